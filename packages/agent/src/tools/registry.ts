import type { Tool } from '@parley/llm';
import type { ParameterSpec, ToolDescriptor } from '../types/index.js';
import { DuplicateToolNameError, InvalidToolSchemaError } from './errors.js';

/** Read-only once built; safe to share across turns. */
export type ToolRegistry = {
  readonly lookup: (name: string) => ToolDescriptor | null;
  readonly has: (name: string) => boolean;
  readonly describeAll: () => ReadonlyArray<Tool>;
  readonly list: () => ReadonlyArray<ToolDescriptor>;
  readonly size: () => number;
};

export type ToolRegistryBuilder = {
  readonly register: (descriptor: ToolDescriptor) => ToolRegistryBuilder;
  readonly build: () => ToolRegistry;
};

function declareParameter(spec: ParameterSpec): Record<string, unknown> {
  const declaration: Record<string, unknown> = {
    type: spec.kind,
    description: spec.description,
  };
  if (spec.items) {
    declaration['items'] = declareParameter(spec.items);
  }
  return declaration;
}

function declareTool(descriptor: ToolDescriptor): Tool {
  const properties: Record<string, unknown> = {};
  for (const [name, spec] of Object.entries(descriptor.parameterSchema.properties)) {
    properties[name] = declareParameter(spec);
  }

  return {
    name: descriptor.name,
    description: descriptor.description,
    parameters: {
      type: 'object',
      properties,
      required: [...descriptor.parameterSchema.required],
    },
  };
}

function checkParameter(toolName: string, paramName: string, spec: ParameterSpec): void {
  if (spec.kind === 'array' && !spec.items) {
    throw new InvalidToolSchemaError(toolName, `array parameter '${paramName}' has no items spec`);
  }
  if (spec.items) {
    checkParameter(toolName, `${paramName}[]`, spec.items);
  }
}

function checkDescriptor(descriptor: ToolDescriptor): void {
  if (descriptor.name.trim().length === 0) {
    throw new InvalidToolSchemaError(descriptor.name, 'name must not be empty');
  }

  const { properties, required } = descriptor.parameterSchema;
  for (const name of required) {
    if (!Object.hasOwn(properties, name)) {
      throw new InvalidToolSchemaError(descriptor.name, `required parameter '${name}' is not declared`);
    }
  }

  for (const [name, spec] of Object.entries(properties)) {
    checkParameter(descriptor.name, name, spec);
  }
}

function freezeRegistry(descriptors: ReadonlyArray<ToolDescriptor>): ToolRegistry {
  const tools = new Map<string, ToolDescriptor>();
  for (const descriptor of descriptors) {
    tools.set(descriptor.name, descriptor);
  }

  const snapshot = Object.freeze([...descriptors]);
  const declarations = Object.freeze(snapshot.map(declareTool));

  return Object.freeze({
    lookup: (name: string) => tools.get(name) ?? null,
    has: (name: string) => tools.has(name),
    describeAll: () => declarations,
    list: () => snapshot,
    size: () => snapshot.length,
  });
}

/**
 * Collects descriptors in registration order. A rejected registration
 * leaves the builder unchanged.
 */
export function createToolRegistryBuilder(): ToolRegistryBuilder {
  const pending: Array<ToolDescriptor> = [];

  const builder: ToolRegistryBuilder = {
    register(descriptor: ToolDescriptor): ToolRegistryBuilder {
      checkDescriptor(descriptor);
      if (pending.some((existing) => existing.name === descriptor.name)) {
        throw new DuplicateToolNameError(descriptor.name);
      }
      pending.push(descriptor);
      return builder;
    },
    build(): ToolRegistry {
      return freezeRegistry(pending);
    },
  };

  return builder;
}

export function createToolRegistry(descriptors: ReadonlyArray<ToolDescriptor>): ToolRegistry {
  const builder = createToolRegistryBuilder();
  for (const descriptor of descriptors) {
    builder.register(descriptor);
  }
  return builder.build();
}
