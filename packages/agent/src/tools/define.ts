import type { ParameterSpec, ToolDescriptor, ToolHandler } from '../types/index.js';

export type ToolDefinition = {
  readonly name: string;
  readonly description: string;
  readonly category?: string;
  readonly parameters?: Readonly<Record<string, ParameterSpec>>;
  readonly handler: ToolHandler;
};

/**
 * Builds a frozen descriptor. The required set is read off each parameter's
 * `required` flag, in declaration order.
 */
export function defineTool(definition: ToolDefinition): ToolDescriptor {
  const properties = { ...definition.parameters };
  const required = Object.entries(properties)
    .filter(([, spec]) => spec.required === true)
    .map(([name]) => name);

  return Object.freeze({
    name: definition.name,
    description: definition.description,
    category: definition.category ?? 'general',
    parameterSchema: Object.freeze({
      properties: Object.freeze(properties),
      required: Object.freeze(required),
    }),
    handler: definition.handler,
  });
}
