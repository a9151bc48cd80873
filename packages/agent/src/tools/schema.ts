import { z } from 'zod';
import type { ParameterKind, ParameterSchema, ParameterSpec } from '../types/index.js';

export type ArgumentValidation =
  | { readonly success: true; readonly args: Readonly<Record<string, unknown>> }
  | { readonly success: false; readonly message: string };

export type ArgumentValidator = (raw: unknown) => ArgumentValidation;

const jsonText = z.string().transform((text, ctx) => {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'not valid JSON' });
    return z.NEVER;
  }
});

const plainObject = z.record(z.unknown());

const KIND_LABEL: Record<ParameterKind, string> = {
  string: 'a string',
  integer: 'an integer',
  number: 'a number',
  boolean: 'a boolean',
  object: 'a JSON object',
  array: 'an array',
};

/**
 * Models emit loosely typed arguments, so each kind accepts the obvious
 * textual encodings of its values as well as the value itself.
 */
function coercerFor(spec: ParameterSpec): z.ZodType<unknown> {
  switch (spec.kind) {
    case 'string':
      return z.union([
        z.string(),
        z.number().finite().transform(String),
        z.boolean().transform(String),
      ]);

    case 'integer':
      return z.union([
        z.number().int(),
        z.string().trim().regex(/^[-+]?\d+$/).transform(Number),
      ]);

    case 'number':
      return z.union([
        z.number().finite(),
        z.string().trim().min(1).transform(Number).pipe(z.number().finite()),
      ]);

    case 'boolean':
      return z.union([
        z.boolean(),
        z
          .string()
          .trim()
          .toLowerCase()
          .pipe(z.enum(['true', 'false']))
          .transform((value) => value === 'true'),
      ]);

    case 'object':
      return z.union([plainObject, jsonText.pipe(plainObject)]);

    case 'array': {
      const element = spec.items ? coercerFor(spec.items) : z.unknown();
      return z.union([z.array(element), jsonText.pipe(z.array(element))]);
    }
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Compiles a parameter schema into a validator. Null counts as absent,
 * absent optional parameters take their declared default, and keys the
 * schema does not declare are dropped.
 */
export function compileArgumentValidator(schema: ParameterSchema): ArgumentValidator {
  const required = new Set(schema.required);
  const fields = Object.entries(schema.properties).map(([name, spec]) => ({
    name,
    spec,
    coercer: coercerFor(spec),
  }));

  return (raw: unknown): ArgumentValidation => {
    if (!isPlainObject(raw)) {
      return { success: false, message: 'arguments must be a JSON object' };
    }

    const args: Record<string, unknown> = {};

    for (const { name, spec, coercer } of fields) {
      const value = raw[name];

      if (value === undefined || value === null) {
        if (required.has(name)) {
          return { success: false, message: `missing required parameter '${name}'` };
        }
        if (spec.default !== undefined) {
          args[name] = spec.default;
        }
        continue;
      }

      const parsed = coercer.safeParse(value);
      if (!parsed.success) {
        return {
          success: false,
          message: `invalid value for parameter '${name}': expected ${KIND_LABEL[spec.kind]}`,
        };
      }
      args[name] = parsed.data;
    }

    return { success: true, args };
  };
}
