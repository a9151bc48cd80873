import type { Logger } from './logger.js';

export type ParameterKind = 'string' | 'integer' | 'number' | 'boolean' | 'object' | 'array';

export type ParameterSpec = {
  readonly kind: ParameterKind;
  readonly description: string;
  readonly required?: boolean;
  readonly default?: unknown;
  /** Element spec for `array` parameters. */
  readonly items?: ParameterSpec;
};

export type ParameterSchema = {
  readonly properties: Readonly<Record<string, ParameterSpec>>;
  readonly required: ReadonlyArray<string>;
};

export type ToolContext = {
  readonly signal: AbortSignal;
  readonly logger: Logger;
};

/**
 * Receives arguments already validated and coerced against the tool's
 * parameter schema. May resolve to a string, any JSON-serializable value,
 * or a ToolOutcome.
 */
export type ToolHandler = (
  args: Readonly<Record<string, unknown>>,
  context: ToolContext,
) => Promise<unknown>;

export type ToolDescriptor = {
  readonly name: string;
  readonly description: string;
  readonly category: string;
  readonly parameterSchema: ParameterSchema;
  readonly handler: ToolHandler;
};

export type ToolStatus = 'ok' | 'warning' | 'error';

export const TOOL_OUTCOME: unique symbol = Symbol('parley.toolOutcome');

export type ToolOutcome = {
  readonly [TOOL_OUTCOME]: true;
  readonly status: ToolStatus;
  readonly payload: unknown;
};

export function ok(payload: unknown): ToolOutcome {
  return { [TOOL_OUTCOME]: true, status: 'ok', payload };
}

export function warning(message: string, details?: Readonly<Record<string, unknown>>): ToolOutcome {
  return { [TOOL_OUTCOME]: true, status: 'warning', payload: { message, ...details } };
}

export function failure(message: string): ToolOutcome {
  return { [TOOL_OUTCOME]: true, status: 'error', payload: { message } };
}

export function isToolOutcome(value: unknown): value is ToolOutcome {
  return typeof value === 'object' && value !== null && TOOL_OUTCOME in value;
}

/** A function-call request as emitted by the model. Arguments are untrusted. */
export type ToolCallRequest = {
  readonly toolCallId: string;
  readonly name: string;
  readonly arguments: unknown;
};

export type ToolErrorKind = 'tool_not_found' | 'invalid_arguments' | 'handler_error';

export type ToolResult = {
  readonly toolCallId: string;
  readonly toolName: string;
  readonly status: ToolStatus;
  /** Normalized text appended to history. */
  readonly content: string;
  readonly errorKind: ToolErrorKind | null;
  readonly durationMs: number;
};
