import type {
  Logger,
  ToolCallRequest,
  ToolDescriptor,
  ToolErrorKind,
  ToolResult,
  ToolStatus,
} from '../types/index.js';
import { isToolOutcome, silentLogger } from '../types/index.js';
import type { ToolRegistry } from './registry.js';
import { compileArgumentValidator, type ArgumentValidator } from './schema.js';

export type ExecuteOptions = {
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
};

export type NormalizedOutput = {
  readonly status: ToolStatus;
  readonly content: string;
};

const validators = new WeakMap<ToolDescriptor, ArgumentValidator>();

function validatorFor(descriptor: ToolDescriptor): ArgumentValidator {
  let validator = validators.get(descriptor);
  if (!validator) {
    validator = compileArgumentValidator(descriptor.parameterSchema);
    validators.set(descriptor, validator);
  }
  return validator;
}

function serialize(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return '';
  }
  return JSON.stringify(value);
}

function statusPayload(status: ToolStatus, payload: unknown): string {
  if (typeof payload === 'object' && payload !== null && !Array.isArray(payload)) {
    // the outcome's status wins over a `status` key in the payload
    const details = Object.entries(payload).filter(([key]) => key !== 'status');
    return JSON.stringify({ status, ...Object.fromEntries(details) });
  }
  return JSON.stringify({ status, message: serialize(payload) });
}

/**
 * Turns whatever a handler returned into the text appended to history.
 * Warning and error outcomes carry their status in the JSON so the model
 * can tell them apart from normal output.
 */
export function normalizeOutput(value: unknown): NormalizedOutput {
  if (!isToolOutcome(value)) {
    return { status: 'ok', content: serialize(value) };
  }
  if (value.status === 'ok') {
    return { status: 'ok', content: serialize(value.payload) };
  }
  return { status: value.status, content: statusPayload(value.status, value.payload) };
}

function errorResult(
  call: ToolCallRequest,
  errorKind: ToolErrorKind,
  message: string,
  startedAt: number,
): ToolResult {
  return {
    toolCallId: call.toolCallId,
    toolName: call.name,
    status: 'error',
    content: JSON.stringify({ status: 'error', message }),
    errorKind,
    durationMs: Date.now() - startedAt,
  };
}

/**
 * Resolves, validates and runs one tool call. Never rejects: every failure
 * comes back as an error result so the conversation can carry on.
 */
export async function executeToolCall(
  call: ToolCallRequest,
  registry: ToolRegistry,
  options: ExecuteOptions = {},
): Promise<ToolResult> {
  const startedAt = Date.now();
  const logger = (options.logger ?? silentLogger).child({ tool: call.name, toolCallId: call.toolCallId });

  const descriptor = registry.lookup(call.name);
  if (!descriptor) {
    logger.warn('tool not found');
    return errorResult(call, 'tool_not_found', `tool not found: ${call.name}`, startedAt);
  }

  const validation = validatorFor(descriptor)(call.arguments);
  if (!validation.success) {
    logger.warn('invalid tool arguments', { reason: validation.message });
    return errorResult(call, 'invalid_arguments', validation.message, startedAt);
  }

  try {
    const returned = await descriptor.handler(validation.args, {
      signal: options.signal ?? new AbortController().signal,
      logger,
    });
    const { status, content } = normalizeOutput(returned);
    const durationMs = Date.now() - startedAt;
    logger.debug('tool finished', { status, durationMs });

    return {
      toolCallId: call.toolCallId,
      toolName: call.name,
      status,
      content,
      errorKind: null,
      durationMs,
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn('tool handler failed', { error: message });
    return errorResult(call, 'handler_error', message, startedAt);
  }
}
