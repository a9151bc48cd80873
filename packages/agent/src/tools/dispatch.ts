import type { Logger, ToolCallRequest, ToolResult } from '../types/index.js';
import type { ToolRegistry } from './registry.js';
import { executeToolCall } from './executor.js';

export type DispatchHooks = {
  readonly onStart?: (call: ToolCallRequest) => void;
  readonly onEnd?: (result: ToolResult) => void;
};

export type DispatchOptions = {
  readonly parallel: boolean;
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
  readonly hooks?: DispatchHooks;
};

/**
 * Runs a batch of tool calls from one model response. Results come back in
 * request order whether the calls ran one after another or concurrently.
 */
export async function dispatchToolCalls(
  calls: ReadonlyArray<ToolCallRequest>,
  registry: ToolRegistry,
  options: DispatchOptions,
): Promise<ReadonlyArray<ToolResult>> {
  if (options.parallel) {
    return dispatchParallel(calls, registry, options);
  }

  return dispatchSequential(calls, registry, options);
}

async function dispatchParallel(
  calls: ReadonlyArray<ToolCallRequest>,
  registry: ToolRegistry,
  options: DispatchOptions,
): Promise<ReadonlyArray<ToolResult>> {
  const settled = await Promise.allSettled(calls.map((call) => runOne(call, registry, options)));

  return calls.map((call, index): ToolResult => {
    const result = settled[index];

    if (result?.status === 'fulfilled') {
      return result.value;
    }

    return {
      toolCallId: call.toolCallId,
      toolName: call.name,
      status: 'error',
      content: JSON.stringify({ status: 'error', message: `tool execution failed: ${String(result?.reason)}` }),
      errorKind: 'handler_error',
      durationMs: 0,
    };
  });
}

async function dispatchSequential(
  calls: ReadonlyArray<ToolCallRequest>,
  registry: ToolRegistry,
  options: DispatchOptions,
): Promise<ReadonlyArray<ToolResult>> {
  const results: Array<ToolResult> = [];

  for (const call of calls) {
    results.push(await runOne(call, registry, options));
  }

  return results;
}

async function runOne(
  call: ToolCallRequest,
  registry: ToolRegistry,
  options: DispatchOptions,
): Promise<ToolResult> {
  options.hooks?.onStart?.(call);
  const result = await executeToolCall(call, registry, { signal: options.signal, logger: options.logger });
  options.hooks?.onEnd?.(result);
  return result;
}
