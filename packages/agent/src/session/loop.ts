import type { Client, LLMRequest, LLMResponse, Message, RetryPolicy } from '@parley/llm';
import {
  AbortError,
  assistantMessage,
  responseText,
  responseToolCalls,
  retry,
  toolMessage,
  userMessage,
} from '@parley/llm';
import type { Logger, ToolCallRequest, Turn, TurnOutcome } from '../types/index.js';
import type { ToolRegistry } from '../tools/registry.js';
import { dispatchToolCalls } from '../tools/dispatch.js';
import type { SessionEventEmitter } from './events.js';
import type { UsageTracker } from './usage.js';

export type ModelClient = Pick<Client, 'complete'>;

export type ResolvedSessionConfig = {
  readonly model: string;
  readonly provider: string | undefined;
  readonly systemInstruction: string | undefined;
  readonly maxToolRoundsPerInput: number;
  readonly parallelToolCalls: boolean;
  readonly temperature: number;
  readonly topP: number;
  readonly maxTokens: number;
  readonly requestTimeoutMs: number;
};

export type LoopContext = {
  readonly sessionId: string;
  readonly client: ModelClient;
  readonly registry: ToolRegistry;
  readonly config: ResolvedSessionConfig;
  readonly retryPolicy: RetryPolicy;
  readonly history: Array<Turn>;
  readonly eventEmitter: SessionEventEmitter;
  readonly usage: UsageTracker;
  readonly logger: Logger;
  readonly signal: AbortSignal;
};

export function turnLimitMessage(rounds: number): string {
  return `Turn aborted: the model requested tools for ${rounds} consecutive rounds without producing an answer.`;
}

export function historyToMessages(history: ReadonlyArray<Turn>): Array<Message> {
  return history.map((turn) => {
    switch (turn.role) {
      case 'user':
        return userMessage(turn.content);
      case 'model':
        return assistantMessage(turn.content);
      case 'tool_result':
        return toolMessage(turn.toolCallId, turn.toolName, turn.content, turn.status === 'error');
    }
  });
}

/** Rejects with AbortError as soon as the signal fires, even if `work` never settles. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new AbortError('Turn was aborted'));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new AbortError('Turn was aborted'));
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

function buildRequest(context: LoopContext): LLMRequest {
  const { config } = context;
  return {
    model: config.model,
    provider: config.provider,
    system: config.systemInstruction,
    messages: historyToMessages(context.history),
    tools: context.registry.describeAll(),
    temperature: config.temperature,
    topP: config.topP,
    maxTokens: config.maxTokens,
    timeoutMs: config.requestTimeoutMs,
    signal: context.signal,
  };
}

async function callModel(context: LoopContext, round: number): Promise<LLMResponse> {
  const { eventEmitter, logger, signal } = context;
  const request = buildRequest(context);

  eventEmitter.emit({ kind: 'MODEL_CALL_START', round });
  logger.debug('model call', { round, model: request.model, messages: request.messages.length });

  return untilAborted(
    retry(() => context.client.complete(request), {
      policy: context.retryPolicy,
      signal,
      onRetry: (error, attempt, delayMs) => {
        logger.warn('model call failed, retrying', { attempt, delayMs, error: error.message });
        eventEmitter.emit({ kind: 'MODEL_RETRY', attempt, delayMs, error });
      },
    }),
    signal,
  );
}

/**
 * Drives one user input to completion: model call, tool dispatch, repeat,
 * until the model answers in plain text or the round cap is reached.
 * The user turn must already be in history; the caller owns rollback.
 */
export async function processInput(context: LoopContext): Promise<TurnOutcome> {
  const { config, eventEmitter, history, logger, signal } = context;
  let round = 0;

  try {
    while (true) {
      const response = await callModel(context, round);
      context.usage.record(response.model, response.usage);

      const text = responseText(response);
      const toolCalls = responseToolCalls(response);

      if (toolCalls.length === 0) {
        history.push({ role: 'model', content: response.content });
        eventEmitter.emit({ kind: 'ASSISTANT_TEXT', text, final: true });
        return { kind: 'completed', text };
      }

      if (round >= config.maxToolRoundsPerInput) {
        const limitText = turnLimitMessage(round);
        logger.warn('tool round cap reached', { rounds: round });
        history.push({ role: 'model', content: [{ kind: 'TEXT', text: limitText }] });
        eventEmitter.emit({ kind: 'TURN_LIMIT', rounds: round });
        return { kind: 'turn_limit', text: limitText };
      }

      if (text.length > 0) {
        eventEmitter.emit({ kind: 'ASSISTANT_TEXT', text, final: false });
      }

      const requests: Array<ToolCallRequest> = toolCalls.map((call) => ({
        toolCallId: call.toolCallId,
        name: call.toolName,
        arguments: call.args,
      }));

      const results = await untilAborted(
        dispatchToolCalls(requests, context.registry, {
          parallel: config.parallelToolCalls,
          signal,
          logger,
          hooks: {
            onStart: (call) =>
              eventEmitter.emit({
                kind: 'TOOL_CALL_START',
                toolCallId: call.toolCallId,
                toolName: call.name,
                args: call.arguments,
              }),
            onEnd: (result) => {
              if (!signal.aborted) {
                eventEmitter.emit({ kind: 'TOOL_CALL_END', ...result });
              }
            },
          },
        }),
        signal,
      );

      // model turn and its results land together or not at all
      history.push({ role: 'model', content: response.content });
      for (const result of results) {
        history.push({
          role: 'tool_result',
          toolCallId: result.toolCallId,
          toolName: result.toolName,
          status: result.status,
          content: result.content,
        });
      }

      round += 1;
    }
  } catch (err) {
    if (signal.aborted || err instanceof AbortError) {
      logger.debug('turn aborted', { round });
      eventEmitter.emit({ kind: 'TURN_ABORTED' });
      return { kind: 'aborted' };
    }

    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn('turn failed', { round, error: error.message });
    eventEmitter.emit({ kind: 'TURN_ERROR', error });
    return { kind: 'error', message: error.message, error };
  }
}
