import { nanoid } from 'nanoid';
import type { RetryPolicy } from '@parley/llm';
import { DEFAULT_RETRY_POLICY } from '@parley/llm';
import type {
  Logger,
  SessionConfig,
  SessionEvent,
  SessionState,
  Turn,
  TurnOutcome,
} from '../types/index.js';
import { silentLogger } from '../types/index.js';
import type { ToolRegistry } from '../tools/registry.js';
import { createSessionEventEmitter } from './events.js';
import { createUsageTracker, type UsageSummary } from './usage.js';
import { processInput, type ModelClient, type ResolvedSessionConfig } from './loop.js';

export const DEFAULT_MODEL = 'gemini-2.5-flash';

export const SESSION_DEFAULTS = {
  model: DEFAULT_MODEL,
  maxToolRoundsPerInput: 10,
  parallelToolCalls: true,
  temperature: 0.8,
  topP: 0.9,
  maxTokens: 8192,
  requestTimeoutMs: 120_000,
} as const;

export type SessionOptions = {
  readonly client: ModelClient;
  readonly registry: ToolRegistry;
  readonly config?: SessionConfig;
  readonly logger?: Logger;
  readonly retryPolicy?: RetryPolicy;
};

export type Session = {
  readonly id: string;
  readonly submit: (input: string) => Promise<TurnOutcome>;
  /** Cancels the turn in flight, if any. The session stays usable. */
  readonly abort: () => void;
  readonly close: () => void;
  readonly events: () => AsyncIterable<SessionEvent>;
  readonly state: () => SessionState;
  readonly history: () => ReadonlyArray<Turn>;
  readonly usage: () => UsageSummary;
  readonly config: ResolvedSessionConfig;
};

export function resolveSessionConfig(config: SessionConfig = {}): ResolvedSessionConfig {
  const maxToolRoundsPerInput = config.maxToolRoundsPerInput ?? SESSION_DEFAULTS.maxToolRoundsPerInput;
  if (!Number.isInteger(maxToolRoundsPerInput) || maxToolRoundsPerInput < 0) {
    throw new RangeError(`maxToolRoundsPerInput must be a non-negative integer, got ${maxToolRoundsPerInput}`);
  }

  return {
    model: config.model ?? SESSION_DEFAULTS.model,
    provider: config.provider,
    systemInstruction: config.systemInstruction,
    maxToolRoundsPerInput,
    parallelToolCalls: config.parallelToolCalls ?? SESSION_DEFAULTS.parallelToolCalls,
    temperature: config.temperature ?? SESSION_DEFAULTS.temperature,
    topP: config.topP ?? SESSION_DEFAULTS.topP,
    maxTokens: config.maxTokens ?? SESSION_DEFAULTS.maxTokens,
    requestTimeoutMs: config.requestTimeoutMs ?? SESSION_DEFAULTS.requestTimeoutMs,
  };
}

export function createSession(options: SessionOptions): Session {
  const sessionId = nanoid();
  const config = resolveSessionConfig(options.config);
  const logger = (options.logger ?? silentLogger).child({ sessionId });
  const retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  const history: Array<Turn> = [];
  const eventEmitter = createSessionEventEmitter();
  const usage = createUsageTracker();
  let currentState: SessionState = 'IDLE';
  let turnController: AbortController | null = null;

  eventEmitter.emit({ kind: 'SESSION_START', sessionId });
  logger.debug('session started', { model: config.model, tools: options.registry.size() });

  const submit = async (input: string): Promise<TurnOutcome> => {
    if (currentState === 'CLOSED') {
      throw new Error('Session is closed');
    }
    if (currentState === 'PROCESSING') {
      throw new Error('A turn is already in progress');
    }

    currentState = 'PROCESSING';
    const controller = new AbortController();
    turnController = controller;
    const checkpoint = history.length;

    history.push({ role: 'user', content: input });

    try {
      const outcome = await processInput({
        sessionId,
        client: options.client,
        registry: options.registry,
        config,
        retryPolicy,
        history,
        eventEmitter,
        usage,
        logger,
        signal: controller.signal,
      });

      if (outcome.kind === 'aborted' || outcome.kind === 'error') {
        history.length = checkpoint;
      }

      return outcome;
    } finally {
      turnController = null;
      if (currentState === 'PROCESSING') {
        currentState = 'IDLE';
      }
    }
  };

  const abort = (): void => {
    turnController?.abort();
  };

  const close = (): void => {
    if (currentState === 'CLOSED') {
      return;
    }
    turnController?.abort();
    currentState = 'CLOSED';
    logger.debug('session closed', { turns: history.length });
    eventEmitter.emit({ kind: 'SESSION_END', sessionId });
    eventEmitter.complete();
  };

  return {
    id: sessionId,
    submit,
    abort,
    close,
    events: () => eventEmitter.iterator(),
    state: () => currentState,
    history: () => [...history],
    usage: () => usage.summary(),
    config,
  };
}
