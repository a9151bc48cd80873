import type { Message } from './message.js';
import type { Tool, ToolChoice } from './tool.js';

export type LLMRequest = {
  readonly model: string;
  readonly provider?: string;
  readonly messages: ReadonlyArray<Message>;
  readonly system?: string;
  readonly tools?: ReadonlyArray<Tool>;
  readonly toolChoice?: ToolChoice;
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly topP?: number;
  readonly stopSequences?: ReadonlyArray<string>;
  /** Per-request deadline in milliseconds. */
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  readonly providerOptions?: Record<string, Record<string, unknown>>;
};
