import { isTextPart, isToolCallPart, type ContentPart } from './content.js';
import type { ToolCall } from './tool.js';

/** Why the model stopped; `tool_calls` means it is waiting on tool results. */
export type FinishReason = 'stop' | 'length' | 'tool_calls' | 'content_filter' | 'error';

export type Usage = {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
};

export function usageAdd(a: Readonly<Usage>, b: Readonly<Usage>): Usage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}

export const emptyUsage = (): Usage => ({ inputTokens: 0, outputTokens: 0, totalTokens: 0 });

export type LLMResponse = {
  readonly id: string;
  readonly model: string;
  readonly content: ReadonlyArray<ContentPart>;
  readonly finishReason: FinishReason;
  readonly usage: Usage;
};

/** All TEXT parts joined, tool calls skipped. */
export function responseText(response: Readonly<LLMResponse>): string {
  return response.content.filter(isTextPart).reduce((text, part) => text + part.text, '');
}

/** Tool calls in the order the model emitted them. */
export function responseToolCalls(response: Readonly<LLMResponse>): ReadonlyArray<ToolCall> {
  return response.content
    .filter(isToolCallPart)
    .map(({ toolCallId, toolName, args }) => ({ toolCallId, toolName, args }));
}
