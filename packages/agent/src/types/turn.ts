import type { ContentPart } from '@parley/llm';
import type { ToolStatus } from './tool.js';

export type UserTurn = {
  readonly role: 'user';
  readonly content: string;
};

export type ModelTurn = {
  readonly role: 'model';
  readonly content: ReadonlyArray<ContentPart>;
};

/** One per tool call, in the order the model requested them. */
export type ToolResultTurn = {
  readonly role: 'tool_result';
  readonly toolCallId: string;
  readonly toolName: string;
  readonly status: ToolStatus;
  readonly content: string;
};

export type Turn = UserTurn | ModelTurn | ToolResultTurn;
