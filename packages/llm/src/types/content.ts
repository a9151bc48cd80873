export type Role = 'system' | 'user' | 'assistant' | 'tool';

export type TextData = {
  readonly kind: 'TEXT';
  readonly text: string;
};

/** A model's request to run a local tool. `args` is whatever the model sent, unvalidated. */
export type ToolCallData = {
  readonly kind: 'TOOL_CALL';
  readonly toolCallId: string;
  readonly toolName: string;
  readonly args: Record<string, unknown>;
};

/** A tool's output, returned to the model under the id of the call it answers. */
export type ToolResultData = {
  readonly kind: 'TOOL_RESULT';
  readonly toolCallId: string;
  readonly toolName: string;
  readonly content: string;
  readonly isError: boolean;
};

export type ContentPart = TextData | ToolCallData | ToolResultData;

export function isTextPart(part: ContentPart): part is TextData {
  return part.kind === 'TEXT';
}

export function isToolCallPart(part: ContentPart): part is ToolCallData {
  return part.kind === 'TOOL_CALL';
}
