/**
 * Declaration of a callable function as sent to the model. Carries no
 * executable reference.
 */
export type Tool = {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>;
};

/** A tool call lifted out of a response, without its content tag. */
export type ToolCall = {
  readonly toolCallId: string;
  readonly toolName: string;
  readonly args: Record<string, unknown>;
};

export type ToolChoice =
  | { readonly mode: 'auto' }
  | { readonly mode: 'none' }
  | { readonly mode: 'required' }
  | { readonly mode: 'named'; readonly toolName: string };
