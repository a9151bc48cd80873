import type { ToolErrorKind, ToolStatus } from './tool.js';

export type SessionEvent =
  | { readonly kind: 'SESSION_START'; readonly sessionId: string }
  | { readonly kind: 'SESSION_END'; readonly sessionId: string }
  | { readonly kind: 'MODEL_CALL_START'; readonly round: number }
  | { readonly kind: 'ASSISTANT_TEXT'; readonly text: string; readonly final: boolean }
  | {
      readonly kind: 'TOOL_CALL_START';
      readonly toolCallId: string;
      readonly toolName: string;
      readonly args: unknown;
    }
  | {
      readonly kind: 'TOOL_CALL_END';
      readonly toolCallId: string;
      readonly toolName: string;
      readonly status: ToolStatus;
      readonly content: string;
      readonly errorKind: ToolErrorKind | null;
      readonly durationMs: number;
    }
  | { readonly kind: 'MODEL_RETRY'; readonly attempt: number; readonly delayMs: number; readonly error: Error }
  | { readonly kind: 'TURN_LIMIT'; readonly rounds: number }
  | { readonly kind: 'TURN_ERROR'; readonly error: Error }
  | { readonly kind: 'TURN_ABORTED' };

export type EventKind = SessionEvent['kind'];
