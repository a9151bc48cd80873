export type SessionState = 'IDLE' | 'PROCESSING' | 'CLOSED';

export type SessionConfig = {
  readonly model?: string;
  readonly provider?: string;
  readonly systemInstruction?: string;
  /** Consecutive tool-call rounds allowed within one user input. */
  readonly maxToolRoundsPerInput?: number;
  readonly parallelToolCalls?: boolean;
  readonly temperature?: number;
  readonly topP?: number;
  readonly maxTokens?: number;
  readonly requestTimeoutMs?: number;
};

export type TurnOutcome =
  | { readonly kind: 'completed'; readonly text: string }
  | { readonly kind: 'turn_limit'; readonly text: string }
  | { readonly kind: 'error'; readonly message: string; readonly error: Error }
  | { readonly kind: 'aborted' };
