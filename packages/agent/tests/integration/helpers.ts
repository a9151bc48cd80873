import { Client } from '@parley/llm';
import type { ContentPart, LLMRequest, LLMResponse, ProviderAdapter } from '@parley/llm';

export type ScriptStep =
  | ReadonlyArray<ContentPart>
  | Error
  | ((request: LLMRequest) => Promise<LLMResponse>);

export const STEP_USAGE = { inputTokens: 10, outputTokens: 5, totalTokens: 15 } as const;

export function text(value: string): ContentPart {
  return { kind: 'TEXT', text: value };
}

export function call(toolCallId: string, toolName: string, args: Record<string, unknown> = {}): ContentPart {
  return { kind: 'TOOL_CALL', toolCallId, toolName, args };
}

export function reply(content: ReadonlyArray<ContentPart>): LLMResponse {
  return {
    id: 'resp',
    model: 'gemini-2.5-flash',
    content,
    finishReason: content.some((part) => part.kind === 'TOOL_CALL') ? 'tool_calls' : 'stop',
    usage: STEP_USAGE,
  };
}

/** Plays back a fixed list of model replies and records every request. */
export class ScriptedAdapter implements ProviderAdapter {
  readonly name = 'scripted';
  readonly requests: Array<LLMRequest> = [];
  private readonly steps: Array<ScriptStep>;

  constructor(steps: ReadonlyArray<ScriptStep>) {
    this.steps = [...steps];
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    this.requests.push(request);
    const step = this.steps.shift();

    if (step === undefined) {
      throw new Error('script exhausted');
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return step(request);
    }
    return reply(step);
  }
}

export function scriptedClient(steps: ReadonlyArray<ScriptStep>): { client: Client; adapter: ScriptedAdapter } {
  const adapter = new ScriptedAdapter(steps);
  return { client: new Client({ providers: { scripted: adapter } }), adapter };
}

export const FAST_RETRY = { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 5, backoffMultiplier: 2 } as const;
