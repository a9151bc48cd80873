import chalk, { type ChalkInstance } from 'chalk';
import type { SessionEvent, ToolStatus, TurnOutcome, UsageSummary } from '@parley/agent';
import type { ThrottleNotice } from '@parley/llm';

const PREVIEW_LIMIT = 80;

export function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length <= max ? flat : `${flat.slice(0, Math.max(0, max - 1))}…`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `query="rust", num_results=3` for object arguments, JSON otherwise. */
export function formatArgs(args: unknown): string {
  if (isRecord(args)) {
    return Object.entries(args)
      .map(([key, value]) => `${key}=${JSON.stringify(value) ?? 'undefined'}`)
      .join(', ');
  }
  return args === undefined ? '' : JSON.stringify(args) ?? '';
}

export type StatusInfo = {
  readonly sessionId: string;
  readonly model: string;
  readonly toolNames: ReadonlyArray<string>;
  readonly turns: number;
  readonly maxToolRounds: number;
};

export type Renderer = {
  /** Lines for an in-flight session event, or null when the event has no visible line. */
  readonly event: (event: SessionEvent) => string | null;
  readonly outcome: (outcome: TurnOutcome) => string;
  readonly throttle: (notice: ThrottleNotice) => string;
  readonly usage: (summary: UsageSummary) => string;
  readonly status: (info: StatusInfo) => string;
  readonly help: () => string;
  readonly error: (message: string) => string;
  readonly banner: (model: string, toolNames: ReadonlyArray<string>) => string;
};

export const COMMANDS: ReadonlyArray<readonly [string, string]> = [
  ['help', 'show this list'],
  ['usage', 'token counts and estimated cost (also: tokens, cost)'],
  ['status', 'model, tools and turn count (also: session)'],
  ['exit', 'leave parley (also: quit, :q, Ctrl-C at the prompt)'],
];

export function createRenderer(c: ChalkInstance = chalk): Renderer {
  const statusMark: Record<ToolStatus, string> = {
    ok: c.green('✓'),
    warning: c.yellow('!'),
    error: c.red('✗'),
  };

  return {
    event(event) {
      switch (event.kind) {
        case 'TOOL_CALL_START':
          return `${c.cyan('⚙')} ${event.toolName}(${truncate(formatArgs(event.args), PREVIEW_LIMIT)})`;
        case 'TOOL_CALL_END':
          return `${statusMark[event.status]} ${event.toolName} ${c.dim(`${Math.round(event.durationMs)}ms`)} ${c.dim(
            truncate(event.content, PREVIEW_LIMIT),
          )}`;
        case 'MODEL_RETRY':
          return c.yellow(
            `retrying model call (attempt ${event.attempt}) in ${(event.delayMs / 1000).toFixed(1)}s: ${event.error.message}`,
          );
        case 'ASSISTANT_TEXT':
          // final text is printed from the turn outcome
          return event.final || !event.text.trim() ? null : c.dim(event.text.trim());
        default:
          return null;
      }
    },

    outcome(outcome) {
      switch (outcome.kind) {
        case 'completed':
          return outcome.text;
        case 'turn_limit':
          return c.yellow(outcome.text);
        case 'error':
          return c.red(`Error: ${outcome.message}`);
        case 'aborted':
          return c.dim('(cancelled)');
      }
    },

    throttle(notice) {
      return c.yellow(`throttling: ${notice.reason}, waiting ${(notice.delayMs / 1000).toFixed(1)}s`);
    },

    usage(summary) {
      const { usage } = summary;
      return [
        c.bold('Usage'),
        `  requests:      ${summary.requests}`,
        `  input tokens:  ${usage.inputTokens.toLocaleString('en-US')}`,
        `  output tokens: ${usage.outputTokens.toLocaleString('en-US')}`,
        `  total tokens:  ${usage.totalTokens.toLocaleString('en-US')}`,
        `  cost:          $${summary.totalCost.toFixed(4)}`,
        `  elapsed:       ${summary.elapsedMinutes.toFixed(1)} min ($${summary.costPerMinute.toFixed(4)}/min)`,
      ].join('\n');
    },

    status(info) {
      return [
        c.bold('Session'),
        `  id:        ${info.sessionId}`,
        `  model:     ${info.model}`,
        `  tools:     ${info.toolNames.length > 0 ? info.toolNames.join(', ') : '(none)'}`,
        `  turns:     ${info.turns}`,
        `  max tool rounds per input: ${info.maxToolRounds}`,
      ].join('\n');
    },

    help() {
      const width = Math.max(...COMMANDS.map(([name]) => name.length));
      return [c.bold('Commands'), ...COMMANDS.map(([name, text]) => `  ${name.padEnd(width)}  ${text}`)].join('\n');
    },

    error(message) {
      return c.red(message);
    },

    banner(model, toolNames) {
      return `${c.bold('parley')} ${c.dim(`· ${model} · tools: ${toolNames.join(', ') || 'none'}`)}\n${c.dim(
        "Type 'help' for commands, 'exit' to quit.",
      )}`;
    },
  };
}
