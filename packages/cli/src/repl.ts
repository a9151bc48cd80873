import { createInterface } from 'node:readline';
import type { Logger, Session, SessionEvent } from '@parley/agent';
import type { Renderer } from './display.js';

export type ReplCommand = 'exit' | 'usage' | 'status' | 'help';

const COMMAND_ALIASES: Readonly<Record<string, ReplCommand>> = {
  exit: 'exit',
  quit: 'exit',
  ':q': 'exit',
  usage: 'usage',
  tokens: 'usage',
  cost: 'usage',
  status: 'status',
  session: 'status',
  help: 'help',
};

/** Built-in REPL command for a line, or null when the line goes to the model. */
export function parseReplCommand(line: string): ReplCommand | null {
  return COMMAND_ALIASES[line.trim().toLowerCase()] ?? null;
}

export type ReplOptions = {
  readonly session: Session;
  readonly renderer: Renderer;
  readonly toolNames: ReadonlyArray<string>;
  readonly logger: Logger;
  readonly input?: NodeJS.ReadableStream;
  readonly output?: NodeJS.WritableStream;
};

const nextTick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

async function pumpEvents(
  events: AsyncIterable<SessionEvent>,
  renderer: Renderer,
  write: (line: string) => void,
): Promise<void> {
  for await (const event of events) {
    const line = renderer.event(event);
    if (line !== null) {
      write(line);
    }
  }
}

/**
 * Line-oriented chat loop. Ctrl-C cancels the turn in flight, or leaves
 * when the prompt is idle. Prints the usage summary on the way out.
 */
export async function runRepl(options: ReplOptions): Promise<void> {
  const { session, renderer, toolNames, logger } = options;
  const output = options.output ?? process.stdout;
  const write = (line: string): void => {
    output.write(`${line}\n`);
  };

  const rl = createInterface({
    input: options.input ?? process.stdin,
    output,
    prompt: '> ',
    terminal: 'isTTY' in output && output.isTTY === true,
  });

  let busy = false;
  rl.on('SIGINT', () => {
    if (busy) {
      logger.debug('cancelling turn on SIGINT');
      session.abort();
    } else {
      rl.close();
    }
  });

  const pump = pumpEvents(session.events(), renderer, write);

  write(renderer.banner(session.config.model, toolNames));
  rl.prompt();

  try {
    for await (const line of rl) {
      const input = line.trim();
      if (!input) {
        rl.prompt();
        continue;
      }

      const command = parseReplCommand(input);
      if (command === 'exit') {
        break;
      }
      if (command === 'usage') {
        write(renderer.usage(session.usage()));
      } else if (command === 'status') {
        write(
          renderer.status({
            sessionId: session.id,
            model: session.config.model,
            toolNames,
            turns: session.history().filter((turn) => turn.role === 'user').length,
            maxToolRounds: session.config.maxToolRoundsPerInput,
          }),
        );
      } else if (command === 'help') {
        write(renderer.help());
      } else {
        busy = true;
        try {
          const outcome = await session.submit(input);
          // let the event pump flush tool lines before the answer
          await nextTick();
          write(renderer.outcome(outcome));
        } finally {
          busy = false;
        }
      }
      rl.prompt();
    }
  } finally {
    rl.close();
    session.close();
    await pump;
    write('');
    write(renderer.usage(session.usage()));
  }
}
