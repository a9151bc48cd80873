import { readFileSync } from 'node:fs';
import { createInterface } from 'node:readline/promises';
import { fileURLToPath } from 'node:url';
import { config as dotenvConfig } from 'dotenv';
import { Client, ConfigurationError, GeminiAdapter, RateLimiter, rateLimitMiddleware } from '@parley/llm';
import { ConsoleLogger, createBuiltinTools, createSession, createToolRegistry, type Logger } from '@parley/agent';
import { defaultConfigPath, loadConfig, type AppConfig, type Env } from './config.js';
import { createRenderer } from './display.js';
import { ConfigurationMissingError } from './errors.js';
import { runRepl } from './repl.js';
import { runSetup } from './setup.js';
import { loadSystemInstruction } from './system-instruction.js';

export type CliCommand = 'repl' | 'config' | 'version' | 'help' | 'unknown';

export function parseCommand(args: ReadonlyArray<string>): CliCommand {
  const command = args[0]?.toLowerCase();
  switch (command) {
    case undefined:
    case 'repl':
    case 'chat':
      return 'repl';
    case 'config':
    case '--config':
      return 'config';
    case 'version':
    case '--version':
    case '-v':
      return 'version';
    case 'help':
    case '--help':
    case '-h':
      return 'help';
    default:
      return 'unknown';
  }
}

export function getVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL('../package.json', import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // bundled without package.json beside it
  }
  return '0.0.0';
}

export const USAGE = `parley: a terminal assistant with web search

Usage:
  parley              start a chat session
  parley --config     set API keys (stored in ~/.parley/config.json)
  parley --version    print the version
  parley --help       show this message

Environment:
  GEMINI_API_KEY          overrides api_key from the config file
  SERPER_API_KEY          overrides serper_api_key
  PARLEY_MODEL            model name (default gemini-2.5-flash)
  PARLEY_MAX_TOOL_ROUNDS  tool rounds allowed per input (default 10)
  PARLEY_LOG_LEVEL        debug, info, warn or error (default warn)
  PARLEY_CONFIG_PATH      alternative config file location`;

async function prompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

const print = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

async function startRepl(env: Env): Promise<number> {
  const renderer = createRenderer();
  let config: AppConfig;
  try {
    config = await loadConfig({ env });
  } catch (err) {
    if (err instanceof ConfigurationMissingError) {
      process.stderr.write(`${renderer.error(err.message)}\nRun \`parley --config\` to add one.\n`);
      return 1;
    }
    if (err instanceof ConfigurationError) {
      process.stderr.write(`${renderer.error(`Configuration error: ${err.message}`)}\n`);
      return 1;
    }
    throw err;
  }

  const logger: Logger = new ConsoleLogger(config.logLevel, { app: 'parley' });
  const systemInstruction = await loadSystemInstruction(logger);
  const limiter = new RateLimiter({
    onThrottle: (notice) => {
      logger.info('throttling model call', { limitedBy: notice.limitedBy, delayMs: Math.round(notice.delayMs) });
      process.stdout.write(`${renderer.throttle(notice)}\n`);
    },
  });
  const client = new Client({
    providers: { gemini: new GeminiAdapter(config.apiKey) },
    middleware: [rateLimitMiddleware(limiter)],
  });
  const registry = createToolRegistry(createBuiltinTools({ serperApiKey: config.serperApiKey }));
  if (!config.serperApiKey) {
    logger.info('no Serper API key; search_web will report that it is not configured');
  }

  const session = createSession({
    client,
    registry,
    logger,
    config: {
      model: config.model,
      provider: 'gemini',
      systemInstruction,
      maxToolRoundsPerInput: config.maxToolRounds,
    },
  });

  try {
    await runRepl({ session, renderer, logger, toolNames: registry.list().map((tool) => tool.name) });
  } finally {
    await client.close();
  }
  return 0;
}

/** Resolves to the process exit code. */
export async function runCli(args: ReadonlyArray<string>, env: Env = process.env): Promise<number> {
  dotenvConfig();

  switch (parseCommand(args)) {
    case 'repl':
      return startRepl(env);
    case 'config': {
      const logger = new ConsoleLogger('warn', { app: 'parley' });
      await runSetup({ path: defaultConfigPath(env), prompt, print, logger });
      return 0;
    }
    case 'version':
      print(`parley v${getVersion()}`);
      return 0;
    case 'help':
      print(USAGE);
      return 0;
    case 'unknown':
      process.stderr.write(`Unknown command: ${args[0] ?? ''}\n\n${USAGE}\n`);
      return 1;
  }
}
