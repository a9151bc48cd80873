import { ConfigurationError } from '@parley/llm';
import type { Logger } from '@parley/agent';
import { readConfigFile, writeConfigFile, type ConfigFile } from './config.js';

export type Prompter = (question: string) => Promise<string>;

export type SetupOptions = {
  readonly path: string;
  readonly prompt: Prompter;
  readonly print: (line: string) => void;
  readonly logger: Logger;
};

function mask(value: string | undefined): string {
  if (!value) {
    return 'not set';
  }
  return value.length <= 4 ? 'set' : `set, ends in ${value.slice(-4)}`;
}

/**
 * Interactive `parley --config`. A blank answer keeps the current value;
 * keys the prompts do not cover are carried over untouched.
 */
export async function runSetup(options: SetupOptions): Promise<ConfigFile> {
  const { path, prompt, print, logger } = options;

  let existing: ConfigFile = {};
  try {
    existing = await readConfigFile(path);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) {
      throw err;
    }
    logger.warn('existing config is unreadable, starting from defaults', { path, error: err.message });
    print(`Existing config could not be read (${err.message}); starting fresh.`);
  }

  print(`Configuring parley (${path})`);

  const apiKey = (await prompt(`Gemini API key [${mask(existing.api_key)}]: `)).trim();
  const serperKey = (await prompt(`Serper API key for web search [${mask(existing.serper_api_key)}]: `)).trim();

  const next: ConfigFile = {
    ...existing,
    ...(apiKey ? { api_key: apiKey } : {}),
    ...(serperKey ? { serper_api_key: serperKey } : {}),
  };

  if (!next.api_key) {
    print('No Gemini API key set. parley will not start until one is configured.');
  }

  await writeConfigFile(path, next);
  print(`Saved ${path}`);
  return next;
}
