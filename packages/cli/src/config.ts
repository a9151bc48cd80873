import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '@parley/llm';
import { DEFAULT_MODEL, SESSION_DEFAULTS, isLogLevel, type LogLevel } from '@parley/agent';
import { ConfigurationMissingError } from './errors.js';

export const ConfigFileSchema = z
  .object({
    api_key: z.string().optional(),
    serper_api_key: z.string().optional(),
    model: z.string().min(1).optional(),
    max_tool_rounds: z.number().int().nonnegative().optional(),
  })
  .passthrough();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type AppConfig = {
  readonly apiKey: string;
  readonly serperApiKey: string | undefined;
  readonly model: string;
  readonly maxToolRounds: number;
  readonly logLevel: LogLevel;
  readonly configPath: string;
};

export type Env = Readonly<Record<string, string | undefined>>;

export function defaultConfigPath(env: Env = process.env): string {
  return nonEmpty(env['PARLEY_CONFIG_PATH']) ?? join(homedir(), '.parley', 'config.json');
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** A missing file reads as empty; a malformed one is a ConfigurationError. */
export async function readConfigFile(path: string): Promise<ConfigFile> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      return {};
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ConfigurationError(`${path} is not valid JSON`);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw new ConfigurationError(`${path}: ${where}: ${issue?.message ?? 'invalid configuration'}`);
  }
  return parsed.data;
}

export async function writeConfigFile(path: string, file: ConfigFile): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(file, null, 2)}\n`, 'utf-8');
}

function envInt(env: Env, key: string): number | undefined {
  const raw = nonEmpty(env[key]);
  if (raw === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${key} must be a non-negative integer, got '${raw}'`);
  }
  return Number(raw);
}

function envLogLevel(env: Env): LogLevel {
  const raw = nonEmpty(env['PARLEY_LOG_LEVEL'])?.toLowerCase();
  if (raw === undefined) {
    return 'warn';
  }
  if (!isLogLevel(raw)) {
    throw new ConfigurationError(`PARLEY_LOG_LEVEL must be one of debug, info, warn, error; got '${raw}'`);
  }
  return raw;
}

export type LoadConfigOptions = {
  readonly env?: Env;
  readonly path?: string;
};

/**
 * Merges the config file with environment overrides. Never writes.
 * Call dotenv before this so a local .env takes part.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const configPath = options.path ?? defaultConfigPath(env);
  const file = await readConfigFile(configPath);

  const apiKey = nonEmpty(env['GEMINI_API_KEY']) ?? nonEmpty(file.api_key);
  if (!apiKey) {
    throw new ConfigurationMissingError(configPath);
  }

  return {
    apiKey,
    serperApiKey: nonEmpty(env['SERPER_API_KEY']) ?? nonEmpty(file.serper_api_key),
    model: nonEmpty(env['PARLEY_MODEL']) ?? file.model ?? DEFAULT_MODEL,
    maxToolRounds: envInt(env, 'PARLEY_MAX_TOOL_ROUNDS') ?? file.max_tool_rounds ?? SESSION_DEFAULTS.maxToolRoundsPerInput,
    logLevel: envLogLevel(env),
    configPath,
  };
}
