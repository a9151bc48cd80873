import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { Logger } from '@parley/agent';

export const FALLBACK_SYSTEM_INSTRUCTION =
  'You are a helpful assistant running in a terminal. Use the available tools when they help answer the question.';

export const SYSTEM_INSTRUCTION_PATH = fileURLToPath(new URL('./system-instruction.md', import.meta.url));

/** Reads the system instruction shipped beside the sources; falls back when missing or blank. */
export async function loadSystemInstruction(logger: Logger, path: string = SYSTEM_INSTRUCTION_PATH): Promise<string> {
  try {
    const text = (await readFile(path, 'utf-8')).trim();
    if (text) {
      return text;
    }
    logger.warn('system instruction file is empty, using fallback', { path });
  } catch (err) {
    logger.warn('system instruction file not readable, using fallback', {
      path,
      error: err instanceof Error ? err.message : String(err),
    });
  }
  return FALLBACK_SYSTEM_INSTRUCTION;
}
