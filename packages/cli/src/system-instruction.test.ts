import { describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { silentLogger, type Logger } from '@parley/agent';
import { FALLBACK_SYSTEM_INSTRUCTION, loadSystemInstruction } from './system-instruction.js';

function recordingLogger(): { logger: Logger; warn: ReturnType<typeof vi.fn> } {
  const warn = vi.fn();
  const logger: Logger = { ...silentLogger, warn, child: () => logger };
  return { logger, warn };
}

describe('loadSystemInstruction', () => {
  it('reads the bundled instruction file', async () => {
    const text = await loadSystemInstruction(silentLogger);

    expect(text.startsWith('You are parley')).toBe(true);
  });

  it('falls back and warns when the file is missing', async () => {
    const { logger, warn } = recordingLogger();

    const text = await loadSystemInstruction(logger, join(tmpdir(), 'parley-missing', 'nope.md'));

    expect(text).toBe(FALLBACK_SYSTEM_INSTRUCTION);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('falls back when the file is blank', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'parley-instruction-'));
    const path = join(dir, 'blank.md');
    await writeFile(path, '  \n');
    const { logger, warn } = recordingLogger();

    try {
      expect(await loadSystemInstruction(logger, path)).toBe(FALLBACK_SYSTEM_INSTRUCTION);
      expect(warn).toHaveBeenCalledWith('system instruction file is empty, using fallback', { path });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
