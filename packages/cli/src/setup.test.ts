import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { silentLogger } from '@parley/agent';
import { runSetup } from './setup.js';

function scriptedPrompt(answers: ReadonlyArray<string>): { prompt: (q: string) => Promise<string>; questions: Array<string> } {
  const queue = [...answers];
  const questions: Array<string> = [];
  return {
    questions,
    prompt: async (question) => {
      questions.push(question);
      return queue.shift() ?? '';
    },
  };
}

describe('runSetup', () => {
  let dir: string;
  let path: string;
  const printed: Array<string> = [];
  const print = (line: string): void => {
    printed.push(line);
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'parley-setup-'));
    path = join(dir, 'config.json');
    printed.length = 0;
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the keys it is given', async () => {
    const { prompt, questions } = scriptedPrompt(['test-key', 'test-serper']);

    const saved = await runSetup({ path, prompt, print, logger: silentLogger });

    expect(saved).toEqual({ api_key: 'test-key', serper_api_key: 'test-serper' });
    expect(questions).toEqual(['Gemini API key [not set]: ', 'Serper API key for web search [not set]: ']);
    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual(saved);
    expect(printed.at(-1)).toBe(`Saved ${path}`);
  });

  it('keeps current values on blank answers and preserves other keys', async () => {
    await writeFile(path, JSON.stringify({ api_key: 'old-key', model: 'gemini-2.5-pro' }));
    const { prompt, questions } = scriptedPrompt(['  ', 'test-serper']);

    const saved = await runSetup({ path, prompt, print, logger: silentLogger });

    expect(questions[0]).toBe('Gemini API key [set, ends in -key]: ');
    expect(saved).toEqual({ api_key: 'old-key', model: 'gemini-2.5-pro', serper_api_key: 'test-serper' });
  });

  it('starts fresh when the existing file is malformed', async () => {
    await writeFile(path, 'not json');
    const { prompt } = scriptedPrompt(['test-key', '']);

    const saved = await runSetup({ path, prompt, print, logger: silentLogger });

    expect(saved).toEqual({ api_key: 'test-key' });
    expect(printed[0]).toBe(`Existing config could not be read (${path} is not valid JSON); starting fresh.`);
  });

  it('warns when no Gemini key ends up configured', async () => {
    const { prompt } = scriptedPrompt(['', '']);

    await runSetup({ path, prompt, print, logger: silentLogger });

    expect(printed).toContain('No Gemini API key set. parley will not start until one is configured.');
  });
});
