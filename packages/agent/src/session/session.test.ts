import { describe, it, expect } from 'vitest';
import { AuthenticationError, InvalidRequestError, ServerError, type LLMResponse } from '@parley/llm';
import { createSession, resolveSessionConfig, type Session } from './session.js';
import { turnLimitMessage } from './loop.js';
import { defineTool } from '../tools/define.js';
import { createToolRegistry } from '../tools/registry.js';
import type { SessionEvent } from '../types/index.js';
import { FAST_RETRY, call, scriptedClient, text } from '../../tests/integration/helpers.js';

const registry = createToolRegistry([
  defineTool({
    name: 'lookup',
    description: 'Looks a key up',
    parameters: { key: { kind: 'string', description: 'Key', required: true } },
    handler: async (args) => `value-${String(args['key'])}`,
  }),
]);

async function drain(session: Session): Promise<Array<SessionEvent>> {
  session.close();
  const events: Array<SessionEvent> = [];
  for await (const event of session.events()) {
    events.push(event);
  }
  return events;
}

describe('createSession', () => {
  it('answers plain text in one model call', async () => {
    const { client, adapter } = scriptedClient([[text('Hi there')]]);
    const session = createSession({ client, registry });

    const outcome = await session.submit('hello');

    expect(outcome).toEqual({ kind: 'completed', text: 'Hi there' });
    expect(session.history()).toEqual([
      { role: 'user', content: 'hello' },
      { role: 'model', content: [{ kind: 'TEXT', text: 'Hi there' }] },
    ]);
    expect(session.state()).toBe('IDLE');

    const request = adapter.requests[0];
    expect(request?.model).toBe('gemini-2.5-flash');
    expect(request?.temperature).toBe(0.8);
    expect(request?.topP).toBe(0.9);
    expect(request?.maxTokens).toBe(8192);
    expect(request?.tools).toEqual(registry.describeAll());
    expect(request?.messages).toEqual([{ role: 'user', content: 'hello' }]);
  });

  it('returns history snapshots that later turns leave untouched', async () => {
    const { client } = scriptedClient([[text('first')], [text('second')]]);
    const session = createSession({ client, registry });

    await session.submit('one');
    const snapshot = session.history();
    await session.submit('two');

    expect(snapshot).toHaveLength(2);
    expect(session.history()).toHaveLength(4);
    expect(session.history()).not.toBe(session.history());
  });

  it('sends the system instruction with every request', async () => {
    const { client, adapter } = scriptedClient([[text('ok')]]);
    const session = createSession({ client, registry, config: { systemInstruction: 'Be brief.', model: 'gemini-2.5-pro' } });

    await session.submit('hi');

    expect(adapter.requests[0]?.system).toBe('Be brief.');
    expect(adapter.requests[0]?.model).toBe('gemini-2.5-pro');
  });

  it('runs a tool round and feeds the result back', async () => {
    const { client, adapter } = scriptedClient([
      [text('Looking.'), call('c1', 'lookup', { key: 'a' })],
      [text('It is value-a.')],
    ]);
    const session = createSession({ client, registry });

    const outcome = await session.submit('what is a?');

    expect(outcome).toEqual({ kind: 'completed', text: 'It is value-a.' });
    expect(session.history()).toEqual([
      { role: 'user', content: 'what is a?' },
      { role: 'model', content: [text('Looking.'), call('c1', 'lookup', { key: 'a' })] },
      { role: 'tool_result', toolCallId: 'c1', toolName: 'lookup', status: 'ok', content: 'value-a' },
      { role: 'model', content: [text('It is value-a.')] },
    ]);
    expect(adapter.requests[1]?.messages.at(-1)).toEqual({
      role: 'tool',
      content: [{ kind: 'TOOL_RESULT', toolCallId: 'c1', toolName: 'lookup', content: 'value-a', isError: false }],
    });

    const events = await drain(session);
    expect(events.map((event) => event.kind)).toEqual([
      'SESSION_START',
      'MODEL_CALL_START',
      'ASSISTANT_TEXT',
      'TOOL_CALL_START',
      'TOOL_CALL_END',
      'MODEL_CALL_START',
      'ASSISTANT_TEXT',
      'SESSION_END',
    ]);
    expect(events[2]).toEqual({ kind: 'ASSISTANT_TEXT', text: 'Looking.', final: false });
    expect(events[4]).toMatchObject({ kind: 'TOOL_CALL_END', toolCallId: 'c1', status: 'ok', content: 'value-a' });
  });

  it('reports unknown tools back to the model and carries on', async () => {
    const { client, adapter } = scriptedClient([[call('c1', 'no_such_tool')], [text('Sorry, I cannot.')]]);
    const session = createSession({ client, registry });

    const outcome = await session.submit('do it');

    expect(outcome).toEqual({ kind: 'completed', text: 'Sorry, I cannot.' });
    expect(session.history()[2]).toEqual({
      role: 'tool_result',
      toolCallId: 'c1',
      toolName: 'no_such_tool',
      status: 'error',
      content: '{"status":"error","message":"tool not found: no_such_tool"}',
    });
    expect(adapter.requests).toHaveLength(2);
  });

  it('stops at the round cap without leaving an unanswered tool call', async () => {
    const { client, adapter } = scriptedClient([
      [call('c1', 'lookup', { key: '1' })],
      [call('c2', 'lookup', { key: '2' })],
      [call('c3', 'lookup', { key: '3' })],
    ]);
    const session = createSession({ client, registry, config: { maxToolRoundsPerInput: 2 } });

    const outcome = await session.submit('loop forever');

    expect(outcome).toEqual({ kind: 'turn_limit', text: turnLimitMessage(2) });
    expect(adapter.requests).toHaveLength(3);
    expect(session.history().map((turn) => turn.role)).toEqual([
      'user',
      'model',
      'tool_result',
      'model',
      'tool_result',
      'model',
    ]);
    expect(session.history().at(-1)).toEqual({ role: 'model', content: [text(turnLimitMessage(2))] });

    const events = await drain(session);
    expect(events).toContainEqual({ kind: 'TURN_LIMIT', rounds: 2 });
  });

  it('rolls history back and stays usable after a model failure', async () => {
    const { client } = scriptedClient([
      [text('first answer')],
      [call('c1', 'lookup', { key: 'a' })],
      new InvalidRequestError('Invalid request: bad turn', { statusCode: 400, provider: 'gemini' }),
      [text('third answer')],
    ]);
    const session = createSession({ client, registry, retryPolicy: FAST_RETRY });

    await session.submit('one');
    const failed = await session.submit('two');

    expect(failed).toMatchObject({ kind: 'error', message: 'Invalid request: bad turn' });
    expect(session.history()).toEqual([
      { role: 'user', content: 'one' },
      { role: 'model', content: [text('first answer')] },
    ]);
    expect(session.state()).toBe('IDLE');

    const recovered = await session.submit('three');
    expect(recovered).toEqual({ kind: 'completed', text: 'third answer' });
    expect(session.history()).toHaveLength(4);
  });

  it('does not retry authentication failures', async () => {
    const { client, adapter } = scriptedClient([new AuthenticationError('Authentication failed: bad key', { statusCode: 401, provider: 'gemini' })]);
    const session = createSession({ client, registry, retryPolicy: FAST_RETRY });

    const outcome = await session.submit('hi');

    expect(outcome).toMatchObject({ kind: 'error', message: 'Authentication failed: bad key' });
    expect(adapter.requests).toHaveLength(1);
    expect(session.history()).toEqual([]);
  });

  it('retries retryable model failures with backoff', async () => {
    const { client, adapter } = scriptedClient([
      new ServerError('Server error: busy', { statusCode: 503, provider: 'gemini' }),
      [text('recovered')],
    ]);
    const session = createSession({ client, registry, retryPolicy: FAST_RETRY });

    const outcome = await session.submit('hi');

    expect(outcome).toEqual({ kind: 'completed', text: 'recovered' });
    expect(adapter.requests).toHaveLength(2);

    const events = await drain(session);
    expect(events.find((event) => event.kind === 'MODEL_RETRY')).toMatchObject({ kind: 'MODEL_RETRY', attempt: 1 });
  });

  it('gives up once the retry budget is spent', async () => {
    const busy = () => new ServerError('Server error: busy', { statusCode: 503, provider: 'gemini' });
    const { client, adapter } = scriptedClient([busy(), busy(), busy()]);
    const session = createSession({ client, registry, retryPolicy: FAST_RETRY });

    const outcome = await session.submit('hi');

    expect(outcome).toMatchObject({ kind: 'error', message: 'Server error: busy' });
    expect(adapter.requests).toHaveLength(3);
  });

  it('aborts a turn stuck in a tool and discards its partial history', async () => {
    let abortTurn = (): void => undefined;
    const stuck = createToolRegistry([
      defineTool({
        name: 'stuck',
        description: 'Never finishes on its own',
        handler: async () => {
          setTimeout(() => abortTurn(), 0);
          return new Promise<string>(() => undefined);
        },
      }),
    ]);
    const { client } = scriptedClient([[call('s1', 'stuck')], [text('after abort')]]);
    const session = createSession({ client, registry: stuck });
    abortTurn = () => session.abort();

    const outcome = await session.submit('hang');

    expect(outcome).toEqual({ kind: 'aborted' });
    expect(session.history()).toEqual([]);
    expect(session.state()).toBe('IDLE');

    expect(await session.submit('next')).toEqual({ kind: 'completed', text: 'after abort' });
  });

  it('aborts a turn waiting on the model', async () => {
    const { client } = scriptedClient([
      (request) =>
        new Promise<LLMResponse>((_resolve, reject) => {
          request.signal?.addEventListener('abort', () => reject(new Error('cancelled')));
        }),
    ]);
    const session = createSession({ client, registry });

    const pending = session.submit('slow');
    setTimeout(() => session.abort(), 5);

    expect(await pending).toEqual({ kind: 'aborted' });
    expect(session.history()).toEqual([]);
    const events = await drain(session);
    expect(events.map((event) => event.kind)).toContain('TURN_ABORTED');
  });

  it('refuses overlapping turns', async () => {
    const { client } = scriptedClient([[text('one')]]);
    const session = createSession({ client, registry });

    const first = session.submit('a');

    await expect(session.submit('b')).rejects.toThrow('A turn is already in progress');
    await first;
  });

  it('refuses input once closed', async () => {
    const { client } = scriptedClient([]);
    const session = createSession({ client, registry });

    session.close();

    expect(session.state()).toBe('CLOSED');
    await expect(session.submit('late')).rejects.toThrow('Session is closed');
  });

  it('tracks token usage across model calls', async () => {
    const { client } = scriptedClient([[call('c1', 'lookup', { key: 'a' })], [text('done')]]);
    const session = createSession({ client, registry });

    await session.submit('go');

    const summary = session.usage();
    expect(summary.requests).toBe(2);
    expect(summary.usage).toEqual({ inputTokens: 20, outputTokens: 10, totalTokens: 30 });
  });
});

describe('resolveSessionConfig', () => {
  it('applies defaults', () => {
    expect(resolveSessionConfig()).toEqual({
      model: 'gemini-2.5-flash',
      provider: undefined,
      systemInstruction: undefined,
      maxToolRoundsPerInput: 10,
      parallelToolCalls: true,
      temperature: 0.8,
      topP: 0.9,
      maxTokens: 8192,
      requestTimeoutMs: 120_000,
    });
  });

  it('rejects a negative round cap', () => {
    expect(() => resolveSessionConfig({ maxToolRoundsPerInput: -1 })).toThrow(RangeError);
  });
});
