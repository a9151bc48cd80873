import { describe, it, expect } from 'vitest';
import { createSessionEventEmitter } from './events.js';
import type { SessionEvent } from '../types/index.js';

async function collect(iterable: AsyncIterable<SessionEvent>): Promise<Array<SessionEvent>> {
  const events: Array<SessionEvent> = [];
  for await (const event of iterable) {
    events.push(event);
  }
  return events;
}

describe('SessionEventEmitter', () => {
  it('delivers events emitted while the consumer waits', async () => {
    const emitter = createSessionEventEmitter();
    const pending = collect(emitter.iterator());

    setTimeout(() => {
      emitter.emit({ kind: 'SESSION_START', sessionId: 's1' });
      emitter.emit({ kind: 'MODEL_CALL_START', round: 0 });
      emitter.complete();
    }, 5);

    expect(await pending).toEqual([
      { kind: 'SESSION_START', sessionId: 's1' },
      { kind: 'MODEL_CALL_START', round: 0 },
    ]);
  });

  it('buffers events emitted before iteration starts', async () => {
    const emitter = createSessionEventEmitter();

    emitter.emit({ kind: 'SESSION_START', sessionId: 's1' });
    emitter.emit({ kind: 'TURN_ABORTED' });
    emitter.emit({ kind: 'SESSION_END', sessionId: 's1' });
    emitter.complete();

    expect((await collect(emitter.iterator())).map((event) => event.kind)).toEqual([
      'SESSION_START',
      'TURN_ABORTED',
      'SESSION_END',
    ]);
  });

  it('ends a waiting consumer on complete', async () => {
    const emitter = createSessionEventEmitter();
    const pending = collect(emitter.iterator());

    emitter.complete();

    expect(await pending).toEqual([]);
  });

  it('ignores events emitted after complete', async () => {
    const emitter = createSessionEventEmitter();

    emitter.emit({ kind: 'TURN_ABORTED' });
    emitter.complete();
    emitter.emit({ kind: 'SESSION_END', sessionId: 'late' });

    expect(await collect(emitter.iterator())).toEqual([{ kind: 'TURN_ABORTED' }]);
  });
});
