import type { SessionEvent } from '../types/index.js';

export type SessionEventEmitter = {
  readonly emit: (event: SessionEvent) => void;
  readonly complete: () => void;
  readonly iterator: () => AsyncIterable<SessionEvent>;
};

/**
 * Single-consumer async queue. Events emitted before anyone iterates are
 * buffered; after complete() the iterator drains the buffer and ends.
 */
export function createSessionEventEmitter(): SessionEventEmitter {
  const buffer: Array<SessionEvent> = [];
  let waiter: ((result: IteratorResult<SessionEvent, undefined>) => void) | null = null;
  let done = false;

  const asyncIterator: AsyncIterator<SessionEvent, undefined> = {
    next: async (): Promise<IteratorResult<SessionEvent, undefined>> => {
      const buffered = buffer.shift();
      if (buffered !== undefined) {
        return { value: buffered, done: false };
      }

      if (done) {
        return { done: true, value: undefined };
      }

      return new Promise<IteratorResult<SessionEvent, undefined>>((resolve) => {
        waiter = resolve;
      });
    },
  };

  return {
    emit: (event: SessionEvent) => {
      if (done) {
        return;
      }
      if (waiter) {
        const w = waiter;
        waiter = null;
        w({ value: event, done: false });
      } else {
        buffer.push(event);
      }
    },

    complete: () => {
      done = true;
      if (waiter) {
        const w = waiter;
        waiter = null;
        w({ done: true, value: undefined });
      }
    },

    iterator: () => ({
      [Symbol.asyncIterator]: () => asyncIterator,
    }),
  };
}
