import { describe, it, expect, vi, afterEach } from 'vitest';
import { logger } from '@recycler/observability';
import { RecyclerEventEmitter } from '../recycler-events.js';
import type { RecyclerEvent } from '../recycler-events.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('RecyclerEventEmitter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should stamp events and deliver them to every handler', () => {
    const emitter = new RecyclerEventEmitter(() => NOW);
    const first: RecyclerEvent[] = [];
    const second: RecyclerEvent[] = [];
    emitter.on((event) => {
      first.push(event);
    });
    emitter.on((event) => {
      second.push(event);
    });

    emitter.emit({ type: 'class.removed', actor: 'admin', classId: 'cans' });

    const expected = { type: 'class.removed', actor: 'admin', classId: 'cans', timestamp: NOW };
    expect(first).toEqual([expected]);
    expect(second).toEqual([expected]);
  });

  it('should stop delivering after unsubscribe and clearHandlers', () => {
    const emitter = new RecyclerEventEmitter(() => NOW);
    const handler = vi.fn();
    const unsubscribe = emitter.on(handler);

    unsubscribe();
    emitter.emit({ type: 'recycler.paused', actor: 'admin' });
    emitter.on(handler);
    emitter.clearHandlers();
    emitter.emit({ type: 'recycler.unpaused', actor: 'admin' });

    expect(handler).not.toHaveBeenCalled();
  });

  it('should log handler failures without throwing', async () => {
    const errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const emitter = new RecyclerEventEmitter(() => NOW);
    const failure = new Error('sink down');
    emitter.on(() => {
      throw failure;
    });
    emitter.on(async () => {
      throw failure;
    });

    expect(() =>
      emitter.emit({ type: 'recycler.paused', actor: 'admin' })
    ).not.toThrow();
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenCalledWith(
      { err: failure, event: 'recycler.paused' },
      'Recycler event handler failed'
    );
  });
});
