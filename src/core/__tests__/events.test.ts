import { describe, it, expect, afterEach, vi } from 'vitest';
import { enableEventLogging, eventBus, withEventHandler } from '../events.js';

const fetched = {
  venue: 'Paradex',
  instrument: 'BTC',
  durationMs: 12,
  bidLevels: 3,
  askLevels: 4,
} as const;

describe('eventBus', () => {
  afterEach(() => {
    eventBus.removeAllListeners();
    eventBus.clearHistory();
  });

  it('delivers typed payloads and keeps history', () => {
    const handler = vi.fn();
    eventBus.on('BOOK_FETCHED', handler);

    eventBus.emit('BOOK_FETCHED', fetched);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[0]).toMatchObject({ type: 'BOOK_FETCHED', payload: fetched });
    expect(eventBus.getHistory('BOOK_FETCHED')).toHaveLength(1);
    expect(eventBus.getHistory('VENUE_FAILED')).toHaveLength(0);
  });

  it('keeps only the most recent 200 events', () => {
    for (let i = 0; i < 201; i++) {
      eventBus.emit('BOOK_FETCHED', { ...fetched, durationMs: i });
    }

    const history = eventBus.getHistory();
    expect(history).toHaveLength(200);
    expect(history[0]?.payload).toMatchObject({ durationMs: 1 });
  });

  it('unsubscribes scoped handlers after the task, even when it fails', async () => {
    const handler = vi.fn();

    await expect(
      withEventHandler('BOOK_FETCHED', handler, async () => {
        eventBus.emit('BOOK_FETCHED', fetched);
        throw new Error('task failed');
      })
    ).rejects.toThrow('task failed');
    eventBus.emit('BOOK_FETCHED', fetched);

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('stops event logging without removing other listeners', () => {
    const log = vi.fn();
    const other = vi.fn();
    eventBus.on('BOOK_FETCHED', other);

    const stop = enableEventLogging(log);
    eventBus.emit('BOOK_FETCHED', fetched);
    stop();
    eventBus.emit('BOOK_FETCHED', fetched);

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0]?.[0]).toMatch(/^\[EVENT\] BOOK_FETCHED at /);
    expect(other).toHaveBeenCalledTimes(2);
  });
});
