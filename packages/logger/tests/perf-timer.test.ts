import { Writable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { createLogger } from '../src/createLogger.js';
import { logDuration, startTimer } from '../src/perf-timer.js';

function steppingClock(...readings: number[]) {
  let index = 0;
  return () => readings[Math.min(index++, readings.length - 1)] ?? 0;
}

describe('startTimer', () => {
  it('should report rounded elapsed time while running', () => {
    const timer = startTimer(steppingClock(100, 112.4, 130.6));

    expect(timer.elapsed()).toBe(12);
    expect(timer.elapsed()).toBe(31);
    expect(timer.stopped).toBe(false);
  });

  it('should freeze the duration on stop', () => {
    const timer = startTimer(steppingClock(0, 40, 90));

    expect(timer.stop()).toBe(40);
    expect(timer.stopped).toBe(true);
    expect(timer.stop()).toBe(40);
    expect(timer.elapsed()).toBe(40);
  });

  it('should measure real time with the default clock', async () => {
    const timer = startTimer();
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(timer.stop()).toBeGreaterThanOrEqual(25);
  });
});

describe('logDuration', () => {
  function capture() {
    const entries: Record<string, unknown>[] = [];
    const stream = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        for (const line of String(chunk).split('\n')) {
          if (line.length === 0) continue;
          const entry: unknown = JSON.parse(line);
          if (typeof entry === 'object' && entry !== null && !Array.isArray(entry)) {
            entries.push(Object.fromEntries(Object.entries(entry)));
          }
        }
        callback();
      },
    });
    return { logger: createLogger({ level: 'info', json: true, console: false, stream }), entries };
  }

  const flush = () => new Promise((resolve) => setTimeout(resolve, 20));

  it('should return the result and log the duration', async () => {
    const { logger, entries } = capture();

    const result = await logDuration(logger, 'Loaded', { symbol: 'AAPL' }, async () => 42);
    await flush();

    expect(result).toBe(42);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 'info', message: 'Loaded', symbol: 'AAPL' });
    expect(typeof entries[0]?.['duration_ms']).toBe('number');
  });

  it('should log and rethrow failures', async () => {
    const { logger, entries } = capture();

    await expect(
      logDuration(logger, 'Loaded', {}, () => Promise.reject(new Error('boom')))
    ).rejects.toThrow('boom');
    await flush();

    expect(entries[0]).toMatchObject({ level: 'error', message: 'Loaded (failed)', error: 'boom' });
  });
});
