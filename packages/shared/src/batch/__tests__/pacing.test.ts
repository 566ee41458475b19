import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MinIntervalPacer, noPacing } from '../pacing';

describe('MinIntervalPacer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('releases the first caller immediately and spaces the rest', async () => {
    const pacer = new MinIntervalPacer({ minIntervalMs: 1000 });
    const released: number[] = [];

    for (const id of [1, 2, 3]) {
      void pacer.acquire().then(() => released.push(id));
    }

    await vi.advanceTimersByTimeAsync(0);
    expect(released).toEqual([1]);

    await vi.advanceTimersByTimeAsync(999);
    expect(released).toEqual([1]);

    await vi.advanceTimersByTimeAsync(1);
    expect(released).toEqual([1, 2]);

    await vi.advanceTimersByTimeAsync(1000);
    expect(released).toEqual([1, 2, 3]);
  });

  it('does not wait when the interval has already elapsed', async () => {
    const pacer = new MinIntervalPacer({ minIntervalMs: 1000 });
    await pacer.acquire();

    vi.advanceTimersByTime(1500);

    let done = false;
    void pacer.acquire().then(() => {
      done = true;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(done).toBe(true);
  });

  it('waits only for the remainder of the interval', async () => {
    let clock = 0;
    const pacer = new MinIntervalPacer({ minIntervalMs: 1000, now: () => clock });
    await pacer.acquire();

    clock = 600;
    let done = false;
    void pacer.acquire().then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(399);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(done).toBe(true);
  });

  it('never waits with a zero interval', async () => {
    const pacer = new MinIntervalPacer({ minIntervalMs: 0 });
    const released: number[] = [];

    for (const id of [1, 2]) {
      void pacer.acquire().then(() => released.push(id));
    }
    await vi.advanceTimersByTimeAsync(0);

    expect(released).toEqual([1, 2]);
  });

  it('rejects a negative interval', () => {
    expect(() => new MinIntervalPacer({ minIntervalMs: -1 })).toThrow(RangeError);
  });
});

describe('noPacing', () => {
  it('resolves immediately', async () => {
    await expect(noPacing.acquire()).resolves.toBeUndefined();
  });
});
