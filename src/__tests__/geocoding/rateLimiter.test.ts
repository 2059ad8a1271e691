import { describe, expect, test } from 'vitest';
import { RateLimiter } from '../../services/geocoding';

function createClock() {
  let now = 0;
  const waits: number[] = [];
  return {
    now: () => now,
    sleep: async (ms: number) => {
      waits.push(ms);
      now += ms;
    },
    advance: (ms: number) => {
      now += ms;
    },
    waits,
  };
}

describe('RateLimiter', () => {
  test('serializes concurrent callers with the minimum delay between them', async () => {
    const clock = createClock();
    const limiter = new RateLimiter(1000, clock.sleep, clock.now);
    const started: Array<[string, number]> = [];

    const task = (label: string) => async () => {
      started.push([label, clock.now()]);
      return label;
    };

    const results = await Promise.all([
      limiter.schedule(task('a')),
      limiter.schedule(task('b')),
      limiter.schedule(task('c')),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(started).toEqual([
      ['a', 0],
      ['b', 1000],
      ['c', 2000],
    ]);
    expect(clock.waits).toEqual([1000, 1000]);
  });

  test('only waits for the remainder of the delay', async () => {
    const clock = createClock();
    const limiter = new RateLimiter(1000, clock.sleep, clock.now);

    await limiter.schedule(async () => {});
    clock.advance(400);
    await limiter.schedule(async () => {});

    expect(clock.waits).toEqual([600]);
  });

  test('keeps going after a failed task', async () => {
    const clock = createClock();
    const limiter = new RateLimiter(0, clock.sleep, clock.now);

    const failed = limiter.schedule(async () => {
      throw new Error('boom');
    });
    const next = limiter.schedule(async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
