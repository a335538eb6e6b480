/**
 * Request Pacer Tests
 *
 * Tests the fixed spacing between outbound calls, using a fake clock.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { RequestPacer } from '../../domain/services/RequestPacer.js';

describe('RequestPacer', () => {
  let clock: number;
  let sleeps: number[];
  let events: Array<{ type: 'start' | 'end'; at: number }>;
  let pacer: RequestPacer;

  const call = (durationMs: number, fail = false) => async () => {
    events.push({ type: 'start', at: clock });
    clock += durationMs;
    events.push({ type: 'end', at: clock });
    if (fail) throw new Error('timeout');
    return 'done';
  };

  const gapsBetweenCalls = () => {
    const starts = events.filter((e) => e.type === 'start').map((e) => e.at);
    const ends = events.filter((e) => e.type === 'end').map((e) => e.at);
    return starts.slice(1).map((start, i) => start - ends[i]);
  };

  beforeEach(() => {
    clock = 0;
    sleeps = [];
    events = [];
    pacer = new RequestPacer({
      minIntervalMs: 1500,
      now: () => clock,
      sleep: async (ms) => {
        sleeps.push(ms);
        clock += ms;
      },
    });
  });

  it('should not delay the first call', async () => {
    await expect(pacer.run(call(200))).resolves.toBe('done');
    expect(sleeps).toEqual([]);
  });

  it('should leave at least 1.5s between one call finishing and the next starting', async () => {
    for (let i = 0; i < 5; i++) {
      await pacer.run(call(200));
    }

    expect(gapsBetweenCalls()).toEqual([1500, 1500, 1500, 1500]);
    expect(sleeps).toEqual([1500, 1500, 1500, 1500]);
  });

  it('should pace after a failed call too', async () => {
    await expect(pacer.run(call(300, true))).rejects.toThrow('timeout');
    await pacer.run(call(300));

    expect(gapsBetweenCalls()).toEqual([1500]);
  });

  it('should only wait for the remainder when time has already passed', async () => {
    await pacer.run(call(100));
    clock += 1000;
    await pacer.run(call(100));

    expect(sleeps).toEqual([500]);
    expect(gapsBetweenCalls()).toEqual([1500]);
  });

  it('should not wait when the interval has already elapsed', async () => {
    await pacer.run(call(100));
    clock += 5000;
    await pacer.run(call(100));

    expect(sleeps).toEqual([]);
  });

  it('should wait in real time by default', async () => {
    const realPacer = new RequestPacer({ minIntervalMs: 20 });
    const starts: number[] = [];
    const ends: number[] = [];
    const timed = async () => {
      starts.push(Date.now());
      ends.push(Date.now());
    };

    await realPacer.run(timed);
    await realPacer.run(timed);

    expect(starts[1] - ends[0]).toBeGreaterThanOrEqual(19);
  });
});
