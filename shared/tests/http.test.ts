import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { RequestPacer, parseRetryAfter } from '../src/http.js';

function fakeClock(start = 0) {
  let time = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => time,
    advance: (ms: number) => { time += ms; },
    sleep: async (ms: number) => {
      sleeps.push(ms);
      time += ms;
    },
  };
}

describe('RequestPacer', () => {
  it('does not wait before the first request', async () => {
    const clock = fakeClock();
    const pacer = new RequestPacer(1000, clock);

    await pacer.acquire();

    assert.deepEqual(clock.sleeps, []);
  });

  it('waits out the remainder of the interval', async () => {
    const clock = fakeClock();
    const pacer = new RequestPacer(1000, clock);

    await pacer.acquire();
    clock.advance(300);
    await pacer.acquire();

    assert.deepEqual(clock.sleeps, [700]);
  });

  it('does not wait once the interval has passed', async () => {
    const clock = fakeClock();
    const pacer = new RequestPacer(1000, clock);

    await pacer.acquire();
    clock.advance(1500);
    await pacer.acquire();

    assert.deepEqual(clock.sleeps, []);
  });

  it('serializes concurrent callers', async () => {
    const clock = fakeClock();
    const pacer = new RequestPacer(1000, clock);

    const results = await Promise.all([1, 2, 3].map((n) => pacer.schedule(async () => n)));

    assert.deepEqual(results, [1, 2, 3]);
    assert.deepEqual(clock.sleeps, [1000, 1000]);
    assert.equal(clock.now(), 2000);
  });
});

describe('parseRetryAfter', () => {
  it('converts whole seconds to milliseconds', () => {
    assert.equal(parseRetryAfter('3'), 3000);
    assert.equal(parseRetryAfter(2), 2000);
  });

  it('returns null for missing or non-numeric values', () => {
    assert.equal(parseRetryAfter(undefined), null);
    assert.equal(parseRetryAfter('soon'), null);
    assert.equal(parseRetryAfter('Wed, 21 Oct 2026 07:28:00 GMT'), null);
  });
});
