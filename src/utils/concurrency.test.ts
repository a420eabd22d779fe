import { describe, expect, it } from 'vitest';
import { runPooled, settledOr } from './concurrency.js';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('runPooled', () => {
  it('returns settled results in task order', async () => {
    const results = await runPooled([
      async () => {
        await delay(20);
        return 'slow';
      },
      async () => 'fast',
    ]);

    expect(results).toEqual([
      { status: 'fulfilled', value: 'slow' },
      { status: 'fulfilled', value: 'fast' },
    ]);
  });

  it('keeps a rejection from cancelling its sibling', async () => {
    const failure = new Error('boom');
    const results = await runPooled([
      async () => {
        throw failure;
      },
      async () => 42,
    ]);

    expect(results[0]).toEqual({ status: 'rejected', reason: failure });
    expect(results[1]).toEqual({ status: 'fulfilled', value: 42 });
  });

  it('never runs more than the limit at once', async () => {
    let running = 0;
    let peak = 0;
    const task = async () => {
      running++;
      peak = Math.max(peak, running);
      await delay(5);
      running--;
    };

    await runPooled([task, task, task, task, task], 2);
    expect(peak).toBe(2);
  });

  it('handles an empty task list', async () => {
    expect(await runPooled([])).toEqual([]);
  });
});

describe('settledOr', () => {
  it('substitutes the fallback for a rejection', () => {
    expect(settledOr<number[]>({ status: 'rejected', reason: new Error('x') }, [])).toEqual([]);
    expect(settledOr({ status: 'fulfilled', value: [1] }, [])).toEqual([1]);
  });
});
