import { describe, it, expect } from 'vitest';
import { sleep } from '@gitbrief/core';
import { runPool } from '../pool.js';

describe('runPool', () => {
  it('never runs more than `concurrency` workers at once', async () => {
    let active = 0;
    let peak = 0;

    const outcomes = await runPool(
      [1, 2, 3, 4, 5, 6],
      async (n) => {
        active++;
        peak = Math.max(peak, active);
        await sleep(5);
        active--;
        return n * 2;
      },
      { concurrency: 2, gracePeriodMs: 0 },
    );

    expect(peak).toBe(2);
    expect(outcomes).toEqual([2, 4, 6, 8, 10, 12].map((value) => ({ status: 'fulfilled', value })));
  });

  it('keeps outcomes at their item index when later items finish first', async () => {
    const outcomes = await runPool(
      [30, 1, 10],
      async (ms) => {
        await sleep(ms);
        return ms;
      },
      { concurrency: 3, gracePeriodMs: 0 },
    );

    expect(outcomes.map((o) => (o.status === 'fulfilled' ? o.value : null))).toEqual([30, 1, 10]);
  });

  it('records a rejected worker without stopping the others', async () => {
    const outcomes = await runPool(
      ['a', 'b', 'c'],
      async (item) => {
        if (item === 'b') throw new Error('boom');
        return item.toUpperCase();
      },
      { concurrency: 1, gracePeriodMs: 0 },
    );

    expect(outcomes[0]).toEqual({ status: 'fulfilled', value: 'A' });
    expect(outcomes[1].status).toBe('rejected');
    expect(outcomes[2]).toEqual({ status: 'fulfilled', value: 'C' });
  });

  it('starts nothing once the signal has aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let started = 0;

    const outcomes = await runPool(
      [1, 2],
      async (n) => {
        started++;
        return n;
      },
      { concurrency: 2, signal: controller.signal, gracePeriodMs: 10 },
    );

    expect(started).toBe(0);
    expect(outcomes).toEqual([{ status: 'cancelled' }, { status: 'cancelled' }]);
  });

  it('abandons in-flight items after the grace period', async () => {
    const controller = new AbortController();
    const abandoned: boolean[] = [];

    const pending = runPool(
      [1, 2, 3],
      async (n, _index, signal) => {
        if (n === 1) return n;
        // Item 2 never settles on its own; item 3 is never started
        await new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
        abandoned.push(signal.aborted);
        return n;
      },
      { concurrency: 1, signal: controller.signal, gracePeriodMs: 20 },
    );

    await sleep(5);
    controller.abort();
    const outcomes = await pending;

    expect(outcomes).toEqual([{ status: 'fulfilled', value: 1 }, { status: 'cancelled' }, { status: 'cancelled' }]);
    expect(abandoned).toEqual([true]);
  });

  it('lets in-flight items finish inside the grace period', async () => {
    const controller = new AbortController();

    const pending = runPool(
      [15, 15],
      async (ms) => {
        await sleep(ms);
        return ms;
      },
      { concurrency: 2, signal: controller.signal, gracePeriodMs: 200 },
    );

    controller.abort();
    expect(await pending).toEqual([
      { status: 'fulfilled', value: 15 },
      { status: 'fulfilled', value: 15 },
    ]);
  });
});
