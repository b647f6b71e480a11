import { describe, it, expect } from 'vitest';
import { Publisher } from '../../src/Publisher.js';
import type { HandleMut } from '../../src/domain/ports/Handle.js';
import { availableParallelism } from '../../src/infrastructure/concurrency/availableParallelism.js';
import { Tick, sleep } from '../fixtures/events.js';

/** Records how many invocations are running at once. */
class ConcurrencyProbe {
  active = 0;
  peak = 0;
  calls = 0;

  constructor(private readonly delayMs: number) {}

  readonly handler = async (): Promise<void> => {
    this.active++;
    this.calls++;
    this.peak = Math.max(this.peak, this.active);
    await sleep(this.delayMs);
    this.active--;
  };
}

/** Read-modify-write across an await: loses updates unless invocations are serialized. */
class SlowCounter implements HandleMut<Tick> {
  readonly eventType = Tick;
  count = 0;

  async handleMut(): Promise<void> {
    const current = this.count;
    await sleep(1);
    this.count = current + 1;
  }
}

describe('shared handler fan-out', () => {
  it('should run shared handlers concurrently up to maxConcurrency', async () => {
    const publisher = new Publisher({ maxConcurrency: 3 });
    const probe = new ConcurrencyProbe(5);

    for (let i = 0; i < 10; i++) {
      publisher.subscribeWith(Tick, probe.handler);
    }
    const result = await publisher.publish(new Tick());

    expect(result.success).toBe(true);
    expect(probe.calls).toBe(10);
    expect(probe.peak).toBe(3);
    expect(probe.active).toBe(0);
  });

  it('should default the budget to the available parallelism', async () => {
    const budget = availableParallelism();
    const publisher = new Publisher();
    const probe = new ConcurrencyProbe(2);

    for (let i = 0; i < budget + 4; i++) {
      publisher.subscribeWith(Tick, probe.handler);
    }
    await publisher.publish(new Tick());

    expect(probe.calls).toBe(budget + 4);
    expect(probe.peak).toBe(budget);
  });

  it('should run shared handlers one at a time with maxConcurrency 1', async () => {
    const publisher = new Publisher({ maxConcurrency: 1 });
    const probe = new ConcurrencyProbe(1);

    for (let i = 0; i < 4; i++) {
      publisher.subscribeWith(Tick, probe.handler);
    }
    await publisher.publish(new Tick());

    expect(probe.calls).toBe(4);
    expect(probe.peak).toBe(1);
  });

  it('should wait for every shared handler before resolving', async () => {
    const publisher = new Publisher({ maxConcurrency: 4 });
    const finished: number[] = [];

    for (const delay of [15, 5, 10]) {
      publisher.subscribeWith(Tick, async () => {
        await sleep(delay);
        finished.push(delay);
      });
    }
    await publisher.publish(new Tick());

    expect(finished).toEqual([5, 10, 15]);
  });

  it('should not serialize a shared handler across overlapping publishes', async () => {
    const publisher = new Publisher();
    let count = 0;

    publisher.subscribeWith(Tick, async () => {
      const current = count;
      await sleep(1);
      count = current + 1;
    });
    await Promise.all(Array.from({ length: 20 }, () => publisher.publish(new Tick())));

    expect(count).toBe(1);
  });
});

describe('exclusive handlers', () => {
  it('should never lose updates across overlapping publishes', async () => {
    const publisher = new Publisher();
    const counter = new SlowCounter();

    publisher.subscribeMut(counter);
    const results = await Promise.all(Array.from({ length: 20 }, () => publisher.publish(new Tick())));

    expect(counter.count).toBe(20);
    expect(results.every((r) => r.success)).toBe(true);
  });

  it('should keep exclusive handlers serialized while shared handlers run in parallel', async () => {
    const publisher = new Publisher({ maxConcurrency: 4 });
    const counter = new SlowCounter();
    const probe = new ConcurrencyProbe(3);

    for (let i = 0; i < 4; i++) {
      publisher.subscribeWith(Tick, probe.handler);
    }
    publisher.subscribeMut(counter);
    await Promise.all(Array.from({ length: 10 }, () => publisher.publish(new Tick())));

    expect(counter.count).toBe(10);
    expect(probe.calls).toBe(40);
  });

  it('should not run two exclusive handlers of one publish at the same time', async () => {
    const publisher = new Publisher();
    let active = 0;
    let peak = 0;

    for (let i = 0; i < 3; i++) {
      publisher.subscribeMut({
        eventType: Tick,
        async handleMut() {
          active++;
          peak = Math.max(peak, active);
          await sleep(2);
          active--;
        },
      });
    }
    await publisher.publish(new Tick());

    expect(peak).toBe(1);
  });
});
