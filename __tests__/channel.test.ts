import { EventChannel } from '../lib/net/channel';
import { mapUnordered } from '../lib/net/worker';
import { delayMs } from '../lib/net/timeout';

type Item = { n: number };

describe('EventChannel', () => {
  test('delivers pushed values in order and ends on close', async () => {
    const channel = new EventChannel<Item>(4);
    await channel.push({ n: 1 });
    await channel.push({ n: 2 });
    channel.close();
    await expect(channel.toArray()).resolves.toEqual([{ n: 1 }, { n: 2 }]);
  });

  test('producer waits while the buffer is full', async () => {
    const channel = new EventChannel<Item>(1);
    await channel.push({ n: 1 });
    let secondDone = false;
    const second = channel.push({ n: 2 }).then(() => {
      secondDone = true;
    });
    await delayMs(5);
    expect(secondDone).toBe(false);
    expect(channel.size).toBe(1);

    const iterator = channel[Symbol.asyncIterator]();
    await expect(iterator.next()).resolves.toEqual({ done: false, value: { n: 1 } });
    await second;
    expect(secondDone).toBe(true);
    await expect(iterator.next()).resolves.toEqual({ done: false, value: { n: 2 } });
  });

  test('a consumer that stops early detaches without blocking the producer', async () => {
    const channel = new EventChannel<Item>(1);
    const produced: number[] = [];
    const producer = (async () => {
      for (let n = 1; n <= 5; n++) {
        await channel.push({ n });
        produced.push(n);
      }
      channel.close();
    })();

    for await (const item of channel) {
      expect(item).toEqual({ n: 1 });
      break;
    }
    await producer;
    expect(produced).toEqual([1, 2, 3, 4, 5]);
    expect(channel.isDetached).toBe(true);
    expect(channel.size).toBe(0);
  });

  test('rejects pushes after close and a second consumer', async () => {
    const channel = new EventChannel<Item>();
    channel[Symbol.asyncIterator]();
    expect(() => channel[Symbol.asyncIterator]()).toThrow('single consumer');
    channel.close();
    await expect(channel.push({ n: 1 })).rejects.toThrow('channel closed');
  });

  test('capacity must be a positive integer', () => {
    expect(() => new EventChannel<Item>(0)).toThrow(TypeError);
  });
});

describe('mapUnordered', () => {
  test('yields in completion order with bounded concurrency', async () => {
    let active = 0;
    let peak = 0;
    const delays: Record<string, number> = { slow: 30, mid: 15, fast: 1 };
    const out: string[] = [];
    for await (const value of mapUnordered(['slow', 'mid', 'fast'], 3, async (key) => {
      active++;
      peak = Math.max(peak, active);
      await delayMs(delays[key]);
      active--;
      return key;
    })) {
      out.push(value);
    }
    expect(out).toEqual(['fast', 'mid', 'slow']);
    expect(peak).toBe(3);
  });

  test('never exceeds the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const results: number[] = [];
    for await (const n of mapUnordered([1, 2, 3, 4, 5, 6], 2, async (v) => {
      active++;
      peak = Math.max(peak, active);
      await delayMs(2);
      active--;
      return v * 10;
    })) {
      results.push(n);
    }
    expect(peak).toBe(2);
    expect(results.sort((a, b) => a - b)).toEqual([10, 20, 30, 40, 50, 60]);
  });

  test('rethrows a failed task', async () => {
    const run = async () => {
      const out: number[] = [];
      for await (const n of mapUnordered([1, 2], 2, async (v) => {
        if (v === 2) throw new Error('boom');
        await delayMs(20);
        return v;
      })) {
        out.push(n);
      }
      return out;
    };
    await expect(run()).rejects.toThrow('boom');
  });
});
