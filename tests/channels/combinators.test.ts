/**
 * Channel Combinator Tests
 */

import { Channel } from '../../src/channels/channel.js';
import { merge, pipeline, select } from '../../src/channels/combinators.js';
import { ChannelClosedError, UsageError } from '../../src/utils/errors.js';

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

async function* fromArray<T>(values: T[], gapMs = 0): AsyncGenerator<T> {
  for (const value of values) {
    if (gapMs > 0) {
      await sleep(gapMs);
    }
    yield value;
  }
}

async function toArray<T>(source: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of source) {
    values.push(value);
  }
  return values;
}

function closedChannel<T>(values: T[]): Channel<T> {
  const channel = Channel.buffered<T>(Math.max(1, values.length));
  values.forEach((value) => channel.trySend(value));
  channel.close();
  return channel;
}

describe('Channel Combinators', () => {
  describe('select', () => {
    it('should throw synchronously for no sources', () => {
      expect(() => select([])).toThrow(UsageError);
    });

    it('should pick a channel that already has a value', async () => {
      const empty = Channel.buffered<string>(1);
      const ready = Channel.buffered<string>(1);
      ready.trySend('b');

      await expect(select([empty, ready])).resolves.toEqual([1, 'b']);
      expect(empty.length).toBe(0);
    });

    it('should prefer the lowest index when several are ready', async () => {
      const first = Channel.buffered<number>(1);
      const second = Channel.buffered<number>(1);
      first.trySend(1);
      second.trySend(2);

      await expect(select([first, second])).resolves.toEqual([0, 1]);
      expect(second.tryReceive()).toBe(2);
    });

    it('should wait for the first channel to produce', async () => {
      const left = new Channel<string>();
      const right = new Channel<string>();
      const selecting = select([left, right]);

      expect(right.trySend('x')).toBe(true);

      await expect(selecting).resolves.toEqual([1, 'x']);
      expect(left.trySend('y')).toBe(false);
    });

    it('should leave values in the losing channels', async () => {
      const left = Channel.buffered<number>(1);
      const right = Channel.buffered<number>(1);
      const selecting = select([left, right]);

      left.trySend(10);
      right.trySend(20);

      await expect(selecting).resolves.toEqual([0, 10]);
      expect(right.tryReceive()).toBe(20);
    });

    it('should read from plain async iterables', async () => {
      const channel = new Channel<string>();

      await expect(select([channel, fromArray(['g'])])).resolves.toEqual([1, 'g']);
    });

    it('should reject when every source has ended', async () => {
      const first = new Channel<number>();
      const second = new Channel<number>();
      first.close();
      second.close();

      await expect(select([first, second])).rejects.toThrow(ChannelClosedError);
      await expect(select([first, fromArray<number>([])])).rejects.toThrow(
        'Every selected source ended without a value'
      );
    });

    it('should skip a closed channel when another produces', async () => {
      const closed = new Channel<number>();
      closed.close();
      const open = new Channel<number>();
      const selecting = select([closed, open]);

      open.trySend(3);

      await expect(selecting).resolves.toEqual([1, 3]);
    });

    it('should reject with a source error', async () => {
      async function* failing(): AsyncGenerator<number> {
        throw new Error('source broke');
      }
      const idle = new Channel<number>();

      await expect(select([idle, failing()])).rejects.toThrow('source broke');
      expect(idle.trySend(1)).toBe(false);
    });
  });

  describe('merge', () => {
    it('should yield every value of every source', async () => {
      const values = await toArray(merge([closedChannel([1, 2]), closedChannel([3])]));

      expect(values.sort()).toEqual([1, 2, 3]);
    });

    it('should keep each source in its own order', async () => {
      const values = await toArray(merge([fromArray(['a1', 'a2', 'a3'], 5), fromArray(['b1', 'b2'], 7)]));

      expect(values.filter((value) => value.startsWith('a'))).toEqual(['a1', 'a2', 'a3']);
      expect(values.filter((value) => value.startsWith('b'))).toEqual(['b1', 'b2']);
    });

    it('should complete only after every source completes', async () => {
      const fast = closedChannel(['fast']);
      const slow = new Channel<string>();
      let done = false;
      const merging = toArray(merge([fast, slow])).then((values) => {
        done = true;
        return values;
      });

      await sleep(20);
      expect(done).toBe(false);

      await slow.send('slow');
      slow.close();

      await expect(merging).resolves.toEqual(['fast', 'slow']);
    });

    it('should end at once for no sources', async () => {
      await expect(toArray(merge<number>([]))).resolves.toEqual([]);
    });

    it('should raise the first source error', async () => {
      async function* failing(): AsyncGenerator<number> {
        yield 1;
        throw new Error('merge source failed');
      }

      await expect(toArray(merge([failing(), new Channel<number>()]))).rejects.toThrow(
        'merge source failed'
      );
    });

    it('should stop reading channels when the consumer breaks', async () => {
      const source = Channel.buffered<number>(3);
      source.trySend(1);

      for await (const value of merge([source])) {
        expect(value).toBe(1);
        break;
      }
      await sleep(10);
      source.trySend(2);

      expect(source.tryReceive()).toBe(2);
    });

    it('should leave unread buffered values in order when the consumer breaks', async () => {
      const source = Channel.buffered<number>(3);
      [1, 2, 3].forEach((value) => source.trySend(value));

      for await (const value of merge([source])) {
        expect(value).toBe(1);
        break;
      }
      await sleep(10);

      expect(source.tryReceive()).toBe(2);
      expect(source.tryReceive()).toBe(3);
      expect(source.isEmpty).toBe(true);
    });

    it('should take only the value it yields across several channels', async () => {
      const first = Channel.buffered<number>(1);
      const second = Channel.buffered<number>(1);
      first.trySend(1);
      second.trySend(2);

      const received: number[] = [];
      for await (const value of merge([first, second])) {
        received.push(value);
        break;
      }
      await sleep(10);

      expect(received).toHaveLength(1);
      expect(first.length + second.length).toBe(1);
    });

    it('should not take a value sent after the consumer breaks', async () => {
      const source = new Channel<number>();
      const merged = merge([source, fromArray([0])]);

      await expect(merged.next()).resolves.toEqual({ done: false, value: 0 });
      await merged.return();

      expect(source.trySend(5)).toBe(false);
    });
  });

  describe('pipeline', () => {
    it('should transform each value in order', async () => {
      const values = await toArray(pipeline(closedChannel([1, 2, 3]), (value) => value * 10));

      expect(values).toEqual([10, 20, 30]);
    });

    it('should await async transforms', async () => {
      const values = await toArray(
        pipeline(fromArray(['a', 'b']), async (value) => {
          await sleep(5);
          return value.toUpperCase();
        })
      );

      expect(values).toEqual(['A', 'B']);
    });

    it('should end when the source ends', async () => {
      const source = new Channel<number>();
      const piping = toArray(pipeline(source, (value) => value + 1));

      await source.send(1);
      source.close();

      await expect(piping).resolves.toEqual([2]);
    });

    it('should chain stages', async () => {
      const doubled = pipeline(closedChannel([1, 2]), (value) => value * 2);
      const labelled = pipeline(doubled, (value) => `#${value}`);

      await expect(toArray(labelled)).resolves.toEqual(['#2', '#4']);
    });
  });
});
