/**
 * Channel combinators: select, merge and pipeline.
 *
 * Sources may be channels or any async iterable. Channel sources are
 * read through cancellable receives, so values a combinator does not use
 * stay in their channel. Values already pulled from a plain async
 * iterable cannot be put back.
 */

import { ChannelClosedError, UsageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { Channel } from './channel.js';

export type ChannelSource<T> = Channel<T> | AsyncIterable<T>;

/**
 * Index of the source that produced first, and its value
 */
export type SelectResult<T> = [index: number, value: T];

const logger = createLogger({ source: 'ChannelCombinators' });

function closeIterator<T>(iterator: AsyncIterator<T>): void {
  if (!iterator.return) {
    return;
  }
  iterator.return().catch((err: unknown) => {
    logger.debug('Source iterator failed while closing', err);
  });
}

// ============================================================================
// select
// ============================================================================

/**
 * Wait for whichever source produces first. Every other source is
 * unsubscribed once one wins. Rejects with ChannelClosedError if all
 * sources end without producing.
 */
export function select<T>(sources: Array<ChannelSource<T>>): Promise<SelectResult<T>> {
  if (sources.length === 0) {
    throw new UsageError('select() needs at least one source', 'sources', 0);
  }

  // A channel with a value ready wins without touching the others
  for (let index = 0; index < sources.length; index++) {
    const source = sources[index];
    if (source instanceof Channel) {
      const ready = source.poll();
      if (ready.ok) {
        return Promise.resolve<SelectResult<T>>([index, ready.value]);
      }
    }
  }

  return new Promise<SelectResult<T>>((resolve, reject) => {
    const unsubscribers: Array<() => void> = [];
    let settled = false;
    let ended = 0;

    const claim = (): boolean => {
      if (settled) {
        return false;
      }
      settled = true;
      return true;
    };

    const unsubscribeAll = () => {
      for (const unsubscribe of unsubscribers) {
        unsubscribe();
      }
    };

    const win = (index: number, value: T) => {
      unsubscribeAll();
      resolve([index, value]);
    };

    const end = () => {
      ended++;
      if (ended === sources.length && claim()) {
        reject(new ChannelClosedError('Every selected source ended without a value'));
      }
    };

    const lose = (error: unknown) => {
      if (error instanceof ChannelClosedError) {
        end();
        return;
      }
      if (claim()) {
        unsubscribeAll();
        reject(error);
      }
    };

    sources.forEach((source, index) => {
      if (source instanceof Channel) {
        const pending = source.receiveCancellable(claim);
        unsubscribers.push(pending.cancel);
        pending.promise.then((value) => win(index, value), lose);
        return;
      }

      const iterator = source[Symbol.asyncIterator]();
      unsubscribers.push(() => closeIterator(iterator));
      iterator.next().then((result) => {
        if (result.done) {
          end();
        } else if (claim()) {
          win(index, result.value);
        }
      }, lose);
    });
  });
}

// ============================================================================
// merge
// ============================================================================

type MergeStep<T> = { index: number; done: true } | { index: number; done: false; value: T };

function receiveStep<T>(
  channel: Channel<T>,
  index: number,
  claim: () => boolean
): { step: Promise<MergeStep<T>>; cancel: () => void } {
  const pending = channel.receiveCancellable(claim);
  const step = pending.promise.then(
    (value): MergeStep<T> => ({ index, done: false, value }),
    (error: unknown): MergeStep<T> => {
      if (error instanceof ChannelClosedError) {
        return { index, done: true };
      }
      throw error;
    }
  );
  return { step, cancel: pending.cancel };
}

function pullStep<T>(iterator: AsyncIterator<T>, index: number): Promise<MergeStep<T>> {
  return iterator.next().then((result): MergeStep<T> => {
    if (result.done) {
      return { index, done: true };
    }
    return { index, done: false, value: result.value };
  });
}

/**
 * Interleave values from every source. Completes once all sources have
 * completed; the first source error is raised at once.
 *
 * Channels are only read when the consumer asks for the next value, so a
 * consumer that stops early leaves every unread value in its channel.
 */
export async function* merge<T>(sources: Array<ChannelSource<T>>): AsyncGenerator<T, void, undefined> {
  const channels = new Map<number, Channel<T>>();
  const iterators = new Map<number, AsyncIterator<T>>();
  sources.forEach((source, index) => {
    if (source instanceof Channel) {
      channels.set(index, source);
    } else {
      iterators.set(index, source[Symbol.asyncIterator]());
    }
  });

  const open = sources.map((_, index) => index);
  // Iterator reads outlive the round that started them
  const pulls = new Map<number, Promise<MergeStep<T>>>();
  let turn = 0;

  const finish = (index: number) => {
    open.splice(open.indexOf(index), 1);
    pulls.delete(index);
  };

  const pollChannels = (): MergeStep<T> | undefined => {
    turn++;
    for (let offset = 0; offset < open.length; offset++) {
      const index = open[(turn + offset) % open.length];
      const ready = channels.get(index)?.poll();
      if (ready?.ok) {
        return { index, done: false, value: ready.value };
      }
    }
    return undefined;
  };

  try {
    while (open.length > 0) {
      const ready = pollChannels();
      if (ready && !ready.done) {
        yield ready.value;
        continue;
      }

      // At most one channel hands over a value per round
      const claims: number[] = [];
      const claim = (index: number) => () => {
        if (claims.length > 0) {
          return false;
        }
        claims.push(index);
        return true;
      };

      const contenders = new Map<number, Promise<MergeStep<T>>>();
      const cancels: Array<() => void> = [];
      for (const index of open) {
        const channel = channels.get(index);
        const iterator = iterators.get(index);
        if (channel) {
          const { step, cancel } = receiveStep(channel, index, claim(index));
          contenders.set(index, step);
          cancels.push(cancel);
        } else if (iterator) {
          const pull = pulls.get(index) ?? pullStep(iterator, index);
          pulls.set(index, pull);
          contenders.set(index, pull);
        }
      }

      let winner: MergeStep<T>;
      try {
        winner = await Promise.race(contenders.values());
      } finally {
        for (const cancel of cancels) {
          cancel();
        }
      }

      if (claims.length > 0) {
        // A channel gave up its value; deliver that one and keep any
        // iterator value that also arrived for the next round
        if (winner.done) {
          finish(winner.index);
        }
        const claimed = await contenders.get(claims[0]);
        if (claimed && !claimed.done) {
          yield claimed.value;
        }
      } else if (winner.done) {
        finish(winner.index);
      } else {
        pulls.delete(winner.index);
        yield winner.value;
      }
    }
  } finally {
    for (const iterator of iterators.values()) {
      closeIterator(iterator);
    }
    for (const pull of pulls.values()) {
      pull.catch((err: unknown) => {
        logger.debug('Merged source failed after the consumer stopped', err);
      });
    }
  }
}

// ============================================================================
// pipeline
// ============================================================================

/**
 * Map each value of `source`; ends exactly when the source ends
 */
export async function* pipeline<T, R>(
  source: ChannelSource<T>,
  transform: (value: T) => R | Promise<R>
): AsyncGenerator<R, void, undefined> {
  for await (const value of source) {
    yield await transform(value);
  }
}
