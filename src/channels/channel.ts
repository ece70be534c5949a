/**
 * Channel Module
 *
 * Typed FIFO channels for producer/consumer coordination.
 *
 * - Unbuffered (capacity 0): send waits until a receiver takes the value
 * - Buffered: send waits only while the buffer is full
 * - Closing keeps buffered values receivable until drained
 */

import { ChannelClosedError, UsageError } from '../utils/errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of a non-blocking receive
 */
export type ReceiveResult<T> = { ok: true; value: T } | { ok: false };

/**
 * A receive that can be withdrawn from the waiter queue
 */
export interface PendingReceive<T> {
  promise: Promise<T>;
  cancel: () => void;
}

interface WaitingReceiver<T> {
  /** Returns false when the receiver declines the value */
  deliver: (value: T) => boolean;
  fail: (error: Error) => void;
}

interface WaitingSender<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

const EMPTY: ReceiveResult<never> = { ok: false };

// ============================================================================
// Channel
// ============================================================================

export class Channel<T> implements AsyncIterable<T> {
  protected buffer: T[] = [];
  protected receivers: Array<WaitingReceiver<T>> = [];
  protected senders: Array<WaitingSender<T>> = [];
  private closed = false;

  /**
   * Create an unbuffered channel, or one holding up to `capacity` values
   */
  constructor(public readonly capacity: number = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new UsageError('Channel capacity must be a non-negative integer', 'capacity', capacity);
    }
  }

  /**
   * Create a channel whose sends don't wait until `capacity` values are queued
   */
  static buffered<T>(capacity: number): Channel<T> {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new UsageError('Capacity must be a positive integer', 'capacity', capacity);
    }
    return new Channel<T>(capacity);
  }

  /**
   * Send a value, waiting while no receiver or buffer slot is free.
   * Rejects with ChannelClosedError once the channel is closed.
   */
  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }
    if (this.offer(value)) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  /**
   * Send without waiting. False if the value cannot be taken right now.
   */
  trySend(value: T): boolean {
    if (this.closed) {
      return false;
    }
    return this.offer(value);
  }

  /**
   * Receive the oldest value, waiting for one if necessary.
   * Rejects with ChannelClosedError once closed and drained.
   */
  receive(): Promise<T> {
    return this.receiveCancellable().promise;
  }

  /**
   * Receive without waiting. Undefined when nothing is available.
   */
  tryReceive(): T | undefined {
    const result = this.take();
    return result.ok ? result.value : undefined;
  }

  /**
   * Receive without waiting, telling "empty" apart from an undefined value
   */
  poll(): ReceiveResult<T> {
    return this.take();
  }

  /**
   * Receive with the option of withdrawing from the waiter queue.
   * `claim` is asked before a value is handed over; returning false
   * leaves the value for the next receiver.
   */
  receiveCancellable(claim?: () => boolean): PendingReceive<T> {
    const next = this.take();
    if (next.ok) {
      return { promise: Promise.resolve(next.value), cancel: () => undefined };
    }
    if (this.closed) {
      return { promise: Promise.reject(new ChannelClosedError()), cancel: () => undefined };
    }

    let waiter: WaitingReceiver<T> | undefined;
    const promise = new Promise<T>((resolve, reject) => {
      waiter = {
        deliver: (value) => {
          if (claim && !claim()) {
            return false;
          }
          resolve(value);
          return true;
        },
        fail: reject,
      };
      this.receivers.push(waiter);
    });

    const cancel = () => {
      const index = waiter ? this.receivers.indexOf(waiter) : -1;
      if (index >= 0) {
        this.receivers.splice(index, 1);
      }
    };

    return { promise, cancel };
  }

  /**
   * Close the channel. Waiting receivers fail, waiting senders fail with
   * their value undelivered, buffered values stay receivable.
   */
  close(): void {
    this.closeLocal();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of buffered values. */
  get length(): number {
    return this.buffer.length;
  }

  get isEmpty(): boolean {
    return this.buffer.length === 0;
  }

  /**
   * Values in arrival order, ending once the channel is closed and drained
   */
  stream(): AsyncIterable<T> {
    return {
      [Symbol.asyncIterator]: () => new ChannelSubscription<T>(this),
    };
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return new ChannelSubscription<T>(this);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  protected closeLocal(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const receivers = this.receivers;
    this.receivers = [];
    for (const receiver of receivers) {
      receiver.fail(new ChannelClosedError());
    }

    const senders = this.senders;
    this.senders = [];
    for (const sender of senders) {
      sender.reject(new ChannelClosedError('Channel closed before the value was delivered'));
    }
  }

  /**
   * Hand the value to a waiting receiver or buffer it, capacity allowing
   */
  protected offer(value: T): boolean {
    if (this.handOff(value)) {
      return true;
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return true;
    }
    return false;
  }

  /**
   * Accept a value regardless of capacity
   */
  protected deliver(value: T): void {
    if (!this.handOff(value)) {
      this.buffer.push(value);
    }
  }

  private handOff(value: T): boolean {
    for (let receiver = this.receivers.shift(); receiver; receiver = this.receivers.shift()) {
      if (receiver.deliver(value)) {
        return true;
      }
    }
    return false;
  }

  private take(): ReceiveResult<T> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      // Refill the freed slot from the oldest waiting sender
      const sender = this.senders.shift();
      if (sender) {
        this.buffer.push(sender.value);
        sender.resolve();
      }
      return { ok: true, value };
    }

    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return { ok: true, value: sender.value };
    }
    return EMPTY;
  }
}

// ============================================================================
// Subscription
// ============================================================================

/**
 * One pass over a channel. Returning early withdraws the pending receive,
 * so an abandoned subscription never swallows a value.
 */
export class ChannelSubscription<T> implements AsyncIterator<T> {
  private done = false;
  private stop?: () => void;

  constructor(private readonly channel: Channel<T>) {}

  next(): Promise<IteratorResult<T>> {
    if (this.done) {
      return Promise.resolve({ done: true, value: undefined });
    }

    const pending = this.channel.receiveCancellable();
    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.stop = () => {
        pending.cancel();
        resolve({ done: true, value: undefined });
      };
      pending.promise.then(
        (value) => {
          this.stop = undefined;
          resolve({ done: false, value });
        },
        (error: unknown) => {
          this.stop = undefined;
          if (error instanceof ChannelClosedError) {
            this.done = true;
            resolve({ done: true, value: undefined });
          } else {
            reject(error);
          }
        }
      );
    });
  }

  async return(): Promise<IteratorResult<T>> {
    this.done = true;
    this.stop?.();
    this.stop = undefined;
    return { done: true, value: undefined };
  }
}
