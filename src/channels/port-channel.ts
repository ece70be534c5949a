/**
 * Port Channel
 *
 * Channel endpoint backed by a worker_threads MessagePort. A value sent on
 * one endpoint is buffered on the other. Closing is itself a message:
 *
 * - every value carries a sequence number, and the close message carries
 *   how many values were sent before it
 * - the receiving side applies the close once it has seen that many
 *   values, then closes the port
 * - a value reaching an endpoint that already closed is discarded
 */

import { MessageChannel, MessagePort } from 'worker_threads';
import { z } from 'zod';
import { ChannelClosedError } from '../utils/errors.js';
import { createLogger, Logger } from '../utils/logger.js';
import { Channel } from './channel.js';

const PortMessageSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('value'), seq: z.number().int().nonnegative(), value: z.unknown() }),
  z.object({ kind: z.literal('close'), sent: z.number().int().nonnegative() }),
]);

export type PortMessage = z.infer<typeof PortMessageSchema>;

export class PortChannel<T> extends Channel<T> {
  private sentCount = 0;
  private receivedCount = 0;
  private remoteCloseAt?: number;
  private portClosed = false;
  private logger: Logger;

  constructor(private readonly port: MessagePort) {
    super(0);
    this.logger = createLogger({ source: 'PortChannel' });
    port.on('message', (message: unknown) => this.handleMessage(message));
    port.on('close', () => this.handlePortClose());
  }

  /**
   * Wrap a port transferred into this thread
   */
  static attach<T>(port: MessagePort): PortChannel<T> {
    return new PortChannel<T>(port);
  }

  /**
   * Create two endpoints linked by one MessageChannel
   */
  static linked<T>(): [PortChannel<T>, PortChannel<T>] {
    const { port1, port2 } = new MessageChannel();
    return [new PortChannel<T>(port1), new PortChannel<T>(port2)];
  }

  /**
   * Post the value to the other endpoint. Never waits.
   */
  override send(value: T): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new ChannelClosedError());
    }
    try {
      this.post(value);
    } catch (error) {
      return Promise.reject(error);
    }
    return Promise.resolve();
  }

  /**
   * Post the value. Throws if the value cannot be cloned.
   */
  override trySend(value: T): boolean {
    if (this.isClosed) {
      return false;
    }
    this.post(value);
    return true;
  }

  override close(): void {
    if (this.isClosed) {
      return;
    }
    if (!this.portClosed) {
      const message: PortMessage = { kind: 'close', sent: this.sentCount };
      this.port.postMessage(message);
    }
    this.closeLocal();
  }

  private post(value: T): void {
    const message: PortMessage = { kind: 'value', seq: this.sentCount, value };
    this.port.postMessage(message);
    this.sentCount++;
  }

  private handleMessage(raw: unknown): void {
    const parsed = PortMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Received invalid message on channel port');
      return;
    }

    const message = parsed.data;
    if (message.kind === 'value') {
      if (this.isClosed) {
        this.logger.debug('Discarding value that arrived after close', { seq: message.seq });
        return;
      }
      this.receivedCount++;
      // Sent as a T by the other endpoint
      this.deliver(message.value as T);
    } else {
      this.remoteCloseAt = message.sent;
    }
    this.applyRemoteClose();
  }

  private applyRemoteClose(): void {
    if (this.remoteCloseAt === undefined || this.receivedCount < this.remoteCloseAt) {
      if (this.remoteCloseAt !== undefined && this.isClosed) {
        this.closePort();
      }
      return;
    }
    this.closeLocal();
    this.closePort();
  }

  private handlePortClose(): void {
    this.portClosed = true;
    this.closeLocal();
  }

  private closePort(): void {
    if (this.portClosed) {
      return;
    }
    this.portClosed = true;
    this.port.close();
  }
}

/**
 * Create two linked cross-worker channel endpoints
 */
export function linkedChannels<T>(): [PortChannel<T>, PortChannel<T>] {
  return PortChannel.linked<T>();
}
