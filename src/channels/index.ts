/**
 * Channels Module
 *
 * Typed channels (unbuffered, buffered and cross-worker) and the
 * select/merge/pipeline combinators.
 */

export type { ReceiveResult, PendingReceive } from './channel.js';
export { Channel, ChannelSubscription } from './channel.js';
export type { PortMessage } from './port-channel.js';
export { PortChannel, linkedChannels } from './port-channel.js';
export type { ChannelSource, SelectResult } from './combinators.js';
export { select, merge, pipeline } from './combinators.js';
