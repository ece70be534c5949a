/**
 * Workers Module
 *
 * One share-nothing worker per task, a registry of live workers, and a
 * limiter bounding how many run at once.
 */

export type {
  Task,
  TaskOutcome,
  SpawnOptions,
  WorkerHandle,
  WorkerAdapter,
  TaskLauncher,
} from './types.js';

export type { DispatcherOptions, DispatcherStats } from './dispatcher.js';
export { WorkerDispatcher } from './dispatcher.js';
export { ConcurrencyLimiter } from './limiter.js';
export type { WorkerRecord } from './registry.js';
export { WorkerRegistry } from './registry.js';
export type { ThreadWorkerAdapterOptions } from './thread-adapter.js';
export { ThreadWorkerAdapter } from './thread-adapter.js';
export { InlineWorkerAdapter } from './inline-adapter.js';
export { createWorkerAdapter } from './adapter-factory.js';
