/**
 * Worker adapter selection
 */

import { loadWorkerConfig, type WorkerAdapterKind } from '../config/threadline-config.js';
import { InlineWorkerAdapter } from './inline-adapter.js';
import { ThreadWorkerAdapter, type ThreadWorkerAdapterOptions } from './thread-adapter.js';
import type { WorkerAdapter } from './types.js';

/**
 * Create a worker adapter. Without a kind, THREADLINE_WORKER_ADAPTER decides.
 */
export function createWorkerAdapter(
  kind?: WorkerAdapterKind,
  options: ThreadWorkerAdapterOptions = {}
): WorkerAdapter {
  const config = loadWorkerConfig();
  const resolved = kind ?? config.adapter;

  if (resolved === 'inline') {
    return new InlineWorkerAdapter();
  }
  return new ThreadWorkerAdapter({
    memoryLimitMb: options.memoryLimitMb ?? config.memoryLimitMb,
  });
}
