/**
 * Worker Registry
 *
 * Tracks the live workers of one dispatcher. Each dispatcher owns its own
 * registry; pass one in to share or inspect it from tests.
 */

import { UsageError } from '../utils/errors.js';
import type { WorkerHandle } from './types.js';

export interface WorkerRecord {
  name: string;
  handle: WorkerHandle;
  adapter: string;
  startedAt: number;
}

export class WorkerRegistry {
  private workers: Map<string, WorkerRecord> = new Map();
  private counter = 0;

  /**
   * Generate a name not held by any live worker
   */
  nextName(): string {
    let name = `worker_${this.counter++}`;
    while (this.workers.has(name)) {
      name = `worker_${this.counter++}`;
    }
    return name;
  }

  /**
   * Throw if a live worker already holds the name
   */
  assertAvailable(name: string): void {
    if (this.workers.has(name)) {
      throw new UsageError(`A worker named "${name}" is already running`, 'name', name);
    }
  }

  add(record: WorkerRecord): void {
    this.assertAvailable(record.name);
    this.workers.set(record.name, record);
  }

  get(name: string): WorkerRecord | undefined {
    return this.workers.get(name);
  }

  has(name: string): boolean {
    return this.workers.has(name);
  }

  /**
   * Remove a worker. Only removes the given handle's entry.
   */
  remove(name: string, handle?: WorkerHandle): boolean {
    const record = this.workers.get(name);
    if (!record || (handle && record.handle !== handle)) {
      return false;
    }
    return this.workers.delete(name);
  }

  /**
   * Remove and return every record
   */
  drain(): WorkerRecord[] {
    const records = Array.from(this.workers.values());
    this.workers.clear();
    return records;
  }

  get size(): number {
    return this.workers.size;
  }

  names(): string[] {
    return Array.from(this.workers.keys());
  }
}
