/**
 * Worker Bootstrap
 *
 * Script evaluated inside each worker thread. It rebuilds the task from
 * its source text, runs it, and posts exactly one report to the parent:
 * { type: 'success', value } or { type: 'failure', error }.
 */

import { UsageError } from '../utils/errors.js';
import type { Task } from './types.js';

export const WORKER_BOOTSTRAP = `
'use strict';
const { parentPort, workerData } = require('worker_threads');

function serializeError(error) {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'Error', message: typeof error === 'string' ? error : String(error) };
}

(async () => {
  try {
    const task = (0, eval)('(' + workerData.source + ')');
    const value = await task();
    parentPort.postMessage({ type: 'success', value });
  } catch (error) {
    parentPort.postMessage({ type: 'failure', error: serializeError(error) });
  }
})();
`;

const NATIVE_CODE = /\{\s*\[native code\]\s*\}\s*$/;
const FUNCTION_KEYWORD = /^(async\s+)?function\b/;
const ZERO_ARG_ARROW = /^(async\s*)?\(\s*\)\s*=>/;
const METHOD_SHORTHAND = /^(async\s+)?(\*\s*)?[A-Za-z_$][\w$]*\s*\(/;

/**
 * Turn a task into source text that evaluates to a callable expression.
 * The task must not close over outer variables: only its own text
 * reaches the worker.
 */
export function toTaskSource(task: Task<unknown>): string {
  const source = task.toString().trim();

  if (NATIVE_CODE.test(source)) {
    throw new UsageError('Native or bound functions cannot be sent to a worker thread', 'task');
  }
  if (source.startsWith('class')) {
    throw new UsageError('A class is not a task', 'task');
  }
  if (FUNCTION_KEYWORD.test(source) || ZERO_ARG_ARROW.test(source)) {
    return source;
  }
  if (METHOD_SHORTHAND.test(source)) {
    // `run() { ... }` or `async run() { ... }`
    return source.startsWith('async')
      ? `async function ${source.replace(/^async\s+/, '')}`
      : `function ${source}`;
  }
  // Single-parameter arrow like `_ => ...`
  return source;
}
