/**
 * Run Context
 *
 * Uses Node.js `AsyncLocalStorage` to propagate batch-scoped context
 * (the runId) across the whole pipeline without passing it through every
 * function signature.
 *
 * The batch coordinator opens a context per `processBatch` call.
 * The logger reads it automatically so every log line of a run includes `runId`.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface RunContext {
  /** Unique identifier for one batch run. */
  runId: string;
}

/**
 * Singleton AsyncLocalStorage instance shared across the process.
 */
export const runContext = new AsyncLocalStorage<RunContext>();

/**
 * Get the current run context, or `undefined` if called outside
 * a batch run (e.g., a single-player lookup from the CLI).
 */
export function getRunContext(): RunContext | undefined {
  return runContext.getStore();
}

/**
 * Run `fn` inside a fresh context. A runId is generated unless one is given.
 */
export function withRunContext<T>(fn: () => Promise<T>, runId: string = randomUUID()): Promise<T> {
  return runContext.run({ runId }, fn);
}
