/**
 * @fileoverview Run context carried through AsyncLocalStorage.
 *
 * An ingestion or analytics run gets one id which is carried through every
 * awaited call. The log format copies the context onto each entry written
 * inside the run, `run_id` included.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RunContext {
  run_id: string;
  [key: string]: unknown;
}

const storage = new AsyncLocalStorage<RunContext>();

export function getRunContext(): Readonly<RunContext> | undefined {
  return storage.getStore();
}

export function getRunId(): string | undefined {
  return storage.getStore()?.run_id;
}

/**
 * Runs `fn` inside a run context. Passing the current {@link getRunId} keeps
 * an outer run's id for nested runs.
 *
 * @param runId - A fresh UUID when omitted
 * @param fields - Stamped on every log entry of the run
 *
 * @example
 * ```typescript
 * await withRunContext(() => service.ingestEod(1, 'AAPL', start, end), undefined, { symbol: 'AAPL' });
 * ```
 */
export async function withRunContext<T>(
  fn: () => Promise<T> | T,
  runId?: string,
  fields: Record<string, unknown> = {}
): Promise<T> {
  return storage.run({ ...fields, run_id: runId ?? randomUUID() }, fn);
}

/**
 * Adds fields to the active run, e.g. once a provider has been chosen.
 * `run_id` itself cannot be replaced.
 *
 * @returns false outside of a run
 */
export function annotateRun(fields: Record<string, unknown>): boolean {
  const context = storage.getStore();
  if (!context) {
    return false;
  }
  for (const [key, value] of Object.entries(fields)) {
    if (key !== 'run_id') {
      context[key] = value;
    }
  }
  return true;
}
