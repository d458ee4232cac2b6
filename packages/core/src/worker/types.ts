/**
 * Worker (task-batching scheduler) types
 */

import type { JobFault } from '../errors.js';

/**
 * Opaque unit of work. A thunk, so that nothing starts before a run method
 * is called.
 */
export type Job<T> = () => Promise<T>;

/**
 * idle → running → done; a worker is consumed by its one run call
 */
export type WorkerState = 'idle' | 'running' | 'done';

/**
 * Logger interface for worker events
 */
export interface WorkerLogger {
  debug: (message: string) => void;
  error: (message: string) => void;
}

/**
 * Configuration for Worker
 */
export interface WorkerOptions {
  /** Number of lanes (default: os.availableParallelism()) */
  lanes?: number;
  /** Logger for lane events (default: DebugLogger with "Worker" context) */
  logger?: WorkerLogger;
}

/**
 * Result of driving one lane or chunk to completion
 */
export type GroupOutcome<T> = { ok: true; results: T[] } | { ok: false; fault: JobFault };
