/**
 * solbench core - Main exports
 *
 * Scheduler, errors and logging shared by the solbench packages.
 *
 * @module core
 */

// Scheduler
export {
  Worker,
  defaultLaneCount,
  type Job,
  type WorkerState,
  type WorkerLogger,
  type WorkerOptions,
  type GroupOutcome,
} from './worker/index.js';

// Errors
export {
  SolbenchError,
  ValidationError,
  ConfigurationError,
  WorkerStateError,
  JobFaultError,
  LaneFaultError,
  ChunkFaultError,
  wrapError,
  errorMessage,
  type ErrorDetails,
  type ErrorJSON,
  type JobFault,
} from './errors.js';

// Logging
export { DebugLogger, LOG_LEVELS, LOG_LEVEL_ENV, type LogLevel } from './debug-logger.js';
