/**
 * solbench Error Classes - Typed Error Handling
 *
 * Every error raised by solbench code derives from SolbenchError and
 * carries a stable code plus structured details.
 *
 * @module errors
 */

export interface ErrorDetails {
  [key: string]: unknown;
}

export interface ErrorJSON {
  name: string;
  code: string;
  message: string;
  details: ErrorDetails;
  timestamp: string;
  stack?: string;
}

/**
 * Base error class for all solbench errors
 */
export class SolbenchError extends Error {
  code: string;
  details: ErrorDetails;
  timestamp: string;

  constructor(message: string, code = 'SOLBENCH_ERROR', details: ErrorDetails = {}) {
    super(message);
    this.name = 'SolbenchError';
    this.code = code;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Capture stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): ErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends SolbenchError {
  field: string;

  constructor(field: string, message: string, received?: unknown, details: ErrorDetails = {}) {
    super(`Validation failed for '${field}': ${message}`, 'INVALID_INPUT', {
      field,
      received: received !== undefined ? String(received).substring(0, 100) : undefined,
      ...details,
    });
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends SolbenchError {
  configKey: string;

  constructor(configKey: string, message: string, details: ErrorDetails = {}) {
    super(`Configuration error for '${configKey}': ${message}`, 'CONFIG_ERROR', {
      configKey,
      ...details,
    });
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }
}

/**
 * Error thrown when a Worker is used outside its idle → running → done lifecycle
 */
export class WorkerStateError extends SolbenchError {
  operation: string;
  state: string;

  constructor(operation: string, state: string, details: ErrorDetails = {}) {
    super(`Cannot ${operation}: worker is ${state} and can only be run once`, 'WORKER_STATE_ERROR', {
      operation,
      state,
      ...details,
    });
    this.name = 'WorkerStateError';
    this.operation = operation;
    this.state = state;
  }
}

/**
 * A single failed job, located by its group (lane or chunk) and its
 * position inside that group
 */
export interface JobFault {
  group: number;
  position: number;
  cause: unknown;
}

/**
 * Error thrown when a job rejects while a Worker drives it
 */
export class JobFaultError extends SolbenchError {
  group: number;
  position: number;
  faults: JobFault[];

  constructor(groupKind: 'lane' | 'chunk', faults: JobFault[], details: ErrorDetails = {}) {
    const [first] = faults;
    const group = first?.group ?? -1;
    const position = first?.position ?? -1;
    const reason = first?.cause instanceof Error ? first.cause.message : String(first?.cause);
    const others = faults.length > 1 ? ` (${faults.length - 1} more ${groupKind}(s) failed)` : '';
    super(`Job ${position} in ${groupKind} ${group} failed: ${reason}${others}`, 'JOB_FAULT', {
      groupKind,
      group,
      position,
      faultCount: faults.length,
      ...details,
    });
    this.name = 'JobFaultError';
    this.group = group;
    this.position = position;
    this.faults = faults;
    this.cause = first?.cause;
  }
}

/**
 * A lane stopped because one of its jobs failed
 */
export class LaneFaultError extends JobFaultError {
  constructor(faults: JobFault[], details: ErrorDetails = {}) {
    super('lane', faults, details);
    this.name = 'LaneFaultError';
  }

  get lane(): number {
    return this.group;
  }
}

/**
 * A single-threaded chunk failed; later chunks were not started
 */
export class ChunkFaultError extends JobFaultError {
  constructor(faults: JobFault[], details: ErrorDetails = {}) {
    super('chunk', faults, details);
    this.name = 'ChunkFaultError';
  }

  get chunk(): number {
    return this.group;
  }
}

/**
 * Helper function to wrap unknown errors
 */
export function wrapError(error: unknown, context = 'Unknown operation'): SolbenchError {
  if (error instanceof SolbenchError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new SolbenchError(`${context}: ${message}`, 'INTERNAL_ERROR', {
    originalError: message,
    originalStack: stack,
  });
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
