/**
 * DebugLogger - Centralized diagnostic logging for solbench
 *
 * Command output goes to stdout through console.log; everything
 * diagnostic goes through this logger, on stderr, so that piping
 * `solbench wallet generate 10 > wallets.yaml` stays clean.
 *
 * Features:
 * - Log levels (DEBUG, INFO, WARN, ERROR)
 * - Timestamp formatting
 * - Environment-based filtering (SOLBENCH_LOG_LEVEL)
 * - Module/context tagging
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'NONE';

export const LOG_LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  NONE: 4,
};

export const LOG_LEVEL_ENV = 'SOLBENCH_LOG_LEVEL';

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export class DebugLogger {
  private context: string;

  constructor(context = 'solbench') {
    this.context = context;
  }

  // Read on every call: the CLI applies `logging.level` after module loggers exist
  private _getLogLevel(): number {
    const env = (process.env[LOG_LEVEL_ENV] || 'ERROR').toUpperCase();
    return isLogLevel(env) ? LOG_LEVELS[env] : LOG_LEVELS.ERROR;
  }

  private _shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this._getLogLevel();
  }

  private _formatMessage(level: LogLevel, ...args: unknown[]): unknown[] {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${this.context}] [${level}]`;
    return [prefix, ...args];
  }

  debug(...args: unknown[]): void {
    if (!this._shouldLog('DEBUG')) {
      return;
    }
    console.error(...this._formatMessage('DEBUG', ...args));
  }

  info(...args: unknown[]): void {
    if (!this._shouldLog('INFO')) {
      return;
    }
    console.error(...this._formatMessage('INFO', ...args));
  }

  warn(...args: unknown[]): void {
    if (!this._shouldLog('WARN')) {
      return;
    }
    console.warn(...this._formatMessage('WARN', ...args));
  }

  error(...args: unknown[]): void {
    if (!this._shouldLog('ERROR')) {
      return;
    }
    console.error(...this._formatMessage('ERROR', ...args));
  }
}
