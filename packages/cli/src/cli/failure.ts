/**
 * Top-level failure reporting for the solbench command
 */

import { DebugLogger, wrapError } from '@solbench/core';

const logger = new DebugLogger('CLI');

/**
 * Line printed to stderr before exiting with status 1.
 * The structured error goes to the debug log.
 */
export function formatFailure(error: unknown): string {
  const failure = wrapError(error, 'Unexpected error');
  logger.debug(JSON.stringify(failure.toJSON()));
  return `Error: ${failure.message}`;
}
