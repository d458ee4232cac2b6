/**
 * CLI error classes
 *
 * Domain errors raised around the scheduler: wallet files and the chain client.
 */

import { SolbenchError, type ErrorDetails } from '@solbench/core';

/**
 * Error thrown when a wallet file or directory cannot be used
 */
export class WalletError extends SolbenchError {
  path: string;

  constructor(path: string, message: string, details: ErrorDetails = {}) {
    super(`${message}: ${path}`, 'WALLET_ERROR', { path, ...details });
    this.name = 'WalletError';
    this.path = path;
  }
}

/**
 * Error thrown when an RPC call or a transaction fails
 */
export class ChainError extends SolbenchError {
  operation: string;

  constructor(operation: string, message: string, details: ErrorDetails = {}) {
    super(`${operation} failed: ${message}`, 'CHAIN_ERROR', { operation, ...details });
    this.name = 'ChainError';
    this.operation = operation;
  }
}
