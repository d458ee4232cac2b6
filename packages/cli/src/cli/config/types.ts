/**
 * Configuration types for the solbench CLI
 */

import type { Keypair } from '@solana/web3.js';

// ============================================================================
// File Configuration (as written in config.yaml)
// ============================================================================

/**
 * One load-test transfer between two configured wallets
 */
export interface TransferCase {
  /** Index into `wallets` of the sender */
  from: number;
  /** Index into `wallets` of the receiver */
  to: number;
  /** Amount in SOL or in whole tokens */
  amount: number;
}

export interface RpcConfig {
  /**
   * JSON-RPC endpoint
   * @example "http://localhost:8899"
   */
  uri: string;
}

export interface TokenConfig {
  /** base58 secret key of the payer and mint authority */
  owner: string;
  /** base58 secret key of the mint account */
  mint: string;
}

export interface TestConfig {
  transfers: {
    sols: TransferCase[];
    tokens: TransferCase[];
  };
}

export interface WorkerConfig {
  /**
   * Lane count for every Worker the CLI builds
   * If not specified, uses the available parallelism
   */
  lanes?: number;
  /**
   * Chunk size for token transfers (runSingleThreaded)
   * @default 32
   */
  batch_size: number;
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

export interface LoggingConfig {
  /** Applied when SOLBENCH_LOG_LEVEL is not set */
  level: LogLevelName;
}

export interface SolbenchConfig {
  rpc: RpcConfig;
  token: TokenConfig;
  test: TestConfig;
  /** base58 secret keys */
  wallets: string[];
  worker: WorkerConfig;
  logging: LoggingConfig;
}

// ============================================================================
// Runtime Configuration (keys decoded)
// ============================================================================

export interface RuntimeConfig {
  rpcUri: string;
  tokenOwner: Keypair;
  tokenMint: Keypair;
  wallets: Keypair[];
  transfers: TestConfig['transfers'];
  worker: WorkerConfig;
  logging: LoggingConfig;
  /** File the config was loaded from */
  path: string;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_BATCH_SIZE = 32;

export const DEFAULT_WORKER_CONFIG: WorkerConfig = {
  batch_size: DEFAULT_BATCH_SIZE,
};

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: 'error',
};

/**
 * Env var naming the config file when --config is not given
 */
export const CONFIG_ENV = 'SOLBENCH_CONFIG';

export const SOLBENCH_PATHS = {
  /** solbench home directory */
  HOME: '~/.solbench',
  /** Configuration file */
  CONFIG: '~/.solbench/config.yaml',
} as const;
