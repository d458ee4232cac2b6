/**
 * Shared state handed to every command that needs the config file
 */

import { LOG_LEVEL_ENV, Worker } from '@solbench/core';

import type { ChainClient } from '../chain/types.js';
import { loadRuntimeConfig } from './config/config-manager.js';
import type { RuntimeConfig } from './config/types.js';

export interface CommandContext {
  config: RuntimeConfig;
  client: ChainClient;
}

export type ClientFactory = (rpcUri: string) => ChainClient;

/**
 * Worker sized by `worker.lanes` (available parallelism when unset)
 */
export function createWorker<T>(config: RuntimeConfig): Worker<T> {
  return new Worker<T>({ lanes: config.worker.lanes });
}

/**
 * Apply `logging.level` unless SOLBENCH_LOG_LEVEL is already set
 */
export function applyLoggingConfig(config: RuntimeConfig): void {
  if (process.env[LOG_LEVEL_ENV]) {
    return;
  }
  process.env[LOG_LEVEL_ENV] = config.logging.level.toUpperCase();
}

/**
 * Load the config file and apply its logging level
 */
export async function loadCommandConfig(configPath: string | undefined): Promise<RuntimeConfig> {
  const config = await loadRuntimeConfig(configPath);
  applyLoggingConfig(config);
  return config;
}

export async function createContext(
  configPath: string | undefined,
  createClient: ClientFactory
): Promise<CommandContext> {
  const config = await loadCommandConfig(configPath);
  return { config, client: createClient(config.rpcUri) };
}
