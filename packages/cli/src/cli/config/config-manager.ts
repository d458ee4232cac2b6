/**
 * Configuration Manager for the solbench CLI
 *
 * Loads the YAML configuration file. Resolution order:
 * --config option, then $SOLBENCH_CONFIG, then ~/.solbench/config.yaml
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import * as yaml from 'js-yaml';
import type { Keypair } from '@solana/web3.js';
import { ConfigurationError, DebugLogger, errorMessage } from '@solbench/core';

import { decodeKeypair, encodeKeypair } from '../../wallet/keypair.js';
import type {
  LogLevelName,
  RuntimeConfig,
  SolbenchConfig,
  TransferCase,
  WorkerConfig,
} from './types.js';
import {
  CONFIG_ENV,
  DEFAULT_LOGGING_CONFIG,
  DEFAULT_WORKER_CONFIG,
  LOG_LEVEL_NAMES,
  SOLBENCH_PATHS,
} from './types.js';

const logger = new DebugLogger('Config');

type YamlRecord = Record<string, unknown>;

/**
 * Expand ~ to home directory
 */
export function expandPath(path: string): string {
  if (path.startsWith('~')) {
    return path.replace('~', homedir());
  }
  return path;
}

/**
 * Get the full path to config file
 *
 * @param explicit - Value of the --config option, if any
 */
export function getConfigPath(explicit?: string): string {
  return expandPath(explicit || process.env[CONFIG_ENV] || SOLBENCH_PATHS.CONFIG);
}

/**
 * Check if config file exists
 */
export function configExists(explicit?: string): boolean {
  return existsSync(getConfigPath(explicit));
}

function isRecord(value: unknown): value is YamlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVEL_NAMES.some((level) => level === value);
}

function readSection(parent: YamlRecord, key: string, path: string, required: boolean): YamlRecord {
  const value = parent[key];
  if (value === undefined || value === null) {
    if (required) {
      throw new ConfigurationError(path, 'missing required section');
    }
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(path, 'must be a mapping');
  }
  return value;
}

function readString(parent: YamlRecord, key: string, path: string): string {
  const value = parent[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigurationError(path, 'must be a non-empty string', { received: value });
  }
  return value;
}

function readNumber(parent: YamlRecord, key: string, path: string): number | undefined {
  const value = parent[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number') {
    throw new ConfigurationError(path, 'must be a number', { received: value });
  }
  return value;
}

function readList(parent: YamlRecord, key: string, path: string): unknown[] {
  const value = parent[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError(path, 'must be a list');
  }
  return value;
}

function readTransfers(parent: YamlRecord, key: string): TransferCase[] {
  const path = `test.transfers.${key}`;
  return readList(parent, key, path).map((entry, index) => {
    const entryPath = `${path}[${index}]`;
    if (!isRecord(entry)) {
      throw new ConfigurationError(entryPath, 'must be a mapping with from, to and amount');
    }
    const from = readNumber(entry, 'from', `${entryPath}.from`);
    const to = readNumber(entry, 'to', `${entryPath}.to`);
    const amount = readNumber(entry, 'amount', `${entryPath}.amount`);
    if (from === undefined || to === undefined || amount === undefined) {
      throw new ConfigurationError(entryPath, 'from, to and amount are required');
    }
    return { from, to, amount };
  });
}

/**
 * Turn parsed YAML into a typed configuration, filling optional sections
 * with defaults
 *
 * @throws ConfigurationError naming the first malformed key
 */
export function parseConfig(raw: unknown): SolbenchConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('config', 'top level must be a mapping');
  }

  const rpc = readSection(raw, 'rpc', 'rpc', true);
  const token = readSection(raw, 'token', 'token', true);
  const test = readSection(raw, 'test', 'test', false);
  const transfers = readSection(test, 'transfers', 'test.transfers', false);
  const worker = readSection(raw, 'worker', 'worker', false);
  const logging = readSection(raw, 'logging', 'logging', false);

  const wallets = readList(raw, 'wallets', 'wallets').map((wallet, index) => {
    if (typeof wallet !== 'string') {
      throw new ConfigurationError(`wallets[${index}]`, 'must be a base58 string');
    }
    return wallet;
  });

  const workerConfig: WorkerConfig = {
    ...DEFAULT_WORKER_CONFIG,
    batch_size: readNumber(worker, 'batch_size', 'worker.batch_size') ?? DEFAULT_WORKER_CONFIG.batch_size,
  };
  const lanes = readNumber(worker, 'lanes', 'worker.lanes');
  if (lanes !== undefined) {
    workerConfig.lanes = lanes;
  }

  let level = DEFAULT_LOGGING_CONFIG.level;
  if (logging.level !== undefined) {
    const name = readString(logging, 'level', 'logging.level').toLowerCase();
    if (!isLogLevelName(name)) {
      throw new ConfigurationError(
        'logging.level',
        `must be one of: ${LOG_LEVEL_NAMES.join(', ')}`,
        { received: logging.level }
      );
    }
    level = name;
  }

  return {
    rpc: { uri: readString(rpc, 'uri', 'rpc.uri') },
    token: {
      owner: readString(token, 'owner', 'token.owner'),
      mint: readString(token, 'mint', 'token.mint'),
    },
    test: {
      transfers: {
        sols: readTransfers(transfers, 'sols'),
        tokens: readTransfers(transfers, 'tokens'),
      },
    },
    wallets,
    worker: workerConfig,
    logging: { level },
  };
}

/**
 * Validate configuration values
 *
 * @returns List of problems (empty when valid)
 */
export function validateConfig(config: SolbenchConfig): string[] {
  const errors: string[] = [];

  let protocol: string | null = null;
  try {
    protocol = new URL(config.rpc.uri).protocol;
  } catch {
    errors.push(`rpc.uri is not a valid URL: ${config.rpc.uri}`);
  }
  if (protocol !== null && protocol !== 'http:' && protocol !== 'https:') {
    errors.push('rpc.uri must use http or https');
  }

  if (config.worker.lanes !== undefined) {
    if (!Number.isInteger(config.worker.lanes) || config.worker.lanes < 1) {
      errors.push('worker.lanes must be a positive integer');
    }
  }

  if (!Number.isInteger(config.worker.batch_size) || config.worker.batch_size < 1) {
    errors.push('worker.batch_size must be a positive integer');
  }

  for (const kind of ['sols', 'tokens'] as const) {
    config.test.transfers[kind].forEach((transfer, index) => {
      const path = `test.transfers.${kind}[${index}]`;
      if (!Number.isInteger(transfer.from) || transfer.from < 0) {
        errors.push(`${path}.from must be a wallet index`);
      }
      if (!Number.isInteger(transfer.to) || transfer.to < 0) {
        errors.push(`${path}.to must be a wallet index`);
      }
      if (!Number.isFinite(transfer.amount) || transfer.amount <= 0) {
        errors.push(`${path}.amount must be a positive number`);
      }
    });
  }

  return errors;
}

/**
 * Load configuration from file
 *
 * @param explicit - Value of the --config option, if any
 * @throws ConfigurationError if the file is missing, unparsable or invalid
 */
export async function loadConfig(explicit?: string): Promise<SolbenchConfig> {
  const configPath = getConfigPath(explicit);

  if (!existsSync(configPath)) {
    throw new ConfigurationError(
      configPath,
      `file not found. Pass --config or set ${CONFIG_ENV}.`
    );
  }

  let raw: unknown;
  try {
    const content = await readFile(configPath, 'utf-8');
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(configPath, `failed to parse: ${errorMessage(error)}`);
  }

  const config = parseConfig(raw);
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(configPath, errors.join('; '), { errors });
  }

  logger.debug(
    `Loaded ${configPath}: wallets=${config.wallets.length} sols=${config.test.transfers.sols.length} tokens=${config.test.transfers.tokens.length}`
  );
  return config;
}

/**
 * Decode every key of a loaded configuration
 */
export function toRuntimeConfig(config: SolbenchConfig, path: string): RuntimeConfig {
  return {
    rpcUri: config.rpc.uri,
    tokenOwner: decodeKeypair(config.token.owner, 'token.owner'),
    tokenMint: decodeKeypair(config.token.mint, 'token.mint'),
    wallets: config.wallets.map((wallet, index) => decodeKeypair(wallet, `wallets[${index}]`)),
    transfers: config.test.transfers,
    worker: config.worker,
    logging: config.logging,
    path,
  };
}

export async function loadRuntimeConfig(explicit?: string): Promise<RuntimeConfig> {
  const config = await loadConfig(explicit);
  return toRuntimeConfig(config, getConfigPath(explicit));
}

/**
 * YAML view of a runtime configuration
 *
 * @param showSecrets - Print secret keys instead of addresses
 */
export function renderConfig(config: RuntimeConfig, showSecrets = false): string {
  const key = (keypair: Keypair): string =>
    showSecrets ? encodeKeypair(keypair) : keypair.publicKey.toBase58();
  const view = {
    path: config.path,
    rpc: { uri: config.rpcUri },
    token: { owner: key(config.tokenOwner), mint: key(config.tokenMint) },
    test: { transfers: config.transfers },
    wallets: config.wallets.map(key),
    worker: config.worker,
    logging: config.logging,
  };
  return yaml.dump(view, { indent: 2, lineWidth: 120, noRefs: true });
}
