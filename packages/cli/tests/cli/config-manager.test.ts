/**
 * Unit tests for ConfigManager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as yaml from 'js-yaml';
import { Keypair } from '@solana/web3.js';

import { ConfigurationError } from '@solbench/core';
import {
  configExists,
  expandPath,
  getConfigPath,
  loadConfig,
  loadRuntimeConfig,
  parseConfig,
  renderConfig,
  validateConfig,
} from '../../src/cli/config/config-manager.js';
import { CONFIG_ENV, DEFAULT_BATCH_SIZE } from '../../src/cli/config/types.js';
import type { SolbenchConfig } from '../../src/cli/config/types.js';
import { encodeKeypair } from '../../src/wallet/keypair.js';

function rawConfig(): Record<string, unknown> {
  return {
    rpc: { uri: 'http://localhost:8899' },
    token: { owner: encodeKeypair(Keypair.generate()), mint: encodeKeypair(Keypair.generate()) },
    test: {
      transfers: {
        sols: [{ from: 0, to: 1, amount: 0.5 }],
        tokens: [{ from: 1, to: 0, amount: 10 }],
      },
    },
    wallets: [encodeKeypair(Keypair.generate()), encodeKeypair(Keypair.generate())],
  };
}

describe('ConfigManager', () => {
  let testDir: string;
  let originalHome: string | undefined;
  let originalConfigEnv: string | undefined;

  beforeEach(async () => {
    // Create temp directory with random suffix to avoid collisions
    testDir = join(tmpdir(), `solbench-cfg-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });

    // Save and override HOME
    originalHome = process.env.HOME;
    process.env.HOME = testDir;
    originalConfigEnv = process.env[CONFIG_ENV];
    delete process.env[CONFIG_ENV];
  });

  afterEach(async () => {
    if (originalHome !== undefined) {
      process.env.HOME = originalHome;
    } else {
      delete process.env.HOME;
    }
    if (originalConfigEnv !== undefined) {
      process.env[CONFIG_ENV] = originalConfigEnv;
    } else {
      delete process.env[CONFIG_ENV];
    }

    await rm(testDir, { recursive: true, force: true });
  });

  describe('expandPath()', () => {
    it('should expand ~ to home directory', () => {
      expect(expandPath('~/.solbench/config.yaml')).toBe(join(testDir, '.solbench/config.yaml'));
    });

    it('should not modify paths without ~', () => {
      const path = '/absolute/path/to/file';
      expect(expandPath(path)).toBe(path);
    });

    it('should handle ~ in the middle of path', () => {
      const path = '/path/to/~file';
      expect(expandPath(path)).toBe(path);
    });
  });

  describe('getConfigPath()', () => {
    it('should prefer the explicit path', () => {
      process.env[CONFIG_ENV] = '/from/env.yaml';
      expect(getConfigPath('/explicit.yaml')).toBe('/explicit.yaml');
    });

    it('should fall back to the env var', () => {
      process.env[CONFIG_ENV] = '/from/env.yaml';
      expect(getConfigPath()).toBe('/from/env.yaml');
    });

    it('should default to ~/.solbench/config.yaml', () => {
      expect(getConfigPath()).toBe(join(testDir, '.solbench/config.yaml'));
      expect(configExists()).toBe(false);
    });
  });

  describe('parseConfig()', () => {
    it('should fill optional sections with defaults', () => {
      const raw = rawConfig();
      delete raw.test;

      const config = parseConfig(raw);

      expect(config.test.transfers).toEqual({ sols: [], tokens: [] });
      expect(config.worker).toEqual({ batch_size: DEFAULT_BATCH_SIZE });
      expect(config.logging).toEqual({ level: 'error' });
      expect(config.wallets).toHaveLength(2);
    });

    it('should read worker and logging sections', () => {
      const config = parseConfig({
        ...rawConfig(),
        worker: { lanes: 4, batch_size: 8 },
        logging: { level: 'DEBUG' },
      });

      expect(config.worker).toEqual({ lanes: 4, batch_size: 8 });
      expect(config.logging.level).toBe('debug');
    });

    it('should reject a missing required section', () => {
      const raw = rawConfig();
      delete raw.rpc;

      expect(() => parseConfig(raw)).toThrow(ConfigurationError);
      expect(() => parseConfig(raw)).toThrow("Configuration error for 'rpc': missing required section");
    });

    it('should name the malformed transfer key', () => {
      const raw = { ...rawConfig(), test: { transfers: { sols: [{ from: 0, to: 'one', amount: 1 }] } } };

      expect(() => parseConfig(raw)).toThrow(
        "Configuration error for 'test.transfers.sols[0].to': must be a number"
      );
    });

    it('should reject an unknown log level', () => {
      expect(() => parseConfig({ ...rawConfig(), logging: { level: 'loud' } })).toThrow(
        "Configuration error for 'logging.level': must be one of: debug, info, warn, error"
      );
    });

    it('should reject a non-mapping document', () => {
      expect(() => parseConfig(['rpc'])).toThrow(
        "Configuration error for 'config': top level must be a mapping"
      );
    });
  });

  describe('validateConfig()', () => {
    it('should accept a valid config', () => {
      expect(validateConfig(parseConfig(rawConfig()))).toEqual([]);
    });

    it('should list every problem', () => {
      const config: SolbenchConfig = {
        ...parseConfig(rawConfig()),
        rpc: { uri: 'ws://localhost:8900' },
        worker: { lanes: 0, batch_size: 1.5 },
      };
      config.test.transfers.sols = [{ from: -1, to: 1, amount: 0 }];

      expect(validateConfig(config)).toEqual([
        'rpc.uri must use http or https',
        'worker.lanes must be a positive integer',
        'worker.batch_size must be a positive integer',
        'test.transfers.sols[0].from must be a wallet index',
        'test.transfers.sols[0].amount must be a positive number',
      ]);
    });

    it('should report an unparsable URI', () => {
      const config = { ...parseConfig(rawConfig()), rpc: { uri: 'localhost' } };

      expect(validateConfig(config)).toEqual(['rpc.uri is not a valid URL: localhost']);
    });
  });

  describe('loadConfig()', () => {
    it('should load a config file', async () => {
      const path = join(testDir, 'config.yaml');
      const raw = rawConfig();
      await writeFile(path, yaml.dump(raw));

      const config = await loadConfig(path);

      expect(config.rpc.uri).toBe('http://localhost:8899');
      expect(config.test.transfers.tokens).toEqual([{ from: 1, to: 0, amount: 10 }]);
    });

    it('should load from the default path', async () => {
      await mkdir(join(testDir, '.solbench'), { recursive: true });
      await writeFile(join(testDir, '.solbench/config.yaml'), yaml.dump(rawConfig()));

      expect(configExists()).toBe(true);
      const config = await loadConfig();
      expect(config.wallets).toHaveLength(2);
    });

    it('should fail on a missing file', async () => {
      const path = join(testDir, 'missing.yaml');

      await expect(loadConfig(path)).rejects.toThrow(
        `Configuration error for '${path}': file not found. Pass --config or set SOLBENCH_CONFIG.`
      );
    });

    it('should fail on invalid YAML', async () => {
      const path = join(testDir, 'broken.yaml');
      await writeFile(path, 'rpc: [unclosed');

      await expect(loadConfig(path)).rejects.toThrow(`Configuration error for '${path}': failed to parse:`);
    });

    it('should fail with every validation problem', async () => {
      const path = join(testDir, 'invalid.yaml');
      await writeFile(path, yaml.dump({ ...rawConfig(), worker: { lanes: 0, batch_size: 0 } }));

      await expect(loadConfig(path)).rejects.toThrow(
        'worker.lanes must be a positive integer; worker.batch_size must be a positive integer'
      );
    });
  });

  describe('loadRuntimeConfig() and renderConfig()', () => {
    it('should decode every key', async () => {
      const path = join(testDir, 'config.yaml');
      const owner = Keypair.generate();
      const token = { owner: encodeKeypair(owner), mint: encodeKeypair(Keypair.generate()) };
      await writeFile(path, yaml.dump({ ...rawConfig(), token }));

      const config = await loadRuntimeConfig(path);

      expect(config.path).toBe(path);
      expect(config.wallets).toHaveLength(2);
      expect(config.tokenOwner.publicKey.equals(owner.publicKey)).toBe(true);
    });

    it('should name the wallet that fails to decode', async () => {
      const path = join(testDir, 'config.yaml');
      await writeFile(path, yaml.dump({ ...rawConfig(), wallets: [encodeKeypair(Keypair.generate()), 'abc'] }));

      await expect(loadRuntimeConfig(path)).rejects.toThrow("Configuration error for 'wallets[1]'");
    });

    it('should render addresses by default', async () => {
      const path = join(testDir, 'config.yaml');
      await writeFile(path, yaml.dump(rawConfig()));
      const config = await loadRuntimeConfig(path);

      const rendered = yaml.load(renderConfig(config));

      expect(rendered).toEqual({
        path,
        rpc: { uri: 'http://localhost:8899' },
        token: {
          owner: config.tokenOwner.publicKey.toBase58(),
          mint: config.tokenMint.publicKey.toBase58(),
        },
        test: {
          transfers: {
            sols: [{ from: 0, to: 1, amount: 0.5 }],
            tokens: [{ from: 1, to: 0, amount: 10 }],
          },
        },
        wallets: config.wallets.map((wallet) => wallet.publicKey.toBase58()),
        worker: { batch_size: DEFAULT_BATCH_SIZE },
        logging: { level: 'error' },
      });
    });
  });
});
