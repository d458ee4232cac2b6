/**
 * Unit tests for solana-cli wallet files
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { WalletError } from '../../src/errors.js';
import { encodeKeypair, generateKeypairs } from '../../src/wallet/keypair.js';
import { readKeypairFile, saveWallets, walletFileName } from '../../src/wallet/wallet-files.js';

describe('wallet files', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `solbench-files-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should name files by zero-padded index', () => {
    expect(walletFileName(0)).toBe('id000000.json');
    expect(walletFileName(42)).toBe('id000042.json');
  });

  it('should save keypairs as JSON byte arrays', async () => {
    const keypairs = generateKeypairs(2);

    const saved = await saveWallets(keypairs, testDir);

    expect(saved.map((wallet) => wallet.path)).toEqual([
      join(testDir, 'id000000.json'),
      join(testDir, 'id000001.json'),
    ]);
    const bytes: unknown = JSON.parse(await readFile(saved[1].path, 'utf-8'));
    expect(bytes).toEqual(Array.from(keypairs[1].secretKey));
  });

  it('should report each file as soon as it is written', async () => {
    const keypairs = generateKeypairs(3);
    await mkdir(join(testDir, 'id000002.json'));
    const reported: string[] = [];

    await expect(
      saveWallets(keypairs, testDir, (wallet) => reported.push(wallet.path))
    ).rejects.toBeInstanceOf(WalletError);

    expect(reported).toEqual([join(testDir, 'id000000.json'), join(testDir, 'id000001.json')]);
  });

  it('should read a saved keypair back as base58', async () => {
    const [keypair] = generateKeypairs(1);
    const [saved] = await saveWallets([keypair], testDir);

    expect(await readKeypairFile(saved.path)).toBe(encodeKeypair(keypair));
  });

  it('should reject a missing save dir', async () => {
    const missing = join(testDir, 'missing');

    await expect(saveWallets(generateKeypairs(1), missing)).rejects.toThrow(
      `Can't access wallet save dir: ${missing}`
    );
  });

  it('should reject a save dir that is a file', async () => {
    const file = join(testDir, 'file.txt');
    await writeFile(file, 'x');

    await expect(saveWallets(generateKeypairs(1), file)).rejects.toThrow(
      `Invalid wallet save dir: ${file}`
    );
  });

  it('should reject a missing keypair file', async () => {
    const missing = join(testDir, 'id.json');

    await expect(readKeypairFile(missing)).rejects.toBeInstanceOf(WalletError);
    await expect(readKeypairFile(missing)).rejects.toThrow(`Can't read keypair json file: ${missing}`);
  });

  it('should reject malformed keypair files', async () => {
    const notJson = join(testDir, 'broken.json');
    const tooShort = join(testDir, 'short.json');
    await writeFile(notJson, '[1, 2,');
    await writeFile(tooShort, JSON.stringify([1, 2, 3]));

    await expect(readKeypairFile(notJson)).rejects.toThrow(`Can't parse keypair json file: ${notJson}`);
    await expect(readKeypairFile(tooShort)).rejects.toThrow(
      `Keypair file must hold an array of 64 bytes: ${tooShort}`
    );
  });
});
