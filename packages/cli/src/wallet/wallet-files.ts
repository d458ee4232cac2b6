/**
 * solana-cli compatible wallet files
 *
 * A keypair file is a JSON array of the 64 secret key bytes.
 */

import { readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Keypair } from '@solana/web3.js';
import bs58 from 'bs58';
import { errorMessage } from '@solbench/core';

import { WalletError } from '../errors.js';
import { SECRET_KEY_LENGTH } from './keypair.js';

export interface SavedWallet {
  keypair: Keypair;
  path: string;
}

/**
 * File name of the i-th saved wallet: id000000.json, id000001.json, ...
 */
export function walletFileName(index: number): string {
  return `id${String(index).padStart(6, '0')}.json`;
}

/**
 * Save keypairs into an existing directory
 *
 * @param onSaved - Called after each file is written, before the next one
 * @returns Saved files in keypair order
 * @throws WalletError if dir is missing, not a directory, or not writable
 */
export async function saveWallets(
  keypairs: Keypair[],
  dir: string,
  onSaved?: (wallet: SavedWallet) => void
): Promise<SavedWallet[]> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(dir)).isDirectory();
  } catch (error) {
    throw new WalletError(dir, "Can't access wallet save dir", { cause: errorMessage(error) });
  }
  if (!isDirectory) {
    throw new WalletError(dir, 'Invalid wallet save dir');
  }

  const saved: SavedWallet[] = [];
  for (const [index, keypair] of keypairs.entries()) {
    const path = join(dir, walletFileName(index));
    try {
      await writeFile(path, JSON.stringify(Array.from(keypair.secretKey)), 'utf-8');
    } catch (error) {
      throw new WalletError(path, "Can't save wallet to file", { cause: errorMessage(error) });
    }
    const wallet = { keypair, path };
    saved.push(wallet);
    onSaved?.(wallet);
  }
  return saved;
}

function isSecretKeyBytes(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.length === SECRET_KEY_LENGTH &&
    value.every((byte) => Number.isInteger(byte) && byte >= 0 && byte <= 255)
  );
}

/**
 * Read a keypair file and return its secret key as base58
 *
 * @throws WalletError if the file is unreadable or not a 64-byte array
 */
export async function readKeypairFile(path: string): Promise<string> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new WalletError(path, "Can't read keypair json file", { cause: errorMessage(error) });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new WalletError(path, "Can't parse keypair json file", { cause: errorMessage(error) });
  }

  if (!isSecretKeyBytes(parsed)) {
    throw new WalletError(path, `Keypair file must hold an array of ${SECRET_KEY_LENGTH} bytes`);
  }
  return bs58.encode(Uint8Array.from(parsed));
}
