/**
 * solbench wallet commands
 *
 * generate / read work without a config file; list / save use `wallets`.
 */

import type { Keypair } from '@solana/web3.js';

import { encodeKeypair, generateKeypairs } from '../../wallet/keypair.js';
import { readKeypairFile, saveWallets } from '../../wallet/wallet-files.js';
import type { RuntimeConfig } from '../config/types.js';

/**
 * Options for wallet list command
 */
export interface WalletListOptions {
  /** Show public key (account address) */
  pubkey?: boolean;
  /** Show base58 keypair */
  keypair?: boolean;
}

// One line per file as soon as it is written, so a failed save still lists the earlier ones
async function printSaved(keypairs: Keypair[], dir: string): Promise<void> {
  await saveWallets(keypairs, dir, ({ keypair, path }) => {
    console.log(`- keypair: ${encodeKeypair(keypair)}\n  saved_to: ${path}`);
  });
}

/**
 * Generate keypairs and print them as a YAML list, or save them to `dir`
 */
export async function walletGenerateCommand(count: number, dir?: string): Promise<void> {
  const keypairs = generateKeypairs(count);
  if (dir) {
    await printSaved(keypairs, dir);
    return;
  }
  for (const keypair of keypairs) {
    console.log(`- ${encodeKeypair(keypair)}`);
  }
}

/**
 * Print a solana-cli keypair file as base58
 */
export async function walletReadCommand(path: string): Promise<void> {
  console.log(await readKeypairFile(path));
}

export function walletListCommand(config: RuntimeConfig, options: WalletListOptions = {}): void {
  const pubkey = options.pubkey ?? false;
  const keypair = options.keypair ?? false;

  for (const wallet of config.wallets) {
    const address = wallet.publicKey.toBase58();
    if (pubkey === keypair) {
      console.log(`${address} | ${encodeKeypair(wallet)}`);
    } else {
      console.log(pubkey ? address : encodeKeypair(wallet));
    }
  }
}

/**
 * Save configured wallets as solana-cli json files
 */
export async function walletSaveCommand(config: RuntimeConfig, dir: string): Promise<void> {
  await printSaved(config.wallets, dir);
}
