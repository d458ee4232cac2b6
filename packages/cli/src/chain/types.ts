/**
 * Chain client types
 *
 * Commands talk to the cluster only through ChainClient, so tests can swap
 * in an in-process fake.
 */

import type { Keypair, PublicKey } from '@solana/web3.js';

/** Commitment levels a command can wait for */
export type WaitCommitment = 'confirmed' | 'finalized';

export interface ChainClient {
  /** Balance in lamports */
  getBalance(address: PublicKey): Promise<number>;
  /** Returns the airdrop transaction signature */
  requestAirdrop(address: PublicKey, lamports: number): Promise<string>;
  /** Resolves once the transaction reached the commitment */
  waitForSignature(signature: string, commitment: WaitCommitment): Promise<void>;
  transferSol(from: Keypair, to: PublicKey, lamports: number, memo?: string): Promise<string>;
  /** Creates the mint account `mint` with `owner` as payer and mint authority */
  deployToken(mint: Keypair, owner: Keypair, decimals: number): Promise<string>;
  /** Mints into the holder's associated token account, creating it if needed */
  mintTo(mint: PublicKey, authority: Keypair, holder: PublicKey, subunits: bigint): Promise<string>;
  /** Balance of the holder's associated token account, in subunits */
  getTokenBalance(mint: PublicKey, holder: PublicKey): Promise<bigint>;
  transferToken(mint: PublicKey, from: Keypair, to: PublicKey, subunits: bigint): Promise<string>;
}

export interface ConfirmationOptions {
  /** Delay between status polls (default: 500) */
  pollIntervalMs?: number;
  /** Give up after this long (default: 90000) */
  timeoutMs?: number;
}
