/**
 * Amount conversions between display units and on-chain base units
 */

import { LAMPORTS_PER_SOL } from '@solana/web3.js';

/** Decimals of the token deployed by `solbench token deploy` */
export const TOKEN_DECIMALS = 6;

const TOKEN_SUBUNITS_PER_COIN = 10 ** TOKEN_DECIMALS;

export function solToLamports(sol: number): number {
  return Math.floor(sol * LAMPORTS_PER_SOL);
}

export function lamportsToSol(lamports: number): number {
  return lamports / LAMPORTS_PER_SOL;
}

export function coinsToSubunits(coins: number): bigint {
  return BigInt(Math.floor(coins * TOKEN_SUBUNITS_PER_COIN));
}

export function subunitsToCoins(subunits: bigint): number {
  return Number(subunits) / TOKEN_SUBUNITS_PER_COIN;
}
