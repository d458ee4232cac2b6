/**
 * solbench test transfer commands
 *
 * Load test: every `test.transfers.<kind>` entry becomes one Worker job that
 * checks the sender balance, sends, then waits for confirmed and finalized.
 */

import type { Keypair, PublicKey } from '@solana/web3.js';
import { DebugLogger, errorMessage, type Worker } from '@solbench/core';

import type { ChainClient } from '../../chain/types.js';
import {
  coinsToSubunits,
  lamportsToSol,
  solToLamports,
  subunitsToCoins,
} from '../../wallet/units.js';
import type { TransferCase } from '../config/types.js';
import { createWorker, type CommandContext } from '../context.js';

const logger = new DebugLogger('Transfer');

export const TRANSFER_MEMO = 'Test transfer';

/**
 * What differs between SOL and token transfers
 */
interface TransferAsset<U> {
  /** Unit shown in error lines */
  unit: string;
  /** Print "transferring ..." before sending */
  announce: boolean;
  toBase(amount: number): U;
  fromBase(base: U): number;
  exceeds(base: U, balance: U): boolean;
  balance(holder: PublicKey): Promise<U>;
  send(from: Keypair, to: PublicKey, base: U): Promise<string>;
}

function solAsset(client: ChainClient): TransferAsset<number> {
  return {
    unit: 'SOL',
    announce: false,
    toBase: solToLamports,
    fromBase: lamportsToSol,
    exceeds: (base, balance) => base > balance,
    balance: (holder) => client.getBalance(holder),
    send: (from, to, lamports) => client.transferSol(from, to, lamports, TRANSFER_MEMO),
  };
}

function tokenAsset(client: ChainClient, mint: PublicKey): TransferAsset<bigint> {
  return {
    unit: 'Tokens',
    announce: true,
    toBase: coinsToSubunits,
    fromBase: subunitsToCoins,
    exceeds: (base, balance) => base > balance,
    balance: (holder) => client.getTokenBalance(mint, holder),
    send: (from, to, subunits) => client.transferToken(mint, from, to, subunits),
  };
}

async function transfer<U>(
  client: ChainClient,
  asset: TransferAsset<U>,
  index: number,
  from: Keypair,
  to: PublicKey,
  base: U
): Promise<void> {
  const amount = asset.fromBase(base);
  const fromAddress = from.publicKey.toBase58();
  const toAddress = to.toBase58();

  try {
    const balance = await asset.balance(from.publicKey);
    if (asset.exceeds(base, balance)) {
      console.error(
        `${index}. transfer ${fromAddress} -> ${toAddress} error: insufficient balance ${asset.fromBase(balance)} < ${amount}`
      );
      return;
    }

    if (asset.announce) {
      console.log(`${index}. transferring ${amount.toFixed(2)} from ${fromAddress} to ${toAddress}...`);
    }
    const signature = await asset.send(from, to, base);
    console.log(
      `${index}. transferred ${amount.toFixed(2)} from ${fromAddress} to ${toAddress}\n    tx: ${signature}`
    );

    let start = Date.now();
    await client.waitForSignature(signature, 'confirmed');
    console.log(`${index}. tx: ${signature} confirmed in ${Date.now() - start}ms`);

    start = Date.now();
    await client.waitForSignature(signature, 'finalized');
    console.log(`${index}. tx: ${signature} finalized in ${Date.now() - start}ms`);
  } catch (error) {
    console.error(
      `${index}. transfer ${amount} ${asset.unit} ${fromAddress} -> ${toAddress} error: ${errorMessage(error)}`
    );
  }
}

function pushTransfers<U>(
  ctx: CommandContext,
  asset: TransferAsset<U>,
  cases: TransferCase[]
): Worker<void> {
  const { wallets } = ctx.config;
  const worker = createWorker<void>(ctx.config);

  cases.forEach(({ from, to, amount }, index) => {
    const sender = wallets[from];
    if (sender === undefined) {
      console.error(`invalid sender wallet index ${from}`);
      return;
    }
    const receiver = wallets[to];
    if (receiver === undefined) {
      console.error(`invalid receiver wallet index ${to}`);
      return;
    }
    const base = asset.toBase(amount);
    worker.push(() => transfer(ctx.client, asset, index, sender, receiver.publicKey, base));
  });

  logger.debug(`${asset.unit}: ${worker.size} of ${cases.length} transfer(s) queued`);
  return worker;
}

/**
 * Run every configured SOL transfer at once across all lanes
 */
export async function testTransferSolsCommand(ctx: CommandContext): Promise<void> {
  if (ctx.config.wallets.length === 0) {
    return;
  }
  const worker = pushTransfers(ctx, solAsset(ctx.client), ctx.config.transfers.sols);
  await worker.runAllJoined();
}

/**
 * Run configured token transfers in chunks of `worker.batch_size`
 */
export async function testTransferTokensCommand(ctx: CommandContext): Promise<void> {
  if (ctx.config.wallets.length === 0) {
    return;
  }
  const asset = tokenAsset(ctx.client, ctx.config.tokenMint.publicKey);
  const worker = pushTransfers(ctx, asset, ctx.config.transfers.tokens);
  await worker.runSingleThreaded(ctx.config.worker.batch_size);
}
