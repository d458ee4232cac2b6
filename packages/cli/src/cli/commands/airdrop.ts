/**
 * solbench airdrop command
 *
 * Requests an airdrop for every configured wallet and for the token owner.
 * With --confirm, waits until every airdrop is finalized.
 */

import type { PublicKey } from '@solana/web3.js';
import { DebugLogger, errorMessage } from '@solbench/core';

import { solToLamports } from '../../wallet/units.js';
import { createWorker, type CommandContext } from '../context.js';
import { printInOrder, type IndexedLine } from './report.js';

const logger = new DebugLogger('Airdrop');

/**
 * Options for airdrop command
 */
export interface AirdropOptions {
  /** Wait for finalized commitment */
  confirm?: boolean;
}

interface AirdropTarget {
  index: number;
  /** "<address>" prefixed by "<i>. " or "token:owner. " */
  prefix: string;
  address: PublicKey;
}

type AirdropRequest =
  | (AirdropTarget & { ok: true; signature: string })
  | (AirdropTarget & { ok: false; error: string });

export async function airdropCommand(
  ctx: CommandContext,
  sols: number,
  options: AirdropOptions = {}
): Promise<void> {
  const lamports = solToLamports(sols);

  const targets: AirdropTarget[] = ctx.config.wallets.map((wallet, index) => ({
    index,
    prefix: `${index}. ${wallet.publicKey.toBase58()}`,
    address: wallet.publicKey,
  }));
  const owner = ctx.config.tokenOwner.publicKey;
  targets.push({
    index: targets.length,
    prefix: `token:owner. ${owner.toBase58()}`,
    address: owner,
  });

  logger.debug(`Requesting ${lamports} lamports for ${targets.length} account(s)`);

  const requests = createWorker<AirdropRequest>(ctx.config);
  for (const target of targets) {
    requests.push(async () => {
      try {
        const signature = await ctx.client.requestAirdrop(target.address, lamports);
        return { ...target, ok: true, signature };
      } catch (error) {
        return { ...target, ok: false, error: errorMessage(error) };
      }
    });
  }
  const results = await requests.runAllJoinedAndCollectResults();

  if (!options.confirm) {
    printInOrder(
      results.map((result) => ({
        index: result.index,
        text: result.ok
          ? `${result.prefix}: tx id = ${result.signature}`
          : `${result.prefix}: error: ${result.error}`,
      }))
    );
    return;
  }

  console.error('Waiting for confirmation of all transactions...');
  const failed: IndexedLine[] = [];
  const confirmations = createWorker<IndexedLine>(ctx.config);
  for (const result of results) {
    if (!result.ok) {
      failed.push({ index: result.index, text: `${result.prefix}: error: ${result.error}`, error: true });
      continue;
    }
    confirmations.push(async () => {
      const line = `${result.prefix}: tx id = ${result.signature}`;
      try {
        await ctx.client.waitForSignature(result.signature, 'finalized');
        return { index: result.index, text: `${line} - OK` };
      } catch (error) {
        return { index: result.index, text: `${line}: error: ${errorMessage(error)}` };
      }
    });
  }

  printInOrder(failed);
  printInOrder(await confirmations.runAllJoinedAndCollectResults());
}
