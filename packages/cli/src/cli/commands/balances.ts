/**
 * solbench balances command
 *
 * SOL balance of every configured wallet
 */

import { errorMessage } from '@solbench/core';

import { lamportsToSol } from '../../wallet/units.js';
import { createWorker, type CommandContext } from '../context.js';
import { printInOrder, type IndexedLine } from './report.js';

export async function balancesCommand(ctx: CommandContext): Promise<void> {
  const worker = createWorker<IndexedLine>(ctx.config);

  ctx.config.wallets.forEach((wallet, index) => {
    const address = wallet.publicKey.toBase58();
    worker.push(async () => {
      try {
        const lamports = await ctx.client.getBalance(wallet.publicKey);
        return { index, text: `${index}. ${address}: ${lamportsToSol(lamports)}` };
      } catch (error) {
        return { index, text: `${index}. ${address}: error: ${errorMessage(error)}` };
      }
    });
  });

  printInOrder(await worker.runAllJoinedAndCollectResults());
}
