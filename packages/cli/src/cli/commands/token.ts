/**
 * solbench token commands
 *
 * The token is an SPL mint with 6 decimals whose mint account is
 * `token.mint` and whose payer and mint authority is `token.owner`.
 */

import { DebugLogger, ValidationError, errorMessage } from '@solbench/core';

import { parsePublicKey } from '../../wallet/keypair.js';
import { TOKEN_DECIMALS, coinsToSubunits, subunitsToCoins } from '../../wallet/units.js';
import { createWorker, type CommandContext } from '../context.js';
import { printInOrder, type IndexedLine } from './report.js';

const logger = new DebugLogger('Token');

export async function tokenDeployCommand(ctx: CommandContext): Promise<void> {
  const { tokenMint, tokenOwner } = ctx.config;
  const mint = tokenMint.publicKey.toBase58();

  console.log(
    `Deploying token ${mint} (decimals: ${TOKEN_DECIMALS}, authority: ${tokenOwner.publicKey.toBase58()})...`
  );
  const signature = await ctx.client.deployToken(tokenMint, tokenOwner, TOKEN_DECIMALS);
  await ctx.client.waitForSignature(signature, 'confirmed');
  console.log(`Token ${mint} deployed\n    tx: ${signature}`);
}

/**
 * Mint `amount` whole tokens to the associated token account of `holder`
 */
export async function tokenMintCommand(
  ctx: CommandContext,
  holder: string,
  amount: number
): Promise<void> {
  const holderKey = parsePublicKey(holder, 'holder');
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new ValidationError('amount', 'must be a positive number', amount);
  }

  const subunits = coinsToSubunits(amount);
  logger.debug(`Minting ${subunits} subunits to ${holderKey.toBase58()}`);

  const signature = await ctx.client.mintTo(
    ctx.config.tokenMint.publicKey,
    ctx.config.tokenOwner,
    holderKey,
    subunits
  );
  await ctx.client.waitForSignature(signature, 'confirmed');
  console.log(`Minted ${subunitsToCoins(subunits)} to ${holderKey.toBase58()}\n    tx: ${signature}`);
}

/**
 * Token balance of every configured wallet
 */
export async function tokenBalancesCommand(ctx: CommandContext): Promise<void> {
  const mint = ctx.config.tokenMint.publicKey;
  const worker = createWorker<IndexedLine>(ctx.config);

  ctx.config.wallets.forEach((wallet, index) => {
    const address = wallet.publicKey.toBase58();
    worker.push(async () => {
      try {
        const subunits = await ctx.client.getTokenBalance(mint, wallet.publicKey);
        return { index, text: `${index}. ${address}: ${subunitsToCoins(subunits)}` };
      } catch (error) {
        return { index, text: `${index}. ${address}: error: ${errorMessage(error)}` };
      }
    });
  });

  printInOrder(await worker.runAllJoinedAndCollectResults());
}
