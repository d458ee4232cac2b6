/**
 * Signature status polling
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type {
  RpcResponseAndContext,
  SignatureStatus,
  SignatureStatusConfig,
  TransactionConfirmationStatus,
} from '@solana/web3.js';
import { DebugLogger } from '@solbench/core';

import { ChainError } from '../errors.js';
import type { ConfirmationOptions, WaitCommitment } from './types.js';

const logger = new DebugLogger('Confirm');

export const DEFAULT_POLL_INTERVAL_MS = 500;
export const DEFAULT_CONFIRM_TIMEOUT_MS = 90_000;

const COMMITMENT_RANK: Record<TransactionConfirmationStatus, number> = {
  processed: 0,
  confirmed: 1,
  finalized: 2,
};

/**
 * The part of Connection the poller needs
 */
export interface SignatureStatusSource {
  getSignatureStatus(
    signature: string,
    config?: SignatureStatusConfig
  ): Promise<RpcResponseAndContext<SignatureStatus | null>>;
}

/**
 * Poll until `signature` reaches `commitment`
 *
 * @throws ChainError if the transaction failed or the timeout elapsed
 */
export async function pollSignature(
  source: SignatureStatusSource,
  signature: string,
  commitment: WaitCommitment,
  options: ConfirmationOptions = {}
): Promise<void> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_CONFIRM_TIMEOUT_MS;
  const deadline = Date.now() + timeoutMs;
  let polls = 0;

  for (;;) {
    const { value: status } = await source.getSignatureStatus(signature, {
      searchTransactionHistory: true,
    });
    polls++;

    if (status?.err) {
      throw new ChainError(
        `waitForSignature(${commitment})`,
        `transaction ${signature} failed: ${JSON.stringify(status.err)}`
      );
    }

    const reached = status?.confirmationStatus;
    if (reached && COMMITMENT_RANK[reached] >= COMMITMENT_RANK[commitment]) {
      logger.debug(`${signature} ${reached} after ${polls} poll(s)`);
      return;
    }

    if (Date.now() + pollIntervalMs > deadline) {
      throw new ChainError(
        `waitForSignature(${commitment})`,
        `transaction ${signature} not ${commitment} after ${timeoutMs}ms`,
        { lastStatus: reached ?? null }
      );
    }
    await sleep(pollIntervalMs);
  }
}
