/**
 * ChainClient backed by @solana/web3.js and @solana/spl-token
 */

import {
  Connection,
  Keypair,
  PublicKey,
  SystemProgram,
  Transaction,
  TransactionInstruction,
} from '@solana/web3.js';
import {
  MINT_SIZE,
  TOKEN_PROGRAM_ID,
  createAssociatedTokenAccountIdempotentInstruction,
  createInitializeMint2Instruction,
  createMintToInstruction,
  createTransferInstruction,
  getAssociatedTokenAddressSync,
  getMinimumBalanceForRentExemptMint,
} from '@solana/spl-token';
import { DebugLogger, errorMessage } from '@solbench/core';

import { ChainError } from '../errors.js';
import { pollSignature } from './confirmation.js';
import type { ChainClient, ConfirmationOptions, WaitCommitment } from './types.js';

const logger = new DebugLogger('Chain');

/** SPL Memo program (v2) */
export const MEMO_PROGRAM_ID = new PublicKey('MemoSq4gqABAXKb96qnH8TysNcWxMyWCqXgDLGmfcHr');

export function createMemoInstruction(memo: string): TransactionInstruction {
  return new TransactionInstruction({
    keys: [],
    programId: MEMO_PROGRAM_ID,
    data: Buffer.from(memo, 'utf-8'),
  });
}

export class SolanaChainClient implements ChainClient {
  private connection: Connection;
  private confirmation: ConfirmationOptions;

  constructor(connection: Connection, confirmation: ConfirmationOptions = {}) {
    this.connection = connection;
    this.confirmation = confirmation;
  }

  /**
   * Wrap RPC failures into ChainError
   */
  private async call<R>(operation: string, fn: () => Promise<R>): Promise<R> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ChainError) {
        throw error;
      }
      logger.debug(`${operation} failed:`, error);
      throw new ChainError(operation, errorMessage(error));
    }
  }

  private send(operation: string, transaction: Transaction, signers: Keypair[]): Promise<string> {
    return this.call(operation, () => this.connection.sendTransaction(transaction, signers));
  }

  getBalance(address: PublicKey): Promise<number> {
    return this.call('getBalance', () => this.connection.getBalance(address));
  }

  requestAirdrop(address: PublicKey, lamports: number): Promise<string> {
    return this.call('requestAirdrop', () => this.connection.requestAirdrop(address, lamports));
  }

  waitForSignature(signature: string, commitment: WaitCommitment): Promise<void> {
    return this.call('waitForSignature', () =>
      pollSignature(this.connection, signature, commitment, this.confirmation)
    );
  }

  transferSol(from: Keypair, to: PublicKey, lamports: number, memo?: string): Promise<string> {
    const transaction = new Transaction().add(
      SystemProgram.transfer({ fromPubkey: from.publicKey, toPubkey: to, lamports })
    );
    if (memo) {
      transaction.add(createMemoInstruction(memo));
    }
    return this.send('transferSol', transaction, [from]);
  }

  async deployToken(mint: Keypair, owner: Keypair, decimals: number): Promise<string> {
    const lamports = await this.call('getMinimumBalanceForRentExemptMint', () =>
      getMinimumBalanceForRentExemptMint(this.connection)
    );
    const transaction = new Transaction().add(
      SystemProgram.createAccount({
        fromPubkey: owner.publicKey,
        newAccountPubkey: mint.publicKey,
        space: MINT_SIZE,
        lamports,
        programId: TOKEN_PROGRAM_ID,
      }),
      createInitializeMint2Instruction(mint.publicKey, decimals, owner.publicKey, owner.publicKey)
    );
    return this.send('deployToken', transaction, [owner, mint]);
  }

  mintTo(mint: PublicKey, authority: Keypair, holder: PublicKey, subunits: bigint): Promise<string> {
    const destination = getAssociatedTokenAddressSync(mint, holder);
    const transaction = new Transaction().add(
      createAssociatedTokenAccountIdempotentInstruction(
        authority.publicKey,
        destination,
        holder,
        mint
      ),
      createMintToInstruction(mint, destination, authority.publicKey, subunits)
    );
    return this.send('mintTo', transaction, [authority]);
  }

  async getTokenBalance(mint: PublicKey, holder: PublicKey): Promise<bigint> {
    const account = getAssociatedTokenAddressSync(mint, holder);
    const balance = await this.call('getTokenBalance', () =>
      this.connection.getTokenAccountBalance(account)
    );
    return BigInt(balance.value.amount);
  }

  transferToken(mint: PublicKey, from: Keypair, to: PublicKey, subunits: bigint): Promise<string> {
    const source = getAssociatedTokenAddressSync(mint, from.publicKey);
    const destination = getAssociatedTokenAddressSync(mint, to);
    const transaction = new Transaction().add(
      createAssociatedTokenAccountIdempotentInstruction(from.publicKey, destination, to, mint),
      createTransferInstruction(source, destination, from.publicKey, subunits)
    );
    return this.send('transferToken', transaction, [from]);
  }
}

/**
 * Client for an RPC endpoint
 */
export function createSolanaClient(
  rpcUri: string,
  confirmation: ConfirmationOptions = {}
): SolanaChainClient {
  return new SolanaChainClient(new Connection(rpcUri, 'confirmed'), confirmation);
}
