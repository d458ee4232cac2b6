export type { ChainClient, ConfirmationOptions, WaitCommitment } from './types.js';
export {
  pollSignature,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_CONFIRM_TIMEOUT_MS,
  type SignatureStatusSource,
} from './confirmation.js';
export {
  SolanaChainClient,
  createSolanaClient,
  createMemoInstruction,
  MEMO_PROGRAM_ID,
} from './solana-client.js';
