#!/usr/bin/env node

/**
 * solbench CLI
 *
 * Entry point for the solbench command
 */

import { createSolanaClient } from '../chain/solana-client.js';
import { formatFailure } from './failure.js';
import { createProgram } from './program.js';

const program = createProgram({ createClient: (rpcUri) => createSolanaClient(rpcUri) });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(formatFailure(error));
  process.exit(1);
});
