/**
 * solbench command tree
 *
 * Built by a factory so tests can hand in a fake ChainClient.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Argument, Command, InvalidArgumentError } from 'commander';

import { airdropCommand, type AirdropOptions } from './commands/airdrop.js';
import { balancesCommand } from './commands/balances.js';
import {
  COMPLETION_SHELLS,
  completionCommand,
  type CompletionShell,
} from './commands/completion.js';
import { showConfigCommand } from './commands/show-config.js';
import { testTransferSolsCommand, testTransferTokensCommand } from './commands/test-transfer.js';
import { tokenBalancesCommand, tokenDeployCommand, tokenMintCommand } from './commands/token.js';
import {
  walletGenerateCommand,
  walletListCommand,
  walletReadCommand,
  walletSaveCommand,
  type WalletListOptions,
} from './commands/wallet.js';
import { createContext, loadCommandConfig, type ClientFactory } from './context.js';

export interface ProgramDeps {
  createClient: ClientFactory;
}

type GlobalOptions = {
  config?: string;
};

// Read version from package.json at runtime (src/cli and dist/cli sit at the same depth)
const getVersion = (): string => {
  try {
    const pkgPath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return 'unknown';
  } catch {
    return 'unknown'; // Fallback if package.json not found
  }
};

export function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return count;
}

export function parseAmount(value: string): number {
  const amount = Number(value);
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return amount;
}

export function createProgram(deps: ProgramDeps): Command {
  const program = new Command();

  const configPath = (): string | undefined => program.opts<GlobalOptions>().config;
  const context = () => createContext(configPath(), deps.createClient);

  program
    .name('solbench')
    .description('Solana wallet, token and transfer load-test tool')
    .version(getVersion(), '-v, --version', 'Print version information')
    .option('-c, --config <path>', 'Config file (default: $SOLBENCH_CONFIG or ~/.solbench/config.yaml)');

  // --------------------------------------------------------------------------
  // wallet
  // --------------------------------------------------------------------------

  const wallet = program.command('wallet').description('Generate, read and export wallets');

  wallet
    .command('generate')
    .description('Generate keypairs and print them as base58, or save them as json files')
    .argument('<count>', 'Number of keypairs', parseCount)
    .argument('[dir]', 'Directory to save solana-cli keypair files into')
    .action(async (count: number, dir: string | undefined) => {
      await walletGenerateCommand(count, dir);
    });

  wallet
    .command('read')
    .description('Print a solana-cli keypair json file as base58')
    .argument('<path>', 'Keypair file')
    .action(async (path: string) => {
      await walletReadCommand(path);
    });

  wallet
    .command('list')
    .description('List configured wallets')
    .option('--pubkey', 'Show account addresses')
    .option('--keypair', 'Show base58 keypairs')
    .action(async (options: WalletListOptions) => {
      walletListCommand(await loadCommandConfig(configPath()), options);
    });

  wallet
    .command('save')
    .description('Save configured wallets as solana-cli keypair files')
    .argument('<dir>', 'Existing directory')
    .action(async (dir: string) => {
      await walletSaveCommand(await loadCommandConfig(configPath()), dir);
    });

  // --------------------------------------------------------------------------
  // config, balances, airdrop
  // --------------------------------------------------------------------------

  program
    .command('show-config')
    .description('Print the loaded configuration')
    .option('--secrets', 'Print secret keys instead of addresses')
    .action(async (options: { secrets?: boolean }) => {
      showConfigCommand(await loadCommandConfig(configPath()), options);
    });

  program
    .command('balances')
    .description('SOL balance of every configured wallet')
    .action(async () => {
      await balancesCommand(await context());
    });

  program
    .command('airdrop')
    .description('Airdrop SOL to every configured wallet and the token owner')
    .argument('<sols>', 'Amount of SOL per account', parseAmount)
    .option('--confirm', 'Wait until every airdrop is finalized')
    .action(async (sols: number, options: AirdropOptions) => {
      await airdropCommand(await context(), sols, options);
    });

  // --------------------------------------------------------------------------
  // token
  // --------------------------------------------------------------------------

  const token = program.command('token').description('Deploy, mint and inspect the test token');

  token
    .command('deploy')
    .description('Create the token mint with token.owner as authority')
    .action(async () => {
      await tokenDeployCommand(await context());
    });

  token
    .command('mint')
    .description("Mint tokens to the holder's associated token account")
    .argument('<holder>', 'Holder account address')
    .argument('<amount>', 'Amount of whole tokens', parseAmount)
    .action(async (holder: string, amount: number) => {
      await tokenMintCommand(await context(), holder, amount);
    });

  token
    .command('balances')
    .description('Token balance of every configured wallet')
    .action(async () => {
      await tokenBalancesCommand(await context());
    });

  // --------------------------------------------------------------------------
  // test transfer
  // --------------------------------------------------------------------------

  const transfer = program
    .command('test')
    .description('Load tests')
    .command('transfer')
    .description('Send the transfers listed under test.transfers');

  transfer
    .command('sols')
    .description('SOL transfers, all lanes at once')
    .action(async () => {
      await testTransferSolsCommand(await context());
    });

  transfer
    .command('tokens')
    .description('Token transfers in chunks of worker.batch_size')
    .action(async () => {
      await testTransferTokensCommand(await context());
    });

  // --------------------------------------------------------------------------
  // completion
  // --------------------------------------------------------------------------

  program
    .command('completion')
    .alias('autocompletion')
    .description('Print a shell completion script')
    .addArgument(new Argument('<shell>', 'Target shell').choices(COMPLETION_SHELLS))
    .action((shell: CompletionShell) => {
      completionCommand(program, shell);
    });

  return program;
}
