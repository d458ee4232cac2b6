/**
 * solbench CLI - library exports
 */

// Chain client
export * from './chain/index.js';

// Wallets, keypairs and units
export * from './wallet/index.js';

// Errors
export { WalletError, ChainError } from './errors.js';

// Configuration
export {
  expandPath,
  getConfigPath,
  configExists,
  parseConfig,
  validateConfig,
  loadConfig,
  loadRuntimeConfig,
  toRuntimeConfig,
  renderConfig,
} from './cli/config/config-manager.js';
export * from './cli/config/types.js';

// Commands
export { createProgram, type ProgramDeps } from './cli/program.js';
export { createContext, createWorker, type CommandContext, type ClientFactory } from './cli/context.js';
