export {
  encodeKeypair,
  decodeKeypair,
  parsePublicKey,
  generateKeypairs,
  SECRET_KEY_LENGTH,
} from './keypair.js';
export { saveWallets, readKeypairFile, walletFileName, type SavedWallet } from './wallet-files.js';
export {
  TOKEN_DECIMALS,
  solToLamports,
  lamportsToSol,
  coinsToSubunits,
  subunitsToCoins,
} from './units.js';
