/**
 * Keypair encoding
 *
 * Keypairs travel as base58 strings of the 64-byte secret key, the same
 * encoding solana-cli prints and Phantom imports.
 */

import { Keypair, PublicKey } from '@solana/web3.js';
import bs58 from 'bs58';
import { ConfigurationError, ValidationError, errorMessage } from '@solbench/core';

export const SECRET_KEY_LENGTH = 64;

export function encodeKeypair(keypair: Keypair): string {
  return bs58.encode(keypair.secretKey);
}

/**
 * Decode a base58 secret key
 *
 * @param encoded - base58 string
 * @param field - Config key reported on failure (e.g. "wallets[3]")
 * @throws ConfigurationError if the string is not base58 or not 64 bytes
 */
export function decodeKeypair(encoded: string, field: string): Keypair {
  let bytes: Uint8Array;
  try {
    bytes = bs58.decode(encoded.trim());
  } catch (error) {
    throw new ConfigurationError(field, `can't parse base58 keypair: ${errorMessage(error)}`);
  }

  if (bytes.length !== SECRET_KEY_LENGTH) {
    throw new ConfigurationError(
      field,
      `keypair must be ${SECRET_KEY_LENGTH} bytes, got ${bytes.length}`
    );
  }

  try {
    return Keypair.fromSecretKey(bytes);
  } catch (error) {
    throw new ConfigurationError(field, `can't parse keypair bytes: ${errorMessage(error)}`);
  }
}

/**
 * Parse a base58 account address
 *
 * @throws ValidationError if the address is invalid
 */
export function parsePublicKey(value: string, field = 'address'): PublicKey {
  try {
    return new PublicKey(value.trim());
  } catch (error) {
    throw new ValidationError(field, `invalid public key: ${errorMessage(error)}`, value);
  }
}

export function generateKeypairs(count: number): Keypair[] {
  return Array.from({ length: count }, () => Keypair.generate());
}
