/**
 * Keypair encoding and unit conversion tests
 */

import { describe, it, expect } from 'vitest';
import { Keypair } from '@solana/web3.js';
import bs58 from 'bs58';

import { ConfigurationError, ValidationError } from '@solbench/core';
import {
  decodeKeypair,
  encodeKeypair,
  generateKeypairs,
  parsePublicKey,
} from '../../src/wallet/keypair.js';
import {
  coinsToSubunits,
  lamportsToSol,
  solToLamports,
  subunitsToCoins,
} from '../../src/wallet/units.js';

describe('keypair', () => {
  it('should decode what it encodes', () => {
    const keypair = Keypair.generate();

    const decoded = decodeKeypair(encodeKeypair(keypair), 'wallets[0]');

    expect(decoded.publicKey.equals(keypair.publicKey)).toBe(true);
  });

  it('should ignore surrounding whitespace', () => {
    const keypair = Keypair.generate();

    const decoded = decodeKeypair(`  ${encodeKeypair(keypair)}\n`, 'token.owner');

    expect(decoded.publicKey.equals(keypair.publicKey)).toBe(true);
  });

  it('should reject non-base58 input with the config key', () => {
    expect(() => decodeKeypair('0OIl', 'wallets[3]')).toThrow(ConfigurationError);
    expect(() => decodeKeypair('0OIl', 'wallets[3]')).toThrow(
      "Configuration error for 'wallets[3]': can't parse base58 keypair"
    );
  });

  it('should reject a key of the wrong length', () => {
    const short = bs58.encode(new Uint8Array(32).fill(7));

    expect(() => decodeKeypair(short, 'token.mint')).toThrow(
      "Configuration error for 'token.mint': keypair must be 64 bytes, got 32"
    );
  });

  it('should parse public keys', () => {
    const address = Keypair.generate().publicKey.toBase58();

    expect(parsePublicKey(address).toBase58()).toBe(address);
  });

  it('should reject invalid public keys', () => {
    expect(() => parsePublicKey('not-a-key', 'holder')).toThrow(ValidationError);
    expect(() => parsePublicKey('not-a-key', 'holder')).toThrow(
      "Validation failed for 'holder': invalid public key"
    );
  });

  it('should generate distinct keypairs', () => {
    const keypairs = generateKeypairs(3);

    expect(keypairs).toHaveLength(3);
    expect(new Set(keypairs.map((keypair) => keypair.publicKey.toBase58())).size).toBe(3);
  });
});

describe('units', () => {
  it('should convert SOL to lamports rounding down', () => {
    expect(solToLamports(0.5)).toBe(500_000_000);
    expect(solToLamports(2)).toBe(2_000_000_000);
    expect(solToLamports(0.0000000019)).toBe(1);
  });

  it('should convert lamports to SOL', () => {
    expect(lamportsToSol(1_500_000_000)).toBe(1.5);
    expect(lamportsToSol(0)).toBe(0);
  });

  it('should convert coins to 6-decimal subunits rounding down', () => {
    expect(coinsToSubunits(2.5)).toBe(2_500_000n);
    expect(coinsToSubunits(1.2345678)).toBe(1_234_567n);
  });

  it('should convert subunits to coins', () => {
    expect(subunitsToCoins(1_234_567n)).toBe(1.234567);
    expect(subunitsToCoins(0n)).toBe(0);
  });
});
