// Path: src/services/key-material.test.ts
// Tests for key material generation

import { describe, it, expect } from 'vitest';
import { KeyMaterialGenerator, decodeKey, type CryptoProvider } from './key-material.js';
import { EngineError } from '../utils/error.js';

function brokenProvider(): CryptoProvider {
  const fail = (): never => {
    throw new Error('provider offline');
  };
  return {
    generateX25519: fail,
    deriveX25519Public: fail,
    randomBytes: fail,
    randomUUID: fail,
  };
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof EngineError ? err.code : 'not-an-engine-error';
  }
  return undefined;
}

describe('KeyMaterialGenerator', () => {
  const keys = new KeyMaterialGenerator();

  it('should generate a keypair whose public key derives from the private key', () => {
    const pair = keys.generateKeypair();

    expect(pair.privateKey).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(pair.publicKey).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(keys.derivePublicKey(pair.privateKey)).toBe(pair.publicKey);
  });

  it('should encode WireGuard keys as padded base64', () => {
    const pair = keys.generateKeypair('base64');

    expect(pair.privateKey).toMatch(/^[A-Za-z0-9+/]{43}=$/);
    expect(keys.derivePublicKey(pair.privateKey, 'base64')).toBe(pair.publicKey);
  });

  it('should produce 16 hex character short IDs and v4 UUIDs', () => {
    expect(keys.generateShortId()).toMatch(/^[0-9a-f]{16}$/);
    expect(keys.generateUserId()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('should reject undecodable private keys as ConfigCorrupt', () => {
    expect(codeOf(() => keys.derivePublicKey('not-a-key'))).toBe('ConfigCorrupt');
    expect(codeOf(() => keys.derivePublicKey(''))).toBe('ConfigCorrupt');
  });

  it('should surface provider failures as CryptoUnavailable', () => {
    const offline = new KeyMaterialGenerator(brokenProvider());
    const validKey = Buffer.alloc(32, 7).toString('base64url');

    expect(codeOf(() => offline.generateKeypair())).toBe('CryptoUnavailable');
    expect(codeOf(() => offline.derivePublicKey(validKey))).toBe('CryptoUnavailable');
    expect(codeOf(() => offline.generateShortId())).toBe('CryptoUnavailable');
    expect(codeOf(() => offline.generateUserId())).toBe('CryptoUnavailable');
  });
});

describe('decodeKey', () => {
  it('should accept both base64 alphabets', () => {
    const raw = Buffer.alloc(32, 0xfb);

    expect(decodeKey(raw.toString('base64url'))).toEqual(raw);
    expect(decodeKey(raw.toString('base64'))).toEqual(raw);
    expect(decodeKey(Buffer.alloc(16).toString('base64'))).toBeNull();
  });
});
