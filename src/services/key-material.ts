// Path: src/services/key-material.ts
// X25519 keypairs, Reality short IDs and client UUIDs

import crypto from 'node:crypto';
import { EngineError, extractErrorMessage } from '../utils/error.js';

export type KeyEncoding = 'base64url' | 'base64';

export interface X25519KeyPair {
  privateKey: string;
  publicKey: string;
}

/**
 * Primitive operations the generator depends on.
 * Raw keys are 32-byte buffers.
 */
export interface CryptoProvider {
  generateX25519(): { privateKey: Buffer; publicKey: Buffer };
  deriveX25519Public(privateKey: Buffer): Buffer;
  randomBytes(size: number): Buffer;
  randomUUID(): string;
}

// PKCS#8 header for a raw 32-byte X25519 private key (OID 1.3.101.110)
const X25519_PKCS8_PREFIX = Buffer.from('302e020100300506032b656e04220420', 'hex');

const KEY_LENGTH = 32;

function rawFromJwk(jwk: crypto.JsonWebKey, field: 'd' | 'x'): Buffer {
  const value = jwk[field];
  if (typeof value !== 'string') {
    throw new Error(`JWK export is missing "${field}"`);
  }
  return Buffer.from(value, 'base64url');
}

export const nodeCryptoProvider: CryptoProvider = {
  generateX25519() {
    const { privateKey } = crypto.generateKeyPairSync('x25519');
    const jwk = privateKey.export({ format: 'jwk' });
    return { privateKey: rawFromJwk(jwk, 'd'), publicKey: rawFromJwk(jwk, 'x') };
  },
  deriveX25519Public(privateKey) {
    const keyObject = crypto.createPrivateKey({
      key: Buffer.concat([X25519_PKCS8_PREFIX, privateKey]),
      format: 'der',
      type: 'pkcs8',
    });
    return rawFromJwk(crypto.createPublicKey(keyObject).export({ format: 'jwk' }), 'x');
  },
  randomBytes: (size) => crypto.randomBytes(size),
  randomUUID: () => crypto.randomUUID(),
};

/**
 * Key Material Generator.
 *
 * Failures of the primitive provider surface as CryptoUnavailable; there is
 * no fixed fallback key.
 */
export class KeyMaterialGenerator {
  constructor(private readonly provider: CryptoProvider = nodeCryptoProvider) {}

  generateKeypair(encoding: KeyEncoding = 'base64url'): X25519KeyPair {
    const pair = this.call('generate X25519 keypair', () => this.provider.generateX25519());
    if (pair.privateKey.length !== KEY_LENGTH || pair.publicKey.length !== KEY_LENGTH) {
      throw new EngineError('Crypto provider returned keys of unexpected length', 'CryptoUnavailable');
    }
    return {
      privateKey: pair.privateKey.toString(encoding),
      publicKey: pair.publicKey.toString(encoding),
    };
  }

  /**
   * Derive the public half of an encoded private key.
   *
   * @throws EngineError ConfigCorrupt when the key does not decode to 32 bytes
   */
  derivePublicKey(privateKey: string, encoding: KeyEncoding = 'base64url'): string {
    const raw = decodeKey(privateKey);
    if (!raw) {
      throw new EngineError('Private key is not a 32-byte base64 value', 'ConfigCorrupt', {
        metadata: { length: privateKey.length },
      });
    }
    return this.call('derive X25519 public key', () => this.provider.deriveX25519Public(raw)).toString(encoding);
  }

  /** 16 lowercase hex characters */
  generateShortId(): string {
    return this.call('generate short ID', () => this.provider.randomBytes(8)).toString('hex');
  }

  generateUserId(): string {
    return this.call('generate UUID', () => this.provider.randomUUID());
  }

  /** Random password for shadowsocks and proxy clients */
  generatePassword(): string {
    return this.call('generate password', () => this.provider.randomBytes(18)).toString('base64url');
  }

  private call<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new EngineError(`Cannot ${operation}: ${extractErrorMessage(err)}`, 'CryptoUnavailable', { cause: err });
    }
  }
}

/**
 * Decode a base64 or base64url X25519 key, or null when it is not 32 bytes.
 */
export function decodeKey(encoded: string): Buffer | null {
  const trimmed = encoded.trim();
  if (!/^[A-Za-z0-9+/_-]+=*$/.test(trimmed)) {
    return null;
  }
  const raw = Buffer.from(trimmed, 'base64');
  return raw.length === KEY_LENGTH ? raw : null;
}
