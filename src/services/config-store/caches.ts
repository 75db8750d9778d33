// Path: src/services/config-store/caches.ts
// Flat single-value cache files mirroring InboundConfig fields

import path from 'node:path';
import { readTextIfExists, removeIfExists, writeAtomic } from '../../utils/file.js';
import { primaryInbound, realitySettings, serverPrivateKey } from './document.js';
import type { InboundConfig } from './types.js';

export const CACHE_FILES = {
  protocol: 'protocol.txt',
  useReality: 'use_reality.txt',
  port: 'port.txt',
  sni: 'sni.txt',
  privateKey: 'private_key.txt',
  publicKey: 'public_key.txt',
  shortId: 'short_id.txt',
} as const;

export type CacheName = keyof typeof CACHE_FILES;

/** null means the file must not exist */
export type CachedScalars = Record<CacheName, string | null>;

const CACHE_NAMES = Object.keys(CACHE_FILES).filter((k): k is CacheName => k in CACHE_FILES);

export function protocolLabel(cfg: InboundConfig): string {
  const inbound = primaryInbound(cfg);
  if (inbound.protocol === 'vless') {
    return inbound.streamSettings.security === 'reality' ? 'vless+reality' : 'vless';
  }
  return inbound.protocol;
}

/**
 * The cache values a document implies.
 *
 * @param derivePublicKey - maps the server private key to its public key
 */
export function expectedCaches(cfg: InboundConfig, derivePublicKey: (privateKey: string) => string): CachedScalars {
  const reality = realitySettings(cfg);
  const privateKey = serverPrivateKey(cfg) ?? null;

  return {
    protocol: protocolLabel(cfg),
    useReality: reality ? 'true' : 'false',
    port: String(primaryInbound(cfg).port),
    sni: reality?.serverNames[0] ?? null,
    privateKey,
    publicKey: privateKey === null ? null : derivePublicKey(privateKey),
    shortId: reality?.shortIds[0] ?? null,
  };
}

export function readCaches(cacheDir: string): CachedScalars {
  const read = (name: CacheName): string | null => {
    const content = readTextIfExists(path.join(cacheDir, CACHE_FILES[name]));
    return content === null ? null : content.replace(/\r?\n$/, '');
  };
  return {
    protocol: read('protocol'),
    useReality: read('useReality'),
    port: read('port'),
    sni: read('sni'),
    privateKey: read('privateKey'),
    publicKey: read('publicKey'),
    shortId: read('shortId'),
  };
}

/**
 * Names of caches whose on-disk value differs from the expected one.
 */
export function diffCaches(expected: CachedScalars, actual: CachedScalars): CacheName[] {
  return CACHE_NAMES.filter((name) => expected[name] !== actual[name]);
}

/**
 * Write every cache file from expected values. Idempotent: files already
 * holding the right value are not rewritten.
 *
 * @returns names of the files that changed
 */
export function writeCaches(cacheDir: string, expected: CachedScalars): CacheName[] {
  const actual = readCaches(cacheDir);
  const changed = diffCaches(expected, actual);

  for (const name of changed) {
    const filePath = path.join(cacheDir, CACHE_FILES[name]);
    const value = expected[name];
    if (value === null) {
      removeIfExists(filePath);
    } else {
      const secret = name === 'privateKey';
      writeAtomic(filePath, `${value}\n`, { mode: secret ? 0o600 : 0o644 });
    }
  }

  return changed;
}
