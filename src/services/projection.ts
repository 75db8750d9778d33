// Path: src/services/projection.ts
// Projection of ClientEntry + server-wide values onto the UserRecord a client should hold

import { primaryInbound, realitySettings } from './config-store/document.js';
import type { ClientEntry, InboundConfig } from './config-store/types.js';
import { projectRecord } from './user-registry/registry.js';
import type { ServerMeta, UserIdentity, UserRecord } from './user-registry/types.js';
import type { ServerContext } from '../types/protocol.js';

export interface ServerKeys {
  privateKey: string;
  publicKey: string;
}

/**
 * Record fields that derive from the document; a mismatch in any of them is drift.
 */
export const KEY_FIELDS = ['uuid', 'port', 'server', 'sni', 'private_key', 'public_key', 'short_id', 'address'] as const;

export type KeyField = (typeof KEY_FIELDS)[number];

export function serverMeta(ctx: ServerContext, cfg: InboundConfig, keys: ServerKeys | null, defaultSni: string): ServerMeta {
  return {
    port: primaryInbound(cfg).port,
    server: ctx.serverHost,
    sni: realitySettings(cfg)?.serverNames[0] ?? defaultSni,
    privateKey: keys?.privateKey ?? '',
    publicKey: keys?.publicKey ?? '',
  };
}

/**
 * A Reality user keeps its own short ID while the document still lists it;
 * otherwise it falls back to the first one.
 */
export function userShortId(cfg: InboundConfig, current?: string): string | undefined {
  const reality = realitySettings(cfg);
  if (!reality) return undefined;
  if (current !== undefined && reality.shortIds.includes(current)) return current;
  return reality.shortIds[0];
}

export function identityFor(ctx: ServerContext, cfg: InboundConfig, client: ClientEntry, existing?: UserRecord | null): UserIdentity {
  const shortId = userShortId(cfg, existing?.short_id);
  if (ctx.protocol === 'wireguard') {
    return {
      uuid: client.id,
      privateKey: client.id,
      ...(client.address === undefined ? {} : { address: client.address }),
    };
  }
  return { uuid: client.id, ...(shortId === undefined ? {} : { shortId }) };
}

/**
 * The record a client entry implies. An existing record keeps its creation time.
 */
export function expectedRecord(
  ctx: ServerContext,
  cfg: InboundConfig,
  client: ClientEntry,
  meta: ServerMeta,
  existing?: UserRecord | null,
  now: Date = new Date()
): UserRecord {
  const createdAt = existing?.created_at || now.toISOString();
  return projectRecord(ctx.protocol, client.email, identityFor(ctx, cfg, client, existing), meta, createdAt);
}

export function driftedFields(expected: UserRecord, actual: UserRecord): KeyField[] {
  return KEY_FIELDS.filter((field) => expected[field] !== actual[field]);
}
