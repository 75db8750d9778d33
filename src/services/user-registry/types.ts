// Path: src/services/user-registry/types.ts

import type { ProtocolKind } from '../../types/protocol.js';

/**
 * Per-user credential sidecar, stored as users/<name>.json.
 * A projection of the ClientEntry plus server-wide key material.
 */
export interface UserRecord {
  name: string;
  /** Protocol-specific identifier: UUID, password or client private key */
  uuid: string;
  port: number;
  server: string;
  sni: string;
  /** Server Reality private key (vless) or the client's own key (wireguard) */
  private_key: string;
  public_key: string;
  short_id?: string;
  protocol: ProtocolKind;
  created_at: string;
  /** Tunnel address (wireguard) */
  address?: string;
}

/**
 * Server-wide values every record of an instance shares.
 */
export interface ServerMeta {
  port: number;
  server: string;
  sni: string;
  privateKey: string;
  publicKey: string;
}

export interface UserIdentity {
  uuid: string;
  shortId?: string;
  address?: string;
  /** Overrides ServerMeta.privateKey (wireguard client key) */
  privateKey?: string;
}
