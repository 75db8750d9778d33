// Path: src/services/config-store/types.ts
// InboundConfig document model

import type { SecurityMode } from '../../types/protocol.js';

/**
 * The index signatures keep fields this tool does not manage, so a
 * load/save cycle never drops them.
 */

export interface ClientEntry {
  /** UUID (vless), password (shadowsocks, proxy) or client private key (wireguard) */
  id: string;
  /** Display name, unique within the document */
  email: string;
  flow?: string;
  /** Tunnel address (wireguard) */
  address?: string;
  [key: string]: unknown;
}

export interface RealitySettings {
  privateKey: string;
  shortIds: string[];
  serverNames: string[];
  [key: string]: unknown;
}

export interface StreamSettings {
  network: string;
  security: SecurityMode;
  realitySettings?: RealitySettings;
  [key: string]: unknown;
}

export interface InboundSettings {
  clients: ClientEntry[];
  /** Server private key for protocols without Reality (wireguard) */
  secretKey?: string;
  [key: string]: unknown;
}

export interface Inbound {
  port: number;
  protocol: string;
  settings: InboundSettings;
  streamSettings: StreamSettings;
  [key: string]: unknown;
}

/**
 * Only the first inbound is managed; any further inbounds pass through untouched.
 */
export interface InboundConfig {
  inbounds: [Inbound, ...Record<string, unknown>[]];
  [key: string]: unknown;
}

export const REALITY_FLOW = 'xtls-rprx-vision';
