// Path: src/types/protocol.ts

/**
 * Protocol instance types shared across the engine
 */

export const PROTOCOLS = ['vless', 'shadowsocks', 'wireguard', 'proxy'] as const;

export type ProtocolKind = (typeof PROTOCOLS)[number];

export type SecurityMode = 'none' | 'reality';

export type Transport = 'tcp' | 'udp';

export function isProtocolKind(value: string): value is ProtocolKind {
  return PROTOCOLS.some((p) => p === value);
}

export interface ProtocolTraits {
  /** Transport the container listens on */
  transport: Transport;
  /** Encoding of X25519 keys in documents and links */
  keyEncoding: 'base64url' | 'base64';
  /** Whether the instance owns a server keypair */
  hasServerKeys: boolean;
  /** Compose service name */
  service: string;
}

export const PROTOCOL_TRAITS: Record<ProtocolKind, ProtocolTraits> = {
  vless: { transport: 'tcp', keyEncoding: 'base64url', hasServerKeys: true, service: 'xray' },
  shadowsocks: { transport: 'tcp', keyEncoding: 'base64url', hasServerKeys: false, service: 'xray' },
  wireguard: { transport: 'udp', keyEncoding: 'base64', hasServerKeys: true, service: 'wireguard' },
  proxy: { transport: 'tcp', keyEncoding: 'base64url', hasServerKeys: false, service: 'xray' },
};

/**
 * Explicit per-invocation context: every path and address an engine
 * operation needs, resolved once from settings.
 */
export interface ServerContext {
  protocol: ProtocolKind;
  /** Root holding every protocol instance */
  workDir: string;
  /** <workDir>/<protocol> */
  instanceDir: string;
  /** Directory holding config.json and the cache files */
  configDir: string;
  configPath: string;
  usersDir: string;
  composePath: string;
  logsDir: string;
  /** Public address placed in connection URIs */
  serverHost: string;
}
