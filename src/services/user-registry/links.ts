// Path: src/services/user-registry/links.ts
// Connection URI builders, one grammar per protocol

import type { UserRecord } from './types.js';

export const SHADOWSOCKS_METHOD = 'chacha20-ietf-poly1305';
export const WIREGUARD_DNS = '1.1.1.1, 1.0.0.1';

function hostPart(host: string): string {
  return host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
}

export function realityUri(r: UserRecord, shortId: string): string {
  return (
    `vless://${r.uuid}@${hostPart(r.server)}:${r.port}` +
    `?encryption=none&flow=xtls-rprx-vision&security=reality&sni=${r.sni}&fp=chrome` +
    `&pbk=${r.public_key}&sid=${shortId}&type=tcp&headerType=none#${encodeURIComponent(r.name)}`
  );
}

export function plainVlessUri(r: UserRecord): string {
  return `vless://${r.uuid}@${hostPart(r.server)}:${r.port}?encryption=none&security=none&type=tcp#${encodeURIComponent(r.name)}`;
}

export function shadowsocksUri(r: UserRecord): string {
  const userInfo = Buffer.from(`${SHADOWSOCKS_METHOD}:${r.uuid}`).toString('base64url');
  return `ss://${userInfo}@${hostPart(r.server)}:${r.port}#${encodeURIComponent(r.name)}`;
}

export function socksUri(r: UserRecord): string {
  return `socks5://${encodeURIComponent(r.name)}:${encodeURIComponent(r.uuid)}@${hostPart(r.server)}:${r.port}`;
}

export function wireguardClientConfig(r: UserRecord): string {
  return [
    '[Interface]',
    `PrivateKey = ${r.private_key}`,
    `Address = ${r.address ?? ''}`,
    `DNS = ${WIREGUARD_DNS}`,
    '',
    '[Peer]',
    `PublicKey = ${r.public_key}`,
    `Endpoint = ${hostPart(r.server)}:${r.port}`,
    'AllowedIPs = 0.0.0.0/0, ::/0',
    'PersistentKeepalive = 25',
    '',
  ].join('\n');
}

/**
 * The connection string a client imports. Deterministic in the record fields;
 * VLESS records with a short ID use the Reality grammar.
 */
export function buildConnectionUri(record: UserRecord): string {
  switch (record.protocol) {
    case 'vless':
      return record.short_id === undefined ? plainVlessUri(record) : realityUri(record, record.short_id);
    case 'shadowsocks':
      return shadowsocksUri(record);
    case 'proxy':
      return socksUri(record);
    case 'wireguard':
      return wireguardClientConfig(record);
  }
}
