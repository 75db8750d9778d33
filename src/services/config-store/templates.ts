// Path: src/services/config-store/templates.ts
// Fresh InboundConfig documents for a new protocol instance

import { parseInboundConfig } from '../../lib/validation.js';
import { EngineError } from '../../utils/error.js';
import type { ProtocolKind } from '../../types/protocol.js';
import type { InboundConfig } from './types.js';

export const SHADOWSOCKS_CIPHER = 'chacha20-ietf-poly1305';
export const WIREGUARD_SUBNET = '10.66.66';

export interface InstanceTemplateOptions {
  port: number;
  /** Reality private key; vless without it installs with security "none" */
  realityPrivateKey?: string;
  shortId?: string;
  sni: string;
  /** WireGuard server private key */
  wireguardSecretKey?: string;
}

const OUTBOUNDS = [
  { protocol: 'freedom', tag: 'direct' },
  { protocol: 'blackhole', tag: 'block' },
];

function inboundFor(protocol: ProtocolKind, options: InstanceTemplateOptions): Record<string, unknown> {
  const { port, sni } = options;
  switch (protocol) {
    case 'vless':
      return {
        port,
        protocol: 'vless',
        tag: 'vless-in',
        settings: { clients: [], decryption: 'none' },
        streamSettings:
          options.realityPrivateKey === undefined
            ? { network: 'tcp', security: 'none' }
            : {
                network: 'tcp',
                security: 'reality',
                realitySettings: {
                  show: false,
                  dest: `${sni}:443`,
                  xver: 0,
                  serverNames: [sni],
                  privateKey: options.realityPrivateKey,
                  shortIds: [options.shortId ?? ''],
                },
              },
        sniffing: { enabled: true, destOverride: ['http', 'tls'] },
      };
    case 'shadowsocks':
      return {
        port,
        protocol: 'shadowsocks',
        tag: 'shadowsocks-in',
        settings: { clients: [], method: SHADOWSOCKS_CIPHER, network: 'tcp,udp' },
        streamSettings: { network: 'tcp', security: 'none' },
      };
    case 'proxy':
      return {
        port,
        protocol: 'socks',
        tag: 'socks-in',
        settings: { clients: [], auth: 'password', udp: true },
        streamSettings: { network: 'tcp', security: 'none' },
      };
    case 'wireguard':
      return {
        port,
        protocol: 'wireguard',
        tag: 'wireguard-in',
        settings: {
          clients: [],
          secretKey: options.wireguardSecretKey,
          address: [`${WIREGUARD_SUBNET}.1/24`],
          mtu: 1420,
        },
        streamSettings: { network: 'udp', security: 'none' },
      };
  }
}

/**
 * Build the document a fresh install commits: one inbound, no clients.
 *
 * @throws EngineError InvalidInput when required key material is missing
 */
export function newInstanceDocument(protocol: ProtocolKind, options: InstanceTemplateOptions): InboundConfig {
  if (protocol === 'wireguard' && options.wireguardSecretKey === undefined) {
    throw new EngineError('WireGuard instances need a server key', 'InvalidInput');
  }
  const raw = {
    log: { loglevel: 'warning', access: 'none' },
    inbounds: [inboundFor(protocol, options)],
    outbounds: OUTBOUNDS,
  };
  const { config, result } = parseInboundConfig(raw);
  if (!config) {
    throw new EngineError(`Template for ${protocol} failed validation`, 'InvalidInput', {
      metadata: { errors: result.errors },
    });
  }
  return config;
}
