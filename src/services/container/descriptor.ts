// Path: src/services/container/descriptor.ts
// docker-compose.yml generation and port drift repair

import * as yaml from 'js-yaml';
import { createLogger } from '../../lib/logger.js';
import { extractErrorMessage } from '../../utils/error.js';
import { readTextIfExists, writeAtomic } from '../../utils/file.js';
import { PROTOCOL_TRAITS, type ProtocolKind, type ServerContext } from '../../types/protocol.js';

const log = createLogger({ module: 'compose-descriptor' });

export const IMAGES: Record<ProtocolKind, string> = {
  vless: 'teddysun/xray:latest',
  shadowsocks: 'teddysun/xray:latest',
  proxy: 'teddysun/xray:latest',
  wireguard: 'lscr.io/linuxserver/wireguard:latest',
};

type ComposeDocument = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Fresh descriptor for a protocol instance listening on port.
 */
export function renderDescriptor(protocol: ProtocolKind, port: number): ComposeDocument {
  const { service, transport } = PROTOCOL_TRAITS[protocol];
  const mapping = `${port}:${port}${transport === 'udp' ? '/udp' : ''}`;

  if (protocol === 'wireguard') {
    return {
      services: {
        [service]: {
          image: IMAGES[protocol],
          container_name: `vpn-warden-${protocol}`,
          cap_add: ['NET_ADMIN', 'SYS_MODULE'],
          environment: ['PUID=1000', 'PGID=1000', 'TZ=UTC', `SERVERPORT=${port}`],
          volumes: ['./config:/config', '/lib/modules:/lib/modules:ro'],
          ports: [mapping],
          sysctls: ['net.ipv4.conf.all.src_valid_mark=1', 'net.ipv4.ip_forward=1'],
          restart: 'unless-stopped',
        },
      },
    };
  }

  return {
    services: {
      [service]: {
        image: IMAGES[protocol],
        container_name: `vpn-warden-${protocol}`,
        restart: 'unless-stopped',
        ports: [mapping],
        volumes: ['./config:/etc/xray', './logs:/var/log/xray'],
        command: ['xray', 'run', '-c', '/etc/xray/config.json'],
        logging: { driver: 'json-file', options: { 'max-size': '10m', 'max-file': '3' } },
      },
    },
  };
}

export function dumpDescriptor(doc: ComposeDocument): string {
  return yaml.dump(doc, { lineWidth: -1, noRefs: true });
}

// [ip:]host:container[/proto]
const PORT_MAPPING = /^(?:(.+):)?(\d+):(\d+)(\/(?:tcp|udp))?$/;

function rewriteMapping(entry: unknown, port: number): { value: unknown; from?: number } {
  if (typeof entry === 'number') {
    return entry === port ? { value: entry } : { value: port, from: entry };
  }
  if (typeof entry !== 'string') {
    return { value: entry };
  }
  const match = PORT_MAPPING.exec(entry);
  if (!match) {
    return { value: entry };
  }
  const [, ip, host, container, proto] = match;
  if (Number(host) === port && Number(container) === port) {
    return { value: entry };
  }
  return { value: `${ip ? `${ip}:` : ''}${port}:${port}${proto ?? ''}`, from: Number(host) };
}

function rewriteEnvironment(env: unknown, port: number): { value: unknown; from?: number } {
  if (!Array.isArray(env)) return { value: env };
  let from: number | undefined;
  const value = env.map((item: unknown) => {
    if (typeof item !== 'string') return item;
    const match = /^SERVERPORT=(\d+)$/.exec(item);
    if (!match || Number(match[1]) === port) return item;
    from = Number(match[1]);
    return `SERVERPORT=${port}`;
  });
  return { value, from };
}

export interface DescriptorReconcileResult {
  changed: boolean;
  /** Ports the descriptor referenced before repair */
  previousPorts: number[];
  /** The descriptor was missing or unparsable and was written from the template */
  regenerated: boolean;
}

/**
 * Point every port reference in the descriptor at the committed port.
 * Unrelated keys are kept. A missing or unparsable descriptor is regenerated.
 */
export function reconcileDescriptor(ctx: ServerContext, port: number): DescriptorReconcileResult {
  const content = readTextIfExists(ctx.composePath);

  let parsed: unknown = null;
  if (content !== null) {
    try {
      parsed = yaml.load(content);
    } catch (err) {
      log.warn({ composePath: ctx.composePath, err: extractErrorMessage(err) }, 'Descriptor unparsable, regenerating');
    }
  }

  if (!isRecord(parsed) || !isRecord(parsed.services)) {
    writeAtomic(ctx.composePath, dumpDescriptor(renderDescriptor(ctx.protocol, port)), { mode: 0o644 });
    log.info({ composePath: ctx.composePath, port }, 'Descriptor written from template');
    return { changed: true, previousPorts: [], regenerated: true };
  }

  const previousPorts = new Set<number>();
  const services: Record<string, unknown> = {};
  for (const [name, service] of Object.entries(parsed.services)) {
    if (!isRecord(service)) {
      services[name] = service;
      continue;
    }
    const next: Record<string, unknown> = { ...service };
    if (Array.isArray(service.ports)) {
      next.ports = service.ports.map((entry: unknown) => {
        const { value, from } = rewriteMapping(entry, port);
        if (from !== undefined) previousPorts.add(from);
        return value;
      });
    }
    if (service.environment !== undefined) {
      const { value, from } = rewriteEnvironment(service.environment, port);
      if (from !== undefined) previousPorts.add(from);
      next.environment = value;
    }
    services[name] = next;
  }

  if (previousPorts.size === 0) {
    return { changed: false, previousPorts: [], regenerated: false };
  }

  writeAtomic(ctx.composePath, dumpDescriptor({ ...parsed, services }), { mode: 0o644 });
  log.warn({ composePath: ctx.composePath, from: [...previousPorts], to: port }, 'Descriptor port drift repaired');
  return { changed: true, previousPorts: [...previousPorts].sort((a, b) => a - b), regenerated: false };
}
