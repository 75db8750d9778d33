// Path: src/services/config-store/document.ts
// Pure InboundConfig mutations; every function returns a new document

import { EngineError } from '../../utils/error.js';
import type { ClientEntry, Inbound, InboundConfig, RealitySettings } from './types.js';

export function primaryInbound(cfg: InboundConfig): Inbound {
  return cfg.inbounds[0];
}

function withPrimary(cfg: InboundConfig, update: (inbound: Inbound) => Inbound): InboundConfig {
  const [primary, ...rest] = cfg.inbounds;
  return { ...cfg, inbounds: [update(primary), ...rest] };
}

function withClients(cfg: InboundConfig, update: (clients: ClientEntry[]) => ClientEntry[]): InboundConfig {
  return withPrimary(cfg, (inbound) => ({
    ...inbound,
    settings: { ...inbound.settings, clients: update(inbound.settings.clients) },
  }));
}

export function listClients(cfg: InboundConfig): readonly ClientEntry[] {
  return primaryInbound(cfg).settings.clients;
}

export function findClient(cfg: InboundConfig, name: string): ClientEntry | undefined {
  return listClients(cfg).find((c) => c.email === name);
}

export function isReality(cfg: InboundConfig): boolean {
  return primaryInbound(cfg).streamSettings.security === 'reality';
}

export function realitySettings(cfg: InboundConfig): RealitySettings | undefined {
  const stream = primaryInbound(cfg).streamSettings;
  return stream.security === 'reality' ? stream.realitySettings : undefined;
}

function requireClient(cfg: InboundConfig, name: string): ClientEntry {
  const client = findClient(cfg, name);
  if (!client) {
    throw new EngineError(`User "${name}" not found`, 'NotFound', { metadata: { name } });
  }
  return client;
}

function assertNameFree(cfg: InboundConfig, name: string): void {
  if (findClient(cfg, name)) {
    throw new EngineError(`User "${name}" already exists`, 'DuplicateName', { metadata: { name } });
  }
}

function assertIdFree(cfg: InboundConfig, id: string, except?: string): void {
  if (listClients(cfg).some((c) => c.id === id && c.email !== except)) {
    throw new EngineError('Client id is already used by another user', 'DuplicateName', { metadata: { except } });
  }
}

/**
 * Append a client.
 *
 * @throws EngineError DuplicateName when the name (or id) is already present
 */
export function addClient(
  cfg: InboundConfig,
  name: string,
  id: string,
  flow?: string,
  extra: { address?: string } = {}
): InboundConfig {
  assertNameFree(cfg, name);
  assertIdFree(cfg, id);
  const entry: ClientEntry = { id, ...(flow === undefined ? {} : { flow }), email: name, ...extra };
  return withClients(cfg, (clients) => [...clients, entry]);
}

/**
 * @throws EngineError NotFound
 */
export function removeClient(cfg: InboundConfig, name: string): InboundConfig {
  requireClient(cfg, name);
  return withClients(cfg, (clients) => clients.filter((c) => c.email !== name));
}

/**
 * Rename a client in place, keeping its position and any extra fields.
 *
 * @throws EngineError NotFound when oldName is absent
 * @throws EngineError DuplicateName when newName belongs to another client
 */
export function renameClient(cfg: InboundConfig, oldName: string, newName: string, newId: string): InboundConfig {
  requireClient(cfg, oldName);
  if (newName !== oldName) {
    assertNameFree(cfg, newName);
  }
  assertIdFree(cfg, newId, oldName);
  return withClients(cfg, (clients) =>
    clients.map((c) => (c.email === oldName ? { ...c, id: newId, email: newName } : c))
  );
}

/**
 * Append a Reality short ID unless already present.
 */
export function addShortId(cfg: InboundConfig, shortId: string): InboundConfig {
  const reality = realitySettings(cfg);
  if (!reality || reality.shortIds.includes(shortId)) {
    return cfg;
  }
  return withReality(cfg, { ...reality, shortIds: [...reality.shortIds, shortId] });
}

function withReality(cfg: InboundConfig, reality: RealitySettings): InboundConfig {
  return withPrimary(cfg, (inbound) => ({
    ...inbound,
    streamSettings: { ...inbound.streamSettings, realitySettings: reality },
  }));
}

/**
 * Server private key: the Reality key, or settings.secretKey for WireGuard.
 */
export function serverPrivateKey(cfg: InboundConfig): string | undefined {
  return realitySettings(cfg)?.privateKey ?? primaryInbound(cfg).settings.secretKey;
}

/**
 * Replace the server private key, keeping short IDs and server names.
 *
 * @throws EngineError InvalidInput when the document carries no server key
 */
export function withServerPrivateKey(cfg: InboundConfig, privateKey: string): InboundConfig {
  const reality = realitySettings(cfg);
  if (reality) {
    return withReality(cfg, { ...reality, privateKey });
  }
  if (primaryInbound(cfg).settings.secretKey !== undefined) {
    return withPrimary(cfg, (inbound) => ({
      ...inbound,
      settings: { ...inbound.settings, secretKey: privateKey },
    }));
  }
  throw new EngineError('Instance has no server key material to replace', 'InvalidInput');
}
