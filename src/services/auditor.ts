// Path: src/services/auditor.ts
// Consistency Auditor: compares the document, caches and user records, and heals drift

import { createLogger } from '../lib/logger.js';
import { extractErrorMessage, isEngineError } from '../utils/error.js';
import type { ConfigDocumentStore } from './config-store/store.js';
import { isReality, listClients, serverPrivateKey } from './config-store/document.js';
import type { InboundConfig } from './config-store/types.js';
import type { CacheName } from './config-store/caches.js';
import { driftedFields, expectedRecord, serverMeta, type ServerKeys } from './projection.js';
import type { UserCredentialRegistry } from './user-registry/registry.js';
import type { UserRecord } from './user-registry/types.js';
import type { ProtocolKind } from '../types/protocol.js';

const log = createLogger({ module: 'auditor' });

/**
 * Stand-in public key used when none can be derived or read. It is not a valid
 * key, so links built from it fail to connect instead of silently pointing at
 * a shared secret.
 */
export const PLACEHOLDER_PUBLIC_KEY = 'MISSING-SERVER-PUBLIC-KEY';

export type DiscrepancyKind = 'missing-record' | 'orphan-record' | 'stale-record' | 'stale-cache' | 'missing-key-material';

export interface Discrepancy {
  kind: DiscrepancyKind;
  protocol: ProtocolKind;
  /** User name, for record discrepancies */
  name?: string;
  /** Drifted record fields or cache names */
  fields?: string[];
  detail: string;
}

export interface AuditReport {
  protocol: ProtocolKind;
  discrepancies: Discrepancy[];
  /** Server keys came from a fallback source or the placeholder */
  degraded: boolean;
  keySource: KeySource;
}

export type KeySource = 'document' | 'cache' | 'placeholder' | 'none';

export type HealOutcome = 'healed' | 'skipped' | 'unresolved';

export interface HealResult {
  discrepancy: Discrepancy;
  outcome: HealOutcome;
  error?: string;
}

export interface HealOptions {
  /** Delete orphaned records; without it they are only reported */
  allowDelete?: boolean;
}

export interface AuditorDeps {
  store: ConfigDocumentStore;
  registry: UserCredentialRegistry;
  defaultSni: string;
  now?: () => Date;
}

interface ResolvedKeys {
  keys: ServerKeys | null;
  source: KeySource;
}

export class ConsistencyAuditor {
  constructor(private readonly deps: AuditorDeps) {}

  private get protocol(): ProtocolKind {
    return this.deps.store.ctx.protocol;
  }

  /**
   * Server keys from the document, else the public_key.txt cache, else the placeholder.
   */
  resolveServerKeys(cfg: InboundConfig): ResolvedKeys {
    const { store } = this.deps;
    const privateKey = serverPrivateKey(cfg);
    const needsKeys = isReality(cfg) || this.protocol === 'wireguard';

    if (privateKey !== undefined) {
      try {
        return { keys: { privateKey, publicKey: store.derivePublicKey(privateKey) }, source: 'document' };
      } catch (err) {
        if (!isEngineError(err)) throw err;
        log.warn({ protocol: this.protocol, err: err.message }, 'Cannot derive public key from document');
      }
    } else if (!needsKeys) {
      return { keys: null, source: 'none' };
    }

    const cached = store.readCaches().publicKey;
    if (cached) {
      return { keys: { privateKey: privateKey ?? '', publicKey: cached }, source: 'cache' };
    }

    log.error(
      { protocol: this.protocol },
      'No server key material available, using a non-functional placeholder public key'
    );
    return { keys: { privateKey: privateKey ?? '', publicKey: PLACEHOLDER_PUBLIC_KEY }, source: 'placeholder' };
  }

  /**
   * @throws EngineError NotFound or ConfigCorrupt when the document cannot be loaded
   */
  audit(): AuditReport {
    const { store, registry, defaultSni } = this.deps;
    const ctx = store.ctx;
    const cfg = store.load();
    const discrepancies: Discrepancy[] = [];
    const resolved = this.resolveServerKeys(cfg);

    if (resolved.source === 'cache' || resolved.source === 'placeholder') {
      discrepancies.push({
        kind: 'missing-key-material',
        protocol: ctx.protocol,
        detail:
          resolved.source === 'cache'
            ? 'server public key could not be derived from the document; using public_key.txt'
            : 'no usable server key material; records carry a placeholder public key',
      });
    }

    const staleCaches = this.staleCaches(cfg, resolved);
    if (staleCaches.length > 0) {
      discrepancies.push({
        kind: 'stale-cache',
        protocol: ctx.protocol,
        fields: staleCaches,
        detail: `cache files out of date: ${staleCaches.join(', ')}`,
      });
    }

    const meta = serverMeta(ctx, cfg, resolved.keys, defaultSni);
    const scan = registry.scan(ctx.protocol);
    const records = new Map(scan.records.map((r) => [r.name, r]));
    const unreadable = new Set(scan.unreadable);
    const clientNames = new Set<string>();

    for (const client of listClients(cfg)) {
      clientNames.add(client.email);
      const record = records.get(client.email);
      if (!record) {
        discrepancies.push({
          kind: unreadable.has(client.email) ? 'stale-record' : 'missing-record',
          protocol: ctx.protocol,
          name: client.email,
          detail: unreadable.has(client.email) ? 'user record is unreadable' : 'client has no user record',
        });
        continue;
      }
      const fields = driftedFields(expectedRecord(ctx, cfg, client, meta, record), record);
      if (fields.length > 0) {
        discrepancies.push({
          kind: 'stale-record',
          protocol: ctx.protocol,
          name: client.email,
          fields,
          detail: `user record differs in ${fields.join(', ')}`,
        });
      }
    }

    for (const name of [...records.keys(), ...unreadable]) {
      if (!clientNames.has(name)) {
        discrepancies.push({
          kind: 'orphan-record',
          protocol: ctx.protocol,
          name,
          detail: 'user record has no client entry',
        });
      }
    }

    log.info({ protocol: ctx.protocol, count: discrepancies.length }, 'Audit complete');
    return {
      protocol: ctx.protocol,
      discrepancies,
      degraded: resolved.source === 'cache' || resolved.source === 'placeholder',
      keySource: resolved.source,
    };
  }

  private staleCaches(cfg: InboundConfig, resolved: ResolvedKeys): CacheName[] {
    if (resolved.source !== 'document' && resolved.source !== 'none') {
      // expected values cannot be computed without a derivable key
      return [];
    }
    return this.deps.store.staleCaches(cfg);
  }

  /**
   * Repair one discrepancy. Orphaned records are removed only with allowDelete.
   */
  async heal(discrepancy: Discrepancy, options: HealOptions = {}): Promise<HealResult> {
    const { store, registry, defaultSni } = this.deps;
    const ctx = store.ctx;

    try {
      switch (discrepancy.kind) {
        case 'missing-key-material':
          return { discrepancy, outcome: 'unresolved', error: 'server keys must be regenerated with rotate-keys' };

        case 'stale-cache':
          store.rebuildCaches(store.load());
          return { discrepancy, outcome: 'healed' };

        case 'orphan-record':
          if (!options.allowDelete || discrepancy.name === undefined) {
            return { discrepancy, outcome: 'skipped' };
          }
          registry.delete(ctx.protocol, discrepancy.name);
          log.warn({ protocol: ctx.protocol, name: discrepancy.name }, 'Orphaned user record deleted');
          return { discrepancy, outcome: 'healed' };

        case 'missing-record':
        case 'stale-record': {
          const cfg = store.load();
          const client = listClients(cfg).find((c) => c.email === discrepancy.name);
          if (!client) {
            return { discrepancy, outcome: 'unresolved', error: 'client entry no longer exists' };
          }
          const resolved = this.resolveServerKeys(cfg);
          const meta = serverMeta(ctx, cfg, resolved.keys, defaultSni);
          const existing = this.readQuietly(client.email);
          const now = this.deps.now?.() ?? new Date();
          await registry.put(expectedRecord(ctx, cfg, client, meta, existing, now));
          log.info({ protocol: ctx.protocol, name: client.email, keySource: resolved.source }, 'User record rebuilt');
          return { discrepancy, outcome: 'healed' };
        }
      }
    } catch (err) {
      log.error({ protocol: ctx.protocol, kind: discrepancy.kind, err: extractErrorMessage(err) }, 'Heal failed');
      return { discrepancy, outcome: 'unresolved', error: extractErrorMessage(err) };
    }
  }

  /**
   * Audit then heal every discrepancy in order, caches first.
   */
  async healAll(options: HealOptions = {}): Promise<{ audit: AuditReport; results: HealResult[] }> {
    const audit = this.audit();
    const ordered = [...audit.discrepancies].sort(
      (a, b) => Number(b.kind === 'stale-cache') - Number(a.kind === 'stale-cache')
    );
    const results: HealResult[] = [];
    for (const discrepancy of ordered) {
      results.push(await this.heal(discrepancy, options));
    }
    return { audit, results };
  }

  private readQuietly(name: string): UserRecord | null {
    try {
      return this.deps.registry.tryRead(this.protocol, name);
    } catch (err) {
      log.warn({ protocol: this.protocol, name, err: extractErrorMessage(err) }, 'Replacing unreadable user record');
      return null;
    }
  }
}
