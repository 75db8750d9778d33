// Path: src/services/rotation.ts
// Key Rotation Coordinator: backup, new keys, document, user records, restart

import { createLogger } from '../lib/logger.js';
import { EngineError, extractErrorMessage, wrapError } from '../utils/error.js';
import { PROTOCOL_TRAITS } from '../types/protocol.js';
import type { ConfigDocumentStore } from './config-store/store.js';
import { findClient, primaryInbound, serverPrivateKey, withServerPrivateKey } from './config-store/document.js';
import type { InboundConfig } from './config-store/types.js';
import type { ContainerLifecycleManager } from './container/lifecycle.js';
import type { HealthProbeResult } from './container/health.js';
import type { KeyMaterialGenerator } from './key-material.js';
import { identityFor, serverMeta } from './projection.js';
import type { UserCredentialRegistry } from './user-registry/registry.js';

const log = createLogger({ module: 'key-rotation' });

export type RotationState = 'Idle' | 'BackingUp' | 'GeneratingKeys' | 'UpdatingConfig' | 'UpdatingUsers' | 'Restarting';

export interface UserUpdateFailure {
  name: string;
  error: string;
}

export type RestartOutcome =
  | { ok: true; health: HealthProbeResult }
  | { ok: false; code: string; error: string };

export interface RotationReport {
  protocol: string;
  backupPath: string;
  publicKey: string;
  updatedUsers: string[];
  failedUsers: UserUpdateFailure[];
  restart: RestartOutcome;
  /** States visited, in order */
  transitions: RotationState[];
}

export interface RotationDeps {
  store: ConfigDocumentStore;
  registry: UserCredentialRegistry;
  keys: KeyMaterialGenerator;
  lifecycle: ContainerLifecycleManager;
  defaultSni: string;
  now?: () => Date;
}

/**
 * Replaces an instance's server keypair and propagates it.
 *
 * Only the backup and document steps are fatal. User records are updated
 * best-effort and a restart failure is reported without reverting anything,
 * since the new document is already authoritative. Re-running after a partial
 * failure produces a fresh consistent state.
 */
export class KeyRotationCoordinator {
  private current: RotationState = 'Idle';
  private visited: RotationState[] = [];

  constructor(private readonly deps: RotationDeps) {}

  get state(): RotationState {
    return this.current;
  }

  /**
   * @throws EngineError BackupFailed, CryptoUnavailable or the document save failure (restored from backup)
   * @throws EngineError PartialRotation when some user records could not be updated
   */
  async rotate(): Promise<RotationReport> {
    const { store, keys } = this.deps;
    const ctx = store.ctx;
    const now = this.deps.now ?? (() => new Date());
    this.visited = [];

    try {
      const cfg = store.load();
      if (!PROTOCOL_TRAITS[ctx.protocol].hasServerKeys || serverPrivateKey(cfg) === undefined) {
        throw new EngineError(`${ctx.protocol} instance has no server keys to rotate`, 'InvalidInput', {
          metadata: { protocol: ctx.protocol },
        });
      }

      this.enter('BackingUp');
      const backupPath = store.backup(now());

      this.enter('GeneratingKeys');
      const pair = keys.generateKeypair(PROTOCOL_TRAITS[ctx.protocol].keyEncoding);

      this.enter('UpdatingConfig');
      const rotated = this.updateConfig(cfg, pair.privateKey, backupPath);

      this.enter('UpdatingUsers');
      const { updatedUsers, failedUsers } = await this.updateUsers(rotated, pair);

      this.enter('Restarting');
      const restart = await this.restart(primaryInbound(rotated).port);

      const report: RotationReport = {
        protocol: ctx.protocol,
        backupPath,
        publicKey: pair.publicKey,
        updatedUsers,
        failedUsers,
        restart,
        transitions: [...this.visited, 'Idle'],
      };

      if (failedUsers.length > 0) {
        throw new EngineError(
          `Key rotation applied, but ${failedUsers.length} user record(s) were not updated`,
          'PartialRotation',
          { metadata: { report } }
        );
      }
      log.info({ protocol: ctx.protocol, users: updatedUsers.length, restarted: restart.ok }, 'Key rotation complete');
      return report;
    } finally {
      this.enter('Idle');
    }
  }

  private enter(state: RotationState): void {
    if (state !== 'Idle') this.visited.push(state);
    log.debug({ from: this.current, to: state }, 'Rotation state');
    this.current = state;
  }

  private updateConfig(cfg: InboundConfig, privateKey: string, backupPath: string): InboundConfig {
    const { store } = this.deps;
    const rotated = withServerPrivateKey(cfg, privateKey);
    try {
      store.commit(rotated);
      return rotated;
    } catch (err) {
      log.error({ backupPath, err: extractErrorMessage(err) }, 'Document update failed, restoring backup');
      store.restore(backupPath);
      store.rebuildCaches(store.load());
      throw wrapError(err, 'RuntimeFailure', { backupPath, restored: true });
    }
  }

  private async updateUsers(
    cfg: InboundConfig,
    pair: { privateKey: string; publicKey: string }
  ): Promise<{ updatedUsers: string[]; failedUsers: UserUpdateFailure[] }> {
    const { store, registry, defaultSni } = this.deps;
    const ctx = store.ctx;
    const meta = serverMeta(ctx, cfg, pair, defaultSni);
    const scan = registry.scan(ctx.protocol);

    const updatedUsers: string[] = [];
    const failedUsers: UserUpdateFailure[] = scan.unreadable.map((name) => ({
      name,
      error: 'user record is unreadable',
    }));

    for (const record of scan.records) {
      try {
        await registry.update(ctx.protocol, record.name, (r) => {
          const client = findClient(cfg, r.name);
          // orphans keep their own identity; the auditor decides their fate
          const identity = client
            ? identityFor(ctx, cfg, client, r)
            : { uuid: r.uuid, shortId: r.short_id, privateKey: ctx.protocol === 'wireguard' ? r.private_key : undefined };
          return {
            ...r,
            port: meta.port,
            server: meta.server,
            sni: meta.sni,
            private_key: identity.privateKey ?? meta.privateKey,
            public_key: meta.publicKey,
            ...(identity.shortId === undefined ? {} : { short_id: identity.shortId }),
          };
        });
        updatedUsers.push(record.name);
      } catch (err) {
        log.error({ protocol: ctx.protocol, name: record.name, err: extractErrorMessage(err) }, 'User record not rotated');
        failedUsers.push({ name: record.name, error: extractErrorMessage(err) });
      }
    }
    return { updatedUsers, failedUsers };
  }

  private async restart(port: number): Promise<RestartOutcome> {
    const { store, lifecycle } = this.deps;
    try {
      const { health } = await lifecycle.restartAndWait(store.ctx, port);
      return { ok: true, health };
    } catch (err) {
      const wrapped = wrapError(err, 'RuntimeFailure');
      log.error({ protocol: store.ctx.protocol, err: wrapped.message }, 'Restart after rotation failed, keys stay rotated');
      return { ok: false, code: wrapped.code, error: wrapped.message };
    }
  }
}
