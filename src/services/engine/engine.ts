// Path: src/services/engine/engine.ts
// Engine facade: resolves the instance context and runs one command at a time

import fs from 'node:fs';
import { createLogger } from '../../lib/logger.js';
import { createServerContext } from '../../lib/context.js';
import type { EngineSettings } from '../../lib/config/types.js';
import { assertValidName, assertValidUuid } from '../../lib/validation.js';
import { EngineError, extractErrorMessage, wrapError } from '../../utils/error.js';
import { withInstanceLock } from '../../utils/lock.js';
import { cleanupOrphanedFiles, type CleanupStats } from '../../utils/startup-cleanup.js';
import { PROTOCOLS, PROTOCOL_TRAITS, type ProtocolKind, type ServerContext } from '../../types/protocol.js';
import { ConsistencyAuditor, type AuditReport } from '../auditor.js';
import {
  ConfigDocumentStore,
  addClient,
  addShortId,
  findClient,
  isReality,
  listClients,
  primaryInbound,
  removeClient,
  renameClient,
  type InboundConfig,
} from '../config-store/index.js';
import { newInstanceDocument, WIREGUARD_SUBNET } from '../config-store/templates.js';
import { REALITY_FLOW } from '../config-store/types.js';
import { ContainerLifecycleManager, type LifecycleOptions } from '../container/lifecycle.js';
import { RuntimeHealthSignals, type HealthProbeResult, type HealthSignals } from '../container/health.js';
import type { ContainerRuntime } from '../container/runtime.js';
import { reconcileFirewall, scanCommittedPorts, type FirewallController } from '../firewall.js';
import { KeyMaterialGenerator } from '../key-material.js';
import { allocatePort, type PortProbe } from '../port-allocator.js';
import { expectedRecord, identityFor, serverMeta } from '../projection.js';
import { KeyRotationCoordinator, type RotationReport } from '../rotation.js';
import { UserCredentialRegistry, buildConnectionUri, type QrRenderer, type UserRecord } from '../user-registry/index.js';
import type {
  AddUserInput,
  CommandHandlers,
  CommandInput,
  CommandName,
  CommandOutput,
  EditUserInput,
  EngineResult,
  HealInput,
  HealOutput,
  InstallInput,
  InstallOutput,
  InstanceStatus,
  RestartOutput,
  StatusInput,
  UninstallOutput,
  UserOutput,
} from './types.js';

const log = createLogger({ module: 'engine' });

/** Client tunnel addresses are <subnet>.2 .. <subnet>.254 */
const FIRST_CLIENT_HOST = 2;
const LAST_CLIENT_HOST = 254;

export interface EngineDeps {
  /** Settings with serverHost already resolved */
  settings: EngineSettings;
  runtime: ContainerRuntime;
  firewall: FirewallController;
  qr: QrRenderer;
  keys?: KeyMaterialGenerator;
  signals?: HealthSignals;
  probe?: PortProbe;
  random?: () => number;
  now?: () => Date;
  /** Overrides for the health wait (sleep and clock in tests) */
  lifecycle?: Partial<LifecycleOptions>;
}

export class VpnEngine {
  readonly lifecycle: ContainerLifecycleManager;
  readonly registry: UserCredentialRegistry;
  private readonly keys: KeyMaterialGenerator;
  private readonly settings: EngineSettings;

  private readonly handlers: CommandHandlers = {
    install: (input) => this.install(input),
    uninstall: (input) => this.uninstall(input.protocol),
    'add-user': (input) => this.addUser(input),
    'delete-user': (input) => this.deleteUser(input.protocol, input.name),
    'edit-user': (input) => this.editUser(input),
    'show-user': (input) => Promise.resolve(this.showUser(input.protocol, input.name)),
    'list-users': (input) => Promise.resolve(this.listUsers(input.protocol)),
    'rotate-keys': (input) => this.rotateKeys(input.protocol),
    restart: (input) => this.restart(input.protocol),
    audit: (input) => Promise.resolve(this.audit(input.protocol)),
    heal: (input) => this.heal(input),
    status: (input) => this.status(input),
    cleanup: (input) => Promise.resolve(this.cleanup(input)),
  };

  constructor(private readonly deps: EngineDeps) {
    this.settings = deps.settings;
    this.keys = deps.keys ?? new KeyMaterialGenerator();
    this.registry = new UserCredentialRegistry(this.settings.workDir, deps.qr, {
      writeQrImages: this.settings.writeQrImages,
    });
    this.lifecycle = new ContainerLifecycleManager(deps.runtime, deps.signals ?? new RuntimeHealthSignals(deps.runtime), {
      ...this.settings.health,
      ...deps.lifecycle,
    });
  }

  /**
   * Run one command. Failures come back as a typed error instead of a throw.
   */
  async execute<K extends CommandName>(kind: K, input: CommandInput<K>): Promise<EngineResult<CommandOutput<K>>> {
    const handler: CommandHandlers[K] = this.handlers[kind];
    try {
      const data = await handler(input);
      return { ok: true, data };
    } catch (err) {
      const error = wrapError(err, 'RuntimeFailure', { command: kind });
      log.error({ command: kind, code: error.code, err: error.message }, 'Command failed');
      return { ok: false, error };
    }
  }

  context(protocol: ProtocolKind): ServerContext {
    return createServerContext(this.settings, protocol);
  }

  store(protocol: ProtocolKind): ConfigDocumentStore {
    return new ConfigDocumentStore(this.context(protocol), this.keys);
  }

  installedProtocols(): ProtocolKind[] {
    return PROTOCOLS.filter((p) => fs.existsSync(this.context(p).configPath));
  }

  private now(): Date {
    return this.deps.now?.() ?? new Date();
  }

  private auditor(protocol: ProtocolKind): ConsistencyAuditor {
    return new ConsistencyAuditor({
      store: this.store(protocol),
      registry: this.registry,
      defaultSni: this.settings.defaultSni,
      now: () => this.now(),
    });
  }

  /**
   * Hold the instance lock and clear leftovers of interrupted writes first.
   */
  private mutate<T>(ctx: ServerContext, fn: () => Promise<T>): Promise<T> {
    return withInstanceLock(ctx.instanceDir, this.settings.lockStaleMs, () => {
      cleanupOrphanedFiles([ctx.instanceDir, ctx.configDir, ctx.usersDir], {
        backupRetention: this.settings.backupRetention,
      });
      return fn();
    });
  }

  private requireInstalled(protocol: ProtocolKind): ConfigDocumentStore {
    const store = this.store(protocol);
    if (!store.exists()) {
      throw new EngineError(`${protocol} is not installed`, 'NotFound', { metadata: { protocol } });
    }
    return store;
  }

  private async install(input: InstallInput): Promise<InstallOutput> {
    const { protocol } = input;
    const store = this.store(protocol);
    const ctx = store.ctx;
    if (store.exists()) {
      throw new EngineError(`${protocol} is already installed`, 'DuplicateName', { metadata: { protocol } });
    }

    return this.mutate(ctx, async () => {
      const { transport, keyEncoding } = PROTOCOL_TRAITS[protocol];
      const committed = scanCommittedPorts(this.settings.workDir);
      const port = await allocatePort(input.port ?? { mode: 'random' }, {
        transport,
        probe: this.deps.probe,
        excluded: new Set(committed.ports.values()),
        random: this.deps.random,
      });

      const sni = input.sni ?? this.settings.defaultSni;
      const reality = protocol === 'vless' && input.reality !== false;
      const pair = reality || protocol === 'wireguard' ? this.keys.generateKeypair(keyEncoding) : undefined;

      const cfg = newInstanceDocument(protocol, {
        port,
        sni,
        realityPrivateKey: reality ? pair?.privateKey : undefined,
        shortId: reality ? this.keys.generateShortId() : undefined,
        wireguardSecretKey: protocol === 'wireguard' ? pair?.privateKey : undefined,
      });
      store.commit(cfg);
      log.info({ protocol, port, reality }, 'Instance document written');

      const firewall = await reconcileFirewall({
        workDir: this.settings.workDir,
        port,
        transport,
        firewall: this.deps.firewall,
      });
      await this.lifecycle.start(ctx, port);
      const health = await this.lifecycle.waitHealthy(ctx, port);

      return { protocol, port, publicKey: pair?.publicKey, firewall, health };
    });
  }

  private async uninstall(protocol: ProtocolKind): Promise<UninstallOutput> {
    const ctx = this.context(protocol);
    if (!fs.existsSync(ctx.instanceDir)) {
      throw new EngineError(`${protocol} is not installed`, 'NotFound', { metadata: { protocol } });
    }

    const port = await this.mutate(ctx, async () => {
      const cached = this.store(protocol).readCaches().port;
      try {
        await this.lifecycle.stop(ctx);
      } catch (err) {
        log.warn({ protocol, err: extractErrorMessage(err) }, 'Container stop failed, removing instance anyway');
      }
      return cached === null ? null : Number.parseInt(cached, 10);
    });

    fs.rmSync(ctx.instanceDir, { recursive: true, force: true });
    log.info({ protocol, instanceDir: ctx.instanceDir }, 'Instance removed');

    const firewall = await reconcileFirewall({
      workDir: this.settings.workDir,
      transport: PROTOCOL_TRAITS[protocol].transport,
      previousPort: port !== null && Number.isInteger(port) ? port : undefined,
      firewall: this.deps.firewall,
    });
    return { protocol, port, firewall };
  }

  private nextWireguardAddress(cfg: InboundConfig): string {
    const used = new Set(listClients(cfg).map((c) => c.address));
    for (let host = FIRST_CLIENT_HOST; host <= LAST_CLIENT_HOST; host++) {
      const address = `${WIREGUARD_SUBNET}.${host}/32`;
      if (!used.has(address)) return address;
    }
    throw new EngineError('WireGuard client address pool is exhausted', 'InvalidInput');
  }

  private clientIdFor(protocol: ProtocolKind, id: string | undefined): string {
    switch (protocol) {
      case 'vless':
        if (id === undefined) return this.keys.generateUserId();
        assertValidUuid(id);
        return id;
      case 'shadowsocks':
      case 'proxy':
        return id ?? this.keys.generatePassword();
      case 'wireguard':
        return this.keys.generateKeypair(PROTOCOL_TRAITS.wireguard.keyEncoding).privateKey;
    }
  }

  private async restartAfterMutation(store: ConfigDocumentStore, cfg: InboundConfig): Promise<HealthProbeResult> {
    const { health } = await this.lifecycle.restartAndWait(store.ctx, primaryInbound(cfg).port);
    return health;
  }

  private async addUser(input: AddUserInput): Promise<UserOutput> {
    const { protocol, name } = input;
    assertValidName(name);
    const store = this.requireInstalled(protocol);

    return this.mutate(store.ctx, async () => {
      let cfg = store.load();
      if (findClient(cfg, name) || this.registry.exists(protocol, name)) {
        throw new EngineError(`User "${name}" already exists for ${protocol}`, 'DuplicateName', {
          metadata: { protocol, name },
        });
      }

      const id = this.clientIdFor(protocol, input.id);
      const reality = isReality(cfg);
      const shortId = reality ? this.keys.generateShortId() : undefined;
      const address = protocol === 'wireguard' ? this.nextWireguardAddress(cfg) : undefined;
      const flow = protocol === 'vless' ? (reality ? REALITY_FLOW : '') : undefined;

      cfg = addClient(cfg, name, id, flow, address === undefined ? {} : { address });
      if (shortId !== undefined) {
        cfg = addShortId(cfg, shortId);
      }
      store.commit(cfg);

      const meta = serverMeta(store.ctx, cfg, store.serverKeys(cfg), this.settings.defaultSni);
      const client = findClient(cfg, name);
      if (!client) {
        throw new EngineError(`User "${name}" missing after commit`, 'ConfigCorrupt');
      }
      const identity = { ...identityFor(store.ctx, cfg, client), ...(shortId === undefined ? {} : { shortId }) };
      const record = await this.registry.create(protocol, name, identity, meta, this.now());
      log.info({ protocol, name }, 'User added');

      const health = await this.restartAfterMutation(store, cfg);
      return { record, link: buildConnectionUri(record), health };
    });
  }

  private async deleteUser(protocol: ProtocolKind, name: string): Promise<{ name: string }> {
    const store = this.requireInstalled(protocol);

    return this.mutate(store.ctx, async () => {
      const cfg = removeClient(store.load(), name);
      store.commit(cfg);
      if (this.registry.exists(protocol, name)) {
        this.registry.delete(protocol, name);
      } else {
        log.warn({ protocol, name }, 'User had no record to delete');
      }
      log.info({ protocol, name }, 'User deleted');

      await this.restartAfterMutation(store, cfg);
      return { name };
    });
  }

  private async editUser(input: EditUserInput): Promise<UserOutput> {
    const { protocol, name } = input;
    const newName = input.newName ?? name;
    assertValidName(newName);
    const store = this.requireInstalled(protocol);

    return this.mutate(store.ctx, async () => {
      const current = store.load();
      const client = findClient(current, name);
      if (!client) {
        throw new EngineError(`User "${name}" not found`, 'NotFound', { metadata: { protocol, name } });
      }
      const newId = input.newId ?? client.id;
      if (protocol === 'vless') {
        assertValidUuid(newId);
      }
      if (newName !== name && this.registry.exists(protocol, newName)) {
        throw new EngineError(`User "${newName}" already has a ${protocol} record`, 'DuplicateName', {
          metadata: { protocol, name: newName },
        });
      }

      const cfg = renameClient(current, name, newName, newId);
      store.commit(cfg);

      const meta = serverMeta(store.ctx, cfg, store.serverKeys(cfg), this.settings.defaultSni);
      const renamed = findClient(cfg, newName);
      if (!renamed) {
        throw new EngineError(`User "${newName}" missing after commit`, 'ConfigCorrupt');
      }

      let record: UserRecord;
      if (this.registry.exists(protocol, name)) {
        record = await this.registry.update(protocol, name, (r) =>
          expectedRecord(store.ctx, cfg, renamed, meta, r, this.now())
        );
      } else {
        record = await this.registry.create(protocol, newName, identityFor(store.ctx, cfg, renamed), meta, this.now());
      }
      log.info({ protocol, name, newName }, 'User edited');

      const health = await this.restartAfterMutation(store, cfg);
      return { record, link: buildConnectionUri(record), health };
    });
  }

  private showUser(protocol: ProtocolKind, name: string): UserOutput {
    const record = this.registry.read(protocol, name);
    const link = this.registry.readLink(protocol, name)?.trimEnd() ?? buildConnectionUri(record);
    return { record, link };
  }

  private listUsers(protocol: ProtocolKind): UserRecord[] {
    return this.registry.list(protocol);
  }

  private async rotateKeys(protocol: ProtocolKind): Promise<RotationReport> {
    const store = this.requireInstalled(protocol);
    return this.mutate(store.ctx, () =>
      new KeyRotationCoordinator({
        store,
        registry: this.registry,
        keys: this.keys,
        lifecycle: this.lifecycle,
        defaultSni: this.settings.defaultSni,
        now: () => this.now(),
      }).rotate()
    );
  }

  private async restart(protocol: ProtocolKind): Promise<RestartOutput> {
    const store = this.requireInstalled(protocol);
    return this.mutate(store.ctx, () => this.lifecycle.restartAndWait(store.ctx, primaryInbound(store.load()).port));
  }

  private audit(protocol: ProtocolKind): AuditReport {
    this.requireInstalled(protocol);
    return this.auditor(protocol).audit();
  }

  private async heal(input: HealInput): Promise<HealOutput> {
    const store = this.requireInstalled(input.protocol);
    return this.mutate(store.ctx, () => this.auditor(input.protocol).healAll({ allowDelete: input.allowDelete }));
  }

  private async status(input: StatusInput): Promise<InstanceStatus[]> {
    const protocols = input.protocol ? [input.protocol] : this.installedProtocols();
    const statuses: InstanceStatus[] = [];

    for (const protocol of protocols) {
      const store = this.store(protocol);
      const ctx = store.ctx;
      const installed = store.exists();
      let running: boolean | null = null;
      if (installed) {
        try {
          running = await this.deps.runtime.isRunning(ctx.instanceDir);
        } catch (err) {
          log.warn({ protocol, err: extractErrorMessage(err) }, 'Cannot query container state');
        }
      }
      statuses.push({
        protocol,
        installed,
        running,
        caches: installed ? store.readCaches() : null,
        users: installed ? this.registry.list(protocol).length : 0,
        recentProbes: this.lifecycle.recentProbes(ctx),
      });
    }
    return statuses;
  }

  private cleanup(input: StatusInput): CleanupStats {
    const protocols = input.protocol ? [input.protocol] : this.installedProtocols();
    const dirs = protocols.flatMap((p) => {
      const ctx = this.context(p);
      return [ctx.instanceDir, ctx.configDir, ctx.usersDir];
    });
    return cleanupOrphanedFiles(dirs, { backupRetention: this.settings.backupRetention });
  }
}
