// Path: src/services/rotation.test.ts
// Tests for the key rotation state machine

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import { KeyRotationCoordinator } from './rotation.js';
import { ConfigDocumentStore } from './config-store/store.js';
import { realitySettings } from './config-store/document.js';
import type { InboundConfig } from './config-store/types.js';
import type { CacheName } from './config-store/caches.js';
import { ContainerLifecycleManager } from './container/lifecycle.js';
import { KeyMaterialGenerator, nodeCryptoProvider } from './key-material.js';
import { UserCredentialRegistry } from './user-registry/registry.js';
import { buildConnectionUri } from './user-registry/links.js';
import { serverMeta } from './projection.js';
import { EngineError } from '../utils/error.js';
import { FakeContainerRuntime, FakeQrRenderer, StaticHealthSignals } from '../testing/fakes.js';
import {
  ALICE_UUID,
  BOB_UUID,
  REALITY_PRIVATE_KEY,
  makeWorkDir,
  realityDocument,
  removeWorkDir,
  testContext,
  writeDocument,
} from '../testing/fixtures.js';
import type { ServerContext } from '../types/protocol.js';

vi.mock('../lib/logger.js', () => ({
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

const SNI = 'addons.mozilla.org';
const SHORT_ID = '0123456789abcdef';

async function rejectionOf(promise: Promise<unknown>): Promise<EngineError> {
  const err = await promise.then(
    () => null,
    (e: unknown) => e
  );
  if (!(err instanceof EngineError)) {
    throw new Error('expected an EngineError rejection');
  }
  return err;
}

class FailingCommitStore extends ConfigDocumentStore {
  commit(): CacheName[] {
    throw new Error('disk full');
  }
}

class FailingBackupStore extends ConfigDocumentStore {
  backup(): string {
    throw new EngineError('Cannot back up config document: read-only', 'BackupFailed');
  }
}

describe('KeyRotationCoordinator', () => {
  let workDir: string;
  let ctx: ServerContext;
  let keys: KeyMaterialGenerator;
  let store: ConfigDocumentStore;
  let qr: FakeQrRenderer;
  let registry: UserCredentialRegistry;
  let runtime: FakeContainerRuntime;
  let lifecycle: ContainerLifecycleManager;
  let originalContent: string;

  beforeEach(async () => {
    workDir = makeWorkDir();
    ctx = testContext(workDir, 'vless');
    keys = new KeyMaterialGenerator();
    store = new ConfigDocumentStore(ctx, keys);
    qr = new FakeQrRenderer();
    registry = new UserCredentialRegistry(workDir, qr);
    runtime = new FakeContainerRuntime();
    lifecycle = new ContainerLifecycleManager(runtime, new StaticHealthSignals(true, true), {
      timeoutMs: 1000,
      pollIntervalMs: 100,
      historySize: 10,
      sleep: () => Promise.resolve(),
      now: () => 0,
    });

    writeDocument(
      ctx,
      realityDocument([
        { id: ALICE_UUID, email: 'alice' },
        { id: BOB_UUID, email: 'bob' },
      ])
    );
    originalContent = fs.readFileSync(ctx.configPath, 'utf-8');
    const cfg = store.load();
    store.rebuildCaches(cfg);
    const meta = serverMeta(ctx, cfg, store.serverKeys(cfg), SNI);
    await registry.create('vless', 'alice', { uuid: ALICE_UUID, shortId: SHORT_ID }, meta);
    await registry.create('vless', 'bob', { uuid: BOB_UUID, shortId: SHORT_ID }, meta);
  });

  afterEach(() => {
    removeWorkDir(workDir);
  });

  function coordinator(overrides: { store?: ConfigDocumentStore; keys?: KeyMaterialGenerator } = {}): KeyRotationCoordinator {
    return new KeyRotationCoordinator({
      store: overrides.store ?? store,
      registry,
      keys: overrides.keys ?? keys,
      lifecycle,
      defaultSni: SNI,
    });
  }

  function privateKeyOf(cfg: InboundConfig): string | undefined {
    return realitySettings(cfg)?.privateKey;
  }

  it('should rotate the document, caches and every user record', async () => {
    const rotation = coordinator();
    const report = await rotation.rotate();

    expect(report.transitions).toEqual([
      'BackingUp',
      'GeneratingKeys',
      'UpdatingConfig',
      'UpdatingUsers',
      'Restarting',
      'Idle',
    ]);
    expect(rotation.state).toBe('Idle');
    expect(report.updatedUsers).toEqual(['alice', 'bob']);
    expect(report.failedUsers).toEqual([]);
    expect(report.restart.ok).toBe(true);

    const cfg = store.load();
    const newPrivate = privateKeyOf(cfg);
    expect(newPrivate).not.toBe(REALITY_PRIVATE_KEY);
    expect(newPrivate && keys.derivePublicKey(newPrivate)).toBe(report.publicKey);
    expect(realitySettings(cfg)?.shortIds).toEqual([SHORT_ID]);
    expect(store.staleCaches(cfg)).toEqual([]);

    for (const name of ['alice', 'bob']) {
      const record = registry.read('vless', name);
      expect(record.public_key).toBe(report.publicKey);
      expect(record.private_key).toBe(newPrivate);
      expect(record.short_id).toBe(SHORT_ID);
      expect(registry.readLink('vless', name)).toBe(`${buildConnectionUri(record)}\n`);
    }

    expect(fs.readFileSync(report.backupPath, 'utf-8')).toBe(originalContent);
  });

  it('should let a second rotation supersede the first everywhere', async () => {
    const first = await coordinator().rotate();
    const second = await coordinator().rotate();

    expect(second.publicKey).not.toBe(first.publicKey);
    expect(store.readCaches().publicKey).toBe(second.publicKey);
    expect(registry.list('vless').map((r) => r.public_key)).toEqual([second.publicKey, second.publicKey]);
    expect(store.listBackups()).toHaveLength(2);
  });

  it('should report per-user failures as a partial rotation and recover on re-run', async () => {
    qr.failFor = (text) => text.endsWith('#bob');

    const err = await rejectionOf(coordinator().rotate());

    expect(err.code).toBe('PartialRotation');
    const cfg = store.load();
    const rotatedPublic = store.serverKeys(cfg)?.publicKey;
    expect(registry.read('vless', 'alice').public_key).toBe(rotatedPublic);
    expect(runtime.calls).toEqual(['up']);

    qr.failFor = undefined;
    const report = await coordinator().rotate();
    expect(report.failedUsers).toEqual([]);
    expect(registry.read('vless', 'bob').public_key).toBe(report.publicKey);
  });

  it('should abort without mutation when the crypto provider fails', async () => {
    const broken = new KeyMaterialGenerator({
      ...nodeCryptoProvider,
      generateX25519: () => {
        throw new Error('x25519 unsupported');
      },
    });
    const rotation = coordinator({ keys: broken });

    const err = await rejectionOf(rotation.rotate());

    expect(err.code).toBe('CryptoUnavailable');
    expect(rotation.state).toBe('Idle');
    expect(fs.readFileSync(ctx.configPath, 'utf-8')).toBe(originalContent);
    expect(runtime.calls).toEqual([]);
  });

  it('should abort before key generation when the backup fails', async () => {
    const err = await rejectionOf(coordinator({ store: new FailingBackupStore(ctx, keys) }).rotate());

    expect(err.code).toBe('BackupFailed');
    expect(fs.readFileSync(ctx.configPath, 'utf-8')).toBe(originalContent);
  });

  it('should restore the backup when the document update fails', async () => {
    const failing = new FailingCommitStore(ctx, keys);

    const err = await rejectionOf(coordinator({ store: failing }).rotate());

    expect(err.code).toBe('RuntimeFailure');
    expect(err.message).toBe('disk full');
    expect(fs.readFileSync(ctx.configPath, 'utf-8')).toBe(originalContent);
    expect(registry.read('vless', 'alice').private_key).toBe(REALITY_PRIVATE_KEY);
  });

  it('should report a restart failure without reverting the keys', async () => {
    runtime.failOn = 'up';

    const report = await coordinator().rotate();

    expect(report.restart).toEqual({ ok: false, code: 'RuntimeFailure', error: 'up failed' });
    expect(privateKeyOf(store.load())).not.toBe(REALITY_PRIVATE_KEY);
    expect(registry.read('vless', 'alice').public_key).toBe(report.publicKey);
  });

  it('should refuse an instance without server keys', async () => {
    const plain = testContext(workDir, 'shadowsocks');
    writeDocument(plain, {
      inbounds: [
        {
          port: 8388,
          protocol: 'shadowsocks',
          settings: { clients: [] },
          streamSettings: { network: 'tcp', security: 'none' },
        },
      ],
    });

    const err = await rejectionOf(coordinator({ store: new ConfigDocumentStore(plain, keys) }).rotate());

    expect(err.code).toBe('InvalidInput');
    expect(new ConfigDocumentStore(plain, keys).listBackups()).toEqual([]);
  });
});
