// Path: src/services/config-store/store.test.ts
// Tests for the config document store

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import {
  ConfigDocumentStore,
  addClient,
  removeClient,
  renameClient,
  addShortId,
  listClients,
  withServerPrivateKey,
  backupStamp,
  serializeConfigDocument,
  CACHE_FILES,
  type InboundConfig,
} from './index.js';
import { KeyMaterialGenerator } from '../key-material.js';
import { EngineError } from '../../utils/error.js';
import {
  ALICE_UUID,
  BOB_UUID,
  REALITY_PRIVATE_KEY,
  makeWorkDir,
  plainVlessDocument,
  realityDocument,
  removeWorkDir,
  testContext,
  writeDocument,
} from '../../testing/fixtures.js';

vi.mock('../../lib/logger.js', () => ({
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof EngineError ? err.code : 'not-an-engine-error';
  }
  return undefined;
}

describe('ConfigDocumentStore', () => {
  const keys = new KeyMaterialGenerator();
  let workDir: string;
  let store: ConfigDocumentStore;

  beforeEach(() => {
    workDir = makeWorkDir();
    store = new ConfigDocumentStore(testContext(workDir), keys);
  });

  afterEach(() => {
    removeWorkDir(workDir);
  });

  describe('load and save', () => {
    it('should round-trip a document byte for byte, unknown fields included', () => {
      writeDocument(store.ctx, realityDocument([{ id: ALICE_UUID, email: 'alice' }]));
      const original = fs.readFileSync(store.ctx.configPath, 'utf-8');

      store.save(store.load());

      expect(fs.readFileSync(store.ctx.configPath, 'utf-8')).toBe(original);
    });

    it('should change only the intended field when a client is added', () => {
      writeDocument(store.ctx, realityDocument([{ id: ALICE_UUID, email: 'alice' }]));
      const original = fs.readFileSync(store.ctx.configPath, 'utf-8');

      store.save(addClient(store.load(), 'bob', BOB_UUID, 'xtls-rprx-vision'));

      const reloaded = store.load();
      expect(listClients(reloaded)[1]).toEqual({ id: BOB_UUID, flow: 'xtls-rprx-vision', email: 'bob' });
      expect(serializeConfigDocument(removeClient(reloaded, 'bob'))).toBe(original);
    });

    it('should report a missing document as NotFound', () => {
      expect(codeOf(() => store.load())).toBe('NotFound');
    });

    it('should report unparsable and invalid documents as ConfigCorrupt', () => {
      fs.mkdirSync(store.ctx.configDir, { recursive: true });
      fs.writeFileSync(store.ctx.configPath, '{"inbounds": [');
      expect(codeOf(() => store.load())).toBe('ConfigCorrupt');

      writeDocument(store.ctx, realityDocument([
        { id: ALICE_UUID, email: 'alice' },
        { id: BOB_UUID, email: 'alice' },
      ]));
      expect(codeOf(() => store.load())).toBe('ConfigCorrupt');
    });

    it('should refuse to save an invalid document and leave the file untouched', () => {
      writeDocument(store.ctx, plainVlessDocument());
      const before = fs.readFileSync(store.ctx.configPath, 'utf-8');
      const cfg = store.load();
      const broken: InboundConfig = {
        ...cfg,
        inbounds: [{ ...cfg.inbounds[0], port: 70000 }],
      };

      expect(codeOf(() => store.save(broken))).toBe('ConfigCorrupt');
      expect(fs.readFileSync(store.ctx.configPath, 'utf-8')).toBe(before);
      expect(fs.readdirSync(store.ctx.configDir)).toEqual(['config.json']);
    });
  });

  describe('client mutations', () => {
    beforeEach(() => {
      writeDocument(store.ctx, realityDocument([
        { id: ALICE_UUID, email: 'alice' },
        { id: BOB_UUID, email: 'bob' },
      ]));
    });

    it('should reject duplicate names', () => {
      const cfg = store.load();
      expect(codeOf(() => addClient(cfg, 'alice', '9d8c7b6a-5f4e-4d3c-8b2a-1f0e9d8c7b6a', ''))).toBe('DuplicateName');
    });

    it('should report removal and rename of absent clients as NotFound', () => {
      const cfg = store.load();
      expect(codeOf(() => removeClient(cfg, 'carol'))).toBe('NotFound');
      expect(codeOf(() => renameClient(cfg, 'carol', 'dave', ALICE_UUID))).toBe('NotFound');
    });

    it('should rename in place and keep extra fields', () => {
      const renamed = renameClient(store.load(), 'alice', 'alicia', ALICE_UUID);

      expect(listClients(renamed)).toEqual([
        { id: ALICE_UUID, flow: 'xtls-rprx-vision', email: 'alicia', level: 0 },
        { id: BOB_UUID, flow: 'xtls-rprx-vision', email: 'bob', level: 0 },
      ]);
    });

    it('should refuse renaming onto another existing name', () => {
      expect(codeOf(() => renameClient(store.load(), 'alice', 'bob', ALICE_UUID))).toBe('DuplicateName');
    });

    it('should add short IDs once', () => {
      const cfg = addShortId(addShortId(store.load(), 'aabbccdd00112233'), 'aabbccdd00112233');
      const stream = cfg.inbounds[0].streamSettings;

      expect(stream.realitySettings?.shortIds).toEqual(['0123456789abcdef', 'aabbccdd00112233']);
    });
  });

  describe('caches', () => {
    it('should mirror document fields into flat files', () => {
      writeDocument(store.ctx, realityDocument());
      const cfg = store.load();

      store.rebuildCaches(cfg);

      const read = (file: string): string => fs.readFileSync(path.join(store.ctx.configDir, file), 'utf-8');
      expect(read(CACHE_FILES.protocol)).toBe('vless+reality\n');
      expect(read(CACHE_FILES.useReality)).toBe('true\n');
      expect(read(CACHE_FILES.port)).toBe('443\n');
      expect(read(CACHE_FILES.sni)).toBe('addons.mozilla.org\n');
      expect(read(CACHE_FILES.privateKey)).toBe(`${REALITY_PRIVATE_KEY}\n`);
      expect(read(CACHE_FILES.publicKey)).toBe(`${keys.derivePublicKey(REALITY_PRIVATE_KEY)}\n`);
      expect(read(CACHE_FILES.shortId)).toBe('0123456789abcdef\n');
      expect(store.staleCaches(cfg)).toEqual([]);
    });

    it('should be idempotent and only rewrite stale files', () => {
      writeDocument(store.ctx, realityDocument());
      const cfg = store.load();

      expect(store.rebuildCaches(cfg)).toHaveLength(7);
      expect(store.rebuildCaches(cfg)).toEqual([]);

      fs.writeFileSync(path.join(store.ctx.configDir, CACHE_FILES.port), '8443\n');
      expect(store.staleCaches(cfg)).toEqual(['port']);
      expect(store.rebuildCaches(cfg)).toEqual(['port']);
    });

    it('should remove key caches when the document has no Reality block', () => {
      writeDocument(store.ctx, realityDocument());
      store.rebuildCaches(store.load());
      writeDocument(store.ctx, plainVlessDocument(8080));

      const changed = store.rebuildCaches(store.load());

      expect(changed).toEqual(['protocol', 'useReality', 'port', 'sni', 'privateKey', 'publicKey', 'shortId']);
      expect(fs.readdirSync(store.ctx.configDir).sort()).toEqual([
        'config.json',
        'port.txt',
        'protocol.txt',
        'use_reality.txt',
      ]);
      expect(store.readCaches().protocol).toBe('vless');
    });

    it('should rebuild caches after the document on commit', () => {
      writeDocument(store.ctx, realityDocument());
      const rotated = withServerPrivateKey(store.load(), Buffer.alloc(32, 0x33).toString('base64url'));

      store.commit(rotated);

      expect(store.staleCaches(store.load())).toEqual([]);
      expect(store.readCaches().privateKey).toBe(Buffer.alloc(32, 0x33).toString('base64url'));
    });
  });

  describe('backups', () => {
    it('should name backups by UTC timestamp and never overwrite one', () => {
      writeDocument(store.ctx, realityDocument());
      const now = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6));

      const first = store.backup(now);
      const second = store.backup(now);

      expect(backupStamp(now)).toBe('20240102_030405_006');
      expect(path.basename(first)).toBe('config.json.backup.20240102_030405_006');
      expect(path.basename(second)).toBe('config.json.backup.20240102_030405_006-1');
      expect(store.listBackups()).toEqual([first, second]);
    });

    it('should fail with BackupFailed when there is no document', () => {
      expect(codeOf(() => store.backup())).toBe('BackupFailed');
    });
  });
});
