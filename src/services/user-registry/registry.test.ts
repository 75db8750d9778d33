// Path: src/services/user-registry/registry.test.ts
// Tests for the user credential registry

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { UserCredentialRegistry, parseUserRecord } from './registry.js';
import type { ServerMeta } from './types.js';
import { EngineError } from '../../utils/error.js';
import { FakeQrRenderer } from '../../testing/fakes.js';
import { ALICE_UUID, BOB_UUID, TEST_HOST, makeWorkDir, removeWorkDir } from '../../testing/fixtures.js';

vi.mock('../../lib/logger.js', () => ({
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

const META: ServerMeta = {
  port: 443,
  server: TEST_HOST,
  sni: 'addons.mozilla.org',
  privateKey: 'server-private-test',
  publicKey: 'server-public-test',
};

const NOW = new Date('2024-03-01T12:00:00.000Z');

async function codeOf(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (err) {
    return err instanceof EngineError ? err.code : 'not-an-engine-error';
  }
  return undefined;
}

describe('UserCredentialRegistry', () => {
  let workDir: string;
  let qr: FakeQrRenderer;
  let registry: UserCredentialRegistry;

  beforeEach(() => {
    workDir = makeWorkDir();
    qr = new FakeQrRenderer();
    registry = new UserCredentialRegistry(workDir, qr);
  });

  afterEach(() => {
    removeWorkDir(workDir);
  });

  it('should write the record, its link and its QR image', async () => {
    const record = await registry.create('vless', 'alice', { uuid: ALICE_UUID, shortId: 'aabbccdd00112233' }, META, NOW);
    const dir = registry.usersDir('vless');

    expect(record).toEqual({
      name: 'alice',
      uuid: ALICE_UUID,
      port: 443,
      server: TEST_HOST,
      sni: 'addons.mozilla.org',
      private_key: 'server-private-test',
      public_key: 'server-public-test',
      short_id: 'aabbccdd00112233',
      protocol: 'vless',
      created_at: '2024-03-01T12:00:00.000Z',
    });
    expect(JSON.parse(fs.readFileSync(path.join(dir, 'alice.json'), 'utf-8'))).toEqual(record);

    const link = `vless://${ALICE_UUID}@203.0.113.10:443?encryption=none&flow=xtls-rprx-vision&security=reality` +
      '&sni=addons.mozilla.org&fp=chrome&pbk=server-public-test&sid=aabbccdd00112233&type=tcp&headerType=none#alice';
    expect(fs.readFileSync(path.join(dir, 'alice.link'), 'utf-8')).toBe(`${link}\n`);
    expect(fs.readFileSync(path.join(dir, 'alice.png'), 'utf-8')).toBe(`QR:${link}`);
  });

  it('should keep protocol namespaces apart', async () => {
    await registry.create('vless', 'shared', { uuid: ALICE_UUID }, META, NOW);
    await registry.create('wireguard', 'shared', { uuid: 'wg-client-key', privateKey: 'wg-client-key', address: '10.66.66.2/32' }, { ...META, port: 51820 }, NOW);

    const vless = registry.list('vless');
    const wireguard = registry.list('wireguard');

    expect(vless.map((r) => [r.name, r.protocol])).toEqual([['shared', 'vless']]);
    expect(wireguard.map((r) => [r.name, r.protocol])).toEqual([['shared', 'wireguard']]);
    expect(wireguard[0].private_key).toBe('wg-client-key');
  });

  it('should refuse a second record with the same name in one namespace', async () => {
    await registry.create('vless', 'alice', { uuid: ALICE_UUID }, META, NOW);

    expect(await codeOf(registry.create('vless', 'alice', { uuid: BOB_UUID }, META, NOW))).toBe('DuplicateName');
  });

  it('should regenerate the link when a record is updated', async () => {
    await registry.create('vless', 'alice', { uuid: ALICE_UUID }, META, NOW);

    const updated = await registry.update('vless', 'alice', (r) => ({ ...r, port: 8443 }));

    expect(updated.created_at).toBe('2024-03-01T12:00:00.000Z');
    expect(registry.readLink('vless', 'alice')).toBe(
      `vless://${ALICE_UUID}@203.0.113.10:8443?encryption=none&security=none&type=tcp#alice\n`
    );
  });

  it('should move sidecars when an update renames the user', async () => {
    await registry.create('vless', 'alice', { uuid: ALICE_UUID }, META, NOW);

    await registry.update('vless', 'alice', (r) => ({ ...r, name: 'alicia' }));

    expect(fs.readdirSync(registry.usersDir('vless')).sort()).toEqual(['alicia.json', 'alicia.link', 'alicia.png']);
  });

  it('should report reads, updates and deletes of unknown users as NotFound', async () => {
    expect(() => registry.read('vless', 'ghost')).toThrow(EngineError);
    expect(await codeOf(registry.update('vless', 'ghost', (r) => r))).toBe('NotFound');
    expect(await codeOf(Promise.resolve().then(() => registry.delete('vless', 'ghost')))).toBe('NotFound');
  });

  it('should delete every sidecar', async () => {
    await registry.create('vless', 'alice', { uuid: ALICE_UUID }, META, NOW);

    registry.delete('vless', 'alice');

    expect(fs.readdirSync(registry.usersDir('vless'))).toEqual([]);
  });

  it('should separate unreadable record files during a scan', async () => {
    await registry.create('vless', 'alice', { uuid: ALICE_UUID }, META, NOW);
    fs.writeFileSync(path.join(registry.usersDir('vless'), 'broken.json'), '{"name": "broken"}');

    const scan = registry.scan('vless');

    expect(scan.records.map((r) => r.name)).toEqual(['alice']);
    expect(scan.unreadable).toEqual(['broken']);
  });

  it('should surface QR renderer failures', async () => {
    qr.failFor = () => true;

    expect(await codeOf(registry.create('vless', 'alice', { uuid: ALICE_UUID }, META, NOW))).toBe('RuntimeFailure');
  });

  it('should skip QR images when disabled', async () => {
    const noImages = new UserCredentialRegistry(workDir, qr, { writeQrImages: false });

    await noImages.create('proxy', 'carol', { uuid: 'test-secret' }, { ...META, port: 1080 }, NOW);

    expect(fs.readdirSync(noImages.usersDir('proxy')).sort()).toEqual(['carol.json', 'carol.link']);
    expect(qr.rendered).toEqual([]);
  });
});

describe('parseUserRecord', () => {
  it('should reject records missing required fields', () => {
    expect(parseUserRecord({ name: 'x' })).toBeNull();
    expect(parseUserRecord('text')).toBeNull();
  });

  it('should reject unknown protocols', () => {
    expect(parseUserRecord({
      name: 'a', uuid: 'u', port: 1, server: 's', sni: '', private_key: '', public_key: '', protocol: 'trojan',
    })).toBeNull();
  });
});
