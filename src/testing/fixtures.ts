// Path: src/testing/fixtures.ts
// Shared test fixtures: temp work dirs and sample documents

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createServerContext } from '../lib/context.js';
import type { ProtocolKind, ServerContext } from '../types/protocol.js';

export const TEST_HOST = '203.0.113.10';
export const ALICE_UUID = '0b6f3c6e-8d3a-4f51-9a5e-3c1d2e4f5a6b';
export const BOB_UUID = '7c2d9e41-5b6a-4c8d-8e9f-0a1b2c3d4e5f';
export const REALITY_PRIVATE_KEY = Buffer.alloc(32, 0x11).toString('base64url');

export function makeWorkDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'vpn-warden-test-'));
}

export function removeWorkDir(workDir: string): void {
  fs.rmSync(workDir, { recursive: true, force: true });
}

export function testContext(workDir: string, protocol: ProtocolKind = 'vless'): ServerContext {
  return createServerContext({ workDir, serverHost: TEST_HOST }, protocol);
}

/**
 * A Reality document with fields the engine does not manage.
 */
export function realityDocument(clients: { id: string; email: string }[] = []): Record<string, unknown> {
  return {
    log: { loglevel: 'warning' },
    inbounds: [
      {
        port: 443,
        protocol: 'vless',
        tag: 'vless-in',
        settings: {
          clients: clients.map((c) => ({ id: c.id, flow: 'xtls-rprx-vision', email: c.email, level: 0 })),
          decryption: 'none',
        },
        streamSettings: {
          network: 'tcp',
          security: 'reality',
          realitySettings: {
            show: false,
            dest: 'addons.mozilla.org:443',
            xver: 0,
            serverNames: ['addons.mozilla.org'],
            privateKey: REALITY_PRIVATE_KEY,
            shortIds: ['0123456789abcdef'],
          },
        },
        sniffing: { enabled: true, destOverride: ['http', 'tls'] },
      },
    ],
    outbounds: [{ protocol: 'freedom', tag: 'direct' }],
  };
}

export function plainVlessDocument(port = 8080): Record<string, unknown> {
  return {
    inbounds: [
      {
        port,
        protocol: 'vless',
        settings: { clients: [], decryption: 'none' },
        streamSettings: { network: 'tcp', security: 'none' },
      },
    ],
    outbounds: [{ protocol: 'freedom' }],
  };
}

export function writeDocument(ctx: ServerContext, raw: Record<string, unknown>): void {
  fs.mkdirSync(ctx.configDir, { recursive: true });
  fs.writeFileSync(ctx.configPath, JSON.stringify(raw, null, 2) + '\n');
}
