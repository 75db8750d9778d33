// Path: src/services/config-store/store.ts
// Config Document Store: the authoritative document, its caches and backups

import fs from 'node:fs';
import path from 'node:path';
import { createLogger } from '../../lib/logger.js';
import { parseInboundConfig } from '../../lib/validation.js';
import { EngineError, extractErrorMessage } from '../../utils/error.js';
import { readTextIfExists, writeAtomic } from '../../utils/file.js';
import type { KeyMaterialGenerator } from '../key-material.js';
import { PROTOCOL_TRAITS, type ServerContext } from '../../types/protocol.js';
import { serverPrivateKey } from './document.js';
import {
  diffCaches,
  expectedCaches,
  readCaches,
  writeCaches,
  type CachedScalars,
  type CacheName,
} from './caches.js';
import type { InboundConfig } from './types.js';

const log = createLogger({ module: 'config-store' });

const BACKUP_PREFIX = 'config.json.backup.';

export function serializeConfigDocument(cfg: InboundConfig): string {
  return JSON.stringify(cfg, null, 2) + '\n';
}

/**
 * Load and validate an InboundConfig document.
 *
 * @throws EngineError NotFound when the file is missing
 * @throws EngineError ConfigCorrupt when it is not valid JSON or fails validation
 */
export function loadConfigDocument(configPath: string): InboundConfig {
  const content = readTextIfExists(configPath);
  if (content === null) {
    throw new EngineError(`Config document not found: ${configPath}`, 'NotFound', { metadata: { configPath } });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new EngineError(`Config document is not valid JSON: ${extractErrorMessage(err)}`, 'ConfigCorrupt', {
      cause: err,
      metadata: { configPath },
    });
  }

  const { config, result } = parseInboundConfig(raw);
  if (!config) {
    throw new EngineError(`Config document failed validation: ${configPath}`, 'ConfigCorrupt', {
      metadata: { configPath, errors: result.errors },
    });
  }
  for (const warning of result.warnings) {
    log.warn({ configPath, field: warning.field }, warning.message);
  }
  return config;
}

/**
 * Validate then atomically replace the document. An invalid document is never written.
 *
 * @throws EngineError ConfigCorrupt
 */
export function saveConfigDocument(cfg: InboundConfig, configPath: string): void {
  const serialized = serializeConfigDocument(cfg);
  const { result } = parseInboundConfig(JSON.parse(serialized));
  if (!result.valid) {
    throw new EngineError('Refusing to save an invalid config document', 'ConfigCorrupt', {
      metadata: { configPath, errors: result.errors },
    });
  }
  writeAtomic(configPath, serialized, { mode: 0o600, fsync: true });
  log.debug({ configPath }, 'Config document saved');
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** YYYYMMDD_HHMMSS_mmm in UTC */
export function backupStamp(now: Date): string {
  return (
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}_` +
    `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}_` +
    pad(now.getUTCMilliseconds(), 3)
  );
}

/**
 * Copy the document to a timestamped backup beside it. Never overwrites an
 * existing backup.
 *
 * @throws EngineError BackupFailed
 */
export function backupConfigDocument(configPath: string, now: Date = new Date()): string {
  const base = path.join(path.dirname(configPath), `${BACKUP_PREFIX}${backupStamp(now)}`);

  for (let attempt = 0; attempt < 100; attempt++) {
    const target = attempt === 0 ? base : `${base}-${attempt}`;
    try {
      fs.copyFileSync(configPath, target, fs.constants.COPYFILE_EXCL);
      fs.chmodSync(target, 0o600);
      log.info({ backup: target }, 'Config document backed up');
      return target;
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'EEXIST') continue;
      throw new EngineError(`Cannot back up config document: ${extractErrorMessage(err)}`, 'BackupFailed', {
        cause: err,
        metadata: { configPath, target },
      });
    }
  }
  throw new EngineError('Cannot find a free backup file name', 'BackupFailed', { metadata: { configPath } });
}

export function listBackups(configDir: string): string[] {
  if (!fs.existsSync(configDir)) return [];
  return fs
    .readdirSync(configDir)
    .filter((f) => f.startsWith(BACKUP_PREFIX))
    .sort()
    .map((f) => path.join(configDir, f));
}

/**
 * Repository over one protocol instance's document and cache files.
 */
export class ConfigDocumentStore {
  constructor(
    readonly ctx: ServerContext,
    private readonly keys: KeyMaterialGenerator
  ) {}

  exists(): boolean {
    return fs.existsSync(this.ctx.configPath);
  }

  load(): InboundConfig {
    return loadConfigDocument(this.ctx.configPath);
  }

  save(cfg: InboundConfig): void {
    saveConfigDocument(cfg, this.ctx.configPath);
  }

  /**
   * Save the document, then rebuild caches from it. Caches are always written
   * after the document.
   */
  commit(cfg: InboundConfig): CacheName[] {
    this.save(cfg);
    return this.rebuildCaches(cfg);
  }

  backup(now?: Date): string {
    return backupConfigDocument(this.ctx.configPath, now);
  }

  restore(backupPath: string): void {
    writeAtomic(this.ctx.configPath, fs.readFileSync(backupPath), { mode: 0o600, fsync: true });
    log.warn({ backup: backupPath }, 'Config document restored from backup');
  }

  listBackups(): string[] {
    return listBackups(this.ctx.configDir);
  }

  derivePublicKey(privateKey: string): string {
    return this.keys.derivePublicKey(privateKey, PROTOCOL_TRAITS[this.ctx.protocol].keyEncoding);
  }

  /**
   * Server keypair implied by the document, or null when the instance has none.
   */
  serverKeys(cfg: InboundConfig): { privateKey: string; publicKey: string } | null {
    const privateKey = serverPrivateKey(cfg);
    return privateKey === undefined ? null : { privateKey, publicKey: this.derivePublicKey(privateKey) };
  }

  expectedCaches(cfg: InboundConfig): CachedScalars {
    return expectedCaches(cfg, (key) => this.derivePublicKey(key));
  }

  readCaches(): CachedScalars {
    return readCaches(this.ctx.configDir);
  }

  staleCaches(cfg: InboundConfig): CacheName[] {
    return diffCaches(this.expectedCaches(cfg), this.readCaches());
  }

  /**
   * Write each cache file from the document. Idempotent.
   */
  rebuildCaches(cfg: InboundConfig): CacheName[] {
    const changed = writeCaches(this.ctx.configDir, this.expectedCaches(cfg));
    if (changed.length > 0) {
      log.debug({ protocol: this.ctx.protocol, changed }, 'Caches rebuilt');
    }
    return changed;
  }
}
