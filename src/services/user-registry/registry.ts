// Path: src/services/user-registry/registry.ts
// User Credential Registry: per-protocol sidecar records, links and QR images

import fs from 'node:fs';
import path from 'node:path';
import { createLogger } from '../../lib/logger.js';
import { instanceDirFor } from '../../lib/context.js';
import { EngineError, extractErrorMessage, wrapError } from '../../utils/error.js';
import { readTextIfExists, removeIfExists, writeAtomic } from '../../utils/file.js';
import { safeJoinPath } from '../../utils/path.js';
import { isProtocolKind, type ProtocolKind } from '../../types/protocol.js';
import { buildConnectionUri } from './links.js';
import type { QrRenderer } from './qr.js';
import type { ServerMeta, UserIdentity, UserRecord } from './types.js';

const log = createLogger({ module: 'user-registry' });

const SIDECAR_EXTENSIONS = ['.json', '.link', '.png'] as const;

export interface RegistryOptions {
  /** Render users/<name>.png alongside each record */
  writeQrImages: boolean;
}

export interface RegistryScan {
  records: UserRecord[];
  /** Names whose record file exists but cannot be parsed */
  unreadable: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed record file.
 *
 * @returns the typed record, or null when a required field is missing or mistyped
 */
export function parseUserRecord(raw: unknown): UserRecord | null {
  if (!isRecord(raw)) return null;
  const { name, uuid, port, server, sni, private_key, public_key, short_id, protocol, created_at, address } = raw;
  if (
    typeof name !== 'string' ||
    typeof uuid !== 'string' ||
    typeof port !== 'number' ||
    typeof server !== 'string' ||
    typeof sni !== 'string' ||
    typeof private_key !== 'string' ||
    typeof public_key !== 'string' ||
    typeof protocol !== 'string' ||
    !isProtocolKind(protocol)
  ) {
    return null;
  }
  return {
    name,
    uuid,
    port,
    server,
    sni,
    private_key,
    public_key,
    ...(typeof short_id === 'string' ? { short_id } : {}),
    protocol,
    created_at: typeof created_at === 'string' ? created_at : '',
    ...(typeof address === 'string' ? { address } : {}),
  };
}

/**
 * Build a record from a client identity and server-wide values.
 */
export function projectRecord(
  protocol: ProtocolKind,
  name: string,
  identity: UserIdentity,
  meta: ServerMeta,
  createdAt: string
): UserRecord {
  return {
    name,
    uuid: identity.uuid,
    port: meta.port,
    server: meta.server,
    sni: meta.sni,
    private_key: identity.privateKey ?? meta.privateKey,
    public_key: meta.publicKey,
    ...(identity.shortId === undefined ? {} : { short_id: identity.shortId }),
    protocol,
    created_at: createdAt,
    ...(identity.address === undefined ? {} : { address: identity.address }),
  };
}

/**
 * Records are namespaced by protocol: <workDir>/<protocol>/users/<name>.*,
 * so the same name may exist under several protocols.
 */
export class UserCredentialRegistry {
  constructor(
    private readonly workDir: string,
    private readonly qr: QrRenderer,
    private readonly options: RegistryOptions = { writeQrImages: true }
  ) {}

  usersDir(protocol: ProtocolKind): string {
    return path.join(instanceDirFor(this.workDir, protocol), 'users');
  }

  private sidecar(protocol: ProtocolKind, name: string, ext: (typeof SIDECAR_EXTENSIONS)[number]): string {
    return safeJoinPath(this.usersDir(protocol), `${name}${ext}`);
  }

  exists(protocol: ProtocolKind, name: string): boolean {
    return fs.existsSync(this.sidecar(protocol, name, '.json'));
  }

  /**
   * @throws EngineError DuplicateName when a record already exists
   */
  async create(
    protocol: ProtocolKind,
    name: string,
    identity: UserIdentity,
    meta: ServerMeta,
    now: Date = new Date()
  ): Promise<UserRecord> {
    if (this.exists(protocol, name)) {
      throw new EngineError(`User "${name}" already has a ${protocol} record`, 'DuplicateName', {
        metadata: { protocol, name },
      });
    }
    const record = projectRecord(protocol, name, identity, meta, now.toISOString());
    await this.put(record);
    log.info({ protocol, name }, 'User record created');
    return record;
  }

  /**
   * @returns the record, or null when none exists
   * @throws EngineError ConfigCorrupt when the file exists but is malformed
   */
  tryRead(protocol: ProtocolKind, name: string): UserRecord | null {
    const filePath = this.sidecar(protocol, name, '.json');
    const content = readTextIfExists(filePath);
    if (content === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new EngineError(`User record ${filePath} is not valid JSON`, 'ConfigCorrupt', { cause: err });
    }
    const record = parseUserRecord(raw);
    if (!record) {
      throw new EngineError(`User record ${filePath} is missing required fields`, 'ConfigCorrupt', {
        metadata: { filePath },
      });
    }
    return record;
  }

  /**
   * @throws EngineError NotFound
   */
  read(protocol: ProtocolKind, name: string): UserRecord {
    const record = this.tryRead(protocol, name);
    if (!record) {
      throw new EngineError(`User "${name}" has no ${protocol} record`, 'NotFound', { metadata: { protocol, name } });
    }
    return record;
  }

  /**
   * Apply mutator to an existing record and regenerate its link and QR image.
   * A mutator that changes the name moves the sidecars.
   *
   * @throws EngineError NotFound
   */
  async update(protocol: ProtocolKind, name: string, mutator: (record: UserRecord) => UserRecord): Promise<UserRecord> {
    const current = this.read(protocol, name);
    const next = { ...mutator(current), protocol };

    if (next.name !== name && this.exists(protocol, next.name)) {
      throw new EngineError(`User "${next.name}" already has a ${protocol} record`, 'DuplicateName', {
        metadata: { protocol, name: next.name },
      });
    }

    await this.put(next);
    if (next.name !== name) {
      this.removeSidecars(protocol, name);
    }
    log.debug({ protocol, name, newName: next.name }, 'User record updated');
    return next;
  }

  /**
   * Write a record with its derived link and QR image, replacing any previous files.
   */
  async put(record: UserRecord): Promise<void> {
    const { protocol, name } = record;
    const link = buildConnectionUri(record);

    writeAtomic(this.sidecar(protocol, name, '.json'), JSON.stringify(record, null, 2) + '\n', {
      mode: 0o600,
      dirMode: 0o700,
    });
    writeAtomic(this.sidecar(protocol, name, '.link'), link.endsWith('\n') ? link : `${link}\n`, {
      mode: 0o600,
      dirMode: 0o700,
    });

    if (this.options.writeQrImages) {
      try {
        await this.qr.toFile(this.sidecar(protocol, name, '.png'), link);
      } catch (err) {
        throw wrapError(err, 'RuntimeFailure', { protocol, name, artifact: 'qr' });
      }
    }
  }

  /**
   * @throws EngineError NotFound
   */
  delete(protocol: ProtocolKind, name: string): void {
    if (!this.exists(protocol, name)) {
      throw new EngineError(`User "${name}" has no ${protocol} record`, 'NotFound', { metadata: { protocol, name } });
    }
    this.removeSidecars(protocol, name);
    log.info({ protocol, name }, 'User record deleted');
  }

  private removeSidecars(protocol: ProtocolKind, name: string): void {
    for (const ext of SIDECAR_EXTENSIONS) {
      removeIfExists(this.sidecar(protocol, name, ext));
    }
  }

  readLink(protocol: ProtocolKind, name: string): string | null {
    return readTextIfExists(this.sidecar(protocol, name, '.link'));
  }

  /**
   * Scan the protocol namespace, separating malformed record files.
   */
  scan(protocol: ProtocolKind): RegistryScan {
    const dir = this.usersDir(protocol);
    const result: RegistryScan = { records: [], unreadable: [] };
    if (!fs.existsSync(dir)) return result;

    const names = fs
      .readdirSync(dir)
      .filter((f) => f.endsWith('.json'))
      .map((f) => f.slice(0, -'.json'.length))
      .sort();

    for (const name of names) {
      try {
        const record = this.tryRead(protocol, name);
        if (record) result.records.push(record);
      } catch (err) {
        log.warn({ protocol, name, err: extractErrorMessage(err) }, 'Skipping unreadable user record');
        result.unreadable.push(name);
      }
    }
    return result;
  }

  list(protocol: ProtocolKind): UserRecord[] {
    return this.scan(protocol).records;
  }
}
