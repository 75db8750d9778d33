// Path: src/utils/lock.ts
// Single-flight lock file per protocol instance directory

import fs from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { createLogger } from '../lib/logger.js';
import { EngineError, isMissingFileError } from './error.js';
import { readTextIfExists } from './file.js';

const log = createLogger({ module: 'lock' });

export const LOCK_FILE_NAME = '.lock';

export interface InstanceLock {
  readonly path: string;
  readonly token: string;
  /** Remove the lock file if this holder still owns it */
  release(): void;
}

function isStale(lockPath: string, staleMs: number): boolean {
  try {
    return Date.now() - fs.statSync(lockPath).mtimeMs >= staleMs;
  } catch (err) {
    if (isMissingFileError(err)) return true;
    throw err;
  }
}

/**
 * Acquire the lock for an instance directory using O_EXCL creation.
 * A lock older than staleMs is considered abandoned and replaced.
 *
 * @throws EngineError InstanceLocked when another holder owns a fresh lock
 */
export function acquireInstanceLock(instanceDir: string, staleMs: number): InstanceLock {
  const lockPath = path.join(instanceDir, LOCK_FILE_NAME);
  const token = `${process.pid}:${randomUUID()}`;

  fs.mkdirSync(instanceDir, { recursive: true, mode: 0o750 });

  if (fs.existsSync(lockPath) && isStale(lockPath, staleMs)) {
    log.warn({ lockPath }, 'Stale lock file detected, removing');
    fs.rmSync(lockPath, { force: true });
  }

  let fd: number;
  try {
    fd = fs.openSync(lockPath, fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL, 0o644);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EEXIST') {
      const holder = (readTextIfExists(lockPath) ?? '').trim();
      throw new EngineError(
        `Instance ${instanceDir} is locked by another operation (${holder || 'unknown holder'})`,
        'InstanceLocked',
        { metadata: { lockPath, holder } }
      );
    }
    throw err;
  }

  try {
    fs.writeSync(fd, token);
  } finally {
    fs.closeSync(fd);
  }
  log.debug({ lockPath }, 'Lock acquired');

  return {
    path: lockPath,
    token,
    release(): void {
      const current = readTextIfExists(lockPath);
      if (current?.trim() !== token) {
        log.warn({ lockPath }, 'Lock no longer owned, leaving it in place');
        return;
      }
      fs.rmSync(lockPath, { force: true });
      log.debug({ lockPath }, 'Lock released');
    },
  };
}

/**
 * Run fn while holding the instance lock; the lock is released even when fn throws.
 */
export async function withInstanceLock<T>(
  instanceDir: string,
  staleMs: number,
  fn: () => Promise<T>
): Promise<T> {
  const lock = acquireInstanceLock(instanceDir, staleMs);
  try {
    return await fn();
  } finally {
    lock.release();
  }
}
