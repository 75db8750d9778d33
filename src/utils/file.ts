// Path: src/utils/file.ts
// Atomic writes and tolerant reads for documents, caches and sidecars

import fs from 'node:fs';
import path from 'node:path';
import { validateOutputPath } from './path.js';
import { EngineError, extractErrorMessage, isMissingFileError } from './error.js';

export interface AtomicWriteOptions {
  /** File permissions, default 0o640 */
  mode?: number;
  /** fsync the temp file before the rename */
  fsync?: boolean;
  /** Mode for parent directories created on the way, default 0o750 */
  dirMode?: number;
}

/**
 * Temp file name used by writeAtomic for a target path.
 * startup-cleanup relies on this shape to find leftovers.
 */
export function tempPathFor(filePath: string, pid: number = process.pid): string {
  return `${filePath}.tmp.${pid}`;
}

function writeSynced(tempPath: string, content: string | Buffer, mode: number): void {
  const fd = fs.openSync(tempPath, 'w', mode);
  try {
    if (typeof content === 'string') {
      fs.writeSync(fd, content);
    } else {
      fs.writeSync(fd, content, 0, content.length);
    }
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Replace filePath in one rename. Readers see either the old content or the
 * new content; a crash leaves at most a *.tmp.<pid> file behind.
 *
 * @throws EngineError InvalidInput for relative or escaping paths, RuntimeFailure when the write fails
 */
export function writeAtomic(filePath: string, content: string | Buffer, options: AtomicWriteOptions = {}): void {
  validateOutputPath(filePath);

  const mode = options.mode ?? 0o640;
  const tempPath = tempPathFor(filePath);
  ensureDir(path.dirname(filePath), options.dirMode);

  try {
    if (options.fsync === true) {
      writeSynced(tempPath, content, mode);
    } else {
      fs.writeFileSync(tempPath, content, { mode });
    }
    fs.renameSync(tempPath, filePath);
  } catch (err) {
    fs.rmSync(tempPath, { force: true });
    throw new EngineError(`Cannot write ${filePath}: ${extractErrorMessage(err)}`, 'RuntimeFailure', {
      cause: err,
      metadata: { filePath },
    });
  }
}

/**
 * Read a UTF-8 file, returning null when it does not exist.
 * Any other read failure propagates.
 */
export function readTextIfExists(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFileError(err)) {
      return null;
    }
    throw err;
  }
}

/**
 * @returns true if a file was removed
 */
export function removeIfExists(filePath: string): boolean {
  try {
    fs.unlinkSync(filePath);
    return true;
  } catch (err) {
    if (isMissingFileError(err)) {
      return false;
    }
    throw err;
  }
}

export function ensureDir(dirPath: string, mode: number = 0o750): void {
  fs.mkdirSync(dirPath, { recursive: true, mode });
}
