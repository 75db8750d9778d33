// Path: src/utils/path.ts
// Guards for paths built from user names and settings

import path from 'node:path';
import { EngineError } from './error.js';

/**
 * No ".." segment and no null byte.
 */
export function isPathSafe(candidate: string): boolean {
  if (candidate.includes('\0')) {
    return false;
  }
  return !candidate.split(/[\\/]/).includes('..');
}

/**
 * @throws EngineError InvalidInput when the path is empty, relative or traverses upward
 */
export function validateOutputPath(filePath: string): void {
  if (!filePath) {
    throw new EngineError('Path cannot be empty', 'InvalidInput');
  }
  if (!path.isAbsolute(filePath)) {
    throw new EngineError(`Path must be absolute: ${filePath}`, 'InvalidInput', { metadata: { filePath } });
  }
  if (!isPathSafe(filePath)) {
    throw new EngineError(`Invalid path (potential traversal): ${filePath}`, 'InvalidInput', {
      metadata: { filePath },
    });
  }
}

/**
 * Join a file name under an absolute base directory, refusing results outside it.
 *
 * @throws EngineError InvalidInput
 */
export function safeJoinPath(baseDir: string, name: string): string {
  if (!path.isAbsolute(baseDir)) {
    throw new EngineError(`Base path must be absolute: ${baseDir}`, 'InvalidInput');
  }

  const resolved = path.resolve(baseDir, name);
  const base = path.normalize(baseDir);
  if (resolved !== base && !resolved.startsWith(base + path.sep)) {
    throw new EngineError(`Path escapes base directory: ${name}`, 'InvalidInput', { metadata: { baseDir, name } });
  }
  return resolved;
}
