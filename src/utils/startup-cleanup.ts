// Path: src/utils/startup-cleanup.ts
// Startup cleanup of files left behind by interrupted commands

import fs from 'node:fs';
import path from 'node:path';
import { logger } from '../lib/logger.js';

const log = logger.child({ module: 'startup-cleanup' });

/**
 * Temp files written by writeAtomic: {name}.tmp.{pid}
 */
const TEMP_FILE_PATTERN = /^.+\.tmp\.(\d+)$/;

/**
 * Rotation backups: config.json.backup.{YYYYMMDD_HHMMSS_mmm}[-n]
 */
const BACKUP_FILE_PATTERN = /^config\.json\.backup\.\d{8}_\d{6}/;

export interface CleanupStats {
  tempFilesRemoved: number;
  backupFilesRemoved: number;
  errors: number;
}

export interface CleanupOptions {
  /** Keep this many newest rotation backups per directory; undefined keeps all */
  backupRetention?: number;
}

/**
 * Clean up orphaned temporary files and surplus rotation backups.
 *
 * Temp files owned by the running process are left alone.
 *
 * @param directories - Directories to scan (missing ones are skipped)
 */
export function cleanupOrphanedFiles(directories: string[], options: CleanupOptions = {}): CleanupStats {
  const stats: CleanupStats = {
    tempFilesRemoved: 0,
    backupFilesRemoved: 0,
    errors: 0,
  };

  for (const dir of new Set(directories)) {
    if (!dir) continue;

    if (!fs.existsSync(dir)) {
      log.debug({ dir }, 'Directory does not exist, skipping cleanup');
      continue;
    }

    let files: string[];
    try {
      files = fs.readdirSync(dir);
    } catch (err) {
      stats.errors++;
      log.warn({ err, dir }, 'Failed to scan directory for orphaned files');
      continue;
    }

    for (const file of files) {
      const match = TEMP_FILE_PATTERN.exec(file);
      if (!match || Number(match[1]) === process.pid) continue;

      const filePath = path.join(dir, file);
      try {
        if (!fs.statSync(filePath).isFile()) continue;
        fs.unlinkSync(filePath);
        stats.tempFilesRemoved++;
        log.info({ path: filePath }, 'Cleaned up orphaned temp file');
      } catch (err) {
        stats.errors++;
        log.warn({ path: filePath, err }, 'Failed to clean orphaned temp file');
      }
    }

    if (options.backupRetention === undefined) continue;

    // Timestamps sort lexicographically, newest last
    const backups = files.filter((f) => BACKUP_FILE_PATTERN.test(f)).sort();
    const surplus = backups.slice(0, Math.max(0, backups.length - options.backupRetention));
    for (const file of surplus) {
      const filePath = path.join(dir, file);
      try {
        fs.unlinkSync(filePath);
        stats.backupFilesRemoved++;
        log.info({ path: filePath }, 'Pruned old config backup');
      } catch (err) {
        stats.errors++;
        log.warn({ path: filePath, err }, 'Failed to prune config backup');
      }
    }
  }

  if (stats.tempFilesRemoved > 0 || stats.backupFilesRemoved > 0) {
    log.info(stats, 'Startup cleanup completed');
  }

  return stats;
}
