// Path: src/lib/config/validate.ts
// Settings validation

import path from 'node:path';
import type { ValidationError, ValidationResult, ValidationWarning } from '../validation.js';
import type { EngineSettings } from './types.js';

function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate engine settings, with field-level errors and warnings.
 */
export function validateSettings(settings: EngineSettings): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  if (!path.isAbsolute(settings.workDir)) {
    errors.push({ field: 'workDir', message: 'Work directory must be an absolute path', value: settings.workDir });
  }

  if (settings.serverHost && /[\s/@#?]/.test(settings.serverHost)) {
    errors.push({ field: 'serverHost', message: 'Server host must be a bare hostname or IP address', value: settings.serverHost });
  }
  if (!settings.serverHost) {
    warnings.push({
      field: 'serverHost',
      message: 'Server host not set, the first external IPv4 address will be used',
      suggestion: 'Set serverHost when the server sits behind NAT',
    });
  }

  if (!settings.defaultSni || !/^[A-Za-z0-9.-]+$/.test(settings.defaultSni)) {
    errors.push({ field: 'defaultSni', message: 'Default SNI must be a hostname', value: settings.defaultSni });
  }

  const { timeoutMs, pollIntervalMs, historySize } = settings.health;
  if (!isPositiveInt(timeoutMs)) {
    errors.push({ field: 'health.timeoutMs', message: 'Health timeout must be a positive integer', value: timeoutMs });
  }
  if (!isPositiveInt(pollIntervalMs)) {
    errors.push({ field: 'health.pollIntervalMs', message: 'Poll interval must be a positive integer', value: pollIntervalMs });
  } else if (isPositiveInt(timeoutMs) && pollIntervalMs > timeoutMs) {
    warnings.push({
      field: 'health.pollIntervalMs',
      message: 'Poll interval is longer than the health timeout, only one probe will run',
    });
  }
  if (!isPositiveInt(historySize)) {
    errors.push({ field: 'health.historySize', message: 'History size must be a positive integer', value: historySize });
  }

  if (!Number.isInteger(settings.backupRetention) || settings.backupRetention < 1) {
    errors.push({ field: 'backupRetention', message: 'Keep at least one backup', value: settings.backupRetention });
  }
  if (!isPositiveInt(settings.lockStaleMs)) {
    errors.push({ field: 'lockStaleMs', message: 'Lock stale age must be a positive integer', value: settings.lockStaleMs });
  } else if (settings.lockStaleMs < settings.health.timeoutMs) {
    warnings.push({
      field: 'lockStaleMs',
      message: 'Locks may be treated as stale while a restart is still waiting for health',
      suggestion: `Use at least ${settings.health.timeoutMs}`,
    });
  }

  if (!Number.isInteger(settings.diagnosticsPort) || settings.diagnosticsPort < 1 || settings.diagnosticsPort > 65535) {
    errors.push({ field: 'diagnosticsPort', message: 'Diagnostics port must be between 1 and 65535', value: settings.diagnosticsPort });
  }

  return { valid: errors.length === 0, errors, warnings };
}
