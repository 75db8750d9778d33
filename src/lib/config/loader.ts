// Path: src/lib/config/loader.ts
// Settings loading with environment variable overrides

import fs from 'node:fs';
import os from 'node:os';
import { configLogger as log } from '../logger.js';
import { EngineError, extractErrorMessage } from '../../utils/error.js';
import { DEFAULT_SETTINGS, type EngineSettings, type HealthSettings } from './types.js';
import { getConfigFile, getUserConfig } from './storage.js';
import { validateSettings } from './validate.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge a parsed settings object over the defaults, keeping only fields of the
 * right type. Field values are checked by validateSettings afterwards.
 */
export function mergeSettings(raw: unknown): EngineSettings {
  const src = isRecord(raw) ? raw : {};
  const healthSrc = isRecord(src.health) ? src.health : {};

  const str = (key: string, fallback: string): string => {
    const value = src[key];
    return typeof value === 'string' ? value : fallback;
  };
  const num = (obj: Record<string, unknown>, key: string, fallback: number): number => {
    const value = obj[key];
    return typeof value === 'number' ? value : fallback;
  };

  const health: HealthSettings = {
    timeoutMs: num(healthSrc, 'timeoutMs', DEFAULT_SETTINGS.health.timeoutMs),
    pollIntervalMs: num(healthSrc, 'pollIntervalMs', DEFAULT_SETTINGS.health.pollIntervalMs),
    historySize: num(healthSrc, 'historySize', DEFAULT_SETTINGS.health.historySize),
  };
  const firewall = src.firewall === 'none' || src.firewall === 'ufw' ? src.firewall : DEFAULT_SETTINGS.firewall;

  return {
    workDir: str('workDir', DEFAULT_SETTINGS.workDir),
    serverHost: str('serverHost', DEFAULT_SETTINGS.serverHost),
    defaultSni: str('defaultSni', DEFAULT_SETTINGS.defaultSni),
    firewall,
    health,
    backupRetention: num(src, 'backupRetention', DEFAULT_SETTINGS.backupRetention),
    lockStaleMs: num(src, 'lockStaleMs', DEFAULT_SETTINGS.lockStaleMs),
    writeQrImages: typeof src.writeQrImages === 'boolean' ? src.writeQrImages : DEFAULT_SETTINGS.writeQrImages,
    diagnosticsPort: num(src, 'diagnosticsPort', DEFAULT_SETTINGS.diagnosticsPort),
  };
}

/**
 * Apply environment variable overrides.
 *
 * - VPN_WARDEN_WORK_DIR: instance root
 * - VPN_WARDEN_SERVER_HOST: public address for links
 * - VPN_WARDEN_FIREWALL: "ufw" or "none"
 * - VPN_WARDEN_HEALTH_TIMEOUT_MS: health wait timeout
 */
export function applyEnvOverrides(settings: EngineSettings, env: NodeJS.ProcessEnv = process.env): EngineSettings {
  const next = { ...settings, health: { ...settings.health } };
  if (env.VPN_WARDEN_WORK_DIR) {
    next.workDir = env.VPN_WARDEN_WORK_DIR;
  }
  if (env.VPN_WARDEN_SERVER_HOST) {
    next.serverHost = env.VPN_WARDEN_SERVER_HOST;
  }
  if (env.VPN_WARDEN_FIREWALL === 'ufw' || env.VPN_WARDEN_FIREWALL === 'none') {
    next.firewall = env.VPN_WARDEN_FIREWALL;
  }
  if (env.VPN_WARDEN_HEALTH_TIMEOUT_MS) {
    const timeout = Number.parseInt(env.VPN_WARDEN_HEALTH_TIMEOUT_MS, 10);
    if (Number.isFinite(timeout)) {
      next.health.timeoutMs = timeout;
    }
  }
  return next;
}

/**
 * Load settings from the system file, else the per-user store, with environment overrides.
 *
 * @throws EngineError InvalidInput when the merged settings fail validation
 */
export function loadSettings(): EngineSettings {
  let raw: unknown;

  const configFile = getConfigFile();
  if (fs.existsSync(configFile)) {
    try {
      raw = JSON.parse(fs.readFileSync(configFile, 'utf-8'));
      log.debug({ path: configFile }, 'Loaded system settings');
    } catch (err) {
      throw new EngineError(`Cannot read settings file ${configFile}: ${extractErrorMessage(err)}`, 'InvalidInput', {
        cause: err,
      });
    }
  } else if (process.env.VPN_WARDEN_CONFIG_DIR) {
    // Custom settings dir without a file: defaults only, never the user store
    raw = {};
    log.debug({ path: configFile }, 'Using default settings for custom config dir');
  } else {
    const store = getUserConfig();
    raw = store.store;
    log.debug({ path: store.path }, 'Loaded user settings');
  }

  const settings = applyEnvOverrides(mergeSettings(raw));
  const result = validateSettings(settings);
  for (const warning of result.warnings) {
    log.warn({ field: warning.field, suggestion: warning.suggestion }, warning.message);
  }
  if (!result.valid) {
    throw new EngineError('Invalid settings', 'InvalidInput', { metadata: { errors: result.errors } });
  }
  return settings;
}

/**
 * The configured public address, or the first external IPv4 address.
 */
export function resolveServerHost(settings: EngineSettings): string {
  if (settings.serverHost) {
    return settings.serverHost;
  }
  for (const addresses of Object.values(os.networkInterfaces())) {
    for (const address of addresses ?? []) {
      if (address.family === 'IPv4' && !address.internal) {
        log.debug({ address: address.address }, 'Autodetected server host');
        return address.address;
      }
    }
  }
  throw new EngineError('Cannot detect a public address; set serverHost', 'InvalidInput');
}

/**
 * Get settings file path for display
 */
export function getSettingsPath(): string {
  const configFile = getConfigFile();
  if (fs.existsSync(configFile) || process.env.VPN_WARDEN_CONFIG_DIR) {
    return configFile;
  }
  return getUserConfig().path;
}
