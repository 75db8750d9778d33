// Path: src/lib/config/storage.ts
// Settings file location and the per-user store

import Conf from 'conf';
import path from 'node:path';
import { DEFAULT_SETTINGS, type EngineSettings } from './types.js';

/**
 * Get settings directory path - computed dynamically to support test isolation
 */
export function getConfigDir(): string {
  return process.env.VPN_WARDEN_CONFIG_DIR ?? '/etc/vpn-warden';
}

/**
 * Get settings file path
 */
export function getConfigFile(): string {
  return path.join(getConfigDir(), 'settings.json');
}

let userConfig: Conf<EngineSettings> | null = null;

/**
 * User-level settings store (development/non-root usage), created on first use
 */
export function getUserConfig(): Conf<EngineSettings> {
  userConfig ??= new Conf<EngineSettings>({
    projectName: 'vpn-warden',
    defaults: DEFAULT_SETTINGS,
  });
  return userConfig;
}
