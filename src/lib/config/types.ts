// Path: src/lib/config/types.ts
// Engine settings type definitions

import type { FirewallKind } from '../../services/firewall.js';

/**
 * Health wait tuning for container restarts
 */
export interface HealthSettings {
  /** Overall wait before a container is declared unhealthy (ms) */
  timeoutMs: number;
  /** Delay between probes (ms) */
  pollIntervalMs: number;
  /** Probe results kept in memory per instance */
  historySize: number;
}

/**
 * Engine settings
 */
export interface EngineSettings {
  /** Root directory holding one directory per installed protocol */
  workDir: string;
  /** Public address placed in connection links; empty means autodetect */
  serverHost: string;
  /** Reality camouflage SNI for new installs */
  defaultSni: string;
  /** Firewall controller */
  firewall: FirewallKind;
  health: HealthSettings;
  /** Rotation backups kept per instance */
  backupRetention: number;
  /** Age after which an instance lock is treated as abandoned (ms) */
  lockStaleMs: number;
  /** Render users/<name>.png next to each record */
  writeQrImages: boolean;
  /** Port of the diagnostics server started by `serve` */
  diagnosticsPort: number;
}

/**
 * Default settings
 */
export const DEFAULT_SETTINGS: EngineSettings = {
  workDir: '/opt/vpn-warden',
  serverHost: '',
  defaultSni: 'addons.mozilla.org',
  firewall: 'ufw',
  health: {
    timeoutMs: 30000,
    pollIntervalMs: 1000,
    historySize: 10,
  },
  backupRetention: 10,
  lockStaleMs: 600000,
  writeQrImages: true,
  diagnosticsPort: 9100,
};
