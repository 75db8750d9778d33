// Path: src/services/engine/types.ts
// Engine command table: one input and one output type per verb

import type { EngineError } from '../../utils/error.js';
import type { ProtocolKind } from '../../types/protocol.js';
import type { CachedScalars } from '../config-store/caches.js';
import type { HealthProbeResult } from '../container/health.js';
import type { RestartReport } from '../container/lifecycle.js';
import type { FirewallReport } from '../firewall.js';
import type { PortRequest } from '../port-allocator.js';
import type { AuditReport, HealResult } from '../auditor.js';
import type { RotationReport } from '../rotation.js';
import type { UserRecord } from '../user-registry/types.js';
import type { CleanupStats } from '../../utils/startup-cleanup.js';

interface ProtocolInput {
  protocol: ProtocolKind;
}

interface UserInput extends ProtocolInput {
  name: string;
}

export interface InstallInput extends ProtocolInput {
  port?: PortRequest;
  /** VLESS only; defaults to true */
  reality?: boolean;
  sni?: string;
}

export interface InstallOutput {
  protocol: ProtocolKind;
  port: number;
  publicKey?: string;
  firewall: FirewallReport;
  health: HealthProbeResult;
}

export interface UninstallOutput {
  protocol: ProtocolKind;
  port: number | null;
  firewall: FirewallReport;
}

export interface AddUserInput extends UserInput {
  /** UUID (vless) or password (shadowsocks, proxy); generated when omitted */
  id?: string;
}

export interface EditUserInput extends UserInput {
  newName?: string;
  newId?: string;
}

export interface UserOutput {
  record: UserRecord;
  link: string;
  health?: HealthProbeResult;
}

export interface RestartOutput {
  restart: RestartReport;
  health: HealthProbeResult;
}

export interface HealInput extends ProtocolInput {
  allowDelete?: boolean;
}

export interface HealOutput {
  audit: AuditReport;
  results: HealResult[];
}

export interface StatusInput {
  protocol?: ProtocolKind;
}

export interface InstanceStatus {
  protocol: ProtocolKind;
  installed: boolean;
  /** Null when the runtime could not be queried */
  running: boolean | null;
  caches: CachedScalars | null;
  users: number;
  recentProbes: readonly HealthProbeResult[];
}

export interface CommandMap {
  install: { input: InstallInput; output: InstallOutput };
  uninstall: { input: ProtocolInput; output: UninstallOutput };
  'add-user': { input: AddUserInput; output: UserOutput };
  'delete-user': { input: UserInput; output: { name: string } };
  'edit-user': { input: EditUserInput; output: UserOutput };
  'show-user': { input: UserInput; output: UserOutput };
  'list-users': { input: ProtocolInput; output: UserRecord[] };
  'rotate-keys': { input: ProtocolInput; output: RotationReport };
  restart: { input: ProtocolInput; output: RestartOutput };
  audit: { input: ProtocolInput; output: AuditReport };
  heal: { input: HealInput; output: HealOutput };
  status: { input: StatusInput; output: InstanceStatus[] };
  cleanup: { input: StatusInput; output: CleanupStats };
}

export type CommandName = keyof CommandMap;
export type CommandInput<K extends CommandName> = CommandMap[K]['input'];
export type CommandOutput<K extends CommandName> = CommandMap[K]['output'];

export type CommandHandlers = {
  [K in CommandName]: (input: CommandInput<K>) => Promise<CommandOutput<K>>;
};

/**
 * Structured outcome handed to the CLI and diagnostics layers; engine
 * commands never throw past this boundary.
 */
export type EngineResult<T> = { ok: true; data: T } | { ok: false; error: EngineError };
