// Path: src/services/firewall.ts
// Firewall allow-rule reconciliation across all protocol instances

import fs from 'node:fs';
import path from 'node:path';
import { createLogger } from '../lib/logger.js';
import { instanceDirFor } from '../lib/context.js';
import { runSafe, whichSafe } from '../utils/shell.js';
import { writeAtomic, readTextIfExists } from '../utils/file.js';
import { extractErrorMessage } from '../utils/error.js';
import { PROTOCOLS, PROTOCOL_TRAITS, type ProtocolKind, type Transport } from '../types/protocol.js';

const log = createLogger({ module: 'firewall' });

export const FIREWALL_LEDGER_FILE = 'firewall-ports.json';

export type FirewallKind = 'ufw' | 'none';

export interface FirewallController {
  readonly kind: FirewallKind;
  allow(port: number, transport: Transport): Promise<void>;
  remove(port: number, transport: Transport): Promise<void>;
}

export class UfwFirewall implements FirewallController {
  readonly kind = 'ufw';

  async allow(port: number, transport: Transport): Promise<void> {
    await runSafe('ufw', ['allow', `${port}/${transport}`]);
  }

  async remove(port: number, transport: Transport): Promise<void> {
    await runSafe('ufw', ['delete', 'allow', `${port}/${transport}`]);
  }
}

export class NoFirewall implements FirewallController {
  readonly kind = 'none';

  allow(): Promise<void> {
    return Promise.resolve();
  }

  remove(): Promise<void> {
    return Promise.resolve();
  }
}

/**
 * Falls back to no firewall when ufw is configured but not on PATH.
 */
export function createFirewall(
  kind: FirewallKind,
  locate: (command: string) => string | null = whichSafe
): FirewallController {
  if (kind === 'none') {
    return new NoFirewall();
  }
  if (locate('ufw') === null) {
    log.warn('ufw not found, firewall rules will not be managed');
    return new NoFirewall();
  }
  return new UfwFirewall();
}

export interface CommittedPorts {
  /** "port/transport" rules referenced by readable instance documents */
  rules: Map<string, ProtocolKind>;
  ports: Map<ProtocolKind, number>;
  /** Instances whose document could not be read */
  unreadable: ProtocolKind[];
}

function ruleKey(port: number, transport: Transport): string {
  return `${port}/${transport}`;
}

function parseRule(rule: string): { port: number; transport: Transport } | null {
  const match = /^(\d+)\/(tcp|udp)$/.exec(rule);
  if (!match) return null;
  return { port: Number(match[1]), transport: match[2] === 'udp' ? 'udp' : 'tcp' };
}

function readPrimaryPort(configPath: string): number | null {
  const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || !('inbounds' in parsed) || !Array.isArray(parsed.inbounds)) {
    return null;
  }
  const primary: unknown = parsed.inbounds[0];
  if (typeof primary !== 'object' || primary === null || !('port' in primary)) {
    return null;
  }
  return typeof primary.port === 'number' && Number.isInteger(primary.port) ? primary.port : null;
}

/**
 * Scan every installed instance document under workDir for its listening port.
 */
export function scanCommittedPorts(workDir: string): CommittedPorts {
  const result: CommittedPorts = { rules: new Map(), ports: new Map(), unreadable: [] };

  for (const protocol of PROTOCOLS) {
    const configPath = path.join(instanceDirFor(workDir, protocol), 'config', 'config.json');
    if (!fs.existsSync(configPath)) continue;

    let port: number | null;
    try {
      port = readPrimaryPort(configPath);
    } catch (err) {
      log.warn({ protocol, err: extractErrorMessage(err) }, 'Cannot read instance document for port scan');
      port = null;
    }

    if (port === null) {
      result.unreadable.push(protocol);
      continue;
    }
    result.ports.set(protocol, port);
    result.rules.set(ruleKey(port, PROTOCOL_TRAITS[protocol].transport), protocol);
  }

  return result;
}

function readLedger(ledgerPath: string): Set<string> {
  const content = readTextIfExists(ledgerPath);
  if (content === null) return new Set();
  try {
    const parsed: unknown = JSON.parse(content);
    if (Array.isArray(parsed)) {
      return new Set(parsed.filter((entry): entry is string => typeof entry === 'string' && parseRule(entry) !== null));
    }
  } catch (err) {
    log.warn({ ledgerPath, err: extractErrorMessage(err) }, 'Firewall ledger unreadable, starting empty');
  }
  return new Set();
}

export interface ReconcileFirewallInput {
  workDir: string;
  /** Committed port to allow; omitted when the instance was removed */
  port?: number;
  transport: Transport;
  /** Port the instance used before this change, a removal candidate */
  previousPort?: number;
  firewall: FirewallController;
}

export interface FirewallReport {
  allowed: string[];
  removed: string[];
  /** Candidates kept because some instance still references them or a scan failed */
  retained: string[];
}

/**
 * Ensure an allow-rule exists for the committed port and drop rules this tool
 * opened earlier that no installed instance references any more.
 *
 * Only rules recorded in the ledger (plus previousPort) are ever removed, so
 * rules the operator added by hand stay untouched. When any instance document
 * is unreadable, no rule is removed.
 */
export async function reconcileFirewall(input: ReconcileFirewallInput): Promise<FirewallReport> {
  const ledgerPath = path.join(input.workDir, FIREWALL_LEDGER_FILE);
  const ledger = readLedger(ledgerPath);
  const committed = scanCommittedPorts(input.workDir);
  const report: FirewallReport = { allowed: [], removed: [], retained: [] };

  let current: string | null = null;
  if (input.port !== undefined) {
    current = ruleKey(input.port, input.transport);
    await input.firewall.allow(input.port, input.transport);
    ledger.add(current);
    report.allowed.push(current);
  }

  const candidates = new Set(ledger);
  if (input.previousPort !== undefined) {
    candidates.add(ruleKey(input.previousPort, input.transport));
  }
  if (current !== null) {
    candidates.delete(current);
  }

  for (const rule of [...candidates].sort()) {
    const parsed = parseRule(rule);
    if (!parsed) continue;

    if (committed.rules.has(rule) || committed.unreadable.length > 0) {
      report.retained.push(rule);
      continue;
    }

    await input.firewall.remove(parsed.port, parsed.transport);
    ledger.delete(rule);
    report.removed.push(rule);
  }

  writeAtomic(ledgerPath, JSON.stringify([...ledger].sort(), null, 2) + '\n', { mode: 0o644 });
  log.info({ ...report, firewall: input.firewall.kind }, 'Firewall reconciled');
  return report;
}
