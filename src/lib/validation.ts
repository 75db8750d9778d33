// Path: src/lib/validation.ts
// Structural validation for InboundConfig documents and operator input

import { EngineError } from '../utils/error.js';
import type {
  ClientEntry,
  Inbound,
  InboundConfig,
  InboundSettings,
  RealitySettings,
  StreamSettings,
} from '../services/config-store/types.js';
import { REALITY_FLOW } from '../services/config-store/types.js';

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

export interface ValidationWarning {
  field: string;
  message: string;
  suggestion?: string;
}

export const NAME_PATTERN = /^[A-Za-z0-9_-]+$/;
export const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
/** Up to 8 bytes as lowercase hex; the empty short ID is allowed */
export const SHORT_ID_PATTERN = /^(?:[0-9a-f]{2}){0,8}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

class Collector {
  readonly errors: ValidationError[] = [];
  readonly warnings: ValidationWarning[] = [];

  error(field: string, message: string, value?: unknown): void {
    this.errors.push({ field, message, value });
  }

  warn(field: string, message: string, suggestion?: string): void {
    this.warnings.push({ field, message, suggestion });
  }
}

function parseClients(raw: unknown, field: string, out: Collector): ClientEntry[] {
  if (!Array.isArray(raw)) {
    out.error(field, 'Client list must be an array', raw);
    return [];
  }

  const names = new Set<string>();
  const ids = new Set<string>();
  const clients: ClientEntry[] = [];

  raw.forEach((entry: unknown, index) => {
    const prefix = `${field}[${index}]`;
    if (!isRecord(entry)) {
      out.error(prefix, 'Client entry must be an object', entry);
      return;
    }

    const { id, email } = entry;
    if (typeof id !== 'string' || id === '') {
      out.error(`${prefix}.id`, 'Client id is required', id);
      return;
    }
    if (typeof email !== 'string' || email === '') {
      out.error(`${prefix}.email`, 'Client name is required', email);
      return;
    }
    if (names.has(email)) {
      out.error(`${prefix}.email`, `Duplicate client name "${email}"`, email);
    }
    if (ids.has(id)) {
      out.error(`${prefix}.id`, `Duplicate client id for "${email}"`);
    }
    names.add(email);
    ids.add(id);

    clients.push({
      ...entry,
      id,
      email,
      flow: optionalString(entry.flow),
      address: optionalString(entry.address),
    });
  });

  return clients;
}

function parseReality(raw: unknown, field: string, out: Collector): RealitySettings | undefined {
  if (!isRecord(raw)) {
    out.error(field, 'Reality settings are required when security is "reality"');
    return undefined;
  }

  const { privateKey, shortIds, serverNames } = raw;
  let valid = true;

  if (typeof privateKey !== 'string' || privateKey === '') {
    out.error(`${field}.privateKey`, 'Reality private key is required');
    valid = false;
  }
  if (!isStringArray(shortIds) || shortIds.length === 0) {
    out.error(`${field}.shortIds`, 'At least one short ID is required', shortIds);
    valid = false;
  } else {
    shortIds.forEach((sid, i) => {
      if (!SHORT_ID_PATTERN.test(sid)) {
        out.error(`${field}.shortIds[${i}]`, 'Short ID must be up to 16 lowercase hex characters of even length', sid);
        valid = false;
      }
    });
  }
  if (!isStringArray(serverNames) || serverNames.length === 0) {
    out.error(`${field}.serverNames`, 'At least one server name is required', serverNames);
    valid = false;
  }

  if (!valid || typeof privateKey !== 'string' || !isStringArray(shortIds) || !isStringArray(serverNames)) {
    return undefined;
  }
  return { ...raw, privateKey, shortIds: [...shortIds], serverNames: [...serverNames] };
}

function parseStream(raw: unknown, field: string, out: Collector): StreamSettings | undefined {
  if (!isRecord(raw)) {
    out.error(field, 'Stream settings are required');
    return undefined;
  }

  const { network, security } = raw;
  if (typeof network !== 'string' || network === '') {
    out.error(`${field}.network`, 'Network type is required', network);
    return undefined;
  }
  if (security !== 'none' && security !== 'reality') {
    out.error(`${field}.security`, 'Security must be "none" or "reality"', security);
    return undefined;
  }

  if (security === 'none') {
    return { ...raw, network, security };
  }

  const realitySettings = parseReality(raw.realitySettings, `${field}.realitySettings`, out);
  return realitySettings ? { ...raw, network, security, realitySettings } : undefined;
}

function parseSettings(raw: unknown, field: string, out: Collector): InboundSettings | undefined {
  if (!isRecord(raw)) {
    out.error(field, 'Inbound settings are required');
    return undefined;
  }
  const clients = parseClients(raw.clients, `${field}.clients`, out);
  return { ...raw, clients, secretKey: optionalString(raw.secretKey) };
}

function parseInbound(raw: unknown, out: Collector): Inbound | undefined {
  const field = 'inbounds[0]';
  if (!isRecord(raw)) {
    out.error(field, 'Primary inbound must be an object', raw);
    return undefined;
  }

  const { port, protocol } = raw;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
    out.error(`${field}.port`, 'Port must be an integer between 1 and 65535', port);
  }
  if (typeof protocol !== 'string' || protocol === '') {
    out.error(`${field}.protocol`, 'Protocol is required', protocol);
  }

  const settings = parseSettings(raw.settings, `${field}.settings`, out);
  const streamSettings = parseStream(raw.streamSettings, `${field}.streamSettings`, out);

  if (streamSettings?.security === 'reality' && settings) {
    settings.clients.forEach((client, i) => {
      if (client.flow !== REALITY_FLOW) {
        out.warn(
          `${field}.settings.clients[${i}].flow`,
          `Client "${client.email}" has flow "${client.flow ?? ''}" on a Reality inbound`,
          `Set flow to "${REALITY_FLOW}"`
        );
      }
    });
  }

  if (typeof port !== 'number' || typeof protocol !== 'string' || !settings || !streamSettings) {
    return undefined;
  }
  return { ...raw, port, protocol, settings, streamSettings };
}

export interface ParseOutcome {
  config: InboundConfig | null;
  result: ValidationResult;
}

/**
 * Validate a raw JSON value and build the typed document from it.
 * Unknown fields are carried over in their original key order.
 */
export function parseInboundConfig(raw: unknown): ParseOutcome {
  const out = new Collector();
  let config: InboundConfig | null = null;

  if (!isRecord(raw)) {
    out.error('', 'Document must be a JSON object');
  } else if (!Array.isArray(raw.inbounds) || raw.inbounds.length === 0) {
    out.error('inbounds', 'At least one inbound is required', raw.inbounds);
  } else {
    const [first, ...rest] = raw.inbounds;
    const primary = parseInbound(first, out);
    const extras: Record<string, unknown>[] = [];
    rest.forEach((entry: unknown, i) => {
      if (isRecord(entry)) {
        extras.push(entry);
      } else {
        out.error(`inbounds[${i + 1}]`, 'Inbound must be an object', entry);
      }
    });
    if (primary && out.errors.length === 0) {
      config = { ...raw, inbounds: [primary, ...extras] };
    }
  }

  return {
    config,
    result: { valid: out.errors.length === 0, errors: out.errors, warnings: out.warnings },
  };
}

/**
 * Format validation result for display
 */
export function formatValidationResult(result: ValidationResult): string {
  const lines: string[] = [];

  if (result.errors.length > 0) {
    lines.push('Errors:');
    for (const error of result.errors) {
      lines.push(`  ✗ ${error.field || '(document)'}: ${error.message}`);
      if (error.value !== undefined) {
        lines.push(`    Value: ${JSON.stringify(error.value)}`);
      }
    }
  }

  if (result.warnings.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push('Warnings:');
    for (const warning of result.warnings) {
      lines.push(`  ⚠ ${warning.field}: ${warning.message}`);
      if (warning.suggestion) {
        lines.push(`    Suggestion: ${warning.suggestion}`);
      }
    }
  }

  if (result.valid && result.warnings.length === 0) {
    lines.push('✓ Configuration is valid');
  } else if (result.valid) {
    lines.push('');
    lines.push('✓ Configuration is valid (with warnings)');
  }

  return lines.join('\n');
}

/**
 * @throws EngineError InvalidInput
 */
export function assertValidName(name: string): void {
  if (!NAME_PATTERN.test(name)) {
    throw new EngineError(
      `Invalid user name "${name}": use letters, digits, "_" and "-" only`,
      'InvalidInput',
      { metadata: { name } }
    );
  }
}

/**
 * @throws EngineError InvalidInput
 */
export function assertValidUuid(id: string): void {
  if (!UUID_PATTERN.test(id)) {
    throw new EngineError(`Invalid UUID "${id}"`, 'InvalidInput', { metadata: { id } });
  }
}
