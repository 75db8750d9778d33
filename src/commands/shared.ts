// Path: src/commands/shared.ts
// Engine construction and result handling shared by CLI commands

import chalk from 'chalk';
import ora from 'ora';
import { InvalidArgumentError } from 'commander';
import { loadSettings, resolveServerHost } from '../lib/config/index.js';
import { formatValidationResult, type ValidationError } from '../lib/validation.js';
import { VpnEngine } from '../services/engine/index.js';
import type { CommandInput, CommandName, CommandOutput } from '../services/engine/index.js';
import { DockerComposeRuntime } from '../services/container/index.js';
import { createFirewall } from '../services/firewall.js';
import { qrcodeRenderer } from '../services/user-registry/index.js';
import { PROTOCOLS, isProtocolKind, type ProtocolKind } from '../types/protocol.js';
import { extractErrorMessage, type EngineError } from '../utils/error.js';

/**
 * Build an engine from the settings file and the local docker and firewall.
 * Exits when the settings are unusable.
 */
export function createEngine(): VpnEngine {
  try {
    const settings = loadSettings();
    return new VpnEngine({
      settings: { ...settings, serverHost: resolveServerHost(settings) },
      runtime: new DockerComposeRuntime(),
      firewall: createFirewall(settings.firewall),
      qr: qrcodeRenderer,
    });
  } catch (err) {
    console.error(chalk.red('Error:'), extractErrorMessage(err));
    process.exit(1);
  }
}

export function parseProtocol(value: string): ProtocolKind {
  if (!isProtocolKind(value)) {
    throw new InvalidArgumentError(`Must be one of: ${PROTOCOLS.join(', ')}`);
  }
  return value;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Must be an integer between 1 and 65535');
  }
  return port;
}

function isValidationErrorList(value: unknown): value is ValidationError[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'object' && v !== null && 'field' in v && 'message' in v);
}

export function printEngineError(error: EngineError): void {
  console.error(chalk.red('Error:'), error.message, chalk.gray(`(${error.code})`));
  const errors = error.metadata?.errors;
  if (isValidationErrorList(errors)) {
    console.error(formatValidationResult({ valid: false, errors, warnings: [] }));
  }
}

/**
 * Run one engine command behind a spinner. On failure the error is printed
 * and the process exits with status 1.
 */
export async function runWithSpinner<K extends CommandName>(
  engine: VpnEngine,
  kind: K,
  input: CommandInput<K>,
  text: string,
  quiet = false,
): Promise<CommandOutput<K>> {
  const spinner = quiet ? null : ora(text).start();
  const result = await engine.execute(kind, input);
  if (!result.ok) {
    spinner?.fail(text);
    printEngineError(result.error);
    process.exit(1);
  }
  spinner?.succeed(text);
  return result.data;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
