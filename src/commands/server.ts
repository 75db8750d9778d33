// Path: src/commands/server.ts
// Instance commands: install, uninstall, restart, rotate-keys

import type { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import type { FirewallReport } from '../services/firewall.js';
import type { RotationReport } from '../services/rotation.js';
import type { PortRequest } from '../services/port-allocator.js';
import type { ProtocolKind } from '../types/protocol.js';
import { createEngine, parsePort, parseProtocol, printEngineError, printJson, runWithSpinner } from './shared.js';
import type {
  ConfirmCommandOptions,
  InstallCommandOptions,
  JsonCommandOptions,
  RotateCommandOptions,
  UninstallCommandOptions,
} from './types.js';

async function confirm(message: string, options: ConfirmCommandOptions): Promise<boolean> {
  if (options.yes === true) return true;
  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    { type: 'confirm', name: 'proceed', message, default: false },
  ]);
  return proceed;
}

function printFirewall(report: FirewallReport): void {
  if (report.allowed.length > 0) console.log(`  Firewall:     allowed ${report.allowed.join(', ')}`);
  if (report.removed.length > 0) console.log(`  Firewall:     removed ${report.removed.join(', ')}`);
  if (report.retained.length > 0) console.log(chalk.gray(`  Retained:     ${report.retained.join(', ')}`));
}

function printRotation(report: RotationReport): void {
  console.log();
  console.log(`  Backup:       ${report.backupPath}`);
  console.log(`  Public Key:   ${report.publicKey}`);
  console.log(`  Users:        ${report.updatedUsers.length} updated`);
  for (const failure of report.failedUsers) {
    console.log(chalk.yellow(`    ${failure.name}: ${failure.error}`));
  }
  if (report.restart.ok) {
    console.log(`  Restart:      ${chalk.green('healthy')}`);
  } else {
    console.log(`  Restart:      ${chalk.red(report.restart.error)}`);
  }
  console.log();
}

export function registerServerCommands(program: Command): void {
  program
    .command('install')
    .description('Install a protocol instance and start its container')
    .argument('<protocol>', 'vless, shadowsocks, wireguard or proxy', parseProtocol)
    .option('-p, --port <port>', 'Listening port (random in 10000-65000 when omitted)', parsePort)
    .option('--fixed', 'Use --port as given, without range or availability checks')
    .option('--sni <host>', 'Reality camouflage SNI')
    .option('--no-reality', 'VLESS without Reality')
    .option('--json', 'Output as JSON')
    .addHelpText('after', `
Examples:
  vpn-warden install vless
  vpn-warden install vless --port 8443 --sni www.example.com
  vpn-warden install wireguard --port 51820
  vpn-warden install proxy --port 443 --fixed
`)
    .action(async (protocol: ProtocolKind, options: InstallCommandOptions) => {
      const engine = createEngine();
      let port: PortRequest | undefined;
      if (options.port !== undefined) {
        port = { mode: options.fixed === true ? 'fixed' : 'manual', port: options.port };
      }

      const out = await runWithSpinner(
        engine,
        'install',
        { protocol, port, sni: options.sni, reality: options.reality },
        `Installing ${protocol}`,
        options.json === true,
      );

      if (options.json === true) {
        printJson(out);
        return;
      }

      console.log();
      console.log(`  Protocol:     ${chalk.cyan(out.protocol)}`);
      console.log(`  Port:         ${out.port}`);
      if (out.publicKey) console.log(`  Public Key:   ${out.publicKey}`);
      printFirewall(out.firewall);
      console.log();
      console.log('Add a user with ' + chalk.cyan(`vpn-warden user add ${out.protocol} <name>`));
    });

  program
    .command('uninstall')
    .description('Stop and remove a protocol instance with its users')
    .argument('<protocol>', 'Installed protocol', parseProtocol)
    .option('-y, --yes', 'Skip confirmation')
    .option('--json', 'Output as JSON')
    .action(async (protocol: ProtocolKind, options: UninstallCommandOptions) => {
      if (!(await confirm(`Remove ${protocol} and all of its users?`, options))) {
        console.log('Cancelled');
        return;
      }
      const engine = createEngine();
      const out = await runWithSpinner(engine, 'uninstall', { protocol }, `Removing ${protocol}`, options.json === true);

      if (options.json === true) {
        printJson(out);
        return;
      }
      printFirewall(out.firewall);
    });

  program
    .command('restart')
    .description('Reconcile the container descriptor and restart the container')
    .argument('<protocol>', 'Installed protocol', parseProtocol)
    .option('--json', 'Output as JSON')
    .action(async (protocol: ProtocolKind, options: JsonCommandOptions) => {
      const engine = createEngine();
      const out = await runWithSpinner(engine, 'restart', { protocol }, `Restarting ${protocol}`, options.json === true);

      if (options.json === true) {
        printJson(out);
        return;
      }
      const { descriptor } = out.restart;
      if (descriptor.regenerated) {
        console.log(chalk.gray('  Descriptor regenerated from template'));
      } else if (descriptor.changed) {
        console.log(chalk.gray(`  Descriptor ports repaired (was ${descriptor.previousPorts.join(', ')})`));
      }
      console.log(`  Mode:         ${out.restart.recreated ? 'recreated' : 'restarted in place'}`);
      console.log(`  Healthy at:   attempt ${out.health.attempt}`);
    });

  program
    .command('rotate-keys')
    .description('Generate a new server keypair and propagate it to every user')
    .argument('<protocol>', 'vless (Reality) or wireguard', parseProtocol)
    .option('-y, --yes', 'Skip confirmation')
    .option('--json', 'Output as JSON')
    .addHelpText('after', `
Existing client links stop working after rotation; every user needs the new link.
`)
    .action(async (protocol: ProtocolKind, options: RotateCommandOptions) => {
      if (!(await confirm(`Rotate the ${protocol} server keys? Existing client links will stop working.`, options))) {
        console.log('Cancelled');
        return;
      }
      const engine = createEngine();
      const result = await engine.execute('rotate-keys', { protocol });

      if (result.ok) {
        if (options.json === true) {
          printJson(result.data);
          return;
        }
        console.log(chalk.green(`✓ Rotated ${protocol} keys`));
        printRotation(result.data);
        if (!result.data.restart.ok) process.exit(1);
        return;
      }

      if (options.json === true) {
        printJson({ code: result.error.code, error: result.error.message, metadata: result.error.metadata });
      } else {
        printEngineError(result.error);
        const report = result.error.metadata?.report;
        if (isRotationReport(report)) printRotation(report);
        if (result.error.code === 'PartialRotation') {
          console.log('Run ' + chalk.cyan(`vpn-warden rotate-keys ${protocol}`) + ' again to finish.');
        }
      }
      process.exit(1);
    });
}

function isRotationReport(value: unknown): value is RotationReport {
  return typeof value === 'object' && value !== null && 'failedUsers' in value && 'updatedUsers' in value;
}
