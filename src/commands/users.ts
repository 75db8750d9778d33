// Path: src/commands/users.ts
// User commands: add, delete, edit, show, list

import type { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { qrcodeRenderer, type UserRecord } from '../services/user-registry/index.js';
import type { UserOutput } from '../services/engine/index.js';
import type { ProtocolKind } from '../types/protocol.js';
import { createEngine, parseProtocol, printJson, runWithSpinner } from './shared.js';
import type {
  ConfirmCommandOptions,
  JsonCommandOptions,
  UserAddCommandOptions,
  UserEditCommandOptions,
  UserShowCommandOptions,
} from './types.js';

async function printUser(out: UserOutput, qr: boolean): Promise<void> {
  const { record } = out;
  console.log();
  console.log(chalk.bold(record.name));
  console.log(`  Protocol:     ${record.protocol}`);
  console.log(`  Server:       ${record.server}:${record.port}`);
  if (record.address) console.log(`  Address:      ${record.address}`);
  if (record.short_id) console.log(`  Short ID:     ${record.short_id}`);
  console.log(`  Created:      ${new Date(record.created_at).toLocaleString()}`);
  console.log();
  console.log(out.link);
  if (qr) {
    console.log(await qrcodeRenderer.toTerminal(out.link));
  }
}

function listRow(record: UserRecord): string {
  const extra = record.address ?? record.short_id ?? '';
  return `  ${record.name.padEnd(24)} ${String(record.port).padEnd(6)} ${chalk.gray(extra)}`;
}

export function registerUserCommands(program: Command): void {
  const userCmd = program
    .command('user')
    .description('Manage the users of a protocol instance');

  userCmd
    .command('add')
    .description('Add a user and print its connection link')
    .argument('<protocol>', 'Installed protocol', parseProtocol)
    .argument('<name>', 'User name (letters, digits, "-" and "_")')
    .option('--id <id>', 'UUID (vless) or password (shadowsocks, proxy); generated when omitted')
    .option('--qr', 'Print the link as a QR code')
    .option('--json', 'Output as JSON')
    .addHelpText('after', `
Examples:
  vpn-warden user add vless alice --qr
  vpn-warden user add shadowsocks bob --id test-secret
  vpn-warden user add wireguard laptop --json
`)
    .action(async (protocol: ProtocolKind, name: string, options: UserAddCommandOptions) => {
      const engine = createEngine();
      const out = await runWithSpinner(
        engine,
        'add-user',
        { protocol, name, id: options.id },
        `Adding ${name} to ${protocol}`,
        options.json === true,
      );
      if (options.json === true) {
        printJson(out);
        return;
      }
      await printUser(out, options.qr === true);
    });

  userCmd
    .command('delete')
    .alias('rm')
    .description('Remove a user from the instance and delete its record')
    .argument('<protocol>', 'Installed protocol', parseProtocol)
    .argument('<name>', 'User name')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (protocol: ProtocolKind, name: string, options: ConfirmCommandOptions) => {
      if (options.yes !== true) {
        const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
          { type: 'confirm', name: 'proceed', message: `Delete ${name} from ${protocol}?`, default: false },
        ]);
        if (!proceed) {
          console.log('Cancelled');
          return;
        }
      }
      const engine = createEngine();
      await runWithSpinner(engine, 'delete-user', { protocol, name }, `Deleting ${name}`);
    });

  userCmd
    .command('edit')
    .description('Rename a user or replace its identifier')
    .argument('<protocol>', 'Installed protocol', parseProtocol)
    .argument('<name>', 'Current user name')
    .option('-n, --name <name>', 'New user name')
    .option('--id <id>', 'New UUID (vless) or password (shadowsocks, proxy)')
    .option('--json', 'Output as JSON')
    .addHelpText('after', `
Examples:
  vpn-warden user edit vless alice --name carol
  vpn-warden user edit proxy bob --id test-secret
`)
    .action(async (protocol: ProtocolKind, name: string, options: UserEditCommandOptions) => {
      if (options.name === undefined && options.id === undefined) {
        console.error(chalk.red('Nothing to change: pass --name or --id'));
        process.exit(1);
      }
      const engine = createEngine();
      const out = await runWithSpinner(
        engine,
        'edit-user',
        { protocol, name, newName: options.name, newId: options.id },
        `Updating ${name}`,
        options.json === true,
      );
      if (options.json === true) {
        printJson(out);
        return;
      }
      await printUser(out, false);
    });

  userCmd
    .command('show')
    .description('Show a user record and its connection link')
    .argument('<protocol>', 'Installed protocol', parseProtocol)
    .argument('<name>', 'User name')
    .option('--qr', 'Print the link as a QR code')
    .option('--json', 'Output as JSON')
    .action(async (protocol: ProtocolKind, name: string, options: UserShowCommandOptions) => {
      const engine = createEngine();
      const out = await runWithSpinner(engine, 'show-user', { protocol, name }, `Reading ${name}`, true);
      if (options.json === true) {
        printJson(out);
        return;
      }
      await printUser(out, options.qr === true);
    });

  userCmd
    .command('list')
    .alias('ls')
    .description('List the users of an instance')
    .argument('<protocol>', 'Installed protocol', parseProtocol)
    .option('--json', 'Output as JSON')
    .action(async (protocol: ProtocolKind, options: JsonCommandOptions) => {
      const engine = createEngine();
      const records = await runWithSpinner(engine, 'list-users', { protocol }, `Listing ${protocol} users`, true);
      if (options.json === true) {
        printJson(records);
        return;
      }

      if (records.length === 0) {
        console.log(`No ${protocol} users`);
        return;
      }
      console.log();
      console.log(chalk.bold(`${protocol} users`));
      console.log();
      for (const record of records) {
        console.log(listRow(record));
      }
      console.log();
      console.log(`Total: ${records.length} user(s)`);
    });
}
