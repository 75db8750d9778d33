// Path: src/commands/status.ts
// Show installed instances and their runtime state

import type { Command } from 'commander';
import chalk from 'chalk';
import { getSettingsPath } from '../lib/config/index.js';
import { describeProbe } from '../services/container/index.js';
import type { InstanceStatus } from '../services/engine/index.js';
import type { ProtocolKind } from '../types/protocol.js';
import { createEngine, parseProtocol, printJson, runWithSpinner } from './shared.js';
import type { JsonCommandOptions } from './types.js';

function runningLabel(running: boolean | null): string {
  if (running === null) return chalk.yellow('unknown');
  return running ? chalk.green('running') : chalk.red('stopped');
}

function printInstance(status: InstanceStatus): void {
  console.log();
  console.log(`  ${chalk.cyan(status.protocol)}`);
  if (!status.installed) {
    console.log('    Not installed');
    return;
  }
  console.log(`    Container:   ${runningLabel(status.running)}`);
  console.log(`    Port:        ${status.caches?.port ?? chalk.gray('no cache')}`);
  console.log(`    Users:       ${status.users}`);
  if (status.caches?.publicKey) {
    console.log(`    Public Key:  ${status.caches.publicKey}`);
  }
  const last = status.recentProbes.at(-1);
  if (last) {
    console.log(`    Last probe:  ${describeProbe(last)} ${chalk.gray(`(${last.timestamp})`)}`);
  }
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show installed instances and container state')
    .argument('[protocol]', 'Limit to one protocol', parseProtocol)
    .option('--json', 'Output as JSON')
    .addHelpText('after', `
Examples:
  vpn-warden status         # Human-readable status
  vpn-warden status --json  # JSON output for scripting
`)
    .action(async (protocol: ProtocolKind | undefined, options: JsonCommandOptions) => {
      const engine = createEngine();
      const statuses = await runWithSpinner(engine, 'status', { protocol }, 'Reading status', true);

      if (options.json === true) {
        printJson({ settingsPath: getSettingsPath(), instances: statuses });
        return;
      }

      console.log();
      console.log(chalk.bold('VPN Instances'));

      if (statuses.length === 0) {
        console.log();
        console.log('  No instances installed');
        console.log('  Run ' + chalk.cyan('vpn-warden install <protocol>') + ' to add one.');
      }
      for (const status of statuses) {
        printInstance(status);
      }

      console.log();
      console.log(chalk.gray(`Settings: ${getSettingsPath()}`));
      console.log();
    });
}
