// Path: src/commands/doctor.ts
// Consistency commands: audit, heal, cleanup

import type { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import type { Discrepancy, HealOutcome } from '../services/auditor.js';
import type { ProtocolKind } from '../types/protocol.js';
import { createEngine, parseProtocol, printJson, runWithSpinner } from './shared.js';
import type { HealCommandOptions, JsonCommandOptions } from './types.js';

const OUTCOME_COLORS: Record<HealOutcome, (text: string) => string> = {
  healed: chalk.green,
  skipped: chalk.yellow,
  unresolved: chalk.red,
};

function describeDiscrepancy(d: Discrepancy): string {
  const subject = d.name ? ` ${chalk.cyan(d.name)}` : '';
  const fields = d.fields && d.fields.length > 0 ? chalk.gray(` [${d.fields.join(', ')}]`) : '';
  return `${d.kind}${subject}: ${d.detail}${fields}`;
}

export function registerDoctorCommands(program: Command): void {
  program
    .command('audit')
    .description('Compare the instance document with user records and caches')
    .argument('<protocol>', 'Installed protocol', parseProtocol)
    .option('--json', 'Output as JSON')
    .addHelpText('after', `
Exits with status 2 when discrepancies are found.

Examples:
  vpn-warden audit vless
  vpn-warden audit wireguard --json
`)
    .action(async (protocol: ProtocolKind, options: JsonCommandOptions) => {
      const engine = createEngine();
      const report = await runWithSpinner(engine, 'audit', { protocol }, `Auditing ${protocol}`, options.json === true);

      if (options.json === true) {
        printJson(report);
      } else {
        if (report.degraded) {
          console.log(chalk.yellow(`  Server keys from ${report.keySource}; links may be unusable`));
        }
        if (report.discrepancies.length === 0) {
          console.log(chalk.green('  No discrepancies'));
        }
        for (const d of report.discrepancies) {
          console.log(`  ${describeDiscrepancy(d)}`);
        }
      }
      if (report.discrepancies.length > 0) process.exitCode = 2;
    });

  program
    .command('heal')
    .description('Repair user records and caches from the instance document')
    .argument('<protocol>', 'Installed protocol', parseProtocol)
    .option('--allow-delete', 'Delete records of users missing from the document')
    .option('-y, --yes', 'Skip confirmation for --allow-delete')
    .option('--json', 'Output as JSON')
    .action(async (protocol: ProtocolKind, options: HealCommandOptions) => {
      if (options.allowDelete === true && options.yes !== true) {
        const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
          { type: 'confirm', name: 'proceed', message: 'Delete orphaned user records?', default: false },
        ]);
        if (!proceed) {
          console.log('Cancelled');
          return;
        }
      }

      const engine = createEngine();
      const out = await runWithSpinner(
        engine,
        'heal',
        { protocol, allowDelete: options.allowDelete === true },
        `Healing ${protocol}`,
        options.json === true,
      );

      if (options.json === true) {
        printJson(out);
      } else if (out.results.length === 0) {
        console.log(chalk.green('  Nothing to heal'));
      } else {
        for (const result of out.results) {
          const outcome = OUTCOME_COLORS[result.outcome](result.outcome.padEnd(10));
          const error = result.error ? chalk.gray(` (${result.error})`) : '';
          console.log(`  ${outcome} ${describeDiscrepancy(result.discrepancy)}${error}`);
        }
      }
      if (out.results.some((r) => r.outcome === 'unresolved')) process.exitCode = 1;
    });

  program
    .command('cleanup')
    .description('Remove leftover temp files and rotation backups beyond the retention limit')
    .argument('[protocol]', 'Limit to one protocol', parseProtocol)
    .option('--json', 'Output as JSON')
    .action(async (protocol: ProtocolKind | undefined, options: JsonCommandOptions) => {
      const engine = createEngine();
      const stats = await runWithSpinner(engine, 'cleanup', { protocol }, 'Cleaning up', options.json === true);
      if (options.json === true) {
        printJson(stats);
        return;
      }
      console.log(`  Temp files:   ${stats.tempFilesRemoved} removed`);
      console.log(`  Backups:      ${stats.backupFilesRemoved} removed`);
      if (stats.errors > 0) console.log(chalk.yellow(`  Errors:       ${stats.errors}`));
    });
}
