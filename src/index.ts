#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { registerServerCommands } from './commands/server.js';
import { registerUserCommands } from './commands/users.js';
import { registerDoctorCommands } from './commands/doctor.js';
import { registerStatusCommand } from './commands/status.js';
import { registerServeCommand } from './commands/serve.js';

// Read version from package.json at runtime
function getVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(__dirname, '..', 'package.json');
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? '0.0.0';
  } catch {
    return '0.0.0';
  }
}
const version = getVersion();

const program = new Command();

program
  .name('vpn-warden')
  .description('Install VPN protocol instances and keep their users, keys and containers consistent')
  .version(version);

// Register commands
registerServerCommands(program);
registerUserCommands(program);
registerDoctorCommands(program);
registerStatusCommand(program);
registerServeCommand(program);

// Parse arguments
program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
