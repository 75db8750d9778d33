// Path: src/commands/serve.ts
// Run the read-only diagnostics HTTP server in the foreground

import type { Command } from 'commander';
import chalk from 'chalk';
import { createLogger, flushLogs } from '../lib/logger.js';
import { loadSettings } from '../lib/config/index.js';
import { startHealthServer, stopHealthServer } from '../lib/health.js';
import { extractErrorMessage } from '../utils/error.js';
import { createEngine, parsePort } from './shared.js';
import type { ServeCommandOptions } from './types.js';

const log = createLogger({ module: 'serve' });

function onSignal(signal: NodeJS.Signals): void {
  log.info({ signal }, 'Shutting down');
  stopHealthServer()
    .then(flushLogs)
    .then(() => process.exit(0))
    .catch((e: unknown) => {
      log.error({ err: e }, 'Shutdown error');
      process.exit(1);
    });
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Serve /health, /live and /audit/:protocol over HTTP')
    .option('-p, --port <port>', 'Listen port (default: diagnosticsPort setting)', parsePort)
    .option('--host <host>', 'Listen address', '127.0.0.1')
    .addHelpText('after', `
Examples:
  vpn-warden serve
  vpn-warden serve --port 9200
  curl http://127.0.0.1:9100/audit/vless
`)
    .action(async (options: ServeCommandOptions) => {
      const engine = createEngine();
      const port = options.port ?? loadSettings().diagnosticsPort;

      try {
        await startHealthServer(engine, port, options.host);
      } catch (err) {
        console.error(chalk.red('Error:'), extractErrorMessage(err));
        process.exit(1);
      }

      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);
      console.log(`Diagnostics on http://${options.host}:${port}`);
    });
}
