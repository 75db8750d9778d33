// Path: src/lib/logger.ts
// Centralized Pino logger for vpn-warden

import pino from 'pino';
import fs from 'node:fs';
import path from 'node:path';
import { createRequire } from 'node:module';

const isDev = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';
const logFile = process.env.LOG_FILE ?? (isDev ? undefined : '/var/log/vpn-warden/engine.log');

/**
 * Create file stream for logging if LOG_FILE is set
 */
function createFileStream(): pino.DestinationStream | undefined {
  if (!logFile || isDev) return undefined;

  const logDir = path.dirname(logFile);
  if (!fs.existsSync(logDir)) {
    try {
      fs.mkdirSync(logDir, { recursive: true, mode: 0o750 });
    } catch {
      // No log directory, stdout only
      return undefined;
    }
  }

  return pino.destination({
    dest: logFile,
    sync: false,
    mkdir: true,
  });
}

function isPinoPrettyAvailable(): boolean {
  try {
    createRequire(import.meta.url).resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

/**
 * Pretty output in development when pino-pretty is installed, JSON otherwise
 */
function createTransport(): pino.TransportSingleOptions | undefined {
  if (!isDev || isTest || !isPinoPrettyAvailable()) {
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

/**
 * Base logger instance
 *
 * Logs go to stderr so command output on stdout (--json, links) stays clean.
 *
 * Configure via environment variables:
 * - LOG_LEVEL: trace, debug, info, warn, error, fatal, silent (default: warn in dev, info in prod)
 * - LOG_FILE: Path to log file (default: /var/log/vpn-warden/engine.log in prod)
 */
const transport = createTransport();

export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? (isDev ? 'warn' : 'info'),
    transport,
    base: {
      service: 'vpn-warden',
      pid: process.pid,
    },
    redact: {
      paths: [
        'password',
        'secret',
        'privateKey',
        'private_key',
        'record.private_key',
        'keys.privateKey',
      ],
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  // A transport owns its own destination
  transport ? undefined : (createFileStream() ?? pino.destination(2))
);

/**
 * Create a child logger with additional context
 *
 * @example
 * const log = createLogger({ module: 'rotation' });
 * log.info({ protocol: 'vless' }, 'Rotation started');
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return logger.child(context);
}

export const configLogger = createLogger({ module: 'config' });
export const healthLogger = createLogger({ module: 'health' });

/**
 * Flush logs before process exit
 */
export async function flushLogs(): Promise<void> {
  await new Promise((resolve) => {
    logger.flush();
    setTimeout(resolve, 100);
  });
}

export type Logger = pino.Logger;
