// Path: src/services/port-allocator.ts
// Listening port selection with bind-based liveness checks

import net from 'node:net';
import dgram from 'node:dgram';
import { createLogger } from '../lib/logger.js';
import { EngineError } from '../utils/error.js';
import type { Transport } from '../types/protocol.js';

const log = createLogger({ module: 'port-allocator' });

export const RANDOM_PORT_RANGE: PortRange = { min: 10000, max: 65000 };
export const RANDOM_PORT_ATTEMPTS = 20;
export const FALLBACK_PORT = 10443;
export const MIN_MANUAL_PORT = 1024;
export const MAX_PORT = 65535;

export interface PortRange {
  min: number;
  max: number;
}

export type PortRequest =
  | { mode: 'random'; range?: PortRange }
  | { mode: 'manual'; port: number }
  | { mode: 'fixed'; port: number };

/**
 * A candidate port and its availability verdict at allocation time.
 */
export interface PortLease {
  port: number;
  free: boolean;
}

export interface PortProbe {
  isFree(port: number, transport: Transport): Promise<boolean>;
}

interface ServerError extends Error {
  code?: string;
}

function isTcpPortFree(port: number): Promise<boolean> {
  return new Promise((resolve, reject) => {
    const server = new net.Server();
    server.once('error', (error: ServerError) => {
      if (error.code === 'EADDRINUSE' || error.code === 'EACCES') {
        resolve(false);
      } else {
        reject(error);
      }
    });
    server.listen({ port, exclusive: true }, () => {
      server.close(() => resolve(true));
    });
  });
}

function isUdpPortFree(port: number): Promise<boolean> {
  return new Promise((resolve, reject) => {
    const socket = dgram.createSocket('udp4');
    socket.once('error', (error: ServerError) => {
      socket.close();
      if (error.code === 'EADDRINUSE' || error.code === 'EACCES') {
        resolve(false);
      } else {
        reject(error);
      }
    });
    socket.bind(port, () => {
      socket.close(() => resolve(true));
    });
  });
}

/**
 * Liveness check by attempting to bind the port.
 */
export const bindProbe: PortProbe = {
  isFree: (port, transport) => (transport === 'udp' ? isUdpPortFree(port) : isTcpPortFree(port)),
};

export interface AllocateOptions {
  transport: Transport;
  probe?: PortProbe;
  /** Ports committed by other protocol instances */
  excluded?: ReadonlySet<number>;
  /** Uniform [0,1) source, injectable for tests */
  random?: () => number;
}

async function lease(port: number, options: AllocateOptions): Promise<PortLease> {
  if (options.excluded?.has(port)) {
    return { port, free: false };
  }
  const probe = options.probe ?? bindProbe;
  return { port, free: await probe.isFree(port, options.transport) };
}

function assertPortNumber(port: number, min: number): void {
  if (!Number.isInteger(port) || port < min || port > MAX_PORT) {
    throw new EngineError(`Port must be an integer between ${min} and ${MAX_PORT}`, 'InvalidInput', {
      metadata: { port },
    });
  }
}

/**
 * Pick a listening port.
 *
 * - random: up to 20 uniform draws in the range, then the fixed fallback 10443
 * - manual: operator-chosen port in [1024, 65535] that must be free
 * - fixed: a known default that must be free
 *
 * @throws EngineError PortRangeExhausted when random draws and the fallback are all busy
 */
export async function allocatePort(request: PortRequest, options: AllocateOptions): Promise<number> {
  if (request.mode === 'manual' || request.mode === 'fixed') {
    assertPortNumber(request.port, request.mode === 'manual' ? MIN_MANUAL_PORT : 1);
    const candidate = await lease(request.port, options);
    if (!candidate.free) {
      throw new EngineError(`Port ${request.port} is already in use`, 'InvalidInput', {
        metadata: { port: request.port, mode: request.mode },
      });
    }
    log.debug({ port: candidate.port, mode: request.mode }, 'Port accepted');
    return candidate.port;
  }

  const range = request.range ?? RANDOM_PORT_RANGE;
  const random = options.random ?? Math.random;

  for (let attempt = 1; attempt <= RANDOM_PORT_ATTEMPTS; attempt++) {
    const port = range.min + Math.floor(random() * (range.max - range.min + 1));
    const candidate = await lease(port, options);
    if (candidate.free) {
      log.debug({ port, attempt }, 'Random port allocated');
      return port;
    }
    log.debug({ port, attempt }, 'Random port busy');
  }

  const fallback = await lease(FALLBACK_PORT, options);
  if (fallback.free) {
    log.warn({ port: FALLBACK_PORT, attempts: RANDOM_PORT_ATTEMPTS }, 'Random ports busy, using fallback port');
    return FALLBACK_PORT;
  }

  throw new EngineError(
    `No free port after ${RANDOM_PORT_ATTEMPTS} attempts in [${range.min},${range.max}] and fallback ${FALLBACK_PORT} is busy`,
    'PortRangeExhausted',
    { metadata: { range, attempts: RANDOM_PORT_ATTEMPTS, fallback: FALLBACK_PORT } }
  );
}
