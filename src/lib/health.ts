// Path: src/lib/health.ts
// Read-only diagnostics HTTP endpoint using Fastify

import Fastify, { type FastifyInstance } from 'fastify';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { healthLogger as log } from './logger.js';
import { isProtocolKind } from '../types/protocol.js';
import type { EngineErrorCode } from '../utils/error.js';
import type { VpnEngine } from '../services/engine/engine.js';
import type { InstanceStatus } from '../services/engine/types.js';

// Version from package.json at module load time
let engineVersion = '0.0.0';
try {
  const pkgPath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');
  const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
  engineVersion = pkg.version ?? engineVersion;
} catch (err) {
  engineVersion = process.env.npm_package_version ?? engineVersion;
  log.debug({ err }, 'package.json not found, using fallback version');
}

export type DiagnosticsEngine = Pick<VpnEngine, 'execute'>;

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  version: string;
  instances: InstanceHealth[];
}

export interface InstanceHealth {
  protocol: string;
  port: number | null;
  running: boolean | null;
  healthy: boolean;
  users: number;
  lastProbes: InstanceStatus['recentProbes'];
}

const STATUS_CODES: Partial<Record<EngineErrorCode, number>> = {
  NotFound: 404,
  InvalidInput: 400,
  ConfigCorrupt: 409,
  InstanceLocked: 423,
};

let fastifyServer: FastifyInstance | null = null;

function instanceHealth(status: InstanceStatus): InstanceHealth {
  const last = status.recentProbes.at(-1);
  const probeOk = last !== undefined && last.processReady && last.reachable;
  const port = status.caches?.port;
  return {
    protocol: status.protocol,
    port: port ? Number.parseInt(port, 10) : null,
    running: status.running,
    healthy: status.running === true && probeOk,
    users: status.users,
    lastProbes: status.recentProbes,
  };
}

/**
 * Aggregate status: unhealthy as soon as one instance is unhealthy.
 */
export function summarizeHealth(instances: InstanceHealth[]): HealthStatus['status'] {
  return instances.every((i) => i.healthy) ? 'healthy' : 'unhealthy';
}

function addDiagnosticsRoutes(fastify: FastifyInstance, engine: DiagnosticsEngine): void {
  fastify.get('/health', async (_request, reply) => {
    const result = await engine.execute('status', {});
    if (!result.ok) {
      log.error({ code: result.error.code, err: result.error.message }, 'Status query failed');
      return reply.code(500).send({ error: result.error.code, message: result.error.message });
    }
    const instances = result.data.map(instanceHealth);
    const health: HealthStatus = {
      status: summarizeHealth(instances),
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: engineVersion,
      instances,
    };
    return reply.code(health.status === 'unhealthy' ? 503 : 200).send(health);
  });

  // Liveness probe
  fastify.get('/live', async (_request, reply) => {
    return reply.send({ alive: true, timestamp: new Date().toISOString() });
  });

  fastify.get<{ Params: { protocol: string } }>('/audit/:protocol', async (request, reply) => {
    const { protocol } = request.params;
    if (!isProtocolKind(protocol)) {
      return reply.code(400).send({ error: 'InvalidInput', message: `Unknown protocol "${protocol}"` });
    }
    const result = await engine.execute('audit', { protocol });
    if (!result.ok) {
      return reply
        .code(STATUS_CODES[result.error.code] ?? 500)
        .send({ error: result.error.code, message: result.error.message });
    }
    return reply.send(result.data);
  });
}

/**
 * Create a Fastify instance with the diagnostics routes, not yet listening
 */
export function createDiagnosticsServer(engine: DiagnosticsEngine): FastifyInstance {
  const fastify = Fastify({
    logger: false, // We use our own pino logger
  });
  addDiagnosticsRoutes(fastify, engine);
  return fastify;
}

/**
 * Start the diagnostics HTTP server
 */
export async function startHealthServer(
  engine: DiagnosticsEngine,
  port: number = 9100,
  host: string = '127.0.0.1'
): Promise<FastifyInstance> {
  if (fastifyServer) {
    log.warn('Health server already running');
    return fastifyServer;
  }

  const server = createDiagnosticsServer(engine);
  try {
    await server.listen({ port, host });
    fastifyServer = server;
    log.info({ port, host }, 'Health server started');
    return server;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EADDRINUSE') {
      log.error({ port }, 'Health server port already in use');
    } else {
      log.error({ err }, 'Health server error');
    }
    throw err;
  }
}

/**
 * Stop the diagnostics HTTP server
 */
export async function stopHealthServer(): Promise<void> {
  if (fastifyServer) {
    await fastifyServer.close();
    fastifyServer = null;
    log.info('Health server stopped');
  }
}
