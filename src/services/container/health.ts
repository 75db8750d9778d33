// Path: src/services/container/health.ts
// Health signals: process-ready log marker and port reachability

import net from 'node:net';
import { PROTOCOL_TRAITS, type ProtocolKind, type ServerContext } from '../../types/protocol.js';
import type { ContainerRuntime } from './runtime.js';

/**
 * One health-check attempt. Only the most recent attempts are retained.
 */
export interface HealthProbeResult {
  timestamp: string;
  reachable: boolean;
  processReady: boolean;
  attempt: number;
}

export interface HealthSignals {
  /** Only log output written at or after `since` counts */
  processReady(ctx: ServerContext, since?: Date): Promise<boolean>;
  portReachable(ctx: ServerContext, port: number): Promise<boolean>;
}

export const READY_MARKERS: Record<ProtocolKind, RegExp> = {
  vless: /Xray \S+ started/,
  shadowsocks: /Xray \S+ started/,
  proxy: /Xray \S+ started/,
  wireguard: /All tunnels are now active/,
};

const LOG_TAIL_LINES = 200;

export function tcpConnect(host: string, port: number, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.connect({ host, port });
    const finish = (ok: boolean): void => {
      socket.destroy();
      resolve(ok);
    };
    socket.setTimeout(timeoutMs, () => finish(false));
    socket.once('connect', () => finish(true));
    socket.once('error', () => finish(false));
  });
}

/**
 * Signals read through the container runtime. UDP listeners cannot be probed
 * with a connect, so they count as reachable while the container runs.
 */
export class RuntimeHealthSignals implements HealthSignals {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly connectTimeoutMs = 1000
  ) {}

  async processReady(ctx: ServerContext, since?: Date): Promise<boolean> {
    const logs = await this.runtime.logs(ctx.instanceDir, LOG_TAIL_LINES, since);
    return READY_MARKERS[ctx.protocol].test(logs);
  }

  async portReachable(ctx: ServerContext, port: number): Promise<boolean> {
    if (PROTOCOL_TRAITS[ctx.protocol].transport === 'udp') {
      return this.runtime.isRunning(ctx.instanceDir);
    }
    return tcpConnect('127.0.0.1', port, this.connectTimeoutMs);
  }
}

/**
 * Operator-facing explanation of a failed probe.
 */
export function describeProbe(result: HealthProbeResult): string {
  if (!result.processReady && !result.reachable) return 'process not started and port unreachable';
  if (!result.processReady) return 'process not started';
  if (!result.reachable) return 'port unreachable';
  return 'healthy';
}
