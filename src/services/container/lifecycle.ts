// Path: src/services/container/lifecycle.ts
// Container Lifecycle Manager: start, stop, restart with descriptor repair, health wait

import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { createLogger } from '../../lib/logger.js';
import { EngineError, extractErrorMessage } from '../../utils/error.js';
import { ensureDir, readTextIfExists, writeAtomic } from '../../utils/file.js';
import type { ServerContext } from '../../types/protocol.js';
import { reconcileDescriptor, type DescriptorReconcileResult } from './descriptor.js';
import { describeProbe, type HealthProbeResult, type HealthSignals } from './health.js';
import type { ContainerRuntime } from './runtime.js';

const log = createLogger({ module: 'lifecycle' });

/** Probe history file inside each instance directory */
export const HEALTH_HISTORY_FILE = 'health.json';

function isProbeResult(value: unknown): value is HealthProbeResult {
  return (
    typeof value === 'object' &&
    value !== null &&
    'timestamp' in value &&
    typeof value.timestamp === 'string' &&
    'reachable' in value &&
    typeof value.reachable === 'boolean' &&
    'processReady' in value &&
    typeof value.processReady === 'boolean' &&
    'attempt' in value &&
    typeof value.attempt === 'number'
  );
}

export interface HealthWaitOptions {
  timeoutMs: number;
  pollIntervalMs: number;
}

export interface LifecycleOptions extends HealthWaitOptions {
  /** Probe results kept per instance */
  historySize: number;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => number;
}

export interface RestartReport {
  descriptor: DescriptorReconcileResult;
  /** down + up instead of an in-place restart */
  recreated: boolean;
}

export class ContainerLifecycleManager {
  /** When each instance's current process was launched; log markers older than this are ignored */
  private readonly launchedAt = new Map<string, Date>();
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly now: () => number;

  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly signals: HealthSignals,
    private readonly options: LifecycleOptions
  ) {
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
    this.now = options.now ?? Date.now;
  }

  async start(ctx: ServerContext, port: number): Promise<DescriptorReconcileResult> {
    ensureDir(ctx.logsDir);
    const descriptor = reconcileDescriptor(ctx, port);
    this.markLaunch(ctx);
    await this.runtime.up(ctx.instanceDir);
    return descriptor;
  }

  async stop(ctx: ServerContext): Promise<void> {
    await this.runtime.down(ctx.instanceDir);
  }

  /**
   * Repair the descriptor against the committed port, then restart. A changed
   * descriptor only takes effect through down + up.
   */
  async restart(ctx: ServerContext, port: number): Promise<RestartReport> {
    ensureDir(ctx.logsDir);
    const descriptor = reconcileDescriptor(ctx, port);
    const running = await this.runtime.isRunning(ctx.instanceDir);
    this.markLaunch(ctx);

    if (descriptor.changed || !running) {
      if (running) {
        await this.runtime.down(ctx.instanceDir);
      }
      await this.runtime.up(ctx.instanceDir);
      log.info({ protocol: ctx.protocol, port, descriptorChanged: descriptor.changed }, 'Container recreated');
      return { descriptor, recreated: true };
    }

    await this.runtime.restart(ctx.instanceDir);
    log.info({ protocol: ctx.protocol, port }, 'Container restarted');
    return { descriptor, recreated: false };
  }

  /**
   * Poll both health signals until they hold together or the timeout passes.
   *
   * @throws EngineError ContainerUnhealthy carrying the last probe result
   */
  async waitHealthy(ctx: ServerContext, port: number, wait: Partial<HealthWaitOptions> = {}): Promise<HealthProbeResult> {
    const timeoutMs = wait.timeoutMs ?? this.options.timeoutMs;
    const pollIntervalMs = wait.pollIntervalMs ?? this.options.pollIntervalMs;
    const deadline = this.now() + timeoutMs;

    for (let attempt = 1; ; attempt++) {
      const result = await this.probe(ctx, port, attempt);
      if (result.processReady && result.reachable) {
        log.info({ protocol: ctx.protocol, port, attempt }, 'Container healthy');
        return result;
      }

      if (this.now() + pollIntervalMs > deadline) {
        const detail = describeProbe(result);
        log.error({ protocol: ctx.protocol, port, last: result }, 'Container failed health check');
        throw new EngineError(`Container unhealthy after ${attempt} attempts: ${detail}`, 'ContainerUnhealthy', {
          metadata: { lastProbe: result, detail, timeoutMs },
        });
      }
      await this.sleep(pollIntervalMs);
    }
  }

  async restartAndWait(ctx: ServerContext, port: number): Promise<{ restart: RestartReport; health: HealthProbeResult }> {
    const restart = await this.restart(ctx, port);
    const health = await this.waitHealthy(ctx, port);
    return { restart, health };
  }

  /**
   * Recent probe results for an instance, oldest first. Read from the
   * instance's health.json so every process sees the same history.
   */
  recentProbes(ctx: ServerContext): readonly HealthProbeResult[] {
    const file = path.join(ctx.instanceDir, HEALTH_HISTORY_FILE);
    const text = readTextIfExists(file);
    if (text === null) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      log.warn({ file, err: extractErrorMessage(err) }, 'Ignoring unreadable probe history');
      return [];
    }
    if (!Array.isArray(parsed)) return [];
    return parsed.filter(isProbeResult).slice(-this.options.historySize);
  }

  private markLaunch(ctx: ServerContext): void {
    this.launchedAt.set(ctx.instanceDir, new Date(this.now()));
  }

  private record(ctx: ServerContext, result: HealthProbeResult): void {
    const entries = [...this.recentProbes(ctx), result].slice(-this.options.historySize);
    writeAtomic(path.join(ctx.instanceDir, HEALTH_HISTORY_FILE), `${JSON.stringify(entries, null, 2)}\n`);
  }

  private async probe(ctx: ServerContext, port: number, attempt: number): Promise<HealthProbeResult> {
    const [processReady, reachable] = await Promise.all([
      this.signals.processReady(ctx, this.launchedAt.get(ctx.instanceDir)).catch((err: unknown) => {
        log.debug({ err: extractErrorMessage(err) }, 'Log marker probe failed');
        return false;
      }),
      this.signals.portReachable(ctx, port).catch((err: unknown) => {
        log.debug({ err: extractErrorMessage(err) }, 'Port probe failed');
        return false;
      }),
    ]);
    const result: HealthProbeResult = {
      timestamp: new Date(this.now()).toISOString(),
      reachable,
      processReady,
      attempt,
    };

    this.record(ctx, result);
    log.debug({ protocol: ctx.protocol, ...result }, 'Health probe');
    return result;
  }
}
