// Path: src/services/container/runtime.ts
// Container runtime contract and the docker compose implementation

import path from 'node:path';
import { createLogger } from '../../lib/logger.js';
import { runSafe } from '../../utils/shell.js';

const log = createLogger({ module: 'container-runtime' });

/**
 * Operations on the container described by <instanceDir>/docker-compose.yml.
 */
export interface ContainerRuntime {
  up(instanceDir: string): Promise<void>;
  down(instanceDir: string): Promise<void>;
  restart(instanceDir: string): Promise<void>;
  isRunning(instanceDir: string): Promise<boolean>;
  /** Most recent log lines, limited to output written since the given time when one is passed */
  logs(instanceDir: string, tail: number, since?: Date): Promise<string>;
}

export class DockerComposeRuntime implements ContainerRuntime {
  constructor(private readonly binary: string = 'docker') {}

  private compose(instanceDir: string, args: string[], timeoutMs?: number) {
    const file = path.join(instanceDir, 'docker-compose.yml');
    return runSafe(this.binary, ['compose', '-f', file, ...args], { cwd: instanceDir, timeoutMs });
  }

  async up(instanceDir: string): Promise<void> {
    await this.compose(instanceDir, ['up', '-d', '--remove-orphans'], 300_000);
    log.info({ instanceDir }, 'Container started');
  }

  async down(instanceDir: string): Promise<void> {
    await this.compose(instanceDir, ['down']);
    log.info({ instanceDir }, 'Container stopped');
  }

  async restart(instanceDir: string): Promise<void> {
    await this.compose(instanceDir, ['restart']);
    log.info({ instanceDir }, 'Container restarted');
  }

  async isRunning(instanceDir: string): Promise<boolean> {
    const { stdout } = await this.compose(instanceDir, ['ps', '--status', 'running', '--quiet']);
    return stdout.trim().length > 0;
  }

  async logs(instanceDir: string, tail: number, since?: Date): Promise<string> {
    const args = ['logs', '--no-color', '--tail', String(tail)];
    if (since) args.push('--since', since.toISOString());
    const { stdout, stderr } = await this.compose(instanceDir, args);
    return `${stdout}${stderr}`;
  }
}
