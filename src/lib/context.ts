// Path: src/lib/context.ts
// ServerContext construction from engine settings

import path from 'node:path';
import type { ProtocolKind, ServerContext } from '../types/protocol.js';

export function instanceDirFor(workDir: string, protocol: ProtocolKind): string {
  return path.join(workDir, protocol);
}

export function createServerContext(
  settings: { workDir: string; serverHost: string },
  protocol: ProtocolKind
): ServerContext {
  const instanceDir = instanceDirFor(settings.workDir, protocol);
  const configDir = path.join(instanceDir, 'config');
  return {
    protocol,
    workDir: settings.workDir,
    instanceDir,
    configDir,
    configPath: path.join(configDir, 'config.json'),
    usersDir: path.join(instanceDir, 'users'),
    composePath: path.join(instanceDir, 'docker-compose.yml'),
    logsDir: path.join(instanceDir, 'logs'),
    serverHost: settings.serverHost,
  };
}
