// Path: src/utils/shell.ts
// Safe subprocess execution utilities - prevent command injection

import { execFile, execFileSync } from 'node:child_process';
import { promisify } from 'node:util';
import { EngineError, extractErrorMessage } from './error.js';

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  /** Kill the child after this many milliseconds (default 120s) */
  timeoutMs?: number;
}

function stderrOf(err: unknown): string | undefined {
  if (err instanceof Error && 'stderr' in err && typeof err.stderr === 'string') {
    return err.stderr.trim();
  }
  return undefined;
}

/**
 * Run a command with an argument vector (no shell invocation).
 * Non-zero exit codes become RuntimeFailure errors carrying stderr.
 *
 * @param command - Executable name or path
 * @param args - Arguments passed verbatim
 */
export async function runSafe(
  command: string,
  args: readonly string[],
  options: RunOptions = {}
): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, [...args], {
      cwd: options.cwd,
      timeout: options.timeoutMs ?? 120_000,
      encoding: 'utf-8',
      maxBuffer: 16 * 1024 * 1024,
    });
    return { stdout, stderr };
  } catch (err) {
    throw new EngineError(
      `${command} ${args.join(' ')} failed: ${stderrOf(err) || extractErrorMessage(err)}`,
      'RuntimeFailure',
      { cause: err, metadata: { command, args: [...args], cwd: options.cwd } }
    );
  }
}

/**
 * Safely find the path to a command.
 *
 * @returns Path to command or null if not found
 */
export function whichSafe(commandName: string): string | null {
  try {
    const result = execFileSync('which', [commandName], { encoding: 'utf-8', stdio: 'pipe' });
    return result.trim() || null;
  } catch {
    return null;
  }
}
