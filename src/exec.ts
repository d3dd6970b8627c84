/**
 * Subprocess helpers shared by the git and script steps.
 */

import execa from 'execa';
import * as core from '@actions/core';
import { UpdateError, UpdateErrorCode } from './errors';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ExecOptions {
  cwd?: string;
}

/**
 * Run a command and capture its output. Never rejects on a non-zero exit.
 */
export async function run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
  core.debug(`$ ${[command, ...args].join(' ')}`);
  try {
    const result = await execa(command, args, {
      cwd: options?.cwd,
      reject: false,
    });
    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      exitCode: result.exitCode ?? (result.failed ? 127 : 0),
    };
  } catch (err) {
    throw new UpdateError(UpdateErrorCode.GIT_ERROR, `Command failed to spawn: ${command}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Run a command that must succeed.
 *
 * @param code - Error code raised when the command exits non-zero
 */
export async function runOrThrow(
  command: string,
  args: string[],
  code: UpdateErrorCode,
  options?: ExecOptions
): Promise<ExecResult> {
  const result = await run(command, args, options);
  if (result.exitCode !== 0) {
    throw new UpdateError(code, `Command exited with ${result.exitCode}: ${[command, ...args].join(' ')}`, {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
    });
  }
  return result;
}
