/**
 * Local git operations for the commit-and-push step.
 *
 * Thin wrappers around the git CLI, run in the checked-out repository:
 * - Status: getStatus
 * - Staging: stageDirectory
 * - History: commit, getHeadSha
 * - Remote: push
 */

import { run, runOrThrow } from './exec';
import { UpdateError, UpdateErrorCode } from './errors';
import { parsePorcelain } from './status';
import { StatusEntry } from './types';

/**
 * Read the working tree status. An empty list means a clean tree.
 */
export async function getStatus(cwd: string): Promise<StatusEntry[]> {
  const result = await runOrThrow('git', ['status', '--porcelain', '-z'], UpdateErrorCode.GIT_ERROR, { cwd });
  return parsePorcelain(result.stdout);
}

/**
 * Stage everything under `dir`, including deletions and new files.
 */
export async function stageDirectory(cwd: string, dir: string): Promise<void> {
  await runOrThrow('git', ['add', `${dir}/`], UpdateErrorCode.GIT_ERROR, { cwd });
}

/**
 * Commit the staged changes under a fixed identity.
 *
 * The identity is passed with `-c` so it overrides whatever the runner's
 * git config holds, regardless of who triggered the workflow.
 *
 * @returns SHA of the new commit
 */
export async function commit(
  cwd: string,
  message: string,
  authorName: string,
  authorEmail: string
): Promise<string> {
  await runOrThrow(
    'git',
    ['-c', `user.name=${authorName}`, '-c', `user.email=${authorEmail}`, 'commit', '-m', message],
    UpdateErrorCode.GIT_ERROR,
    { cwd }
  );
  return getHeadSha(cwd);
}

export async function getHeadSha(cwd: string): Promise<string> {
  const result = await run('git', ['rev-parse', 'HEAD'], { cwd });
  if (result.exitCode !== 0) {
    throw new UpdateError(UpdateErrorCode.GIT_ERROR, 'Could not resolve HEAD after committing', {
      stderr: result.stderr,
    });
  }
  return result.stdout.trim();
}

/**
 * Push the current branch to `remote`, using git's default push refspec.
 */
export async function push(cwd: string, remote: string): Promise<void> {
  const result = await run('git', ['push', remote], { cwd });
  if (result.exitCode !== 0) {
    throw new UpdateError(UpdateErrorCode.PUSH_FAILED, `Push to '${remote}' was rejected (exit ${result.exitCode})`, {
      exitCode: result.exitCode,
      stderr: result.stderr,
    });
  }
}
