/**
 * The update flow: run the PR reference script, then commit and push its
 * changes to the fragment directory if there are any.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as core from '@actions/core';
import { run } from './exec';
import { getStatus, stageDirectory, commit, push } from './git';
import { partitionByDirectory } from './status';
import { ActionConfig, UpdateResult } from './types';
import { UpdateError, UpdateErrorCode } from './errors';

/**
 * Run the update script. Its output is forwarded to the log.
 *
 * The script is treated as a black box: it gets only the configured
 * arguments and is expected to rewrite fragment files in place.
 */
export async function runUpdateScript(config: ActionConfig, cwd: string): Promise<void> {
  const scriptPath = path.resolve(cwd, config.script);
  if (!fs.existsSync(scriptPath)) {
    throw new UpdateError(UpdateErrorCode.SCRIPT_NOT_FOUND, `Update script not found: ${config.script}`);
  }

  const args = [config.script, ...config.scriptArgs];
  core.info(`Running ${config.interpreter} ${args.join(' ')}`);
  const result = await run(config.interpreter, args, { cwd });

  if (result.stdout.trim()) {
    core.info(result.stdout.trimEnd());
  }
  if (result.stderr.trim()) {
    core.info(result.stderr.trimEnd());
  }

  if (result.exitCode !== 0) {
    throw new UpdateError(UpdateErrorCode.SCRIPT_FAILED, `Update script exited with ${result.exitCode}`, {
      exitCode: result.exitCode,
    });
  }
}

/**
 * Run the script and commit what it changed.
 *
 * Steps:
 * 1. Run the update script
 * 2. Read `git status --porcelain -z`; empty output means nothing to do
 * 3. Stage the fragment directory and commit under the configured identity
 * 4. Push to the configured remote
 *
 * Changes outside the fragment directory are never staged. If they are the
 * only changes the run fails, since there is nothing to commit.
 */
export async function updatePrReferences(config: ActionConfig, cwd: string): Promise<UpdateResult> {
  await step('Update PR references', () => runUpdateScript(config, cwd));

  const entries = await getStatus(cwd);
  if (entries.length === 0) {
    core.info('no changes');
    return { committed: false, changedFiles: [], strayFiles: [] };
  }

  const { inside, outside } = partitionByDirectory(entries, config.fragmentDir);
  const changedFiles = inside.map(entry => entry.path);
  const strayFiles = outside.map(entry => entry.path);

  if (changedFiles.length === 0) {
    throw new UpdateError(
      UpdateErrorCode.GIT_ERROR,
      `Nothing to commit under ${config.fragmentDir}/, but the working tree changed: ${strayFiles.join(', ')}`,
      { strayFiles }
    );
  }

  if (strayFiles.length > 0) {
    core.warning(`Ignoring changes outside ${config.fragmentDir}/: ${strayFiles.join(', ')}`);
  }

  core.info(`Changed fragments:\n${changedFiles.map(file => `  ${file}`).join('\n')}`);

  if (config.dryRun) {
    core.info(`Dry run: would commit ${changedFiles.length} file(s) with message '${config.commitMessage}'`);
    return { committed: false, changedFiles, strayFiles };
  }

  const commitSha = await step('Commit changes', async () => {
    await stageDirectory(cwd, config.fragmentDir);
    const sha = await commit(cwd, config.commitMessage, config.authorName, config.authorEmail);
    core.info(`Created commit ${sha}`);
    return sha;
  });

  await step(`Push to ${config.remote}`, () => push(cwd, config.remote));

  return { committed: true, changedFiles, strayFiles, commitSha };
}

async function step<T>(name: string, fn: () => Promise<T>): Promise<T> {
  core.startGroup(name);
  try {
    return await fn();
  } finally {
    core.endGroup();
  }
}
