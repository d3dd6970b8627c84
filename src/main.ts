/**
 * The action's run loop.
 *
 * Handles push events on the configured branch: runs the PR reference
 * script over the change fragments and commits and pushes the result when
 * anything changed. Every other event is skipped. Any failure fails the job.
 */

import * as core from '@actions/core';
import * as github from '@actions/github';
import { readBranch, readConfig } from './config';
import { skipReason } from './trigger';
import { updatePrReferences } from './update';
import { describeError } from './errors';
import { UpdateResult } from './types';

export async function run(): Promise<void> {
  try {
    const context = github.context;
    const reason = skipReason({ eventName: context.eventName, ref: context.ref }, readBranch());
    if (reason) {
      core.info(reason);
      setOutputs({ committed: false, changedFiles: [], strayFiles: [] }, false);
      return;
    }

    const config = readConfig();
    const cwd = process.env['GITHUB_WORKSPACE'] || process.cwd();
    const result = await updatePrReferences(config, cwd);
    setOutputs(result, config.dryRun);
  } catch (error) {
    core.setFailed(describeError(error));
  }
}

/**
 * Publish the step outputs. In dry-run mode `changed` reports whether a
 * commit would have been made.
 */
function setOutputs(result: UpdateResult, dryRun: boolean): void {
  const changed = result.committed || (dryRun && result.changedFiles.length > 0);
  core.setOutput('changed', changed ? 'true' : 'false');
  core.setOutput('changed-files', result.changedFiles.join('\n'));
  core.setOutput('commit-sha', result.commitSha ?? '');
}
