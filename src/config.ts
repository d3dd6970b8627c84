/**
 * Action input handling.
 *
 * Reads the inputs declared in action.yml, applies defaults and validates
 * them once so the rest of the action works with a typed ActionConfig.
 */

import * as core from '@actions/core';
import { ActionConfig } from './types';
import { UpdateError, UpdateErrorCode } from './errors';
import { normalizeDirectory } from './status';

export const DEFAULTS = {
  branch: 'main',
  interpreter: 'python',
  script: './changelog.d/update-pr-refs.py',
  fragmentDir: 'changelog.d',
  commitMessage: '(actions) update PR references',
  authorName: 'GitHub Actions',
  authorEmail: 'actions@github.com',
  remote: 'origin',
} as const;

/**
 * Branch whose pushes trigger an update. Read on its own so the trigger can
 * be checked before the remaining inputs are validated.
 */
export function readBranch(): string {
  return input('branch', DEFAULTS.branch);
}

/**
 * Read and validate all action inputs.
 */
export function readConfig(): ActionConfig {
  const fragmentDir = normalizeDirectory(input('fragment-dir', DEFAULTS.fragmentDir));
  if (fragmentDir === '' || fragmentDir.startsWith('/') || fragmentDir.split('/').includes('..')) {
    throw new UpdateError(
      UpdateErrorCode.CONFIG_INVALID,
      `fragment-dir must be a directory inside the repository, got '${core.getInput('fragment-dir')}'`
    );
  }

  const commitMessage = input('commit-message', DEFAULTS.commitMessage);

  const authorEmail = input('author-email', DEFAULTS.authorEmail);
  if (!authorEmail.includes('@')) {
    throw new UpdateError(UpdateErrorCode.CONFIG_INVALID, `author-email is not an email address: '${authorEmail}'`);
  }

  const scriptArgs = core.getInput('script-args').split(/\s+/).filter(arg => arg !== '');

  return {
    branch: readBranch(),
    interpreter: input('interpreter', DEFAULTS.interpreter),
    script: input('script', DEFAULTS.script),
    scriptArgs,
    fragmentDir,
    commitMessage,
    authorName: input('author-name', DEFAULTS.authorName),
    authorEmail,
    remote: input('remote', DEFAULTS.remote),
    dryRun: booleanInput('dry-run'),
  };
}

/**
 * Read a string input, falling back to `fallback` when it is unset or blank.
 */
function input(name: string, fallback: string): string {
  const value = core.getInput(name);
  return value === '' ? fallback : value;
}

/**
 * Read a YAML 1.2 boolean input. action.yml gives every boolean input a default.
 */
function booleanInput(name: string): boolean {
  try {
    return core.getBooleanInput(name);
  } catch (error) {
    throw new UpdateError(
      UpdateErrorCode.CONFIG_INVALID,
      error instanceof Error ? error.message : `Input '${name}' is not a boolean`
    );
  }
}
