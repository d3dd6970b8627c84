/**
 * Resolved action inputs.
 *
 * Mirrors the `inputs` block of action.yml after defaults and validation:
 *   - branch → branch
 *   - interpreter / script / script-args → how the update script is launched
 *   - fragment-dir → fragmentDir (the only directory ever staged)
 *   - commit-message / author-name / author-email → commit details
 *   - remote → remote
 *   - dry-run → dryRun
 */
export interface ActionConfig {
  /** Branch whose pushes trigger an update (defaults to main) */
  branch: string;
  /** Program used to run the update script, e.g. `python` */
  interpreter: string;
  /** Path of the update script, relative to the repository root */
  script: string;
  /** Extra arguments passed to the script after its path */
  scriptArgs: string[];
  /** Directory holding the change fragments, relative to the repository root */
  fragmentDir: string;
  /** Message of the commit created when fragments changed */
  commitMessage: string;
  /** Committer and author name */
  authorName: string;
  /** Committer and author email */
  authorEmail: string;
  /** Remote the commit is pushed to */
  remote: string;
  /** Report what would be committed without staging, committing or pushing */
  dryRun: boolean;
}

/**
 * One record of `git status --porcelain -z` (v1 format).
 *
 * Corresponds to:
 *   XY path<NUL>
 *   XY path<NUL>orig<NUL>      (renames and copies)
 */
export interface StatusEntry {
  /** Status in the index (X column) */
  index: string;
  /** Status in the work tree (Y column) */
  workTree: string;
  /** Path relative to the repository root */
  path: string;
  /** Source path of a rename or copy, null otherwise */
  originalPath: string | null;
}

/**
 * Outcome of a single update run.
 */
export interface UpdateResult {
  /** Whether a commit was created (always false in dry-run mode) */
  committed: boolean;
  /** Changed paths under the fragment directory */
  changedFiles: string[];
  /** Changed paths outside the fragment directory; reported, never staged */
  strayFiles: string[];
  /** SHA of the created commit */
  commitSha?: string;
}

/**
 * The parts of a workflow event the action decides on.
 */
export interface TriggerContext {
  /** Name of the event that started the workflow, e.g. `push` */
  eventName: string;
  /** Fully-qualified ref that was pushed, e.g. `refs/heads/main` */
  ref: string;
}
