import { gitResult } from './git.js';

export type GitOpResult = { ok: true } | { ok: false; error: string };

function failure(stderr: string, fallback: string): GitOpResult {
  return { ok: false, error: stderr.trim() || fallback };
}

export async function getCurrentBranch(cwd: string): Promise<string | null> {
  const result = await gitResult(['rev-parse', '--abbrev-ref', 'HEAD'], cwd);
  return result.exitCode === 0 ? result.stdout.trim() : null;
}

export async function getRemoteUrl(cwd: string, remote = 'origin'): Promise<string | null> {
  const result = await gitResult(['remote', 'get-url', remote], cwd);
  return result.exitCode === 0 && result.stdout.trim() ? result.stdout.trim() : null;
}

/**
 * Check out `branch`, falling back to a tracking branch from origin.
 */
export async function checkoutBranch(branch: string, cwd: string): Promise<GitOpResult> {
  const local = await gitResult(['checkout', branch], cwd);
  if (local.exitCode === 0) {
    return { ok: true };
  }
  const tracking = await gitResult(['checkout', '-b', branch, `origin/${branch}`], cwd);
  if (tracking.exitCode === 0) {
    return { ok: true };
  }
  return failure(local.stderr, `Failed to checkout branch ${branch}`);
}

/**
 * Stage everything and commit. A clean tree is not an error: there is
 * simply nothing to commit.
 */
export async function commitChanges(message: string, cwd: string): Promise<GitOpResult & { committed?: boolean }> {
  const status = await gitResult(['status', '--porcelain'], cwd);
  if (status.exitCode !== 0) {
    return failure(status.stderr, 'Failed to read git status');
  }
  if (status.stdout.trim().length === 0) {
    return { ok: true, committed: false };
  }

  const add = await gitResult(['add', '-A'], cwd);
  if (add.exitCode !== 0) {
    return failure(add.stderr, 'git add failed');
  }
  const commit = await gitResult(['commit', '-m', message], cwd);
  if (commit.exitCode !== 0) {
    return failure(commit.stderr || commit.stdout, 'git commit failed');
  }
  return { ok: true, committed: true };
}

export async function pushBranch(branch: string, cwd: string): Promise<GitOpResult> {
  const result = await gitResult(['push', '-u', 'origin', branch], cwd);
  if (result.exitCode !== 0) {
    return failure(result.stderr, `Failed to push ${branch}`);
  }
  return { ok: true };
}

/**
 * A local or remote branch named `*-issue-<n>-*`, restricted to
 * `*-adw-<runId>-*` when a run ID is given.
 */
export async function findExistingBranchForIssue(
  issueNumber: string,
  runId: string | null,
  cwd: string
): Promise<string | null> {
  const result = await gitResult(['branch', '-a'], cwd);
  if (result.exitCode !== 0) {
    return null;
  }
  const branches = result.stdout
    .split('\n')
    // `*` marks the current branch, `+` one checked out in a linked worktree
    .map((line) => line.trim().replace(/^[*+]\s+/, '').replace('remotes/origin/', ''))
    .filter((line) => line.length > 0);

  for (const branch of branches) {
    if (!branch.includes(`-issue-${issueNumber}-`)) {
      continue;
    }
    if (!runId || branch.includes(`-adw-${runId}-`)) {
      return branch;
    }
  }
  return null;
}

/** Files changed relative to `base`, or null when the diff cannot be computed. */
export async function changedFiles(base: string, cwd: string): Promise<string[] | null> {
  const result = await gitResult(['diff', base, '--name-only'], cwd);
  if (result.exitCode !== 0) {
    return null;
  }
  return result.stdout.split('\n').map((l) => l.trim()).filter((l) => l.length > 0);
}
