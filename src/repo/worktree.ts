import fs from 'node:fs';
import path from 'node:path';
import { gitOptional, gitResult } from './git.js';

export type WorktreeValidation =
  | { valid: true }
  | { valid: false; reason: string };

export type EnsureWorktreeResult =
  | { ok: true; worktreePath: string; created: boolean; recovered: boolean }
  | { ok: false; error: string };

/**
 * Add patterns to the main repository's .git/info/exclude so the agents and
 * trees directories never show up as untracked files.
 */
function upsertInfoExclude(gitdir: string, patterns: string[]): void {
  const infoDir = path.join(gitdir, 'info');
  const excludePath = path.join(infoDir, 'exclude');

  fs.mkdirSync(infoDir, { recursive: true });

  const existing = fs.existsSync(excludePath)
    ? fs.readFileSync(excludePath, 'utf8')
    : '';

  const existingLines = new Set(
    existing
      .split(/\r?\n/)
      .map(l => l.trim())
      .filter(l => l.length > 0 && !l.startsWith('#'))
  );

  const toAdd = patterns.filter(p => !existingLines.has(p));
  if (toAdd.length === 0) return;

  const needsNewline = existing.length > 0 && !existing.endsWith('\n');
  const header = existing.includes('# adw run artifacts')
    ? ''
    : '# adw run artifacts\n';

  const addition = (needsNewline ? '\n' : '') + header + toAdd.map(p => `${p}\n`).join('');

  fs.writeFileSync(excludePath, existing + addition, 'utf8');
}

/**
 * Exclude run directories that live inside the repository from git status.
 * Directories outside the repository are left alone.
 */
export function ensureRepoInfoExclude(repoRoot: string, dirs: string[]): void {
  const mainGitDir = path.join(repoRoot, '.git');
  if (!fs.existsSync(mainGitDir) || !fs.statSync(mainGitDir).isDirectory()) {
    return;
  }
  const patterns = dirs
    .map((dir) => path.relative(repoRoot, dir))
    .filter((rel) => rel.length > 0 && !rel.startsWith('..') && !path.isAbsolute(rel))
    .map((rel) => `/${rel.split(path.sep).join('/')}/`);
  if (patterns.length > 0) {
    upsertInfoExclude(mainGitDir, patterns);
  }
}

function realpathOrSelf(p: string): string {
  try {
    return fs.realpathSync(p);
  } catch {
    return path.resolve(p);
  }
}

/**
 * Paths of every worktree registered with the repository (the main checkout
 * included), from `git worktree list --porcelain`.
 */
export async function listWorktrees(repoRoot: string): Promise<{ paths: string[] } | { error: string }> {
  const result = await gitResult(['worktree', 'list', '--porcelain'], repoRoot);
  if (result.exitCode !== 0) {
    return { error: result.stderr.trim() || `git exited with ${result.exitCode}` };
  }
  const paths = result.stdout
    .split('\n')
    .filter((line) => line.startsWith('worktree '))
    .map((line) => line.slice('worktree '.length).trim());
  return { paths };
}

/**
 * A usable worktree exists, is a directory, has a .git marker and is
 * registered with the main repository. The first failing check is reported.
 */
export async function validateWorktreePath(
  repoRoot: string,
  worktreePath: string
): Promise<WorktreeValidation> {
  if (!fs.existsSync(worktreePath)) {
    return { valid: false, reason: `Worktree path does not exist: ${worktreePath}` };
  }
  if (!fs.statSync(worktreePath).isDirectory()) {
    return { valid: false, reason: `Worktree path is not a directory: ${worktreePath}` };
  }
  if (!fs.existsSync(path.join(worktreePath, '.git'))) {
    return { valid: false, reason: `Worktree is not a git repository: ${worktreePath}` };
  }

  const listing = await listWorktrees(repoRoot);
  if ('error' in listing) {
    return { valid: false, reason: `Failed to list worktrees: ${listing.error}` };
  }
  const target = realpathOrSelf(worktreePath);
  const registered = listing.paths.some((p) => realpathOrSelf(p) === target);
  if (!registered) {
    return { valid: false, reason: `Worktree not registered in git: ${worktreePath}` };
  }
  return { valid: true };
}

/**
 * Remove a worktree: `git worktree remove --force`, then a plain recursive
 * delete if git refused (for example when the directory was never registered).
 */
export async function removeWorktree(
  repoRoot: string,
  worktreePath: string
): Promise<void> {
  if (!fs.existsSync(worktreePath)) {
    return;
  }

  const result = await gitResult(['worktree', 'remove', worktreePath, '--force'], repoRoot);

  if (result.exitCode !== 0 && fs.existsSync(worktreePath)) {
    fs.rmSync(worktreePath, { recursive: true, force: true });
  }
}

async function branchExists(repoRoot: string, branch: string): Promise<boolean> {
  const result = await gitResult(['branch', '--list', branch], repoRoot);
  return result.exitCode === 0 && result.stdout.trim().length > 0;
}

/**
 * Create a worktree at `worktreePath` on `branch`, attaching to the branch if
 * it exists and creating it from HEAD otherwise. Git's stderr is returned as
 * the error; nothing is retried.
 */
export async function createWorktree(
  repoRoot: string,
  worktreePath: string,
  branch: string
): Promise<{ ok: true } | { ok: false; error: string }> {
  fs.mkdirSync(path.dirname(worktreePath), { recursive: true });

  // Drop registrations whose directories are gone so `worktree add` accepts the path again
  await gitOptional(['worktree', 'prune'], repoRoot);

  const args = (await branchExists(repoRoot, branch))
    ? ['worktree', 'add', worktreePath, branch]
    : ['worktree', 'add', '-b', branch, worktreePath];

  const result = await gitResult(args, repoRoot);
  if (result.exitCode !== 0) {
    return { ok: false, error: result.stderr.trim() || 'Unknown error' };
  }
  return { ok: true };
}

/**
 * Make sure `worktreePath` holds a valid worktree on `branch`.
 *
 * - valid: reused untouched (`created: false`)
 * - absent: created
 * - present but invalid: removed, then created (`recovered: true`)
 */
export async function ensureWorktree(
  repoRoot: string,
  worktreePath: string,
  branch: string
): Promise<EnsureWorktreeResult> {
  let recovered = false;

  if (fs.existsSync(worktreePath)) {
    const validation = await validateWorktreePath(repoRoot, worktreePath);
    if (validation.valid) {
      return { ok: true, worktreePath, created: false, recovered: false };
    }
    console.warn(`WARNING: Existing worktree is invalid: ${validation.reason}. Removing and recreating...`);
    await removeWorktree(repoRoot, worktreePath);
    recovered = true;
  }

  const created = await createWorktree(repoRoot, worktreePath, branch);
  if (!created.ok) {
    return created;
  }
  return { ok: true, worktreePath, created: true, recovered };
}
