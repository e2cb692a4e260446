import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { execa } from 'execa';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  changedFiles,
  commitChanges,
  findExistingBranchForIssue,
  getCurrentBranch,
  getRemoteUrl
} from '../git-ops.js';
import {
  ensureRepoInfoExclude,
  ensureWorktree,
  listWorktrees,
  removeWorktree,
  validateWorktreePath
} from '../worktree.js';

describe('worktrees', () => {
  let tmpDir: string;
  let repoPath: string;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'adw-worktree-'));
    repoPath = path.join(tmpDir, 'repo');
    fs.mkdirSync(repoPath);
    await execa('git', ['init'], { cwd: repoPath });
    await execa('git', ['config', 'user.name', 'Test'], { cwd: repoPath });
    await execa('git', ['config', 'user.email', 'test@example.com'], { cwd: repoPath });
    fs.writeFileSync(path.join(repoPath, 'README.md'), '# Widgets\n');
    await execa('git', ['add', '.'], { cwd: repoPath });
    await execa('git', ['commit', '-m', 'initial commit'], { cwd: repoPath });
    await execa('git', ['branch', '-M', 'main'], { cwd: repoPath });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates a worktree on a new branch and reuses it', async () => {
    const worktreePath = path.join(repoPath, 'trees', 'abc12345');

    const first = await ensureWorktree(repoPath, worktreePath, 'feature-issue-7-adw-abc12345-widget');
    const second = await ensureWorktree(repoPath, worktreePath, 'feature-issue-7-adw-abc12345-widget');

    expect(first).toEqual({ ok: true, worktreePath, created: true, recovered: false });
    expect(second).toEqual({ ok: true, worktreePath, created: false, recovered: false });
    expect(await getCurrentBranch(worktreePath)).toBe('feature-issue-7-adw-abc12345-widget');
    expect(await validateWorktreePath(repoPath, worktreePath)).toEqual({ valid: true });

    expect(await listWorktrees(repoPath)).toEqual({
      paths: [fs.realpathSync(repoPath), fs.realpathSync(worktreePath)]
    });
  });

  it('attaches to an existing branch', async () => {
    await execa('git', ['branch', 'chore-issue-3-adw-deadbeef-tidy'], { cwd: repoPath });
    const worktreePath = path.join(repoPath, 'trees', 'deadbeef');

    const result = await ensureWorktree(repoPath, worktreePath, 'chore-issue-3-adw-deadbeef-tidy');

    expect(result.ok).toBe(true);
    expect(await getCurrentBranch(worktreePath)).toBe('chore-issue-3-adw-deadbeef-tidy');
  });

  it('replaces a directory that is not a worktree', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const worktreePath = path.join(repoPath, 'trees', 'abc12345');
    fs.mkdirSync(worktreePath, { recursive: true });
    fs.writeFileSync(path.join(worktreePath, 'stray.txt'), 'x');

    expect(await validateWorktreePath(repoPath, worktreePath)).toEqual({
      valid: false,
      reason: `Worktree is not a git repository: ${worktreePath}`
    });

    const result = await ensureWorktree(repoPath, worktreePath, 'feature-x');

    expect(result).toEqual({ ok: true, worktreePath, created: true, recovered: true });
    expect(fs.existsSync(path.join(worktreePath, 'stray.txt'))).toBe(false);
  });

  it('reports each invalid worktree reason', async () => {
    const missing = path.join(repoPath, 'trees', 'missing');
    expect(await validateWorktreePath(repoPath, missing)).toEqual({
      valid: false,
      reason: `Worktree path does not exist: ${missing}`
    });

    const file = path.join(tmpDir, 'file');
    fs.writeFileSync(file, 'x');
    expect(await validateWorktreePath(repoPath, file)).toEqual({
      valid: false,
      reason: `Worktree path is not a directory: ${file}`
    });

    const otherRepo = path.join(tmpDir, 'other');
    fs.mkdirSync(otherRepo);
    await execa('git', ['init'], { cwd: otherRepo });
    expect(await validateWorktreePath(repoPath, otherRepo)).toEqual({
      valid: false,
      reason: `Worktree not registered in git: ${otherRepo}`
    });
  });

  it('removes a worktree and its registration', async () => {
    const worktreePath = path.join(repoPath, 'trees', 'abc12345');
    await ensureWorktree(repoPath, worktreePath, 'feature-x');

    await removeWorktree(repoPath, worktreePath);

    expect(fs.existsSync(worktreePath)).toBe(false);
    expect(await listWorktrees(repoPath)).toEqual({ paths: [fs.realpathSync(repoPath)] });
  });

  it('excludes run directories inside the repository once', () => {
    ensureRepoInfoExclude(repoPath, [path.join(repoPath, 'agents'), path.join(repoPath, 'trees'), tmpDir]);
    ensureRepoInfoExclude(repoPath, [path.join(repoPath, 'trees')]);

    const exclude = fs.readFileSync(path.join(repoPath, '.git', 'info', 'exclude'), 'utf8');
    const lines = exclude.split('\n').filter((l) => l.length > 0 && !l.startsWith('#'));
    expect(lines).toEqual(['/agents/', '/trees/']);
    expect(exclude).toContain('# adw run artifacts\n/agents/\n/trees/\n');
  });

  it('commits changes and treats a clean tree as nothing to do', async () => {
    expect(await commitChanges('noop', repoPath)).toEqual({ ok: true, committed: false });

    fs.writeFileSync(path.join(repoPath, 'widget.ts'), 'export {};\n');
    expect(await commitChanges('feat: add widget', repoPath)).toEqual({ ok: true, committed: true });

    const { stdout } = await execa('git', ['log', '-1', '--format=%s'], { cwd: repoPath });
    expect(stdout).toBe('feat: add widget');
    expect(await changedFiles('HEAD~1', repoPath)).toEqual(['widget.ts']);
  });

  it('finds the branch of an issue, narrowed by run ID', async () => {
    await execa('git', ['branch', 'feature-issue-7-adw-abc12345-widget'], { cwd: repoPath });
    await execa('git', ['branch', 'bug-issue-17-adw-deadbeef-crash'], { cwd: repoPath });

    expect(await findExistingBranchForIssue('7', null, repoPath)).toBe('feature-issue-7-adw-abc12345-widget');
    expect(await findExistingBranchForIssue('7', 'abc12345', repoPath)).toBe('feature-issue-7-adw-abc12345-widget');
    expect(await findExistingBranchForIssue('7', 'deadbeef', repoPath)).toBeNull();
    expect(await findExistingBranchForIssue('9', null, repoPath)).toBeNull();
  });

  it('finds a branch checked out in a linked worktree', async () => {
    const treePath = path.join(tmpDir, 'trees', 'abc12345');
    await execa('git', ['worktree', 'add', '-b', 'feature-issue-7-adw-abc12345-x', treePath], { cwd: repoPath });

    const { stdout } = await execa('git', ['branch', '-a'], { cwd: repoPath });
    expect(stdout).toContain('+ feature-issue-7-adw-abc12345-x');
    expect(await findExistingBranchForIssue('7', 'abc12345', repoPath)).toBe('feature-issue-7-adw-abc12345-x');
  });

  it('reads the origin URL when there is one', async () => {
    expect(await getRemoteUrl(repoPath)).toBeNull();
    await execa('git', ['remote', 'add', 'origin', 'git@github.com:acme/widgets.git'], { cwd: repoPath });
    expect(await getRemoteUrl(repoPath)).toBe('git@github.com:acme/widgets.git');
  });
});
