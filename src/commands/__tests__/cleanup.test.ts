import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { adwConfigSchema } from '../../config/schema.js';
import { AdwPaths, getAdwPaths } from '../../store/runs-root.js';
import { RunArtifacts, cleanupCommand, formatSize, scanRuns, selectRuns } from '../cleanup.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

function artifacts(runId: string, ageDays: number, active = false): RunArtifacts {
  return { runId, worktreePath: null, stateDir: `/agents/${runId}`, size: 0, ageDays, active };
}

describe('formatSize', () => {
  it('picks a unit', () => {
    expect(formatSize(512)).toBe('512B');
    expect(formatSize(1536)).toBe('1.5KB');
    expect(formatSize(3 * 1024 * 1024)).toBe('3.0MB');
    expect(formatSize(2 * 1024 * 1024 * 1024)).toBe('2.00GB');
  });
});

describe('selectRuns', () => {
  const runs = [artifacts('aaaa1111', 10, true), artifacts('bbbb2222', 3), artifacts('cccc3333', 8)];

  it('selects runs at least olderThan days old', () => {
    const result = selectRuns(runs, { all: false, olderThan: 7, keepActive: false });
    expect(result).toEqual({ selected: [runs[0], runs[2]] });
  });

  it('drops active runs when asked', () => {
    const result = selectRuns(runs, { all: true, olderThan: 7, keepActive: true });
    expect(result).toEqual({ selected: [runs[1], runs[2]] });
  });

  it('selects one run by ID', () => {
    expect(selectRuns(runs, { all: false, runId: 'bbbb2222', olderThan: 7, keepActive: false })).toEqual({
      selected: [runs[1]]
    });
    expect(selectRuns(runs, { all: false, runId: 'ffff0000', olderThan: 7, keepActive: false })).toEqual({
      error: "ADW ID 'ffff0000' not found"
    });
  });
});

describe('cleanup', () => {
  let repoPath: string;
  let paths: AdwPaths;
  const now = Date.now();

  function setMtime(p: string, ageMs: number): void {
    const time = new Date(now - ageMs);
    fs.utimesSync(p, time, time);
  }

  beforeEach(() => {
    repoPath = fs.mkdtempSync(path.join(os.tmpdir(), 'adw-cleanup-'));
    paths = getAdwPaths(repoPath, adwConfigSchema.parse({}));

    const worktree = path.join(paths.trees_dir, 'aaaa1111');
    fs.mkdirSync(worktree, { recursive: true });
    fs.writeFileSync(path.join(worktree, 'x.txt'), 'hello');
    fs.mkdirSync(path.join(paths.agents_dir, 'aaaa1111'), { recursive: true });
    fs.writeFileSync(path.join(paths.agents_dir, 'aaaa1111', 'state.json'), '{}');
    fs.mkdirSync(path.join(paths.agents_dir, 'bbbb2222'), { recursive: true });
    fs.writeFileSync(path.join(paths.agents_dir, 'bbbb2222', 'state.json'), '{}');

    setMtime(worktree, 10 * DAY_MS + HOUR_MS);
    setMtime(path.join(paths.agents_dir, 'aaaa1111', 'state.json'), HOUR_MS);
    setMtime(path.join(paths.agents_dir, 'bbbb2222', 'state.json'), 3 * DAY_MS + HOUR_MS);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(repoPath, { recursive: true, force: true });
  });

  it('scans worktrees and states with their age and activity', () => {
    expect(scanRuns(paths, now)).toEqual([
      {
        runId: 'aaaa1111',
        worktreePath: path.join(paths.trees_dir, 'aaaa1111'),
        stateDir: path.join(paths.agents_dir, 'aaaa1111'),
        size: 7,
        ageDays: 10,
        active: true
      },
      {
        runId: 'bbbb2222',
        worktreePath: null,
        stateDir: path.join(paths.agents_dir, 'bbbb2222'),
        size: 2,
        ageDays: 3,
        active: false
      }
    ]);
  });

  it('deletes nothing on a dry run', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await cleanupCommand({
      repo: repoPath,
      all: true,
      olderThan: 7,
      dryRun: true,
      worktreesOnly: false,
      statesOnly: false,
      keepActive: false
    });

    expect(log).toHaveBeenCalledWith(`[DRY RUN] Would delete state: ${path.join(paths.agents_dir, 'bbbb2222')}`);
    expect(fs.existsSync(path.join(paths.agents_dir, 'bbbb2222'))).toBe(true);
    expect(fs.existsSync(path.join(paths.trees_dir, 'aaaa1111'))).toBe(true);
  });

  it('removes only state directories with --states-only', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await cleanupCommand({
      repo: repoPath,
      all: true,
      olderThan: 7,
      dryRun: false,
      worktreesOnly: false,
      statesOnly: true,
      keepActive: false
    });

    expect(fs.existsSync(path.join(paths.agents_dir, 'aaaa1111'))).toBe(false);
    expect(fs.existsSync(path.join(paths.agents_dir, 'bbbb2222'))).toBe(false);
    expect(fs.existsSync(path.join(paths.trees_dir, 'aaaa1111'))).toBe(true);
    expect(process.exitCode).toBeUndefined();
  });

  it('reports an unknown run ID', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await cleanupCommand({
      repo: repoPath,
      all: false,
      runId: 'ffff0000',
      olderThan: 7,
      dryRun: false,
      worktreesOnly: false,
      statesOnly: false,
      keepActive: false
    });

    expect(error).toHaveBeenCalledWith("Error: ADW ID 'ffff0000' not found");
    expect(process.exitCode).toBe(1);
  });
});
