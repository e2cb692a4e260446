import fs from 'node:fs';
import path from 'node:path';
import { loadConfig } from '../config/load.js';
import { gitOptional } from '../repo/git.js';
import { removeWorktree } from '../repo/worktree.js';
import { listRunIds } from '../store/run-utils.js';
import { AdwPaths, getAdwPaths, getRunDir, getStatePath, getWorktreePath } from '../store/runs-root.js';

export interface CleanupOptions {
  repo: string;
  config?: string;
  all: boolean;
  runId?: string;
  olderThan: number; // days
  dryRun: boolean;
  worktreesOnly: boolean;
  statesOnly: boolean;
  keepActive: boolean;
}

export interface RunArtifacts {
  runId: string;
  worktreePath: string | null;
  stateDir: string | null;
  size: number;
  /** Age of the worktree (or the state when there is none), whole days */
  ageDays: number;
  active: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const ACTIVE_WINDOW_MS = DAY_MS;

/**
 * Get directory size recursively (in bytes). Unreadable entries count as zero.
 */
function getDirSize(dirPath: string): number {
  let size = 0;
  let items: fs.Dirent[];
  try {
    items = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch {
    return 0;
  }
  for (const item of items) {
    const itemPath = path.join(dirPath, item.name);
    if (item.isDirectory()) {
      size += getDirSize(itemPath);
    } else if (item.isFile()) {
      size += fs.statSync(itemPath).size;
    }
  }
  return size;
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)}GB`;
}

function mtimeMs(p: string): number | null {
  return fs.existsSync(p) ? fs.statSync(p).mtimeMs : null;
}

/**
 * Every run with a worktree or a state directory, sorted by run ID.
 */
export function scanRuns(paths: AdwPaths, now = Date.now()): RunArtifacts[] {
  const runIds = new Set([...listRunIds(paths.trees_dir), ...listRunIds(paths.agents_dir)]);
  const runs: RunArtifacts[] = [];

  for (const runId of runIds) {
    const worktree = getWorktreePath(paths, runId);
    const stateDir = getRunDir(paths, runId);
    const worktreePath = fs.existsSync(worktree) ? worktree : null;
    const statePath = fs.existsSync(stateDir) ? stateDir : null;

    const worktreeTime = worktreePath ? mtimeMs(worktreePath) : null;
    const stateTime = mtimeMs(getStatePath(paths, runId)) ?? (statePath ? mtimeMs(statePath) : null);
    const reference = worktreeTime ?? stateTime ?? now;
    const newest = Math.max(worktreeTime ?? 0, stateTime ?? 0);

    runs.push({
      runId,
      worktreePath,
      stateDir: statePath,
      size: (worktreePath ? getDirSize(worktreePath) : 0) + (statePath ? getDirSize(statePath) : 0),
      ageDays: Math.floor((now - reference) / DAY_MS),
      active: now - newest < ACTIVE_WINDOW_MS
    });
  }

  return runs.sort((a, b) => a.runId.localeCompare(b.runId));
}

/**
 * Which runs to clean: all of them, one by ID, or those at least
 * `olderThan` days old. Active runs are dropped first when asked.
 */
export function selectRuns(
  runs: RunArtifacts[],
  options: Pick<CleanupOptions, 'all' | 'runId' | 'olderThan' | 'keepActive'>
): { selected: RunArtifacts[] } | { error: string } {
  const candidates = options.keepActive ? runs.filter((r) => !r.active) : runs;
  if (options.all) {
    return { selected: candidates };
  }
  if (options.runId) {
    const match = candidates.find((r) => r.runId === options.runId);
    if (!match) {
      return { error: `ADW ID '${options.runId}' not found` };
    }
    return { selected: [match] };
  }
  return { selected: candidates.filter((r) => r.ageDays >= options.olderThan) };
}

export async function cleanupCommand(options: CleanupOptions): Promise<void> {
  if (options.worktreesOnly && options.statesOnly) {
    console.error('Error: --worktrees-only and --states-only cannot be used together');
    process.exitCode = 1;
    return;
  }

  const repoPath = path.resolve(options.repo);
  const config = loadConfig({ repoRoot: repoPath, configPath: options.config });
  const paths = getAdwPaths(repoPath, config);
  const runs = scanRuns(paths);

  if (runs.length === 0) {
    console.log('No ADW worktrees or state files found');
    return;
  }

  console.log('=== Disk Usage Summary ===\n');
  console.log('| Run ID   | Age (days) | Size     | Worktree | State |');
  console.log('|----------|------------|----------|----------|-------|');
  for (const run of runs) {
    const age = String(run.ageDays).padStart(10);
    const size = formatSize(run.size).padStart(8);
    const wt = (run.worktreePath ? 'yes' : 'no').padEnd(8);
    const st = (run.stateDir ? 'yes' : 'no').padEnd(5);
    console.log(`| ${run.runId.padEnd(8)} | ${age} | ${size} | ${wt} | ${st} |`);
  }
  console.log('');

  if (options.keepActive) {
    const active = runs.filter((r) => r.active).map((r) => r.runId);
    if (active.length > 0) {
      console.log(`Skipping ${active.length} active workflow(s): ${active.join(', ')}`);
    }
  }

  const selection = selectRuns(runs, options);
  if ('error' in selection) {
    console.error(`Error: ${selection.error}`);
    process.exitCode = 1;
    return;
  }
  const { selected } = selection;
  if (selected.length === 0) {
    console.log(`No ADW IDs older than ${options.olderThan} days found`);
    return;
  }

  const verb = options.dryRun ? '[DRY RUN] Would delete' : 'Deleting';
  let worktreesRemoved = 0;
  let statesRemoved = 0;
  let failed = 0;

  for (const run of selected) {
    if (run.worktreePath && !options.statesOnly) {
      console.log(`${verb} worktree: ${run.worktreePath}`);
      if (!options.dryRun) {
        try {
          await removeWorktree(paths.repo_root, run.worktreePath);
          worktreesRemoved++;
        } catch (err) {
          console.error(`  Failed: ${(err as Error).message}`);
          failed++;
        }
      }
    }
    if (run.stateDir && !options.worktreesOnly) {
      console.log(`${verb} state: ${run.stateDir}`);
      if (!options.dryRun) {
        fs.rmSync(run.stateDir, { recursive: true, force: true });
        statesRemoved++;
      }
    }
  }

  console.log('');
  if (options.dryRun) {
    console.log('Dry run complete. Use without --dry-run to actually delete.');
    return;
  }

  if (worktreesRemoved > 0) {
    await gitOptional(['worktree', 'prune'], paths.repo_root);
  }
  console.log(`Cleanup complete. Worktrees removed: ${worktreesRemoved}, states removed: ${statesRemoved}.`);
  if (failed > 0) {
    process.exitCode = 1;
  }
}
