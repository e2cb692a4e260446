import path from 'node:path';
import { AdwConfig } from '../config/schema.js';

/**
 * Canonical ADW paths for a repository.
 *
 * Layout:
 * ```
 * agents/
 *   <runId>/state.json
 *   <runId>/<agentName>/raw_output.jsonl
 *   <runId>/<agentName>/prompts/<command>.txt
 *   <runId>/<phase>/execution.log
 * trees/
 *   <runId>/
 * ```
 */
export interface AdwPaths {
  /** The target repository root */
  repo_root: string;
  /** Per-run state, transcripts and logs */
  agents_dir: string;
  /** Worktree checkouts */
  trees_dir: string;
}

function resolveUnder(repoRoot: string, dir: string): string {
  return path.isAbsolute(dir) ? dir : path.resolve(repoRoot, dir);
}

export function getAdwPaths(repoPath: string, config: AdwConfig): AdwPaths {
  const repoRoot = path.resolve(repoPath);
  return {
    repo_root: repoRoot,
    agents_dir: resolveUnder(repoRoot, config.paths.agents_dir),
    trees_dir: resolveUnder(repoRoot, config.paths.trees_dir)
  };
}

export function getRunDir(paths: AdwPaths, runId: string): string {
  return path.join(paths.agents_dir, runId);
}

export function getStatePath(paths: AdwPaths, runId: string): string {
  return path.join(getRunDir(paths, runId), 'state.json');
}

/** Transcripts and prompts of one agent within a run. */
export function getAgentDir(agentsDir: string, runId: string, agentName: string): string {
  return path.join(agentsDir, runId, agentName);
}

export function getWorktreePath(paths: AdwPaths, runId: string): string {
  return path.join(paths.trees_dir, runId);
}
