import fs from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';

/**
 * New run ID: the first 8 hex characters of a random UUID.
 */
export function makeRunId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Run directories under a root (agents or trees), oldest first by mtime.
 */
export function listRunIds(rootDir: string): string[] {
  if (!fs.existsSync(rootDir)) {
    return [];
  }
  return fs
    .readdirSync(rootDir, { withFileTypes: true })
    .filter((e) => e.isDirectory())
    .map((e) => ({ name: e.name, mtime: fs.statSync(path.join(rootDir, e.name)).mtimeMs }))
    .sort((a, b) => a.mtime - b.mtime || a.name.localeCompare(b.name))
    .map((e) => e.name);
}

/**
 * Run IDs that have a saved state file, most recently modified first.
 */
export function listRecentRunIds(agentsDir: string, limit = 10): string[] {
  return listRunIds(agentsDir)
    .filter((id) => fs.existsSync(path.join(agentsDir, id, 'state.json')))
    .reverse()
    .slice(0, limit);
}

/**
 * Resolve a run ID, supporting 'latest' as a special value.
 * @throws Error if 'latest' is given but no run has saved state
 */
export function resolveRunId(runId: string, agentsDir: string): string {
  if (runId !== 'latest') {
    return runId;
  }
  const latest = listRecentRunIds(agentsDir, 1)[0];
  if (!latest) {
    throw new Error('No runs found. Start one with `adw plan <issue>`.');
  }
  return latest;
}
