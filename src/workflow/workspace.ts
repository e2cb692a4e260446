import { ensureRepoInfoExclude, ensureWorktree } from '../repo/worktree.js';
import { getWorktreePath } from '../store/runs-root.js';
import { PipelineRun } from './context.js';

export interface Workspace {
  worktreePath: string;
  backendPort: number;
  created: boolean;
}

/**
 * Worktree at `<trees>/<runId>` on the run's branch, plus its backend port.
 * The port is kept across re-runs and only reallocated when the worktree
 * had to be (re)created.
 */
export async function ensureIsolatedWorkspace(run: PipelineRun, branch: string): Promise<Workspace> {
  const { paths, ports } = run.deps;
  const worktreePath = getWorktreePath(paths, run.runId);

  ensureRepoInfoExclude(paths.repo_root, [paths.agents_dir, paths.trees_dir]);

  const ensured = await ensureWorktree(paths.repo_root, worktreePath, branch);
  if (!ensured.ok) {
    throw run.fail(`Failed to create worktree: ${ensured.error}`);
  }
  if (ensured.recovered) {
    run.logger.warn(`Recreated invalid worktree at ${worktreePath}`);
  }

  let backendPort = run.state.get('backend_port');
  if (backendPort === null || ensured.created) {
    try {
      backendPort = await ports.findAvailablePort(run.runId);
    } catch (err) {
      throw run.fail(`Port allocation failed: ${(err as Error).message}`);
    }
    run.logger.info(`Allocated backend port: ${backendPort}`);
  } else {
    run.logger.info(`Reusing backend port: ${backendPort}`);
  }

  run.state.update({ worktree_path: worktreePath, backend_port: backendPort });
  run.state.save('worktree');

  await run.comment(
    'ops',
    `✅ Using isolated worktree\n🏠 Path: ${worktreePath}\n🔌 Backend Port: ${backendPort}`
  );

  return { worktreePath, backendPort, created: ensured.created };
}
