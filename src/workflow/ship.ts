import { WorkflowState } from '../store/workflow-state.js';
import { WorkflowStateData } from '../types/schemas.js';
import { PipelineRun, WorkflowDeps, requireState } from './context.js';

export const SHIP_PHASE = 'adw_ship_iso';
export const AGENT_SHIPPER = 'shipper';

/** `patch_file` is only set by patch runs, so it is not required to ship. */
export const SHIP_REQUIRED_FIELDS = [
  'issue_number',
  'branch_name',
  'plan_file',
  'issue_class',
  'worktree_path',
  'backend_port'
] as const satisfies readonly (keyof WorkflowStateData)[];

export function missingShipFields(state: WorkflowState): string[] {
  return SHIP_REQUIRED_FIELDS.filter((field) => state.get(field) === null);
}

/**
 * Merge the run's pull request once every earlier phase has recorded its
 * results.
 */
export async function runShip(
  deps: WorkflowDeps,
  input: { issueNumber: string; runId: string }
): Promise<WorkflowState> {
  const state = requireState(input, deps.paths.agents_dir);
  const issueNumber = state.get('issue_number') ?? input.issueNumber;
  state.appendHistory(SHIP_PHASE);
  state.save(SHIP_PHASE);

  const run = new PipelineRun(deps, state, issueNumber, SHIP_PHASE);
  const { logger } = run;
  logger.info(`ADW Ship Iso starting - ID: ${run.runId}, Issue: ${issueNumber}`);

  const missing = missingShipFields(state);
  if (missing.length > 0) {
    throw run.fail(`Cannot ship: state is missing ${missing.join(', ')}`, AGENT_SHIPPER);
  }

  await run.preflight(['env_vars', 'git_repo', 'git_remote']);
  await run.requireWorktree();

  const branch = state.get('branch_name') ?? '';
  const pr = await deps.issues.findPullRequest(branch);
  if (!pr) {
    throw run.fail(`No open pull request for branch ${branch}`, AGENT_SHIPPER);
  }

  await run.comment(AGENT_SHIPPER, `🚢 Merging pull request: ${pr.url}`);
  try {
    await deps.issues.mergePullRequest(branch);
  } catch (err) {
    throw run.fail(`Failed to merge pull request: ${(err as Error).message}`, AGENT_SHIPPER);
  }

  await run.comment(AGENT_SHIPPER, `✅ Shipped! Merged ${pr.url}`);
  logger.info('ADW Ship Iso completed successfully');
  return state;
}
