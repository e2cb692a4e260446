import { safeExecute } from '../errors.js';
import { checkoutBranch } from '../repo/git-ops.js';
import { WorkflowState } from '../store/workflow-state.js';
import { Issue } from '../types/schemas.js';
import { PipelineRun, WorkflowDeps, requireState } from './context.js';
import { AGENT_IMPLEMENTOR, commitWithAgentMessage, finalizeGitOperations, implementPlan } from './ops.js';

export const BUILD_PHASE = 'adw_build_iso';

/**
 * Implement the recorded plan inside the run's existing worktree. Needs a
 * prior plan run: without state nothing is created.
 */
export async function runBuild(
  deps: WorkflowDeps,
  input: { issueNumber: string; runId: string }
): Promise<WorkflowState> {
  const state = requireState(input, deps.paths.agents_dir);
  const issueNumber = state.get('issue_number') ?? input.issueNumber;

  const run = new PipelineRun(deps, state, issueNumber, BUILD_PHASE);
  const { logger } = run;
  await run.commentState('🔍 Found existing state - resuming isolated build');

  state.appendHistory(BUILD_PHASE);
  state.save(BUILD_PHASE);
  logger.info(`ADW Build Iso starting - ID: ${run.runId}, Issue: ${issueNumber}`);

  await run.preflight(['env_vars', 'git_repo', 'git_remote']);

  const worktreePath = await run.requireWorktree();

  const branchName = state.get('branch_name');
  if (!branchName) {
    throw run.fail('No branch name in state - run plan first');
  }
  const planFile = state.get('plan_file');
  if (!planFile) {
    throw run.fail('No plan file in state - run plan first');
  }

  const checkout = await checkoutBranch(branchName, worktreePath);
  if (!checkout.ok) {
    throw run.fail(`Failed to checkout branch ${branchName} in worktree: ${checkout.error}`);
  }
  logger.info(`Checked out branch in worktree: ${branchName}`);
  logger.info(`Using plan file: ${planFile}`);

  await run.comment(AGENT_IMPLEMENTOR, '🔨 Starting implementation...');
  const response = await safeExecute('Implementing plan', run.context(AGENT_IMPLEMENTOR), () =>
    implementPlan(deps.agent, planFile, run.runId, worktreePath)
  );
  if (!response.success) {
    throw run.fail(`Implementation failed: ${response.output.slice(0, 500)}`, AGENT_IMPLEMENTOR);
  }
  logger.info('Implementation completed successfully');

  let issue: Issue | null = null;
  try {
    issue = await deps.issues.fetchIssue(issueNumber);
    await commitWithAgentMessage(run, AGENT_IMPLEMENTOR, issue, state.get('issue_class') ?? '/feature', worktreePath);
  } catch (err) {
    logger.warn(`Could not create commit: ${(err as Error).message}`);
  }

  await finalizeGitOperations(run, worktreePath, issue);

  await run.comment(AGENT_IMPLEMENTOR, '✅ Implementation complete!');
  logger.info('ADW Build Iso completed successfully');
  return state;
}
