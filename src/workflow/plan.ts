import { requireValue, safeExecute } from '../errors.js';
import { consoleLogger } from '../store/run-logger.js';
import { WorkflowState } from '../store/workflow-state.js';
import { Issue, IssueClass } from '../types/schemas.js';
import { PipelineInput, PipelineRun, WorkflowDeps, ensureRunId, fileExists } from './context.js';
import {
  AGENT_PLANNER,
  buildPlan,
  classifyIssue,
  commitWithAgentMessage,
  finalizeGitOperations,
  generateBranchName,
  resolvePlanPath
} from './ops.js';
import { ensureIsolatedWorkspace } from './workspace.js';

export const PLAN_PHASE = 'adw_plan_iso';

export async function resolveIssueClass(run: PipelineRun, issue: Issue, label = PLAN_PHASE): Promise<IssueClass> {
  const recorded = run.state.get('issue_class');
  if (recorded) {
    run.logger.info(`Using recorded issue class: ${recorded}`);
    return recorded;
  }
  const issueClass = requireValue(
    await classifyIssue(run.deps.agent, issue, run.runId, run.logger),
    run.context(),
    'Failed to classify issue'
  );
  run.state.update({ issue_class: issueClass });
  run.state.save(label);
  run.logger.info(`Issue classified as: ${issueClass}`);
  return issueClass;
}

export async function resolveBranchName(
  run: PipelineRun,
  issue: Issue,
  issueClass: IssueClass,
  label = PLAN_PHASE
): Promise<string> {
  const recorded = run.state.get('branch_name');
  if (recorded) {
    run.logger.info(`Using recorded branch: ${recorded}`);
    return recorded;
  }
  const branchName = requireValue(
    await generateBranchName(run.deps.agent, issue, issueClass, run.runId, run.logger),
    run.context(),
    'Failed to generate branch name'
  );
  run.state.update({ branch_name: branchName });
  run.state.save(label);
  return branchName;
}

/**
 * Classify the issue, name a branch, set up the isolated worktree and write
 * the implementation plan. Steps whose artifact is already in the state are
 * skipped, so re-running with the same run ID resumes.
 */
export async function runPlan(deps: WorkflowDeps, input: PipelineInput): Promise<WorkflowState> {
  const { issueNumber } = input;
  const state = ensureRunId(issueNumber, input.runId, deps.paths.agents_dir, consoleLogger);
  state.appendHistory(PLAN_PHASE);
  state.update({ issue_number: issueNumber });
  state.save(PLAN_PHASE);

  const run = new PipelineRun(deps, state, issueNumber, PLAN_PHASE);
  const { logger } = run;
  logger.info(`ADW Plan Iso starting - ID: ${run.runId}, Issue: ${issueNumber}`);

  await run.preflight(['env_vars', 'git_repo', 'git_remote', 'disk_space', 'worktree_directory']);

  const issue = await safeExecute('Fetching issue', run.context(), () => deps.issues.fetchIssue(issueNumber));
  await run.comment('ops', '🚀 Starting ADW planning workflow...');

  const issueClass = await resolveIssueClass(run, issue);
  const branchName = await resolveBranchName(run, issue, issueClass);

  const { worktreePath } = await ensureIsolatedWorkspace(run, branchName);

  let planFile = state.get('plan_file');
  if (fileExists(planFile)) {
    logger.info(`Plan already exists: ${planFile}`);
  } else {
    await run.comment(AGENT_PLANNER, '📝 Building implementation plan...');
    const response = await safeExecute('Building plan', run.context(AGENT_PLANNER), () =>
      buildPlan(deps.agent, issue, issueClass, run.runId, worktreePath)
    );
    if (!response.success) {
      throw run.fail(`Failed to build plan: ${response.output}`, AGENT_PLANNER);
    }
    planFile = resolvePlanPath(response.output, worktreePath);
    state.update({ plan_file: planFile });
    state.save(PLAN_PHASE);
    logger.info(`Plan file created: ${planFile}`);
  }

  await commitWithAgentMessage(run, AGENT_PLANNER, issue, issueClass, worktreePath);
  await finalizeGitOperations(run, worktreePath, issue);

  await run.comment(AGENT_PLANNER, `✅ Planning complete! Plan file: ${planFile}`);
  logger.info('ADW Plan Iso completed successfully');
  return state;
}
