import { WorkflowError, safeExecute } from '../errors.js';
import { findKeywordComment } from '../github/issues.js';
import { findExistingBranchForIssue } from '../repo/git-ops.js';
import { consoleLogger } from '../store/run-logger.js';
import { WorkflowState } from '../store/workflow-state.js';
import { Issue } from '../types/schemas.js';
import { PipelineInput, PipelineRun, WorkflowDeps, ensureRunId } from './context.js';
import { commitWithAgentMessage, createAndImplementPatch, finalizeGitOperations } from './ops.js';
import { resolveBranchName, resolveIssueClass } from './plan.js';
import { ensureIsolatedWorkspace } from './workspace.js';

export const PATCH_PHASE = 'adw_patch_iso';
export const PATCH_KEYWORD = 'adw_patch';
export const AGENT_PATCH_PLANNER = 'patch_planner';
export const AGENT_PATCH_IMPLEMENTOR = 'patch_implementor';

async function resolvePatchBranch(run: PipelineRun, issue: Issue): Promise<string> {
  const recorded = run.state.get('branch_name');
  if (recorded) {
    return recorded;
  }
  const existing = await findExistingBranchForIssue(run.issueNumber, run.runId, run.deps.paths.repo_root);
  if (existing) {
    run.logger.info(`Found existing branch: ${existing}`);
    run.state.update({ branch_name: existing });
    run.state.save(PATCH_PHASE);
    return existing;
  }
  run.logger.info('No existing branch found, creating new one');
  const issueClass = await resolveIssueClass(run, issue, PATCH_PHASE);
  return resolveBranchName(run, issue, issueClass, PATCH_PHASE);
}

/**
 * The change to make: the latest human comment mentioning the keyword,
 * else the issue itself when its body does.
 */
async function resolveChangeRequest(run: PipelineRun, issue: Issue): Promise<string> {
  const comment = findKeywordComment(PATCH_KEYWORD, issue);
  if (comment) {
    run.logger.info(`Found '${PATCH_KEYWORD}' in comment, using comment body`);
    await run.comment(
      'ops',
      `✅ Creating patch plan from comment containing '${PATCH_KEYWORD}':\n\n\`\`\`\n${comment.body}\n\`\`\``
    );
    return comment.body;
  }
  if (issue.body.includes(PATCH_KEYWORD)) {
    await run.comment('ops', `✅ Creating patch plan from issue containing '${PATCH_KEYWORD}'`);
    return `Issue #${issue.number}: ${issue.title}\n\n${issue.body}`;
  }
  throw new WorkflowError({
    ...run.context(),
    message: `No '${PATCH_KEYWORD}' keyword found in issue body or comments. Add '${PATCH_KEYWORD}' to trigger patch workflow.`
  });
}

/**
 * Apply a targeted change requested on the issue, in the run's worktree.
 * Creates the worktree (and branch) when this is the first phase of the run.
 */
export async function runPatch(deps: WorkflowDeps, input: PipelineInput): Promise<WorkflowState> {
  const { issueNumber } = input;
  const state = ensureRunId(issueNumber, input.runId, deps.paths.agents_dir, consoleLogger);
  state.appendHistory(PATCH_PHASE);
  state.update({ issue_number: issueNumber });
  state.save(PATCH_PHASE);

  const run = new PipelineRun(deps, state, issueNumber, PATCH_PHASE);
  const { logger } = run;
  logger.info(`ADW Patch Iso starting - ID: ${run.runId}, Issue: ${issueNumber}`);

  await run.preflight(['env_vars', 'git_repo', 'git_remote', 'disk_space', 'worktree_directory']);

  const issue = await safeExecute('Fetching issue', run.context(), () => deps.issues.fetchIssue(issueNumber));
  await run.comment('ops', '✅ Starting isolated patch workflow');

  const branchName = await resolvePatchBranch(run, issue);
  logger.info(`Working on branch: ${branchName}`);
  await run.comment('ops', `✅ Working on branch: ${branchName}`);

  const { worktreePath } = await ensureIsolatedWorkspace(run, branchName);
  await run.commentState('🔍 Using state');

  const changeRequest = await resolveChangeRequest(run, issue);

  const { patchFile, response } = await createAndImplementPatch(
    deps.agent,
    {
      runId: run.runId,
      changeRequest,
      specPath: null,
      plannerAgent: AGENT_PATCH_PLANNER,
      implementorAgent: AGENT_PATCH_IMPLEMENTOR,
      workingDir: worktreePath
    },
    logger
  );
  if (patchFile === null) {
    throw run.fail(response.output, AGENT_PATCH_PLANNER);
  }
  state.update({ patch_file: patchFile });
  state.save(PATCH_PHASE);
  await run.comment(AGENT_PATCH_PLANNER, `✅ Patch plan created: ${patchFile}`);

  if (!response.success) {
    throw run.fail(`Error implementing patch: ${response.output}`, AGENT_PATCH_IMPLEMENTOR);
  }
  await run.comment(AGENT_PATCH_IMPLEMENTOR, '✅ Patch implemented');

  const committed = await commitWithAgentMessage(
    run, AGENT_PATCH_IMPLEMENTOR, issue, '/patch', worktreePath
  );
  if (committed) {
    await run.comment(AGENT_PATCH_IMPLEMENTOR, '✅ Patch committed');
  }

  await run.comment('ops', '🔧 Finalizing git operations');
  await finalizeGitOperations(run, worktreePath, issue);

  await run.comment('ops', '✅ Isolated patch workflow completed');
  logger.info('ADW Patch Iso completed successfully');
  return state;
}
