import { requireValue } from '../errors.js';
import { WorkflowState } from '../store/workflow-state.js';
import { ReviewIssue, ReviewResult } from '../types/schemas.js';
import { PipelineRun, WorkflowDeps, requireState } from './context.js';
import { commitOrWarn, createAndImplementPatch, finalizeGitOperations, findSpecFile } from './ops.js';
import { parseReviewResult } from './parse.js';

export const REVIEW_PHASE = 'adw_review_iso';
export const AGENT_REVIEWER = 'reviewer';

export interface BlockerOutcome {
  issue: ReviewIssue;
  resolved: boolean;
  patchFile: string | null;
}

export function formatReviewComment(review: ReviewResult, outcomes: BlockerOutcome[]): string {
  const lines = [
    review.success ? '## ✅ Review Passed' : '## ⚠️ Review Found Issues',
    '',
    review.review_summary || 'No summary provided.'
  ];
  if (review.review_issues.length > 0) {
    lines.push('', '### Issues');
    for (const issue of review.review_issues) {
      const outcome = outcomes.find((o) => o.issue.review_issue_number === issue.review_issue_number);
      const status = outcome ? (outcome.resolved ? ' (patched)' : ' (patch failed)') : '';
      lines.push(`- **#${issue.review_issue_number}** [${issue.issue_severity}]${status}: ${issue.issue_description}`);
    }
  }
  return lines.join('\n');
}

/**
 * Review the implementation against the plan and patch every blocker the
 * reviewer reports.
 */
export async function runReview(
  deps: WorkflowDeps,
  input: { issueNumber: string; runId: string }
): Promise<WorkflowState> {
  const state = requireState(input, deps.paths.agents_dir);
  const issueNumber = state.get('issue_number') ?? input.issueNumber;
  state.appendHistory(REVIEW_PHASE);
  state.save(REVIEW_PHASE);

  const run = new PipelineRun(deps, state, issueNumber, REVIEW_PHASE);
  const { logger } = run;
  logger.info(`ADW Review Iso starting - ID: ${run.runId}, Issue: ${issueNumber}`);

  await run.preflight(['env_vars', 'git_repo', 'git_remote']);
  const worktreePath = await run.requireWorktree();

  const specFile = await findSpecFile(state, logger);
  if (!specFile) {
    throw run.fail('No spec file found - run plan first', AGENT_REVIEWER);
  }

  await run.comment(AGENT_REVIEWER, `🔍 Reviewing implementation against ${specFile}`);
  const response = await deps.agent.executeTemplate({
    agentName: AGENT_REVIEWER,
    slashCommand: '/review',
    args: [run.runId, specFile, AGENT_REVIEWER],
    runId: run.runId,
    workingDir: worktreePath
  });
  if (!response.success) {
    throw run.fail(`Review failed: ${response.output.slice(0, 500)}`, AGENT_REVIEWER);
  }
  const review = requireValue(parseReviewResult(response.output), run.context(AGENT_REVIEWER), 'Failed to parse review');
  logger.info(`Review reported ${review.review_issues.length} issue(s)`);

  const outcomes: BlockerOutcome[] = [];
  for (const issue of review.review_issues.filter((i) => i.issue_severity === 'blocker')) {
    const n = issue.review_issue_number;
    logger.info(`Patching blocker #${n}: ${issue.issue_description}`);
    const { patchFile, response: patchResponse } = await createAndImplementPatch(
      deps.agent,
      {
        runId: run.runId,
        changeRequest: `${issue.issue_description}\n\n${issue.issue_resolution}`.trim(),
        specPath: specFile,
        plannerAgent: `review_patch_planner_${n}`,
        implementorAgent: `review_patch_implementor_${n}`,
        workingDir: worktreePath
      },
      logger
    );
    if (!patchResponse.success) {
      logger.warn(`Patch for blocker #${n} failed: ${patchResponse.output}`);
    }
    outcomes.push({ issue, resolved: patchResponse.success, patchFile });
  }

  await run.comment(AGENT_REVIEWER, formatReviewComment(review, outcomes));

  const patched = outcomes.filter((o) => o.resolved).length;
  await commitOrWarn(
    run,
    `review: Address review findings (ADW ${run.runId})\n\n- Issues: ${review.review_issues.length}\n- Blockers patched: ${patched}`,
    worktreePath
  );
  await finalizeGitOperations(run, worktreePath, null);

  const unresolved = outcomes.filter((o) => !o.resolved).length;
  if (unresolved > 0) {
    throw run.fail(`${unresolved} blocker(s) could not be patched`, AGENT_REVIEWER);
  }

  await run.comment(AGENT_REVIEWER, '✅ Review complete!');
  logger.info('ADW Review Iso completed successfully');
  return state;
}
