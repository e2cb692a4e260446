import { WorkflowState } from '../store/workflow-state.js';
import { PipelineRun, WorkflowDeps, requireState } from './context.js';
import { commitOrWarn, finalizeGitOperations, findSpecFile } from './ops.js';

export const DOCUMENT_PHASE = 'adw_document_iso';
export const AGENT_DOCUMENTER = 'documenter';

export async function runDocument(
  deps: WorkflowDeps,
  input: { issueNumber: string; runId: string }
): Promise<WorkflowState> {
  const state = requireState(input, deps.paths.agents_dir);
  const issueNumber = state.get('issue_number') ?? input.issueNumber;
  state.appendHistory(DOCUMENT_PHASE);
  state.save(DOCUMENT_PHASE);

  const run = new PipelineRun(deps, state, issueNumber, DOCUMENT_PHASE);
  const { logger } = run;
  logger.info(`ADW Document Iso starting - ID: ${run.runId}, Issue: ${issueNumber}`);

  await run.preflight(['env_vars', 'git_repo', 'git_remote']);
  const worktreePath = await run.requireWorktree();

  const specFile = await findSpecFile(state, logger);
  if (!specFile) {
    throw run.fail('No spec file found - run plan first', AGENT_DOCUMENTER);
  }

  await run.comment(AGENT_DOCUMENTER, '📚 Generating documentation...');
  const response = await deps.agent.executeTemplate({
    agentName: AGENT_DOCUMENTER,
    slashCommand: '/document',
    args: [run.runId, specFile],
    runId: run.runId,
    workingDir: worktreePath
  });
  if (!response.success) {
    throw run.fail(`Documentation failed: ${response.output.slice(0, 500)}`, AGENT_DOCUMENTER);
  }
  const docPath = response.output.trim();
  logger.info(`Documentation written: ${docPath}`);

  await commitOrWarn(run, `docs: Add documentation (ADW ${run.runId})`, worktreePath);
  await finalizeGitOperations(run, worktreePath, null);

  await run.comment(AGENT_DOCUMENTER, `✅ Documentation complete: ${docPath}`);
  return state;
}
