import fs from 'node:fs';
import path from 'node:path';
import { AgentRunner } from '../agent/invoker.js';
import { StepResult, stepFailed, stepOk } from '../errors.js';
import { changedFiles, commitChanges, pushBranch } from '../repo/git-ops.js';
import { Logger } from '../store/run-logger.js';
import { WorkflowState } from '../store/workflow-state.js';
import { AgentPromptResponse, ISSUE_CLASSES, Issue, IssueClass, PullRequestRef } from '../types/schemas.js';
import { PipelineRun } from './context.js';

export const AGENT_CLASSIFIER = 'issue_classifier';
export const AGENT_BRANCH_GENERATOR = 'branch_generator';
export const AGENT_PLANNER = 'sdlc_planner';
export const AGENT_IMPLEMENTOR = 'sdlc_implementor';
export const AGENT_PR_CREATOR = 'pr_creator';

/** The fields of an issue the agent prompts receive. */
export function issueToPromptJson(issue: Issue): string {
  return JSON.stringify({ number: issue.number, title: issue.title, body: issue.body });
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isIssueClass(value: string): value is IssueClass {
  return (ISSUE_CLASSES as readonly string[]).includes(value);
}

const CLASSIFICATION_PATTERNS: RegExp[] = [
  /(?:\*\*)?Classification[:\s]+[`*]*(\/chore|\/bug|\/feature|0)[`*]+/i,
  /(?:\*\*)?Classification[:\s]*[`*]*(\/chore|\/bug|\/feature|0)[`*]*/i,
  /(?:^|\s|`|\*)(\/chore|\/bug|\/feature|0)(?:\s|`|\*|$)/,
  /^\s*(\/chore|\/bug|\/feature|0)\s*$/m
];

/**
 * Pull the issue class out of the classifier's reply. The reply is free
 * text, so the patterns go from most to least specific.
 */
export function parseIssueClass(rawOutput: string): StepResult<IssueClass> {
  const output = rawOutput.trim();
  let command = output;
  for (const pattern of CLASSIFICATION_PATTERNS) {
    const match = pattern.exec(output);
    if (match) {
      command = match[1];
      break;
    }
  }

  if (['chore', 'bug', 'feature'].includes(command)) {
    command = `/${command}`;
  }
  if (command === '0') {
    return stepFailed(`No command selected: ${rawOutput}`);
  }
  if (!isIssueClass(command)) {
    return stepFailed(
      `Invalid command selected. Expected /chore, /bug, or /feature, got: ${command}. ` +
      `Full response: ${rawOutput.slice(0, 200)}`
    );
  }
  return stepOk(command);
}

export async function classifyIssue(
  agent: AgentRunner,
  issue: Issue,
  runId: string,
  logger: Logger
): Promise<StepResult<IssueClass>> {
  logger.debug(`Classifying issue: ${issue.title}`);
  const response = await agent.executeTemplate({
    agentName: AGENT_CLASSIFIER,
    slashCommand: '/classify_issue',
    args: [issueToPromptJson(issue)],
    runId
  });
  if (!response.success) {
    return stepFailed(response.output);
  }
  return parseIssueClass(response.output);
}

/** Replace characters git rejects in ref names, then tidy the hyphens. */
export function sanitizeBranchName(name: string): string {
  return name
    .replace(/[ ~^:?*[\\@{}\n\r\t]/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
}

function stripQuotes(line: string): string {
  return line.replace(/[`"']/g, '').trim();
}

export function parseBranchName(
  rawOutput: string,
  issueType: string,
  runId: string,
  issueNumber: number
): StepResult<string> {
  const output = rawOutput.trim();
  const expected = new RegExp(
    `${escapeRegExp(issueType)}-issue-\\d+-adw-${escapeRegExp(runId)}-[a-z0-9-]+`,
    'i'
  );

  let branch: string | null = null;
  const codeBlock = /```(?:[a-z]+)?\n([a-z0-9-]+)\n```/i.exec(output);
  const direct = expected.exec(output);
  if (codeBlock) {
    branch = codeBlock[1].trim();
  } else if (direct) {
    branch = direct[0];
  } else {
    const lines = output.split('\n').map((l) => l.trim());
    const candidate = lines.find((line) =>
      line.includes(`issue-${issueNumber}`) &&
      line.includes(runId) &&
      line.toLowerCase().includes(issueType) &&
      line.includes('-') &&
      !/^[#*`]/.test(line)
    );
    if (candidate) {
      const cleaned = stripQuotes(candidate);
      branch = expected.exec(cleaned)?.[0] ?? cleaned;
    } else {
      for (const line of lines) {
        if (!line || line.startsWith('#') || line.startsWith('*')) continue;
        const cleaned = stripQuotes(line).replace(/^[*-]\s*/, '');
        if (cleaned && cleaned.length < 100) {
          branch = cleaned;
          break;
        }
      }
    }
  }

  if (!branch) {
    return stepFailed('Could not extract branch name from response');
  }
  const sanitized = sanitizeBranchName(branch);
  if (!sanitized) {
    return stepFailed('Could not extract valid branch name from response');
  }
  return stepOk(sanitized);
}

export async function generateBranchName(
  agent: AgentRunner,
  issue: Issue,
  issueClass: IssueClass,
  runId: string,
  logger: Logger
): Promise<StepResult<string>> {
  const issueType = issueClass.slice(1);
  const response = await agent.executeTemplate({
    agentName: AGENT_BRANCH_GENERATOR,
    slashCommand: '/generate_branch_name',
    args: [issueType, runId, issueToPromptJson(issue)],
    runId
  });
  if (!response.success) {
    return stepFailed(response.output);
  }
  const parsed = parseBranchName(response.output, issueType, runId, issue.number);
  if (parsed.value !== null) {
    logger.info(`Generated branch name: ${parsed.value}`);
  }
  return parsed;
}

export function buildPlan(
  agent: AgentRunner,
  issue: Issue,
  issueClass: IssueClass,
  runId: string,
  workingDir: string
): Promise<AgentPromptResponse> {
  return agent.executeTemplate({
    agentName: AGENT_PLANNER,
    slashCommand: issueClass,
    args: [String(issue.number), runId, issueToPromptJson(issue)],
    runId,
    workingDir
  });
}

/** Plan paths come back relative to the worktree. */
export function resolvePlanPath(output: string, worktreePath: string): string {
  const planFile = output.trim();
  return path.isAbsolute(planFile) ? planFile : path.join(worktreePath, planFile);
}

export function implementPlan(
  agent: AgentRunner,
  planFile: string,
  runId: string,
  workingDir: string,
  agentName = AGENT_IMPLEMENTOR
): Promise<AgentPromptResponse> {
  return agent.executeTemplate({
    agentName,
    slashCommand: '/implement',
    args: [planFile],
    runId,
    workingDir
  });
}

export async function createCommitMessage(
  agent: AgentRunner,
  agentName: string,
  issue: Issue,
  commitType: string,
  runId: string,
  workingDir: string
): Promise<StepResult<string>> {
  const response = await agent.executeTemplate({
    agentName: `${agentName}_committer`,
    slashCommand: '/commit',
    args: [agentName, commitType.replace(/^\//, ''), issueToPromptJson(issue)],
    runId,
    workingDir
  });
  if (!response.success) {
    return stepFailed(response.output);
  }
  return stepOk(response.output.trim());
}

/**
 * Ask the agent for a commit message and commit everything in the worktree.
 * Every failure here is a warning.
 */
export async function commitWithAgentMessage(
  run: PipelineRun,
  agentName: string,
  issue: Issue,
  commitType: string,
  worktreePath: string
): Promise<boolean> {
  const message = await createCommitMessage(
    run.deps.agent, agentName, issue, commitType, run.runId, worktreePath
  );
  if (message.error !== null) {
    run.logger.warn(`Failed to create commit message: ${message.error}`);
    return false;
  }
  run.logger.info(`Created commit message: ${message.value}`);
  return commitOrWarn(run, message.value, worktreePath);
}

export async function commitOrWarn(run: PipelineRun, message: string, worktreePath: string): Promise<boolean> {
  const result = await commitChanges(message, worktreePath);
  if (!result.ok) {
    run.logger.warn(`Failed to commit: ${result.error}`);
    return false;
  }
  if (!result.committed) {
    run.logger.info('Nothing to commit');
  }
  return true;
}

/**
 * Push the branch and make sure a pull request exists for it. Push and PR
 * failures are warnings; the work is already committed.
 */
export async function finalizeGitOperations(
  run: PipelineRun,
  worktreePath: string,
  issue: Issue | null
): Promise<void> {
  const branch = run.state.get('branch_name');
  if (!branch) {
    run.logger.warn('No branch name in state - skipping push');
    return;
  }

  const pushed = await pushBranch(branch, worktreePath);
  if (!pushed.ok) {
    run.logger.warn(`Failed to push branch ${branch}: ${pushed.error}`);
    return;
  }
  run.logger.info(`Pushed branch: ${branch}`);

  let existing: PullRequestRef | null;
  try {
    existing = await run.deps.issues.findPullRequest(branch);
  } catch (err) {
    run.logger.warn(`Failed to look up pull request: ${(err as Error).message}`);
    return;
  }
  if (existing) {
    await run.comment('ops', `✅ Pull request updated: ${existing.url}`);
    return;
  }

  const issueJson = issue ? issueToPromptJson(issue) : '{}';
  const response = await run.deps.agent.executeTemplate({
    agentName: AGENT_PR_CREATOR,
    slashCommand: '/pull_request',
    args: [branch, issueJson, run.state.get('plan_file') ?? 'No plan file (test run)', run.runId],
    runId: run.runId,
    workingDir: worktreePath
  });
  if (!response.success) {
    run.logger.warn(`Failed to create pull request: ${response.output}`);
    return;
  }
  const prUrl = response.output.trim();
  run.logger.info(`Created pull request: ${prUrl}`);
  await run.comment('ops', `✅ Pull request created: ${prUrl}`);
}

/**
 * The plan this run is working from: the recorded plan file, else the first
 * spec in the branch diff, else a spec named after the issue and run.
 */
export async function findSpecFile(state: WorkflowState, logger: Logger): Promise<string | null> {
  const worktreePath = state.get('worktree_path');

  const planFile = state.get('plan_file');
  if (planFile) {
    const candidate = worktreePath && !path.isAbsolute(planFile)
      ? path.join(worktreePath, planFile)
      : planFile;
    if (fs.existsSync(candidate)) {
      logger.info(`Using spec file from state: ${candidate}`);
      return candidate;
    }
  }

  const cwd = worktreePath ?? process.cwd();
  logger.info('Looking for spec file in git diff');
  const files = await changedFiles('origin/main', cwd);
  const fromDiff = files?.find((f) => f.startsWith('specs/') && f.endsWith('.md'));
  if (fromDiff) {
    const specFile = path.join(cwd, fromDiff);
    logger.info(`Found spec file: ${specFile}`);
    return specFile;
  }

  const issueNumber = /issue-(\d+)/.exec(state.get('branch_name') ?? '')?.[1];
  const specsDir = path.join(cwd, 'specs');
  if (issueNumber && fs.existsSync(specsDir)) {
    const prefix = `issue-${issueNumber}-adw-${state.runId}`;
    const match = fs.readdirSync(specsDir)
      .sort()
      .find((name) => name.startsWith(prefix) && name.endsWith('.md'));
    if (match) {
      const specFile = path.join(specsDir, match);
      logger.info(`Found spec file by pattern: ${specFile}`);
      return specFile;
    }
  }

  logger.warn('No spec file found');
  return null;
}

export interface PatchRequest {
  runId: string;
  changeRequest: string;
  specPath: string | null;
  plannerAgent: string;
  implementorAgent: string;
  workingDir: string;
}

export interface PatchOutcome {
  patchFile: string | null;
  response: AgentPromptResponse;
}

/**
 * `/patch` writes a patch plan under specs/patch/, then `/implement` applies it.
 */
export async function createAndImplementPatch(
  agent: AgentRunner,
  request: PatchRequest,
  logger: Logger
): Promise<PatchOutcome> {
  const planResponse = await agent.executeTemplate({
    agentName: request.plannerAgent,
    slashCommand: '/patch',
    args: [request.runId, request.changeRequest, request.specPath ?? '', request.plannerAgent],
    runId: request.runId,
    workingDir: request.workingDir
  });

  if (!planResponse.success) {
    logger.error(`Error creating patch plan: ${planResponse.output}`);
    return {
      patchFile: null,
      response: { output: `Failed to create patch plan: ${planResponse.output}`, success: false, retryCode: 'none' }
    };
  }

  const patchFile = planResponse.output.trim();
  if (!patchFile.includes('specs/patch/') || !patchFile.endsWith('.md')) {
    logger.error(`Invalid patch plan path returned: ${patchFile}`);
    return {
      patchFile: null,
      response: { output: `Invalid patch plan path: ${patchFile}`, success: false, retryCode: 'none' }
    };
  }

  logger.info(`Created patch plan: ${patchFile}`);
  const response = await implementPlan(agent, patchFile, request.runId, request.workingDir, request.implementorAgent);
  return { patchFile, response };
}
