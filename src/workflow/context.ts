import fs from 'node:fs';
import { AgentRunner } from '../agent/invoker.js';
import { PreflightContext, PreflightRunOptions, runPreflightChecks } from '../commands/preflight.js';
import { AdwConfig } from '../config/schema.js';
import { ErrorContext, WorkflowError } from '../errors.js';
import { IssueRepository, formatIssueMessage } from '../github/issues.js';
import { PortAllocator } from '../repo/ports.js';
import { validateWorktreePath } from '../repo/worktree.js';
import { SonarQubeClient } from '../sonar/client.js';
import { Logger, RunLogger, consoleLogger } from '../store/run-logger.js';
import { makeRunId } from '../store/run-utils.js';
import { AdwPaths } from '../store/runs-root.js';
import { WorkflowState } from '../store/workflow-state.js';

export type PreflightRunner = (ctx: PreflightContext, options: PreflightRunOptions) => Promise<unknown>;

/**
 * Everything a pipeline talks to. The CLI wires the real implementations;
 * tests substitute fakes for the agent and the issue repository.
 */
export interface WorkflowDeps {
  config: AdwConfig;
  paths: AdwPaths;
  issues: IssueRepository;
  agent: AgentRunner;
  ports: PortAllocator;
  sonar?: SonarQubeClient | null;
  preflight?: PreflightRunner;
  createLogger?: (runId: string, phase: string) => Logger;
}

export interface PipelineInput {
  issueNumber: string;
  runId?: string;
}

/**
 * One pipeline invocation against one run: its state, logger and the
 * helpers every step uses to comment and fail.
 */
export class PipelineRun {
  readonly deps: WorkflowDeps;
  readonly state: WorkflowState;
  readonly issueNumber: string;
  readonly logger: Logger;

  constructor(deps: WorkflowDeps, state: WorkflowState, issueNumber: string, phase: string) {
    this.deps = deps;
    this.state = state;
    this.issueNumber = issueNumber;
    this.logger = (deps.createLogger ?? defaultLogger(deps))(state.runId, phase);
  }

  get runId(): string {
    return this.state.runId;
  }

  context(agentName = 'ops'): ErrorContext {
    return { issueNumber: this.issueNumber, runId: this.runId, agentName };
  }

  fail(message: string, agentName = 'ops'): WorkflowError {
    return new WorkflowError({ ...this.context(agentName), message });
  }

  /** Progress comment; a failure to post is logged, never fatal. */
  async comment(agentName: string, message: string): Promise<void> {
    try {
      await this.deps.issues.postComment(
        this.issueNumber,
        formatIssueMessage(this.runId, agentName, message)
      );
    } catch (err) {
      this.logger.warn(`Failed to post issue comment: ${(err as Error).message}`);
    }
  }

  async commentState(message: string): Promise<void> {
    const json = JSON.stringify(this.state.toJSON(), null, 2);
    await this.comment('ops', `${message}\n\`\`\`json\n${json}\n\`\`\``);
  }

  async preflight(checks: PreflightRunOptions['checks']): Promise<void> {
    const runner = this.deps.preflight ?? runPreflightChecks;
    await runner(
      { config: this.deps.config, paths: this.deps.paths },
      {
        checks,
        logger: this.logger,
        issues: this.deps.issues,
        issueNumber: this.issueNumber,
        runId: this.runId
      }
    );
  }

  /**
   * The recorded worktree, validated. Dependent pipelines never recreate it.
   */
  async requireWorktree(): Promise<string> {
    const worktreePath = this.state.get('worktree_path');
    if (!worktreePath) {
      throw this.fail('Worktree validation failed: No worktree path in state. Run plan first');
    }
    const validation = await validateWorktreePath(this.deps.paths.repo_root, worktreePath);
    if (!validation.valid) {
      throw this.fail(`Worktree validation failed: ${validation.reason}. Run plan first`);
    }
    this.logger.info(`Using worktree at: ${worktreePath}`);
    return worktreePath;
  }
}

function defaultLogger(deps: WorkflowDeps): (runId: string, phase: string) => Logger {
  return (runId, phase) => new RunLogger(deps.paths.agents_dir, runId, phase);
}

/**
 * Reuse the run's state when it exists; otherwise create and save it,
 * generating a run ID when none was given.
 */
export function ensureRunId(
  issueNumber: string,
  runId: string | undefined,
  agentsDir: string,
  logger: Logger = consoleLogger
): WorkflowState {
  if (runId) {
    const existing = WorkflowState.load(runId, agentsDir);
    if (existing) {
      logger.info(`Found existing ADW state for ID: ${runId}`);
      return existing;
    }
    const state = WorkflowState.create(runId, agentsDir);
    state.update({ issue_number: issueNumber });
    state.save('ensure_run_id');
    logger.info(`Created new ADW state for provided ID: ${runId}`);
    return state;
  }

  const newId = makeRunId();
  const state = WorkflowState.create(newId, agentsDir);
  state.update({ issue_number: issueNumber });
  state.save('ensure_run_id');
  logger.info(`Created new ADW ID and state: ${newId}`);
  return state;
}

/**
 * Load the state a dependent pipeline needs. A missing state fails before
 * anything is created on disk.
 */
export function requireState(input: Required<PipelineInput>, agentsDir: string): WorkflowState {
  const state = WorkflowState.load(input.runId, agentsDir);
  if (!state) {
    throw new WorkflowError({
      message: `No state found for ADW ID: ${input.runId}. Run plan first to create the worktree and state`,
      issueNumber: input.issueNumber,
      runId: input.runId
    });
  }
  return state;
}

export function fileExists(p: string | null): p is string {
  return p !== null && fs.existsSync(p);
}
