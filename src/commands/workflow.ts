import path from 'node:path';
import { AgentInvoker } from '../agent/invoker.js';
import { loadConfig } from '../config/load.js';
import { AdwConfig } from '../config/schema.js';
import { WorkflowError, reportError, toWorkflowError } from '../errors.js';
import { GhIssueRepository, IssueRepository, extractRepoPath } from '../github/issues.js';
import { getRemoteUrl } from '../repo/git-ops.js';
import { PortAllocator } from '../repo/ports.js';
import { SonarQubeClient } from '../sonar/client.js';
import { consoleLogger } from '../store/run-logger.js';
import { getAdwPaths } from '../store/runs-root.js';
import { WorkflowDeps } from '../workflow/context.js';

export interface RepoOptions {
  repo?: string;
  config?: string;
}

/** `owner/repo` of the repository issues and pull requests live in. */
export async function resolveGithubRepo(config: AdwConfig, repoRoot: string): Promise<string> {
  const url = config.github.repo_url ?? (await getRemoteUrl(repoRoot));
  if (!url) {
    throw new WorkflowError({
      message: 'No git remote "origin" and no GITHUB_REPO_URL set',
      severity: 'critical'
    });
  }
  return extractRepoPath(url);
}

export function createSonarClient(config: AdwConfig): SonarQubeClient | null {
  const { sonarqube_url: url, sonarqube_project_key: projectKey, sonarqube_token: token } = config.env;
  if (!url || !projectKey) {
    return null;
  }
  return new SonarQubeClient({ url, projectKey, token });
}

export function createIssueRepository(config: AdwConfig, repoPath: string): IssueRepository {
  return new GhIssueRepository({ repoPath, githubPat: config.env.github_pat });
}

/**
 * Wire the real collaborators for a pipeline run in `options.repo`.
 */
export async function createDeps(options: RepoOptions): Promise<WorkflowDeps> {
  const repoRoot = path.resolve(options.repo ?? '.');
  const config = loadConfig({ repoRoot, configPath: options.config });
  const paths = getAdwPaths(repoRoot, config);
  const repoPath = await resolveGithubRepo(config, paths.repo_root);

  return {
    config,
    paths,
    issues: createIssueRepository(config, repoPath),
    agent: new AgentInvoker({
      agent: config.agent,
      env: config.env,
      agentsDir: paths.agents_dir,
      repoRoot: paths.repo_root
    }),
    ports: new PortAllocator(config.ports),
    sonar: createSonarClient(config)
  };
}

/** Arguments a composite or the trigger passes on to the phases it starts. */
export function forwardedArgs(options: RepoOptions): string[] {
  const args: string[] = [];
  if (options.repo) {
    args.push('--repo', path.resolve(options.repo));
  }
  if (options.config) {
    args.push('--config', path.resolve(options.config));
  }
  return args;
}

export interface ActionContext {
  issueNumber?: string;
  runId?: string;
  /** Filled in by the action once it has wired its dependencies */
  issues: IssueRepository | null;
}

/**
 * Run a pipeline action: a failure is reported (and posted to the issue when
 * it knows its run) and becomes the process exit code.
 */
export async function runAction(context: ActionContext, action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (err) {
    const error = toWorkflowError(err, { issueNumber: context.issueNumber, runId: context.runId });
    await reportError(error, consoleLogger, context.issues);
    process.exitCode = error.exitCode;
  }
}
