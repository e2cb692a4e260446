import fs from 'node:fs';
import path from 'node:path';
import { execa } from 'execa';
import { AdwConfig, EnvConfig } from '../config/schema.js';
import { ErrorSeverity, WorkflowError } from '../errors.js';
import { IssueRepository, formatIssueMessage } from '../github/issues.js';
import { gitResult } from '../repo/git.js';
import { Logger } from '../store/run-logger.js';
import { AdwPaths } from '../store/runs-root.js';

export const CHECK_NAMES = [
  'env_vars',
  'git_repo',
  'git_remote',
  'git_clean',
  'disk_space',
  'worktree_directory',
  'agent_cli',
  'github_cli',
  'github_auth'
] as const;

export type CheckName = (typeof CHECK_NAMES)[number];

export const DEFAULT_CHECKS: readonly CheckName[] = [
  'env_vars',
  'git_repo',
  'git_remote',
  'disk_space',
  'worktree_directory'
];

const CHECK_LABELS: Record<CheckName, string> = {
  env_vars: 'Environment Variables',
  git_repo: 'Git Repository',
  git_remote: 'Git Remote',
  git_clean: 'Git Working Directory',
  disk_space: 'Disk Space',
  worktree_directory: 'Worktree Directory',
  agent_cli: 'Agent CLI',
  github_cli: 'GitHub CLI',
  github_auth: 'GitHub Authentication'
};

export interface ValidationResult {
  success: boolean;
  message: string;
  severity: ErrorSeverity;
}

export interface CheckOutcome {
  name: CheckName;
  label: string;
  result: ValidationResult;
}

export interface PreflightContext {
  config: AdwConfig;
  paths: AdwPaths;
}

function pass(message: string): ValidationResult {
  return { success: true, message, severity: 'info' };
}

function fail(message: string, severity: ErrorSeverity = 'error'): ValidationResult {
  return { success: false, message, severity };
}

export function checkEnvVars(env: EnvConfig): ValidationResult {
  if (!env.anthropic_api_key) {
    return fail('Missing required environment variables: ANTHROPIC_API_KEY', 'critical');
  }
  return pass('All required env vars are set');
}

export async function checkGitRepo(cwd: string): Promise<ValidationResult> {
  const result = await gitResult(['rev-parse', '--git-dir'], cwd);
  if (result.exitCode !== 0) {
    return fail(`Not in a valid git repository: ${result.stderr.trim()}`, 'critical');
  }
  return pass('Git repository is valid');
}

export async function checkGitRemote(cwd: string): Promise<ValidationResult> {
  const result = await gitResult(['remote', 'get-url', 'origin'], cwd);
  if (result.exitCode === 0 && result.stdout.trim()) {
    return pass("Git remote 'origin' is configured");
  }
  return fail("Git remote 'origin' is not configured");
}

export async function checkGitClean(cwd: string): Promise<ValidationResult> {
  const result = await gitResult(['status', '--porcelain'], cwd);
  if (result.exitCode !== 0) {
    return fail('Could not check git status', 'warning');
  }
  if (result.stdout.trim()) {
    return fail('Git working directory has uncommitted changes', 'warning');
  }
  return pass('Git working directory is clean');
}

export async function checkDiskSpace(requiredGb: number, dir: string): Promise<ValidationResult> {
  try {
    const stats = await fs.promises.statfs(dir);
    const availableGb = (stats.bavail * stats.bsize) / 1024 ** 3;
    if (availableGb >= requiredGb) {
      return pass(`Sufficient disk space available: ${availableGb.toFixed(2)} GB`);
    }
    return fail(`Insufficient disk space: ${availableGb.toFixed(2)} GB available, ${requiredGb} GB required`);
  } catch (err) {
    return fail(`Could not check disk space: ${(err as Error).message}`, 'warning');
  }
}

export function checkWorktreeDirectory(treesDir: string): ValidationResult {
  try {
    fs.mkdirSync(treesDir, { recursive: true });
    const probe = path.join(treesDir, '.test_write');
    fs.writeFileSync(probe, 'test');
    fs.rmSync(probe);
    return pass(`Worktree directory is writable: ${treesDir}`);
  } catch (err) {
    return fail(`Worktree directory is not writable: ${(err as Error).message}`);
  }
}

async function checkBinary(
  bin: string,
  args: string[],
  label: string,
  severity: ErrorSeverity,
  env?: Record<string, string>
): Promise<ValidationResult> {
  const result = await execa(bin, args, { timeout: 5000, reject: false, env });
  if (result.timedOut) {
    return fail(`${label} '${bin}' timed out`, severity);
  }
  if (typeof result.exitCode !== 'number') {
    return fail(`${label} '${bin}' not found in PATH`, severity);
  }
  if (result.exitCode !== 0) {
    return fail(`${label} '${bin}' is not working (exit code: ${result.exitCode})`, severity);
  }
  const version = result.stdout.trim().split('\n')[0] || 'unknown';
  return pass(`${label} is available: ${version}`);
}

export function checkAgentCli(bin: string): Promise<ValidationResult> {
  return checkBinary(bin, ['--version'], 'Agent CLI', 'critical');
}

export function checkGithubCli(bin = 'gh'): Promise<ValidationResult> {
  return checkBinary(bin, ['--version'], 'GitHub CLI', 'error');
}

export async function checkGithubAuth(githubPat?: string, bin = 'gh'): Promise<ValidationResult> {
  const result = await execa(bin, ['auth', 'status'], {
    timeout: 5000,
    reject: false,
    env: githubPat ? { GH_TOKEN: githubPat } : undefined
  });
  if (result.exitCode === 0) {
    return pass('GitHub CLI is authenticated');
  }
  if (typeof result.exitCode !== 'number' || result.timedOut) {
    return fail('Could not check GitHub authentication', 'warning');
  }
  return fail("GitHub CLI is not authenticated. Run 'gh auth login'");
}

async function runCheck(name: CheckName, ctx: PreflightContext): Promise<ValidationResult> {
  const repoRoot = ctx.paths.repo_root;
  switch (name) {
    case 'env_vars':
      return checkEnvVars(ctx.config.env);
    case 'git_repo':
      return checkGitRepo(repoRoot);
    case 'git_remote':
      return checkGitRemote(repoRoot);
    case 'git_clean':
      return checkGitClean(repoRoot);
    case 'disk_space':
      return checkDiskSpace(ctx.config.preflight.min_disk_gb, repoRoot);
    case 'worktree_directory':
      return checkWorktreeDirectory(ctx.paths.trees_dir);
    case 'agent_cli':
      return checkAgentCli(ctx.config.agent.bin);
    case 'github_cli':
      return checkGithubCli();
    case 'github_auth':
      return checkGithubAuth(ctx.config.env.github_pat);
  }
}

export async function runChecks(
  names: readonly CheckName[],
  ctx: PreflightContext
): Promise<CheckOutcome[]> {
  const outcomes: CheckOutcome[] = [];
  for (const name of CHECK_NAMES) {
    if (!names.includes(name)) continue;
    outcomes.push({ name, label: CHECK_LABELS[name], result: await runCheck(name, ctx) });
  }
  return outcomes;
}

/** Failed critical and error checks block; warnings only with failOnWarning. */
export function isBlocking(result: ValidationResult, failOnWarning: boolean): boolean {
  if (result.success) return false;
  if (result.severity === 'critical' || result.severity === 'error') return true;
  return result.severity === 'warning' && failOnWarning;
}

export function formatCheckLine(outcome: CheckOutcome): string {
  const { result } = outcome;
  const status = result.success ? '✅ PASS' : `❌ FAIL (${result.severity})`;
  return `  ${outcome.label}: ${status} - ${result.message}`;
}

export const PREFLIGHT_FAILED_MESSAGE =
  'Pre-flight validation checks failed. Please fix the issues above and try again.';

export interface PreflightRunOptions {
  checks?: readonly CheckName[];
  logger: Logger;
  issues?: IssueRepository | null;
  issueNumber?: string | null;
  runId?: string | null;
}

/**
 * Run the checks, log the report, and throw a critical WorkflowError when a
 * blocking check failed. The issue gets a comment before the throw.
 */
export async function runPreflightChecks(
  ctx: PreflightContext,
  options: PreflightRunOptions
): Promise<CheckOutcome[]> {
  const { logger } = options;
  logger.info('Running pre-flight validation checks...');

  const outcomes = await runChecks(options.checks ?? DEFAULT_CHECKS, ctx);
  const failOnWarning = ctx.config.preflight.fail_on_warning;

  logger.info('Pre-flight check results:');
  for (const outcome of outcomes) {
    logger.info(formatCheckLine(outcome));
  }

  if (outcomes.some((o) => isBlocking(o.result, failOnWarning))) {
    if (options.issues && options.issueNumber) {
      try {
        await options.issues.postComment(
          options.issueNumber,
          formatIssueMessage(options.runId ?? 'unknown', 'ops', `❌ ${PREFLIGHT_FAILED_MESSAGE}`)
        );
      } catch (err) {
        logger.warn(`Failed to post pre-flight comment: ${(err as Error).message}`);
      }
    }
    throw new WorkflowError({
      message: PREFLIGHT_FAILED_MESSAGE,
      severity: 'critical',
      issueNumber: options.issueNumber,
      runId: options.runId,
      // already posted above
      shouldComment: false
    });
  }

  logger.info('✅ All pre-flight checks passed!');
  return outcomes;
}
