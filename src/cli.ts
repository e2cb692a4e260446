#!/usr/bin/env node
import { Command } from 'commander';
import { cleanupCommand } from './commands/cleanup.js';
import { doctorCommand } from './commands/doctor.js';
import { triggerCommand } from './commands/trigger.js';
import { ActionContext, RepoOptions, createDeps, forwardedArgs, runAction } from './commands/workflow.js';
import { consoleLogger } from './store/run-logger.js';
import { resolveRunId } from './store/run-utils.js';
import { WorkflowDeps } from './workflow/context.js';
import { runBuild } from './workflow/build.js';
import { COMPOSITE_PHASES, isCompositeName, runComposite } from './workflow/composite.js';
import { runDocument } from './workflow/document.js';
import { runPatch } from './workflow/patch.js';
import { runPlan } from './workflow/plan.js';
import { runReview } from './workflow/review.js';
import { runShip } from './workflow/ship.js';
import { runTest } from './workflow/test.js';

const program = new Command();

program
  .name('adw')
  .description('Issue-driven developer workflows run by a coding agent in isolated git worktrees');

function withRepoOptions(command: Command): Command {
  return command
    .option('--repo <path>', 'Target repo path (default: current directory)', '.')
    .option('--config <path>', 'Path to adw.config.json or adw.config.yaml');
}

async function runPipeline(
  issueNumber: string,
  runId: string | undefined,
  options: RepoOptions,
  pipeline: (deps: WorkflowDeps, runId: string | undefined) => Promise<unknown>
): Promise<void> {
  const context: ActionContext = { issueNumber, runId, issues: null };
  await runAction(context, async () => {
    const deps = await createDeps(options);
    context.issues = deps.issues;
    const resolved = runId ? resolveRunId(runId, deps.paths.agents_dir) : undefined;
    context.runId = resolved;
    await pipeline(deps, resolved);
  });
}

withRepoOptions(
  program
    .command('plan')
    .description('Classify the issue, create the worktree and write an implementation plan')
    .argument('<issue>', 'Issue number')
    .argument('[runId]', 'Run ID to create or resume')
).action(async (issue: string, runId: string | undefined, options: RepoOptions) => {
  await runPipeline(issue, runId, options, (deps, id) => runPlan(deps, { issueNumber: issue, runId: id }));
});

withRepoOptions(
  program
    .command('patch')
    .description("Apply the change requested by an 'adw_patch' comment")
    .argument('<issue>', 'Issue number')
    .argument('[runId]', 'Run ID to create or resume')
).action(async (issue: string, runId: string | undefined, options: RepoOptions) => {
  await runPipeline(issue, runId, options, (deps, id) => runPatch(deps, { issueNumber: issue, runId: id }));
});

type DependentPipeline = (deps: WorkflowDeps, input: { issueNumber: string; runId: string }) => Promise<unknown>;

const DEPENDENT_PIPELINES: Array<[name: string, description: string, pipeline: DependentPipeline]> = [
  ['build', 'Implement the plan in the run\'s worktree', runBuild],
  ['review', 'Review the implementation and patch blockers', runReview],
  ['document', 'Write documentation for the change', runDocument],
  ['ship', 'Merge the run\'s pull request', runShip]
];

for (const [name, description, pipeline] of DEPENDENT_PIPELINES) {
  withRepoOptions(
    program
      .command(name)
      .description(description)
      .argument('<issue>', 'Issue number')
      .argument('<runId>', 'Run ID from a previous plan or patch run (or "latest")')
  ).action(async (issue: string, runId: string, options: RepoOptions) => {
    await runPipeline(issue, runId, options, (deps, id) =>
      pipeline(deps, { issueNumber: issue, runId: id ?? runId })
    );
  });
}

withRepoOptions(
  program
    .command('test')
    .description('Run the test suite, generate tests and fix failures')
    .argument('<issue>', 'Issue number')
    .argument('<runId>', 'Run ID from a previous plan or patch run (or "latest")')
    .option('--skip-e2e', 'Skip the end-to-end test command', false)
).action(async (issue: string, runId: string, options: RepoOptions & { skipE2e: boolean }) => {
  await runPipeline(issue, runId, options, (deps, id) =>
    runTest(deps, { issueNumber: issue, runId: id ?? runId, skipE2e: options.skipE2e })
  );
});

for (const name of Object.keys(COMPOSITE_PHASES).filter(isCompositeName)) {
  const phases = COMPOSITE_PHASES[name].map((p) => (p.advisory ? `${p.name}*` : p.name)).join(' -> ');
  withRepoOptions(
    program
      .command(name)
      .description(`Run ${phases} (* = advisory)`)
      .argument('<issue>', 'Issue number')
      .argument('[runId]', 'Run ID to use for every phase')
      .option('--skip-e2e', 'Skip the end-to-end test command in the test phase', false)
  ).action(async (issue: string, runId: string | undefined, options: RepoOptions & { skipE2e: boolean }) => {
    const context: ActionContext = { issueNumber: issue, runId, issues: null };
    await runAction(context, () =>
      runComposite(name, {
        issueNumber: issue,
        runId,
        forward: forwardedArgs(options),
        testArgs: options.skipE2e ? ['--skip-e2e'] : [],
        logger: consoleLogger
      })
    );
  });
}

withRepoOptions(
  program
    .command('doctor')
    .description('Check the environment, git setup and agent CLI')
).action(async (options: RepoOptions) => {
  await doctorCommand(options);
});

withRepoOptions(
  program
    .command('cleanup')
    .description('Remove old worktrees and run state')
    .option('--all', 'Clean every run', false)
    .option('--run-id <id>', 'Clean one run')
    .option('--older-than <days>', 'Clean runs at least this many days old', '7')
    .option('--dry-run', 'Show what would be deleted', false)
    .option('--worktrees-only', 'Only remove worktrees', false)
    .option('--states-only', 'Only remove state directories', false)
    .option('--keep-active', 'Skip runs modified in the last 24 hours', false)
).action(async (options: RepoOptions & {
  all: boolean;
  runId?: string;
  olderThan: string;
  dryRun: boolean;
  worktreesOnly: boolean;
  statesOnly: boolean;
  keepActive: boolean;
}) => {
  await runAction({ issues: null }, () => cleanupCommand({
    repo: options.repo ?? '.',
    config: options.config,
    all: options.all,
    runId: options.runId,
    olderThan: Number.parseInt(options.olderThan, 10),
    dryRun: options.dryRun,
    worktreesOnly: options.worktreesOnly,
    statesOnly: options.statesOnly,
    keepActive: options.keepActive
  }));
});

withRepoOptions(
  program
    .command('trigger')
    .description('Serve the GitHub webhook that starts workflows from issues and comments')
    .option('--port <n>', 'Port to listen on (default: trigger.port)')
).action(async (options: RepoOptions & { port?: string }) => {
  await runAction({ issues: null }, () => triggerCommand(options));
});

await program.parseAsync();
