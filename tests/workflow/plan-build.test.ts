import fs from 'node:fs';
import path from 'node:path';
import { execa } from 'execa';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { WorkflowError } from '../../src/errors.js';
import { WorkflowState } from '../../src/store/workflow-state.js';
import { runBuild } from '../../src/workflow/build.js';
import { runPlan } from '../../src/workflow/plan.js';
import { TestDeps, initRepo, makeDeps, makeIssue, makeTempDir, ok } from '../helpers/fakes.js';

const RUN_ID = 'abc12345';
const BRANCH = `feature-issue-7-adw-${RUN_ID}-add-widget`;
const PLAN_REL = `specs/issue-7-adw-${RUN_ID}-sdlc_planner-add-widget.md`;
const PR_URL = 'https://github.com/acme/widgets/pull/12';

describe('plan and build pipelines', () => {
  let tmpDir: string;
  let repoPath: string;
  let deps: TestDeps;

  beforeEach(async () => {
    tmpDir = makeTempDir('adw-plan-build-');
    repoPath = await initRepo(tmpDir);
    deps = makeDeps(repoPath);
    deps.issues.issues.set('7', makeIssue());

    deps.agent
      .on('/classify_issue', '/feature')
      .on('/generate_branch_name', BRANCH)
      .on('/feature', (request) => {
        const dir = request.workingDir ?? repoPath;
        fs.mkdirSync(path.join(dir, 'specs'), { recursive: true });
        fs.writeFileSync(path.join(dir, PLAN_REL), '# Plan\n');
        return ok(PLAN_REL);
      })
      .on('/implement', (request) => {
        const dir = request.workingDir ?? repoPath;
        fs.writeFileSync(path.join(dir, 'widget.ts'), 'export const widget = 1;\n');
        return ok('Implemented the plan');
      })
      .on('/commit', (request) => ok(`${request.args[0]}: feat: update widget`))
      .on('/pull_request', PR_URL);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('plans a fresh issue in its own worktree', async () => {
    const state = await runPlan(deps, { issueNumber: '7', runId: RUN_ID });

    const worktreePath = path.join(repoPath, 'trees', RUN_ID);
    expect(state.toJSON()).toEqual({
      run_id: RUN_ID,
      issue_number: '7',
      branch_name: BRANCH,
      plan_file: path.join(worktreePath, PLAN_REL),
      patch_file: null,
      issue_class: '/feature',
      worktree_path: worktreePath,
      backend_port: 9108,
      model_set: 'base',
      history: ['adw_plan_iso']
    });

    const saved = WorkflowState.load(RUN_ID, deps.paths.agents_dir);
    expect(saved?.get('plan_file')).toBe(path.join(worktreePath, PLAN_REL));

    expect(deps.agent.commands()).toEqual([
      '/classify_issue',
      '/generate_branch_name',
      '/feature',
      '/commit',
      '/pull_request'
    ]);

    const { stdout: log } = await execa('git', ['log', '-1', '--format=%s'], { cwd: worktreePath });
    expect(log).toBe('sdlc_planner: feat: update widget');

    const { stdout: remote } = await execa('git', ['branch', '--list', BRANCH], {
      cwd: path.join(tmpDir, 'origin.git')
    });
    expect(remote.trim()).toBe(BRANCH);

    expect(deps.issues.bodies()).toContain(`[ADW-AGENTS] ${RUN_ID}_ops: ✅ Pull request created: ${PR_URL}`);
    expect(deps.issues.bodies().at(-1)).toBe(
      `[ADW-AGENTS] ${RUN_ID}_sdlc_planner: ✅ Planning complete! Plan file: ${path.join(worktreePath, PLAN_REL)}`
    );
  });

  it('generates a run ID when none is given', async () => {
    const state = await runPlan(deps, { issueNumber: '7' });

    expect(state.runId).toMatch(/^[0-9a-f]{8}$/);
    const worktreePath = path.join(repoPath, 'trees', state.runId);
    expect(state.get('worktree_path')).toBe(worktreePath);
    expect(fs.existsSync(worktreePath)).toBe(true);
    const port = state.get('backend_port');
    expect(port).toBeGreaterThanOrEqual(9100);
    expect(port).toBeLessThan(9115);
    expect(WorkflowState.load(state.runId, deps.paths.agents_dir)?.get('issue_number')).toBe('7');
  });

  it('skips finished steps when the plan is re-run', async () => {
    await runPlan(deps, { issueNumber: '7', runId: RUN_ID });
    deps.issues.pullRequests.set(BRANCH, { number: 12, url: PR_URL });
    deps.agent.requests.length = 0;

    const state = await runPlan(deps, { issueNumber: '7', runId: RUN_ID });

    expect(deps.agent.commands()).toEqual(['/commit']);
    expect(state.get('backend_port')).toBe(9108);
    expect(state.history).toEqual(['adw_plan_iso', 'adw_plan_iso']);
    expect(deps.issues.bodies()).toContain(`[ADW-AGENTS] ${RUN_ID}_ops: ✅ Pull request updated: ${PR_URL}`);
  });

  it('builds in the worktree the plan created', async () => {
    await runPlan(deps, { issueNumber: '7', runId: RUN_ID });
    deps.issues.pullRequests.set(BRANCH, { number: 12, url: PR_URL });
    deps.agent.requests.length = 0;

    const state = await runBuild(deps, { issueNumber: '7', runId: RUN_ID });

    const worktreePath = path.join(repoPath, 'trees', RUN_ID);
    expect(state.history).toEqual(['adw_plan_iso', 'adw_build_iso']);
    expect(deps.agent.commands()).toEqual(['/implement', '/commit']);
    expect(deps.agent.requests[0]).toEqual({
      agentName: 'sdlc_implementor',
      slashCommand: '/implement',
      args: [path.join(worktreePath, PLAN_REL)],
      runId: RUN_ID,
      workingDir: worktreePath
    });
    expect(deps.agent.requests[1].agentName).toBe('sdlc_implementor_committer');
    expect(deps.agent.requests[1].args.slice(0, 2)).toEqual(['sdlc_implementor', 'feature']);

    const { stdout: files } = await execa('git', ['show', '--name-only', '--format=', 'HEAD'], { cwd: worktreePath });
    expect(files.trim()).toBe('widget.ts');
    expect(deps.issues.bodies().at(-1)).toBe(`[ADW-AGENTS] ${RUN_ID}_sdlc_implementor: ✅ Implementation complete!`);
  });

  it('fails a build without state before touching anything', async () => {
    const attempt = runBuild(deps, { issueNumber: '7', runId: 'deadbeef' });

    await expect(attempt).rejects.toBeInstanceOf(WorkflowError);
    await expect(attempt).rejects.toThrow(
      'No state found for ADW ID: deadbeef. Run plan first to create the worktree and state'
    );
    expect(fs.existsSync(path.join(deps.paths.agents_dir, 'deadbeef'))).toBe(false);
    expect(fs.existsSync(path.join(deps.paths.trees_dir, 'deadbeef'))).toBe(false);
    expect(deps.agent.requests).toHaveLength(0);
    expect(deps.issues.comments).toHaveLength(0);
  });

  it('refuses to build when the recorded worktree is gone', async () => {
    const state = WorkflowState.create(RUN_ID, deps.paths.agents_dir);
    state.update({
      issue_number: '7',
      branch_name: BRANCH,
      plan_file: PLAN_REL,
      worktree_path: path.join(repoPath, 'trees', RUN_ID)
    });
    state.save('test');

    await expect(runBuild(deps, { issueNumber: '7', runId: RUN_ID })).rejects.toThrow(
      `Worktree validation failed: Worktree path does not exist: ${path.join(repoPath, 'trees', RUN_ID)}. Run plan first`
    );
    expect(fs.existsSync(path.join(repoPath, 'trees', RUN_ID))).toBe(false);
    expect(deps.agent.requests).toHaveLength(0);
  });
});
