import fs from 'node:fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { WorkflowState } from '../../src/store/workflow-state.js';
import {
  TriggerDeps,
  extractWebhookContent,
  handleWebhook,
  inferWorkflowFromContent,
  parseDirective,
  workflowCommand
} from '../../src/trigger/router.js';
import { FakeAgent, FakeIssues, MemoryLogger, makeTempDir } from '../helpers/fakes.js';

describe('parseDirective', () => {
  it('reads the workflow, a prefixed run ID and the model set', () => {
    expect(parseDirective('Please run adw_test_iso adw-ABC12345 with model_set heavy')).toEqual({
      workflow: 'adw_test_iso',
      runId: 'abc12345',
      modelSet: 'heavy'
    });
  });

  it('accepts a bare hex run ID', () => {
    expect(parseDirective('adw_review_iso deadbeef')).toEqual({
      workflow: 'adw_review_iso',
      runId: 'deadbeef',
      modelSet: null
    });
  });

  it('matches multi-word workflow names', () => {
    expect(parseDirective('adw_plan_build_test_review_iso')?.workflow).toBe('adw_plan_build_test_review_iso');
  });

  it('skips names that are not registered workflows', () => {
    expect(parseDirective('adw_deploy_iso then adw_plan_iso')?.workflow).toBe('adw_plan_iso');
    expect(parseDirective('adw_sdlc_ZTE_iso')).toBeNull();
    expect(parseDirective('no directive here')).toBeNull();
  });
});

describe('inferWorkflowFromContent', () => {
  it('picks a workflow by keyword', () => {
    expect(inferWorkflowFromContent('Raise coverage of the parser')).toBe('adw_plan_build_test_iso');
    expect(inferWorkflowFromContent('Update the README')).toBe('adw_plan_build_document_iso');
    expect(inferWorkflowFromContent('Please audit the auth module')).toBe('adw_plan_build_test_review_iso');
    expect(inferWorkflowFromContent('Login is broken')).toBe('adw_plan_build_test_iso');
  });

  it('returns null without a keyword', () => {
    expect(inferWorkflowFromContent('thanks!')).toBeNull();
    expect(inferWorkflowFromContent('')).toBeNull();
  });
});

describe('workflowCommand', () => {
  it('maps workflow names to CLI commands', () => {
    expect(workflowCommand('adw_plan_iso')).toBe('plan');
    expect(workflowCommand('adw_plan_build_test_review_iso')).toBe('plan-build-test-review');
    expect(workflowCommand('adw_sdlc_iso')).toBe('sdlc');
  });
});

describe('extractWebhookContent', () => {
  it('uses title and body of a new issue', () => {
    expect(extractWebhookContent('issues', {
      action: 'opened',
      issue: { number: 4, title: 'Widgets', body: 'Add them' }
    })).toEqual({ issueNumber: 4, text: 'Widgets\n\nAdd them', source: 'issue' });
  });

  it('ignores bot comments, other events and payloads without an issue', () => {
    expect(extractWebhookContent('issue_comment', {
      action: 'created',
      issue: { number: 4 },
      comment: { body: '[ADW-AGENTS] abc12345_ops: done' }
    })).toEqual({ reason: 'Ignoring ADW bot comment' });
    expect(extractWebhookContent('issues', { action: 'closed', issue: { number: 4 } })).toEqual({
      reason: 'Unhandled event: issues/closed'
    });
    expect(extractWebhookContent('push', { ref: 'main' })).toEqual({ reason: 'No issue in payload' });
  });
});

describe('handleWebhook', () => {
  let agentsDir: string;
  let issues: FakeIssues;
  let launched: string[][];
  let deps: TriggerDeps;

  beforeEach(() => {
    agentsDir = makeTempDir('adw-trigger-');
    issues = new FakeIssues();
    launched = [];
    deps = {
      issues,
      agentsDir,
      logger: new MemoryLogger(),
      launch: (command, issueNumber, runId) => {
        launched.push([command, issueNumber, runId]);
      }
    };
  });

  afterEach(() => {
    fs.rmSync(agentsDir, { recursive: true, force: true });
  });

  function comment(body: string): unknown {
    return { action: 'created', issue: { number: 7 }, comment: { body } };
  }

  it('launches a requested workflow and records its model set', async () => {
    const response = await handleWebhook(deps, 'issue_comment', comment('adw_plan_build_iso model_set heavy'));

    expect(response.status).toBe('triggered');
    if (response.status !== 'triggered') {
      return;
    }
    expect(response.workflow).toBe('adw_plan_build_iso');
    expect(response.issue_number).toBe(7);
    expect(launched).toEqual([['plan-build', '7', response.run_id]]);
    expect(WorkflowState.load(response.run_id, agentsDir)?.get('model_set')).toBe('heavy');
    expect(issues.bodies()).toEqual([
      `[ADW-AGENTS] 🚀 ADW workflow triggered: \`adw_plan_build_iso\` (ADW ID: ${response.run_id})\n\n` +
        'Reason: Comment requested adw_plan_build_iso'
    ]);
  });

  it('continues an existing run when the comment names one', async () => {
    const response = await handleWebhook(deps, 'issue_comment', comment('adw_review_iso adw-abc12345'));

    expect(response).toEqual({ status: 'triggered', workflow: 'adw_review_iso', run_id: 'abc12345', issue_number: 7 });
    expect(launched).toEqual([['review', '7', 'abc12345']]);
    expect(WorkflowState.load('abc12345', agentsDir)).toBeNull();
  });

  it('refuses a dependent workflow without a run ID', async () => {
    const response = await handleWebhook(deps, 'issue_comment', comment('adw_build_iso please'));

    expect(response).toEqual({ status: 'ignored', reason: 'adw_build_iso requires an ADW ID' });
    expect(launched).toEqual([]);
    expect(issues.bodies()[0]).toMatch(/^\[ADW-AGENTS\] ❌ Error: `adw_build_iso` is a dependent workflow/);
  });

  it('defaults a new issue to plan, build and test', async () => {
    const response = await handleWebhook(deps, 'issues', {
      action: 'opened',
      issue: { number: 9, title: 'Widgets', body: 'Widgets please' }
    });

    expect(response).toMatchObject({ status: 'triggered', workflow: 'adw_plan_build_test_iso', issue_number: 9 });
    expect(issues.bodies()[0]).toContain('Reason: New issue with content, defaulting to adw_plan_build_test_iso');
  });

  it('ignores a comment with nothing to run', async () => {
    expect(await handleWebhook(deps, 'issue_comment', comment('thanks!'))).toEqual({
      status: 'ignored',
      reason: 'No workflow triggered'
    });
    expect(launched).toEqual([]);
  });

  it('consults the classifier before keyword inference', async () => {
    const classifier = new FakeAgent().on(
      '/classify_adw',
      '{"adw_slash_command": "/adw_plan_iso", "adw_id": "", "model_set": "base"}'
    );
    deps.classifier = classifier;

    const response = await handleWebhook(deps, 'issue_comment', comment('fix the login bug'));

    expect(response).toMatchObject({ status: 'triggered', workflow: 'adw_plan_iso' });
    expect(classifier.requests[0]).toMatchObject({ agentName: 'adw_classifier', args: ['fix the login bug'] });
    expect(issues.bodies()[0]).toContain('Reason: Comment classified as adw_plan_iso');
  });

  it('falls back to keywords when the classifier fails', async () => {
    deps.classifier = new FakeAgent();

    const response = await handleWebhook(deps, 'issue_comment', comment('fix the login bug'));

    expect(response).toMatchObject({ status: 'triggered', workflow: 'adw_plan_build_test_iso' });
  });
});
