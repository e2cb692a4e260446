import { AgentRunner } from '../agent/invoker.js';
import { ADW_BOT_IDENTIFIER, IssueRepository } from '../github/issues.js';
import { Logger } from '../store/run-logger.js';
import { makeRunId } from '../store/run-utils.js';
import { WorkflowState } from '../store/workflow-state.js';
import { MODEL_SETS, ModelSet } from '../types/schemas.js';
import { extractJsonPayload } from '../workflow/parse.js';

export const WORKFLOWS = [
  'adw_plan_iso',
  'adw_patch_iso',
  'adw_build_iso',
  'adw_test_iso',
  'adw_review_iso',
  'adw_document_iso',
  'adw_ship_iso',
  'adw_plan_build_iso',
  'adw_plan_build_test_iso',
  'adw_plan_build_review_iso',
  'adw_plan_build_document_iso',
  'adw_plan_build_test_review_iso',
  'adw_sdlc_iso'
] as const;

export type WorkflowName = (typeof WORKFLOWS)[number];

/** These continue an existing run and cannot start one. */
export const DEPENDENT_WORKFLOWS: readonly WorkflowName[] = [
  'adw_build_iso',
  'adw_test_iso',
  'adw_review_iso',
  'adw_document_iso',
  'adw_ship_iso'
];

export function isWorkflowName(value: string): value is WorkflowName {
  return (WORKFLOWS as readonly string[]).includes(value);
}

function isModelSet(value: string): value is ModelSet {
  return (MODEL_SETS as readonly string[]).includes(value);
}

/** CLI command for a workflow: adw_plan_build_iso -> plan-build. */
export function workflowCommand(workflow: WorkflowName): string {
  return workflow.replace(/^adw_/, '').replace(/_iso$/, '').replace(/_/g, '-');
}

export interface WorkflowDirective {
  workflow: WorkflowName;
  runId: string | null;
  modelSet: ModelSet | null;
}

const DIRECTIVE_PATTERN = /\b(adw_[a-z_]+?_iso)\b(?:\s+(?:adw-([a-z0-9]{8})|([0-9a-f]{8}))\b)?/gi;
const MODEL_SET_PATTERN = /\bmodel_set\s+(heavy|base)\b/i;

/**
 * First registered `adw_<name>_iso` directive in the text, with the run ID
 * that follows it and any `model_set heavy|base`.
 */
export function parseDirective(text: string): WorkflowDirective | null {
  for (const match of text.matchAll(DIRECTIVE_PATTERN)) {
    const workflow = match[1].toLowerCase();
    if (!isWorkflowName(workflow)) {
      continue;
    }
    const modelSet = MODEL_SET_PATTERN.exec(text)?.[1].toLowerCase() ?? null;
    return {
      workflow,
      runId: (match[2] ?? match[3] ?? null)?.toLowerCase() ?? null,
      modelSet: modelSet !== null && isModelSet(modelSet) ? modelSet : null
    };
  }
  return null;
}

const KEYWORD_RULES: { workflow: WorkflowName; keywords: string[] }[] = [
  {
    workflow: 'adw_plan_build_test_iso',
    keywords: ['test', 'coverage', 'uncovered code', '100%']
  },
  {
    workflow: 'adw_plan_build_document_iso',
    keywords: ['document', 'readme', 'doc']
  },
  {
    workflow: 'adw_plan_build_test_review_iso',
    keywords: ['review', 'audit', 'inspect']
  },
  {
    workflow: 'adw_plan_build_test_iso',
    keywords: [
      'fix', 'bug', 'error', 'issue', 'broken', 'not working',
      'feature', 'add', 'implement', 'create', 'new', 'enhancement',
      'do', 'make', 'build', 'generate', 'write'
    ]
  }
];

/** Workflow for free text with no directive, by keyword. */
export function inferWorkflowFromContent(content: string): WorkflowName | null {
  const lower = content.toLowerCase();
  if (!lower) {
    return null;
  }
  for (const rule of KEYWORD_RULES) {
    if (rule.keywords.some((keyword) => lower.includes(keyword))) {
      return rule.workflow;
    }
  }
  return null;
}

/**
 * Ask the `/classify_adw` agent for a directive. Any failure means "no
 * directive"; the caller falls back to keyword inference.
 */
export async function classifyWithAgent(
  agent: AgentRunner,
  text: string,
  logger: Logger
): Promise<WorkflowDirective | null> {
  const response = await agent.executeTemplate({
    agentName: 'adw_classifier',
    slashCommand: '/classify_adw',
    args: [text],
    runId: makeRunId()
  });
  if (!response.success) {
    logger.warn(`Failed to classify ADW: ${response.output}`);
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(extractJsonPayload(response.output, '{'));
  } catch (err) {
    logger.warn(`Failed to parse classify_adw response: ${(err as Error).message}`);
    return null;
  }
  if (typeof data !== 'object' || data === null) {
    return null;
  }
  const record = new Map(Object.entries(data));
  const command = String(record.get('adw_slash_command') ?? '').replace(/\//g, '');
  if (!isWorkflowName(command)) {
    return null;
  }
  const runId = record.get('adw_id');
  const modelSet = String(record.get('model_set') ?? 'base');
  return {
    workflow: command,
    runId: typeof runId === 'string' && runId ? runId : null,
    modelSet: isModelSet(modelSet) ? modelSet : null
  };
}

export type WebhookResponse =
  | { status: 'triggered'; workflow: WorkflowName; run_id: string; issue_number: number }
  | { status: 'ignored'; reason: string }
  | { status: 'error'; message: string };

/** Starts `adw <command> <issue> <runId>` in the background. */
export type PipelineLauncher = (command: string, issueNumber: string, runId: string) => void;

export interface TriggerDeps {
  issues: IssueRepository;
  agentsDir: string;
  launch: PipelineLauncher;
  logger: Logger;
  /** Set to consult the /classify_adw agent before keyword inference */
  classifier?: AgentRunner | null;
}

interface WebhookContent {
  issueNumber: number;
  text: string;
  source: 'issue' | 'comment';
}

function field(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  return new Map(Object.entries(value)).get(key);
}

function stringField(value: unknown, key: string): string {
  const found = field(value, key);
  return typeof found === 'string' ? found : '';
}

/**
 * The text to route from a webhook payload, or the reason there is none.
 */
export function extractWebhookContent(event: string, payload: unknown): WebhookContent | { reason: string } {
  const action = stringField(payload, 'action');
  const issue = field(payload, 'issue');
  const issueNumber = field(issue, 'number');
  if (typeof issueNumber !== 'number') {
    return { reason: 'No issue in payload' };
  }

  if (event === 'issues' && action === 'opened') {
    const body = stringField(issue, 'body');
    if (body.includes(ADW_BOT_IDENTIFIER)) {
      return { reason: 'Ignoring ADW bot issue' };
    }
    return { issueNumber, text: `${stringField(issue, 'title')}\n\n${body}`.trim(), source: 'issue' };
  }
  if (event === 'issue_comment' && action === 'created') {
    const body = stringField(field(payload, 'comment'), 'body');
    if (body.includes(ADW_BOT_IDENTIFIER)) {
      return { reason: 'Ignoring ADW bot comment' };
    }
    return { issueNumber, text: body, source: 'comment' };
  }
  return { reason: `Unhandled event: ${event}/${action}` };
}

interface Resolution {
  directive: WorkflowDirective;
  reason: string;
}

async function resolveWorkflow(deps: TriggerDeps, content: WebhookContent): Promise<Resolution | null> {
  const label = content.source === 'issue' ? 'New issue' : 'Comment';

  const explicit = parseDirective(content.text);
  if (explicit) {
    return { directive: explicit, reason: `${label} requested ${explicit.workflow}` };
  }
  if (deps.classifier) {
    const classified = await classifyWithAgent(deps.classifier, content.text, deps.logger);
    if (classified) {
      return { directive: classified, reason: `${label} classified as ${classified.workflow}` };
    }
  }
  const inferred = inferWorkflowFromContent(content.text);
  if (inferred) {
    return {
      directive: { workflow: inferred, runId: null, modelSet: null },
      reason: `${label} inferred workflow: ${inferred}`
    };
  }
  if (content.source === 'issue' && content.text) {
    return {
      directive: { workflow: 'adw_plan_build_test_iso', runId: null, modelSet: null },
      reason: `${label} with content, defaulting to adw_plan_build_test_iso`
    };
  }
  return null;
}

async function commentBestEffort(deps: TriggerDeps, issueNumber: string, body: string): Promise<void> {
  try {
    await deps.issues.postComment(issueNumber, body);
  } catch (err) {
    deps.logger.warn(`Failed to post comment: ${(err as Error).message}`);
  }
}

/**
 * Decide what a GitHub event should run and launch it. Returns as soon as
 * the pipeline has been started.
 */
export async function handleWebhook(
  deps: TriggerDeps,
  event: string,
  payload: unknown
): Promise<WebhookResponse> {
  const content = extractWebhookContent(event, payload);
  if ('reason' in content) {
    deps.logger.info(content.reason);
    return { status: 'ignored', reason: content.reason };
  }
  const issueNumber = String(content.issueNumber);
  deps.logger.info(`Received webhook: event=${event}, issue_number=${issueNumber}`);

  const resolution = await resolveWorkflow(deps, content);
  if (!resolution) {
    return { status: 'ignored', reason: 'No workflow triggered' };
  }
  const { directive, reason } = resolution;

  if (DEPENDENT_WORKFLOWS.includes(directive.workflow) && !directive.runId) {
    deps.logger.warn(`${directive.workflow} is a dependent workflow that requires an existing ADW ID`);
    await commentBestEffort(
      deps,
      issueNumber,
      `${ADW_BOT_IDENTIFIER} ❌ Error: \`${directive.workflow}\` is a dependent workflow that requires an existing ADW ID.\n\n` +
        `To run this workflow, provide the ADW ID in your comment, for example:\n` +
        `\`${directive.workflow} adw-12345678\`\n\n` +
        'The ADW ID should come from a previous workflow run (like `adw_plan_iso` or `adw_patch_iso`).'
    );
    return { status: 'ignored', reason: `${directive.workflow} requires an ADW ID` };
  }

  const runId = directive.runId ?? makeRunId();
  if (directive.modelSet) {
    const state = WorkflowState.load(runId, deps.agentsDir) ?? WorkflowState.create(runId, deps.agentsDir);
    state.update({ model_set: directive.modelSet, issue_number: issueNumber });
    state.save('webhook_trigger');
  }

  deps.logger.info(`Triggering ${directive.workflow} for issue #${issueNumber} (ADW ID: ${runId})`);
  deps.launch(workflowCommand(directive.workflow), issueNumber, runId);

  await commentBestEffort(
    deps,
    issueNumber,
    `${ADW_BOT_IDENTIFIER} 🚀 ADW workflow triggered: \`${directive.workflow}\` (ADW ID: ${runId})\n\nReason: ${reason}`
  );

  return { status: 'triggered', workflow: directive.workflow, run_id: runId, issue_number: content.issueNumber };
}
