import { z } from 'zod';

export const ISSUE_CLASSES = ['/chore', '/bug', '/feature'] as const;
export type IssueClass = (typeof ISSUE_CLASSES)[number];

export const MODEL_SETS = ['base', 'heavy'] as const;
export type ModelSet = (typeof MODEL_SETS)[number];

export type ModelName = 'sonnet' | 'opus';

/**
 * Why an agent invocation failed. Everything except 'none' is worth retrying.
 */
export type RetryCode =
  | 'none'
  | 'claude_code_error'
  | 'timeout_error'
  | 'execution_error'
  | 'error_during_execution';

export const workflowStateSchema = z.object({
  run_id: z.string().min(1),
  issue_number: z.string().nullable().default(null),
  branch_name: z.string().nullable().default(null),
  plan_file: z.string().nullable().default(null),
  patch_file: z.string().nullable().default(null),
  issue_class: z.enum(ISSUE_CLASSES).nullable().default(null),
  worktree_path: z.string().nullable().default(null),
  backend_port: z.number().int().nullable().default(null),
  model_set: z.enum(MODEL_SETS).default('base'),
  history: z.array(z.string()).default([])
});

export type WorkflowStateData = z.infer<typeof workflowStateSchema>;

/** Fields a pipeline step may change; run_id and history have their own operations. */
export type WorkflowStateUpdate = Partial<Omit<WorkflowStateData, 'run_id' | 'history'>>;

export interface AgentPromptRequest {
  prompt: string;
  runId: string;
  agentName: string;
  model: ModelName;
  dangerouslySkipPermissions: boolean;
  outputFile: string;
  workingDir?: string;
}

export interface AgentTemplateRequest {
  agentName: string;
  slashCommand: string;
  args: string[];
  runId: string;
  workingDir?: string;
}

export interface AgentPromptResponse {
  output: string;
  success: boolean;
  sessionId?: string;
  retryCode: RetryCode;
}

export interface IssueComment {
  id: string;
  author: string;
  body: string;
  createdAt: string;
}

export interface Issue {
  number: number;
  title: string;
  body: string;
  state: string;
  author: string;
  labels: string[];
  comments: IssueComment[];
  url: string;
  createdAt: string;
  updatedAt: string;
}

export interface PullRequestRef {
  number: number;
  url: string;
}

export const testResultSchema = z.object({
  test_name: z.string().default('unknown'),
  passed: z.coerce.boolean().default(false),
  execution_command: z.string().default(''),
  test_purpose: z.string().default(''),
  error: z.string().nullish()
});

export type TestResult = z.infer<typeof testResultSchema>;

export const reviewIssueSchema = z.object({
  review_issue_number: z.number().int(),
  issue_description: z.string(),
  issue_resolution: z.string().default(''),
  issue_severity: z.enum(['skippable', 'tech_debt', 'blocker'])
});

export const reviewResultSchema = z.object({
  success: z.boolean(),
  review_summary: z.string().default(''),
  review_issues: z.array(reviewIssueSchema).default([])
});

export type ReviewIssue = z.infer<typeof reviewIssueSchema>;
export type ReviewResult = z.infer<typeof reviewResultSchema>;
