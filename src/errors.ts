import type { IssueRepository } from './github/issues.js';
import { formatIssueMessage } from './github/issues.js';
import type { Logger } from './store/run-logger.js';

export type ErrorSeverity = 'critical' | 'error' | 'warning' | 'info';

export interface ErrorContext {
  issueNumber?: string | null;
  runId?: string | null;
  agentName?: string;
}

export interface WorkflowErrorParams extends ErrorContext {
  message: string;
  severity?: ErrorSeverity;
  shouldComment?: boolean;
  exitCode?: number;
  cause?: unknown;
}

/**
 * An abort that knows which run and issue it belongs to, so it can be
 * logged, posted to the issue and mapped to an exit code in one place.
 */
export class WorkflowError extends Error {
  readonly severity: ErrorSeverity;
  readonly issueNumber: string | null;
  readonly runId: string | null;
  readonly agentName: string;
  readonly shouldComment: boolean;
  readonly exitCode: number;

  constructor(params: WorkflowErrorParams) {
    super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
    this.name = 'WorkflowError';
    this.severity = params.severity ?? 'error';
    this.issueNumber = params.issueNumber ?? null;
    this.runId = params.runId ?? null;
    this.agentName = params.agentName ?? 'ops';
    this.shouldComment = params.shouldComment ?? true;
    this.exitCode = params.exitCode ?? 1;
  }
}

/** Wrap anything thrown into a WorkflowError carrying the given context. */
export function toWorkflowError(err: unknown, context: ErrorContext, prefix?: string): WorkflowError {
  if (err instanceof WorkflowError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new WorkflowError({
    ...context,
    message: prefix ? `${prefix}: ${message}` : message,
    cause: err
  });
}

const SEVERITY_ICON: Record<ErrorSeverity, string> = {
  critical: '❌',
  error: '❌',
  warning: '⚠️',
  info: 'ℹ️'
};

/**
 * Log the error at its severity and, when it has an issue and run to
 * attach to, post it as an issue comment. A failed comment is only a warning.
 */
export async function reportError(
  error: WorkflowError,
  logger: Logger,
  issues?: IssueRepository | null
): Promise<void> {
  switch (error.severity) {
    case 'critical':
    case 'error':
      logger.error(error.message);
      break;
    case 'warning':
      logger.warn(error.message);
      break;
    case 'info':
      logger.info(error.message);
      break;
  }

  if (!error.shouldComment || !issues || !error.issueNumber || !error.runId) {
    return;
  }
  const body = formatIssueMessage(
    error.runId,
    error.agentName,
    `${SEVERITY_ICON[error.severity]} ${error.message}`
  );
  try {
    await issues.postComment(error.issueNumber, body);
  } catch (err) {
    logger.warn(`Failed to post error comment: ${(err as Error).message}`);
  }
}

/**
 * Run a step; anything it throws comes back out as a WorkflowError
 * prefixed with the step name.
 */
export async function safeExecute<T>(
  stepName: string,
  context: ErrorContext,
  step: () => Promise<T>
): Promise<T> {
  try {
    return await step();
  } catch (err) {
    throw toWorkflowError(err, context, `${stepName} failed`);
  }
}

export type StepResult<T> =
  | { value: T; error: null }
  | { value: null; error: string };

export function stepOk<T>(value: T): StepResult<T> {
  return { value, error: null };
}

export function stepFailed<T>(error: string): StepResult<T> {
  return { value: null, error };
}

/** The step's value, or a WorkflowError with its message. */
export function requireValue<T>(result: StepResult<T>, context: ErrorContext, prefix?: string): T {
  if (result.error !== null) {
    throw new WorkflowError({
      ...context,
      message: prefix ? `${prefix}: ${result.error}` : result.error
    });
  }
  return result.value;
}
