import { AgentPromptResponse, RetryCode } from '../types/schemas.js';

export const DEFAULT_RETRY_DELAYS: readonly number[] = [1, 3, 5];
export const DEFAULT_RETRY_INCREMENT = 2;

const RETRYABLE_CODES: ReadonlySet<RetryCode> = new Set<RetryCode>([
  'claude_code_error',
  'timeout_error',
  'execution_error',
  'error_during_execution'
]);

export function isRetryable(code: RetryCode): boolean {
  return RETRYABLE_CODES.has(code);
}

export interface RetryPolicy {
  maxRetries: number;
  /** Seed delays in seconds */
  delays: readonly number[];
  /** Added to the last seed delay for each attempt past the seed list */
  increment: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  delays: DEFAULT_RETRY_DELAYS,
  increment: DEFAULT_RETRY_INCREMENT
};

/**
 * Delay schedule of length `max(maxRetries, seed length)`: the seed list,
 * extended by `increment` per extra entry.
 */
export function retrySchedule(
  maxRetries: number,
  delays: readonly number[] = DEFAULT_RETRY_DELAYS,
  increment = DEFAULT_RETRY_INCREMENT
): number[] {
  const schedule = delays.length > 0 ? [...delays] : [0];
  while (schedule.length < maxRetries) {
    schedule.push(schedule[schedule.length - 1] + increment);
  }
  return schedule;
}

/**
 * Seconds to wait before `attempt` (0-based). The first attempt never waits;
 * attempt i waits schedule[i], so with the default seed the waits are 3 then 5.
 */
export function retryDelay(
  attempt: number,
  maxRetries: number,
  delays: readonly number[] = DEFAULT_RETRY_DELAYS,
  increment = DEFAULT_RETRY_INCREMENT
): number {
  if (attempt <= 0) {
    return 0;
  }
  const schedule = retrySchedule(Math.max(maxRetries, attempt + 1), delays, increment);
  return schedule[attempt];
}

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryHooks {
  sleep?: Sleeper;
  onRetry?: (attempt: number, delaySeconds: number, previous: AgentPromptResponse) => void;
}

/**
 * Run `attempt` up to `policy.maxRetries` times. Stops at the first success
 * or non-retryable response; otherwise returns the last response.
 */
export async function withRetry(
  attempt: () => Promise<AgentPromptResponse>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {}
): Promise<AgentPromptResponse> {
  const wait = hooks.sleep ?? sleep;
  const attempts = Math.max(policy.maxRetries, 1);
  let last: AgentPromptResponse | null = null;

  for (let i = 0; i < attempts; i++) {
    if (i > 0 && last) {
      const delaySeconds = retryDelay(i, attempts, policy.delays, policy.increment);
      hooks.onRetry?.(i, delaySeconds, last);
      await wait(delaySeconds * 1000);
    }

    const response = await attempt();
    last = response;

    if (response.success || !isRetryable(response.retryCode)) {
      return response;
    }
  }

  // attempts >= 1, so the loop assigned `last`
  if (!last) {
    throw new Error('Retry loop ran no attempts');
  }
  return last;
}
