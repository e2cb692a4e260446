import { z } from 'zod';
import { StepResult, stepFailed, stepOk } from '../errors.js';
import {
  ReviewResult,
  TestResult,
  reviewResultSchema,
  testResultSchema
} from '../types/schemas.js';

/**
 * First balanced `open ... close` span starting at the first `open`.
 * Brackets inside strings are not special-cased.
 */
export function balancedSpan(text: string, open: '[' | '{'): string | null {
  const close = open === '[' ? ']' : '}';
  const start = text.indexOf(open);
  if (start === -1) {
    return null;
  }
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    if (text[i] === open) {
      depth++;
    } else if (text[i] === close) {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }
  return null;
}

/**
 * The JSON payload of an agent reply: a fenced ```json block, else the first
 * balanced bracket span, else the whole text.
 */
export function extractJsonPayload(output: string, open: '[' | '{'): string {
  const fenced = open === '['
    ? /```(?:json)?\s*\n(\[[\s\S]*?\])\n```/.exec(output)
    : /```(?:json)?\s*\n(\{[\s\S]*?\})\n```/.exec(output);
  if (fenced) {
    return fenced[1];
  }
  return balancedSpan(output, open) ?? output.trim();
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch (err) {
    return { ok: false, error: (err as Error).message };
  }
}

export interface ParsedTestResults {
  results: TestResult[];
  passed: number;
  failed: number;
  /** Set when the reply held no usable JSON array */
  error?: string;
}

/**
 * Test results reported by the `/test` agent. Entries that do not look
 * like a test result are dropped.
 */
export function parseTestResults(output: string): ParsedTestResults {
  const parsed = parseJson(extractJsonPayload(output, '['));
  if (!parsed.ok) {
    return { results: [], passed: 0, failed: 0, error: parsed.error };
  }
  if (!Array.isArray(parsed.value)) {
    return { results: [], passed: 0, failed: 0, error: 'Test results are not a JSON array' };
  }

  const results: TestResult[] = [];
  for (const item of parsed.value) {
    const result = testResultSchema.safeParse(item);
    if (result.success) {
      results.push(result.data);
    }
  }
  const passed = results.filter((r) => r.passed).length;
  return { results, passed, failed: results.length - passed };
}

/** Count from a test runner summary such as "8 passed, 2 failed". */
export function summaryCount(output: string, label: 'passed' | 'failed'): number | null {
  const match = new RegExp(`(\\d+)\\s+${label}`).exec(output);
  return match ? Number.parseInt(match[1], 10) : null;
}

export function parseReviewResult(output: string): StepResult<ReviewResult> {
  const parsed = parseJson(extractJsonPayload(output, '{'));
  if (!parsed.ok) {
    return stepFailed(`Invalid review JSON: ${parsed.error}`);
  }
  const result = reviewResultSchema.safeParse(parsed.value);
  if (!result.success) {
    return stepFailed(`Unexpected review result: ${formatZodError(result.error)}`);
  }
  return stepOk(result.data);
}

function formatZodError(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}
