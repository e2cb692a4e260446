import fs from 'node:fs';
import { z } from 'zod';

export const TRUNCATION_SUFFIX = '... (truncated)';

const streamRecordSchema = z.object({ type: z.string() }).passthrough();

const resultRecordSchema = z.object({
  type: z.literal('result'),
  subtype: z.string().optional(),
  is_error: z.boolean().optional(),
  result: z.string().optional(),
  session_id: z.string().optional()
}).passthrough();

const assistantRecordSchema = z.object({
  type: z.literal('assistant'),
  message: z.object({
    content: z.array(z.object({ text: z.string().optional() }).passthrough())
  }).passthrough()
}).passthrough();

export type StreamRecord = z.infer<typeof streamRecordSchema>;
export type ResultRecord = z.infer<typeof resultRecordSchema>;

export interface ParsedTranscript {
  messages: StreamRecord[];
  result: ResultRecord | null;
}

function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line) as unknown;
  } catch {
    // the agent interleaves plain text on some failures
    return undefined;
  }
}

/**
 * Parse line-delimited JSON. Blank and malformed lines are skipped.
 */
export function parseJsonlLines(text: string): StreamRecord[] {
  const records: StreamRecord[] = [];
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const parsed = streamRecordSchema.safeParse(parseJsonLine(trimmed));
    if (parsed.success) {
      records.push(parsed.data);
    }
  }
  return records;
}

/** Last record of type "result", scanning from the end. */
export function findResultRecord(messages: StreamRecord[]): ResultRecord | null {
  for (let i = messages.length - 1; i >= 0; i--) {
    const parsed = resultRecordSchema.safeParse(messages[i]);
    if (parsed.success) {
      return parsed.data;
    }
  }
  return null;
}

/** Text of the first content block of an assistant message, if any. */
export function assistantText(record: unknown): string | null {
  const parsed = assistantRecordSchema.safeParse(record);
  if (!parsed.success) {
    return null;
  }
  const text = parsed.data.message.content[0]?.text;
  return text ? text : null;
}

export function parseTranscriptFile(outputFile: string): ParsedTranscript {
  if (!fs.existsSync(outputFile)) {
    return { messages: [], result: null };
  }
  const messages = parseJsonlLines(fs.readFileSync(outputFile, 'utf-8'));
  return { messages, result: findResultRecord(messages) };
}

/**
 * Write the transcript as a JSON array next to the .jsonl file.
 */
export function writeTranscriptJson(outputFile: string, messages: StreamRecord[]): string {
  const jsonFile = outputFile.replace(/\.jsonl$/, '.json');
  fs.writeFileSync(jsonFile, JSON.stringify(messages, null, 2));
  return jsonFile;
}

function lastIndexWithin(text: string, needle: string, start: number, end: number): number {
  if (end <= 0) return -1;
  const pos = text.lastIndexOf(needle, end - 1);
  return pos >= Math.max(start, 0) ? pos : -1;
}

/**
 * Shorten text for comments and logs.
 *
 * Line-delimited JSON is first reduced to its result or last assistant text.
 * Long text is cut before `maxLength - suffix.length`, at the last newline in
 * the 50 characters before the cut, else the last space in the 20 before it,
 * else exactly at the cut.
 */
export function truncateOutput(output: string, maxLength = 500, suffix = TRUNCATION_SUFFIX): string {
  if (output.startsWith('{"type":') && output.includes('\n{"type":')) {
    const lines = output.trim().split('\n');
    for (const record of parseJsonlLines(output).reverse()) {
      const result = resultRecordSchema.safeParse(record);
      if (result.success) {
        if (result.data.result) {
          return truncateOutput(result.data.result, maxLength, suffix);
        }
        continue;
      }
      const text = assistantText(record);
      if (text) {
        return truncateOutput(text, maxLength, suffix);
      }
    }
    return `[JSONL output with ${lines.length} messages]${suffix}`;
  }

  if (output.length <= maxLength) {
    return output;
  }

  const truncateAt = Math.max(maxLength - suffix.length, 0);

  const newlinePos = lastIndexWithin(output, '\n', truncateAt - 50, truncateAt);
  if (newlinePos > 0) {
    return output.slice(0, newlinePos) + suffix;
  }

  const spacePos = lastIndexWithin(output, ' ', truncateAt - 20, truncateAt);
  if (spacePos > 0) {
    return output.slice(0, spacePos) + suffix;
  }

  return output.slice(0, truncateAt) + suffix;
}
