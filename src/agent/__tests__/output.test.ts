import { describe, expect, it } from 'vitest';
import { TRUNCATION_SUFFIX, findResultRecord, parseJsonlLines, truncateOutput } from '../output.js';

describe('parseJsonlLines', () => {
  it('skips blank, malformed and untyped lines', () => {
    const text = '{"type":"system"}\n\nnot json\n{"no_type":true}\n{"type":"result","result":"ok"}\n';
    expect(parseJsonlLines(text)).toEqual([{ type: 'system' }, { type: 'result', result: 'ok' }]);
  });

  it('finds the last result record', () => {
    const records = parseJsonlLines('{"type":"result","result":"first"}\n{"type":"assistant"}\n{"type":"result","result":"last"}');
    expect(findResultRecord(records)?.result).toBe('last');
    expect(findResultRecord(parseJsonlLines('{"type":"assistant"}'))).toBeNull();
  });
});

describe('truncateOutput', () => {
  it('leaves short text alone', () => {
    expect(truncateOutput('all good')).toBe('all good');
  });

  it('cuts at the limit when there is no break', () => {
    const result = truncateOutput('a'.repeat(600));
    expect(result).toBe('a'.repeat(485) + TRUNCATION_SUFFIX);
    expect(result).toHaveLength(500);
  });

  it('prefers a newline shortly before the cut', () => {
    const text = 'x'.repeat(460) + '\n' + 'y'.repeat(200);
    expect(truncateOutput(text)).toBe('x'.repeat(460) + TRUNCATION_SUFFIX);
  });

  it('falls back to a nearby space', () => {
    const text = 'w'.repeat(470) + ' ' + 'z'.repeat(200);
    expect(truncateOutput(text)).toBe('w'.repeat(470) + TRUNCATION_SUFFIX);
  });

  it('reduces a transcript to its result', () => {
    expect(truncateOutput('{"type":"system"}\n{"type":"result","result":"Done"}')).toBe('Done');
  });

  it('uses the last assistant text when there is no result', () => {
    const transcript = '{"type":"system"}\n{"type":"assistant","message":{"content":[{"text":"Hi"}]}}';
    expect(truncateOutput(transcript)).toBe('Hi');
  });

  it('summarizes a transcript with no text', () => {
    expect(truncateOutput('{"type":"system"}\n{"type":"user"}')).toBe(`[JSONL output with 2 messages]${TRUNCATION_SUFFIX}`);
  });
});
