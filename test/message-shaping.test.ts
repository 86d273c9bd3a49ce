import { describe, expect, it } from 'vitest';

import { splitMessage } from '../src/control/chunking.js';
import {
  buildSystemPreamble,
  formatCompactionNote,
  formatCompletionSummary,
  formatDenialNote,
  formatDuration,
  formatToolActivity,
  formatToolError,
} from '../src/control/render.js';
import { shouldShow } from '../src/control/verbosity.js';
import type { CompletionEvent } from '../src/engine/types.js';

describe('message chunking', () => {
  it('returns short text unchanged and nothing for empty text', () => {
    expect(splitMessage('hello', 10)).toEqual(['hello']);
    expect(splitMessage('', 10)).toEqual([]);
  });

  it('prefers paragraph breaks, then line breaks, then a hard cut', () => {
    expect(splitMessage('aaaaaa\n\nbbbbbb', 10)).toEqual(['aaaaaa\n\n', 'bbbbbb']);
    expect(splitMessage('aaaaaa\nbbbbbb', 10)).toEqual(['aaaaaa\n', 'bbbbbb']);
    expect(splitMessage('abcdefghijklmnop', 10)).toEqual(['abcdefghij', 'klmnop']);
  });

  it('ignores breaks in the first half of the window', () => {
    expect(splitMessage('ab\ncdefghijklmn', 10)).toEqual(['ab\ncdefghi', 'jklmn']);
  });

  it('does not split a surrogate pair', () => {
    const text = `${'a'.repeat(9)}😀tail`;
    const chunks = splitMessage(text, 10);
    expect(chunks[0]).toBe('a'.repeat(9));
    expect(chunks.join('')).toBe(text);
  });

  it('keeps every chunk within the limit and loses nothing', () => {
    const text = Array.from({ length: 40 }, (_, index) => `line ${index} ${'x'.repeat(index % 13)}`).join('\n');
    const chunks = splitMessage(text, 50);
    expect(chunks.every((chunk) => chunk.length <= 50)).toBe(true);
    expect(chunks.join('')).toBe(text);
  });

  it('rejects a limit below two', () => {
    expect(() => splitMessage('abc', 1)).toThrow(RangeError);
  });
});

describe('verbosity filter', () => {
  const bash = { type: 'tool_activity' as const, toolName: 'Bash', summary: 'Running `ls`' };
  const result = { type: 'tool_result' as const, toolName: 'Bash', output: 'ok', isError: false };
  const readResult = { ...result, toolName: 'Read' };
  const failed = { ...result, isError: true };
  const compaction = { type: 'compaction' as const, trigger: 'auto' as const };

  it('always shows text', () => {
    expect(shouldShow('minimal', { type: 'text', text: 'hi' })).toBe(true);
  });

  it('shows tool activity outside minimal mode except for silent tools', () => {
    expect(shouldShow('minimal', bash)).toBe(false);
    expect(shouldShow('normal', bash)).toBe(true);
    expect(shouldShow('verbose', { ...bash, toolName: 'ExitPlanMode' })).toBe(false);
  });

  it('shows tool output only in verbose mode and never for file reads', () => {
    expect(shouldShow('normal', result)).toBe(false);
    expect(shouldShow('verbose', result)).toBe(true);
    expect(shouldShow('verbose', readResult)).toBe(false);
  });

  it('shows tool errors unless minimal', () => {
    expect(shouldShow('minimal', failed)).toBe(false);
    expect(shouldShow('normal', failed)).toBe(true);
  });

  it('shows compaction notes only in verbose mode', () => {
    expect(shouldShow('normal', compaction)).toBe(false);
    expect(shouldShow('verbose', compaction)).toBe(true);
  });
});

describe('rendering', () => {
  const done = (overrides: Partial<CompletionEvent> = {}): CompletionEvent => ({
    type: 'completion',
    sessionIdentifier: 's1',
    subtype: 'success',
    isError: false,
    permissionDenials: [],
    ...overrides,
  });

  it('formats durations', () => {
    expect(formatDuration(45_900)).toBe('45s');
    expect(formatDuration(125_000)).toBe('2m5s');
  });

  it('summarizes a completed turn', () => {
    expect(formatCompletionSummary(done({ numTurns: 3, durationMs: 12_000, costUsd: 0.042 }))).toBe(
      ':checkered_flag: 3 turns took 12s · $0.04',
    );
    expect(formatCompletionSummary(done({ numTurns: 1 }))).toBe(':checkered_flag: Done, 1 turn');
    expect(formatCompletionSummary(done())).toBeNull();
  });

  it('labels known error subtypes', () => {
    expect(
      formatCompletionSummary(done({ isError: true, subtype: 'error_max_turns', numTurns: 10, durationMs: 61_000 })),
    ).toBe(':x: 10 turns took 1m1s (hit max turns limit)');
  });

  it('adds session totals after the first request', () => {
    expect(
      formatCompletionSummary(done({ numTurns: 2, durationMs: 3000, costUsd: 0.5 }), { turnCount: 3, totalCostUsd: 1.25 }),
    ).toBe(':checkered_flag: 2 turns took 3s · $0.50\n:bar_chart: 3 requests · $1.25 session total');
  });

  it('formats tool lines', () => {
    expect(formatToolActivity({ type: 'tool_activity', toolName: 'Read', summary: 'Reading `a.ts`', parentToolUseId: 't0' })).toBe(
      ':wrench: _(subagent)_ Reading `a.ts`',
    );
    expect(formatToolError({ type: 'tool_result', toolName: 'Bash', output: ' exit 1 ', isError: true })).toBe(
      ':warning: `Bash` error: exit 1',
    );
  });

  it('formats compaction and denial notes', () => {
    expect(formatCompactionNote({ type: 'compaction', trigger: 'auto', preTokens: 150_000 })).toBe(
      ':brain: Context was automatically compacted (150,000 tokens before); earlier messages may be summarized',
    );
    expect(formatDenialNote(['Write'])).toBe(':no_entry_sign: 1 tool permission denied: `Write`');
  });

  it('tells the agent about the thread it is talking through', () => {
    const preamble = buildSystemPreamble('minimal', 3900);
    expect(preamble).toContain('never your tool calls');
    expect(preamble).toContain('about 3900 characters');
  });
});
