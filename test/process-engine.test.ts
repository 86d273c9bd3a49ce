import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { mkdtemp, rm } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { buildEngineEnv, ProcessEngine, splitCommand } from '../src/engine/process.js';
import { describeToolUse, StreamJsonParser } from '../src/engine/stream-json.js';
import type { AgentEvent } from '../src/engine/types.js';
import { createLogger } from '../src/utils/logger.js';

const fixture = fileURLToPath(new URL('./fixtures/fake-agent.mjs', import.meta.url));
const quiet = createLogger('test', 'error');

const collect = async (stream: AsyncIterable<AgentEvent>) => {
  const events: AgentEvent[] = [];
  for await (const event of stream) events.push(event);
  return events;
};

describe('stream-json parser', () => {
  it('maps assistant text and tool calls', () => {
    const parser = new StreamJsonParser();
    const events = parser.parse({
      type: 'assistant',
      message: {
        content: [
          { type: 'text', text: 'Looking.' },
          { type: 'tool_use', id: 'tu1', name: 'Read', input: { file_path: '/repo/src/app.ts' } },
          { type: 'thinking', thinking: 'hmm' },
        ],
      },
    });

    expect(events).toEqual([
      { type: 'text', text: 'Looking.' },
      { type: 'tool_activity', toolName: 'Read', toolUseId: 'tu1', summary: 'Reading `app.ts`', parentToolUseId: undefined },
    ]);
  });

  it('drops sub-agent narration but keeps its tool calls', () => {
    const parser = new StreamJsonParser();
    const events = parser.parse({
      type: 'assistant',
      parent_tool_use_id: 'task-1',
      message: {
        content: [
          { type: 'text', text: 'inner thoughts' },
          { type: 'tool_use', id: 'tu2', name: 'Grep', input: { pattern: 'TODO' } },
        ],
      },
    });

    expect(events).toEqual([
      { type: 'tool_activity', toolName: 'Grep', toolUseId: 'tu2', summary: 'Searching for `TODO`', parentToolUseId: 'task-1' },
    ]);
  });

  it('names tool results after the call that produced them', () => {
    const parser = new StreamJsonParser();
    parser.parse({ type: 'assistant', message: { content: [{ type: 'tool_use', id: 'tu3', name: 'Bash', input: {} }] } });

    const events = parser.parse({
      type: 'user',
      message: {
        content: [
          { type: 'tool_result', tool_use_id: 'tu3', content: [{ type: 'text', text: 'line 1' }, { type: 'text', text: 'line 2' }] },
          { type: 'tool_result', tool_use_id: 'unknown', content: 'denied', is_error: true },
        ],
      },
    });

    expect(events).toEqual([
      { type: 'tool_result', toolUseId: 'tu3', toolName: 'Bash', output: 'line 1\nline 2', isError: false },
      { type: 'tool_result', toolUseId: 'unknown', toolName: 'Tool', output: 'denied', isError: true },
    ]);
  });

  it('maps the result line to a completion', () => {
    const parser = new StreamJsonParser();
    const [event] = parser.parse({
      type: 'result',
      subtype: 'error_max_turns',
      is_error: true,
      session_id: 'sess-9',
      total_cost_usd: 0.3,
      num_turns: 10,
      duration_ms: 4000,
      permission_denials: [{ tool_name: 'Bash', tool_input: {} }],
    });

    expect(event).toEqual({
      type: 'completion',
      sessionIdentifier: 'sess-9',
      subtype: 'error_max_turns',
      isError: true,
      costUsd: 0.3,
      numTurns: 10,
      durationMs: 4000,
      resultText: undefined,
      permissionDenials: ['Bash'],
    });
    expect(parser.sessionIdentifier).toBe('sess-9');
  });

  it('reads system lines', () => {
    const parser = new StreamJsonParser();
    expect(parser.parse({ type: 'system', subtype: 'init', session_id: 'sess-1' })).toEqual([
      { type: 'session', sessionIdentifier: 'sess-1' },
    ]);
    expect(parser.sessionIdentifier).toBe('sess-1');
    expect(
      parser.parse({ type: 'system', subtype: 'compact_boundary', compact_metadata: { trigger: 'manual', pre_tokens: 900 } }),
    ).toEqual([{ type: 'compaction', trigger: 'manual', preTokens: 900 }]);
  });

  it('ignores blank and non-JSON lines', () => {
    const parser = new StreamJsonParser();
    expect(parser.parseLine('')).toEqual([]);
    expect(parser.parseLine('Checking for updates...')).toEqual([]);
    expect(parser.parseLine('{"type":"rate_limit_event"}')).toEqual([]);
  });

  it('describes tool calls in one line', () => {
    expect(describeToolUse('Bash', { command: 'npm test', description: 'Run the tests' })).toBe('Run the tests');
    expect(describeToolUse('Bash', { command: 'ls -la' })).toBe('Running `ls -la`');
    expect(describeToolUse('Edit', { file_path: '/a/b/c.ts' })).toBe('Editing `c.ts`');
    expect(describeToolUse('Task', { subagent_type: 'explorer', description: 'map the repo' })).toBe(
      'Spawning explorer: map the repo',
    );
    expect(describeToolUse('mcp__db__query', {})).toBe('Using `mcp__db__query`');
  });
});

describe('process engine', () => {
  let cwd = '';

  beforeEach(async () => {
    cwd = await mkdtemp(path.join(os.tmpdir(), 'relaybot-engine-'));
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  const engine = () => new ProcessEngine({ command: process.execPath, args: `"${fixture}"`, logger: quiet });

  it('builds arguments in a fixed order', () => {
    const args = new ProcessEngine({
      command: 'claude',
      model: 'test-model',
      permissionMode: 'acceptEdits',
      defaultLimits: { maxTurns: 5 },
    }).buildArgs({ prompt: 'hi', workingDirectory: '/tmp', resume: 's1', limits: { maxBudgetUsd: 2 } });

    expect(args).toEqual([
      '-p',
      'hi',
      '--output-format',
      'stream-json',
      '--verbose',
      '--resume',
      's1',
      '--model',
      'test-model',
      '--permission-mode',
      'acceptEdits',
      '--max-turns',
      '5',
      '--max-budget-usd',
      '2',
    ]);
  });

  it('splits extra arguments with quotes', () => {
    expect(splitCommand('claude', '--add-dir "/srv/my repo" --debug')).toEqual(['claude', '--add-dir', '/srv/my repo', '--debug']);
  });

  it('passes only allow-listed environment variables', () => {
    const env = buildEngineEnv('/work', {
      HOME: '/home/dev',
      PATH: '/usr/bin',
      ANTHROPIC_API_KEY: 'test-key',
      SLACK_BOT_TOKEN: 'test-secret',
    });
    expect(env).toEqual({ PWD: '/work', HOME: '/home/dev', PATH: '/usr/bin', ANTHROPIC_API_KEY: 'test-key' });
  });

  it('streams events from a new session', async () => {
    const events = await collect(engine().start({ prompt: 'hello', workingDirectory: cwd }));

    expect(events).toEqual([
      { type: 'session', sessionIdentifier: 'sess-fixture' },
      { type: 'text', text: 'echo: hello' },
      { type: 'tool_activity', toolName: 'Bash', toolUseId: 'tu1', summary: 'Running `ls`', parentToolUseId: undefined },
      { type: 'tool_result', toolUseId: 'tu1', toolName: 'Bash', output: 'README.md', isError: false },
      {
        type: 'completion',
        sessionIdentifier: 'sess-fixture',
        subtype: 'success',
        isError: false,
        costUsd: 0.01,
        numTurns: 1,
        durationMs: 5,
        resultText: 'echo: hello',
        permissionDenials: [],
      },
    ]);
  });

  it('resumes an existing session', async () => {
    const events = await collect(engine().resume({ sessionIdentifier: 'sess-42', prompt: 'again', workingDirectory: cwd }));
    const done = events.at(-1);
    expect(done?.type === 'completion' ? done.sessionIdentifier : null).toBe('sess-42');
  });

  it('reports a lost session from the agent stderr', async () => {
    const events = await collect(engine().resume({ sessionIdentifier: 'sess-gone', prompt: 'fail', workingDirectory: cwd }));

    expect(events).toEqual([
      { type: 'error', message: 'boom\nNo conversation found with session ID: sess-gone', sessionLost: true },
    ]);
  });

  it('ends the stream without a completion when aborted', async () => {
    const controller = new AbortController();
    const events: AgentEvent[] = [];
    for await (const event of engine().start({ prompt: 'hang', workingDirectory: cwd }, controller.signal)) {
      events.push(event);
      if (event.type === 'text') controller.abort();
    }

    expect(events).toEqual([
      { type: 'session', sessionIdentifier: 'sess-fixture' },
      { type: 'text', text: 'waiting' },
    ]);
  });

  it('pings the agent binary', async () => {
    await expect(new ProcessEngine({ command: process.execPath, logger: quiet }).ping()).resolves.toBe(true);
  });
});
