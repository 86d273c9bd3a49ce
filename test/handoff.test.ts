import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';

import { HandoffRegistry } from '../src/control/handoff-registry.js';
import { buildHandoffMessage, performHandoff, resolveSessionIdFromHistory, type HandoffPoster } from '../src/control/handoff.js';
import { ReconnectionScanner } from '../src/control/reconnect.js';
import { WorkspaceResolver } from '../src/control/workspace.js';
import { HandoffError } from '../src/shared/errors.js';
import { createLogger } from '../src/utils/logger.js';

const quiet = createLogger('test', 'error');

class FakePoster implements HandoffPoster {
  readonly posted: { channelId: string; text: string }[] = [];

  constructor(private readonly channels: Record<string, string>) {}

  async findChannelId(channelName: string) {
    return this.channels[channelName] ?? null;
  }

  async postMessage(channelId: string, text: string) {
    this.posted.push({ channelId, text });
    return '1700000500.000100';
  }
}

let tmpDir = '';
let historyFile = '';

beforeEach(async () => {
  tmpDir = await mkdtemp(path.join(os.tmpdir(), 'relaybot-handoff-'));
  historyFile = path.join(tmpDir, 'history.jsonl');
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

const setup = (channels: Record<string, string> = { web: 'C900' }) => {
  const registry = new HandoffRegistry(path.join(tmpDir, 'handoff-sessions.json'), { logger: quiet });
  const workspace = new WorkspaceResolver({ baseDirectory: tmpDir, channelDirs: { web: 'web' } });
  const poster = new FakePoster(channels);
  return { registry, poster, deps: { registry, workspace, poster, historyFile, random: () => 0 } };
};

describe('session id from history', () => {
  it('reads the session of the last entry', async () => {
    await writeFile(
      historyFile,
      `${JSON.stringify({ display: 'first', sessionId: 's-old' })}\n${JSON.stringify({ display: 'second', sessionId: 's-new' })}\n`,
      'utf8',
    );
    await expect(resolveSessionIdFromHistory(historyFile)).resolves.toBe('s-new');
  });

  it('explains a missing history file', async () => {
    await expect(resolveSessionIdFromHistory(historyFile)).rejects.toMatchObject({
      name: 'HandoffError',
      hint: 'Pass --session-id explicitly.',
    });
  });

  it('rejects an entry without a session id', async () => {
    await writeFile(historyFile, '{"display":"x"}\n', 'utf8');
    await expect(resolveSessionIdFromHistory(historyFile)).rejects.toBeInstanceOf(HandoffError);
  });
});

describe('handoff', () => {
  it('builds the message with the marker last', () => {
    expect(buildHandoffMessage('Refactor done', 'amber-ancient-anchor', 'Keep the old API?')).toBe(
      'Refactor done\n\nKeep the old API?\n\n_(session: amber-ancient-anchor)_',
    );
    expect(buildHandoffMessage('Refactor done', 'amber-ancient-anchor')).toBe(
      'Refactor done\n\n_(session: amber-ancient-anchor)_',
    );
  });

  it('posts to the channel mapped to the working directory', async () => {
    await writeFile(historyFile, `${JSON.stringify({ sessionId: 's-new' })}\n`, 'utf8');
    const { registry, poster, deps } = setup();

    const result = await performHandoff(deps, {
      summary: 'Refactor done',
      questions: 'Keep the old API?',
      cwd: path.join(tmpDir, 'web', 'src'),
    });

    expect(result).toMatchObject({
      alias: 'amber-ancient-anchor',
      sessionIdentifier: 's-new',
      channelName: 'web',
      channelId: 'C900',
      messageId: '1700000500.000100',
    });
    expect(poster.posted).toEqual([
      { channelId: 'C900', text: 'Refactor done\n\nKeep the old API?\n\n_(session: amber-ancient-anchor)_' },
    ]);
    await expect(registry.resolve('amber-ancient-anchor')).resolves.toBe('s-new');
  });

  it('is found again by the reconnection scanner', async () => {
    const { registry, poster, deps } = setup();
    await performHandoff(deps, { summary: 'Done', sessionIdentifier: 's-explicit', channel: 'web' });

    const scanner = new ReconnectionScanner(registry, { logger: quiet });
    const result = await scanner.scan([{ messageId: '1700000500.000100', text: poster.posted[0].text, fromSelf: true }]);
    expect(result.recovered).toEqual({ sessionIdentifier: 's-explicit', alias: 'amber-ancient-anchor', source: 'alias' });
  });

  it('accepts an explicit channel with a leading hash', async () => {
    const { poster, deps } = setup({ ops: 'C901' });
    const result = await performHandoff(deps, { summary: 'Done', sessionIdentifier: 's1', channel: '#ops' });

    expect(result.channelName).toBe('ops');
    expect(poster.posted[0].channelId).toBe('C901');
  });

  it('fails when no channel matches the directory', async () => {
    const { deps } = setup();
    await expect(
      performHandoff(deps, { summary: 'Done', sessionIdentifier: 's1', cwd: path.join(tmpDir, 'other') }),
    ).rejects.toThrow(/could not resolve a Slack channel/);
  });

  it('fails when Slack does not know the channel', async () => {
    const { registry, deps } = setup({});
    await expect(performHandoff(deps, { summary: 'Done', sessionIdentifier: 's1', channel: 'web' })).rejects.toThrow(
      'channel #web not found',
    );
    expect(await registry.list()).toEqual([]);
  });

  it('requires a summary', async () => {
    const { deps } = setup();
    await expect(performHandoff(deps, { summary: '  ', sessionIdentifier: 's1', channel: 'web' })).rejects.toBeInstanceOf(
      HandoffError,
    );
  });
});
