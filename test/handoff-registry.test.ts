import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';

import { HandoffRegistry } from '../src/control/handoff-registry.js';
import { ReconnectionScanner } from '../src/control/reconnect.js';
import { AliasConflictError } from '../src/shared/errors.js';
import { createLogger } from '../src/utils/logger.js';
import { FakeTransport } from './support/fakes.js';

const quiet = createLogger('test', 'error');

let tmpDir = '';
let file = '';

beforeEach(async () => {
  tmpDir = await mkdtemp(path.join(os.tmpdir(), 'relaybot-registry-'));
  file = path.join(tmpDir, 'state', 'handoff-sessions.json');
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe('handoff registry', () => {
  it('records and resolves aliases case-insensitively', async () => {
    const registry = new HandoffRegistry(file, { logger: quiet });
    await registry.recordHandoff('abc123', 'Quiet-Neon-Fox', 'C100:1700000000.000100');

    await expect(registry.resolve('quiet-neon-fox')).resolves.toBe('abc123');
    await expect(registry.resolve('QUIET-NEON-FOX')).resolves.toBe('abc123');
    await expect(registry.resolve('lucky-neon-fox')).resolves.toBeNull();
    expect((await registry.get('quiet-neon-fox'))?.sourceConversation).toBe('C100:1700000000.000100');
  });

  it('persists a versioned record list visible to other instances', async () => {
    await new HandoffRegistry(file, { logger: quiet }).recordHandoff('abc123', 'quiet-neon-fox');

    const persisted: unknown = JSON.parse(await readFile(file, 'utf8'));
    expect(persisted).toMatchObject({ version: 1, records: [{ alias: 'quiet-neon-fox', sessionIdentifier: 'abc123' }] });
    await expect(new HandoffRegistry(file, { logger: quiet }).resolve('quiet-neon-fox')).resolves.toBe('abc123');
  });

  it('is idempotent for the same alias and session', async () => {
    const registry = new HandoffRegistry(file, { logger: quiet });
    const first = await registry.recordHandoff('abc123', 'quiet-neon-fox');
    const second = await registry.recordHandoff('abc123', 'quiet-neon-fox');

    expect(second).toEqual(first);
    expect(await registry.list()).toHaveLength(1);
  });

  it('refuses to rebind an alias to another session', async () => {
    const registry = new HandoffRegistry(file, { logger: quiet });
    await registry.recordHandoff('abc123', 'quiet-neon-fox');

    await expect(registry.recordHandoff('def456', 'quiet-neon-fox')).rejects.toBeInstanceOf(AliasConflictError);
    await expect(registry.resolve('quiet-neon-fox')).resolves.toBe('abc123');
  });

  it('serializes concurrent writers', async () => {
    const registry = new HandoffRegistry(file, { logger: quiet });
    await Promise.all(
      ['brisk-amber-otter', 'quiet-amber-fox', 'lucky-neon-fox'].map((alias, index) =>
        registry.recordHandoff(`sess-${index}`, alias),
      ),
    );
    expect((await registry.list()).map((record) => record.alias).sort()).toEqual([
      'brisk-amber-otter',
      'lucky-neon-fox',
      'quiet-amber-fox',
    ]);
  });

  it('treats a corrupt file as empty and recovers on the next write', async () => {
    const registry = new HandoffRegistry(file, { logger: quiet });
    await registry.init();
    await writeFile(file, 'not json', 'utf8');

    await expect(registry.resolve('quiet-neon-fox')).resolves.toBeNull();
    await registry.recordHandoff('abc123', 'quiet-neon-fox');
    await expect(registry.resolve('quiet-neon-fox')).resolves.toBe('abc123');
  });

  it('reads the older flat alias map', async () => {
    const registry = new HandoffRegistry(file, { logger: quiet });
    await registry.init();
    await writeFile(file, JSON.stringify({ 'brisk-amber-otter': 'sess-1' }), 'utf8');

    await expect(registry.resolve('brisk-amber-otter')).resolves.toBe('sess-1');
  });

  it('prunes the oldest records past maxRecords', async () => {
    const registry = new HandoffRegistry(file, { maxRecords: 2, logger: quiet });
    await registry.recordHandoff('sess-1', 'brisk-amber-otter');
    await registry.recordHandoff('sess-2', 'quiet-amber-fox');
    await registry.recordHandoff('sess-3', 'lucky-neon-fox');

    expect((await registry.list()).map((record) => record.alias)).toEqual(['quiet-amber-fox', 'lucky-neon-fox']);
  });
});

describe('reconnection scanner', () => {
  const own = (text: string, messageId = '1.0') => ({ messageId, text, fromSelf: true });

  it('prefers the most recent resolvable marker', async () => {
    const registry = new HandoffRegistry(file, { logger: quiet });
    await registry.recordHandoff('sess-old', 'brisk-amber-otter');
    await registry.recordHandoff('sess-new', 'quiet-amber-fox');
    const scanner = new ReconnectionScanner(registry, { logger: quiet });

    const result = await scanner.scan([
      own(':sparkles: New session\n_(session: brisk-amber-otter)_', '1.0'),
      own(':sparkles: New session\n_(session: quiet-amber-fox)_', '2.0'),
    ]);

    expect(result).toEqual({
      recovered: { sessionIdentifier: 'sess-new', alias: 'quiet-amber-fox', source: 'alias' },
      totalFound: 2,
      unmappedAliases: [],
      skipped: ['brisk-amber-otter'],
    });
  });

  it('skips newer aliases the registry does not know', async () => {
    const registry = new HandoffRegistry(file, { logger: quiet });
    await registry.recordHandoff('sess-old', 'brisk-amber-otter');
    const scanner = new ReconnectionScanner(registry, { logger: quiet });

    const result = await scanner.scan([own('_(session: brisk-amber-otter)_', '1.0'), own('_(session: lucky-neon-fox)_', '2.0')]);

    expect(result.recovered?.sessionIdentifier).toBe('sess-old');
    expect(result.unmappedAliases).toEqual(['lucky-neon-fox']);
  });

  it('ignores markers pasted by other users', async () => {
    const registry = new HandoffRegistry(file, { logger: quiet });
    await registry.recordHandoff('sess-old', 'brisk-amber-otter');
    const scanner = new ReconnectionScanner(registry, { logger: quiet });

    const result = await scanner.scan([{ messageId: '1.0', text: '_(session: brisk-amber-otter)_', userId: 'U9', fromSelf: false }]);

    expect(result.recovered).toBeNull();
    expect(result.totalFound).toBe(0);
  });

  it('falls back to a legacy session id marker', async () => {
    const scanner = new ReconnectionScanner(new HandoffRegistry(file, { logger: quiet }), { logger: quiet });

    const result = await scanner.scan([own('resumed _(session_id: abc-123)_')]);
    expect(result.recovered).toEqual({ sessionIdentifier: 'abc-123', source: 'legacy' });
  });

  it('gives the same answer on repeated scans without writing', async () => {
    const registry = new HandoffRegistry(file, { logger: quiet });
    await registry.recordHandoff('sess-old', 'brisk-amber-otter');
    const scanner = new ReconnectionScanner(registry, { logger: quiet });
    const history = [own('_(session: brisk-amber-otter)_')];

    const first = await scanner.scan(history);
    const second = await scanner.scan(history);

    expect(second).toEqual(first);
    expect(await registry.list()).toHaveLength(1);
  });

  it('treats a failed history fetch as a new thread', async () => {
    const transport = new FakeTransport();
    transport.failHistory = true;
    const scanner = new ReconnectionScanner(new HandoffRegistry(file, { logger: quiet }), { logger: quiet });

    const result = await scanner.recover(transport, 'C100', '1700000000.000100');
    expect(result).toEqual({ recovered: null, totalFound: 0, unmappedAliases: [], skipped: [] });
  });
});
