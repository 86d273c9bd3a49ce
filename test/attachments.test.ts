import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';

import { attachmentNote, safeFilename, saveAttachments } from '../src/control/attachments.js';
import { createLogger } from '../src/utils/logger.js';
import { FakeTransport } from './support/fakes.js';

const quiet = createLogger('test', 'error');

let tmpDir = '';

beforeEach(async () => {
  tmpDir = await mkdtemp(path.join(os.tmpdir(), 'relaybot-attachments-'));
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe('attachment filenames', () => {
  it('keeps only the last path segment', () => {
    expect(safeFilename('../../etc/passwd')).toBe('passwd');
    expect(safeFilename('C:\\Users\\dev\\shot.png')).toBe('shot.png');
    expect(safeFilename('notes.md')).toBe('notes.md');
  });

  it('falls back to a generic name', () => {
    expect(safeFilename(undefined)).toBe('attachment');
    expect(safeFilename('..')).toBe('attachment');
    expect(safeFilename('')).toBe('attachment');
  });
});

describe('saving attachments', () => {
  it('numbers files that share a name', async () => {
    const transport = new FakeTransport();
    transport.files.set('F1', 'first');
    transport.files.set('F2', 'second');
    const targetDir = path.join(tmpDir, 'thread');

    const saved = await saveAttachments(
      transport,
      [
        { id: 'F1', filename: 'trace.log' },
        { id: 'F2', filename: 'trace.log' },
      ],
      { targetDir, maxBytes: 1024, logger: quiet },
    );

    expect(saved.map((file) => file.filePath)).toEqual([path.join(targetDir, 'trace.log'), path.join(targetDir, 'trace_1.log')]);
    await expect(readFile(path.join(targetDir, 'trace_1.log'), 'utf8')).resolves.toBe('second');
  });

  it('skips files over the size limit', async () => {
    const transport = new FakeTransport();
    transport.files.set('F1', 'x'.repeat(20));
    transport.files.set('F2', 'x'.repeat(20));
    transport.files.set('F3', 'ok');

    const saved = await saveAttachments(
      transport,
      [
        { id: 'F1', filename: 'declared.bin', sizeBytes: 20 },
        { id: 'F2', filename: 'undeclared.bin' },
        { id: 'F3', filename: 'small.txt', sizeBytes: 2 },
      ],
      { targetDir: tmpDir, maxBytes: 10, logger: quiet },
    );

    expect(saved.map((file) => file.originalName)).toEqual(['small.txt']);
    await expect(readdir(tmpDir)).resolves.toEqual(['small.txt']);
  });

  it('returns nothing when no file could be fetched', async () => {
    const saved = await saveAttachments(new FakeTransport(), [{ id: 'F404', filename: 'gone.png' }], {
      targetDir: tmpDir,
      maxBytes: 10,
      logger: quiet,
    });
    expect(saved).toEqual([]);
  });
});

describe('attachment note', () => {
  it('labels images and other files', () => {
    expect(
      attachmentNote([
        { originalName: 'screen.png', filePath: '/data/a/screen.png', contentType: 'image/png' },
        { originalName: 'build.log', filePath: '/data/a/build.log', contentType: 'text/plain' },
      ]),
    ).toBe(
      [
        'The user attached files. Use the Read tool to inspect them:',
        '- Image: /data/a/screen.png (original name: screen.png)',
        '- File: /data/a/build.log (original name: build.log)',
      ].join('\n'),
    );
  });
});
