import fs from 'node:fs/promises';
import path from 'node:path';
import type { ChatTransport, InboundAttachment } from '../shared/protocol.js';
import { systemErrorCode } from '../shared/errors.js';
import { describeError, type Logger } from '../utils/logger.js';
import { ensureDir, expandPath } from '../utils/path.js';

export interface SavedAttachment {
  originalName: string;
  filePath: string;
  contentType: string;
}

export interface SaveAttachmentsOptions {
  targetDir: string;
  maxBytes: number;
  logger: Logger;
}

/** Drops directory parts so a shared file cannot be written outside `targetDir`. */
export const safeFilename = (name: string | undefined) => {
  const base = path.basename((name ?? '').replace(/\\/g, '/'));
  return base.replace(/^\.+$/, '') || 'attachment';
};

const numbered = (filename: string, counter: number) => {
  const ext = path.extname(filename);
  return `${filename.slice(0, filename.length - ext.length)}_${counter}${ext}`;
};

/** Writes without overwriting: `log.txt` becomes `log_1.txt`, `log_2.txt`, ... */
const writeUnique = async (dir: string, filename: string, data: Uint8Array) => {
  for (let counter = 0; ; counter += 1) {
    const filePath = path.join(dir, counter === 0 ? filename : numbered(filename, counter));
    try {
      await fs.writeFile(filePath, data, { flag: 'wx' });
      return filePath;
    } catch (error) {
      if (systemErrorCode(error) !== 'EEXIST') throw error;
    }
  }
};

/**
 * Downloads a message's shared files into `targetDir`. Files that are too
 * large or fail to download are skipped and logged.
 */
export const saveAttachments = async (
  transport: ChatTransport,
  attachments: InboundAttachment[],
  options: SaveAttachmentsOptions,
): Promise<SavedAttachment[]> => {
  if (!attachments.length) return [];

  const dir = path.resolve(expandPath(options.targetDir));
  await ensureDir(dir);

  const saved: SavedAttachment[] = [];
  for (const attachment of attachments) {
    const originalName = attachment.filename ?? 'attachment';
    if (attachment.sizeBytes !== undefined && attachment.sizeBytes > options.maxBytes) {
      options.logger.warn('attachment too large, skipping', { name: originalName, sizeBytes: attachment.sizeBytes });
      continue;
    }

    try {
      const data = await transport.downloadAttachment(attachment);
      if (data.byteLength > options.maxBytes) {
        options.logger.warn('attachment too large, skipping', { name: originalName, sizeBytes: data.byteLength });
        continue;
      }
      const filePath = await writeUnique(dir, safeFilename(attachment.filename), data);
      saved.push({ originalName, filePath, contentType: attachment.contentType ?? 'application/octet-stream' });
      options.logger.info('attachment saved', { name: originalName, bytes: data.byteLength, filePath });
    } catch (error) {
      options.logger.warn('attachment download failed', { name: originalName, ...describeError(error) });
    }
  }
  return saved;
};

export const attachmentNote = (saved: SavedAttachment[]) => {
  const refs = saved.map((file) => {
    const label = file.contentType.startsWith('image/') ? 'Image' : 'File';
    return `- ${label}: ${file.filePath} (original name: ${file.originalName})`;
  });
  return ['The user attached files. Use the Read tool to inspect them:', ...refs].join('\n');
};
