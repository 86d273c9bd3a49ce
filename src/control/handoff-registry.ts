import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { AliasConflictError, systemErrorCode } from '../shared/errors.js';
import { createLogger, describeError, type Logger } from '../utils/logger.js';
import { Mutex } from '../utils/mutex.js';
import { ensureDir, expandPath } from '../utils/path.js';
import { normalizeAlias } from './aliases.js';

export interface HandoffRecord {
  alias: string;
  sessionIdentifier: string;
  createdAt: string;
  sourceConversation?: string;
}

export interface HandoffRegistryOptions {
  /** Oldest records beyond this count are pruned on write; 0 keeps everything. */
  maxRecords?: number;
  logger?: Logger;
}

const recordSchema = z.object({
  alias: z.string().min(1),
  sessionIdentifier: z.string().min(1),
  createdAt: z.string(),
  sourceConversation: z.string().optional(),
});

const persistedSchema = z.object({
  version: z.literal(1),
  records: z.array(z.unknown()),
});

// Earlier installs stored a flat `{ alias: sessionId }` map.
const flatMapSchema = z.record(z.string());

interface PersistedRegistry {
  version: 1;
  records: HandoffRecord[];
}

/**
 * Durable alias → session mapping shared by the bridge daemon and the
 * `relaybot handoff` CLI. Reads always go to disk so a handoff written by the
 * CLI is visible to a running daemon. Writes replace the file through a
 * rename, so a reader sees either the old or the new registry.
 */
export class HandoffRegistry {
  private readonly file: string;
  private readonly writeLock = new Mutex();
  private readonly logger: Logger;

  constructor(file: string, private readonly options: HandoffRegistryOptions = {}) {
    this.file = expandPath(file);
    this.logger = options.logger ?? createLogger('control.handoff-registry');
  }

  get filePath() {
    return this.file;
  }

  async init() {
    await ensureDir(path.dirname(this.file));
  }

  async resolve(alias: string): Promise<string | null> {
    const record = await this.get(alias);
    return record ? record.sessionIdentifier : null;
  }

  async get(alias: string): Promise<HandoffRecord | null> {
    const key = normalizeAlias(alias);
    const records = await this.readRecords();
    return records.find((record) => record.alias === key) ?? null;
  }

  async has(alias: string) {
    return (await this.get(alias)) !== null;
  }

  async list() {
    return this.readRecords();
  }

  async recordHandoff(sessionIdentifier: string, alias: string, sourceConversation?: string): Promise<HandoffRecord> {
    const key = normalizeAlias(alias);
    return this.writeLock.runExclusive(async () => {
      const records = await this.readRecords();
      const existing = records.find((record) => record.alias === key);
      if (existing) {
        if (existing.sessionIdentifier !== sessionIdentifier) {
          throw new AliasConflictError(key, existing.sessionIdentifier);
        }
        return existing;
      }

      const record: HandoffRecord = {
        alias: key,
        sessionIdentifier,
        createdAt: new Date().toISOString(),
        ...(sourceConversation ? { sourceConversation } : {}),
      };
      records.push(record);

      const max = this.options.maxRecords ?? 0;
      const kept = max > 0 && records.length > max ? records.slice(records.length - max) : records;
      await this.persist({ version: 1, records: kept });
      this.logger.debug('handoff recorded', { alias: key, sourceConversation });
      return record;
    });
  }

  private async readRecords(): Promise<HandoffRecord[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.file, { encoding: 'utf8' });
    } catch (error) {
      if (systemErrorCode(error) !== 'ENOENT') {
        this.logger.warn('handoff registry unreadable', { file: this.file, ...describeError(error) });
      }
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('handoff registry is not valid JSON', { file: this.file, ...describeError(error) });
      return [];
    }

    const current = persistedSchema.safeParse(parsed);
    if (current.success) {
      const records: HandoffRecord[] = [];
      for (const entry of current.data.records) {
        const record = recordSchema.safeParse(entry);
        if (record.success) {
          records.push(record.data);
        }
      }
      return records;
    }

    const flat = flatMapSchema.safeParse(parsed);
    if (flat.success) {
      return Object.entries(flat.data).map(([alias, sessionIdentifier]) => ({
        alias,
        sessionIdentifier,
        createdAt: new Date(0).toISOString(),
      }));
    }

    this.logger.warn('handoff registry has an unknown shape', { file: this.file });
    return [];
  }

  private async persist(payload: PersistedRegistry) {
    await ensureDir(path.dirname(this.file));
    const tmp = `${this.file}.${process.pid}.${Date.now()}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(payload, null, 2), { encoding: 'utf8', mode: 0o600 });
    await fs.rename(tmp, this.file);
  }
}
