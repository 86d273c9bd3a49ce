import type { ConversationKey } from '../shared/protocol.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { Mutex } from '../utils/mutex.js';

export type SessionState = 'new' | 'active' | 'busy' | 'idle';

export interface RecoveredSession {
  sessionIdentifier: string;
  alias?: string;
  source: 'alias' | 'legacy' | 'prompt';
}

export interface SessionInfoInit {
  conversationKey: ConversationKey;
  workingDirectory: string;
  maxQueuedTurns?: number;
  recovered?: RecoveredSession | null;
  now?: number;
}

export class SessionInfo {
  readonly conversationKey: ConversationKey;
  readonly workingDirectory: string;
  readonly lock: Mutex;
  readonly createdAt: number;
  readonly recoveredFrom?: RecoveredSession;
  lastActivity: number;
  turnCount = 0;
  totalCostUsd = 0;
  alias?: string;
  private identifier: string | null = null;

  constructor(init: SessionInfoInit) {
    const now = init.now ?? Date.now();
    this.conversationKey = init.conversationKey;
    this.workingDirectory = init.workingDirectory;
    this.lock = new Mutex({ maxWaiting: init.maxQueuedTurns });
    this.createdAt = now;
    this.lastActivity = now;
    if (init.recovered) {
      this.recoveredFrom = init.recovered;
      this.identifier = init.recovered.sessionIdentifier;
      this.alias = init.recovered.alias;
    }
  }

  get sessionIdentifier() {
    return this.identifier;
  }

  /**
   * Binds the agent session. Re-assigning the same identifier is a no-op; a
   * different identifier requires `clearSessionIdentifier` first.
   */
  assignSessionIdentifier(identifier: string) {
    if (this.identifier === identifier) return;
    if (this.identifier !== null) {
      throw new Error(`session identifier already set for ${this.conversationKey}`);
    }
    this.identifier = identifier;
  }

  /** Drops an unrecoverable session so the next turn starts fresh. */
  clearSessionIdentifier() {
    this.identifier = null;
    this.alias = undefined;
  }

  touch(now = Date.now()) {
    this.lastActivity = now;
  }

  isBusy() {
    return this.lock.isLocked() || this.lock.pending() > 0;
  }

  stateAt(now: number, idleAfterMs: number): SessionState {
    if (this.isBusy()) return 'busy';
    if (this.identifier === null) return 'new';
    return now - this.lastActivity > idleAfterMs ? 'idle' : 'active';
  }
}

export interface GetOrCreateOptions {
  workingDirectory: string;
  /** Runs once for a key with no entry; `null` means start a fresh session. */
  recover?: () => Promise<RecoveredSession | null>;
}

export interface SessionStoreOptions {
  maxQueuedTurns?: number;
  logger?: Logger;
}

/**
 * In-memory conversation → session registry. The store mutex only guards the
 * create-or-join decision; the recovery lookup for a new key runs outside it,
 * and concurrent callers for that key share the same pending creation.
 */
export class SessionStore {
  private readonly sessions = new Map<ConversationKey, SessionInfo>();
  private readonly creating = new Map<ConversationKey, Promise<SessionInfo>>();
  private readonly storeLock = new Mutex();
  private readonly logger: Logger;

  constructor(private readonly options: SessionStoreOptions = {}) {
    this.logger = options.logger ?? createLogger('control.session-store');
  }

  async getOrCreate(conversationKey: ConversationKey, options: GetOrCreateOptions): Promise<SessionInfo> {
    // The decision returns a wrapper so the store lock is not held while the
    // creation (and its recovery lookup) is awaited.
    const decision = await this.storeLock.runExclusive(() => {
      const existing = this.sessions.get(conversationKey);
      if (existing) {
        existing.touch();
        return { pending: Promise.resolve(existing) };
      }

      const inFlight = this.creating.get(conversationKey);
      if (inFlight) {
        return { pending: inFlight };
      }

      const creation = this.create(conversationKey, options).finally(() => {
        this.creating.delete(conversationKey);
      });
      this.creating.set(conversationKey, creation);
      return { pending: creation };
    });

    return decision.pending;
  }

  private async create(conversationKey: ConversationKey, options: GetOrCreateOptions) {
    let recovered: RecoveredSession | null = null;
    if (options.recover) {
      try {
        recovered = await options.recover();
      } catch (error) {
        this.logger.warn('session recovery failed, starting fresh', {
          conversationKey,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const info = new SessionInfo({
      conversationKey,
      workingDirectory: options.workingDirectory,
      maxQueuedTurns: this.options.maxQueuedTurns,
      recovered,
    });
    this.sessions.set(conversationKey, info);
    this.logger.info(recovered ? 'session recovered' : 'session created', {
      conversationKey,
      workingDirectory: info.workingDirectory,
      alias: recovered?.alias,
    });
    return info;
  }

  get(conversationKey: ConversationKey) {
    return this.sessions.get(conversationKey);
  }

  has(conversationKey: ConversationKey) {
    return this.sessions.has(conversationKey);
  }

  get size() {
    return this.sessions.size;
  }

  entries() {
    return Array.from(this.sessions.values());
  }

  async remove(conversationKey: ConversationKey) {
    return this.storeLock.runExclusive(() => this.sessions.delete(conversationKey));
  }

  /**
   * Evicts entries idle for longer than `maxAgeMs`. An entry whose lock is
   * held, or has turns queued behind it, is never evicted.
   */
  async sweepIdle(maxAgeMs: number, now = Date.now()): Promise<ConversationKey[]> {
    return this.storeLock.runExclusive(() => {
      const evicted: ConversationKey[] = [];
      for (const [key, info] of this.sessions) {
        if (info.isBusy()) continue;
        if (now - info.lastActivity <= maxAgeMs) continue;
        this.sessions.delete(key);
        evicted.push(key);
      }
      if (evicted.length) {
        this.logger.info('evicted idle sessions', { count: evicted.length });
      }
      return evicted;
    });
  }

  clear() {
    this.sessions.clear();
  }
}
