import type { AppConfig } from '../config.js';
import type { AgentEngine } from '../engine/types.js';
import type { ChatEvent, ChatTransport, ReactionEvent } from '../shared/protocol.js';
import { createLogger, describeError, type Logger } from '../utils/logger.js';
import { EventDeduper } from './dedupe.js';
import { MessageDispatcher, type DispatchOutcome } from './dispatcher.js';
import { HandoffRegistry } from './handoff-registry.js';
import { RateLimiter } from './rate-limit.js';
import { ReconnectionScanner } from './reconnect.js';
import { SessionStore } from './session-store.js';
import { WorkspaceResolver } from './workspace.js';

export type DaemonConfig = Pick<
  AppConfig,
  | 'LOG_LEVEL'
  | 'HANDOFF_FILE'
  | 'HANDOFF_MAX_RECORDS'
  | 'ATTACHMENTS_DIR'
  | 'MAX_ATTACHMENT_BYTES'
  | 'SLACK_ALLOWED_USERS'
  | 'SLACK_ALLOWED_CHANNELS'
  | 'BASE_DIRECTORY'
  | 'CHANNEL_DIRS'
  | 'VERBOSITY'
  | 'RATE_LIMIT_PER_MINUTE'
  | 'DEDUPE_WINDOW_MS'
  | 'DEDUPE_MAX_ENTRIES'
  | 'MAX_MESSAGE_CHARS'
  | 'SNIPPET_THRESHOLD_CHARS'
  | 'MAX_QUEUE_PER_SESSION'
  | 'SESSION_IDLE_MS'
  | 'SESSION_SWEEP_INTERVAL_MS'
  | 'REACTION_MAX_RETRIES'
  | 'REACTION_RETRY_BASE_MS'
  | 'ENGINE_TIMEOUT_MS'
  | 'ENGINE_MAX_TURNS'
  | 'ENGINE_MAX_BUDGET_USD'
>;

export interface RelayDaemonDeps {
  transport: ChatTransport;
  engine: AgentEngine;
  now?: () => number;
}

/** Owns the bridge's state and wires the chat transport to the dispatcher. */
export class RelayDaemon {
  readonly store: SessionStore;
  readonly registry: HandoffRegistry;
  readonly scanner: ReconnectionScanner;
  readonly dispatcher: MessageDispatcher;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;
  private readonly now: () => number;
  private sweepTimer?: ReturnType<typeof setInterval>;

  constructor(private readonly config: DaemonConfig, deps: RelayDaemonDeps) {
    const level = config.LOG_LEVEL;
    this.logger = createLogger('control.daemon', level);
    this.now = deps.now ?? Date.now;

    this.store = new SessionStore({
      maxQueuedTurns: config.MAX_QUEUE_PER_SESSION,
      logger: createLogger('control.session-store', level),
    });
    this.registry = new HandoffRegistry(config.HANDOFF_FILE, {
      maxRecords: config.HANDOFF_MAX_RECORDS,
      logger: createLogger('control.handoff-registry', level),
    });
    this.scanner = new ReconnectionScanner(this.registry, { logger: createLogger('control.reconnect', level) });
    this.rateLimiter = new RateLimiter(config.RATE_LIMIT_PER_MINUTE);

    this.dispatcher = new MessageDispatcher(
      {
        transport: deps.transport,
        engine: deps.engine,
        store: this.store,
        registry: this.registry,
        scanner: this.scanner,
        workspace: new WorkspaceResolver({
          baseDirectory: config.BASE_DIRECTORY || undefined,
          channelDirs: config.CHANNEL_DIRS,
        }),
        deduper: new EventDeduper({ windowMs: config.DEDUPE_WINDOW_MS, maxEntries: config.DEDUPE_MAX_ENTRIES }),
        rateLimiter: this.rateLimiter,
        allowList: { users: config.SLACK_ALLOWED_USERS, channels: config.SLACK_ALLOWED_CHANNELS },
        logger: createLogger('control.dispatcher', level),
        securityLogger: createLogger('security', level),
        now: this.now,
      },
      {
        verbosity: config.VERBOSITY,
        maxMessageChars: config.MAX_MESSAGE_CHARS,
        snippetThresholdChars: config.SNIPPET_THRESHOLD_CHARS,
        turnTimeoutMs: config.ENGINE_TIMEOUT_MS,
        limits: {
          maxTurns: config.ENGINE_MAX_TURNS || undefined,
          maxBudgetUsd: config.ENGINE_MAX_BUDGET_USD || undefined,
        },
        reactionMaxRetries: config.REACTION_MAX_RETRIES,
        reactionRetryBaseMs: config.REACTION_RETRY_BASE_MS,
        attachmentsDirectory: config.ATTACHMENTS_DIR,
        maxAttachmentBytes: config.MAX_ATTACHMENT_BYTES,
      },
    );
  }

  async start() {
    await this.registry.init();
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.logger.error('idle sweep failed', describeError(error));
      });
    }, this.config.SESSION_SWEEP_INTERVAL_MS);
    this.sweepTimer.unref();
    this.logger.info('relay daemon started', { handoffFile: this.registry.filePath, verbosity: this.config.VERBOSITY });
  }

  handle(event: ChatEvent): Promise<DispatchOutcome> {
    return this.dispatcher.handle(event);
  }

  handleReaction(reaction: ReactionEvent) {
    return this.dispatcher.handleReaction(reaction);
  }

  async sweep(now = this.now()) {
    const evicted = await this.store.sweepIdle(this.config.SESSION_IDLE_MS, now);
    this.rateLimiter.prune(now);
    return evicted;
  }

  /** Stops the sweeper, then drains in-flight turns within `graceMs`. */
  async stop(graceMs: number) {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
    const { interrupted } = await this.dispatcher.drain(graceMs);
    this.logger.info('relay daemon stopped', { sessions: this.store.size, interrupted });
  }
}
