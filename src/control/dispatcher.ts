import path from 'node:path';
import type { AgentEngine, AgentEvent, CompletionEvent, TurnLimits } from '../engine/types.js';
import { AdmissionError, AliasConflictError, ConfigurationError, LockQueueFullError, errorMessage } from '../shared/errors.js';
import type { ChatEvent, ChatTransport, ConversationKey, ReactionEvent } from '../shared/protocol.js';
import { createLogger, describeError, type Logger } from '../utils/logger.js';
import type { Release } from '../utils/mutex.js';
import { retryWithBackoff, sleep } from '../utils/retry.js';
import { generateAlias } from './aliases.js';
import { attachmentNote, saveAttachments } from './attachments.js';
import { splitMessage } from './chunking.js';
import type { EventDeduper } from './dedupe.js';
import { isAllowed, type AllowList } from './guards.js';
import type { HandoffRegistry } from './handoff-registry.js';
import { findSessionMarkers, formatSessionMarker, stripSessionMarkers } from './markers.js';
import type { RateLimiter } from './rate-limit.js';
import type { ReconnectionScanner } from './reconnect.js';
import {
  REACTIONS,
  buildSystemPreamble,
  emptyResponseNote,
  formatCompactionNote,
  formatCompletionSummary,
  formatContinuingSession,
  formatDenialNote,
  formatNewSession,
  formatToolActivity,
  formatToolError,
  formatToolResult,
  greetingPrompt,
  handoffGreetingPrompt,
  interruptedNote,
  staleSessionNote,
  timeoutNote,
} from './render.js';
import type { RecoveredSession, SessionInfo, SessionStore } from './session-store.js';
import { buildThreadTranscript, withThreadHistory } from './thread-context.js';
import { shouldShow, type Verbosity } from './verbosity.js';
import type { WorkspaceResolver } from './workspace.js';

export type DispatchOutcome =
  | 'duplicate'
  | 'empty'
  | 'not_allowed'
  | 'rate_limited'
  | 'unresolved'
  | 'queue_full'
  | 'stopped'
  | 'shutting_down'
  | 'completed'
  | 'failed'
  | 'interrupted'
  | 'timeout';

type StopReason = 'interrupt' | 'timeout' | 'shutdown';

type Admission =
  | { kind: 'unresolved'; error: ConfigurationError }
  | { kind: 'queued'; session: SessionInfo; acquired: Promise<{ release: Release } | { error: unknown }> };

interface ActiveTurn {
  controller: AbortController;
  stopReason: StopReason | null;
  channelId: string;
  /** Thread root, the prompting message and the replies posted for it. */
  messageIds: Set<string>;
}

export interface DispatcherDeps {
  transport: ChatTransport;
  engine: AgentEngine;
  store: SessionStore;
  registry: HandoffRegistry;
  scanner: ReconnectionScanner;
  workspace: WorkspaceResolver;
  deduper: EventDeduper;
  rateLimiter: RateLimiter;
  allowList: AllowList;
  logger?: Logger;
  securityLogger?: Logger;
  now?: () => number;
}

export interface DispatcherOptions {
  verbosity: Verbosity;
  maxMessageChars: number;
  snippetThresholdChars: number;
  turnTimeoutMs: number;
  limits?: TurnLimits;
  reactionMaxRetries?: number;
  reactionRetryBaseMs?: number;
  /** Shared files are saved under `<attachmentsDirectory>/<conversation>`. */
  attachmentsDirectory: string;
  maxAttachmentBytes?: number;
  /** Thread messages replayed to a fresh session opened mid-thread. */
  historyContextMessages?: number;
}

const STOP_COMMAND = /^[!/]?stop$/i;
const DEFAULT_MAX_ATTACHMENT_BYTES = 10 * 1024 * 1024;
const DEFAULT_HISTORY_CONTEXT_MESSAGES = 100;

export const isStopCommand = (text: string) => STOP_COMMAND.test(text.trim());

/**
 * Turns one inbound chat event into at most one agent turn. Turns for the same
 * conversation run one at a time in arrival order; different conversations
 * run concurrently. `handle` never rejects.
 */
export class MessageDispatcher {
  private readonly logger: Logger;
  private readonly security: Logger;
  private readonly now: () => number;
  private readonly active = new Map<ConversationKey, ActiveTurn>();
  private readonly inflight = new Set<Promise<DispatchOutcome>>();
  private readonly intake = new Map<ConversationKey, Promise<void>>();
  private closing = false;

  constructor(private readonly deps: DispatcherDeps, private readonly options: DispatcherOptions) {
    this.logger = deps.logger ?? createLogger('control.dispatcher');
    this.security = deps.securityLogger ?? createLogger('security');
    this.now = deps.now ?? Date.now;
  }

  handle(event: ChatEvent): Promise<DispatchOutcome> {
    const task = this.process(event).catch((error: unknown) => {
      this.logger.error('dispatch failed', { eventId: event.id, ...describeError(error) });
      return 'failed' as const;
    });
    this.inflight.add(task);
    void task.finally(() => this.inflight.delete(task));
    return task;
  }

  isRunning(conversationKey: ConversationKey) {
    return this.active.has(conversationKey);
  }

  /** Aborts the conversation's in-flight turn. Queued turns still run. */
  interrupt(conversationKey: ConversationKey, reason: StopReason = 'interrupt') {
    const turn = this.active.get(conversationKey);
    if (!turn) return false;
    if (!turn.stopReason) turn.stopReason = reason;
    turn.controller.abort();
    return true;
  }

  /**
   * An `:octagonal_sign:` reaction on the thread root, the prompting message
   * or one of the bridge's replies stops the running turn.
   */
  async handleReaction(reaction: ReactionEvent) {
    if (reaction.name !== REACTIONS.interrupted) return false;

    const match = Array.from(this.active.entries()).find(
      ([, turn]) => turn.channelId === reaction.channelId && turn.messageIds.has(reaction.messageId),
    );
    if (!match) return false;

    if (!isAllowed(this.deps.allowList, reaction)) {
      this.security.warn('stop reaction from user outside the allow-list', { userId: reaction.userId });
      return false;
    }

    this.security.info('turn interrupted by reaction', { conversationKey: match[0], userId: reaction.userId });
    return this.interrupt(match[0]);
  }

  interruptAll(reason: StopReason = 'shutdown') {
    let count = 0;
    for (const key of this.active.keys()) {
      if (this.interrupt(key, reason)) count += 1;
    }
    return count;
  }

  /**
   * Stops admitting events, waits up to `graceMs` for in-flight work, then
   * interrupts what is still running and waits for it to unwind.
   */
  async drain(graceMs: number) {
    this.closing = true;
    const settled = Promise.allSettled(Array.from(this.inflight));
    const timedOut = await Promise.race([settled.then(() => false), sleep(graceMs).then(() => true)]);
    if (!timedOut) return { interrupted: 0 };

    const interrupted = this.interruptAll('shutdown');
    this.logger.warn('shutdown grace period elapsed, interrupting turns', { interrupted });
    await Promise.allSettled(Array.from(this.inflight));
    return { interrupted };
  }

  private checkAdmission(event: ChatEvent): AdmissionError | null {
    if (!isAllowed(this.deps.allowList, event)) {
      return new AdmissionError('not_allowed', event.userId);
    }
    const decision = this.deps.rateLimiter.check(event.userId, this.now());
    if (!decision.allowed) {
      return new AdmissionError('rate_limited', event.userId, decision.retryAfterMs);
    }
    return null;
  }

  private async process(event: ChatEvent): Promise<DispatchOutcome> {
    if (this.deps.deduper.isDuplicate(event.kind, event.id, this.now())) {
      this.logger.debug('duplicate event dropped', { kind: event.kind, eventId: event.id });
      return 'duplicate';
    }

    const prompt = event.text.trim();
    if (!prompt && !event.attachments.length) return 'empty';

    if (this.closing) return 'shutting_down';

    const denied = this.checkAdmission(event);
    if (denied) {
      this.security.warn(denied.message, { userId: denied.userId, retryAfterMs: denied.retryAfterMs });
      if (denied.reason === 'not_allowed') {
        await this.post(event, ':no_entry: You are not on the allow-list for this bot.');
      } else {
        await this.react(event.channelId, event.messageId, REACTIONS.rateLimited);
        const seconds = Math.max(1, Math.ceil((denied.retryAfterMs ?? 0) / 1000));
        await this.post(event, `:no_entry_sign: Slow down: too many messages. Try again in ${seconds}s.`);
      }
      return denied.reason;
    }

    const conversationKey = event.conversationKey;
    if (isStopCommand(prompt)) {
      const stopped = this.interrupt(conversationKey);
      if (!stopped) {
        await this.post(event, ':information_source: Nothing is running in this thread.');
      }
      return 'stopped';
    }

    // Acknowledged on arrival, so a message queued behind a running turn
    // shows it was seen.
    const acknowledged = this.react(event.channelId, event.messageId, REACTIONS.received);

    // Resolution and lock queuing run in arrival order per conversation, so
    // the FIFO lock sees events in the order the platform delivered them.
    let admitted: Admission;
    try {
      admitted = await this.inArrivalOrder(conversationKey, () => this.admitToSession(event));
    } finally {
      await acknowledged;
    }
    if (admitted.kind === 'unresolved') {
      await this.post(event, `:x: ${admitted.error.message}.${admitted.error.hint ? ` ${admitted.error.hint}` : ''}`);
      await this.swapReaction(event, REACTIONS.failure);
      return 'unresolved';
    }

    const { session } = admitted;
    const acquired = await admitted.acquired;
    if ('error' in acquired) {
      if (!(acquired.error instanceof LockQueueFullError)) throw acquired.error;
      await this.post(event, ':warning: Too many messages are waiting in this thread. Try again when the current turn finishes.');
      await this.swapReaction(event, REACTIONS.failure);
      return 'queue_full';
    }

    const { release } = acquired;
    try {
      if (this.closing) {
        await this.react(event.channelId, event.messageId, REACTIONS.received, true);
        return 'shutting_down';
      }
      return await this.runTurn(event, session);
    } finally {
      release();
    }
  }

  private inArrivalOrder<T>(conversationKey: ConversationKey, step: () => Promise<T>): Promise<T> {
    const previous = this.intake.get(conversationKey) ?? Promise.resolve();
    const next = previous.then(step);
    const tail = next.then(
      () => undefined,
      () => undefined,
    );
    this.intake.set(conversationKey, tail);
    void tail.then(() => {
      if (this.intake.get(conversationKey) === tail) this.intake.delete(conversationKey);
    });
    return next;
  }

  /** Resolves the workspace and session, then joins the session's lock queue. */
  private async admitToSession(event: ChatEvent): Promise<Admission> {
    let workingDirectory: string;
    try {
      workingDirectory = this.deps.workspace.resolve(await this.channelName(event));
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      this.logger.warn('working directory unresolved', { channelId: event.channelId, message: error.message });
      return { kind: 'unresolved', error };
    }

    const session = await this.deps.store.getOrCreate(event.conversationKey, {
      workingDirectory,
      recover: () => this.recoverSession(event),
    });

    const acquired = session.lock.acquire().then(
      (release) => ({ release }),
      (error: unknown) => ({ error }),
    );
    return { kind: 'queued', session, acquired };
  }

  private async channelName(event: ChatEvent) {
    if (event.isDirectMessage) return null;
    try {
      return await this.deps.transport.channelName(event.channelId);
    } catch (error) {
      this.logger.warn('channel lookup failed', { channelId: event.channelId, ...describeError(error) });
      return null;
    }
  }

  /**
   * A conversation with no live entry resumes the session named by a marker in
   * the prompt itself, or else the one found in the thread's history.
   */
  private async recoverSession(event: ChatEvent): Promise<RecoveredSession | null> {
    for (const marker of findSessionMarkers(event.text).reverse()) {
      if (marker.kind === 'legacy') {
        this.security.info('session resumed from prompt', { sessionIdentifier: marker.value, userId: event.userId });
        return { sessionIdentifier: marker.value, source: 'prompt' };
      }
      const sessionIdentifier = await this.deps.registry.resolve(marker.value);
      if (sessionIdentifier) {
        this.security.info('handoff resumed from prompt', { alias: marker.value, userId: event.userId });
        return { sessionIdentifier, alias: marker.value, source: 'prompt' };
      }
    }

    if (event.threadId === event.messageId) return null;

    const result = await this.deps.scanner.recover(this.deps.transport, event.channelId, event.threadId);
    if (result.recovered) {
      this.security.info('session resumed from thread history', {
        alias: result.recovered.alias,
        source: result.recovered.source,
        userId: event.userId,
      });
    }
    return result.recovered;
  }

  /**
   * The text sent to the agent: the message without session markers, a
   * greeting when nothing else is left, shared files, and on a fresh session
   * opened mid-thread the thread's earlier messages.
   */
  private async buildPrompt(event: ChatEvent, session: SessionInfo) {
    let prompt = stripSessionMarkers(event.text);
    const firstTurn = session.turnCount === 0;

    if (firstTurn && !session.sessionIdentifier && !session.recoveredFrom && event.threadId !== event.messageId) {
      const transcript = await this.threadTranscript(event);
      if (transcript) prompt = withThreadHistory(transcript, prompt);
    }

    const saved = await saveAttachments(this.deps.transport, event.attachments, {
      targetDir: path.join(this.options.attachmentsDirectory, session.conversationKey),
      maxBytes: this.options.maxAttachmentBytes ?? DEFAULT_MAX_ATTACHMENT_BYTES,
      logger: this.logger,
    });
    if (saved.length) {
      prompt = prompt ? `${prompt}\n\n${attachmentNote(saved)}` : attachmentNote(saved);
    }

    if (!prompt) {
      prompt = firstTurn && session.recoveredFrom ? handoffGreetingPrompt : greetingPrompt;
    }
    return prompt;
  }

  private async threadTranscript(event: ChatEvent) {
    try {
      const history = await this.deps.transport.fetchHistory(event.channelId, event.threadId);
      return buildThreadTranscript(history, {
        currentMessageId: event.messageId,
        allowedUsers: this.deps.allowList.users,
        maxMessages: this.options.historyContextMessages ?? DEFAULT_HISTORY_CONTEXT_MESSAGES,
      });
    } catch (error) {
      this.logger.warn('thread history unavailable, starting without context', {
        channelId: event.channelId,
        threadId: event.threadId,
        ...describeError(error),
      });
      return null;
    }
  }

  private async runTurn(event: ChatEvent, session: SessionInfo): Promise<DispatchOutcome> {
    const key = session.conversationKey;
    const turn: ActiveTurn = {
      controller: new AbortController(),
      stopReason: null,
      channelId: event.channelId,
      messageIds: new Set([event.threadId, event.messageId]),
    };
    this.active.set(key, turn);
    const timer = setTimeout(() => {
      this.interrupt(key, 'timeout');
    }, this.options.turnTimeoutMs);

    const startedAt = this.now();
    const output = new TurnOutput(this, event);
    let completion: CompletionEvent | null = null;
    let failure: string | null = null;
    let announced: string | null = null;
    let lost = false;

    try {
      if (session.turnCount === 0 && session.recoveredFrom?.alias) {
        await this.post(event, formatContinuingSession(session.recoveredFrom.alias));
      }

      const prompt = await this.buildPrompt(event, session);

      const resumeFrom = session.sessionIdentifier;
      const stream = resumeFrom
        ? this.deps.engine.resume(
            { sessionIdentifier: resumeFrom, prompt, workingDirectory: session.workingDirectory, limits: this.options.limits },
            turn.controller.signal,
          )
        : this.deps.engine.start(
            {
              prompt,
              workingDirectory: session.workingDirectory,
              systemPreamble: buildSystemPreamble(this.options.verbosity, this.options.maxMessageChars),
              limits: this.options.limits,
            },
            turn.controller.signal,
          );

      for await (const agentEvent of stream) {
        if (agentEvent.type === 'session') {
          announced = agentEvent.sessionIdentifier;
          continue;
        }
        if (agentEvent.type === 'completion') {
          completion = agentEvent;
          continue;
        }
        if (agentEvent.type === 'error') {
          failure = agentEvent.message;
          if (agentEvent.sessionLost && session.sessionIdentifier) {
            this.logger.warn('agent lost the session, next turn starts fresh', { conversationKey: key });
            session.clearSessionIdentifier();
            lost = true;
          }
        }
        await output.render(agentEvent);
      }
      await output.flush();
    } catch (error) {
      if (turn.stopReason) {
        this.logger.debug('stream ended by stop', { conversationKey: key, ...describeError(error) });
      } else {
        this.logger.error('agent turn failed', { conversationKey: key, ...describeError(error) });
        failure = errorMessage(error);
        await output.flush();
        await this.post(event, `:x: Error: ${failure}`);
      }
    } finally {
      clearTimeout(timer);
      this.active.delete(key);
    }

    // A turn that was stopped or failed after the agent announced its session
    // still leaves that session resumable.
    const reported = completion?.sessionIdentifier ?? announced;
    if (reported && !lost) {
      await this.bindSession(event, session, reported);
    }

    session.turnCount += 1;
    session.totalCostUsd += completion?.costUsd ?? 0;
    session.touch(this.now());

    if (turn.stopReason) {
      this.logger.info('turn stopped', { conversationKey: key, reason: turn.stopReason, elapsedMs: this.now() - startedAt });
      if (turn.stopReason === 'timeout') {
        await this.post(event, timeoutNote(this.options.turnTimeoutMs));
        await this.swapReaction(event, REACTIONS.failure);
        return 'timeout';
      }
      await this.post(event, interruptedNote);
      await this.swapReaction(event, REACTIONS.interrupted);
      return 'interrupted';
    }

    if (completion) {
      const summary = formatCompletionSummary(completion, session);
      if (!output.postedText && !completion.isError) {
        await this.post(event, completion.resultText?.trim() ? completion.resultText : emptyResponseNote);
      }
      if (summary) await this.post(event, summary);
      if (completion.permissionDenials.length) {
        this.security.info('tool permissions denied', {
          conversationKey: key,
          tools: Array.from(new Set(completion.permissionDenials)).sort(),
        });
        await this.post(event, formatDenialNote(completion.permissionDenials));
      }
    }

    if (failure || !completion || completion.isError) {
      if (!completion && !failure) {
        await this.post(event, ':x: The agent exited without finishing the turn.');
      }
      await this.swapReaction(event, REACTIONS.failure);
      return 'failed';
    }

    await this.swapReaction(event, REACTIONS.success);
    return 'completed';
  }

  /**
   * Binds the agent's session to the conversation. A fresh session gets an
   * alias and a marker message; a resume that came back under a different
   * identifier means the old session is gone.
   */
  private async bindSession(event: ChatEvent, session: SessionInfo, identifier: string) {
    const current = session.sessionIdentifier;
    if (current === identifier) return;

    if (current !== null) {
      this.logger.warn('agent started a new session instead of resuming', { conversationKey: session.conversationKey });
      session.clearSessionIdentifier();
      await this.post(event, staleSessionNote);
    }
    session.assignSessionIdentifier(identifier);

    try {
      const alias = await generateAlias({ isTaken: (candidate) => this.deps.registry.has(candidate) });
      await this.deps.registry.recordHandoff(identifier, alias, session.conversationKey);
      session.alias = alias;
      await this.post(event, formatNewSession(formatSessionMarker(alias)));
    } catch (error) {
      const level = error instanceof AliasConflictError ? 'warn' : 'error';
      this.logger[level]('could not record session alias', { conversationKey: session.conversationKey, ...describeError(error) });
    }
  }

  /** Posts `text` in the event's thread, split to the transport limit. Failures are logged. */
  async post(event: ChatEvent, text: string) {
    for (const chunk of splitMessage(text, this.options.maxMessageChars)) {
      try {
        const handle = await this.deps.transport.postMessage({
          channelId: event.channelId,
          threadId: event.threadId,
          text: chunk,
        });
        this.active.get(event.conversationKey)?.messageIds.add(handle.messageId);
      } catch (error) {
        this.logger.warn('post failed', { channelId: event.channelId, threadId: event.threadId, ...describeError(error) });
        return false;
      }
    }
    return true;
  }

  async upload(event: ChatEvent, filename: string, content: string, comment: string) {
    try {
      await this.deps.transport.uploadFile({
        channelId: event.channelId,
        threadId: event.threadId,
        filename,
        content,
        comment,
      });
    } catch (error) {
      this.logger.warn('upload failed, posting inline', { channelId: event.channelId, ...describeError(error) });
      await this.post(event, `${comment}\n\`\`\`\n${content}\n\`\`\``);
    }
  }

  private async react(channelId: string, messageId: string, name: string, remove = false) {
    const target = { channelId, messageId, name };
    try {
      await retryWithBackoff(
        () => (remove ? this.deps.transport.removeReaction(target) : this.deps.transport.addReaction(target)),
        {
          maxRetries: this.options.reactionMaxRetries ?? 3,
          baseMs: this.options.reactionRetryBaseMs ?? 250,
        },
      );
    } catch (error) {
      this.logger.warn('reaction failed', { name, remove, messageId, ...describeError(error) });
    }
  }

  private async swapReaction(event: ChatEvent, name: string) {
    await this.react(event.channelId, event.messageId, REACTIONS.received, true);
    await this.react(event.channelId, event.messageId, name);
  }

  get verbosity() {
    return this.options.verbosity;
  }

  get snippetThreshold() {
    return this.options.snippetThresholdChars;
  }
}

/** Renders one turn's agent events into thread posts, batching adjacent text. */
class TurnOutput {
  private blocks: string[] = [];
  postedText = false;

  constructor(private readonly dispatcher: MessageDispatcher, private readonly event: ChatEvent) {}

  async render(agentEvent: AgentEvent) {
    if (!shouldShow(this.dispatcher.verbosity, agentEvent)) return;

    switch (agentEvent.type) {
      case 'text':
        this.blocks.push(agentEvent.text.trim());
        return;
      case 'tool_activity':
        await this.flush();
        await this.dispatcher.post(this.event, formatToolActivity(agentEvent));
        return;
      case 'tool_result':
        await this.flush();
        if (agentEvent.isError) {
          await this.dispatcher.post(this.event, formatToolError(agentEvent));
        } else if (agentEvent.output.length > this.dispatcher.snippetThreshold) {
          await this.dispatcher.upload(
            this.event,
            `${agentEvent.toolName || 'tool'}-output.txt`,
            agentEvent.output,
            `\`${agentEvent.toolName || 'Tool'}\` output (${agentEvent.output.length} chars)`,
          );
        } else {
          await this.dispatcher.post(this.event, formatToolResult(agentEvent));
        }
        return;
      case 'compaction':
        await this.flush();
        await this.dispatcher.post(this.event, formatCompactionNote(agentEvent));
        return;
      case 'error':
        await this.flush();
        await this.dispatcher.post(this.event, `:x: Error: ${agentEvent.message}`);
        return;
      case 'session':
      case 'completion':
        return;
    }
  }

  /** Consecutive text blocks go out as one post, a blank line apart. */
  async flush() {
    const text = this.blocks.filter(Boolean).join('\n\n');
    this.blocks = [];
    if (!text) return;
    this.postedText = true;
    await this.dispatcher.post(this.event, text);
  }
}
