import { App, LogLevel } from '@slack/bolt';
import type { LogLevel as RelayLogLevel } from '../../utils/logger.js';
import { conversationKeyFor } from '../../control/route.js';
import type {
  ChatEvent,
  ChatTransport,
  ConversationKey,
  EventKind,
  FileUpload,
  HistoryMessage,
  InboundAttachment,
  MessageHandle,
  OutboundMessage,
  ReactionEvent,
  ReactionTarget,
} from '../../shared/protocol.js';
import { createLogger, describeError, type Logger } from '../../utils/logger.js';

const HISTORY_PAGE_SIZE = 200;
const HISTORY_MAX_PAGES = 10;

export interface SlackTransportOptions {
  botToken: string;
  appToken: string;
  signingSecret: string;
  logLevel?: RelayLogLevel;
  /** Receives every accepted inbound event; must not reject. */
  onEvent: (event: ChatEvent) => Promise<unknown>;
  /** Thread replies without a mention are only picked up in conversations the bridge knows. */
  isKnownConversation: (conversationKey: ConversationKey) => boolean;
  /** Receives reactions added by people to messages; must not reject. */
  onReaction?: (reaction: ReactionEvent) => Promise<unknown>;
}

interface SlackFile {
  id?: string;
  name?: string | null;
  mimetype?: string;
  url_private?: string;
  url_private_download?: string;
  size?: number;
}

interface RawInbound {
  kind: EventKind;
  channel: string;
  user: string;
  text: string;
  ts: string;
  threadTs?: string;
  isDirectMessage: boolean;
  files?: SlackFile[];
}

const BOLT_LOG_LEVELS: Record<RelayLogLevel, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/** Slack's error code (`already_reacted`, `channel_not_found`, ...) from a Web API error. */
export const slackErrorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && 'data' in error) {
    const data = error.data;
    if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
      return data.error;
    }
  }
  return undefined;
};

export const stripMention = (text: string, botUserId: string | undefined) => {
  if (!botUserId) return text.trim();
  return text.replace(new RegExp(`<@${botUserId}(?:\\|[^>]+)?>\\s*`, 'g'), '').trim();
};

export class SlackTransport implements ChatTransport {
  private readonly logger: Logger;
  private app?: App;
  private botUserId?: string;
  private botId?: string;
  private readonly channelNames = new Map<string, string | null>();

  constructor(private readonly options: SlackTransportOptions) {
    this.logger = createLogger('transports.slack', options.logLevel);
  }

  private get client() {
    if (!this.app) {
      throw new Error('slack_app_not_ready');
    }
    return this.app.client;
  }

  async start() {
    if (!this.options.botToken || !this.options.appToken || !this.options.signingSecret) {
      throw new Error('SLACK_BOT_TOKEN, SLACK_APP_TOKEN, SLACK_SIGNING_SECRET must be set');
    }

    this.app = new App({
      token: this.options.botToken,
      appToken: this.options.appToken,
      signingSecret: this.options.signingSecret,
      socketMode: true,
      logLevel: BOLT_LOG_LEVELS[this.options.logLevel ?? 'info'],
    });

    this.app.event('app_mention', async ({ event }) => {
      if (!event.user || ('bot_id' in event && event.bot_id)) return;
      this.accept({
        kind: 'mention',
        channel: event.channel,
        user: event.user,
        text: event.text,
        ts: event.ts,
        threadTs: event.thread_ts,
        isDirectMessage: false,
      });
    });

    this.app.message(async ({ message }) => {
      // Edits, deletions and joins are ignored; file shares carry a prompt.
      if (message.subtype !== undefined && message.subtype !== 'file_share') return;
      if (!message.user || message.user === this.botUserId || ('bot_id' in message && message.bot_id)) return;

      const text = message.text ?? '';
      const isDirectMessage = message.channel_type === 'im';
      if (!isDirectMessage) {
        // Mentions arrive through app_mention.
        if (this.botUserId && text.includes(`<@${this.botUserId}>`)) return;
        if (!message.thread_ts) return;
        if (!(await this.isBridgeThread(message.channel, message.thread_ts))) return;
      }

      this.accept({
        kind: 'message',
        channel: message.channel,
        user: message.user,
        text,
        ts: message.ts,
        threadTs: message.thread_ts,
        isDirectMessage,
        files: message.files,
      });
    });

    this.app.event('reaction_added', async ({ event }) => {
      if (event.item.type !== 'message' || event.user === this.botUserId) return;
      const reaction: ReactionEvent = {
        channelId: event.item.channel,
        messageId: event.item.ts,
        userId: event.user,
        name: event.reaction,
        isDirectMessage: event.item.channel.startsWith('D'),
      };
      this.options.onReaction?.(reaction).catch((error: unknown) => {
        this.logger.error('reaction handler failed', { messageId: reaction.messageId, ...describeError(error) });
      });
    });

    await this.app.start();
    const response = await this.client.auth.test();
    this.botUserId = response.user_id || undefined;
    this.botId = response.bot_id || undefined;
    this.logger.info(`Slack transport started as bot=${this.botUserId ?? 'unknown'}`);
  }

  async stop() {
    if (!this.app) return;
    await this.app.stop();
    this.app = undefined;
    this.logger.info('Slack transport stopped');
  }

  toChatEvent(raw: RawInbound): ChatEvent {
    const threadId = raw.threadTs ?? raw.ts;
    const attachments: InboundAttachment[] = (raw.files ?? []).map((file) => ({
      id: file.id ?? `${file.name ?? 'file'}-${raw.ts}`,
      filename: file.name ?? undefined,
      contentType: file.mimetype,
      url: file.url_private_download ?? file.url_private,
      sizeBytes: file.size,
    }));

    return {
      id: raw.ts,
      kind: raw.kind,
      conversationKey: conversationKeyFor(raw.channel, threadId),
      channelId: raw.channel,
      threadId,
      messageId: raw.ts,
      userId: raw.user,
      text: stripMention(raw.text, this.botUserId),
      isDirectMessage: raw.isDirectMessage,
      attachments,
      receivedAt: new Date().toISOString(),
    };
  }

  private accept(raw: RawInbound) {
    const event = this.toChatEvent(raw);
    this.logger.debug(`Slack event accepted kind=${event.kind} channel=${event.channelId} thread=${event.threadId}`);
    // Turns can run for minutes; Bolt's handler returns right away.
    this.options.onEvent(event).catch((error: unknown) => {
      this.logger.error('event handler failed', { eventId: event.id, ...describeError(error) });
    });
  }

  /** A live session, or a past post by the bot, marks the thread as the bridge's. */
  private async isBridgeThread(channelId: string, threadId: string) {
    if (this.options.isKnownConversation(conversationKeyFor(channelId, threadId))) return true;
    try {
      const history = await this.fetchHistory(channelId, threadId);
      return history.some((message) => message.fromSelf);
    } catch (error) {
      this.logger.warn('could not check thread history', { channelId, threadId, ...describeError(error) });
      return false;
    }
  }

  async postMessage(message: OutboundMessage): Promise<MessageHandle> {
    const result = await this.client.chat.postMessage({
      channel: message.channelId,
      text: message.text,
      thread_ts: message.threadId,
      mrkdwn: true,
    });
    return { channelId: message.channelId, messageId: result.ts ?? '' };
  }

  async addReaction(target: ReactionTarget) {
    try {
      await this.client.reactions.add({ channel: target.channelId, timestamp: target.messageId, name: target.name });
    } catch (error) {
      if (slackErrorCode(error) === 'already_reacted') return;
      throw error;
    }
  }

  async removeReaction(target: ReactionTarget) {
    try {
      await this.client.reactions.remove({ channel: target.channelId, timestamp: target.messageId, name: target.name });
    } catch (error) {
      if (slackErrorCode(error) === 'no_reaction') return;
      throw error;
    }
  }

  async uploadFile(upload: FileUpload) {
    const file = {
      content: upload.content,
      filename: upload.filename,
      title: upload.title ?? upload.filename,
      initial_comment: upload.comment,
    };
    if (upload.threadId) {
      await this.client.files.uploadV2({ ...file, channel_id: upload.channelId, thread_ts: upload.threadId });
      return;
    }
    await this.client.files.uploadV2({ ...file, channel_id: upload.channelId });
  }

  /** Private file URLs need the bot token; an HTML body means the app lacks `files:read`. */
  async downloadAttachment(attachment: InboundAttachment): Promise<Uint8Array> {
    if (!attachment.url) {
      throw new Error(`attachment ${attachment.id} has no download URL`);
    }
    const response = await fetch(attachment.url, {
      headers: { Authorization: `Bearer ${this.options.botToken}` },
    });
    if (!response.ok) {
      throw new Error(`attachment download failed: HTTP ${response.status}`);
    }
    if ((response.headers.get('content-type') ?? '').startsWith('text/html')) {
      throw new Error('attachment download returned HTML (missing files:read scope?)');
    }
    return new Uint8Array(await response.arrayBuffer());
  }

  async fetchHistory(channelId: string, threadId: string): Promise<HistoryMessage[]> {
    const messages: HistoryMessage[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < HISTORY_MAX_PAGES; page += 1) {
      const response = await this.client.conversations.replies({
        channel: channelId,
        ts: threadId,
        limit: HISTORY_PAGE_SIZE,
        cursor,
      });

      for (const message of response.messages ?? []) {
        if (!message.ts) continue;
        messages.push({
          messageId: message.ts,
          text: message.text ?? '',
          userId: message.user,
          fromSelf:
            (this.botUserId !== undefined && message.user === this.botUserId) ||
            (this.botId !== undefined && message.bot_id === this.botId),
        });
      }

      cursor = response.response_metadata?.next_cursor || undefined;
      if (!cursor) break;
    }

    return messages;
  }

  async channelName(channelId: string): Promise<string | null> {
    const cached = this.channelNames.get(channelId);
    if (cached !== undefined) return cached;

    const response = await this.client.conversations.info({ channel: channelId });
    const name = response.channel?.name ?? null;
    this.channelNames.set(channelId, name);
    return name;
  }
}
