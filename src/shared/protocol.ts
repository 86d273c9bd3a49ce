/** Identifies one chat thread; primary key of the session store. */
export type ConversationKey = string;

/** Slack delivers the same user action as `app_mention` and as `message`. */
export type EventKind = 'mention' | 'message';

export interface InboundAttachment {
  id: string;
  filename?: string;
  contentType?: string;
  url?: string;
  sizeBytes?: number;
}

export interface ChatEvent {
  /** Platform event id used for deduplication (the Slack message ts). */
  id: string;
  kind: EventKind;
  conversationKey: ConversationKey;
  channelId: string;
  /** Thread root this event belongs to; equals `messageId` for a top-level message. */
  threadId: string;
  messageId: string;
  userId: string;
  text: string;
  isDirectMessage: boolean;
  attachments: InboundAttachment[];
  receivedAt: string;
}

export interface MessageHandle {
  channelId: string;
  messageId: string;
}

export interface OutboundMessage {
  channelId: string;
  threadId?: string;
  text: string;
}

export interface FileUpload {
  channelId: string;
  threadId?: string;
  filename: string;
  content: string;
  title?: string;
  comment?: string;
}

export interface HistoryMessage {
  messageId: string;
  text: string;
  userId?: string;
  /** True when the bridge itself authored the message. */
  fromSelf: boolean;
}

/** A reaction someone added to a message. */
export interface ReactionEvent {
  channelId: string;
  messageId: string;
  userId: string;
  name: string;
  isDirectMessage: boolean;
}

export interface ReactionTarget {
  channelId: string;
  messageId: string;
  name: string;
}

/** Everything the core needs from the chat platform. */
export interface ChatTransport {
  postMessage(message: OutboundMessage): Promise<MessageHandle>;
  addReaction(target: ReactionTarget): Promise<void>;
  removeReaction(target: ReactionTarget): Promise<void>;
  uploadFile(upload: FileUpload): Promise<void>;
  /** Raw bytes of a file shared with a message. */
  downloadAttachment(attachment: InboundAttachment): Promise<Uint8Array>;
  /** Messages of a thread, oldest first. */
  fetchHistory(channelId: string, threadId: string): Promise<HistoryMessage[]>;
  channelName(channelId: string): Promise<string | null>;
}
