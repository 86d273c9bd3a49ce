import type { ConversationKey } from '../shared/protocol.js';

const sanitize = (value: string) => value.replace(/[^a-zA-Z0-9._-]/g, '_');

/** One conversation per Slack thread, keyed by channel and thread root ts. */
export const conversationKeyFor = (channelId: string, threadId: string): ConversationKey =>
  `${sanitize(channelId)}:${sanitize(threadId)}`;
