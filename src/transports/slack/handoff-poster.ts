import { WebClient } from '@slack/web-api';
import type { HandoffPoster } from '../../control/handoff.js';

const CHANNEL_PAGE_SIZE = 200;

/** Web API client for the `handoff` command, which runs without Socket Mode. */
export class SlackHandoffPoster implements HandoffPoster {
  private readonly client: WebClient;

  constructor(botToken: string, client?: WebClient) {
    this.client = client ?? new WebClient(botToken);
  }

  async findChannelId(channelName: string): Promise<string | null> {
    let cursor: string | undefined;
    do {
      const response = await this.client.conversations.list({
        types: 'public_channel,private_channel',
        exclude_archived: true,
        limit: CHANNEL_PAGE_SIZE,
        cursor,
      });
      const match = (response.channels ?? []).find((channel) => channel.name === channelName);
      if (match?.id) return match.id;
      cursor = response.response_metadata?.next_cursor || undefined;
    } while (cursor);
    return null;
  }

  async postMessage(channelId: string, text: string): Promise<string> {
    const response = await this.client.chat.postMessage({ channel: channelId, text, mrkdwn: true });
    return response.ts ?? '';
  }
}
