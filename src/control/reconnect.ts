import type { ChatTransport, HistoryMessage } from '../shared/protocol.js';
import { createLogger, describeError, type Logger } from '../utils/logger.js';
import type { HandoffRegistry } from './handoff-registry.js';
import { findSessionMarkers, type SessionMarker } from './markers.js';
import type { RecoveredSession } from './session-store.js';

export interface ReconnectResult {
  recovered: RecoveredSession | null;
  /** Markers seen in the scanned history. */
  totalFound: number;
  /** Aliases present in the thread but unknown to the registry. */
  unmappedAliases: string[];
  /** Resolvable references older than the one that won. */
  skipped: string[];
}

export interface ReconnectionScannerOptions {
  /**
   * Only markers in the bridge's own messages count; anyone can paste a
   * marker into a thread.
   */
  trustOwnMessagesOnly?: boolean;
  logger?: Logger;
}

const emptyResult = (): ReconnectResult => ({
  recovered: null,
  totalFound: 0,
  unmappedAliases: [],
  skipped: [],
});

export class ReconnectionScanner {
  private readonly logger: Logger;
  private readonly trustOwnMessagesOnly: boolean;

  constructor(private readonly registry: HandoffRegistry, options: ReconnectionScannerOptions = {}) {
    this.logger = options.logger ?? createLogger('control.reconnect');
    this.trustOwnMessagesOnly = options.trustOwnMessagesOnly ?? true;
  }

  /**
   * Walks the history newest to oldest; the most recent marker that resolves
   * wins. Read-only against the registry.
   */
  async scan(history: HistoryMessage[]): Promise<ReconnectResult> {
    const markers: SessionMarker[] = [];
    for (const message of history) {
      if (this.trustOwnMessagesOnly && !message.fromSelf) continue;
      markers.push(...findSessionMarkers(message.text));
    }

    const result = emptyResult();
    result.totalFound = markers.length;

    for (const marker of markers.reverse()) {
      if (marker.kind === 'alias') {
        const sessionIdentifier = await this.registry.resolve(marker.value);
        if (!sessionIdentifier) {
          if (!result.unmappedAliases.includes(marker.value)) {
            result.unmappedAliases.push(marker.value);
          }
          continue;
        }
        if (result.recovered) {
          if (result.recovered.alias !== marker.value) result.skipped.push(marker.value);
          continue;
        }
        result.recovered = { sessionIdentifier, alias: marker.value, source: 'alias' };
        continue;
      }

      if (result.recovered) {
        if (result.recovered.sessionIdentifier !== marker.value) result.skipped.push(marker.value);
        continue;
      }
      result.recovered = { sessionIdentifier: marker.value, source: 'legacy' };
    }

    return result;
  }

  /** History fetch failures degrade to "no match". */
  async recover(transport: ChatTransport, channelId: string, threadId: string): Promise<ReconnectResult> {
    let history: HistoryMessage[];
    try {
      history = await transport.fetchHistory(channelId, threadId);
    } catch (error) {
      this.logger.warn('history fetch failed, treating thread as new', { channelId, threadId, ...describeError(error) });
      return emptyResult();
    }

    const result = await this.scan(history);
    if (result.recovered) {
      this.logger.info('recovered session from thread history', {
        channelId,
        threadId,
        alias: result.recovered.alias,
        source: result.recovered.source,
      });
    } else if (result.unmappedAliases.length) {
      this.logger.info('thread references unknown aliases', { threadId, aliases: result.unmappedAliases });
    }
    return result;
  }
}
