import type { EventKind } from '../shared/protocol.js';

export interface EventDeduperOptions {
  windowMs: number;
  maxEntries: number;
}

/**
 * Recently seen event ids, one set per event kind: Slack delivers one user
 * action as both `app_mention` and `message`, and each path drops only its
 * own replays.
 */
export class EventDeduper {
  private readonly seen: Record<EventKind, Map<string, number>> = {
    mention: new Map(),
    message: new Map(),
  };

  constructor(private readonly options: EventDeduperOptions) {}

  /** Records the id and returns true when it was already seen in `kind`'s window. */
  isDuplicate(kind: EventKind, id: string, now = Date.now()) {
    const entries = this.seen[kind];
    this.prune(entries, now);

    const seenAt = entries.get(id);
    if (seenAt !== undefined && now - seenAt < this.options.windowMs) {
      return true;
    }

    entries.set(id, now);
    if (entries.size > this.options.maxEntries) {
      this.evictOldestHalf(entries);
    }
    return false;
  }

  size(kind: EventKind) {
    return this.seen[kind].size;
  }

  private prune(entries: Map<string, number>, now: number) {
    // Insertion order is arrival order, so expired ids sit at the front.
    for (const [id, seenAt] of entries) {
      if (now - seenAt < this.options.windowMs) break;
      entries.delete(id);
    }
  }

  private evictOldestHalf(entries: Map<string, number>) {
    let drop = Math.floor(entries.size / 2);
    for (const id of entries.keys()) {
      if (drop <= 0) break;
      entries.delete(id);
      drop -= 1;
    }
  }
}
