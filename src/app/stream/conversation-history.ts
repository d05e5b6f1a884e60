/**
 * Conversation History
 * Append-only record of what was said during the session.
 */

import type { ConversationEntry } from '../../domain/stream/collaborators.js';

export type ConversationEntryInput = Omit<ConversationEntry, 'timestamp'> & { timestamp?: number };

export class ConversationHistory {
  private entries: ConversationEntry[] = [];

  append(input: ConversationEntryInput): ConversationEntry {
    const entry: ConversationEntry = Object.freeze({
      ...input,
      timestamp: input.timestamp ?? Date.now(),
    });
    this.entries.push(entry);
    return entry;
  }

  size(): number {
    return this.entries.length;
  }

  /**
   * Frozen copy of the whole history.
   */
  snapshot(): readonly ConversationEntry[] {
    return Object.freeze([...this.entries]);
  }

  tail(count: number): readonly ConversationEntry[] {
    if (count <= 0) {
      return Object.freeze([]);
    }
    return Object.freeze(this.entries.slice(-count));
  }

  since(timestamp: number): readonly ConversationEntry[] {
    return Object.freeze(this.entries.filter((entry) => entry.timestamp >= timestamp));
  }

  lastStreamerUtterance(): ConversationEntry | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i].speaker === 'streamer') {
        return this.entries[i];
      }
    }
    return undefined;
  }

  /**
   * Hand over every entry and start an empty history.
   */
  archive(): ConversationEntry[] {
    const archived = this.entries;
    this.entries = [];
    return archived;
  }
}

export function formatHistory(entries: readonly ConversationEntry[], emptyText = '(no conversation yet)'): string {
  if (entries.length === 0) {
    return emptyText;
  }

  return entries
    .map((entry) => {
      const who = entry.speaker === 'viewer' ? `viewer ${entry.author ?? 'anonymous'}` : entry.speaker;
      return `${who}: ${entry.text}`;
    })
    .join('\n');
}
