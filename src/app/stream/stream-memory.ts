/**
 * Stream Memory
 *
 * Long-term memory of the session. Every so often the conversation since the
 * last digest is summarized into a short block; once enough blocks pile up
 * they are compressed into a single chapter. Prompts see the latest blocks.
 */

import type { ConversationEntry } from '../../domain/stream/collaborators.js';

export interface StreamMemoryConfig {
  /** Minimum time between two digests */
  intervalMs: number;
  /** New history entries needed before a digest is worth it */
  minEntries: number;
  /** Block count that triggers compression */
  compressionThreshold: number;
  /** Latest blocks handed to prompts */
  contextBlocks: number;
}

export const DEFAULT_STREAM_MEMORY_CONFIG: StreamMemoryConfig = {
  intervalMs: 300_000,
  minEntries: 5,
  compressionThreshold: 5,
  contextBlocks: 5,
};

export interface MemoryBlock {
  text: string;
  createdAt: number;
  compressed: boolean;
}

export interface StreamMemoryStats {
  blocks: number;
  digestedEntries: number;
  digests: number;
  compressions: number;
  lastDigestAt: number;
}

export class StreamMemory {
  private config: StreamMemoryConfig;
  private blocks: MemoryBlock[] = [];
  private digestedEntries = 0;
  private lastDigestAt: number;
  private digestRequested = false;
  private digests = 0;
  private compressions = 0;

  constructor(config: Partial<StreamMemoryConfig> = {}, startedAt: number = Date.now()) {
    this.config = { ...DEFAULT_STREAM_MEMORY_CONFIG, ...config };
    this.lastDigestAt = startedAt;
  }

  isDue(historySize: number, now: number): boolean {
    return (
      !this.digestRequested &&
      historySize - this.digestedEntries >= this.config.minEntries &&
      now - this.lastDigestAt >= this.config.intervalMs
    );
  }

  /**
   * Claim the next digest. Returns false when one is not due or is already
   * requested.
   */
  requestDigest(historySize: number, now: number): boolean {
    if (!this.isDue(historySize, now)) {
      return false;
    }
    this.digestRequested = true;
    return true;
  }

  isDigestRequested(): boolean {
    return this.digestRequested;
  }

  /**
   * Entries appended since the last successful digest.
   */
  undigested(history: readonly ConversationEntry[]): readonly ConversationEntry[] {
    return history.slice(this.digestedEntries);
  }

  /**
   * Store a digest covering history up to `digestedThrough` entries. Returns
   * true when the blocks should now be compressed.
   */
  recordDigest(text: string, digestedThrough: number, now: number): boolean {
    this.blocks.push({ text, createdAt: now, compressed: false });
    this.digestedEntries = digestedThrough;
    this.lastDigestAt = now;
    this.digestRequested = false;
    this.digests++;
    return this.blocks.length >= this.config.compressionThreshold;
  }

  /**
   * A failed digest waits a full interval before the next try.
   */
  recordDigestFailure(now: number): void {
    this.lastDigestAt = now;
    this.digestRequested = false;
  }

  replaceWithCompressed(text: string, now: number): void {
    this.blocks = [{ text, createdAt: now, compressed: true }];
    this.compressions++;
  }

  getBlocks(): readonly MemoryBlock[] {
    return [...this.blocks];
  }

  /**
   * Latest blocks joined for a prompt; empty when nothing has been digested.
   */
  getContextSummary(): string {
    return this.blocks
      .slice(-this.config.contextBlocks)
      .map((block) => block.text)
      .join('\n\n');
  }

  getStats(): StreamMemoryStats {
    return {
      blocks: this.blocks.length,
      digestedEntries: this.digestedEntries,
      digests: this.digests,
      compressions: this.compressions,
      lastDigestAt: this.lastDigestAt,
    };
  }
}
