/**
 * Live-chat stand-in that replays comments from a JSON Lines file.
 *
 * Each line: {"author": "...", "text": "...", "delayMs": 1500}
 * `delayMs` is the pause before the comment is delivered.
 */

import { promises as fs } from 'fs';
import type { LiveChatSource } from '../../domain/stream/collaborators.js';
import type { RawComment } from '../../domain/stream/events.js';
import { sleep } from '../../app/stream/timeouts.js';

export interface ScriptedComment {
  id?: string;
  author: string;
  text: string;
  delayMs: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parse JSONL content. Blank lines are skipped; malformed lines are
 * reported through `onInvalid` and skipped.
 */
export function parseChatScript(
  content: string,
  defaultDelayMs: number,
  onInvalid?: (lineNumber: number, reason: string) => void
): ScriptedComment[] {
  const comments: ScriptedComment[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      onInvalid?.(index + 1, 'not valid JSON');
      return;
    }

    if (!isRecord(parsed) || typeof parsed.author !== 'string' || typeof parsed.text !== 'string') {
      onInvalid?.(index + 1, 'author and text must be strings');
      return;
    }

    const delay = typeof parsed.delayMs === 'number' && parsed.delayMs >= 0 ? parsed.delayMs : defaultDelayMs;
    comments.push({
      ...(typeof parsed.id === 'string' ? { id: parsed.id } : {}),
      author: parsed.author,
      text: parsed.text,
      delayMs: delay,
    });
  });

  return comments;
}

export interface JsonlChatSourceOptions {
  filePath: string;
  defaultDelayMs?: number;
  now?: () => number;
  logger?: Pick<Console, 'warn'>;
}

export class JsonlChatSource implements LiveChatSource {
  private delivered = 0;

  constructor(private options: JsonlChatSourceOptions) {}

  /**
   * Resumes after the last delivered comment when called again.
   */
  async *comments(signal: AbortSignal): AsyncIterable<RawComment> {
    const content = await fs.readFile(this.options.filePath, 'utf-8');
    const script = parseChatScript(content, this.options.defaultDelayMs ?? 2000, (lineNumber, reason) => {
      (this.options.logger ?? console).warn('[JsonlChatSource] Skipping line', { lineNumber, reason });
    });
    const now = this.options.now ?? Date.now;

    for (const entry of script.slice(this.delivered)) {
      await sleep(entry.delayMs, signal);
      if (signal.aborted) {
        return;
      }
      this.delivered++;
      yield {
        ...(entry.id !== undefined ? { id: entry.id } : {}),
        author: entry.author,
        text: entry.text,
        timestamp: now(),
      };
    }
  }

  getDeliveredCount(): number {
    return this.delivered;
  }
}
