/**
 * Comment Filter
 * NG-word, pattern, length and user-list screening for live-chat comments.
 */

import type { RawComment } from '../../domain/stream/events.js';

export type NgMatchingMode = 'substring' | 'word_boundary';

export interface CommentFilterConfig {
  ngWords: string[];
  /** Regular expression sources, tested case-sensitively */
  ngPatterns: string[];
  blockedUsers: string[];
  /** When non-empty, only these authors pass */
  allowedUsers: string[];
  minLength: number;
  maxLength: number;
  matchingMode: NgMatchingMode;
}

export const DEFAULT_COMMENT_FILTER_CONFIG: CommentFilterConfig = {
  ngWords: [],
  ngPatterns: [
    'https?://\\S+',
    '(.)\\1{4,}',
    '[!@#$%^&*]{3,}',
    '^\\d+$',
    '[A-Z]{10,}',
  ],
  blockedUsers: [],
  allowedUsers: [],
  minLength: 1,
  maxLength: 200,
  matchingMode: 'substring',
};

export type CommentRejectReason =
  | 'blocked_user'
  | 'not_allowed_user'
  | 'too_short'
  | 'too_long'
  | 'ng_word'
  | 'ng_pattern';

export type CommentFilterResult =
  | { allowed: true; cleaned: string }
  | { allowed: false; reason: CommentRejectReason; detail: string };

export interface CommentFilterStats {
  ngWords: number;
  ngPatterns: number;
  blockedUsers: number;
  allowedUsers: number;
  matchingMode: NgMatchingMode;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class CommentFilter {
  private ngWords: string[];
  private patterns: RegExp[];
  private blockedUsers: Set<string>;
  private allowedUsers: Set<string>;

  constructor(private config: CommentFilterConfig = DEFAULT_COMMENT_FILTER_CONFIG) {
    this.ngWords = config.ngWords.map((word) => word.trim().toLowerCase()).filter((word) => word.length > 0);
    this.patterns = config.ngPatterns.map((source) => new RegExp(source));
    this.blockedUsers = new Set(config.blockedUsers);
    this.allowedUsers = new Set(config.allowedUsers);
  }

  filter(comment: RawComment): CommentFilterResult {
    const author = comment.author;
    const message = comment.text;

    if (this.blockedUsers.has(author)) {
      return { allowed: false, reason: 'blocked_user', detail: author };
    }

    if (this.allowedUsers.size > 0 && !this.allowedUsers.has(author)) {
      return { allowed: false, reason: 'not_allowed_user', detail: author };
    }

    const length = [...message.trim()].length;
    if (length < this.config.minLength) {
      return { allowed: false, reason: 'too_short', detail: String(length) };
    }
    if (length > this.config.maxLength) {
      return { allowed: false, reason: 'too_long', detail: String(length) };
    }

    const lowered = message.toLowerCase();
    for (const word of this.ngWords) {
      if (this.matchesWord(lowered, word)) {
        return { allowed: false, reason: 'ng_word', detail: word };
      }
    }

    for (const pattern of this.patterns) {
      if (pattern.test(message)) {
        return { allowed: false, reason: 'ng_pattern', detail: pattern.source };
      }
    }

    return { allowed: true, cleaned: this.clean(message) };
  }

  addNgWord(word: string): void {
    const normalized = word.trim().toLowerCase();
    if (normalized && !this.ngWords.includes(normalized)) {
      this.ngWords.push(normalized);
    }
  }

  blockUser(author: string): void {
    this.blockedUsers.add(author);
  }

  getStats(): CommentFilterStats {
    return {
      ngWords: this.ngWords.length,
      ngPatterns: this.patterns.length,
      blockedUsers: this.blockedUsers.size,
      allowedUsers: this.allowedUsers.size,
      matchingMode: this.config.matchingMode,
    };
  }

  private matchesWord(loweredMessage: string, word: string): boolean {
    if (this.config.matchingMode === 'word_boundary') {
      const pattern = new RegExp(`(?:^|[^\\p{L}\\p{N}_])${escapeRegExp(word)}(?:[^\\p{L}\\p{N}_]|$)`, 'u');
      return pattern.test(loweredMessage);
    }
    return loweredMessage.includes(word);
  }

  private clean(message: string): string {
    return message
      .trim()
      .replace(/\s+/g, ' ')
      .replace(/[!！‼]{2,}/g, '!')
      .replace(/[?？]{2,}/g, '?');
  }
}
