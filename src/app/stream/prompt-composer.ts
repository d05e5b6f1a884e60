/**
 * Prompt Composer
 * Builds generator prompts from the persona and per-purpose templates.
 */

import type { ConversationEntry } from '../../domain/stream/collaborators.js';
import type { StreamMode } from '../../domain/stream/modes.js';
import { formatHistory } from './conversation-history.js';
import type { PendingComment } from './pending-comments.js';

export type PromptTemplateName =
  | 'persona'
  | `mode/${StreamMode}`
  | 'greeting'
  | 'farewell'
  | 'comment-response'
  | 'stream-summary'
  | 'daily-summary'
  | 'memory-digest'
  | 'memory-compress';

export interface PromptTemplateSource {
  load(name: PromptTemplateName): string;
}

/** Long-term memory text offered to every template as `{{memory}}` */
export interface MemoryContextSource {
  getContextSummary(): string;
}

const NO_MEMORY = '(nothing notable yet)';

export function renderPromptTemplate(template: string, values: Record<string, string>): string {
  let output = template;
  for (const [key, value] of Object.entries(values)) {
    output = output.replaceAll(`{{${key}}}`, value);
  }
  return output;
}

export function formatComments(comments: readonly PendingComment[], emptyText = '(no comments)'): string {
  if (comments.length === 0) {
    return emptyText;
  }
  return comments.map((comment) => `- ${comment.author}: ${comment.text}`).join('\n');
}

export interface MonologuePromptInput {
  mode: StreamMode;
  history: readonly ConversationEntry[];
  theme: string | null;
  recentComments?: readonly PendingComment[];
}

export interface SummaryPromptInput {
  history: readonly ConversationEntry[];
  durationMinutes: number;
  date?: string;
}

export class PromptComposer {
  constructor(
    private templates: PromptTemplateSource,
    private memory?: MemoryContextSource
  ) {}

  composeMonologue(input: MonologuePromptInput): string {
    return this.compose(`mode/${input.mode}`, {
      mode: input.mode,
      theme: input.theme ?? '(none)',
      history: formatHistory(input.history),
      comments: formatComments(input.recentComments ?? []),
    });
  }

  composeGreeting(theme: string | null): string {
    return this.compose('greeting', { theme: theme ?? '(none)' });
  }

  composeFarewell(history: readonly ConversationEntry[]): string {
    return this.compose('farewell', { history: formatHistory(history) });
  }

  composeCommentResponse(comments: readonly PendingComment[], history: readonly ConversationEntry[]): string {
    return this.compose('comment-response', {
      comments: formatComments(comments),
      count: String(comments.length),
      history: formatHistory(history),
    });
  }

  composeSummary(kind: 'stream' | 'daily', input: SummaryPromptInput): string {
    return this.compose(kind === 'stream' ? 'stream-summary' : 'daily-summary', {
      history: formatHistory(input.history),
      duration: String(input.durationMinutes),
      date: input.date ?? '',
    });
  }

  composeMemoryDigest(entries: readonly ConversationEntry[]): string {
    return this.compose('memory-digest', { history: formatHistory(entries) });
  }

  composeMemoryCompression(blocks: readonly string[]): string {
    return this.compose('memory-compress', { notes: blocks.join('\n\n') });
  }

  private compose(name: PromptTemplateName, values: Record<string, string>): string {
    const memory = this.memory?.getContextSummary().trim() || NO_MEMORY;
    const persona = this.templates.load('persona').trim();
    const body = renderPromptTemplate(this.templates.load(name), { ...values, memory }).trim();
    return persona ? `${persona}\n\n${body}` : body;
  }
}
