/**
 * Stream Handler Types
 */

import { createEvent, type FollowUp, type StreamEvent, type StreamEventKind } from '../../../domain/stream/events.js';
import type { CommentActivity } from '../../../domain/stream/modes.js';
import type { ProcessState } from '../../../domain/stream/state.js';
import type { ConversationHistory } from '../conversation-history.js';
import type { ModeManager } from '../mode-manager.js';
import type { PendingComments } from '../pending-comments.js';

export type StreamLogger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Shared state handed to every handler on dispatch. Handlers read and write
 * process state only through this context.
 */
export interface HandlerContext {
  state: ProcessState;
  history: ConversationHistory;
  modes: ModeManager;
  pending: PendingComments;
  now(): number;
}

export interface HandlerOutcome {
  followUps: FollowUp[];
}

export interface StreamHandler<K extends StreamEventKind = StreamEventKind> {
  readonly name: string;
  readonly kinds: readonly K[];
  handle(event: Extract<StreamEvent, { kind: K }>, ctx: HandlerContext): Promise<HandlerOutcome>;
}

export interface HandlerTimeouts {
  generationTimeoutMs: number;
  speechTimeoutMs: number;
}

export const DEFAULT_HANDLER_TIMEOUTS: HandlerTimeouts = {
  generationTimeoutMs: 30_000,
  speechTimeoutMs: 60_000,
};

export function noFollowUps(): HandlerOutcome {
  return { followUps: [] };
}

export function currentActivity(ctx: HandlerContext): CommentActivity {
  return {
    pendingComments: ctx.pending.size(),
    recentComments: ctx.state.commentsSinceLastMonologue,
  };
}

/**
 * Comments still waiting after an utterance get answered before the next
 * monologue. Returns null when nothing is pending or a response is already
 * requested.
 */
export function pendingResponseFollowUp(ctx: HandlerContext): FollowUp | null {
  if (ctx.pending.size() === 0 || !ctx.pending.markResponseRequested()) {
    return null;
  }
  return { event: createEvent('comment_response_requested', {}) };
}
