/**
 * Comment Handler
 *
 * Screens incoming comments, buffers the accepted ones and, once enough are
 * waiting, answers them together in one integrated response. Smaller batches
 * are answered after the next streamer utterance, which requests the
 * response itself.
 */

import type { StreamCollaborators } from '../../../domain/stream/collaborators.js';
import { createEvent, type RawComment, type StreamEvent } from '../../../domain/stream/events.js';
import { isTransientError, toErrorMessage } from '../../../domain/stream/errors.js';
import type { CommentFilter } from '../comment-filter.js';
import type { CooldownTracker } from '../cooldown.js';
import type { PromptComposer } from '../prompt-composer.js';
import type { SegmentationOptions } from '../text-segmenter.js';
import { deliverUtterance, generateText } from './delivery.js';
import {
  DEFAULT_HANDLER_TIMEOUTS,
  noFollowUps,
  type HandlerContext,
  type HandlerOutcome,
  type HandlerTimeouts,
  type StreamHandler,
  type StreamLogger,
} from './types.js';

type CommentEventKind = 'comment_received' | 'comment_response_requested';

export interface CommentHandlerOptions {
  collaborators: StreamCollaborators;
  composer: PromptComposer;
  cooldown: CooldownTracker;
  filter: CommentFilter;
  /** Pending comments that trigger an integrated response */
  responseThreshold: number;
  contextEntries?: number;
  timeouts?: HandlerTimeouts;
  /** Deliver the utterance sentence by sentence */
  segmentation?: SegmentationOptions;
  logger?: StreamLogger;
}

export class CommentHandler implements StreamHandler<CommentEventKind> {
  readonly name = 'comment';
  readonly kinds = ['comment_received', 'comment_response_requested'] as const;

  private logger: StreamLogger;
  private timeouts: HandlerTimeouts;
  private contextEntries: number;

  constructor(private options: CommentHandlerOptions) {
    this.logger = options.logger ?? console;
    this.timeouts = options.timeouts ?? DEFAULT_HANDLER_TIMEOUTS;
    this.contextEntries = options.contextEntries ?? 10;
  }

  async handle(event: Extract<StreamEvent, { kind: CommentEventKind }>, ctx: HandlerContext): Promise<HandlerOutcome> {
    if (event.kind === 'comment_received') {
      return this.receive(event.payload.comment, ctx);
    }
    return this.respond(ctx);
  }

  private receive(comment: RawComment, ctx: HandlerContext): HandlerOutcome {
    const result = this.options.filter.filter(comment);
    if (!result.allowed) {
      this.logger.debug('[CommentHandler] Comment dropped', {
        author: comment.author,
        reason: result.reason,
      });
      return noFollowUps();
    }

    const pendingCount = ctx.pending.add({
      author: comment.author,
      text: result.cleaned,
      receivedAt: comment.timestamp,
    });
    ctx.state.commentsSinceLastMonologue++;

    if (pendingCount >= this.options.responseThreshold && ctx.pending.markResponseRequested()) {
      return { followUps: [{ event: createEvent('comment_response_requested', {}) }] };
    }
    return noFollowUps();
  }

  private async respond(ctx: HandlerContext): Promise<HandlerOutcome> {
    const { cooldown, collaborators, composer } = this.options;

    if (ctx.pending.size() === 0) {
      this.logger.debug('[CommentHandler] Response requested with no pending comments');
      ctx.pending.clearResponseRequest();
      return noFollowUps();
    }

    if (cooldown.shouldSkip(this.name, 'generator')) {
      this.logger.info('[CommentHandler] Cooling down, response deferred', { pending: ctx.pending.size() });
      ctx.pending.clearResponseRequest();
      return noFollowUps();
    }

    const comments = ctx.pending.peek();
    const context = ctx.history.tail(this.contextEntries);
    const prompt = composer.composeCommentResponse(comments, context);

    let reply: string;
    try {
      reply = await generateText(collaborators, prompt, context, this.timeouts.generationTimeoutMs);
    } catch (error) {
      if (!isTransientError(error)) {
        throw error;
      }
      ctx.pending.clearResponseRequest();
      const tripped = cooldown.recordFailure(this.name, 'generator');
      this.logger.warn('[CommentHandler] Response generation failed', {
        error: toErrorMessage(error),
        pending: comments.length,
        cooldown: tripped,
      });
      return noFollowUps();
    }
    cooldown.recordSuccess(this.name, 'generator');

    for (const comment of ctx.pending.take(comments.length)) {
      ctx.history.append({
        speaker: 'viewer',
        author: comment.author,
        text: comment.text,
        kind: 'comment',
        timestamp: comment.receivedAt,
      });
    }
    ctx.history.append({
      speaker: 'streamer',
      text: reply,
      kind: 'comment_response',
      mode: ctx.state.currentMode,
      timestamp: ctx.now(),
    });

    try {
      await deliverUtterance(collaborators, reply, this.timeouts.speechTimeoutMs, this.options.segmentation);
    } catch (error) {
      if (!isTransientError(error)) {
        throw error;
      }
      this.logger.warn('[CommentHandler] Response delivery failed', { error: toErrorMessage(error) });
    }

    return noFollowUps();
  }
}
