/**
 * Greeting Handler
 * Opens the stream once, then hands over to the monologue cycle.
 */

import type { StreamCollaborators } from '../../../domain/stream/collaborators.js';
import { createEvent, type FollowUp, type StreamEventOf } from '../../../domain/stream/events.js';
import { isTransientError, toErrorMessage } from '../../../domain/stream/errors.js';
import type { PromptComposer } from '../prompt-composer.js';
import type { SegmentationOptions } from '../text-segmenter.js';
import { deliverUtterance, generateText } from './delivery.js';
import {
  DEFAULT_HANDLER_TIMEOUTS,
  noFollowUps,
  pendingResponseFollowUp,
  type HandlerContext,
  type HandlerOutcome,
  type HandlerTimeouts,
  type StreamHandler,
  type StreamLogger,
} from './types.js';

export interface GreetingHandlerOptions {
  collaborators: StreamCollaborators;
  composer: PromptComposer;
  fallbackGreeting: string;
  timeouts?: HandlerTimeouts;
  /** Deliver the utterance sentence by sentence */
  segmentation?: SegmentationOptions;
  logger?: StreamLogger;
}

export class GreetingHandler implements StreamHandler<'prepare_greeting'> {
  readonly name = 'greeting';
  readonly kinds = ['prepare_greeting'] as const;

  private greeted = false;
  private logger: StreamLogger;
  private timeouts: HandlerTimeouts;

  constructor(private options: GreetingHandlerOptions) {
    this.logger = options.logger ?? console;
    this.timeouts = options.timeouts ?? DEFAULT_HANDLER_TIMEOUTS;
  }

  hasGreeted(): boolean {
    return this.greeted;
  }

  async handle(_event: StreamEventOf<'prepare_greeting'>, ctx: HandlerContext): Promise<HandlerOutcome> {
    if (this.greeted) {
      this.logger.info('[GreetingHandler] Greeting already delivered, ignoring');
      return noFollowUps();
    }
    this.greeted = true;

    const { collaborators, composer } = this.options;
    let text: string;
    try {
      const prompt = composer.composeGreeting(ctx.modes.getActiveTheme());
      text = await generateText(collaborators, prompt, [], this.timeouts.generationTimeoutMs);
    } catch (error) {
      if (!isTransientError(error)) {
        throw error;
      }
      this.logger.warn('[GreetingHandler] Using fallback greeting', { error: toErrorMessage(error) });
      text = this.options.fallbackGreeting;
    }

    ctx.history.append({ speaker: 'streamer', text, kind: 'greeting', timestamp: ctx.now() });

    try {
      await deliverUtterance(collaborators, text, this.timeouts.speechTimeoutMs, this.options.segmentation);
    } catch (error) {
      if (!isTransientError(error)) {
        throw error;
      }
      this.logger.warn('[GreetingHandler] Greeting delivery failed', { error: toErrorMessage(error) });
    }

    const response = pendingResponseFollowUp(ctx);
    const followUps: FollowUp[] = response ? [response] : [];
    followUps.push({ event: createEvent('monologue_tick', { reason: 'startup' }) });
    return { followUps };
  }
}
