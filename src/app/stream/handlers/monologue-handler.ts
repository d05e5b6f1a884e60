/**
 * Monologue Handler
 *
 * One `monologue_tick` produces at most one streamer utterance: consult the
 * mode manager, compose the prompt, generate, record, caption and speak, then
 * schedule the next tick after the cadence delay. Comments left pending after
 * the utterance are handed to the comment handler right away.
 */

import type { CollaboratorName, StreamCollaborators } from '../../../domain/stream/collaborators.js';
import { createEvent, type StreamEventOf } from '../../../domain/stream/events.js';
import { isTransientError, toErrorMessage } from '../../../domain/stream/errors.js';
import type { CooldownTracker } from '../cooldown.js';
import type { PromptComposer } from '../prompt-composer.js';
import type { StreamMemory } from '../stream-memory.js';
import type { SegmentationOptions } from '../text-segmenter.js';
import { deliverUtterance, generateText } from './delivery.js';
import {
  DEFAULT_HANDLER_TIMEOUTS,
  currentActivity,
  noFollowUps,
  pendingResponseFollowUp,
  type HandlerContext,
  type HandlerOutcome,
  type HandlerTimeouts,
  type StreamHandler,
  type StreamLogger,
} from './types.js';

export interface MonologueHandlerOptions {
  collaborators: StreamCollaborators;
  composer: PromptComposer;
  cooldown: CooldownTracker;
  /** Delay between the end of one utterance and the next tick */
  cadenceMs: number;
  /** History entries given to the generator as context */
  contextEntries?: number;
  timeouts?: HandlerTimeouts;
  /** Deliver the utterance sentence by sentence */
  segmentation?: SegmentationOptions;
  /** Long-term memory; a digest is requested once one is due */
  memory?: StreamMemory;
  logger?: StreamLogger;
}

export class MonologueHandler implements StreamHandler<'monologue_tick'> {
  readonly name = 'monologue';
  readonly kinds = ['monologue_tick'] as const;

  private logger: StreamLogger;
  private timeouts: HandlerTimeouts;
  private contextEntries: number;

  constructor(private options: MonologueHandlerOptions) {
    this.logger = options.logger ?? console;
    this.timeouts = options.timeouts ?? DEFAULT_HANDLER_TIMEOUTS;
    this.contextEntries = options.contextEntries ?? 10;
  }

  async handle(event: StreamEventOf<'monologue_tick'>, ctx: HandlerContext): Promise<HandlerOutcome> {
    const { cooldown, collaborators, composer } = this.options;

    const skipGenerator = cooldown.shouldSkip(this.name, 'generator');
    const skipSpeech = cooldown.shouldSkip(this.name, 'speech');
    if (skipGenerator || skipSpeech) {
      this.logger.info('[MonologueHandler] Cooling down, skipping cycle', {
        reason: event.payload.reason,
        generator: skipGenerator,
        speech: skipSpeech,
      });
      return this.nextTick();
    }

    const activity = currentActivity(ctx);
    const now = ctx.now();
    if (ctx.modes.shouldSwitch(ctx.state, ctx.history.size(), activity, now)) {
      ctx.modes.selectNextMode(ctx.state, ctx.history.size(), activity, now);
    }

    const mode = ctx.state.currentMode;
    const context = ctx.history.tail(this.contextEntries);
    const prompt = composer.composeMonologue({
      mode,
      history: context,
      theme: ctx.modes.getActiveTheme(),
      recentComments: ctx.pending.peek(),
    });

    let text: string;
    try {
      text = await generateText(collaborators, prompt, context, this.timeouts.generationTimeoutMs);
    } catch (error) {
      return this.recover('generator', error);
    }
    cooldown.recordSuccess(this.name, 'generator');

    ctx.history.append({ speaker: 'streamer', text, kind: 'monologue', mode, timestamp: ctx.now() });

    try {
      await deliverUtterance(collaborators, text, this.timeouts.speechTimeoutMs, this.options.segmentation);
      cooldown.recordSuccess(this.name, 'speech');
    } catch (error) {
      if (!isTransientError(error)) {
        throw error;
      }
      this.noteFailure('speech', error);
    }

    ctx.modes.recordTurn(ctx.state);
    ctx.state.consecutiveSilenceTicks =
      ctx.state.commentsSinceLastMonologue === 0 ? ctx.state.consecutiveSilenceTicks + 1 : 0;
    ctx.state.commentsSinceLastMonologue = 0;

    const outcome = this.nextTick();
    const response = pendingResponseFollowUp(ctx);
    if (response) {
      outcome.followUps.push(response);
    }
    if (this.options.memory?.requestDigest(ctx.history.size(), ctx.now())) {
      outcome.followUps.push({ event: createEvent('prepare_memory_digest', {}) });
    }
    return outcome;
  }

  private nextTick(): HandlerOutcome {
    return {
      followUps: [
        {
          event: createEvent('monologue_tick', { reason: 'cycle' }),
          delayMs: this.options.cadenceMs,
        },
      ],
    };
  }

  /**
   * Transient failures end the cycle without a follow-up; the ticker's
   * watchdog restarts it. Anything else propagates to the controller.
   */
  private recover(collaborator: CollaboratorName, error: unknown): HandlerOutcome {
    if (!isTransientError(error)) {
      throw error;
    }
    this.noteFailure(collaborator, error);
    return noFollowUps();
  }

  private noteFailure(collaborator: CollaboratorName, error: unknown): void {
    const tripped = this.options.cooldown.recordFailure(this.name, collaborator);
    this.logger.warn('[MonologueHandler] Collaborator failure', {
      collaborator,
      error: toErrorMessage(error),
      cooldown: tripped,
    });
  }
}
