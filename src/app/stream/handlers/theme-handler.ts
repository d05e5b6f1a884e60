/**
 * Theme Handler
 * Sets the active theme and steers the stream into theme continuation.
 */

import type { StreamEventOf } from '../../../domain/stream/events.js';
import {
  currentActivity,
  noFollowUps,
  type HandlerContext,
  type HandlerOutcome,
  type StreamHandler,
  type StreamLogger,
} from './types.js';

export class ThemeHandler implements StreamHandler<'theme_requested'> {
  readonly name = 'theme';
  readonly kinds = ['theme_requested'] as const;

  private logger: StreamLogger;

  constructor(options: { logger?: StreamLogger } = {}) {
    this.logger = options.logger ?? console;
  }

  async handle(event: StreamEventOf<'theme_requested'>, ctx: HandlerContext): Promise<HandlerOutcome> {
    ctx.modes.setActiveTheme(event.payload.themeContent);

    const activity = currentActivity(ctx);
    const historySize = ctx.history.size();
    if (!ctx.modes.isEligible('theme_continuation', historySize, activity)) {
      this.logger.warn('[ThemeHandler] Theme set but theme_continuation is not eligible', {
        source: event.payload.source,
      });
      return noFollowUps();
    }

    if (ctx.state.currentMode !== 'theme_continuation') {
      ctx.modes.forceMode(ctx.state, 'theme_continuation', historySize, activity, ctx.now());
    }

    this.logger.info('[ThemeHandler] Theme activated', {
      source: event.payload.source ?? 'unknown',
      length: event.payload.themeContent.trim().length,
    });
    return noFollowUps();
  }
}
