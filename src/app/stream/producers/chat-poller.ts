/**
 * Chat Poller
 * Pumps comments from the live-chat source into the event queue, and
 * re-subscribes after the source fails.
 */

import type { LiveChatSource } from '../../../domain/stream/collaborators.js';
import { createEvent } from '../../../domain/stream/events.js';
import { toErrorMessage } from '../../../domain/stream/errors.js';
import type { IEventQueue } from '../event-queue.js';
import { sleep } from '../timeouts.js';

export interface ChatPollerOptions {
  queue: IEventQueue;
  source: LiveChatSource;
  restartDelayMs: number;
  /** Subscribe again when the source ends without an error */
  resubscribeOnEnd?: boolean;
  logger?: Pick<Console, 'info' | 'warn' | 'error'>;
}

export interface ChatPollerStats {
  received: number;
  failures: number;
  subscriptions: number;
}

export class ChatPoller {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private logger: Pick<Console, 'info' | 'warn' | 'error'>;
  private stats: ChatPollerStats = { received: 0, failures: 0, subscriptions: 0 };

  constructor(private options: ChatPollerOptions) {
    this.logger = options.logger ?? console;
  }

  start(): void {
    if (this.loop) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.pump(controller.signal).catch((error: unknown) => {
      this.logger.error('[ChatPoller] Poll loop crashed', { error: toErrorMessage(error) });
    });
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    const loop = this.loop;
    this.loop = null;
    this.controller = null;
    if (loop) {
      await loop;
    }
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Resolves when the poll loop ends on its own or after stop().
   */
  async finished(): Promise<void> {
    if (this.loop) {
      await this.loop;
    }
  }

  getStats(): ChatPollerStats {
    return { ...this.stats };
  }

  private async pump(signal: AbortSignal): Promise<void> {
    const { queue, source, restartDelayMs } = this.options;

    while (!signal.aborted) {
      this.stats.subscriptions++;
      try {
        for await (const comment of source.comments(signal)) {
          if (signal.aborted) {
            break;
          }
          queue.enqueue(createEvent('comment_received', { comment }));
          this.stats.received++;
        }
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        this.stats.failures++;
        this.logger.warn('[ChatPoller] Chat source failed, restarting', {
          error: toErrorMessage(error),
          restartDelayMs,
        });
        await sleep(restartDelayMs, signal);
        continue;
      }

      if (signal.aborted || !this.options.resubscribeOnEnd) {
        break;
      }
      this.logger.info('[ChatPoller] Chat source ended, resubscribing');
      await sleep(restartDelayMs, signal);
    }
  }
}
