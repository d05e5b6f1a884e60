/**
 * Summary Handler
 *
 * Builds stream-end and daily summaries from a history snapshot. The
 * generator writes the prose; when it fails a deterministic digest is used
 * so a summary is always produced.
 */

import { randomUUID } from 'crypto';
import type { ConversationEntry, StreamCollaborators } from '../../../domain/stream/collaborators.js';
import type { StreamEvent } from '../../../domain/stream/events.js';
import { isTransientError, toErrorMessage } from '../../../domain/stream/errors.js';
import type { StreamSummary, SummaryKind, SummaryStore } from '../../../domain/stream/summary.js';
import type { PromptComposer } from '../prompt-composer.js';
import type { SummaryTaskTracker } from '../summary-tracker.js';
import { calendarDayWindow } from '../../../infra/scheduler/cron-adapter.js';
import { generateText } from './delivery.js';
import {
  DEFAULT_HANDLER_TIMEOUTS,
  noFollowUps,
  type HandlerContext,
  type HandlerOutcome,
  type HandlerTimeouts,
  type StreamHandler,
  type StreamLogger,
} from './types.js';

type SummaryEventKind = 'prepare_stream_summary' | 'prepare_daily_summary';

const MAX_TOPICS = 5;
const MAX_NOTABLE_COMMENTS = 5;
const TOPIC_MAX_CHARS = 40;

export interface SummaryHandlerOptions {
  collaborators: StreamCollaborators;
  composer: PromptComposer;
  tracker: SummaryTaskTracker;
  store?: SummaryStore;
  timeouts?: HandlerTimeouts;
  logger?: StreamLogger;
}

/**
 * First sentence of each monologue, deduplicated, in speaking order.
 */
export function extractTopics(entries: readonly ConversationEntry[], limit = MAX_TOPICS): string[] {
  const topics: string[] = [];
  for (const entry of entries) {
    if (entry.speaker !== 'streamer' || entry.kind !== 'monologue') {
      continue;
    }
    const sentence = entry.text.split(/[。.!?！？\n]/)[0].trim();
    if (!sentence) {
      continue;
    }
    const topic = [...sentence].length > TOPIC_MAX_CHARS
      ? `${[...sentence].slice(0, TOPIC_MAX_CHARS).join('')}…`
      : sentence;
    if (!topics.includes(topic)) {
      topics.push(topic);
    }
    if (topics.length >= limit) {
      break;
    }
  }
  return topics;
}

/**
 * The most recent viewer comments as `author: text`.
 */
export function pickNotableComments(entries: readonly ConversationEntry[], limit = MAX_NOTABLE_COMMENTS): string[] {
  return entries
    .filter((entry) => entry.speaker === 'viewer')
    .slice(-limit)
    .map((entry) => `${entry.author ?? 'anonymous'}: ${entry.text}`);
}

export function buildDigest(summary: Omit<StreamSummary, 'text'>): string {
  const heading = summary.kind === 'daily' ? `Daily summary ${summary.date ?? ''}`.trim() : 'Stream summary';
  const lines = [`${heading}: ${summary.entryCount} entries over ${summary.durationMinutes} minutes.`];
  if (summary.topics.length > 0) {
    lines.push(`Topics: ${summary.topics.join(' / ')}`);
  }
  if (summary.notableComments.length > 0) {
    lines.push(`Comments: ${summary.notableComments.join(' / ')}`);
  }
  return lines.join('\n');
}

export class SummaryHandler implements StreamHandler<SummaryEventKind> {
  readonly name = 'summary';
  readonly kinds = ['prepare_stream_summary', 'prepare_daily_summary'] as const;

  private logger: StreamLogger;
  private timeouts: HandlerTimeouts;

  constructor(private options: SummaryHandlerOptions) {
    this.logger = options.logger ?? console;
    this.timeouts = options.timeouts ?? DEFAULT_HANDLER_TIMEOUTS;
  }

  async handle(event: Extract<StreamEvent, { kind: SummaryEventKind }>, ctx: HandlerContext): Promise<HandlerOutcome> {
    const taskId = event.taskId ?? randomUUID();
    const kind: SummaryKind = event.kind === 'prepare_stream_summary' ? 'stream' : 'daily';
    const now = ctx.now();
    const { tracker } = this.options;

    tracker.start(taskId, kind, now);
    this.logger.info('[SummaryHandler] Summary task started', { taskId, kind });

    try {
      const summary =
        event.kind === 'prepare_stream_summary'
          ? await this.summarize(taskId, 'stream', ctx.history.snapshot(), ctx, {
              endingReason: event.payload.endingReason,
              durationMinutes: Math.max(0, Math.round((now - ctx.state.startedAt) / 60_000)),
            })
          : await this.summarizeDay(taskId, event.payload.date, event.payload.timezone, ctx);

      if (this.options.store) {
        await this.options.store.save(summary);
      }
      tracker.complete(taskId, summary, ctx.now());
      this.logger.info('[SummaryHandler] Summary task completed', {
        taskId,
        kind,
        entryCount: summary.entryCount,
      });
    } catch (error) {
      tracker.fail(taskId, toErrorMessage(error), ctx.now());
      this.logger.error('[SummaryHandler] Summary task failed', { taskId, kind, error: toErrorMessage(error) });
      throw error;
    }

    return noFollowUps();
  }

  private summarizeDay(
    taskId: string,
    date: string,
    timeZone: string | undefined,
    ctx: HandlerContext
  ): Promise<StreamSummary> {
    const day = calendarDayWindow(date, timeZone);
    const entries = ctx.history.since(day.start).filter((entry) => entry.timestamp < day.end);
    const span = entries.length > 1 ? entries[entries.length - 1].timestamp - entries[0].timestamp : 0;
    return this.summarize(taskId, 'daily', entries, ctx, {
      date,
      durationMinutes: Math.round(span / 60_000),
    });
  }

  private async summarize(
    taskId: string,
    kind: SummaryKind,
    entries: readonly ConversationEntry[],
    ctx: HandlerContext,
    extra: { durationMinutes: number; date?: string; endingReason?: string }
  ): Promise<StreamSummary> {
    const base: Omit<StreamSummary, 'text'> = {
      taskId,
      kind,
      topics: extractTopics(entries),
      notableComments: pickNotableComments(entries),
      durationMinutes: extra.durationMinutes,
      entryCount: entries.length,
      createdAt: ctx.now(),
      ...(extra.date !== undefined ? { date: extra.date } : {}),
      ...(extra.endingReason !== undefined ? { endingReason: extra.endingReason } : {}),
    };

    let text: string;
    if (entries.length === 0) {
      text = buildDigest(base);
    } else {
      try {
        const prompt = this.options.composer.composeSummary(kind, {
          history: entries,
          durationMinutes: extra.durationMinutes,
          date: extra.date,
        });
        text = await generateText(this.options.collaborators, prompt, [], this.timeouts.generationTimeoutMs);
      } catch (error) {
        if (!isTransientError(error)) {
          throw error;
        }
        this.logger.warn('[SummaryHandler] Generator unavailable, using digest', {
          taskId,
          error: toErrorMessage(error),
        });
        text = buildDigest(base);
      }
    }

    return { ...base, text };
  }
}
