/**
 * Stream Events
 *
 * Typed messages that flow through the event queue. Producers create them,
 * the stream controller routes them to a handler by `kind`.
 */

import { randomUUID } from 'crypto';

export type MonologueTickReason = 'cycle' | 'watchdog' | 'startup';

export type StreamEndingReason = 'normal' | 'manual' | 'signal' | 'marker' | 'error';

export type ShutdownReason = 'marker' | 'signal' | 'event' | 'manual';

/**
 * A comment record as delivered by the live-chat collaborator.
 */
export interface RawComment {
  id?: string;
  author: string;
  text: string;
  /** Delivery timestamp in milliseconds */
  timestamp: number;
}

export interface StreamEventPayloads {
  monologue_tick: { reason: MonologueTickReason };
  comment_received: { comment: RawComment };
  comment_response_requested: Record<string, never>;
  prepare_greeting: Record<string, never>;
  prepare_stream_summary: { endingReason: StreamEndingReason };
  prepare_daily_summary: { date: string; timezone?: string };
  prepare_memory_digest: Record<string, never>;
  theme_requested: { themeContent: string; source?: string };
  shutdown_requested: { reason: ShutdownReason };
}

export type StreamEventKind = keyof StreamEventPayloads;

export const STREAM_EVENT_KINDS: readonly StreamEventKind[] = [
  'monologue_tick',
  'comment_received',
  'comment_response_requested',
  'prepare_greeting',
  'prepare_stream_summary',
  'prepare_daily_summary',
  'prepare_memory_digest',
  'theme_requested',
  'shutdown_requested',
];

interface StreamEventBase<K extends StreamEventKind> {
  readonly id: string;
  readonly kind: K;
  readonly payload: Readonly<StreamEventPayloads[K]>;
  /** Correlation id for request/completion pairs (summaries, responses) */
  readonly taskId?: string;
  readonly createdAt: number;
}

export type StreamEventOf<K extends StreamEventKind> = StreamEventBase<K>;

export type StreamEvent = {
  [K in StreamEventKind]: StreamEventBase<K>;
}[StreamEventKind];

export interface CreateEventOptions {
  taskId?: string;
  now?: number;
}

export function createEvent<K extends StreamEventKind>(
  kind: K,
  payload: StreamEventPayloads[K],
  options: CreateEventOptions = {}
): StreamEventOf<K> {
  const event: StreamEventBase<K> = {
    id: randomUUID(),
    kind,
    payload: Object.freeze({ ...payload }),
    createdAt: options.now ?? Date.now(),
    ...(options.taskId !== undefined ? { taskId: options.taskId } : {}),
  };
  return Object.freeze(event);
}

export function isEventOfKind<K extends StreamEventKind>(
  event: StreamEvent,
  kind: K
): event is Extract<StreamEvent, { kind: K }> {
  return event.kind === kind;
}

export function isStreamEventKind(value: string): value is StreamEventKind {
  return (STREAM_EVENT_KINDS as readonly string[]).includes(value);
}

/**
 * Event scheduled by a handler, optionally after a delay.
 */
export interface FollowUp {
  event: StreamEvent;
  delayMs?: number;
}
