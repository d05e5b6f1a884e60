/**
 * Stream Controller
 *
 * The single dispatch loop. Takes events off the queue in FIFO order, routes
 * each one to its handler, schedules follow-ups and, when the queue runs dry
 * with a shutdown pending, walks the shutdown sequence:
 *
 *   running -> farewell_preparing -> farewell_speaking -> summary_preparing -> terminated
 */

import { randomUUID } from 'crypto';
import type { StreamCollaborators } from '../../domain/stream/collaborators.js';
import {
  createEvent,
  type ShutdownReason,
  type StreamEndingReason,
  type StreamEvent,
  type StreamEventKind,
} from '../../domain/stream/events.js';
import { isStateInvariantError, toErrorMessage, type StateInvariantError } from '../../domain/stream/errors.js';
import {
  canTransitionShutdown,
  type IShutdownTransitionEvent,
  type ShutdownPhase,
} from '../../domain/stream/shutdown-rules.js';
import { summarizeState, type ProcessState, type ProcessStatusSummary } from '../../domain/stream/state.js';
import type { ConversationHistory } from './conversation-history.js';
import { EMPTY, type EventQueue } from './event-queue.js';
import type { HandlerRegistry } from './handler-registry.js';
import { deliverUtterance, generateText } from './handlers/delivery.js';
import type { HandlerContext, StreamLogger } from './handlers/types.js';
import type { ModeManager } from './mode-manager.js';
import type { PendingComments } from './pending-comments.js';
import type { PromptComposer } from './prompt-composer.js';
import type { ShutdownRequest, ShutdownSignal } from './shutdown-signal.js';
import { StreamMetrics, type StreamMetricsSnapshot } from './stream-metrics.js';
import type { SegmentationOptions } from './text-segmenter.js';
import { withTimeout } from './timeouts.js';

export interface StreamControllerConfig {
  /** How long one dequeue waits before the loop checks for shutdown */
  pollIntervalMs: number;
  farewellTimeoutMs: number;
  speechTimeoutMs: number;
  summaryTimeoutMs: number;
  fallbackFarewell: string;
  /** History entries handed to the farewell prompt */
  farewellContextEntries: number;
  /** Enqueue prepare_greeting when the loop starts */
  greetOnStart: boolean;
}

export const DEFAULT_CONTROLLER_CONFIG: StreamControllerConfig = {
  pollIntervalMs: 1000,
  farewellTimeoutMs: 30_000,
  speechTimeoutMs: 60_000,
  summaryTimeoutMs: 60_000,
  fallbackFarewell: 'That is all for today. Thank you for watching, see you next time!',
  farewellContextEntries: 10,
  greetOnStart: true,
};

export interface StreamControllerDeps {
  state: ProcessState;
  queue: EventQueue;
  signal: ShutdownSignal;
  registry: HandlerRegistry;
  history: ConversationHistory;
  modes: ModeManager;
  pending: PendingComments;
  collaborators: StreamCollaborators;
  composer: PromptComposer;
  config?: Partial<StreamControllerConfig>;
  /** Handler timings and queue depth; a private collector is used when omitted */
  metrics?: StreamMetrics;
  /** Farewell delivery, sentence by sentence */
  segmentation?: SegmentationOptions;
  logger?: StreamLogger;
  now?: () => number;
}

export type StreamRunResult =
  | {
      outcome: 'graceful';
      shutdownReason: ShutdownReason;
      summaryTaskId: string | null;
      farewell: string;
    }
  | { outcome: 'fatal'; error: StateInvariantError }
  | { outcome: 'aborted' };

export interface StreamControllerStatus extends ProcessStatusSummary {
  queued: number;
  scheduledFollowUps: number;
  dispatched: number;
  handlerFailures: number;
}

export type PhaseChangeCallback = (event: IShutdownTransitionEvent) => void;

const ENDING_REASONS: Record<ShutdownReason, StreamEndingReason> = {
  marker: 'marker',
  signal: 'signal',
  event: 'manual',
  manual: 'manual',
};

export class StreamController {
  private config: StreamControllerConfig;
  private logger: StreamLogger;
  private now: () => number;
  private ctx: HandlerContext;
  private metrics: StreamMetrics;

  private started = false;
  private aborted = false;
  private inFlight: StreamEventKind | null = null;
  private timers = new Map<NodeJS.Timeout, StreamEventKind>();
  private lastDispatchAt = new Map<StreamEventKind, number>();
  private phaseHistory: IShutdownTransitionEvent[] = [];
  private phaseCallbacks: PhaseChangeCallback[] = [];
  private dispatched = 0;
  private handlerFailures = 0;

  constructor(private deps: StreamControllerDeps) {
    this.config = { ...DEFAULT_CONTROLLER_CONFIG, ...deps.config };
    this.logger = deps.logger ?? console;
    this.now = deps.now ?? Date.now;
    this.metrics = deps.metrics ?? new StreamMetrics({ now: this.now });
    this.ctx = {
      state: deps.state,
      history: deps.history,
      modes: deps.modes,
      pending: deps.pending,
      now: this.now,
    };
  }

  // ==========================================================================
  // Dispatch loop
  // ==========================================================================

  async run(): Promise<StreamRunResult> {
    if (this.started) {
      throw new Error('StreamController.run() may only be called once');
    }
    this.started = true;

    const { state, queue, signal } = this.deps;
    this.logger.info('[StreamController] Dispatch loop started', { mode: state.currentMode });

    if (this.config.greetOnStart) {
      queue.enqueue(createEvent('prepare_greeting', {}));
    }

    while (state.isRunning && !this.aborted) {
      const next = await queue.dequeue(this.config.pollIntervalMs);
      if (this.aborted) {
        break;
      }
      this.metrics.setGauge('controller', 'queue_depth', queue.size());

      if (next === EMPTY) {
        const request = signal.consume();
        if (request) {
          return this.runShutdown(request);
        }
        continue;
      }

      const fatal = await this.dispatch(next);
      if (fatal) {
        this.logger.error('[StreamController] State invariant violated, stopping', {
          kind: next.kind,
          error: fatal.message,
          data: fatal.data,
        });
        this.terminate('fatal');
        return { outcome: 'fatal', error: fatal };
      }
    }

    return { outcome: 'aborted' };
  }

  /**
   * Route one event. Handler failures are logged and swallowed so the loop
   * keeps going; a state-invariant violation is returned to the caller.
   */
  private async dispatch(event: StreamEvent): Promise<StateInvariantError | null> {
    if (event.kind === 'shutdown_requested') {
      const accepted = this.deps.signal.request(event.payload.reason, this.now());
      this.logger.info('[StreamController] Shutdown requested by event', {
        reason: event.payload.reason,
        accepted,
      });
      return null;
    }

    const handler = this.deps.registry.get(event.kind);
    if (!handler) {
      this.logger.warn('[StreamController] No handler registered', { kind: event.kind, id: event.id });
      return null;
    }

    const startedAt = this.now();
    this.inFlight = event.kind;
    this.lastDispatchAt.set(event.kind, startedAt);
    this.dispatched++;

    let succeeded = false;
    try {
      const outcome = await handler.handle(event, this.ctx);
      succeeded = true;
      if (!this.aborted && this.deps.state.isRunning) {
        for (const followUp of outcome.followUps) {
          this.schedule(followUp.event, followUp.delayMs);
        }
      }
      return null;
    } catch (error) {
      if (isStateInvariantError(error)) {
        return error;
      }
      this.handlerFailures++;
      this.logger.error('[StreamController] Handler failed', {
        kind: event.kind,
        handler: handler.name,
        error: toErrorMessage(error),
      });
      return null;
    } finally {
      this.inFlight = null;
      this.metrics.recordDuration(handler.name, event.kind, this.now() - startedAt, succeeded);
    }
  }

  private schedule(event: StreamEvent, delayMs?: number): void {
    if (delayMs === undefined || delayMs <= 0) {
      this.deps.queue.enqueue(event);
      return;
    }

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.deps.queue.enqueue(event);
    }, delayMs);
    this.timers.set(timer, event.kind);
  }

  // ==========================================================================
  // Shutdown sequence
  // ==========================================================================

  private async runShutdown(request: ShutdownRequest): Promise<StreamRunResult> {
    const { collaborators, composer, history } = this.deps;
    this.logger.info('[StreamController] Shutdown sequence started', { reason: request.reason });

    // Farewell preparation
    this.transition('farewell_preparing', request.reason);
    let farewell: string;
    try {
      const context = history.tail(this.config.farewellContextEntries);
      farewell = await generateText(
        collaborators,
        composer.composeFarewell(context),
        context,
        this.config.farewellTimeoutMs
      );
    } catch (error) {
      this.logger.warn('[StreamController] Farewell generation failed, using fallback', {
        error: toErrorMessage(error),
      });
      farewell = this.config.fallbackFarewell;
    }
    if (this.aborted) {
      return { outcome: 'aborted' };
    }
    history.append({ speaker: 'streamer', text: farewell, kind: 'farewell', timestamp: this.now() });

    // Farewell playback
    this.transition('farewell_speaking', 'farewell ready');
    try {
      await deliverUtterance(collaborators, farewell, this.config.speechTimeoutMs, this.deps.segmentation);
    } catch (error) {
      this.logger.warn('[StreamController] Farewell playback failed', { error: toErrorMessage(error) });
    }
    if (this.aborted) {
      return { outcome: 'aborted' };
    }

    // Stream summary
    this.transition('summary_preparing', 'farewell spoken');
    const summaryTaskId: string | null = await this.runStreamSummary(ENDING_REASONS[request.reason]);
    if (this.aborted) {
      return { outcome: 'aborted' };
    }

    this.terminate('shutdown complete');
    this.logger.info('[StreamController] Shutdown sequence finished', {
      reason: request.reason,
      summaryTaskId,
    });

    return { outcome: 'graceful', shutdownReason: request.reason, summaryTaskId, farewell };
  }

  private async runStreamSummary(endingReason: StreamEndingReason): Promise<string | null> {
    const taskId = randomUUID();
    const event = createEvent('prepare_stream_summary', { endingReason }, { taskId, now: this.now() });

    if (!this.deps.registry.has(event.kind)) {
      this.logger.warn('[StreamController] No summary handler registered, skipping summary');
      return null;
    }

    try {
      await withTimeout(this.deps.registry.dispatch(event, this.ctx), this.config.summaryTimeoutMs, 'stream summary');
    } catch (error) {
      this.logger.warn('[StreamController] Stream summary did not complete', {
        taskId,
        error: toErrorMessage(error),
      });
    }
    return taskId;
  }

  /**
   * Forceful stop: cut speech off and end the loop without a farewell.
   */
  abort(): void {
    if (this.aborted || this.deps.state.shutdownPhase === 'terminated') {
      return;
    }
    this.aborted = true;
    this.logger.warn('[StreamController] Aborting', { phase: this.deps.state.shutdownPhase });
    this.deps.collaborators.speech.stop();
    this.terminate('aborted');
  }

  private terminate(trigger: string): void {
    for (const timer of this.timers.keys()) {
      clearTimeout(timer);
    }
    this.timers.clear();

    const { queue } = this.deps;
    queue.close();
    const dropped = queue.drain();
    if (dropped.length > 0) {
      this.logger.info('[StreamController] Dropped queued events at termination', { count: dropped.length });
    }

    this.transition('terminated', trigger);
  }

  private transition(to: ShutdownPhase, trigger: string): boolean {
    const { state } = this.deps;
    const from = state.shutdownPhase;
    if (!canTransitionShutdown(from, to)) {
      this.logger.warn(`[StreamController] Invalid shutdown transition: ${from} -> ${to}`);
      return false;
    }

    const event: IShutdownTransitionEvent = { from, to, trigger, timestamp: this.now() };
    this.phaseHistory.push(event);
    state.shutdownPhase = to;
    if (to === 'terminated') {
      state.isRunning = false;
    }

    for (const callback of this.phaseCallbacks) {
      try {
        callback(event);
      } catch (error) {
        this.logger.error('[StreamController] Phase callback error:', error);
      }
    }
    return true;
  }

  // ==========================================================================
  // Introspection
  // ==========================================================================

  getPhase(): ShutdownPhase {
    return this.deps.state.shutdownPhase;
  }

  onPhaseChange(callback: PhaseChangeCallback): () => void {
    this.phaseCallbacks.push(callback);
    return () => {
      const index = this.phaseCallbacks.indexOf(callback);
      if (index >= 0) {
        this.phaseCallbacks.splice(index, 1);
      }
    };
  }

  getPhaseHistory(): IShutdownTransitionEvent[] {
    return [...this.phaseHistory];
  }

  getLastDispatchAt(kind: StreamEventKind): number | undefined {
    return this.lastDispatchAt.get(kind);
  }

  /**
   * Whether an event of this kind is queued, waiting on a follow-up timer,
   * or being handled right now.
   */
  hasOutstanding(kind: StreamEventKind): boolean {
    if (this.inFlight === kind || this.deps.queue.hasPending(kind)) {
      return true;
    }
    for (const scheduled of this.timers.values()) {
      if (scheduled === kind) {
        return true;
      }
    }
    return false;
  }

  getMetrics(): StreamMetricsSnapshot {
    return this.metrics.getSnapshot();
  }

  getStatus(): StreamControllerStatus {
    return {
      ...summarizeState(this.deps.state, this.now()),
      queued: this.deps.queue.size(),
      scheduledFollowUps: this.timers.size,
      dispatched: this.dispatched,
      handlerFailures: this.handlerFailures,
    };
  }
}
