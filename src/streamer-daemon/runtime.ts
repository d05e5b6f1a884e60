/**
 * Streamer Runtime
 *
 * Builds the control core from a loaded configuration: state, queue, mode
 * manager, handlers, controller and the producers that feed the queue.
 */

import type {
  LiveChatSource,
  StreamCollaborators,
  TextGenerator,
} from '../domain/stream/collaborators.js';
import { createProcessState, type ProcessState } from '../domain/stream/state.js';
import type { SummaryStore } from '../domain/stream/summary.js';
import { createEvent } from '../domain/stream/events.js';
import { CommentFilter, type CommentFilterConfig } from '../app/stream/comment-filter.js';
import { ConversationHistory } from '../app/stream/conversation-history.js';
import { CooldownTracker } from '../app/stream/cooldown.js';
import { EventQueue } from '../app/stream/event-queue.js';
import { HandlerRegistry } from '../app/stream/handler-registry.js';
import {
  CommentHandler,
  GreetingHandler,
  MemoryHandler,
  MonologueHandler,
  SummaryHandler,
  ThemeHandler,
  type HandlerTimeouts,
  type StreamLogger,
} from '../app/stream/handlers/index.js';
import { ModeManager } from '../app/stream/mode-manager.js';
import { PendingComments } from '../app/stream/pending-comments.js';
import { ChatPoller } from '../app/stream/producers/chat-poller.js';
import { DailySummarySchedule } from '../app/stream/producers/daily-summary-schedule.js';
import { MonologueTicker } from '../app/stream/producers/monologue-ticker.js';
import { PromptComposer, type PromptTemplateSource } from '../app/stream/prompt-composer.js';
import { createSeededRandom, defaultRandom } from '../app/stream/random.js';
import { ShutdownSignal } from '../app/stream/shutdown-signal.js';
import { StreamController } from '../app/stream/stream-controller.js';
import { StreamMemory } from '../app/stream/stream-memory.js';
import { StreamMetrics } from '../app/stream/stream-metrics.js';
import type { SegmentationOptions } from '../app/stream/text-segmenter.js';
import { SummaryTaskTracker } from '../app/stream/summary-tracker.js';
import type { StreamerConfig } from '../infra/config/runtime-config.js';
import type { StreamerPaths } from '../infra/config/streamer-paths.js';
import {
  ConsoleCaptions,
  MockTextGenerator,
  OpenAITextGenerator,
  SimulatedSpeech,
} from '../infra/collaborators/index.js';
import { ShutdownMarkerWatcher } from '../infra/shutdown/marker-watcher.js';

export interface StreamerRuntimeOptions {
  config: StreamerConfig;
  paths: StreamerPaths;
  filterConfig: CommentFilterConfig;
  templates: PromptTemplateSource;
  /** Force the offline generator regardless of configuration */
  mock?: boolean;
  /** Seed for reproducible mode selection */
  seed?: string;
  /** Initial theme, queued as a theme_requested event */
  theme?: { content: string; source?: string };
  chatSource?: LiveChatSource;
  summaryStore?: SummaryStore;
  /** Replaces the generator/speech/captions built from configuration */
  collaborators?: Partial<StreamCollaborators>;
  logger?: StreamLogger;
  now?: () => number;
}

export interface StreamerRuntime {
  state: ProcessState;
  queue: EventQueue;
  signal: ShutdownSignal;
  history: ConversationHistory;
  modes: ModeManager;
  pending: PendingComments;
  tracker: SummaryTaskTracker;
  registry: HandlerRegistry;
  controller: StreamController;
  collaborators: StreamCollaborators;
  ticker: MonologueTicker;
  markerWatcher: ShutdownMarkerWatcher;
  chatPoller: ChatPoller | null;
  dailySchedule: DailySummarySchedule | null;
  memory: StreamMemory | null;
  metrics: StreamMetrics;
  /** Start every producer */
  startProducers(): void;
  /** Stop every producer; waits for the chat poller to unwind */
  stopProducers(): Promise<void>;
}

export function createTextGenerator(config: StreamerConfig, mock = false): TextGenerator {
  if (mock || config.generator.provider === 'mock') {
    return new MockTextGenerator({ latencyMs: 200 });
  }
  return new OpenAITextGenerator({
    baseUrl: config.generator.baseUrl,
    model: config.generator.model,
    apiKey: config.generator.apiKey,
    temperature: config.generator.temperature,
    maxTokens: config.generator.maxTokens,
    requestTimeoutMs: config.stream.generationTimeoutMs,
  });
}

export function createStreamerRuntime(options: StreamerRuntimeOptions): StreamerRuntime {
  const { config, paths } = options;
  const logger = options.logger ?? console;
  const now = options.now ?? Date.now;

  const collaborators: StreamCollaborators = {
    generator: options.collaborators?.generator ?? createTextGenerator(config, options.mock),
    speech:
      options.collaborators?.speech ??
      new SimulatedSpeech({
        charsPerSecond: config.speech.charsPerSecond,
        minDurationMs: config.speech.minDurationMs,
        logger,
      }),
    captions: options.collaborators?.captions ?? new ConsoleCaptions(),
  };

  const state = createProcessState(now());
  const queue = new EventQueue({ logger });
  const signal = new ShutdownSignal();
  const history = new ConversationHistory();
  const pending = new PendingComments(config.comments.pendingLimit);
  const tracker = new SummaryTaskTracker();
  const cooldown = new CooldownTracker(config.cooldown);
  const memory = config.memory.enabled
    ? new StreamMemory(
        {
          intervalMs: config.memory.intervalMs,
          minEntries: config.memory.minEntries,
          compressionThreshold: config.memory.compressionThreshold,
          contextBlocks: config.memory.contextBlocks,
        },
        now()
      )
    : null;
  const composer = new PromptComposer(options.templates, memory ?? undefined);
  const metrics = new StreamMetrics({ now });
  const segmentation: SegmentationOptions | undefined = config.speech.segmentUtterances
    ? { maxLength: config.speech.segmentMaxLength, minMergeLength: config.speech.segmentMinMergeLength }
    : undefined;
  const modes = new ModeManager(
    { weights: config.modes.weights, dwell: config.modes.dwell },
    { random: options.seed !== undefined ? createSeededRandom(options.seed) : defaultRandom, logger }
  );

  const timeouts: HandlerTimeouts = {
    generationTimeoutMs: config.stream.generationTimeoutMs,
    speechTimeoutMs: config.stream.speechTimeoutMs,
  };

  const registry = new HandlerRegistry();
  registry.register(
    new MonologueHandler({
      collaborators,
      composer,
      cooldown,
      cadenceMs: config.stream.cadenceMs,
      contextEntries: config.stream.contextEntries,
      timeouts,
      segmentation,
      memory: memory ?? undefined,
      logger,
    })
  );
  registry.register(
    new CommentHandler({
      collaborators,
      composer,
      cooldown,
      filter: new CommentFilter(options.filterConfig),
      responseThreshold: config.comments.responseThreshold,
      contextEntries: config.stream.contextEntries,
      timeouts,
      segmentation,
      logger,
    })
  );
  registry.register(
    new GreetingHandler({
      collaborators,
      composer,
      fallbackGreeting: config.stream.fallbackGreeting,
      timeouts,
      segmentation,
      logger,
    })
  );
  registry.register(
    new SummaryHandler({
      collaborators,
      composer,
      tracker,
      store: options.summaryStore,
      timeouts,
      logger,
    })
  );
  registry.register(new ThemeHandler({ logger }));
  if (memory) {
    registry.register(new MemoryHandler({ collaborators, composer, memory, timeouts, logger }));
  }

  const controller = new StreamController({
    state,
    queue,
    signal,
    registry,
    history,
    modes,
    pending,
    collaborators,
    composer,
    config: {
      pollIntervalMs: config.stream.pollIntervalMs,
      farewellTimeoutMs: config.stream.farewellTimeoutMs,
      speechTimeoutMs: config.stream.speechTimeoutMs,
      summaryTimeoutMs: config.stream.summaryTimeoutMs,
      fallbackFarewell: config.stream.fallbackFarewell,
      farewellContextEntries: config.stream.contextEntries,
    },
    metrics,
    segmentation,
    logger,
    now,
  });

  const ticker = new MonologueTicker({
    queue,
    activity: controller,
    idleRestartMs: config.stream.idleRestartMs,
    now,
    logger,
  });

  const markerWatcher = new ShutdownMarkerWatcher({
    markerPath: paths.shutdownMarker,
    signal,
    pollMs: config.shutdown.markerPollMs,
    now,
    logger,
  });

  const chatPoller = options.chatSource
    ? new ChatPoller({
        queue,
        source: options.chatSource,
        restartDelayMs: config.comments.restartDelayMs,
        logger,
      })
    : null;

  const dailySchedule = config.dailySummary.enabled
    ? new DailySummarySchedule({
        queue,
        cron: config.dailySummary.cron,
        timezone: config.dailySummary.timezone,
        now,
        logger,
      })
    : null;

  if (options.theme) {
    queue.enqueue(
      createEvent(
        'theme_requested',
        {
          themeContent: options.theme.content,
          ...(options.theme.source !== undefined ? { source: options.theme.source } : {}),
        },
        { now: now() }
      )
    );
  }

  return {
    state,
    queue,
    signal,
    history,
    modes,
    pending,
    tracker,
    registry,
    controller,
    collaborators,
    ticker,
    markerWatcher,
    chatPoller,
    dailySchedule,
    memory,
    metrics,
    startProducers() {
      markerWatcher.start();
      ticker.start();
      chatPoller?.start();
      dailySchedule?.start();
    },
    async stopProducers() {
      markerWatcher.stop();
      ticker.stop();
      dailySchedule?.stop();
      await chatPoller?.stop();
    },
  };
}
