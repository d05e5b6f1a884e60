/**
 * Streamer Daemon - one streaming session from start to exit code
 *
 * Takes the pid lock, opens the archive, runs the dispatch loop until the
 * shutdown sequence (or an abort) ends it, then archives the session's
 * history and releases everything it acquired.
 */

import type Database from 'better-sqlite3';
import type { StreamRunResult } from '../app/stream/stream-controller.js';
import type { StreamLogger } from '../app/stream/handlers/types.js';
import { toErrorMessage } from '../domain/stream/errors.js';
import { openStreamArchive } from '../infra/persistence/database.js';
import { FanOutSummaryStore, MarkdownSummaryWriter } from '../infra/persistence/summary-markdown.js';
import type { SqliteStreamArchive } from '../infra/persistence/stream-archive-repository.js';
import { acquireStreamerLock, releaseStreamerLock } from './pid-lock.js';
import { createStreamerRuntime, type StreamerRuntime, type StreamerRuntimeOptions } from './runtime.js';

export const EXIT_GRACEFUL = 0;
export const EXIT_FATAL = 1;
export const EXIT_FORCED = 130;

export interface StreamerDaemonOptions extends Omit<StreamerRuntimeOptions, 'summaryStore'> {
  mode?: 'foreground' | 'background';
  /** Install SIGINT/SIGTERM handlers on the process */
  handleSignals?: boolean;
  /** Called on the second interrupt, after the abort */
  exit?: (code: number) => void;
}

export interface StreamerSessionReport {
  exitCode: number;
  result: StreamRunResult;
  archivedSessionId: string | null;
}

export function exitCodeFor(result: StreamRunResult): number {
  switch (result.outcome) {
    case 'graceful':
      return EXIT_GRACEFUL;
    case 'fatal':
      return EXIT_FATAL;
    case 'aborted':
      return EXIT_FORCED;
  }
}

export class StreamerDaemon {
  private logger: StreamLogger;
  private runtime: StreamerRuntime | null = null;
  private interrupts = 0;
  private signalListener: (() => void) | null = null;

  constructor(private options: StreamerDaemonOptions) {
    this.logger = options.logger ?? console;
  }

  async run(): Promise<StreamerSessionReport> {
    const { paths } = this.options;
    const now = this.options.now ?? Date.now;

    acquireStreamerLock(paths.pidFile, { dataDir: paths.dataDir, mode: this.options.mode ?? 'foreground' });

    let db: Database.Database | null = null;
    try {
      const opened = openStreamArchive(paths.archiveDb);
      db = opened.db;
      const archive = opened.archive;

      const runtime = createStreamerRuntime({
        ...this.options,
        summaryStore: new FanOutSummaryStore([archive, new MarkdownSummaryWriter(paths.summariesDir)]),
      });
      this.runtime = runtime;

      runtime.controller.onPhaseChange((event) => {
        this.logger.info('[StreamerDaemon] Shutdown phase', { from: event.from, to: event.to, trigger: event.trigger });
      });

      if (this.options.handleSignals) {
        this.installSignalHandlers();
      }

      this.logger.info('[StreamerDaemon] Streaming started', { pid: process.pid, dataDir: paths.dataDir });
      runtime.startProducers();

      const result = await runtime.controller.run();
      await runtime.stopProducers();

      const archivedSessionId = this.archiveHistory(runtime, archive, now());
      const exitCode = exitCodeFor(result);
      this.logger.info('[StreamerDaemon] Streaming finished', { outcome: result.outcome, exitCode });
      this.logger.info('[StreamerDaemon] Session metrics', {
        ...runtime.controller.getMetrics(),
        memory: runtime.memory?.getStats() ?? null,
      });

      return { exitCode, result, archivedSessionId };
    } finally {
      this.removeSignalHandlers();
      db?.close();
      releaseStreamerLock(paths.pidFile);
    }
  }

  /**
   * First interrupt asks for a graceful shutdown; the second aborts.
   */
  interrupt(): void {
    const runtime = this.runtime;
    if (!runtime) {
      return;
    }

    this.interrupts++;
    if (this.interrupts === 1) {
      const accepted = runtime.signal.request('signal');
      this.logger.info('[StreamerDaemon] Interrupt received, finishing gracefully', { accepted });
      return;
    }

    this.logger.warn('[StreamerDaemon] Second interrupt, aborting');
    runtime.controller.abort();
    this.options.exit?.(EXIT_FORCED);
  }

  getRuntime(): StreamerRuntime | null {
    return this.runtime;
  }

  private archiveHistory(runtime: StreamerRuntime, archive: SqliteStreamArchive, endedAt: number): string | null {
    const entries = runtime.history.archive();
    if (entries.length === 0) {
      return null;
    }

    try {
      const session = archive.archiveSession(entries, endedAt);
      this.logger.info('[StreamerDaemon] History archived', { sessionId: session.id, entries: session.entryCount });
      return session.id;
    } catch (error) {
      this.logger.error('[StreamerDaemon] Failed to archive history', { error: toErrorMessage(error) });
      return null;
    }
  }

  private installSignalHandlers(): void {
    const listener = () => {
      this.interrupt();
    };
    this.signalListener = listener;
    process.on('SIGINT', listener);
    process.on('SIGTERM', listener);
  }

  private removeSignalHandlers(): void {
    if (this.signalListener) {
      process.off('SIGINT', this.signalListener);
      process.off('SIGTERM', this.signalListener);
      this.signalListener = null;
    }
  }
}
