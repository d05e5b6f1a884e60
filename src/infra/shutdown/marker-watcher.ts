/**
 * Shutdown Marker Watcher
 *
 * Polls for the marker file written by `streamer stop`. When it appears the
 * file is removed and a 'marker' shutdown is requested on the signal.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ShutdownSignal } from '../../app/stream/shutdown-signal.js';
import { ShutdownPathError, toErrorMessage } from '../../domain/stream/errors.js';

export interface ShutdownMarkerWatcherOptions {
  markerPath: string;
  signal: ShutdownSignal;
  pollMs: number;
  now?: () => number;
  logger?: Pick<Console, 'info' | 'warn'>;
}

export interface ShutdownMarkerContent {
  requestedAt: number;
  requestedBy?: number;
}

export class ShutdownMarkerWatcher {
  private interval: NodeJS.Timeout | null = null;
  private logger: Pick<Console, 'info' | 'warn'>;

  constructor(private options: ShutdownMarkerWatcherOptions) {
    this.logger = options.logger ?? console;
  }

  start(): void {
    if (this.interval) {
      return;
    }

    // A marker left over from a previous run must not stop this one
    if (removeShutdownMarker(this.options.markerPath)) {
      this.logger.warn('[ShutdownMarkerWatcher] Removed stale marker', { path: this.options.markerPath });
    }

    this.interval = setInterval(() => {
      this.check();
    }, this.options.pollMs);
    this.interval.unref();
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }

  /**
   * One poll. Returns true when a marker was found and consumed.
   */
  check(): boolean {
    const { markerPath, signal } = this.options;
    if (!fs.existsSync(markerPath)) {
      return false;
    }

    try {
      removeShutdownMarker(markerPath);
    } catch (error) {
      if (!(error instanceof ShutdownPathError)) {
        throw error;
      }
      this.logger.warn('[ShutdownMarkerWatcher] Could not remove marker', { path: markerPath, error: error.message });
    }

    const now = (this.options.now ?? Date.now)();
    const accepted = signal.request('marker', now);
    this.logger.info('[ShutdownMarkerWatcher] Shutdown marker found', { path: markerPath, accepted });
    return true;
  }

  isWatching(): boolean {
    return this.interval !== null;
  }
}

export function writeShutdownMarker(markerPath: string, content: ShutdownMarkerContent): void {
  try {
    fs.mkdirSync(path.dirname(markerPath), { recursive: true, mode: 0o700 });
    fs.writeFileSync(markerPath, JSON.stringify(content, null, 2));
  } catch (error) {
    throw new ShutdownPathError(`Cannot write shutdown marker ${markerPath}: ${toErrorMessage(error)}`, {
      path: markerPath,
    });
  }
}

/**
 * Returns true when a file was removed.
 */
export function removeShutdownMarker(markerPath: string): boolean {
  try {
    fs.unlinkSync(markerPath);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw new ShutdownPathError(`Cannot remove shutdown marker ${markerPath}: ${toErrorMessage(error)}`, {
      path: markerPath,
    });
  }
}
