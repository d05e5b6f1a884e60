/**
 * Shutdown Signal
 *
 * Single-slot latch shared by the marker watcher, OS signal handlers and the
 * dispatch loop. request() only records the reason; the dispatch loop takes
 * it with consume(), which clears the slot and latches so the shutdown
 * sequence can start at most once.
 */

import type { ShutdownReason } from '../../domain/stream/events.js';

export interface ShutdownRequest {
  reason: ShutdownReason;
  requestedAt: number;
}

export class ShutdownSignal {
  private pending: ShutdownRequest | null = null;
  private consumed = false;
  private listeners = new Set<(request: ShutdownRequest) => void>();

  /**
   * Record a shutdown request. Returns false if one is already pending or
   * the signal was consumed.
   */
  request(reason: ShutdownReason, now: number = Date.now()): boolean {
    if (this.consumed || this.pending) {
      return false;
    }

    const request: ShutdownRequest = { reason, requestedAt: now };
    this.pending = request;

    for (const listener of this.listeners) {
      try {
        listener(request);
      } catch (error) {
        console.error('[ShutdownSignal] Listener error:', error);
      }
    }
    return true;
  }

  /**
   * Take the pending request, if any.
   */
  consume(): ShutdownRequest | null {
    const request = this.pending;
    if (!request) {
      return null;
    }
    this.pending = null;
    this.consumed = true;
    return request;
  }

  isPending(): boolean {
    return this.pending !== null;
  }

  isConsumed(): boolean {
    return this.consumed;
  }

  onRequest(listener: (request: ShutdownRequest) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
