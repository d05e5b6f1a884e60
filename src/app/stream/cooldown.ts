/**
 * Cool-down Tracker
 *
 * Counts consecutive failures per (handler, collaborator). Once the count
 * reaches the threshold the pair is cooled down and the next N cycles are
 * skipped; after that the handler tries again with a fresh count.
 */

import type { CollaboratorName } from '../../domain/stream/collaborators.js';

export interface CooldownConfig {
  failureThreshold: number;
  cooldownCycles: number;
}

export const DEFAULT_COOLDOWN_CONFIG: CooldownConfig = {
  failureThreshold: 5,
  cooldownCycles: 3,
};

interface CooldownEntry {
  consecutiveFailures: number;
  remainingSkips: number;
  trips: number;
}

export interface CooldownStatus {
  consecutiveFailures: number;
  remainingSkips: number;
  trips: number;
}

export class CooldownTracker {
  private entries = new Map<string, CooldownEntry>();

  constructor(private config: CooldownConfig = DEFAULT_COOLDOWN_CONFIG) {}

  private getKey(handler: string, collaborator: CollaboratorName): string {
    return `${handler}:${collaborator}`;
  }

  private getEntry(handler: string, collaborator: CollaboratorName): CooldownEntry {
    const key = this.getKey(handler, collaborator);
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { consecutiveFailures: 0, remainingSkips: 0, trips: 0 };
      this.entries.set(key, entry);
    }
    return entry;
  }

  /**
   * Called once per cycle before doing work. Returns true when this cycle
   * must be skipped, and uses up one skip.
   */
  shouldSkip(handler: string, collaborator: CollaboratorName): boolean {
    const entry = this.getEntry(handler, collaborator);
    if (entry.remainingSkips <= 0) {
      return false;
    }
    entry.remainingSkips--;
    return true;
  }

  /**
   * Returns true when this failure tripped the cool-down.
   */
  recordFailure(handler: string, collaborator: CollaboratorName): boolean {
    const entry = this.getEntry(handler, collaborator);
    entry.consecutiveFailures++;

    if (entry.consecutiveFailures >= this.config.failureThreshold) {
      entry.consecutiveFailures = 0;
      entry.remainingSkips = this.config.cooldownCycles;
      entry.trips++;
      return true;
    }
    return false;
  }

  recordSuccess(handler: string, collaborator: CollaboratorName): void {
    const entry = this.getEntry(handler, collaborator);
    entry.consecutiveFailures = 0;
  }

  isCoolingDown(handler: string, collaborator: CollaboratorName): boolean {
    return this.getEntry(handler, collaborator).remainingSkips > 0;
  }

  getStatus(handler: string, collaborator: CollaboratorName): CooldownStatus {
    const entry = this.getEntry(handler, collaborator);
    return { ...entry };
  }

  reset(): void {
    this.entries.clear();
  }
}
