/**
 * Mode Manager
 *
 * Sole writer of ProcessState.currentMode. Decides when the current mode has
 * run its course and picks the next one by weighted random choice among the
 * modes whose eligibility predicate holds.
 */

import type { ConversationEntry } from '../../domain/stream/collaborators.js';
import type {
  CommentActivity,
  ModeDwellPolicy,
  ModeEligibilityContext,
  ModeSwitchRecord,
  ModeWeights,
  StreamMode,
} from '../../domain/stream/modes.js';
import {
  DEFAULT_DWELL_POLICY,
  DEFAULT_MODE_WEIGHTS,
  STREAM_MODES,
  isModeEligible,
} from '../../domain/stream/modes.js';
import type { ProcessState } from '../../domain/stream/state.js';
import { StateInvariantError, ValidationError } from '../../domain/stream/errors.js';
import { defaultRandom, type RandomSource } from './random.js';

export interface ModeManagerConfig {
  weights: ModeWeights;
  dwell: ModeDwellPolicy;
}

export interface ModeManagerOptions {
  random?: RandomSource;
  logger?: Pick<Console, 'info' | 'warn'>;
  historyLimit?: number;
}

export interface ModeStatistics {
  currentMode: StreamMode;
  currentTurns: number;
  totalSwitches: number;
  turnsByMode: Record<StreamMode, number>;
  recentModes: StreamMode[];
}

type HistoryInput = readonly ConversationEntry[] | number;

export class ModeManager {
  private random: RandomSource;
  private logger: Pick<Console, 'info' | 'warn'>;
  private activeTheme: string | null = null;
  private switchHistory: ModeSwitchRecord[] = [];
  private totalSwitches = 0;
  private turnsByMode: Record<StreamMode, number> = {
    normal_monologue: 0,
    theme_continuation: 0,
    deep_dive: 0,
    chill_chat: 0,
    viewer_consultation: 0,
  };
  private historyLimit: number;

  constructor(
    private config: ModeManagerConfig = { weights: DEFAULT_MODE_WEIGHTS, dwell: DEFAULT_DWELL_POLICY },
    options: ModeManagerOptions = {}
  ) {
    this.random = options.random ?? defaultRandom;
    this.logger = options.logger ?? console;
    this.historyLimit = options.historyLimit ?? 50;
  }

  // ==========================================================================
  // Theme
  // ==========================================================================

  setActiveTheme(themeContent: string): void {
    const trimmed = themeContent.trim();
    if (!trimmed) {
      throw new ValidationError('Theme content is empty');
    }
    this.activeTheme = trimmed;
  }

  clearTheme(): void {
    this.activeTheme = null;
  }

  getActiveTheme(): string | null {
    return this.activeTheme;
  }

  // ==========================================================================
  // Eligibility
  // ==========================================================================

  private buildContext(history: HistoryInput, activity: CommentActivity): ModeEligibilityContext {
    return {
      activity,
      historySize: typeof history === 'number' ? history : history.length,
      hasActiveTheme: this.activeTheme !== null,
      policy: this.config.dwell,
    };
  }

  /**
   * Modes that may be selected right now: eligibility predicate holds and
   * the configured weight is positive.
   */
  getEligibleModes(history: HistoryInput, activity: CommentActivity): StreamMode[] {
    const ctx = this.buildContext(history, activity);
    return STREAM_MODES.filter(
      (mode) => isModeEligible(mode, ctx) && this.config.weights[mode] > 0
    );
  }

  isEligible(mode: StreamMode, history: HistoryInput, activity: CommentActivity): boolean {
    return this.getEligibleModes(history, activity).includes(mode);
  }

  // ==========================================================================
  // Switching
  // ==========================================================================

  /**
   * Whether the current mode should give way. A mode that lost its
   * eligibility always yields; otherwise the dwell policy applies and the
   * switch probability climbs from 20% to 80% between min and max turns.
   */
  shouldSwitch(
    state: ProcessState,
    history: HistoryInput,
    activity: CommentActivity,
    now: number = Date.now()
  ): boolean {
    if (!this.isEligible(state.currentMode, history, activity)) {
      return true;
    }

    const { minDwellTurns, maxDwellTurns, minDwellMs } = this.config.dwell;

    if (state.modeTurns >= maxDwellTurns) {
      return true;
    }

    if (state.modeTurns < minDwellTurns || now - state.lastModeSwitchAt < minDwellMs) {
      return false;
    }

    if (maxDwellTurns <= minDwellTurns) {
      return true;
    }

    const progress = (state.modeTurns - minDwellTurns) / (maxDwellTurns - minDwellTurns);
    const switchProbability = 0.2 + progress * 0.6;
    return this.random() < switchProbability;
  }

  /**
   * Pick the next mode and record it on the state. The previous mode is
   * left out unless nothing else is eligible.
   */
  selectNextMode(
    state: ProcessState,
    history: HistoryInput,
    activity: CommentActivity,
    now: number = Date.now()
  ): StreamMode {
    const eligible = this.getEligibleModes(history, activity);
    if (eligible.length === 0) {
      throw new StateInvariantError('No eligible stream mode', {
        previousMode: state.currentMode,
        pendingComments: activity.pendingComments,
      });
    }

    const alternatives = eligible.filter((mode) => mode !== state.currentMode);
    const candidates = alternatives.length > 0 ? alternatives : eligible;

    const total = candidates.reduce((sum, mode) => sum + this.config.weights[mode], 0);
    if (!(total > 0)) {
      throw new StateInvariantError('Mode weights do not sum to a positive total', {
        candidates,
      });
    }

    const roll = this.random() * total;
    let cumulative = 0;
    let chosen = candidates[candidates.length - 1];
    for (const mode of candidates) {
      cumulative += this.config.weights[mode];
      if (roll < cumulative) {
        chosen = mode;
        break;
      }
    }

    this.applyMode(state, chosen, now, false);
    return chosen;
  }

  /**
   * Switch to a specific mode, bypassing the weighted draw but not the
   * eligibility rules.
   */
  forceMode(
    state: ProcessState,
    mode: StreamMode,
    history: HistoryInput,
    activity: CommentActivity,
    now: number = Date.now()
  ): void {
    if (!this.isEligible(mode, history, activity)) {
      throw new ValidationError(`Mode '${mode}' is not eligible`);
    }
    this.applyMode(state, mode, now, true);
  }

  recordTurn(state: ProcessState): void {
    state.modeTurns++;
    this.turnsByMode[state.currentMode]++;
  }

  private applyMode(state: ProcessState, mode: StreamMode, now: number, forced: boolean): void {
    const record: ModeSwitchRecord = {
      from: state.currentMode,
      to: mode,
      turns: state.modeTurns,
      timestamp: now,
      forced,
    };

    this.switchHistory.push(record);
    this.totalSwitches++;
    if (this.switchHistory.length > this.historyLimit) {
      this.switchHistory.shift();
    }

    state.currentMode = mode;
    state.lastModeSwitchAt = now;
    state.modeTurns = 0;

    this.logger.info('[ModeManager] Mode switched', {
      from: record.from,
      to: record.to,
      forced,
    });
  }

  getSwitchHistory(): ModeSwitchRecord[] {
    return [...this.switchHistory];
  }

  getStatistics(state: ProcessState): ModeStatistics {
    return {
      currentMode: state.currentMode,
      currentTurns: state.modeTurns,
      totalSwitches: this.totalSwitches,
      turnsByMode: { ...this.turnsByMode },
      recentModes: this.switchHistory.slice(-5).map((record) => record.to),
    };
  }
}
