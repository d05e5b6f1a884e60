/**
 * Process State
 *
 * One instance per process, created at start and passed explicitly to the
 * controller, the mode manager and the handlers. Only the dispatch path
 * writes to it.
 */

import type { StreamMode } from './modes.js';
import type { ShutdownPhase } from './shutdown-rules.js';

export interface ProcessState {
  /** Flips true -> false once, at the end of the shutdown sequence */
  isRunning: boolean;
  currentMode: StreamMode;
  lastModeSwitchAt: number;
  /** Utterances produced in the current mode */
  modeTurns: number;
  commentsSinceLastMonologue: number;
  consecutiveSilenceTicks: number;
  shutdownPhase: ShutdownPhase;
  readonly startedAt: number;
}

export function createProcessState(
  now: number = Date.now(),
  initialMode: StreamMode = 'normal_monologue'
): ProcessState {
  return {
    isRunning: true,
    currentMode: initialMode,
    lastModeSwitchAt: now,
    modeTurns: 0,
    commentsSinceLastMonologue: 0,
    consecutiveSilenceTicks: 0,
    shutdownPhase: 'running',
    startedAt: now,
  };
}

export type ProcessStateView = Readonly<ProcessState>;

export interface ProcessStatusSummary {
  isRunning: boolean;
  currentMode: StreamMode;
  modeTurns: number;
  shutdownPhase: ShutdownPhase;
  uptimeMs: number;
}

export function summarizeState(state: ProcessStateView, now: number = Date.now()): ProcessStatusSummary {
  return {
    isRunning: state.isRunning,
    currentMode: state.currentMode,
    modeTurns: state.modeTurns,
    shutdownPhase: state.shutdownPhase,
    uptimeMs: Math.max(0, now - state.startedAt),
  };
}
