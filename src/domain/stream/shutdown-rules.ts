/**
 * Shutdown Phase Rules
 * Valid transitions of the graceful shutdown sequence.
 */

export type ShutdownPhase =
  | 'running'
  | 'farewell_preparing'
  | 'farewell_speaking'
  | 'summary_preparing'
  | 'terminated';

export const SHUTDOWN_TRANSITIONS: Record<ShutdownPhase, ShutdownPhase[]> = {
  running: ['farewell_preparing', 'terminated'],
  farewell_preparing: ['farewell_speaking', 'terminated'],
  farewell_speaking: ['summary_preparing', 'terminated'],
  summary_preparing: ['terminated'],
  terminated: [],
};

export function canTransitionShutdown(from: ShutdownPhase, to: ShutdownPhase): boolean {
  return SHUTDOWN_TRANSITIONS[from].includes(to);
}

export interface IShutdownTransitionEvent {
  from: ShutdownPhase;
  to: ShutdownPhase;
  trigger: string;
  timestamp: number;
}
