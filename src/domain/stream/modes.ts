/**
 * Stream Modes
 * Content-generation behaviors and the inputs used to pick between them.
 */

export type StreamMode =
  | 'normal_monologue'
  | 'theme_continuation'
  | 'deep_dive'
  | 'chill_chat'
  | 'viewer_consultation';

export const STREAM_MODES: readonly StreamMode[] = [
  'normal_monologue',
  'theme_continuation',
  'deep_dive',
  'chill_chat',
  'viewer_consultation',
];

export type ModeWeights = Record<StreamMode, number>;

export const DEFAULT_MODE_WEIGHTS: ModeWeights = {
  normal_monologue: 60,
  theme_continuation: 20,
  deep_dive: 5,
  chill_chat: 60,
  viewer_consultation: 40,
};

export interface ModeDwellPolicy {
  /** Utterances a mode must be held before a switch is considered */
  minDwellTurns: number;
  /** Utterances after which a switch is forced */
  maxDwellTurns: number;
  /** Wall-clock minimum between switches */
  minDwellMs: number;
  /** History entries required before deep dives are eligible */
  deepDiveMinHistory: number;
}

export const DEFAULT_DWELL_POLICY: ModeDwellPolicy = {
  minDwellTurns: 2,
  maxDwellTurns: 5,
  minDwellMs: 60_000,
  deepDiveMinHistory: 4,
};

/**
 * Snapshot of chat activity the mode manager consults.
 */
export interface CommentActivity {
  pendingComments: number;
  /** Comments accepted since the last monologue */
  recentComments: number;
}

export interface ModeEligibilityContext {
  activity: CommentActivity;
  historySize: number;
  hasActiveTheme: boolean;
  policy: ModeDwellPolicy;
}

export type ModeEligibilityPredicate = (ctx: ModeEligibilityContext) => boolean;

export const MODE_ELIGIBILITY: Record<StreamMode, ModeEligibilityPredicate> = {
  normal_monologue: () => true,
  theme_continuation: (ctx) => ctx.hasActiveTheme,
  deep_dive: (ctx) => ctx.historySize >= ctx.policy.deepDiveMinHistory,
  chill_chat: (ctx) => ctx.activity.pendingComments === 0,
  viewer_consultation: (ctx) => ctx.activity.pendingComments > 0,
};

export function isModeEligible(mode: StreamMode, ctx: ModeEligibilityContext): boolean {
  return MODE_ELIGIBILITY[mode](ctx);
}

export function isStreamMode(value: unknown): value is StreamMode {
  return typeof value === 'string' && (STREAM_MODES as readonly string[]).includes(value);
}

export interface ModeSwitchRecord {
  from: StreamMode;
  to: StreamMode;
  turns: number;
  timestamp: number;
  forced: boolean;
}
