import { describe, it, expect } from '@jest/globals';
import { ModeManager } from '../../../src/app/stream/mode-manager.js';
import { createSeededRandom, createSequenceRandom } from '../../../src/app/stream/random.js';
import {
  DEFAULT_DWELL_POLICY,
  DEFAULT_MODE_WEIGHTS,
  type CommentActivity,
  type ModeWeights,
  type StreamMode,
} from '../../../src/domain/stream/modes.js';
import { createProcessState } from '../../../src/domain/stream/state.js';
import { StateInvariantError, ValidationError } from '../../../src/domain/stream/errors.js';
import { createRecordingLogger } from '../../helpers/stream-fixtures.js';

const quietChat: CommentActivity = { pendingComments: 0, recentComments: 0 };
const busyChat: CommentActivity = { pendingComments: 2, recentComments: 2 };

function createManager(randomValues: number[], weights: Partial<ModeWeights> = {}): ModeManager {
  return new ModeManager(
    { weights: { ...DEFAULT_MODE_WEIGHTS, ...weights }, dwell: { ...DEFAULT_DWELL_POLICY } },
    { random: createSequenceRandom(randomValues), logger: createRecordingLogger() }
  );
}

describe('ModeManager', () => {
  describe('eligibility', () => {
    it('offers only unconditional and quiet-chat modes on an empty stream', () => {
      const manager = createManager([0]);
      expect(manager.getEligibleModes(0, quietChat)).toEqual(['normal_monologue', 'chill_chat']);
    });

    it('swaps chill chat for viewer consultation when comments are pending', () => {
      const manager = createManager([0]);
      manager.setActiveTheme('Retro consoles');

      expect(manager.getEligibleModes(10, busyChat)).toEqual([
        'normal_monologue',
        'theme_continuation',
        'deep_dive',
        'viewer_consultation',
      ]);
    });

    it('drops modes whose weight is zero', () => {
      const manager = createManager([0], { deep_dive: 0 });
      expect(manager.getEligibleModes(10, quietChat)).toEqual(['normal_monologue', 'chill_chat']);
    });
  });

  describe('selectNextMode', () => {
    it('never picks an ineligible mode', () => {
      for (const roll of [0, 0.25, 0.5, 0.75, 0.99]) {
        const manager = createManager([roll]);
        const state = createProcessState(0);

        const mode = manager.selectNextMode(state, 0, quietChat, 1000);

        expect(mode).toBe('chill_chat');
        expect(state.currentMode).toBe('chill_chat');
      }
    });

    it('draws among the alternatives by weight', () => {
      const picks: StreamMode[] = [];
      for (const roll of [0, 0.35, 0.5]) {
        const manager = createManager([roll]);
        manager.setActiveTheme('Retro consoles');
        picks.push(manager.selectNextMode(createProcessState(0), 10, busyChat, 1000));
      }

      // theme 20, deep dive 5, viewer consultation 40 -> total 65
      expect(picks).toEqual(['theme_continuation', 'deep_dive', 'viewer_consultation']);
    });

    it('keeps the previous mode only when nothing else is eligible', () => {
      const manager = createManager([0.9], { chill_chat: 0 });
      const state = createProcessState(0);
      state.modeTurns = 4;

      expect(manager.selectNextMode(state, 0, quietChat, 5000)).toBe('normal_monologue');
      expect(state.modeTurns).toBe(0);
      expect(state.lastModeSwitchAt).toBe(5000);
    });

    it('treats an empty eligible set as a state invariant violation', () => {
      const manager = createManager([0], { normal_monologue: 0, chill_chat: 0 });
      expect(() => manager.selectNextMode(createProcessState(0), 0, quietChat)).toThrow(StateInvariantError);
    });

    it('repeats the same choices for the same seed', () => {
      const run = (): StreamMode[] => {
        const manager = new ModeManager(
          { weights: { ...DEFAULT_MODE_WEIGHTS }, dwell: { ...DEFAULT_DWELL_POLICY } },
          { random: createSeededRandom('stream-42'), logger: createRecordingLogger() }
        );
        manager.setActiveTheme('Retro consoles');
        const state = createProcessState(0);
        return [1, 2, 3, 4, 5, 6].map((step) => manager.selectNextMode(state, 10, busyChat, step));
      };

      expect(run()).toEqual(run());
    });
  });

  describe('shouldSwitch', () => {
    it('holds the mode before the minimum dwell', () => {
      const manager = createManager([0]);
      const state = createProcessState(0);
      state.modeTurns = 1;

      expect(manager.shouldSwitch(state, 0, quietChat, 120_000)).toBe(false);
    });

    it('forces a switch at the maximum dwell', () => {
      const manager = createManager([0.99]);
      const state = createProcessState(0);
      state.modeTurns = 5;

      expect(manager.shouldSwitch(state, 0, quietChat, 1)).toBe(true);
    });

    it('switches with 20% probability right after the minimum dwell', () => {
      const state = createProcessState(0);
      state.modeTurns = 2;

      expect(createManager([0.1]).shouldSwitch(state, 0, quietChat, 60_000)).toBe(true);
      expect(createManager([0.3]).shouldSwitch(state, 0, quietChat, 60_000)).toBe(false);
    });

    it('waits for the wall-clock dwell even after enough turns', () => {
      const state = createProcessState(0);
      state.modeTurns = 3;

      expect(createManager([0]).shouldSwitch(state, 0, quietChat, 59_999)).toBe(false);
    });

    it('leaves a mode that lost its eligibility', () => {
      const state = createProcessState(0, 'viewer_consultation');
      expect(createManager([0.99]).shouldSwitch(state, 0, quietChat, 1)).toBe(true);
    });
  });

  describe('themes and forced modes', () => {
    it('rejects an empty theme', () => {
      expect(() => createManager([0]).setActiveTheme('   ')).toThrow(ValidationError);
    });

    it('refuses to force an ineligible mode', () => {
      const manager = createManager([0]);
      expect(() => manager.forceMode(createProcessState(0), 'theme_continuation', 0, quietChat)).toThrow(
        ValidationError
      );
    });

    it('records forced switches and turns in the statistics', () => {
      const manager = createManager([0]);
      const state = createProcessState(0);
      manager.setActiveTheme('Retro consoles');

      manager.forceMode(state, 'theme_continuation', 0, quietChat, 10);
      manager.recordTurn(state);
      manager.recordTurn(state);

      const stats = manager.getStatistics(state);
      expect(stats.currentMode).toBe('theme_continuation');
      expect(stats.currentTurns).toBe(2);
      expect(stats.totalSwitches).toBe(1);
      expect(stats.turnsByMode.theme_continuation).toBe(2);
      expect(manager.getSwitchHistory()).toEqual([
        { from: 'normal_monologue', to: 'theme_continuation', turns: 0, timestamp: 10, forced: true },
      ]);
    });
  });
});
