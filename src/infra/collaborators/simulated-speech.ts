/**
 * Speech stand-in that "plays" text for a duration proportional to its length.
 */

import type { SpeechSynthesizer } from '../../domain/stream/collaborators.js';
import { sleep } from '../../app/stream/timeouts.js';

export interface SimulatedSpeechOptions {
  charsPerSecond: number;
  minDurationMs: number;
  logger?: Pick<Console, 'info'>;
}

export function estimateSpeechDurationMs(text: string, charsPerSecond: number, minDurationMs: number): number {
  const chars = [...text.trim()].length;
  return Math.max(minDurationMs, Math.round((chars / charsPerSecond) * 1000));
}

export class SimulatedSpeech implements SpeechSynthesizer {
  private current: AbortController | null = null;
  private spoken = 0;
  private interrupted = 0;

  constructor(private options: SimulatedSpeechOptions) {}

  async speak(text: string): Promise<void> {
    this.stop();
    const controller = new AbortController();
    this.current = controller;

    const durationMs = estimateSpeechDurationMs(text, this.options.charsPerSecond, this.options.minDurationMs);
    await sleep(durationMs, controller.signal);

    if (controller.signal.aborted) {
      this.interrupted++;
      this.options.logger?.info('[SimulatedSpeech] Playback interrupted');
    } else {
      this.spoken++;
    }
    if (this.current === controller) {
      this.current = null;
    }
  }

  stop(): void {
    this.current?.abort();
    this.current = null;
  }

  isSpeaking(): boolean {
    return this.current !== null;
  }

  getStats(): { spoken: number; interrupted: number } {
    return { spoken: this.spoken, interrupted: this.interrupted };
  }
}
