/**
 * Offline text generator for `--mock` runs and tests.
 */

import type { ConversationEntry, TextGenerator } from '../../domain/stream/collaborators.js';
import { TransientCollaboratorError } from '../../domain/stream/errors.js';
import { sleep } from '../../app/stream/timeouts.js';

export interface MockTextGeneratorOptions {
  /** Replies returned in order, cycling; defaults to an echo of the prompt's last line */
  responses?: string[];
  latencyMs?: number;
  /** Fail every Nth call with a transient error */
  failEvery?: number;
}

export class MockTextGenerator implements TextGenerator {
  private calls = 0;
  private prompts: string[] = [];

  constructor(private options: MockTextGeneratorOptions = {}) {}

  async complete(prompt: string, _history: readonly ConversationEntry[]): Promise<string> {
    this.calls++;
    this.prompts.push(prompt);

    if (this.options.latencyMs && this.options.latencyMs > 0) {
      await sleep(this.options.latencyMs);
    }

    const failEvery = this.options.failEvery ?? 0;
    if (failEvery > 0 && this.calls % failEvery === 0) {
      throw new TransientCollaboratorError('generator', `Mock failure on call ${this.calls}`);
    }

    const responses = this.options.responses ?? [];
    if (responses.length > 0) {
      return responses[(this.calls - 1) % responses.length];
    }

    const lines = prompt.trim().split('\n');
    return `Mock line ${this.calls}: ${lines[lines.length - 1]}`;
  }

  getCallCount(): number {
    return this.calls;
  }

  getPrompts(): string[] {
    return [...this.prompts];
  }
}
