import type {
  CaptionDisplay,
  ConversationEntry,
  SpeechSynthesizer,
  StreamCollaborators,
  TextGenerator,
} from '../../src/domain/stream/collaborators.js';
import { createProcessState } from '../../src/domain/stream/state.js';
import { ConversationHistory } from '../../src/app/stream/conversation-history.js';
import { ModeManager } from '../../src/app/stream/mode-manager.js';
import { PendingComments } from '../../src/app/stream/pending-comments.js';
import type { PromptTemplateName, PromptTemplateSource } from '../../src/app/stream/prompt-composer.js';
import { createSequenceRandom } from '../../src/app/stream/random.js';
import type { HandlerContext, StreamLogger } from '../../src/app/stream/handlers/types.js';
import { DEFAULT_DWELL_POLICY, DEFAULT_MODE_WEIGHTS } from '../../src/domain/stream/modes.js';

export interface LogRecord {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context: unknown;
}

export function createRecordingLogger(): StreamLogger & { records: LogRecord[] } {
  const records: LogRecord[] = [];
  const record =
    (level: LogRecord['level']) =>
    (message?: unknown, context?: unknown): void => {
      records.push({ level, message: String(message), context });
    };
  return {
    records,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

/**
 * Templates whose rendered text is easy to assert on: `<name>|{{placeholders}}`.
 */
export class StaticTemplates implements PromptTemplateSource {
  constructor(private overrides: Partial<Record<PromptTemplateName, string>> = {}) {}

  load(name: PromptTemplateName): string {
    const override = this.overrides[name];
    if (override !== undefined) {
      return override;
    }
    return name === 'persona' ? '' : `${name}|{{history}}|{{comments}}`;
  }
}

/**
 * Returns scripted replies in order; an Error entry is thrown instead.
 * After the script runs out it answers `reply N`.
 */
export class ScriptedGenerator implements TextGenerator {
  readonly prompts: string[] = [];
  private calls = 0;

  constructor(private script: Array<string | Error> = []) {}

  async complete(prompt: string, _history: readonly ConversationEntry[]): Promise<string> {
    this.calls++;
    this.prompts.push(prompt);
    const next = this.script.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? `reply ${this.calls}`;
  }

  getCallCount(): number {
    return this.calls;
  }
}

export class FakeSpeech implements SpeechSynthesizer {
  readonly spoken: string[] = [];
  stopCalls = 0;
  failWith: Error | null = null;
  /** Never finish playback until stop() */
  hang = false;
  private release: (() => void) | null = null;

  async speak(text: string): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.spoken.push(text);
    if (this.hang) {
      await new Promise<void>((resolve) => {
        this.release = () => resolve();
      });
    }
  }

  stop(): void {
    this.stopCalls++;
    this.release?.();
    this.release = null;
  }
}

export class RecordingCaptions implements CaptionDisplay {
  readonly lines: string[] = [];

  display(text: string): void {
    this.lines.push(text);
  }
}

export interface FakeCollaborators extends StreamCollaborators {
  generator: ScriptedGenerator;
  speech: FakeSpeech;
  captions: RecordingCaptions;
}

export function createFakeCollaborators(script: Array<string | Error> = []): FakeCollaborators {
  return {
    generator: new ScriptedGenerator(script),
    speech: new FakeSpeech(),
    captions: new RecordingCaptions(),
  };
}

export function createHandlerContext(
  options: { random?: readonly number[]; now?: number; logger?: StreamLogger } = {}
): HandlerContext {
  const now = options.now ?? 1_000;
  return {
    state: createProcessState(0),
    history: new ConversationHistory(),
    modes: new ModeManager(
      { weights: { ...DEFAULT_MODE_WEIGHTS }, dwell: { ...DEFAULT_DWELL_POLICY } },
      { random: createSequenceRandom(options.random ?? [0]), logger: options.logger ?? createRecordingLogger() }
    ),
    pending: new PendingComments(),
    now: () => now,
  };
}
