/**
 * External collaborator contracts.
 * The control core talks to generation, speech, captions and chat only
 * through these interfaces.
 */

import type { RawComment } from './events.js';

export type Speaker = 'streamer' | 'viewer' | 'system';

export type ConversationEntryKind =
  | 'greeting'
  | 'monologue'
  | 'comment'
  | 'comment_response'
  | 'farewell';

export interface ConversationEntry {
  readonly speaker: Speaker;
  /** Viewer display name, when speaker is 'viewer' */
  readonly author?: string;
  readonly text: string;
  readonly timestamp: number;
  readonly kind: ConversationEntryKind;
  readonly mode?: string;
}

export interface TextGenerator {
  complete(prompt: string, history: readonly ConversationEntry[]): Promise<string>;
}

export interface SpeechSynthesizer {
  /** Resolves when playback has finished */
  speak(text: string): Promise<void>;
  /** Aborts in-flight playback immediately */
  stop(): void;
}

export interface CaptionDisplay {
  display(text: string): void;
}

export interface LiveChatSource {
  /**
   * Lazily yields comments until the signal aborts. May be called again
   * after a failure to resume.
   */
  comments(signal: AbortSignal): AsyncIterable<RawComment>;
}

export interface StreamCollaborators {
  generator: TextGenerator;
  speech: SpeechSynthesizer;
  captions: CaptionDisplay;
}

export type CollaboratorName = 'generator' | 'speech' | 'captions' | 'chat';
