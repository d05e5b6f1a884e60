/**
 * Shared collaborator calls for handlers: bounded generation and
 * caption-then-speech delivery.
 */

import type { ConversationEntry, StreamCollaborators } from '../../../domain/stream/collaborators.js';
import { CollaboratorTimeoutError, TransientCollaboratorError } from '../../../domain/stream/errors.js';
import { segmentUtterance, type SegmentationOptions } from '../text-segmenter.js';
import { callWithTimeout } from '../timeouts.js';

/**
 * Ask the generator for text. An empty completion counts as a transient
 * generator failure.
 */
export async function generateText(
  collaborators: StreamCollaborators,
  prompt: string,
  history: readonly ConversationEntry[],
  timeoutMs: number
): Promise<string> {
  const raw = await callWithTimeout(
    () => collaborators.generator.complete(prompt, history),
    timeoutMs,
    'generator.complete'
  );
  const text = raw.trim();
  if (!text) {
    throw new TransientCollaboratorError('generator', 'Generator returned an empty completion');
  }
  return text;
}

/**
 * Show the caption, then speak and wait for playback. With segmentation each
 * sentence is captioned and spoken in turn. Playback that runs past the
 * timeout is stopped and the remaining segments are dropped.
 */
export async function deliverUtterance(
  collaborators: StreamCollaborators,
  text: string,
  timeoutMs: number,
  segmentation?: SegmentationOptions
): Promise<void> {
  const segments = segmentation ? segmentUtterance(text, segmentation) : [];
  for (const segment of segments.length > 0 ? segments : [text]) {
    collaborators.captions.display(segment);
    try {
      await callWithTimeout(() => collaborators.speech.speak(segment), timeoutMs, 'speech.speak');
    } catch (error) {
      if (error instanceof CollaboratorTimeoutError) {
        collaborators.speech.stop();
      }
      throw error;
    }
  }
}
