/**
 * Memory Handler
 * Digests the conversation since the last digest into long-term memory.
 */

import type { StreamCollaborators } from '../../../domain/stream/collaborators.js';
import type { StreamEventOf } from '../../../domain/stream/events.js';
import { isTransientError, toErrorMessage } from '../../../domain/stream/errors.js';
import type { PromptComposer } from '../prompt-composer.js';
import type { StreamMemory } from '../stream-memory.js';
import { generateText } from './delivery.js';
import {
  DEFAULT_HANDLER_TIMEOUTS,
  noFollowUps,
  type HandlerContext,
  type HandlerOutcome,
  type HandlerTimeouts,
  type StreamHandler,
  type StreamLogger,
} from './types.js';

export interface MemoryHandlerOptions {
  collaborators: StreamCollaborators;
  composer: PromptComposer;
  memory: StreamMemory;
  timeouts?: HandlerTimeouts;
  logger?: StreamLogger;
}

export class MemoryHandler implements StreamHandler<'prepare_memory_digest'> {
  readonly name = 'memory';
  readonly kinds = ['prepare_memory_digest'] as const;

  private logger: StreamLogger;
  private timeouts: HandlerTimeouts;

  constructor(private options: MemoryHandlerOptions) {
    this.logger = options.logger ?? console;
    this.timeouts = options.timeouts ?? DEFAULT_HANDLER_TIMEOUTS;
  }

  async handle(_event: StreamEventOf<'prepare_memory_digest'>, ctx: HandlerContext): Promise<HandlerOutcome> {
    const { collaborators, composer, memory } = this.options;
    const history = ctx.history.snapshot();
    const entries = memory.undigested(history);

    if (entries.length === 0) {
      memory.recordDigestFailure(ctx.now());
      return noFollowUps();
    }

    let digest: string;
    try {
      digest = await generateText(
        collaborators,
        composer.composeMemoryDigest(entries),
        [],
        this.timeouts.generationTimeoutMs
      );
    } catch (error) {
      if (!isTransientError(error)) {
        throw error;
      }
      memory.recordDigestFailure(ctx.now());
      this.logger.warn('[MemoryHandler] Digest failed', { entries: entries.length, error: toErrorMessage(error) });
      return noFollowUps();
    }

    const compress = memory.recordDigest(digest, history.length, ctx.now());
    this.logger.info('[MemoryHandler] Memory updated', { entries: entries.length, blocks: memory.getStats().blocks });

    if (compress) {
      await this.compress(ctx);
    }
    return noFollowUps();
  }

  /**
   * A failed compression keeps the blocks; the next digest tries again.
   */
  private async compress(ctx: HandlerContext): Promise<void> {
    const { collaborators, composer, memory } = this.options;
    const blocks = memory.getBlocks().map((block) => block.text);

    try {
      const chapter = await generateText(
        collaborators,
        composer.composeMemoryCompression(blocks),
        [],
        this.timeouts.generationTimeoutMs
      );
      memory.replaceWithCompressed(chapter, ctx.now());
      this.logger.info('[MemoryHandler] Memory compressed', { blocks: blocks.length });
    } catch (error) {
      if (!isTransientError(error)) {
        throw error;
      }
      this.logger.warn('[MemoryHandler] Compression failed', { blocks: blocks.length, error: toErrorMessage(error) });
    }
  }
}
