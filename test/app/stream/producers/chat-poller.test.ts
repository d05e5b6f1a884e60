import { describe, it, expect } from '@jest/globals';
import { EventQueue } from '../../../../src/app/stream/event-queue.js';
import { ChatPoller } from '../../../../src/app/stream/producers/chat-poller.js';
import type { LiveChatSource } from '../../../../src/domain/stream/collaborators.js';
import type { RawComment } from '../../../../src/domain/stream/events.js';

const quiet = { info: () => undefined, warn: () => undefined, error: () => undefined };

class FlakySource implements LiveChatSource {
  calls = 0;

  async *comments(_signal: AbortSignal): AsyncIterable<RawComment> {
    this.calls++;
    if (this.calls === 1) {
      yield { author: 'alice', text: 'first', timestamp: 1 };
      throw new Error('connection reset');
    }
    yield { author: 'bob', text: 'second', timestamp: 2 };
  }
}

class WaitingSource implements LiveChatSource {
  async *comments(signal: AbortSignal): AsyncIterable<RawComment> {
    await new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
  }
}

describe('ChatPoller', () => {
  it('re-subscribes after the source fails', async () => {
    const queue = new EventQueue({ logger: quiet });
    const source = new FlakySource();
    const poller = new ChatPoller({ queue, source, restartDelayMs: 1, logger: quiet });

    poller.start();
    await poller.finished();

    const comments = queue.drain().map((event) => (event.kind === 'comment_received' ? event.payload.comment.text : ''));
    expect(comments).toEqual(['first', 'second']);
    expect(poller.getStats()).toEqual({ received: 2, failures: 1, subscriptions: 2 });
  });

  it('stops waiting on the source when stopped', async () => {
    const queue = new EventQueue({ logger: quiet });
    const poller = new ChatPoller({ queue, source: new WaitingSource(), restartDelayMs: 1, logger: quiet });

    poller.start();
    expect(poller.isRunning()).toBe(true);
    await poller.stop();

    expect(poller.isRunning()).toBe(false);
    expect(queue.size()).toBe(0);
  });
});
