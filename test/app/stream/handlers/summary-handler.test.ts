import { describe, it, expect } from '@jest/globals';
import {
  SummaryHandler,
  buildDigest,
  extractTopics,
  pickNotableComments,
} from '../../../../src/app/stream/handlers/summary-handler.js';
import { PromptComposer } from '../../../../src/app/stream/prompt-composer.js';
import { SummaryTaskTracker } from '../../../../src/app/stream/summary-tracker.js';
import type { ConversationEntry } from '../../../../src/domain/stream/collaborators.js';
import { createEvent } from '../../../../src/domain/stream/events.js';
import { TransientCollaboratorError } from '../../../../src/domain/stream/errors.js';
import type { StreamSummary, SummaryStore } from '../../../../src/domain/stream/summary.js';
import {
  StaticTemplates,
  createFakeCollaborators,
  createHandlerContext,
  createRecordingLogger,
  type FakeCollaborators,
} from '../../../helpers/stream-fixtures.js';

class MemorySummaryStore implements SummaryStore {
  readonly saved: StreamSummary[] = [];

  async save(summary: StreamSummary): Promise<void> {
    this.saved.push(summary);
  }
}

function createHandler(collaborators: FakeCollaborators, tracker: SummaryTaskTracker, store: SummaryStore) {
  return new SummaryHandler({
    collaborators,
    composer: new PromptComposer(new StaticTemplates({ 'daily-summary': 'Day {{date}} ({{duration}} min)' })),
    tracker,
    store,
    logger: createRecordingLogger(),
  });
}

const entries: ConversationEntry[] = [
  { speaker: 'streamer', text: 'Retro consoles are great. Really.', kind: 'monologue', timestamp: 100 },
  { speaker: 'viewer', author: 'alice', text: 'hello', kind: 'comment', timestamp: 200 },
  { speaker: 'streamer', text: 'Retro consoles are great! Again.', kind: 'monologue', timestamp: 300 },
];

describe('summary helpers', () => {
  it('takes the first sentence of each distinct monologue as a topic', () => {
    expect(extractTopics(entries)).toEqual(['Retro consoles are great']);
  });

  it('truncates long topics', () => {
    const long = 'a'.repeat(45);
    expect(extractTopics([{ speaker: 'streamer', text: long, kind: 'monologue', timestamp: 1 }])).toEqual([
      `${'a'.repeat(40)}…`,
    ]);
  });

  it('lists viewer comments as author and text', () => {
    expect(pickNotableComments(entries)).toEqual(['alice: hello']);
  });

  it('renders a digest with topics and comments', () => {
    expect(
      buildDigest({
        taskId: 't',
        kind: 'stream',
        topics: ['One', 'Two'],
        notableComments: ['alice: hi'],
        durationMinutes: 12,
        entryCount: 4,
        createdAt: 0,
      })
    ).toBe('Stream summary: 4 entries over 12 minutes.\nTopics: One / Two\nComments: alice: hi');
  });
});

describe('SummaryHandler', () => {
  it('produces a digest for an empty stream and completes the task', async () => {
    const tracker = new SummaryTaskTracker();
    const store = new MemorySummaryStore();
    const collaborators = createFakeCollaborators();
    const ctx = createHandlerContext({ now: 125_000 });

    const event = createEvent('prepare_stream_summary', { endingReason: 'marker' }, { taskId: 'task-1' });
    const outcome = await createHandler(collaborators, tracker, store).handle(event, ctx);

    expect(outcome.followUps).toEqual([]);
    expect(collaborators.generator.getCallCount()).toBe(0);
    expect(store.saved).toEqual([
      {
        taskId: 'task-1',
        kind: 'stream',
        topics: [],
        notableComments: [],
        durationMinutes: 2,
        entryCount: 0,
        createdAt: 125_000,
        endingReason: 'marker',
        text: 'Stream summary: 0 entries over 2 minutes.',
      },
    ]);
    expect(tracker.get('task-1')?.status).toBe('completed');
  });

  it('asks the generator to write the summary when there is history', async () => {
    const tracker = new SummaryTaskTracker();
    const store = new MemorySummaryStore();
    const collaborators = createFakeCollaborators(['A relaxed stream about consoles.']);
    const ctx = createHandlerContext();
    for (const entry of entries) {
      ctx.history.append(entry);
    }

    const event = createEvent('prepare_stream_summary', { endingReason: 'normal' }, { taskId: 'task-2' });
    await createHandler(collaborators, tracker, store).handle(event, ctx);

    expect(store.saved[0].text).toBe('A relaxed stream about consoles.');
    expect(store.saved[0].topics).toEqual(['Retro consoles are great']);
    expect(store.saved[0].entryCount).toBe(3);
  });

  it('falls back to the digest when the generator is unavailable', async () => {
    const tracker = new SummaryTaskTracker();
    const store = new MemorySummaryStore();
    const collaborators = createFakeCollaborators([new TransientCollaboratorError('generator', 'down')]);
    const ctx = createHandlerContext();
    for (const entry of entries) {
      ctx.history.append(entry);
    }

    const event = createEvent('prepare_stream_summary', { endingReason: 'signal' }, { taskId: 'task-3' });
    await createHandler(collaborators, tracker, store).handle(event, ctx);

    expect(store.saved[0].text).toBe(
      'Stream summary: 3 entries over 0 minutes.\nTopics: Retro consoles are great\nComments: alice: hello'
    );
    expect(tracker.get('task-3')?.summary?.text).toBe(store.saved[0].text);
  });

  it('summarizes only the entries of the requested day', async () => {
    const tracker = new SummaryTaskTracker();
    const store = new MemorySummaryStore();
    const collaborators = createFakeCollaborators(['Daily recap']);
    const ctx = createHandlerContext();
    const at = (iso: string) => new Date(iso).getTime();
    ctx.history.append({ speaker: 'streamer', text: 'Late night.', kind: 'monologue', timestamp: at('2026-03-09T23:30:00') });
    ctx.history.append({ speaker: 'streamer', text: 'Morning.', kind: 'monologue', timestamp: at('2026-03-10T10:00:00') });
    ctx.history.append({ speaker: 'streamer', text: 'Noon.', kind: 'monologue', timestamp: at('2026-03-10T10:30:00') });

    const event = createEvent('prepare_daily_summary', { date: '2026-03-10' }, { taskId: 'day-1' });
    await createHandler(collaborators, tracker, store).handle(event, ctx);

    expect(collaborators.generator.prompts).toEqual(['Day 2026-03-10 (30 min)']);
    expect(store.saved[0]).toMatchObject({
      kind: 'daily',
      date: '2026-03-10',
      entryCount: 2,
      durationMinutes: 30,
      topics: ['Morning', 'Noon'],
      text: 'Daily recap',
    });
  });

  it('cuts the day at midnight in the requested zone', async () => {
    const tracker = new SummaryTaskTracker();
    const store = new MemorySummaryStore();
    const collaborators = createFakeCollaborators(['Tokyo recap']);
    const ctx = createHandlerContext();
    ctx.history.append({ speaker: 'streamer', text: 'Before midnight.', kind: 'monologue', timestamp: Date.UTC(2026, 2, 10, 14, 0) });
    ctx.history.append({ speaker: 'streamer', text: 'After midnight.', kind: 'monologue', timestamp: Date.UTC(2026, 2, 10, 16, 0) });
    ctx.history.append({ speaker: 'streamer', text: 'Late evening.', kind: 'monologue', timestamp: Date.UTC(2026, 2, 11, 14, 30) });
    ctx.history.append({ speaker: 'streamer', text: 'Next day.', kind: 'monologue', timestamp: Date.UTC(2026, 2, 11, 15, 30) });

    const event = createEvent(
      'prepare_daily_summary',
      { date: '2026-03-11', timezone: 'Asia/Tokyo' },
      { taskId: 'day-tokyo' }
    );
    await createHandler(collaborators, tracker, store).handle(event, ctx);

    expect(collaborators.generator.prompts).toEqual(['Day 2026-03-11 (1350 min)']);
    expect(store.saved[0]).toMatchObject({
      date: '2026-03-11',
      entryCount: 2,
      topics: ['After midnight', 'Late evening'],
    });
  });

  it('marks the task failed when saving throws', async () => {
    const tracker = new SummaryTaskTracker();
    const failingStore: SummaryStore = {
      save: async () => {
        throw new Error('disk full');
      },
    };
    const ctx = createHandlerContext();

    const event = createEvent('prepare_stream_summary', { endingReason: 'normal' }, { taskId: 'task-4' });
    await expect(createHandler(createFakeCollaborators(), tracker, failingStore).handle(event, ctx)).rejects.toThrow(
      'disk full'
    );
    expect(tracker.get('task-4')).toMatchObject({ status: 'failed', error: 'disk full' });
  });
});

describe('SummaryTaskTracker', () => {
  it('resolves waiters when the task completes', async () => {
    const tracker = new SummaryTaskTracker();
    tracker.start('t1', 'stream', 0);
    const waiting = tracker.waitFor('t1', 0);

    tracker.fail('t1', 'generator down', 5);

    await expect(waiting).resolves.toMatchObject({ status: 'failed', finishedAt: 5 });
  });

  it('refuses duplicate and unknown task ids', async () => {
    const tracker = new SummaryTaskTracker();
    tracker.start('t1', 'daily', 0);

    expect(() => tracker.start('t1', 'daily', 1)).toThrow('Summary task already started: t1');
    await expect(tracker.waitFor('nope', 10)).rejects.toThrow('Unknown summary task: nope');
  });
});
