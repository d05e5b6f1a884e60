import { describe, it, expect } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConsoleCaptions } from '../../../src/infra/collaborators/console-captions.js';
import { JsonlChatSource, parseChatScript } from '../../../src/infra/collaborators/jsonl-chat-source.js';
import { MockTextGenerator } from '../../../src/infra/collaborators/mock-text-generator.js';
import { SimulatedSpeech, estimateSpeechDurationMs } from '../../../src/infra/collaborators/simulated-speech.js';
import { TransientCollaboratorError } from '../../../src/domain/stream/errors.js';
import type { RawComment } from '../../../src/domain/stream/events.js';

describe('MockTextGenerator', () => {
  it('cycles through scripted responses', async () => {
    const generator = new MockTextGenerator({ responses: ['one', 'two'] });

    const replies = [
      await generator.complete('a', []),
      await generator.complete('b', []),
      await generator.complete('c', []),
    ];

    expect(replies).toEqual(['one', 'two', 'one']);
    expect(generator.getPrompts()).toEqual(['a', 'b', 'c']);
  });

  it('echoes the last prompt line and fails on schedule', async () => {
    const generator = new MockTextGenerator({ failEvery: 2 });

    await expect(generator.complete('persona\n\nTalk about tea', [])).resolves.toBe('Mock line 1: Talk about tea');
    await expect(generator.complete('again', [])).rejects.toBeInstanceOf(TransientCollaboratorError);
    expect(generator.getCallCount()).toBe(2);
  });
});

describe('parseChatScript', () => {
  it('reads comments and reports bad lines', () => {
    const invalid: Array<[number, string]> = [];
    const script = parseChatScript(
      [
        '{"author":"alice","text":"hi","delayMs":100}',
        '',
        'not json',
        '{"author":"bob"}',
        '{"id":"c-4","author":"carol","text":"yo"}',
      ].join('\n'),
      2000,
      (lineNumber, reason) => invalid.push([lineNumber, reason])
    );

    expect(script).toEqual([
      { author: 'alice', text: 'hi', delayMs: 100 },
      { id: 'c-4', author: 'carol', text: 'yo', delayMs: 2000 },
    ]);
    expect(invalid).toEqual([
      [3, 'not valid JSON'],
      [4, 'author and text must be strings'],
    ]);
  });
});

describe('JsonlChatSource', () => {
  it('resumes after the last delivered comment', async () => {
    const filePath = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'streamer-chat-')), 'chat.jsonl');
    fs.writeFileSync(
      filePath,
      ['{"author":"a","text":"one"}', '{"author":"b","text":"two"}', '{"author":"c","text":"three"}'].join('\n')
    );
    const source = new JsonlChatSource({ filePath, defaultDelayMs: 0, now: () => 42 });
    const signal = new AbortController().signal;

    const first: RawComment[] = [];
    for await (const comment of source.comments(signal)) {
      first.push(comment);
      break;
    }
    const rest: RawComment[] = [];
    for await (const comment of source.comments(signal)) {
      rest.push(comment);
    }

    expect(first).toEqual([{ author: 'a', text: 'one', timestamp: 42 }]);
    expect(rest.map((comment) => comment.text)).toEqual(['two', 'three']);
    expect(source.getDeliveredCount()).toBe(3);
  });
});

describe('SimulatedSpeech', () => {
  it('scales playback time with the text length', () => {
    expect(estimateSpeechDurationMs('hello', 10, 100)).toBe(500);
    expect(estimateSpeechDurationMs('hi', 10, 500)).toBe(500);
  });

  it('stops playback immediately', async () => {
    const speech = new SimulatedSpeech({ charsPerSecond: 1, minDurationMs: 0 });

    const playing = speech.speak('a fairly long line');
    expect(speech.isSpeaking()).toBe(true);
    speech.stop();
    await playing;

    expect(speech.isSpeaking()).toBe(false);
    expect(speech.getStats()).toEqual({ spoken: 0, interrupted: 1 });
  });
});

describe('ConsoleCaptions', () => {
  it('writes one line per caption', () => {
    const lines: string[] = [];
    const captions = new ConsoleCaptions((line) => lines.push(line), () => new Date(2026, 2, 10, 21, 5, 9));

    captions.display('Hello there');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('21:05:09');
    expect(lines[0]).toContain('Hello there');
    expect(captions.getLastCaption()).toBe('Hello there');
  });
});
