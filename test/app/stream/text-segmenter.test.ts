import { describe, it, expect } from '@jest/globals';
import { segmentUtterance } from '../../../src/app/stream/text-segmenter.js';

describe('segmentUtterance', () => {
  it('splits at sentence ends and keeps the punctuation', () => {
    expect(segmentUtterance('Hello there! How are you today? I am fine.')).toEqual([
      'Hello there!',
      'How are you today?',
      'I am fine.',
    ]);
  });

  it('splits Japanese sentences', () => {
    expect(
      segmentUtterance('こんにちは。今日はいい天気ですね！散歩に行きたいな。', { maxLength: 60, minMergeLength: 3 })
    ).toEqual(['こんにちは。', '今日はいい天気ですね！', '散歩に行きたいな。']);
  });

  it('joins a short segment to the next one', () => {
    expect(segmentUtterance('Wow! That is a great question, let me think.')).toEqual([
      'Wow! That is a great question, let me think.',
    ]);
  });

  it('breaks long segments at the last space that fits', () => {
    expect(segmentUtterance('alpha beta gamma delta epsilon zeta', { maxLength: 20, minMergeLength: 5 })).toEqual([
      'alpha beta gamma',
      'delta epsilon zeta',
    ]);
  });

  it('forces a break when there is nowhere soft to cut', () => {
    expect(segmentUtterance('abcdefghijklmnopqrstuvwxyz', { maxLength: 10, minMergeLength: 5 })).toEqual([
      'abcdefghij',
      'klmnopqrst',
      'uvwxyz',
    ]);
  });

  it('keeps question marks inside URLs', () => {
    expect(segmentUtterance('Look at https://example.com/?q=1 now! Great.')).toEqual([
      'Look at https://example.com/?q=1 now!',
      'Great.',
    ]);
  });

  it('returns nothing for blank text', () => {
    expect(segmentUtterance(' \n ')).toEqual([]);
  });
});
