/**
 * Text Segmenter
 *
 * Splits a generated utterance into caption-sized sentences that are shown
 * and spoken one after another. URLs are never split.
 */

export interface SegmentationOptions {
  /** Segments longer than this are broken at a comma, space or closing bracket */
  maxLength: number;
  /** A segment shorter than this is joined to the one after it */
  minMergeLength: number;
}

export const DEFAULT_SEGMENTATION: SegmentationOptions = {
  maxLength: 60,
  minMergeLength: 10,
};

const URL_PATTERN = /https?:\/\/\S+/g;
const SENTENCE_BREAK = /(?<=[。！？!?])(?![。！？!?])|(?<=\.)\s+|\n+/;
const SOFT_BREAKS = [',', '、', ' ', ']', '』', '）'];

function placeholder(index: number): string {
  return `\uE000${index}\uE001`;
}

function breakLongSegment(segment: string, maxLength: number): string[] {
  const parts: string[] = [];
  let rest = segment;
  while (rest.length > maxLength) {
    let cut = -1;
    for (const mark of SOFT_BREAKS) {
      cut = Math.max(cut, rest.lastIndexOf(mark, maxLength - 1));
    }
    const end = cut > 0 ? cut + 1 : maxLength;
    const head = rest.slice(0, end).trim();
    if (head) {
      parts.push(head);
    }
    rest = rest.slice(end).trim();
  }
  if (rest) {
    parts.push(rest);
  }
  return parts;
}

function mergeShortSegments(segments: string[], options: SegmentationOptions): string[] {
  const merged: string[] = [];
  for (const segment of segments) {
    const last = merged.length > 0 ? merged[merged.length - 1] : undefined;
    if (last !== undefined && last.length < options.minMergeLength && last.length + segment.length < options.maxLength) {
      merged[merged.length - 1] = `${last} ${segment}`;
    } else {
      merged.push(segment);
    }
  }
  return merged;
}

export function segmentUtterance(text: string, options: SegmentationOptions = DEFAULT_SEGMENTATION): string[] {
  const urls: string[] = [];
  const masked = text.replace(URL_PATTERN, (url) => {
    urls.push(url);
    return placeholder(urls.length - 1);
  });

  const sentences = masked
    .split(SENTENCE_BREAK)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0)
    .flatMap((sentence) => breakLongSegment(sentence, options.maxLength));

  return mergeShortSegments(sentences, options).map((segment) =>
    urls.reduce((restored, url, index) => restored.replaceAll(placeholder(index), url), segment)
  );
}
