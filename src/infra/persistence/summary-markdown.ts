import * as fs from 'fs';
import * as path from 'path';
import type { StreamSummary, SummaryStore } from '../../domain/stream/summary.js';

function stamp(timestampMs: number): string {
  return new Date(timestampMs).toISOString().replace(/[-:]/g, '').replace(/\.\d+Z$/, 'Z');
}

export function renderSummaryMarkdown(summary: StreamSummary): string {
  const title = summary.kind === 'daily' ? `# Daily summary ${summary.date ?? ''}`.trimEnd() : '# Stream summary';
  const lines = [
    title,
    '',
    `- Created: ${new Date(summary.createdAt).toISOString()}`,
    `- Duration: ${summary.durationMinutes} min`,
    `- Entries: ${summary.entryCount}`,
  ];
  if (summary.endingReason) {
    lines.push(`- Ended by: ${summary.endingReason}`);
  }

  lines.push('', '## Summary', '', summary.text);

  if (summary.topics.length > 0) {
    lines.push('', '## Topics', '', ...summary.topics.map((topic) => `- ${topic}`));
  }
  if (summary.notableComments.length > 0) {
    lines.push('', '## Comments', '', ...summary.notableComments.map((comment) => `- ${comment}`));
  }
  return `${lines.join('\n')}\n`;
}

export function summaryFileName(summary: StreamSummary): string {
  return `${summary.kind}-summary-${stamp(summary.createdAt)}-${summary.taskId.slice(0, 8)}.md`;
}

/**
 * Writes each summary as a Markdown file under `dir`.
 */
export class MarkdownSummaryWriter implements SummaryStore {
  constructor(private dir: string) {}

  async save(summary: StreamSummary): Promise<void> {
    await fs.promises.mkdir(this.dir, { recursive: true });
    await fs.promises.writeFile(path.join(this.dir, summaryFileName(summary)), renderSummaryMarkdown(summary), 'utf-8');
  }
}

/**
 * Saves to every store in order; the first failure rejects.
 */
export class FanOutSummaryStore implements SummaryStore {
  constructor(private stores: SummaryStore[]) {}

  async save(summary: StreamSummary): Promise<void> {
    for (const store of this.stores) {
      await store.save(summary);
    }
  }
}
