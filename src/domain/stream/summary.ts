/**
 * Stream Summary
 * Result of a summary task, produced at stream end or on the daily schedule.
 */

export type SummaryKind = 'stream' | 'daily';

export interface StreamSummary {
  taskId: string;
  kind: SummaryKind;
  topics: string[];
  notableComments: string[];
  durationMinutes: number;
  entryCount: number;
  text: string;
  createdAt: number;
  /** Calendar date (YYYY-MM-DD) for daily summaries */
  date?: string;
  /** Why the stream ended, for stream summaries */
  endingReason?: string;
}

export type SummaryTaskStatus = 'pending' | 'completed' | 'failed';

export interface SummaryStore {
  save(summary: StreamSummary): Promise<void>;
}
