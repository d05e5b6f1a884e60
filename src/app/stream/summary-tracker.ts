/**
 * Summary Task Tracker
 * Correlates summary requests with their results by task id.
 */

import type { StreamSummary, SummaryKind, SummaryTaskStatus } from '../../domain/stream/summary.js';
import { ValidationError } from '../../domain/stream/errors.js';
import { withTimeout } from './timeouts.js';

export interface SummaryTaskRecord {
  taskId: string;
  kind: SummaryKind;
  status: SummaryTaskStatus;
  startedAt: number;
  finishedAt?: number;
  summary?: StreamSummary;
  error?: string;
}

interface TaskEntry {
  record: SummaryTaskRecord;
  settled: Promise<SummaryTaskRecord>;
  resolve: (record: SummaryTaskRecord) => void;
}

export class SummaryTaskTracker {
  private tasks = new Map<string, TaskEntry>();

  start(taskId: string, kind: SummaryKind, now: number = Date.now()): SummaryTaskRecord {
    if (this.tasks.has(taskId)) {
      throw new ValidationError(`Summary task already started: ${taskId}`);
    }

    let resolve: (record: SummaryTaskRecord) => void = () => undefined;
    const settled = new Promise<SummaryTaskRecord>((res) => {
      resolve = res;
    });

    const record: SummaryTaskRecord = { taskId, kind, status: 'pending', startedAt: now };
    this.tasks.set(taskId, { record, settled, resolve });
    return { ...record };
  }

  complete(taskId: string, summary: StreamSummary, now: number = Date.now()): void {
    const entry = this.getPending(taskId);
    entry.record.status = 'completed';
    entry.record.summary = summary;
    entry.record.finishedAt = now;
    entry.resolve({ ...entry.record });
  }

  fail(taskId: string, error: string, now: number = Date.now()): void {
    const entry = this.getPending(taskId);
    entry.record.status = 'failed';
    entry.record.error = error;
    entry.record.finishedAt = now;
    entry.resolve({ ...entry.record });
  }

  get(taskId: string): SummaryTaskRecord | undefined {
    const entry = this.tasks.get(taskId);
    return entry ? { ...entry.record } : undefined;
  }

  /**
   * Wait until the task completes or fails. Rejects with
   * CollaboratorTimeoutError when `timeoutMs` elapses first.
   */
  waitFor(taskId: string, timeoutMs: number): Promise<SummaryTaskRecord> {
    const entry = this.tasks.get(taskId);
    if (!entry) {
      return Promise.reject(new ValidationError(`Unknown summary task: ${taskId}`));
    }
    return withTimeout(entry.settled, timeoutMs, `summary task ${taskId}`);
  }

  list(): SummaryTaskRecord[] {
    return [...this.tasks.values()].map((entry) => ({ ...entry.record }));
  }

  private getPending(taskId: string): TaskEntry {
    const entry = this.tasks.get(taskId);
    if (!entry) {
      throw new ValidationError(`Unknown summary task: ${taskId}`);
    }
    if (entry.record.status !== 'pending') {
      throw new ValidationError(`Summary task already ${entry.record.status}: ${taskId}`);
    }
    return entry;
  }
}
