/**
 * SQLite Stream Archive
 * Persistent storage for stream summaries and end-of-session conversation logs
 */

import type Database from 'better-sqlite3';
import { randomUUID } from 'crypto';

import type { ConversationEntry, ConversationEntryKind, Speaker } from '../../domain/stream/collaborators.js';
import type { StreamSummary, SummaryKind, SummaryStore } from '../../domain/stream/summary.js';

// ============================================================================
// Database Row Types
// ============================================================================

interface SummaryRow {
  task_id: string;
  kind: string;
  topics: string;
  notable_comments: string;
  duration_minutes: number;
  entry_count: number;
  text: string;
  created_at: number;
  summary_date: string | null;
  ending_reason: string | null;
}

interface EntryRow {
  speaker: string;
  author: string | null;
  text: string;
  timestamp: number;
  kind: string;
  mode: string | null;
}

export interface ArchivedSession {
  id: string;
  startedAt: number;
  endedAt: number;
  entryCount: number;
}

const SPEAKERS: readonly Speaker[] = ['streamer', 'viewer', 'system'];
const ENTRY_KINDS: readonly ConversationEntryKind[] = [
  'greeting',
  'monologue',
  'comment',
  'comment_response',
  'farewell',
];

function parseStringArray(json: string): string[] {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function toSpeaker(value: string): Speaker {
  return SPEAKERS.find((speaker) => speaker === value) ?? 'system';
}

function toEntryKind(value: string): ConversationEntryKind {
  return ENTRY_KINDS.find((kind) => kind === value) ?? 'monologue';
}

// ============================================================================
// SQLite Stream Archive
// ============================================================================

export class SqliteStreamArchive implements SummaryStore {
  constructor(private db: Database.Database) {}

  /**
   * Create archive tables
   */
  initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS stream_summaries (
        task_id TEXT PRIMARY KEY,
        kind TEXT NOT NULL,
        topics TEXT NOT NULL,
        notable_comments TEXT NOT NULL,
        duration_minutes INTEGER NOT NULL,
        entry_count INTEGER NOT NULL,
        text TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        summary_date TEXT,
        ending_reason TEXT
      );

      CREATE TABLE IF NOT EXISTS archived_sessions (
        id TEXT PRIMARY KEY,
        started_at INTEGER NOT NULL,
        ended_at INTEGER NOT NULL,
        entry_count INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS archived_entries (
        session_id TEXT NOT NULL,
        seq INTEGER NOT NULL,
        speaker TEXT NOT NULL,
        author TEXT,
        text TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        kind TEXT NOT NULL,
        mode TEXT,
        PRIMARY KEY (session_id, seq),
        FOREIGN KEY (session_id) REFERENCES archived_sessions(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_stream_summaries_created ON stream_summaries(created_at DESC);
    `);
  }

  async save(summary: StreamSummary): Promise<void> {
    this.db
      .prepare<[string, string, string, string, number, number, string, number, string | null, string | null]>(`
        INSERT OR REPLACE INTO stream_summaries (
          task_id, kind, topics, notable_comments, duration_minutes,
          entry_count, text, created_at, summary_date, ending_reason
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        summary.taskId,
        summary.kind,
        JSON.stringify(summary.topics),
        JSON.stringify(summary.notableComments),
        summary.durationMinutes,
        summary.entryCount,
        summary.text,
        summary.createdAt,
        summary.date ?? null,
        summary.endingReason ?? null
      );
  }

  getSummary(taskId: string): StreamSummary | null {
    const row = this.db
      .prepare<[string], SummaryRow>('SELECT * FROM stream_summaries WHERE task_id = ?')
      .get(taskId);
    return row ? this.parseSummaryRow(row) : null;
  }

  listSummaries(limit = 20): StreamSummary[] {
    return this.db
      .prepare<[number], SummaryRow>('SELECT * FROM stream_summaries ORDER BY created_at DESC LIMIT ?')
      .all(limit)
      .map((row) => this.parseSummaryRow(row));
  }

  /**
   * Store a whole session's history in one transaction.
   */
  archiveSession(entries: readonly ConversationEntry[], endedAt: number = Date.now()): ArchivedSession {
    const session: ArchivedSession = {
      id: randomUUID(),
      startedAt: entries.length > 0 ? entries[0].timestamp : endedAt,
      endedAt,
      entryCount: entries.length,
    };

    const insertSession = this.db.prepare<[string, number, number, number]>(
      'INSERT INTO archived_sessions (id, started_at, ended_at, entry_count) VALUES (?, ?, ?, ?)'
    );
    const insertEntry = this.db.prepare<[string, number, string, string | null, string, number, string, string | null]>(`
      INSERT INTO archived_entries (session_id, seq, speaker, author, text, timestamp, kind, mode)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const write = this.db.transaction(() => {
      insertSession.run(session.id, session.startedAt, session.endedAt, session.entryCount);
      entries.forEach((entry, index) => {
        insertEntry.run(
          session.id,
          index,
          entry.speaker,
          entry.author ?? null,
          entry.text,
          entry.timestamp,
          entry.kind,
          entry.mode ?? null
        );
      });
    });
    write();

    return session;
  }

  getSessionEntries(sessionId: string): ConversationEntry[] {
    return this.db
      .prepare<[string], EntryRow>(`
        SELECT speaker, author, text, timestamp, kind, mode FROM archived_entries
        WHERE session_id = ?
        ORDER BY seq ASC
      `)
      .all(sessionId)
      .map((row) => ({
        speaker: toSpeaker(row.speaker),
        ...(row.author !== null ? { author: row.author } : {}),
        text: row.text,
        timestamp: row.timestamp,
        kind: toEntryKind(row.kind),
        ...(row.mode !== null ? { mode: row.mode } : {}),
      }));
  }

  private parseSummaryRow(row: SummaryRow): StreamSummary {
    const kind: SummaryKind = row.kind === 'daily' ? 'daily' : 'stream';
    return {
      taskId: row.task_id,
      kind,
      topics: parseStringArray(row.topics),
      notableComments: parseStringArray(row.notable_comments),
      durationMinutes: row.duration_minutes,
      entryCount: row.entry_count,
      text: row.text,
      createdAt: row.created_at,
      ...(row.summary_date !== null ? { date: row.summary_date } : {}),
      ...(row.ending_reason !== null ? { endingReason: row.ending_reason } : {}),
    };
  }
}
