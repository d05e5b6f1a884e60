import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { SqliteStreamArchive } from './stream-archive-repository.js';

/**
 * Open (creating if needed) the archive database under the data directory.
 */
export function openStreamArchive(dbPath: string): { db: Database.Database; archive: SqliteStreamArchive } {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true, mode: 0o700 });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  const archive = new SqliteStreamArchive(db);
  archive.initialize();
  return { db, archive };
}
