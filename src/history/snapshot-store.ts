/**
 * Snapshot Store
 *
 * SQLite-backed persistence for daily activity snapshots.
 * Uses better-sqlite3 for synchronous, fast local storage.
 * Database lives at ~/.worklog/history.db by default.
 */

import Database from 'better-sqlite3';
import { ensureConfigDir, historyDbInConfigDir, historyDbPath } from '../config/paths.js';
import { SnapshotPersistenceError, SnapshotReadError, errorMessage } from '../errors.js';
import type { CalendarDate } from '../types/timesheet.js';
import { SnapshotRecordSchema } from '../validators.js';
import type { DailySnapshot, SnapshotRecord, SnapshotStore } from './types.js';

interface SnapshotRow {
  date: string;
  record: string;
}

export class SqliteSnapshotStore implements SnapshotStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? historyDbPath();
    if (!dbPath && historyDbInConfigDir()) {
      ensureConfigDir();
    }
    this.db = new Database(path);
    this.db.pragma('journal_mode = WAL');
    this.migrate();
  }

  put(date: CalendarDate, snapshot: DailySnapshot): void {
    try {
      this.db
        .prepare<[string, string]>(
          `INSERT INTO snapshots (date, record, updated_at)
           VALUES (?, ?, datetime('now'))
           ON CONFLICT(date) DO UPDATE SET
             record = excluded.record,
             updated_at = excluded.updated_at`
        )
        .run(date, JSON.stringify(toRecord(date, snapshot)));
    } catch (err) {
      throw new SnapshotPersistenceError(
        date,
        `Failed to store snapshot for ${date}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }

  /** Throws SnapshotReadError for both undecodable records and database failures. */
  get(date: CalendarDate): DailySnapshot | null {
    let row: SnapshotRow | undefined;
    try {
      row = this.db
        .prepare<[string], SnapshotRow>(`SELECT date, record FROM snapshots WHERE date = ?`)
        .get(date);
    } catch (err) {
      throw new SnapshotReadError(date, `Failed to read snapshot for ${date}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    return row ? decodeRow(row) : null;
  }

  existsInRange(start: CalendarDate, end: CalendarDate): CalendarDate[] {
    try {
      const rows = this.db
        .prepare<[string, string], { date: string }>(
          `SELECT date FROM snapshots WHERE date >= ? AND date <= ? ORDER BY date ASC`
        )
        .all(start, end);

      return rows.map((row) => row.date);
    } catch (err) {
      throw new SnapshotReadError(
        start,
        `Failed to list snapshots from ${start} to ${end}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }

  // ─── Schema Migration ─────────────────────────────────────

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS snapshots (
        date        TEXT PRIMARY KEY,
        record      TEXT NOT NULL,
        updated_at  TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `);
  }
}

// ─── Record Mapping ─────────────────────────────────────────

export function toRecord(date: CalendarDate, snapshot: DailySnapshot): SnapshotRecord {
  return {
    date,
    jira: snapshot.issueEntries.map(({ kind: _kind, ...entry }) => entry),
    github: snapshot.vcsEntries.map(({ kind: _kind, ...entry }) => entry),
    raw_jira_response: snapshot.rawIssueResponse,
    raw_github_response: snapshot.rawVcsResponse,
  };
}

function decodeRow(row: SnapshotRow): DailySnapshot {
  let payload: unknown;
  try {
    payload = JSON.parse(row.record);
  } catch (err) {
    throw new SnapshotReadError(row.date, `Snapshot for ${row.date} is not valid JSON`, {
      cause: err,
    });
  }

  const parsed = SnapshotRecordSchema.safeParse(payload);
  if (!parsed.success) {
    throw new SnapshotReadError(
      row.date,
      `Snapshot for ${row.date} does not match the record format: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      { cause: parsed.error }
    );
  }

  const record = parsed.data;
  if (record.date !== row.date) {
    throw new SnapshotReadError(row.date, `Snapshot stored under ${row.date} is dated ${record.date}`);
  }

  return {
    date: record.date,
    issueEntries: record.jira,
    vcsEntries: record.github,
    rawIssueResponse: record.raw_jira_response,
    rawVcsResponse: record.raw_github_response,
  };
}
