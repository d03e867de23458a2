import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { SqliteSnapshotStore, toRecord } from './snapshot-store.js';
import type { DailySnapshot } from './types.js';
import { SnapshotPersistenceError, SnapshotReadError } from '../errors.js';

function makeSnapshot(date: string, overrides: Partial<DailySnapshot> = {}): DailySnapshot {
  return {
    date,
    issueEntries: [
      {
        kind: 'issue',
        key: 'PAY-7',
        summary: 'Refund flow',
        description: 'Handle partial refunds',
        status: 'In Progress',
        project: 'Payments',
        assignee: 'Dana',
      },
    ],
    vcsEntries: [
      {
        kind: 'vcs',
        type: 'Commit',
        repo: 'acme/api',
        key: 'aaa',
        summary: 'Add refund endpoint',
        description: 'Add refund endpoint',
      },
    ],
    rawIssueResponse: '[{"key":"PAY-7"}]',
    rawVcsResponse: '[{"key":"aaa"}]',
    ...overrides,
  };
}

describe('SqliteSnapshotStore', () => {
  let store: SqliteSnapshotStore;

  beforeEach(() => {
    // In-memory database for fast, isolated tests
    store = new SqliteSnapshotStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  describe('put / get', () => {
    it('round-trips a snapshot', () => {
      const snapshot = makeSnapshot('2026-02-06');
      store.put('2026-02-06', snapshot);

      expect(store.get('2026-02-06')).toEqual(snapshot);
    });

    it('returns null for a date with no snapshot', () => {
      expect(store.get('2026-02-06')).toBeNull();
    });

    it('replaces the stored snapshot instead of merging', () => {
      store.put('2026-02-06', makeSnapshot('2026-02-06'));
      store.put(
        '2026-02-06',
        makeSnapshot('2026-02-06', { issueEntries: [], rawIssueResponse: '[]' })
      );

      const stored = store.get('2026-02-06');
      expect(stored?.issueEntries).toEqual([]);
      expect(stored?.rawIssueResponse).toBe('[]');
      expect(stored?.vcsEntries).toHaveLength(1);
      expect(store.existsInRange('2026-02-06', '2026-02-06')).toEqual(['2026-02-06']);
    });

    it('stores an empty day', () => {
      store.put(
        '2026-02-07',
        makeSnapshot('2026-02-07', { issueEntries: [], vcsEntries: [], rawIssueResponse: '[]', rawVcsResponse: '[]' })
      );

      expect(store.get('2026-02-07')).toEqual({
        date: '2026-02-07',
        issueEntries: [],
        vcsEntries: [],
        rawIssueResponse: '[]',
        rawVcsResponse: '[]',
      });
    });

    it('throws SnapshotPersistenceError when the write fails', () => {
      store.close();

      expect(() => store.put('2026-02-06', makeSnapshot('2026-02-06'))).toThrow(
        SnapshotPersistenceError
      );
      // Reopen so afterEach can close it
      store = new SqliteSnapshotStore(':memory:');
    });
  });

  describe('existsInRange', () => {
    it('lists stored dates in the range ascending', () => {
      store.put('2026-02-09', makeSnapshot('2026-02-09'));
      store.put('2026-02-03', makeSnapshot('2026-02-03'));
      store.put('2026-02-05', makeSnapshot('2026-02-05'));
      store.put('2026-01-30', makeSnapshot('2026-01-30'));

      expect(store.existsInRange('2026-02-01', '2026-02-09')).toEqual([
        '2026-02-03',
        '2026-02-05',
        '2026-02-09',
      ]);
    });

    it('returns an empty list when nothing is stored', () => {
      expect(store.existsInRange('2026-02-01', '2026-02-09')).toEqual([]);
    });
  });
});

describe('toRecord', () => {
  it('uses the persisted field names and drops the entry tag', () => {
    const record = toRecord('2026-02-06', makeSnapshot('2026-02-06'));

    expect(Object.keys(record)).toEqual([
      'date',
      'jira',
      'github',
      'raw_jira_response',
      'raw_github_response',
    ]);
    expect(record.jira[0]).toEqual({
      key: 'PAY-7',
      summary: 'Refund flow',
      description: 'Handle partial refunds',
      status: 'In Progress',
      project: 'Payments',
      assignee: 'Dana',
    });
    expect(record.github[0]?.type).toBe('Commit');
  });
});

describe('SqliteSnapshotStore on disk', () => {
  let dir: string;
  let dbPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'worklog-store-'));
    dbPath = join(dir, 'history.db');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('keeps snapshots across reopen', () => {
    const first = new SqliteSnapshotStore(dbPath);
    first.put('2026-02-06', makeSnapshot('2026-02-06'));
    first.close();

    const second = new SqliteSnapshotStore(dbPath);
    expect(second.get('2026-02-06')?.issueEntries[0]?.key).toBe('PAY-7');
    second.close();
  });

  it('throws SnapshotReadError for a record that is not JSON', () => {
    const store = new SqliteSnapshotStore(dbPath);
    const raw = new Database(dbPath);
    raw.prepare(`INSERT INTO snapshots (date, record) VALUES (?, ?)`).run('2026-02-06', '{broken');
    raw.close();

    expect(() => store.get('2026-02-06')).toThrow(SnapshotReadError);
    expect(() => store.get('2026-02-06')).toThrow('Snapshot for 2026-02-06 is not valid JSON');
    store.close();
  });

  it('throws SnapshotReadError for a record of the wrong shape', () => {
    const store = new SqliteSnapshotStore(dbPath);
    const raw = new Database(dbPath);
    raw
      .prepare(`INSERT INTO snapshots (date, record) VALUES (?, ?)`)
      .run('2026-02-06', JSON.stringify({ date: '2026-02-06', jira: 'nope' }));
    raw.close();

    try {
      store.get('2026-02-06');
      expect.unreachable('get should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(SnapshotReadError);
      expect(err instanceof SnapshotReadError ? err.date : '').toBe('2026-02-06');
    }
    store.close();
  });

  it('wraps database failures in SnapshotReadError', () => {
    const store = new SqliteSnapshotStore(dbPath);
    store.close();

    expect(() => store.get('2026-02-06')).toThrow(SnapshotReadError);
    expect(() => store.get('2026-02-06')).toThrow(/^Failed to read snapshot for 2026-02-06: /);
    expect(() => store.existsInRange('2026-02-01', '2026-02-06')).toThrow(
      /^Failed to list snapshots from 2026-02-01 to 2026-02-06: /
    );
  });
});
