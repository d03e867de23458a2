import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InsightsEngine, round2 } from './insights-engine.js';
import { SqliteSnapshotStore } from '../history/snapshot-store.js';
import type { DailySnapshot, SnapshotStore } from '../history/types.js';
import { SnapshotReadError } from '../errors.js';
import { silentLogger } from '../log.js';
import type { IssueEntry, VcsEntry } from '../types/activity.js';

function issue(key: string, status: string, project = 'Payments'): IssueEntry {
  return { kind: 'issue', key, summary: key, description: '', status, project, assignee: 'Dana' };
}

function commit(repo: string, key = `${repo}-sha`): VcsEntry {
  return { kind: 'vcs', type: 'Commit', repo, key, summary: 'work', description: 'work' };
}

function snapshot(date: string, issueEntries: IssueEntry[], vcsEntries: VcsEntry[]): DailySnapshot {
  return { date, issueEntries, vcsEntries, rawIssueResponse: '[]', rawVcsResponse: '[]' };
}

describe('InsightsEngine', () => {
  let store: SqliteSnapshotStore;
  let engine: InsightsEngine;

  beforeEach(() => {
    store = new SqliteSnapshotStore(':memory:');
    engine = new InsightsEngine({ store, logger: silentLogger });
  });

  afterEach(() => {
    store.close();
  });

  function put(day: DailySnapshot): void {
    store.put(day.date, day);
  }

  it('computes every section of the report', () => {
    put(snapshot('2026-02-01', [issue('PAY-1', 'In Progress')], [commit('acme/api', 'a1')]));
    put(snapshot('2026-02-02', [issue('PAY-2', 'In Progress', 'Ledger')], []));
    put(
      snapshot(
        '2026-02-03',
        [issue('PAY-1', 'Done')],
        [commit('acme/api', 'a2'), commit('acme/web', 'w1')]
      )
    );

    const report = engine.analyze({ start: '2026-02-01', end: '2026-02-04' });

    expect(report).toEqual({
      range: { start: '2026-02-01', end: '2026-02-04', total_days: 4 },
      commit_metrics: {
        total_commits: 3,
        commits_per_day: { '2026-02-01': 1, '2026-02-02': 0, '2026-02-03': 2, '2026-02-04': 0 },
        commits_per_repo: { 'acme/api': 2, 'acme/web': 1 },
      },
      jira_metrics: {
        total_tickets_touched: 2,
        tickets_completed: 1,
        tickets_in_progress: 1,
        average_days_active: 2,
      },
      distribution: {
        total_issue_touches: 3,
        project_distribution_percent: { Payments: 66.67, Ledger: 33.33 },
        repo_distribution_percent: { 'acme/api': 66.67, 'acme/web': 33.33 },
      },
      consistency: {
        active_days: 3,
        longest_inactivity_streak_days: 1,
        context_switching_days: 1,
      },
    });
  });

  it('returns identical output for repeated runs over the same store', () => {
    put(snapshot('2026-02-01', [issue('PAY-1', 'Done')], [commit('acme/api')]));
    put(snapshot('2026-02-02', [], [commit('acme/web')]));
    const range = { start: '2026-02-01', end: '2026-02-03' };

    expect(JSON.stringify(engine.analyze(range))).toBe(JSON.stringify(engine.analyze(range)));
  });

  it('freezes the report deeply', () => {
    put(snapshot('2026-02-01', [], [commit('acme/api')]));

    const report = engine.analyze({ start: '2026-02-01', end: '2026-02-01' });

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.commit_metrics)).toBe(true);
    expect(Object.isFrozen(report.commit_metrics.commits_per_repo)).toBe(true);
    expect(Object.isFrozen(report.distribution.project_distribution_percent)).toBe(true);
  });

  it('gives project percentages that sum to 100 when issues were touched', () => {
    put(
      snapshot(
        '2026-02-01',
        [issue('PAY-1', 'Done'), issue('PAY-2', 'Done'), issue('LED-1', 'Done', 'Ledger')],
        []
      )
    );
    put(snapshot('2026-02-02', [issue('OPS-1', 'To Do', 'Ops')], []));

    const { distribution } = engine.analyze({ start: '2026-02-01', end: '2026-02-02' });
    const total = Object.values(distribution.project_distribution_percent).reduce(
      (sum, pct) => sum + pct,
      0
    );

    expect(distribution.total_issue_touches).toBe(4);
    expect(distribution.project_distribution_percent).toEqual({
      Payments: 50,
      Ledger: 25,
      Ops: 25,
    });
    expect(total).toBeCloseTo(100, 1);
  });

  it('leaves distributions empty when nothing was recorded', () => {
    put(snapshot('2026-02-01', [], []));

    const { distribution, jira_metrics } = engine.analyze({
      start: '2026-02-01',
      end: '2026-02-01',
    });

    expect(distribution).toEqual({
      total_issue_touches: 0,
      project_distribution_percent: {},
      repo_distribution_percent: {},
    });
    expect(jira_metrics.average_days_active).toBe(0);
  });

  it('counts the longest run of inactive days', () => {
    put(snapshot('2026-02-01', [], [commit('acme/api')]));
    put(snapshot('2026-02-05', [issue('PAY-1', 'In Progress')], []));

    const { consistency } = engine.analyze({ start: '2026-02-01', end: '2026-02-05' });

    expect(consistency.active_days).toBe(2);
    expect(consistency.longest_inactivity_streak_days).toBe(3);
  });

  it('treats a stored but empty day as inactive', () => {
    put(snapshot('2026-02-01', [], []));
    put(snapshot('2026-02-02', [], []));

    const { consistency } = engine.analyze({ start: '2026-02-01', end: '2026-02-02' });

    expect(consistency).toEqual({
      active_days: 0,
      longest_inactivity_streak_days: 2,
      context_switching_days: 0,
    });
  });

  it('flags a day whose repos plus projects exceed the threshold', () => {
    put(snapshot('2026-02-01', [issue('PAY-1', 'Done')], [commit('A', 'a'), commit('B', 'b')]));
    put(snapshot('2026-02-02', [issue('PAY-2', 'Done')], [commit('A', 'c')]));

    const { consistency } = engine.analyze({ start: '2026-02-01', end: '2026-02-02' });

    expect(consistency.context_switching_days).toBe(1);
  });

  it('honours a custom context switch threshold', () => {
    put(snapshot('2026-02-01', [issue('PAY-1', 'Done')], [commit('A')]));

    const strict = new InsightsEngine({ store, contextSwitchThreshold: 1, logger: silentLogger });

    expect(
      strict.analyze({ start: '2026-02-01', end: '2026-02-01' }).consistency.context_switching_days
    ).toBe(1);
  });

  it('classifies tickets by every status observed across the range', () => {
    put(snapshot('2026-02-01', [issue('PAY-1', 'In Progress'), issue('PAY-3', 'To Do')], []));
    put(snapshot('2026-02-02', [issue('PAY-2', 'IN PROGRESS')], []));
    put(snapshot('2026-02-03', [issue('PAY-1', 'Resolved')], []));

    const { jira_metrics } = engine.analyze({ start: '2026-02-01', end: '2026-02-03' });

    expect(jira_metrics).toEqual({
      total_tickets_touched: 3,
      tickets_completed: 1,
      tickets_in_progress: 1,
      average_days_active: 1.67,
    });
  });

  it('treats an unreadable snapshot as missing', () => {
    const warn = vi.fn();
    const flaky: SnapshotStore = {
      put: () => undefined,
      existsInRange: () => ['2026-02-01', '2026-02-02'],
      get: (date) => {
        if (date === '2026-02-01') throw new SnapshotReadError(date, 'corrupt');
        return snapshot(date, [], [commit('acme/api')]);
      },
    };

    const report = new InsightsEngine({ store: flaky, logger: { ...silentLogger, warn } }).analyze({
      start: '2026-02-01',
      end: '2026-02-02',
    });

    expect(report.commit_metrics.commits_per_day).toEqual({ '2026-02-01': 0, '2026-02-02': 1 });
    expect(report.consistency.active_days).toBe(1);
    expect(warn).toHaveBeenCalledWith('Treating unreadable snapshot 2026-02-01 as missing: corrupt');
  });

  it('keeps analyzing when the store fails with a database error', () => {
    const warn = vi.fn();
    const failing: SnapshotStore = {
      put: () => undefined,
      existsInRange: () => ['2026-02-01', '2026-02-02'],
      get: (date) => {
        if (date === '2026-02-01') throw new Error('SQLITE_IOERR: disk I/O error');
        return snapshot(date, [], [commit('acme/api')]);
      },
    };

    const report = new InsightsEngine({ store: failing, logger: { ...silentLogger, warn } }).analyze({
      start: '2026-02-01',
      end: '2026-02-02',
    });

    expect(report.commit_metrics.commits_per_day).toEqual({ '2026-02-01': 0, '2026-02-02': 1 });
    expect(warn).toHaveBeenCalledWith(
      'Treating unreadable snapshot 2026-02-01 as missing: SQLITE_IOERR: disk I/O error'
    );
  });

  it('reads every date when listing the range fails', () => {
    const warn = vi.fn();
    const failing: SnapshotStore = {
      put: () => undefined,
      existsInRange: () => {
        throw new Error('SQLITE_BUSY: database is locked');
      },
      get: (date) => (date === '2026-02-02' ? snapshot(date, [], [commit('acme/api')]) : null),
    };

    const report = new InsightsEngine({ store: failing, logger: { ...silentLogger, warn } }).analyze({
      start: '2026-02-01',
      end: '2026-02-03',
    });

    expect(report.commit_metrics.commits_per_day).toEqual({
      '2026-02-01': 0,
      '2026-02-02': 1,
      '2026-02-03': 0,
    });
    expect(report.consistency.active_days).toBe(1);
    expect(warn).toHaveBeenCalledWith(
      'Could not list stored snapshots for 2026-02-01 to 2026-02-03, reading each date: SQLITE_BUSY: database is locked'
    );
  });
});

describe('round2', () => {
  it('rounds to two decimals', () => {
    expect(round2(66.666)).toBe(66.67);
    expect(round2(2)).toBe(2);
  });
});
