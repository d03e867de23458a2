/**
 * Productivity Insights Engine
 *
 * Aggregates the stored snapshots of a date range into commit, ticket,
 * distribution and consistency metrics. Reads the SnapshotStore only; it
 * never fetches. Running it twice over an unchanged store gives the same
 * report.
 */

import { DEFAULT_POLICY } from '../config/policy.js';
import { errorMessage } from '../errors.js';
import type { DailySnapshot, SnapshotStore } from '../history/types.js';
import { defaultLogger, type Logger } from '../log.js';
import { daysBetween, enumerateDates } from '../timesheet/date-range.js';
import { isCompletedStatus, isInProgressStatus, normalizeStatus } from '../types/activity.js';
import type { CalendarDate, DateRange } from '../types/timesheet.js';
import type { InsightsReport } from './types.js';

export interface InsightsEngineOptions {
  store: SnapshotStore;
  contextSwitchThreshold?: number;
  logger?: Logger;
}

interface TicketSpan {
  firstSeen: CalendarDate;
  lastSeen: CalendarDate;
  statuses: Set<string>;
}

/** Running totals, filled in date order and frozen into the report at the end. */
interface Accumulator {
  commitsPerDay: Map<CalendarDate, number>;
  commitsPerRepo: Map<string, number>;
  projectTouches: Map<string, number>;
  tickets: Map<string, TicketSpan>;
  totalCommits: number;
  totalIssueTouches: number;
  activeDays: number;
  inactivityStreak: number;
  longestInactivityStreak: number;
  contextSwitchingDays: number;
}

export class InsightsEngine {
  private readonly store: SnapshotStore;
  private readonly contextSwitchThreshold: number;
  private readonly logger: Logger;

  constructor(options: InsightsEngineOptions) {
    this.store = options.store;
    this.contextSwitchThreshold =
      options.contextSwitchThreshold ?? DEFAULT_POLICY.contextSwitchThreshold;
    this.logger = options.logger ?? defaultLogger;
  }

  analyze(range: DateRange): InsightsReport {
    const dates = enumerateDates(range);
    const stored = this.storedDates(range);
    const acc = createAccumulator();

    for (const date of dates) {
      const snapshot = stored === null || stored.has(date) ? this.read(date) : null;
      this.accumulate(acc, date, snapshot);
    }

    return deepFreeze(buildReport(acc, range, dates.length));
  }

  /** null when the listing fails; every date is then read individually. */
  private storedDates(range: DateRange): Set<CalendarDate> | null {
    try {
      return new Set(this.store.existsInRange(range.start, range.end));
    } catch (err) {
      this.logger.warn(
        `Could not list stored snapshots for ${range.start} to ${range.end}, reading each date: ${errorMessage(err)}`
      );
      return null;
    }
  }

  private read(date: CalendarDate): DailySnapshot | null {
    try {
      return this.store.get(date);
    } catch (err) {
      this.logger.warn(`Treating unreadable snapshot ${date} as missing: ${errorMessage(err)}`);
      return null;
    }
  }

  private accumulate(acc: Accumulator, date: CalendarDate, snapshot: DailySnapshot | null): void {
    const vcsEntries = snapshot?.vcsEntries ?? [];
    const issueEntries = snapshot?.issueEntries ?? [];

    acc.commitsPerDay.set(date, vcsEntries.length);
    acc.totalCommits += vcsEntries.length;

    if (vcsEntries.length === 0 && issueEntries.length === 0) {
      acc.inactivityStreak += 1;
      acc.longestInactivityStreak = Math.max(acc.longestInactivityStreak, acc.inactivityStreak);
      return;
    }

    acc.activeDays += 1;
    acc.inactivityStreak = 0;

    const repos = new Set<string>();
    for (const entry of vcsEntries) {
      increment(acc.commitsPerRepo, entry.repo);
      repos.add(entry.repo);
    }

    const projects = new Set<string>();
    for (const entry of issueEntries) {
      increment(acc.projectTouches, entry.project);
      acc.totalIssueTouches += 1;
      projects.add(entry.project);
      trackTicket(acc.tickets, entry.key, entry.status, date);
    }

    if (repos.size + projects.size > this.contextSwitchThreshold) {
      acc.contextSwitchingDays += 1;
    }
  }
}

// ─── Accumulation ────────────────────────────────────────────

function createAccumulator(): Accumulator {
  return {
    commitsPerDay: new Map(),
    commitsPerRepo: new Map(),
    projectTouches: new Map(),
    tickets: new Map(),
    totalCommits: 0,
    totalIssueTouches: 0,
    activeDays: 0,
    inactivityStreak: 0,
    longestInactivityStreak: 0,
    contextSwitchingDays: 0,
  };
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function trackTicket(
  tickets: Map<string, TicketSpan>,
  key: string,
  status: string,
  date: CalendarDate
): void {
  const span = tickets.get(key);
  if (!span) {
    tickets.set(key, { firstSeen: date, lastSeen: date, statuses: new Set([normalizeStatus(status)]) });
    return;
  }
  span.lastSeen = date;
  span.statuses.add(normalizeStatus(status));
}

// ─── Report ──────────────────────────────────────────────────

function buildReport(acc: Accumulator, range: DateRange, totalDays: number): InsightsReport {
  let completed = 0;
  let inProgress = 0;
  let spanDays = 0;

  for (const span of acc.tickets.values()) {
    const statuses = [...span.statuses];
    if (statuses.some(isCompletedStatus)) {
      completed += 1;
    } else if (statuses.some(isInProgressStatus)) {
      inProgress += 1;
    }
    spanDays += daysBetween(span.firstSeen, span.lastSeen) + 1;
  }

  const ticketCount = acc.tickets.size;

  return {
    range: { start: range.start, end: range.end, total_days: totalDays },
    commit_metrics: {
      total_commits: acc.totalCommits,
      commits_per_day: Object.fromEntries(acc.commitsPerDay),
      commits_per_repo: Object.fromEntries(acc.commitsPerRepo),
    },
    jira_metrics: {
      total_tickets_touched: ticketCount,
      tickets_completed: completed,
      tickets_in_progress: inProgress,
      average_days_active: ticketCount === 0 ? 0 : round2(spanDays / ticketCount),
    },
    distribution: {
      total_issue_touches: acc.totalIssueTouches,
      project_distribution_percent: percentages(acc.projectTouches, acc.totalIssueTouches),
      repo_distribution_percent: percentages(acc.commitsPerRepo, acc.totalCommits),
    },
    consistency: {
      active_days: acc.activeDays,
      longest_inactivity_streak_days: acc.longestInactivityStreak,
      context_switching_days: acc.contextSwitchingDays,
    },
  };
}

function percentages(counts: Map<string, number>, total: number): Record<string, number> {
  if (total === 0) return {};
  return Object.fromEntries(
    [...counts].map(([key, count]) => [key, round2((100 * count) / total)])
  );
}

export function round2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const nested: unknown = Reflect.get(value, key);
    if (typeof nested === 'object' && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
