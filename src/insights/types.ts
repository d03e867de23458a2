/**
 * Insight Types
 *
 * The productivity report computed from stored snapshots. Field names are
 * snake_case because the report is exported as JSON as-is.
 */

import type { CalendarDate } from '../types/timesheet.js';

export type Counts = Readonly<Record<string, number>>;

export interface InsightsReport {
  readonly range: {
    readonly start: CalendarDate;
    readonly end: CalendarDate;
    readonly total_days: number;
  };
  readonly commit_metrics: {
    readonly total_commits: number;
    /** Every date in the range, 0 where nothing was recorded. */
    readonly commits_per_day: Counts;
    readonly commits_per_repo: Counts;
  };
  readonly jira_metrics: {
    readonly total_tickets_touched: number;
    readonly tickets_completed: number;
    readonly tickets_in_progress: number;
    /** Mean span in days between a ticket's first and last sighting, inclusive. */
    readonly average_days_active: number;
  };
  readonly distribution: {
    readonly total_issue_touches: number;
    readonly project_distribution_percent: Counts;
    readonly repo_distribution_percent: Counts;
  };
  readonly consistency: {
    readonly active_days: number;
    readonly longest_inactivity_streak_days: number;
    readonly context_switching_days: number;
  };
}
