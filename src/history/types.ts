/**
 * History Types
 *
 * One snapshot per calendar day: the parsed entries from both sources plus
 * the raw text each source returned, so a day can be re-examined later.
 */

import type { IssueEntry, VcsEntry } from '../types/activity.js';
import type { CalendarDate } from '../types/timesheet.js';

export interface DailySnapshot {
  date: CalendarDate;
  issueEntries: IssueEntry[];
  vcsEntries: VcsEntry[];
  rawIssueResponse: string;
  rawVcsResponse: string;
}

/** The persisted JSON document. Field names are part of the on-disk format. */
export interface SnapshotRecord {
  date: CalendarDate;
  jira: Omit<IssueEntry, 'kind'>[];
  github: Omit<VcsEntry, 'kind'>[];
  raw_jira_response: string;
  raw_github_response: string;
}

/**
 * Date-keyed snapshot persistence.
 *
 * `put` replaces whatever is stored for the date and throws
 * SnapshotPersistenceError when the write fails. `get` throws
 * SnapshotReadError for a record it cannot decode.
 */
export interface SnapshotStore {
  put(date: CalendarDate, snapshot: DailySnapshot): void;
  get(date: CalendarDate): DailySnapshot | null;
  /** Dates in [start, end] that have a snapshot, ascending. */
  existsInRange(start: CalendarDate, end: CalendarDate): CalendarDate[];
}
