/**
 * Carry-Forward Resolver
 *
 * A day with no activity at all inherits the most recent in-progress ticket
 * from the days before it, so the timesheet shows ongoing work rather than a
 * blank. Lookups go through the SnapshotStore only.
 */

import { errorMessage } from '../errors.js';
import type { DailySnapshot, SnapshotStore } from '../history/types.js';
import { defaultLogger, type Logger } from '../log.js';
import { isInProgressStatus, type IssueEntry } from '../types/activity.js';
import type { CalendarDate, TimesheetRow } from '../types/timesheet.js';
import { shiftDate } from './date-range.js';

export const NOT_AVAILABLE = 'N/A';
export const NO_ACTIVITY_REMARK = 'No activity found.';
export const CARRIED_STATUS = 'In Progress';

export interface CarriedTask {
  entry: IssueEntry;
  /** The earlier date the ticket was found on. */
  fromDate: CalendarDate;
}

export type RowFields = Omit<TimesheetRow, 'date'>;

/**
 * Search D-1 back to D-`lookbackDays` for the first in-progress issue.
 * A snapshot the store fails to return, for any reason, is skipped like a
 * missing one.
 */
export function findCarriedTask(
  store: SnapshotStore,
  date: CalendarDate,
  lookbackDays: number,
  logger: Logger = defaultLogger
): CarriedTask | null {
  for (let offset = 1; offset <= lookbackDays; offset++) {
    const prior = shiftDate(date, -offset);

    let snapshot: DailySnapshot | null;
    try {
      snapshot = store.get(prior);
    } catch (err) {
      logger.warn(`Skipping unreadable snapshot ${prior}: ${errorMessage(err)}`);
      continue;
    }
    if (!snapshot) continue;

    const entry = snapshot.issueEntries.find((e) => isInProgressStatus(e.status));
    if (entry) return { entry, fromDate: prior };
  }

  return null;
}

export function carryForwardFields(carried: CarriedTask | null): RowFields {
  if (!carried) {
    return {
      project: NOT_AVAILABLE,
      task: NOT_AVAILABLE,
      taskDescription: NOT_AVAILABLE,
      status: NOT_AVAILABLE,
      remark: NO_ACTIVITY_REMARK,
    };
  }

  const { entry } = carried;
  return {
    project: entry.project,
    task: entry.summary,
    taskDescription: entry.description,
    status: CARRIED_STATUS,
    remark: `Continuing work on ${entry.summary}.`,
  };
}
