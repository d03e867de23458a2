/**
 * Task Selector
 *
 * Picks the one issue that represents a day on the timesheet: finished work
 * first, then work in progress, then anything else. Ties keep fetch order.
 */

import { isCompletedStatus, isInProgressStatus, type IssueEntry } from '../types/activity.js';

export type IssueRank = 0 | 1 | 2;

export function issueRank(status: string): IssueRank {
  if (isCompletedStatus(status)) return 0;
  if (isInProgressStatus(status)) return 1;
  return 2;
}

export function selectTask(entries: readonly IssueEntry[]): IssueEntry | null {
  let best: { entry: IssueEntry; rank: IssueRank } | null = null;

  for (const entry of entries) {
    const rank = issueRank(entry.status);
    // Strictly lower rank only, so the earliest entry wins a tie.
    if (best === null || rank < best.rank) {
      best = { entry, rank };
      if (rank === 0) break;
    }
  }

  return best?.entry ?? null;
}
