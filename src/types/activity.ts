/**
 * Activity entry types
 *
 * One day's worth of activity is a list of issue-tracker entries and a list of
 * version-control entries, tagged on `kind`.
 */

export interface IssueEntry {
  kind: 'issue';
  /** Stable ticket identity, e.g. "PROJ-42". Used to follow a ticket across days. */
  key: string;
  summary: string;
  description: string;
  status: string;
  project: string;
  assignee: string;
}

export type VcsEntryType = 'Commit' | 'Create' | 'PullRequest';

export interface VcsEntry {
  kind: 'vcs';
  type: VcsEntryType;
  repo: string;
  key: string;
  summary: string;
  description: string;
}

// ─── Status Classification ──────────────────────────────────

export const COMPLETED_STATUSES: ReadonlySet<string> = new Set([
  'done',
  'completed',
  'verified',
  'closed',
  'resolved',
]);

export const IN_PROGRESS_STATUS = 'in progress';

export function normalizeStatus(status: string): string {
  return status.trim().toLowerCase();
}

export function isCompletedStatus(status: string): boolean {
  return COMPLETED_STATUSES.has(normalizeStatus(status));
}

export function isInProgressStatus(status: string): boolean {
  return normalizeStatus(status) === IN_PROGRESS_STATUS;
}
