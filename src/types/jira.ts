/**
 * Jira data types, as mapped by the Jira client
 */

export interface JiraIssue {
  key: string;
  summary: string;
  status: string;
  description: string;
  assignee: string;
  /** Project display name, e.g. "Payments Platform". */
  project: string;
  updatedAt: string;
}

/** Time logged against an issue. `date` is the YYYY-MM-DD the work started. */
export interface JiraWorklog {
  author: string;
  authorEmail: string;
  date: string;
  timeSpentSeconds: number;
}
