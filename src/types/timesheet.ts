/**
 * Timesheet types
 */

/** A calendar day as `YYYY-MM-DD`. */
export type CalendarDate = string;

export interface DateRange {
  start: CalendarDate;
  end: CalendarDate;
}

/** One row per date. Column names follow the exported timesheet. */
export interface TimesheetRow {
  date: CalendarDate;
  project: string;
  task: string;
  taskDescription: string;
  status: string;
  remark: string;
}

/** Who to fetch activity for: the Jira project and the GitHub user. */
export interface ActivityTarget {
  projectKey: string;
  username: string;
}
