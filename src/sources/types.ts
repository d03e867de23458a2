/**
 * The activity source seam.
 *
 * Both calls resolve to JSON text: an array of entry objects, or an
 * `{"error": "..."}` marker when the source could not be reached. The text is
 * stored verbatim as the day's raw response, so implementations should not
 * throw for ordinary upstream failures.
 */

import type { CalendarDate } from '../types/timesheet.js';

export interface IssueFetchOptions {
  /** Attach each issue's worklogs as a `worklogs` array. */
  fetchWorklogs?: boolean;
}

export interface ActivitySource {
  /** Issues in `projectKey` updated on `date`. */
  fetchIssues(
    projectKey: string,
    date: CalendarDate,
    options?: IssueFetchOptions
  ): Promise<string>;
  /** Branches, pull requests and commits by `username` on `date`. */
  fetchVcsActivity(username: string, date: CalendarDate): Promise<string>;
}

export function sourceErrorMarker(message: string): string {
  return JSON.stringify({ error: message });
}
