/**
 * Timesheet Assembler
 *
 * Walks a date range oldest first. For each date it fetches both sources,
 * stores the day's snapshot, and builds exactly one row. Oldest-first matters:
 * carry-forward reads the snapshots written for earlier dates in the same run.
 * Rows come back newest first.
 */

import { DEFAULT_POLICY, type ResolvedPolicy } from '../config/policy.js';
import { SnapshotPersistenceError, errorMessage } from '../errors.js';
import type { DailySnapshot, SnapshotStore } from '../history/types.js';
import { defaultLogger, type Logger } from '../log.js';
import { parseIssueResponse, parseVcsResponse } from '../sources/response-parser.js';
import { sourceErrorMarker, type ActivitySource } from '../sources/types.js';
import { fallbackRemark, type Summarizer } from '../summarize/summarizer.js';
import type { IssueEntry, VcsEntry } from '../types/activity.js';
import type {
  ActivityTarget,
  CalendarDate,
  DateRange,
  TimesheetRow,
} from '../types/timesheet.js';
import { carryForwardFields, findCarriedTask, type RowFields } from './carry-forward.js';
import { enumerateDates } from './date-range.js';
import { selectTask } from './task-selector.js';

export const GENERAL_PROJECT = 'GitHub/General';
export const GENERAL_TASK = 'General Development Activities';
export const GENERAL_DESCRIPTION = 'See Remarks for details.';
export const GENERAL_STATUS = 'Completed';

export interface TimesheetAssemblerOptions {
  source: ActivitySource;
  store: SnapshotStore;
  summarizer: Summarizer;
  policy?: ResolvedPolicy;
  logger?: Logger;
}

export class TimesheetAssembler {
  private readonly source: ActivitySource;
  private readonly store: SnapshotStore;
  private readonly summarizer: Summarizer;
  private readonly policy: ResolvedPolicy;
  private readonly logger: Logger;

  constructor(options: TimesheetAssemblerOptions) {
    this.source = options.source;
    this.store = options.store;
    this.summarizer = options.summarizer;
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.logger = options.logger ?? defaultLogger;
  }

  async assemble(target: ActivityTarget, range: DateRange): Promise<TimesheetRow[]> {
    const dates = enumerateDates(range);
    const rows: TimesheetRow[] = [];

    for (const date of dates) {
      const snapshot = await this.collect(target, date);
      this.persist(snapshot);
      rows.push(await this.buildRow(snapshot));
    }

    return sortNewestFirst(rows);
  }

  // ─── Per-date Steps ─────────────────────────────────────────

  private async collect(target: ActivityTarget, date: CalendarDate): Promise<DailySnapshot> {
    const [rawIssueResponse, rawVcsResponse] = await Promise.all([
      this.fetchRaw('Jira', date, () => this.source.fetchIssues(target.projectKey, date)),
      this.fetchRaw('GitHub', date, () => this.source.fetchVcsActivity(target.username, date)),
    ]);

    const issues = parseIssueResponse(rawIssueResponse);
    if (issues.error) this.logger.warn(`${date}: ${issues.error.message}`);

    const vcs = parseVcsResponse(rawVcsResponse);
    if (vcs.error) this.logger.warn(`${date}: ${vcs.error.message}`);

    this.logger.debug(
      `${date}: ${issues.entries.length} issue(s), ${vcs.entries.length} vcs entr(ies)`
    );

    return {
      date,
      issueEntries: issues.entries,
      vcsEntries: vcs.entries,
      rawIssueResponse,
      rawVcsResponse,
    };
  }

  /** A source that rejects is recorded the same way as one that returned an error marker. */
  private async fetchRaw(
    sourceName: string,
    date: CalendarDate,
    fetcher: () => Promise<string>
  ): Promise<string> {
    try {
      return await fetcher();
    } catch (err) {
      this.logger.warn(`${date}: ${sourceName} fetch failed: ${errorMessage(err)}`);
      return sourceErrorMarker(`${sourceName} fetch failed: ${errorMessage(err)}`);
    }
  }

  private persist(snapshot: DailySnapshot): void {
    try {
      this.store.put(snapshot.date, snapshot);
    } catch (err) {
      const failure =
        err instanceof SnapshotPersistenceError
          ? err
          : new SnapshotPersistenceError(snapshot.date, errorMessage(err), { cause: err });
      this.logger.error(`${snapshot.date}: snapshot not saved: ${failure.message}`);
    }
  }

  private async buildRow(snapshot: DailySnapshot): Promise<TimesheetRow> {
    const { date } = snapshot;
    const selected = selectTask(snapshot.issueEntries);
    const vcsContext = formatVcsContext(snapshot.vcsEntries);

    if (selected) {
      const issueContext = formatIssueContext(selected, this.policy.summarizerContextLimit);
      return {
        date,
        project: selected.project,
        task: selected.summary,
        taskDescription: selected.description,
        status: selected.status,
        remark: await this.summarize(issueContext, vcsContext, date),
      };
    }

    if (snapshot.vcsEntries.length > 0) {
      return {
        date,
        project: GENERAL_PROJECT,
        task: GENERAL_TASK,
        taskDescription: GENERAL_DESCRIPTION,
        status: GENERAL_STATUS,
        remark: await this.summarize('', vcsContext, date),
      };
    }

    const carried = findCarriedTask(this.store, date, this.policy.lookbackDays, this.logger);
    if (carried) this.logger.debug(`${date}: carrying forward ${carried.entry.key} from ${carried.fromDate}`);
    const fields: RowFields = carryForwardFields(carried);
    return { date, ...fields };
  }

  private async summarize(issueContext: string, vcsContext: string, date: CalendarDate): Promise<string> {
    try {
      return await this.summarizer.summarize(issueContext, vcsContext, date);
    } catch (err) {
      this.logger.warn(`${date}: summarizer threw: ${errorMessage(err)}`);
      return fallbackRemark(err, issueContext, vcsContext, this.policy.fallbackSnippetLength);
    }
  }
}

// ─── Summarizer Context ──────────────────────────────────────

export function formatIssueContext(entry: IssueEntry, descriptionLimit: number): string {
  const lines = [`Issue ${entry.key} [${entry.status}] in ${entry.project}: ${entry.summary}`];
  const description = entry.description.slice(0, descriptionLimit);
  if (description) lines.push(`Description: ${description}`);
  return lines.join('\n');
}

export function formatVcsContext(entries: readonly VcsEntry[]): string {
  return entries.map((e) => `- ${e.type} in ${e.repo}: ${e.summary}`).join('\n');
}

function sortNewestFirst(rows: TimesheetRow[]): TimesheetRow[] {
  return [...rows].sort((a, b) => b.date.localeCompare(a.date));
}
