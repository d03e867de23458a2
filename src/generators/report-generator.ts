/**
 * Report Generator
 *
 * Renders timesheets, productivity reports and stored-history listings as
 * Markdown for the terminal and for MCP tool results.
 * All functions are synchronous and do no I/O.
 */

import type { EmployeeConfig } from '../config/types.js';
import type { Counts, InsightsReport } from '../insights/types.js';
import { NOT_AVAILABLE } from '../timesheet/carry-forward.js';
import type { CalendarDate, DateRange, TimesheetRow } from '../types/timesheet.js';

/** Keep table cells on one line and stop `|` from splitting columns. */
export function escapeCell(value: string): string {
  return value.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|').trim();
}

function tableRow(cells: readonly (string | number)[]): string {
  return `| ${cells.map((cell) => escapeCell(String(cell))).join(' | ')} |`;
}

function sortedByValue(counts: Counts): [string, number][] {
  return Object.entries(counts).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

// ─── Timesheet ───────────────────────────────────────────────

export interface TimesheetReportInput {
  rows: readonly TimesheetRow[];
  range: DateRange;
  employee?: EmployeeConfig;
}

/**
 * Generate the timesheet view: one table row per date, newest first,
 * followed by a short tally.
 */
export function generateTimesheetReport(input: TimesheetReportInput): string {
  const { rows, range, employee } = input;
  const parts: string[] = [];

  parts.push(`# Timesheet - ${range.start} to ${range.end}`);
  parts.push('');
  if (employee?.name) {
    const id = employee.id ? ` (${employee.id})` : '';
    parts.push(`**${employee.name}**${id} · ${employee.role} · ${employee.site}`);
    parts.push('');
  }

  if (rows.length === 0) {
    parts.push('_No rows_');
    return parts.join('\n');
  }

  parts.push(tableRow(['Date', 'Project', 'Task', 'Status', 'Remark']));
  parts.push('|------|---------|------|--------|--------|');
  for (const row of rows) {
    parts.push(tableRow([row.date, row.project, row.task, row.status, row.remark]));
  }
  parts.push('');

  const withActivity = rows.filter((row) => row.status !== NOT_AVAILABLE).length;
  parts.push(`${rows.length} day(s), ${withActivity} with recorded or carried-forward work.`);

  return parts.join('\n');
}

// ─── Insights ────────────────────────────────────────────────

function countTable(header: string, counts: Counts, unit = ''): string[] {
  const entries = sortedByValue(counts);
  if (entries.length === 0) return ['_None_'];

  const lines = [tableRow([header, 'Value']), '|------|-------|'];
  for (const [key, value] of entries) {
    lines.push(tableRow([key, `${value}${unit}`]));
  }
  return lines;
}

/** Generate the productivity report: Commits, Tickets, Distribution, Consistency. */
export function generateInsightsReport(report: InsightsReport): string {
  const { range, commit_metrics, jira_metrics, distribution, consistency } = report;
  const parts: string[] = [];

  parts.push(`# Productivity Insights - ${range.start} to ${range.end}`);
  parts.push('');
  parts.push(`_${range.total_days} day(s) analyzed from stored history_`);
  parts.push('');

  // ── Commits ──
  parts.push('## Commits');
  parts.push('');
  parts.push(`**Total:** ${commit_metrics.total_commits}`);
  parts.push('');
  parts.push(tableRow(['Date', 'Entries']));
  parts.push('|------|---------|');
  for (const [date, count] of Object.entries(commit_metrics.commits_per_day)) {
    parts.push(tableRow([date, count]));
  }
  parts.push('');
  parts.push('### By Repository');
  parts.push('');
  parts.push(...countTable('Repository', commit_metrics.commits_per_repo));
  parts.push('');

  // ── Tickets ──
  parts.push('## Tickets');
  parts.push('');
  parts.push(tableRow(['Metric', 'Value']));
  parts.push('|--------|-------|');
  parts.push(tableRow(['Touched', jira_metrics.total_tickets_touched]));
  parts.push(tableRow(['Completed', jira_metrics.tickets_completed]));
  parts.push(tableRow(['In Progress', jira_metrics.tickets_in_progress]));
  parts.push(tableRow(['Average Days Active', jira_metrics.average_days_active]));
  parts.push('');

  // ── Distribution ──
  parts.push('## Distribution');
  parts.push('');
  parts.push(`**Issue touches:** ${distribution.total_issue_touches}`);
  parts.push('');
  parts.push('### Projects');
  parts.push('');
  parts.push(...countTable('Project', distribution.project_distribution_percent, '%'));
  parts.push('');
  parts.push('### Repositories');
  parts.push('');
  parts.push(...countTable('Repository', distribution.repo_distribution_percent, '%'));
  parts.push('');

  // ── Consistency ──
  parts.push('## Consistency');
  parts.push('');
  parts.push(tableRow(['Metric', 'Value']));
  parts.push('|--------|-------|');
  parts.push(tableRow(['Active Days', `${consistency.active_days} of ${range.total_days}`]));
  parts.push(tableRow(['Longest Inactivity Streak', `${consistency.longest_inactivity_streak_days} day(s)`]));
  parts.push(tableRow(['Context Switching Days', consistency.context_switching_days]));

  return parts.join('\n');
}

// ─── History ─────────────────────────────────────────────────

export function generateHistoryReport(range: DateRange, storedDates: readonly CalendarDate[]): string {
  const parts: string[] = [];
  parts.push(`# Stored Snapshots - ${range.start} to ${range.end}`);
  parts.push('');

  if (storedDates.length === 0) {
    parts.push('_No snapshots stored for this range. Run `worklog generate` first._');
    return parts.join('\n');
  }

  for (const date of storedDates) {
    parts.push(`- ${date}`);
  }
  parts.push('');
  parts.push(`${storedDates.length} snapshot(s)`);
  return parts.join('\n');
}
