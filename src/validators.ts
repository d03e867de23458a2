/**
 * Zod schemas for data crossing a boundary: source responses, stored
 * snapshot records, and MCP tool arguments.
 *
 * Text fields use .nullish() plus a '' fallback so sparse payloads from the
 * sources (or older stored records) don't crash the pipeline.
 */

import { z } from 'zod';
import type { IssueEntry, VcsEntry } from './types/activity.js';

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

// ─── Calendar Dates ──────────────────────────────────────────

export const CalendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date as YYYY-MM-DD')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  }, 'Not a real calendar date');

/** Jira project keys: an uppercase letter, then uppercase letters, digits or underscores. */
export const JiraProjectKeySchema = z
  .string()
  .regex(/^[A-Z][A-Z0-9_]*$/, 'Expected a Jira project key such as PAY or CORE_2');

// ─── Activity Entries ────────────────────────────────────────

export const IssueEntrySchema = z
  .object({
    key: text,
    summary: text,
    description: text,
    status: text,
    project: text,
    assignee: text,
  })
  .transform((entry): IssueEntry => ({ kind: 'issue', ...entry }));

/** Event-API type names are accepted for the two event-derived entry types. */
const VCS_TYPE_ALIASES: Record<string, string> = {
  CreateEvent: 'Create',
  PullRequestEvent: 'PullRequest',
};

const VcsEntryTypeSchema = z.preprocess(
  (value) => (typeof value === 'string' ? (VCS_TYPE_ALIASES[value] ?? value) : value),
  z.enum(['Commit', 'Create', 'PullRequest'])
);

export const VcsEntrySchema = z
  .object({
    type: VcsEntryTypeSchema,
    repo: text,
    key: text,
    summary: text,
    description: text,
  })
  .transform((entry): VcsEntry => ({ kind: 'vcs', ...entry }));

export const IssueEntryListSchema = z.array(IssueEntrySchema);
export const VcsEntryListSchema = z.array(VcsEntrySchema);

/** What a source returns instead of a list when it could not fetch. */
export const SourceErrorMarkerSchema = z.object({ error: z.string() });

// ─── Stored Snapshot Records ─────────────────────────────────

export const SnapshotRecordSchema = z.object({
  date: CalendarDateSchema,
  jira: IssueEntryListSchema.default([]),
  github: VcsEntryListSchema.default([]),
  raw_jira_response: z.string().default(''),
  raw_github_response: z.string().default(''),
});

// ─── Tool Arguments ──────────────────────────────────────────

const rangeFields = {
  from: CalendarDateSchema.optional(),
  to: CalendarDateSchema.optional(),
  days: z.number().int().positive().max(366).optional(),
};

const fromAndToTogether = (args: { from?: string; to?: string }): boolean =>
  (args.from === undefined) === (args.to === undefined);

export const DateRangeArgsSchema = z
  .object(rangeFields)
  .refine(fromAndToTogether, { message: 'from and to must be given together' });

export const JiraActivityArgsSchema = z.object({
  date: CalendarDateSchema,
  projectKey: JiraProjectKeySchema.optional(),
  fetchWorklogs: z.boolean().default(false),
});

export const GitHubActivityArgsSchema = z.object({
  date: CalendarDateSchema,
  username: z.string().min(1).optional(),
});

export const InsightsArgsSchema = z
  .object({ ...rangeFields, format: z.enum(['markdown', 'json']).default('markdown') })
  .refine(fromAndToTogether, { message: 'from and to must be given together' });
