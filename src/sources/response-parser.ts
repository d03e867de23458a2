/**
 * Source response parsing
 *
 * Turns the JSON text an ActivitySource returned into typed entries. Parsing
 * never throws: a bad response yields no entries plus the error that explains
 * why, and the caller decides how loudly to report it.
 */

import type { z } from 'zod';
import {
  MalformedSourceResponseError,
  SourceUnavailableError,
  errorMessage,
  type WorklogError,
} from '../errors.js';
import type { IssueEntry, VcsEntry } from '../types/activity.js';
import {
  IssueEntryListSchema,
  SourceErrorMarkerSchema,
  VcsEntryListSchema,
} from '../validators.js';

export interface ParsedSourceResponse<T> {
  entries: T[];
  error: WorklogError | null;
}

function parseSourceResponse<T>(
  raw: string,
  schema: z.ZodType<T[], z.ZodTypeDef, unknown>,
  sourceName: string
): ParsedSourceResponse<T> {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (err) {
    return {
      entries: [],
      error: new MalformedSourceResponseError(
        `${sourceName} response is not valid JSON: ${errorMessage(err)}`,
        { cause: err }
      ),
    };
  }

  const marker = SourceErrorMarkerSchema.safeParse(payload);
  if (marker.success) {
    return {
      entries: [],
      error: new SourceUnavailableError(`${sourceName} unavailable: ${marker.data.error}`),
    };
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return {
      entries: [],
      error: new MalformedSourceResponseError(
        `${sourceName} response has an unexpected shape${where}: ${issue?.message ?? 'invalid'}`,
        { cause: parsed.error }
      ),
    };
  }

  return { entries: parsed.data, error: null };
}

export function parseIssueResponse(raw: string): ParsedSourceResponse<IssueEntry> {
  return parseSourceResponse(raw, IssueEntryListSchema, 'Jira');
}

export function parseVcsResponse(raw: string): ParsedSourceResponse<VcsEntry> {
  return parseSourceResponse(raw, VcsEntryListSchema, 'GitHub');
}
