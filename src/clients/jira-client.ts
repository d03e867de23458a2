/**
 * Jira Cloud REST API Client
 *
 * Uses native fetch with basic auth (email:apiToken).
 * Only the calls the timesheet needs: who am I, JQL search, and an issue's
 * worklogs.
 */

import type {
  JiraApiUser,
  JiraApiIssue,
  JiraApiSearchResult,
  JiraApiWorklog,
  JiraApiWorklogPage,
} from './types.js';
import type { JiraIssue, JiraWorklog } from '../types/jira.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_RESULTS = 50;

const ISSUE_FIELDS = ['summary', 'status', 'updated', 'description', 'assignee', 'project'];

export class JiraClientError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public retryable: boolean
  ) {
    super(message);
    this.name = 'JiraClientError';
  }
}

export class JiraClient {
  private baseUrl: string;
  private authHeader: string;

  constructor(host: string, email: string, apiToken: string) {
    const withScheme = /^https?:\/\//.test(host) ? host : `https://${host}`;
    this.baseUrl = withScheme.replace(/\/+$/, '');
    this.authHeader = `Basic ${Buffer.from(`${email}:${apiToken}`).toString('base64')}`;
  }

  /**
   * Get the authenticated user's profile.
   * Used to validate credentials are working.
   */
  async getMyself(): Promise<{ accountId: string; displayName: string }> {
    const user = await this.get<JiraApiUser>('/rest/api/3/myself');
    return { accountId: user.accountId, displayName: user.displayName };
  }

  /**
   * Search for issues using JQL.
   * A single page of up to maxResults issues, in the order Jira returns them.
   */
  async searchIssues(jql: string, maxResults = DEFAULT_MAX_RESULTS): Promise<JiraIssue[]> {
    const result = await this.post<JiraApiSearchResult>('/rest/api/3/search/jql', {
      jql,
      fields: ISSUE_FIELDS,
      maxResults,
    });

    return result.issues.map((issue) => mapIssue(issue));
  }

  /** All worklogs of an issue, oldest first, following the page offsets. */
  async getWorklogs(issueKey: string): Promise<JiraWorklog[]> {
    const worklogs: JiraWorklog[] = [];
    const path = `/rest/api/3/issue/${encodeURIComponent(issueKey)}/worklog`;

    let startAt = 0;
    for (;;) {
      const page = await this.get<JiraApiWorklogPage>(`${path}?startAt=${startAt}`);
      worklogs.push(...page.worklogs.map(mapWorklog));

      startAt = page.startAt + page.worklogs.length;
      if (page.worklogs.length === 0 || startAt >= page.total) break;
    }

    return worklogs;
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async get<T>(path: string): Promise<T> {
    return this.request<T>('GET', path);
  }

  private async post<T>(path: string, body: unknown): Promise<T> {
    return this.request<T>('POST', path, body);
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), DEFAULT_TIMEOUT_MS);

    try {
      const headers: Record<string, string> = {
        Authorization: this.authHeader,
        Accept: 'application/json',
      };

      const init: RequestInit = {
        method,
        headers,
        signal: controller.signal,
      };

      if (body !== undefined) {
        headers['Content-Type'] = 'application/json';
        init.body = JSON.stringify(body);
      }

      const response = await fetch(url, init);

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        throw new JiraClientError(
          `Jira API error: ${response.status} ${response.statusText} for ${path}`,
          response.status,
          retryable
        );
      }

      return (await response.json()) as T;
    } finally {
      clearTimeout(timeout);
    }
  }
}

// ─── Mapping ─────────────────────────────────────────────

function mapIssue(issue: JiraApiIssue): JiraIssue {
  const { fields } = issue;
  return {
    key: issue.key,
    summary: fields.summary ?? '',
    status: fields.status?.name ?? '',
    description: descriptionText(fields.description),
    assignee: fields.assignee?.displayName ?? 'Unassigned',
    project: fields.project?.name ?? '',
    updatedAt: fields.updated ?? '',
  };
}

function mapWorklog(worklog: JiraApiWorklog): JiraWorklog {
  return {
    author: worklog.author?.displayName ?? 'Unknown',
    authorEmail: worklog.author?.emailAddress ?? '',
    date: (worklog.started ?? '').slice(0, 10),
    timeSpentSeconds: worklog.timeSpentSeconds ?? 0,
  };
}

function descriptionText(description: unknown): string {
  if (typeof description === 'string') return description;
  return extractTextFromADF(description).trim();
}

// ─── ADF Text Extraction ──────────────────────────────────

const BLOCK_NODES = new Set(['paragraph', 'heading', 'listItem', 'codeBlock', 'blockquote']);

/**
 * Extract plain text from Atlassian Document Format (ADF).
 * Recursively walks the ADF tree collecting text nodes; block nodes end in a newline.
 */
export function extractTextFromADF(adf: unknown): string {
  if (!isRecord(adf)) return '';
  if (adf['type'] === 'text' && typeof adf['text'] === 'string') {
    return adf['text'];
  }
  if (adf['type'] === 'hardBreak') {
    return '\n';
  }
  const content = adf['content'];
  if (Array.isArray(content)) {
    const text = content.map((child: unknown) => extractTextFromADF(child)).join('');
    const withBreak = typeof adf['type'] === 'string' && BLOCK_NODES.has(adf['type']);
    return (withBreak ? `${text}\n` : text).replace(/\n{3,}/g, '\n\n');
  }
  return '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
