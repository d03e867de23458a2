/**
 * API Response Types
 *
 * TypeScript types for raw GitHub and Jira REST API responses.
 * These are the shapes returned by the API; they get mapped to
 * our internal types (src/types/) by the client modules.
 */

// ─── GitHub API Responses ────────────────────────────────────

export interface GitHubApiUser {
  login: string;
  id: number;
  name: string | null;
}

/** An entry of GET /users/{username}/events. Payload varies by event type. */
export interface GitHubApiEvent {
  id: string;
  type: string;
  created_at: string | null;
  repo: { name: string } | null;
  payload?: {
    ref?: string | null;
    ref_type?: string;
    action?: string;
    pull_request?: {
      title?: string;
      html_url?: string;
    };
  };
}

/** An item of GET /search/commits. */
export interface GitHubApiCommitSearchItem {
  sha: string;
  html_url: string;
  commit: {
    message: string;
    author: { name: string; date: string } | null;
    committer: { date: string } | null;
  };
  repository: { full_name: string } | null;
}

export interface GitHubApiSearchResult<T> {
  total_count: number;
  incomplete_results: boolean;
  items: T[];
}

// ─── Jira API Responses ──────────────────────────────────────

export interface JiraApiUser {
  accountId: string;
  displayName: string;
  emailAddress?: string;
  active: boolean;
}

export interface JiraApiIssue {
  id: string;
  key: string;
  fields: {
    summary?: string;
    status?: { name: string } | null;
    assignee?: { displayName: string } | null;
    project?: { key: string; name: string } | null;
    /** Atlassian Document Format on Cloud v3; plain text on older servers. */
    description?: unknown;
    updated?: string;
  };
}

export interface JiraApiSearchResult {
  issues: JiraApiIssue[];
  nextPageToken?: string;
  isLast?: boolean;
}

/** An entry of GET /rest/api/3/issue/{key}/worklog. */
export interface JiraApiWorklog {
  id: string;
  author?: { displayName?: string; emailAddress?: string } | null;
  started?: string;
  timeSpentSeconds?: number;
}

export interface JiraApiWorklogPage {
  startAt: number;
  maxResults: number;
  total: number;
  worklogs: JiraApiWorklog[];
}
