/**
 * GitHub REST API Client
 *
 * Uses native fetch. Reads a user's public event feed and searches commits
 * by author and committer date. Responses are mapped to our internal types.
 */

import type {
  GitHubApiUser,
  GitHubApiEvent,
  GitHubApiCommitSearchItem,
  GitHubApiSearchResult,
} from './types.js';
import type { GitHubCommit, GitHubEvent } from '../types/github.js';

const GITHUB_API = 'https://api.github.com';
const DEFAULT_TIMEOUT_MS = 30_000;
const PAGE_SIZE = 100;
/** The events API serves at most 300 events (3 pages of 100). */
const MAX_EVENT_PAGES = 3;

export class GitHubClientError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public retryable: boolean
  ) {
    super(message);
    this.name = 'GitHubClientError';
  }
}

export class GitHubClient {
  constructor(private token: string) {}

  /**
   * Get the authenticated user's profile.
   * Used to validate the token is working.
   */
  async getAuthenticatedUser(): Promise<{ login: string; name: string | null }> {
    const user = await this.get<GitHubApiUser>('/user');
    return { login: user.login, name: user.name };
  }

  /**
   * Get a user's events, newest first.
   * Stops paging once an event older than `notBefore` (YYYY-MM-DD) shows up.
   */
  async getUserEvents(username: string, notBefore?: string): Promise<GitHubEvent[]> {
    const events: GitHubEvent[] = [];

    for (let page = 1; page <= MAX_EVENT_PAGES; page++) {
      const batch = await this.get<GitHubApiEvent[]>(
        `/users/${encodeURIComponent(username)}/events?per_page=${PAGE_SIZE}&page=${page}`
      );

      for (const event of batch) {
        if (!event.created_at) continue;
        events.push(mapEvent(event, event.created_at));
      }

      const last = events[events.length - 1];
      const reachedOlder =
        notBefore !== undefined && last !== undefined && last.createdAt.slice(0, 10) < notBefore;
      if (batch.length < PAGE_SIZE || reachedOlder) break;
    }

    return events;
  }

  /**
   * Search commits authored by a user with a given committer date (YYYY-MM-DD).
   * Newest first, at most one page of 100.
   */
  async searchCommits(username: string, date: string): Promise<GitHubCommit[]> {
    const query = new URLSearchParams();
    query.set('q', `author:${username} committer-date:${date}`);
    query.set('sort', 'committer-date');
    query.set('order', 'desc');
    query.set('per_page', String(PAGE_SIZE));

    const result = await this.get<GitHubApiSearchResult<GitHubApiCommitSearchItem>>(
      `/search/commits?${query.toString()}`
    );

    return result.items.map((item) => ({
      sha: item.sha,
      message: item.commit.message,
      author: item.commit.author?.name ?? username,
      date: item.commit.committer?.date ?? item.commit.author?.date ?? '',
      repo: item.repository?.full_name ?? 'unknown',
      url: item.html_url,
    }));
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async get<T>(path: string): Promise<T> {
    const url = `${GITHUB_API}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), DEFAULT_TIMEOUT_MS);

    try {
      const response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${this.token}`,
          Accept: 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        throw new GitHubClientError(
          `GitHub API error: ${response.status} ${response.statusText} for ${path}`,
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

function mapEvent(event: GitHubApiEvent, createdAt: string): GitHubEvent {
  const payload = event.payload ?? {};
  return {
    id: event.id,
    type: event.type,
    createdAt,
    repo: event.repo?.name ?? 'unknown',
    ref: payload.ref ?? undefined,
    refType: payload.ref_type,
    action: payload.action,
    pullRequestTitle: payload.pull_request?.title,
    pullRequestUrl: payload.pull_request?.html_url,
  };
}
