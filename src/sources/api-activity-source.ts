/**
 * API-backed ActivitySource
 *
 * Reads issues from Jira Cloud and branch, pull request and commit activity
 * from GitHub for a single calendar date. Upstream failures become error
 * markers in the returned text; nothing here throws for a bad response.
 */

import { GitHubClient } from '../clients/github-client.js';
import { JiraClient } from '../clients/jira-client.js';
import { resolveGitHubCredentials, resolveJiraCredentials } from '../config/credentials.js';
import { errorMessage } from '../errors.js';
import { defaultLogger, type Logger } from '../log.js';
import { shiftDate } from '../timesheet/date-range.js';
import type { GitHubCommit, GitHubEvent } from '../types/github.js';
import type { JiraIssue, JiraWorklog } from '../types/jira.js';
import type { CalendarDate } from '../types/timesheet.js';
import { sourceErrorMarker, type ActivitySource, type IssueFetchOptions } from './types.js';

/** Jira's page size for a single day of one project. */
const MAX_ISSUES_PER_DAY = 50;

export const JIRA_NOT_CONFIGURED = 'Jira credentials not configured.';
export const GITHUB_NOT_CONFIGURED = 'GitHub token not configured.';

interface RawWorklog {
  author: string;
  author_email: string;
  date: string;
  time_spent_seconds: number;
}

interface RawIssue {
  key: string;
  summary: string;
  description: string;
  status: string;
  project: string;
  assignee: string;
  updated: string;
  worklogs?: RawWorklog[];
}

interface RawVcsEntry {
  type: 'Create' | 'PullRequest' | 'Commit';
  repo: string;
  key: string;
  summary: string;
  description: string;
}

export interface ApiActivitySourceOptions {
  jira: JiraClient | null;
  github: GitHubClient | null;
  logger?: Logger;
}

export class ApiActivitySource implements ActivitySource {
  private readonly jira: JiraClient | null;
  private readonly github: GitHubClient | null;
  private readonly logger: Logger;

  constructor(options: ApiActivitySourceOptions) {
    this.jira = options.jira;
    this.github = options.github;
    this.logger = options.logger ?? defaultLogger;
  }

  async fetchIssues(
    projectKey: string,
    date: CalendarDate,
    options: IssueFetchOptions = {}
  ): Promise<string> {
    const jira = this.jira;
    if (!jira) return sourceErrorMarker(JIRA_NOT_CONFIGURED);

    const jql = buildDailyJql(projectKey, date);
    this.logger.debug(`Jira search: ${jql}`);

    let issues: JiraIssue[];
    try {
      issues = await jira.searchIssues(jql, MAX_ISSUES_PER_DAY);
    } catch (err) {
      this.logger.warn(`Jira search for ${projectKey} on ${date} failed: ${errorMessage(err)}`);
      return sourceErrorMarker(`Error fetching Jira data: ${errorMessage(err)}`);
    }

    const raw = issues.map(toRawIssue);
    if (options.fetchWorklogs) {
      for (const issue of raw) {
        issue.worklogs = await this.worklogsFor(jira, issue.key);
      }
    }
    return JSON.stringify(raw);
  }

  /** A failed worklog fetch leaves that issue with no worklogs. */
  private async worklogsFor(jira: JiraClient, issueKey: string): Promise<RawWorklog[]> {
    try {
      const worklogs = await jira.getWorklogs(issueKey);
      return worklogs.map(toRawWorklog);
    } catch (err) {
      this.logger.warn(`Worklogs for ${issueKey} failed: ${errorMessage(err)}`);
      return [];
    }
  }

  async fetchVcsActivity(username: string, date: CalendarDate): Promise<string> {
    if (!this.github) return sourceErrorMarker(GITHUB_NOT_CONFIGURED);

    const entries: RawVcsEntry[] = [];
    const failures: string[] = [];

    try {
      const events = await this.github.getUserEvents(username, date);
      entries.push(...eventsOnDate(events, date));
    } catch (err) {
      this.logger.warn(`GitHub events for ${username} on ${date} failed: ${errorMessage(err)}`);
      failures.push(errorMessage(err));
    }

    try {
      const commits = await this.github.searchCommits(username, date);
      entries.push(...uniqueCommits(commits));
    } catch (err) {
      this.logger.warn(`GitHub commit search for ${username} on ${date} failed: ${errorMessage(err)}`);
      failures.push(errorMessage(err));
    }

    // Both halves down means we know nothing about the day.
    if (failures.length === 2) {
      return sourceErrorMarker(`Error fetching GitHub data: ${failures.join('; ')}`);
    }

    return JSON.stringify(entries);
  }
}

/** Build a source from credentials in the environment or credentials.json. */
export function createApiActivitySource(logger: Logger = defaultLogger): ApiActivitySource {
  const jiraCreds = resolveJiraCredentials();
  const githubCreds = resolveGitHubCredentials();

  return new ApiActivitySource({
    jira: jiraCreds ? new JiraClient(jiraCreds.host, jiraCreds.email, jiraCreds.apiToken) : null,
    github: githubCreds ? new GitHubClient(githubCreds.token) : null,
    logger,
  });
}

// ─── Mapping ─────────────────────────────────────────────────

export function buildDailyJql(projectKey: string, date: CalendarDate): string {
  const next = shiftDate(date, 1);
  return `project = ${quoteJql(projectKey)} AND updated >= "${date}" AND updated < "${next}" ORDER BY updated DESC`;
}

/** Double-quoted JQL string literal. */
export function quoteJql(value: string): string {
  return `"${value.replace(/[\\"]/g, (ch) => `\\${ch}`)}"`;
}

function toRawWorklog(worklog: JiraWorklog): RawWorklog {
  return {
    author: worklog.author,
    author_email: worklog.authorEmail,
    date: worklog.date,
    time_spent_seconds: worklog.timeSpentSeconds,
  };
}

function toRawIssue(issue: JiraIssue): RawIssue {
  return {
    key: issue.key,
    summary: issue.summary,
    description: issue.description,
    status: issue.status,
    project: issue.project,
    assignee: issue.assignee,
    updated: issue.updatedAt,
  };
}

/**
 * Branch/tag creations and pull request events from `date`.
 * The feed is newest first, so the first older event ends the scan.
 */
function eventsOnDate(events: GitHubEvent[], date: CalendarDate): RawVcsEntry[] {
  const entries: RawVcsEntry[] = [];

  for (const event of events) {
    const day = event.createdAt.slice(0, 10);
    if (day < date) break;
    if (day !== date) continue;

    if (event.type === 'CreateEvent') {
      const ref = event.ref ?? 'unknown';
      entries.push({
        type: 'Create',
        repo: event.repo,
        key: `create-${ref}-${event.createdAt}`,
        summary: `Created ${event.refType ?? ''} '${ref}'`,
        description: '',
      });
    } else if (event.type === 'PullRequestEvent') {
      const action = event.action ?? '';
      const title = event.pullRequestTitle ?? '';
      entries.push({
        type: 'PullRequest',
        repo: event.repo,
        key: event.pullRequestUrl ?? '',
        summary: `PR ${action}: ${title}`,
        description: `Pull Request: ${title} (${action})`,
      });
    }
  }

  return entries;
}

function uniqueCommits(commits: GitHubCommit[]): RawVcsEntry[] {
  const seen = new Set<string>();
  const entries: RawVcsEntry[] = [];

  for (const commit of commits) {
    if (seen.has(commit.sha)) continue;
    seen.add(commit.sha);

    entries.push({
      type: 'Commit',
      repo: commit.repo,
      key: commit.sha,
      summary: commit.message.split('\n')[0] ?? '',
      description: commit.message,
    });
  }

  return entries;
}
