/**
 * MCP tool definitions and handlers.
 *
 * Handlers take a runtime factory so each call reads the current profile and
 * credentials, and closes the snapshot store when it is done.
 */

import type { z } from 'zod';

import {
  hasGitHubCredentials,
  hasJiraCredentials,
  hasSummarizerCredentials,
} from './config/credentials.js';
import { historyDbPath, resolveConfigDir } from './config/paths.js';
import { profileConfigExists, readProfileConfig } from './config/profile-config.js';
import { errorMessage } from './errors.js';
import { generateInsightsReport, generateTimesheetReport } from './generators/report-generator.js';
import { analyzeInsights, generateTimesheet, rangeFor, type Runtime } from './runtime.js';
import {
  DateRangeArgsSchema,
  GitHubActivityArgsSchema,
  InsightsArgsSchema,
  JiraActivityArgsSchema,
} from './validators.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export type RuntimeFactory = () => Runtime;

const DATE_PROPERTY = {
  type: 'string' as const,
  description: 'Calendar date (YYYY-MM-DD)',
};

const RANGE_PROPERTIES = {
  from: { type: 'string' as const, description: 'Range start (YYYY-MM-DD). Requires "to".' },
  to: { type: 'string' as const, description: 'Range end (YYYY-MM-DD), inclusive. Requires "from".' },
  days: {
    type: 'number' as const,
    description: 'Last N days ending today (used when from/to are omitted)',
  },
};

// ─── Tool Definitions ────────────────────────────────────────

export const TOOL_DEFINITIONS = [
  {
    name: 'get_jira_activity',
    description:
      'Fetch the Jira issues of a project updated on one date. Returns the raw JSON list the timesheet is built from, or {"error": ...} when Jira is unavailable. Set fetchWorklogs to attach each issue\'s logged time.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        projectKey: {
          type: 'string' as const,
          description: 'Jira project key (defaults to the profile project)',
        },
        date: DATE_PROPERTY,
        fetchWorklogs: {
          type: 'boolean' as const,
          description: 'Attach worklogs (author, author_email, date, time_spent_seconds) to each issue',
        },
      },
      required: ['date'],
    },
  },
  {
    name: 'get_github_activity',
    description:
      'Fetch a GitHub user\'s commits, branch creations and pull request activity on one date as raw JSON, or {"error": ...} when GitHub is unavailable.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        username: {
          type: 'string' as const,
          description: 'GitHub username (defaults to the profile user)',
        },
        date: DATE_PROPERTY,
      },
      required: ['date'],
    },
  },
  {
    name: 'generate_timesheet',
    description:
      'Build the timesheet for a date range: one row per day with project, task, status and a summarized remark. Fetches Jira and GitHub activity, stores a snapshot per day, and carries in-progress tickets forward over idle days. Use when the user asks: "timesheet", "what did I work on this week", "fill my hours".',
    inputSchema: {
      type: 'object' as const,
      properties: RANGE_PROPERTIES,
    },
  },
  {
    name: 'productivity_insights',
    description:
      'Analyze stored daily snapshots for a date range: commits per day and repo, tickets touched and completed, project distribution, consistency and context switching. Reads stored history only; run generate_timesheet first to collect it.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        ...RANGE_PROPERTIES,
        format: {
          type: 'string' as const,
          enum: ['markdown', 'json'],
          description: 'Output format (default: markdown)',
        },
      },
    },
  },
  {
    name: 'get_capabilities',
    description: 'Show configuration status, available tools and how to finish setup.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
];

// ─── Dispatch ────────────────────────────────────────────────

export async function callTool(
  name: string,
  args: Record<string, unknown> | undefined,
  openRuntime: RuntimeFactory,
  now: Date = new Date()
): Promise<ToolResult> {
  try {
    switch (name) {
      case 'get_jira_activity':
        return await withRuntime(openRuntime, (runtime) => handleJiraActivity(runtime, args));
      case 'get_github_activity':
        return await withRuntime(openRuntime, (runtime) => handleGitHubActivity(runtime, args));
      case 'generate_timesheet':
        return await withRuntime(openRuntime, (runtime) => handleTimesheet(runtime, args, now));
      case 'productivity_insights':
        return await withRuntime(openRuntime, (runtime) => handleInsights(runtime, args, now));
      case 'get_capabilities':
        return handleGetCapabilities();
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    return {
      content: [{ type: 'text', text: `Error: ${errorMessage(error)}` }],
      isError: true,
    };
  }
}

async function withRuntime(
  openRuntime: RuntimeFactory,
  handler: (runtime: Runtime) => Promise<ToolResult> | ToolResult
): Promise<ToolResult> {
  const runtime = openRuntime();
  try {
    return await handler(runtime);
  } finally {
    runtime.store.close();
  }
}

/** Parse tool arguments, joining every issue into one message. */
export function parseToolArgs<T extends z.ZodTypeAny>(
  schema: T,
  args: Record<string, unknown> | undefined
): z.output<T> {
  const result = schema.safeParse(args ?? {});
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  throw new Error(`Invalid arguments: ${issues.join('; ')}`);
}

function text(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }] };
}

// ─── Raw Activity ────────────────────────────────────────────

async function handleJiraActivity(
  runtime: Runtime,
  args: Record<string, unknown> | undefined
): Promise<ToolResult> {
  const { date, projectKey, fetchWorklogs } = parseToolArgs(JiraActivityArgsSchema, args);
  return text(
    await runtime.source.fetchIssues(projectKey ?? runtime.profile.jira.projectKey, date, {
      fetchWorklogs,
    })
  );
}

async function handleGitHubActivity(
  runtime: Runtime,
  args: Record<string, unknown> | undefined
): Promise<ToolResult> {
  const { date, username } = parseToolArgs(GitHubActivityArgsSchema, args);
  return text(
    await runtime.source.fetchVcsActivity(username ?? runtime.profile.github.username, date)
  );
}

// ─── Timesheet & Insights ────────────────────────────────────

async function handleTimesheet(
  runtime: Runtime,
  args: Record<string, unknown> | undefined,
  now: Date
): Promise<ToolResult> {
  const request = parseToolArgs(DateRangeArgsSchema, args);
  const range = rangeFor(runtime.profile, request, now);
  const rows = await generateTimesheet(runtime, range);
  return text(generateTimesheetReport({ rows, range, employee: runtime.profile.employee }));
}

function handleInsights(
  runtime: Runtime,
  args: Record<string, unknown> | undefined,
  now: Date
): ToolResult {
  const { format, ...request } = parseToolArgs(InsightsArgsSchema, args);
  const range = rangeFor(runtime.profile, request, now);
  const report = analyzeInsights(runtime, range);
  return text(format === 'json' ? JSON.stringify(report, null, 2) : generateInsightsReport(report));
}

// ─── Get Capabilities ────────────────────────────────────────

function handleGetCapabilities(): ToolResult {
  const profile = readProfileConfig();
  const jira = hasJiraCredentials();
  const github = hasGitHubCredentials();
  const summarizer = hasSummarizerCredentials();

  const parts: string[] = [];
  parts.push('# worklog MCP');
  parts.push('');

  parts.push('## Status');
  parts.push('');
  parts.push('| Component | Status |');
  parts.push('|-----------|--------|');
  parts.push(`| Config directory | \`${resolveConfigDir()}\` |`);
  parts.push(`| History database | \`${historyDbPath()}\` |`);
  parts.push(
    `| Profile | ${profile ? `${profile.jira.projectKey} / @${profile.github.username}` : 'Not configured (defaults in use)'} |`
  );
  parts.push(`| Jira credentials | ${jira ? 'Configured' : 'Not configured'} |`);
  parts.push(`| GitHub credentials | ${github ? 'Configured' : 'Not configured'} |`);
  parts.push(`| Summarizer | ${summarizer ? 'Configured' : 'Not configured (placeholder remarks)'} |`);
  parts.push('');

  if (!jira || !github || !profileConfigExists()) {
    parts.push('## Getting Started');
    parts.push('');
    parts.push('Run `worklog init` in a terminal, or set these variables in your MCP server config:');
    parts.push('');
    parts.push('```json');
    parts.push('"env": {');
    parts.push('  "JIRA_HOST": "yourcompany.atlassian.net",');
    parts.push('  "JIRA_EMAIL": "you@example.com",');
    parts.push('  "JIRA_API_TOKEN": "your_jira_api_token",');
    parts.push('  "GITHUB_TOKEN": "your_github_token",');
    parts.push('  "GROQ_API_KEY": "optional_summarizer_key"');
    parts.push('}');
    parts.push('```');
    parts.push('');
  }

  parts.push('## Available Tools');
  parts.push('');
  parts.push('- **get_jira_activity**: raw Jira issues for a project and date');
  parts.push('- **get_github_activity**: raw GitHub activity for a user and date');
  parts.push('- **generate_timesheet**: one row per day over a date range');
  parts.push('- **productivity_insights**: metrics from stored history');

  return text(parts.join('\n'));
}
