#!/usr/bin/env node

/**
 * worklog CLI
 *
 * Build timesheets from Jira and GitHub activity and analyze the stored
 * history from the command line.
 *
 * Usage:
 *   worklog generate [--from YYYY-MM-DD --to YYYY-MM-DD | --days N] [--csv [path]] [--xlsx [path]]
 *   worklog insights [--from ... --to ... | --days N] [--json [path]]
 *   worklog history [--from ... --to ... | --days N]
 *   worklog status
 *   worklog init
 */

import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { runInit } from './commands/init.js';
import {
  hasGitHubCredentials,
  hasJiraCredentials,
  hasSummarizerCredentials,
} from './config/credentials.js';
import { historyDbPath, resolveConfigDir } from './config/paths.js';
import { profileConfigExists } from './config/profile-config.js';
import {
  generateHistoryReport,
  generateInsightsReport,
  generateTimesheetReport,
} from './generators/report-generator.js';
import { setDebugEnabled } from './log.js';
import {
  analyzeInsights,
  createRuntime,
  generateTimesheet,
  rangeFor,
  todayFor,
  type Runtime,
} from './runtime.js';
import type { DateRangeRequest } from './timesheet/date-range.js';
import { defaultExportName, writeTimesheet, type ExportFormat } from './timesheet/export.js';

// ─── Argument Parsing ───────────────────────────────────────

function parseArgs(argv: string[]): { command: string; flags: Record<string, string> } {
  const args = argv.slice(2);
  let command = args[0] ?? 'help';
  let flagStart = 1;

  // "help generate" → "help-generate"
  if (command === 'help' && args[1] && !args[1].startsWith('--')) {
    command = `help-${args[1]}`;
    flagStart = 2;
  }

  const flags: Record<string, string> = {};

  for (let i = flagStart; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined || !arg.startsWith('--')) continue;

    const key = arg.slice(2);
    const next = args[i + 1];
    // Value flags (--days 5) vs bare flags (--csv, --json)
    if (next !== undefined && !next.startsWith('--')) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = '';
    }
  }

  return { command, flags };
}

function rangeRequest(flags: Record<string, string>): DateRangeRequest {
  return {
    from: flags['from'],
    to: flags['to'],
    days: flags['days'] !== undefined ? Number(flags['days']) : undefined,
  };
}

// ─── Commands ───────────────────────────────────────────────

async function runGenerate(runtime: Runtime, flags: Record<string, string>): Promise<string> {
  const range = rangeFor(runtime.profile, rangeRequest(flags));
  runtime.logger.info(`Collecting activity for ${range.start} to ${range.end}...`);

  const rows = await generateTimesheet(runtime, range);
  const report = generateTimesheetReport({ rows, range, employee: runtime.profile.employee });

  const written: string[] = [];
  for (const format of ['csv', 'xlsx'] as const satisfies readonly ExportFormat[]) {
    const target = flags[format];
    if (target === undefined) continue;

    const filePath = resolve(target || defaultExportName(todayFor(runtime.profile), format));
    await writeTimesheet(rows, runtime.profile.employee, format, filePath);
    written.push(`Saved ${format.toUpperCase()} to ${filePath}`);
  }

  return [report, ...written].join('\n\n');
}

function runInsights(runtime: Runtime, flags: Record<string, string>): string {
  const range = rangeFor(runtime.profile, rangeRequest(flags));
  const report = analyzeInsights(runtime, range);

  const jsonTarget = flags['json'];
  if (jsonTarget === undefined) return generateInsightsReport(report);

  const json = JSON.stringify(report, null, 2);
  if (!jsonTarget) return json;

  const filePath = resolve(jsonTarget);
  writeFileSync(filePath, `${json}\n`);
  return `Saved insights to ${filePath}`;
}

function runHistory(runtime: Runtime, flags: Record<string, string>): string {
  const range = rangeFor(runtime.profile, rangeRequest(flags));
  return generateHistoryReport(range, runtime.store.existsInRange(range.start, range.end));
}

function runStatus(runtime: Runtime): string {
  const { profile, policy } = runtime;
  const mark = (ok: boolean) => (ok ? 'configured' : 'not configured');
  const lines: string[] = [];

  lines.push('# worklog Status');
  lines.push('');
  lines.push(`**Config directory:** ${resolveConfigDir()}`);
  lines.push(`**Profile:** ${profileConfigExists() ? 'profile.json' : 'defaults (run `worklog init`)'}`);
  lines.push(`**History database:** ${historyDbPath()}`);
  lines.push('');

  lines.push('## Employee');
  lines.push('');
  lines.push(`- Name: ${profile.employee.name || '(not set)'}`);
  lines.push(`- Id: ${profile.employee.id || '(not set)'}`);
  lines.push(`- Role: ${profile.employee.role} · ${profile.employee.site} · Billable ${profile.employee.billable}`);
  lines.push(`- Authorized hours: ${profile.employee.authorizedHours}`);
  lines.push('');

  lines.push('## Sources');
  lines.push('');
  lines.push(`- Jira: ${mark(hasJiraCredentials())} (project ${profile.jira.projectKey})`);
  lines.push(`- GitHub: ${mark(hasGitHubCredentials())} (user ${profile.github.username})`);
  lines.push(`- Summarizer: ${mark(hasSummarizerCredentials())}`);
  lines.push('');

  lines.push('## Settings');
  lines.push('');
  lines.push(`- Timezone: ${profile.settings.timezone}`);
  lines.push(`- Default range: ${profile.settings.defaultRangeDays} day(s)`);
  lines.push(`- Carry-forward lookback: ${policy.lookbackDays} day(s)`);
  lines.push(`- Context switch threshold: ${policy.contextSwitchThreshold}`);

  return lines.join('\n');
}

// ─── Help ───────────────────────────────────────────────────

const MAIN_HELP = `worklog — Timesheets from Jira and GitHub activity

Usage: worklog <command> [options]

Setup:
  init              Interactive setup: credentials and employee profile

Timesheet:
  generate          Collect activity per day and build the timesheet

History:
  insights          Productivity metrics over stored snapshots
  history           List dates with a stored snapshot

Info:
  status            Show profile, credentials, and settings
  help [command]    Show help for a specific command

Date range (generate, insights, history):
  --from YYYY-MM-DD --to YYYY-MM-DD   Explicit range, both required
  --days N                            Last N days ending today (default from profile)

Examples:
  worklog init
  worklog generate --days 5 --xlsx
  worklog generate --from 2026-02-02 --to 2026-02-06 --csv week.csv
  worklog insights --days 30 --json
  worklog help generate

Environment Variables:
  GITHUB_TOKEN        GitHub personal access token
  GITHUB_USERNAME     GitHub user whose activity is collected
  JIRA_HOST           Jira Cloud hostname (JIRA_URL also accepted)
  JIRA_EMAIL          Jira account email
  JIRA_API_TOKEN      Jira API token
  JIRA_PROJECT_KEY    Jira project to collect issues from
  GROQ_API_KEY        Summarizer API key (remarks are not summarized without it)
  GROQ_MODEL          Summarizer model (default: llama-3.1-8b-instant)
  WORKLOG_HOME        Config directory (default: ~/.worklog)
  WORKLOG_DB          History database path (default: <config dir>/history.db)
  WORKLOG_DEBUG       Set to 1 for debug logging on stderr`;

const COMMAND_HELP: Record<string, string> = {
  init: `worklog init — Interactive Setup

  Detects or prompts for GitHub, Jira and summarizer credentials, validates
  them against the live APIs, and writes the employee profile.

  Usage:
    worklog init`,

  generate: `worklog generate — Build a Timesheet

  For every date in the range (oldest first) fetches Jira issues and GitHub
  activity, stores the day's snapshot, and builds one timesheet row:
    - the day's most relevant issue (done, then in progress, then other)
    - otherwise general development activity when only GitHub activity exists
    - otherwise the in-progress ticket carried forward from recent days
  Rows are printed newest first.

  Usage:
    worklog generate [--from YYYY-MM-DD --to YYYY-MM-DD | --days N] [options]

  Options:
    --csv [path]            Also write CSV (default: timesheet_YYYYMMDD.csv)
    --xlsx [path]           Also write XLSX (default: timesheet_YYYYMMDD.xlsx)

  Examples:
    worklog generate
    worklog generate --days 10 --csv`,

  insights: `worklog insights — Productivity Insights

  Aggregates stored snapshots only; nothing is fetched. Run generate first.

  Usage:
    worklog insights [--from YYYY-MM-DD --to YYYY-MM-DD | --days N] [--json [path]]

  Report sections:
    Commits                 Per day and per repository
    Tickets                 Touched, completed, in progress, average days active
    Distribution            Share of issue touches per project, commits per repo
    Consistency             Active days, longest inactivity streak, context switching

  Examples:
    worklog insights --days 30
    worklog insights --from 2026-01-01 --to 2026-01-31 --json january.json`,

  history: `worklog history — Stored Snapshots

  Lists the dates in the range that have a stored snapshot.

  Usage:
    worklog history [--from YYYY-MM-DD --to YYYY-MM-DD | --days N]`,

  status: `worklog status — Show Configuration Status

  Usage:
    worklog status`,
};

function showHelp(command?: string): string {
  if (!command) return MAIN_HELP;
  return COMMAND_HELP[command] ?? `Unknown command: ${command}\n\n${MAIN_HELP}`;
}

// ─── Main ───────────────────────────────────────────────────

async function main() {
  const { command, flags } = parseArgs(process.argv);
  if (flags['debug'] !== undefined) setDebugEnabled(true);

  if (command === 'init') {
    await runInit();
    return;
  }

  if (command === 'help' || command === '--help' || command === '-h') {
    console.log(showHelp());
    return;
  }
  if (command.startsWith('help-')) {
    console.log(showHelp(command.slice(5)));
    return;
  }

  const runtime = createRuntime();

  try {
    let output: string;

    switch (command) {
      case 'generate':
        output = await runGenerate(runtime, flags);
        break;
      case 'insights':
        output = runInsights(runtime, flags);
        break;
      case 'history':
        output = runHistory(runtime, flags);
        break;
      case 'status':
        output = runStatus(runtime);
        break;
      default:
        console.error(`Unknown command: ${command}\n`);
        output = showHelp();
    }

    console.log(output);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  } finally {
    runtime.store.close();
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
