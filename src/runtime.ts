/**
 * Runtime wiring shared by the CLI and the MCP server: profile, policy,
 * snapshot store, activity source and summarizer, built from the config
 * directory and the environment.
 */

import { resolveSummarizerCredentials } from './config/credentials.js';
import { resolvePolicy, type ResolvedPolicy } from './config/policy.js';
import { loadProfileConfig } from './config/profile-config.js';
import type { ProfileConfig } from './config/types.js';
import { SqliteSnapshotStore } from './history/snapshot-store.js';
import { InsightsEngine } from './insights/insights-engine.js';
import type { InsightsReport } from './insights/types.js';
import { defaultLogger, type Logger } from './log.js';
import { createApiActivitySource } from './sources/api-activity-source.js';
import type { ActivitySource } from './sources/types.js';
import { createSummarizer, type Summarizer } from './summarize/summarizer.js';
import { TimesheetAssembler } from './timesheet/assembler.js';
import { resolveDateRange, todayIn, type DateRangeRequest } from './timesheet/date-range.js';
import type { ActivityTarget, CalendarDate, DateRange, TimesheetRow } from './types/timesheet.js';

export interface Runtime {
  profile: ProfileConfig;
  policy: ResolvedPolicy;
  store: SqliteSnapshotStore;
  source: ActivitySource;
  summarizer: Summarizer;
  logger: Logger;
}

export function createRuntime(logger: Logger = defaultLogger): Runtime {
  const profile = loadProfileConfig();
  const policy = resolvePolicy(profile.settings);

  return {
    profile,
    policy,
    store: new SqliteSnapshotStore(),
    source: createApiActivitySource(logger),
    summarizer: createSummarizer(resolveSummarizerCredentials(), {
      snippetLength: policy.fallbackSnippetLength,
      logger,
    }),
    logger,
  };
}

export function activityTarget(profile: ProfileConfig): ActivityTarget {
  return { projectKey: profile.jira.projectKey, username: profile.github.username };
}

export function todayFor(profile: ProfileConfig, now: Date = new Date()): CalendarDate {
  return todayIn(profile.settings.timezone, now);
}

/** Explicit from/to, else the last N days ending today in the profile's timezone. */
export function rangeFor(
  profile: ProfileConfig,
  request: DateRangeRequest,
  now: Date = new Date()
): DateRange {
  return resolveDateRange(request, todayFor(profile, now), profile.settings.defaultRangeDays);
}

export function generateTimesheet(runtime: Runtime, range: DateRange): Promise<TimesheetRow[]> {
  const assembler = new TimesheetAssembler({
    source: runtime.source,
    store: runtime.store,
    summarizer: runtime.summarizer,
    policy: runtime.policy,
    logger: runtime.logger,
  });
  return assembler.assemble(activityTarget(runtime.profile), range);
}

export function analyzeInsights(runtime: Runtime, range: DateRange): InsightsReport {
  const engine = new InsightsEngine({
    store: runtime.store,
    contextSwitchThreshold: runtime.policy.contextSwitchThreshold,
    logger: runtime.logger,
  });
  return engine.analyze(range);
}
