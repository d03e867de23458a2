/**
 * Profile Configuration Manager
 *
 * Reads and writes ~/.worklog/profile.json: who the timesheet is for, which
 * Jira project and GitHub user to pull activity from, and policy overrides.
 * Validates with Zod on read; serializes on write.
 */

import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { ProfileConfig } from './types.js';
import { ensureConfigDir, profileConfigPath } from './paths.js';
import { JiraProjectKeySchema } from '../validators.js';

// ─── Zod Schemas ─────────────────────────────────────────────

const EmployeeConfigSchema = z.object({
  id: z.string().default(''),
  name: z.string().default(''),
  billable: z.enum(['Yes', 'No']).default('Yes'),
  role: z.string().default('Developer'),
  site: z.enum(['Onshore', 'Offshore']).default('Offshore'),
  authorizedHours: z.string().default('8'),
});

const SettingsSchema = z.object({
  timezone: z.string().default(systemTimezone()),
  defaultRangeDays: z.number().int().positive().max(366).default(5),
  lookbackDays: z.number().int().nonnegative().optional(),
  contextSwitchThreshold: z.number().int().nonnegative().optional(),
  summarizerContextLimit: z.number().int().positive().optional(),
  fallbackSnippetLength: z.number().int().nonnegative().optional(),
});

const ProfileConfigSchema = z.object({
  version: z.literal(1),
  employee: EmployeeConfigSchema,
  jira: z.object({ projectKey: JiraProjectKeySchema }),
  github: z.object({ username: z.string().min(1) }),
  settings: SettingsSchema.default({}),
});

export { ProfileConfigSchema };

// ─── Read / Write ────────────────────────────────────────────

/**
 * Read and validate the profile from ~/.worklog/profile.json.
 * Returns null if the file doesn't exist.
 * Throws on invalid JSON or schema validation failure.
 */
export function readProfileConfig(): ProfileConfig | null {
  const filePath = profileConfigPath();
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return ProfileConfigSchema.parse(parsed);
}

/**
 * Read the profile, falling back to a default one built from the environment
 * (JIRA_PROJECT_KEY, GITHUB_USERNAME / GITHUB_OWNER) when no file exists.
 */
export function loadProfileConfig(): ProfileConfig {
  const fromFile = readProfileConfig();
  const profile = fromFile ?? createDefaultProfile();

  const envProject = process.env['JIRA_PROJECT_KEY'];
  const envUser = process.env['GITHUB_USERNAME'] || process.env['GITHUB_OWNER'];
  return {
    ...profile,
    jira: envProject ? { projectKey: JiraProjectKeySchema.parse(envProject) } : profile.jira,
    github: envUser ? { username: envUser } : profile.github,
  };
}

/**
 * Write the profile to ~/.worklog/profile.json.
 * Validates before writing to prevent corrupt configs.
 */
export function writeProfileConfig(config: ProfileConfig): void {
  ProfileConfigSchema.parse(config);
  ensureConfigDir();
  const filePath = profileConfigPath();
  writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

export function profileConfigExists(): boolean {
  return existsSync(profileConfigPath());
}

/**
 * Default profile scaffold. Project key and username are placeholders until
 * `worklog init` or the environment fills them in.
 */
export function createDefaultProfile(projectKey = 'PROJ', username = 'user'): ProfileConfig {
  return {
    version: 1,
    employee: {
      id: '',
      name: '',
      billable: 'Yes',
      role: 'Developer',
      site: 'Offshore',
      authorizedHours: '8',
    },
    jira: { projectKey },
    github: { username },
    settings: {
      timezone: systemTimezone(),
      defaultRangeDays: 5,
    },
  };
}

function systemTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}
