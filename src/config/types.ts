/**
 * Configuration Types
 *
 * Defines the shape of the employee profile and credentials.
 * These are the canonical types. Zod schemas in profile-config.ts and
 * credentials.ts validate against these.
 */

import type { PolicyConfig } from './policy.js';

/** Static timesheet columns attached to every exported row. */
export interface EmployeeConfig {
  id: string;
  name: string;
  billable: 'Yes' | 'No';
  role: string;
  site: 'Onshore' | 'Offshore';
  authorizedHours: string;
}

export interface ProfileSettings extends PolicyConfig {
  timezone: string;
  /** Range length used when a command is given neither --from/--to nor --days. */
  defaultRangeDays: number;
}

/** Root profile configuration, stored in ~/.worklog/profile.json */
export interface ProfileConfig {
  version: 1;
  employee: EmployeeConfig;
  jira: { projectKey: string };
  github: { username: string };
  settings: ProfileSettings;
}

/** GitHub credentials. */
export interface GitHubCredentials {
  token: string;
}

/** Jira credentials (basic auth: email + API token). */
export interface JiraCredentials {
  host: string;
  email: string;
  apiToken: string;
}

/** Chat-completions endpoint used to write timesheet remarks. */
export interface SummarizerCredentials {
  apiKey: string;
  model?: string;
  baseUrl?: string;
}

/** Root credentials, stored in ~/.worklog/credentials.json */
export interface CredentialsConfig {
  github?: GitHubCredentials;
  jira?: JiraCredentials;
  summarizer?: SummarizerCredentials;
}
