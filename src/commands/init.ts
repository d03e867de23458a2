/**
 * worklog init: Interactive Setup Command
 *
 * 1. Detect or prompt for GitHub + Jira credentials and validate them
 * 2. Optionally add a summarizer API key
 * 3. Prompt for the employee profile and the activity sources
 * 4. Save credentials.json and profile.json
 */

import {
  mergeCredentials,
  resolveGitHubCredentials,
  resolveJiraCredentials,
  resolveSummarizerCredentials,
} from '../config/credentials.js';
import { resolveConfigDir } from '../config/paths.js';
import {
  createDefaultProfile,
  readProfileConfig,
  writeProfileConfig,
} from '../config/profile-config.js';
import type {
  CredentialsConfig,
  GitHubCredentials,
  JiraCredentials,
  ProfileConfig,
} from '../config/types.js';
import { GitHubClient, GitHubClientError } from '../clients/github-client.js';
import { JiraClient, JiraClientError } from '../clients/jira-client.js';
import { errorMessage } from '../errors.js';
import { JiraProjectKeySchema } from '../validators.js';
import { Prompter, PromptCancelledError, say } from './prompt.js';

const MAX_AUTH_RETRIES = 3;
const TOTAL_STEPS = 5;

type CredSource = 'env' | 'file' | 'prompt';

interface ResolvedCreds<T> {
  creds: T;
  source: CredSource;
}

// ─── Entry Point ──────────────────────────────────────────────

export async function runInit(): Promise<void> {
  say.header('worklog init');
  say.info('Set up credentials and the profile used on every timesheet row.\n');

  const prompt = new Prompter();

  try {
    say.step(1, TOTAL_STEPS, 'GitHub credentials');
    const github = await resolveOrPromptGitHub(prompt);
    const ghLogin = await validateGitHub(prompt, github);

    say.step(2, TOTAL_STEPS, 'Jira credentials');
    const jira = await resolveOrPromptJira(prompt);
    await validateJira(prompt, jira);

    say.step(3, TOTAL_STEPS, 'Summarizer');
    const summarizerKey = await promptSummarizerKey(prompt);

    say.step(4, TOTAL_STEPS, 'Profile');
    const profile = await promptProfile(prompt, ghLogin);

    say.step(5, TOTAL_STEPS, 'Saving');
    const toSave: CredentialsConfig = {};
    if (github.source === 'prompt') toSave.github = github.creds;
    if (jira.source === 'prompt') toSave.jira = jira.creds;
    if (summarizerKey) toSave.summarizer = { apiKey: summarizerKey };
    if (Object.keys(toSave).length > 0) {
      mergeCredentials(toSave);
      say.ok(`Credentials saved to ${resolveConfigDir()}/credentials.json`);
    }

    writeProfileConfig(profile);
    say.ok(`Profile saved to ${resolveConfigDir()}/profile.json`);

    prompt.close();
    printSummary(profile);
  } catch (error) {
    prompt.close();
    if (error instanceof PromptCancelledError) {
      console.log('\nSetup cancelled.');
      return;
    }
    throw error;
  }
}

// ─── Credential Resolution ────────────────────────────────────

async function resolveOrPromptGitHub(prompt: Prompter): Promise<ResolvedCreds<GitHubCredentials>> {
  const existing = resolveGitHubCredentials();
  if (existing) {
    const source: CredSource = process.env['GITHUB_TOKEN'] ? 'env' : 'file';
    say.ok(`Found GitHub token in ${source === 'env' ? 'GITHUB_TOKEN' : 'credentials file'}.`);
    return { creds: existing, source };
  }

  say.info('No GitHub token found. Create one at https://github.com/settings/tokens');
  say.info('Required scopes: repo, read:user');
  const token = await prompt.secret('GitHub personal access token');
  if (!token) throw new Error('GitHub token is required.');

  return { creds: { token }, source: 'prompt' };
}

async function resolveOrPromptJira(prompt: Prompter): Promise<ResolvedCreds<JiraCredentials>> {
  const existing = resolveJiraCredentials();
  if (existing) {
    const source: CredSource = process.env['JIRA_API_TOKEN'] ? 'env' : 'file';
    say.ok(`Found Jira credentials in ${source === 'env' ? 'environment' : 'credentials file'}.`);
    return { creds: existing, source };
  }

  say.info('No Jira credentials found.');
  say.info('Create an API token at https://id.atlassian.com/manage-profile/security/api-tokens');

  const host = await prompt.text('Jira Cloud hostname (e.g., company.atlassian.net)', {
    required: true,
    check: (v) =>
      v.includes('.') ? null : 'Must be a valid hostname (e.g., company.atlassian.net)',
  });
  const email = await prompt.text('Jira account email', {
    required: true,
    check: (v) => (v.includes('@') ? null : 'Must be a valid email address'),
  });
  const apiToken = await prompt.secret('Jira API token');
  if (!apiToken) throw new Error('Jira API token is required.');

  return { creds: { host, email, apiToken }, source: 'prompt' };
}

async function promptSummarizerKey(prompt: Prompter): Promise<string | null> {
  if (resolveSummarizerCredentials()) {
    say.ok('Summarizer API key already configured.');
    return null;
  }

  say.info('Remarks are summarized by a chat-completions model (Groq by default).');
  say.info('Leave blank to skip; rows will then carry a placeholder remark.');
  const apiKey = await prompt.secret('Summarizer API key (GROQ_API_KEY)');
  return apiKey || null;
}

// ─── Credential Validation ───────────────────────────────────

/** Returns the authenticated login, used as the default GitHub username. */
async function validateGitHub(
  prompt: Prompter,
  resolved: ResolvedCreds<GitHubCredentials>
): Promise<string | undefined> {
  const { creds, source } = resolved;

  for (let attempt = 1; attempt <= MAX_AUTH_RETRIES; attempt++) {
    try {
      const user = await new GitHubClient(creds.token).getAuthenticatedUser();
      say.ok(`GitHub: authenticated as @${user.login}${user.name ? ` (${user.name})` : ''}`);
      return user.login;
    } catch (error) {
      if (error instanceof GitHubClientError && error.statusCode === 401) {
        if (source !== 'prompt' || attempt >= MAX_AUTH_RETRIES) {
          throw new Error(`GitHub authentication failed (${error.statusCode}). Check your token.`);
        }
        say.warn(`Invalid token (attempt ${attempt}/${MAX_AUTH_RETRIES}). Try again.`);
        const token = await prompt.secret('GitHub personal access token');
        if (!token) throw new Error('GitHub token is required.');
        creds.token = token;
        continue;
      }
      if (await skipValidation(prompt, 'GitHub', error)) return undefined;
      throw error;
    }
  }

  throw new Error('GitHub authentication failed after maximum retries.');
}

async function validateJira(prompt: Prompter, resolved: ResolvedCreds<JiraCredentials>): Promise<void> {
  const { creds, source } = resolved;

  for (let attempt = 1; attempt <= MAX_AUTH_RETRIES; attempt++) {
    try {
      const user = await new JiraClient(creds.host, creds.email, creds.apiToken).getMyself();
      say.ok(`Jira: authenticated as ${user.displayName}`);
      return;
    } catch (error) {
      if (
        error instanceof JiraClientError &&
        (error.statusCode === 401 || error.statusCode === 403)
      ) {
        if (source !== 'prompt' || attempt >= MAX_AUTH_RETRIES) {
          throw new Error(`Jira authentication failed (${error.statusCode}). Check your credentials.`);
        }
        say.warn(`Invalid credentials (attempt ${attempt}/${MAX_AUTH_RETRIES}). Try again.`);
        const apiToken = await prompt.secret('Jira API token');
        if (!apiToken) throw new Error('Jira API token is required.');
        creds.apiToken = apiToken;
        continue;
      }
      if (await skipValidation(prompt, 'Jira', error)) return;
      throw error;
    }
  }

  throw new Error('Jira authentication failed after maximum retries.');
}

/** Network trouble is not a bad credential: let the user keep going. */
async function skipValidation(prompt: Prompter, service: string, error: unknown): Promise<boolean> {
  const skip = await prompt.confirm(
    `${service} API unreachable: ${errorMessage(error)}. Skip validation?`,
    false
  );
  if (skip) say.warn(`Skipping ${service} validation. Credentials saved as-is.`);
  return skip;
}

// ─── Profile ─────────────────────────────────────────────────

async function promptProfile(prompt: Prompter, ghLogin: string | undefined): Promise<ProfileConfig> {
  const current = readProfileConfig();
  const base = current ?? createDefaultProfile(undefined, ghLogin);
  if (current) say.info('Editing the existing profile; press Enter to keep a value.\n');

  const { employee } = base;
  const name = await prompt.text('Employee name', { defaultValue: employee.name || undefined });
  const id = await prompt.text('Employee id', { defaultValue: employee.id || undefined });
  const role = await prompt.text('Role', { defaultValue: employee.role });
  const billable = await prompt.choice('Billable', ['Yes', 'No'] as const, employee.billable);
  const site = await prompt.choice('Site', ['Onshore', 'Offshore'] as const, employee.site);
  const authorizedHours = await prompt.text('Authorized hours per day', {
    defaultValue: employee.authorizedHours,
    check: (v) => (Number(v) > 0 ? null : 'Must be a positive number'),
  });

  const projectKey = await prompt.text('Jira project key', {
    required: true,
    defaultValue: base.jira.projectKey,
    check: (v) => {
      const result = JiraProjectKeySchema.safeParse(v);
      return result.success ? null : (result.error.issues[0]?.message ?? 'Invalid project key');
    },
  });
  const username = await prompt.text('GitHub username', {
    required: true,
    defaultValue: ghLogin ?? base.github.username,
  });
  const timezone = await prompt.text('Timezone', {
    defaultValue: base.settings.timezone,
    check: (v) => (isTimeZone(v) ? null : `Unknown timezone: ${v}`),
  });

  return {
    ...base,
    employee: { id, name, billable, role, site, authorizedHours },
    jira: { projectKey },
    github: { username },
    settings: { ...base.settings, timezone },
  };
}

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

// ─── Summary ─────────────────────────────────────────────────

function printSummary(profile: ProfileConfig): void {
  say.header('Setup Complete');

  console.log(`  Employee: ${profile.employee.name || '(unnamed)'} ${profile.employee.id}`.trimEnd());
  console.log(`  Jira:     project ${profile.jira.projectKey}`);
  console.log(`  GitHub:   @${profile.github.username}`);
  console.log(`  Config:   ${resolveConfigDir()}`);

  console.log('\nNext steps:');
  console.log('  1. Run `worklog generate` to build this week\'s timesheet');
  console.log('  2. Run `worklog status` to verify config\n');
}
