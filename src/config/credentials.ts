/**
 * Credentials Resolver
 *
 * Resolves API credentials in order:
 * 1. Environment variables (GITHUB_TOKEN, JIRA_*, GROQ_*)
 * 2. ~/.worklog/credentials.json
 * 3. Returns null if neither found
 *
 * Credentials file is stored with 600 permissions (owner read/write only).
 */

import { readFileSync, writeFileSync, existsSync, chmodSync } from 'node:fs';
import { z } from 'zod';
import type {
  CredentialsConfig,
  GitHubCredentials,
  JiraCredentials,
  SummarizerCredentials,
} from './types.js';
import { ensureConfigDir, credentialsPath } from './paths.js';

// ─── Zod Schema ──────────────────────────────────────────────

const CredentialsSchema = z.object({
  github: z
    .object({
      token: z.string().min(1),
    })
    .optional(),
  jira: z
    .object({
      host: z.string().min(1),
      email: z.string().email(),
      apiToken: z.string().min(1),
    })
    .optional(),
  summarizer: z
    .object({
      apiKey: z.string().min(1),
      model: z.string().min(1).optional(),
      baseUrl: z.string().url().optional(),
    })
    .optional(),
});

// ─── Environment Variable Names ──────────────────────────────

const ENV_GITHUB_TOKEN = 'GITHUB_TOKEN';
const ENV_JIRA_API_TOKEN = 'JIRA_API_TOKEN';
const ENV_JIRA_EMAIL = 'JIRA_EMAIL';
const ENV_JIRA_HOST = 'JIRA_HOST';
const ENV_JIRA_URL = 'JIRA_URL';
const ENV_GROQ_API_KEY = 'GROQ_API_KEY';
const ENV_GROQ_MODEL = 'GROQ_MODEL';
const ENV_SUMMARIZER_BASE_URL = 'SUMMARIZER_BASE_URL';

export const DEFAULT_SUMMARIZER_MODEL = 'llama-3.1-8b-instant';
export const DEFAULT_SUMMARIZER_BASE_URL = 'https://api.groq.com/openai/v1';

// ─── Resolve ─────────────────────────────────────────────────

/**
 * Resolve GitHub credentials.
 * Checks env var first, then credentials file.
 */
export function resolveGitHubCredentials(): GitHubCredentials | null {
  const envToken = process.env[ENV_GITHUB_TOKEN];
  if (envToken) {
    return { token: envToken };
  }

  const fileConfig = readCredentialsFile();
  if (fileConfig?.github?.token) {
    return fileConfig.github;
  }

  return null;
}

/**
 * Resolve Jira credentials.
 * JIRA_URL is accepted as an alias for JIRA_HOST.
 */
export function resolveJiraCredentials(): JiraCredentials | null {
  const envToken = process.env[ENV_JIRA_API_TOKEN];
  const envEmail = process.env[ENV_JIRA_EMAIL];
  const envHost = process.env[ENV_JIRA_HOST] || process.env[ENV_JIRA_URL];

  if (envToken && envEmail && envHost) {
    return { host: envHost, email: envEmail, apiToken: envToken };
  }

  const fileConfig = readCredentialsFile();
  if (fileConfig?.jira?.apiToken && fileConfig.jira.email && fileConfig.jira.host) {
    return fileConfig.jira;
  }

  return null;
}

/**
 * Resolve summarizer credentials with model and base URL filled in.
 * An env API key wins over the file; env model/base URL win over both.
 */
export function resolveSummarizerCredentials(): Required<SummarizerCredentials> | null {
  const fileConfig = readCredentialsFile()?.summarizer;
  const apiKey = process.env[ENV_GROQ_API_KEY] || fileConfig?.apiKey;
  if (!apiKey) {
    return null;
  }

  return {
    apiKey,
    model: process.env[ENV_GROQ_MODEL] || fileConfig?.model || DEFAULT_SUMMARIZER_MODEL,
    baseUrl:
      process.env[ENV_SUMMARIZER_BASE_URL] || fileConfig?.baseUrl || DEFAULT_SUMMARIZER_BASE_URL,
  };
}

/**
 * Resolve all credentials. Returns what's available.
 */
export function resolveCredentials(): CredentialsConfig {
  const github = resolveGitHubCredentials() ?? undefined;
  const jira = resolveJiraCredentials() ?? undefined;
  const summarizer = resolveSummarizerCredentials() ?? undefined;
  return { github, jira, summarizer };
}

// ─── File Operations ─────────────────────────────────────────

/**
 * Read credentials from ~/.worklog/credentials.json.
 * Returns null if the file doesn't exist or fails validation.
 */
function readCredentialsFile(): CredentialsConfig | null {
  const filePath = credentialsPath();
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  const result = CredentialsSchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }
  return result.data;
}

/**
 * Write credentials to ~/.worklog/credentials.json with 600 permissions.
 */
export function writeCredentials(config: CredentialsConfig): void {
  ensureConfigDir();
  const filePath = credentialsPath();
  writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  chmodSync(filePath, 0o600);
}

/**
 * Merge new credentials into the existing credentials file.
 * Only overwrites sections present in newCreds; preserves the rest.
 */
export function mergeCredentials(newCreds: CredentialsConfig): void {
  const existing = readCredentialsFile() ?? {};
  const merged: CredentialsConfig = { ...existing };

  if (newCreds.github) {
    merged.github = newCreds.github;
  }
  if (newCreds.jira) {
    merged.jira = newCreds.jira;
  }
  if (newCreds.summarizer) {
    merged.summarizer = newCreds.summarizer;
  }

  writeCredentials(merged);
}

export function hasGitHubCredentials(): boolean {
  return resolveGitHubCredentials() !== null;
}

export function hasJiraCredentials(): boolean {
  return resolveJiraCredentials() !== null;
}

export function hasSummarizerCredentials(): boolean {
  return resolveSummarizerCredentials() !== null;
}
