import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
  writeFileSync: vi.fn(),
  mkdirSync: vi.fn(),
  chmodSync: vi.fn(),
}));

vi.mock('./paths.js', () => ({
  credentialsPath: vi.fn(() => '/mock/.worklog/credentials.json'),
  ensureConfigDir: vi.fn(() => '/mock/.worklog'),
  resolveConfigDir: vi.fn(() => '/mock/.worklog'),
}));

import {
  resolveGitHubCredentials,
  resolveJiraCredentials,
  resolveSummarizerCredentials,
  resolveCredentials,
  writeCredentials,
  mergeCredentials,
  hasGitHubCredentials,
  hasJiraCredentials,
  hasSummarizerCredentials,
} from './credentials.js';
import { existsSync, readFileSync, writeFileSync, chmodSync } from 'node:fs';

const ENV_KEYS = [
  'GITHUB_TOKEN',
  'JIRA_API_TOKEN',
  'JIRA_EMAIL',
  'JIRA_HOST',
  'JIRA_URL',
  'GROQ_API_KEY',
  'GROQ_MODEL',
  'SUMMARIZER_BASE_URL',
];

describe('credentials', () => {
  const savedEnv: Record<string, string | undefined> = {};

  beforeEach(() => {
    vi.clearAllMocks();
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
    vi.mocked(existsSync).mockReturnValue(false);
  });

  afterEach(() => {
    for (const [key, value] of Object.entries(savedEnv)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  describe('resolveGitHubCredentials', () => {
    it('returns null when no credentials available', () => {
      expect(resolveGitHubCredentials()).toBeNull();
    });

    it('resolves from GITHUB_TOKEN env var', () => {
      process.env['GITHUB_TOKEN'] = 'test-token';
      expect(resolveGitHubCredentials()).toEqual({ token: 'test-token' });
    });

    it('resolves from credentials file when env var not set', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ github: { token: 'file-token' } }));

      expect(resolveGitHubCredentials()).toEqual({ token: 'file-token' });
    });

    it('env var takes precedence over file', () => {
      process.env['GITHUB_TOKEN'] = 'env-token';
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ github: { token: 'file-token' } }));

      expect(resolveGitHubCredentials()).toEqual({ token: 'env-token' });
    });
  });

  describe('resolveJiraCredentials', () => {
    it('returns null when no credentials available', () => {
      expect(resolveJiraCredentials()).toBeNull();
    });

    it('resolves from env vars when all three are set', () => {
      process.env['JIRA_API_TOKEN'] = 'jira-token';
      process.env['JIRA_EMAIL'] = 'user@test.com';
      process.env['JIRA_HOST'] = 'test.atlassian.net';

      expect(resolveJiraCredentials()).toEqual({
        host: 'test.atlassian.net',
        email: 'user@test.com',
        apiToken: 'jira-token',
      });
    });

    it('accepts JIRA_URL in place of JIRA_HOST', () => {
      process.env['JIRA_API_TOKEN'] = 'jira-token';
      process.env['JIRA_EMAIL'] = 'user@test.com';
      process.env['JIRA_URL'] = 'https://test.atlassian.net';

      expect(resolveJiraCredentials()?.host).toBe('https://test.atlassian.net');
    });

    it('returns null when only partial env vars set', () => {
      process.env['JIRA_API_TOKEN'] = 'jira-token';
      expect(resolveJiraCredentials()).toBeNull();
    });

    it('resolves from credentials file', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(
        JSON.stringify({
          jira: { host: 'example.atlassian.net', email: 'a@b.com', apiToken: 'tok' },
        })
      );

      expect(resolveJiraCredentials()).toEqual({
        host: 'example.atlassian.net',
        email: 'a@b.com',
        apiToken: 'tok',
      });
    });

    it('ignores a credentials file that fails validation', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(
        JSON.stringify({ jira: { host: 'x', email: 'not-an-email', apiToken: 'tok' } })
      );

      expect(resolveJiraCredentials()).toBeNull();
    });
  });

  describe('resolveSummarizerCredentials', () => {
    it('returns null without an API key', () => {
      expect(resolveSummarizerCredentials()).toBeNull();
    });

    it('fills in the default model and base URL', () => {
      process.env['GROQ_API_KEY'] = 'test-secret';

      expect(resolveSummarizerCredentials()).toEqual({
        apiKey: 'test-secret',
        model: 'llama-3.1-8b-instant',
        baseUrl: 'https://api.groq.com/openai/v1',
      });
    });

    it('lets GROQ_MODEL override the model from the file', () => {
      process.env['GROQ_MODEL'] = 'env-model';
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(
        JSON.stringify({ summarizer: { apiKey: 'file-key', model: 'file-model' } })
      );

      expect(resolveSummarizerCredentials()).toEqual({
        apiKey: 'file-key',
        model: 'env-model',
        baseUrl: 'https://api.groq.com/openai/v1',
      });
    });
  });

  describe('resolveCredentials', () => {
    it('returns empty sections when nothing configured', () => {
      const creds = resolveCredentials();
      expect(creds.github).toBeUndefined();
      expect(creds.jira).toBeUndefined();
      expect(creds.summarizer).toBeUndefined();
    });

    it('returns both sources when both configured', () => {
      process.env['GITHUB_TOKEN'] = 'gh-tok';
      process.env['JIRA_API_TOKEN'] = 'j-tok';
      process.env['JIRA_EMAIL'] = 'a@b.com';
      process.env['JIRA_HOST'] = 'x.atlassian.net';

      const creds = resolveCredentials();
      expect(creds.github).toBeDefined();
      expect(creds.jira).toBeDefined();
    });
  });

  describe('writeCredentials', () => {
    it('writes file with 600 permissions', () => {
      writeCredentials({ github: { token: 'test' } });

      expect(writeFileSync).toHaveBeenCalledWith(
        '/mock/.worklog/credentials.json',
        expect.stringContaining('"token": "test"'),
        'utf-8'
      );
      expect(chmodSync).toHaveBeenCalledWith('/mock/.worklog/credentials.json', 0o600);
    });
  });

  describe('mergeCredentials', () => {
    it('keeps existing sections that are not being replaced', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ github: { token: 'kept' } }));

      mergeCredentials({ summarizer: { apiKey: 'test-secret' } });

      const written = vi.mocked(writeFileSync).mock.calls[0]?.[1];
      expect(JSON.parse(String(written))).toEqual({
        github: { token: 'kept' },
        summarizer: { apiKey: 'test-secret' },
      });
    });
  });

  describe('has*Credentials', () => {
    it('hasGitHubCredentials reflects GITHUB_TOKEN', () => {
      expect(hasGitHubCredentials()).toBe(false);
      process.env['GITHUB_TOKEN'] = 'tok';
      expect(hasGitHubCredentials()).toBe(true);
    });

    it('hasJiraCredentials needs all three env vars', () => {
      expect(hasJiraCredentials()).toBe(false);
      process.env['JIRA_API_TOKEN'] = 'tok';
      process.env['JIRA_EMAIL'] = 'a@b.com';
      process.env['JIRA_HOST'] = 'x.atlassian.net';
      expect(hasJiraCredentials()).toBe(true);
    });

    it('hasSummarizerCredentials reflects GROQ_API_KEY', () => {
      expect(hasSummarizerCredentials()).toBe(false);
      process.env['GROQ_API_KEY'] = 'test-secret';
      expect(hasSummarizerCredentials()).toBe(true);
    });
  });
});
