/**
 * Config Directory Resolution
 *
 * Everything worklog keeps on disk lives in one directory:
 * 1. WORKLOG_HOME environment variable
 * 2. ~/.worklog/ (default)
 *
 * The snapshot database can be moved elsewhere with WORKLOG_DB.
 */

import { mkdirSync, chmodSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

const DEFAULT_DIR_NAME = '.worklog';

/**
 * Resolve the worklog config directory path.
 * Does NOT create the directory; call ensureConfigDir() for that.
 */
export function resolveConfigDir(): string {
  const envDir = process.env['WORKLOG_HOME'];
  if (envDir) {
    return envDir;
  }
  return join(homedir(), DEFAULT_DIR_NAME);
}

/**
 * Ensure the config directory exists with proper permissions.
 * Creates it if missing. Returns the resolved path.
 */
export function ensureConfigDir(): string {
  const dir = resolveConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  } else {
    chmodSync(dir, 0o700);
  }
  return dir;
}

/** Resolve path to profile.json */
export function profileConfigPath(): string {
  return join(resolveConfigDir(), 'profile.json');
}

/** Resolve path to credentials.json */
export function credentialsPath(): string {
  return join(resolveConfigDir(), 'credentials.json');
}

/**
 * Resolve path to the daily snapshot database.
 * WORKLOG_DB wins; otherwise history.db inside the config directory.
 */
export function historyDbPath(): string {
  return process.env['WORKLOG_DB'] || join(resolveConfigDir(), 'history.db');
}

/** True when the snapshot database lives in the config directory. */
export function historyDbInConfigDir(): boolean {
  return !process.env['WORKLOG_DB'];
}
