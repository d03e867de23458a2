/**
 * Namespaced logging for worklog.
 *
 * Everything goes to stderr: stdout carries MCP protocol frames when running
 * as a server, and report output when running as a CLI.
 */

const PREFIX = 'worklog';

let debugEnabled = process.env['WORKLOG_DEBUG'] === '1';

/** Components take a Logger so tests can inject a silent or spying one. */
export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

export function debug(...args: unknown[]): void {
  if (!debugEnabled) return;
  console.error(`${PREFIX} [debug]:`, ...args);
}

export function info(...args: unknown[]): void {
  console.error(`${PREFIX}:`, ...args);
}

/** Non-fatal issues: degraded sources, unreadable snapshots, summarizer fallbacks. */
export function warn(...args: unknown[]): void {
  console.error(`${PREFIX} [warn]:`, ...args);
}

export function error(...args: unknown[]): void {
  console.error(`${PREFIX} [error]:`, ...args);
}

export const defaultLogger: Logger = { debug, info, warn, error };

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
