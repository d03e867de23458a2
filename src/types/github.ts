/**
 * GitHub data types, as mapped by the GitHub client
 */

export interface GitHubEvent {
  id: string;
  type: string;
  createdAt: string;
  repo: string;
  ref?: string;
  refType?: string;
  action?: string;
  pullRequestTitle?: string;
  pullRequestUrl?: string;
}

export interface GitHubCommit {
  sha: string;
  /** Full commit message, all lines. */
  message: string;
  author: string;
  date: string;
  repo: string;
  url: string;
}
