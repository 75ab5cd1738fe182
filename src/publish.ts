/**
 * Writing a README back to GitHub, directly or through a pull request
 */

import type { CodeHost, CommitResult, PullRequestInfo } from './github/client';
import { formatTimestamp } from './backup/store';

export const README_PATH = 'README.md';

export interface PublishOptions {
  createPr?: boolean;
  message?: string;
  /** Branch for the pull request; generated from the current time when omitted */
  branchName?: string;
  now?: () => Date;
}

export interface PublishResult extends CommitResult {
  method: 'direct' | 'pull-request';
  branch: string;
  pullRequest?: PullRequestInfo;
}

const DEFAULT_MESSAGE = 'Update README';

const PR_BODY = `This pull request refreshes README.md.

A copy of the previous README was saved locally before it was replaced.
Review the content before merging.`;

/**
 * Commit README.md to the default branch, or to a new branch with a pull request
 */
export async function publishReadme(
  host: CodeHost,
  repoName: string,
  content: string,
  options: PublishOptions = {},
): Promise<PublishResult> {
  const repo = await host.getRepository(repoName);
  const message = options.message ?? DEFAULT_MESSAGE;

  if (!options.createPr) {
    const commit = await host.commitFile(repoName, README_PATH, content, message, repo.defaultBranch);
    return { method: 'direct', branch: repo.defaultBranch, ...commit };
  }

  const now = options.now ?? (() => new Date());
  const branch = options.branchName ?? `readme-update-${formatTimestamp(now())}`;

  await host.createBranch(repoName, branch, repo.defaultBranch);
  const commit = await host.commitFile(repoName, README_PATH, content, message, branch);
  const pullRequest = await host.createPullRequest(repoName, message, PR_BODY, branch, repo.defaultBranch);

  return { method: 'pull-request', branch, ...commit, pullRequest };
}
