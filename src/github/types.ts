/**
 * GitHub API response types
 * These types represent the raw responses from GitHub's REST API
 */

/**
 * GitHub user object (simplified)
 */
export interface GitHubUser {
  login: string;
  id: number;
  name: string | null;
  avatar_url: string;
  html_url: string;
  public_repos?: number;
  owned_private_repos?: number;
}

/**
 * GitHub repository owner
 */
export interface GitHubOwner {
  login: string;
  id: number;
  type: string;
}

/**
 * GitHub repository response
 */
export interface GitHubRepository {
  id: number;
  name: string;
  full_name: string;
  owner: GitHubOwner;
  description: string | null;
  language: string | null;
  html_url: string;
  default_branch: string;
  private: boolean;
  fork: boolean;
  stargazers_count: number;
  forks_count: number;
  open_issues_count: number;
  size: number;
  updated_at: string;
  topics?: string[];
}

/**
 * Byte counts per language from /repos/{repo}/languages
 */
export type GitHubLanguages = Record<string, number>;

/**
 * Item of a directory listing from the contents API
 */
export interface GitHubContentItem {
  name: string;
  path: string;
  sha: string;
  size: number;
  type: 'file' | 'dir' | 'symlink' | 'submodule';
}

/**
 * Single file from the contents API
 */
export interface GitHubFileContent extends GitHubContentItem {
  content?: string;
  encoding?: string;
}

/**
 * Response of PUT /repos/{repo}/contents/{path}
 */
export interface GitHubCommitFileResponse {
  content: GitHubContentItem | null;
  commit: {
    sha: string;
    html_url: string;
  };
}

/**
 * Git reference from the refs API
 */
export interface GitHubGitRef {
  ref: string;
  object: {
    sha: string;
    type: string;
  };
}

/**
 * Pull request as returned on creation
 */
export interface GitHubPullRequest {
  id: number;
  number: number;
  html_url: string;
  state: 'open' | 'closed';
}

/**
 * GitHub API error response
 */
export interface GitHubError {
  message: string;
  documentation_url?: string;
  errors?: Array<{
    resource: string;
    field: string;
    code: string;
  }>;
}

/**
 * Pagination info from Link header
 */
export interface PaginationInfo {
  next?: string;
  prev?: string;
  first?: string;
  last?: string;
}
