/**
 * GitHub REST API client
 * Handles listing repositories, reading files, committing and opening pull requests
 */

import type { RepoMeta, StructureEntry } from '../domain/models';
import type {
  GitHubRepository,
  GitHubLanguages,
  GitHubContentItem,
  GitHubFileContent,
  GitHubCommitFileResponse,
  GitHubGitRef,
  GitHubPullRequest,
  GitHubUser,
  GitHubError,
  PaginationInfo,
} from './types';

const GITHUB_API_BASE = 'https://api.github.com';

export class GitHubClientError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public endpoint?: string,
  ) {
    super(message);
    this.name = 'GitHubClientError';
  }
}

export interface AuthenticatedUser {
  login: string;
  name: string | null;
  avatarUrl: string;
  publicRepos: number;
  privateRepos: number;
}

export interface CommitResult {
  action: 'created' | 'updated';
  commitSha: string;
  commitUrl: string;
}

export interface PullRequestInfo {
  number: number;
  url: string;
  state: 'open' | 'closed';
}

/**
 * Operations the README pipeline and publisher need from a code host
 */
export interface CodeHost {
  getAuthenticatedUser(): Promise<AuthenticatedUser>;
  listRepositories(): Promise<RepoMeta[]>;
  getRepository(fullName: string): Promise<RepoMeta>;
  getLanguages(fullName: string): Promise<Record<string, number>>;
  listDirectory(fullName: string, path?: string, branch?: string): Promise<StructureEntry[]>;
  /** Returns null when the file does not exist */
  getFileContent(fullName: string, path: string, branch?: string): Promise<string | null>;
  commitFile(
    fullName: string,
    path: string,
    content: string,
    message: string,
    branch?: string,
  ): Promise<CommitResult>;
  createBranch(fullName: string, branchName: string, fromBranch?: string): Promise<boolean>;
  createPullRequest(
    fullName: string,
    title: string,
    body: string,
    head: string,
    base?: string,
  ): Promise<PullRequestInfo>;
}

export interface GitHubClientOptions {
  timeoutMs?: number;
  /** Minimum milliseconds between two requests */
  minRequestIntervalMs?: number;
  baseUrl?: string;
}

/**
 * Parse Link header for pagination
 */
function parseLinkHeader(header: string | null): PaginationInfo {
  if (!header) return {};

  const links: PaginationInfo = {};
  const parts = header.split(',');

  for (const part of parts) {
    const match = part.match(/<([^>]+)>;\s*rel="([^"]+)"/);
    if (match) {
      const [, url, rel] = match;
      if (url && (rel === 'next' || rel === 'prev' || rel === 'first' || rel === 'last')) {
        links[rel] = url;
      }
    }
  }

  return links;
}

/**
 * Encode each segment of a repository path for use in a URL
 */
function encodePath(path: string): string {
  return path
    .split('/')
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join('/');
}

function toRepoMeta(repo: GitHubRepository): RepoMeta {
  return {
    name: repo.name,
    fullName: repo.full_name,
    description: repo.description?.trim() || null,
    language: repo.language,
    stars: repo.stargazers_count,
    forks: repo.forks_count,
    updatedAt: repo.updated_at,
    htmlUrl: repo.html_url,
    defaultBranch: repo.default_branch,
    topics: repo.topics ?? [],
    private: repo.private,
    fork: repo.fork,
    size: repo.size,
    openIssues: repo.open_issues_count,
  };
}

/**
 * Sleep for a specified number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * GitHub API client authenticated with a personal access token
 */
export class GitHubClient implements CodeHost {
  private token: string;
  private baseUrl: string;
  private timeoutMs: number;
  private lastRequestTime = 0;
  private readonly minRequestInterval: number;

  constructor(token: string, options: GitHubClientOptions = {}) {
    this.token = token;
    this.baseUrl = options.baseUrl ?? GITHUB_API_BASE;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.minRequestInterval = options.minRequestIntervalMs ?? 100;
  }

  /**
   * Rate limit: ensure minimum time between requests
   */
  private async rateLimit(): Promise<void> {
    const now = Date.now();
    const timeSinceLastRequest = now - this.lastRequestTime;

    if (timeSinceLastRequest < this.minRequestInterval) {
      await sleep(this.minRequestInterval - timeSinceLastRequest);
    }

    this.lastRequestTime = Date.now();
  }

  /**
   * Make an authenticated request to the GitHub API.
   * Rate limiting is reported as an error; requests are never retried.
   */
  private async request<T>(
    endpoint: string,
    options: RequestInit = {},
  ): Promise<{ data: T; pagination: PaginationInfo }> {
    await this.rateLimit();

    const url = endpoint.startsWith('http') ? endpoint : `${this.baseUrl}${endpoint}`;

    let response: Response;
    try {
      response = await fetch(url, {
        ...options,
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: {
          Accept: 'application/vnd.github.v3+json',
          Authorization: `Bearer ${this.token}`,
          'User-Agent': 'readme-refresh-cli',
          ...(options.body ? { 'Content-Type': 'application/json' } : {}),
          ...options.headers,
        },
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new GitHubClientError(
          `GitHub API request timed out after ${this.timeoutMs}ms`,
          undefined,
          endpoint,
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new GitHubClientError(`GitHub API request failed: ${message}`, undefined, endpoint);
    }

    if (response.status === 429 || (response.status === 403 && response.headers.get('X-RateLimit-Remaining') === '0')) {
      const reset = response.headers.get('X-RateLimit-Reset');
      const resetAt = reset ? new Date(parseInt(reset, 10) * 1000).toISOString() : 'later';
      throw new GitHubClientError(
        `Rate limit exceeded. Try again after ${resetAt}.`,
        response.status,
        endpoint,
      );
    }

    if (!response.ok) {
      let errorMessage = `GitHub API error: ${response.status} ${response.statusText}`;

      try {
        const errorBody = (await response.json()) as GitHubError;
        if (errorBody.message) {
          errorMessage = `GitHub API error: ${errorBody.message}`;
        }
      } catch {
        // Body was not JSON; keep the status line
      }

      throw new GitHubClientError(errorMessage, response.status, endpoint);
    }

    const data = (await response.json()) as T;
    const pagination = parseLinkHeader(response.headers.get('Link'));

    return { data, pagination };
  }

  /**
   * Fetch all pages of a paginated endpoint
   */
  private async fetchAllPages<T>(endpoint: string): Promise<T[]> {
    const results: T[] = [];
    let nextUrl: string | undefined = `${this.baseUrl}${endpoint}`;

    while (nextUrl) {
      const response: { data: T[]; pagination: PaginationInfo } = await this.request<T[]>(nextUrl);
      results.push(...response.data);
      nextUrl = response.pagination.next;
    }

    return results;
  }

  async getAuthenticatedUser(): Promise<AuthenticatedUser> {
    const { data } = await this.request<GitHubUser>('/user');
    return {
      login: data.login,
      name: data.name,
      avatarUrl: data.avatar_url,
      publicRepos: data.public_repos ?? 0,
      privateRepos: data.owned_private_repos ?? 0,
    };
  }

  /**
   * Get all repositories the authenticated user owns, collaborates on or reaches through an org
   */
  async listRepositories(): Promise<RepoMeta[]> {
    const repos = await this.fetchAllPages<GitHubRepository>(
      '/user/repos?per_page=100&affiliation=owner,collaborator,organization_member&sort=updated&direction=desc'
    );
    return repos.map(toRepoMeta);
  }

  async getRepository(fullName: string): Promise<RepoMeta> {
    try {
      const { data } = await this.request<GitHubRepository>(`/repos/${fullName}`);
      return toRepoMeta(data);
    } catch (error) {
      if (error instanceof GitHubClientError && error.statusCode === 404) {
        throw new GitHubClientError(`Repository not found: ${fullName}`, 404, error.endpoint);
      }
      throw error;
    }
  }

  /**
   * Byte counts per language
   */
  async getLanguages(fullName: string): Promise<Record<string, number>> {
    const { data } = await this.request<GitHubLanguages>(`/repos/${fullName}/languages`);
    return data;
  }

  /**
   * List one directory of a repository (root by default)
   */
  async listDirectory(fullName: string, path = '', branch?: string): Promise<StructureEntry[]> {
    const query = branch ? `?ref=${encodeURIComponent(branch)}` : '';
    const { data } = await this.request<GitHubContentItem[] | GitHubContentItem>(
      `/repos/${fullName}/contents/${encodePath(path)}${query}`
    );

    const items = Array.isArray(data) ? data : [data];
    return items.map((item) => ({
      name: item.name,
      path: item.path,
      type: item.type === 'dir' ? 'dir' : 'file',
      size: item.type === 'dir' ? 0 : item.size,
    }));
  }

  private async getFile(fullName: string, path: string, branch?: string): Promise<GitHubFileContent | null> {
    const query = branch ? `?ref=${encodeURIComponent(branch)}` : '';
    try {
      const { data } = await this.request<GitHubFileContent | GitHubContentItem[]>(
        `/repos/${fullName}/contents/${encodePath(path)}${query}`
      );
      // A directory listing means the path is not a file
      return Array.isArray(data) ? null : data;
    } catch (error) {
      if (error instanceof GitHubClientError && error.statusCode === 404) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Get the decoded text of a file, or null when it does not exist
   */
  async getFileContent(fullName: string, path: string, branch?: string): Promise<string | null> {
    const file = await this.getFile(fullName, path, branch);
    if (!file || file.content === undefined) {
      return null;
    }
    if (file.encoding === 'base64') {
      return Buffer.from(file.content, 'base64').toString('utf-8');
    }
    return file.content;
  }

  /**
   * Commit a file, updating it when the path already exists
   */
  async commitFile(
    fullName: string,
    path: string,
    content: string,
    message: string,
    branch?: string,
  ): Promise<CommitResult> {
    const existing = await this.getFile(fullName, path, branch);

    const { data } = await this.request<GitHubCommitFileResponse>(
      `/repos/${fullName}/contents/${encodePath(path)}`,
      {
        method: 'PUT',
        body: JSON.stringify({
          message,
          content: Buffer.from(content, 'utf-8').toString('base64'),
          ...(branch ? { branch } : {}),
          ...(existing ? { sha: existing.sha } : {}),
        }),
      },
    );

    return {
      action: existing ? 'updated' : 'created',
      commitSha: data.commit.sha,
      commitUrl: data.commit.html_url,
    };
  }

  /**
   * Create a branch pointing at the tip of another branch
   */
  async createBranch(fullName: string, branchName: string, fromBranch?: string): Promise<boolean> {
    const source = fromBranch ?? (await this.getRepository(fullName)).defaultBranch;
    const { data: ref } = await this.request<GitHubGitRef>(
      `/repos/${fullName}/git/ref/heads/${encodePath(source)}`
    );

    await this.request<GitHubGitRef>(`/repos/${fullName}/git/refs`, {
      method: 'POST',
      body: JSON.stringify({ ref: `refs/heads/${branchName}`, sha: ref.object.sha }),
    });
    return true;
  }

  async createPullRequest(
    fullName: string,
    title: string,
    body: string,
    head: string,
    base?: string,
  ): Promise<PullRequestInfo> {
    const baseBranch = base ?? (await this.getRepository(fullName)).defaultBranch;
    const { data } = await this.request<GitHubPullRequest>(`/repos/${fullName}/pulls`, {
      method: 'POST',
      body: JSON.stringify({ title, body, head, base: baseBranch }),
    });

    return {
      number: data.number,
      url: data.html_url,
      state: data.state,
    };
  }
}
