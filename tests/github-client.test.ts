import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { GitHubClient, GitHubClientError } from '../src/github/client';

const BASE = 'https://api.test';

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

function repo(name: string): Record<string, unknown> {
  return {
    name,
    full_name: `octo/${name}`,
    description: '  ',
    language: 'Go',
    stargazers_count: 2,
    forks_count: 0,
    updated_at: '2026-01-01T00:00:00Z',
    html_url: `https://github.com/octo/${name}`,
    default_branch: 'main',
    private: false,
    fork: false,
    size: 1,
    open_issues_count: 0,
  };
}

describe('GitHubClient', () => {
  const fetchMock = vi.fn<typeof fetch>();
  let client: GitHubClient;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    client = new GitHubClient('test-token', { baseUrl: BASE, minRequestIntervalMs: 0 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('follows pagination links and maps repositories', async () => {
    fetchMock
      .mockResolvedValueOnce(json([repo('one')], 200, { Link: `<${BASE}/user/repos?page=2>; rel="next"` }))
      .mockResolvedValueOnce(json([repo('two')]));

    const repos = await client.listRepositories();

    expect(repos.map((r) => r.fullName)).toEqual(['octo/one', 'octo/two']);
    expect(repos[0]?.description).toBeNull();
    expect(repos[0]?.topics).toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(String(fetchMock.mock.calls[1]?.[0])).toBe(`${BASE}/user/repos?page=2`);
  });

  it('sends the token as a bearer header', async () => {
    fetchMock.mockResolvedValueOnce(json({ login: 'octo', name: null, avatar_url: '' }));

    const user = await client.getAuthenticatedUser();

    expect(user.login).toBe('octo');
    const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
    expect(headers.get('Authorization')).toBe('Bearer test-token');
  });

  it('decodes base64 file content', async () => {
    fetchMock.mockResolvedValueOnce(
      json({ name: 'README.md', path: 'README.md', sha: 's1', content: Buffer.from('# hello').toString('base64'), encoding: 'base64' })
    );

    expect(await client.getFileContent('octo/demo', 'README.md', 'main')).toBe('# hello');
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe(`${BASE}/repos/octo/demo/contents/README.md?ref=main`);
  });

  it('returns null for a missing file', async () => {
    fetchMock.mockResolvedValueOnce(json({ message: 'Not Found' }, 404));
    expect(await client.getFileContent('octo/demo', 'README.md')).toBeNull();
  });

  it('reports a missing repository by name', async () => {
    fetchMock.mockResolvedValueOnce(json({ message: 'Not Found' }, 404));
    await expect(client.getRepository('octo/missing')).rejects.toThrow('Repository not found: octo/missing');
  });

  it('fails immediately when rate limited', async () => {
    fetchMock.mockResolvedValueOnce(json({ message: 'API rate limit exceeded' }, 403, { 'X-RateLimit-Remaining': '0' }));

    const error = await client.getLanguages('octo/demo').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GitHubClientError);
    expect(error instanceof GitHubClientError && error.statusCode).toBe(403);
    expect(error instanceof Error && error.message.startsWith('Rate limit exceeded')).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('updates an existing file with its sha', async () => {
    fetchMock
      .mockResolvedValueOnce(json({ name: 'README.md', path: 'README.md', sha: 'old-sha', content: '', encoding: 'base64' }))
      .mockResolvedValueOnce(json({ commit: { sha: 'c1', html_url: 'https://github.com/octo/demo/commit/c1' } }));

    const result = await client.commitFile('octo/demo', 'README.md', '# new', 'Update README', 'main');

    expect(result).toEqual({ action: 'updated', commitSha: 'c1', commitUrl: 'https://github.com/octo/demo/commit/c1' });
    const init = fetchMock.mock.calls[1]?.[1];
    expect(init?.method).toBe('PUT');
    expect(JSON.parse(String(init?.body))).toEqual({
      message: 'Update README',
      content: Buffer.from('# new').toString('base64'),
      branch: 'main',
      sha: 'old-sha',
    });
  });

  it('creates a file that does not exist yet', async () => {
    fetchMock
      .mockResolvedValueOnce(json({ message: 'Not Found' }, 404))
      .mockResolvedValueOnce(json({ commit: { sha: 'c2', html_url: 'u' } }, 201));

    const result = await client.commitFile('octo/demo', 'README.md', '# new', 'Add README');

    expect(result.action).toBe('created');
    expect(JSON.parse(String(fetchMock.mock.calls[1]?.[1]?.body))).not.toHaveProperty('sha');
  });

  it('branches from the tip of the source branch', async () => {
    fetchMock
      .mockResolvedValueOnce(json({ ref: 'refs/heads/main', object: { sha: 'tip' } }))
      .mockResolvedValueOnce(json({ ref: 'refs/heads/readme', object: { sha: 'tip' } }, 201));

    expect(await client.createBranch('octo/demo', 'readme', 'main')).toBe(true);
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe(`${BASE}/repos/octo/demo/git/ref/heads/main`);
    expect(JSON.parse(String(fetchMock.mock.calls[1]?.[1]?.body))).toEqual({ ref: 'refs/heads/readme', sha: 'tip' });
  });
});
