/**
 * Repository discovery
 * Filtering, sorting and summary statistics over the user's repository list
 */

import type { RepoMeta } from './models';

export interface RepositoryFilter {
  language?: string;
  /** Case-insensitive substring of the repository name */
  name?: string;
  includePrivate?: boolean;
  includeForks?: boolean;
}

export type RepositorySortField = 'stars' | 'updatedAt' | 'name' | 'forks';

export const SORT_FIELDS: readonly RepositorySortField[] = ['stars', 'updatedAt', 'name', 'forks'];

export interface RepositorySummary {
  total: number;
  public: number;
  private: number;
  totalStars: number;
  languages: Array<{ language: string; count: number }>;
}

/**
 * Filter repositories based on criteria
 */
export function filterRepositories(repos: readonly RepoMeta[], filter: RepositoryFilter = {}): RepoMeta[] {
  const name = filter.name?.toLowerCase();

  return repos.filter((repo) => {
    if (filter.language && repo.language !== filter.language) return false;
    if (name && !repo.name.toLowerCase().includes(name)) return false;
    if (filter.includePrivate === false && repo.private) return false;
    if (filter.includeForks === false && repo.fork) return false;
    return true;
  });
}

function compareField(a: RepoMeta, b: RepoMeta, field: RepositorySortField): number {
  switch (field) {
    case 'stars':
    case 'forks':
      return a[field] - b[field];
    case 'name':
      return a.name.localeCompare(b.name);
    case 'updatedAt':
      return Date.parse(a.updatedAt) - Date.parse(b.updatedAt);
  }
}

/**
 * Sort repositories; descending by default (newest, most starred, Z to A)
 */
export function sortRepositories(
  repos: readonly RepoMeta[],
  field: RepositorySortField = 'updatedAt',
  descending = true,
): RepoMeta[] {
  const direction = descending ? -1 : 1;

  return [...repos].sort((a, b) => compareField(a, b, field) * direction);
}

/**
 * Count repositories per language, most common first
 */
export function languageStats(repos: readonly RepoMeta[]): Array<{ language: string; count: number }> {
  const counts = new Map<string, number>();
  for (const repo of repos) {
    if (!repo.language) continue;
    counts.set(repo.language, (counts.get(repo.language) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([language, count]) => ({ language, count }))
    .sort((a, b) => b.count - a.count || a.language.localeCompare(b.language));
}

export function summarizeRepositories(repos: readonly RepoMeta[]): RepositorySummary {
  const privateCount = repos.filter((repo) => repo.private).length;

  return {
    total: repos.length,
    public: repos.length - privateCount,
    private: privateCount,
    totalStars: repos.reduce((sum, repo) => sum + repo.stars, 0),
    languages: languageStats(repos),
  };
}
