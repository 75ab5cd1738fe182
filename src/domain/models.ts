/**
 * Domain models for the readme-refresh CLI tool
 */

/**
 * Sentinel used as the primary language when GitHub reports no language data
 */
export const UNKNOWN_LANGUAGE = 'Unknown';

/**
 * Represents a GitHub repository as listed for the authenticated user
 */
export interface RepoMeta {
  name: string;
  fullName: string;
  description: string | null;
  language: string | null;
  stars: number;
  forks: number;
  updatedAt: string;
  htmlUrl: string;
  defaultBranch: string;
  topics: string[];
  private: boolean;
  fork: boolean;
  size: number;
  openIssues: number;
}

/**
 * One entry of a repository directory listing
 */
export interface StructureEntry {
  name: string;
  path: string;
  type: 'file' | 'dir';
  size: number;
}

/**
 * LLM-derived judgments about a project.
 * A field is present only when the model returned a non-empty value for it.
 */
export interface Insight {
  projectType?: string;
  mainPurpose?: string;
  keyFeatures?: string[];
  targetAudience?: string;
  complexity?: string;
}

/**
 * Deterministic fact sheet assembled once per repository per run
 */
export interface RepositoryFacts {
  readonly fullName: string;
  readonly shortName: string;
  readonly description: string | null;
  readonly topics: readonly string[];
  readonly stars: number;
  readonly defaultBranch: string;
  /** Language name to percentage of bytes, one decimal */
  readonly languages: Readonly<Record<string, number>>;
  readonly primaryLanguage: string;
  readonly structure: readonly StructureEntry[];
  readonly dependencies: readonly string[];
  readonly frameworks: readonly string[];
  readonly hasTests: boolean;
  readonly hasCi: boolean;
  readonly hasDocker: boolean;
  readonly hasDocs: boolean;
  /** Raw README.md text; absent when the repository has none */
  readonly existingReadme?: string;
  /** GitHub login credited in the Author section */
  readonly author?: string;
  readonly insight?: Readonly<Insight>;
}

/**
 * Which path produced a README
 */
export type QualitySignal = 'llm-fresh' | 'llm-reviewed' | 'fallback-template' | 'existing-kept';

export interface GeneratedDocument {
  content: string;
  qualitySignal: QualitySignal;
}

/**
 * A saved copy of a README taken before it was overwritten
 */
export interface BackupRecord {
  id: string;
  repoName: string;
  content: string;
  createdAt: string;
}

export interface PerRepoSuccess {
  repoName: string;
  success: true;
  readme: string;
  qualitySignal: QualitySignal;
  qualityScore: number;
  backup?: BackupRecord;
  facts: RepositoryFacts;
}

export interface PerRepoFailure {
  repoName: string;
  success: false;
  error: string;
}

/**
 * Outcome of the pipeline for one selected repository
 */
export type PerRepoResult = PerRepoSuccess | PerRepoFailure;

/**
 * Tunable limits used across the pipeline
 */
export interface GenerationThresholds {
  /** An existing README longer than this is kept when there is no other evidence */
  minExistingReadmeLength: number;
  minGeneratedLength: number;
  maxUnknownTokens: number;
  maxNotApplicableTokens: number;
  maxTreeItems: number;
  maxDependencies: number;
  maxRequirementLines: number;
  maxRuntimePackageDeps: number;
  maxDevPackageDeps: number;
}

export const DEFAULT_THRESHOLDS: GenerationThresholds = {
  minExistingReadmeLength: 100,
  minGeneratedLength: 50,
  maxUnknownTokens: 3,
  maxNotApplicableTokens: 2,
  maxTreeItems: 20,
  maxDependencies: 20,
  maxRequirementLines: 15,
  maxRuntimePackageDeps: 10,
  maxDevPackageDeps: 5,
};

/**
 * Returns the primary language unless it is the "no data" sentinel
 */
export function knownLanguage(facts: Pick<RepositoryFacts, 'primaryLanguage'>): string | undefined {
  return facts.primaryLanguage && facts.primaryLanguage !== UNKNOWN_LANGUAGE
    ? facts.primaryLanguage
    : undefined;
}
