/**
 * Deterministic repository signals
 * Languages, dependencies, frameworks and layout flags derived from metadata and manifests
 */

import {
  DEFAULT_THRESHOLDS,
  UNKNOWN_LANGUAGE,
  type GenerationThresholds,
  type RepoMeta,
  type RepositoryFacts,
  type StructureEntry,
} from '../domain/models';

export interface SignalInput {
  repo: RepoMeta;
  /** Byte counts per language */
  languages: Record<string, number>;
  structure: StructureEntry[];
  /** Fetched file name to content */
  files: Record<string, string>;
  author?: string;
}

type DependencyLimits = Pick<
  GenerationThresholds,
  'maxDependencies' | 'maxRequirementLines' | 'maxRuntimePackageDeps' | 'maxDevPackageDeps'
>;

const PYTHON_FRAMEWORKS: Record<string, string> = {
  flask: 'Flask',
  django: 'Django',
  fastapi: 'FastAPI',
  streamlit: 'Streamlit',
  pytest: 'pytest',
  numpy: 'NumPy',
  pandas: 'Pandas',
  tensorflow: 'TensorFlow',
  torch: 'PyTorch',
  'scikit-learn': 'scikit-learn',
  sklearn: 'scikit-learn',
};

const JS_FRAMEWORKS: Record<string, string> = {
  react: 'React',
  vue: 'Vue.js',
  angular: 'Angular',
  next: 'Next.js',
  express: 'Express.js',
  nestjs: 'NestJS',
  '@nestjs': 'NestJS',
  gatsby: 'Gatsby',
  svelte: 'Svelte',
};

const TEST_DIRS = new Set(['test', 'tests', 'spec', 'specs', '__tests__']);
const CI_ENTRIES = new Set([
  '.github',
  '.gitlab-ci.yml',
  '.travis.yml',
  'azure-pipelines.yml',
  '.circleci',
  'jenkinsfile',
]);
const DOCKER_FILES = new Set(['dockerfile', 'docker-compose.yml', 'docker-compose.yaml']);
const DOCKER_FRAMEWORK_FILES = new Set(['dockerfile', 'docker-compose.yml']);
const DOC_DIRS = new Set(['docs', 'doc', 'documentation']);

/**
 * Convert language bytes to percentages rounded to one decimal
 */
export function processLanguages(languages: Record<string, number>): Record<string, number> {
  const entries = Object.entries(languages);
  const total = entries.reduce((sum, [, bytes]) => sum + bytes, 0);
  if (entries.length === 0 || total <= 0) {
    return {};
  }

  const result: Record<string, number> = {};
  for (const [lang, bytes] of entries) {
    result[lang] = Math.round((bytes / total) * 1000) / 10;
  }
  return result;
}

/**
 * Get the language with the most bytes
 */
export function primaryLanguage(languages: Record<string, number>): string {
  let best: string | undefined;
  let bestBytes = -Infinity;

  for (const [lang, bytes] of Object.entries(languages)) {
    if (bytes > bestBytes) {
      best = lang;
      bestBytes = bytes;
    }
  }

  return best ?? UNKNOWN_LANGUAGE;
}

/**
 * Parse Python requirements.txt
 */
export function parseRequirements(content: string, limit = DEFAULT_THRESHOLDS.maxRequirementLines): string[] {
  const deps: string[] = [];
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line || line.startsWith('#') || line.startsWith('-')) continue;

    const match = line.match(/^[A-Za-z0-9_.-]+/);
    if (match) {
      deps.push(match[0]);
    }
  }
  return deps.slice(0, limit);
}

function objectKeys(value: unknown): string[] {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return [];
  }
  return Object.keys(value);
}

/**
 * Parse package.json runtime and development dependency names
 */
export function parsePackageJson(
  content: string,
  limits: Pick<DependencyLimits, 'maxRuntimePackageDeps' | 'maxDevPackageDeps'> = DEFAULT_THRESHOLDS,
): string[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return [];
  }
  if (data === null || typeof data !== 'object') {
    return [];
  }

  const runtime = objectKeys(Reflect.get(data, 'dependencies')).slice(0, limits.maxRuntimePackageDeps);
  const dev = objectKeys(Reflect.get(data, 'devDependencies')).slice(0, limits.maxDevPackageDeps);
  return [...runtime, ...dev];
}

/**
 * Parse Ruby Gemfile
 */
export function parseGemfile(content: string, limit = DEFAULT_THRESHOLDS.maxRequirementLines): string[] {
  const deps: string[] = [];
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line.startsWith('gem ')) continue;

    const match = line.match(/gem\s+['"]([^'"]+)['"]/);
    if (match?.[1]) {
      deps.push(match[1]);
    }
  }
  return deps.slice(0, limit);
}

/**
 * Detect dependencies from the manifest files present in the listing
 */
export function detectDependencies(
  structure: readonly StructureEntry[],
  files: Record<string, string>,
  limits: DependencyLimits = DEFAULT_THRESHOLDS,
): string[] {
  const dependencies: string[] = [];
  const fileNames = new Set(structure.map((item) => item.name));
  const fileContent = (name: string): string | undefined =>
    fileNames.has(name) ? files[name] : undefined;

  // Python
  const requirements = fileContent('requirements.txt');
  if (requirements !== undefined) {
    dependencies.push(...parseRequirements(requirements, limits.maxRequirementLines));
  }
  if (fileNames.has('Pipfile')) {
    dependencies.push('pipenv');
  }
  if (fileContent('pyproject.toml')?.toLowerCase().includes('poetry')) {
    dependencies.push('poetry');
  }

  // JavaScript / Node.js
  const packageJson = fileContent('package.json');
  if (packageJson !== undefined) {
    dependencies.push(...parsePackageJson(packageJson, limits));
  }

  // Ruby
  const gemfile = fileContent('Gemfile');
  if (gemfile !== undefined) {
    dependencies.push(...parseGemfile(gemfile, limits.maxRequirementLines));
  }

  // Marker-only manifests
  if (fileNames.has('go.mod')) {
    dependencies.push('Go modules');
  }
  if (fileNames.has('pom.xml')) {
    dependencies.push('Maven');
  }
  if (fileNames.has('build.gradle') || fileNames.has('build.gradle.kts')) {
    dependencies.push('Gradle');
  }
  if (fileNames.has('Cargo.toml')) {
    dependencies.push('Cargo');
  }

  return [...new Set(dependencies)].slice(0, limits.maxDependencies);
}

/**
 * Detect frameworks from dependency names and Docker files
 */
export function detectFrameworks(
  dependencies: readonly string[],
  structure: readonly StructureEntry[],
): string[] {
  const frameworks = new Set<string>();
  const tables = [PYTHON_FRAMEWORKS, JS_FRAMEWORKS];

  for (const dep of dependencies) {
    const lower = dep.toLowerCase();
    for (const table of tables) {
      for (const [keyword, framework] of Object.entries(table)) {
        if (lower.includes(keyword)) {
          frameworks.add(framework);
        }
      }
    }
  }

  if (structure.some((item) => DOCKER_FRAMEWORK_FILES.has(item.name.toLowerCase()))) {
    frameworks.add('Docker');
  }

  return [...frameworks];
}

function hasEntry(
  structure: readonly StructureEntry[],
  names: Set<string>,
  type?: StructureEntry['type'],
): boolean {
  return structure.some(
    (item) => (type === undefined || item.type === type) && names.has(item.name.toLowerCase())
  );
}

export function hasTests(structure: readonly StructureEntry[]): boolean {
  return hasEntry(structure, TEST_DIRS, 'dir');
}

export function hasCi(structure: readonly StructureEntry[]): boolean {
  return hasEntry(structure, CI_ENTRIES);
}

export function hasDocker(structure: readonly StructureEntry[]): boolean {
  return hasEntry(structure, DOCKER_FILES);
}

export function hasDocs(structure: readonly StructureEntry[]): boolean {
  return hasEntry(structure, DOC_DIRS, 'dir');
}

/**
 * Assemble the fact sheet for one repository
 */
export function extractSignals(
  input: SignalInput,
  limits: DependencyLimits = DEFAULT_THRESHOLDS,
): RepositoryFacts {
  const { repo, languages, structure, files } = input;
  const dependencies = detectDependencies(structure, files, limits);
  const existingReadme = files['README.md'];

  return {
    fullName: repo.fullName,
    shortName: repo.name,
    description: repo.description,
    topics: repo.topics,
    stars: repo.stars,
    defaultBranch: repo.defaultBranch,
    languages: processLanguages(languages),
    primaryLanguage: primaryLanguage(languages),
    structure,
    dependencies,
    frameworks: detectFrameworks(dependencies, structure),
    hasTests: hasTests(structure),
    hasCi: hasCi(structure),
    hasDocker: hasDocker(structure),
    hasDocs: hasDocs(structure),
    ...(existingReadme !== undefined ? { existingReadme } : {}),
    ...(input.author ? { author: input.author } : {}),
  };
}
