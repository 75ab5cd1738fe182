/**
 * CLI command definitions and orchestration
 * Uses commander for argument parsing
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { BackupError, FileBackupStore } from './backup/store';
import { ConfigError, loadBackupDir, loadConfig, loadLLMConfig, validateConfig } from './config';
import {
  filterRepositories,
  sortRepositories,
  summarizeRepositories,
  SORT_FIELDS,
  type RepositorySortField,
} from './domain/discovery';
import type { PerRepoResult, PerRepoSuccess } from './domain/models';
import { GitHubClient, GitHubClientError } from './github/client';
import { createLLMClient, LLMClientError } from './llm/client';
import { createLogger, type Logger } from './logger';
import { runPipeline } from './pipeline';
import { publishReadme, README_PATH, type PublishResult } from './publish';
import { refineReadme } from './readme/generator';

interface OutputOptions {
  verbose?: boolean;
  quiet?: boolean;
}

interface ReposOptions extends OutputOptions {
  language?: string;
  name?: string;
  sort: RepositorySortField;
  private: boolean;
  forks: boolean;
}

interface GenerateOptions extends OutputOptions {
  out: string;
  commit?: boolean;
  pr?: boolean;
  insight: boolean;
  review: boolean;
  json?: boolean;
}

interface CommitOptions extends OutputOptions {
  pr?: boolean;
  message?: string;
}

interface RefineOptions extends OutputOptions {
  feedback: string;
  out?: string;
}

interface BackupListOptions extends OutputOptions {
  repo?: string;
}

interface PruneOptions extends OutputOptions {
  keep: number;
}

/**
 * Parse a positive integer option
 */
function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseSortField(value: string): RepositorySortField {
  const field = SORT_FIELDS.find((f) => f === value);
  if (!field) {
    throw new InvalidArgumentError(`Expected one of: ${SORT_FIELDS.join(', ')}.`);
  }
  return field;
}

/**
 * Validate owner/repo format
 */
function parseRepoName(value: string): string {
  if (!/^[A-Za-z0-9-]+\/[A-Za-z0-9._-]+$/.test(value)) {
    throw new InvalidArgumentError(`Invalid repository "${value}". Expected owner/repo.`);
  }
  return value;
}

/**
 * Local file name for a generated README
 */
export function outputFileName(repoName: string): string {
  return `${repoName.replace('/', '_')}.md`;
}

/**
 * Report an error and exit
 */
function fail(error: unknown, logger: Logger): never {
  if (error instanceof ConfigError) {
    logger.error(`Configuration Error:\n${error.message}`);
    process.exit(1);
  }

  if (error instanceof GitHubClientError) {
    logger.error(`GitHub API Error: ${error.message}`);
    if (error.statusCode === 401) {
      logger.error('  Check that your GITHUB_TOKEN is valid.');
    } else if (error.statusCode === 403 || error.statusCode === 429) {
      logger.error('  You may have hit a rate limit or lack the "repo" scope. Try again later.');
    }
    process.exit(1);
  }

  if (error instanceof LLMClientError) {
    logger.error(`LLM API Error: ${error.message}`);
    if (error.statusCode === 401) {
      logger.error('  Check the API key for your LLM provider.');
    }
    process.exit(1);
  }

  if (error instanceof BackupError || error instanceof Error) {
    logger.error(`Error: ${error.message}`);
  } else {
    logger.error('An unexpected error occurred');
  }
  process.exit(1);
}

function printPublishResult(result: PublishResult, repoName: string, logger: Logger): void {
  if (result.pullRequest) {
    logger.log(`  ${repoName}: pull request #${result.pullRequest.number} opened: ${result.pullRequest.url}`);
  } else {
    logger.log(`  ${repoName}: README ${result.action} on ${result.branch} (${result.commitSha.slice(0, 7)})`);
  }
}

function printResults(results: PerRepoResult[], logger: Logger): void {
  logger.log('');
  for (const result of results) {
    if (result.success) {
      const backup = result.backup ? `, backup ${result.backup.id}` : '';
      logger.log(`  ✅ ${result.repoName}: score ${result.qualityScore}/100 (${result.qualitySignal}${backup})`);
    } else {
      logger.log(`  ❌ ${result.repoName}: ${result.error}`);
    }
  }
}

/**
 * Run the repos command
 */
async function runRepos(options: ReposOptions): Promise<void> {
  const logger = createLogger(options);

  try {
    validateConfig(process.env, { github: true });
    const config = loadConfig();
    const github = new GitHubClient(config.githubToken, { timeoutMs: config.githubTimeoutMs });

    const all = await github.listRepositories();
    const repos = sortRepositories(
      filterRepositories(all, {
        language: options.language,
        name: options.name,
        includePrivate: options.private,
        includeForks: options.forks,
      }),
      options.sort,
    );

    for (const repo of repos) {
      const flags = [repo.private ? 'private' : undefined, repo.fork ? 'fork' : undefined]
        .filter((f): f is string => f !== undefined);
      const suffix = flags.length > 0 ? ` [${flags.join(', ')}]` : '';
      logger.log(`${repo.fullName.padEnd(40)} ${(repo.language ?? '-').padEnd(14)} ★ ${repo.stars}${suffix}`);
    }

    const summary = summarizeRepositories(all);
    logger.log('');
    logger.log(`Showing ${repos.length} of ${summary.total} repositories (${summary.public} public, ${summary.private} private, ${summary.totalStars} stars)`);
    if (summary.languages.length > 0) {
      logger.log(`Languages: ${summary.languages.map((l) => `${l.language} (${l.count})`).join(', ')}`);
    }
  } catch (error) {
    fail(error, logger);
  }
}

/**
 * Run the generate command
 */
async function runGenerate(repoNames: string[], options: GenerateOptions): Promise<void> {
  // stdout carries only the JSON document in --json mode
  const logger = createLogger(options.json ? { quiet: true } : options);

  try {
    validateConfig(process.env, { github: true, llm: true });
    const config = loadConfig();

    const github = new GitHubClient(config.githubToken, { timeoutMs: config.githubTimeoutMs });
    const llm = createLLMClient(config.llm);
    const backups = new FileBackupStore(config.backupDir);

    const user = await github.getAuthenticatedUser();
    logger.log(`Connected as ${user.login}`);
    logger.log(`LLM: ${llm.provider}/${llm.model}`);
    logger.log(`Repositories: ${repoNames.join(', ')}`);
    logger.log('');

    const results = await runPipeline({ host: github, llm, backups }, repoNames, {
      username: user.login,
      insight: options.insight,
      review: options.review,
      maxTokens: config.llm.maxTokens,
      logger,
      onProgress: (current, total, repoName) => {
        logger.progress(`\r  Processing ${current}/${total}: ${repoName}`);
      },
    });
    logger.log('');

    const outDir = resolve(options.out);
    await mkdir(outDir, { recursive: true });
    const succeeded = results.filter((r): r is PerRepoSuccess => r.success);
    for (const result of succeeded) {
      await writeFile(join(outDir, outputFileName(result.repoName)), result.readme, 'utf-8');
    }

    if (options.json) {
      console.log(JSON.stringify(results, null, 2));
    } else {
      printResults(results, logger);
      logger.log('');
      logger.log(`READMEs written to: ${outDir}`);
    }

    if (options.commit || options.pr) {
      logger.log('');
      logger.log('Publishing...');
      for (const result of succeeded) {
        if (result.qualitySignal === 'existing-kept') {
          logger.log(`  ${result.repoName}: existing README kept, nothing to publish`);
          continue;
        }
        try {
          const published = await publishReadme(github, result.repoName, result.readme, {
            createPr: options.pr,
            message: 'Update README',
          });
          printPublishResult(published, result.repoName, logger);
        } catch (error) {
          logger.error(`  ${result.repoName}: publish failed: ${error instanceof Error ? error.message : String(error)}`);
        }
      }
    }

    logger.log('');
    logger.log(`✅ Done! ${succeeded.length}/${results.length} repositories processed.`);
    if (succeeded.length < results.length) {
      process.exitCode = 1;
    }
  } catch (error) {
    fail(error, logger);
  }
}

/**
 * Run the commit command: back up the current README, then publish a local file
 */
async function runCommit(repoName: string, file: string, options: CommitOptions): Promise<void> {
  const logger = createLogger(options);

  try {
    validateConfig(process.env, { github: true });
    const config = loadConfig();
    const github = new GitHubClient(config.githubToken, { timeoutMs: config.githubTimeoutMs });
    const backups = new FileBackupStore(config.backupDir);

    const content = await readFile(file, 'utf-8');
    const current = await github.getFileContent(repoName, README_PATH);
    if (current !== null) {
      const backup = await backups.save(repoName, current);
      logger.log(`Backed up current README as ${backup.id}`);
    }

    const result = await publishReadme(github, repoName, content, {
      createPr: options.pr,
      message: options.message ?? 'Update README',
    });
    printPublishResult(result, repoName, logger);
  } catch (error) {
    fail(error, logger);
  }
}

/**
 * Run the refine command
 */
async function runRefine(file: string, options: RefineOptions): Promise<void> {
  const logger = createLogger(options);

  try {
    validateConfig(process.env, { llm: true });
    const llmConfig = loadLLMConfig();
    const llm = createLLMClient(llmConfig);

    const readme = await readFile(file, 'utf-8');
    const refined = await refineReadme(readme, options.feedback, llm, {
      maxTokens: llmConfig.maxTokens,
      logger,
    });

    const target = options.out ?? file;
    await writeFile(target, refined, 'utf-8');
    logger.log(refined === readme ? `README unchanged: ${target}` : `Refined README written to: ${target}`);
  } catch (error) {
    fail(error, logger);
  }
}

/**
 * Run the health command
 */
async function runHealth(options: OutputOptions): Promise<void> {
  const logger = createLogger(options);

  try {
    validateConfig(process.env, { llm: true });
    const llm = createLLMClient(loadLLMConfig());
    const status = await llm.testConnection();

    logger.log(`Status:    ${status.connected ? 'healthy' : 'degraded'}`);
    logger.log(`Provider:  ${status.provider}`);
    logger.log(`Model:     ${status.model} (${status.modelAvailable ? 'available' : 'not available'})`);
    if (status.models && status.models.length > 0) {
      logger.log(`Models:    ${status.models.join(', ')}`);
    }
    if (status.error) {
      logger.error(`Error:     ${status.error}`);
    }
    if (!status.connected) {
      process.exitCode = 1;
    }
  } catch (error) {
    fail(error, logger);
  }
}

function createBackupsCommand(): Command {
  const backups = new Command('backups').description('Manage local README backups');
  const store = (): FileBackupStore => new FileBackupStore(loadBackupDir());

  backups
    .command('list')
    .description('List backups, newest first')
    .option('--repo <repo>', 'Only backups of this repository (owner/repo)')
    .action(async (options: BackupListOptions) => {
      const logger = createLogger(options);
      try {
        const records = options.repo ? await store().listForRepo(options.repo) : await store().listAll();
        if (records.length === 0) {
          logger.log('No backups found.');
          return;
        }
        for (const record of records) {
          const sizeKb = (Buffer.byteLength(record.content, 'utf-8') / 1024).toFixed(2);
          logger.log(`${record.id.padEnd(60)} ${record.repoName.padEnd(40)} ${record.createdAt} ${sizeKb} KB`);
        }
      } catch (error) {
        fail(error, logger);
      }
    });

  backups
    .command('show <id>')
    .description('Print the content of a backup')
    .action(async (id: string) => {
      const logger = createLogger();
      try {
        const record = await store().read(id);
        if (!record) {
          logger.error(`Backup not found: ${id}`);
          process.exit(1);
        }
        console.log(record.content);
      } catch (error) {
        fail(error, logger);
      }
    });

  backups
    .command('delete <id>')
    .description('Delete a backup')
    .action(async (id: string) => {
      const logger = createLogger();
      try {
        if (await store().delete(id)) {
          logger.log(`Backup deleted: ${id}`);
        } else {
          logger.error(`Backup not found: ${id}`);
          process.exitCode = 1;
        }
      } catch (error) {
        fail(error, logger);
      }
    });

  backups
    .command('restore <id>')
    .description('Commit a backup back to its repository')
    .action(async (id: string) => {
      const logger = createLogger();
      try {
        validateConfig(process.env, { github: true });
        const config = loadConfig();
        const record = await new FileBackupStore(config.backupDir).read(id);
        if (!record) {
          logger.error(`Backup not found: ${id}`);
          process.exit(1);
        }

        const github = new GitHubClient(config.githubToken, { timeoutMs: config.githubTimeoutMs });
        const result = await publishReadme(github, record.repoName, record.content, {
          message: 'Restore README from backup',
        });
        logger.log(`README restored for ${record.repoName}`);
        printPublishResult(result, record.repoName, logger);
      } catch (error) {
        fail(error, logger);
      }
    });

  backups
    .command('prune')
    .description('Delete old backups, keeping the newest per repository')
    .option('--keep <n>', 'Backups to keep per repository', parsePositiveInt, 5)
    .action(async (options: PruneOptions) => {
      const logger = createLogger(options);
      try {
        const deleted = await store().prune(options.keep);
        logger.log(`Deleted ${deleted} backup${deleted === 1 ? '' : 's'}.`);
      } catch (error) {
        fail(error, logger);
      }
    });

  return backups;
}

/**
 * Create the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('readme-refresh')
    .description('Analyze GitHub repositories and generate or refresh their READMEs with an LLM')
    .version('1.0.0');

  program
    .command('repos')
    .description('List your repositories')
    .option('-l, --language <language>', 'Only repositories whose primary language matches')
    .option('-n, --name <text>', 'Only repositories whose name contains this text')
    .option('-s, --sort <field>', `Sort by: ${SORT_FIELDS.join(', ')}`, parseSortField, 'updatedAt')
    .option('--no-private', 'Hide private repositories')
    .option('--no-forks', 'Hide forks')
    .option('-q, --quiet', 'Minimal output')
    .action(async (options: ReposOptions) => {
      await runRepos(options);
    });

  program
    .command('generate')
    .description('Generate READMEs for one or more repositories')
    .argument('<repos...>', 'Repositories in owner/repo format', (value: string, previous: string[] = []) => [
      ...previous,
      parseRepoName(value),
    ])
    .option('-o, --out <dir>', 'Directory for generated READMEs', 'readmes')
    .option('--commit', 'Commit each generated README to the default branch')
    .option('--pr', 'Open a pull request for each generated README')
    .option('--no-insight', 'Skip the LLM project analysis step')
    .option('--no-review', 'Skip the LLM review step')
    .option('--json', 'Print results as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Minimal output')
    .action(async (repos: string[], options: GenerateOptions) => {
      await runGenerate(repos, options);
    });

  program
    .command('commit')
    .description('Commit a local README file to a repository')
    .argument('<repo>', 'Repository in owner/repo format', parseRepoName)
    .argument('<file>', 'README file to commit')
    .option('--pr', 'Open a pull request instead of committing to the default branch')
    .option('-m, --message <message>', 'Commit message')
    .action(async (repo: string, file: string, options: CommitOptions) => {
      await runCommit(repo, file, options);
    });

  program
    .command('refine')
    .description('Rewrite a local README according to feedback')
    .argument('<file>', 'README file to refine')
    .requiredOption('-f, --feedback <text>', 'What to change')
    .option('-o, --out <file>', 'Write to this file instead of overwriting the input')
    .action(async (file: string, options: RefineOptions) => {
      await runRefine(file, options);
    });

  program.addCommand(createBackupsCommand());

  program
    .command('health')
    .description('Check the connection to the configured LLM provider')
    .action(async (options: OutputOptions) => {
      await runHealth(options);
    });

  return program;
}
