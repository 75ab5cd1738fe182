/**
 * Pipeline coordinator
 * Runs fetch, backup, analysis, generation and review for each selected repository
 */

import { augmentWithInsight } from './analysis/insight';
import { extractSignals } from './analysis/signals';
import type { BackupStore } from './backup/store';
import {
  DEFAULT_THRESHOLDS,
  type BackupRecord,
  type GenerationThresholds,
  type PerRepoResult,
  type StructureEntry,
} from './domain/models';
import type { CodeHost } from './github/client';
import type { LLMClient } from './llm/client';
import { silentLogger, type Logger } from './logger';
import { synthesizeReadme } from './readme/generator';
import { scoreReadme } from './readme/quality';
import { reviewReadme } from './readme/reviewer';

/**
 * Files fetched for analysis when they appear at the repository root
 */
export const FILES_TO_FETCH = [
  'README.md',
  'requirements.txt',
  'package.json',
  'pyproject.toml',
  'Gemfile',
  'Cargo.toml',
  'app.py',
  'main.py',
  'index.js',
  'index.ts',
  'main.go',
] as const;

export interface PipelineDeps {
  host: CodeHost;
  llm: LLMClient;
  backups: BackupStore;
}

export interface PipelineOptions {
  /** GitHub login credited as the author */
  username?: string;
  /** Ask the model for project insight before generating (default true) */
  insight?: boolean;
  /** Run the review pass (default true) */
  review?: boolean;
  thresholds?: GenerationThresholds;
  maxTokens?: number;
  logger?: Logger;
  onProgress?: (current: number, total: number, repoName: string) => void;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ReadmePipeline {
  private host: CodeHost;
  private llm: LLMClient;
  private backups: BackupStore;
  private options: PipelineOptions;
  private logger: Logger;

  constructor(deps: PipelineDeps, options: PipelineOptions = {}) {
    this.host = deps.host;
    this.llm = deps.llm;
    this.backups = deps.backups;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Process every repository; a failure is recorded for that repository only
   */
  async runPipeline(repoNames: readonly string[]): Promise<PerRepoResult[]> {
    const results: PerRepoResult[] = [];

    for (const [index, repoName] of repoNames.entries()) {
      this.options.onProgress?.(index + 1, repoNames.length, repoName);

      try {
        results.push(await this.processRepository(repoName));
      } catch (error) {
        this.logger.warn(`  Failed: ${repoName} - ${errorMessage(error)}`);
        results.push({ repoName, success: false, error: errorMessage(error) });
      }
    }

    return results;
  }

  private async fetchFiles(
    repoName: string,
    structure: readonly StructureEntry[],
    branch: string,
  ): Promise<Record<string, string>> {
    const present = new Set(structure.filter((item) => item.type === 'file').map((item) => item.name));
    const files: Record<string, string> = {};

    for (const name of FILES_TO_FETCH) {
      if (!present.has(name)) continue;
      const content = await this.host.getFileContent(repoName, name, branch);
      if (content !== null) {
        files[name] = content;
      }
    }

    return files;
  }

  /**
   * Save the current README without holding up generation.
   * A failed backup is reported and leaves the result without one.
   */
  private startBackup(repoName: string, readme: string | undefined): Promise<BackupRecord | undefined> {
    if (readme === undefined) {
      return Promise.resolve(undefined);
    }
    return this.backups.save(repoName, readme).catch((error: unknown) => {
      this.logger.warn(`  Backup failed for ${repoName}: ${errorMessage(error)}`);
      return undefined;
    });
  }

  private async processRepository(repoName: string): Promise<PerRepoResult> {
    const thresholds = this.options.thresholds ?? DEFAULT_THRESHOLDS;
    const logger = this.logger;

    logger.verbose(`\nProcessing ${repoName}`);
    logger.verbose('  Fetching repository data...');
    const repo = await this.host.getRepository(repoName);
    const languages = await this.host.getLanguages(repoName);
    const structure = await this.host.listDirectory(repoName, '', repo.defaultBranch);
    const files = await this.fetchFiles(repoName, structure, repo.defaultBranch);

    const backup = this.startBackup(repoName, files['README.md']);

    logger.verbose('  Analyzing...');
    let facts = extractSignals(
      {
        repo,
        languages,
        structure,
        files,
        ...(this.options.username ? { author: this.options.username } : {}),
      },
      thresholds,
    );
    if (this.options.insight !== false) {
      facts = await augmentWithInsight(facts, files, this.llm, { logger });
    }

    logger.verbose('  Generating README...');
    let doc = await synthesizeReadme(facts, this.llm, {
      thresholds,
      maxTokens: this.options.maxTokens,
      logger,
    });

    if (this.options.review !== false) {
      logger.verbose('  Reviewing README...');
      doc = await reviewReadme(doc, facts, this.llm, {
        thresholds,
        maxTokens: this.options.maxTokens,
        logger,
      });
    }

    const qualityScore = scoreReadme(doc.content);
    logger.verbose(`  Quality score: ${qualityScore}/100 (${doc.qualitySignal})`);

    const savedBackup = await backup;

    return {
      repoName,
      success: true,
      readme: doc.content,
      qualitySignal: doc.qualitySignal,
      qualityScore,
      ...(savedBackup ? { backup: savedBackup } : {}),
      facts,
    };
  }
}

/**
 * Run the pipeline once with the given collaborators
 */
export function runPipeline(
  deps: PipelineDeps,
  repoNames: readonly string[],
  options: PipelineOptions = {},
): Promise<PerRepoResult[]> {
  return new ReadmePipeline(deps, options).runPipeline(repoNames);
}
