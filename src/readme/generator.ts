/**
 * README generation
 * Builds the prompt, calls the model and falls back to the template on failure or low quality
 */

import { DEFAULT_THRESHOLDS, type GeneratedDocument, type GenerationThresholds, type RepositoryFacts } from '../domain/models';
import type { LLMClient } from '../llm/client';
import { silentLogger, type Logger } from '../logger';
import { buildFallbackReadme } from './fallback';
import { buildGenerationPrompt, buildRefinePrompt } from './prompts';
import { lowQualityReason, stripCodeFence } from './quality';

export interface SynthesisOptions {
  thresholds?: GenerationThresholds;
  maxTokens?: number;
  logger?: Logger;
}

/**
 * Whether an existing README should be kept instead of generating a new one:
 * it is substantial and nothing was detected that a generated README could add
 */
export function shouldKeepExisting(
  facts: RepositoryFacts,
  thresholds: Pick<GenerationThresholds, 'minExistingReadmeLength'> = DEFAULT_THRESHOLDS,
): boolean {
  return (
    facts.existingReadme !== undefined &&
    facts.existingReadme.length > thresholds.minExistingReadmeLength &&
    facts.dependencies.length === 0 &&
    facts.frameworks.length === 0
  );
}

function fallback(facts: RepositoryFacts): GeneratedDocument {
  return { content: buildFallbackReadme(facts), qualitySignal: 'fallback-template' };
}

/**
 * Produce a README for a repository
 */
export async function synthesizeReadme(
  facts: RepositoryFacts,
  llm: LLMClient,
  options: SynthesisOptions = {},
): Promise<GeneratedDocument> {
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  const logger = options.logger ?? silentLogger;

  if (facts.existingReadme !== undefined && shouldKeepExisting(facts, thresholds)) {
    logger.verbose('  Existing README kept: nothing detected that a new one would add');
    return { content: facts.existingReadme, qualitySignal: 'existing-kept' };
  }

  const prompt = buildGenerationPrompt(facts, thresholds.maxTreeItems);

  let content: string;
  try {
    const response = await llm.complete(prompt, {
      temperature: 0.7,
      maxTokens: options.maxTokens ?? 2048,
    });
    content = stripCodeFence(response);
  } catch (error) {
    logger.warn(`  Generation failed, using template: ${error instanceof Error ? error.message : String(error)}`);
    return fallback(facts);
  }

  const reason = lowQualityReason(content, thresholds);
  if (reason) {
    logger.warn(`  Generated README rejected (${reason}), using template`);
    return fallback(facts);
  }

  return { content, qualitySignal: 'llm-fresh' };
}

/**
 * Rewrite a README according to free-text feedback; returns the input on failure
 */
export async function refineReadme(
  readme: string,
  feedback: string,
  llm: LLMClient,
  options: Pick<SynthesisOptions, 'maxTokens' | 'logger'> = {},
): Promise<string> {
  const logger = options.logger ?? silentLogger;

  try {
    const refined = stripCodeFence(
      await llm.complete(buildRefinePrompt(readme, feedback), {
        temperature: 0.5,
        maxTokens: options.maxTokens ?? 2048,
      })
    );
    const reason = lowQualityReason(refined);
    if (reason) {
      logger.warn(`  Refined README rejected (${reason}), keeping the original`);
      return readme;
    }
    return refined;
  } catch (error) {
    logger.warn(`  Refinement failed: ${error instanceof Error ? error.message : String(error)}`);
    return readme;
  }
}
