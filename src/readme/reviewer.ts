/**
 * Second model pass over a generated README
 */

import { DEFAULT_THRESHOLDS, type GeneratedDocument, type GenerationThresholds, type RepositoryFacts } from '../domain/models';
import type { LLMClient } from '../llm/client';
import { silentLogger, type Logger } from '../logger';
import { buildReviewPrompt } from './prompts';
import { lowQualityReason, stripCodeFence } from './quality';

export interface ReviewOptions {
  thresholds?: GenerationThresholds;
  maxTokens?: number;
  logger?: Logger;
}

/**
 * Ask the model to repair formatting and tone.
 * Returns the document unchanged when the call fails or its output is rejected.
 * Kept human READMEs are never sent for review.
 */
export async function reviewReadme(
  doc: GeneratedDocument,
  facts: RepositoryFacts,
  llm: LLMClient,
  options: ReviewOptions = {},
): Promise<GeneratedDocument> {
  const logger = options.logger ?? silentLogger;

  if (doc.qualitySignal === 'existing-kept') {
    return doc;
  }

  let improved: string;
  try {
    improved = stripCodeFence(
      await llm.complete(buildReviewPrompt(doc.content, facts), {
        temperature: 0.3,
        maxTokens: options.maxTokens ?? 2048,
      })
    );
  } catch (error) {
    logger.warn(`  Review failed, keeping unreviewed README: ${error instanceof Error ? error.message : String(error)}`);
    return doc;
  }

  const reason = lowQualityReason(improved, options.thresholds ?? DEFAULT_THRESHOLDS);
  if (reason) {
    logger.warn(`  Reviewed README rejected (${reason}), keeping unreviewed README`);
    return doc;
  }

  return { content: improved, qualitySignal: 'llm-reviewed' };
}
