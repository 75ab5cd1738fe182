/**
 * Output cleanup, the low-quality gate and the advisory README score
 */

import { DEFAULT_THRESHOLDS, type GenerationThresholds } from '../domain/models';

export type QualityGateThresholds = Pick<
  GenerationThresholds,
  'minGeneratedLength' | 'maxUnknownTokens' | 'maxNotApplicableTokens'
>;

export interface QualityReport {
  hasTitle: boolean;
  hasDescription: boolean;
  hasInstallation: boolean;
  hasUsage: boolean;
  hasCodeBlocks: boolean;
  hasBadges: boolean;
  wordCount: number;
  sectionCount: number;
  /** 0-100 */
  score: number;
}

const QUALITY_WEIGHTS = {
  title: 20,
  description: 15,
  installation: 20,
  usage: 15,
  codeBlocks: 15,
  badges: 5,
  perSection: 2,
  sectionCap: 10,
} as const;

const WRAPPED_FENCE = /^```(markdown|md)?[ \t]*\r?\n([\s\S]*?)\r?\n?```$/i;
const FENCE_LINE = /^[ \t]*```/m;

/**
 * Remove a code fence wrapping the whole response.
 * A bare opening fence only wraps the reply when no other fence line follows it.
 */
export function stripCodeFence(content: string): string {
  const trimmed = content.trim();
  const match = trimmed.match(WRAPPED_FENCE);
  if (!match) return trimmed;

  const [, language, body = ''] = match;
  if (!language && FENCE_LINE.test(body)) return trimmed;
  return body.trim();
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

/**
 * Why a generated README is rejected, or undefined when it passes
 */
export function lowQualityReason(
  content: string,
  thresholds: QualityGateThresholds = DEFAULT_THRESHOLDS,
): string | undefined {
  const lower = content.toLowerCase();

  if (content.trim().length < thresholds.minGeneratedLength) {
    return `shorter than ${thresholds.minGeneratedLength} characters`;
  }
  const unknowns = countOccurrences(lower, 'unknown');
  if (unknowns > thresholds.maxUnknownTokens) {
    return `${unknowns} "Unknown" placeholders`;
  }
  const notApplicable = countOccurrences(lower, 'n/a');
  if (notApplicable > thresholds.maxNotApplicableTokens) {
    return `${notApplicable} "N/A" placeholders`;
  }
  if (lower.includes('[insert') || lower.includes('[todo')) {
    return 'bracketed insert/TODO marker';
  }
  return undefined;
}

export function isLowQuality(content: string, thresholds?: QualityGateThresholds): boolean {
  return lowQualityReason(content, thresholds) !== undefined;
}

/**
 * Non-LLM README quality check. Advisory only.
 */
export function checkQuality(content: string): QualityReport {
  const lower = content.toLowerCase();
  const lines = content.split('\n');

  const report = {
    hasTitle: lines.some((line) => line.startsWith('# ')),
    hasDescription: content.length > 200,
    hasInstallation: lower.includes('install'),
    hasUsage: lower.includes('usage'),
    hasCodeBlocks: content.includes('```'),
    hasBadges: content.includes('shields.io') || content.includes('!['),
    wordCount: content.split(/\s+/).filter((word) => word.length > 0).length,
    sectionCount: countOccurrences(content, '## '),
  };

  const score =
    (report.hasTitle ? QUALITY_WEIGHTS.title : 0) +
    (report.hasDescription ? QUALITY_WEIGHTS.description : 0) +
    (report.hasInstallation ? QUALITY_WEIGHTS.installation : 0) +
    (report.hasUsage ? QUALITY_WEIGHTS.usage : 0) +
    (report.hasCodeBlocks ? QUALITY_WEIGHTS.codeBlocks : 0) +
    (report.hasBadges ? QUALITY_WEIGHTS.badges : 0) +
    Math.min(report.sectionCount * QUALITY_WEIGHTS.perSection, QUALITY_WEIGHTS.sectionCap);

  return { ...report, score };
}

export function scoreReadme(content: string): number {
  return checkQuality(content).score;
}
