/**
 * Optional LLM-derived project insight
 * Asks the model what the visible evidence says about a project and keeps only non-empty answers
 */

import { z } from 'zod';
import { knownLanguage, type Insight, type RepositoryFacts, type StructureEntry } from '../domain/models';
import type { LLMClient } from '../llm/client';
import { silentLogger, type Logger } from '../logger';

const MAIN_FILES: Record<string, string[]> = {
  Python: ['app.py', 'main.py', '__init__.py'],
  JavaScript: ['index.js', 'app.js', 'main.js'],
  TypeScript: ['index.ts', 'app.ts', 'main.ts'],
  Go: ['main.go'],
  Rust: ['main.rs', 'lib.rs'],
  Java: ['Main.java', 'App.java'],
};

const SNIPPET_LENGTH = 800;
const README_EXCERPT_LENGTH = 500;
const STRUCTURE_GROUP_LIMIT = 10;

const insightReplySchema = z.object({
  project_type: z.string().optional().catch(undefined),
  main_purpose: z.string().optional().catch(undefined),
  key_features: z.array(z.unknown()).optional().catch(undefined),
  target_audience: z.string().optional().catch(undefined),
  complexity: z.string().optional().catch(undefined),
});

/**
 * Summarize directory structure as at most ten directories and ten files
 */
export function summarizeStructure(structure: readonly StructureEntry[]): string {
  const dirs = structure
    .filter((item) => item.type === 'dir')
    .slice(0, STRUCTURE_GROUP_LIMIT)
    .map((item) => `${item.name}/`);
  const files = structure
    .filter((item) => item.type !== 'dir')
    .slice(0, STRUCTURE_GROUP_LIMIT)
    .map((item) => item.name);

  return [...dirs, ...files].join('\n');
}

/**
 * Pick a snippet from the most likely entry point for the language
 */
export function mainFileSnippet(files: Record<string, string>, language: string | undefined): string | undefined {
  const candidates = [...(language ? MAIN_FILES[language] ?? [] : []), 'README.md'];

  for (const name of candidates) {
    const content = files[name];
    if (content) {
      return content.slice(0, SNIPPET_LENGTH);
    }
  }

  const first = Object.values(files).find((content) => content.length > 0);
  return first?.slice(0, SNIPPET_LENGTH);
}

export function buildInsightPrompt(facts: RepositoryFacts, files: Record<string, string>): string {
  const infoParts: string[] = [];
  const language = knownLanguage(facts);

  if (facts.shortName) infoParts.push(`**Project Name**: ${facts.shortName}`);
  if (facts.description) infoParts.push(`**Description**: ${facts.description}`);
  if (language) infoParts.push(`**Language**: ${language}`);
  if (facts.dependencies.length > 0) {
    infoParts.push(`**Dependencies**: ${facts.dependencies.slice(0, 10).join(', ')}`);
  }
  if (facts.frameworks.length > 0) {
    infoParts.push(`**Frameworks**: ${facts.frameworks.join(', ')}`);
  }

  const structure = summarizeStructure(facts.structure);
  const snippet = mainFileSnippet(files, language);

  const sections = [
    'Analyze this software project and provide insights. Answer ONLY from the evidence below; if there is limited information, say so by leaving fields empty.',
    infoParts.length > 0 ? infoParts.join('\n') : 'Limited project information available.',
    `**Directory Structure**:\n${structure || 'Minimal structure'}`,
  ];

  if (snippet) {
    sections.push(`**Code Sample**:\n\`\`\`\n${snippet}\n\`\`\``);
  }
  if (facts.existingReadme) {
    sections.push(`**Existing README**:\n${facts.existingReadme.slice(0, README_EXCERPT_LENGTH)}`);
  }

  sections.push(`Based on what you can actually see, respond with ONLY a JSON object:
{
    "project_type": "type based on evidence, or empty string if unclear",
    "main_purpose": "what this does based on actual evidence, or empty string if unclear",
    "key_features": ["only features you can actually infer"],
    "target_audience": "who would use this based on evidence, or empty string",
    "complexity": "beginner/intermediate/advanced based on code, or empty string"
}

IMPORTANT: Do not make things up. If you can't determine something, use an empty string or an empty array.`);

  return sections.join('\n\n');
}

/**
 * Extract the JSON object from a model reply, tolerating code fences and surrounding prose
 */
export function extractJsonObject(reply: string): string | undefined {
  let text = reply.trim();
  text = text.replace(/^```[a-zA-Z]*\s*/, '').replace(/\s*```$/, '');

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start < 0 || end <= start) {
    return undefined;
  }
  return text.slice(start, end + 1);
}

/**
 * Parse a model reply into an Insight holding only non-empty fields.
 * Returns an empty object when the reply is not usable.
 */
export function parseInsight(reply: string): Insight {
  const json = extractJsonObject(reply);
  if (!json) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return {};
  }

  const parsed = insightReplySchema.safeParse(raw);
  if (!parsed.success) return {};

  const data = parsed.data;
  const insight: Insight = {};
  const text = (value: string | undefined): string | undefined => value?.trim() || undefined;

  const projectType = text(data.project_type);
  if (projectType) insight.projectType = projectType;

  const mainPurpose = text(data.main_purpose);
  if (mainPurpose) insight.mainPurpose = mainPurpose;

  const keyFeatures = (data.key_features ?? [])
    .filter((f): f is string => typeof f === 'string')
    .map((f) => f.trim())
    .filter((f) => f.length > 0);
  if (keyFeatures.length > 0) insight.keyFeatures = keyFeatures;

  const targetAudience = text(data.target_audience);
  if (targetAudience) insight.targetAudience = targetAudience;

  const complexity = text(data.complexity);
  if (complexity) insight.complexity = complexity;

  return insight;
}

export interface InsightOptions {
  logger?: Logger;
}

/**
 * Enrich facts with model judgments. Failures leave the facts unchanged.
 */
export async function augmentWithInsight(
  facts: RepositoryFacts,
  files: Record<string, string>,
  llm: LLMClient,
  options: InsightOptions = {},
): Promise<RepositoryFacts> {
  const logger = options.logger ?? silentLogger;
  const prompt = buildInsightPrompt(facts, files);

  let reply: string;
  try {
    reply = await llm.complete(prompt, { temperature: 0.2, maxTokens: 500 });
  } catch (error) {
    logger.verbose(`  Insight skipped: ${error instanceof Error ? error.message : String(error)}`);
    return facts;
  }

  const insight = parseInsight(reply);
  if (Object.keys(insight).length === 0) {
    logger.verbose('  Insight skipped: model reply held no usable fields');
    return facts;
  }

  return { ...facts, insight };
}
