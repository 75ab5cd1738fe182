/**
 * Prompt builders for README generation, review and refinement.
 * Each is a pure function of its inputs.
 */

import { DEFAULT_THRESHOLDS, knownLanguage, type RepositoryFacts } from '../domain/models';
import { findLicenseFile, formatDirectoryTree } from './tree';

const EXISTING_README_EXCERPT = 800;

/**
 * Context lines for the facts that are actually present
 */
export function buildContextLines(facts: RepositoryFacts): string[] {
  const lines: string[] = [];
  const insight = facts.insight ?? {};
  const language = knownLanguage(facts);

  if (facts.shortName) lines.push(`**Repository**: ${facts.shortName}`);
  if (facts.author) lines.push(`**Author**: ${facts.author}`);
  if (facts.description) lines.push(`**Description**: ${facts.description}`);
  if (insight.mainPurpose && insight.mainPurpose !== facts.description) {
    lines.push(`**Purpose**: ${insight.mainPurpose}`);
  }
  if (insight.projectType) lines.push(`**Project Type**: ${insight.projectType}`);
  if (insight.targetAudience) lines.push(`**Target Users**: ${insight.targetAudience}`);
  if (insight.complexity) lines.push(`**Complexity**: ${insight.complexity}`);

  const languages = Object.entries(facts.languages)
    .sort(([, a], [, b]) => b - a)
    .slice(0, 5)
    .map(([name, pct]) => `${name} (${pct}%)`);
  if (languages.length > 0) lines.push(`**Languages**: ${languages.join(', ')}`);
  if (language) lines.push(`**Primary Language**: ${language}`);

  if (facts.frameworks.length > 0) {
    lines.push(`**Frameworks**: ${facts.frameworks.slice(0, 5).join(', ')}`);
  }
  if (facts.dependencies.length > 0) {
    lines.push(`**Dependencies**: ${facts.dependencies.slice(0, 8).join(', ')}`);
  }
  if (insight.keyFeatures && insight.keyFeatures.length > 0) {
    lines.push(`**Key Features Detected**: ${insight.keyFeatures.slice(0, 5).join(', ')}`);
  }
  if (facts.topics.length > 0) lines.push(`**Topics**: ${facts.topics.join(', ')}`);

  const traits = [
    facts.hasTests ? 'tests' : undefined,
    facts.hasCi ? 'CI configuration' : undefined,
    facts.hasDocker ? 'Docker setup' : undefined,
    facts.hasDocs ? 'docs directory' : undefined,
  ].filter((trait): trait is string => trait !== undefined);
  if (traits.length > 0) lines.push(`**Repository Includes**: ${traits.join(', ')}`);

  const license = findLicenseFile(facts.structure);
  if (license) lines.push(`**License File**: ${license.name}`);

  return lines;
}

/**
 * README sections worth writing given the available facts
 */
export function applicableSections(facts: RepositoryFacts): string[] {
  const insight = facts.insight ?? {};
  const language = knownLanguage(facts);
  const hasKeyFeatures = (insight.keyFeatures?.length ?? 0) > 0;
  const hasFrameworks = facts.frameworks.length > 0;

  const sections = ['# Title (just the project name)'];

  if (facts.description || insight.mainPurpose) {
    sections.push('## Description (brief and honest)');
  }
  if (hasKeyFeatures || hasFrameworks || language) {
    sections.push('## Features (ONLY real, detectable features)');
  }
  if (Object.keys(facts.languages).length > 0 || hasFrameworks) {
    sections.push('## Tech Stack (table with ONLY known technologies)');
  }
  if (facts.structure.length > 1) {
    sections.push('## Project Structure');
  }
  if (language && facts.dependencies.length > 0) {
    sections.push('## Installation');
  }
  if (language && (hasKeyFeatures || hasFrameworks)) {
    sections.push('## Usage (ONLY if you can infer how it is used)');
  }
  if (facts.hasTests) {
    sections.push('## Running Tests (ONLY if you can tell how tests are run)');
  }
  if (facts.author) {
    sections.push('## Author');
  }
  if (findLicenseFile(facts.structure)) {
    sections.push('## License');
  }

  return sections;
}

export function buildGenerationPrompt(
  facts: RepositoryFacts,
  maxTreeItems = DEFAULT_THRESHOLDS.maxTreeItems,
): string {
  const context = buildContextLines(facts);
  const hasLicense = findLicenseFile(facts.structure) !== undefined;
  const sections = applicableSections(facts);
  const owner = facts.author ?? 'the author';

  const parts = [
    'You are writing a README for a PERSONAL GitHub repository (not a company or team project).',
    context.length > 0 ? context.join('\n') : '**WARNING**: Very limited information available.',
  ];

  if (facts.structure.length > 0) {
    parts.push(`**Directory Structure**:\n\`\`\`\n${formatDirectoryTree(facts.structure, maxTreeItems)}\n\`\`\``);
  }

  if (facts.existingReadme) {
    parts.push(
      `**Existing README** (improve it rather than starting over):\n` +
      `${facts.existingReadme.slice(0, EXISTING_README_EXCERPT)}\n\n` +
      'Keep every accurate, useful part of the existing README. Fix its defects: remove placeholder text, ' +
      'replace corporate tone with plain language' +
      (hasLicense ? '.' : ', and drop any License section or license claim, since the repository has no LICENSE file.')
    );
  }

  const rules = [
    '1. NEVER write "Unknown", "N/A", "[Insert...]" or "[TODO]". If you do not know something, leave that part out.',
    '2. NEVER use corporate language such as "our team", "we", "passionate" or "revolutionary". One person owns this repository.',
    '3. NEVER mention features, frameworks or technologies that are not listed above.',
    hasLicense
      ? '4. Mention the license only by pointing at the LICENSE file.'
      : '4. NEVER include a License section. There is no LICENSE file.',
    facts.dependencies.length > 0
      ? '5. Installation steps must match the listed dependencies.'
      : '5. NEVER include an Installation section. No dependencies were detected.',
    '6. Skip any section you cannot fill with real information. Three good sections beat ten vague ones.',
    '7. Use simple, direct language.',
  ];

  parts.push(`**RULES**:\n${rules.join('\n')}`);
  parts.push(`**Tone**: Simple, direct, personal. Write as ${owner} explaining their own project.`);
  parts.push(`**Sections to consider** (ONLY include them if you have real content):\n${sections.map((s) => `- ${s}`).join('\n')}`);
  parts.push('Generate the README now in Markdown. Output only the README.');

  return parts.join('\n\n');
}

export function buildReviewPrompt(content: string, facts: RepositoryFacts): string {
  const header = [`**Project**: ${facts.shortName}`];
  const language = knownLanguage(facts);
  if (language) header.push(`**Language**: ${language}`);
  if (facts.frameworks.length > 0) header.push(`**Frameworks**: ${facts.frameworks.join(', ')}`);

  const installCheck = language
    ? `5. Make sure any installation or run commands are plausible for ${language}.`
    : '5. Leave installation and run commands as they are.';

  return `You are a technical writer reviewing a README.md file.

${header.join('\n')}

**README to Review**:
\`\`\`\`markdown
${content}
\`\`\`\`

**Your Task**: Improve this README by:
1. Fixing Markdown formatting problems.
2. Adding the correct language hint to every code block.
3. Keeping the tone simple and direct. Remove corporate phrasing ("our team", "we are passionate").
4. Deleting any section without real content, and any section containing placeholders such as "Unknown", "N/A", "[Insert...]" or "[TODO]".
${installCheck}
6. Never adding facts, features or technologies that are not already in the README.

Output ONLY the improved README, no explanations or comments.`;
}

export function buildRefinePrompt(readme: string, feedback: string): string {
  return `You are a technical writer improving a README.md based on feedback.

## Current README:
${readme}

## User Feedback:
${feedback}

## Instructions:
Update the README to address the feedback while keeping its structure.
Do not add placeholders or facts that are not in the current README or the feedback.
Return only the complete updated README.md content.`;
}
