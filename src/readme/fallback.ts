/**
 * Deterministic README template used when the model is unavailable or its output is rejected
 */

import { knownLanguage, type RepositoryFacts } from '../domain/models';
import { findLicenseFile, formatDirectoryTree } from './tree';

const FALLBACK_TREE_ITEMS = 15;

export const INSTALL_COMMANDS: Readonly<Record<string, string>> = {
  Python: 'pip install -r requirements.txt',
  JavaScript: 'npm install',
  TypeScript: 'npm install',
  Ruby: 'bundle install',
  Go: 'go mod download',
  Rust: 'cargo build',
  Java: 'mvn install',
  Kotlin: './gradlew build',
};

export const RUN_COMMANDS: Readonly<Record<string, string>> = {
  Python: 'python main.py',
  JavaScript: 'npm start',
  TypeScript: 'npm start',
  Ruby: 'ruby main.rb',
  Go: 'go run .',
  Rust: 'cargo run',
  Java: 'mvn exec:java',
  Kotlin: './gradlew run',
};

/**
 * Escape text for a shields.io static badge path segment
 */
function badgeText(text: string): string {
  return encodeURIComponent(text.replace(/-/g, '--').replace(/_/g, '__'));
}

function topicBadges(topics: readonly string[]): string {
  return topics
    .slice(0, 5)
    .map((topic) => `![${topic}](https://img.shields.io/badge/topic-${badgeText(topic)}-blue)`)
    .join(' ');
}

/**
 * Assemble a README purely from the fact sheet.
 * Sections without supporting facts are left out.
 */
export function buildFallbackReadme(facts: RepositoryFacts): string {
  const language = knownLanguage(facts);
  const { frameworks, dependencies, structure } = facts;
  const blocks: string[] = [`# ${facts.shortName}`];

  if (facts.description) {
    blocks.push(facts.description);
  }

  if (facts.topics.length > 0) {
    blocks.push(topicBadges(facts.topics));
  }

  const features: string[] = [];
  if (language) features.push(`- Built with ${language}`);
  if (frameworks.length > 0) features.push(`- Uses ${frameworks.slice(0, 3).join(', ')}`);
  if (features.length > 0) {
    blocks.push(`## Features\n\n${features.join('\n')}`);
  }

  if (language || frameworks.length > 0 || dependencies.length > 0) {
    const rows = ['| Component | Technology |', '|-----------|------------|'];
    if (language) rows.push(`| Language | ${language} |`);
    if (frameworks.length > 0) rows.push(`| Frameworks | ${frameworks.slice(0, 3).join(', ')} |`);
    if (dependencies.length > 0) rows.push(`| Dependencies | ${dependencies.slice(0, 5).join(', ')} |`);
    blocks.push(`## Tech Stack\n\n${rows.join('\n')}`);
  }

  if (structure.length > 0) {
    blocks.push(`## Project Structure\n\n\`\`\`text\n${formatDirectoryTree(structure, FALLBACK_TREE_ITEMS)}\n\`\`\``);
  }

  const installCommand = language ? INSTALL_COMMANDS[language] : undefined;
  if (installCommand && dependencies.length > 0) {
    blocks.push(
      '## Installation\n\n```bash\n' +
      `git clone https://github.com/${facts.fullName}.git\n` +
      `cd ${facts.shortName}\n` +
      `${installCommand}\n` +
      '```'
    );
  }

  const runCommand = language ? RUN_COMMANDS[language] : undefined;
  if (runCommand) {
    blocks.push(`## Usage\n\n\`\`\`bash\n${runCommand}\n\`\`\``);
  }

  blocks.push('## Contributing\n\nContributions are welcome. Feel free to open an issue or submit a pull request.');

  if (facts.author) {
    blocks.push(`## Author\n\n**${facts.author}**\n- GitHub: [@${facts.author}](https://github.com/${facts.author})`);
  }

  const license = findLicenseFile(structure);
  if (license) {
    blocks.push(`## License\n\nSee [${license.name}](${license.name}) for details.`);
  }

  return `${blocks.join('\n\n')}\n`;
}
