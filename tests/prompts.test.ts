import { describe, expect, it } from 'vitest';

import {
  applicableSections,
  buildContextLines,
  buildGenerationPrompt,
  buildRefinePrompt,
  buildReviewPrompt,
} from '../src/readme/prompts';
import { facts, file } from './fakes';

const rich = facts({
  author: 'octo',
  description: 'Tiny web app',
  languages: { Python: 80, Shell: 20 },
  primaryLanguage: 'Python',
  frameworks: ['Flask'],
  dependencies: ['flask'],
  topics: ['web'],
  hasTests: true,
  hasDocker: true,
  structure: [file('LICENSE')],
  insight: { mainPurpose: 'Tiny web app', projectType: 'web service' },
});

const manyFiles = Array.from({ length: 25 }, (_, i) => file(`file${String(i).padStart(2, '0')}.txt`));

describe('buildContextLines', () => {
  it('emits nothing for missing facts', () => {
    expect(buildContextLines(facts())).toEqual(['**Repository**: demo']);
  });

  it('lists every fact that is present', () => {
    expect(buildContextLines(rich)).toEqual([
      '**Repository**: demo',
      '**Author**: octo',
      '**Description**: Tiny web app',
      '**Project Type**: web service',
      '**Languages**: Python (80%), Shell (20%)',
      '**Primary Language**: Python',
      '**Frameworks**: Flask',
      '**Dependencies**: flask',
      '**Topics**: web',
      '**Repository Includes**: tests, Docker setup',
      '**License File**: LICENSE',
    ]);
  });
});

describe('applicableSections', () => {
  it('offers only the title without facts', () => {
    expect(applicableSections(facts())).toEqual(['# Title (just the project name)']);
  });

  it('offers the sections the facts support', () => {
    expect(applicableSections(rich)).toEqual([
      '# Title (just the project name)',
      '## Description (brief and honest)',
      '## Features (ONLY real, detectable features)',
      '## Tech Stack (table with ONLY known technologies)',
      '## Installation',
      '## Usage (ONLY if you can infer how it is used)',
      '## Running Tests (ONLY if you can tell how tests are run)',
      '## Author',
      '## License',
    ]);
  });

  it('leaves out Installation without dependencies', () => {
    expect(applicableSections(facts({ ...rich, dependencies: [] }))).not.toContain('## Installation');
  });
});

describe('buildGenerationPrompt', () => {
  it('forbids Installation and License when there is no evidence for them', () => {
    const prompt = buildGenerationPrompt(facts());

    expect(prompt).toContain('5. NEVER include an Installation section. No dependencies were detected.');
    expect(prompt).toContain('4. NEVER include a License section. There is no LICENSE file.');
    expect(prompt).not.toContain('- ## Installation');
    expect(prompt).not.toContain('**Primary Language**');
    expect(prompt).not.toContain('**Description**');
  });

  it('allows Installation and License when they are backed by facts', () => {
    const prompt = buildGenerationPrompt(rich);

    expect(prompt).toContain('5. Installation steps must match the listed dependencies.');
    expect(prompt).toContain('4. Mention the license only by pointing at the LICENSE file.');
    expect(prompt).toContain('Write as octo explaining their own project.');
  });

  it('embeds the existing README with instructions to improve it', () => {
    const prompt = buildGenerationPrompt(facts({ existingReadme: '# old readme' }));

    expect(prompt).toContain(
      '**Existing README** (improve it rather than starting over):\n# old readme\n\n' +
        'Keep every accurate, useful part of the existing README. Fix its defects: remove placeholder text, ' +
        'replace corporate tone with plain language, and drop any License section or license claim, ' +
        'since the repository has no LICENSE file.'
    );
  });

  it('does not ask to drop the license when a LICENSE file exists', () => {
    const prompt = buildGenerationPrompt(facts({ existingReadme: '# old readme', structure: [file('LICENSE.md')] }));
    expect(prompt).toContain('replace corporate tone with plain language.\n\n');
  });

  it('truncates a long existing README', () => {
    const prompt = buildGenerationPrompt(facts({ existingReadme: 'x'.repeat(900) }));

    expect(prompt).toContain(`${'x'.repeat(800)}\n\n`);
    expect(prompt).not.toContain('x'.repeat(801));
  });

  it('caps the directory tree', () => {
    expect(buildGenerationPrompt(facts({ structure: manyFiles }))).toContain(
      '├── file19.txt\n└── ... and 5 more items\n```'
    );
    expect(buildGenerationPrompt(facts({ structure: manyFiles }), 3)).toContain(
      '├── file02.txt\n└── ... and 22 more items'
    );
  });
});

describe('buildReviewPrompt', () => {
  it('asks to keep commands when the language is unknown', () => {
    const prompt = buildReviewPrompt('# Doc', facts());

    expect(prompt).toContain('````markdown\n# Doc\n````');
    expect(prompt).toContain('5. Leave installation and run commands as they are.');
    expect(prompt).not.toContain('**Language**');
  });

  it('checks commands against the known language', () => {
    const prompt = buildReviewPrompt('# Doc', rich);

    expect(prompt).toContain('**Language**: Python\n**Frameworks**: Flask');
    expect(prompt).toContain('5. Make sure any installation or run commands are plausible for Python.');
  });
});

describe('buildRefinePrompt', () => {
  it('includes the README and the feedback', () => {
    const prompt = buildRefinePrompt('# Doc', 'add a usage example');

    expect(prompt).toContain('## Current README:\n# Doc\n');
    expect(prompt).toContain('## User Feedback:\nadd a usage example\n');
  });
});
