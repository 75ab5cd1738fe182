import { describe, expect, it } from 'vitest';

import { checkQuality, isLowQuality, lowQualityReason, scoreReadme, stripCodeFence } from '../src/readme/quality';

const FILLER = 'This project converts CSV exports into monthly summaries for a budget.';

describe('stripCodeFence', () => {
  it('removes a fence wrapping the whole reply', () => {
    expect(stripCodeFence('```markdown\n# Title\n\nBody\n```')).toBe('# Title\n\nBody');
    expect(stripCodeFence('```\n# Title\n```')).toBe('# Title');
  });

  it('unwraps a markdown fence that holds inner code blocks', () => {
    expect(stripCodeFence('```markdown\n# T\n\n```bash\nnpm test\n```\n```')).toBe('# T\n\n```bash\nnpm test\n```');
  });

  it('keeps separate bare code blocks at both ends intact', () => {
    const content = '```\nnpm install\n```\n\nThen run the tests:\n\n```\nnpm test\n```';
    expect(stripCodeFence(content)).toBe(content);
  });

  it('leaves inner code blocks alone', () => {
    const content = '# Title\n\n```bash\nnpm install\n```';
    expect(stripCodeFence(`  ${content}\n`)).toBe(content);
  });
});

describe('lowQualityReason', () => {
  it('accepts a plain README', () => {
    expect(lowQualityReason(`# Budget\n\n${FILLER}`)).toBeUndefined();
    expect(isLowQuality(`# Budget\n\n${FILLER}`)).toBe(false);
  });

  it('rejects short output', () => {
    expect(lowQualityReason('# Hi')).toBe('shorter than 50 characters');
  });

  it('rejects more than three Unknown placeholders', () => {
    const content = `${FILLER}\nLanguage: Unknown\nLicense: unknown\nAuthor: UNKNOWN\nVersion: Unknown`;
    expect(lowQualityReason(content)).toBe('4 "Unknown" placeholders');
    expect(lowQualityReason(`${FILLER}\nUnknown Unknown Unknown`)).toBeUndefined();
  });

  it('rejects more than two N/A placeholders', () => {
    expect(lowQualityReason(`${FILLER}\nN/A n/a N/A`)).toBe('3 "N/A" placeholders');
  });

  it('rejects bracketed markers', () => {
    expect(lowQualityReason(`${FILLER}\n[TODO: add usage]`)).toBe('bracketed insert/TODO marker');
    expect(lowQualityReason(`${FILLER}\n[Insert screenshot here]`)).toBe('bracketed insert/TODO marker');
  });

  it('honors custom thresholds', () => {
    expect(
      lowQualityReason('Unknown', { minGeneratedLength: 1, maxUnknownTokens: 0, maxNotApplicableTokens: 2 })
    ).toBe('1 "Unknown" placeholders');
  });
});

describe('checkQuality', () => {
  it('scores each feature by its weight', () => {
    const content = '# Demo\n\n## Installation\n\n```bash\nnpm install\n```\n\n## Usage\n\nRun it.';
    const report = checkQuality(content);

    expect(report.hasTitle).toBe(true);
    expect(report.hasDescription).toBe(false);
    expect(report.hasInstallation).toBe(true);
    expect(report.hasUsage).toBe(true);
    expect(report.hasCodeBlocks).toBe(true);
    expect(report.hasBadges).toBe(false);
    expect(report.sectionCount).toBe(2);
    expect(report.score).toBe(74);
  });

  it('caps the section bonus', () => {
    const sections = Array.from({ length: 8 }, (_, i) => `## Part ${i}`).join('\n');
    expect(scoreReadme(sections)).toBe(10);
  });

  it('is deterministic', () => {
    const content = `# Demo\n\n![build](https://img.shields.io/badge/build-passing-green)\n\n${FILLER.repeat(3)}`;
    expect(scoreReadme(content)).toBe(scoreReadme(content));
    expect(scoreReadme(content)).toBe(40);
  });

  it('scores an empty document as zero', () => {
    expect(scoreReadme('')).toBe(0);
  });
});
