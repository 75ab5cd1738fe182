import { describe, expect, it } from 'vitest';

import { runPipeline } from '../src/pipeline';
import { scoreReadme } from '../src/readme/quality';
import { FakeHost, FakeLLM, file, MemoryBackupStore, repoMeta, type FakeRepo } from './fakes';

const GENERATED = '# y\n\nA habit tracker that stores daily check-ins in a local SQLite file.\n\n## Installation\n\n```bash\npip install -r requirements.txt\n```';
const REVIEWED = `${GENERATED}\n\n## Usage\n\n\`\`\`bash\npython main.py\n\`\`\``;

function habitRepo(overrides: Partial<FakeRepo> = {}): FakeRepo {
  return {
    meta: repoMeta({ name: 'y', fullName: 'x/y', description: 'Habit tracker' }),
    languages: { Python: 100 },
    structure: [file('README.md'), file('requirements.txt'), file('notes.txt')],
    files: { 'README.md': '# y\nold', 'requirements.txt': 'flask\n', 'main.py': 'print()' },
    ...overrides,
  };
}

describe('runPipeline', () => {
  it('records a failure for one repository and continues with the next', async () => {
    const host = new FakeHost({ 'x/y': habitRepo() });
    const backups = new MemoryBackupStore();
    const llm = new FakeLLM('{"main_purpose":"Tracks habits"}', GENERATED, REVIEWED);

    const results = await runPipeline({ host, llm, backups }, ['a/b', 'x/y'], { username: 'x' });

    expect(results).toHaveLength(2);
    expect(results[0]).toEqual({ repoName: 'a/b', success: false, error: 'Repository not found: a/b' });

    const ok = results[1];
    if (!ok?.success) throw new Error('expected x/y to succeed');
    expect(ok.repoName).toBe('x/y');
    expect(ok.readme).toBe(REVIEWED);
    expect(ok.qualitySignal).toBe('llm-reviewed');
    expect(ok.qualityScore).toBe(scoreReadme(REVIEWED));
    expect(ok.backup?.content).toBe('# y\nold');
    expect(ok.facts.insight).toEqual({ mainPurpose: 'Tracks habits' });
    expect(ok.facts.author).toBe('x');
    expect(ok.facts.dependencies).toEqual(['flask']);
    expect(backups.records).toHaveLength(1);
  });

  it('only fetches files present in the listing', async () => {
    const host = new FakeHost({ 'x/y': habitRepo() });
    await runPipeline({ host, llm: new FakeLLM(GENERATED), backups: new MemoryBackupStore() }, ['x/y']);

    expect(host.fileRequests).toEqual(['x/y:README.md', 'x/y:requirements.txt']);
  });

  it('skips insight and review when disabled', async () => {
    const llm = new FakeLLM(GENERATED);
    const results = await runPipeline(
      { host: new FakeHost({ 'x/y': habitRepo() }), llm, backups: new MemoryBackupStore() },
      ['x/y'],
      { insight: false, review: false },
    );

    expect(llm.calls).toHaveLength(1);
    expect(results[0]).toMatchObject({ success: true, readme: GENERATED, qualitySignal: 'llm-fresh' });
  });

  it('still succeeds when the backup cannot be written', async () => {
    const backups = new MemoryBackupStore();
    backups.failWith = new Error('disk full');

    const results = await runPipeline(
      { host: new FakeHost({ 'x/y': habitRepo() }), llm: new FakeLLM(GENERATED), backups },
      ['x/y'],
      { insight: false, review: false },
    );

    const result = results[0];
    expect(result?.success).toBe(true);
    expect(result && 'backup' in result).toBe(false);
  });

  it('saves no backup when the repository has no README', async () => {
    const backups = new MemoryBackupStore();
    const repo = habitRepo({ structure: [file('requirements.txt')] });

    await runPipeline({ host: new FakeHost({ 'x/y': repo }), llm: new FakeLLM(GENERATED), backups }, ['x/y']);

    expect(backups.records).toEqual([]);
  });

  it('reports progress for every repository', async () => {
    const progress: Array<[number, number, string]> = [];
    await runPipeline(
      { host: new FakeHost({ 'x/y': habitRepo() }), llm: new FakeLLM(GENERATED), backups: new MemoryBackupStore() },
      ['a/b', 'x/y'],
      { onProgress: (current, total, name) => progress.push([current, total, name]) },
    );

    expect(progress).toEqual([
      [1, 2, 'a/b'],
      [2, 2, 'x/y'],
    ]);
  });
});
