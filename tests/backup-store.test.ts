import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { backupId, FileBackupStore, formatTimestamp, isValidBackupId } from '../src/backup/store';

describe('backup ids', () => {
  it('formats timestamps in UTC with milliseconds', () => {
    expect(formatTimestamp(new Date(Date.UTC(2026, 2, 4, 5, 6, 7, 89)))).toBe('20260304_050607089');
  });

  it('builds file-safe ids from repository names', () => {
    expect(backupId('octo/demo', new Date(Date.UTC(2026, 0, 1)))).toBe('octo_demo_20260101_000000000');
  });

  it('rejects ids that could escape the directory', () => {
    expect(isValidBackupId('octo_demo_20260101_000000000')).toBe(true);
    expect(isValidBackupId('../secrets')).toBe(false);
    expect(isValidBackupId('..')).toBe(false);
    expect(isValidBackupId('')).toBe(false);
  });
});

describe('FileBackupStore', () => {
  let dir: string;
  let clock: Date;
  let store: FileBackupStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'readme-backups-'));
    clock = new Date(Date.UTC(2026, 0, 1, 12, 0, 0));
    store = new FileBackupStore(dir, { now: () => clock });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('saves and reads back a backup', async () => {
    const saved = await store.save('octo/demo', '# Old README');

    expect(saved).toEqual({
      id: 'octo_demo_20260101_120000000',
      repoName: 'octo/demo',
      content: '# Old README',
      createdAt: '2026-01-01T12:00:00.000Z',
    });
    expect(await store.read(saved.id)).toEqual(saved);
  });

  it('never reuses an id within the same instant', async () => {
    const first = await store.save('octo/demo', 'one');
    const second = await store.save('octo/demo', 'two');
    const third = await store.save('octo/demo', 'three');

    expect(first.id).toBe('octo_demo_20260101_120000000');
    expect(second.id).toBe('octo_demo_20260101_120000000-2');
    expect(third.id).toBe('octo_demo_20260101_120000000-3');
    expect((await store.read(first.id))?.content).toBe('one');
  });

  it('lists newest first and filters by repository', async () => {
    await store.save('octo/demo', 'a');
    clock = new Date(Date.UTC(2026, 0, 2));
    await store.save('octo/other', 'b');
    clock = new Date(Date.UTC(2026, 0, 3));
    await store.save('octo/demo', 'c');

    expect((await store.listAll()).map((r) => r.content)).toEqual(['c', 'b', 'a']);
    expect((await store.listForRepo('octo/demo')).map((r) => r.content)).toEqual(['c', 'a']);
  });

  it('returns an empty list when the directory does not exist', async () => {
    const missing = new FileBackupStore(join(dir, 'missing'));
    expect(await missing.listAll()).toEqual([]);
  });

  it('skips files that are not valid backups', async () => {
    await store.save('octo/demo', 'a');
    await writeFile(join(dir, 'broken.json'), '{ nope', 'utf-8');
    await writeFile(join(dir, 'other.json'), JSON.stringify({ version: 1, id: 'mismatch', repoName: 'x', content: '', createdAt: '' }), 'utf-8');

    expect(await store.listAll()).toHaveLength(1);
    expect(await store.read('broken')).toBeNull();
    expect(await store.read('other')).toBeNull();
  });

  it('skips entries that cannot be read', async () => {
    await store.save('octo/demo', 'a');
    clock = new Date(Date.UTC(2026, 0, 2));
    await store.save('octo/demo', 'b');
    await mkdir(join(dir, 'not-a-file.json'));

    expect((await store.listAll()).map((r) => r.content)).toEqual(['b', 'a']);
    expect(await store.prune(1)).toBe(1);
  });

  it('deletes a backup once', async () => {
    const saved = await store.save('octo/demo', 'a');

    expect(await store.delete(saved.id)).toBe(true);
    expect(await store.delete(saved.id)).toBe(false);
    expect(await store.read(saved.id)).toBeNull();
  });

  it('treats invalid ids as missing', async () => {
    expect(await store.read('../etc/passwd')).toBeNull();
    expect(await store.delete('../etc/passwd')).toBe(false);
  });

  it('prunes old backups per repository', async () => {
    for (let day = 1; day <= 4; day++) {
      clock = new Date(Date.UTC(2026, 0, day));
      await store.save('octo/demo', `demo-${day}`);
    }
    await store.save('octo/other', 'other-4');

    expect(await store.prune(2)).toBe(2);
    expect((await store.listForRepo('octo/demo')).map((r) => r.content)).toEqual(['demo-4', 'demo-3']);
    expect(await store.listForRepo('octo/other')).toHaveLength(1);
  });
});
