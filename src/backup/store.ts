/**
 * File-based store for README backups
 * Each backup is one JSON file in the backup directory, written once and never modified
 */

import { mkdir, readdir, readFile, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { BackupRecord } from '../domain/models';

const BACKUP_VERSION = 1;
const MAX_ID_SUFFIX = 100;
const VALID_ID = /^[A-Za-z0-9._-]+$/;

const backupFileSchema = z.object({
  version: z.literal(BACKUP_VERSION),
  id: z.string(),
  repoName: z.string(),
  content: z.string(),
  createdAt: z.string(),
});

export class BackupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BackupError';
  }
}

/**
 * Operations on saved README copies
 */
export interface BackupStore {
  save(repoName: string, content: string): Promise<BackupRecord>;
  /** Newest first */
  listAll(): Promise<BackupRecord[]>;
  read(id: string): Promise<BackupRecord | null>;
  delete(id: string): Promise<boolean>;
  listForRepo(repoName: string): Promise<BackupRecord[]>;
  /** Keep the newest keepLast backups per repository; returns how many were deleted */
  prune(keepLast?: number): Promise<number>;
}

export interface FileBackupStoreOptions {
  now?: () => Date;
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, '0');
}

/**
 * yyyyMMdd_HHmmssSSS in UTC
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    pad(date.getUTCMilliseconds(), 3)
  );
}

/**
 * Backup id for a repository at a moment: owner_repo_yyyyMMdd_HHmmssSSS
 */
export function backupId(repoName: string, date: Date): string {
  const safeName = repoName.replace(/[^A-Za-z0-9._-]/g, '_');
  return `${safeName}_${formatTimestamp(date)}`;
}

export function isValidBackupId(id: string): boolean {
  return VALID_ID.test(id) && id !== '.' && id !== '..';
}

function newestFirst(a: BackupRecord, b: BackupRecord): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? 1 : -1;
  }
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

export class FileBackupStore implements BackupStore {
  private dir: string;
  private now: () => Date;

  constructor(dir: string, options: FileBackupStoreOptions = {}) {
    this.dir = dir;
    this.now = options.now ?? (() => new Date());
  }

  private pathFor(id: string): string {
    return join(this.dir, `${id}.json`);
  }

  /**
   * Write a new backup. An id already taken gets a numeric suffix.
   */
  async save(repoName: string, content: string): Promise<BackupRecord> {
    await mkdir(this.dir, { recursive: true });

    const createdAt = this.now();
    const baseId = backupId(repoName, createdAt);

    for (let attempt = 1; attempt <= MAX_ID_SUFFIX; attempt++) {
      const id = attempt === 1 ? baseId : `${baseId}-${attempt}`;
      const record: BackupRecord = {
        id,
        repoName,
        content,
        createdAt: createdAt.toISOString(),
      };

      try {
        await writeFile(this.pathFor(id), JSON.stringify({ version: BACKUP_VERSION, ...record }, null, 2), {
          encoding: 'utf-8',
          flag: 'wx',
        });
        return record;
      } catch (error) {
        if (!hasCode(error, 'EEXIST')) {
          const message = error instanceof Error ? error.message : String(error);
          throw new BackupError(`Could not save backup for ${repoName}: ${message}`);
        }
      }
    }

    throw new BackupError(`Could not find a free backup id for ${repoName}`);
  }

  /**
   * Read a backup by id; null when missing or unreadable
   */
  async read(id: string): Promise<BackupRecord | null> {
    if (!isValidBackupId(id)) return null;

    let raw: string;
    try {
      raw = await readFile(this.pathFor(id), 'utf-8');
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return null;
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      return null;
    }

    const parsed = backupFileSchema.safeParse(data);
    if (!parsed.success || parsed.data.id !== id) return null;

    const { repoName, content, createdAt } = parsed.data;
    return { id, repoName, content, createdAt };
  }

  async listAll(): Promise<BackupRecord[]> {
    let files: string[];
    try {
      files = await readdir(this.dir);
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return [];
      throw error;
    }

    const records = await Promise.all(
      files
        .filter((file) => file.endsWith('.json'))
        // an entry that cannot be read counts as an invalid record
        .map((file) => this.read(file.slice(0, -'.json'.length)).catch((): null => null))
    );

    return records
      .filter((record): record is BackupRecord => record !== null)
      .sort(newestFirst);
  }

  async listForRepo(repoName: string): Promise<BackupRecord[]> {
    const all = await this.listAll();
    return all.filter((record) => record.repoName === repoName);
  }

  async delete(id: string): Promise<boolean> {
    if (!isValidBackupId(id)) return false;

    try {
      await unlink(this.pathFor(id));
      return true;
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return false;
      throw error;
    }
  }

  async prune(keepLast = 5): Promise<number> {
    const byRepo = new Map<string, BackupRecord[]>();
    for (const record of await this.listAll()) {
      const existing = byRepo.get(record.repoName) ?? [];
      existing.push(record);
      byRepo.set(record.repoName, existing);
    }

    let deleted = 0;
    for (const records of byRepo.values()) {
      for (const record of records.slice(keepLast)) {
        if (await this.delete(record.id)) {
          deleted++;
        }
      }
    }
    return deleted;
  }
}
