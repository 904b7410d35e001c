import { join } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, listFiles, readTextFileIfExists, remove, writeTextFileAtomic } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { CacheCorruptError } from '../../utils/errors.js';
import { getCrateRecordsDir } from '../directory.js';
import { checkCrateRecord, isCachedCrateRecord, normalizeCrateName } from './crate-record.js';
import type { CachedCrateRecord } from './types.js';

/**
 * Persistent storage for crate records, keyed by normalized crate name.
 * The resolver and cache commands depend on this interface only.
 */
export interface CrateStore {
  /** Human-readable location (directory path, or `memory`) */
  readonly location: string;
  get(name: string): Promise<CachedCrateRecord | null>;
  put(record: CachedCrateRecord): Promise<void>;
  list(): Promise<CachedCrateRecord[]>;
  /** Returns true when a record was removed */
  delete(name: string): Promise<boolean>;
  /** Returns the number of records removed */
  clear(): Promise<number>;
}

function recordFileName(name: string): string {
  return `${encodeURIComponent(normalizeCrateName(name))}${FILE_PATTERNS.CACHE_RECORD_EXT}`;
}

/**
 * One JSON file per crate under `<cacheDir>/crates/`. Writes replace the
 * file atomically; unreadable records are reported and treated as absent.
 */
export class FileCrateStore implements CrateStore {
  readonly location: string;
  private readonly recordsDir: string;

  constructor(cacheDir: string) {
    this.location = cacheDir;
    this.recordsDir = getCrateRecordsDir(cacheDir);
  }

  private recordPath(name: string): string {
    return join(this.recordsDir, recordFileName(name));
  }

  async get(name: string): Promise<CachedCrateRecord | null> {
    return this.readRecord(this.recordPath(name));
  }

  async put(record: CachedCrateRecord): Promise<void> {
    const normalized: CachedCrateRecord = { ...record, crate: normalizeCrateName(record.crate) };
    await writeTextFileAtomic(this.recordPath(normalized.crate), JSON.stringify(normalized, null, 2) + '\n');
  }

  async list(): Promise<CachedCrateRecord[]> {
    if (!(await exists(this.recordsDir))) {
      return [];
    }
    const files = (await this.recordFiles()).sort();
    const records: CachedCrateRecord[] = [];
    for (const file of files) {
      const record = await this.readRecord(join(this.recordsDir, file));
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  async delete(name: string): Promise<boolean> {
    const path = this.recordPath(name);
    if (!(await exists(path))) {
      return false;
    }
    await remove(path);
    return true;
  }

  async clear(): Promise<number> {
    if (!(await exists(this.recordsDir))) {
      return 0;
    }
    const files = await this.recordFiles();
    for (const file of files) {
      await remove(join(this.recordsDir, file));
    }
    return files.length;
  }

  private async recordFiles(): Promise<string[]> {
    const files = await listFiles(this.recordsDir);
    // Leading-dot files are in-progress atomic writes.
    return files.filter(file => file.endsWith(FILE_PATTERNS.CACHE_RECORD_EXT) && !file.startsWith('.'));
  }

  private async readRecord(path: string): Promise<CachedCrateRecord | null> {
    const content = await readTextFileIfExists(path);
    if (content === null) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.reportCorrupt(path, error instanceof Error ? error.message : String(error));
      return null;
    }

    const problem = checkCrateRecord(parsed);
    if (problem !== null || !isCachedCrateRecord(parsed)) {
      this.reportCorrupt(path, problem ?? 'invalid record');
      return null;
    }
    return parsed;
  }

  private reportCorrupt(path: string, reason: string): void {
    const error = new CacheCorruptError(path, reason);
    logger.warn(error.message, { code: error.code });
  }
}

/**
 * Same contract as FileCrateStore, held in process memory.
 */
export class MemoryCrateStore implements CrateStore {
  readonly location = 'memory';
  private readonly records = new Map<string, CachedCrateRecord>();

  async get(name: string): Promise<CachedCrateRecord | null> {
    const record = this.records.get(normalizeCrateName(name));
    return record ? structuredClone(record) : null;
  }

  async put(record: CachedCrateRecord): Promise<void> {
    const crate = normalizeCrateName(record.crate);
    this.records.set(crate, structuredClone({ ...record, crate }));
  }

  async list(): Promise<CachedCrateRecord[]> {
    return [...this.records.keys()]
      .sort()
      .map(name => this.records.get(name))
      .filter((record): record is CachedCrateRecord => record !== undefined)
      .map(record => structuredClone(record));
  }

  async delete(name: string): Promise<boolean> {
    return this.records.delete(normalizeCrateName(name));
  }

  async clear(): Promise<number> {
    const count = this.records.size;
    this.records.clear();
    return count;
  }
}
