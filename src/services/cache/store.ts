import { access, mkdir, readdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { constants } from 'fs';
import { join } from 'path';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import { CacheIOError, errorMessage } from '../../core/errors.ts';
import type { CacheEntry } from '../../core/types.ts';
import { logger } from '../../utils/logger.ts';
import { isCacheKey } from './cache-key.ts';

/**
 * Persistent verdict storage, keyed by cache key. Lookups never touch the
 * network; the classifier consults the store before every backend call.
 */
export interface ClassificationStore {
  /** Prepare the store for use. Throws CacheIOError if it is unusable. */
  open(): Promise<void>;
  lookup(key: string): Promise<CacheEntry | undefined>;
  store(key: string, entry: CacheEntry): Promise<void>;
}

export interface CacheStats {
  entries: number;
  validSkills: number;
  rejected: number;
  unreadable: number;
}

const cacheEntrySchema = z.object({
  decision: z.enum(['valid-skill', 'rejected']),
  reason: z.string(),
  model: z.string(),
  cachedAt: z.string(),
});

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function parseEntry(raw: string): CacheEntry | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const result = cacheEntrySchema.safeParse(json);
  return result.success ? result.data : undefined;
}

function sameVerdict(a: CacheEntry, b: CacheEntry): boolean {
  return a.decision === b.decision && a.reason === b.reason && a.model === b.model;
}

/**
 * One JSON file per key under `cacheDir`.
 *
 * Entries are written to a private temp file and renamed into place, so
 * concurrent writers (tasks of one run or separate processes) can race on
 * the same key without ever leaving a torn file; the last rename wins.
 */
export class FileClassificationStore implements ClassificationStore {
  readonly cacheDir: string;

  constructor(cacheDir: string) {
    this.cacheDir = cacheDir;
  }

  async open(): Promise<void> {
    try {
      await mkdir(this.cacheDir, { recursive: true });
      await access(this.cacheDir, constants.R_OK | constants.W_OK);
    } catch (error) {
      throw new CacheIOError(
        `Classification cache at ${this.cacheDir} is not readable and writable: ${errorMessage(error)}`,
        this.cacheDir,
        { cause: error }
      );
    }
  }

  entryPath(key: string): string {
    if (!isCacheKey(key)) {
      throw new Error(`Invalid cache key: ${key}`);
    }
    return join(this.cacheDir, `${key}.json`);
  }

  async lookup(key: string): Promise<CacheEntry | undefined> {
    const path = this.entryPath(key);
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw new CacheIOError(
        `Failed to read cache entry ${path}: ${errorMessage(error)}`,
        this.cacheDir,
        { cause: error }
      );
    }

    const entry = parseEntry(raw);
    if (!entry) {
      // A torn or hand-edited entry is a miss; the next store replaces it
      logger.debug(`Ignoring unreadable cache entry ${path}`);
    }
    return entry;
  }

  async store(key: string, entry: CacheEntry): Promise<void> {
    const existing = await this.lookup(key);
    if (existing && sameVerdict(existing, entry)) {
      return;
    }

    const path = this.entryPath(key);
    const tempPath = `${path}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;
    try {
      await writeFile(tempPath, JSON.stringify(entry, null, 2), 'utf-8');
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true }).catch(() => undefined);
      throw new CacheIOError(
        `Failed to write cache entry ${path}: ${errorMessage(error)}`,
        this.cacheDir,
        { cause: error }
      );
    }
  }

  private async listEntryFiles(): Promise<string[]> {
    try {
      const names = await readdir(this.cacheDir);
      return names.filter((name) => name.endsWith('.json') && isCacheKey(name.slice(0, -5)));
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw new CacheIOError(
        `Failed to list ${this.cacheDir}: ${errorMessage(error)}`,
        this.cacheDir,
        { cause: error }
      );
    }
  }

  async stats(): Promise<CacheStats> {
    const stats: CacheStats = { entries: 0, validSkills: 0, rejected: 0, unreadable: 0 };
    for (const name of await this.listEntryFiles()) {
      stats.entries++;
      const entry = await this.lookup(name.slice(0, -5));
      if (!entry) {
        stats.unreadable++;
      } else if (entry.decision === 'valid-skill') {
        stats.validSkills++;
      } else {
        stats.rejected++;
      }
    }
    return stats;
  }

  /**
   * Delete every entry. Returns the number of entries removed.
   */
  async clear(): Promise<number> {
    const names = await this.listEntryFiles();
    await Promise.all(names.map((name) => rm(join(this.cacheDir, name), { force: true })));
    return names.length;
  }
}

/**
 * In-process store for tests and embedding.
 */
export class MemoryClassificationStore implements ClassificationStore {
  private readonly entries = new Map<string, CacheEntry>();
  writes = 0;

  async open(): Promise<void> {}

  async lookup(key: string): Promise<CacheEntry | undefined> {
    return this.entries.get(key);
  }

  async store(key: string, entry: CacheEntry): Promise<void> {
    const existing = this.entries.get(key);
    if (existing && sameVerdict(existing, entry)) {
      return;
    }
    this.entries.set(key, entry);
    this.writes++;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }
}
