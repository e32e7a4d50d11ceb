import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { ConfigError, errorMessage } from '../../core/errors.ts';
import type { SourceFileRow, ValidationRecord, ValidationStatus } from '../../core/types.ts';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS validation_results (
    url TEXT PRIMARY KEY,
    repo_key TEXT,
    path TEXT,
    status TEXT NOT NULL,
    is_skill INTEGER NOT NULL,
    reason TEXT,
    cache_key TEXT,
    model TEXT,
    validated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS validation_results_status ON validation_results (status);
  CREATE TABLE IF NOT EXISTS files (
    url TEXT PRIMARY KEY,
    sha TEXT,
    size_bytes INTEGER,
    discovered_at TEXT
  );
`;

interface ValidationRow {
  url: string;
  repo_key: string | null;
  path: string | null;
  status: ValidationStatus;
  is_skill: number;
  reason: string | null;
  cache_key: string | null;
  model: string | null;
  validated_at: string;
}

function toRecord(row: ValidationRow): ValidationRecord {
  return {
    url: row.url,
    repoKey: row.repo_key,
    path: row.path,
    status: row.status,
    reason: row.reason ?? '',
    cacheKey: row.cache_key,
    model: row.model,
    validatedAt: row.validated_at,
  };
}

/**
 * The validation database: one record per candidate, plus a `files` table
 * holding only accepted files for the downstream fetchers and the exporter.
 */
export class OutputDatabase {
  readonly path: string;
  private readonly db: Database.Database;

  constructor(path: string) {
    this.path = path;
    try {
      mkdirSync(dirname(path), { recursive: true });
      this.db = new Database(path);
      this.db.pragma('journal_mode = WAL');
      this.db.exec(SCHEMA);
    } catch (error) {
      throw new ConfigError(`Cannot open output database ${path}: ${errorMessage(error)}`, { cause: error });
    }
  }

  getRecord(url: string): ValidationRecord | undefined {
    const row = this.db
      .prepare<[string], ValidationRow>('SELECT * FROM validation_results WHERE url = ?')
      .get(url);
    return row ? toRecord(row) : undefined;
  }

  listRecords(): ValidationRecord[] {
    return this.db
      .prepare<[], ValidationRow>('SELECT * FROM validation_results ORDER BY url')
      .all()
      .map(toRecord);
  }

  getStatuses(): Map<string, ValidationStatus> {
    const rows = this.db
      .prepare<[], { url: string; status: ValidationStatus }>('SELECT url, status FROM validation_results')
      .all();
    return new Map(rows.map((row) => [row.url, row.status]));
  }

  /**
   * Insert or replace a batch of records in one transaction: either the whole
   * batch is durable or none of it is.
   */
  writeRecords(records: ValidationRecord[]): void {
    const insert = this.db.prepare(
      `INSERT OR REPLACE INTO validation_results
         (url, repo_key, path, status, is_skill, reason, cache_key, model, validated_at)
       VALUES (@url, @repoKey, @path, @status, @isSkill, @reason, @cacheKey, @model, @validatedAt)`
    );
    const writeAll = this.db.transaction((batch: ValidationRecord[]) => {
      for (const record of batch) {
        insert.run({ ...record, isSkill: record.status === 'accepted' ? 1 : 0 });
      }
    });
    writeAll(records);
  }

  countByStatus(): Partial<Record<ValidationStatus, number>> {
    const rows = this.db
      .prepare<[], { status: ValidationStatus; count: number }>(
        'SELECT status, COUNT(*) AS count FROM validation_results GROUP BY status'
      )
      .all();
    return Object.fromEntries(rows.map((row) => [row.status, row.count]));
  }

  listAcceptedUrls(): string[] {
    return this.db
      .prepare<[], { url: string }>("SELECT url FROM validation_results WHERE status = 'accepted' ORDER BY url")
      .all()
      .map((row) => row.url);
  }

  /**
   * Replace the `files` table with the accepted subset of the source rows.
   * Returns the number of rows written.
   */
  rebuildFilesTable(sourceRows: SourceFileRow[]): number {
    const accepted = new Set(this.listAcceptedUrls());
    const insert = this.db.prepare(
      'INSERT OR IGNORE INTO files (url, sha, size_bytes, discovered_at) VALUES (@url, @sha, @size_bytes, @discovered_at)'
    );
    const rebuild = this.db.transaction((rows: SourceFileRow[]) => {
      this.db.prepare('DELETE FROM files').run();
      let inserted = 0;
      for (const row of rows) {
        if (accepted.has(row.url)) {
          inserted += insert.run(row).changes;
        }
      }
      return inserted;
    });
    return rebuild(sourceRows);
  }

  listAcceptedFiles(): SourceFileRow[] {
    return this.db
      .prepare<[], SourceFileRow>('SELECT url, sha, size_bytes, discovered_at FROM files ORDER BY url')
      .all();
  }

  close(): void {
    this.db.close();
  }
}
