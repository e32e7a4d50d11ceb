import Database from 'better-sqlite3';
import { ConfigError, errorMessage } from '../../core/errors.ts';
import type { SourceFileRow } from '../../core/types.ts';

export interface RepoMetadataRow {
  repo_key: string;
  stars: number | null;
  forks: number | null;
  watchers: number | null;
  language: string | null;
  /** JSON array of topic strings */
  topics: string | null;
  description: string | null;
  license: string | null;
  created_at: string | null;
  updated_at: string | null;
}

export interface FileHistoryRow {
  url: string;
  /** JSON array of { sha, author, date, message } */
  commits: string | null;
}

/**
 * Read-only view of the upstream fetcher's database.
 */
export class SourceDatabase {
  readonly path: string;
  private readonly db: Database.Database;

  constructor(path: string) {
    this.path = path;
    try {
      this.db = new Database(path, { readonly: true, fileMustExist: true });
    } catch (error) {
      throw new ConfigError(`Cannot open source database ${path}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private hasTable(name: string): boolean {
    const row = this.db
      .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
      .get(name);
    return row !== undefined;
  }

  listFiles(): SourceFileRow[] {
    if (!this.hasTable('files')) {
      throw new ConfigError(`Source database ${this.path} has no files table`);
    }
    return this.db
      .prepare<[], SourceFileRow>('SELECT url, sha, size_bytes, discovered_at FROM files ORDER BY url')
      .all();
  }

  /** Empty when the metadata fetcher has not run yet. */
  listRepoMetadata(): RepoMetadataRow[] {
    if (!this.hasTable('repo_metadata')) return [];
    return this.db
      .prepare<[], RepoMetadataRow>(
        `SELECT repo_key, stars, forks, watchers, language, topics, description, license, created_at, updated_at
         FROM repo_metadata ORDER BY repo_key`
      )
      .all();
  }

  /** Empty when the history fetcher has not run yet. */
  listFileHistory(): FileHistoryRow[] {
    if (!this.hasTable('file_history')) return [];
    return this.db.prepare<[], FileHistoryRow>('SELECT url, commits FROM file_history ORDER BY url').all();
  }

  close(): void {
    this.db.close();
  }
}
