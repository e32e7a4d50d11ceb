import { ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import type { FileExportRow, HistoryExportRow, RepoExportRow } from './rows.ts';

const text = { type: 'UTF8', compression: 'SNAPPY', optional: true } as const;
const int = { type: 'INT64', compression: 'SNAPPY', optional: true } as const;
const key = { type: 'UTF8', compression: 'SNAPPY' } as const;

export const filesSchema = new ParquetSchema({
  url: key,
  sha: text,
  size_bytes: int,
  discovered_at: text,
  repo_key: text,
  filename: text,
  path: text,
});

export const reposSchema = new ParquetSchema({
  repo_key: key,
  repo_owner: key,
  repo_name: key,
  stars: int,
  forks: int,
  watchers: int,
  language: text,
  topics: { type: 'UTF8', compression: 'SNAPPY', repeated: true },
  description: text,
  license: text,
  created_at: text,
  updated_at: text,
});

export const historySchema = new ParquetSchema({
  url: key,
  commit_sha: text,
  commit_author: text,
  commit_date: text,
  commit_message: text,
});

type ExportRow = FileExportRow | RepoExportRow | HistoryExportRow;

/** Optional parquet columns are written by leaving the value out */
function dropNulls(row: ExportRow): Record<string, unknown> {
  return Object.fromEntries(Object.entries(row).filter(([, value]) => value !== null));
}

export async function writeParquet(path: string, schema: ParquetSchema, rows: ExportRow[]): Promise<number> {
  const writer = await ParquetWriter.openFile(schema, path);
  try {
    for (const row of rows) {
      await writer.appendRow(dropNulls(row));
    }
  } finally {
    await writer.close();
  }
  return rows.length;
}
