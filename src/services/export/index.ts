import { mkdir } from 'fs/promises';
import { join } from 'path';
import type { OutputDatabase, SourceDatabase } from '../database/index.ts';
import { writeKaggleMetadata, type DatasetCounts } from './kaggle.ts';
import { filesSchema, historySchema, reposSchema, writeParquet } from './parquet.ts';
import { buildFileRows, buildHistoryRows, buildRepoRows } from './rows.ts';

export { buildFileRows, buildRepoRows, buildHistoryRows } from './rows.ts';
export type { FileExportRow, RepoExportRow, HistoryExportRow, CoverageOptions } from './rows.ts';
export { writeParquet, filesSchema, reposSchema, historySchema } from './parquet.ts';
export { buildDatasetMetadata, renderTemplate, writeKaggleMetadata, README_TEMPLATE_PATH } from './kaggle.ts';
export type { DatasetCounts, DatasetMetadata } from './kaggle.ts';

export interface ExportOptions {
  outputDir: string;
  allowNoRepo?: boolean;
  allowNoHistory?: boolean;
  /** Also write Kaggle dataset-metadata.json and README.md */
  kaggleUsername?: string;
  onStep?: (message: string) => void;
  onWarning?: (message: string) => void;
}

export interface ExportResult extends DatasetCounts {
  written: string[];
}

/**
 * Write the accepted files, their repositories and their commit history as
 * Parquet. Coverage is checked before anything is written.
 */
export async function exportDataset(
  source: SourceDatabase,
  output: OutputDatabase,
  options: ExportOptions
): Promise<ExportResult> {
  const files = buildFileRows(source.listFiles(), output.listAcceptedUrls());
  const repos = buildRepoRows(files, source.listRepoMetadata(), {
    allowMissing: options.allowNoRepo,
    onWarning: options.onWarning,
  });
  const history = buildHistoryRows(files, source.listFileHistory(), {
    allowMissing: options.allowNoHistory,
    onWarning: options.onWarning,
  });

  await mkdir(options.outputDir, { recursive: true });
  const written: string[] = [];

  const targets = [
    { name: 'files.parquet', schema: filesSchema, rows: files },
    { name: 'repos.parquet', schema: reposSchema, rows: repos },
    { name: 'history.parquet', schema: historySchema, rows: history },
  ];
  for (const target of targets) {
    const path = join(options.outputDir, target.name);
    options.onStep?.(`Writing ${target.name}`);
    await writeParquet(path, target.schema, target.rows);
    written.push(path);
  }

  const counts: DatasetCounts = { files: files.length, repos: repos.length, history: history.length };
  if (options.kaggleUsername) {
    options.onStep?.('Writing Kaggle metadata');
    written.push(...(await writeKaggleMetadata(options.outputDir, options.kaggleUsername, counts)));
  }

  return { ...counts, written };
}
