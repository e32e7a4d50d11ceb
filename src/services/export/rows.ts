import { z } from 'zod';
import { MissingDataError } from '../../core/errors.ts';
import type { SourceFileRow } from '../../core/types.ts';
import { getRepoKey, parseGitHubBlobUrl } from '../../source-parser.ts';
import type { FileHistoryRow, RepoMetadataRow } from '../database/index.ts';

export interface FileExportRow {
  url: string;
  sha: string | null;
  size_bytes: number | null;
  discovered_at: string | null;
  repo_key: string | null;
  filename: string | null;
  path: string | null;
}

export interface RepoExportRow {
  repo_key: string;
  repo_owner: string;
  repo_name: string;
  stars: number | null;
  forks: number | null;
  watchers: number | null;
  language: string | null;
  topics: string[];
  description: string | null;
  license: string | null;
  created_at: string | null;
  updated_at: string | null;
}

export interface HistoryExportRow {
  url: string;
  commit_sha: string | null;
  commit_author: string | null;
  commit_date: string | null;
  commit_message: string | null;
}

export interface CoverageOptions {
  /** Export even when some values are missing; the gap is reported through onWarning */
  allowMissing?: boolean;
  onWarning?: (message: string) => void;
}

const MISSING_SAMPLE = 10;

const topicsSchema = z.array(z.string());

const commitsSchema = z.array(
  z.object({
    sha: z.string().nullish(),
    author: z.string().nullish(),
    date: z.string().nullish(),
    message: z.string().nullish(),
  })
);

function parseJson(text: string | null): unknown {
  if (text === null) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function checkCoverage(message: string, missing: string[], flag: string, options: CoverageOptions): void {
  if (missing.length === 0) return;
  if (!options.allowMissing) {
    throw new MissingDataError(`${message}\nUse ${flag} to export anyway.`, missing);
  }
  options.onWarning?.(message);
}

/**
 * Source rows whose URL was accepted, with the URL split into its parts.
 */
export function buildFileRows(sourceRows: SourceFileRow[], acceptedUrls: Iterable<string>): FileExportRow[] {
  const accepted = new Set(acceptedUrls);
  return sourceRows
    .filter((row) => accepted.has(row.url))
    .map((row) => {
      const parsed = parseGitHubBlobUrl(row.url);
      return {
        url: row.url,
        sha: row.sha,
        size_bytes: row.size_bytes,
        discovered_at: row.discovered_at,
        repo_key: parsed ? `${parsed.owner}/${parsed.repo}` : null,
        filename: row.url.split('/').pop() ?? null,
        path: parsed?.path ?? null,
      };
    });
}

/**
 * Metadata for every repository that holds an exported file. Throws
 * MissingDataError when a repository has none, unless allowed.
 */
export function buildRepoRows(
  files: FileExportRow[],
  metadata: RepoMetadataRow[],
  options: CoverageOptions = {}
): RepoExportRow[] {
  const needed = new Set(files.map((file) => file.repo_key ?? getRepoKey(file.url)).filter((key) => key !== null));
  const rows = metadata.filter((row) => needed.has(row.repo_key));

  const have = new Set(rows.map((row) => row.repo_key));
  const missing = [...needed].filter((key) => !have.has(key)).sort();
  const sample = missing.slice(0, MISSING_SAMPLE).join(', ');
  checkCoverage(
    `${missing.length} repositories of accepted files have no metadata (e.g. ${sample})`,
    missing,
    '--allow-no-repo',
    options
  );

  return rows.map((row) => {
    const [owner = '', name = ''] = row.repo_key.split('/');
    const topics = topicsSchema.safeParse(parseJson(row.topics));
    return {
      ...row,
      repo_owner: owner,
      repo_name: name,
      topics: topics.success ? topics.data : [],
    };
  });
}

/**
 * One row per commit. A file with no recorded commits keeps a single row
 * with empty commit fields.
 */
export function buildHistoryRows(
  files: FileExportRow[],
  history: FileHistoryRow[],
  options: CoverageOptions = {}
): HistoryExportRow[] {
  const byUrl = new Map(history.map((row) => [row.url, row.commits]));

  const missing = files.map((file) => file.url).filter((url) => !byUrl.has(url));
  checkCoverage(
    `${missing.length} accepted files have no history (e.g. ${missing[0] ?? ''})`,
    missing,
    '--allow-no-history',
    options
  );

  const rows: HistoryExportRow[] = [];
  for (const file of files) {
    const parsed = commitsSchema.safeParse(parseJson(byUrl.get(file.url) ?? null));
    const commits = parsed.success ? parsed.data : [];
    if (commits.length === 0) {
      rows.push({ url: file.url, commit_sha: null, commit_author: null, commit_date: null, commit_message: null });
      continue;
    }
    for (const commit of commits) {
      rows.push({
        url: file.url,
        commit_sha: commit.sha ?? null,
        commit_author: commit.author ?? null,
        commit_date: commit.date ?? null,
        commit_message: commit.message ?? null,
      });
    }
  }
  return rows;
}
