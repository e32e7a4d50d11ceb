import { join, normalize, resolve, sep } from 'path';
import type { BlobLocation, CandidateFile, SourceFileRow } from './core/types.ts';

export interface GitHubBlobUrl {
  owner: string;
  repo: string;
  ref: string;
  path: string;
}

/**
 * Parse https://github.com/owner/repo/blob/ref/path/to/SKILL.md.
 * Returns null for anything else.
 *
 * The ref is a single segment, the same split the fetcher uses when it lays
 * out the content directory.
 */
export function parseGitHubBlobUrl(url: string): GitHubBlobUrl | null {
  const match = url.match(/^https?:\/\/github\.com\/([^/]+)\/([^/]+)\/blob\/([^/]+)\/(.+)$/);
  if (!match) {
    return null;
  }
  const [, owner, repo, ref, path] = match;
  if (!owner || !repo || !ref || !path) {
    return null;
  }
  return { owner, repo, ref, path };
}

/**
 * Extract owner/repo from a blob URL.
 */
export function getRepoKey(url: string): string | null {
  const parsed = parseGitHubBlobUrl(url);
  return parsed ? `${parsed.owner}/${parsed.repo}` : null;
}

/**
 * Validates that a path is within an expected base directory
 * @param basePath - The expected base directory
 * @param targetPath - The path to validate
 * @returns true if targetPath is within basePath
 */
export function isPathSafe(basePath: string, targetPath: string): boolean {
  const normalizedBase = normalize(resolve(basePath));
  const normalizedTarget = normalize(resolve(targetPath));

  return normalizedTarget.startsWith(normalizedBase + sep) || normalizedTarget === normalizedBase;
}

/**
 * The fetcher stores content at <contentDir>/<owner>/<repo>/blob/<ref>/<path>.
 * Returns null when the URL is not a blob URL or would resolve outside
 * `contentDir` (a `..` segment in the path).
 */
export function resolveBlobLocation(url: string, contentDir: string): BlobLocation | null {
  const parsed = parseGitHubBlobUrl(url);
  if (!parsed) {
    return null;
  }

  const contentPath = join(contentDir, parsed.owner, parsed.repo, 'blob', parsed.ref, parsed.path);
  if (!isPathSafe(contentDir, contentPath) || resolve(contentPath) === resolve(contentDir)) {
    return null;
  }

  return {
    ...parsed,
    repoKey: `${parsed.owner}/${parsed.repo}`,
    contentPath,
  };
}

export function toCandidate(row: SourceFileRow, contentDir: string): CandidateFile {
  return {
    url: row.url,
    location: resolveBlobLocation(row.url, contentDir),
    sha: row.sha,
    sizeBytes: row.size_bytes,
    discoveredAt: row.discovered_at,
  };
}
