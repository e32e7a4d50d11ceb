/**
 * Where a GitHub blob lives and where the fetcher stores its content.
 */
export interface BlobLocation {
  owner: string;
  repo: string;
  ref: string;
  /** Path of the file inside the repository */
  path: string;
  /** owner/repo */
  repoKey: string;
  /** Where the fetcher writes this file's content, whether or not it has yet */
  contentPath: string;
}

/**
 * A SKILL.md candidate discovered by the upstream fetcher. Read-only.
 */
export interface CandidateFile {
  /** GitHub blob URL (primary key in the source database) */
  url: string;
  /** Null when the URL is not a GitHub blob URL inside the content directory */
  location: BlobLocation | null;
  sha: string | null;
  sizeBytes: number | null;
  discoveredAt: string | null;
}

/**
 * A row of the source database's `files` table.
 */
export interface SourceFileRow {
  url: string;
  sha: string | null;
  size_bytes: number | null;
  discovered_at: string | null;
}

export type FrontmatterRejection =
  | 'empty-content'
  | 'binary-content'
  | 'missing-delimiter'
  | 'unterminated-header'
  | 'invalid-yaml'
  | 'not-a-mapping'
  | 'missing-name'
  | 'missing-description';

export type FrontmatterCheckResult =
  | {
      valid: true;
      /** The header block verbatim, both delimiter lines included */
      header: string;
      data: Record<string, unknown>;
    }
  | {
      valid: false;
      reason: FrontmatterRejection;
      detail?: string;
    };

/**
 * The exact tuple a cache key is derived from.
 */
export interface ClassificationInput {
  promptTemplate: string;
  model: string;
  /** Content after truncation */
  content: string;
}

export type ClassificationDecision = 'valid-skill' | 'rejected';

export interface ClassificationVerdict {
  decision: ClassificationDecision;
  reason: string;
}

export interface CacheEntry extends ClassificationVerdict {
  model: string;
  /** ISO timestamp of the classification */
  cachedAt: string;
}

export interface ClassificationOutcome {
  key: string;
  verdict: ClassificationVerdict;
  source: 'cache' | 'backend';
}

export type ValidationStatus =
  | 'accepted'
  | 'structurally_rejected'
  | 'semantically_rejected'
  | 'classification_error'
  | 'skipped';

/** Statuses that are final for unchanged content and are not re-evaluated by default */
export const RESOLVED_STATUSES: ReadonlySet<ValidationStatus> = new Set([
  'accepted',
  'structurally_rejected',
  'semantically_rejected',
]);

export interface ValidationRecord {
  url: string;
  repoKey: string | null;
  path: string | null;
  status: ValidationStatus;
  reason: string;
  cacheKey: string | null;
  model: string | null;
  /** ISO timestamp */
  validatedAt: string;
}

export interface RunSummary {
  total: number;
  alreadyResolved: number;
  counts: Record<ValidationStatus, number>;
  cacheHits: number;
  backendCalls: number;
  interrupted: boolean;
}

export type BackendKind = 'anthropic' | 'openai-compatible';
