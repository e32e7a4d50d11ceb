import { readFile } from 'fs/promises';
import { CacheIOError, ClassificationParseError, TransportError, errorMessage } from '../../core/errors.ts';
import type {
  BlobLocation,
  CandidateFile,
  ValidationRecord,
  ValidationStatus,
} from '../../core/types.ts';
import type { PreparedClassification, SkillClassifier } from '../classifier/classifier.ts';
import { checkFrontmatter, decodeUtf8, describeRejection } from '../prefilter/frontmatter.ts';
import { pause } from '../../utils/pause.ts';

/**
 * Non-terminal stages a candidate passes through. Terminal states are the
 * ValidationStatus values.
 */
export type CandidateStage =
  | 'pending'
  | 'frontmatter-check'
  | 'needs-semantic-check'
  | 'cache-lookup'
  | 'classify';

export type LocatedCandidate = CandidateFile & { location: BlobLocation };

export const SKIP_REASONS = {
  unresolvable: 'Unresolvable file URL',
  notFetched: 'Content not fetched yet',
} as const;

export function makeRecord(
  candidate: CandidateFile,
  status: ValidationStatus,
  reason: string,
  now: Date,
  classification?: { cacheKey: string; model: string }
): ValidationRecord {
  return {
    url: candidate.url,
    repoKey: candidate.location?.repoKey ?? null,
    path: candidate.location?.path ?? null,
    status,
    reason,
    cacheKey: classification?.cacheKey ?? null,
    model: classification?.model ?? null,
    validatedAt: now.toISOString(),
  };
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

// ── pending → skipped | frontmatter-check ────────────────────────────────

export type LoadResult =
  | { kind: 'loaded'; candidate: LocatedCandidate; bytes: Buffer }
  | { kind: 'skipped'; record: ValidationRecord };

/**
 * Read the fetched content. A file that is not on disk yet is skipped, not
 * rejected, so a later run picks it up once the fetcher has caught up.
 */
export async function loadCandidateContent(candidate: CandidateFile, now: Date): Promise<LoadResult> {
  const { location } = candidate;
  if (!location) {
    return { kind: 'skipped', record: makeRecord(candidate, 'skipped', SKIP_REASONS.unresolvable, now) };
  }

  try {
    const bytes = await readFile(location.contentPath);
    return { kind: 'loaded', candidate: { ...candidate, location }, bytes };
  } catch (error) {
    const missing = isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
    const reason = missing ? SKIP_REASONS.notFetched : `Content unreadable: ${errorMessage(error)}`;
    return { kind: 'skipped', record: makeRecord(candidate, 'skipped', reason, now) };
  }
}

// ── frontmatter-check → structurally_rejected | needs-semantic-check ─────

export type StructuralResult =
  | { kind: 'rejected'; record: ValidationRecord }
  | { kind: 'needs-semantic-check'; candidate: LocatedCandidate; content: string };

export function runStructuralCheck(candidate: LocatedCandidate, bytes: Uint8Array, now: Date): StructuralResult {
  const content = decodeUtf8(bytes);
  const result = checkFrontmatter(content ?? bytes);
  if (!result.valid) {
    return {
      kind: 'rejected',
      record: makeRecord(candidate, 'structurally_rejected', describeRejection(result), now),
    };
  }
  // decodeUtf8 succeeded, otherwise the check above rejected the bytes
  return { kind: 'needs-semantic-check', candidate, content: content ?? '' };
}

// ── needs-semantic-check → cache-lookup → classify → terminal ────────────

export interface SemanticTask {
  candidate: CandidateFile;
  prepared: PreparedClassification;
}

export interface SemanticCheckOptions {
  retries: number;
  retryDelayMs: number;
  signal?: AbortSignal;
  now?: () => Date;
}

/**
 * Resolve one file through the classifier. Per-file failures become a
 * classification_error record; only CacheIOError escapes, since it ends the
 * run.
 */
export async function runSemanticCheck(
  task: SemanticTask,
  classifier: SkillClassifier,
  options: SemanticCheckOptions
): Promise<ValidationRecord> {
  const now = options.now ?? (() => new Date());
  const classification = { cacheKey: task.prepared.key, model: task.prepared.input.model };

  for (let attempt = 0; ; attempt++) {
    try {
      const { verdict } = await classifier.classify(task.prepared);
      const status = verdict.decision === 'valid-skill' ? 'accepted' : 'semantically_rejected';
      return makeRecord(task.candidate, status, verdict.reason, now(), classification);
    } catch (error) {
      if (error instanceof CacheIOError) {
        throw error;
      }
      if (error instanceof TransportError) {
        // An interrupt during the backoff gives up on the file for this run
        if (attempt < options.retries && (await pause(options.retryDelayMs * 2 ** attempt, options.signal))) {
          continue;
        }
        return makeRecord(task.candidate, 'classification_error', `Transport error: ${error.message}`, now(), classification);
      }
      if (error instanceof ClassificationParseError) {
        return makeRecord(task.candidate, 'classification_error', `Parse error: ${error.message}`, now(), classification);
      }
      return makeRecord(task.candidate, 'classification_error', `Error: ${errorMessage(error)}`, now(), classification);
    }
  }
}
