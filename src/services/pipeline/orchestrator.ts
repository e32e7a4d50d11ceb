import pLimit from 'p-limit';
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_CONCURRENT,
  DEFAULT_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
} from '../../core/constants.ts';
import { ConfigError } from '../../core/errors.ts';
import {
  RESOLVED_STATUSES,
  type CandidateFile,
  type RunSummary,
  type ValidationRecord,
  type ValidationStatus,
} from '../../core/types.ts';
import type { SkillClassifier } from '../classifier/classifier.ts';
import { loadCandidateContent, runSemanticCheck, runStructuralCheck } from './stages.ts';

/**
 * Where results go. OutputDatabase implements this.
 */
export interface RecordSink {
  getStatuses(): Map<string, ValidationStatus>;
  writeRecords(records: ValidationRecord[]): void;
}

export interface ValidateOptions {
  batchSize?: number;
  maxConcurrent?: number;
  retries?: number;
  retryDelayMs?: number;
  /** Re-evaluate files that already have a resolved status */
  revalidate?: boolean;
  signal?: AbortSignal;
  now?: () => Date;
  onRecord?: (record: ValidationRecord) => void;
  onBatch?: (progress: { done: number; pending: number }) => void;
}

export function emptyCounts(): Record<ValidationStatus, number> {
  return {
    accepted: 0,
    structurally_rejected: 0,
    semantically_rejected: 0,
    classification_error: 0,
    skipped: 0,
  };
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Candidates without a resolved status, or every candidate when revalidating.
 */
export function selectPending(
  candidates: readonly CandidateFile[],
  sink: Pick<RecordSink, 'getStatuses'>,
  revalidate = false
): CandidateFile[] {
  if (revalidate) return [...candidates];
  const existing = sink.getStatuses();
  return candidates.filter((candidate) => {
    const status = existing.get(candidate.url);
    return !(status && RESOLVED_STATUSES.has(status));
  });
}

/**
 * Drive every candidate to a terminal status.
 *
 * Candidates are processed in batches; each batch's records are committed
 * together once every file in it is resolved, so an interrupted run loses at
 * most the batch in flight. Semantic checks within a batch share one pool
 * of `maxConcurrent` slots; the next batch starts once the current one is
 * committed.
 * Files already resolved by an earlier run are left alone unless
 * `revalidate` is set.
 *
 * A CacheIOError aborts the run after the batch's finished records have
 * been written.
 */
export async function validateCandidates(
  candidates: readonly CandidateFile[],
  deps: { classifier: SkillClassifier; sink: RecordSink },
  options: ValidateOptions = {}
): Promise<RunSummary> {
  const batchSize = positiveInteger('batchSize', options.batchSize ?? DEFAULT_BATCH_SIZE);
  const maxConcurrent = positiveInteger('maxConcurrent', options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT);
  const retries = options.retries ?? DEFAULT_RETRIES;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const now = options.now ?? (() => new Date());
  const { classifier, sink } = deps;
  const { signal } = options;

  const pending = selectPending(candidates, sink, options.revalidate);

  const summary: RunSummary = {
    total: candidates.length,
    alreadyResolved: candidates.length - pending.length,
    counts: emptyCounts(),
    cacheHits: 0,
    backendCalls: 0,
    interrupted: false,
  };

  const limit = pLimit(maxConcurrent);

  const processCandidate = async (candidate: CandidateFile): Promise<ValidationRecord | null> => {
    const loaded = await loadCandidateContent(candidate, now());
    if (loaded.kind === 'skipped') {
      return loaded.record;
    }

    const structural = runStructuralCheck(loaded.candidate, loaded.bytes, now());
    if (structural.kind === 'rejected') {
      return structural.record;
    }

    const prepared = classifier.prepare(structural.content);
    const { candidate: located } = structural;
    return limit(async (): Promise<ValidationRecord | null> => {
      // Not started before the interrupt: leave it for the next run
      if (signal?.aborted) {
        return null;
      }
      return runSemanticCheck(
        { candidate: located, prepared },
        classifier,
        { retries, retryDelayMs, signal, now }
      );
    });
  };

  let done = 0;
  for (let start = 0; start < pending.length; start += batchSize) {
    if (signal?.aborted) {
      break;
    }

    const batch = pending.slice(start, start + batchSize);
    const settled = await Promise.allSettled(batch.map(processCandidate));

    const records: ValidationRecord[] = [];
    let fatal: unknown;
    for (const result of settled) {
      if (result.status === 'rejected') {
        fatal ??= result.reason;
      } else if (result.value) {
        records.push(result.value);
      }
    }

    sink.writeRecords(records);
    for (const record of records) {
      summary.counts[record.status]++;
      options.onRecord?.(record);
    }
    done += records.length;
    options.onBatch?.({ done, pending: pending.length });

    if (fatal !== undefined) {
      throw fatal;
    }
  }

  summary.interrupted = signal?.aborted ?? false;
  summary.cacheHits = classifier.stats.cacheHits;
  summary.backendCalls = classifier.stats.backendCalls;
  return summary;
}
