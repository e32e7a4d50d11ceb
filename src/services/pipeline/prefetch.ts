import type { CandidateFile } from '../../core/types.ts';
import type { BulkClassifier, BulkOptions } from '../classifier/backends/types.ts';
import type { PrefetchResult, PreparedClassification, SkillClassifier } from '../classifier/classifier.ts';
import { selectPending, type RecordSink } from './orchestrator.ts';
import { loadCandidateContent, runStructuralCheck } from './stages.ts';

export interface PrefetchOptions extends BulkOptions {
  revalidate?: boolean;
  now?: () => Date;
}

/**
 * Bulk pass ahead of validateCandidates: every pending file that passes the
 * frontmatter check is classified through the bulk backend. Nothing is
 * written to the sink here; the per-file pass that follows records every
 * status, reusing these verdicts.
 */
export async function prefetchVerdicts(
  candidates: readonly CandidateFile[],
  deps: { classifier: SkillClassifier; sink: Pick<RecordSink, 'getStatuses'>; bulk: BulkClassifier },
  options: PrefetchOptions = {}
): Promise<PrefetchResult> {
  const now = options.now ?? (() => new Date());
  const items: PreparedClassification[] = [];

  for (const candidate of selectPending(candidates, deps.sink, options.revalidate)) {
    const loaded = await loadCandidateContent(candidate, now());
    if (loaded.kind === 'skipped') continue;

    const structural = runStructuralCheck(loaded.candidate, loaded.bytes, now());
    if (structural.kind === 'rejected') continue;

    items.push(deps.classifier.prepare(structural.content));
  }

  return deps.classifier.prefetch(items, deps.bulk, { signal: options.signal, onProgress: options.onProgress });
}
