import { CONTENT_MAX_BYTES } from '../../core/constants.ts';
import type { ClassificationInput, ClassificationOutcome } from '../../core/types.ts';
import { deriveCacheKey } from '../cache/cache-key.ts';
import type { ClassificationStore } from '../cache/store.ts';
import { truncateContent } from '../prefilter/truncate.ts';
import type { BulkClassifier, BulkOptions, ClassifierBackend } from './backends/types.ts';

export interface SkillClassifierOptions {
  backend: ClassifierBackend;
  store: ClassificationStore;
  model: string;
  promptTemplate: string;
  maxContentBytes?: number;
  /** Ignore cached verdicts and classify again, overwriting them */
  refresh?: boolean;
  now?: () => Date;
}

export interface PreparedClassification {
  key: string;
  input: ClassificationInput;
}

export interface ClassifierStats {
  cacheHits: number;
  backendCalls: number;
  /** Files that reused a verdict already resolved for identical input in this run */
  shared: number;
  /** Verdicts that came back from a bulk backend */
  batched: number;
}

export interface PrefetchResult {
  /** Distinct uncached inputs sent to the bulk backend */
  requested: number;
  stored: number;
  failed: number;
}

/**
 * Semantic second pass: cache first, backend on a miss, cache write before
 * returning.
 *
 * Identical inputs (the same SKILL.md copied across repositories) are
 * resolved once per run: concurrent requests for one key share a single
 * lookup/classification, and later requests reuse its result. Failed
 * attempts are forgotten so the key can be retried.
 */
export class SkillClassifier {
  readonly model: string;
  readonly stats: ClassifierStats = { cacheHits: 0, backendCalls: 0, shared: 0, batched: 0 };

  private readonly backend: ClassifierBackend;
  private readonly store: ClassificationStore;
  private readonly promptTemplate: string;
  private readonly maxContentBytes: number;
  private readonly refresh: boolean;
  private readonly now: () => Date;
  private readonly resolved = new Map<string, Promise<ClassificationOutcome>>();

  constructor(options: SkillClassifierOptions) {
    this.backend = options.backend;
    this.store = options.store;
    this.model = options.model;
    this.promptTemplate = options.promptTemplate;
    this.maxContentBytes = options.maxContentBytes ?? CONTENT_MAX_BYTES;
    this.refresh = options.refresh ?? false;
    this.now = options.now ?? (() => new Date());
  }

  get backendName(): string {
    return this.backend.name;
  }

  /**
   * Truncate and derive the cache key. Synchronous, so it runs inline before
   * a task is admitted to the concurrency pool.
   */
  prepare(content: string): PreparedClassification {
    const input: ClassificationInput = {
      promptTemplate: this.promptTemplate,
      model: this.model,
      content: truncateContent(content, this.maxContentBytes),
    };
    return { key: deriveCacheKey(input), input };
  }

  /**
   * Send every distinct uncached input through a bulk backend ahead of the
   * per-file pass. Verdicts are stored and kept for this run, so classify()
   * answers those inputs without another request. Failed inputs stay
   * uncached and go through the per-file backend.
   */
  async prefetch(
    items: readonly PreparedClassification[],
    bulk: BulkClassifier,
    options: BulkOptions = {}
  ): Promise<PrefetchResult> {
    const uncached = new Map<string, ClassificationInput>();
    for (const { key, input } of items) {
      if (uncached.has(key) || this.resolved.has(key)) continue;
      if (!this.refresh && (await this.store.lookup(key))) continue;
      uncached.set(key, input);
    }

    const result: PrefetchResult = { requested: uncached.size, stored: 0, failed: 0 };
    if (uncached.size === 0) return result;

    const requests = [...uncached].map(([id, input]) => ({ id, input }));
    for await (const outcome of bulk.classifyMany(requests, options)) {
      const input = uncached.get(outcome.id);
      if (!input) continue;
      if ('error' in outcome) {
        result.failed++;
        continue;
      }
      await this.store.store(outcome.id, {
        ...outcome.verdict,
        model: input.model,
        cachedAt: this.now().toISOString(),
      });
      const resolved: ClassificationOutcome = { key: outcome.id, verdict: outcome.verdict, source: 'backend' };
      this.resolved.set(outcome.id, Promise.resolve(resolved));
      this.stats.batched++;
      result.stored++;
    }
    return result;
  }

  classify(prepared: PreparedClassification): Promise<ClassificationOutcome> {
    const existing = this.resolved.get(prepared.key);
    if (existing) {
      this.stats.shared++;
      return existing;
    }

    const pending = this.resolve(prepared).catch((error: unknown) => {
      this.resolved.delete(prepared.key);
      throw error;
    });
    this.resolved.set(prepared.key, pending);
    return pending;
  }

  private async resolve({ key, input }: PreparedClassification): Promise<ClassificationOutcome> {
    if (!this.refresh) {
      const cached = await this.store.lookup(key);
      if (cached) {
        this.stats.cacheHits++;
        return { key, verdict: { decision: cached.decision, reason: cached.reason }, source: 'cache' };
      }
    }

    this.stats.backendCalls++;
    const verdict = await this.backend.classify(input);
    await this.store.store(key, {
      ...verdict,
      model: input.model,
      cachedAt: this.now().toISOString(),
    });
    return { key, verdict, source: 'backend' };
  }
}
