import type { BackendKind, ClassificationInput, ClassificationVerdict } from '../../../core/types.ts';
import { renderPrompt } from '../prompt.ts';
import { parseVerdictResponse } from '../response.ts';

/**
 * The one capability the pipeline needs from an inference backend. The rest
 * of the pipeline never sees which backend is behind it.
 */
export interface ClassifierBackend {
  readonly name: string;
  classify(input: ClassificationInput): Promise<ClassificationVerdict>;
}

export interface CompletionBackendOptions {
  apiKey?: string;
  baseUrl?: string;
  maxOutputTokens: number;
  /** Per-request timeout */
  timeoutMs?: number;
}

/**
 * A backend that answers a rendered prompt with free text. Subclasses only
 * implement the request; prompt rendering and verdict parsing are shared.
 */
export abstract class CompletionBackend implements ClassifierBackend {
  abstract readonly name: BackendKind;

  /** Send one prompt. Throws TransportError when the backend fails. */
  protected abstract complete(prompt: string, model: string): Promise<string>;

  async classify(input: ClassificationInput): Promise<ClassificationVerdict> {
    const text = await this.complete(renderPrompt(input.promptTemplate, input.content), input.model);
    return parseVerdictResponse(text);
  }
}

export function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

export interface BulkRequest {
  /** Cache key of the input; results come back under the same id */
  id: string;
  input: ClassificationInput;
}

export type BulkResult = { id: string; verdict: ClassificationVerdict } | { id: string; error: Error };

export interface BulkOptions {
  signal?: AbortSignal;
  onProgress?: (progress: BulkProgress) => void;
}

export interface BulkProgress {
  batchId: string;
  requests: number;
  processed: number;
  succeeded: number;
  errored: number;
}

/**
 * A backend that takes many inputs at once and answers them later, at a
 * lower price than one request per input.
 */
export interface BulkClassifier {
  readonly name: string;
  classifyMany(requests: BulkRequest[], options?: BulkOptions): AsyncIterable<BulkResult>;
}
