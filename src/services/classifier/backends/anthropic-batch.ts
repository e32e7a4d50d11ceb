import Anthropic from '@anthropic-ai/sdk';
import { BATCH_CHUNK_SIZE, DEFAULT_BATCH_POLL_MS } from '../../../core/constants.ts';
import { TransportError, errorMessage } from '../../../core/errors.ts';
import { pause } from '../../../utils/pause.ts';
import { renderPrompt } from '../prompt.ts';
import { parseVerdictResponse } from '../response.ts';
import {
  statusOf,
  type BulkClassifier,
  type BulkOptions,
  type BulkRequest,
  type BulkResult,
  type CompletionBackendOptions,
} from './types.ts';

export interface AnthropicBatchOptions extends CompletionBackendOptions {
  /** Requests per submitted batch */
  chunkSize?: number;
  pollIntervalMs?: number;
}

function parseResult(id: string, text: string): BulkResult {
  try {
    return { id, verdict: parseVerdictResponse(text) };
  } catch (error) {
    return { id, error: error instanceof Error ? error : new Error(String(error)) };
  }
}

/**
 * Classification through the Anthropic Message Batches API, at half the
 * price of the Messages API. Requests are submitted in chunks, each chunk is
 * polled until it has ended, and results are matched back by custom id.
 */
export class AnthropicBatchBackend implements BulkClassifier {
  readonly name = 'anthropic-batch';
  private readonly client: Anthropic;
  private readonly maxOutputTokens: number;
  private readonly chunkSize: number;
  private readonly pollIntervalMs: number;

  constructor(options: AnthropicBatchOptions) {
    this.maxOutputTokens = options.maxOutputTokens;
    this.chunkSize = options.chunkSize ?? BATCH_CHUNK_SIZE;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_BATCH_POLL_MS;
    this.client = new Anthropic({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
    });
  }

  async *classifyMany(requests: BulkRequest[], options: BulkOptions = {}): AsyncGenerator<BulkResult> {
    for (let start = 0; start < requests.length; start += this.chunkSize) {
      if (options.signal?.aborted) return;

      const chunk = requests.slice(start, start + this.chunkSize);
      const batchId = await this.submit(chunk);
      if (!(await this.waitForEnd(batchId, chunk.length, options))) return;
      yield* await this.collect(batchId);
    }
  }

  private async submit(chunk: BulkRequest[]): Promise<string> {
    const batch = await this.call('submit a batch', () =>
      this.client.messages.batches.create({
        requests: chunk.map(({ id, input }) => ({
          custom_id: id,
          params: {
            model: input.model,
            max_tokens: this.maxOutputTokens,
            temperature: 0,
            messages: [{ role: 'user' as const, content: renderPrompt(input.promptTemplate, input.content) }],
          },
        })),
      })
    );
    return batch.id;
  }

  /**
   * Poll until the batch has ended. On interrupt the batch is canceled and
   * false is returned; its inputs stay uncached.
   */
  private async waitForEnd(batchId: string, requests: number, options: BulkOptions): Promise<boolean> {
    for (;;) {
      const batch = await this.call('poll a batch', () => this.client.messages.batches.retrieve(batchId));
      const counts = batch.request_counts;
      options.onProgress?.({
        batchId,
        requests,
        processed: counts.succeeded + counts.errored + counts.canceled + counts.expired,
        succeeded: counts.succeeded,
        errored: counts.errored,
      });
      if (batch.processing_status === 'ended') {
        return true;
      }
      if (!(await pause(this.pollIntervalMs, options.signal))) {
        await this.call('cancel a batch', () => this.client.messages.batches.cancel(batchId));
        return false;
      }
    }
  }

  private async collect(batchId: string): Promise<BulkResult[]> {
    return this.call('read batch results', async () => {
      const results: BulkResult[] = [];
      for await (const { custom_id: id, result } of await this.client.messages.batches.results(batchId)) {
        if (result.type === 'succeeded') {
          const text = result.message.content.map((block) => (block.type === 'text' ? block.text : '')).join('');
          results.push(parseResult(id, text));
        } else {
          results.push({ id, error: new TransportError(`Batch request ${result.type}`, this.name) });
        }
      }
      return results;
    });
  }

  private async call<T>(action: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      throw new TransportError(`Could not ${action}: ${errorMessage(error)}`, this.name, {
        status: statusOf(error),
        cause: error,
      });
    }
  }
}
