import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  AnthropicBatchBackend,
  createBulkBackend,
  resolveBackendKind,
  type BulkProgress,
  type BulkRequest,
  type BulkResult,
} from '../src/services/classifier/backends/index.ts';
import { ClassificationParseError, ConfigError, TransportError } from '../src/core/errors.ts';

interface BatchEntry {
  custom_id: string;
  result: { type: string; message?: { content: { type: string; text: string }[] } };
}

const mocks = vi.hoisted(() => ({
  create: vi.fn(),
  retrieve: vi.fn(),
  results: vi.fn(),
  cancel: vi.fn(),
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = {
      create: vi.fn(),
      batches: {
        create: mocks.create,
        retrieve: mocks.retrieve,
        results: mocks.results,
        cancel: mocks.cancel,
      },
    };
  },
}));

function batch(id: string, status: 'in_progress' | 'ended', succeeded = 0, errored = 0) {
  return {
    id,
    processing_status: status,
    request_counts: { processing: 0, succeeded, errored, canceled: 0, expired: 0 },
  };
}

function succeeded(id: string, text: string): BatchEntry {
  return { custom_id: id, result: { type: 'succeeded', message: { content: [{ type: 'text', text }] } } };
}

async function* stream(entries: BatchEntry[]): AsyncGenerator<BatchEntry> {
  yield* entries;
}

function request(id: string, content: string): BulkRequest {
  return { id, input: { promptTemplate: 'Classify:\n{{content}}', model: 'test-model', content } };
}

async function collect(results: AsyncIterable<BulkResult>): Promise<BulkResult[]> {
  const collected: BulkResult[] = [];
  for await (const result of results) collected.push(result);
  return collected;
}

beforeEach(() => {
  mocks.create.mockReset();
  mocks.retrieve.mockReset();
  mocks.results.mockReset();
  mocks.cancel.mockReset();
});

describe('AnthropicBatchBackend', () => {
  it('submits chunks, polls until ended and reads results by custom id', async () => {
    let submitted = 0;
    mocks.create.mockImplementation(async () => batch(`batch-${++submitted}`, 'in_progress'));
    const polls = new Map<string, number>();
    mocks.retrieve.mockImplementation(async (id: string) => {
      const count = (polls.get(id) ?? 0) + 1;
      polls.set(id, count);
      return id === 'batch-1' && count === 1 ? batch(id, 'in_progress') : batch(id, 'ended', 2);
    });
    mocks.results.mockImplementation(async (id: string) =>
      id === 'batch-1'
        ? stream([
            succeeded('k1', '{"is_skill": true, "reason": "Defines a skill"}'),
            succeeded('k2', 'I think so'),
          ])
        : stream([{ custom_id: 'k3', result: { type: 'expired' } }])
    );

    const progress: BulkProgress[] = [];
    const backend = new AnthropicBatchBackend({
      apiKey: 'test-secret',
      maxOutputTokens: 256,
      chunkSize: 2,
      pollIntervalMs: 1,
    });
    const results = await collect(
      backend.classifyMany([request('k1', 'one'), request('k2', 'two'), request('k3', 'three')], {
        onProgress: (p) => progress.push(p),
      })
    );

    expect(mocks.create).toHaveBeenCalledTimes(2);
    expect(mocks.create).toHaveBeenNthCalledWith(1, {
      requests: [
        {
          custom_id: 'k1',
          params: {
            model: 'test-model',
            max_tokens: 256,
            temperature: 0,
            messages: [{ role: 'user', content: 'Classify:\none' }],
          },
        },
        {
          custom_id: 'k2',
          params: {
            model: 'test-model',
            max_tokens: 256,
            temperature: 0,
            messages: [{ role: 'user', content: 'Classify:\ntwo' }],
          },
        },
      ],
    });
    expect(polls).toEqual(
      new Map([
        ['batch-1', 2],
        ['batch-2', 1],
      ])
    );
    expect(progress.map((p) => [p.batchId, p.processed])).toEqual([
      ['batch-1', 0],
      ['batch-1', 2],
      ['batch-2', 2],
    ]);

    expect(results).toHaveLength(3);
    expect(results[0]).toEqual({ id: 'k1', verdict: { decision: 'valid-skill', reason: 'Defines a skill' } });

    const unreadable = results[1];
    expect(unreadable?.id).toBe('k2');
    expect(unreadable && 'error' in unreadable ? unreadable.error : undefined).toBeInstanceOf(
      ClassificationParseError
    );

    const expired = results[2];
    expect(expired && 'error' in expired ? expired.error.message : undefined).toBe('Batch request expired');
  });

  it('cancels the batch and stops when interrupted while polling', async () => {
    mocks.create.mockResolvedValue(batch('batch-1', 'in_progress'));
    mocks.retrieve.mockResolvedValue(batch('batch-1', 'in_progress'));
    mocks.cancel.mockResolvedValue(batch('batch-1', 'in_progress'));
    const controller = new AbortController();

    const backend = new AnthropicBatchBackend({ apiKey: 'test-secret', maxOutputTokens: 256, pollIntervalMs: 60_000 });
    const results = await collect(
      backend.classifyMany([request('k1', 'one')], {
        signal: controller.signal,
        onProgress: () => controller.abort(),
      })
    );

    expect(results).toEqual([]);
    expect(mocks.cancel).toHaveBeenCalledWith('batch-1');
    expect(mocks.results).not.toHaveBeenCalled();
  });

  it('wraps API failures in TransportError', async () => {
    mocks.create.mockRejectedValue(Object.assign(new Error('Unauthorized'), { status: 401 }));
    const backend = new AnthropicBatchBackend({ apiKey: 'test-secret', maxOutputTokens: 256 });

    const error = await collect(backend.classifyMany([request('k1', 'one')])).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.message).toBe('Could not submit a batch: Unauthorized');
      expect(error.status).toBe(401);
      expect(error.backend).toBe('anthropic-batch');
    }
  });
});

describe('createBulkBackend', () => {
  it('builds a batch backend only for anthropic-batch', () => {
    expect(createBulkBackend({ backend: 'anthropic', maxOutputTokens: 256, anthropicApiKey: 'test-secret' })).toBeNull();
    expect(
      createBulkBackend({ backend: 'anthropic-batch', maxOutputTokens: 256, anthropicApiKey: 'test-secret' })
    ).toBeInstanceOf(AnthropicBatchBackend);
    expect(resolveBackendKind('anthropic-batch', undefined)).toBe('anthropic');
  });

  it('requires an API key', () => {
    expect(() => createBulkBackend({ backend: 'anthropic-batch', maxOutputTokens: 256 })).toThrow(ConfigError);
  });
});
