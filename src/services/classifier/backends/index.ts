import { ConfigError } from '../../../core/errors.ts';
import type { BackendKind } from '../../../core/types.ts';
import { AnthropicBackend } from './anthropic.ts';
import { AnthropicBatchBackend } from './anthropic-batch.ts';
import { OpenAICompatibleBackend } from './openai-compatible.ts';
import type { BulkClassifier, ClassifierBackend } from './types.ts';

export { AnthropicBackend } from './anthropic.ts';
export { AnthropicBatchBackend } from './anthropic-batch.ts';
export type { AnthropicBatchOptions } from './anthropic-batch.ts';
export { OpenAICompatibleBackend } from './openai-compatible.ts';
export { CompletionBackend } from './types.ts';
export type {
  BulkClassifier,
  BulkOptions,
  BulkProgress,
  BulkRequest,
  BulkResult,
  ClassifierBackend,
  CompletionBackendOptions,
} from './types.ts';

/**
 * `anthropic-batch` sends uncached inputs through the Message Batches API
 * and whatever is left over through the Messages API.
 */
export type BackendChoice = 'auto' | BackendKind | 'anthropic-batch';

export interface BackendConfig {
  backend: BackendChoice;
  baseUrl?: string;
  maxOutputTokens: number;
  timeoutMs?: number;
  batchPollMs?: number;
  anthropicApiKey?: string;
  openaiApiKey?: string;
}

/**
 * `auto` means: a configured base URL is a local (OpenAI-compatible) model
 * server, no base URL is the hosted Anthropic API.
 */
export function resolveBackendKind(backend: BackendChoice, baseUrl: string | undefined): BackendKind {
  if (backend === 'anthropic-batch') return 'anthropic';
  if (backend !== 'auto') return backend;
  return baseUrl ? 'openai-compatible' : 'anthropic';
}

export function createBackend(config: BackendConfig): ClassifierBackend {
  const kind = resolveBackendKind(config.backend, config.baseUrl);
  const common = {
    baseUrl: config.baseUrl,
    maxOutputTokens: config.maxOutputTokens,
    timeoutMs: config.timeoutMs,
  };

  switch (kind) {
    case 'anthropic': {
      if (!config.anthropicApiKey && !config.baseUrl) {
        throw new ConfigError('ANTHROPIC_API_KEY is not set (or pass --base-url for a local model server)');
      }
      return new AnthropicBackend({ ...common, apiKey: config.anthropicApiKey });
    }
    case 'openai-compatible': {
      if (!config.openaiApiKey && !config.baseUrl) {
        throw new ConfigError('OPENAI_API_KEY is not set (or pass --base-url for a local model server)');
      }
      return new OpenAICompatibleBackend({ ...common, apiKey: config.openaiApiKey });
    }
  }
}

/**
 * The bulk backend for `anthropic-batch`; null for every other choice.
 */
export function createBulkBackend(config: BackendConfig): BulkClassifier | null {
  if (config.backend !== 'anthropic-batch') return null;
  if (!config.anthropicApiKey && !config.baseUrl) {
    throw new ConfigError('ANTHROPIC_API_KEY is not set (the Message Batches API needs one)');
  }
  return new AnthropicBatchBackend({
    apiKey: config.anthropicApiKey,
    baseUrl: config.baseUrl,
    maxOutputTokens: config.maxOutputTokens,
    timeoutMs: config.timeoutMs,
    pollIntervalMs: config.batchPollMs,
  });
}
