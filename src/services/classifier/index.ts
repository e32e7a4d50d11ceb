export { SkillClassifier } from './classifier.ts';
export type {
  SkillClassifierOptions,
  PreparedClassification,
  ClassifierStats,
  PrefetchResult,
} from './classifier.ts';
export { loadPromptTemplate, renderPrompt, CONTENT_PLACEHOLDER, DEFAULT_PROMPT_PATH } from './prompt.ts';
export { parseVerdictResponse } from './response.ts';
export {
  AnthropicBackend,
  AnthropicBatchBackend,
  OpenAICompatibleBackend,
  CompletionBackend,
  createBackend,
  createBulkBackend,
  resolveBackendKind,
} from './backends/index.ts';
export type {
  ClassifierBackend,
  BulkClassifier,
  BulkProgress,
  BackendChoice,
  BackendConfig,
} from './backends/index.ts';
