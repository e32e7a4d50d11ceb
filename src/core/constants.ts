export const DEFAULT_MODEL = 'claude-haiku-4-5-20251001';

/** Frontmatter plus a short introduction is enough signal for classification */
export const CONTENT_MAX_BYTES = 3072;
export const TRUNCATION_MARKER = '\n[truncated]';

export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_MAX_CONCURRENT = 3;
export const DEFAULT_RETRIES = 2;
export const DEFAULT_RETRY_DELAY_MS = 1000;
export const DEFAULT_MAX_OUTPUT_TOKENS = 256;

/** Requests per submitted Message Batches API batch */
export const BATCH_CHUNK_SIZE = 10_000;
export const DEFAULT_BATCH_POLL_MS = 30_000;

export const CACHE_NAMESPACE = 'skills-dataset';
export const CACHE_SUBDIR = 'classifications';

export const CONFIG_FILE = 'skills-dataset.config.json';

export const DEFAULT_MAIN_DB = 'results/skills.db';
export const DEFAULT_OUTPUT_DB = 'validation.db';
export const DEFAULT_CONTENT_DIR = 'results/content';
export const DEFAULT_EXPORT_DIR = 'build';
