/**
 * The classification backend could not be reached or answered with an error.
 * Retryable for the single file that triggered it.
 */
export class TransportError extends Error {
  readonly backend: string;
  readonly status: number | undefined;

  constructor(message: string, backend: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'TransportError';
    this.backend = backend;
    this.status = options?.status;
  }
}

/**
 * The model answered, but not with a verdict we can read.
 */
export class ClassificationParseError extends Error {
  readonly responseText: string;

  constructor(message: string, responseText: string) {
    super(message);
    this.name = 'ClassificationParseError';
    this.responseText = responseText;
  }
}

/**
 * The classification cache cannot be read or written. Fatal: running without
 * the cache would re-classify everything on every run.
 */
export class CacheIOError extends Error {
  readonly cacheDir: string;

  constructor(message: string, cacheDir: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'CacheIOError';
    this.cacheDir = cacheDir;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ConfigError';
  }
}

/**
 * Accepted files are missing repository metadata or commit history at export time.
 */
export class MissingDataError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[]) {
    super(message);
    this.name = 'MissingDataError';
    this.missing = missing;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
