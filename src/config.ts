import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { xdgCache } from 'xdg-basedir';
import { z } from 'zod';
import {
  CACHE_NAMESPACE,
  CACHE_SUBDIR,
  CONFIG_FILE,
  CONTENT_MAX_BYTES,
  DEFAULT_BATCH_POLL_MS,
  DEFAULT_BATCH_SIZE,
  DEFAULT_CONTENT_DIR,
  DEFAULT_MAIN_DB,
  DEFAULT_MAX_CONCURRENT,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_MODEL,
  DEFAULT_OUTPUT_DB,
  DEFAULT_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  TRUNCATION_MARKER,
} from './core/constants.ts';
import { ConfigError, errorMessage } from './core/errors.ts';

const positiveInt = z.number().int().positive();

const configSchema = z.object({
  mainDb: z.string().min(1),
  outputDb: z.string().min(1),
  contentDir: z.string().min(1),
  cacheDir: z.string().min(1),
  model: z
    .string()
    .min(1, 'must not be empty')
    .regex(/^\S+$/, 'must not contain whitespace'),
  baseUrl: z
    .string()
    .url()
    .refine((url) => url.startsWith('http://') || url.startsWith('https://'), {
      message: 'URL must use http:// or https:// protocol',
    })
    .optional(),
  backend: z.enum(['auto', 'anthropic', 'openai-compatible', 'anthropic-batch']),
  batchSize: positiveInt,
  maxConcurrent: positiveInt,
  contentMaxBytes: z
    .number()
    .int()
    .min(TRUNCATION_MARKER.length + 1, `must be more than ${TRUNCATION_MARKER.length} bytes`),
  retries: z.number().int().min(0),
  retryDelayMs: z.number().int().min(0),
  maxOutputTokens: positiveInt,
  batchPollMs: positiveInt,
});

export type PipelineConfig = z.infer<typeof configSchema>;

/** Keys a config file, the environment or a flag may set */
export type ConfigOverrides = Partial<PipelineConfig>;

const fileSchema = configSchema.partial().strict();

const PATH_KEYS = ['mainDb', 'outputDb', 'contentDir', 'cacheDir'] as const;

export function getDefaultCacheDir(): string {
  return join(xdgCache ?? join(homedir(), '.cache'), CACHE_NAMESPACE, CACHE_SUBDIR);
}

export function getDefaults(): PipelineConfig {
  return {
    mainDb: DEFAULT_MAIN_DB,
    outputDb: DEFAULT_OUTPUT_DB,
    contentDir: DEFAULT_CONTENT_DIR,
    cacheDir: getDefaultCacheDir(),
    model: DEFAULT_MODEL,
    baseUrl: undefined,
    backend: 'auto',
    batchSize: DEFAULT_BATCH_SIZE,
    maxConcurrent: DEFAULT_MAX_CONCURRENT,
    contentMaxBytes: CONTENT_MAX_BYTES,
    retries: DEFAULT_RETRIES,
    retryDelayMs: DEFAULT_RETRY_DELAY_MS,
    maxOutputTokens: DEFAULT_MAX_OUTPUT_TOKENS,
    batchPollMs: DEFAULT_BATCH_POLL_MS,
  };
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || 'config'}: ${e.message}`).join(', ');
}

/**
 * Read the project config file. A missing default file is fine; a missing
 * file named explicitly is not.
 */
export function loadConfigFile(configPath?: string, cwd: string = process.cwd()): ConfigOverrides {
  const path = configPath ? resolve(cwd, expandHome(configPath)) : join(cwd, CONFIG_FILE);
  if (!existsSync(path)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read config file ${path}: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: Record<string, unknown> = {};
  if (env['SKILLS_DATASET_MODEL']) overrides['model'] = env['SKILLS_DATASET_MODEL'];
  if (env['SKILLS_DATASET_BASE_URL']) overrides['baseUrl'] = env['SKILLS_DATASET_BASE_URL'];
  if (env['SKILLS_DATASET_BACKEND']) overrides['backend'] = env['SKILLS_DATASET_BACKEND'];
  if (env['SKILLS_DATASET_CACHE_DIR']) overrides['cacheDir'] = env['SKILLS_DATASET_CACHE_DIR'];

  const parsed = fileSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Values from command-line flags; undefined entries are ignored */
  flags?: ConfigOverrides;
}

/**
 * Defaults, then the config file, then the environment, then flags.
 */
export function loadConfig(options: LoadConfigOptions = {}): PipelineConfig {
  const merged: Record<string, unknown> = {
    ...getDefaults(),
    ...loadConfigFile(options.configPath, options.cwd),
    ...configFromEnv(options.env),
  };
  for (const [key, value] of Object.entries(options.flags ?? {})) {
    if (value !== undefined) merged[key] = value;
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const config = parsed.data;
  for (const key of PATH_KEYS) {
    config[key] = expandHome(config[key]);
  }
  return config;
}
