import pc from 'picocolors';
import { loadConfig, type ConfigOverrides, type PipelineConfig } from '../config.ts';
import { TransportError } from '../core/errors.ts';
import type { CandidateFile, RunSummary, ValidationRecord, ValidationStatus } from '../core/types.ts';
import { FileClassificationStore } from '../services/cache/index.ts';
import {
  SkillClassifier,
  createBackend,
  createBulkBackend,
  loadPromptTemplate,
  type BackendChoice,
  type BackendConfig,
  type BulkClassifier,
  type ClassifierBackend,
} from '../services/classifier/index.ts';
import { OutputDatabase, SourceDatabase } from '../services/database/index.ts';
import { prefetchVerdicts, validateCandidates } from '../services/pipeline/index.ts';
import { toCandidate } from '../source-parser.ts';
import { logger } from '../utils/logger.ts';

export interface ValidateCommandOptions {
  mainDb?: string;
  outputDb?: string;
  contentDir?: string;
  model?: string;
  baseUrl?: string;
  backend?: BackendChoice;
  batchSize?: number;
  maxConcurrent?: number;
  maxBytes?: number;
  cacheDir?: string;
  retries?: number;
  revalidate?: boolean;
  refresh?: boolean;
  config?: string;
}

export interface ValidateRuntime {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  signal?: AbortSignal;
  /** Replaces the backend built from configuration */
  backend?: ClassifierBackend;
  /** Replaces the bulk backend built for `anthropic-batch` */
  bulk?: BulkClassifier;
  promptPath?: string;
  /** Print one line per file */
  verbose?: boolean;
}

const STATUS_MARKS: Record<ValidationStatus, string> = {
  accepted: pc.green('✓'),
  structurally_rejected: pc.red('✗'),
  semantically_rejected: pc.red('✗'),
  classification_error: pc.yellow('!'),
  skipped: pc.dim('…'),
};

const STATUS_ORDER: readonly ValidationStatus[] = [
  'accepted',
  'structurally_rejected',
  'semantically_rejected',
  'classification_error',
  'skipped',
];

const STATUS_LABELS: Record<ValidationStatus, string> = {
  accepted: 'Accepted',
  structurally_rejected: 'Rejected (frontmatter)',
  semantically_rejected: 'Rejected (classifier)',
  classification_error: 'Classification errors',
  skipped: 'Skipped',
};

export function formatRecordLine(record: ValidationRecord): string {
  const where = record.repoKey && record.path ? `${record.repoKey}/${record.path}` : record.url;
  return `${STATUS_MARKS[record.status]} ${where} ${pc.dim(record.reason)}`;
}

function flagsFrom(options: ValidateCommandOptions): ConfigOverrides {
  return {
    mainDb: options.mainDb,
    outputDb: options.outputDb,
    contentDir: options.contentDir,
    model: options.model,
    baseUrl: options.baseUrl,
    backend: options.backend,
    batchSize: options.batchSize,
    maxConcurrent: options.maxConcurrent,
    contentMaxBytes: options.maxBytes,
    cacheDir: options.cacheDir,
    retries: options.retries,
  };
}

function printSummary(summary: RunSummary, accepted: number): void {
  logger.section('Summary');
  logger.label('Candidates', String(summary.total));
  logger.label('Already resolved', String(summary.alreadyResolved));
  for (const status of STATUS_ORDER) {
    logger.label(STATUS_LABELS[status], String(summary.counts[status]));
  }
  logger.label('Cache hits', String(summary.cacheHits));
  logger.label('Classifier calls', String(summary.backendCalls));
  logger.label('Accepted files table', `${accepted} rows`);
  logger.line();

  if (summary.interrupted) {
    logger.warning('Interrupted. Finished batches are saved; run again to continue.');
  } else if (summary.counts.classification_error > 0) {
    logger.warning(
      `${summary.counts.classification_error} file(s) could not be classified and will be retried on the next run.`
    );
  } else {
    logger.success('Validation complete');
  }
}

function describeRun(config: PipelineConfig, backend: ClassifierBackend, candidates: number): void {
  logger.section('Validating SKILL.md files');
  logger.label('Source database', config.mainDb);
  logger.label('Output database', config.outputDb);
  logger.label('Content directory', config.contentDir);
  logger.label('Model', `${config.model} ${pc.dim(`(${backend.name})`)}`);
  logger.label('Cache', config.cacheDir);
  logger.label('Candidates', String(candidates));
  logger.line();
}

/**
 * Classify uncached files through the bulk backend before the per-file
 * pass. A failing batch is not fatal: whatever it left uncached goes through
 * the per-file backend.
 */
async function runBulkPass(
  candidates: CandidateFile[],
  classifier: SkillClassifier,
  output: OutputDatabase,
  bulk: BulkClassifier,
  options: ValidateCommandOptions,
  signal: AbortSignal | undefined
): Promise<void> {
  const spinner = logger.spinner(`Collecting files for ${bulk.name}...`);
  try {
    const result = await prefetchVerdicts(
      candidates,
      { classifier, sink: output, bulk },
      {
        revalidate: options.revalidate,
        signal,
        onProgress: ({ batchId, requests, processed, succeeded, errored }) => {
          spinner.text = `Batch ${batchId}: ${processed}/${requests} processed (${succeeded} succeeded, ${errored} errored)`;
        },
      }
    );
    spinner.succeed(
      `Batch classification: ${result.stored} of ${result.requested} stored` +
        (result.failed > 0 ? pc.yellow(`, ${result.failed} failed`) : '')
    );
  } catch (error) {
    if (!(error instanceof TransportError)) {
      spinner.fail('Batch classification failed');
      throw error;
    }
    spinner.fail(`Batch classification failed: ${error.message}`);
    logger.warning('Classifying the remaining files one at a time');
  }
}

/**
 * Run both validation passes over every candidate in the source database,
 * then rebuild the accepted files table.
 */
export async function runValidate(
  options: ValidateCommandOptions,
  runtime: ValidateRuntime = {}
): Promise<RunSummary> {
  const env = runtime.env ?? process.env;
  const config = loadConfig({
    configPath: options.config,
    cwd: runtime.cwd,
    env,
    flags: flagsFrom(options),
  });

  const backendConfig: BackendConfig = {
    backend: config.backend,
    baseUrl: config.baseUrl,
    maxOutputTokens: config.maxOutputTokens,
    batchPollMs: config.batchPollMs,
    anthropicApiKey: env['ANTHROPIC_API_KEY'],
    openaiApiKey: env['OPENAI_API_KEY'],
  };
  const backend = runtime.backend ?? createBackend(backendConfig);
  const bulk = runtime.bulk ?? createBulkBackend(backendConfig);
  const promptTemplate = loadPromptTemplate(runtime.promptPath);

  const store = new FileClassificationStore(config.cacheDir);
  await store.open();

  const source = new SourceDatabase(config.mainDb);
  try {
    const output = new OutputDatabase(config.outputDb);
    try {
      const rows = source.listFiles();
      const candidates = rows.map((row) => toCandidate(row, config.contentDir));
      describeRun(config, backend, candidates.length);

      const classifier = new SkillClassifier({
        backend,
        store,
        model: config.model,
        promptTemplate,
        maxContentBytes: config.contentMaxBytes,
        refresh: options.refresh,
      });

      if (bulk) {
        await runBulkPass(candidates, classifier, output, bulk, options, runtime.signal);
      }

      const summary = await validateCandidates(
        candidates,
        { classifier, sink: output },
        {
          batchSize: config.batchSize,
          maxConcurrent: config.maxConcurrent,
          retries: config.retries,
          retryDelayMs: config.retryDelayMs,
          revalidate: options.revalidate,
          signal: runtime.signal,
          onRecord: (record) => {
            if (runtime.verbose ?? true) logger.log(formatRecordLine(record));
          },
          onBatch: ({ done, pending }) => logger.debug(`${done}/${pending} files written`),
        }
      );

      const accepted = output.rebuildFilesTable(rows);
      printSummary(summary, accepted);
      return summary;
    } finally {
      output.close();
    }
  } finally {
    source.close();
  }
}
