import { Command, InvalidArgumentError, Option } from 'commander';
import pc from 'picocolors';
import packageJson from '../package.json' with { type: 'json' };
import { runCacheClear, runCacheStats, type CacheCommandOptions } from './commands/cache.ts';
import { runExport, type ExportCommandOptions } from './commands/export.ts';
import { runValidate, type ValidateCommandOptions } from './commands/validate.ts';
import { CONFIG_FILE } from './core/constants.ts';
import { errorMessage } from './core/errors.ts';
import { logger } from './utils/logger.ts';

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Run a command action, report a fatal error through the logger and set a
 * failing exit code.
 */
async function guarded(action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (error) {
    logger.error(errorMessage(error));
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    process.exitCode = 1;
  }
}

/**
 * First Ctrl+C lets in-flight files finish and saves them; a second one
 * exits immediately.
 */
function interruptController(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.line();
    logger.warning('Stopping after in-flight files finish (Ctrl+C again to quit now)');
    controller.abort();
  };
  process.on('SIGINT', onSigint);
  return { signal: controller.signal, dispose: () => process.off('SIGINT', onSigint) };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('skills-dataset')
    .description('Validate harvested SKILL.md files and export the accepted ones as a dataset')
    .version(packageJson.version);

  program
    .command('validate')
    .description('Run the frontmatter and classifier passes over every candidate file')
    .option('--main-db <path>', 'Source database written by the fetcher')
    .option('--output-db <path>', 'Validation results database')
    .option('--content-dir <path>', 'Directory holding fetched file content')
    .option('--model <id>', 'Classifier model')
    .option('--base-url <url>', 'Base URL of an OpenAI-compatible or Anthropic-compatible server')
    .addOption(
      new Option('--backend <kind>', 'Classifier backend').choices([
        'auto',
        'anthropic',
        'openai-compatible',
        'anthropic-batch',
      ])
    )
    .option('--batch-size <n>', 'Files committed per batch', parseInteger)
    .option('--max-concurrent <n>', 'Classifier requests in flight', parseInteger)
    .option('--max-bytes <n>', 'Bytes of content sent to the classifier', parseInteger)
    .option('--cache-dir <path>', 'Classification cache directory')
    .option('--retries <n>', 'Retries per file on transport errors', parseInteger)
    .option('--revalidate', 'Re-evaluate files that already have a final status')
    .option('--refresh', 'Ignore cached verdicts and classify again')
    .option('--config <path>', `Config file (default: ./${CONFIG_FILE})`)
    .action(async (options: ValidateCommandOptions) => {
      const interrupt = interruptController();
      try {
        await guarded(() => runValidate(options, { signal: interrupt.signal }));
      } finally {
        interrupt.dispose();
      }
    });

  program
    .command('export')
    .description('Write accepted files, repositories and history as Parquet')
    .option('--main-db <path>', 'Source database written by the fetcher')
    .option('--output-db <path>', 'Validation results database')
    .option('--output-dir <path>', 'Directory for the exported dataset')
    .option('--kaggle-username <name>', 'Also write Kaggle dataset metadata for this account')
    .option('--allow-no-repo', 'Export even when some repositories have no metadata')
    .option('--allow-no-history', 'Export even when some files have no history')
    .option('--config <path>', `Config file (default: ./${CONFIG_FILE})`)
    .action(async (options: ExportCommandOptions) => {
      await guarded(() => runExport(options));
    });

  const cache = program.command('cache').description('Inspect or clear the classification cache');

  cache
    .command('stats')
    .description('Count cached verdicts by decision')
    .option('--cache-dir <path>', 'Classification cache directory')
    .option('--config <path>', `Config file (default: ./${CONFIG_FILE})`)
    .action(async (options: CacheCommandOptions) => {
      await guarded(() => runCacheStats(options));
    });

  cache
    .command('clear')
    .description('Delete every cached verdict')
    .option('--cache-dir <path>', 'Classification cache directory')
    .option('--config <path>', `Config file (default: ./${CONFIG_FILE})`)
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (options: CacheCommandOptions) => {
      await guarded(() => runCacheClear(options));
    });

  program.showHelpAfterError(pc.dim('(run with --help for usage)'));
  return program;
}

