import pc from 'picocolors';
import { loadConfig } from '../config.ts';
import { DEFAULT_EXPORT_DIR } from '../core/constants.ts';
import { OutputDatabase, SourceDatabase } from '../services/database/index.ts';
import { exportDataset, type ExportResult } from '../services/export/index.ts';
import { logger } from '../utils/logger.ts';

export interface ExportCommandOptions {
  mainDb?: string;
  outputDb?: string;
  outputDir?: string;
  kaggleUsername?: string;
  allowNoRepo?: boolean;
  allowNoHistory?: boolean;
  config?: string;
}

export async function runExport(
  options: ExportCommandOptions,
  runtime: { env?: NodeJS.ProcessEnv; cwd?: string } = {}
): Promise<ExportResult> {
  const config = loadConfig({
    configPath: options.config,
    cwd: runtime.cwd,
    env: runtime.env,
    flags: { mainDb: options.mainDb, outputDb: options.outputDb },
  });
  const outputDir = options.outputDir ?? DEFAULT_EXPORT_DIR;

  const source = new SourceDatabase(config.mainDb);
  try {
    const output = new OutputDatabase(config.outputDb);
    try {
      logger.section('Exporting dataset');
      logger.label('Source database', config.mainDb);
      logger.label('Output database', config.outputDb);
      logger.label('Output directory', outputDir);
      logger.line();

      const spinner = logger.spinner('Collecting accepted files...');
      const warnings: string[] = [];
      let result: ExportResult;
      try {
        result = await exportDataset(source, output, {
          outputDir,
          allowNoRepo: options.allowNoRepo,
          allowNoHistory: options.allowNoHistory,
          kaggleUsername: options.kaggleUsername,
          onStep: (message) => {
            spinner.text = `${message}...`;
          },
          onWarning: (message) => warnings.push(message),
        });
      } catch (error) {
        spinner.fail('Export failed');
        throw error;
      }
      spinner.succeed('Export written');

      for (const warning of warnings) {
        logger.warning(warning);
      }
      logger.label('Files', String(result.files));
      logger.label('Repositories', String(result.repos));
      logger.label('History rows', String(result.history));
      logger.line();
      for (const path of result.written) {
        logger.log(`  ${pc.dim('→')} ${path}`);
      }
      return result;
    } finally {
      output.close();
    }
  } finally {
    source.close();
  }
}
