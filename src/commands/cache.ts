import * as p from '@clack/prompts';
import pc from 'picocolors';
import { loadConfig } from '../config.ts';
import { ConfigError } from '../core/errors.ts';
import { FileClassificationStore, type CacheStats } from '../services/cache/index.ts';
import { logger } from '../utils/logger.ts';

export interface CacheCommandOptions {
  cacheDir?: string;
  config?: string;
  yes?: boolean;
}

interface CacheRuntime {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Whether a confirmation can be asked for; defaults to stdin being a terminal */
  interactive?: boolean;
}

function openStore(options: CacheCommandOptions, runtime: CacheRuntime): FileClassificationStore {
  const config = loadConfig({
    configPath: options.config,
    cwd: runtime.cwd,
    env: runtime.env,
    flags: { cacheDir: options.cacheDir },
  });
  return new FileClassificationStore(config.cacheDir);
}

export async function runCacheStats(options: CacheCommandOptions, runtime: CacheRuntime = {}): Promise<CacheStats> {
  const store = openStore(options, runtime);
  const stats = await store.stats();

  logger.section('Classification cache');
  logger.label('Directory', store.cacheDir);
  logger.label('Entries', String(stats.entries));
  logger.label('Valid skills', pc.green(String(stats.validSkills)));
  logger.label('Rejected', String(stats.rejected));
  if (stats.unreadable > 0) {
    logger.label('Unreadable', pc.yellow(String(stats.unreadable)));
  }
  logger.line();
  return stats;
}

/**
 * Delete every cached verdict. Asks first unless --yes; without a terminal
 * to ask on, --yes is required.
 */
export async function runCacheClear(options: CacheCommandOptions, runtime: CacheRuntime = {}): Promise<number> {
  const store = openStore(options, runtime);

  if (!options.yes) {
    if (!(runtime.interactive ?? process.stdin.isTTY)) {
      throw new ConfigError('Refusing to clear the cache without confirmation. Pass --yes.');
    }
    const confirmed = await p.confirm({
      message: `Delete every cached verdict in ${pc.cyan(store.cacheDir)}?`,
      initialValue: false,
    });
    if (p.isCancel(confirmed) || !confirmed) {
      p.cancel('Cache left as it is');
      return 0;
    }
  }

  const removed = await store.clear();
  logger.success(`Removed ${removed} cached verdict${removed === 1 ? '' : 's'} from ${store.cacheDir}`);
  return removed;
}
