import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runValidate } from '../src/commands/validate.ts';
import { runExport } from '../src/commands/export.ts';
import { runCacheClear, runCacheStats } from '../src/commands/cache.ts';
import { OutputDatabase } from '../src/services/database/index.ts';
import { ConfigError } from '../src/core/errors.ts';
import {
  REJECT_MARKER,
  StubBackend,
  blobUrl,
  createSourceDb,
  fileRow,
  skillMarkdown,
  writeContent,
} from './test-utils.ts';

describe('commands', () => {
  let tempDir: string;
  let paths: { mainDb: string; outputDb: string; contentDir: string; cacheDir: string };

  const skill = blobUrl('acme', 'tools', 'skills/review/SKILL.md');
  const headerless = blobUrl('acme', 'notes');
  const readme = blobUrl('beta', 'docs');
  const unfetched = blobUrl('gamma', 'later');

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    tempDir = await mkdtemp(join(tmpdir(), 'skills-dataset-commands-'));
    paths = {
      mainDb: join(tempDir, 'skills.db'),
      outputDb: join(tempDir, 'validation.db'),
      contentDir: join(tempDir, 'content'),
      cacheDir: join(tempDir, 'cache'),
    };

    createSourceDb(paths.mainDb, [fileRow(skill), fileRow(headerless), fileRow(readme), fileRow(unfetched)]);
    writeContent(paths.contentDir, skill, skillMarkdown('review', 'Reviews pull requests', '# Review\n'));
    writeContent(paths.contentDir, headerless, '# Just notes\n');
    writeContent(paths.contentDir, readme, skillMarkdown('docs', 'Project docs', `${REJECT_MARKER}\n`));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  async function validate(backend: StubBackend) {
    return runValidate(paths, { env: {}, cwd: tempDir, backend, verbose: false });
  }

  it('validates, caches verdicts and exports the accepted file', async () => {
    const backend = new StubBackend();
    const summary = await validate(backend);

    expect(summary.total).toBe(4);
    expect(summary.counts).toEqual({
      accepted: 1,
      structurally_rejected: 1,
      semantically_rejected: 1,
      classification_error: 0,
      skipped: 1,
    });
    expect(backend.calls).toHaveLength(2);

    const output = new OutputDatabase(paths.outputDb);
    try {
      expect(output.listAcceptedFiles()).toEqual([fileRow(skill)]);
      expect(output.getRecord(unfetched)?.reason).toBe('Content not fetched yet');
    } finally {
      output.close();
    }

    const stats = await runCacheStats({ cacheDir: paths.cacheDir }, { env: {}, cwd: tempDir });
    expect(stats).toEqual({ entries: 2, validSkills: 1, rejected: 1, unreadable: 0 });

    const outputDir = join(tempDir, 'build');
    const result = await runExport(
      { mainDb: paths.mainDb, outputDb: paths.outputDb, outputDir, allowNoRepo: true, allowNoHistory: true },
      { env: {}, cwd: tempDir }
    );
    expect(result).toMatchObject({ files: 1, repos: 0, history: 1 });
  });

  it('resumes without calling the backend for resolved files', async () => {
    await validate(new StubBackend());

    writeContent(paths.contentDir, unfetched, skillMarkdown('later', 'Fetched on the second run'));
    const backend = new StubBackend();
    const summary = await validate(backend);

    expect(summary.alreadyResolved).toBe(3);
    expect(summary.counts.accepted).toBe(1);
    expect(backend.calls).toHaveLength(1);
  });

  it('clears the cache when confirmed with --yes', async () => {
    await validate(new StubBackend());

    const removed = await runCacheClear({ cacheDir: paths.cacheDir, yes: true }, { env: {}, cwd: tempDir });
    expect(removed).toBe(2);
    expect(await runCacheStats({ cacheDir: paths.cacheDir }, { env: {}, cwd: tempDir })).toEqual({
      entries: 0,
      validSkills: 0,
      rejected: 0,
      unreadable: 0,
    });
  });

  it('refuses to clear the cache without a terminal or --yes', async () => {
    await validate(new StubBackend());

    await expect(
      runCacheClear({ cacheDir: paths.cacheDir }, { env: {}, cwd: tempDir, interactive: false })
    ).rejects.toThrow(new ConfigError('Refusing to clear the cache without confirmation. Pass --yes.'));

    const stats = await runCacheStats({ cacheDir: paths.cacheDir }, { env: {}, cwd: tempDir });
    expect(stats.entries).toBe(2);
  });
});
