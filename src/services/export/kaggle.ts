import { readFile, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const README_TEMPLATE_PATH = join(__dirname, '..', '..', '..', 'templates', 'dataset-readme.md');

export interface DatasetCounts {
  files: number;
  repos: number;
  history: number;
}

export interface DatasetMetadata {
  title: string;
  id: string;
  licenses: { name: string }[];
  keywords: string[];
  description: string;
  resources: { path: string; description: string }[];
}

function formatCount(count: number): string {
  return count.toLocaleString('en-US');
}

export function buildDatasetMetadata(username: string, counts: DatasetCounts): DatasetMetadata {
  return {
    title: 'GitHub SKILL.md Files',
    id: `${username}/github-skill-files`,
    licenses: [{ name: 'CC0-1.0' }],
    keywords: ['github', 'skills', 'ai', 'agents', 'automation'],
    description:
      `Validated SKILL.md files from ${formatCount(counts.repos)} GitHub repositories. ` +
      `Contains ${formatCount(counts.files)} skill files with repository metadata and commit history.`,
    resources: [
      { path: 'files.parquet', description: 'File URLs and basic Git info' },
      { path: 'repos.parquet', description: 'Repository metadata (stars, forks, language, topics)' },
      { path: 'history.parquet', description: 'Commit history, one row per commit' },
    ],
  };
}

/**
 * Replace `{{name}}` placeholders. Unknown names are left as they are.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, name: string) => values[name] ?? match);
}

export async function writeKaggleMetadata(
  outputDir: string,
  username: string,
  counts: DatasetCounts,
  templatePath: string = README_TEMPLATE_PATH
): Promise<string[]> {
  const metadataPath = join(outputDir, 'dataset-metadata.json');
  await writeFile(metadataPath, JSON.stringify(buildDatasetMetadata(username, counts), null, 2) + '\n', 'utf-8');

  const template = await readFile(templatePath, 'utf-8');
  const readmePath = join(outputDir, 'README.md');
  await writeFile(
    readmePath,
    renderTemplate(template, {
      filesCount: formatCount(counts.files),
      reposCount: formatCount(counts.repos),
      historyCount: formatCount(counts.history),
    }),
    'utf-8'
  );

  return [metadataPath, readmePath];
}
