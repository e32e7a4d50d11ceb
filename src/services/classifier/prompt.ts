import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { ConfigError, errorMessage } from '../../core/errors.ts';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const CONTENT_PLACEHOLDER = '{{content}}';
export const DEFAULT_PROMPT_PATH = join(__dirname, '..', '..', '..', 'prompts', 'validation-prompt.txt');

/**
 * Read a prompt template. The template text is part of every cache key, so
 * any edit to the file invalidates earlier verdicts.
 */
export function loadPromptTemplate(path: string = DEFAULT_PROMPT_PATH): string {
  let template: string;
  try {
    template = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Could not read prompt template ${path}: ${errorMessage(error)}`, { cause: error });
  }
  if (!template.includes(CONTENT_PLACEHOLDER)) {
    throw new ConfigError(`Prompt template ${path} has no ${CONTENT_PLACEHOLDER} placeholder`);
  }
  return template;
}

export function renderPrompt(template: string, content: string): string {
  // Function replacer: `$` sequences in file content must stay literal
  return template.replace(CONTENT_PLACEHOLDER, () => content);
}
