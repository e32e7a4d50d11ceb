import { createHash } from 'crypto';
import type { ClassificationInput } from '../../core/types.ts';

const CACHE_KEY_PATTERN = /^[a-f0-9]{64}$/;

/**
 * SHA-256 over (prompt template, model, truncated content).
 *
 * The tuple is hashed as a JSON array so field boundaries are unambiguous.
 * Editing the prompt or switching models yields new keys. The endpoint is not
 * part of the key: the same model behind another URL reuses its verdicts.
 */
export function deriveCacheKey(input: ClassificationInput): string {
  const material = JSON.stringify([input.promptTemplate, input.model, input.content]);
  return createHash('sha256').update(material, 'utf-8').digest('hex');
}

export function isCacheKey(value: string): boolean {
  return CACHE_KEY_PATTERN.test(value);
}
