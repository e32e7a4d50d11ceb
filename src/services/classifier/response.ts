import { z } from 'zod';
import { ClassificationParseError } from '../../core/errors.ts';
import type { ClassificationVerdict } from '../../core/types.ts';

const verdictSchema = z.object({
  is_skill: z.boolean(),
  reason: z.string().optional(),
});

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Places a verdict object may hide in a chat reply, most specific last:
 * the whole reply, a fenced json block, the first brace span naming is_skill.
 */
function jsonCandidates(text: string): string[] {
  const candidates = [text];
  const fenced = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/.exec(text);
  if (fenced?.[1]) {
    candidates.push(fenced[1]);
  }
  const braces = /\{[\s\S]*"is_skill"[\s\S]*\}/.exec(text);
  if (braces) {
    candidates.push(braces[0]);
  }
  return candidates;
}

/**
 * Map a model reply to a verdict. Anything without a boolean `is_skill` is a
 * ClassificationParseError: inclusion requires an affirmative answer.
 */
export function parseVerdictResponse(text: string): ClassificationVerdict {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new ClassificationParseError('Model returned an empty response', text);
  }

  for (const candidate of jsonCandidates(trimmed)) {
    const result = verdictSchema.safeParse(tryParseJson(candidate));
    if (result.success) {
      return {
        decision: result.data.is_skill ? 'valid-skill' : 'rejected',
        reason: result.data.reason?.trim() ?? '',
      };
    }
  }

  throw new ClassificationParseError(
    `Could not read a verdict from the model response: ${trimmed.slice(0, 200)}`,
    text
  );
}
