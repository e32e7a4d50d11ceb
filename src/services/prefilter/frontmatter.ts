import matter from 'gray-matter';
import type { FrontmatterCheckResult, FrontmatterRejection } from '../../core/types.ts';

type Rejected = Extract<FrontmatterCheckResult, { valid: false }>;

const BOM = '\uFEFF';
const OPENING_LINE = /^---[ \t]*\r?\n/;
const CLOSING_LINE = /^---[ \t]*\r?$/;

export interface FrontmatterBlock {
  /** Header block verbatim, from the opening `---` through the closing line's newline */
  header: string;
  /** Raw YAML between the delimiters */
  yaml: string;
  /** Offset in the original string where the body starts */
  end: number;
}

type ScanResult =
  | { kind: 'found'; block: FrontmatterBlock }
  | { kind: 'missing' }
  | { kind: 'unterminated' };

function scanFrontmatter(content: string): ScanResult {
  const offset = content.startsWith(BOM) ? BOM.length : 0;
  const text = content.slice(offset);

  const opening = OPENING_LINE.exec(text);
  if (!opening) {
    return { kind: 'missing' };
  }

  let pos = opening[0].length;
  while (pos <= text.length) {
    const newline = text.indexOf('\n', pos);
    const lineEnd = newline === -1 ? text.length : newline;
    if (CLOSING_LINE.test(text.slice(pos, lineEnd))) {
      const end = newline === -1 ? text.length : newline + 1;
      return {
        kind: 'found',
        block: {
          header: text.slice(0, end),
          yaml: text.slice(opening[0].length, pos),
          end: offset + end,
        },
      };
    }
    if (newline === -1) break;
    pos = newline + 1;
  }

  return { kind: 'unterminated' };
}

/**
 * Find the leading `---` header block, or null when the content has none
 * (or never closes it).
 */
export function locateFrontmatter(content: string): FrontmatterBlock | null {
  const scan = scanFrontmatter(content);
  return scan.kind === 'found' ? scan.block : null;
}

/**
 * Strict UTF-8 decode. Returns null for invalid sequences or embedded NUL
 * bytes, which is how binary files show up in the content directory.
 */
export function decodeUtf8(bytes: Uint8Array): string | null {
  if (bytes.includes(0)) return null;
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasText(value: unknown): boolean {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Structural first pass: does the file open with a well-formed YAML header
 * that names and describes a skill? Malformed input is a normal result here,
 * never an exception.
 */
export function checkFrontmatter(content: string | Uint8Array): FrontmatterCheckResult {
  let text: string;
  if (typeof content === 'string') {
    if (content.includes('\u0000')) {
      return { valid: false, reason: 'binary-content' };
    }
    text = content;
  } else {
    const decoded = decodeUtf8(content);
    if (decoded === null) {
      return { valid: false, reason: 'binary-content' };
    }
    text = decoded;
  }

  if (text.replace(BOM, '').trim() === '') {
    return { valid: false, reason: 'empty-content' };
  }

  const scan = scanFrontmatter(text);
  if (scan.kind === 'missing') {
    return { valid: false, reason: 'missing-delimiter' };
  }
  if (scan.kind === 'unterminated') {
    return { valid: false, reason: 'unterminated-header' };
  }

  let data: unknown;
  try {
    // Passing options keeps gray-matter from caching every header it sees
    ({ data } = matter(scan.block.header, {}));
  } catch (error) {
    return {
      valid: false,
      reason: 'invalid-yaml',
      detail: error instanceof Error ? error.message.split('\n')[0] : undefined,
    };
  }

  if (!isRecord(data)) {
    return { valid: false, reason: 'not-a-mapping' };
  }
  if (!hasText(data.name) && !hasText(data.title)) {
    return { valid: false, reason: 'missing-name' };
  }
  if (!hasText(data.description)) {
    return { valid: false, reason: 'missing-description' };
  }

  return { valid: true, header: scan.block.header, data };
}

const REJECTION_MESSAGES: Record<FrontmatterRejection, string> = {
  'empty-content': 'Empty file',
  'binary-content': 'Binary or non-UTF-8 content',
  'missing-delimiter': 'No YAML frontmatter',
  'unterminated-header': 'Frontmatter block is never closed',
  'invalid-yaml': 'Frontmatter is not valid YAML',
  'not-a-mapping': 'Frontmatter is not a key-value mapping',
  'missing-name': 'Frontmatter has no name',
  'missing-description': 'Frontmatter has no description',
};

export function describeRejection(result: Rejected): string {
  const message = REJECTION_MESSAGES[result.reason];
  return result.detail ? `${message}: ${result.detail}` : message;
}
