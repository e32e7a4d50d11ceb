import { CONTENT_MAX_BYTES, TRUNCATION_MARKER } from '../../core/constants.ts';
import { locateFrontmatter } from './frontmatter.ts';

export function utf8ByteLength(text: string): number {
  return Buffer.byteLength(text, 'utf-8');
}

/**
 * Decode the first `limit` bytes, backing off so a multi-byte character is
 * never split.
 */
function sliceUtf8(bytes: Buffer, limit: number): string {
  let end = Math.min(limit, bytes.length);
  // 10xxxxxx is a continuation byte
  while (end > 0 && end < bytes.length && ((bytes[end] ?? 0) & 0xc0) === 0x80) {
    end--;
  }
  return bytes.subarray(0, end).toString('utf-8');
}

/**
 * Bound the text sent to the classifier to `maxBytes` UTF-8 bytes.
 *
 * The frontmatter header is kept whole whenever it fits in the budget; only
 * the body is cut, and a `[truncated]` marker (counted against the budget)
 * is appended.
 */
export function truncateContent(content: string, maxBytes: number = CONTENT_MAX_BYTES): string {
  const bytes = Buffer.from(content, 'utf-8');
  if (bytes.length <= maxBytes) {
    return content;
  }

  const markerBytes = utf8ByteLength(TRUNCATION_MARKER);
  const block = locateFrontmatter(content);
  const headerEnd = block ? utf8ByteLength(content.slice(0, block.end)) : 0;

  if (headerEnd > maxBytes) {
    // Oversized header: no way to keep it whole, cut like plain text
    return sliceUtf8(bytes, Math.max(0, maxBytes - markerBytes)) + TRUNCATION_MARKER;
  }

  if (block && headerEnd + markerBytes > maxBytes) {
    return content.slice(0, block.end);
  }

  return sliceUtf8(bytes, Math.max(maxBytes - markerBytes, headerEnd)) + TRUNCATION_MARKER;
}
