import { describe, it, expect } from 'vitest';
import {
  checkFrontmatter,
  decodeUtf8,
  describeRejection,
  locateFrontmatter,
} from '../src/services/prefilter/frontmatter.ts';

const VALID = '---\nname: foo\ndescription: does X\n---\n# Foo\n\nBody text.\n';

function rejectionOf(content: string | Uint8Array): string {
  const result = checkFrontmatter(content);
  if (result.valid) {
    throw new Error('expected a rejection');
  }
  return describeRejection(result);
}

describe('checkFrontmatter', () => {
  it('accepts a header with name and description', () => {
    const result = checkFrontmatter(VALID);
    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.header).toBe('---\nname: foo\ndescription: does X\n---\n');
      expect(result.data).toEqual({ name: 'foo', description: 'does X' });
    }
  });

  it('accepts title in place of name', () => {
    const result = checkFrontmatter('---\ntitle: Foo\ndescription: does X\n---\n');
    expect(result.valid).toBe(true);
  });

  it('accepts CRLF line endings', () => {
    const result = checkFrontmatter('---\r\nname: foo\r\ndescription: bar\r\n---\r\nbody\r\n');
    expect(result.valid).toBe(true);
  });

  it('ignores a leading byte order mark', () => {
    const result = checkFrontmatter('\uFEFF' + VALID);
    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.header.startsWith('---\n')).toBe(true);
    }
  });

  it('rejects content without a header', () => {
    expect(checkFrontmatter('# Just markdown\n')).toEqual({ valid: false, reason: 'missing-delimiter' });
    expect(rejectionOf('# Just markdown\n')).toBe('No YAML frontmatter');
  });

  it('rejects a header that does not start on the first line', () => {
    expect(rejectionOf('\n---\nname: foo\ndescription: bar\n---\n')).toBe('No YAML frontmatter');
  });

  it('rejects empty and whitespace-only content', () => {
    expect(rejectionOf('')).toBe('Empty file');
    expect(rejectionOf('  \n\t\n')).toBe('Empty file');
  });

  it('rejects a header that is never closed', () => {
    expect(rejectionOf('---\nname: foo\ndescription: bar\n')).toBe('Frontmatter block is never closed');
  });

  it('rejects a header without a name', () => {
    expect(rejectionOf('---\ndescription: does X\n---\n')).toBe('Frontmatter has no name');
  });

  it('rejects a blank name', () => {
    expect(rejectionOf('---\nname: "  "\ndescription: does X\n---\n')).toBe('Frontmatter has no name');
  });

  it('rejects a header without a description', () => {
    expect(rejectionOf('---\nname: foo\n---\n')).toBe('Frontmatter has no description');
  });

  it('rejects an empty header', () => {
    expect(rejectionOf('---\n---\nbody\n')).toBe('Frontmatter has no name');
  });

  it('reports invalid YAML without throwing', () => {
    const result = checkFrontmatter('---\nname: [unclosed\ndescription: x\n---\n');
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.reason).toBe('invalid-yaml');
      expect(describeRejection(result)).toMatch(/^Frontmatter is not valid YAML/);
    }
  });

  it('rejects binary content', () => {
    expect(rejectionOf(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x00, 0x1a]))).toBe('Binary or non-UTF-8 content');
    expect(rejectionOf(new Uint8Array([0xff, 0xfe, 0x2d]))).toBe('Binary or non-UTF-8 content');
    expect(rejectionOf('---\nname: a\u0000\n---\n')).toBe('Binary or non-UTF-8 content');
  });

  it('checks bytes the same way as text', () => {
    const bytes = new TextEncoder().encode(VALID);
    expect(checkFrontmatter(bytes).valid).toBe(true);
  });
});

describe('locateFrontmatter', () => {
  it('returns the header and the body offset', () => {
    const block = locateFrontmatter(VALID);
    expect(block).not.toBeNull();
    expect(block?.yaml).toBe('name: foo\ndescription: does X\n');
    expect(VALID.slice(block?.end)).toBe('# Foo\n\nBody text.\n');
  });

  it('counts the byte order mark in the body offset', () => {
    const block = locateFrontmatter('\uFEFF---\nname: a\n---\nbody');
    expect(block?.end).toBe(17);
  });

  it('returns null for a header that is never closed', () => {
    expect(locateFrontmatter('---\nname: foo\n')).toBeNull();
  });

  it('accepts a closing line at the end of the file without a newline', () => {
    const block = locateFrontmatter('---\nname: a\n---');
    expect(block?.header).toBe('---\nname: a\n---');
  });
});

describe('decodeUtf8', () => {
  it('decodes valid UTF-8', () => {
    expect(decodeUtf8(new TextEncoder().encode('héllo'))).toBe('héllo');
  });

  it('returns null for invalid sequences and NUL bytes', () => {
    expect(decodeUtf8(new Uint8Array([0xc3, 0x28]))).toBeNull();
    expect(decodeUtf8(new Uint8Array([0x61, 0x00, 0x62]))).toBeNull();
  });
});
