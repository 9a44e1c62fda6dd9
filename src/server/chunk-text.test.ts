import { describe, expect, it } from 'vitest';
import { chunkText, normalizeText } from './chunk-text.js';

describe('chunkText', () => {
  it('returns no chunks for blank input', () => {
    expect(chunkText('  \n\n  ')).toEqual([]);
  });

  it('keeps short text in a single chunk', () => {
    expect(chunkText('  hello world \r\n')).toEqual([{ text: 'hello world', start: 0, end: 11 }]);
  });

  it('breaks on word boundaries without overlap', () => {
    const chunks = chunkText('aaaa bbbb cccc dddd', { chunkSize: 10, chunkOverlap: 0 });
    expect(chunks).toEqual([
      { text: 'aaaa bbbb ', start: 0, end: 10 },
      { text: 'cccc dddd', start: 10, end: 19 },
    ]);
  });

  it('overlaps consecutive chunks', () => {
    const chunks = chunkText('aaaa bbbb cccc dddd', { chunkSize: 10, chunkOverlap: 5 });
    expect(chunks.map((c) => c.text)).toEqual(['aaaa bbbb ', 'bbbb cccc ', 'cccc dddd']);
  });

  it('prefers paragraph breaks', () => {
    const chunks = chunkText('First paragraph.\n\nSecond paragraph.', {
      chunkSize: 30,
      chunkOverlap: 0,
    });
    expect(chunks.map((c) => c.text)).toEqual(['First paragraph.\n\n', 'Second paragraph.']);
  });

  it('cuts hard when no separator falls in the second half of the window', () => {
    const chunks = chunkText('abcdefghijklmnop', { chunkSize: 6, chunkOverlap: 0 });
    expect(chunks.map((c) => c.text)).toEqual(['abcdef', 'ghijkl', 'mnop']);
  });

  it('reproduces the normalized text when overlaps are skipped', () => {
    const text = 'Lorem ipsum dolor sit amet.\nConsectetur adipiscing elit. '.repeat(20);
    const chunks = chunkText(text, { chunkSize: 120, chunkOverlap: 30 });
    let rebuilt = '';
    let cursor = 0;
    for (const chunk of chunks) {
      rebuilt += chunk.text.slice(Math.max(0, cursor - chunk.start));
      cursor = chunk.end;
    }
    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.every((c) => c.text.length <= 120)).toBe(true);
    expect(rebuilt).toBe(normalizeText(text));
  });

  it('never splits a surrogate pair at a hard cut or overlap start', () => {
    const text = 'a' + '\u{1F600}'.repeat(700);
    const chunks = chunkText(text);
    const loneSurrogate = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

    expect(chunks.map((c) => [c.start, c.end])).toEqual([
      [0, 999],
      [799, 1401],
    ]);
    expect(chunks.some((c) => loneSurrogate.test(c.text))).toBe(false);
  });

  it('keeps a pair whole when the chunk size is a single unit', () => {
    const chunks = chunkText('\u{1F600}b', { chunkSize: 1, chunkOverlap: 0 });
    expect(chunks.map((c) => c.text)).toEqual(['\u{1F600}', 'b']);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => chunkText('text', { chunkSize: 10, chunkOverlap: 10 })).toThrow(
      'chunkOverlap must be a non-negative integer smaller than chunkSize'
    );
  });
});
