import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from '../constants.js';

export interface TextChunk {
  text: string;
  /** Offset of the first character in the normalized document text. */
  start: number;
  /** Offset one past the last character. */
  end: number;
}

export interface ChunkOptions {
  chunkSize?: number;
  chunkOverlap?: number;
}

/** Break points tried from the coarsest to the finest. */
const SEPARATORS = ['\n\n', '\n', '. ', ' '] as const;

/** Line endings normalized to \n and outer whitespace removed; chunk offsets refer to this form. */
export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, '\n').trim();
}

function findBreak(text: string, start: number, end: number): number {
  const window = text.slice(start, end);
  // A break in the first half would leave a tiny chunk; cut hard instead.
  const minimum = Math.floor(window.length / 2);
  for (const separator of SEPARATORS) {
    const at = window.lastIndexOf(separator);
    if (at >= minimum) {
      return start + at + separator.length;
    }
  }
  return end;
}

function isHighSurrogate(text: string, index: number): boolean {
  const code = text.charCodeAt(index);
  return code >= 0xd800 && code <= 0xdbff;
}

/** Move an offset that falls inside a surrogate pair back to the start of the pair. */
function alignToCodePoint(text: string, offset: number): number {
  return offset > 0 && offset < text.length && isHighSurrogate(text, offset - 1)
    ? offset - 1
    : offset;
}

/**
 * Split text into overlapping chunks of at most `chunkSize` characters, preferring
 * paragraph, line, sentence and word boundaries. Concatenating the chunks while
 * skipping each one's overlap with its predecessor reproduces the normalized text.
 */
export function chunkText(text: string, options?: ChunkOptions): TextChunk[] {
  const chunkSize = options?.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const chunkOverlap = options?.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new Error('chunkSize must be a positive integer');
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new Error('chunkOverlap must be a non-negative integer smaller than chunkSize');
  }

  const normalized = normalizeText(text);
  const chunks: TextChunk[] = [];
  let start = 0;

  while (start < normalized.length) {
    let end = Math.min(start + chunkSize, normalized.length);
    if (end < normalized.length) {
      end = alignToCodePoint(normalized, findBreak(normalized, start, end));
      // A one-unit window on a pair's first half must take the whole pair.
      if (end <= start) end = start + 2;
    }
    const slice = normalized.slice(start, end);
    if (slice.trim()) {
      chunks.push({ text: slice, start, end });
    }
    if (end >= normalized.length) break;
    const next = alignToCodePoint(normalized, end - chunkOverlap);
    start = next > start ? next : end;
  }

  return chunks;
}
