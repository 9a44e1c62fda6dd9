/**
 * Reassemble chunk records into documents.
 * Groups by `document_id` metadata (falling back to the id prefix before `#chunk`) and
 * merges chunk text in `chunk_index` order.
 */

import type { DocumentChunk, DocumentMetadata } from '../types.js';

export const CHUNK_ID_SEPARATOR = '#chunk';

/**
 * Bookkeeping keys stored with every chunk, plus `content` which unchunked records may use
 * for their text. Hidden from callers reading a document.
 */
export const CHUNK_METADATA_KEYS = [
  'document_id',
  'title',
  'text',
  'content',
  'chunk_index',
  'chunk_count',
  'chunk_start',
  'chunk_end',
] as const;

export function chunkId(documentId: string, index: number): string {
  return `${documentId}${CHUNK_ID_SEPARATOR}${index}`;
}

export function getDocumentId(chunk: { id: string; metadata: DocumentMetadata }): string {
  const fromMetadata = chunk.metadata['document_id'];
  if (typeof fromMetadata === 'string' && fromMetadata.length > 0) {
    return fromMetadata;
  }
  const at = chunk.id.lastIndexOf(CHUNK_ID_SEPARATOR);
  return at > 0 ? chunk.id.slice(0, at) : chunk.id;
}

function getNumber(metadata: DocumentMetadata, key: string): number | undefined {
  const v = metadata[key];
  if (typeof v === 'number' && Number.isFinite(v)) return v;
  if (typeof v === 'string' && /^\d+$/.test(v)) return parseInt(v, 10);
  return undefined;
}

export interface ReassembledDocument {
  document_id: string;
  title: string;
  content: string;
  /** Caller-supplied metadata from the first chunk, without the chunk bookkeeping keys. */
  metadata: DocumentMetadata;
  chunk_count: number;
  best_score: number;
}

export function stripChunkMetadata(metadata: DocumentMetadata): DocumentMetadata {
  const out: DocumentMetadata = {};
  const hidden: readonly string[] = CHUNK_METADATA_KEYS;
  for (const [key, value] of Object.entries(metadata)) {
    if (!hidden.includes(key)) {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Concatenate ordered chunks. When every chunk carries its offsets, overlapping text is
 * written once; otherwise chunks are joined with `separator`.
 */
function mergeChunks(chunks: DocumentChunk[], separator: string): string {
  const withOffsets = chunks.every(
    (c) =>
      getNumber(c.metadata, 'chunk_start') !== undefined &&
      getNumber(c.metadata, 'chunk_end') !== undefined
  );
  if (!withOffsets) {
    return chunks
      .map((c) => c.content.trim())
      .filter(Boolean)
      .join(separator);
  }

  let merged = '';
  let cursor = 0;
  for (const chunk of chunks) {
    const start = getNumber(chunk.metadata, 'chunk_start') ?? 0;
    const end = getNumber(chunk.metadata, 'chunk_end') ?? start + chunk.content.length;
    if (merged.length === 0) {
      merged = chunk.content;
    } else if (start >= cursor) {
      merged += chunk.content;
    } else {
      merged += chunk.content.slice(cursor - start);
    }
    cursor = Math.max(cursor, end);
  }
  return merged.trim();
}

/** Group chunks by document and merge their content. */
export function reassembleByDocument(
  chunks: DocumentChunk[],
  options?: {
    /** Separator for chunks that carry no offsets. Default double newline. */
    contentSeparator?: string;
  }
): ReassembledDocument[] {
  const separator = options?.contentSeparator ?? '\n\n';
  const byDoc = new Map<string, DocumentChunk[]>();

  for (const chunk of chunks) {
    const key = getDocumentId(chunk);
    let list = byDoc.get(key);
    if (!list) {
      list = [];
      byDoc.set(key, list);
    }
    list.push(chunk);
  }

  const out: ReassembledDocument[] = [];

  for (const [documentId, list] of byDoc) {
    const sorted = [...list].sort((a, b) => {
      const orderA = getNumber(a.metadata, 'chunk_index');
      const orderB = getNumber(b.metadata, 'chunk_index');
      if (orderA !== undefined && orderB !== undefined) return orderA - orderB;
      if (orderA !== undefined) return -1;
      if (orderB !== undefined) return 1;
      return 0;
    });

    const first = sorted[0];
    const title = first?.metadata['title'];

    out.push({
      document_id: documentId,
      title: typeof title === 'string' ? title : '',
      content: mergeChunks(sorted, separator),
      metadata: stripChunkMetadata(first?.metadata ?? {}),
      chunk_count: sorted.length,
      best_score: Math.round(Math.max(...sorted.map((c) => c.score)) * 10000) / 10000,
    });
  }

  return out;
}
