import { describe, it, expect } from 'vitest';
import { chunkId, getDocumentId, reassembleByDocument } from './reassemble-documents.js';
import type { DocumentChunk } from '../types.js';

describe('getDocumentId', () => {
  it('prefers document_id metadata', () => {
    expect(getDocumentId({ id: 'x#chunk3', metadata: { document_id: 'report' } })).toBe('report');
  });

  it('falls back to the id prefix before the chunk suffix', () => {
    expect(getDocumentId({ id: chunkId('notes#2024', 4), metadata: {} })).toBe('notes#2024');
    expect(getDocumentId({ id: 'plain', metadata: {} })).toBe('plain');
  });
});

describe('reassembleByDocument', () => {
  it('groups chunks by document and orders them by chunk_index', () => {
    const chunks: DocumentChunk[] = [
      {
        id: 'a#chunk1',
        content: 'Second chunk.',
        score: 0.8,
        metadata: { document_id: 'a', chunk_index: 1, title: 'Doc A', author: 'Ada' },
      },
      {
        id: 'a#chunk0',
        content: 'First chunk.',
        score: 0.9,
        metadata: { document_id: 'a', chunk_index: 0, title: 'Doc A', author: 'Ada' },
      },
      { id: 'b', content: 'Other doc.', score: 0.7, metadata: {} },
    ];

    const docs = reassembleByDocument(chunks);

    expect(docs).toHaveLength(2);
    const a = docs.find((d) => d.document_id === 'a');
    expect(a).toEqual({
      document_id: 'a',
      title: 'Doc A',
      content: 'First chunk.\n\nSecond chunk.',
      metadata: { author: 'Ada' },
      chunk_count: 2,
      best_score: 0.9,
    });
    expect(docs.find((d) => d.document_id === 'b')?.content).toBe('Other doc.');
  });

  it('writes overlapping text once when chunks carry offsets', () => {
    const chunks: DocumentChunk[] = [
      {
        id: 'd#chunk1',
        content: 'bbbb cccc ',
        score: 0.5,
        metadata: { chunk_index: 1, chunk_start: 5, chunk_end: 15 },
      },
      {
        id: 'd#chunk0',
        content: 'aaaa bbbb ',
        score: 0.5,
        metadata: { chunk_index: 0, chunk_start: 0, chunk_end: 10 },
      },
      {
        id: 'd#chunk2',
        content: 'cccc dddd',
        score: 0.5,
        metadata: { chunk_index: 2, chunk_start: 10, chunk_end: 19 },
      },
    ];

    expect(reassembleByDocument(chunks)[0].content).toBe('aaaa bbbb cccc dddd');
  });

  it('uses the custom separator for chunks without offsets', () => {
    const chunks: DocumentChunk[] = [
      { id: 'd#chunk0', content: ' one ', score: 0.1, metadata: { chunk_index: 0 } },
      { id: 'd#chunk1', content: 'two', score: 0.2, metadata: { chunk_index: 1 } },
    ];

    const [doc] = reassembleByDocument(chunks, { contentSeparator: ' | ' });

    expect(doc.content).toBe('one | two');
    expect(doc.best_score).toBe(0.2);
  });
});
