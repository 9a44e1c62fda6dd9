import { beforeEach, describe, expect, it } from 'vitest';
import { setLogLevel } from '../../logger.js';
import { InMemoryDocumentStore } from '../../testing/in-memory-store.js';
import type { TextPayload } from '../tool-response.js';
import { listDocumentsTool } from './list-documents-tool.js';
import { pineconeStatsTool } from './pinecone-stats-tool.js';
import { processDocumentTool } from './process-document-tool.js';
import { readDocumentTool } from './read-document-tool.js';
import { semanticSearchTool } from './semantic-search-tool.js';

function textOf(result: TextPayload): string {
  return result.content[0].text;
}

const LONG_TEXT = Array.from({ length: 30 }, (_, i) => `Paragraph ${i} about vector search.`).join(
  '\n\n'
);

describe('gateway tools', () => {
  let store: InMemoryDocumentStore;

  beforeEach(() => {
    setLogLevel('INFO');
    store = new InMemoryDocumentStore();
  });

  describe('process-document', () => {
    it('chunks, embeds and upserts the document', async () => {
      const result = await processDocumentTool.call(
        {
          document_id: 'doc-1',
          text: LONG_TEXT,
          title: 'Vector notes',
          metadata: { category: 'notes', date: '2024-01-01T00:00:00Z' },
        },
        store
      );

      expect(result.isError).toBeUndefined();
      expect(textOf(result)).toBe(
        'Processed document "doc-1": 2 chunk(s) embedded and stored in namespace "default".'
      );
      expect(store.embedCalls).toHaveLength(1);
      expect(store.embedCalls[0].inputType).toBe('passage');

      const stored = store.namespaces.get('');
      expect([...(stored?.keys() ?? [])]).toEqual(['doc-1#chunk0', 'doc-1#chunk1']);
      const first = stored?.get('doc-1#chunk0');
      expect(first?.metadata['document_id']).toBe('doc-1');
      expect(first?.metadata['chunk_count']).toBe(2);
      expect(first?.metadata['timestamp']).toBe(1704067200);
      expect(first?.metadata['category']).toBe('notes');
    });

    it('does not let caller metadata overwrite chunk bookkeeping', async () => {
      await processDocumentTool.call(
        { document_id: 'doc-1', text: 'Short body', metadata: { chunk_index: 99, text: 'x' } },
        store
      );
      const record = store.namespaces.get('')?.get('doc-1#chunk0');
      expect(record?.metadata['chunk_index']).toBe(0);
      expect(record?.metadata['text']).toBe('Short body');
    });

    it('rejects blank text without touching the store', async () => {
      const result = await processDocumentTool.call({ document_id: 'doc-1', text: '   ' }, store);
      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe('Invalid arguments for process-document: text: text cannot be empty');
      expect(store.embedCalls).toHaveLength(0);
    });

    it('rejects document ids containing the chunk separator', async () => {
      const result = await processDocumentTool.call({ document_id: 'a#chunk1', text: 'body' }, store);
      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe(
        'Invalid arguments for process-document: document_id: document_id cannot contain "#chunk"'
      );
    });
  });

  describe('read-document', () => {
    it('reassembles a chunked document into its original text', async () => {
      await processDocumentTool.call(
        {
          document_id: 'doc-1',
          text: LONG_TEXT,
          title: 'Vector notes',
          metadata: { category: 'notes', date: '2024-01-01T00:00:00Z' },
        },
        store
      );

      const result = await readDocumentTool.call({ document_id: 'doc-1' }, store);

      expect(result.isError).toBeUndefined();
      expect(textOf(result)).toBe(
        [
          'Document: doc-1',
          'Title: Vector notes',
          'Metadata: {"category":"notes","date":"2024-01-01T00:00:00Z","timestamp":1704067200}',
          'Chunks: 2',
          '',
          LONG_TEXT,
        ].join('\n')
      );
    });

    it('reads an unchunked record stored under the plain id', async () => {
      await store.upsert([
        {
          id: 'legacy',
          values: [1, 0, 0, 0, 0, 0, 0, 0],
          metadata: { title: 'Old', content: 'Legacy body' },
        },
      ]);

      const result = await readDocumentTool.call({ document_id: 'legacy' }, store);

      expect(textOf(result)).toBe('Document: legacy\nTitle: Old\nChunks: 1\n\nLegacy body');
    });

    it('reports missing chunks', async () => {
      await processDocumentTool.call({ document_id: 'doc-1', text: LONG_TEXT }, store);
      store.namespaces.get('')?.delete('doc-1#chunk1');

      const result = await readDocumentTool.call({ document_id: 'doc-1' }, store);

      const chunksLine = textOf(result)
        .split('\n')
        .find((line) => line.startsWith('Chunks:'));
      expect(chunksLine).toBe('Chunks: 1 of 2 (some chunks are missing)');
    });

    it('returns a not-found message for unknown ids', async () => {
      const result = await readDocumentTool.call({ document_id: 'missing' }, store);
      expect(result.isError).toBeUndefined();
      expect(textOf(result)).toBe('Document not found: missing');
    });
  });

  describe('semantic-search', () => {
    beforeEach(async () => {
      await processDocumentTool.call(
        {
          document_id: 'doc-a',
          text: 'alpha alpha alpha',
          title: 'Alpha doc',
          metadata: { category: 'greek', tags: ['letters'] },
        },
        store
      );
      await processDocumentTool.call(
        { document_id: 'doc-b', text: 'zzzz yyyy', metadata: { category: 'other' } },
        store
      );
      store.embedCalls.length = 0;
    });

    it('ranks the closest chunk first and embeds the query as a query', async () => {
      const result = await semanticSearchTool.call({ query: 'alpha' }, store);
      const lines = textOf(result).split('\n');

      expect(lines[0]).toBe('Found 2 result(s) for "alpha":');
      expect(lines[2]).toBe('1. Alpha doc (document: doc-a, score: 1.0000)');
      expect(lines[3]).toBe('   alpha alpha alpha');
      expect(store.embedCalls).toEqual([{ texts: ['alpha'], inputType: 'query' }]);
      expect(store.queries[0].topK).toBe(10);
      expect(store.queries[0].filter).toBeUndefined();
    });

    it('applies the category filter', async () => {
      const result = await semanticSearchTool.call({ query: 'alpha', category: 'other' }, store);

      expect(textOf(result).split('\n')[0]).toBe('Found 1 result(s) for "alpha":');
      expect(store.queries[0].filter).toEqual({ category: { $eq: 'other' } });
    });

    it('combines tags and date range into an $and filter', async () => {
      await semanticSearchTool.call(
        {
          query: 'alpha',
          tags: ['letters'],
          date_range: { start: '2024-01-01T00:00:00Z' },
        },
        store
      );

      expect(store.queries[0].filter).toEqual({
        $and: [{ tags: { $in: ['letters'] } }, { timestamp: { $gte: 1704067200 } }],
      });
    });

    it('says so when nothing matches', async () => {
      const result = await semanticSearchTool.call({ query: 'alpha', category: 'none' }, store);
      expect(textOf(result)).toBe('No results found for "alpha".');
    });

    it('validates arguments', async () => {
      const empty = await semanticSearchTool.call({ query: '   ' }, store);
      expect(empty.isError).toBe(true);
      expect(textOf(empty)).toBe('Invalid arguments for semantic-search: query: query cannot be empty');

      const badTopK = await semanticSearchTool.call({ query: 'alpha', top_k: 0 }, store);
      expect(textOf(badTopK)).toBe(
        'Invalid arguments for semantic-search: top_k: Number must be greater than or equal to 1'
      );
    });

    it('rejects unsupported metadata filter operators', async () => {
      const result = await semanticSearchTool.call(
        { query: 'alpha', metadata_filter: { title: { $regex: 'Al' } } },
        store
      );
      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe(
        'Invalid metadata_filter: Unsupported filter operator "$regex" at "title".'
      );
    });

    it('degrades store failures to a text result', async () => {
      store.embed = async () => {
        throw new Error('embedding service down');
      };

      const result = await semanticSearchTool.call({ query: 'alpha' }, store);
      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe('Semantic search failed. See the server logs for details.');

      setLogLevel('DEBUG');
      const detailed = await semanticSearchTool.call({ query: 'alpha' }, store);
      expect(textOf(detailed)).toBe('Semantic search failed: embedding service down');
    });
  });

  describe('list-documents', () => {
    it('lists each document once with its chunk count', async () => {
      await processDocumentTool.call(
        { document_id: 'doc-1', text: LONG_TEXT, title: 'Vector notes' },
        store
      );
      await processDocumentTool.call({ document_id: 'doc-2', text: 'Short body' }, store);

      const result = await listDocumentsTool.call({}, store);

      expect(textOf(result)).toBe(
        [
          'Found 2 document(s) in namespace "default":',
          '- doc-1: Vector notes (2 chunk(s))',
          '- doc-2 (1 chunk(s))',
        ].join('\n')
      );
      expect(store.queries[0].vector).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
      expect(store.queries[0].topK).toBe(100);
    });

    it('reports an empty namespace', async () => {
      const result = await listDocumentsTool.call({ namespace: 'empty' }, store);
      expect(textOf(result)).toBe('No documents found in namespace "empty".');
    });
  });

  describe('pinecone-stats', () => {
    it('summarizes the index', async () => {
      await processDocumentTool.call({ document_id: 'doc-1', text: LONG_TEXT }, store);
      await processDocumentTool.call(
        { document_id: 'doc-x', text: 'Elsewhere', namespace: 'ns2' },
        store
      );

      const result = await pineconeStatsTool.call({}, store);

      expect(JSON.parse(textOf(result))).toEqual({
        dimension: 8,
        total_record_count: 3,
        index_fullness: 0,
        namespace_count: 2,
        namespaces: {
          '': { record_count: 2 },
          ns2: { record_count: 1 },
        },
      });
    });
  });
});
