import { z } from 'zod';
import type { DocumentChunk, StoreMatch } from '../../types.js';
import { defineTool } from '../define-tool.js';
import { chunkId, reassembleByDocument } from '../reassemble-documents.js';
import { textResponse } from '../tool-response.js';

const argsSchema = z.object({
  document_id: z.string().trim().min(1, 'document_id cannot be empty'),
  namespace: z.string().optional(),
});

function toChunk(match: StoreMatch): DocumentChunk {
  const text = match.metadata['text'] ?? match.metadata['content'];
  return {
    id: match.id,
    content: typeof text === 'string' ? text : '',
    score: match.score,
    metadata: match.metadata,
  };
}

export const readDocumentTool = defineTool({
  definition: {
    name: 'read-document',
    description:
      'Read a stored document by id. Fetches its chunks and returns the reassembled text with title and metadata.',
    inputSchema: {
      type: 'object',
      properties: {
        document_id: { type: 'string', description: 'Identifier used when the document was processed' },
        namespace: { type: 'string', description: 'Pinecone namespace holding the document' },
      },
      required: ['document_id'],
      additionalProperties: false,
    },
  },
  argsSchema,
  failureMessage: 'Failed to read document',
  async run(args, store) {
    const { document_id: documentId, namespace } = args;
    const firstId = chunkId(documentId, 0);
    const initial = await store.fetch([documentId, firstId], namespace);
    const head = initial.get(firstId);

    let records: StoreMatch[];
    let expected: number;
    if (head) {
      const declared = head.metadata['chunk_count'];
      expected = typeof declared === 'number' && declared > 0 ? declared : 1;
      const restIds = Array.from({ length: expected - 1 }, (_, i) => chunkId(documentId, i + 1));
      const rest =
        restIds.length > 0
          ? await store.fetch(restIds, namespace)
          : new Map<string, StoreMatch>();
      records = [head, ...restIds.flatMap((id) => rest.get(id) ?? [])];
    } else {
      const whole = initial.get(documentId);
      if (!whole) {
        return textResponse(`Document not found: ${documentId}`);
      }
      records = [whole];
      expected = 1;
    }

    const [document] = reassembleByDocument(records.map(toChunk));
    const lines = [`Document: ${documentId}`];
    if (document.title) lines.push(`Title: ${document.title}`);
    if (Object.keys(document.metadata).length > 0) {
      lines.push(`Metadata: ${JSON.stringify(document.metadata)}`);
    }
    lines.push(
      records.length === expected
        ? `Chunks: ${records.length}`
        : `Chunks: ${records.length} of ${expected} (some chunks are missing)`
    );

    return textResponse(`${lines.join('\n')}\n\n${document.content}`);
  },
});
