import { z } from 'zod';
import type { DocumentMetadata, StoreRecord } from '../../types.js';
import { chunkText } from '../chunk-text.js';
import { defineTool } from '../define-tool.js';
import { CHUNK_ID_SEPARATOR, CHUNK_METADATA_KEYS, chunkId } from '../reassemble-documents.js';
import { textErrorResponse, textResponse } from '../tool-response.js';

const metadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

const argsSchema = z.object({
  document_id: z
    .string()
    .trim()
    .min(1, 'document_id cannot be empty')
    .refine((id) => !id.includes(CHUNK_ID_SEPARATOR), `document_id cannot contain "${CHUNK_ID_SEPARATOR}"`),
  text: z.string().refine((text) => text.trim().length > 0, 'text cannot be empty'),
  title: z.string().optional(),
  metadata: z.record(z.string(), metadataValueSchema).optional(),
  namespace: z.string().optional(),
});

/**
 * Unix seconds used by semantic-search date_range: an explicit numeric `timestamp`,
 * else a parseable `date`, else now.
 */
export function resolveTimestamp(metadata: DocumentMetadata): number {
  const timestamp = metadata['timestamp'];
  if (typeof timestamp === 'number' && Number.isFinite(timestamp)) {
    return timestamp;
  }
  const date = metadata['date'];
  if (typeof date === 'string' && !Number.isNaN(Date.parse(date))) {
    return Math.floor(Date.parse(date) / 1000);
  }
  return Math.floor(Date.now() / 1000);
}

export const processDocumentTool = defineTool({
  definition: {
    name: 'process-document',
    description:
      'Store a document for later search. The text is split into overlapping chunks, each chunk is ' +
      'embedded with the configured Pinecone model and upserted with the document id, title and metadata. ' +
      'Re-processing a document id overwrites its chunks; read-document only returns chunks of the latest version.',
    inputSchema: {
      type: 'object',
      properties: {
        document_id: { type: 'string', description: 'Unique identifier of the document' },
        text: { type: 'string', description: 'Full document text' },
        title: { type: 'string', description: 'Human-readable title' },
        metadata: {
          type: 'object',
          description:
            'Extra metadata (string, number, boolean or string[] values). ' +
            'Use "category", "tags" and "date" to enable the semantic-search filters.',
          additionalProperties: {
            anyOf: [
              { type: 'string' },
              { type: 'number' },
              { type: 'boolean' },
              { type: 'array', items: { type: 'string' } },
            ],
          },
        },
        namespace: { type: 'string', description: 'Pinecone namespace to store the document in' },
      },
      required: ['document_id', 'text'],
      additionalProperties: false,
    },
  },
  argsSchema,
  failureMessage: 'Failed to process document',
  async run(args, store) {
    const chunks = chunkText(args.text);
    if (chunks.length === 0) {
      return textErrorResponse('Document text is empty');
    }

    const callerMetadata: DocumentMetadata = { ...(args.metadata ?? {}) };
    const reserved: readonly string[] = CHUNK_METADATA_KEYS;
    for (const key of Object.keys(callerMetadata)) {
      if (reserved.includes(key)) delete callerMetadata[key];
    }
    const title = args.title ?? '';
    const timestamp = resolveTimestamp(callerMetadata);

    const vectors = await store.embed(
      chunks.map((chunk) => chunk.text),
      'passage'
    );

    const records: StoreRecord[] = chunks.map((chunk, i) => ({
      id: chunkId(args.document_id, i),
      values: vectors[i],
      metadata: {
        ...callerMetadata,
        timestamp,
        document_id: args.document_id,
        title,
        text: chunk.text,
        chunk_index: i,
        chunk_count: chunks.length,
        chunk_start: chunk.start,
        chunk_end: chunk.end,
      },
    }));

    await store.upsert(records, args.namespace);

    return textResponse(
      `Processed document "${args.document_id}": ${records.length} chunk(s) embedded and stored ` +
        `in namespace "${args.namespace ?? 'default'}".`
    );
  },
});
