import { z } from 'zod';
import { DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT } from '../../constants.js';
import type { StoreMatch } from '../../types.js';
import { defineTool } from '../define-tool.js';
import { getDocumentId } from '../reassemble-documents.js';
import { textResponse } from '../tool-response.js';

const argsSchema = z.object({
  namespace: z.string().optional(),
  limit: z.number().int().min(1).max(MAX_LIST_LIMIT).default(DEFAULT_LIST_LIMIT),
});

export interface DocumentSummary {
  document_id: string;
  title: string;
  chunk_count: number;
}

/** Group sampled chunk records by document, in order of first appearance. */
export function summarizeDocuments(matches: StoreMatch[]): DocumentSummary[] {
  const byId = new Map<string, DocumentSummary>();
  for (const match of matches) {
    const documentId = getDocumentId(match);
    const title = match.metadata['title'];
    const declared = match.metadata['chunk_count'];
    const existing = byId.get(documentId);
    if (existing) {
      if (typeof declared !== 'number') existing.chunk_count += 1;
      if (!existing.title && typeof title === 'string') existing.title = title;
      continue;
    }
    byId.set(documentId, {
      document_id: documentId,
      title: typeof title === 'string' ? title : '',
      chunk_count: typeof declared === 'number' ? declared : 1,
    });
  }
  return [...byId.values()];
}

export const listDocumentsTool = defineTool({
  definition: {
    name: 'list-documents',
    description:
      'List stored documents in a namespace with their titles and chunk counts. ' +
      'Samples up to `limit` chunk records, so very large namespaces may be listed partially.',
    inputSchema: {
      type: 'object',
      properties: {
        namespace: { type: 'string', description: 'Pinecone namespace to list' },
        limit: {
          type: 'integer',
          minimum: 1,
          maximum: MAX_LIST_LIMIT,
          default: DEFAULT_LIST_LIMIT,
          description: `Maximum chunk records to sample (1-${MAX_LIST_LIMIT})`,
        },
      },
      additionalProperties: false,
    },
  },
  argsSchema,
  failureMessage: 'Failed to list documents',
  async run(args, store) {
    const stats = await store.describeStats();
    if (stats.dimension === undefined) {
      throw new Error('Index did not report its dimension');
    }

    const matches = await store.query({
      vector: Array<number>(stats.dimension).fill(0),
      topK: args.limit,
      namespace: args.namespace,
    });
    const documents = summarizeDocuments(matches);
    const namespace = args.namespace ?? 'default';

    if (documents.length === 0) {
      return textResponse(`No documents found in namespace "${namespace}".`);
    }

    const lines = documents.map((doc) => {
      const title = doc.title ? `: ${doc.title}` : '';
      return `- ${doc.document_id}${title} (${doc.chunk_count} chunk(s))`;
    });
    return textResponse(
      `Found ${documents.length} document(s) in namespace "${namespace}":\n${lines.join('\n')}`
    );
  },
});
