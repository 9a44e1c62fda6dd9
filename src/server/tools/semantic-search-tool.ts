import { z } from 'zod';
import { DEFAULT_TOP_K, MAX_TOP_K, MIN_TOP_K, SNIPPET_LENGTH } from '../../constants.js';
import type { StoreMatch } from '../../types.js';
import { defineTool } from '../define-tool.js';
import { buildSearchFilter, metadataFilterSchema, validateMetadataFilter } from '../metadata-filter.js';
import { getDocumentId } from '../reassemble-documents.js';
import { textErrorResponse, textResponse } from '../tool-response.js';

const isoDate = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'must be an ISO-8601 date')
  .transform((value) => Math.floor(Date.parse(value) / 1000));

const argsSchema = z.object({
  query: z.string().trim().min(1, 'query cannot be empty'),
  top_k: z.number().int().min(MIN_TOP_K).max(MAX_TOP_K).default(DEFAULT_TOP_K),
  namespace: z.string().optional(),
  category: z.string().optional(),
  tags: z.array(z.string()).optional(),
  date_range: z.object({ start: isoDate.optional(), end: isoDate.optional() }).optional(),
  metadata_filter: metadataFilterSchema.optional(),
});

/** Collapse whitespace and cut to SNIPPET_LENGTH characters. */
export function snippet(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > SNIPPET_LENGTH ? `${flat.slice(0, SNIPPET_LENGTH)}...` : flat;
}

export function formatMatch(match: StoreMatch, rank: number): string {
  const documentId = getDocumentId(match);
  const title = match.metadata['title'];
  const text = match.metadata['text'];
  const heading = typeof title === 'string' && title ? title : documentId;
  const lines = [`${rank}. ${heading} (document: ${documentId}, score: ${match.score.toFixed(4)})`];
  if (typeof text === 'string' && text.trim()) {
    lines.push(`   ${snippet(text)}`);
  }
  return lines.join('\n');
}

export const semanticSearchTool = defineTool({
  definition: {
    name: 'semantic-search',
    description:
      'Search stored documents by meaning. Embeds the query with the configured Pinecone model and ' +
      'returns the closest chunks with their document id, title, score and a snippet. ' +
      'Optionally narrow by category, tags, a date range on the document timestamp, or a raw metadata filter.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Natural-language search query' },
        top_k: {
          type: 'integer',
          minimum: MIN_TOP_K,
          maximum: MAX_TOP_K,
          default: DEFAULT_TOP_K,
          description: `Number of results to return (${MIN_TOP_K}-${MAX_TOP_K})`,
        },
        namespace: { type: 'string', description: 'Pinecone namespace to search' },
        category: { type: 'string', description: 'Only match documents with this category' },
        tags: {
          type: 'array',
          items: { type: 'string' },
          description: 'Only match documents carrying at least one of these tags',
        },
        date_range: {
          type: 'object',
          properties: {
            start: { type: 'string', format: 'date-time', description: 'Inclusive lower bound' },
            end: { type: 'string', format: 'date-time', description: 'Inclusive upper bound' },
          },
          additionalProperties: false,
        },
        metadata_filter: {
          type: 'object',
          description:
            'Pinecone metadata filter, e.g. {"author": {"$eq": "Ada"}}. ' +
            'Operators: $eq, $ne, $gt, $gte, $lt, $lte, $in, $nin.',
        },
      },
      required: ['query'],
      additionalProperties: false,
    },
  },
  argsSchema,
  failureMessage: 'Semantic search failed',
  async run(args, store) {
    if (args.metadata_filter) {
      const err = validateMetadataFilter(args.metadata_filter);
      if (err) return textErrorResponse(`Invalid metadata_filter: ${err}`);
    }

    const [vector] = await store.embed([args.query], 'query');
    const matches = await store.query({
      vector,
      topK: args.top_k,
      namespace: args.namespace,
      filter: buildSearchFilter({
        category: args.category,
        tags: args.tags,
        dateRange: args.date_range,
        metadataFilter: args.metadata_filter,
      }),
    });

    if (matches.length === 0) {
      return textResponse(`No results found for "${args.query}".`);
    }

    const body = matches.map((match, i) => formatMatch(match, i + 1)).join('\n\n');
    return textResponse(`Found ${matches.length} result(s) for "${args.query}":\n\n${body}`);
  },
});
