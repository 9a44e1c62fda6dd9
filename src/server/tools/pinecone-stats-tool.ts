import { z } from 'zod';
import { defineTool } from '../define-tool.js';
import { jsonResponse } from '../tool-response.js';

export const pineconeStatsTool = defineTool({
  definition: {
    name: 'pinecone-stats',
    description:
      'Show Pinecone index statistics: vector dimension, total record count, index fullness and per-namespace record counts.',
    inputSchema: {
      type: 'object',
      properties: {},
      additionalProperties: false,
    },
  },
  argsSchema: z.object({}),
  failureMessage: 'Failed to get index statistics',
  async run(_args, store) {
    const stats = await store.describeStats();
    const namespaces: Record<string, { record_count: number }> = {};
    for (const [name, summary] of Object.entries(stats.namespaces)) {
      namespaces[name] = { record_count: summary.recordCount };
    }
    return jsonResponse({
      dimension: stats.dimension ?? null,
      total_record_count: stats.totalRecordCount,
      index_fullness: stats.indexFullness ?? null,
      namespace_count: Object.keys(namespaces).length,
      namespaces,
    });
  },
});
