import type { GatewayTool } from '../define-tool.js';
import { listDocumentsTool } from './list-documents-tool.js';
import { pineconeStatsTool } from './pinecone-stats-tool.js';
import { processDocumentTool } from './process-document-tool.js';
import { readDocumentTool } from './read-document-tool.js';
import { semanticSearchTool } from './semantic-search-tool.js';

/** The fixed tool table, in the order tools/list reports it. */
export const GATEWAY_TOOLS: readonly GatewayTool[] = [
  semanticSearchTool,
  processDocumentTool,
  listDocumentsTool,
  readDocumentTool,
  pineconeStatsTool,
];
