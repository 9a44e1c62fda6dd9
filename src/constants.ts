/**
 * Constants for the Pinecone Document MCP Gateway
 */

export const DEFAULT_INDEX_NAME = 'mcp-documents';
/** Pinecone-hosted embedding model; must produce vectors matching the index dimension. */
export const DEFAULT_EMBEDDING_MODEL = 'multilingual-e5-large';
export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = '0.0.0.0';
/** Interval between SSE heartbeat events. */
export const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;

export const DEFAULT_TOP_K = 10;
export const MIN_TOP_K = 1;
export const MAX_TOP_K = 100;

export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 1000;

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;
/** Pinecone inference accepts at most 96 inputs per embed request. */
export const EMBED_BATCH_SIZE = 96;
export const UPSERT_BATCH_SIZE = 100;
export const FETCH_BATCH_SIZE = 100;
/** Characters of chunk text shown per semantic-search hit. */
export const SNIPPET_LENGTH = 300;

export const SERVER_NAME = 'pinecone-document-mcp-gateway';
export const SERVER_VERSION = '0.1.0';

export const STORE_UNAVAILABLE_MESSAGE =
  'Pinecone is not available: the client failed to initialize. Check PINECONE_API_KEY and PINECONE_INDEX_NAME.';
