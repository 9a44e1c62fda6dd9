/**
 * Types for the Pinecone Document MCP Gateway
 */

import type { PineconeRecord, RecordMetadata } from '@pinecone-database/pinecone';

/** Pinecone metadata value types: string, number, boolean, or list of strings */
export type PineconeMetadataValue = string | number | boolean | string[];

export type DocumentMetadata = Record<string, PineconeMetadataValue>;

/** Pinecone inference distinguishes embeddings for stored passages from those for queries. */
export type EmbeddingInputType = 'passage' | 'query';

export interface StoreRecord {
  id: string;
  values: number[];
  metadata: DocumentMetadata;
}

export interface StoreMatch {
  id: string;
  score: number;
  metadata: DocumentMetadata;
}

export interface StoreQuery {
  vector: number[];
  topK: number;
  filter?: Record<string, unknown>;
  namespace?: string;
}

export interface StoreStats {
  dimension?: number;
  totalRecordCount: number;
  indexFullness?: number;
  namespaces: Record<string, { recordCount: number }>;
}

/**
 * Remote document store consumed by the tools/call handlers.
 * The Pinecone adapter implements it; tests supply an in-memory fake.
 */
export interface DocumentStore {
  embed(texts: string[], inputType: EmbeddingInputType): Promise<number[][]>;
  upsert(records: StoreRecord[], namespace?: string): Promise<void>;
  query(params: StoreQuery): Promise<StoreMatch[]>;
  /** Records that do not exist are absent from the returned map. */
  fetch(ids: string[], namespace?: string): Promise<Map<string, StoreMatch>>;
  describeStats(): Promise<StoreStats>;
}

/** A chunk of stored text, as returned by search or fetch. */
export interface DocumentChunk {
  id: string;
  content: string;
  score: number;
  metadata: DocumentMetadata;
}

/**
 * Subset of the Pinecone SDK index handle used by the adapter. Kept structural so the
 * SDK's `Index` satisfies it and tests can pass a stand-in.
 */
export interface VectorIndex {
  upsert(records: PineconeRecord<RecordMetadata>[]): Promise<void>;
  query(options: {
    vector: number[];
    topK: number;
    filter?: Record<string, unknown>;
    includeMetadata: boolean;
    includeValues: boolean;
  }): Promise<{
    matches?: Array<{ id: string; score?: number; metadata?: Record<string, unknown> }>;
  }>;
  fetch(ids: string[]): Promise<{
    records?: Record<string, { id: string; metadata?: Record<string, unknown> }>;
  }>;
  describeIndexStats(): Promise<{
    dimension?: number;
    indexFullness?: number;
    totalRecordCount?: number;
    namespaces?: Record<string, { recordCount?: number }>;
  }>;
}

/** Subset of the Pinecone inference API used for embedding generation. */
export interface EmbeddingApi {
  embed(
    model: string,
    inputs: string[],
    params?: Record<string, string>
  ): Promise<{ data?: object[] }>;
}

export interface PineconeDocumentStoreConfig {
  indexName: string;
  embeddingModel: string;
}
