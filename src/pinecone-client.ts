/**
 * Pinecone document store.
 *
 * Adapts a Pinecone serverless index plus Pinecone inference to the DocumentStore
 * interface: embedding, upsert, similarity query, fetch by id and index statistics.
 * The SDK client is created once per process; the index dimension is read lazily
 * and cached for embedding validation.
 */

import { Pinecone } from '@pinecone-database/pinecone';
import { EMBED_BATCH_SIZE, FETCH_BATCH_SIZE, UPSERT_BATCH_SIZE } from './constants.js';
import { scoped } from './logger.js';
import type {
  DocumentMetadata,
  DocumentStore,
  EmbeddingApi,
  EmbeddingInputType,
  PineconeDocumentStoreConfig,
  PineconeMetadataValue,
  StoreMatch,
  StoreQuery,
  StoreRecord,
  StoreStats,
  VectorIndex,
} from './types.js';

const log = scoped('pinecone');

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

function isMetadataValue(value: unknown): value is PineconeMetadataValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return true;
  }
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/** Drop metadata values Pinecone cannot store (null, nested objects). */
export function toDocumentMetadata(metadata: Record<string, unknown> | undefined): DocumentMetadata {
  const out: DocumentMetadata = {};
  for (const [key, value] of Object.entries(metadata ?? {})) {
    if (isMetadataValue(value)) {
      out[key] = value;
    }
  }
  return out;
}

function batches<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

export class PineconeDocumentStore implements DocumentStore {
  private readonly indexName: string;
  private readonly embeddingModel: string;
  private dimension: number | null = null;

  constructor(
    private readonly indexFor: (namespace?: string) => VectorIndex,
    private readonly inference: EmbeddingApi,
    config: PineconeDocumentStoreConfig
  ) {
    this.indexName = config.indexName;
    this.embeddingModel = config.embeddingModel;
  }

  /**
   * Generate embeddings with Pinecone inference, batched to the API's input limit.
   * Every vector must match the index dimension; mismatches are rejected rather than padded.
   */
  async embed(texts: string[], inputType: EmbeddingInputType): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const vectors: number[][] = [];
    for (const batch of batches(texts, EMBED_BATCH_SIZE)) {
      let response: { data?: object[] };
      try {
        response = await this.inference.embed(this.embeddingModel, batch, {
          inputType,
          truncate: 'END',
        });
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        throw new Error(`Embedding with model "${this.embeddingModel}" failed: ${errorMessage}`);
      }

      const data = response.data ?? [];
      if (data.length !== batch.length) {
        throw new Error(
          `Embedding model "${this.embeddingModel}" returned ${data.length} vector(s) for ${batch.length} input(s)`
        );
      }
      for (const item of data) {
        const values = 'values' in item ? item.values : undefined;
        if (!isNumberArray(values) || values.length === 0) {
          throw new Error(`Embedding model "${this.embeddingModel}" returned no dense vector`);
        }
        vectors.push(values);
      }
    }

    const dimension = await this.getDimension();
    const wrong = vectors.find((v) => v.length !== dimension);
    if (wrong) {
      throw new Error(
        `Embedding dimension ${wrong.length} from model "${this.embeddingModel}" does not match ` +
          `index "${this.indexName}" dimension ${dimension}`
      );
    }

    log.debug(`Embedded ${texts.length} ${inputType} input(s)`);
    return vectors;
  }

  async upsert(records: StoreRecord[], namespace?: string): Promise<void> {
    const index = this.indexFor(namespace);
    for (const batch of batches(records, UPSERT_BATCH_SIZE)) {
      await index.upsert(
        batch.map((record) => ({
          id: record.id,
          values: record.values,
          metadata: record.metadata,
        }))
      );
    }
    log.info(`Upserted ${records.length} record(s) into namespace "${namespace ?? 'default'}"`);
  }

  async query(params: StoreQuery): Promise<StoreMatch[]> {
    const index = this.indexFor(params.namespace);
    const response = await index.query({
      vector: params.vector,
      topK: params.topK,
      filter: params.filter,
      includeMetadata: true,
      includeValues: false,
    });
    return (response.matches ?? []).map((match) => ({
      id: match.id,
      score: match.score ?? 0,
      metadata: toDocumentMetadata(match.metadata),
    }));
  }

  async fetch(ids: string[], namespace?: string): Promise<Map<string, StoreMatch>> {
    const index = this.indexFor(namespace);
    const found = new Map<string, StoreMatch>();
    for (const batch of batches(ids, FETCH_BATCH_SIZE)) {
      const response = await index.fetch(batch);
      for (const [id, record] of Object.entries(response.records ?? {})) {
        found.set(id, { id, score: 1, metadata: toDocumentMetadata(record.metadata) });
      }
    }
    return found;
  }

  async describeStats(): Promise<StoreStats> {
    const stats = await this.indexFor().describeIndexStats();
    const namespaces: Record<string, { recordCount: number }> = {};
    for (const [name, summary] of Object.entries(stats.namespaces ?? {})) {
      namespaces[name] = { recordCount: summary.recordCount ?? 0 };
    }
    if (typeof stats.dimension === 'number') {
      this.dimension = stats.dimension;
    }
    return {
      dimension: stats.dimension,
      totalRecordCount: stats.totalRecordCount ?? 0,
      indexFullness: stats.indexFullness,
      namespaces,
    };
  }

  private async getDimension(): Promise<number> {
    if (this.dimension !== null) {
      return this.dimension;
    }
    const stats = await this.describeStats();
    if (stats.dimension === undefined) {
      throw new Error(`Index "${this.indexName}" did not report its dimension`);
    }
    return stats.dimension;
  }
}

/**
 * Build the store against the hosted Pinecone service.
 * Only constructs the SDK client; no network call is made until a tool runs.
 */
export function createPineconeDocumentStore(
  apiKey: string,
  config: PineconeDocumentStoreConfig
): PineconeDocumentStore {
  if (!apiKey) {
    throw new Error(
      'Pinecone API key is required. Set PINECONE_API_KEY environment variable or pass --api-key.'
    );
  }
  const pc = new Pinecone({ apiKey });
  const index = pc.index(config.indexName);
  log.info(`Pinecone client initialized for index ${config.indexName}`);

  return new PineconeDocumentStore(
    (namespace) => (namespace ? index.namespace(namespace) : index),
    pc.inference,
    config
  );
}
