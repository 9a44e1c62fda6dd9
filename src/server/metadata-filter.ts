import { z } from 'zod';

// Recursive Zod schema for Pinecone metadata filters
// Supports nested objects with operators like {"timestamp": {"$gte": 1704067200}}
const metadataFilterValueSchema: z.ZodType<unknown> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.array(z.string()),
    z.array(z.number()),
    z.record(z.string(), metadataFilterValueSchema),
  ])
);

export const metadataFilterSchema = z.record(z.string(), metadataFilterValueSchema);

const ALLOWED_FILTER_OPERATORS = new Set(['$eq', '$ne', '$gt', '$gte', '$lt', '$lte', '$in', '$nin']);

function isPrimitiveFilterValue(value: unknown): boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isPrimitiveArray(value: unknown): boolean {
  return Array.isArray(value) && value.every((item) => isPrimitiveFilterValue(item));
}

function validateMetadataFilterValue(value: unknown, path: string[]): string | null {
  if (value === null || value === undefined) {
    return `Invalid null/undefined at "${path.join('.')}".`;
  }

  if (isPrimitiveFilterValue(value) || isPrimitiveArray(value)) {
    return null;
  }

  if (typeof value !== 'object' || Array.isArray(value)) {
    return `Unsupported filter value at "${path.join('.')}".`;
  }

  for (const [key, nestedValue] of Object.entries(value)) {
    if (key.startsWith('$')) {
      if (!ALLOWED_FILTER_OPERATORS.has(key)) {
        return `Unsupported filter operator "${key}" at "${path.join('.')}".`;
      }
      if ((key === '$in' || key === '$nin') && !isPrimitiveArray(nestedValue)) {
        return `Operator "${key}" at "${path.join('.')}" must use an array of primitive values.`;
      }
    }

    const nestedError = validateMetadataFilterValue(nestedValue, [...path, key]);
    if (nestedError) {
      return nestedError;
    }
  }

  return null;
}

/** Return a description of the first problem in a caller-supplied filter, or null when valid. */
export function validateMetadataFilter(filter: Record<string, unknown>): string | null {
  for (const [field, value] of Object.entries(filter)) {
    if (field.startsWith('$')) {
      return `Top-level operator "${field}" is not supported; list field conditions instead.`;
    }
    const error = validateMetadataFilterValue(value, [field]);
    if (error) return error;
  }
  return null;
}

export interface SearchFilterOptions {
  category?: string;
  tags?: string[];
  /** Bounds in Unix seconds, matched against the numeric `timestamp` metadata field. */
  dateRange?: { start?: number; end?: number };
  metadataFilter?: Record<string, unknown>;
}

/**
 * Combine the semantic-search convenience arguments into one Pinecone filter.
 * Several conditions are joined with `$and`; none yields undefined.
 */
export function buildSearchFilter(options: SearchFilterOptions): Record<string, unknown> | undefined {
  const conditions: Record<string, unknown>[] = [];

  if (options.category) {
    conditions.push({ category: { $eq: options.category } });
  }
  if (options.tags && options.tags.length > 0) {
    conditions.push({ tags: { $in: options.tags } });
  }
  const range: Record<string, number> = {};
  if (options.dateRange?.start !== undefined) range['$gte'] = options.dateRange.start;
  if (options.dateRange?.end !== undefined) range['$lte'] = options.dateRange.end;
  if (Object.keys(range).length > 0) {
    conditions.push({ timestamp: range });
  }
  if (options.metadataFilter && Object.keys(options.metadataFilter).length > 0) {
    conditions.push(options.metadataFilter);
  }

  if (conditions.length === 0) return undefined;
  if (conditions.length === 1) return conditions[0];
  return { $and: conditions };
}
