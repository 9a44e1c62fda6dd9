/**
 * Runtime configuration: CLI flags override environment variables (loaded from .env),
 * which override built-in defaults.
 */

import { z } from 'zod';
import {
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_HOST,
  DEFAULT_INDEX_NAME,
  DEFAULT_PORT,
} from './constants.js';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CLIOptions {
  apiKey?: string;
  indexName?: string;
  embeddingModel?: string;
  port?: string;
  host?: string;
  logLevel?: string;
  heartbeatMs?: string;
  help?: boolean;
}

export interface GatewayConfig {
  /** Absent when no key was supplied; the gateway then runs with the store unavailable. */
  apiKey?: string;
  indexName: string;
  embeddingModel: string;
  port: number;
  host: string;
  logLevel: LogLevel;
  heartbeatIntervalMs: number;
}

type Env = Record<string, string | undefined>;

const portSchema = z.coerce.number().int().min(0).max(65535);
const heartbeatSchema = z.coerce.number().int().min(1);

/** Parse `--flag value` pairs; unknown flags are ignored. */
export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--api-key':
        options.apiKey = nextArg;
        i++;
        break;
      case '--index-name':
        options.indexName = nextArg;
        i++;
        break;
      case '--embedding-model':
        options.embeddingModel = nextArg;
        i++;
        break;
      case '--port':
        options.port = nextArg;
        i++;
        break;
      case '--host':
        options.host = nextArg;
        i++;
        break;
      case '--log-level':
        options.logLevel = nextArg;
        i++;
        break;
      case '--heartbeat-ms':
        options.heartbeatMs = nextArg;
        i++;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
    }
  }

  return options;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Unknown log levels fall back to INFO rather than failing start-up. */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const upper = (raw ?? '').toUpperCase();
  return isLogLevel(upper) ? upper : 'INFO';
}

function parseNumber(schema: z.ZodNumber, raw: string, label: string): number {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid ${label}: "${raw}"`);
  }
  return result.data;
}

/** Merge CLI options over environment variables and defaults. Throws on malformed numbers. */
export function loadConfig(options: CLIOptions, env: Env = process.env): GatewayConfig {
  const apiKey = options.apiKey || env['PINECONE_API_KEY'] || undefined;
  const rawPort = options.port || env['PORT'] || String(DEFAULT_PORT);
  const rawHeartbeat =
    options.heartbeatMs || env['SSE_HEARTBEAT_MS'] || String(DEFAULT_HEARTBEAT_INTERVAL_MS);

  return {
    apiKey,
    indexName: options.indexName || env['PINECONE_INDEX_NAME'] || DEFAULT_INDEX_NAME,
    embeddingModel:
      options.embeddingModel || env['PINECONE_EMBEDDING_MODEL'] || DEFAULT_EMBEDDING_MODEL,
    port: parseNumber(portSchema, rawPort, 'port'),
    host: options.host || env['HOST'] || DEFAULT_HOST,
    logLevel: resolveLogLevel(
      options.logLevel || env['PINECONE_MCP_LOG_LEVEL'] || env['LOG_LEVEL']
    ),
    heartbeatIntervalMs: parseNumber(heartbeatSchema, rawHeartbeat, 'heartbeat interval'),
  };
}
