#!/usr/bin/env node

/**
 * Pinecone Document MCP Gateway CLI
 *
 * Entry point for the HTTP gateway. Loads configuration, creates the Pinecone
 * document store once, and serves the JSON-RPC façade until interrupted.
 */

import * as dotenv from 'dotenv';
import type { Server } from 'node:http';
import { loadConfig, parseArgs } from './config.js';
import type { GatewayConfig } from './config.js';
import {
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_HOST,
  DEFAULT_INDEX_NAME,
  DEFAULT_PORT,
  STORE_UNAVAILABLE_MESSAGE,
} from './constants.js';
import { error as logError, info as logInfo, setLogLevel, warn as logWarn } from './logger.js';
import { createPineconeDocumentStore } from './pinecone-client.js';
import { createGateway, listen } from './server.js';
import type { DocumentStore } from './types.js';

// Load environment variables
dotenv.config();

function printHelp(): void {
  console.log(`
Pinecone Document MCP Gateway

Usage: pinecone-document-mcp-gateway [options]

Options:
  --api-key TEXT          Pinecone API key (or set PINECONE_API_KEY env var)
  --index-name TEXT       Pinecone index name [default: ${DEFAULT_INDEX_NAME}]
  --embedding-model TEXT  Pinecone inference model [default: ${DEFAULT_EMBEDDING_MODEL}]
  --port NUMBER           HTTP port [default: ${DEFAULT_PORT}]
  --host TEXT             Bind address [default: ${DEFAULT_HOST}]
  --heartbeat-ms NUMBER   SSE heartbeat interval [default: ${DEFAULT_HEARTBEAT_INTERVAL_MS}]
  --log-level TEXT        DEBUG, INFO, WARN or ERROR [default: INFO]
  --help, -h              Show this help message

Environment Variables:
  PINECONE_API_KEY          Pinecone API key
  PINECONE_INDEX_NAME       Pinecone index name
  PINECONE_EMBEDDING_MODEL  Embedding model name
  PORT, HOST                HTTP bind settings
  SSE_HEARTBEAT_MS          SSE heartbeat interval in milliseconds
  PINECONE_MCP_LOG_LEVEL    Logging level (LOG_LEVEL is also read)

Examples:
  # Using environment variables
  export PINECONE_API_KEY=YOUR_API_KEY
  pinecone-document-mcp-gateway

  # Custom index and port
  pinecone-document-mcp-gateway --api-key YOUR_API_KEY --index-name my-index --port 8080
`);
}

/** The gateway still starts without a store; tools/call then reports the reason. */
function createStore(config: GatewayConfig): { store: DocumentStore | null; reason?: string } {
  if (!config.apiKey) {
    logWarn('PINECONE_API_KEY is not set; tools/call will report Pinecone as unavailable');
    return { store: null, reason: STORE_UNAVAILABLE_MESSAGE };
  }
  try {
    return {
      store: createPineconeDocumentStore(config.apiKey, {
        indexName: config.indexName,
        embeddingModel: config.embeddingModel,
      }),
    };
  } catch (error) {
    logError('Failed to initialize Pinecone client', error);
    const detail = error instanceof Error ? error.message : String(error);
    return { store: null, reason: `Pinecone is not available: ${detail}` };
  }
}

async function main(): Promise<void> {
  try {
    const options = parseArgs(process.argv.slice(2));
    if (options.help) {
      printHelp();
      process.exit(0);
    }

    const config = loadConfig(options);
    setLogLevel(config.logLevel);

    const { store, reason } = createStore(config);
    const gateway = createGateway({
      store,
      unavailableMessage: reason,
      heartbeatIntervalMs: config.heartbeatIntervalMs,
    });

    const server: Server = await listen(gateway.app, config.port, config.host);

    logInfo(`Pinecone Document MCP Gateway listening on http://${config.host}:${config.port}`);
    logInfo(`Using Pinecone index: ${config.indexName} (model ${config.embeddingModel})`);
    logInfo(`Log level: ${config.logLevel}`);

    const shutdown = (signal: string): void => {
      logInfo(`Received ${signal}, shutting down`);
      gateway.closeStreams();
      server.close((err) => {
        if (err) {
          logError('Error while closing HTTP server', err);
          process.exit(1);
        }
        process.exit(0);
      });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logError('Fatal error in main()', error);
    process.exit(1);
  }
}

void main();
