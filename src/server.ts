/**
 * Pinecone Document MCP Gateway HTTP surface
 *
 * Express app exposing the service descriptor, health, the static tool list, an SSE
 * heartbeat stream and the JSON-RPC endpoint (POST / and POST /mcp).
 */

import express from 'express';
import type { ErrorRequestHandler, Express, Request, RequestHandler, Response } from 'express';
import type { Server } from 'node:http';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import {
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  SERVER_NAME,
  SERVER_VERSION,
  STORE_UNAVAILABLE_MESSAGE,
} from './constants.js';
import { scoped } from './logger.js';
import type { DocumentStore } from './types.js';
import type { GatewayTool } from './server/define-tool.js';
import { HeartbeatStream } from './server/heartbeat-stream.js';
import { capabilityDescriptor, dispatch, failure, parseErrorReply } from './server/jsonrpc.js';
import { GATEWAY_TOOLS } from './server/tools/index.js';

const log = scoped('http');

const ENDPOINTS = ['GET /', 'GET /health', 'GET /tools', 'GET /sse', 'POST /', 'POST /mcp'];

export interface GatewayOptions {
  /** Remote store; null when the Pinecone client could not be created. */
  store: DocumentStore | null;
  /** Explanation returned by tools/call while the store is null. */
  unavailableMessage?: string;
  heartbeatIntervalMs?: number;
  tools?: readonly GatewayTool[];
  /** Request body size limit passed to express.json. */
  bodyLimit?: string;
}

export interface Gateway {
  app: Express;
  /** Number of SSE clients currently connected. */
  openStreams(): number;
  /** End every SSE stream, e.g. before closing the HTTP server. */
  closeStreams(): void;
}

/** body-parser tags its errors with a `type` such as `entity.parse.failed`. */
function bodyErrorType(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string') {
    return err.type;
  }
  return undefined;
}

const requestLogger: RequestHandler = (req, res, next) => {
  const started = Date.now();
  res.on('finish', () => {
    log.debug(`${req.method} ${req.path} ${res.statusCode}`, { duration_ms: Date.now() - started });
  });
  next();
};

export function createGateway(options: GatewayOptions): Gateway {
  const tools = options.tools ?? GATEWAY_TOOLS;
  const heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
  const dispatchContext = {
    store: options.store,
    tools,
    unavailableMessage: options.unavailableMessage ?? STORE_UNAVAILABLE_MESSAGE,
  };
  const streams = new Map<HeartbeatStream, Response>();
  const startedAt = Date.now();

  const app = express();
  app.disable('x-powered-by');
  app.use(requestLogger);
  // Bodies are JSON-RPC whatever their content type.
  app.use(express.json({ type: () => true, limit: options.bodyLimit ?? '10mb' }));

  app.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      service: SERVER_NAME,
      version: SERVER_VERSION,
      ...capabilityDescriptor(),
      endpoints: ENDPOINTS,
    });
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      pinecone_connected: options.store !== null,
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  app.get('/tools', (_req, res) => {
    res.json({ tools: tools.map((tool) => tool.definition.name) });
  });

  app.get('/sse', (_req, res) => {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });

    const stream = new HeartbeatStream((chunk) => res.write(chunk), heartbeatIntervalMs);
    streams.set(stream, res);
    stream.start([{ type: 'connection', status: 'connected' }, capabilityDescriptor()]);
    log.debug(`SSE client connected (${streams.size} open)`);

    res.on('close', () => {
      stream.stop();
      streams.delete(stream);
      log.debug(`SSE client disconnected (${streams.size} open)`);
    });
  });

  const handleRpc = async (req: Request, res: Response): Promise<void> => {
    const reply = await dispatch(req.body, dispatchContext);
    if (reply === null) {
      res.status(202).end();
      return;
    }
    res.json(reply);
  };

  app.post(['/', '/mcp'], (req, res, next) => {
    handleRpc(req, res).catch(next);
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not Found' });
  });

  const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    if (res.headersSent) {
      log.error(`Error after response started on ${req.method} ${req.path}`, err);
      res.end();
      return;
    }
    const bodyError = bodyErrorType(err);
    if (bodyError === 'entity.parse.failed') {
      log.debug(`Malformed JSON body on ${req.method} ${req.path}`);
      res.status(200).json(parseErrorReply());
      return;
    }
    if (bodyError === 'entity.too.large') {
      res.status(413).json(failure(null, ErrorCode.InvalidRequest, 'Request body too large'));
      return;
    }
    log.error(`Unhandled error on ${req.method} ${req.path}`, err);
    res.status(200).json(failure(null, ErrorCode.InternalError, 'Internal error'));
  };
  app.use(errorHandler);

  return {
    app,
    openStreams: () => streams.size,
    closeStreams: () => {
      for (const [stream, res] of streams) {
        stream.stop();
        res.end();
      }
      streams.clear();
    },
  };
}

/** Listen on host:port; resolves once the socket is bound. */
export function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}
