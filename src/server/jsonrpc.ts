/**
 * JSON-RPC dispatcher for the MCP methods the gateway answers:
 * initialize, ping, tools/list and tools/call.
 */

import {
  ErrorCode,
  LATEST_PROTOCOL_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
} from '@modelcontextprotocol/sdk/types.js';
import type { InitializeResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { SERVER_NAME, SERVER_VERSION, STORE_UNAVAILABLE_MESSAGE } from '../constants.js';
import { scoped } from '../logger.js';
import type { DocumentStore } from '../types.js';
import type { GatewayTool } from './define-tool.js';
import { textErrorResponse, textResponse } from './tool-response.js';

const log = scoped('rpc');

export type JsonRpcId = string | number | null;

export interface JsonRpcSuccess {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: object;
}

export interface JsonRpcFailure {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: { code: number; message: string; data?: unknown };
}

export type JsonRpcReply = JsonRpcSuccess | JsonRpcFailure;

export interface DispatchContext {
  /** Null when the remote client failed to initialize. */
  store: DocumentStore | null;
  tools: readonly GatewayTool[];
  /** Text returned by every tools/call while the store is null. */
  unavailableMessage?: string;
}

const idSchema = z.union([z.string(), z.number(), z.null()]);

const requestSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: idSchema.optional(),
  method: z.string(),
  params: z.record(z.string(), z.unknown()).optional(),
});

const callParamsSchema = z.object({
  name: z.string(),
  arguments: z.record(z.string(), z.unknown()).optional(),
});

export function success(id: JsonRpcId, result: object): JsonRpcSuccess {
  return { jsonrpc: '2.0', id, result };
}

export function failure(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcFailure {
  const error: JsonRpcFailure['error'] = { code, message };
  if (data !== undefined) error.data = data;
  return { jsonrpc: '2.0', id, error };
}

export function parseErrorReply(): JsonRpcFailure {
  return failure(null, ErrorCode.ParseError, 'Parse error');
}

/** Static descriptor returned by initialize, GET / and the SSE greeting. */
export function capabilityDescriptor(protocolVersion: string = LATEST_PROTOCOL_VERSION): InitializeResult {
  return {
    protocolVersion,
    capabilities: { tools: {} },
    serverInfo: { name: SERVER_NAME, version: SERVER_VERSION },
  };
}

function negotiateProtocolVersion(params: Record<string, unknown> | undefined): string {
  const requested = params?.['protocolVersion'];
  return typeof requested === 'string' && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
    ? requested
    : LATEST_PROTOCOL_VERSION;
}

function recoverId(message: unknown): JsonRpcId {
  if (typeof message === 'object' && message !== null && 'id' in message) {
    const parsed = idSchema.safeParse(message.id);
    if (parsed.success) return parsed.data;
  }
  return null;
}

export function listToolDefinitions(tools: readonly GatewayTool[]): Tool[] {
  return tools.map((tool) => tool.definition);
}

async function callTool(
  id: JsonRpcId,
  params: Record<string, unknown> | undefined,
  ctx: DispatchContext
): Promise<JsonRpcReply> {
  const parsed = callParamsSchema.safeParse(params ?? {});
  if (!parsed.success) {
    return failure(id, ErrorCode.InvalidParams, 'Invalid params: tools/call requires a string "name"');
  }
  const { name, arguments: args } = parsed.data;

  if (!ctx.store) {
    log.warn(`tools/call ${name} rejected: Pinecone store unavailable`);
    return success(id, textResponse(ctx.unavailableMessage ?? STORE_UNAVAILABLE_MESSAGE));
  }

  const tool = ctx.tools.find((t) => t.definition.name === name);
  if (!tool) {
    return success(id, textErrorResponse(`Unknown tool: ${name}`));
  }

  const started = Date.now();
  const result = await tool.call(args ?? {}, ctx.store);
  log.debug(`tools/call ${name} finished`, {
    duration_ms: Date.now() - started,
    is_error: result.isError === true,
  });
  return success(id, result);
}

/**
 * Answer one decoded JSON-RPC message. Returns null for notifications (no `id`),
 * which are acknowledged without running anything.
 */
export async function dispatch(message: unknown, ctx: DispatchContext): Promise<JsonRpcReply | null> {
  const parsed = requestSchema.safeParse(message);
  if (!parsed.success) {
    return failure(recoverId(message), ErrorCode.InvalidRequest, 'Invalid Request');
  }

  const { id, method, params } = parsed.data;
  if (id === undefined) {
    log.debug(`Notification ${method} acknowledged`);
    return null;
  }

  switch (method) {
    case 'initialize':
      return success(id, capabilityDescriptor(negotiateProtocolVersion(params)));
    case 'ping':
      return success(id, {});
    case 'tools/list':
      return success(id, { tools: listToolDefinitions(ctx.tools) });
    case 'tools/call':
      return callTool(id, params, ctx);
    default:
      return failure(id, ErrorCode.MethodNotFound, `Method not found: ${method}`);
  }
}
