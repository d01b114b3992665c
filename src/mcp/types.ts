/**
 * MCP protocol and registry types
 */

import { z } from 'zod';

// =============================================================================
// JSON-RPC 2.0
// =============================================================================

export type JsonRpcId = string | number;

/** JSON-RPC 2.0 Request */
export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

/** JSON-RPC 2.0 Notification (no id, no response) */
export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: Record<string, unknown>;
}

/** JSON-RPC 2.0 Response */
export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  result?: unknown;
  error?: JsonRpcError;
}

/** JSON-RPC 2.0 Error */
export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

export function isResponse(msg: JsonRpcMessage): msg is JsonRpcResponse {
  return !('method' in msg) && 'id' in msg;
}

export function isRequest(msg: JsonRpcMessage): msg is JsonRpcRequest {
  return 'method' in msg && 'id' in msg && msg.id !== undefined && msg.id !== null;
}

export function isNotification(msg: JsonRpcMessage): msg is JsonRpcNotification {
  return 'method' in msg && !('id' in msg && msg.id !== undefined && msg.id !== null);
}

/**
 * Narrow a decoded JSON value into a JSON-RPC message. Returns null when the
 * value does not have the shape of one.
 */
export function asJsonRpcMessage(value: unknown): JsonRpcMessage | null {
  if (!isRecord(value) || value.jsonrpc !== '2.0') return null;
  const { id, method } = value;
  if (typeof method === 'string') {
    const params = isRecord(value.params) ? value.params : undefined;
    if (typeof id === 'string' || typeof id === 'number') {
      return { jsonrpc: '2.0', id, method, params };
    }
    return { jsonrpc: '2.0', method, params };
  }
  if (typeof id === 'string' || typeof id === 'number' || id === null) {
    const response: JsonRpcResponse = { jsonrpc: '2.0', id };
    if ('result' in value) response.result = value.result;
    const error = value.error;
    if (isRecord(error)) {
      response.error = {
        code: typeof error.code === 'number' ? error.code : -32603,
        message: typeof error.message === 'string' ? error.message : 'Unknown error',
        data: error.data,
      };
    }
    return response;
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

// =============================================================================
// MCP PROTOCOL TYPES
// =============================================================================

export const MCP_PROTOCOL_VERSION = '2024-11-05';

/** JSON Schema (simplified) */
export interface JsonSchema {
  type?: string | string[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  items?: JsonSchema;
  description?: string;
  enum?: unknown[];
  default?: unknown;
  additionalProperties?: boolean | JsonSchema;
  oneOf?: JsonSchema[];
  anyOf?: JsonSchema[];
  allOf?: JsonSchema[];
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
}

/** MCP Server Info */
export interface McpServerInfo {
  name: string;
  version: string;
}

/** Tool behaviour hints a server may attach to a tool */
export interface McpToolAnnotations {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

/** MCP Tool Definition as it arrives on the wire */
export interface McpTool {
  name: string;
  description?: string;
  inputSchema: JsonSchema;
  outputSchema?: JsonSchema;
  annotations?: McpToolAnnotations;
}

/** MCP Content */
export interface McpContent {
  type: 'text' | 'image' | 'resource';
  text?: string;
  data?: string;
  mimeType?: string;
  uri?: string;
}

/** MCP Tool Call Result */
export interface McpToolResult {
  content: McpContent[];
  isError?: boolean;
  structuredContent?: unknown;
}

/** MCP Prompt */
export interface McpPrompt {
  name: string;
  description?: string;
  arguments?: Array<{
    name: string;
    description?: string;
    required?: boolean;
  }>;
}

export interface HandshakeResult {
  protocolVersion: string;
  serverInfo: McpServerInfo;
  capabilities: Record<string, unknown>;
  instructions?: string;
}

// =============================================================================
// SERVER CONFIG
// =============================================================================

export const transportKindSchema = z.enum(['stdio', 'sse']);
export type TransportKind = z.infer<typeof transportKindSchema>;

export const serverConfigSchema = z
  .object({
    /** Unique server name */
    name: z.string().trim().min(1, 'name is required'),
    /** Transport type */
    transport: transportKindSchema.default('stdio'),
    /** Command to run the server (stdio) */
    command: z.string().trim().min(1).optional(),
    /** Arguments for the command */
    args: z.array(z.string()).default([]),
    /** Environment variable overrides */
    env: z.record(z.string()).default({}),
    /** Working directory */
    cwd: z.string().optional(),
    /** SSE endpoint (sse) */
    url: z.string().url().optional(),
    /** Extra headers for SSE requests */
    headers: z.record(z.string()).default({}),
    description: z.string().optional(),
    /** Default per-invocation deadline in ms */
    requestTimeoutMs: z.number().int().positive().optional(),
    /** Bounded handshake deadline in ms */
    handshakeTimeoutMs: z.number().int().positive().optional(),
    /** SSE only: reconnect the event stream after a transport-level disconnect */
    reconnect: z.boolean().default(false),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.transport === 'stdio' && !cfg.command) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['command'], message: 'command is required for stdio transport' });
    }
    if (cfg.transport === 'sse' && !cfg.url) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: 'url is required for sse transport' });
    }
  });

/** Config record as supplied by configuration collaborators */
export type ServerConfigInput = z.input<typeof serverConfigSchema>;

/** Validated, immutable server config */
export type ServerConfig = Readonly<z.output<typeof serverConfigSchema>>;

// =============================================================================
// REGISTRY TYPES
// =============================================================================

/**
 * A discovered tool. Replaced wholesale on re-discovery, never mutated.
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: JsonSchema;
  readonly outputSchema?: JsonSchema;
  /** Owning server name (lookup only) */
  readonly server: string;
  readonly sideEffects: boolean;
}

export type ConnectionState = 'uninitialized' | 'handshaking' | 'ready' | 'degraded' | 'closed';

export interface ServerStatus {
  state: ConnectionState;
  lastError: string | null;
  toolCount: number;
  transport: TransportKind;
  description?: string;
}

export type ServerStatusSnapshot = Record<string, ServerStatus>;

/** Catalog entry consumed by the model-facing prompt builder */
export interface ToolCatalogEntry {
  name: string;
  description: string;
  inputSchema: JsonSchema;
}
