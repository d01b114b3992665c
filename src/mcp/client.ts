/**
 * MCP protocol client - JSON-RPC 2.0 over a Transport.
 *
 * State machine: uninitialized -> handshaking -> ready -> (degraded | closed)
 *
 * - Handshake has a bounded deadline; failure is terminal (closed)
 * - Transport loss while ready -> degraded, pending invocations fail with
 *   ServerUnavailable; the owning registry decides whether to recreate
 * - Every request resolves exactly once; expired entries are removed and
 *   late responses for unknown ids are discarded
 */

import { EventEmitter } from 'events';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import {
  CancelledError,
  ProtocolFramingError,
  RelayError,
  ServerUnavailableError,
  TimeoutError,
  errorMessage,
  toRelayError,
} from '../errors';
import { normalizeInputSchema, normalizeSchema } from './schema';
import { inferSideEffects } from './security';
import type { Transport } from './transport';
import {
  MCP_PROTOCOL_VERSION,
  isNotification,
  isRequest,
  type ConnectionState,
  type HandshakeResult,
  type JsonRpcId,
  type JsonRpcMessage,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type McpPrompt,
  type McpToolResult,
  type ToolDescriptor,
} from './types';

const logger = createLogger('mcp-client');

const DEFAULT_HANDSHAKE_TIMEOUT_MS = Number(process.env.TOOLRELAY_MCP_HANDSHAKE_TIMEOUT_MS || 10_000);
const DEFAULT_REQUEST_TIMEOUT_MS = Number(process.env.TOOLRELAY_MCP_REQUEST_TIMEOUT_MS || 60_000);
const MAX_LIST_PAGES = 50;

// =============================================================================
// WIRE SCHEMAS
// =============================================================================

const initializeResultSchema = z
  .object({
    protocolVersion: z.string().min(1),
    serverInfo: z
      .object({ name: z.string(), version: z.string().default('unknown') })
      .passthrough()
      .default({ name: 'unknown', version: 'unknown' }),
    capabilities: z.record(z.unknown()).default({}),
    instructions: z.string().optional(),
  })
  .passthrough();

const jsonSchemaValue = z.record(z.unknown());

const toolsListResultSchema = z.object({
  tools: z
    .array(
      z
        .object({
          name: z.string().min(1),
          description: z.string().optional(),
          inputSchema: jsonSchemaValue.optional(),
          outputSchema: jsonSchemaValue.optional(),
          annotations: z
            .object({
              title: z.string().optional(),
              readOnlyHint: z.boolean().optional(),
              destructiveHint: z.boolean().optional(),
              idempotentHint: z.boolean().optional(),
              openWorldHint: z.boolean().optional(),
            })
            .optional(),
        })
        .passthrough(),
    )
    .default([]),
  nextCursor: z.string().optional(),
});

const toolResultSchema = z
  .object({
    content: z
      .array(
        z
          .object({
            type: z.enum(['text', 'image', 'resource']),
            text: z.string().optional(),
            data: z.string().optional(),
            mimeType: z.string().optional(),
            uri: z.string().optional(),
          })
          .passthrough(),
      )
      .default([]),
    isError: z.boolean().optional(),
    structuredContent: z.unknown().optional(),
  })
  .passthrough();

const promptsListResultSchema = z.object({
  prompts: z
    .array(
      z.object({
        name: z.string(),
        description: z.string().optional(),
        arguments: z
          .array(z.object({ name: z.string(), description: z.string().optional(), required: z.boolean().optional() }))
          .optional(),
      }),
    )
    .default([]),
  nextCursor: z.string().optional(),
});

// =============================================================================
// TYPES
// =============================================================================

export interface ClientInfo {
  name: string;
  version: string;
}

export interface ProtocolClientOptions {
  clientInfo?: ClientInfo;
  handshakeTimeoutMs?: number;
  /** Default deadline for requests that do not pass one */
  requestTimeoutMs?: number;
}

export interface RequestOptions {
  deadlineMs?: number;
  signal?: AbortSignal;
}

export interface Invocation {
  correlationId: JsonRpcId;
  result: Promise<McpToolResult>;
}

interface PendingRequest {
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: RelayError) => void;
}

export type NotificationListener = (method: string, params: Record<string, unknown> | undefined) => void;

// =============================================================================
// PROTOCOL CLIENT
// =============================================================================

export class ProtocolClient {
  readonly serverName: string;
  readonly transport: Transport;

  serverInfo?: HandshakeResult['serverInfo'];
  capabilities: Record<string, unknown> = {};
  protocolVersion?: string;
  instructions?: string;
  lastError: RelayError | null = null;

  private currentState: ConnectionState = 'uninitialized';
  private readonly pending = new Map<JsonRpcId, PendingRequest>();
  private requestId = 0;
  private readonly events = new EventEmitter();
  private readonly options: Required<Pick<ProtocolClientOptions, 'handshakeTimeoutMs' | 'requestTimeoutMs'>> & {
    clientInfo: ClientInfo;
  };
  private closeCause: RelayError | null = null;
  private pumpDone: Promise<void> | null = null;
  private framingErrors = 0;

  constructor(serverName: string, transport: Transport, options: ProtocolClientOptions = {}) {
    this.serverName = serverName;
    this.transport = transport;
    this.options = {
      clientInfo: options.clientInfo ?? { name: 'toolrelay', version: '0.1.0' },
      handshakeTimeoutMs: options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS,
      requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    };
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /** JSON-RPC ids correlate responses, so concurrent calls never cross-deliver */
  get supportsMultiplexing(): boolean {
    return this.transport.supportsMultiplexing;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get malformedFrameCount(): number {
    return this.framingErrors;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async connect(): Promise<HandshakeResult> {
    if (this.currentState !== 'uninitialized') {
      throw new ServerUnavailableError(`${this.serverName}: client already ${this.currentState}`);
    }
    this.currentState = 'handshaking';

    this.transport.onClose((cause) => {
      this.closeCause = cause;
    });
    this.transport.onReconnect(() => {
      this.failAllPending(new ServerUnavailableError(`${this.serverName}: connection reset, request abandoned`));
    });

    try {
      await this.transport.start();
    } catch (err) {
      const error = toRelayError(err, 'TransportUnavailable');
      this.currentState = 'closed';
      this.lastError = error;
      throw error;
    }

    this.pumpDone = this.pump().catch((err: unknown) => {
      logger.error({ server: this.serverName, error: errorMessage(err) }, 'MCP receive loop failed');
      this.handleTransportClosed(toRelayError(err, 'ServerUnavailable'));
    });

    try {
      const raw = await this.request('initialize', {
        protocolVersion: MCP_PROTOCOL_VERSION,
        clientInfo: this.options.clientInfo,
        capabilities: {},
      }, { deadlineMs: this.options.handshakeTimeoutMs }).result;

      const parsed = initializeResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ProtocolFramingError(
          `${this.serverName}: malformed handshake response: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
          JSON.stringify(raw),
        );
      }

      const handshake: HandshakeResult = {
        protocolVersion: parsed.data.protocolVersion,
        serverInfo: { name: parsed.data.serverInfo.name, version: parsed.data.serverInfo.version },
        capabilities: parsed.data.capabilities,
        instructions: parsed.data.instructions,
      };
      this.protocolVersion = handshake.protocolVersion;
      this.serverInfo = handshake.serverInfo;
      this.capabilities = handshake.capabilities;
      this.instructions = handshake.instructions;

      await this.notify('notifications/initialized');
      if (this.currentState !== 'handshaking') {
        throw this.lastError ?? new ServerUnavailableError(`${this.serverName}: connection lost during handshake`);
      }
      this.currentState = 'ready';
      logger.info(
        { server: this.serverName, serverInfo: handshake.serverInfo, protocolVersion: handshake.protocolVersion },
        'MCP server connected',
      );
      return handshake;
    } catch (err) {
      const error = toRelayError(err, 'ProtocolFraming');
      logger.warn({ server: this.serverName, kind: error.kind, error: error.message }, 'MCP handshake failed');
      this.currentState = 'closed';
      this.lastError = error;
      this.failAllPending(error);
      await this.transport.close();
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.currentState === 'closed') return;
    this.currentState = 'closed';
    this.failAllPending(new ServerUnavailableError(`${this.serverName}: client closed`));
    await this.transport.close();
    await this.pumpDone;
  }

  onNotification(listener: NotificationListener): () => void {
    this.events.on('notification', listener);
    return () => this.events.off('notification', listener);
  }

  /** Fires when a ready connection degrades */
  onDegraded(listener: (error: RelayError) => void): () => void {
    this.events.on('degraded', listener);
    return () => this.events.off('degraded', listener);
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  async listTools(options: RequestOptions = {}): Promise<ToolDescriptor[]> {
    const descriptors: ToolDescriptor[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < MAX_LIST_PAGES; page++) {
      const raw = await this.request('tools/list', cursor ? { cursor } : undefined, options).result;
      const parsed = toolsListResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ProtocolFramingError(`${this.serverName}: malformed tools/list response`, JSON.stringify(raw));
      }

      for (const tool of parsed.data.tools) {
        descriptors.push(Object.freeze({
          name: tool.name,
          description: tool.description ?? '',
          inputSchema: normalizeInputSchema(tool.inputSchema, tool.name),
          outputSchema: tool.outputSchema ? normalizeSchema(tool.outputSchema) : undefined,
          server: this.serverName,
          sideEffects: inferSideEffects({ name: tool.name, annotations: tool.annotations }),
        }));
      }

      cursor = parsed.data.nextCursor;
      if (!cursor) break;
    }

    return descriptors;
  }

  /** Start a tool call and expose its correlation id for cancel() */
  startInvocation(name: string, args: Record<string, unknown>, options: RequestOptions = {}): Invocation {
    const { id, result } = this.request('tools/call', { name, arguments: args }, options);
    return {
      correlationId: id,
      result: result.then((raw) => {
        const parsed = toolResultSchema.safeParse(raw);
        if (!parsed.success) {
          throw new ProtocolFramingError(`${this.serverName}: malformed tools/call response for ${name}`, JSON.stringify(raw));
        }
        const toolResult: McpToolResult = {
          content: parsed.data.content,
          isError: parsed.data.isError,
          structuredContent: parsed.data.structuredContent,
        };
        return toolResult;
      }),
    };
  }

  invoke(name: string, args: Record<string, unknown>, options: RequestOptions = {}): Promise<McpToolResult> {
    return this.startInvocation(name, args, options).result;
  }

  /**
   * Best-effort cancel: signals the server and fails the local entry with
   * Cancelled. Returns false when nothing was pending under that id.
   */
  cancel(correlationId: JsonRpcId, reason = 'cancelled by client'): boolean {
    const pending = this.pending.get(correlationId);
    if (!pending) return false;
    this.pending.delete(correlationId);
    this.sendCancelled(correlationId, reason);
    pending.reject(new CancelledError(`${this.serverName}: ${pending.method} ${reason}`));
    return true;
  }

  async ping(options: RequestOptions = {}): Promise<boolean> {
    try {
      await this.request('ping', undefined, options).result;
      return true;
    } catch (err) {
      logger.debug({ server: this.serverName, error: errorMessage(err) }, 'MCP ping failed');
      return false;
    }
  }

  async listPrompts(options: RequestOptions = {}): Promise<McpPrompt[]> {
    const raw = await this.request('prompts/list', undefined, options).result;
    const parsed = promptsListResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProtocolFramingError(`${this.serverName}: malformed prompts/list response`, JSON.stringify(raw));
    }
    return parsed.data.prompts;
  }

  // ---------------------------------------------------------------------------
  // Request plumbing
  // ---------------------------------------------------------------------------

  private request(
    method: string,
    params: Record<string, unknown> | undefined,
    options: RequestOptions,
  ): { id: JsonRpcId; result: Promise<unknown> } {
    const id = ++this.requestId;
    const allowed = method === 'initialize' ? this.currentState === 'handshaking' : this.currentState === 'ready';
    if (!allowed) {
      return {
        id,
        result: Promise.reject(this.lastError?.kind === 'ServerUnavailable'
          ? this.lastError
          : new ServerUnavailableError(`${this.serverName}: connection is ${this.currentState}`)),
      };
    }

    const { signal } = options;
    if (signal?.aborted) {
      return { id, result: Promise.reject(new CancelledError(`${this.serverName}: ${method} cancelled before send`)) };
    }

    const timeoutMs = options.deadlineMs ?? this.options.requestTimeoutMs;
    const request: JsonRpcRequest = { jsonrpc: '2.0', id, method };
    if (params) request.params = params;

    const result = new Promise<unknown>((resolve, reject) => {
      const onAbort = () => {
        this.cancel(id, 'cancelled by caller');
      };

      const timer = setTimeout(() => {
        if (!this.pending.has(id)) return;
        this.pending.delete(id);
        this.sendCancelled(id, `timed out after ${timeoutMs}ms`);
        cleanup();
        reject(new TimeoutError(`${this.serverName}: ${method} timed out after ${timeoutMs}ms`, timeoutMs));
      }, timeoutMs);

      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      this.pending.set(id, {
        method,
        resolve: (value) => {
          cleanup();
          resolve(value);
        },
        reject: (error) => {
          cleanup();
          reject(error);
        },
      });
      signal?.addEventListener('abort', onAbort, { once: true });

      this.transport.send(request).catch((err: unknown) => {
        this.rejectPending(id, toRelayError(err, 'ServerUnavailable'));
      });
    });

    return { id, result };
  }

  private async notify(method: string, params?: Record<string, unknown>): Promise<void> {
    try {
      await this.transport.send(params ? { jsonrpc: '2.0', method, params } : { jsonrpc: '2.0', method });
    } catch (err) {
      logger.debug({ server: this.serverName, method, error: errorMessage(err) }, 'MCP notification not delivered');
    }
  }

  private sendCancelled(requestId: JsonRpcId, reason: string): void {
    void this.notify('notifications/cancelled', { requestId, reason });
  }

  private rejectPending(id: JsonRpcId, error: RelayError): void {
    const pending = this.pending.get(id);
    if (!pending) return;
    this.pending.delete(id);
    pending.reject(error);
  }

  private failAllPending(error: RelayError): void {
    const entries = Array.from(this.pending.values());
    this.pending.clear();
    for (const pending of entries) {
      pending.reject(error);
    }
  }

  // ---------------------------------------------------------------------------
  // Inbound
  // ---------------------------------------------------------------------------

  private async pump(): Promise<void> {
    while (true) {
      let message: JsonRpcMessage | null;
      try {
        message = await this.transport.receive();
      } catch (err) {
        if (err instanceof ProtocolFramingError) {
          this.framingErrors++;
          logger.warn({ server: this.serverName, frame: err.frame, error: err.message }, 'Discarding malformed MCP frame');
          if (this.currentState === 'handshaking') {
            // The only outstanding request during a handshake is initialize
            this.failAllPending(err);
          }
          continue;
        }
        throw err;
      }

      if (message === null) break;
      this.handleMessage(message);
    }

    this.handleTransportClosed(this.closeCause);
  }

  private handleMessage(message: JsonRpcMessage): void {
    if (isRequest(message)) {
      this.handleServerRequest(message);
      return;
    }
    if (isNotification(message)) {
      logger.debug({ server: this.serverName, method: message.method }, 'MCP notification');
      this.events.emit('notification', message.method, message.params);
      return;
    }

    const response: JsonRpcResponse = message;
    if (response.id === null) {
      logger.warn({ server: this.serverName, error: response.error }, 'MCP error response without id');
      return;
    }

    const pending = this.pending.get(response.id);
    if (!pending) {
      logger.debug({ server: this.serverName, id: response.id }, 'Discarding response for unknown request id');
      return;
    }
    this.pending.delete(response.id);

    if (response.error) {
      pending.reject(new RelayError(
        'ToolExecution',
        `MCP Error ${response.error.code}: ${response.error.message}`,
        { details: { code: response.error.code, data: response.error.data } },
      ));
    } else {
      pending.resolve(response.result ?? {});
    }
  }

  private handleServerRequest(request: JsonRpcRequest): void {
    const reply: JsonRpcResponse = request.method === 'ping'
      ? { jsonrpc: '2.0', id: request.id, result: {} }
      : { jsonrpc: '2.0', id: request.id, error: { code: -32601, message: `Method not found: ${request.method}` } };
    this.transport.send(reply).catch((err: unknown) => {
      logger.debug({ server: this.serverName, error: errorMessage(err) }, 'Failed to answer server request');
    });
  }

  private handleTransportClosed(cause: RelayError | null): void {
    const error = cause ?? new ServerUnavailableError(`${this.serverName}: connection closed`);
    switch (this.currentState) {
      case 'ready':
        this.currentState = 'degraded';
        this.lastError = error;
        logger.warn({ server: this.serverName, error: error.message }, 'MCP connection degraded');
        this.failAllPending(error);
        this.events.emit('degraded', error);
        break;
      case 'handshaking':
        this.currentState = 'closed';
        this.lastError = error;
        this.failAllPending(error);
        break;
      default:
        this.failAllPending(error);
    }
  }
}
