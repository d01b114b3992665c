/**
 * MCP server registry - owns every configured tool-server connection.
 *
 * Start policy is lazy: initialize() only validates configs and creates
 * connection records; no process is spawned and no socket opened until
 * ensureStarted() (or startAll()) is called for that server.
 *
 * Lifecycle transitions (start/stop/restart) are serialized per server;
 * steady-state invocations are not, they are correlated by the client.
 */

import { EventEmitter } from 'events';
import { createLogger } from '../utils/logger';
import { createMutex, type Mutex } from '../utils/concurrency';
import {
  CancelledError,
  ConfigurationError,
  RelayError,
  ServerUnavailableError,
  TimeoutError,
  errorMessage,
  toRelayError,
} from '../errors';
import { ProtocolClient, type Invocation, type ProtocolClientOptions, type RequestOptions } from './client';
import { createTransportFactory, type TransportFactory } from './transport';
import {
  serverConfigSchema,
  type ConnectionState,
  type McpToolResult,
  type ServerConfig,
  type ServerConfigInput,
  type ServerStatusSnapshot,
  type ToolDescriptor,
} from './types';

const logger = createLogger('mcp-registry');

// =============================================================================
// TYPES
// =============================================================================

interface ServerConnection {
  readonly config: ServerConfig;
  state: ConnectionState;
  client: ProtocolClient | null;
  tools: readonly ToolDescriptor[];
  /** Bumped per discovery; only the newest result is applied */
  discoverySeq: number;
  lastError: RelayError | null;
  startedAt: number | null;
  starting: Promise<ProtocolClient> | null;
  readonly lifecycle: Mutex;
  unsubscribe: Array<() => void>;
}

export interface DuplicateTool {
  name: string;
  /** Server whose entry was dropped */
  server: string;
  /** Server whose entry is visible */
  keptFrom: string;
}

export interface StartOutcome {
  ok: boolean;
  error?: string;
}

export interface ServerRegistryOptions {
  transportFactory?: TransportFactory;
  clientOptions?: ProtocolClientOptions;
}

export type CatalogListener = (catalog: ReadonlyMap<string, ToolDescriptor>) => void;

// =============================================================================
// CONFIG VALIDATION
// =============================================================================

/**
 * Validate and freeze a set of server configs. Malformed records and
 * duplicate names are fatal.
 */
export function parseServerConfigs(inputs: readonly Record<string, unknown>[]): ServerConfig[] {
  const seen = new Set<string>();
  const configs: ServerConfig[] = [];

  inputs.forEach((input, index) => {
    const parsed = serverConfigSchema.safeParse(input);
    if (!parsed.success) {
      const label = typeof input.name === 'string' && input.name ? input.name : `#${index}`;
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`);
      throw new ConfigurationError(`Invalid MCP server config ${label}: ${issues.join('; ')}`, {
        details: { server: label, issues },
      });
    }
    if (seen.has(parsed.data.name)) {
      throw new ConfigurationError(`Duplicate MCP server name: ${parsed.data.name}`);
    }
    seen.add(parsed.data.name);
    configs.push(Object.freeze({
      ...parsed.data,
      args: [...parsed.data.args],
      env: Object.freeze({ ...parsed.data.env }),
      headers: Object.freeze({ ...parsed.data.headers }),
    }));
  });

  return configs;
}

// =============================================================================
// SERVER REGISTRY
// =============================================================================

export class ServerRegistry {
  private readonly connections = new Map<string, ServerConnection>();
  private readonly transportFactory: TransportFactory;
  private readonly clientOptions: ProtocolClientOptions;
  private readonly events = new EventEmitter();
  private catalog: ReadonlyMap<string, ToolDescriptor> = new Map();
  private duplicates: DuplicateTool[] = [];
  private shuttingDown = false;

  constructor(options: ServerRegistryOptions = {}) {
    this.transportFactory = options.transportFactory ?? createTransportFactory();
    this.clientOptions = options.clientOptions ?? {};
  }

  // ---------------------------------------------------------------------------
  // Configuration
  // ---------------------------------------------------------------------------

  /** Accepts raw records (e.g. parsed JSON); each is validated here */
  initialize(inputs: readonly (ServerConfigInput | Record<string, unknown>)[]): void {
    const configs = parseServerConfigs(inputs);
    for (const config of configs) {
      if (this.connections.has(config.name)) {
        throw new ConfigurationError(`MCP server already registered: ${config.name}`);
      }
    }

    for (const config of configs) {
      this.connections.set(config.name, {
        config,
        state: 'uninitialized',
        client: null,
        tools: [],
        discoverySeq: 0,
        lastError: null,
        startedAt: null,
        starting: null,
        lifecycle: createMutex(),
        unsubscribe: [],
      });
      logger.debug({ server: config.name, transport: config.transport }, 'MCP server registered');
    }
    this.shuttingDown = false;
    logger.info({ servers: configs.length }, 'MCP registry initialized (lazy start)');
  }

  listServers(): string[] {
    return Array.from(this.connections.keys());
  }

  getConfig(name: string): ServerConfig | undefined {
    return this.connections.get(name)?.config;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Connect, handshake and discover on first use. Concurrent callers share
   * one in-flight start. A degraded or closed connection is recreated.
   */
  ensureStarted(name: string): Promise<ProtocolClient> {
    const conn = this.connections.get(name);
    if (!conn) {
      return Promise.reject(new ServerUnavailableError(`Unknown MCP server: ${name}`));
    }
    if (conn.state === 'ready' && conn.client) {
      return Promise.resolve(conn.client);
    }
    if (conn.starting) return conn.starting;

    const starting = conn.lifecycle
      .runExclusive(async () => {
        if (conn.state === 'ready' && conn.client) return conn.client;
        return this.startConnection(conn);
      })
      .finally(() => {
        conn.starting = null;
      });
    conn.starting = starting;
    return starting;
  }

  /** Start every server, tolerating individual failures */
  async startAll(): Promise<Record<string, StartOutcome>> {
    const names = this.listServers();
    const settled = await Promise.allSettled(names.map((name) => this.ensureStarted(name)));
    const outcomes: Record<string, StartOutcome> = {};
    settled.forEach((result, i) => {
      outcomes[names[i]] = result.status === 'fulfilled'
        ? { ok: true }
        : { ok: false, error: errorMessage(result.reason) };
    });
    return outcomes;
  }

  /** Close and recreate one server connection */
  async restart(name: string): Promise<ProtocolClient> {
    const conn = this.requireConnection(name);
    await conn.lifecycle.runExclusive(() => this.stopConnection(conn));
    return this.ensureStarted(name);
  }

  /**
   * Close every connection. One server failing to close cleanly does not
   * block the others.
   */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    const conns = Array.from(this.connections.values());
    const results = await Promise.allSettled(
      conns.map((conn) => conn.lifecycle.runExclusive(() => this.stopConnection(conn))),
    );
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        logger.warn({ server: conns[i].config.name, error: errorMessage(result.reason) }, 'MCP server did not close cleanly');
      }
    });
    this.rebuildCatalog();
    logger.info({ servers: conns.length }, 'MCP registry shut down');
  }

  private async startConnection(conn: ServerConnection): Promise<ProtocolClient> {
    const name = conn.config.name;
    if (this.shuttingDown) {
      throw new ServerUnavailableError(`${name}: registry is shutting down`);
    }

    if (conn.client) {
      await this.disposeClient(conn);
    }

    const transport = this.transportFactory(conn.config);
    const client = new ProtocolClient(name, transport, {
      ...this.clientOptions,
      handshakeTimeoutMs: conn.config.handshakeTimeoutMs ?? this.clientOptions.handshakeTimeoutMs,
      requestTimeoutMs: conn.config.requestTimeoutMs ?? this.clientOptions.requestTimeoutMs,
    });
    conn.client = client;
    conn.state = 'handshaking';
    conn.lastError = null;

    try {
      await client.connect();
    } catch (err) {
      const error = toRelayError(err, 'TransportUnavailable');
      conn.state = client.state;
      conn.lastError = error;
      // A failed recreate must not leave the previous session's tools listed
      if (conn.tools.length > 0) {
        conn.tools = [];
        this.rebuildCatalog();
      }
      logger.error({ server: name, kind: error.kind, error: error.message }, 'Failed to start MCP server');
      throw error;
    }

    conn.unsubscribe.push(
      client.onDegraded((error) => {
        if (conn.client !== client) return;
        conn.state = 'degraded';
        conn.lastError = error;
      }),
      client.onNotification((method) => {
        if (method !== 'notifications/tools/list_changed' || conn.client !== client) return;
        logger.info({ server: name }, 'MCP tool list changed, re-discovering');
        this.discover(name).catch((err: unknown) => {
          logger.warn({ server: name, error: errorMessage(err) }, 'MCP re-discovery failed');
        });
      }),
    );

    conn.state = 'ready';
    conn.startedAt = Date.now();

    try {
      await this.discoverWith(conn, client);
    } catch (err) {
      conn.lastError = toRelayError(err, 'ProtocolFraming');
      logger.warn({ server: name, error: conn.lastError.message }, 'MCP tool discovery failed');
    }

    return client;
  }

  private async stopConnection(conn: ServerConnection): Promise<void> {
    const hadClient = conn.client !== null;
    try {
      await this.disposeClient(conn);
    } finally {
      conn.state = hadClient || conn.state !== 'uninitialized' ? 'closed' : conn.state;
      conn.tools = [];
    }
  }

  private async disposeClient(conn: ServerConnection): Promise<void> {
    for (const off of conn.unsubscribe.splice(0)) off();
    const client = conn.client;
    conn.client = null;
    if (client) {
      await client.close();
    }
  }

  // ---------------------------------------------------------------------------
  // Discovery
  // ---------------------------------------------------------------------------

  /** Re-run discovery for one server and atomically replace its entries */
  async discover(name: string): Promise<readonly ToolDescriptor[]> {
    const conn = this.requireConnection(name);
    const client = await this.ensureStarted(name);
    return this.discoverWith(conn, client);
  }

  private async discoverWith(conn: ServerConnection, client: ProtocolClient): Promise<readonly ToolDescriptor[]> {
    const seq = ++conn.discoverySeq;
    const tools = Object.freeze(await client.listTools());
    if (conn.client !== client || seq !== conn.discoverySeq) {
      // Recreated or re-listed meanwhile; the newer result owns the catalog
      return conn.tools;
    }
    conn.tools = tools;
    this.rebuildCatalog();
    logger.info({ server: conn.config.name, tools: tools.map((t) => t.name) }, 'Discovered MCP tools');
    return tools;
  }

  /**
   * Build the flat namespace off to the side, then swap it in. Readers see
   * either the old or the new catalog, never a mix.
   */
  private rebuildCatalog(): void {
    const next = new Map<string, ToolDescriptor>();
    const duplicates: DuplicateTool[] = [];

    for (const conn of this.connections.values()) {
      for (const tool of conn.tools) {
        const existing = next.get(tool.name);
        if (existing) {
          duplicates.push({ name: tool.name, server: tool.server, keptFrom: existing.server });
          logger.warn({ tool: tool.name, server: tool.server, keptFrom: existing.server }, 'Duplicate MCP tool name');
          continue;
        }
        next.set(tool.name, tool);
      }
    }

    this.catalog = next;
    this.duplicates = duplicates;
    this.events.emit('catalog', next);
  }

  getTools(): ReadonlyMap<string, ToolDescriptor> {
    return this.catalog;
  }

  getServerTools(name: string): readonly ToolDescriptor[] {
    return this.connections.get(name)?.tools ?? [];
  }

  getDuplicates(): readonly DuplicateTool[] {
    return this.duplicates;
  }

  onCatalogChange(listener: CatalogListener): () => void {
    this.events.on('catalog', listener);
    return () => this.events.off('catalog', listener);
  }

  // ---------------------------------------------------------------------------
  // Invocation
  // ---------------------------------------------------------------------------

  async startInvocation(
    server: string,
    tool: string,
    args: Record<string, unknown>,
    options: RequestOptions = {},
  ): Promise<Invocation> {
    const startedAt = Date.now();
    const client = await this.startWithin(server, options);
    // Time spent on a lazy (re)start counts against the call's deadline
    const deadlineMs = options.deadlineMs === undefined
      ? undefined
      : Math.max(1, options.deadlineMs - (Date.now() - startedAt));
    return client.startInvocation(tool, args, { ...options, deadlineMs });
  }

  /**
   * ensureStarted bounded by one call's deadline and signal. Only this caller
   * stops waiting; the start itself carries on for later callers.
   */
  private startWithin(name: string, options: RequestOptions): Promise<ProtocolClient> {
    const { deadlineMs, signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new CancelledError(`${name}: call cancelled before the server started`));
    }
    const starting = this.ensureStarted(name);
    if (deadlineMs === undefined && !signal) return starting;

    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const onAbort = () => {
        cleanup();
        reject(new CancelledError(`${name}: cancelled while starting`));
      };
      if (deadlineMs !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          reject(new TimeoutError(`${name}: server did not start within ${deadlineMs}ms`, deadlineMs));
        }, deadlineMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      starting.then(
        (client) => {
          cleanup();
          resolve(client);
        },
        (err: unknown) => {
          cleanup();
          reject(err);
        },
      );
    });
  }

  async invoke(
    server: string,
    tool: string,
    args: Record<string, unknown>,
    options: RequestOptions = {},
  ): Promise<McpToolResult> {
    const invocation = await this.startInvocation(server, tool, args, options);
    return invocation.result;
  }

  /** Whether concurrent calls may share this server's connection */
  supportsMultiplexing(name: string): boolean {
    return this.connections.get(name)?.client?.supportsMultiplexing ?? true;
  }

  getClient(name: string): ProtocolClient | undefined {
    return this.connections.get(name)?.client ?? undefined;
  }

  // ---------------------------------------------------------------------------
  // Status
  // ---------------------------------------------------------------------------

  /** Synchronous snapshot; never waits on in-flight network operations */
  getServerStatus(): ServerStatusSnapshot {
    const snapshot: ServerStatusSnapshot = {};
    for (const [name, conn] of this.connections) {
      snapshot[name] = {
        state: conn.state,
        lastError: conn.lastError ? conn.lastError.message : null,
        toolCount: conn.tools.length,
        transport: conn.config.transport,
        description: conn.config.description,
      };
    }
    return snapshot;
  }

  /** Probe every ready server with a ping */
  async checkHealth(): Promise<Record<string, boolean>> {
    const results: Record<string, boolean> = {};
    await Promise.all(Array.from(this.connections.entries()).map(async ([name, conn]) => {
      results[name] = conn.state === 'ready' && conn.client ? await conn.client.ping() : false;
    }));
    return results;
  }

  private requireConnection(name: string): ServerConnection {
    const conn = this.connections.get(name);
    if (!conn) {
      throw new ServerUnavailableError(`Unknown MCP server: ${name}`);
    }
    return conn;
  }
}
