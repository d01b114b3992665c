/**
 * MCP transports - point-to-point channels to one tool-server.
 *
 * - StdioTransport: child process, newline-delimited JSON over stdin/stdout
 * - SseTransport: GET event stream for inbound messages, POST for outbound
 *
 * Both deliver inbound messages through an ordered queue. A malformed frame
 * is queued as a framing error behind every complete message that arrived
 * before it, so buffered messages are never lost.
 */

import { spawn, type SpawnOptions } from 'child_process';
import { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';
import { createLogger } from '../utils/logger';
import {
  ProtocolFramingError,
  RelayError,
  ServerUnavailableError,
  TransportUnavailableError,
  errorMessage,
} from '../errors';
import { asJsonRpcMessage, type JsonRpcMessage, type ServerConfig, type TransportKind } from './types';

const logger = createLogger('mcp-transport');

const DEFAULT_ENDPOINT_WAIT_MS = 10_000;
const DEFAULT_KILL_GRACE_MS = 2_000;

// =============================================================================
// TRANSPORT CONTRACT
// =============================================================================

export type CloseListener = (error: RelayError | null) => void;

export interface Transport {
  readonly kind: TransportKind;
  /** True once the channel is closed; receive() drains then yields null */
  readonly closed: boolean;
  /** Child exit code (stdio only) */
  readonly exitCode: number | null;
  /** Whether concurrent requests can share this channel */
  readonly supportsMultiplexing: boolean;

  /** Launch or connect. Rejects with TransportUnavailable. */
  start(): Promise<void>;
  /** Write one message. Rejects with ServerUnavailable once closed. */
  send(message: JsonRpcMessage): Promise<void>;
  /**
   * Next inbound message. Suspends until one is available. Resolves null once
   * the channel is closed and drained; rejects with ProtocolFraming for a
   * malformed frame (the following call continues with the next frame).
   */
  receive(): Promise<JsonRpcMessage | null>;
  /** Release the process or connection. Idempotent. */
  close(): Promise<void>;
  /** Fires exactly once when the channel closes, with the cause if unexpected */
  onClose(listener: CloseListener): () => void;
  /** Fires when the channel dropped and was re-established (SSE reconnect) */
  onReconnect(listener: () => void): () => void;
}

// =============================================================================
// INBOUND QUEUE
// =============================================================================

type Inbound = { message: JsonRpcMessage } | { error: ProtocolFramingError };

/**
 * Ordered single-consumer queue of inbound frames.
 */
export class InboundQueue {
  private items: Inbound[] = [];
  private waiters: Array<{ resolve: (item: Inbound | null) => void }> = [];
  private ended = false;

  push(item: Inbound): void {
    if (this.ended) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
    } else {
      this.items.push(item);
    }
  }

  /** Decode one raw frame and enqueue the message or a framing error */
  pushFrame(raw: string): void {
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      this.push({ error: new ProtocolFramingError(`Malformed frame: ${errorMessage(err)}`, raw) });
      return;
    }
    const message = asJsonRpcMessage(decoded);
    if (!message) {
      this.push({ error: new ProtocolFramingError('Frame is not a JSON-RPC 2.0 message', raw) });
      return;
    }
    this.push({ message });
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve(null);
    }
  }

  async next(): Promise<JsonRpcMessage | null> {
    const item = this.items.shift() ?? (this.ended ? null : await new Promise<Inbound | null>((resolve) => {
      this.waiters.push({ resolve });
    }));
    if (!item) return null;
    if ('error' in item) throw item.error;
    return item.message;
  }

  get size(): number {
    return this.items.length;
  }
}

// =============================================================================
// SHARED BASE
// =============================================================================

abstract class BaseTransport implements Transport {
  abstract readonly kind: TransportKind;
  readonly supportsMultiplexing: boolean = true;
  exitCode: number | null = null;

  protected readonly inbound = new InboundQueue();
  protected readonly events = new EventEmitter();
  protected readonly serverName: string;
  private isClosed = false;

  constructor(serverName: string) {
    this.serverName = serverName;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  abstract start(): Promise<void>;
  abstract send(message: JsonRpcMessage): Promise<void>;
  abstract close(): Promise<void>;

  receive(): Promise<JsonRpcMessage | null> {
    return this.inbound.next();
  }

  onClose(listener: CloseListener): () => void {
    this.events.once('close', listener);
    return () => this.events.off('close', listener);
  }

  onReconnect(listener: () => void): () => void {
    this.events.on('reconnect', listener);
    return () => this.events.off('reconnect', listener);
  }

  /** Mark closed, end the inbound queue and notify listeners once */
  protected markClosed(error: RelayError | null): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.inbound.end();
    this.events.emit('close', error);
  }
}

// =============================================================================
// STDIO TRANSPORT
// =============================================================================

/** The part of a ChildProcess the stdio transport relies on */
export interface ChildHandle extends EventEmitter {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildHandle;

const defaultSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

export interface StdioTransportOptions {
  spawn?: SpawnFn;
  killGraceMs?: number;
}

export class StdioTransport extends BaseTransport {
  readonly kind = 'stdio' as const;

  private readonly config: ServerConfig;
  private readonly spawnFn: SpawnFn;
  private readonly killGraceMs: number;
  private child: ChildHandle | null = null;
  private buffer = '';
  private closing = false;

  constructor(config: ServerConfig, options: StdioTransportOptions = {}) {
    super(config.name);
    this.config = config;
    this.spawnFn = options.spawn ?? defaultSpawn;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  }

  async start(): Promise<void> {
    if (this.child) return;
    const command = this.config.command;
    if (!command) {
      throw new TransportUnavailableError(`${this.serverName}: command is required for stdio transport`);
    }

    let child: ChildHandle;
    try {
      child = this.spawnFn(command, [...this.config.args], {
        env: { ...process.env, ...this.config.env },
        cwd: this.config.cwd,
        stdio: ['pipe', 'pipe', 'pipe'],
      });
    } catch (err) {
      throw new TransportUnavailableError(`${this.serverName}: failed to launch ${command}: ${errorMessage(err)}`, { cause: err });
    }
    this.child = child;

    // Decode across chunk boundaries so a split multibyte character survives
    child.stdout?.setEncoding('utf8');
    child.stdout?.on('data', (data: string) => {
      this.handleData(data);
    });

    // A server that closes its stdin makes the next write fail with EPIPE
    child.stdin?.on('error', (err: Error) => {
      logger.warn({ server: this.serverName, error: err.message }, 'MCP server stdin error');
      this.markClosed(new ServerUnavailableError(`${this.serverName}: stdin write failed: ${err.message}`, { cause: err }));
    });

    child.stderr?.on('data', (data: Buffer | string) => {
      logger.debug({ server: this.serverName, stderr: data.toString() }, 'MCP server stderr');
    });

    child.on('exit', (code: number | null) => {
      this.exitCode = code;
    });

    // 'close' fires after stdout is drained, so every complete frame is queued first
    child.on('close', (code: number | null) => {
      if (this.exitCode === null) this.exitCode = code;
      this.flushPartialLine();
      if (this.closing) {
        this.markClosed(null);
        return;
      }
      logger.info({ server: this.serverName, code: this.exitCode }, 'MCP server exited');
      this.markClosed(new ServerUnavailableError(`${this.serverName}: server process exited with code ${this.exitCode}`, {
        details: { exitCode: this.exitCode },
      }));
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off('error', onError);
        resolve();
      };
      const onError = (err: Error) => {
        child.off('spawn', onSpawn);
        this.markClosed(null);
        reject(new TransportUnavailableError(`${this.serverName}: failed to launch ${command}: ${err.message}`, { cause: err }));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    // Errors after a successful spawn (EPIPE and friends) end the session
    child.on('error', (err: Error) => {
      logger.error({ server: this.serverName, error: err.message }, 'MCP server process error');
      this.markClosed(new ServerUnavailableError(`${this.serverName}: ${err.message}`, { cause: err }));
    });
  }

  send(message: JsonRpcMessage): Promise<void> {
    const stdin = this.child?.stdin;
    if (this.closed || !stdin || stdin.destroyed) {
      return Promise.reject(new ServerUnavailableError(`${this.serverName}: transport is closed`));
    }
    return new Promise((resolve, reject) => {
      stdin.write(JSON.stringify(message) + '\n', (err) => {
        if (err) {
          reject(new ServerUnavailableError(`${this.serverName}: write failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    const child = this.child;
    if (this.closed || !child) {
      this.markClosed(null);
      return;
    }
    this.closing = true;

    const exited = new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        logger.warn({ server: this.serverName }, 'MCP server did not exit, sending SIGKILL');
        child.kill('SIGKILL');
        resolve();
      }, this.killGraceMs);
      this.onClose(() => {
        clearTimeout(timer);
        resolve();
      });
    });

    child.stdin?.end();
    child.kill('SIGTERM');
    await exited;
    this.markClosed(null);
  }

  private handleData(data: string): void {
    this.buffer += data;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    for (const line of lines) {
      const frame = line.trim();
      if (!frame) continue;
      this.inbound.pushFrame(frame);
    }
  }

  /** A trailing fragment without newline at exit is a partial read */
  private flushPartialLine(): void {
    const rest = this.buffer.trim();
    this.buffer = '';
    if (rest) {
      this.inbound.push({ error: new ProtocolFramingError('Partial frame at end of stream', rest) });
    }
  }
}

// =============================================================================
// SSE TRANSPORT
// =============================================================================

export type FetchFn = typeof fetch;

export interface SseTransportOptions {
  fetch?: FetchFn;
  endpointWaitMs?: number;
}

export class SseTransport extends BaseTransport {
  readonly kind = 'sse' as const;

  private readonly config: ServerConfig;
  private readonly fetchFn: FetchFn;
  private readonly endpointWaitMs: number;
  private abortController: AbortController | null = null;
  private postUrl: string | null = null;
  private stopping = false;
  private started = false;

  constructor(config: ServerConfig, options: SseTransportOptions = {}) {
    super(config.name);
    this.config = config;
    this.fetchFn = options.fetch ?? fetch;
    this.endpointWaitMs = options.endpointWaitMs ?? DEFAULT_ENDPOINT_WAIT_MS;
  }

  async start(): Promise<void> {
    if (this.started) return;
    try {
      await this.openStream();
      this.started = true;
    } catch (err) {
      this.markClosed(null);
      throw err instanceof RelayError
        ? err
        : new TransportUnavailableError(`${this.serverName}: SSE connect failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async send(message: JsonRpcMessage): Promise<void> {
    const postUrl = this.postUrl;
    if (this.closed || !postUrl) {
      throw new ServerUnavailableError(`${this.serverName}: SSE transport not connected`);
    }

    let resp: Response;
    try {
      resp = await this.fetchFn(postUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...this.config.headers },
        body: JSON.stringify(message),
      });
    } catch (err) {
      throw new ServerUnavailableError(`${this.serverName}: SSE POST failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!resp.ok) {
      throw new ServerUnavailableError(`${this.serverName}: SSE POST failed with status ${resp.status}`);
    }

    // Some servers answer inline instead of over the event stream
    const contentType = resp.headers.get('content-type') ?? '';
    if (contentType.includes('application/json')) {
      const text = await resp.text();
      if (text.trim()) {
        this.inbound.pushFrame(text);
      }
    }
  }

  async close(): Promise<void> {
    this.stopping = true;
    this.abortController?.abort();
    this.postUrl = null;
    this.markClosed(null);
  }

  private async openStream(): Promise<void> {
    const url = this.config.url;
    if (!url) {
      throw new TransportUnavailableError(`${this.serverName}: url is required for sse transport`);
    }

    this.abortController?.abort();
    const controller = new AbortController();
    this.abortController = controller;
    this.postUrl = null;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: { Accept: 'text/event-stream', ...this.config.headers },
        signal: controller.signal,
      });
    } catch (err) {
      throw new TransportUnavailableError(`${this.serverName}: SSE connect failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok) {
      throw new TransportUnavailableError(`${this.serverName}: SSE connect failed with status ${response.status}`);
    }
    if (!response.body) {
      throw new TransportUnavailableError(`${this.serverName}: SSE response has no body`);
    }

    let gotEndpoint = false;
    let resolveEndpoint: (() => void) | null = null;
    let rejectEndpoint: ((error: RelayError) => void) | null = null;
    const endpointReceived = new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(new TransportUnavailableError(`${this.serverName}: timeout waiting for SSE endpoint event`));
      }, this.endpointWaitMs);
      resolveEndpoint = () => {
        clearTimeout(timer);
        resolve();
      };
      rejectEndpoint = (error) => {
        clearTimeout(timer);
        reject(error);
      };
      controller.signal.addEventListener('abort', () => {
        rejectEndpoint?.(new TransportUnavailableError(`${this.serverName}: SSE stream closed before endpoint event`));
      }, { once: true });
    });

    const reader = response.body.getReader();
    this.readStream(reader, controller, {
      onEndpoint: (endpoint) => {
        this.postUrl = new URL(endpoint.trim(), url).toString();
        gotEndpoint = true;
        resolveEndpoint?.();
      },
      onEnd: () => {
        if (!gotEndpoint) {
          rejectEndpoint?.(new TransportUnavailableError(`${this.serverName}: SSE stream closed before endpoint event`));
        }
        return gotEndpoint;
      },
    }).catch((err: unknown) => {
      logger.warn({ server: this.serverName, error: errorMessage(err) }, 'SSE stream reader failed');
    });

    await endpointReceived;
  }

  private async readStream(
    reader: { read(): Promise<{ done: boolean; value?: Uint8Array }>; releaseLock(): void },
    controller: AbortController,
    handlers: {
      onEndpoint: (endpoint: string) => void;
      /** Called once the stream ends; returns whether the session was established */
      onEnd: () => boolean;
    },
  ): Promise<void> {
    const decoder = new TextDecoder();
    let buffer = '';
    let eventType = 'message';
    let dataLines: string[] = [];

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';

        for (const raw of lines) {
          const line = raw.replace(/\r$/, '');
          if (line === '') {
            if (dataLines.length > 0) {
              const data = dataLines.join('\n');
              if (eventType === 'endpoint') {
                handlers.onEndpoint(data);
              } else if (eventType === 'message') {
                this.inbound.pushFrame(data);
              }
              dataLines = [];
            }
            eventType = 'message';
          } else if (line.startsWith('event:')) {
            eventType = line.slice(6).trim();
          } else if (line.startsWith('data:')) {
            const val = line.slice(5);
            dataLines.push(val.startsWith(' ') ? val.slice(1) : val);
          }
          // comments (":") and id:/retry: fields are ignored
        }
      }
    } catch (err) {
      if (!controller.signal.aborted) {
        logger.warn({ server: this.serverName, error: errorMessage(err) }, 'SSE stream read error');
      }
    } finally {
      reader.releaseLock();
    }

    // A stream that never announced its endpoint fails its own start instead
    const established = handlers.onEnd();
    // Only the current stream may trigger disconnect handling
    if (!established || this.stopping || this.abortController !== controller || !this.started) {
      return;
    }
    await this.handleDisconnect();
  }

  private async handleDisconnect(): Promise<void> {
    this.postUrl = null;
    if (!this.config.reconnect) {
      logger.warn({ server: this.serverName }, 'SSE stream lost');
      this.markClosed(new ServerUnavailableError(`${this.serverName}: SSE connection lost`));
      return;
    }

    logger.info({ server: this.serverName }, 'SSE stream lost, reconnecting');
    try {
      await this.openStream();
      this.events.emit('reconnect');
    } catch (err) {
      logger.warn({ server: this.serverName, error: errorMessage(err) }, 'SSE reconnect failed');
      this.markClosed(new ServerUnavailableError(`${this.serverName}: SSE reconnect failed: ${errorMessage(err)}`, { cause: err }));
    }
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export interface TransportFactoryOptions {
  spawn?: SpawnFn;
  fetch?: FetchFn;
}

export type TransportFactory = (config: ServerConfig) => Transport;

export function createTransportFactory(options: TransportFactoryOptions = {}): TransportFactory {
  return (config) => {
    switch (config.transport) {
      case 'stdio':
        return new StdioTransport(config, { spawn: options.spawn });
      case 'sse':
        return new SseTransport(config, { fetch: options.fetch });
    }
  };
}
