/**
 * Tool dispatcher - turns one model-requested tool call into a tagged
 * InvocationResult. Never throws: every failure (unknown tool, bad
 * arguments, permission, timeout, server loss, cancellation) comes back
 * as `success: false` with an error kind.
 */

import { createLogger } from '../utils/logger';
import { createKeyedMutex, mapWithConcurrency, type KeyedMutex } from '../utils/concurrency';
import {
  CancelledError,
  RelayError,
  TimeoutError,
  toRelayError,
  type RelayErrorKind,
} from '../errors';
import type { RequestOptions } from '../mcp/client';
import type { PermissionMode } from '../mcp/security';
import type { McpToolResult } from '../mcp/types';
import type { ToolCall } from './model-client';
import type { NativeTool, ToolRegistry } from './tool-registry';

const logger = createLogger('dispatcher');

// =============================================================================
// TYPES
// =============================================================================

interface InvocationBase {
  toolCallId: string;
  tool: string;
  timingMs: number;
}

export type InvocationResult =
  | (InvocationBase & { success: true; payload: unknown })
  | (InvocationBase & { success: false; errorKind: RelayErrorKind; message: string });

/** What the dispatcher needs from the server side; ServerRegistry satisfies it */
export interface RemoteInvoker {
  invoke(server: string, tool: string, args: Record<string, unknown>, options?: RequestOptions): Promise<McpToolResult>;
  supportsMultiplexing(server: string): boolean;
}

export interface DispatchContext {
  signal: AbortSignal;
  permissionMode: PermissionMode;
  deadlineMs: number;
}

export interface DispatchAllOptions extends DispatchContext {
  maxConcurrency: number;
}

// =============================================================================
// HELPERS
// =============================================================================

/** Text parts joined; non-text results pass through as content blocks */
export function flattenToolContent(result: McpToolResult): unknown {
  if (result.structuredContent !== undefined && result.content.length === 0) {
    return result.structuredContent;
  }
  const texts = result.content.filter((c) => c.type === 'text' && typeof c.text === 'string').map((c) => c.text);
  if (texts.length === result.content.length) {
    return texts.join('\n');
  }
  return result.content;
}

/** Render a result as the string fed back to the model */
export function formatForModel(result: InvocationResult): string {
  if (!result.success) {
    return `Error (${result.errorKind}): ${result.message}`;
  }
  if (result.payload === undefined || result.payload === null || result.payload === '') {
    return 'Tool executed successfully (no output)';
  }
  return typeof result.payload === 'string' ? result.payload : JSON.stringify(result.payload);
}

/**
 * Run a native tool under a deadline. The tool sees a signal that aborts
 * on deadline expiry or when the caller's signal aborts.
 */
async function runNative(
  tool: NativeTool,
  args: Record<string, unknown>,
  context: DispatchContext,
): Promise<unknown> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  context.signal.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Settle before aborting so the timeout wins over the tool's own abort error
      reject(new TimeoutError(`${tool.name} timed out after ${context.deadlineMs}ms`, context.deadlineMs));
      controller.abort();
    }, context.deadlineMs);
  });
  const cancelled = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => {
      if (context.signal.aborted) reject(new CancelledError(`${tool.name} cancelled`));
    }, { once: true });
  });
  // Only one of these settles the race; the losers must not surface as unhandled
  deadline.catch(() => undefined);
  cancelled.catch(() => undefined);

  try {
    return await Promise.race([
      tool.execute(args, {
        signal: controller.signal,
        permissionMode: context.permissionMode,
        deadlineMs: context.deadlineMs,
      }),
      deadline,
      cancelled,
    ]);
  } finally {
    clearTimeout(timer);
    context.signal.removeEventListener('abort', onParentAbort);
  }
}

// =============================================================================
// DISPATCHER
// =============================================================================

export class ToolDispatcher {
  constructor(
    private readonly tools: ToolRegistry,
    private readonly remote: RemoteInvoker | null,
    /** Serializes calls to servers whose connection cannot multiplex */
    private readonly serverLocks: KeyedMutex = createKeyedMutex(),
  ) {}

  /** Copy bound to another tool view; shares the per-server locks */
  withTools(tools: ToolRegistry): ToolDispatcher {
    return new ToolDispatcher(tools, this.remote, this.serverLocks);
  }

  async dispatch(call: ToolCall, context: DispatchContext): Promise<InvocationResult> {
    const startedAt = Date.now();
    const base = { toolCallId: call.id, tool: call.name };

    try {
      const payload = await this.execute(call, context);
      const timingMs = Date.now() - startedAt;
      logger.debug({ tool: call.name, timingMs }, 'Tool call succeeded');
      return { ...base, success: true, payload, timingMs };
    } catch (err) {
      const error = context.signal.aborted ? new CancelledError(`${call.name} cancelled`) : toRelayError(err);
      const timingMs = Date.now() - startedAt;
      logger.info({ tool: call.name, kind: error.kind, error: error.message, timingMs }, 'Tool call failed');
      return { ...base, success: false, errorKind: error.kind, message: error.message, timingMs };
    }
  }

  /**
   * Dispatch a turn's calls with bounded concurrency. The returned array
   * is in request order regardless of completion order.
   */
  dispatchAll(calls: readonly ToolCall[], options: DispatchAllOptions): Promise<InvocationResult[]> {
    return mapWithConcurrency(calls, options.maxConcurrency, (call) => this.dispatch(call, options));
  }

  private async execute(call: ToolCall, context: DispatchContext): Promise<unknown> {
    if (context.signal.aborted) {
      throw new CancelledError(`${call.name} cancelled before dispatch`);
    }

    const resolved = this.tools.resolve(call.name);
    if (!this.tools.isVisible(call.name, context.permissionMode)) {
      throw new RelayError('PermissionDenied', `Tool ${call.name} is not available in ${context.permissionMode} mode`);
    }
    this.tools.validate(call.name, call.arguments);

    if (resolved.kind === 'native') {
      return runNative(resolved.tool, call.arguments, context);
    }

    const remote = this.remote;
    if (!remote) {
      throw new RelayError('ServerUnavailable', `No server registry for remote tool ${call.name}`);
    }
    const invoke = () =>
      remote.invoke(resolved.server, call.name, call.arguments, {
        deadlineMs: context.deadlineMs,
        signal: context.signal,
      });

    const result = remote.supportsMultiplexing(resolved.server)
      ? await invoke()
      : await this.serverLocks.runExclusive(resolved.server, invoke);

    if (result.isError) {
      const text = flattenToolContent(result);
      throw new RelayError('ToolExecution', typeof text === 'string' && text ? text : `${call.name} reported an error`);
    }
    return flattenToolContent(result);
  }
}
