/**
 * Agent runtime - wires the server registry, tool registry, dispatcher and
 * model client into something that runs tasks.
 *
 * Servers start lazily: nothing is spawned until start() or the first
 * runTask(). Tasks share the dispatcher (and so the per-server locks) but
 * each owns its own cancellation and cost ledger.
 */

import { createLogger } from '../utils/logger';
import type { AppConfig } from '../utils/config';
import { ServerRegistry, type StartOutcome } from '../mcp/registry';
import { loadExposureConfig, type ToolExposureConfig } from '../mcp/security';
import type { TransportFactory } from '../mcp/transport';
import { ToolDispatcher } from './dispatcher';
import { ExecutionLoop, type LoopDefaults, type TaskOptions, type TaskOutcome } from './loop';
import { createAnthropicModelClient, type ModelClient } from './model-client';
import { TASK_TOOL_NAME, createNativeTools, type SubAgentRequest } from './native-tools';
import { ToolRegistry } from './tool-registry';

const logger = createLogger('agent');

export interface AgentRuntimeOptions {
  config: AppConfig;
  /** Raw server records; validated by ServerRegistry.initialize */
  serverConfigs?: readonly Record<string, unknown>[];
  model?: ModelClient;
  exposure?: ToolExposureConfig;
  transportFactory?: TransportFactory;
}

export interface AgentRuntime {
  readonly servers: ServerRegistry;
  readonly tools: ToolRegistry;
  readonly dispatcher: ToolDispatcher;
  readonly model: ModelClient;
  /** Start every configured server; failures are reported, not thrown */
  start(): Promise<Record<string, StartOutcome>>;
  createTask(options: TaskOptions): ExecutionLoop;
  runTask(options: TaskOptions): Promise<TaskOutcome>;
  shutdown(): Promise<void>;
}

export function createAgentRuntime(options: AgentRuntimeOptions): AgentRuntime {
  const { config } = options;

  const servers = new ServerRegistry({
    transportFactory: options.transportFactory,
    clientOptions: {
      handshakeTimeoutMs: config.mcp.handshakeTimeoutMs,
      requestTimeoutMs: config.mcp.requestTimeoutMs,
    },
  });
  servers.initialize(options.serverConfigs ?? []);

  const model = options.model ?? createAnthropicModelClient({ maxTokens: config.agent.maxTokens });
  const tools = new ToolRegistry({ exposure: options.exposure ?? loadExposureConfig() });
  const dispatcher = new ToolDispatcher(tools, servers);

  const defaults: LoopDefaults = {
    permissionMode: config.agent.permissionMode,
    maxTurns: config.agent.maxTurns,
    maxWallClockMs: config.agent.maxWallClockMs,
    maxThinkingTokens: config.agent.maxThinkingTokens,
    maxConcurrency: config.agent.maxConcurrency,
    toolDeadlineMs: config.agent.toolDeadlineMs,
    model: config.agent.model,
    systemPrompt: config.agent.systemPrompt,
  };

  // Sub-agents see every tool except `task`, so they cannot recurse
  async function runSubAgent(request: SubAgentRequest): Promise<TaskOutcome> {
    const subTools = tools.fork({ exclude: [TASK_TOOL_NAME] });
    const loop = new ExecutionLoop(
      { model, tools: subTools, dispatcher: dispatcher.withTools(subTools), defaults },
      {
        prompt: request.prompt,
        permissionMode: request.permissionMode,
        signal: request.signal,
        maxTurns: Math.max(1, Math.floor(defaults.maxTurns / 2)),
      },
    );
    return loop.runToCompletion((event) => {
      if (event.type === 'tool_call') {
        logger.debug({ subtask: request.description, tool: event.call.name }, 'Sub-agent tool call');
      }
    });
  }

  tools.registerAllNative(createNativeTools({
    workspaceRoot: config.workspace.root,
    bashTimeoutMs: config.workspace.bashTimeoutMs,
    runSubAgent,
  }));
  const detach = tools.attach(servers);

  logger.info(
    { nativeTools: tools.size(), servers: servers.listServers().length, model: defaults.model },
    'Agent runtime initialized',
  );

  let starting: Promise<Record<string, StartOutcome>> | null = null;

  function start(): Promise<Record<string, StartOutcome>> {
    if (!starting) {
      starting = servers.startAll().then((outcomes) => {
        for (const [name, outcome] of Object.entries(outcomes)) {
          if (!outcome.ok) logger.warn({ server: name, error: outcome.error }, 'MCP server unavailable');
        }
        return outcomes;
      });
    }
    return starting;
  }

  function createTask(task: TaskOptions): ExecutionLoop {
    return new ExecutionLoop({ model, tools, dispatcher, defaults }, task);
  }

  async function runTask(task: TaskOptions): Promise<TaskOutcome> {
    await start();
    return createTask(task).runToCompletion();
  }

  async function shutdown(): Promise<void> {
    detach();
    await servers.shutdown();
  }

  return { servers, tools, dispatcher, model, start, createTask, runTask, shutdown };
}

export { ExecutionLoop } from './loop';
export type { LoopEvent, TaskOptions, TaskOutcome, TerminationReason, ExecutionTurn } from './loop';
export { ToolRegistry } from './tool-registry';
export type { NativeTool, ToolContext, ResolvedTool, ShadowedTool } from './tool-registry';
export { ToolDispatcher, formatForModel } from './dispatcher';
export type { InvocationResult, RemoteInvoker } from './dispatcher';
export { createAnthropicModelClient } from './model-client';
export type { ModelClient, CompletionRequest, CompletionResponse, ToolCall, TranscriptMessage } from './model-client';
export { CostLedger, estimateCostUsd } from './cost';
export type { TokenUsage, CostSnapshot } from './cost';
export { createNativeTools } from './native-tools';
