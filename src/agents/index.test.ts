import { describe, it, expect, afterEach } from 'vitest';
import { tmpdir } from 'os';
import { appConfigSchema } from '../utils/config';
import { OPEN_EXPOSURE } from '../mcp/security';
import { FakeServer, fakeTransportFactory, textResult } from '../mcp/testing/fake-server';
import { createAgentRuntime, type AgentRuntime } from './index';
import type { CompletionRequest, CompletionResponse, ModelClient, ToolCall } from './model-client';

function reply(text: string, toolCalls: ToolCall[] = []): CompletionResponse {
  return {
    text,
    toolCalls,
    thinking: [],
    usage: { inputTokens: 10, outputTokens: 10, cacheReadTokens: 0, cacheWriteTokens: 0 },
    stopReason: toolCalls.length > 0 ? 'tool_use' : 'end_turn',
    model: 'claude-sonnet-4-5',
  };
}

class ScriptedModel implements ModelClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly script: CompletionResponse[]) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push({ ...request, messages: [...request.messages] });
    return this.script.shift() ?? reply('done');
  }
}

let runtime: AgentRuntime | undefined;

afterEach(async () => {
  await runtime?.shutdown();
  runtime = undefined;
});

function build(model: ModelClient, server: FakeServer): AgentRuntime {
  runtime = createAgentRuntime({
    config: appConfigSchema.parse({ agent: { maxTurns: 4 }, workspace: { root: tmpdir() } }),
    serverConfigs: [{ name: server.name, command: `${server.name}-server` }],
    model,
    exposure: OPEN_EXPOSURE,
    transportFactory: fakeTransportFactory([server]),
  });
  return runtime;
}

describe('createAgentRuntime', () => {
  it('starts servers on the first task and routes remote tool calls', async () => {
    const server = new FakeServer('kb', { tools: [{ name: 'lookup', handler: () => textResult('kb says hi') }] });
    const model = new ScriptedModel([reply('', [{ id: 't1', name: 'lookup', arguments: {} }]), reply('answer')]);
    const agent = build(model, server);

    expect(server.transports).toHaveLength(0);
    const outcome = await agent.runTask({ prompt: 'ask kb', permissionMode: 'full' });

    expect(server.transports).toHaveLength(1);
    expect(outcome.reason).toBe('completed');
    expect(outcome.finalText).toBe('answer');
    expect(outcome.turns[0].results[0]).toMatchObject({ success: true, payload: 'kb says hi' });
  });

  it('runs sub-agents without the task tool and reports their result', async () => {
    const server = new FakeServer('kb', { tools: [] });
    const model = new ScriptedModel([
      reply('', [{ id: 't1', name: 'task', arguments: { description: 'sub job', prompt: 'do it' } }]),
      reply('sub result'),
      reply('parent done'),
    ]);
    const agent = build(model, server);

    const outcome = await agent.runTask({ prompt: 'delegate', permissionMode: 'full' });

    expect(model.requests[0].tools.map((t) => t.name)).toContain('task');
    expect(model.requests[1].tools.map((t) => t.name)).not.toContain('task');
    expect(model.requests[1].messages).toEqual([{ role: 'user', content: 'do it' }]);
    expect(outcome.turns[0].results[0]).toMatchObject({
      success: true,
      payload: { status: 'completed', result: 'sub result', tool_use_count: 0 },
    });
    expect(outcome.finalText).toBe('parent done');
  });
});
