import { describe, it, expect } from 'vitest';
import { RelayError } from '../errors';
import { ServerRegistry } from '../mcp/registry';
import { FakeServer, fakeTransportFactory, textResult } from '../mcp/testing/fake-server';
import { ToolDispatcher } from './dispatcher';
import { ExecutionLoop, type LoopEvent, type TaskOptions } from './loop';
import type { CompletionRequest, CompletionResponse, ModelClient, ToolCall } from './model-client';
import { ToolRegistry, type NativeTool } from './tool-registry';

// =============================================================================
// Fakes
// =============================================================================

type Step = (request: CompletionRequest) => CompletionResponse | Promise<CompletionResponse>;

function reply(text: string, toolCalls: ToolCall[] = []): CompletionResponse {
  return {
    text,
    toolCalls,
    thinking: [],
    usage: { inputTokens: 1000, outputTokens: 100, cacheReadTokens: 0, cacheWriteTokens: 0 },
    stopReason: toolCalls.length > 0 ? 'tool_use' : 'end_turn',
    model: 'claude-sonnet-4-5',
  };
}

function call(id: string, name: string, args: Record<string, unknown> = {}): ToolCall {
  return { id, name, arguments: args };
}

/** Plays back a fixed script; once it runs out, repeats `fallback` */
class ScriptedModel implements ModelClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly script: Step[], private readonly fallback: Step = () => reply('done')) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    // The loop keeps appending to its transcript; keep what this call saw
    this.requests.push({ ...request, messages: [...request.messages] });
    const step = this.script.shift() ?? this.fallback;
    return step(request);
  }
}

function sleeper(name: string, ms: number, sideEffects = false): NativeTool {
  return {
    name,
    description: `sleeps ${ms}ms`,
    inputSchema: { type: 'object', properties: {} },
    sideEffects,
    execute: (_args, ctx) =>
      new Promise((resolve, reject) => {
        const timer = setTimeout(() => resolve(`${name} done`), ms);
        ctx.signal.addEventListener('abort', () => {
          clearTimeout(timer);
          reject(new Error('aborted'));
        }, { once: true });
      }),
  };
}

function harness(natives: NativeTool[]) {
  const tools = new ToolRegistry();
  tools.registerAllNative(natives);
  const dispatcher = new ToolDispatcher(tools, null);
  return {
    tools,
    dispatcher,
    loop: (model: ModelClient, task: TaskOptions) => new ExecutionLoop({ model, tools, dispatcher }, task),
  };
}

// =============================================================================
// Turn structure
// =============================================================================

describe('ExecutionLoop turns', () => {
  it('yields tool results in request order even when later calls finish first', async () => {
    const { loop } = harness([sleeper('slow', 50), sleeper('fast', 5)]);
    const model = new ScriptedModel([
      () => reply('checking', [call('t1', 'slow'), call('t2', 'fast')]),
      () => reply('all done'),
    ]);
    const events: LoopEvent[] = [];

    const outcome = await loop(model, { prompt: 'go' }).runToCompletion((e) => events.push(e));

    expect(events.map((e) => e.type)).toEqual([
      'turn_start', 'model_response', 'tool_call', 'tool_call', 'tool_result', 'tool_result', 'turn_end',
      'turn_start', 'model_response', 'turn_end',
      'done',
    ]);
    const results = events.flatMap((e) => (e.type === 'tool_result' ? [e.result.toolCallId] : []));
    expect(results).toEqual(['t1', 't2']);

    expect(model.requests[1].messages[2]).toEqual({
      role: 'tool_results',
      results: [
        { toolCallId: 't1', content: 'slow done', isError: false },
        { toolCallId: 't2', content: 'fast done', isError: false },
      ],
    });
    expect(outcome).toMatchObject({ reason: 'completed', finalText: 'all done', toolUseCount: 2 });
    expect(outcome.turns).toHaveLength(2);
  });

  it('accumulates token usage and cost across turns', async () => {
    const { loop } = harness([sleeper('fast', 1)]);
    const model = new ScriptedModel([() => reply('', [call('t1', 'fast')]), () => reply('ok')]);

    const outcome = await loop(model, { prompt: 'go' }).runToCompletion();

    expect(outcome.ledger).toMatchObject({ inputTokens: 2000, outputTokens: 200, modelCalls: 2 });
    // sonnet: 1000 * 3/1M + 100 * 15/1M = 0.0045 per turn
    expect(outcome.ledger.usd).toBeCloseTo(0.009, 6);
    expect(outcome.turns[0].costUsd).toBeCloseTo(0.0045, 6);
  });

  it('stops at the turn limit', async () => {
    const { loop } = harness([sleeper('fast', 1)]);
    const model = new ScriptedModel([], () => reply('again', [call('t', 'fast')]));

    const outcome = await loop(model, { prompt: 'loop forever', maxTurns: 2 }).runToCompletion();

    expect(outcome.reason).toBe('max_turns');
    expect(outcome.turns).toHaveLength(2);
    expect(model.requests).toHaveLength(2);
  });

  it('ends with model_error when the model call fails', async () => {
    const { loop } = harness([]);
    const model = new ScriptedModel([
      () => {
        throw new RelayError('ModelCallFailure', 'Model call failed: boom');
      },
    ]);

    const outcome = await loop(model, { prompt: 'go' }).runToCompletion();

    expect(outcome.reason).toBe('model_error');
    expect(outcome.error).toEqual({ kind: 'ModelCallFailure', message: 'Model call failed: boom' });
    expect(outcome.turns).toEqual([]);
  });

  it('offers only visible tools and reports denied calls back to the model', async () => {
    const { loop } = harness([sleeper('read', 1), sleeper('write_thing', 1, true)]);
    const model = new ScriptedModel([() => reply('', [call('t1', 'write_thing')]), () => reply('gave up')]);

    const outcome = await loop(model, { prompt: 'go', permissionMode: 'restricted' }).runToCompletion();

    expect(model.requests[0].tools.map((t) => t.name)).toEqual(['read']);
    expect(model.requests[1].messages[2]).toEqual({
      role: 'tool_results',
      results: [{
        toolCallId: 't1',
        content: 'Error (PermissionDenied): Tool write_thing is not available in restricted mode',
        isError: true,
      }],
    });
    expect(outcome.reason).toBe('completed');
  });

  it('can only be run once', async () => {
    const { loop } = harness([]);
    const task = loop(new ScriptedModel([]), { prompt: 'go' });
    await task.runToCompletion();

    await expect(task.run().next()).rejects.toThrow('ExecutionLoop.run() can only be called once');
  });
});

// =============================================================================
// Bounds and cancellation
// =============================================================================

describe('ExecutionLoop bounds', () => {
  it('times out on the wall clock and cancels in-flight tools', async () => {
    const { loop } = harness([sleeper('slow', 500)]);
    const model = new ScriptedModel([() => reply('', [call('t1', 'slow')])]);
    const events: LoopEvent[] = [];

    const outcome = await loop(model, { prompt: 'go', maxWallClockMs: 30 }).runToCompletion((e) => events.push(e));

    expect(outcome.reason).toBe('timeout');
    const result = events.find((e) => e.type === 'tool_result');
    expect(result).toMatchObject({ result: { success: false, errorKind: 'Cancelled' } });
    expect(model.requests).toHaveLength(1);
  });

  it('cancelling one task leaves a concurrent task running', async () => {
    const { loop } = harness([sleeper('slow', 500), sleeper('fast', 20)]);
    const cancelMe = new AbortController();

    const doomed = loop(
      new ScriptedModel([() => reply('', [call('a1', 'slow')])]),
      { prompt: 'a', signal: cancelMe.signal },
    ).runToCompletion();
    const survivor = loop(
      new ScriptedModel([() => reply('', [call('b1', 'fast')]), () => reply('finished')]),
      { prompt: 'b' },
    ).runToCompletion();

    setTimeout(() => cancelMe.abort(), 5);
    const [a, b] = await Promise.all([doomed, survivor]);

    expect(a.reason).toBe('cancelled');
    expect(a.turns[0].results[0]).toMatchObject({ success: false, errorKind: 'Cancelled' });
    expect(b.reason).toBe('completed');
    expect(b.turns[0].results[0]).toMatchObject({ success: true, payload: 'fast done' });
  });

  it('cancelling one task leaves a concurrent task against the same server unaffected', async () => {
    const server = new FakeServer('kb', {
      tools: [
        { name: 'slow_lookup', delayMs: 500 },
        { name: 'quick_lookup', delayMs: 20, handler: () => textResult('quick answer') },
      ],
    });
    const servers = new ServerRegistry({ transportFactory: fakeTransportFactory([server]) });
    servers.initialize([{ name: 'kb', command: 'kb-server' }]);
    const tools = new ToolRegistry();
    tools.attach(servers);
    await servers.ensureStarted('kb');
    const dispatcher = new ToolDispatcher(tools, servers);
    const cancelMe = new AbortController();

    const doomed = new ExecutionLoop(
      { model: new ScriptedModel([() => reply('', [call('a1', 'slow_lookup')])]), tools, dispatcher },
      { prompt: 'a', signal: cancelMe.signal },
    ).runToCompletion();
    const survivor = new ExecutionLoop(
      { model: new ScriptedModel([() => reply('', [call('b1', 'quick_lookup')]), () => reply('finished')]), tools, dispatcher },
      { prompt: 'b' },
    ).runToCompletion();

    setTimeout(() => cancelMe.abort(), 5);
    const [a, b] = await Promise.all([doomed, survivor]);

    expect(a.reason).toBe('cancelled');
    expect(a.turns[0].results[0]).toMatchObject({ success: false, errorKind: 'Cancelled' });
    expect(b.reason).toBe('completed');
    expect(b.turns[0].results[0]).toMatchObject({ success: true, payload: 'quick answer' });
    expect(server.calls.map((c) => c.name).sort()).toEqual(['quick_lookup', 'slow_lookup']);
    expect(server.current?.notifications('notifications/cancelled')).toHaveLength(1);
    await servers.shutdown();
  });

  it('never calls the model when the task is cancelled up front', async () => {
    const { loop } = harness([]);
    const controller = new AbortController();
    controller.abort();
    const model = new ScriptedModel([]);

    const outcome = await loop(model, { prompt: 'go', signal: controller.signal }).runToCompletion();

    expect(outcome.reason).toBe('cancelled');
    expect(model.requests).toHaveLength(0);
  });
});
