/**
 * Execution loop - drives one task: model call, concurrent tool dispatch,
 * results appended in request order, repeat until the model stops asking
 * for tools or a bound is hit.
 *
 * Bounds: turn count, wall clock, external cancellation. Each task owns
 * its AbortController, so cancelling one task never touches another.
 */

import { createLogger } from '../utils/logger';
import { errorMessage, toRelayError, type RelayErrorKind } from '../errors';
import type { PermissionMode } from '../mcp/security';
import { CostLedger, type CostSnapshot, type TokenUsage } from './cost';
import { formatForModel, type InvocationResult, type ToolDispatcher } from './dispatcher';
import type { CompletionResponse, ModelClient, ToolCall, TranscriptMessage } from './model-client';
import type { ToolRegistry } from './tool-registry';

const logger = createLogger('loop');

// =============================================================================
// TYPES
// =============================================================================

export interface TaskOptions {
  prompt: string;
  permissionMode?: PermissionMode;
  maxTurns?: number;
  maxWallClockMs?: number;
  maxThinkingTokens?: number;
  maxConcurrency?: number;
  toolDeadlineMs?: number;
  signal?: AbortSignal;
  model?: string;
  systemPrompt?: string;
}

export type LoopDefaults = Required<Omit<TaskOptions, 'prompt' | 'signal' | 'systemPrompt'>> & {
  systemPrompt?: string;
};

export const DEFAULT_LOOP_OPTIONS: LoopDefaults = {
  permissionMode: 'restricted',
  maxTurns: 20,
  maxWallClockMs: 10 * 60 * 1000,
  maxThinkingTokens: 0,
  maxConcurrency: 5,
  toolDeadlineMs: 60_000,
  model: 'claude-sonnet-4-5',
};

export type TerminationReason = 'completed' | 'max_turns' | 'timeout' | 'model_error' | 'cancelled';

export interface ExecutionTurn {
  index: number;
  text: string;
  toolCalls: ToolCall[];
  /** Same order as toolCalls */
  results: InvocationResult[];
  usage: TokenUsage;
  costUsd: number;
}

export interface TaskOutcome {
  reason: TerminationReason;
  finalText: string;
  turns: ExecutionTurn[];
  ledger: CostSnapshot;
  toolUseCount: number;
  durationMs: number;
  error?: { kind: RelayErrorKind; message: string };
}

export type LoopEvent =
  | { type: 'turn_start'; turn: number }
  | { type: 'model_response'; turn: number; text: string; toolCalls: ToolCall[]; usage: TokenUsage; costUsd: number }
  | { type: 'tool_call'; turn: number; call: ToolCall }
  | { type: 'tool_result'; turn: number; result: InvocationResult }
  | { type: 'turn_end'; turn: ExecutionTurn }
  | { type: 'done'; outcome: TaskOutcome };

export interface ExecutionLoopDeps {
  model: ModelClient;
  tools: ToolRegistry;
  dispatcher: ToolDispatcher;
  defaults?: Partial<LoopDefaults>;
}

// =============================================================================
// EXECUTION LOOP
// =============================================================================

export class ExecutionLoop {
  private readonly options: LoopDefaults & { prompt: string; signal?: AbortSignal };
  private started = false;

  constructor(private readonly deps: ExecutionLoopDeps, task: TaskOptions) {
    const merged = { ...DEFAULT_LOOP_OPTIONS, ...deps.defaults };
    this.options = {
      prompt: task.prompt,
      signal: task.signal,
      permissionMode: task.permissionMode ?? merged.permissionMode,
      maxTurns: task.maxTurns ?? merged.maxTurns,
      maxWallClockMs: task.maxWallClockMs ?? merged.maxWallClockMs,
      maxThinkingTokens: task.maxThinkingTokens ?? merged.maxThinkingTokens,
      maxConcurrency: task.maxConcurrency ?? merged.maxConcurrency,
      toolDeadlineMs: task.toolDeadlineMs ?? merged.toolDeadlineMs,
      model: task.model ?? merged.model,
      systemPrompt: task.systemPrompt ?? merged.systemPrompt,
    };
  }

  /**
   * Lazy, finite event stream for this task. Can be consumed once; the
   * generator's return value is the outcome, also carried by the final
   * `done` event.
   */
  async *run(): AsyncGenerator<LoopEvent, TaskOutcome, undefined> {
    if (this.started) {
      throw new Error('ExecutionLoop.run() can only be called once');
    }
    this.started = true;

    const opts = this.options;
    const startedAt = Date.now();
    const ledger = new CostLedger();
    const turns: ExecutionTurn[] = [];
    const transcript: TranscriptMessage[] = [{ role: 'user', content: opts.prompt }];

    // Task-scoped cancellation: parent signal or wall-clock expiry
    const controller = new AbortController();
    let timedOut = false;
    const onParentAbort = () => controller.abort();
    opts.signal?.addEventListener('abort', onParentAbort, { once: true });
    if (opts.signal?.aborted) controller.abort();
    const wallClock = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, opts.maxWallClockMs);

    let finalText = '';
    let toolUseCount = 0;

    const finish = (reason: TerminationReason, error?: TaskOutcome['error']): TaskOutcome => {
      const outcome: TaskOutcome = {
        reason,
        finalText,
        turns,
        ledger: ledger.snapshot(),
        toolUseCount,
        durationMs: Date.now() - startedAt,
      };
      if (error) outcome.error = error;
      logger.info(
        { reason, turns: turns.length, toolUseCount, costUsd: outcome.ledger.usd, durationMs: outcome.durationMs },
        'Task finished',
      );
      return outcome;
    };
    const stopReason = (): TerminationReason | null => {
      if (!controller.signal.aborted) return null;
      return timedOut ? 'timeout' : 'cancelled';
    };

    try {
      for (let index = 0; index < opts.maxTurns; index++) {
        const early = stopReason();
        if (early) {
          const outcome = finish(early);
          yield { type: 'done', outcome };
          return outcome;
        }

        yield { type: 'turn_start', turn: index };

        let response: CompletionResponse;
        try {
          response = await this.deps.model.complete({
            system: opts.systemPrompt,
            messages: transcript,
            tools: this.deps.tools.catalog(opts.permissionMode),
            maxThinkingTokens: opts.maxThinkingTokens,
            model: opts.model,
            signal: controller.signal,
          });
        } catch (err) {
          const error = toRelayError(err, 'ModelCallFailure');
          const reason = stopReason() ?? (error.kind === 'Cancelled' ? 'cancelled' : 'model_error');
          logger.warn({ turn: index, kind: error.kind, error: errorMessage(err) }, 'Model call did not complete');
          const outcome = finish(reason, { kind: error.kind, message: error.message });
          yield { type: 'done', outcome };
          return outcome;
        }

        const costUsd = ledger.record(opts.model, response.usage);
        if (response.text) finalText = response.text;
        yield {
          type: 'model_response',
          turn: index,
          text: response.text,
          toolCalls: response.toolCalls,
          usage: response.usage,
          costUsd,
        };

        const turn: ExecutionTurn = {
          index,
          text: response.text,
          toolCalls: response.toolCalls,
          results: [],
          usage: response.usage,
          costUsd,
        };

        if (response.toolCalls.length === 0) {
          turns.push(turn);
          yield { type: 'turn_end', turn };
          const outcome = finish('completed');
          yield { type: 'done', outcome };
          return outcome;
        }

        transcript.push({
          role: 'assistant',
          text: response.text,
          toolCalls: response.toolCalls,
          thinking: response.thinking,
        });

        for (const call of response.toolCalls) {
          yield { type: 'tool_call', turn: index, call };
        }
        toolUseCount += response.toolCalls.length;

        turn.results = await this.deps.dispatcher.dispatchAll(response.toolCalls, {
          maxConcurrency: opts.maxConcurrency,
          signal: controller.signal,
          permissionMode: opts.permissionMode,
          deadlineMs: opts.toolDeadlineMs,
        });

        for (const result of turn.results) {
          yield { type: 'tool_result', turn: index, result };
        }

        transcript.push({
          role: 'tool_results',
          results: turn.results.map((result) => ({
            toolCallId: result.toolCallId,
            content: formatForModel(result),
            isError: !result.success,
          })),
        });
        turns.push(turn);
        yield { type: 'turn_end', turn };
      }

      const outcome = finish(stopReason() ?? 'max_turns');
      yield { type: 'done', outcome };
      return outcome;
    } finally {
      clearTimeout(wallClock);
      opts.signal?.removeEventListener('abort', onParentAbort);
      // Consumer may stop iterating early; nothing of this task keeps running
      controller.abort();
    }
  }

  /** Drain the event stream and return the outcome */
  async runToCompletion(onEvent?: (event: LoopEvent) => void): Promise<TaskOutcome> {
    const events = this.run();
    while (true) {
      const next = await events.next();
      if (next.done) return next.value;
      onEvent?.(next.value);
    }
  }
}
