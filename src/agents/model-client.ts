/**
 * Model client - one completion round trip per call.
 *
 * The transcript types here are provider-neutral; the Anthropic
 * implementation converts them to Messages API params.
 */

import Anthropic from '@anthropic-ai/sdk';
import { createLogger } from '../utils/logger';
import { CancelledError, RelayError, errorMessage, isRelayError } from '../errors';
import { RETRY_POLICIES, isTransientError, withRetry, type RetryOptions } from '../infra/retry';
import type { ToolCatalogEntry } from '../mcp/types';
import type { TokenUsage } from './cost';

const logger = createLogger('model-client');

const MIN_THINKING_BUDGET = 1024;

// =============================================================================
// TRANSCRIPT TYPES
// =============================================================================

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResultMessage {
  toolCallId: string;
  content: string;
  isError: boolean;
}

export interface ThinkingBlock {
  thinking: string;
  signature: string;
}

export type TranscriptMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; text: string; toolCalls: ToolCall[]; thinking?: ThinkingBlock[] }
  | { role: 'tool_results'; results: ToolResultMessage[] };

export interface CompletionRequest {
  system?: string;
  messages: readonly TranscriptMessage[];
  tools: readonly ToolCatalogEntry[];
  maxThinkingTokens: number;
  model: string;
  signal?: AbortSignal;
}

export interface CompletionResponse {
  text: string;
  toolCalls: ToolCall[];
  thinking: ThinkingBlock[];
  usage: TokenUsage;
  stopReason: string | null;
  model: string;
}

export interface ModelClient {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

// =============================================================================
// ANTHROPIC
// =============================================================================

/** The slice of the SDK's messages resource this client calls */
export interface MessagesApi {
  create(params: Anthropic.MessageCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<Anthropic.Message>;
}

export interface AnthropicModelClientOptions {
  apiKey?: string;
  baseURL?: string;
  maxTokens?: number;
  retry?: RetryOptions;
  /** Injected SDK surface, used by tests */
  messages?: MessagesApi;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toApiTools(tools: readonly ToolCatalogEntry[]): Anthropic.Tool[] {
  return tools.map((tool) => {
    const inputSchema: Anthropic.Tool['input_schema'] = { ...tool.inputSchema, type: 'object' };
    return { name: tool.name, description: tool.description, input_schema: inputSchema };
  });
}

export function toApiMessages(messages: readonly TranscriptMessage[]): Anthropic.MessageParam[] {
  return messages.map((message): Anthropic.MessageParam => {
    switch (message.role) {
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant': {
        const content: Anthropic.ContentBlockParam[] = [];
        for (const block of message.thinking ?? []) {
          content.push({ type: 'thinking', thinking: block.thinking, signature: block.signature });
        }
        if (message.text) content.push({ type: 'text', text: message.text });
        for (const call of message.toolCalls) {
          content.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
        }
        return { role: 'assistant', content: content.length > 0 ? content : '(no output)' };
      }
      case 'tool_results':
        return {
          role: 'user',
          content: message.results.map((result): Anthropic.ToolResultBlockParam => ({
            type: 'tool_result',
            tool_use_id: result.toolCallId,
            content: result.content,
            is_error: result.isError,
          })),
        };
    }
  });
}

export function fromApiMessage(response: Anthropic.Message): CompletionResponse {
  const texts: string[] = [];
  const toolCalls: ToolCall[] = [];
  const thinking: ThinkingBlock[] = [];

  for (const block of response.content) {
    if (block.type === 'text') {
      texts.push(block.text);
    } else if (block.type === 'tool_use') {
      toolCalls.push({ id: block.id, name: block.name, arguments: isRecord(block.input) ? block.input : {} });
    } else if (block.type === 'thinking') {
      thinking.push({ thinking: block.thinking, signature: block.signature });
    }
  }

  return {
    text: texts.join('\n'),
    toolCalls,
    thinking,
    usage: {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      cacheReadTokens: response.usage.cache_read_input_tokens ?? 0,
      cacheWriteTokens: response.usage.cache_creation_input_tokens ?? 0,
    },
    stopReason: response.stop_reason,
    model: response.model,
  };
}

function isRetryableModelError(error: Error): boolean {
  if (error instanceof Anthropic.APIUserAbortError) return false;
  if (error instanceof Anthropic.APIConnectionError) return true;
  return isTransientError(error);
}

export function createAnthropicModelClient(options: AnthropicModelClientOptions = {}): ModelClient {
  const maxTokens = options.maxTokens ?? 8192;
  const retry = options.retry ?? RETRY_POLICIES.model;

  let messagesApi: MessagesApi | undefined = options.messages;
  if (!messagesApi) {
    const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      logger.warn('ANTHROPIC_API_KEY not set -- model calls will fail');
    }
    // Retries are driven by withRetry, not the SDK
    messagesApi = new Anthropic({ apiKey: apiKey ?? 'missing', baseURL: options.baseURL, maxRetries: 0 }).messages;
  }
  const api = messagesApi;

  async function complete(request: CompletionRequest): Promise<CompletionResponse> {
    const { signal } = request;
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: request.model,
      max_tokens: maxTokens,
      messages: toApiMessages(request.messages),
    };
    if (request.system) params.system = request.system;
    if (request.tools.length > 0) params.tools = toApiTools(request.tools);
    if (request.maxThinkingTokens > 0) {
      const budget = Math.max(MIN_THINKING_BUDGET, request.maxThinkingTokens);
      params.thinking = { type: 'enabled', budget_tokens: budget };
      params.max_tokens = Math.max(maxTokens, budget + MIN_THINKING_BUDGET);
    }

    const startedAt = Date.now();
    try {
      const response = await withRetry(
        () => api.create(params, { signal }),
        {
          ...retry,
          signal,
          retryPredicate: isRetryableModelError,
          onRetry: (info) => {
            if (info.willRetry) {
              logger.warn({ attempt: info.attempt, delay: info.delay, error: info.error.message }, 'Model call failed, retrying');
            }
          },
        },
      );
      const completion = fromApiMessage(response);
      logger.debug(
        {
          model: completion.model,
          toolCalls: completion.toolCalls.length,
          stopReason: completion.stopReason,
          durationMs: Date.now() - startedAt,
        },
        'Model call completed',
      );
      return completion;
    } catch (err) {
      if (signal?.aborted || err instanceof Anthropic.APIUserAbortError) {
        throw new CancelledError('Model call cancelled', { cause: err });
      }
      if (isRelayError(err) && err.kind === 'Cancelled') throw err;
      logger.error({ model: request.model, error: errorMessage(err) }, 'Model call failed');
      throw new RelayError('ModelCallFailure', `Model call failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  return { complete };
}
