/**
 * ModelProvider backed by the Vercel AI SDK.
 */

import {
  APICallError,
  generateText,
  jsonSchema,
  tool,
  type LanguageModel,
  type ModelMessage,
  type ToolSet,
} from 'ai';
import { ProviderError } from '../errors.js';
import type { LlmToolDefinition } from '../tools/registry.js';
import {
  contentToText,
  parseToolArguments,
  type ConversationMessage,
} from '../types/conversation.js';
import type { GenerateOptions, ModelProvider, ModelRequest, ModelResponse } from './types.js';

// ── Conversion functions ─────────────────────────────────────────────

export function convertMessages(messages: readonly ConversationMessage[]): ModelMessage[] {
  return messages.map((message): ModelMessage => {
    const text = contentToText(message.content);
    switch (message.type) {
      case 'user_message':
        return { role: 'user', content: text };
      case 'system_note':
        return { role: 'system', content: text };
      case 'assistant_message': {
        const calls = message.toolCalls ?? [];
        if (calls.length === 0) {
          return { role: 'assistant', content: text };
        }
        return {
          role: 'assistant',
          content: [
            ...(text ? [{ type: 'text' as const, text }] : []),
            ...calls.map((call) => {
              const parsed = parseToolArguments(call.arguments);
              return {
                type: 'tool-call' as const,
                toolCallId: call.id,
                toolName: call.name,
                input: parsed.ok ? parsed.value : {},
              };
            }),
          ],
        };
      }
      case 'tool_result':
        return {
          role: 'tool',
          content: [
            {
              type: 'tool-result',
              toolCallId: message.toolCallId ?? '',
              toolName: message.toolName ?? '',
              output: message.isError
                ? { type: 'error-text', value: text }
                : { type: 'text', value: text },
            },
          ],
        };
    }
  });
}

export function convertTools(tools: readonly LlmToolDefinition[] | undefined): ToolSet | undefined {
  if (!tools || tools.length === 0) return undefined;

  const result: ToolSet = {};
  for (const def of tools) {
    result[def.function.name] = tool({
      description: def.function.description,
      inputSchema: jsonSchema(def.function.parameters),
    });
  }
  return result;
}

/**
 * Provider errors carry the HTTP status in the message so signature matching sees it.
 */
export function convertError(error: unknown): unknown {
  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    const message = status !== undefined ? `${error.message} (status ${String(status)})` : error.message;
    return new ProviderError(message, {
      statusCode: status,
      terminal: !error.isRetryable,
      cause: error,
    });
  }
  return error;
}

// ── Provider ─────────────────────────────────────────────────────────

export interface AiSdkProviderOptions {
  /** Resolve a model id to an AI SDK model */
  resolveModel: (modelId: string) => LanguageModel;
}

/**
 * @example
 * ```typescript
 * import { anthropic } from '@ai-sdk/anthropic';
 *
 * const provider = createAiSdkProvider({ resolveModel: (id) => anthropic(id) });
 * ```
 */
export function createAiSdkProvider(options: AiSdkProviderOptions): ModelProvider {
  return {
    async generate(request: ModelRequest, generateOptions: GenerateOptions = {}): Promise<ModelResponse> {
      const tools = convertTools(request.tools);
      try {
        // Retries are owned by RetryManager
        const result = await generateText({
          model: options.resolveModel(request.model),
          messages: convertMessages(request.messages),
          maxRetries: 0,
          ...(request.system !== undefined ? { system: request.system } : {}),
          ...(tools !== undefined ? { tools } : {}),
          ...(request.maxOutputTokens !== undefined ? { maxOutputTokens: request.maxOutputTokens } : {}),
          ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
          ...(generateOptions.signal !== undefined ? { abortSignal: generateOptions.signal } : {}),
        });

        const inputTokens = result.usage.inputTokens ?? 0;
        const outputTokens = result.usage.outputTokens ?? 0;
        return {
          content: result.text || null,
          toolCalls: result.toolCalls.map((call) => ({
            id: call.toolCallId,
            name: call.toolName,
            arguments: JSON.stringify(call.input ?? {}),
          })),
          usage: {
            inputTokens,
            outputTokens,
            totalTokens: result.usage.totalTokens ?? inputTokens + outputTokens,
          },
          model: request.model,
          stopReason: result.finishReason,
        };
      } catch (error) {
        throw convertError(error);
      }
    },
  };
}
