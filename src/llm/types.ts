/**
 * Provider-neutral request and response shapes.
 */

import type { ConversationMessage, ToolCallRequest } from '../types/conversation.js';
import type { LlmToolDefinition } from '../tools/registry.js';

export interface ModelUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ModelRequest {
  model: string;
  system?: string | undefined;
  messages: readonly ConversationMessage[];
  tools?: readonly LlmToolDefinition[] | undefined;
  maxOutputTokens?: number | undefined;
  temperature?: number | undefined;
}

export interface ModelResponse {
  /** Assistant text, null when the model only called tools */
  content: string | null;
  toolCalls: ToolCallRequest[];
  usage: ModelUsage | null;
  /** Model that actually answered */
  model: string;
  stopReason: string | null;
}

export interface GenerateOptions {
  signal?: AbortSignal | undefined;
}

/**
 * A language model backend. Errors are classified by message; throw
 * `ProviderError` with `terminal: true` for failures that must not be retried.
 */
export interface ModelProvider {
  generate(request: ModelRequest, options?: GenerateOptions): Promise<ModelResponse>;
}
