/**
 * Conversation message model shared by the compaction engine, the
 * orchestrator and the provider adapters.
 */

export type MessageRole = 'user' | 'assistant' | 'tool' | 'system';

export type MessageType = 'user_message' | 'assistant_message' | 'tool_result' | 'system_note';

export const MESSAGE_TYPES: readonly MessageType[] = [
  'user_message',
  'assistant_message',
  'tool_result',
  'system_note',
];

export type MessagePriority = 'critical' | 'high' | 'normal' | 'low';

/** Ordered from most to least important. */
export const MESSAGE_PRIORITIES: readonly MessagePriority[] = ['critical', 'high', 'normal', 'low'];

/** Eviction order: lower rank goes first. */
export const PRIORITY_RANK: Record<MessagePriority, number> = {
  low: 0,
  normal: 1,
  high: 2,
  critical: 3,
};

export type MessageContent = string | Record<string, unknown>;

/**
 * A tool invocation requested by the model. `arguments` is the raw JSON text.
 */
export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: string;
}

/**
 * Cumulative record of everything compaction has removed.
 */
export interface SummaryMetadata {
  evictedCount: number;
  byType: Record<MessageType, number>;
  /** Names of tools whose calls or results were evicted, first-seen order */
  tools: string[];
  /** Compaction runs folded into this summary */
  compactions: number;
}

export interface ConversationMessage {
  readonly id: string;
  readonly role: MessageRole;
  readonly type: MessageType;
  readonly content: MessageContent;
  /** Epoch milliseconds */
  readonly timestamp: number;
  /** UTF-8 size of the serialized content */
  readonly sizeBytes: number;
  readonly priority: MessagePriority;
  /** In [0, 1]; below the configured floor the message is stale context */
  readonly confidence: number;
  readonly toolCalls?: readonly ToolCallRequest[] | undefined;
  readonly toolCallId?: string | undefined;
  readonly toolName?: string | undefined;
  readonly isError?: boolean | undefined;
  /** Present only on the compaction summary entry */
  readonly summary?: SummaryMetadata | undefined;
}

export function isSummaryMessage(message: ConversationMessage): boolean {
  return message.summary !== undefined;
}

export function contentToText(content: MessageContent): string {
  return typeof content === 'string' ? content : JSON.stringify(content);
}

export type ParsedArguments = { ok: true; value: unknown } | { ok: false; error: string };

/** Parse a tool call's JSON arguments; blank text is an empty object. */
export function parseToolArguments(raw: string): ParsedArguments {
  if (raw.trim() === '') {
    return { ok: true, value: {} };
  }
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}
