/**
 * Ordered conversation history with at most one compaction summary entry.
 */

import { randomUUID } from 'node:crypto';
import {
  isSummaryMessage,
  type ConversationMessage,
  type MessageContent,
  type MessagePriority,
  type MessageRole,
  type MessageType,
  type ToolCallRequest,
  contentToText,
} from '../types/conversation.js';
import { analyzePriority } from './priority.js';
import { measureContent, totalSize } from './tokens.js';

const ROLE_FOR_TYPE: Record<MessageType, MessageRole> = {
  user_message: 'user',
  assistant_message: 'assistant',
  tool_result: 'tool',
  system_note: 'system',
};

export interface NewMessage {
  type: MessageType;
  content: MessageContent;
  /** Defaults to the content analyzer's verdict */
  priority?: MessagePriority | undefined;
  confidence?: number | undefined;
  toolCalls?: readonly ToolCallRequest[] | undefined;
  toolCallId?: string | undefined;
  toolName?: string | undefined;
  isError?: boolean | undefined;
  timestamp?: number | undefined;
}

/**
 * Build a frozen message. Size and priority are derived from the content.
 */
export function createMessage(input: NewMessage, now: number = Date.now()): ConversationMessage {
  const confidence = input.confidence ?? 1;
  if (!(confidence >= 0 && confidence <= 1)) {
    throw new RangeError(`Message confidence must be within [0, 1], got ${String(confidence)}`);
  }

  const toolCalls = input.toolCalls ? Object.freeze(input.toolCalls.map((c) => ({ ...c }))) : undefined;
  return Object.freeze({
    id: randomUUID(),
    role: ROLE_FOR_TYPE[input.type],
    type: input.type,
    content: input.content,
    timestamp: input.timestamp ?? now,
    sizeBytes: measureContent(input.content, toolCalls),
    priority: input.priority ?? analyzePriority(contentToText(input.content), input.type),
    confidence,
    ...(toolCalls !== undefined ? { toolCalls } : {}),
    ...(input.toolCallId !== undefined ? { toolCallId: input.toolCallId } : {}),
    ...(input.toolName !== undefined ? { toolName: input.toolName } : {}),
    ...(input.isError !== undefined ? { isError: input.isError } : {}),
  });
}

export class ConversationHistory {
  private messages: ConversationMessage[] = [];

  constructor(initial: readonly ConversationMessage[] = []) {
    this.restore(initial);
  }

  /** Copy of the current sequence; later mutations do not show through. */
  get entries(): readonly ConversationMessage[] {
    return Object.freeze([...this.messages]);
  }

  get length(): number {
    return this.messages.length;
  }

  get sizeBytes(): number {
    return totalSize(this.messages);
  }

  get summary(): ConversationMessage | undefined {
    const first = this.messages[0];
    return first && isSummaryMessage(first) ? first : undefined;
  }

  /** Messages other than the summary entry, in insertion order. */
  get retained(): readonly ConversationMessage[] {
    return this.messages.filter((m) => !isSummaryMessage(m));
  }

  append(...messages: ConversationMessage[]): void {
    for (const message of messages) {
      if (isSummaryMessage(message)) {
        throw new Error('Summary entries are created by compaction only');
      }
    }
    this.messages.push(...messages);
  }

  /**
   * Replace the sequence with the compaction outcome. The summary, when present, goes first.
   */
  applyCompaction(retained: readonly ConversationMessage[], summary: ConversationMessage | undefined): void {
    this.messages = summary ? [summary, ...retained] : [...retained];
  }

  /** Replace the whole sequence, e.g. when rolling back to a snapshot. */
  restore(entries: readonly ConversationMessage[]): void {
    const summaries = entries.filter(isSummaryMessage);
    const rest = entries.filter((m) => !isSummaryMessage(m));
    if (summaries.length > 1) {
      throw new Error('A history holds at most one summary entry');
    }
    this.applyCompaction(rest, summaries[0]);
  }
}
