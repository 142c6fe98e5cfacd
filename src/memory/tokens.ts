/**
 * Size and token estimates for conversation messages.
 *
 * Tokens use the ~4 characters per token heuristic.
 */

import { contentToText, type ConversationMessage, type MessageContent } from '../types/conversation.js';
import { byteLength } from '../utils/serializer.js';

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function estimateMessageTokens(message: ConversationMessage): number {
  let total = estimateTokens(contentToText(message.content));
  for (const call of message.toolCalls ?? []) {
    total += estimateTokens(call.name) + estimateTokens(call.arguments);
  }
  return total;
}

export function estimateMessagesTokens(messages: readonly ConversationMessage[]): number {
  let total = 0;
  for (const message of messages) {
    total += estimateMessageTokens(message);
  }
  return total;
}

/** UTF-8 bytes of the content plus any tool call payloads. */
export function measureContent(
  content: MessageContent,
  toolCalls: readonly { name: string; arguments: string }[] = []
): number {
  let size = byteLength(contentToText(content));
  for (const call of toolCalls) {
    size += byteLength(call.name) + byteLength(call.arguments);
  }
  return size;
}

export function totalSize(messages: readonly ConversationMessage[]): number {
  let total = 0;
  for (const message of messages) {
    total += message.sizeBytes;
  }
  return total;
}
