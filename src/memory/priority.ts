/**
 * Content-based priority and tags for conversation messages.
 */

import type { MessagePriority, MessageType } from '../types/conversation.js';

const SECURITY_KEYWORDS = ['password', 'token', 'key', 'secret', 'auth', 'login', 'permission'];
const CODE_KEYWORDS = ['function', 'class', 'struct', 'enum', 'impl', 'trait', 'mod', 'use'];
const DECISION_KEYWORDS = ['decision', 'choose', 'select', 'option', 'alternative', 'recommend'];
const ERROR_KEYWORDS = ['error', 'fail'];
const SUCCESS_KEYWORDS = ['success', 'complete'];

/** Matches any keyword at the start of a word, case-insensitively. */
function keywordPattern(keywords: readonly string[]): RegExp {
  return new RegExp(`\\b(?:${keywords.join('|')})`, 'i');
}

const SECURITY = keywordPattern(SECURITY_KEYWORDS);
const CODE = keywordPattern(CODE_KEYWORDS);
const DECISION = keywordPattern(DECISION_KEYWORDS);
const ERROR = keywordPattern(ERROR_KEYWORDS);
const SUCCESS = keywordPattern(SUCCESS_KEYWORDS);

export type SemanticTag = 'security' | 'code' | 'decision' | 'error' | 'success';

export function analyzePriority(content: string, type: MessageType): MessagePriority {
  if (SECURITY.test(content)) {
    return 'critical';
  }

  switch (type) {
    case 'system_note':
      return 'critical';
    case 'user_message':
      return DECISION.test(content) || CODE.test(content) ? 'high' : 'normal';
    case 'assistant_message':
      return DECISION.test(content) ? 'high' : 'normal';
    case 'tool_result':
      return ERROR.test(content) ? 'high' : 'low';
  }
}

export function extractTags(content: string): SemanticTag[] {
  const tags: SemanticTag[] = [];
  if (SECURITY.test(content)) tags.push('security');
  if (CODE.test(content)) tags.push('code');
  if (DECISION.test(content)) tags.push('decision');
  if (ERROR.test(content)) tags.push('error');
  if (SUCCESS.test(content)) tags.push('success');
  return tags;
}
