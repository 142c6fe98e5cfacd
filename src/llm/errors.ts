/**
 * Classification of provider errors by message.
 */

import { ProviderError, ProviderFailureError } from '../errors.js';

/** Lowercase phrases that mean the request no longer fits the model's context. */
export const CONTEXT_OVERFLOW_PATTERNS: readonly string[] = [
  'context length',
  'context window',
  'maximum context',
  'model is overloaded',
  'reduce the amount',
  'token limit',
  '503',
];

/**
 * Message of an error and of every error in its cause chain, joined with ': '.
 */
export function errorChainMessage(error: unknown): string {
  const parts: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      parts.push(current.message);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }
  return parts.join(': ');
}

export function isContextOverflowError(error: unknown): boolean {
  const message = errorChainMessage(error).toLowerCase();
  return CONTEXT_OVERFLOW_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * Transient when not flagged terminal and the message contains one of the signatures.
 */
export function isRetryableError(error: unknown, signatures: readonly string[]): boolean {
  if (error instanceof ProviderError && error.terminal) {
    return false;
  }
  if (error instanceof ProviderFailureError) {
    return false;
  }
  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return signatures.some((signature) => message.includes(signature.toLowerCase()));
}
