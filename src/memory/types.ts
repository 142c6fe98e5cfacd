/**
 * Types for the compaction engine.
 */

import type { MessagePriority } from '../types/conversation.js';

export interface CompactionConfig {
  /** Retained messages (summary included) allowed before compaction (default: 50) */
  maxUncompressedMessages: number;
  /** Age of the oldest message that triggers compaction (default: 1 hour) */
  maxMessageAgeMs: number;
  /** Total history bytes that trigger compaction (default: 100 MB) */
  maxMemoryBytes: number;
  /** Minimum spacing of interval-triggered compaction (default: 5 minutes) */
  compactionIntervalMs: number;
  /** Messages below this confidence are stale context (default: 0.3) */
  minContextConfidence: number;
  /** Messages older than this are stale context (default: 2 hours) */
  maxContextAgeMs: number;
  /** Whether the orchestrator compacts on its own (default: true) */
  autoCompactionEnabled: boolean;
}

export const DEFAULT_COMPACTION_CONFIG: CompactionConfig = {
  maxUncompressedMessages: 50,
  maxMessageAgeMs: 3_600_000,
  maxMemoryBytes: 100 * 1_000_000,
  compactionIntervalMs: 300_000,
  minContextConfidence: 0.3,
  maxContextAgeMs: 7_200_000,
  autoCompactionEnabled: true,
};

export interface CompactionOptions {
  /** Also halve the count target; used to recover from context overflow */
  force?: boolean | undefined;
}

export interface CompactionResult {
  /** Messages examined, summary entry included */
  messagesProcessed: number;
  messagesCompacted: number;
  originalSize: number;
  compactedSize: number;
  /** compactedSize / originalSize, or 1.0 when nothing was evicted */
  compressionRatio: number;
  processingTimeMs: number;
}

export interface CompactionStatistics {
  totalMessages: number;
  messagesByPriority: Record<MessagePriority, number>;
  totalMemoryUsage: number;
  averageMessageSize: number;
  /** Epoch ms of the last compaction that evicted something */
  lastCompactionTime: number | null;
  /** Evicting compactions per hour since the engine was created */
  compactionFrequency: number;
}

export type SuggestionUrgency = 'low' | 'medium' | 'high';

export interface CompactionSuggestion {
  reason: 'message_count' | 'message_age' | 'memory_usage' | 'stale_context';
  urgency: SuggestionUrgency;
  description: string;
  /** Messages a compaction would likely remove */
  estimatedEvictions: number;
}
