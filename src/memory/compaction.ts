/**
 * Priority-aware compaction of the conversation history.
 *
 * Evicted messages are folded into a single summary entry at the head of the
 * history. The summary is never re-expanded; later compactions merge into it.
 */

import {
  MESSAGE_TYPES,
  PRIORITY_RANK,
  type ConversationMessage,
  type MessagePriority,
  type MessageType,
  type SummaryMetadata,
} from '../types/conversation.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { Mutex } from '../utils/semaphore.js';
import { truncateToBytes } from '../utils/serializer.js';
import { createMessage, type ConversationHistory, type NewMessage } from './history.js';
import { totalSize } from './tokens.js';
import {
  DEFAULT_COMPACTION_CONFIG,
  type CompactionConfig,
  type CompactionOptions,
  type CompactionResult,
  type CompactionStatistics,
  type CompactionSuggestion,
} from './types.js';

const HOUR_MS = 3_600_000;

const TYPE_LABELS: Record<MessageType, string> = {
  user_message: 'user',
  assistant_message: 'assistant',
  tool_result: 'tool result',
  system_note: 'system note',
};

// ── Eviction units ───────────────────────────────────────────────────

/**
 * Messages evicted together. An assistant message that requested tools and the
 * results that answer it form one unit, so a call never loses its result.
 */
export interface EvictionUnit {
  order: number;
  members: ConversationMessage[];
  priority: MessagePriority;
}

export function groupEvictionUnits(messages: readonly ConversationMessage[]): EvictionUnit[] {
  const units: EvictionUnit[] = [];
  let i = 0;

  while (i < messages.length) {
    const head = messages[i];
    if (!head) break;
    const members = [head];
    i++;

    const callIds = new Set((head.toolCalls ?? []).map((c) => c.id));
    if (callIds.size > 0) {
      let next = messages[i];
      while (next && next.type === 'tool_result' && next.toolCallId && callIds.has(next.toolCallId)) {
        members.push(next);
        i++;
        next = messages[i];
      }
    }

    units.push({ order: units.length, members, priority: highestPriority(members) });
  }
  return units;
}

function highestPriority(messages: readonly ConversationMessage[]): MessagePriority {
  let best: MessagePriority = 'low';
  for (const message of messages) {
    if (PRIORITY_RANK[message.priority] > PRIORITY_RANK[best]) {
      best = message.priority;
    }
  }
  return best;
}

// ── Summary entry ────────────────────────────────────────────────────

function emptySummary(): SummaryMetadata {
  return {
    evictedCount: 0,
    byType: { user_message: 0, assistant_message: 0, tool_result: 0, system_note: 0 },
    tools: [],
    compactions: 0,
  };
}

export function mergeSummary(
  previous: SummaryMetadata | undefined,
  evicted: readonly ConversationMessage[]
): SummaryMetadata {
  const base = previous ?? emptySummary();
  const merged: SummaryMetadata = {
    evictedCount: base.evictedCount + evicted.length,
    byType: { ...base.byType },
    tools: [...base.tools],
    compactions: base.compactions + 1,
  };

  for (const message of evicted) {
    merged.byType[message.type] += 1;
    const names = [...(message.toolCalls ?? []).map((c) => c.name), message.toolName];
    for (const name of names) {
      if (name && !merged.tools.includes(name)) {
        merged.tools.push(name);
      }
    }
  }
  return merged;
}

export function describeSummary(meta: SummaryMetadata): string {
  const parts = MESSAGE_TYPES.filter((type) => meta.byType[type] > 0).map(
    (type) => `${String(meta.byType[type])} ${TYPE_LABELS[type]}`
  );
  const noun = meta.evictedCount === 1 ? 'message' : 'messages';
  let text = `[Conversation summary] ${String(meta.evictedCount)} earlier ${noun} compacted`;
  if (parts.length > 0) {
    text += ` (${parts.join(', ')})`;
  }
  text += '.';
  if (meta.tools.length > 0) {
    text += ` Tools used: ${meta.tools.join(', ')}.`;
  }
  return text;
}

// ── Engine ───────────────────────────────────────────────────────────

export interface CompactionEngineOptions {
  /** Clock in epoch ms (default: Date.now) */
  now?: (() => number) | undefined;
  logger?: Logger | undefined;
}

/**
 * Guards a ConversationHistory: every mutation runs under one mutex and
 * statistics are recomputed after each of them.
 *
 * @example
 * ```typescript
 * const engine = new CompactionEngine(new ConversationHistory(), { maxUncompressedMessages: 20 });
 * await engine.addMessage({ type: 'user_message', content: 'fix the build' });
 * if (engine.shouldCompact()) {
 *   await engine.compactMessagesIntelligently();
 * }
 * ```
 */
export class CompactionEngine {
  readonly config: CompactionConfig;
  private readonly history: ConversationHistory;
  private readonly lock = new Mutex();
  private readonly now: () => number;
  private readonly log: Logger;
  private readonly createdAt: number;
  private lastRunAt: number;
  private lastCompactionTime: number | null = null;
  private compactionCount = 0;
  private statistics: CompactionStatistics;

  constructor(
    history: ConversationHistory,
    config: Partial<CompactionConfig> = {},
    options: CompactionEngineOptions = {}
  ) {
    this.history = history;
    this.config = Object.freeze({ ...DEFAULT_COMPACTION_CONFIG, ...config });
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger({ name: 'compaction' });
    this.createdAt = this.now();
    this.lastRunAt = this.createdAt;
    this.statistics = this.computeStatistics();
  }

  get messages(): readonly ConversationMessage[] {
    return this.history.entries;
  }

  async addMessage(input: NewMessage): Promise<ConversationMessage> {
    const [message] = await this.appendBatch([input]);
    if (!message) {
      throw new Error('appendBatch returned no message');
    }
    return message;
  }

  /** Append several messages with no compaction in between. */
  async appendBatch(inputs: readonly NewMessage[]): Promise<ConversationMessage[]> {
    return this.lock.runExclusive(() => {
      const now = this.now();
      const messages = inputs.map((input) => createMessage(input, now));
      this.history.append(...messages);
      this.statistics = this.computeStatistics();
      return messages;
    });
  }

  /** Replace the whole history, e.g. from a snapshot. */
  async restore(entries: readonly ConversationMessage[]): Promise<void> {
    await this.lock.runExclusive(() => {
      this.history.restore(entries);
      this.statistics = this.computeStatistics();
    });
  }

  shouldCompact(): boolean {
    const entries = this.history.entries;
    const now = this.now();

    if (entries.length > this.config.maxUncompressedMessages) return true;
    if (this.history.sizeBytes > this.config.maxMemoryBytes) return true;

    // Judged per eviction unit, so a trigger always has something to evict.
    const units = groupEvictionUnits(this.history.retained);
    const aged = units.some(
      (u) =>
        u.priority !== 'critical' &&
        u.members.every((m) => now - m.timestamp > this.config.maxMessageAgeMs)
    );
    if (aged) return true;

    return (
      this.config.autoCompactionEnabled &&
      now - this.lastRunAt > this.config.compactionIntervalMs &&
      units.some((u) => this.isExpired(u, now))
    );
  }

  async compactMessagesIntelligently(options: CompactionOptions = {}): Promise<CompactionResult> {
    return this.lock.runExclusive(() => this.compact(options));
  }

  /** Cached copy; identical across calls until the next mutation. */
  getStatistics(): CompactionStatistics {
    return { ...this.statistics, messagesByPriority: { ...this.statistics.messagesByPriority } };
  }

  getSuggestions(): CompactionSuggestion[] {
    const suggestions: CompactionSuggestion[] = [];
    const now = this.now();
    const retained = this.history.retained;
    const count = this.history.length;

    if (count > this.config.maxUncompressedMessages) {
      suggestions.push({
        reason: 'message_count',
        urgency: 'high',
        description: `History holds ${String(count)} entries, limit is ${String(this.config.maxUncompressedMessages)}`,
        estimatedEvictions: count - this.config.maxUncompressedMessages + 1,
      });
    }

    const size = this.history.sizeBytes;
    if (size > this.config.maxMemoryBytes) {
      suggestions.push({
        reason: 'memory_usage',
        urgency: 'high',
        description: `History uses ${String(size)} bytes, limit is ${String(this.config.maxMemoryBytes)}`,
        estimatedEvictions: 0,
      });
    }

    const aged = retained.filter(
      (m) => m.priority !== 'critical' && now - m.timestamp > this.config.maxMessageAgeMs
    ).length;
    if (aged > 0) {
      suggestions.push({
        reason: 'message_age',
        urgency: 'medium',
        description: `${String(aged)} messages are older than ${String(this.config.maxMessageAgeMs)}ms`,
        estimatedEvictions: aged,
      });
    }

    const stale = retained.filter((m) => m.priority !== 'critical' && this.isStale(m, now)).length;
    if (stale > 0) {
      suggestions.push({
        reason: 'stale_context',
        urgency: 'low',
        description: `${String(stale)} messages are below confidence ${String(this.config.minContextConfidence)} or past the context age limit`,
        estimatedEvictions: stale,
      });
    }

    return suggestions;
  }

  // ── Internals ──────────────────────────────────────────────────────

  private isStale(message: ConversationMessage, now: number): boolean {
    return (
      message.confidence < this.config.minContextConfidence ||
      now - message.timestamp > this.config.maxContextAgeMs
    );
  }

  private isExpired(unit: EvictionUnit, now: number): boolean {
    if (unit.priority === 'critical') return false;
    return unit.members.every(
      (m) => this.isStale(m, now) || now - m.timestamp > this.config.maxMessageAgeMs
    );
  }

  private compact(options: CompactionOptions): CompactionResult {
    const started = performance.now();
    const now = this.now();
    const entries = this.history.entries;
    const previousSummary = this.history.summary;
    const originalSize = totalSize(entries);

    let countLimit = this.config.maxUncompressedMessages;
    if (options.force) {
      countLimit = Math.min(countLimit, Math.max(2, Math.floor(entries.length / 2)));
    }

    const units = groupEvictionUnits(this.history.retained);
    const evicted = new Set<EvictionUnit>();
    let retainedCount = units.reduce((n, u) => n + u.members.length, 0);
    let retainedBytes = units.reduce((n, u) => n + totalSize(u.members), 0);

    const evict = (unit: EvictionUnit) => {
      evicted.add(unit);
      retainedCount -= unit.members.length;
      retainedBytes -= totalSize(unit.members);
    };

    for (const unit of units) {
      if (this.isExpired(unit, now)) {
        evict(unit);
      }
    }

    const overBudget = () => {
      const summarySlots = previousSummary || evicted.size > 0 ? 1 : 0;
      return (
        retainedCount + summarySlots > countLimit || retainedBytes > this.config.maxMemoryBytes
      );
    };

    const candidates = units
      .filter((u) => !evicted.has(u))
      .sort((a, b) => PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] || a.order - b.order);
    for (const unit of candidates) {
      if (!overBudget()) break;
      evict(unit);
    }

    this.lastRunAt = now;

    if (evicted.size === 0) {
      return {
        messagesProcessed: entries.length,
        messagesCompacted: 0,
        originalSize,
        compactedSize: originalSize,
        compressionRatio: 1.0,
        processingTimeMs: performance.now() - started,
      };
    }

    const evictedMessages = units.filter((u) => evicted.has(u)).flatMap((u) => u.members);
    const retained = units.filter((u) => !evicted.has(u)).flatMap((u) => u.members);

    const meta = mergeSummary(previousSummary?.summary, evictedMessages);
    const freedBytes = totalSize(evictedMessages) + (previousSummary?.sizeBytes ?? 0);
    const summaryMessage = createMessage(
      {
        type: 'system_note',
        content: truncateToBytes(describeSummary(meta), freedBytes),
        priority: 'critical',
      },
      now
    );
    const summary: ConversationMessage = Object.freeze({ ...summaryMessage, summary: meta });

    this.history.applyCompaction(retained, summary);
    this.compactionCount++;
    this.lastCompactionTime = now;
    this.statistics = this.computeStatistics();

    const compactedSize = totalSize(retained) + summary.sizeBytes;
    const result: CompactionResult = {
      messagesProcessed: entries.length,
      messagesCompacted: evictedMessages.length,
      originalSize,
      compactedSize,
      compressionRatio: originalSize === 0 ? 1.0 : compactedSize / originalSize,
      processingTimeMs: performance.now() - started,
    };

    this.log.info('Compacted conversation history', {
      evicted: result.messagesCompacted,
      retained: retained.length,
      ratio: Number(result.compressionRatio.toFixed(3)),
      forced: options.force === true,
    });
    return result;
  }

  private computeStatistics(): CompactionStatistics {
    const entries = this.history.entries;
    const byPriority: Record<MessagePriority, number> = { critical: 0, high: 0, normal: 0, low: 0 };
    for (const entry of entries) {
      byPriority[entry.priority] += 1;
    }

    const totalMemoryUsage = totalSize(entries);
    const elapsedHours = (this.now() - this.createdAt) / HOUR_MS;

    return {
      totalMessages: entries.length,
      messagesByPriority: byPriority,
      totalMemoryUsage,
      averageMessageSize: entries.length > 0 ? Math.floor(totalMemoryUsage / entries.length) : 0,
      lastCompactionTime: this.lastCompactionTime,
      compactionFrequency:
        elapsedHours > 0 ? this.compactionCount / elapsedHours : this.compactionCount,
    };
  }
}
