/**
 * Zod schemas for session configuration.
 *
 * Every section is optional in the input and filled with defaults, so the
 * smallest valid configuration is `{ agent: { model: '...' } }`.
 */

import { z } from 'zod';
import { DEFAULT_COMPACTION_CONFIG } from '../memory/types.js';
import { DEFAULT_RETRY_CONFIG } from '../utils/retry.js';

export const ToolDecisionSchema = z.enum(['allow', 'prompt', 'deny']);

export const PermissionModeSchema = z.enum(['standard', 'unrestricted']);

export const TaskClassSchema = z.enum([
  'simple',
  'standard',
  'complex',
  'codegen_heavy',
  'retrieval_heavy',
]);

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

/**
 * Compaction thresholds
 */
export const CompactionConfigSchema = z.object({
  maxUncompressedMessages: positiveInt.default(DEFAULT_COMPACTION_CONFIG.maxUncompressedMessages),
  maxMessageAgeMs: positiveInt.default(DEFAULT_COMPACTION_CONFIG.maxMessageAgeMs),
  maxMemoryBytes: positiveInt.default(DEFAULT_COMPACTION_CONFIG.maxMemoryBytes),
  compactionIntervalMs: nonNegativeInt.default(DEFAULT_COMPACTION_CONFIG.compactionIntervalMs),
  minContextConfidence: z.number().min(0).max(1).default(DEFAULT_COMPACTION_CONFIG.minContextConfidence),
  maxContextAgeMs: positiveInt.default(DEFAULT_COMPACTION_CONFIG.maxContextAgeMs),
  autoCompactionEnabled: z.boolean().default(DEFAULT_COMPACTION_CONFIG.autoCompactionEnabled),
});

export const ToolPolicyConfigSchema = z.object({
  default: ToolDecisionSchema.default('prompt'),
  tools: z.record(z.string(), ToolDecisionSchema).default({}),
});

/**
 * Session-based (PTY) tool slots
 */
export const PtyConfigSchema = z.object({
  enabled: z.boolean().default(true),
  maxSessions: positiveInt.default(3),
});

export const ResourceBudgetSchema = z.object({
  maxOutputTokens: positiveInt.optional(),
  maxParallelTools: positiveInt.optional(),
});

export const RouterConfigSchema = z.object({
  enabled: z.boolean().default(true),
  models: z.partialRecord(TaskClassSchema, z.string()).default({}),
  budgets: z.partialRecord(TaskClassSchema, ResourceBudgetSchema).default({}),
  llmRouterModel: z.string().min(1).optional(),
});

export const RetryConfigSchema = z
  .object({
    maxAttempts: positiveInt.default(DEFAULT_RETRY_CONFIG.maxAttempts),
    initialDelayMs: nonNegativeInt.default(DEFAULT_RETRY_CONFIG.initialDelayMs),
    maxDelayMs: nonNegativeInt.default(DEFAULT_RETRY_CONFIG.maxDelayMs),
    backoffMultiplier: z.number().min(1).default(DEFAULT_RETRY_CONFIG.backoffMultiplier),
    retryableErrors: z
      .array(z.string().min(1))
      .default(() => [...DEFAULT_RETRY_CONFIG.retryableErrors]),
    jitter: z.boolean().default(false),
  })
  .refine((retry) => retry.maxDelayMs >= retry.initialDelayMs, {
    message: 'maxDelayMs must not be smaller than initialDelayMs',
    path: ['maxDelayMs'],
  });

export const SnapshotConfigSchema = z.object({
  enabled: z.boolean().default(true),
  directory: z.string().min(1).default('.agent/snapshots'),
  maxSnapshots: positiveInt.default(50),
  autoCleanup: z.boolean().default(true),
});

export const AgentConfigSchema = z.object({
  model: z.string().min(1),
  /** Tried once more after the primary model exhausts its retries */
  fallbackModel: z.string().min(1).optional(),
  systemPrompt: z.string().optional(),
  maxToolIterations: positiveInt.default(10),
  /** Parallel tool cap when the route budget sets none */
  maxParallelTools: positiveInt.default(4),
  /** 0 disables the per-tool timeout */
  toolTimeoutMs: nonNegativeInt.default(120_000),
  maxOutputTokens: positiveInt.optional(),
  temperature: z.number().min(0).max(2).optional(),
});

export const SessionConfigSchema = z.object({
  sessionId: z.string().min(1).optional(),
  agent: AgentConfigSchema,
  permissionMode: PermissionModeSchema.default('standard'),
  /** Tools an unrestricted session may still use; unset allows all */
  allowlist: z.array(z.string().min(1)).optional(),
  toolPolicy: ToolPolicyConfigSchema.prefault({}),
  pty: PtyConfigSchema.prefault({}),
  compaction: CompactionConfigSchema.prefault({}),
  router: RouterConfigSchema.prefault({}),
  retry: RetryConfigSchema.prefault({}),
  snapshots: SnapshotConfigSchema.prefault({}),
});

export type SessionConfigInput = z.input<typeof SessionConfigSchema>;
export type SessionConfig = z.output<typeof SessionConfigSchema>;
export type AgentConfig = z.output<typeof AgentConfigSchema>;
export type SnapshotConfig = z.output<typeof SnapshotConfigSchema>;
