/**
 * Runtime core of an autonomous coding agent: turn orchestration, history
 * compaction, tool gating, provider retries, task routing and snapshots.
 *
 * @packageDocumentation
 */

// Orchestrator
export {
  TurnOrchestrator,
  type TurnOrchestratorOptions,
  type TurnResult,
  type TurnOutcome,
  type RunTurnOptions,
} from './agents/orchestrator.js';

export {
  TurnStateMachine,
  TURN_STATES,
  TRANSITIONS,
  isTerminalState,
  type TurnState,
  type TransitionListener,
} from './agents/state-machine.js';

export {
  dispatchToolCalls,
  formatToolOutput,
  toolErrorText,
  type ToolCallOutcome,
  type DispatchOptions,
} from './agents/tool-calls.js';

// Configuration
export { loadConfig, loadConfigFile } from './config/loader.js';
export {
  SessionConfigSchema,
  AgentConfigSchema,
  CompactionConfigSchema,
  ToolPolicyConfigSchema,
  PtyConfigSchema,
  RouterConfigSchema,
  ResourceBudgetSchema,
  RetryConfigSchema,
  SnapshotConfigSchema,
  ToolDecisionSchema,
  PermissionModeSchema,
  TaskClassSchema,
  type SessionConfig,
  type SessionConfigInput,
  type AgentConfig,
  type SnapshotConfig,
} from './config/schema.js';

// Confirmation
export {
  autoApprove,
  autoDeny,
  confirmWith,
  type ConfirmationHandler,
  type ConfirmationRequest,
} from './confirm/confirm.js';

// Errors
export {
  PolicyDeniedError,
  ResourceExhaustedError,
  ProviderError,
  ProviderFailureError,
  ContextOverflowError,
  ToolExecutionError,
  ToolTimeoutError,
  SnapshotError,
  SnapshotNotFoundError,
  SnapshotCorruptedError,
  ConfigurationError,
  InvalidTransitionError,
  SessionTerminatedError,
} from './errors.js';

// Tracing
export {
  initializeTracing,
  shutdownTracing,
  getTracer,
  isTracingEnabled,
  withSpan,
  extractTraceparent,
  type TracingConfig,
} from './features/tracing.js';

// LLM
export {
  createAiSdkProvider,
  convertMessages,
  convertTools,
  convertError,
  type AiSdkProviderOptions,
} from './llm/ai-provider.js';
export { CONTEXT_OVERFLOW_PATTERNS, isContextOverflowError, isRetryableError } from './llm/errors.js';
export {
  classifyHeuristic,
  classifyWithModel,
  parseTaskClass,
  planRoute,
  route,
  ROUTER_SYSTEM_PROMPT,
  TASK_CLASSES,
  type TaskClass,
  type RouterConfig,
  type ResourceBudget,
  type RouteDecision,
} from './llm/router.js';
export type {
  ModelProvider,
  ModelRequest,
  ModelResponse,
  ModelUsage,
  GenerateOptions,
} from './llm/types.js';

// Memory
export { CompactionEngine, type CompactionEngineOptions } from './memory/compaction.js';
export { ConversationHistory, createMessage, type NewMessage } from './memory/history.js';
export { analyzePriority, extractTags, type SemanticTag } from './memory/priority.js';
export { estimateTokens, estimateMessageTokens, estimateMessagesTokens } from './memory/tokens.js';
export {
  DEFAULT_COMPACTION_CONFIG,
  type CompactionConfig,
  type CompactionOptions,
  type CompactionResult,
  type CompactionStatistics,
  type CompactionSuggestion,
} from './memory/types.js';

// Snapshots
export {
  SnapshotManager,
  FileSnapshotStore,
  MemorySnapshotStore,
  type SnapshotStore,
  type Snapshot,
  type SessionState,
} from './runtime/snapshots.js';

// Tools
export {
  defineTool,
  ToolRegistry,
  DuplicateToolError,
  UnknownToolError,
  type DefineToolConfig,
  type RegisteredTool,
  type ToolContext,
  type ToolExecutor,
  type LlmToolDefinition,
} from './tools/registry.js';
export {
  ToolPolicyGuard,
  type ToolDecision,
  type PermissionMode,
  type ToolPolicyConfig,
  type Authorization,
  type PolicyStatus,
} from './tools/policy.js';
export { SessionConcurrencyGuard, type SessionLease } from './tools/session-guard.js';

// Types
export type {
  ConversationMessage,
  MessageContent,
  MessagePriority,
  MessageRole,
  MessageType,
  SummaryMetadata,
  ToolCallRequest,
} from './types/conversation.js';
export type { AgentEvent, AgentEventListener, ToolCallStatus } from './types/events.js';

// Utilities
export {
  createLogger,
  configureLogging,
  logger,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './utils/logger.js';
export { RetryManager, DEFAULT_RETRY_CONFIG, type RetryConfig, type RetryStats } from './utils/retry.js';
export { Semaphore, Mutex } from './utils/semaphore.js';
