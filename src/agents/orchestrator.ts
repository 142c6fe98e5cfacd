/**
 * Turn orchestrator: drives one conversation turn at a time through routing,
 * provider calls, gated tool execution, compaction and checkpointing.
 */

import { randomUUID } from 'node:crypto';
import type { SessionConfig } from '../config/schema.js';
import { autoDeny, type ConfirmationHandler } from '../confirm/confirm.js';
import {
  ContextOverflowError,
  ProviderFailureError,
  SessionTerminatedError,
  SnapshotError,
} from '../errors.js';
import { extractTraceparent, withSpan, type Span } from '../features/tracing.js';
import { errorChainMessage, isContextOverflowError } from '../llm/errors.js';
import { classifyHeuristic, classifyWithModel, planRoute, type RouteDecision, type TaskClass } from '../llm/router.js';
import type { ModelProvider, ModelRequest, ModelResponse, ModelUsage } from '../llm/types.js';
import { CompactionEngine } from '../memory/compaction.js';
import { ConversationHistory, type NewMessage } from '../memory/history.js';
import type { CompactionResult, CompactionStatistics } from '../memory/types.js';
import { FileSnapshotStore, SnapshotManager, type Snapshot, type SnapshotStore } from '../runtime/snapshots.js';
import { ToolPolicyGuard, type PolicyStatus } from '../tools/policy.js';
import { ToolRegistry, type RegisteredTool } from '../tools/registry.js';
import type { ConversationMessage } from '../types/conversation.js';
import type { AgentEvent, AgentEventListener } from '../types/events.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { RetryManager, type RetryStats, type SleepFn } from '../utils/retry.js';
import { TurnStateMachine, isTerminalState, type TurnState } from './state-machine.js';
import { dispatchToolCalls, type ToolCallOutcome } from './tool-calls.js';

// ── Types ────────────────────────────────────────────────────────────

export interface TurnOrchestratorOptions {
  config: SessionConfig;
  provider: ModelProvider;
  tools?: readonly RegisteredTool[] | undefined;
  /** Decides `prompt` tools (default: deny them) */
  confirmation?: ConfirmationHandler | undefined;
  /** Overrides the file store built from `config.snapshots.directory` */
  snapshotStore?: SnapshotStore | undefined;
  onEvent?: AgentEventListener | undefined;
  logger?: Logger | undefined;
  /** Clock in epoch ms (default: Date.now) */
  now?: (() => number) | undefined;
  /** Backoff sleep (default: real timers) */
  sleep?: SleepFn | undefined;
}

export type TurnOutcome = 'completed' | 'interrupted' | 'max_iterations';

export interface TurnResult {
  turnNumber: number;
  outcome: TurnOutcome;
  /** Final assistant text, null when the turn ended without one */
  content: string | null;
  taskClass: TaskClass;
  /** Model that produced the last response */
  model: string;
  /** Provider round trips in this turn */
  iterations: number;
  toolCalls: ToolCallOutcome[];
  usage: ModelUsage;
  compactions: CompactionResult[];
  snapshot: Snapshot | null;
}

export interface RunTurnOptions {
  signal?: AbortSignal | undefined;
}

interface TurnProgress {
  turnNumber: number;
  taskClass: TaskClass;
  model: string;
  content: string | null;
  iterations: number;
  toolCalls: ToolCallOutcome[];
  usage: ModelUsage;
  compactions: CompactionResult[];
}

// ── Orchestrator ─────────────────────────────────────────────────────

/**
 * @example
 * ```typescript
 * const agent = new TurnOrchestrator({
 *   config: loadConfig({ agent: { model: 'claude-sonnet-4-5' } }),
 *   provider: createAiSdkProvider({ resolveModel: (id) => anthropic(id) }),
 *   tools: [readFile, runPtyCmd],
 *   confirmation: confirmWith(askOnTerminal),
 * });
 * const result = await agent.runTurn('Fix the failing test in src/math.ts');
 * ```
 */
export class TurnOrchestrator {
  readonly sessionId: string;
  readonly config: SessionConfig;
  readonly tools: ToolRegistry;
  readonly policy: ToolPolicyGuard;
  private readonly provider: ModelProvider;
  private readonly confirmation: ConfirmationHandler;
  private readonly engine: CompactionEngine;
  private readonly retry: RetryManager;
  private readonly snapshots: SnapshotManager | undefined;
  private readonly machine: TurnStateMachine;
  private readonly listener: AgentEventListener | undefined;
  private readonly log: Logger;
  private turnCounter = 0;
  private controller: AbortController | undefined;

  constructor(options: TurnOrchestratorOptions) {
    const { config } = options;
    this.config = config;
    this.sessionId = config.sessionId ?? randomUUID();
    this.provider = options.provider;
    this.confirmation = options.confirmation ?? autoDeny;
    this.listener = options.onEvent;
    this.log = (options.logger ?? createLogger({ name: 'orchestrator' })).child({
      bindings: { sessionId: this.sessionId },
    });

    this.tools = new ToolRegistry({
      maxSessions: config.pty.maxSessions,
      sessionToolsEnabled: config.pty.enabled,
      defaultTimeoutMs: config.agent.toolTimeoutMs,
      logger: this.log.child({ name: 'tools' }),
    }).register(...(options.tools ?? []));

    this.policy = new ToolPolicyGuard(config.toolPolicy, this.tools, {
      mode: config.permissionMode,
      allowlist: config.allowlist,
    });

    this.engine = new CompactionEngine(new ConversationHistory(), config.compaction, {
      now: options.now,
      logger: this.log.child({ name: 'compaction' }),
    });

    this.retry = new RetryManager(config.retry, {
      sleep: options.sleep,
      logger: this.log.child({ name: 'retry' }),
    });

    if (config.snapshots.enabled) {
      const store = options.snapshotStore ?? new FileSnapshotStore(config.snapshots.directory);
      this.snapshots = new SnapshotManager(store, {
        now: options.now,
        logger: this.log.child({ name: 'snapshots' }),
      });
    }

    this.machine = new TurnStateMachine((from, to) => {
      this.log.debug('State changed', { from, to });
      this.emit({ type: 'state_changed', from, to });
    });
  }

  get state(): TurnState {
    return this.machine.state;
  }

  /** Number of the last turn started (or restored by rollback). */
  get turnNumber(): number {
    return this.turnCounter;
  }

  get messages(): readonly ConversationMessage[] {
    return this.engine.messages;
  }

  getStatistics(): CompactionStatistics {
    return this.engine.getStatistics();
  }

  getRetryStats(): RetryStats {
    return this.retry.getStats();
  }

  describePolicy(): PolicyStatus[] {
    return this.policy.describe();
  }

  async listSnapshots(): Promise<Snapshot[]> {
    return this.snapshots ? this.snapshots.list() : [];
  }

  /**
   * Run one turn for a user message.
   *
   * @throws SessionTerminatedError after `terminate()` or a fatal failure
   * @throws InvalidTransitionError when a turn is already running
   * @throws ProviderFailureError when the provider fails past every recovery; the session becomes fatal
   */
  async runTurn(input: string, options: RunTurnOptions = {}): Promise<TurnResult> {
    if (isTerminalState(this.machine.state)) {
      throw new SessionTerminatedError(this.machine.state);
    }
    this.machine.transition('routing');

    const turnNumber = ++this.turnCounter;
    const controller = new AbortController();
    this.controller = controller;

    const external = options.signal;
    const forwardAbort = () => controller.abort(external?.reason);
    if (external?.aborted) {
      forwardAbort();
    } else {
      external?.addEventListener('abort', forwardAbort, { once: true });
    }

    try {
      return await withSpan(
        'agent.turn',
        { 'session.id': this.sessionId, 'turn.number': turnNumber },
        (span) => this.executeTurn(turnNumber, input, controller.signal, span)
      );
    } finally {
      external?.removeEventListener('abort', forwardAbort);
      this.controller = undefined;
    }
  }

  /**
   * Abort the running turn. Completed mutating tool results are kept; the
   * turn resolves as `interrupted`.
   *
   * @returns false when no turn is running
   */
  interrupt(): boolean {
    if (!this.controller || this.controller.signal.aborted) {
      return false;
    }
    this.log.info('Interrupting turn', { turnNumber: this.turnCounter });
    this.controller.abort(new Error('Turn interrupted'));
    return true;
  }

  /** End the session. A running turn is aborted; later turns throw. */
  terminate(): void {
    if (isTerminalState(this.machine.state)) return;
    this.controller?.abort(new Error('Session terminated'));
    this.machine.transition('terminated');
    this.log.info('Session terminated', { turns: this.turnCounter });
  }

  /**
   * Restore the history saved at the end of `turnNumber`. Later turns continue from there.
   *
   * @throws SnapshotNotFoundError, SnapshotCorruptedError, SnapshotError
   */
  async rollback(turnNumber: number): Promise<void> {
    if (isTerminalState(this.machine.state)) {
      throw new SessionTerminatedError(this.machine.state);
    }
    if (this.machine.state !== 'idle') {
      throw new SnapshotError('Cannot roll back while a turn is running', turnNumber);
    }
    if (!this.snapshots) {
      throw new SnapshotError('Snapshots are disabled for this session', turnNumber);
    }

    const state = await this.snapshots.load(turnNumber);
    await this.engine.restore(state.messages);
    this.turnCounter = state.turnNumber;
    this.log.info('Rolled back', { turnNumber, messages: state.messages.length });
  }

  // ── Turn ───────────────────────────────────────────────────────────

  private async executeTurn(
    turnNumber: number,
    input: string,
    signal: AbortSignal,
    span: Span | undefined
  ): Promise<TurnResult> {
    const progress: TurnProgress = {
      turnNumber,
      taskClass: 'simple',
      model: this.config.agent.model,
      content: null,
      iterations: 0,
      toolCalls: [],
      usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
      compactions: [],
    };

    try {
      await this.engine.addMessage({ type: 'user_message', content: input });

      const plan = await this.selectRoute(input, signal);
      progress.taskClass = plan.taskClass;
      progress.model = plan.model;
      this.emit({ type: 'route_selected', turnNumber, taskClass: plan.taskClass, model: plan.model });

      let outcome: TurnOutcome = 'completed';
      for (;;) {
        if (signal.aborted) {
          return this.finishInterrupted(progress);
        }

        this.machine.transition('awaiting_provider');
        const response = await this.requestModel(plan, signal, span, progress);
        this.machine.transition('interpreting_response');
        progress.iterations++;
        progress.model = response.model;
        progress.content = response.content;
        addUsage(progress.usage, response.usage);

        if (response.toolCalls.length === 0) {
          await this.engine.addMessage({
            type: 'assistant_message',
            content: response.content ?? '',
          });
          break;
        }

        this.machine.transition('executing_tools');
        const outcomes = await dispatchToolCalls(response.toolCalls, {
          tools: this.tools,
          policy: this.policy,
          confirmation: this.confirmation,
          maxParallel: plan.budget.maxParallelTools ?? this.config.agent.maxParallelTools,
          signal,
          onEvent: (event) => this.emit(event),
          parentSpan: span,
          logger: this.log,
        });

        if (signal.aborted) {
          await this.keepCommittedResults(response, outcomes);
          progress.toolCalls.push(...outcomes);
          return this.finishInterrupted(progress);
        }

        progress.toolCalls.push(...outcomes);
        await this.engine.appendBatch([
          assistantMessage(response.content, response.toolCalls),
          ...outcomes.map(toolResultMessage),
        ]);

        if (progress.iterations >= this.config.agent.maxToolIterations) {
          this.log.warn('Tool iteration limit reached', {
            turnNumber,
            limit: this.config.agent.maxToolIterations,
          });
          outcome = 'max_iterations';
          break;
        }

        if (this.compactionDue()) {
          this.machine.transition('compacting');
          await this.compact(false, progress);
        }
      }

      if (this.compactionDue()) {
        this.machine.transition('compacting');
        await this.compact(false, progress);
      }

      let snapshot: Snapshot | null = null;
      if (this.snapshots) {
        this.machine.transition('snapshotting');
        snapshot = await this.saveSnapshot(progress, span);
      }
      this.machine.transition('idle');
      return { ...progress, outcome, snapshot };
    } catch (error) {
      if (this.machine.state === 'fatal') {
        throw error;
      }
      if (this.machine.state === 'terminated' || signal.aborted) {
        return this.finishInterrupted(progress);
      }
      if (this.machine.canTransition('idle')) {
        this.machine.transition('idle');
      }
      throw error;
    }
  }

  private async selectRoute(input: string, signal: AbortSignal): Promise<RouteDecision> {
    const router = this.config.router;
    const taskClass = router.enabled
      ? await classifyWithModel(this.provider, router, input, signal)
      : classifyHeuristic(input);
    const plan = planRoute(router, taskClass, this.config.agent.model);
    this.log.debug('Route selected', { taskClass, model: plan.model });
    return plan;
  }

  /**
   * Provider call with retries, one forced compaction on context overflow and
   * one pass on the fallback model. Whatever escapes makes the session fatal.
   */
  private async requestModel(
    plan: RouteDecision,
    signal: AbortSignal,
    span: Span | undefined,
    progress: TurnProgress
  ): Promise<ModelResponse> {
    const fallback = this.config.agent.fallbackModel;
    let model = plan.model;
    let compactedForOverflow = false;
    let usedFallback = false;

    for (;;) {
      const request = this.buildRequest(model, plan);
      try {
        return await withSpan(
          'llm.generate',
          { 'llm.model': model },
          () =>
            this.retry.call(() => this.provider.generate(request, { signal }), {
              operationName: `generate(${model})`,
              signal,
            }),
          span
        );
      } catch (error) {
        if (signal.aborted) {
          throw error;
        }

        if (isContextOverflowError(error)) {
          const message = errorChainMessage(error);
          if (!compactedForOverflow) {
            compactedForOverflow = true;
            this.log.warn('Context overflow, compacting and retrying once', { model, error: message });
            this.machine.transition('compacting');
            await this.compact(true, progress);
            this.machine.transition('awaiting_provider');
            continue;
          }
          throw this.fail(
            new ProviderFailureError(
              `Context overflow persisted after compaction: ${message}`,
              2,
              new ContextOverflowError(message, error)
            )
          );
        }

        if (error instanceof ProviderFailureError && fallback && !usedFallback && fallback !== model) {
          usedFallback = true;
          this.log.warn('Primary model failed, switching to fallback', { model, fallback });
          model = fallback;
          continue;
        }

        throw this.fail(
          error instanceof ProviderFailureError
            ? error
            : new ProviderFailureError(`Provider call failed: ${errorChainMessage(error)}`, 1, error)
        );
      }
    }
  }

  private buildRequest(model: string, plan: RouteDecision): ModelRequest {
    const agent = this.config.agent;
    return {
      model,
      system: agent.systemPrompt,
      messages: this.engine.messages,
      tools: this.tools.definitions(),
      maxOutputTokens: plan.budget.maxOutputTokens ?? agent.maxOutputTokens,
      temperature: agent.temperature,
    };
  }

  private fail(error: ProviderFailureError): ProviderFailureError {
    this.log.error('Provider failure, session is fatal', { error: error.message });
    if (this.machine.canTransition('fatal')) {
      this.machine.transition('fatal');
    }
    return error;
  }

  // ── Steps ──────────────────────────────────────────────────────────

  private compactionDue(): boolean {
    return this.engine.config.autoCompactionEnabled && this.engine.shouldCompact();
  }

  private async compact(forced: boolean, progress: TurnProgress): Promise<void> {
    try {
      const result = await this.engine.compactMessagesIntelligently({ force: forced });
      progress.compactions.push(result);
      this.emit({ type: 'compacted', forced, result });
    } catch (error) {
      this.log.warn('Compaction failed, continuing with uncompacted history', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /** After an interrupt, keep only calls whose side effects already happened. */
  private async keepCommittedResults(
    response: ModelResponse,
    outcomes: readonly ToolCallOutcome[]
  ): Promise<void> {
    const committed = outcomes.filter((o) => o.status === 'success' && o.mutating);
    if (committed.length === 0) return;

    await this.engine.appendBatch([
      assistantMessage(
        response.content,
        committed.map((o) => o.call)
      ),
      ...committed.map(toolResultMessage),
    ]);
  }

  private async saveSnapshot(progress: TurnProgress, span: Span | undefined): Promise<Snapshot | null> {
    if (!this.snapshots) return null;

    const traceparent = span ? extractTraceparent(span) : undefined;
    try {
      const snapshot = await this.snapshots.save(
        progress.turnNumber,
        {
          sessionId: this.sessionId,
          turnNumber: progress.turnNumber,
          model: progress.model,
          messages: this.engine.messages,
          statistics: this.engine.getStatistics(),
        },
        {
          taskClass: progress.taskClass,
          iterations: progress.iterations,
          ...(traceparent !== undefined ? { traceparent } : {}),
        }
      );
      this.emit({ type: 'snapshot_saved', turnNumber: snapshot.turnNumber, sizeBytes: snapshot.sizeBytes });

      if (this.config.snapshots.autoCleanup) {
        await this.snapshots.cleanup(this.config.snapshots.maxSnapshots);
      }
      return snapshot;
    } catch (error) {
      this.log.warn('Snapshot failed; the conversation continues', {
        turnNumber: progress.turnNumber,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private finishInterrupted(progress: TurnProgress): TurnResult {
    if (this.machine.canTransition('idle')) {
      this.machine.transition('idle');
    }
    this.log.info('Turn interrupted', { turnNumber: progress.turnNumber });
    return { ...progress, outcome: 'interrupted', snapshot: null };
  }

  private emit(event: AgentEvent): void {
    if (!this.listener) return;
    try {
      this.listener(event);
    } catch (error) {
      this.log.warn('Event listener threw', {
        event: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

// ── Helpers ──────────────────────────────────────────────────────────

function addUsage(total: ModelUsage, usage: ModelUsage | null): void {
  if (!usage) return;
  total.inputTokens += usage.inputTokens;
  total.outputTokens += usage.outputTokens;
  total.totalTokens += usage.totalTokens;
}

function assistantMessage(content: string | null, toolCalls: ModelResponse['toolCalls']): NewMessage {
  return { type: 'assistant_message', content: content ?? '', toolCalls };
}

function toolResultMessage(outcome: ToolCallOutcome): NewMessage {
  return {
    type: 'tool_result',
    content: outcome.output,
    toolCallId: outcome.call.id,
    toolName: outcome.call.name,
    isError: outcome.status !== 'success',
  };
}
