/**
 * Gate and run the tool calls of one model response.
 *
 * Calls are gated one at a time in request order (policy, then confirmation),
 * run concurrently under a parallelism cap, and reported in request order.
 * Nothing here throws: every failure becomes an outcome the model can read.
 */

import type { ConfirmationHandler } from '../confirm/confirm.js';
import { withSpan, type Span } from '../features/tracing.js';
import type { ToolExecutor } from '../tools/registry.js';
import type { Authorization, ToolPolicyGuard } from '../tools/policy.js';
import type { SessionLease } from '../tools/session-guard.js';
import { parseToolArguments, type ToolCallRequest } from '../types/conversation.js';
import type { AgentEventListener, ToolCallStatus } from '../types/events.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { Semaphore } from '../utils/semaphore.js';

export interface ToolCallOutcome {
  call: ToolCallRequest;
  status: ToolCallStatus;
  /** Text handed back to the model */
  output: string;
  /** Whether the tool commits side effects outside the conversation */
  mutating: boolean;
  durationMs: number;
}

export interface DispatchOptions {
  tools: ToolExecutor;
  policy: ToolPolicyGuard;
  confirmation: ConfirmationHandler;
  /** At most this many tools run at once */
  maxParallel: number;
  signal?: AbortSignal | undefined;
  onEvent?: AgentEventListener | undefined;
  parentSpan?: Span | undefined;
  logger?: Logger | undefined;
}

interface ApprovedCall {
  args: unknown;
  lease: SessionLease | null;
  mutating: boolean;
}

const defaultLogger = createLogger({ name: 'tool-calls' });

// ── Helpers ──────────────────────────────────────────────────────────

export function formatToolOutput(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function toolErrorText(error: unknown): string {
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

function outcome(
  call: ToolCallRequest,
  status: ToolCallStatus,
  output: string,
  mutating = false,
  durationMs = 0
): ToolCallOutcome {
  return { call, status, output, mutating, durationMs };
}

function cancelled(call: ToolCallRequest, mutating = false): ToolCallOutcome {
  return outcome(call, 'cancelled', 'Error: Tool execution cancelled', mutating);
}

// ── Gating ───────────────────────────────────────────────────────────

async function gate(
  call: ToolCallRequest,
  options: DispatchOptions,
  log: Logger
): Promise<ToolCallOutcome | ApprovedCall> {
  let authorization: Authorization;
  try {
    authorization = options.policy.authorize(call.name);
  } catch (error) {
    return outcome(call, 'failed', toolErrorText(error));
  }

  if (authorization.decision === 'deny') {
    log.info('Tool call denied by policy', { tool: call.name, toolCallId: call.id });
    return outcome(call, 'denied', `Error: ${authorization.reason}`);
  }

  const lease = authorization.lease;
  const registration = options.tools.get(call.name);
  if (!registration) {
    lease?.release();
    return outcome(call, 'failed', `Error: Unknown tool: ${call.name}`);
  }

  const parsed = parseToolArguments(call.arguments);
  if (!parsed.ok) {
    lease?.release();
    return outcome(
      call,
      'failed',
      `Error: Invalid JSON arguments for tool '${call.name}': ${parsed.error}`
    );
  }

  if (authorization.decision === 'prompt') {
    let approved = false;
    try {
      approved = await options.confirmation.confirm(
        {
          toolName: call.name,
          toolCallId: call.id,
          arguments: parsed.value,
          description: registration.description,
        },
        options.signal
      );
    } catch (error) {
      log.warn('Confirmation handler failed; treating as rejected', {
        tool: call.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    if (!approved) {
      lease?.release();
      return outcome(call, 'rejected', `Error: Tool '${call.name}' was not approved by the user`);
    }
  }

  return { args: parsed.value, lease, mutating: registration.mutating };
}

// ── Execution ────────────────────────────────────────────────────────

async function run(
  call: ToolCallRequest,
  approved: ApprovedCall,
  limiter: Semaphore,
  options: DispatchOptions
): Promise<ToolCallOutcome> {
  const release = await limiter.acquire();
  const { signal, onEvent } = options;
  const started = performance.now();
  let result: ToolCallOutcome;
  // The executor releases the lease once the tool itself settles, which may outlast a timeout.
  let leaseHandedOff = false;
  const execute = () => {
    leaseHandedOff = true;
    return options.tools.execute(call.name, approved.args, {
      toolCallId: call.id,
      signal,
      onSettled: () => approved.lease?.release(),
    });
  };

  try {
    if (signal?.aborted) {
      return cancelled(call, approved.mutating);
    }

    onEvent?.({ type: 'tool_started', toolCallId: call.id, toolName: call.name });
    try {
      const value = await withSpan(
        `tool.${call.name}`,
        { 'tool.name': call.name, 'tool.call_id': call.id },
        execute,
        options.parentSpan
      );
      result = outcome(call, 'success', formatToolOutput(value), approved.mutating);
    } catch (error) {
      result = signal?.aborted
        ? cancelled(call, approved.mutating)
        : outcome(call, 'failed', toolErrorText(error), approved.mutating);
    }
  } finally {
    release();
    if (!leaseHandedOff) {
      approved.lease?.release();
    }
  }

  result.durationMs = Math.round(performance.now() - started);
  onEvent?.({
    type: 'tool_finished',
    toolCallId: call.id,
    toolName: call.name,
    status: result.status,
    durationMs: result.durationMs,
  });
  return result;
}

/**
 * Gate every call, run the approved ones, and return outcomes in request order.
 */
export async function dispatchToolCalls(
  calls: readonly ToolCallRequest[],
  options: DispatchOptions
): Promise<ToolCallOutcome[]> {
  const log = options.logger ?? defaultLogger;
  const limiter = new Semaphore(Math.max(1, options.maxParallel));
  const pending: Promise<ToolCallOutcome>[] = [];

  for (const call of calls) {
    if (options.signal?.aborted) {
      pending.push(Promise.resolve(cancelled(call)));
      continue;
    }

    const gated = await gate(call, options, log);
    if ('status' in gated) {
      pending.push(Promise.resolve(gated));
    } else if (options.signal?.aborted) {
      gated.lease?.release();
      pending.push(Promise.resolve(cancelled(call, gated.mutating)));
    } else {
      pending.push(run(call, gated, limiter, options));
    }
  }

  return Promise.all(pending);
}
