import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';

import { loadConfig } from '../config/loader.js';
import type { SessionConfigInput } from '../config/schema.js';
import {
  InvalidTransitionError,
  ProviderError,
  ProviderFailureError,
  SessionTerminatedError,
  SnapshotNotFoundError,
} from '../errors.js';
import type { ModelProvider, ModelRequest, ModelResponse } from '../llm/types.js';
import { MemorySnapshotStore } from '../runtime/snapshots.js';
import { defineTool } from '../tools/registry.js';
import type { ToolCallRequest } from '../types/conversation.js';
import type { AgentEvent } from '../types/events.js';
import { createLogger } from '../utils/logger.js';
import { TurnOrchestrator, type TurnOrchestratorOptions } from './orchestrator.js';

const quiet = createLogger({ level: 'error', handler: () => undefined });
const NOW = 1_700_000_000_000;

type Step = ModelResponse | Error | ((request: ModelRequest, signal?: AbortSignal) => Promise<ModelResponse>);

class ScriptedProvider implements ModelProvider {
  readonly requests: ModelRequest[] = [];
  private readonly steps: Step[];

  constructor(steps: Step[]) {
    this.steps = steps;
  }

  async generate(request: ModelRequest, options: { signal?: AbortSignal | undefined } = {}): Promise<ModelResponse> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const step = this.steps.shift();
    if (step === undefined) {
      throw new ProviderError('script exhausted', { terminal: true });
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return step(request, options.signal);
    }
    return { ...step, model: request.model };
  }
}

function reply(content: string | null, toolCalls: ToolCallRequest[] = []): ModelResponse {
  return {
    content,
    toolCalls,
    usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
    model: '',
    stopReason: toolCalls.length > 0 ? 'tool-calls' : 'stop',
  };
}

function call(id: string, name: string, args: unknown = {}): ToolCallRequest {
  return { id, name, arguments: JSON.stringify(args) };
}

function session(overrides: Partial<SessionConfigInput> = {}): SessionConfigInput {
  return {
    agent: { model: 'main-model' },
    toolPolicy: { default: 'allow' },
    retry: { maxAttempts: 2, initialDelayMs: 0, maxDelayMs: 0 },
    ...overrides,
  };
}

interface Harness {
  agent: TurnOrchestrator;
  events: AgentEvent[];
  writes: string[];
  store: MemorySnapshotStore;
}

function harness(
  provider: ModelProvider,
  config: SessionConfigInput = session(),
  overrides: Partial<TurnOrchestratorOptions> = {}
): Harness {
  const events: AgentEvent[] = [];
  const writes: string[] = [];
  const store = new MemorySnapshotStore();

  const tools = [
    defineTool({
      name: 'read_file',
      description: 'Read a file',
      inputSchema: z.object({ path: z.string() }),
      execute: async ({ path }) => `contents of ${path}`,
    }),
    defineTool({
      name: 'write_file',
      description: 'Write a file',
      inputSchema: z.object({ path: z.string() }),
      mutating: true,
      execute: async ({ path }) => {
        writes.push(path);
        return `wrote ${path}`;
      },
    }),
    defineTool({
      name: 'slow',
      description: 'Waits, then answers',
      inputSchema: z.object({ ms: z.number() }),
      execute: ({ ms }, ctx) => sleep(ms, 'done', { signal: ctx.signal }),
    }),
  ];

  const agent = new TurnOrchestrator({
    config: loadConfig(config),
    provider,
    tools,
    snapshotStore: store,
    onEvent: (event) => events.push(event),
    logger: quiet,
    now: () => NOW,
    sleep: async () => undefined,
    ...overrides,
  });
  return { agent, events, writes, store };
}

function transitions(events: readonly AgentEvent[]): string[] {
  return events.flatMap((e) => (e.type === 'state_changed' ? [`${e.from}>${e.to}`] : []));
}

describe('TurnOrchestrator', () => {
  it('completes a turn without tool calls', async () => {
    const provider = new ScriptedProvider([reply('Hello there')]);
    const { agent, events } = harness(provider);

    const result = await agent.runTurn('hi');

    assert.strictEqual(result.outcome, 'completed');
    assert.strictEqual(result.content, 'Hello there');
    assert.strictEqual(result.turnNumber, 1);
    assert.strictEqual(result.iterations, 1);
    assert.strictEqual(result.model, 'main-model');
    assert.strictEqual(result.taskClass, 'simple');
    assert.deepStrictEqual(result.usage, { inputTokens: 10, outputTokens: 5, totalTokens: 15 });
    assert.strictEqual(result.snapshot?.turnNumber, 1);
    assert.strictEqual(agent.state, 'idle');
    assert.deepStrictEqual(
      agent.messages.map((m) => m.type),
      ['user_message', 'assistant_message']
    );
    assert.deepStrictEqual(transitions(events), [
      'idle>routing',
      'routing>awaiting_provider',
      'awaiting_provider>interpreting_response',
      'interpreting_response>snapshotting',
      'snapshotting>idle',
    ]);
    assert.deepStrictEqual(
      provider.requests[0]?.tools?.map((t) => t.function.name),
      ['read_file', 'write_file', 'slow']
    );
  });

  it('feeds tool results back in request order until the model stops', async () => {
    const provider = new ScriptedProvider([
      reply(null, [call('c1', 'read_file', { path: 'a.ts' }), call('c2', 'write_file', { path: 'b.ts' })]),
      reply('Done'),
    ]);
    const { agent, writes } = harness(provider);

    const result = await agent.runTurn('update b.ts from a.ts');

    assert.strictEqual(result.content, 'Done');
    assert.strictEqual(result.iterations, 2);
    assert.deepStrictEqual(writes, ['b.ts']);
    assert.deepStrictEqual(
      result.toolCalls.map((o) => [o.call.id, o.status]),
      [
        ['c1', 'success'],
        ['c2', 'success'],
      ]
    );
    assert.deepStrictEqual(result.usage, { inputTokens: 20, outputTokens: 10, totalTokens: 30 });
    assert.deepStrictEqual(
      agent.messages.map((m) => [m.type, m.toolCallId ?? null]),
      [
        ['user_message', null],
        ['assistant_message', null],
        ['tool_result', 'c1'],
        ['tool_result', 'c2'],
        ['assistant_message', null],
      ]
    );
    assert.strictEqual(agent.messages[2]?.content, 'contents of a.ts');
    assert.strictEqual(agent.messages[3]?.content, 'wrote b.ts');
    assert.strictEqual(provider.requests[1]?.messages.length, 4);
  });

  it('never executes a denied tool and tells the model why', async () => {
    const provider = new ScriptedProvider([
      reply(null, [call('c1', 'write_file', { path: 'secret.env' })]),
      reply('Understood'),
    ]);
    const { agent, writes } = harness(
      provider,
      session({ toolPolicy: { default: 'allow', tools: { write_file: 'deny' } } })
    );

    const result = await agent.runTurn('write the env file');

    assert.deepStrictEqual(writes, []);
    assert.strictEqual(result.toolCalls[0]?.status, 'denied');
    const toolResult = agent.messages[2];
    assert.strictEqual(toolResult?.type, 'tool_result');
    assert.strictEqual(toolResult?.content, "Error: Tool 'write_file' execution denied by policy");
    assert.strictEqual(toolResult?.isError, true);
  });

  it('stops at the tool iteration limit', async () => {
    const provider = new ScriptedProvider([
      reply(null, [call('c1', 'read_file', { path: 'a' })]),
      reply(null, [call('c2', 'read_file', { path: 'b' })]),
      reply(null, [call('c3', 'read_file', { path: 'c' })]),
    ]);
    const { agent } = harness(provider, session({ agent: { model: 'main-model', maxToolIterations: 2 } }));

    const result = await agent.runTurn('read everything');

    assert.strictEqual(result.outcome, 'max_iterations');
    assert.strictEqual(result.iterations, 2);
    assert.strictEqual(provider.requests.length, 2);
    assert.strictEqual(agent.state, 'idle');
  });

  it('routes by task class and applies the class budget', async () => {
    const provider = new ScriptedProvider([reply('ok')]);
    const { agent, events } = harness(
      provider,
      session({
        router: {
          models: { codegen_heavy: 'code-model' },
          budgets: { codegen_heavy: { maxOutputTokens: 256 } },
        },
      })
    );

    const result = await agent.runTurn('apply this:\n```ts\nconst x = 1;\n```');

    assert.strictEqual(result.taskClass, 'codegen_heavy');
    assert.strictEqual(result.model, 'code-model');
    assert.strictEqual(provider.requests[0]?.model, 'code-model');
    assert.strictEqual(provider.requests[0]?.maxOutputTokens, 256);
    assert.deepStrictEqual(
      events.find((e) => e.type === 'route_selected'),
      { type: 'route_selected', turnNumber: 1, taskClass: 'codegen_heavy', model: 'code-model' }
    );
  });

  it('compacts once on context overflow and retries', async () => {
    const provider = new ScriptedProvider([
      new ProviderError('maximum context length exceeded', { terminal: true }),
      reply('fits now'),
    ]);
    const { agent, events } = harness(provider);

    const result = await agent.runTurn('hi');

    assert.strictEqual(result.content, 'fits now');
    assert.strictEqual(provider.requests.length, 2);
    const forced = events.flatMap((e) => (e.type === 'compacted' ? [e.forced] : []));
    assert.deepStrictEqual(forced, [true]);
    assert.ok(transitions(events).includes('awaiting_provider>compacting'));
    assert.ok(transitions(events).includes('compacting>awaiting_provider'));
  });

  it('goes fatal when the overflow survives compaction', async () => {
    const provider = new ScriptedProvider([
      new ProviderError('maximum context length exceeded', { terminal: true }),
      new ProviderError('maximum context length exceeded', { terminal: true }),
    ]);
    const { agent } = harness(provider);

    await assert.rejects(agent.runTurn('hi'), (error: unknown) => {
      assert.ok(error instanceof ProviderFailureError);
      assert.strictEqual(
        error.message,
        'Context overflow persisted after compaction: maximum context length exceeded'
      );
      return true;
    });
    assert.strictEqual(agent.state, 'fatal');
    await assert.rejects(agent.runTurn('again'), SessionTerminatedError);
  });

  it('tries the fallback model once the primary exhausts its retries', async () => {
    const provider = new ScriptedProvider([
      new Error('rate limit exceeded'),
      new Error('rate limit exceeded'),
      reply('from the backup'),
    ]);
    const { agent } = harness(
      provider,
      session({ agent: { model: 'main-model', fallbackModel: 'backup-model' } })
    );

    const result = await agent.runTurn('hi');

    assert.strictEqual(result.content, 'from the backup');
    assert.strictEqual(result.model, 'backup-model');
    assert.deepStrictEqual(
      provider.requests.map((r) => r.model),
      ['main-model', 'main-model', 'backup-model']
    );
    assert.strictEqual(agent.getRetryStats().failedRetries, 1);
  });

  it('goes fatal on a terminal provider error', async () => {
    const provider = new ScriptedProvider([new ProviderError('invalid api key', { terminal: true })]);
    const { agent, events } = harness(provider);

    await assert.rejects(agent.runTurn('hi'), {
      name: 'ProviderFailureError',
      message: 'Provider call failed: invalid api key',
    });
    assert.strictEqual(provider.requests.length, 1);
    assert.strictEqual(agent.state, 'fatal');
    assert.deepStrictEqual(transitions(events).slice(-1), ['awaiting_provider>fatal']);
  });

  it('keeps only committed mutating results when interrupted', async () => {
    const provider = new ScriptedProvider([
      reply('Working on it', [call('w1', 'write_file', { path: 'out.txt' }), call('s1', 'slow', { ms: 5_000 })]),
      reply('Fresh start'),
    ]);
    let agent: TurnOrchestrator | undefined;
    const h = harness(provider, session(), {
      onEvent: (event) => {
        if (event.type === 'tool_finished' && event.toolCallId === 'w1') {
          agent?.interrupt();
        }
      },
    });
    agent = h.agent;

    const result = await h.agent.runTurn('write and wait');

    assert.strictEqual(result.outcome, 'interrupted');
    assert.strictEqual(result.snapshot, null);
    assert.deepStrictEqual(h.writes, ['out.txt']);
    assert.deepStrictEqual(
      result.toolCalls.map((o) => [o.call.id, o.status]),
      [
        ['w1', 'success'],
        ['s1', 'cancelled'],
      ]
    );
    assert.deepStrictEqual(
      h.agent.messages.map((m) => m.type),
      ['user_message', 'assistant_message', 'tool_result']
    );
    assert.deepStrictEqual(
      h.agent.messages[1]?.toolCalls?.map((c) => c.id),
      ['w1']
    );
    assert.strictEqual(h.agent.messages[2]?.toolCallId, 'w1');
    assert.strictEqual(h.agent.state, 'idle');
    assert.deepStrictEqual(await h.store.list(), []);

    const next = await h.agent.runTurn('continue');
    assert.strictEqual(next.outcome, 'completed');
    assert.strictEqual(next.turnNumber, 2);
  });

  it('reports false when interrupting an idle session', () => {
    const { agent } = harness(new ScriptedProvider([]));
    assert.strictEqual(agent.interrupt(), false);
  });

  it('rejects a second turn while one is running', async () => {
    const latch = { release: (): void => undefined };
    const gate = new Promise<void>((resolve) => {
      latch.release = resolve;
    });
    const provider = new ScriptedProvider([
      async () => {
        await gate;
        return reply('first');
      },
    ]);
    const { agent } = harness(provider);

    const first = agent.runTurn('one');
    await assert.rejects(agent.runTurn('two'), InvalidTransitionError);
    latch.release();
    const result = await first;
    assert.strictEqual(result.content, 'first');
    assert.strictEqual(result.turnNumber, 1);
  });

  it('refuses turns after terminate', async () => {
    const { agent, events } = harness(new ScriptedProvider([]));

    agent.terminate();

    assert.strictEqual(agent.state, 'terminated');
    assert.deepStrictEqual(transitions(events), ['idle>terminated']);
    await assert.rejects(agent.runTurn('hi'), {
      name: 'SessionTerminatedError',
      message: 'Session is terminated; no further turns can run',
    });
  });

  it('finishes the turn when the snapshot store fails', async () => {
    class FullDisk extends MemorySnapshotStore {
      override write(): Promise<void> {
        return Promise.reject(new Error('disk full'));
      }
    }
    const provider = new ScriptedProvider([reply('still here')]);
    const { agent, events } = harness(provider, session(), { snapshotStore: new FullDisk() });

    const result = await agent.runTurn('hi');

    assert.strictEqual(result.outcome, 'completed');
    assert.strictEqual(result.snapshot, null);
    assert.strictEqual(agent.state, 'idle');
    assert.strictEqual(
      events.some((e) => e.type === 'snapshot_saved'),
      false
    );
  });

  it('rolls back to an earlier turn and continues from it', async () => {
    const provider = new ScriptedProvider([reply('one'), reply('two'), reply('three')]);
    const { agent } = harness(provider);

    await agent.runTurn('first');
    await agent.runTurn('second');
    assert.strictEqual(agent.messages.length, 4);

    await agent.rollback(1);

    assert.strictEqual(agent.turnNumber, 1);
    assert.deepStrictEqual(
      agent.messages.map((m) => m.content),
      ['first', 'one']
    );
    const next = await agent.runTurn('second again');
    assert.strictEqual(next.turnNumber, 2);
    assert.strictEqual(provider.requests[2]?.messages.length, 3);

    await assert.rejects(agent.rollback(7), SnapshotNotFoundError);
  });

  it('keeps only the newest snapshots', async () => {
    const provider = new ScriptedProvider([reply('a'), reply('b'), reply('c')]);
    const { agent } = harness(provider, session({ snapshots: { maxSnapshots: 2 } }));

    await agent.runTurn('1');
    await agent.runTurn('2');
    await agent.runTurn('3');

    const snapshots = await agent.listSnapshots();
    assert.deepStrictEqual(
      snapshots.map((s) => s.turnNumber),
      [2, 3]
    );
    assert.strictEqual(snapshots[1]?.metadata['taskClass'], 'simple');
  });

  it('skips snapshots when they are disabled', async () => {
    const provider = new ScriptedProvider([reply('ok')]);
    const { agent, events, store } = harness(provider, session({ snapshots: { enabled: false } }));

    const result = await agent.runTurn('hi');

    assert.strictEqual(result.snapshot, null);
    assert.deepStrictEqual(await store.list(), []);
    assert.ok(!transitions(events).some((t) => t.includes('snapshotting')));
    await assert.rejects(agent.rollback(1), {
      name: 'SnapshotError',
      message: 'Snapshots are disabled for this session',
    });
  });
});
