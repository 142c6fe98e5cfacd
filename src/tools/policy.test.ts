import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';

import { PolicyDeniedError, ResourceExhaustedError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { ToolPolicyGuard, type ToolPolicyConfig } from './policy.js';
import { ToolRegistry, defineTool } from './registry.js';

const quiet = createLogger({ level: 'error', handler: () => undefined });

function tool(name: string, sessionBased = false) {
  return defineTool({
    name,
    description: name,
    inputSchema: z.object({}),
    sessionBased,
    execute: async () => 'ok',
  });
}

function registry(maxSessions = 2) {
  return new ToolRegistry({ maxSessions, logger: quiet }).register(
    tool('read_file'),
    tool('write_file'),
    tool('run_pty_cmd', true)
  );
}

const policy: ToolPolicyConfig = {
  default: 'prompt',
  tools: { read_file: 'allow', write_file: 'deny' },
};

describe('ToolPolicyGuard.decide', () => {
  it('uses explicit entries and falls back to the default', () => {
    const guard = new ToolPolicyGuard(policy, registry());
    assert.strictEqual(guard.decide('read_file'), 'allow');
    assert.strictEqual(guard.decide('write_file'), 'deny');
    assert.strictEqual(guard.decide('run_pty_cmd'), 'prompt');
  });

  it('allows everything in unrestricted mode', () => {
    const guard = new ToolPolicyGuard(policy, registry(), { mode: 'unrestricted' });
    assert.strictEqual(guard.decide('write_file'), 'allow');
    assert.strictEqual(guard.decide('never_registered'), 'allow');
  });

  it('denies tools outside the allowlist in unrestricted mode', () => {
    const guard = new ToolPolicyGuard(policy, registry(), {
      mode: 'unrestricted',
      allowlist: ['read_file'],
    });
    assert.strictEqual(guard.decide('read_file'), 'allow');
    assert.strictEqual(guard.decide('write_file'), 'deny');
  });

  it('ignores the allowlist in standard mode', () => {
    const guard = new ToolPolicyGuard(policy, registry(), { allowlist: ['read_file'] });
    assert.strictEqual(guard.decide('run_pty_cmd'), 'prompt');
  });
});

describe('ToolPolicyGuard.authorize', () => {
  it('explains a denial without acquiring a session slot', () => {
    const tools = registry();
    const guard = new ToolPolicyGuard({ default: 'deny', tools: {} }, tools);

    const auth = guard.authorize('run_pty_cmd');

    assert.deepStrictEqual(auth, {
      decision: 'deny',
      reason: "Tool 'run_pty_cmd' execution denied by policy",
    });
    assert.strictEqual(tools.sessionGuard.active, 0);
  });

  it('words an explicit denial the way PolicyDeniedError does', () => {
    const guard = new ToolPolicyGuard(policy, registry());

    const auth = guard.authorize('write_file');

    assert.strictEqual(auth.decision, 'deny');
    assert.ok('reason' in auth);
    assert.strictEqual(auth.reason, new PolicyDeniedError('write_file').message);
    assert.strictEqual(auth.reason, "Tool 'write_file' execution denied by policy");
  });

  it('leases a slot only for session-based tools', () => {
    const tools = registry();
    const guard = new ToolPolicyGuard(policy, tools, { mode: 'unrestricted' });

    const plain = guard.authorize('read_file');
    const session = guard.authorize('run_pty_cmd');

    assert.ok(plain.decision === 'allow' && plain.lease === null);
    assert.ok(session.decision === 'allow' && session.lease !== null);
    assert.strictEqual(tools.sessionGuard.active, 1);
  });

  it('throws ResourceExhaustedError once every slot is taken', () => {
    const tools = registry(1);
    const guard = new ToolPolicyGuard(policy, tools, { mode: 'unrestricted' });

    const first = guard.authorize('run_pty_cmd');
    assert.throws(() => guard.authorize('run_pty_cmd'), ResourceExhaustedError);

    assert.ok(first.decision !== 'deny');
    first.lease?.release();
    assert.strictEqual(tools.sessionGuard.active, 0);
  });
});

describe('ToolPolicyGuard.describe', () => {
  it('lists every registered tool with its decision source', () => {
    const guard = new ToolPolicyGuard(policy, registry());
    assert.deepStrictEqual(guard.describe(), [
      { tool: 'read_file', decision: 'allow', source: 'explicit' },
      { tool: 'run_pty_cmd', decision: 'prompt', source: 'default' },
      { tool: 'write_file', decision: 'deny', source: 'explicit' },
    ]);
  });
});
