import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ConfigurationError } from '../errors.js';
import { DEFAULT_COMPACTION_CONFIG } from '../memory/types.js';
import { DEFAULT_RETRYABLE_ERRORS } from '../utils/retry.js';
import { loadConfig, loadConfigFile } from './loader.js';

describe('loadConfig', () => {
  it('fills every section with defaults', () => {
    const config = loadConfig({ agent: { model: 'model-a' } });

    assert.strictEqual(config.agent.model, 'model-a');
    assert.strictEqual(config.agent.maxToolIterations, 10);
    assert.strictEqual(config.agent.maxParallelTools, 4);
    assert.strictEqual(config.agent.toolTimeoutMs, 120_000);
    assert.strictEqual(config.permissionMode, 'standard');
    assert.strictEqual(config.allowlist, undefined);
    assert.deepStrictEqual(config.toolPolicy, { default: 'prompt', tools: {} });
    assert.deepStrictEqual(config.pty, { enabled: true, maxSessions: 3 });
    assert.deepStrictEqual(config.compaction, DEFAULT_COMPACTION_CONFIG);
    assert.deepStrictEqual(config.router, { enabled: true, models: {}, budgets: {} });
    assert.deepStrictEqual(config.retry, {
      maxAttempts: 3,
      initialDelayMs: 500,
      maxDelayMs: 30_000,
      backoffMultiplier: 2,
      retryableErrors: [...DEFAULT_RETRYABLE_ERRORS],
      jitter: false,
    });
    assert.deepStrictEqual(config.snapshots, {
      enabled: true,
      directory: '.agent/snapshots',
      maxSnapshots: 50,
      autoCleanup: true,
    });
  });

  it('keeps explicit values', () => {
    const config = loadConfig({
      agent: { model: 'model-a', fallbackModel: 'model-b' },
      permissionMode: 'unrestricted',
      allowlist: ['read_file'],
      toolPolicy: { tools: { shell: 'deny' } },
      router: { models: { codegen_heavy: 'code-model' }, budgets: { complex: { maxParallelTools: 1 } } },
      compaction: { maxUncompressedMessages: 20 },
    });

    assert.strictEqual(config.agent.fallbackModel, 'model-b');
    assert.strictEqual(config.permissionMode, 'unrestricted');
    assert.deepStrictEqual(config.allowlist, ['read_file']);
    assert.deepStrictEqual(config.toolPolicy, { default: 'prompt', tools: { shell: 'deny' } });
    assert.strictEqual(config.router.models.codegen_heavy, 'code-model');
    assert.deepStrictEqual(config.router.budgets.complex, { maxParallelTools: 1 });
    assert.strictEqual(config.compaction.maxUncompressedMessages, 20);
    assert.strictEqual(config.compaction.maxMessageAgeMs, DEFAULT_COMPACTION_CONFIG.maxMessageAgeMs);
  });

  it('freezes the result', () => {
    const config = loadConfig({ agent: { model: 'model-a' } });
    assert.ok(Object.isFrozen(config));
    assert.ok(Object.isFrozen(config.compaction));
    assert.ok(Object.isFrozen(config.retry.retryableErrors));
  });

  it('reports every invalid field', () => {
    assert.throws(
      () =>
        loadConfig({
          agent: { model: '' },
          compaction: { minContextConfidence: 2 },
          toolPolicy: { default: 'maybe' },
        }),
      (error: unknown) => {
        assert.ok(error instanceof ConfigurationError);
        assert.match(error.message, /^Invalid configuration: /);
        const paths = error.issues.map((issue) => issue.path.join('.'));
        assert.deepStrictEqual(paths.sort(), [
          'agent.model',
          'compaction.minContextConfidence',
          'toolPolicy.default',
        ]);
        return true;
      }
    );
  });

  it('rejects a delay cap below the initial delay', () => {
    assert.throws(
      () => loadConfig({ agent: { model: 'm' }, retry: { initialDelayMs: 1000, maxDelayMs: 10 } }),
      /retry\.maxDelayMs: maxDelayMs must not be smaller than initialDelayMs/
    );
  });

  it('requires an agent section', () => {
    assert.throws(() => loadConfig({}), /agent/);
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'agent-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and validates a JSON file', async () => {
    const path = join(dir, 'session.json');
    await writeFile(path, JSON.stringify({ agent: { model: 'model-a' }, pty: { maxSessions: 5 } }));

    const config = await loadConfigFile(path);

    assert.strictEqual(config.pty.maxSessions, 5);
  });

  it('names the file in validation errors', async () => {
    const path = join(dir, 'bad.json');
    await writeFile(path, JSON.stringify({ agent: { model: 'm' }, pty: { maxSessions: 0 } }));

    await assert.rejects(loadConfigFile(path), (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.ok(error.message.startsWith(`Invalid configuration in ${path}: pty.maxSessions: `));
      return true;
    });
  });

  it('rejects malformed JSON and missing files', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ not json');

    await assert.rejects(loadConfigFile(path), /^ConfigurationError: Invalid JSON in /);
    await assert.rejects(loadConfigFile(join(dir, 'missing.json')), ConfigurationError);
  });
});
