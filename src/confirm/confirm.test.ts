import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { autoApprove, autoDeny, confirmWith, type ConfirmationRequest } from './confirm.js';

const request: ConfirmationRequest = {
  toolName: 'shell',
  toolCallId: 'call-1',
  arguments: { command: 'ls' },
  description: 'Run a shell command',
};

describe('confirmation handlers', () => {
  it('auto-approve and auto-deny answer without asking', async () => {
    assert.strictEqual(await autoApprove.confirm(request), true);
    assert.strictEqual(await autoDeny.confirm(request), false);
  });

  it('passes the request to the callback', async () => {
    const seen: string[] = [];
    const handler = confirmWith((req) => {
      seen.push(req.toolName);
      return req.toolName === 'shell';
    });

    assert.strictEqual(await handler.confirm(request), true);
    assert.strictEqual(await handler.confirm({ ...request, toolName: 'rm' }), false);
    assert.deepStrictEqual(seen, ['shell', 'rm']);
  });

  it('rejects without asking once the signal is aborted', async () => {
    let asked = false;
    const handler = confirmWith(async () => {
      asked = true;
      return true;
    });
    const controller = new AbortController();
    controller.abort();

    assert.strictEqual(await handler.confirm(request, controller.signal), false);
    assert.strictEqual(asked, false);
  });
});
