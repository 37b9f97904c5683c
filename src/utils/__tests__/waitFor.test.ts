import test from 'node:test';
import assert from 'node:assert/strict';
import { OperationCancelledError } from '../../core/errors';
import { pause } from '../rateLimiter';
import { pollUntil, settle, waitUntil, WaitTimeoutError } from '../waitFor';

test('pollUntil resolves with the first truthy probe result', async () => {
  let calls = 0;
  const value = await pollUntil(async () => {
    calls += 1;
    return calls === 3 ? 'ready' : undefined;
  }, { timeoutMs: 500, intervalMs: 1 });
  assert.equal(value, 'ready');
  assert.equal(calls, 3);
});

test('pollUntil probes once even with a zero timeout', async () => {
  let calls = 0;
  const value = await pollUntil(async () => {
    calls += 1;
    return false;
  }, { timeoutMs: 0 });
  assert.equal(value, undefined);
  assert.equal(calls, 1);
});

test('waitUntil raises WaitTimeoutError naming the condition', async () => {
  await assert.rejects(waitUntil(async () => false, 'the editor', { timeoutMs: 20, intervalMs: 5 }), (error: unknown) => {
    assert.ok(error instanceof WaitTimeoutError);
    assert.equal(error.message, 'Timed out after 20ms waiting for the editor');
    return true;
  });
});

test('an already aborted signal cancels before probing', async () => {
  let calls = 0;
  await assert.rejects(
    pollUntil(async () => {
      calls += 1;
      return true;
    }, { timeoutMs: 100, signal: AbortSignal.abort() }),
    OperationCancelledError,
  );
  assert.equal(calls, 0);
});

test('aborting during the pause between probes cancels the wait', async () => {
  const controller = new AbortController();
  setTimeout(() => controller.abort(), 10);
  await assert.rejects(pollUntil(async () => false, { timeoutMs: 5_000, intervalMs: 1_000, signal: controller.signal }), OperationCancelledError);
});

test('settle reports false instead of throwing when the deadline passes', async () => {
  assert.equal(await settle(async () => false, { timeoutMs: 15, intervalMs: 5 }), false);
  assert.equal(await settle(async () => true, { timeoutMs: 15, intervalMs: 5 }), true);
});

test('pause rejects with the abort reason', async () => {
  const reason = new Error('stop');
  await assert.rejects(pause(1_000, AbortSignal.abort(reason)), (error: unknown) => error === reason);
});
