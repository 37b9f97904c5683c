import test from 'node:test';
import assert from 'node:assert/strict';
import { createFakeLauncher, failingLauncher, FakePage, TEST_SESSION_CONFIG } from '../../testing/fakes';
import { setLogLevel } from '../../utils/logger';
import { OperationCancelledError, SessionClosedError, SessionStartError } from '../errors';
import { SessionManager } from '../sessionManager';

setLogLevel('SILENT');

test('withPage closes the page after the operation succeeds or fails', async () => {
  const { launcher, backends } = createFakeLauncher();
  const manager = new SessionManager(launcher);
  const session = await manager.open(TEST_SESSION_CONFIG);

  const html = await session.withPage((page) => page.content());
  assert.equal(html, '<html><body></body></html>');
  await assert.rejects(
    session.withPage(async () => {
      throw new Error('boom');
    }),
    /boom/,
  );

  const pages = backends[0].pages;
  assert.equal(pages.length, 2);
  assert.ok(pages.every((page) => page.isClosed()));
  assert.equal(session.openPageCount, 0);
});

test('aborting closes the page immediately and rejects with OperationCancelledError', async () => {
  const { launcher } = createFakeLauncher();
  const session = await new SessionManager(launcher).open(TEST_SESSION_CONFIG);
  const controller = new AbortController();
  let closedMidOperation = false;

  const pending = session.withPage(async (page) => {
    setTimeout(() => controller.abort(), 5);
    await new Promise((resolve) => setTimeout(resolve, 30));
    closedMidOperation = page.isClosed();
    return page.content();
  }, controller.signal);

  await assert.rejects(pending, OperationCancelledError);
  assert.equal(closedMidOperation, true);
  assert.equal(session.openPageCount, 0);
});

test('an already aborted signal never opens a page', async () => {
  const { launcher, backends } = createFakeLauncher();
  const session = await new SessionManager(launcher).open(TEST_SESSION_CONFIG);
  await assert.rejects(session.withPage(async () => 'unreachable', AbortSignal.abort()), OperationCancelledError);
  assert.equal(backends[0].pages.length, 0);
});

test('launch failures surface as SessionStartError', async () => {
  const manager = new SessionManager(failingLauncher('chromium missing'));
  await assert.rejects(manager.open(TEST_SESSION_CONFIG), (error: unknown) => {
    assert.ok(error instanceof SessionStartError);
    assert.equal(error.message, 'Browser runtime could not be launched: chromium missing');
    return true;
  });
  assert.equal(manager.activeCount, 0);
});

test('close is idempotent and closes every open page with the runtime', async () => {
  const opened: FakePage[] = [];
  const { launcher, backends } = createFakeLauncher(() => {
    const page = new FakePage();
    opened.push(page);
    return page;
  });
  const manager = new SessionManager(launcher);
  const session = await manager.open(TEST_SESSION_CONFIG);

  const pending = session.withPage(() => new Promise<string>((resolve) => setTimeout(() => resolve('late'), 20)));
  await new Promise((resolve) => setTimeout(resolve, 5));
  await manager.close(session);
  await manager.close(session);

  assert.equal(opened[0].isClosed(), true);
  assert.equal(backends[0].closed, true);
  assert.equal(manager.activeCount, 0);
  assert.equal(await pending, 'late');
  await assert.rejects(session.withPage(async () => 'again'), SessionClosedError);
});

test('withSession always closes the session and rethrows the operation error', async () => {
  const { launcher, backends } = createFakeLauncher();
  const manager = new SessionManager(launcher);
  await assert.rejects(
    manager.withSession(TEST_SESSION_CONFIG, async () => {
      throw new Error('extraction exploded');
    }),
    /extraction exploded/,
  );
  assert.equal(backends[0].closed, true);
  assert.equal(manager.activeCount, 0);
});

test('closeAll shuts down every active session', async () => {
  const { launcher, backends } = createFakeLauncher();
  const manager = new SessionManager(launcher);
  await manager.open(TEST_SESSION_CONFIG);
  await manager.open(TEST_SESSION_CONFIG);
  assert.equal(manager.activeCount, 2);
  await manager.closeAll();
  assert.equal(manager.activeCount, 0);
  assert.ok(backends.every((backend) => backend.closed));
});

class CrashingPage extends FakePage {
  async close(): Promise<void> {
    throw new Error('page crashed');
  }
}

test('a page that fails to close still lets the runtime shut down', async () => {
  const { launcher, backends } = createFakeLauncher(() => new CrashingPage());
  const manager = new SessionManager(launcher);
  const session = await manager.open(TEST_SESSION_CONFIG);

  const pending = session.withPage(() => new Promise<string>((resolve) => setTimeout(() => resolve('late'), 20)));
  await new Promise((resolve) => setTimeout(resolve, 5));
  await assert.rejects(manager.close(session), /page crashed/);

  assert.equal(backends[0].closed, true);
  assert.equal(session.isClosed, true);
  assert.equal(manager.activeCount, 0);
  await manager.close(session);
  assert.equal(await pending, 'late');
});
