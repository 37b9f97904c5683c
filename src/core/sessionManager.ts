import { randomUUID } from 'node:crypto';
import { BackendLauncher, BrowserBackend, launchPlaywrightBackend } from '../utils/playwrightBackend';
import { describeError, log } from '../utils/logger';
import { SessionConfig } from './config';
import { OperationCancelledError, SessionClosedError, SessionStartError } from './errors';
import { PageDriver } from './types';

/**
 * A live browser runtime. Pages are only handed out through `withPage`, so a
 * page never outlives the operation that acquired it nor the session itself.
 */
export class Session {
  readonly id = randomUUID();
  private readonly pages = new Set<PageDriver>();
  private closed = false;

  constructor(private readonly backend: BrowserBackend) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get openPageCount(): number {
    return this.pages.size;
  }

  async withPage<T>(operation: (page: PageDriver) => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (this.closed) throw new SessionClosedError();
    if (signal?.aborted) throw new OperationCancelledError('Operation cancelled before a page was opened', { cause: signal.reason });

    const page = await this.backend.newPage();
    this.pages.add(page);
    if (signal?.aborted) {
      await this.releasePage(page);
      throw new OperationCancelledError('Operation cancelled while a page was opening', { cause: signal.reason });
    }
    const onAbort = (): void => {
      this.releasePage(page).catch((error) => log('WARN', `session ${this.id}: page close after abort failed`, describeError(error)));
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await operation(page);
    } catch (error) {
      if (signal?.aborted && !(error instanceof OperationCancelledError)) {
        throw new OperationCancelledError('Operation cancelled', { cause: error });
      }
      throw error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await this.releasePage(page);
    }
  }

  /**
   * Closes every page, then the runtime, even when a page fails to close; the
   * first page failure is rethrown afterwards. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const released = await Promise.allSettled([...this.pages].map((page) => this.releasePage(page)));
    try {
      await this.backend.close();
    } catch (error) {
      // pages are already released; a later close retries the runtime
      this.closed = false;
      throw error;
    }
    const failed = released.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    if (failed) throw failed.reason;
  }

  private async releasePage(page: PageDriver): Promise<void> {
    if (!this.pages.delete(page)) return;
    if (!page.isClosed()) await page.close();
  }
}

export class SessionManager {
  private readonly active = new Set<Session>();

  constructor(private readonly launcher: BackendLauncher = launchPlaywrightBackend) {}

  async open(config: SessionConfig): Promise<Session> {
    let backend: BrowserBackend;
    try {
      backend = await this.launcher(config);
    } catch (error) {
      throw new SessionStartError(`Browser runtime could not be launched: ${describeError(error)}`, { cause: error });
    }
    const session = new Session(backend);
    this.active.add(session);
    log('INFO', `session ${session.id} opened`);
    return session;
  }

  async close(session: Session): Promise<void> {
    this.active.delete(session);
    if (session.isClosed) return;
    await session.close();
    log('INFO', `session ${session.id} closed`);
  }

  /** Opens a session for the duration of `operation` and always closes it. */
  async withSession<T>(config: SessionConfig, operation: (session: Session) => Promise<T>): Promise<T> {
    const session = await this.open(config);
    let failed = false;
    try {
      return await operation(session);
    } catch (error) {
      failed = true;
      throw error;
    } finally {
      try {
        await this.close(session);
      } catch (closeError) {
        // The operation's own failure is the one the caller needs to see.
        if (!failed) throw closeError;
        log('ERROR', `session ${session.id} teardown failed`, describeError(closeError));
      }
    }
  }

  get activeCount(): number {
    return this.active.size;
  }

  async closeAll(): Promise<void> {
    await Promise.all([...this.active].map((session) => this.close(session)));
  }
}
