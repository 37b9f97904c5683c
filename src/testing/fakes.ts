import axios, { AxiosError, AxiosInstance, AxiosResponse } from 'axios';
import { load } from 'cheerio';
import { AdapterContext } from '../adapters/common';
import { SessionConfig } from '../core/config';
import { CredentialKey, CredentialSet } from '../core/credentials';
import { AutomationTimings, BrowserCookie, PageDriver } from '../core/types';
import { BackendLauncher, BrowserBackend } from '../utils/playwrightBackend';

export const FAST_TIMINGS: AutomationTimings = {
  navigationTimeoutMs: 200,
  authTimeoutMs: 200,
  stepTimeoutMs: 200,
  settleMs: 30,
  pollIntervalMs: 5,
};

export const TEST_SESSION_CONFIG: SessionConfig = {
  headless: true,
  stealth: false,
  blockResources: false,
  viewport: { width: 1280, height: 800 },
  navigationTimeoutMs: FAST_TIMINGS.navigationTimeoutMs,
};

type Hook<A extends unknown[]> = (page: FakePage, ...args: A) => void | Promise<void>;

export interface FakePageOptions {
  url?: string;
  /** Markup served by content(); a function sees the page, e.g. to grow with each scroll. */
  html?: string | ((page: FakePage) => string);
  visible?: Iterable<string>;
  onGoto?: Hook<[url: string]>;
  onClick?: Hook<[selector: string]>;
  onFill?: Hook<[selector: string, value: string]>;
}

/** In-memory PageDriver that records every interaction as a readable action line. */
export class FakePage implements PageDriver {
  readonly actions: string[] = [];
  readonly visible: Set<string>;
  readonly cookies: BrowserCookie[] = [];
  currentUrl: string;
  scrolls = 0;
  private closed = false;

  constructor(private readonly options: FakePageOptions = {}) {
    this.currentUrl = options.url ?? 'about:blank';
    this.visible = new Set(options.visible ?? []);
  }

  get html(): string {
    const { html = '<html><body></body></html>' } = this.options;
    return typeof html === 'function' ? html(this) : html;
  }

  async goto(url: string): Promise<void> {
    this.ensureOpen();
    this.actions.push(`goto ${url}`);
    this.currentUrl = url;
    await this.options.onGoto?.(this, url);
  }

  url(): string {
    return this.currentUrl;
  }

  async fill(selector: string, value: string): Promise<void> {
    this.ensureOpen();
    this.actions.push(`fill ${selector} = ${value}`);
    await this.options.onFill?.(this, selector, value);
  }

  async click(selector: string): Promise<void> {
    this.ensureOpen();
    this.actions.push(`click ${selector}`);
    await this.options.onClick?.(this, selector);
  }

  async press(selector: string, key: string): Promise<void> {
    this.ensureOpen();
    this.actions.push(`press ${selector} ${key}`);
  }

  async setInputFiles(selector: string, filePath: string): Promise<void> {
    this.ensureOpen();
    this.actions.push(`upload ${selector} ${filePath}`);
  }

  async isVisible(selector: string): Promise<boolean> {
    this.ensureOpen();
    return this.visible.has(selector);
  }

  async count(selector: string): Promise<number> {
    this.ensureOpen();
    return load(this.html)(selector).length;
  }

  async scroll(containerSelector?: string): Promise<void> {
    this.ensureOpen();
    this.scrolls += 1;
    this.actions.push(`scroll ${containerSelector ?? 'page'}`);
  }

  async content(): Promise<string> {
    this.ensureOpen();
    return this.html;
  }

  async addCookies(cookies: BrowserCookie[]): Promise<void> {
    this.ensureOpen();
    this.cookies.push(...cookies);
    this.actions.push(`cookies ${cookies.map((cookie) => cookie.name).join(',')}`);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Swaps what is visible, as a page transition would. */
  show(...selectors: string[]): void {
    selectors.forEach((selector) => this.visible.add(selector));
  }

  hide(...selectors: string[]): void {
    selectors.forEach((selector) => this.visible.delete(selector));
  }

  private ensureOpen(): void {
    if (this.closed) throw new Error('Target page has been closed');
  }
}

export class FakeBackend implements BrowserBackend {
  readonly pages: FakePage[] = [];
  closed = false;

  constructor(private readonly pageFactory: () => FakePage) {}

  async newPage(): Promise<FakePage> {
    if (this.closed) throw new Error('Browser has been closed');
    const page = this.pageFactory();
    this.pages.push(page);
    return page;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export interface FakeLauncher {
  launcher: BackendLauncher;
  backends: FakeBackend[];
}

export const createFakeLauncher = (pageFactory: () => FakePage = () => new FakePage()): FakeLauncher => {
  const backends: FakeBackend[] = [];
  return {
    backends,
    launcher: async () => {
      const backend = new FakeBackend(pageFactory);
      backends.push(backend);
      return backend;
    },
  };
};

export const failingLauncher =
  (message: string): BackendLauncher =>
  async () => {
    throw new Error(message);
  };

export interface GraphCall {
  method: string;
  url: string;
  params: Record<string, unknown>;
}

export type GraphReply = { status: number; data: unknown } | 'offline';

/** Axios instance whose adapter answers in-process; every request is recorded. */
export const createFakeGraphHttp = (respond: (call: GraphCall) => GraphReply): { http: AxiosInstance; calls: GraphCall[] } => {
  const calls: GraphCall[] = [];
  const http = axios.create({
    adapter: async (config) => {
      const call: GraphCall = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        params: { ...config.params },
      };
      calls.push(call);
      const reply = respond(call);
      if (reply === 'offline') throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
      const response: AxiosResponse = { data: reply.data, status: reply.status, statusText: String(reply.status), headers: {}, config };
      if (reply.status >= 400) {
        throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_REQUEST', config, undefined, response);
      }
      return response;
    },
  });
  return { http, calls };
};

export const testContext = (
  credentials: Partial<Record<CredentialKey, string>> = {},
  overrides: Partial<AdapterContext> = {},
): AdapterContext => ({
  credentials: new CredentialSet(credentials),
  timings: FAST_TIMINGS,
  graphApiVersion: 'v18.0',
  graphMinIntervalMs: 0,
  ...overrides,
});
