import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BrowserContext, LaunchOptions, Page, chromium } from 'playwright';
import { SessionConfig } from '../core/config';
import { BrowserCookie, PageDriver } from '../core/types';
import { log } from './logger';
import { applyStealthToContext, blockHeavyResources } from './stealth';

const SHARED_LAUNCH_ARGS = ['--disable-dev-shm-usage', '--no-sandbox', '--disable-gpu'];
const SCROLL_DISTANCE = 1000;

/** A running browser runtime able to hand out pages. */
export interface BrowserBackend {
  newPage(): Promise<PageDriver>;
  close(): Promise<void>;
}

export type BackendLauncher = (config: SessionConfig) => Promise<BrowserBackend>;

export const getBrowserLaunchOptions = (config: SessionConfig): LaunchOptions => ({
  headless: config.headless,
  args: [...SHARED_LAUNCH_ARGS],
  proxy: config.proxy ? { server: config.proxy } : undefined,
});

export const wrapPage = (page: Page): PageDriver => ({
  goto: async (url) => {
    await page.goto(url, { waitUntil: 'domcontentloaded' });
  },
  url: () => page.url(),
  fill: (selector, value) => page.locator(selector).first().fill(value),
  click: (selector) => page.locator(selector).first().click(),
  press: (selector, key) => page.locator(selector).first().press(key),
  setInputFiles: (selector, filePath) => page.locator(selector).first().setInputFiles(filePath),
  isVisible: (selector) => page.locator(selector).first().isVisible(),
  count: (selector) => page.locator(selector).count(),
  scroll: async (containerSelector) => {
    if (containerSelector) {
      await page.locator(containerSelector).first().hover();
    }
    await page.mouse.wheel(0, SCROLL_DISTANCE);
  },
  content: () => page.content(),
  addCookies: (cookies: BrowserCookie[]) => page.context().addCookies(cookies),
  close: () => page.close(),
  isClosed: () => page.isClosed(),
});

class PlaywrightBackend implements BrowserBackend {
  constructor(
    private readonly context: BrowserContext,
    private readonly profileDir: string,
  ) {}

  async newPage(): Promise<PageDriver> {
    return wrapPage(await this.context.newPage());
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await rm(this.profileDir, { recursive: true, force: true });
    }
  }
}

/** Launches Chromium on a throwaway profile directory that `close()` removes. */
export const launchPlaywrightBackend: BackendLauncher = async (config) => {
  const profileDir = await mkdtemp(join(tmpdir(), 'leadcast-profile-'));
  let context: BrowserContext | undefined;
  try {
    context = await chromium.launchPersistentContext(profileDir, {
      ...getBrowserLaunchOptions(config),
      viewport: config.viewport,
    });
    context.setDefaultTimeout(config.navigationTimeoutMs);
    context.setDefaultNavigationTimeout(config.navigationTimeoutMs);
    if (config.stealth) {
      await applyStealthToContext(context, { blockResources: config.blockResources });
    } else if (config.blockResources) {
      await blockHeavyResources(context);
    }
    log('INFO', `browser started (${config.headless ? 'headless' : 'headed'})`, { profileDir });
    return new PlaywrightBackend(context, profileDir);
  } catch (error) {
    await context?.close();
    await rm(profileDir, { recursive: true, force: true });
    throw error;
  }
};
