import { Authenticator, BrowserPublisher } from '../core/capabilities';
import { AuthenticationError, OperationCancelledError } from '../core/errors';
import { AuthResult, AutomationTimings, OperationOptions, PageDriver, PostRequest, PostResult } from '../core/types';
import { describeError, log } from '../utils/logger';
import { waitUntil } from '../utils/waitFor';
import { AdapterContext, awaitLoginOutcome, payloadField, publishedResult, runPublishSteps, stepWait, waitVisible } from './common';

const BASE_URL = 'https://medium.com';
const MAX_TAGS = 5;

const SELECTORS = {
  writeLink: 'a[href*="new-story"]',
  title: 'h3[data-testid="editorTitleParagraph"]',
  body: 'p[data-testid="editorParagraphText"]',
  publish: 'button:has-text("Publish")',
  tagInput: 'input[placeholder="Add a tag..."]',
  publishNow: 'button:has-text("Publish now")',
};

const DRAFT_URL_PATTERN = /\/p\/([0-9a-f]+)\/edit/;

/** Comma separated, trimmed, case-insensitively unique, at most five. */
export const parseTags = (raw: string): string[] => {
  const seen = new Set<string>();
  const tags: string[] = [];
  for (const tag of raw.split(',').map((entry) => entry.trim())) {
    if (!tag || seen.has(tag.toLowerCase())) continue;
    seen.add(tag.toLowerCase());
    tags.push(tag);
    if (tags.length === MAX_TAGS) break;
  }
  return tags;
};

/** Story id is the trailing hex segment of the published slug. */
export const readStoryId = (url: string): string | undefined => new URL(url).pathname.match(/-([0-9a-f]{8,})$/)?.[1];

export class MediumAdapter implements Authenticator, BrowserPublisher {
  readonly platform = 'medium' as const;
  readonly publishChannel = 'browser' as const;
  private readonly sessionToken?: string;
  private readonly timings: AutomationTimings;

  constructor(context: AdapterContext) {
    this.sessionToken = context.credentials.get('MEDIUM_SESSION_TOKEN');
    this.timings = context.timings;
  }

  // Medium has no password login; a browser session cookie stands in for it.
  async authenticate(page: PageDriver, { signal }: OperationOptions = {}): Promise<AuthResult> {
    if (!this.sessionToken) {
      throw new AuthenticationError('medium credentials are not configured (MEDIUM_SESSION_TOKEN)', { platform: this.platform });
    }
    try {
      await page.addCookies([{ name: 'sid', value: this.sessionToken, domain: '.medium.com', path: '/', secure: true, httpOnly: true }]);
      await page.goto(`${BASE_URL}/me/stories`);
      const landingUrl = await awaitLoginOutcome(
        page,
        this.platform,
        { successSelector: SELECTORS.writeLink, rejectedUrl: /\/signin/ },
        this.timings,
        signal,
      );
      log('INFO', `[${this.platform}] authenticated`, landingUrl);
      return { platform: this.platform, method: 'cookie', landingUrl };
    } catch (error) {
      if (error instanceof AuthenticationError || error instanceof OperationCancelledError) throw error;
      throw new AuthenticationError(`medium login failed: ${describeError(error)}`, { platform: this.platform, cause: error });
    }
  }

  async publish(page: PageDriver, request: PostRequest, { signal }: OperationOptions = {}): Promise<PostResult> {
    const { timings } = this;
    const title = payloadField(request, 'title').trim();
    const body = payloadField(request, 'message');
    const tags = parseTags(payloadField(request, 'tags'));
    const partialState: Record<string, string> = {};

    await runPublishSteps(
      this.platform,
      [
        {
          name: 'open-editor',
          run: async () => {
            await page.goto(`${BASE_URL}/new-story`);
            await waitVisible(page, SELECTORS.title, timings, signal);
          },
        },
        {
          name: 'enter-title',
          run: async () => {
            if (!title) throw new Error('Medium stories need a title');
            await page.fill(SELECTORS.title, title);
          },
        },
        {
          name: 'enter-body',
          run: async () => {
            await page.fill(SELECTORS.body, body);
            const draftId = page.url().match(DRAFT_URL_PATTERN)?.[1];
            if (draftId) {
              partialState.draftId = draftId;
              partialState.draftUrl = page.url();
            }
          },
        },
        {
          name: 'open-publish-dialog',
          run: async () => {
            await page.click(SELECTORS.publish);
            await waitVisible(page, SELECTORS.tagInput, timings, signal);
          },
        },
        {
          name: 'add-tags',
          run: async () => {
            for (const tag of tags) {
              await page.fill(SELECTORS.tagInput, tag);
              await page.press(SELECTORS.tagInput, 'Enter');
            }
          },
        },
        {
          name: 'confirm-publish',
          run: async () => {
            await page.click(SELECTORS.publishNow);
            await waitUntil(
              async () => !/\/edit|\/new-story/.test(page.url()),
              'the published story to load',
              stepWait(timings, signal),
            );
          },
        },
      ],
      partialState,
    );

    const remoteUrl = page.url();
    return publishedResult(this.platform, { remoteId: readStoryId(remoteUrl), remoteUrl });
  }
}
