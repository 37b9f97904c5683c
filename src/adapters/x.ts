import { load } from 'cheerio';
import { Authenticator, BrowserPublisher, RecordExtractor } from '../core/capabilities';
import { LoginPair } from '../core/credentials';
import { ExtractionFieldError } from '../core/errors';
import { AuthResult, AutomationTimings, Lead, LeadQuery, OperationOptions, PageDriver, PostRequest, PostResult } from '../core/types';
import {
  absoluteUrl,
  AdapterContext,
  assertReadableFile,
  payloadField,
  publishedResult,
  requireLoginPair,
  runPublishSteps,
  submitLoginForm,
  waitHidden,
  waitVisible,
} from './common';
import { ExtractionPlan, LeadDraft, RecordCard, runExtraction, truncate } from './extractionPipeline';

const BASE_URL = 'https://x.com';

const SELECTORS = {
  username: 'input[autocomplete="username"]',
  next: 'button:has-text("Next")',
  password: 'input[name="password"]',
  login: '[data-testid="LoginForm_Login_Button"]',
  verification: 'input[data-testid="ocfEnterTextTextInput"]',
  newPost: 'a[data-testid="SideNav_NewTweet_Button"]',
  textarea: '[data-testid="tweetTextarea_0"]',
  fileInput: 'input[data-testid="fileInput"]',
  attachments: '[data-testid="attachments"]',
  submit: '[data-testid="tweetButton"]',
};

const TWEET_PREVIEW_LENGTH = 200;

export const buildLiveSearchUrl = (query: LeadQuery): string =>
  `${BASE_URL}/search?q=${encodeURIComponent(query.terms)}&src=typed_query&f=live`;

export const mapTweetAuthor = (card: RecordCard, query: LeadQuery): LeadDraft => {
  const profileHref = card.attr('[data-testid="User-Name"] a[href^="/"]', 'href');
  const username = profileHref?.split('/').filter(Boolean)[0];
  if (!username) throw new ExtractionFieldError('handle', 'tweet has no author link');

  const handle = `@${username}`;
  return {
    identity: handle,
    attributes: {
      name: card.text('[data-testid="User-Name"] a span') || username,
      handle,
      tweetText: truncate(card.text('[data-testid="tweetText"]'), TWEET_PREVIEW_LENGTH),
      hashtag: query.terms,
    },
    sourceUrl: absoluteUrl(card.attr('a[href*="/status/"]', 'href'), BASE_URL),
  };
};

export const xPlan = (query: LeadQuery): ExtractionPlan => ({
  platform: 'x',
  url: buildLiveSearchUrl(query),
  containerSelector: 'article[data-testid="tweet"]',
  readySelector: '[data-testid="primaryColumn"]',
  blockedUrlPatterns: [/\/i\/flow\/login/, /\/login/],
  scrollRounds: 5,
  mapRecord: mapTweetAuthor,
});

/** Status id from the "Your post was sent" toast, when the page shows one. */
export const readPostedStatusId = (html: string): string | undefined => {
  const href = load(html)('[data-testid="toast"] a[href*="/status/"]').attr('href');
  return href?.match(/\/status\/(\d+)/)?.[1];
};

export class XAdapter implements Authenticator, RecordExtractor, BrowserPublisher {
  readonly platform = 'x' as const;
  readonly publishChannel = 'browser' as const;
  private readonly login?: LoginPair;
  private readonly timings: AutomationTimings;

  constructor(context: AdapterContext) {
    this.login = context.credentials.loginPair('X_USERNAME', 'X_PASSWORD');
    this.timings = context.timings;
  }

  async authenticate(page: PageDriver, options: OperationOptions = {}): Promise<AuthResult> {
    const { login, secret } = requireLoginPair(this.login, this.platform, ['X_USERNAME', 'X_PASSWORD']);
    return submitLoginForm(
      page,
      this.platform,
      {
        url: `${BASE_URL}/i/flow/login`,
        stages: [
          { field: SELECTORS.username, value: login, submit: SELECTORS.next },
          { field: SELECTORS.password, value: secret, submit: SELECTORS.login },
        ],
        signals: {
          successUrl: /x\.com\/home/,
          failureSelectors: ['div[role="alert"]'],
          challengeSelectors: [SELECTORS.verification],
          challengeUrl: /\/account\/access/,
        },
      },
      this.timings,
      options,
    );
  }

  extractRecords(page: PageDriver, query: LeadQuery, maxResults: number, options?: OperationOptions): AsyncGenerator<Lead> {
    return runExtraction(page, xPlan(query), query, maxResults, this.timings, options);
  }

  async publish(page: PageDriver, request: PostRequest, { signal }: OperationOptions = {}): Promise<PostResult> {
    const { timings } = this;
    const message = payloadField(request, 'message');
    const { mediaRef } = request;
    let remoteId: string | undefined;

    await runPublishSteps(
      this.platform,
      [
        {
          name: 'open-composer',
          run: async () => {
            await page.goto(`${BASE_URL}/home`);
            await waitVisible(page, SELECTORS.newPost, timings, signal);
            await page.click(SELECTORS.newPost);
            await waitVisible(page, SELECTORS.textarea, timings, signal);
          },
        },
        { name: 'enter-text', run: () => page.fill(SELECTORS.textarea, message) },
        ...(mediaRef
          ? [
              {
                name: 'attach-media',
                run: async () => {
                  await assertReadableFile(mediaRef);
                  await page.setInputFiles(SELECTORS.fileInput, mediaRef);
                  await waitVisible(page, SELECTORS.attachments, timings, signal);
                },
              },
            ]
          : []),
        {
          name: 'submit',
          run: async () => {
            await page.click(SELECTORS.submit);
            await waitHidden(page, SELECTORS.textarea, timings, signal);
            remoteId = readPostedStatusId(await page.content());
          },
        },
      ],
      {},
    );

    return publishedResult(this.platform, {
      remoteId,
      remoteUrl: remoteId ? `${BASE_URL}/i/status/${remoteId}` : undefined,
    });
  }
}
