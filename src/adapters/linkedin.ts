import { Authenticator, BrowserPublisher, RecordExtractor } from '../core/capabilities';
import { LoginPair } from '../core/credentials';
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
import { ExtractionPlan, LeadDraft, RecordCard, requireText, runExtraction } from './extractionPipeline';

const BASE_URL = 'https://www.linkedin.com';
const LOGIN_URL = `${BASE_URL}/login`;
const FEED_URL = `${BASE_URL}/feed/`;

const SELECTORS = {
  loginField: 'input[name="session_key"]',
  passwordField: 'input[name="session_password"]',
  loginSubmit: 'button[type="submit"]',
  startPost: 'button:has-text("Start a post")',
  editor: 'div[role="textbox"]',
  addMedia: 'button[aria-label="Add media"]',
  fileInput: 'input[type="file"]',
  mediaNext: 'button:has-text("Next")',
  submitPost: 'button.share-actions__primary-action',
};

export const buildPeopleSearchUrl = (query: LeadQuery): string =>
  `${BASE_URL}/search/results/people/?keywords=${encodeURIComponent(query.terms)}&origin=GLOBAL_SEARCH_HEADER`;

/** Maps one `.entity-result` card of the people search. */
export const mapLinkedInProfile = (card: RecordCard, query: LeadQuery): LeadDraft => {
  // The title link carries a visually hidden "View X's profile" suffix; the aria-hidden span is the plain name.
  const name = card.text('.entity-result__title-text a span[aria-hidden="true"]') || requireText(card, '.entity-result__title-text', 'name');
  return {
    identity: name,
    attributes: {
      name,
      headline: card.text('.entity-result__primary-subtitle'),
      location: card.text('.entity-result__secondary-subtitle'),
      query: query.terms,
    },
    sourceUrl: absoluteUrl(card.attr('.entity-result__title-text a', 'href') ?? card.attr('a.app-aware-link', 'href'), BASE_URL),
  };
};

export const linkedInPlan = (query: LeadQuery): ExtractionPlan => ({
  platform: 'linkedin',
  url: buildPeopleSearchUrl(query),
  containerSelector: '.entity-result',
  readySelector: 'main',
  blockedUrlPatterns: [/\/authwall/, /\/login/, /\/checkpoint\//],
  scrollRounds: 3,
  mapRecord: mapLinkedInProfile,
});

export class LinkedInAdapter implements Authenticator, RecordExtractor, BrowserPublisher {
  readonly platform = 'linkedin' as const;
  readonly publishChannel = 'browser' as const;
  private readonly login?: LoginPair;
  private readonly timings: AutomationTimings;

  constructor(context: AdapterContext) {
    this.login = context.credentials.loginPair('LINKEDIN_EMAIL', 'LINKEDIN_PASSWORD');
    this.timings = context.timings;
  }

  async authenticate(page: PageDriver, options: OperationOptions = {}): Promise<AuthResult> {
    const { login, secret } = requireLoginPair(this.login, this.platform, ['LINKEDIN_EMAIL', 'LINKEDIN_PASSWORD']);
    return submitLoginForm(
      page,
      this.platform,
      {
        url: LOGIN_URL,
        stages: [
          { field: SELECTORS.loginField, value: login },
          { field: SELECTORS.passwordField, value: secret, submit: SELECTORS.loginSubmit },
        ],
        signals: {
          successUrl: /linkedin\.com\/(feed|mynetwork|in\/|search)/,
          failureSelectors: ['#error-for-username', '#error-for-password'],
          challengeUrl: /\/checkpoint\//,
        },
      },
      this.timings,
      options,
    );
  }

  extractRecords(page: PageDriver, query: LeadQuery, maxResults: number, options?: OperationOptions): AsyncGenerator<Lead> {
    return runExtraction(page, linkedInPlan(query), query, maxResults, this.timings, options);
  }

  async publish(page: PageDriver, request: PostRequest, { signal }: OperationOptions = {}): Promise<PostResult> {
    const { timings } = this;
    const message = payloadField(request, 'message');
    const { mediaRef } = request;

    await runPublishSteps(
      this.platform,
      [
        {
          name: 'open-composer',
          run: async () => {
            await page.goto(FEED_URL);
            await waitVisible(page, SELECTORS.startPost, timings, signal);
            await page.click(SELECTORS.startPost);
            await waitVisible(page, SELECTORS.editor, timings, signal);
          },
        },
        { name: 'enter-text', run: () => page.fill(SELECTORS.editor, message) },
        ...(mediaRef
          ? [
              {
                name: 'attach-media',
                run: async () => {
                  await assertReadableFile(mediaRef);
                  await page.click(SELECTORS.addMedia);
                  await page.setInputFiles(SELECTORS.fileInput, mediaRef);
                  await waitVisible(page, SELECTORS.mediaNext, timings, signal);
                  await page.click(SELECTORS.mediaNext);
                },
              },
            ]
          : []),
        {
          name: 'submit',
          run: async () => {
            await waitVisible(page, SELECTORS.submitPost, timings, signal);
            await page.click(SELECTORS.submitPost);
            await waitHidden(page, SELECTORS.editor, timings, signal);
          },
        },
      ],
      {},
    );

    return publishedResult(this.platform);
  }
}
