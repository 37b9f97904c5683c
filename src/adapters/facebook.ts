import { ApiPublisher, Authenticator, RecordExtractor } from '../core/capabilities';
import { CredentialSet, LoginPair } from '../core/credentials';
import { MissingCredentialError, NavigationError } from '../core/errors';
import { AuthResult, AutomationTimings, Lead, LeadQuery, OperationOptions, PageDriver, PostRequest, PostResult } from '../core/types';
import {
  absoluteUrl,
  AdapterContext,
  isPublicUrl,
  payloadField,
  publishedResult,
  requireLoginPair,
  runPublishSteps,
  submitLoginForm,
} from './common';
import { ExtractionPlan, LeadDraft, RecordCard, requireText, runExtraction, truncate } from './extractionPipeline';
import { createGraphClient, GraphApiClient, readGraphId } from './graphApi';

const BASE_URL = 'https://www.facebook.com';
const POST_PREVIEW_LENGTH = 200;

const SELECTORS = {
  email: 'input[name="email"]',
  password: 'input[name="pass"]',
  login: 'button[name="login"]',
  author: 'h2 a, h3 a, strong a',
  message: '[data-ad-comet-preview="message"], [data-ad-preview="message"]',
  permalink: 'a[href*="/posts/"], a[href*="/permalink/"]',
};

export const mapGroupPost = (card: RecordCard, query: LeadQuery): LeadDraft => {
  const author = requireText(card, SELECTORS.author, 'author');
  return {
    identity: author,
    attributes: {
      name: author,
      profileUrl: absoluteUrl(card.attr(SELECTORS.author, 'href'), BASE_URL)?.split('?')[0],
      postPreview: truncate(card.text(SELECTORS.message), POST_PREVIEW_LENGTH),
      groupUrl: query.targetUrl,
      query: query.terms,
    },
    sourceUrl: absoluteUrl(card.attr(SELECTORS.permalink, 'href'), BASE_URL),
  };
};

export const facebookGroupPlan = (query: LeadQuery): ExtractionPlan => {
  if (!isPublicUrl(query.targetUrl)) {
    throw new NavigationError(query.targetUrl ?? '', 'facebook lead search needs a group URL in targetUrl', { platform: 'facebook' });
  }
  return {
    platform: 'facebook',
    url: query.targetUrl,
    containerSelector: 'div[role="article"][aria-posinset]',
    readySelector: '[role="feed"]',
    blockedUrlPatterns: [/\/login/, /\/checkpoint\//],
    scrollRounds: 3,
    mapRecord: mapGroupPost,
  };
};

interface PageTarget {
  pageId: string;
  pageToken: string;
}

const resolvePageTarget = async (graph: GraphApiClient, credentials: CredentialSet, signal?: AbortSignal): Promise<PageTarget> => {
  const configuredId = credentials.get('FACEBOOK_PAGE_ID');
  const configuredToken = credentials.get('FACEBOOK_PAGE_TOKEN');
  if (configuredId && configuredToken) return { pageId: configuredId, pageToken: configuredToken };

  const pages = await graph.listManagedPages(signal);
  const page = configuredId ? pages.find((candidate) => candidate.id === configuredId) : pages[0];
  if (!page) throw new Error(configuredId ? `Page ${configuredId} is not managed by this token` : 'No Facebook pages found for this token');
  if (!page.accessToken) throw new Error(`No page access token returned for page ${page.id}`);
  return { pageId: page.id, pageToken: page.accessToken };
};

/**
 * Group-feed lead reading goes through a logged-in browser; page posts go
 * through the Graph API with a page token.
 */
export class FacebookAdapter implements Authenticator, RecordExtractor, ApiPublisher {
  readonly platform = 'facebook' as const;
  readonly publishChannel = 'api' as const;
  private readonly login?: LoginPair;
  private readonly timings: AutomationTimings;
  // unset without META_ACCESS_TOKEN; lead reading still works
  private readonly graph?: GraphApiClient;

  constructor(private readonly context: AdapterContext) {
    const token = context.credentials.get('META_ACCESS_TOKEN');
    this.graph = token ? createGraphClient(context, token) : undefined;
    this.login = context.credentials.loginPair('FACEBOOK_EMAIL', 'FACEBOOK_PASSWORD');
    this.timings = context.timings;
  }

  async authenticate(page: PageDriver, options: OperationOptions = {}): Promise<AuthResult> {
    const { login, secret } = requireLoginPair(this.login, this.platform, ['FACEBOOK_EMAIL', 'FACEBOOK_PASSWORD']);
    return submitLoginForm(
      page,
      this.platform,
      {
        url: `${BASE_URL}/login`,
        stages: [
          { field: SELECTORS.email, value: login },
          { field: SELECTORS.password, value: secret, submit: SELECTORS.login },
        ],
        signals: {
          successUrl: /facebook\.com\/(?!login)/,
          failureSelectors: ['#error_box', '#login_error'],
          challengeUrl: /\/checkpoint\//,
        },
      },
      this.timings,
      options,
    );
  }

  async *extractRecords(page: PageDriver, query: LeadQuery, maxResults: number, options?: OperationOptions): AsyncGenerator<Lead> {
    yield* runExtraction(page, facebookGroupPlan(query), query, maxResults, this.timings, options);
  }

  async publish(request: PostRequest, { signal }: OperationOptions = {}): Promise<PostResult> {
    const { graph } = this;
    if (!graph) throw new MissingCredentialError('META_ACCESS_TOKEN', { platform: this.platform });
    const { credentials } = this.context;
    const partialState: Record<string, string> = {};
    const params: Record<string, string> = { message: payloadField(request, 'message') };
    let target: PageTarget | undefined;
    let postId = '';

    await runPublishSteps(
      this.platform,
      [
        {
          name: 'prepare',
          run: async () => {
            if (!request.mediaRef) return;
            if (!isPublicUrl(request.mediaRef)) throw new Error('Facebook media must be a public http(s) URL');
            params.link = request.mediaRef;
          },
        },
        {
          name: 'resolve-page',
          run: async () => {
            target = await resolvePageTarget(graph, credentials, signal);
            partialState.pageId = target.pageId;
          },
        },
        {
          name: 'post-feed',
          run: async () => {
            if (!target) throw new Error('Page was not resolved');
            const body = await graph.post(`${target.pageId}/feed`, { ...params, access_token: target.pageToken }, signal);
            postId = readGraphId(body, 'page feed post');
          },
        },
      ],
      partialState,
    );

    return publishedResult(this.platform, { remoteId: postId, remoteUrl: `https://facebook.com/${postId}` });
  }
}
