import { RecordExtractor } from '../core/capabilities';
import { AutomationTimings, Lead, LeadQuery, OperationOptions, PageDriver } from '../core/types';
import { absoluteUrl, AdapterContext, isPublicUrl } from './common';
import { ExtractionPlan, LeadDraft, RecordCard, requireText, runExtraction } from './extractionPipeline';

const BASE_URL = 'https://www.google.com';
const GOOGLE_HOST_PATTERN = /(^|\.)google\./i;

export const buildMapsSearchUrl = (query: LeadQuery): string => {
  const search = `${query.terms} ${query.location ?? ''}`.trim();
  return `${BASE_URL}/maps/search/${encodeURIComponent(search)}?hl=en`;
};

/** "4.6 stars 132 Reviews" -> rating and review count. */
export const parseRatingLabel = (label?: string): { rating?: string; reviews?: string } => {
  if (!label) return {};
  const rating = label.match(/(\d(?:[.,]\d)?)\s*stars?/i)?.[1]?.replace(',', '.');
  const reviews = label.match(/([\d,.]+)\s*reviews?/i)?.[1]?.replace(/[,.]/g, '');
  return { rating, reviews };
};

// Only keep real business sites; Maps wraps some links in google.com redirects.
const normalizeWebsite = (href?: string): string | undefined => {
  if (!isPublicUrl(href)) return undefined;
  const parsed = new URL(href);
  if (!GOOGLE_HOST_PATTERN.test(parsed.hostname)) return parsed.toString();
  const wrapped = parsed.searchParams.get('q') || parsed.searchParams.get('url') || undefined;
  return isPublicUrl(wrapped) && !GOOGLE_HOST_PATTERN.test(new URL(wrapped).hostname) ? wrapped : undefined;
};

export const mapBusinessCard = (card: RecordCard, query: LeadQuery): LeadDraft => {
  const name = card.text('.fontHeadlineSmall') || card.attr(null, 'aria-label') || requireText(card, 'a[aria-label]', 'business name');
  const segments = card
    .text('.fontBodyMedium')
    .split('·')
    .map((segment) => segment.trim())
    .filter(Boolean);
  const { rating, reviews } = parseRatingLabel(card.attr('[role="img"]', 'aria-label'));

  return {
    identity: name,
    attributes: {
      name,
      rating,
      reviews,
      category: segments[0],
      address: segments.slice(1).join(' · ') || undefined,
      website: normalizeWebsite(card.attr('a[data-value="Website"]', 'href')),
      searchQuery: query.terms,
      location: query.location,
    },
    sourceUrl: absoluteUrl(card.attr('a[href*="/maps/place/"]', 'href'), BASE_URL),
  };
};

export const googleMapsPlan = (query: LeadQuery): ExtractionPlan => ({
  platform: 'google_maps',
  url: buildMapsSearchUrl(query),
  containerSelector: '[role="feed"] [role="article"]',
  readySelector: '[role="main"]',
  blockedUrlPatterns: [/consent\.google\./, /google\.com\/sorry\//],
  scrollRounds: 5,
  scrollContainer: '[role="feed"]',
  mapRecord: mapBusinessCard,
});

export class GoogleMapsAdapter implements RecordExtractor {
  readonly platform = 'google_maps' as const;
  private readonly timings: AutomationTimings;

  constructor(context: AdapterContext) {
    this.timings = context.timings;
  }

  extractRecords(page: PageDriver, query: LeadQuery, maxResults: number, options?: OperationOptions): AsyncGenerator<Lead> {
    return runExtraction(page, googleMapsPlan(query), query, maxResults, this.timings, options);
  }
}
