import { Cheerio, CheerioAPI, load } from 'cheerio';
import type { Element as DomElement } from 'domhandler';
import { ExtractionFieldError, NavigationError } from '../core/errors';
import { leadKey } from '../core/leadAggregator';
import { AutomationTimings, Lead, LeadQuery, OperationOptions, PageDriver, SupportedPlatform } from '../core/types';
import { describeError, log } from '../utils/logger';
import { pollUntil, settle, throwIfAborted } from '../utils/waitFor';

/** Read access to one record container; every lookup is scoped to the container. */
export interface RecordCard {
  text(selector?: string): string;
  texts(selector: string): string[];
  attr(selector: string | null, name: string): string | undefined;
  exists(selector: string): boolean;
}

export interface LeadDraft {
  identity: string;
  attributes: Record<string, string | undefined>;
  sourceUrl?: string;
}

export type RecordMapper = (card: RecordCard, query: LeadQuery) => LeadDraft;

export interface ExtractionPlan {
  platform: SupportedPlatform;
  url: string;
  containerSelector: string;
  /** Visible once the listing has rendered, even when it has no results. */
  readySelector: string;
  /** Landing on one of these means a login or consent wall instead of the listing. */
  blockedUrlPatterns: RegExp[];
  scrollRounds: number;
  scrollContainer?: string;
  mapRecord: RecordMapper;
}

const normalizeText = (value: string): string => value.replace(/\s+/g, ' ').trim();

const createCard = ($: CheerioAPI, root: Cheerio<DomElement>): RecordCard => {
  const scope = (selector?: string | null): Cheerio<DomElement> => (selector ? root.find(selector).first() : root);
  return {
    text: (selector) => normalizeText(scope(selector).text()),
    texts: (selector) => root.find(selector).toArray().map((el) => normalizeText($(el).text())).filter(Boolean),
    attr: (selector, name) => scope(selector).attr(name)?.trim() || undefined,
    exists: (selector) => root.find(selector).length > 0,
  };
};

export const requireText = (card: RecordCard, selector: string, field: string): string => {
  const value = card.text(selector);
  if (!value) throw new ExtractionFieldError(field, `missing ${field} (${selector})`);
  return value;
};

export const truncate = (value: string, max: number): string => (value.length > max ? value.slice(0, max) : value);

const cleanAttributes = (attributes: Record<string, string | undefined>): Record<string, string> => {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(attributes)) {
    const text = value?.trim();
    if (text) cleaned[key] = text;
  }
  return cleaned;
};

/**
 * Maps every container and yields the leads not seen in an earlier round. A
 * lead is identified by its platform, identity and source URL, so a card
 * re-rendered with different markup is not yielded twice. A container whose
 * mapper throws is logged and skipped; the rest of the round carries on.
 */
function* harvestRound(html: string, plan: ExtractionPlan, query: LeadQuery, seen: Set<string>): Generator<Lead> {
  const $ = load(html);
  for (const el of $<DomElement, string>(plan.containerSelector).toArray()) {
    let lead: Lead;
    try {
      const draft = plan.mapRecord(createCard($, $(el)), query);
      const identity = normalizeText(draft.identity);
      if (!identity) throw new ExtractionFieldError('identity', 'record has no identity');
      lead = {
        platform: plan.platform,
        identity,
        attributes: cleanAttributes(draft.attributes),
        sourceUrl: draft.sourceUrl,
        discoveredAt: new Date().toISOString(),
      };
    } catch (error) {
      log('WARN', `[${plan.platform}] skipped malformed record`, describeError(error));
      continue;
    }

    const key = `${leadKey(lead)}|${lead.sourceUrl ?? ''}`;
    if (seen.has(key)) continue;
    seen.add(key);
    yield lead;
  }
}

const openListing = async (page: PageDriver, plan: ExtractionPlan, timings: AutomationTimings, signal?: AbortSignal): Promise<void> => {
  try {
    await page.goto(plan.url);
  } catch (error) {
    throw new NavigationError(plan.url, `navigation to ${plan.url} failed: ${describeError(error)}`, { platform: plan.platform, cause: error });
  }

  const state = await pollUntil(
    async () => {
      if (plan.blockedUrlPatterns.some((pattern) => pattern.test(page.url()))) return 'blocked' as const;
      return (await page.isVisible(plan.readySelector)) ? ('ready' as const) : undefined;
    },
    { timeoutMs: timings.navigationTimeoutMs, intervalMs: timings.pollIntervalMs, signal },
  );

  if (state === 'blocked') {
    throw new NavigationError(plan.url, `redirected to ${page.url()} instead of the listing`, { platform: plan.platform });
  }
  if (!state) {
    throw new NavigationError(plan.url, `listing never rendered ${plan.readySelector}`, { platform: plan.platform });
  }
};

/**
 * Navigate, then alternate parse and scroll until `maxResults` leads were
 * yielded or the scroll budget is spent. Raises only when the listing itself
 * cannot be reached.
 */
export async function* runExtraction(
  page: PageDriver,
  plan: ExtractionPlan,
  query: LeadQuery,
  maxResults: number,
  timings: AutomationTimings,
  { signal }: OperationOptions = {},
): AsyncGenerator<Lead> {
  if (maxResults <= 0) return;
  log('INFO', `[${plan.platform}] extracting`, { url: plan.url, maxResults });
  await openListing(page, plan, timings, signal);

  const seen = new Set<string>();
  let emitted = 0;
  for (let round = 0; ; round += 1) {
    throwIfAborted(signal);
    for (const lead of harvestRound(await page.content(), plan, query, seen)) {
      yield lead;
      emitted += 1;
      if (emitted >= maxResults) {
        log('INFO', `[${plan.platform}] reached ${maxResults} leads`);
        return;
      }
    }
    if (round >= plan.scrollRounds) break;

    const before = await page.count(plan.containerSelector);
    await page.scroll(plan.scrollContainer);
    const grew = await settle(async () => (await page.count(plan.containerSelector)) > before, {
      timeoutMs: timings.settleMs,
      intervalMs: timings.pollIntervalMs,
      signal,
    });
    if (!grew) log('DEBUG', `[${plan.platform}] no new containers after scroll ${round + 1}`);
  }
  log('INFO', `[${plan.platform}] scroll budget spent with ${emitted} leads`);
}
