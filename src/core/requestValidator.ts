import { isSupportedPlatform } from './adapterFactory';
import { FanoutContent } from './contentFanout';
import { RequestValidationError } from './errors';
import { LeadRunRequest, LeadSearch } from './leadRunner';
import { PostRequestMap, SupportedPlatform } from './types';

export const LEAD_PLATFORMS: readonly SupportedPlatform[] = ['linkedin', 'x', 'google_maps', 'facebook'];
export const PUBLISH_PLATFORMS: readonly SupportedPlatform[] = ['linkedin', 'x', 'facebook', 'instagram', 'medium'];

const DEFAULT_MAX_RESULTS = 50;
const MAX_RESULTS_CAP = 500;
const SEARCH_KEYS = new Set(['platform', 'terms', 'location', 'targetUrl', 'maxResults']);
const POST_KEYS = new Set(['payload', 'mediaRef']);

export interface FanoutRequest {
  content: FanoutContent;
  platforms: SupportedPlatform[];
}

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const requireObject = (value: unknown, key: string): Record<string, unknown> => {
  if (!isObject(value)) throw new RequestValidationError(`${key} must be a JSON object`);
  return value;
};

const rejectUnknownKeys = (value: Record<string, unknown>, allowed: Set<string>, key: string): void => {
  for (const name of Object.keys(value)) {
    if (!allowed.has(name)) throw new RequestValidationError(`${key}.${name} is not supported`);
  }
};

const validateString = (value: unknown, key: string): string | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || !value.trim()) {
    throw new RequestValidationError(`${key} must be a non-empty string`);
  }
  return value.trim();
};

const requireString = (value: unknown, key: string): string => {
  const result = validateString(value, key);
  if (result === undefined) throw new RequestValidationError(`${key} is required`);
  return result;
};

const validatePositiveInt = (value: unknown, key: string, max: number): number | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new RequestValidationError(`${key} must be a positive integer`);
  }
  if (value > max) throw new RequestValidationError(`${key} must be <= ${max}`);
  return value;
};

const validateStringList = (value: unknown, key: string): string[] | undefined => {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) throw new RequestValidationError(`${key} must be an array of strings`);
  return value.map((entry, index) => requireString(entry, `${key}[${index}]`));
};

const validateUrl = (value: unknown, key: string): string | undefined => {
  const raw = validateString(value, key);
  if (raw === undefined) return undefined;
  if (!/^https?:\/\//i.test(raw)) throw new RequestValidationError(`${key} must be an http(s) URL`);
  return raw;
};

const validatePlatform = (value: unknown, key: string, allowed: readonly SupportedPlatform[]): SupportedPlatform => {
  const raw = requireString(value, key).toLowerCase();
  if (!isSupportedPlatform(raw)) throw new RequestValidationError(`Unsupported platform: ${raw}`);
  if (!allowed.includes(raw)) throw new RequestValidationError(`${key} ${raw} is not available here`);
  return raw;
};

const normalizeSearch = (raw: unknown, index: number): LeadSearch => {
  const key = `searches[${index}]`;
  const search = requireObject(raw, key);
  rejectUnknownKeys(search, SEARCH_KEYS, key);
  const platform = validatePlatform(search.platform, `${key}.platform`, LEAD_PLATFORMS);
  const targetUrl = validateUrl(search.targetUrl, `${key}.targetUrl`);
  if (platform === 'facebook' && !targetUrl) throw new RequestValidationError(`${key}.targetUrl is required for facebook`);

  return {
    platform,
    query: {
      terms: requireString(search.terms, `${key}.terms`),
      location: validateString(search.location, `${key}.location`),
      targetUrl,
    },
    maxResults: validatePositiveInt(search.maxResults, `${key}.maxResults`, MAX_RESULTS_CAP) ?? DEFAULT_MAX_RESULTS,
  };
};

export const normalizeLeadRunRequest = (rawBody: unknown): LeadRunRequest => {
  const body = requireObject(rawBody, 'Body');
  if (!Array.isArray(body.searches) || body.searches.length === 0) {
    throw new RequestValidationError('searches must be a non-empty array');
  }
  return {
    searches: body.searches.map(normalizeSearch),
    qualityKeywords: validateStringList(body.qualityKeywords, 'qualityKeywords'),
    outreachLimit: validatePositiveInt(body.outreachLimit, 'outreachLimit', MAX_RESULTS_CAP),
  };
};

const normalizePayload = (raw: unknown, key: string): Record<string, string> => {
  const payload = requireObject(raw, key);
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(payload)) {
    if (typeof value !== 'string') throw new RequestValidationError(`${key}.${name} must be a string`);
    result[name] = value;
  }
  return result;
};

/** Empty payloads pass; the orchestrator reports them per platform. */
export const normalizePublishRequest = (rawBody: unknown): PostRequestMap => {
  const body = requireObject(rawBody, 'Body');
  const posts = requireObject(body.posts, 'posts');
  const entries = Object.entries(posts);
  if (entries.length === 0) throw new RequestValidationError('posts must name at least one platform');

  const requests: PostRequestMap = {};
  for (const [name, raw] of entries) {
    const key = `posts.${name}`;
    const platform = validatePlatform(name, 'posts platform', PUBLISH_PLATFORMS);
    const post = requireObject(raw, key);
    rejectUnknownKeys(post, POST_KEYS, key);
    requests[platform] = {
      payload: normalizePayload(post.payload ?? {}, `${key}.payload`),
      mediaRef: validateString(post.mediaRef, `${key}.mediaRef`),
    };
  }
  return requests;
};

export const normalizeFanoutRequest = (rawBody: unknown): FanoutRequest => {
  const body = requireObject(rawBody, 'Body');
  const platforms = validateStringList(body.platforms, 'platforms')?.map((platform, index) =>
    validatePlatform(platform, `platforms[${index}]`, PUBLISH_PLATFORMS),
  );
  return {
    content: {
      message: requireString(body.message, 'message'),
      title: validateString(body.title, 'title'),
      tags: validateStringList(body.tags, 'tags'),
      mediaPath: validateString(body.mediaPath, 'mediaPath'),
      mediaUrl: validateUrl(body.mediaUrl, 'mediaUrl'),
    },
    platforms: platforms && platforms.length > 0 ? [...new Set(platforms)] : [...PUBLISH_PLATFORMS],
  };
};
