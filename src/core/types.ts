export const SUPPORTED_PLATFORMS = ['linkedin', 'x', 'google_maps', 'facebook', 'instagram', 'medium'] as const;

export type SupportedPlatform = (typeof SUPPORTED_PLATFORMS)[number];

export interface Lead {
  readonly platform: SupportedPlatform;
  readonly identity: string; // name or handle, dedup key together with platform
  readonly attributes: Readonly<Record<string, string>>; // headline, location, rating, address...
  readonly sourceUrl?: string;
  readonly discoveredAt: string;
  readonly matchScore?: number;
}

export interface LeadQuery {
  terms: string; // "customer service manager", "#smallbusiness", "restaurants"
  location?: string; // "Kampala, Uganda"
  targetUrl?: string; // listing to read directly, e.g. a group feed
}

export interface PostRequest {
  platform: SupportedPlatform;
  payload: Record<string, string>; // message / caption / title / tags
  mediaRef?: string; // local path for UI publishers, public URL for Graph API
}

export interface PostResult {
  platform: SupportedPlatform;
  success: boolean;
  remoteId?: string;
  remoteUrl?: string;
  error?: string;
  failedStep?: string;
  partialState?: Record<string, string>;
  timestamp: string;
}

export type PostRequestMap = Partial<Record<SupportedPlatform, Omit<PostRequest, 'platform'>>>;

export type PostResultMap = Partial<Record<SupportedPlatform, PostResult>>;

export interface AuthResult {
  platform: SupportedPlatform;
  method: 'form' | 'cookie';
  landingUrl: string;
}

export interface BrowserCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  secure?: boolean;
  httpOnly?: boolean;
}

/**
 * The slice of a browser tab the engine drives. Selectors are Playwright
 * selectors; every method targets the first match.
 */
export interface PageDriver {
  goto(url: string): Promise<void>;
  url(): string;
  fill(selector: string, value: string): Promise<void>;
  click(selector: string): Promise<void>;
  press(selector: string, key: string): Promise<void>;
  setInputFiles(selector: string, filePath: string): Promise<void>;
  isVisible(selector: string): Promise<boolean>;
  count(selector: string): Promise<number>;
  /** Scrolls the page, or the element matching `containerSelector`, by roughly one viewport. */
  scroll(containerSelector?: string): Promise<void>;
  content(): Promise<string>;
  addCookies(cookies: BrowserCookie[]): Promise<void>;
  close(): Promise<void>;
  isClosed(): boolean;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

export interface AutomationTimings {
  navigationTimeoutMs: number;
  authTimeoutMs: number;
  stepTimeoutMs: number;
  settleMs: number;
  pollIntervalMs: number;
}

export const DEFAULT_TIMINGS: AutomationTimings = {
  navigationTimeoutMs: 30_000,
  authTimeoutMs: 20_000,
  stepTimeoutMs: 15_000,
  settleMs: 2_000,
  pollIntervalMs: 250,
};
