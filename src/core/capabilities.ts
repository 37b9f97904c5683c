import { AuthResult, Lead, LeadQuery, OperationOptions, PageDriver, PostRequest, PostResult, SupportedPlatform } from './types';

export interface PlatformAdapter {
  readonly platform: SupportedPlatform;
}

export interface Authenticator extends PlatformAdapter {
  authenticate(page: PageDriver, options?: OperationOptions): Promise<AuthResult>;
}

export interface RecordExtractor extends PlatformAdapter {
  /** Lazy and single-use; yields at most `maxResults` leads. */
  extractRecords(page: PageDriver, query: LeadQuery, maxResults: number, options?: OperationOptions): AsyncGenerator<Lead>;
}

export interface BrowserPublisher extends PlatformAdapter {
  readonly publishChannel: 'browser';
  publish(page: PageDriver, request: PostRequest, options?: OperationOptions): Promise<PostResult>;
}

export interface ApiPublisher extends PlatformAdapter {
  readonly publishChannel: 'api';
  publish(request: PostRequest, options?: OperationOptions): Promise<PostResult>;
}

export type Publisher = BrowserPublisher | ApiPublisher;

export const canAuthenticate = (adapter: PlatformAdapter): adapter is Authenticator =>
  'authenticate' in adapter && typeof adapter.authenticate === 'function';

export const canExtract = (adapter: PlatformAdapter): adapter is RecordExtractor =>
  'extractRecords' in adapter && typeof adapter.extractRecords === 'function';

export const isPublisher = (adapter: PlatformAdapter): adapter is Publisher =>
  'publishChannel' in adapter &&
  (adapter.publishChannel === 'browser' || adapter.publishChannel === 'api') &&
  'publish' in adapter &&
  typeof adapter.publish === 'function';
