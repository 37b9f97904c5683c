import axios, { AxiosInstance } from 'axios';
import { AutomationError, ConnectivityError, OperationCancelledError } from '../core/errors';
import { createHttpClient } from '../utils/httpClient';
import { RateLimiter } from '../utils/rateLimiter';
import { AdapterContext } from './common';

const GRAPH_HOST = 'https://graph.facebook.com';

export class GraphApiError extends AutomationError {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'GraphApiError';
    this.status = status;
  }
}

export interface ManagedPage {
  id: string;
  name?: string;
  accessToken?: string;
  instagramAccountId?: string;
}

export interface GraphApiOptions {
  accessToken: string;
  version: string;
  http?: AxiosInstance;
  proxy?: string;
  minIntervalMs?: number;
}

type GraphParams = Record<string, string | undefined>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const graphErrorMessage = (body: unknown, status: number): string => {
  if (isRecord(body) && isRecord(body.error) && typeof body.error.message === 'string') return body.error.message;
  return `Graph API responded with HTTP ${status}`;
};

const toGraphError = (error: unknown, signal?: AbortSignal): Error => {
  if (error instanceof OperationCancelledError) return error;
  if (axios.isCancel(error) || signal?.aborted) return new OperationCancelledError('Graph API request cancelled', { cause: error });
  if (axios.isAxiosError(error)) {
    if (!error.response) return new ConnectivityError(`Graph API unreachable: ${error.message}`, { cause: error });
    return new GraphApiError(graphErrorMessage(error.response.data, error.response.status), error.response.status);
  }
  return error instanceof Error ? error : new Error(String(error));
};

export const readGraphId = (data: unknown, context: string): string => {
  if (isRecord(data) && typeof data.id === 'string' && data.id) return data.id;
  throw new GraphApiError(`${context}: response carried no id`, 200);
};

const parseManagedPage = (entry: unknown): ManagedPage | undefined => {
  if (!isRecord(entry) || typeof entry.id !== 'string') return undefined;
  const instagram = entry.instagram_business_account;
  return {
    id: entry.id,
    name: typeof entry.name === 'string' ? entry.name : undefined,
    accessToken: typeof entry.access_token === 'string' ? entry.access_token : undefined,
    instagramAccountId: isRecord(instagram) && typeof instagram.id === 'string' ? instagram.id : undefined,
  };
};

/** Minimal Graph API transport: token injection, pacing and error normalisation. */
export class GraphApiClient {
  private readonly http: AxiosInstance;
  private readonly limiter: RateLimiter;
  private readonly baseUrl: string;

  constructor(private readonly options: GraphApiOptions) {
    this.http = options.http ?? createHttpClient(options.proxy);
    this.limiter = new RateLimiter(options.minIntervalMs ?? 200);
    this.baseUrl = `${GRAPH_HOST}/${options.version}`;
  }

  get(path: string, params: GraphParams = {}, signal?: AbortSignal): Promise<unknown> {
    return this.request('GET', path, params, signal);
  }

  post(path: string, params: GraphParams = {}, signal?: AbortSignal): Promise<unknown> {
    return this.request('POST', path, params, signal);
  }

  async listManagedPages(signal?: AbortSignal): Promise<ManagedPage[]> {
    const body = await this.get('me/accounts', { fields: 'id,name,access_token,instagram_business_account' }, signal);
    const entries = isRecord(body) && Array.isArray(body.data) ? body.data : [];
    return entries.map(parseManagedPage).filter((page): page is ManagedPage => page !== undefined);
  }

  private async request(method: 'GET' | 'POST', path: string, params: GraphParams, signal?: AbortSignal): Promise<unknown> {
    try {
      await this.limiter.wait(signal);
      const { data } = await this.http.request<unknown>({
        method,
        url: `${this.baseUrl}/${path}`,
        params: { access_token: this.options.accessToken, ...params },
        signal,
      });
      return data;
    } catch (error) {
      throw toGraphError(error, signal);
    }
  }
}

export const createGraphClient = (context: AdapterContext, accessToken: string): GraphApiClient =>
  new GraphApiClient({
    accessToken,
    version: context.graphApiVersion,
    http: context.graphHttp,
    proxy: context.proxy,
    minIntervalMs: context.graphMinIntervalMs,
  });
