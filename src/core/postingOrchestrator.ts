import { hasContent } from '../adapters/common';
import { describeError, log } from '../utils/logger';
import { throwIfAborted } from '../utils/waitFor';
import { ActivityLog } from './activityLog';
import { AdapterRegistry } from './adapterFactory';
import { canAuthenticate, isPublisher, Publisher } from './capabilities';
import { SessionConfig } from './config';
import { ConfigurationError, OperationCancelledError, PublishStepError } from './errors';
import { Session, SessionManager } from './sessionManager';
import {
  OperationOptions,
  PostRequest,
  PostRequestMap,
  PostResult,
  PostResultMap,
  SUPPORTED_PLATFORMS,
  SupportedPlatform,
} from './types';

export const EMPTY_PAYLOAD_ERROR = 'Empty payload; nothing to publish';

export const failedResult = (platform: SupportedPlatform, error: unknown): PostResult => ({
  platform,
  success: false,
  error: describeError(error),
  failedStep: error instanceof PublishStepError ? error.step : undefined,
  partialState: error instanceof PublishStepError && Object.keys(error.partialState).length > 0 ? error.partialState : undefined,
  timestamp: new Date().toISOString(),
});

interface PlannedPost {
  platform: SupportedPlatform;
  publisher: Publisher;
  request: PostRequest;
}

export interface PostingOrchestratorDeps {
  registry: AdapterRegistry;
  sessions: SessionManager;
  sessionConfig: SessionConfig;
  activityLog?: ActivityLog;
}

/**
 * Publishes one piece of content to several platforms, one after another.
 * A platform's failure is reported in its own result and never stops the rest.
 */
export class PostingOrchestrator {
  constructor(private readonly deps: PostingOrchestratorDeps) {}

  async publishAll(requests: PostRequestMap, { signal }: OperationOptions = {}): Promise<PostResultMap> {
    const planned = this.plan(requests);
    const results: PostResultMap = {};
    const needsBrowser = planned.some(({ publisher, request }) => publisher.publishChannel === 'browser' && hasContent(request));
    const session = needsBrowser ? await this.deps.sessions.open(this.deps.sessionConfig) : undefined;

    try {
      for (const post of planned) {
        throwIfAborted(signal);
        results[post.platform] = await this.publishOne(post, session, signal);
      }
    } finally {
      if (session) await this.deps.sessions.close(session);
    }

    await this.recordActivity(results);
    return results;
  }

  // Resolves every adapter up front; throws before any session opens.
  private plan(requests: PostRequestMap): PlannedPost[] {
    const planned: PlannedPost[] = [];
    for (const platform of SUPPORTED_PLATFORMS) {
      const request = requests[platform];
      if (!request) continue;
      const adapter = this.deps.registry.get(platform);
      if (!isPublisher(adapter)) throw new ConfigurationError(`${platform} does not support publishing`, { platform });
      planned.push({ platform, publisher: adapter, request: { ...request, platform } });
    }
    return planned;
  }

  private async publishOne({ platform, publisher, request }: PlannedPost, session: Session | undefined, signal?: AbortSignal): Promise<PostResult> {
    if (!hasContent(request)) {
      log('WARN', `[${platform}] skipped: empty payload`);
      return failedResult(platform, EMPTY_PAYLOAD_ERROR);
    }

    try {
      let result: PostResult;
      if (publisher.publishChannel === 'api') {
        result = await publisher.publish(request, { signal });
      } else {
        if (!session) throw new ConfigurationError('No browser session for a browser publisher', { platform });
        const browserPublisher = publisher;
        result = await session.withPage(async (page) => {
          if (canAuthenticate(browserPublisher)) await browserPublisher.authenticate(page, { signal });
          return browserPublisher.publish(page, request, { signal });
        }, signal);
      }
      log('INFO', `[${platform}] published`, result.remoteUrl ?? result.remoteId);
      return result;
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      log('ERROR', `[${platform}] publish failed`, describeError(error));
      return failedResult(platform, error);
    }
  }

  private async recordActivity(results: PostResultMap): Promise<void> {
    const { activityLog } = this.deps;
    if (!activityLog) return;
    const summary = SUPPORTED_PLATFORMS.flatMap((platform) => {
      const result = results[platform];
      return result ? [{ platform, success: result.success, remoteUrl: result.remoteUrl, error: result.error }] : [];
    });
    await activityLog.record('post', { results: summary }).catch((error) => log('WARN', 'activity log write failed', describeError(error)));
  }
}
