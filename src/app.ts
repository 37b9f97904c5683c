import express, { Express, NextFunction, Request, Response } from 'express';
import { ActivityLog } from './core/activityLog';
import { fanOutContent } from './core/contentFanout';
import { OperationCancelledError, RequestValidationError, SessionStartError } from './core/errors';
import { LeadRunner } from './core/leadRunner';
import { PostingOrchestrator } from './core/postingOrchestrator';
import { normalizeFanoutRequest, normalizeLeadRunRequest, normalizePublishRequest } from './core/requestValidator';
import { PostResultMap } from './core/types';
import { describeError, log } from './utils/logger';

export interface AppDeps {
  runner: Pick<LeadRunner, 'run'>;
  orchestrator: Pick<PostingOrchestrator, 'publishAll'>;
  activityLog: Pick<ActivityLog, 'summarize'>;
  apiKey?: string;
  requestTimeoutMs: number;
}

const statusFor = (error: unknown): number => {
  if (error instanceof RequestValidationError) return 400;
  if (error instanceof OperationCancelledError) return 504;
  if (error instanceof SessionStartError) return 503;
  return 500;
};

const sendError = (res: Response, route: string, error: unknown): void => {
  const status = statusFor(error);
  const message = error instanceof OperationCancelledError ? 'Request timeout' : describeError(error);
  if (status >= 500) log('ERROR', `${route} failed`, describeError(error));
  res.status(status).json({ success: false, error: message });
};

/** Runs `operation` with a signal that fires on the deadline or when the client goes away. */
const withDeadline = async <T>(res: Response, timeoutMs: number, operation: (signal: AbortSignal) => Promise<T>): Promise<T> => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new OperationCancelledError('Request timeout')), timeoutMs);
  const onClose = (): void => {
    if (!res.writableEnded) controller.abort(new OperationCancelledError('Client disconnected'));
  };
  res.on('close', onClose);
  try {
    return await operation(controller.signal);
  } finally {
    clearTimeout(timer);
    res.off('close', onClose);
  }
};

const allSucceeded = (results: PostResultMap): boolean => Object.values(results).every((result) => result?.success === true);

export const createApp = (deps: AppDeps): Express => {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_, res) => res.json({ ok: true, service: 'leadcast' }));

  const requireApiKey = (req: Request, res: Response, next: NextFunction): void => {
    if (!deps.apiKey) {
      res.status(503).json({ success: false, error: 'API key is not configured' });
      return;
    }
    if (req.header('x-api-key') !== deps.apiKey) {
      res.status(401).json({ success: false, error: 'Unauthorized' });
      return;
    }
    next();
  };

  app.post('/leads/run', requireApiKey, async (req: Request, res: Response) => {
    const started = Date.now();
    try {
      const request = normalizeLeadRunRequest(req.body);
      const report = await withDeadline(res, deps.requestTimeoutMs, (signal) => deps.runner.run(request, { signal }));
      res.json({ success: true, report, runtimeSeconds: Number(((Date.now() - started) / 1000).toFixed(2)) });
    } catch (error) {
      sendError(res, 'lead run', error);
    }
  });

  app.post('/posts', requireApiKey, async (req: Request, res: Response) => {
    try {
      const requests = normalizePublishRequest(req.body);
      const results = await withDeadline(res, deps.requestTimeoutMs, (signal) => deps.orchestrator.publishAll(requests, { signal }));
      res.json({ success: allSucceeded(results), results });
    } catch (error) {
      sendError(res, 'publish', error);
    }
  });

  app.post('/posts/fanout', requireApiKey, async (req: Request, res: Response) => {
    try {
      const { content, platforms } = normalizeFanoutRequest(req.body);
      const requests = fanOutContent(content, platforms);
      const results = await withDeadline(res, deps.requestTimeoutMs, (signal) => deps.orchestrator.publishAll(requests, { signal }));
      res.json({ success: allSucceeded(results), results });
    } catch (error) {
      sendError(res, 'fan-out publish', error);
    }
  });

  app.get('/activity', requireApiKey, async (_: Request, res: Response) => {
    try {
      res.json({ success: true, summary: await deps.activityLog.summarize() });
    } catch (error) {
      sendError(res, 'activity summary', error);
    }
  });

  return app;
};
