import { AxiosInstance } from 'axios';
import { stat } from 'node:fs/promises';
import { CredentialSet, LoginPair } from '../core/credentials';
import { AuthenticationError, OperationCancelledError, PublishStepError } from '../core/errors';
import {
  AuthResult,
  AutomationTimings,
  OperationOptions,
  PageDriver,
  PostRequest,
  PostResult,
  SupportedPlatform,
} from '../core/types';
import { describeError, log } from '../utils/logger';
import { pollUntil, waitUntil, WaitOptions, WaitTimeoutError } from '../utils/waitFor';

export interface AdapterContext {
  credentials: CredentialSet;
  timings: AutomationTimings;
  graphApiVersion: string;
  proxy?: string;
  graphHttp?: AxiosInstance; // overrides the proxied client built from `proxy`
  graphMinIntervalMs?: number;
}

export const stepWait = (timings: AutomationTimings, signal?: AbortSignal): WaitOptions => ({
  timeoutMs: timings.stepTimeoutMs,
  intervalMs: timings.pollIntervalMs,
  signal,
});

export const waitVisible = (page: PageDriver, selector: string, timings: AutomationTimings, signal?: AbortSignal): Promise<void> =>
  waitUntil(() => page.isVisible(selector), `${selector} to be visible`, stepWait(timings, signal));

export const waitHidden = (page: PageDriver, selector: string, timings: AutomationTimings, signal?: AbortSignal): Promise<void> =>
  waitUntil(async () => !(await page.isVisible(selector)), `${selector} to disappear`, stepWait(timings, signal));

export const payloadField = (request: PostRequest, field: string): string => request.payload[field] ?? '';

export const hasContent = (request: Pick<PostRequest, 'payload' | 'mediaRef'>): boolean =>
  Object.values(request.payload).some((value) => value.trim().length > 0) || Boolean(request.mediaRef?.trim());

export const isPublicUrl = (value?: string): value is string => {
  if (!value) return false;
  try {
    return /^https?:$/.test(new URL(value).protocol);
  } catch {
    return false;
  }
};

export const absoluteUrl = (href: string | undefined, base: string): string | undefined => {
  if (!href) return undefined;
  try {
    const resolved = new URL(href, base);
    resolved.hash = '';
    return resolved.toString();
  } catch {
    return undefined;
  }
};

export const assertReadableFile = async (filePath: string): Promise<void> => {
  const info = await stat(filePath).catch(() => undefined);
  if (!info?.isFile()) throw new Error(`Media file not found: ${filePath}`);
};

export const publishedResult = (platform: SupportedPlatform, remote: { remoteId?: string; remoteUrl?: string } = {}): PostResult => ({
  platform,
  success: true,
  remoteId: remote.remoteId,
  remoteUrl: remote.remoteUrl,
  timestamp: new Date().toISOString(),
});

export interface PublishStep {
  name: string;
  run: () => Promise<void>;
}

/**
 * Runs publish sub-steps in order. The first failure aborts the sequence as a
 * PublishStepError carrying a snapshot of `partialState`; nothing is rolled back.
 */
export const runPublishSteps = async (
  platform: SupportedPlatform,
  steps: PublishStep[],
  partialState: Record<string, string>,
): Promise<void> => {
  for (const step of steps) {
    log('DEBUG', `[${platform}] publish step ${step.name}`);
    try {
      await step.run();
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      throw new PublishStepError(step.name, describeError(error), { ...partialState }, { platform, cause: error });
    }
  }
};

export const requireLoginPair = (
  pair: LoginPair | undefined,
  platform: SupportedPlatform,
  keys: [string, string],
): LoginPair => {
  if (!pair) {
    throw new AuthenticationError(`${platform} credentials are not configured (${keys.join(', ')})`, { platform });
  }
  return pair;
};

export interface LoginSignals {
  successUrl?: RegExp;
  successSelector?: string;
  failureSelectors?: string[];
  rejectedUrl?: RegExp;
  challengeUrl?: RegExp;
  challengeSelectors?: string[];
}

/** Polls until the page shows it is signed in, or fails with AuthenticationError. */
export const awaitLoginOutcome = async (
  page: PageDriver,
  platform: SupportedPlatform,
  signals: LoginSignals,
  timings: AutomationTimings,
  signal?: AbortSignal,
): Promise<string> => {
  const outcome = await pollUntil(
    async () => {
      const url = page.url();
      if (signals.challengeUrl?.test(url)) return 'challenge' as const;
      for (const selector of signals.challengeSelectors ?? []) {
        if (await page.isVisible(selector)) return 'challenge' as const;
      }
      if (signals.rejectedUrl?.test(url)) return 'rejected' as const;
      for (const selector of signals.failureSelectors ?? []) {
        if (await page.isVisible(selector)) return 'rejected' as const;
      }
      if (signals.successUrl && !signals.successUrl.test(url)) return undefined;
      if (signals.successSelector && !(await page.isVisible(signals.successSelector))) return undefined;
      return 'authenticated' as const;
    },
    { timeoutMs: timings.authTimeoutMs, intervalMs: timings.pollIntervalMs, signal },
  );

  if (outcome === 'challenge') throw new AuthenticationError(`${platform} asked for additional verification`, { platform });
  if (outcome === 'rejected') throw new AuthenticationError(`${platform} rejected the credentials`, { platform });
  if (!outcome) throw new AuthenticationError(`${platform} login did not complete within ${timings.authTimeoutMs}ms`, { platform });
  return page.url();
};

export interface LoginStage {
  field: string;
  value: string;
  submit?: string; // clicked after filling
}

export interface LoginForm {
  url: string;
  stages: LoginStage[];
  signals: LoginSignals;
}

export const submitLoginForm = async (
  page: PageDriver,
  platform: SupportedPlatform,
  form: LoginForm,
  timings: AutomationTimings,
  { signal }: OperationOptions = {},
): Promise<AuthResult> => {
  try {
    await page.goto(form.url);
    for (const stage of form.stages) {
      await waitVisible(page, stage.field, timings, signal);
      await page.fill(stage.field, stage.value);
      if (stage.submit) await page.click(stage.submit);
    }
    const landingUrl = await awaitLoginOutcome(page, platform, form.signals, timings, signal);
    log('INFO', `[${platform}] authenticated`, landingUrl);
    return { platform, method: 'form', landingUrl };
  } catch (error) {
    if (error instanceof AuthenticationError || error instanceof OperationCancelledError) throw error;
    const reason = error instanceof WaitTimeoutError ? 'login form did not render' : describeError(error);
    throw new AuthenticationError(`${platform} login failed: ${reason}`, { platform, cause: error });
  }
};
