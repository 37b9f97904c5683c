import { ConfigurationError } from './errors';
import { AutomationTimings, DEFAULT_TIMINGS } from './types';

export interface SessionConfig {
  headless: boolean;
  proxy?: string;
  stealth: boolean;
  blockResources: boolean; // drops images, fonts, stylesheets and media
  viewport: { width: number; height: number };
  navigationTimeoutMs: number;
}

export interface RuntimeConfig {
  session: SessionConfig;
  timings: AutomationTimings;
  outputDir: string;
  activityLogPath: string;
  graphApiVersion: string;
  outreachSender: string;
  port: number;
  apiKey?: string;
  requestTimeoutMs: number;
}

const readBoolean = (env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean => {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (['true', '1', 'yes'].includes(raw)) return true;
  if (['false', '0', 'no'].includes(raw)) return false;
  throw new ConfigurationError(`${key} must be a boolean (true/false)`);
};

const readPositiveInt = (env: NodeJS.ProcessEnv, key: string, fallback: number): number => {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer`);
  }
  return value;
};

const readString = (env: NodeJS.ProcessEnv, key: string, fallback: string): string => env[key]?.trim() || fallback;

const readUrl = (env: NodeJS.ProcessEnv, key: string): string | undefined => {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  try {
    return new URL(raw).toString();
  } catch {
    throw new ConfigurationError(`${key} must be a valid URL`);
  }
};

export const loadRuntimeConfig = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const timings: AutomationTimings = {
    navigationTimeoutMs: readPositiveInt(env, 'NAVIGATION_TIMEOUT_MS', DEFAULT_TIMINGS.navigationTimeoutMs),
    authTimeoutMs: readPositiveInt(env, 'AUTH_TIMEOUT_MS', DEFAULT_TIMINGS.authTimeoutMs),
    stepTimeoutMs: readPositiveInt(env, 'STEP_TIMEOUT_MS', DEFAULT_TIMINGS.stepTimeoutMs),
    settleMs: readPositiveInt(env, 'SETTLE_MS', DEFAULT_TIMINGS.settleMs),
    pollIntervalMs: readPositiveInt(env, 'POLL_INTERVAL_MS', DEFAULT_TIMINGS.pollIntervalMs),
  };

  const graphApiVersion = readString(env, 'GRAPH_API_VERSION', 'v18.0');
  if (!/^v\d+\.\d+$/.test(graphApiVersion)) {
    throw new ConfigurationError('GRAPH_API_VERSION must look like v18.0');
  }

  return {
    session: {
      headless: readBoolean(env, 'HEADLESS', true),
      proxy: readUrl(env, 'PROXY_URL'),
      stealth: readBoolean(env, 'STEALTH', true),
      blockResources: readBoolean(env, 'BLOCK_RESOURCES', false),
      viewport: { width: 1920, height: 1080 },
      navigationTimeoutMs: timings.navigationTimeoutMs,
    },
    timings,
    outputDir: readString(env, 'OUTPUT_DIR', './output'),
    activityLogPath: readString(env, 'ACTIVITY_LOG_PATH', 'activity_log.json'),
    graphApiVersion,
    outreachSender: readString(env, 'OUTREACH_SENDER', 'Your Name'),
    port: readPositiveInt(env, 'PORT', 3000),
    apiKey: env.API_KEY?.trim() || undefined,
    requestTimeoutMs: readPositiveInt(env, 'REQUEST_TIMEOUT_MS', 600_000),
  };
};
