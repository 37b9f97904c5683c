import 'dotenv/config';
import { createApp } from './app';
import { ActivityLog } from './core/activityLog';
import { AdapterRegistry } from './core/adapterFactory';
import { loadRuntimeConfig } from './core/config';
import { CredentialSet } from './core/credentials';
import { LeadRunner } from './core/leadRunner';
import { OutreachTemplateEngine } from './core/outreachTemplates';
import { PostingOrchestrator } from './core/postingOrchestrator';
import { SessionManager } from './core/sessionManager';
import { describeError, log } from './utils/logger';

const config = loadRuntimeConfig();
const credentials = CredentialSet.fromEnv();
const sessions = new SessionManager();
const activityLog = new ActivityLog(config.activityLogPath);
const registry = new AdapterRegistry({
  credentials,
  timings: config.timings,
  graphApiVersion: config.graphApiVersion,
  proxy: config.session.proxy,
});

const app = createApp({
  runner: new LeadRunner({
    registry,
    sessions,
    sessionConfig: config.session,
    templates: new OutreachTemplateEngine({ sender: config.outreachSender }),
    outputDir: config.outputDir,
    activityLog,
  }),
  orchestrator: new PostingOrchestrator({ registry, sessions, sessionConfig: config.session, activityLog }),
  activityLog,
  apiKey: config.apiKey,
  requestTimeoutMs: config.requestTimeoutMs,
});

if (!config.apiKey) log('WARN', 'API_KEY is not set; protected routes will answer 503');
log('INFO', `credentials configured: ${credentials.configuredKeys().join(', ') || 'none'}`);

const server = app.listen(config.port, () => log('INFO', `leadcast listening on ${config.port}`));

const shutdown = async (): Promise<void> => {
  try {
    await sessions.closeAll();
  } catch (error) {
    log('ERROR', 'browser sessions did not close cleanly', describeError(error));
  }
  server.close(() => process.exit(0));
};

process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());
