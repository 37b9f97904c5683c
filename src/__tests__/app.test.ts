import test from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';
import { publishedResult } from '../adapters/common';
import { AppDeps, createApp } from '../app';
import { OperationCancelledError, SessionStartError } from '../core/errors';
import { LeadRunReport, LeadRunRequest } from '../core/leadRunner';
import { failedResult } from '../core/postingOrchestrator';
import { PostRequestMap } from '../core/types';
import { setLogLevel } from '../utils/logger';

setLogLevel('SILENT');

const API_KEY = 'test-secret';

const REPORT: LeadRunReport = {
  startedAt: '2026-10-19T09:30:00.000Z',
  finishedAt: '2026-10-19T09:31:00.000Z',
  platforms: [{ platform: 'linkedin', status: 'ok', leads: 2 }],
  totalLeads: 2,
  uniqueLeads: 2,
  qualityLeads: 1,
  leadsFile: 'output/leads_20261019_093000.csv',
  outreachFile: 'output/outreach_20261019_093000.txt',
};

interface Recorded {
  runs: LeadRunRequest[];
  publishes: PostRequestMap[];
}

const makeDeps = (overrides: Partial<AppDeps> = {}): { deps: AppDeps; recorded: Recorded } => {
  const recorded: Recorded = { runs: [], publishes: [] };
  const deps: AppDeps = {
    runner: {
      run: async (leadRequest) => {
        recorded.runs.push(leadRequest);
        return REPORT;
      },
    },
    orchestrator: {
      publishAll: async (requests) => {
        recorded.publishes.push(requests);
        return {
          x: failedResult('x', new Error('post button never appeared')),
          medium: publishedResult('medium', { remoteUrl: 'https://medium.com/@leadcast/launch-day-abc123def456' }),
        };
      },
    },
    activityLog: { summarize: async () => ({ total: 3, byType: { post: 2, lead_run: 1 } }) },
    apiKey: API_KEY,
    requestTimeoutMs: 1_000,
    ...overrides,
  };
  return { deps, recorded };
};

const LEAD_BODY = { searches: [{ platform: 'linkedin', terms: 'support manager' }] };

test('health needs no key', async () => {
  const res = await request(createApp(makeDeps({ apiKey: undefined }).deps)).get('/health');
  assert.equal(res.status, 200);
  assert.deepEqual(res.body, { ok: true, service: 'leadcast' });
});

test('protected routes check the API key', async () => {
  const app = createApp(makeDeps().deps);
  const missing = await request(app).post('/leads/run').send(LEAD_BODY);
  assert.equal(missing.status, 401);
  assert.deepEqual(missing.body, { success: false, error: 'Unauthorized' });

  const wrong = await request(app).get('/activity').set('x-api-key', 'wrong-key');
  assert.equal(wrong.status, 401);

  const unconfigured = await request(createApp(makeDeps({ apiKey: undefined }).deps)).get('/activity').set('x-api-key', API_KEY);
  assert.equal(unconfigured.status, 503);
  assert.deepEqual(unconfigured.body, { success: false, error: 'API key is not configured' });
});

test('lead runs are validated before the runner is called', async () => {
  const { deps, recorded } = makeDeps();
  const res = await request(createApp(deps)).post('/leads/run').set('x-api-key', API_KEY).send({ searches: [] });
  assert.equal(res.status, 400);
  assert.deepEqual(res.body, { success: false, error: 'searches must be a non-empty array' });
  assert.deepEqual(recorded.runs, []);
});

test('a lead run returns the report', async () => {
  const { deps, recorded } = makeDeps();
  const res = await request(createApp(deps)).post('/leads/run').set('x-api-key', API_KEY).send(LEAD_BODY);

  assert.equal(res.status, 200);
  assert.equal(res.body.success, true);
  assert.deepEqual(res.body.report, REPORT);
  assert.equal(typeof res.body.runtimeSeconds, 'number');
  assert.deepEqual(recorded.runs[0].searches, [
    { platform: 'linkedin', query: { terms: 'support manager', location: undefined, targetUrl: undefined }, maxResults: 50 },
  ]);
});

test('a run past the deadline answers 504', async () => {
  const { deps } = makeDeps({
    requestTimeoutMs: 20,
    runner: {
      run: (_, { signal } = {}) =>
        new Promise<LeadRunReport>((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(new OperationCancelledError('Operation cancelled')), { once: true });
        }),
    },
  });
  const res = await request(createApp(deps)).post('/leads/run').set('x-api-key', API_KEY).send(LEAD_BODY);
  assert.equal(res.status, 504);
  assert.deepEqual(res.body, { success: false, error: 'Request timeout' });
});

test('a browser that cannot start answers 503', async () => {
  const { deps } = makeDeps({
    runner: {
      run: async () => {
        throw new SessionStartError('Browser runtime could not be launched: chromium missing');
      },
    },
  });
  const res = await request(createApp(deps)).post('/leads/run').set('x-api-key', API_KEY).send(LEAD_BODY);
  assert.equal(res.status, 503);
  assert.deepEqual(res.body, { success: false, error: 'Browser runtime could not be launched: chromium missing' });
});

test('fan-out adapts the content per platform and reports partial success', async () => {
  const { deps, recorded } = makeDeps();
  const res = await request(createApp(deps))
    .post('/posts/fanout')
    .set('x-api-key', API_KEY)
    .send({ message: 'Launch day', platforms: ['x', 'medium'] });

  assert.equal(res.status, 200);
  assert.equal(res.body.success, false);
  assert.equal(res.body.results.x.error, 'post button never appeared');
  assert.equal(res.body.results.medium.success, true);

  const [requests] = recorded.publishes;
  assert.deepEqual(Object.keys(requests), ['x', 'medium']);
  assert.equal(requests.x?.payload.message, 'Launch day');
  assert.equal(requests.medium?.payload.title, 'Launch day');
});

test('posts are validated and forwarded as given', async () => {
  const { deps, recorded } = makeDeps();
  const app = createApp(deps);
  const bad = await request(app).post('/posts').set('x-api-key', API_KEY).send({ posts: { google_maps: { payload: {} } } });
  assert.equal(bad.status, 400);
  assert.deepEqual(bad.body, { success: false, error: 'posts platform google_maps is not available here' });

  const ok = await request(app).post('/posts').set('x-api-key', API_KEY).send({ posts: { medium: { payload: { title: 'Hi', message: 'Body' } } } });
  assert.equal(ok.status, 200);
  assert.deepEqual(recorded.publishes, [{ medium: { payload: { title: 'Hi', message: 'Body' }, mediaRef: undefined } }]);
});

test('activity summary', async () => {
  const res = await request(createApp(makeDeps().deps)).get('/activity').set('x-api-key', API_KEY);
  assert.equal(res.status, 200);
  assert.deepEqual(res.body, { success: true, summary: { total: 3, byType: { post: 2, lead_run: 1 } } });
});
