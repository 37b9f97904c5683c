import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createFakeLauncher, failingLauncher, TEST_SESSION_CONFIG, testContext } from '../../testing/fakes';
import { setLogLevel } from '../../utils/logger';
import { BackendLauncher } from '../../utils/playwrightBackend';
import { AdapterFactory, AdapterRegistry } from '../adapterFactory';
import { RecordExtractor } from '../capabilities';
import { ConfigurationError, SessionStartError } from '../errors';
import { fileStamp, LeadRunner } from '../leadRunner';
import { OutreachTemplateEngine } from '../outreachTemplates';
import { SessionManager } from '../sessionManager';
import { Lead, LeadQuery, PageDriver, SupportedPlatform } from '../types';

setLogLevel('SILENT');

const FOUND_AT = '2026-10-19T09:30:01.000Z';

const lead = (platform: SupportedPlatform, identity: string, attributes: Record<string, string>): Lead => ({
  platform,
  identity,
  attributes,
  discoveredAt: FOUND_AT,
});

class FakeExtractor implements RecordExtractor {
  readonly queries: LeadQuery[] = [];

  constructor(
    readonly platform: SupportedPlatform,
    private readonly leads: Lead[],
    private readonly failure?: Error,
  ) {}

  async *extractRecords(page: PageDriver, query: LeadQuery, maxResults: number): AsyncGenerator<Lead> {
    this.queries.push(query);
    for (const found of this.leads.slice(0, maxResults)) yield found;
    if (this.failure) throw this.failure;
  }
}

const withOutputDir = async (run: (dir: string) => Promise<void>): Promise<void> => {
  const dir = await mkdtemp(join(tmpdir(), 'leadcast-run-'));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

const runner = (factories: Partial<Record<SupportedPlatform, AdapterFactory>>, outputDir: string, launcher: BackendLauncher) =>
  new LeadRunner({
    registry: new AdapterRegistry(testContext(), factories),
    sessions: new SessionManager(launcher),
    sessionConfig: TEST_SESSION_CONFIG,
    templates: new OutreachTemplateEngine({ sender: 'Leadcast Team' }),
    outputDir,
    now: () => new Date('2026-10-19T09:30:00.000Z'),
  });

test('fileStamp formats UTC time', () => {
  assert.equal(fileStamp(new Date('2026-01-02T03:04:05.678Z')), '20260102_030405');
});

test('a run merges, dedupes, filters and writes both files', async () => {
  await withOutputDir(async (dir) => {
    const linkedin = new FakeExtractor('linkedin', [
      lead('linkedin', 'Amara Okello', { name: 'Amara Okello', headline: 'Support Manager' }),
      lead('linkedin', 'Daniel Mensah', { name: 'Daniel Mensah', headline: 'Accountant' }),
      lead('linkedin', 'AMARA OKELLO', { name: 'Amara Okello', headline: 'Support Manager' }),
    ]);
    const x = new FakeExtractor(
      'x',
      [lead('x', '@kampala_eats', { handle: '@kampala_eats', tweetText: 'need customer service help', hashtag: '#smallbusiness' })],
      new Error('rate limited'),
    );
    const fake = createFakeLauncher();
    const report = await runner({ linkedin: () => linkedin, x: () => x }, dir, fake.launcher).run({
      searches: [
        { platform: 'linkedin', query: { terms: 'support' }, maxResults: 10 },
        { platform: 'x', query: { terms: '#smallbusiness' }, maxResults: 10 },
      ],
    });

    assert.deepEqual(report, {
      startedAt: '2026-10-19T09:30:00.000Z',
      finishedAt: '2026-10-19T09:30:00.000Z',
      platforms: [
        { platform: 'linkedin', status: 'ok', leads: 3 },
        { platform: 'x', status: 'failed', leads: 1, error: 'rate limited' },
      ],
      totalLeads: 4,
      uniqueLeads: 3,
      qualityLeads: 2,
      leadsFile: join(dir, 'leads_20261019_093000.csv'),
      outreachFile: join(dir, 'outreach_20261019_093000.txt'),
    });
    assert.deepEqual(linkedin.queries, [{ terms: 'support' }]);
    assert.equal(fake.backends.length, 1);
    assert.equal(fake.backends[0].pages.length, 2);
    assert.equal(fake.backends[0].closed, true);

    const csv = (await readFile(join(dir, 'leads_20261019_093000.csv'), 'utf8')).trim().split('\n');
    assert.deepEqual(csv, [
      'platform,identity,discoveredAt,matchScore,handle,hashtag,headline,name,tweetText',
      `linkedin,Amara Okello,${FOUND_AT},2,,,Support Manager,Amara Okello,`,
      `linkedin,Daniel Mensah,${FOUND_AT},,,,Accountant,Daniel Mensah,`,
      `x,@kampala_eats,${FOUND_AT},1,@kampala_eats,#smallbusiness,,,need customer service help`,
    ]);

    const outreach = await readFile(join(dir, 'outreach_20261019_093000.txt'), 'utf8');
    assert.ok(outreach.includes('TO: Amara Okello\nPLATFORM: linkedin'));
    assert.ok(outreach.includes('Your work as Support Manager caught my attention.'));
    assert.ok(outreach.includes('Hi @kampala_eats, saw your post about #smallbusiness.'));
    assert.equal(outreach.includes('Daniel Mensah'), false);
  });
});

test('no quality leads means no outreach file', async () => {
  await withOutputDir(async (dir) => {
    const linkedin = new FakeExtractor('linkedin', [lead('linkedin', 'Daniel Mensah', { headline: 'Accountant' })]);
    const report = await runner({ linkedin: () => linkedin }, dir, createFakeLauncher().launcher).run({
      searches: [{ platform: 'linkedin', query: { terms: 'accounting' }, maxResults: 5 }],
      qualityKeywords: ['support'],
    });
    assert.equal(report.uniqueLeads, 1);
    assert.equal(report.qualityLeads, 0);
    assert.equal(report.leadsFile, join(dir, 'leads_20261019_093000.csv'));
    assert.equal(report.outreachFile, null);
  });
});

test('a platform without extraction is rejected before the browser starts', async () => {
  await withOutputDir(async (dir) => {
    const fake = createFakeLauncher();
    const leadRunner = new LeadRunner({
      registry: new AdapterRegistry(testContext()),
      sessions: new SessionManager(fake.launcher),
      sessionConfig: TEST_SESSION_CONFIG,
      templates: new OutreachTemplateEngine({ sender: 'Leadcast Team' }),
      outputDir: dir,
    });
    await assert.rejects(leadRunner.run({ searches: [{ platform: 'medium', query: { terms: 'ai' }, maxResults: 5 }] }), ConfigurationError);
    assert.equal(fake.backends.length, 0);
  });
});

test('a browser that cannot start fails the whole run', async () => {
  await withOutputDir(async (dir) => {
    const linkedin = new FakeExtractor('linkedin', []);
    await assert.rejects(
      runner({ linkedin: () => linkedin }, dir, failingLauncher('chromium missing')).run({
        searches: [{ platform: 'linkedin', query: { terms: 'support' }, maxResults: 5 }],
      }),
      SessionStartError,
    );
  });
});
