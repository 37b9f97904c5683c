import path from 'node:path';
import { describeError, log } from '../utils/logger';
import { ActivityLog } from './activityLog';
import { AdapterRegistry } from './adapterFactory';
import { canAuthenticate, canExtract, RecordExtractor } from './capabilities';
import { SessionConfig } from './config';
import { ConfigurationError, OperationCancelledError, SessionClosedError } from './errors';
import { applyScores, deduplicate, filterByKeywords, merge, persistToTable } from './leadAggregator';
import { OutreachTemplateEngine, writeOutreachBundle } from './outreachTemplates';
import { Session, SessionManager } from './sessionManager';
import { Lead, LeadQuery, OperationOptions, SupportedPlatform } from './types';

export const DEFAULT_QUALITY_KEYWORDS = ['customer service', 'support', 'business owner', 'manager', 'director', 'CEO'];
export const DEFAULT_OUTREACH_LIMIT = 20;

export interface LeadSearch {
  platform: SupportedPlatform;
  query: LeadQuery;
  maxResults: number;
}

export interface LeadRunRequest {
  searches: LeadSearch[];
  qualityKeywords?: string[];
  outreachLimit?: number;
}

export interface PlatformRunStatus {
  platform: SupportedPlatform;
  status: 'ok' | 'failed';
  leads: number;
  error?: string;
}

export interface LeadRunReport {
  startedAt: string;
  finishedAt: string;
  platforms: PlatformRunStatus[];
  totalLeads: number;
  uniqueLeads: number;
  qualityLeads: number;
  leadsFile: string | null;
  outreachFile: string | null;
}

export interface LeadRunnerDeps {
  registry: AdapterRegistry;
  sessions: SessionManager;
  sessionConfig: SessionConfig;
  templates: OutreachTemplateEngine;
  outputDir: string;
  activityLog?: ActivityLog;
  now?: () => Date;
}

/** UTC `YYYYMMDD_HHMMSS`. */
export const fileStamp = (date: Date): string => date.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);

interface PlannedSearch extends LeadSearch {
  extractor: RecordExtractor;
}

interface SearchOutcome {
  status: PlatformRunStatus;
  leads: Lead[];
}

/**
 * One full lead-generation pass: every search on its own page of a shared
 * session, then merge, dedupe, score, and write the lead table and outreach bundle.
 */
export class LeadRunner {
  private readonly now: () => Date;

  constructor(private readonly deps: LeadRunnerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async run(request: LeadRunRequest, { signal }: OperationOptions = {}): Promise<LeadRunReport> {
    const started = this.now();
    const planned = request.searches.map((search) => this.plan(search));

    const outcomes =
      planned.length === 0
        ? []
        : await this.deps.sessions.withSession(this.deps.sessionConfig, async (session) => {
            const collected: SearchOutcome[] = [];
            for (const search of planned) collected.push(await this.runSearch(session, search, signal));
            return collected;
          });

    const all = merge(...outcomes.map((outcome) => outcome.leads));
    const unique = deduplicate(all);
    const quality = filterByKeywords(unique, request.qualityKeywords ?? DEFAULT_QUALITY_KEYWORDS);
    const stamp = fileStamp(started);
    const { outputDir, templates } = this.deps;

    const leadsFile = await persistToTable(applyScores(unique, quality), path.join(outputDir, `leads_${stamp}.csv`));
    const outreachFile = await writeOutreachBundle(
      path.join(outputDir, `outreach_${stamp}.txt`),
      quality.slice(0, request.outreachLimit ?? DEFAULT_OUTREACH_LIMIT),
      templates,
    );

    const report: LeadRunReport = {
      startedAt: started.toISOString(),
      finishedAt: this.now().toISOString(),
      platforms: outcomes.map((outcome) => outcome.status),
      totalLeads: all.length,
      uniqueLeads: unique.length,
      qualityLeads: quality.length,
      leadsFile,
      outreachFile,
    };
    log('INFO', `lead run finished: ${report.uniqueLeads} unique, ${report.qualityLeads} quality`);
    await this.deps.activityLog
      ?.record('lead_run', { ...report })
      .catch((error) => log('WARN', 'activity log write failed', describeError(error)));
    return report;
  }

  private plan(search: LeadSearch): PlannedSearch {
    const adapter = this.deps.registry.get(search.platform);
    if (!canExtract(adapter)) {
      throw new ConfigurationError(`${search.platform} does not support lead extraction`, { platform: search.platform });
    }
    return { ...search, extractor: adapter };
  }

  private async runSearch(session: Session, { platform, query, maxResults, extractor }: PlannedSearch, signal?: AbortSignal): Promise<SearchOutcome> {
    const leads: Lead[] = [];
    try {
      await session.withPage(async (page) => {
        if (canAuthenticate(extractor)) await extractor.authenticate(page, { signal });
        for await (const lead of extractor.extractRecords(page, query, maxResults, { signal })) leads.push(lead);
      }, signal);
      log('INFO', `[${platform}] ${leads.length} leads`);
      return { status: { platform, status: 'ok', leads: leads.length }, leads };
    } catch (error) {
      if (error instanceof OperationCancelledError || error instanceof SessionClosedError) throw error;
      // leads read before the failure are kept
      log('ERROR', `[${platform}] lead search failed`, describeError(error));
      return { status: { platform, status: 'failed', leads: leads.length, error: describeError(error) }, leads };
    }
  }
}
