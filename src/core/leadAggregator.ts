import { createObjectCsvWriter } from 'csv-writer';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { log } from '../utils/logger';
import { Lead } from './types';

const FIXED_COLUMNS = ['platform', 'identity', 'discoveredAt', 'matchScore'] as const;

export const merge = (...sources: Lead[][]): Lead[] => sources.flat();

export const leadKey = (lead: Pick<Lead, 'platform' | 'identity'>): string => `${lead.platform}:${lead.identity.trim().toLowerCase()}`;

/** First occurrence of each (platform, identity) wins. */
export const deduplicate = (leads: Lead[]): Lead[] => {
  const seen = new Set<string>();
  return leads.filter((lead) => {
    const key = leadKey(lead);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
};

const normalizeKeywords = (keywords: string[]): string[] => {
  const unique = new Map<string, string>();
  for (const keyword of keywords) {
    const normalized = keyword.trim().toLowerCase();
    if (normalized && !unique.has(normalized)) unique.set(normalized, normalized);
  }
  return [...unique.values()];
};

export const scoreLead = (lead: Lead, keywords: string[]): number => {
  const haystack = Object.values(lead.attributes).join(' ').toLowerCase();
  return normalizeKeywords(keywords).filter((keyword) => haystack.includes(keyword)).length;
};

/**
 * Keeps leads whose attribute text contains at least one keyword, scored by the
 * number of distinct keywords found. Ties keep their input order.
 */
export const filterByKeywords = (leads: Lead[], keywords: string[]): Lead[] => {
  const normalized = normalizeKeywords(keywords);
  if (normalized.length === 0) return [];
  return leads
    .map((lead) => ({ ...lead, matchScore: scoreLead(lead, normalized) }))
    .filter((lead) => lead.matchScore > 0)
    .sort((a, b) => b.matchScore - a.matchScore);
};

/** Copies scores from `scored` onto matching leads in `leads`, leaving the rest untouched. */
export const applyScores = (leads: Lead[], scored: Lead[]): Lead[] => {
  const scores = new Map(scored.map((lead): [string, number | undefined] => [leadKey(lead), lead.matchScore]));
  return leads.map((lead) => {
    const matchScore = scores.get(leadKey(lead));
    return matchScore === undefined ? lead : { ...lead, matchScore };
  });
};

const columnFor = (attributeKey: string): string =>
  FIXED_COLUMNS.some((column) => column === attributeKey) ? `attributes.${attributeKey}` : attributeKey;

export const tableColumns = (leads: Lead[]): string[] => {
  const attributeKeys = new Set<string>();
  for (const lead of leads) Object.keys(lead.attributes).forEach((key) => attributeKeys.add(key));
  return [...FIXED_COLUMNS, ...[...attributeKeys].sort().map(columnFor)];
};

export const toRow = (lead: Lead): Record<string, string | number> => {
  const row: Record<string, string | number> = {
    platform: lead.platform,
    identity: lead.identity,
    discoveredAt: lead.discoveredAt,
    matchScore: lead.matchScore ?? '',
  };
  for (const [key, value] of Object.entries(lead.attributes)) row[columnFor(key)] = value;
  return row;
};

/** Writes one CSV row per lead. Returns the written path, or null for an empty batch. */
export const persistToTable = async (leads: Lead[], destination: string): Promise<string | null> => {
  if (leads.length === 0) {
    log('WARN', 'no leads to persist');
    return null;
  }
  await mkdir(path.dirname(destination), { recursive: true });
  const writer = createObjectCsvWriter({
    path: destination,
    header: tableColumns(leads).map((id) => ({ id, title: id })),
  });
  await writer.writeRecords(leads.map(toRow));
  log('INFO', `saved ${leads.length} leads`, destination);
  return destination;
};
