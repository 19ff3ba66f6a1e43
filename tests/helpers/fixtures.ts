import { CandidateOpportunity } from '../../src/types/opportunity';
import { FetchRunStats } from '../../src/types/stats';
import { SourcesConfig } from '../../src/config';
import { FeedEntry, FeedReader } from '../../src/sources/transports';
import { vi } from 'vitest';

export const FIXED_NOW = new Date('2025-06-10T12:00:00.000Z');

export function makeCandidate(overrides: Partial<CandidateOpportunity> = {}): CandidateOpportunity {
  return {
    title: 'Backend Engineer',
    company: 'Acme',
    location: 'Remote',
    type: 'job',
    category: 'Technology',
    description: 'Build APIs',
    applicationUrl: 'https://acme.test/jobs/1',
    source: 'feedA',
    sourceUrl: 'https://acme.test/jobs/1',
    ...overrides,
  };
}

export function makeSourcesConfig(overrides: Partial<SourcesConfig> = {}): SourcesConfig {
  return {
    enabled: [],
    rssFeeds: [],
    redditSubreddits: ['jobbit'],
    credentials: { jooble: '', authenticJobs: '', meetup: '' },
    fetchTimeoutMs: 30000,
    maxItemsPerSource: 100,
    ...overrides,
  };
}

export function makeRunStats(runId: number): FetchRunStats {
  return {
    runId,
    startedAt: FIXED_NOW.toISOString(),
    finishedAt: FIXED_NOW.toISOString(),
    durationMs: 0,
    aborted: false,
    sources: {},
    totals: { fetched: 0, created: 0, updated: 0, rejected: 0, errors: 0 },
  };
}

export function fakeFeedReader(items: FeedEntry[] | Error) {
  const parseURL = vi.fn(async (_url: string) => {
    if (items instanceof Error) throw items;
    return { items };
  });
  const reader: FeedReader = { parseURL };
  return { reader, parseURL };
}
