import { OpportunitySource } from './base';
import { FeedReader, HttpFetch, createFeedReader } from './transports';
import {
  createCustomFeedSource,
  createEventbriteSource,
  createRedditSource,
  createStackOverflowSource,
} from './feeds';
import { createWeWorkRemotelySource } from './weworkremotely';
import { createRemoteOKSource } from './remoteok';
import { createGraphQLJobsSource } from './graphql-jobs';
import { createJoobleSource } from './jooble';
import { createAuthenticJobsSource } from './authentic-jobs';
import { createMeetupSource } from './meetup';
import { SourcesConfig } from '../config';

export interface SourceDeps {
  feedReader: FeedReader;
  http?: HttpFetch;
}

type SourceFactory = (config: SourcesConfig, deps: SourceDeps) => OpportunitySource[];

/**
 * Registry of sources keyed by the name used in ENABLED_FETCHERS.
 * "reddit" expands to one source per configured subreddit.
 */
export const SOURCE_REGISTRY: Record<string, SourceFactory> = {
  reddit: (config, deps) =>
    config.redditSubreddits.map(sub => createRedditSource(sub, deps.feedReader)),
  stackoverflow_jobs: (_config, deps) => [createStackOverflowSource(deps.feedReader)],
  eventbrite: (_config, deps) => [createEventbriteSource(deps.feedReader)],
  weworkremotely: (_config, deps) => [createWeWorkRemotelySource(deps.feedReader)],
  remoteok: (config, deps) => [createRemoteOKSource(config, deps.http)],
  graphql_jobs: (config, deps) => [createGraphQLJobsSource(config, deps.http)],
  jooble: (config, deps) => [createJoobleSource(config, deps.http)],
  authentic_jobs: (config, deps) => [createAuthenticJobsSource(config, deps.http)],
  meetup: (config, deps) => [createMeetupSource(config, deps.http)],
};

export function isSourceEnabled(config: SourcesConfig, registryName: string, sourceName: string): boolean {
  if (config.enabled.length === 0) return true;
  return config.enabled.includes(registryName) || config.enabled.includes(sourceName);
}

/**
 * Factory function to create enabled opportunity sources based on configuration.
 * Feeds from RSS_FEEDS are always added; names stay unique.
 */
export function createOpportunitySources(
  config: SourcesConfig,
  deps: SourceDeps = { feedReader: createFeedReader(config.fetchTimeoutMs) }
): OpportunitySource[] {
  const sources = new Map<string, OpportunitySource>();

  for (const [registryName, factory] of Object.entries(SOURCE_REGISTRY)) {
    for (const source of factory(config, deps)) {
      if (isSourceEnabled(config, registryName, source.name) && !sources.has(source.name)) {
        sources.set(source.name, source);
      }
    }
  }

  for (const feedUrl of config.rssFeeds) {
    const source = createCustomFeedSource(feedUrl, deps.feedReader);
    if (!sources.has(source.name)) {
      sources.set(source.name, source);
    }
  }

  return [...sources.values()];
}

export type { OpportunitySource, SourceFetchResult } from './base';
