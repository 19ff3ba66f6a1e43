import { OpportunitySource, TransportSource } from './base';
import { FeedEntry, FeedReader, FeedTransport } from './transports';
import { feedEntryId } from './feeds';
import { RawOpportunity } from '../types/opportunity';
import { UNKNOWN_COMPANY } from '../utils/normalizer';

/**
 * WeWorkRemotely RSS adapter
 * RSS Feed: https://weworkremotely.com/categories/remote-programming-jobs.rss
 */
export const WWR_FEED_URL = 'https://weworkremotely.com/categories/remote-programming-jobs.rss';

/**
 * Parses "Company Name: Job Title" (colon format), falling back to
 * "Job Title - Company Name" (dash format)
 */
export function splitWwrTitle(rawTitle: string): { title: string; company: string } {
  const colonMatch = rawTitle.match(/^(.+?):\s*(.+)$/);
  if (colonMatch) {
    return { company: colonMatch[1].trim(), title: colonMatch[2].trim() };
  }

  const dashMatch = rawTitle.match(/^(.+?)\s*-\s*(.+)$/);
  if (dashMatch) {
    return { title: dashMatch[1].trim(), company: dashMatch[2].trim() };
  }

  return { title: rawTitle.trim(), company: UNKNOWN_COMPANY };
}

export function mapWwrEntry(entry: FeedEntry): RawOpportunity | null {
  if (!entry.title) {
    return { title: '' };
  }
  if (!entry.link) {
    return null;
  }

  const { title, company } = splitWwrTitle(entry.title);

  return {
    title,
    company,
    location: entry.location || 'Remote',
    description: entry.content || entry.contentSnippet || '',
    applicationUrl: entry.link,
    sourceId: feedEntryId(entry),
    sourceUrl: entry.link,
  };
}

export function createWeWorkRemotelySource(reader: FeedReader): OpportunitySource {
  return new TransportSource<FeedEntry>(
    'weworkremotely',
    new FeedTransport(WWR_FEED_URL, reader),
    mapWwrEntry
  );
}
