import { OpportunitySource, TransportSource } from './base';
import { FeedEntry, FeedReader, FeedTransport } from './transports';
import { RawOpportunity } from '../types/opportunity';

/**
 * Generic RSS/Atom sources: Reddit job boards, Stack Overflow, Eventbrite
 * and any feed listed in RSS_FEEDS
 */

export interface FeedSourceOptions {
  name: string;
  feedUrl: string;
  typeHint?: string;
  // Reddit authors are posters, not employers
  companyFromAuthor?: boolean;
}

/**
 * Last non-empty path segment of a link, e.g. the Reddit post id slug
 */
function lastPathSegment(link: string): string | undefined {
  try {
    const segments = new URL(link).pathname.split('/').filter(s => s.length > 0);
    return segments[segments.length - 1];
  } catch {
    return undefined;
  }
}

function hostnameOf(url: string): string | undefined {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return undefined;
  }
}

export function feedEntryId(entry: FeedEntry): string | undefined {
  const explicit = entry.guid || entry.id;
  if (explicit) return explicit;
  if (entry.link) return lastPathSegment(entry.link);
  return entry.title?.trim().toLowerCase().replace(/\s+/g, '-');
}

export function mapFeedEntry(entry: FeedEntry, companyFromAuthor: boolean): RawOpportunity | null {
  if (!entry.title?.trim()) {
    // Untitled entries are counted as validation errors by the normalizer
    return { title: '' };
  }

  const author = entry.creator || entry.author;

  // pubDate is when the entry was posted, never an application deadline
  return {
    title: entry.title,
    company: entry.company || (companyFromAuthor ? author : undefined),
    location: entry.location,
    description: entry.content || entry.summary || entry.contentSnippet || '',
    applicationUrl: entry.link,
    sourceId: feedEntryId(entry),
    sourceUrl: entry.link,
  };
}

export function createFeedSource(options: FeedSourceOptions, reader: FeedReader): OpportunitySource {
  const companyFromAuthor = options.companyFromAuthor ?? true;
  return new TransportSource<FeedEntry>(
    options.name,
    new FeedTransport(options.feedUrl, reader),
    entry => mapFeedEntry(entry, companyFromAuthor),
    { typeHint: options.typeHint }
  );
}

export function subredditFromUrl(feedUrl: string): string | undefined {
  const match = feedUrl.match(/reddit\.com\/r\/([^/?#]+)/i);
  return match ? match[1] : undefined;
}

export function createRedditSource(subreddit: string, reader: FeedReader): OpportunitySource {
  return createFeedSource(
    {
      name: `reddit_${subreddit.toLowerCase()}`,
      feedUrl: `https://www.reddit.com/r/${subreddit}/.rss`,
      companyFromAuthor: false,
    },
    reader
  );
}

export function createStackOverflowSource(reader: FeedReader): OpportunitySource {
  return createFeedSource(
    { name: 'stackoverflow_jobs', feedUrl: 'https://stackoverflow.com/jobs/feed' },
    reader
  );
}

export function createEventbriteSource(reader: FeedReader, feedUrl: string = 'https://www.eventbrite.com/rss'): OpportunitySource {
  return createFeedSource(
    { name: 'eventbrite', feedUrl, typeHint: 'eventbrite' },
    reader
  );
}

/**
 * Source for a feed URL from RSS_FEEDS. Reddit URLs keep their subreddit naming.
 */
export function createCustomFeedSource(feedUrl: string, reader: FeedReader): OpportunitySource {
  const subreddit = subredditFromUrl(feedUrl);
  if (subreddit) {
    return createFeedSource(
      {
        name: `reddit_${subreddit.toLowerCase()}`,
        feedUrl,
        companyFromAuthor: false,
      },
      reader
    );
  }

  // Unparseable URLs still get a source; the fetch itself fails and is counted
  const host = hostnameOf(feedUrl) ?? 'custom';

  return createFeedSource(
    { name: `rss_${host.replace(/[^a-z0-9]+/gi, '_').toLowerCase()}`, feedUrl },
    reader
  );
}
