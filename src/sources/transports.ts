import fetch, { RequestInit, Response } from 'node-fetch';
import Parser from 'rss-parser';
import { SourceTransport } from './base';
import { SourceFetchError } from '../utils/errors';

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36';

/**
 * Fields rss-parser exposes on RSS and Atom entries that we read
 */
export interface FeedEntry {
  title?: string;
  link?: string;
  guid?: string;
  id?: string;
  author?: string;
  creator?: string;
  company?: string;
  location?: string;
  content?: string;
  contentSnippet?: string;
  summary?: string;
  pubDate?: string;
  isoDate?: string;
  categories?: string[];
}

/**
 * The part of rss-parser the feed transport needs
 */
export interface FeedReader {
  parseURL(url: string): Promise<{ items: FeedEntry[] }>;
}

export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export function createFeedReader(timeoutMs: number): FeedReader {
  return new Parser<Record<string, unknown>, FeedEntry>({
    timeout: timeoutMs,
    headers: { 'User-Agent': USER_AGENT },
    customFields: {
      item: ['company', 'location'],
    },
  });
}

/**
 * Pulls every entry of one RSS/Atom feed
 */
export class FeedTransport implements SourceTransport<FeedEntry> {
  constructor(
    readonly target: string,
    private readonly reader: FeedReader
  ) {}

  async pull(): Promise<FeedEntry[]> {
    const feed = await this.reader.parseURL(this.target);
    return feed.items ?? [];
  }
}

export interface JsonRequest {
  url: string;
  method?: 'GET' | 'POST';
  query?: Record<string, string | number>;
  body?: unknown;
}

/**
 * Performs one JSON request with a hard timeout.
 * Non-2xx answers become SourceFetchError carrying the status.
 */
export async function requestJson(
  source: string,
  request: JsonRequest,
  timeoutMs: number,
  http: HttpFetch = fetch
): Promise<unknown> {
  const url = new URL(request.url);
  for (const [key, value] of Object.entries(request.query ?? {})) {
    url.searchParams.set(key, String(value));
  }

  const response = await http(url.toString(), {
    method: request.method ?? 'GET',
    headers: {
      'Content-Type': 'application/json',
      'User-Agent': USER_AGENT,
    },
    body: request.body === undefined ? undefined : JSON.stringify(request.body),
    timeout: timeoutMs,
  });

  if (!response.ok) {
    throw new SourceFetchError(source, `${source} API returned ${response.status}`, response.status);
  }

  return response.json();
}

/**
 * Calls one JSON API and extracts the list of postings from the body
 */
export class JsonApiTransport<TItem> implements SourceTransport<TItem> {
  readonly target: string;

  constructor(
    private readonly source: string,
    private readonly request: JsonRequest,
    private readonly extract: (body: unknown) => TItem[],
    private readonly timeoutMs: number,
    private readonly http: HttpFetch = fetch
  ) {
    this.target = request.url;
  }

  async pull(): Promise<TItem[]> {
    const body = await requestJson(this.source, this.request, this.timeoutMs, this.http);
    return this.extract(body);
  }
}
