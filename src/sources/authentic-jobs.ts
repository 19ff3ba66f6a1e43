import { z } from 'zod';
import { OpportunitySource, TransportSource } from './base';
import { HttpFetch, JsonApiTransport } from './transports';
import { RawOpportunity, isOpportunityType } from '../types/opportunity';
import { SourcesConfig } from '../config';

/**
 * Authentic Jobs API adapter, requires AUTHENTIC_JOBS_API_KEY
 */
export const AUTHENTIC_JOBS_URL = 'https://authenticjobs.com/api/';

const NamedSchema = z.union([z.object({ name: z.string().nullish() }), z.string()]).nullish();

const ListingSchema = z.object({
  id: z.union([z.string(), z.number()]),
  title: z.string().nullish(),
  company: NamedSchema,
  location: NamedSchema,
  type: NamedSchema,
  category: NamedSchema,
  description: z.string().nullish(),
  url: z.string().nullish(),
});

export type AuthenticJobsListing = z.infer<typeof ListingSchema>;

const ResponseSchema = z.object({
  listings: z
    .object({
      // A single result arrives as an object instead of a one-element list
      listing: z.union([z.array(z.unknown()), z.record(z.unknown())]).nullish(),
    })
    .nullish(),
});

export function extractListings(body: unknown): unknown[] {
  const listing = ResponseSchema.parse(body).listings?.listing;
  if (!listing) return [];
  return Array.isArray(listing) ? listing : [listing];
}

function nameOf(value: z.infer<typeof NamedSchema>): string | undefined {
  if (!value) return undefined;
  if (typeof value === 'string') return value;
  return value.name ?? undefined;
}

export function mapListing(row: unknown): RawOpportunity {
  const listing: AuthenticJobsListing = ListingSchema.parse(row);
  const type = nameOf(listing.type)?.toLowerCase();
  return {
    title: listing.title ?? '',
    company: nameOf(listing.company),
    location: nameOf(listing.location) ?? 'Remote',
    type: type && isOpportunityType(type) ? type : 'job',
    category: nameOf(listing.category) ?? 'Technology',
    description: listing.description ?? '',
    applicationUrl: listing.url ?? undefined,
    sourceId: String(listing.id),
    sourceUrl: listing.url ?? undefined,
  };
}

export function createAuthenticJobsSource(config: SourcesConfig, http?: HttpFetch): OpportunitySource {
  const apiKey = config.credentials.authenticJobs;
  return new TransportSource<unknown>(
    'authentic_jobs',
    new JsonApiTransport(
      'authentic_jobs',
      {
        url: AUTHENTIC_JOBS_URL,
        query: {
          api_key: apiKey,
          method: 'aj.jobs.search',
          format: 'json',
          perpage: 100,
        },
      },
      extractListings,
      config.fetchTimeoutMs,
      http
    ),
    mapListing,
    { enabled: apiKey.length > 0 }
  );
}
