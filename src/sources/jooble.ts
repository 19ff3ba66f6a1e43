import { z } from 'zod';
import { OpportunitySource, TransportSource } from './base';
import { HttpFetch, JsonApiTransport } from './transports';
import { RawOpportunity } from '../types/opportunity';
import { SourcesConfig } from '../config';

/**
 * Jooble API adapter, requires JOOBLE_API_KEY.
 * The key is part of the request path.
 */
export const JOOBLE_API_URL = 'https://jooble.org/api/';

const JoobleJobSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  title: z.string().nullish(),
  company: z.string().nullish(),
  location: z.string().nullish(),
  snippet: z.string().nullish(),
  salary: z.string().nullish(),
  link: z.string().nullish(),
  updated: z.string().nullish(),
});

export type JoobleJob = z.infer<typeof JoobleJobSchema>;

const JoobleResponseSchema = z.object({
  jobs: z.array(z.unknown()).default([]),
});

export function extractJoobleJobs(body: unknown): unknown[] {
  return JoobleResponseSchema.parse(body).jobs;
}

export function mapJoobleJob(row: unknown): RawOpportunity {
  const job: JoobleJob = JoobleJobSchema.parse(row);
  return {
    title: job.title ?? '',
    company: job.company ?? undefined,
    location: job.location || 'Unknown Location',
    description: job.snippet ?? '',
    salary: job.salary ?? undefined,
    applicationUrl: job.link ?? undefined,
    sourceId: job.id === null || job.id === undefined ? undefined : String(job.id),
    sourceUrl: job.link ?? undefined,
  };
}

export function createJoobleSource(config: SourcesConfig, http?: HttpFetch): OpportunitySource {
  const apiKey = config.credentials.jooble;
  return new TransportSource<unknown>(
    'jooble',
    new JsonApiTransport(
      'jooble',
      {
        url: `${JOOBLE_API_URL}${encodeURIComponent(apiKey)}`,
        method: 'POST',
        body: {
          keywords: 'internship OR job OR opportunity',
          location: 'United States',
          radius: '25',
          page: 1,
          searchMode: 1,
        },
      },
      extractJoobleJobs,
      config.fetchTimeoutMs,
      http
    ),
    mapJoobleJob,
    { enabled: apiKey.length > 0, typeHint: 'jooble' }
  );
}
