import { z } from 'zod';
import { OpportunitySource, TransportSource } from './base';
import { HttpFetch, JsonApiTransport } from './transports';
import { RawOpportunity } from '../types/opportunity';
import { SourceFetchError } from '../utils/errors';
import { SourcesConfig } from '../config';

/**
 * GraphQL Jobs API adapter (no auth)
 */
export const GRAPHQL_JOBS_URL = 'https://api.graphql.jobs';

const JOBS_QUERY = `{
  jobs {
    id
    title
    company { name }
    locationNames
    description
    applyUrl
    postedAt
    tags { name }
  }
}`;

const GraphQLJobSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  company: z.object({ name: z.string().nullish() }).nullish(),
  locationNames: z.array(z.string()).nullish(),
  description: z.string().nullish(),
  applyUrl: z.string().nullish(),
  postedAt: z.string().nullish(),
  tags: z.array(z.object({ name: z.string() })).nullish(),
});

export type GraphQLJob = z.infer<typeof GraphQLJobSchema>;

const GraphQLResponseSchema = z.object({
  data: z.object({ jobs: z.array(z.unknown()) }).nullish(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

export function extractGraphQLJobs(body: unknown): unknown[] {
  const parsed = GraphQLResponseSchema.parse(body);
  if (parsed.errors?.length) {
    throw new SourceFetchError('graphql_jobs', `GraphQL API errors: ${parsed.errors.map(e => e.message).join('; ')}`);
  }
  return parsed.data?.jobs ?? [];
}

export function mapGraphQLJob(row: unknown): RawOpportunity {
  const job: GraphQLJob = GraphQLJobSchema.parse(row);
  const locations = job.locationNames ?? [];
  return {
    title: job.title ?? '',
    company: job.company?.name ?? undefined,
    location: locations.length > 0 ? locations.join(', ') : 'Remote',
    type: 'job',
    category: job.tags?.[0]?.name ?? 'Technology',
    description: job.description ?? '',
    applicationUrl: job.applyUrl ?? undefined,
    sourceId: job.id,
    sourceUrl: job.applyUrl ?? undefined,
  };
}

export function createGraphQLJobsSource(config: SourcesConfig, http?: HttpFetch): OpportunitySource {
  return new TransportSource<unknown>(
    'graphql_jobs',
    new JsonApiTransport(
      'graphql_jobs',
      { url: GRAPHQL_JOBS_URL, method: 'POST', body: { query: JOBS_QUERY } },
      extractGraphQLJobs,
      config.fetchTimeoutMs,
      http
    ),
    mapGraphQLJob
  );
}
