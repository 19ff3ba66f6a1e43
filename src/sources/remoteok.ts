import { z } from 'zod';
import { OpportunitySource, TransportSource } from './base';
import { HttpFetch, JsonApiTransport } from './transports';
import { RawOpportunity } from '../types/opportunity';
import { SourcesConfig } from '../config';

/**
 * RemoteOK API adapter
 * API Documentation: https://remoteok.com/api
 */
export const REMOTEOK_API_URL = 'https://remoteok.com/api';

const RemoteOKItemSchema = z
  .object({
    id: z.union([z.string(), z.number()]).optional(),
    position: z.string().optional(),
    title: z.string().optional(),
    company: z.string().optional(),
    location: z.string().optional(),
    description: z.string().optional(),
    tags: z.array(z.string()).optional(),
    url: z.string().optional(),
    apply_url: z.string().optional(),
    salary_min: z.number().optional(),
    salary_max: z.number().optional(),
  })
  .passthrough();

export type RemoteOKItem = z.infer<typeof RemoteOKItemSchema>;

export function extractRemoteOKItems(body: unknown): unknown[] {
  return z.array(z.unknown()).parse(body);
}

function formatSalary(min?: number, max?: number): string | undefined {
  if (!min && !max) return undefined;
  if (min && max) return `$${min.toLocaleString('en-US')} - $${max.toLocaleString('en-US')}`;
  return `$${(min || max || 0).toLocaleString('en-US')}`;
}

/**
 * The first element of the response is a legal notice, not a job;
 * rows without an id and a position or company are skipped
 */
export function mapRemoteOKItem(row: unknown): RawOpportunity | null {
  const job: RemoteOKItem = RemoteOKItemSchema.parse(row);
  if (job.id === undefined || !(job.position || job.company)) {
    return null;
  }

  const id = String(job.id);
  const url = job.url || `https://remoteok.com/remote-jobs/${id}`;

  return {
    title: job.position || job.title || '',
    company: job.company,
    location: job.location || 'Remote',
    category: job.tags?.[0],
    description: job.description,
    salary: formatSalary(job.salary_min, job.salary_max),
    applicationUrl: job.apply_url || url,
    sourceId: id,
    sourceUrl: url,
  };
}

export function createRemoteOKSource(config: SourcesConfig, http?: HttpFetch): OpportunitySource {
  return new TransportSource<unknown>(
    'remoteok',
    new JsonApiTransport('remoteok', { url: REMOTEOK_API_URL }, extractRemoteOKItems, config.fetchTimeoutMs, http),
    mapRemoteOKItem
  );
}
