import { z } from 'zod';
import { OpportunitySource, TransportSource } from './base';
import { HttpFetch, JsonApiTransport } from './transports';
import { RawOpportunity } from '../types/opportunity';
import { SourcesConfig } from '../config';

/**
 * Meetup API adapter, requires MEETUP_API_KEY.
 * Events become workshops/conferences; the event date is the deadline.
 */
export const MEETUP_API_URL = 'https://api.meetup.com/find/events';

const MeetupEventSchema = z.object({
  id: z.union([z.string(), z.number()]),
  name: z.string().nullish(),
  description: z.string().nullish(),
  link: z.string().nullish(),
  local_date: z.string().nullish(),
  group: z.object({ name: z.string().nullish() }).nullish(),
  venue: z
    .object({
      city: z.string().nullish(),
      state: z.string().nullish(),
    })
    .nullish(),
});

export type MeetupEvent = z.infer<typeof MeetupEventSchema>;

export function extractMeetupEvents(body: unknown): unknown[] {
  // Anything other than a list means no events
  return Array.isArray(body) ? body : [];
}

export function venueLocation(event: MeetupEvent): string {
  const city = event.venue?.city?.trim();
  if (!city) return 'Remote';
  const state = event.venue?.state?.trim();
  return state ? `${city}, ${state}` : city;
}

export function mapMeetupEvent(row: unknown): RawOpportunity {
  const event: MeetupEvent = MeetupEventSchema.parse(row);
  return {
    title: event.name ?? '',
    company: event.group?.name || 'Unknown Group',
    location: venueLocation(event),
    description: event.description ?? '',
    deadline: event.local_date ?? undefined,
    applicationUrl: event.link ?? undefined,
    sourceId: String(event.id),
    sourceUrl: event.link ?? undefined,
  };
}

export function createMeetupSource(config: SourcesConfig, http?: HttpFetch): OpportunitySource {
  const apiKey = config.credentials.meetup;
  return new TransportSource<unknown>(
    'meetup',
    new JsonApiTransport(
      'meetup',
      {
        url: MEETUP_API_URL,
        query: {
          key: apiKey,
          text: 'workshop OR conference OR tech OR career',
          radius: 'global',
          order: 'time',
          status: 'upcoming',
          page: 100,
        },
      },
      extractMeetupEvents,
      config.fetchTimeoutMs,
      http
    ),
    mapMeetupEvent,
    { enabled: apiKey.length > 0, typeHint: 'meetup' }
  );
}
