import * as cheerio from 'cheerio';
import {
  CandidateOpportunity,
  OpportunityType,
  RawOpportunity,
} from '../types/opportunity';
import { ValidationError } from './errors';

export const MAX_DESCRIPTION_LENGTH = 500;
export const UNKNOWN_COMPANY = 'Unknown Company';
export const DEFAULT_LOCATION = 'Remote';

/**
 * Category keyword sets, checked in order
 */
const CATEGORY_KEYWORDS: Array<[string, string[]]> = [
  ['Technology', ['software', 'developer', 'programming', 'coding', 'python', 'javascript', 'java', 'tech', 'it', 'computer', 'engineer', 'data']],
  ['Business', ['business', 'marketing', 'sales', 'finance', 'management', 'analyst', 'accounting']],
  ['Design', ['design', 'ui', 'ux', 'graphic', 'creative', 'art']],
  ['Education', ['education', 'teaching', 'tutor', 'research', 'academic']],
];

/**
 * Type keyword sets in priority order.
 * Internship outranks everything so "Software Engineering Intern" is never a job.
 */
const TYPE_KEYWORDS: Array<[OpportunityType, string[]]> = [
  ['internship', ['intern', 'co-op']],
  ['conference', ['conference', 'summit', 'symposium']],
  ['workshop', ['workshop', 'bootcamp', 'webinar']],
  ['competition', ['competition', 'hackathon', 'contest']],
  ['job', ['job', 'position', 'career', 'hiring', 'full-time', 'part-time']],
];

const EVENT_SOURCES = ['meetup', 'eventbrite'];

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

/**
 * Case-insensitive substring search, so "Hackathons" hits "hackathon"
 */
export function mentionsAnyKeyword(text: string, keywords: string[]): boolean {
  const haystack = text.toLowerCase();
  return keywords.some(keyword => haystack.includes(keyword));
}

export function categorize(title: string, description: string): string {
  const text = `${title} ${description}`;
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (mentionsAnyKeyword(text, keywords)) {
      return category;
    }
  }
  return 'General';
}

export function classifyType(
  title: string,
  description: string,
  sourceHint: string = ''
): OpportunityType {
  const text = `${title} ${description}`;
  const hint = sourceHint.toLowerCase();

  for (const [type, keywords] of TYPE_KEYWORDS) {
    if (mentionsAnyKeyword(text, keywords)) {
      return type;
    }
    if ((type === 'conference' || type === 'workshop') && hint.includes(type)) {
      return type;
    }
  }

  return EVENT_SOURCES.some(s => hint.includes(s)) ? 'workshop' : 'job';
}

function utcDate(year: number, monthIndex: number, day: number): Date | undefined {
  const date = new Date(Date.UTC(year, monthIndex, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== monthIndex ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }
  return date;
}

/**
 * Best-effort parsing of the date formats sources are known to emit.
 * Returns undefined rather than throwing.
 */
export function parseDate(raw: string | null | undefined): Date | undefined {
  const value = raw?.trim();
  if (!value) return undefined;

  // 2025-06-10, 2025-06-10T09:00:00Z, 2025-06-10 09:00:00, 2025-06-10T09:00:00+02:00
  const iso = value.match(
    /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/
  );
  if (iso) {
    const [, year, month, day, hours, minutes, seconds, zone] = iso;
    const dateOnly = utcDate(Number(year), Number(month) - 1, Number(day));
    if (!dateOnly || hours === undefined) return dateOnly;

    const offset = zone && zone !== 'Z'
      ? zone.replace(/^([+-]\d{2})(\d{2})$/, '$1:$2')
      : 'Z';
    const parsed = new Date(`${year}-${month}-${day}T${hours}:${minutes}:${seconds ?? '00'}${offset}`);
    return isNaN(parsed.getTime()) ? undefined : parsed;
  }

  // Tue, 10 Jun 2025 09:00:00 GMT / +0000
  if (/^(?:[A-Za-z]{3},\s*)?\d{1,2}\s+[A-Za-z]{3}\s+\d{4}\s+\d{2}:\d{2}(?::\d{2})?\s*(?:[A-Z]{1,4}|[+-]\d{4})$/.test(value)) {
    const parsed = new Date(value);
    return isNaN(parsed.getTime()) ? undefined : parsed;
  }

  // 10 Jun 2025
  const dayMonthYear = value.match(/^(\d{1,2})\s+([A-Za-z]{3,})\s+(\d{4})$/);
  if (dayMonthYear) {
    const month = MONTHS[dayMonthYear[2].slice(0, 3).toLowerCase()];
    if (month === undefined) return undefined;
    return utcDate(Number(dayMonthYear[3]), month, Number(dayMonthYear[1]));
  }

  // 06/10/2025
  const us = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (us) {
    return utcDate(Number(us[3]), Number(us[1]) - 1, Number(us[2]));
  }

  return undefined;
}

/**
 * Removes markup and decodes entities, keeping block boundaries as spaces
 */
export function stripHtml(html: string | null | undefined): string {
  if (!html) return '';

  const $ = cheerio.load(html);
  $('script, style').remove();
  $('br').replaceWith(' ');
  $('p, div, li, tr, td, h1, h2, h3, h4, h5, h6').append(' ');

  return $.root().text().replace(/\s+/g, ' ').trim();
}

export function truncateDescription(text: string, maxLength: number = MAX_DESCRIPTION_LENGTH): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength).trimEnd();
}

/**
 * "Backend Engineer at Acme" -> "Acme", "Data Analyst - Globex" -> "Globex"
 */
export function extractCompany(title: string, explicit?: string): string {
  const named = explicit?.trim();
  if (named) return named;

  const atIndex = title.lastIndexOf(' at ');
  if (atIndex !== -1) {
    const company = title.slice(atIndex + 4).trim();
    if (company) return company;
  }

  const parts = title.split(' - ');
  if (parts.length > 1) {
    const company = parts[parts.length - 1].trim();
    if (company) return company;
  }

  return UNKNOWN_COMPANY;
}

const LOCATION_PATTERNS = [
  /\b[Ll]ocation:\s*([A-Z][a-z]+(?:\s[A-Z][a-z]+)*(?:,\s*[A-Z]{2})?)/,
  /\b[Bb]ased in ([A-Z][a-z]+(?:\s[A-Z][a-z]+)*(?:,\s*[A-Z]{2})?)/,
  /\b([A-Z][a-z]+,\s*[A-Z]{2})\b/,
];

export function extractLocation(text: string): string | undefined {
  for (const pattern of LOCATION_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      return match[1].trim();
    }
  }
  if (/\bremote\b/i.test(text)) {
    return DEFAULT_LOCATION;
  }
  return undefined;
}

function optionalText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Turns an extracted source item into a canonical candidate.
 * Throws ValidationError when the item has no usable title.
 */
export function normalizeOpportunity(
  raw: RawOpportunity,
  source: string,
  sourceHint: string = source
): CandidateOpportunity {
  const title = stripHtml(raw.title);
  if (!title) {
    throw new ValidationError('title', `Item from ${source} has no title`);
  }

  const description = stripHtml(raw.description);
  const applicationUrl = optionalText(raw.applicationUrl) ?? optionalText(raw.sourceUrl) ?? '';

  return {
    title,
    company: extractCompany(title, raw.company),
    location: optionalText(raw.location) ?? extractLocation(description) ?? DEFAULT_LOCATION,
    type: raw.type ?? classifyType(title, description, sourceHint),
    category: optionalText(raw.category) ?? categorize(title, description),
    description: truncateDescription(description || title),
    requirements: optionalText(raw.requirements),
    salary: optionalText(raw.salary),
    deadline: raw.deadline instanceof Date ? raw.deadline : parseDate(raw.deadline),
    applicationUrl,
    source,
    sourceId: optionalText(raw.sourceId),
    sourceUrl: optionalText(raw.sourceUrl) ?? applicationUrl,
  };
}
