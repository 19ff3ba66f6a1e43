import { describe, it, expect } from 'vitest';
import {
  categorize,
  classifyType,
  mentionsAnyKeyword,
  extractCompany,
  extractLocation,
  normalizeOpportunity,
  parseDate,
  stripHtml,
  truncateDescription,
  UNKNOWN_COMPANY,
} from '../../src/utils/normalizer';
import { ValidationError } from '../../src/utils/errors';

describe('mentionsAnyKeyword', () => {
  it('matches keywords anywhere in the text, ignoring case', () => {
    expect(mentionsAnyKeyword('Spring HACKATHONS 2025', ['hackathon'])).toBe(true);
    expect(mentionsAnyKeyword('Build internal tools', ['intern'])).toBe(true);
    expect(mentionsAnyKeyword('Pour coffee', ['tea'])).toBe(false);
  });
});

describe('categorize', () => {
  it('picks the first matching category', () => {
    expect(categorize('Senior Python Developer', '')).toBe('Technology');
    expect(categorize('Marketing Coordinator', '')).toBe('Business');
    expect(categorize('Graphic Designer', '')).toBe('Design');
  });

  it('matches inflected forms', () => {
    expect(categorize('Developers wanted', '')).toBe('Technology');
    expect(categorize('Sales Associates', 'Retail floor')).toBe('Business');
  });

  it('falls back to General', () => {
    expect(categorize('Barista', 'Pour coffee')).toBe('General');
  });
});

describe('classifyType', () => {
  it('ranks internship above every other type', () => {
    expect(classifyType('Software Engineering Intern', '')).toBe('internship');
    expect(classifyType('Internship and workshop fair', '')).toBe('internship');
  });

  it('detects events', () => {
    expect(classifyType('Annual Tech Summit', '')).toBe('conference');
    expect(classifyType('Hackathon weekend', '')).toBe('competition');
  });

  it('matches plural and inflected keywords', () => {
    expect(classifyType('Spring Hackathons 2025', '')).toBe('competition');
    expect(classifyType('Tech Conferences Roundup', '')).toBe('conference');
    expect(classifyType('Open Positions', '')).toBe('job');
    expect(classifyType('Summer Internships', '')).toBe('internship');
  });

  it('uses the source hint when no keyword matches', () => {
    expect(classifyType('Community meetup night', '', 'meetup')).toBe('workshop');
    expect(classifyType('Annual gathering', '', 'conference_feed')).toBe('conference');
    expect(classifyType('Backend Engineer', '', 'reddit_jobbit')).toBe('job');
  });

  it('lets job keywords win over an event source default', () => {
    expect(classifyType('Frontend position', '', 'eventbrite')).toBe('job');
  });
});

describe('parseDate', () => {
  it('parses ISO dates and date-times', () => {
    expect(parseDate('2025-06-10')?.toISOString()).toBe('2025-06-10T00:00:00.000Z');
    expect(parseDate('2025-06-10T09:30:00+02:00')?.toISOString()).toBe('2025-06-10T07:30:00.000Z');
    expect(parseDate('2025-06-10 09:30')?.toISOString()).toBe('2025-06-10T09:30:00.000Z');
  });

  it('parses feed and human formats', () => {
    expect(parseDate('Tue, 10 Jun 2025 09:00:00 GMT')?.toISOString()).toBe('2025-06-10T09:00:00.000Z');
    expect(parseDate('10 Jun 2025')?.toISOString()).toBe('2025-06-10T00:00:00.000Z');
    expect(parseDate('06/10/2025')?.toISOString()).toBe('2025-06-10T00:00:00.000Z');
  });

  it('returns undefined instead of throwing', () => {
    expect(parseDate('2025-02-30')).toBeUndefined();
    expect(parseDate('next Tuesday')).toBeUndefined();
    expect(parseDate('')).toBeUndefined();
    expect(parseDate(null)).toBeUndefined();
  });
});

describe('stripHtml', () => {
  it('keeps block boundaries and decodes entities', () => {
    expect(stripHtml('<p>Join <b>our</b> team</p><p>Apply&nbsp;now</p>')).toBe('Join our team Apply now');
    expect(stripHtml('line one<br>line two')).toBe('line one line two');
  });

  it('drops scripts and styles', () => {
    expect(stripHtml('<div>Hi<script>alert(1)</script><style>p{}</style></div>')).toBe('Hi');
  });
});

describe('truncateDescription', () => {
  it('caps at 500 characters by default', () => {
    expect(truncateDescription('a'.repeat(600))).toHaveLength(500);
  });

  it('trims trailing whitespace after the cut', () => {
    expect(truncateDescription('abc def', 4)).toBe('abc');
  });
});

describe('extractCompany', () => {
  it('reads company from title patterns', () => {
    expect(extractCompany('Backend Engineer at Acme')).toBe('Acme');
    expect(extractCompany('Data Analyst - Globex')).toBe('Globex');
    expect(extractCompany('Looking for work')).toBe(UNKNOWN_COMPANY);
  });

  it('prefers an explicit value', () => {
    expect(extractCompany('Backend Engineer at Acme', ' Initech ')).toBe('Initech');
  });
});

describe('extractLocation', () => {
  it('recognizes the known patterns', () => {
    expect(extractLocation('Location: New York, NY')).toBe('New York, NY');
    expect(extractLocation('Team based in Berlin')).toBe('Berlin');
    expect(extractLocation('Office in Austin, TX downtown')).toBe('Austin, TX');
    expect(extractLocation('Fully remote role')).toBe('Remote');
    expect(extractLocation('Nothing here')).toBeUndefined();
  });
});

describe('normalizeOpportunity', () => {
  it('derives missing fields', () => {
    const candidate = normalizeOpportunity(
      {
        title: 'Backend Engineer at Acme',
        description: '<p>We are hiring. Based in Denver</p>',
        applicationUrl: 'https://acme.test/jobs/1',
        sourceId: '1',
      },
      'feedA'
    );

    expect(candidate).toEqual({
      title: 'Backend Engineer at Acme',
      company: 'Acme',
      location: 'Denver',
      type: 'job',
      category: 'Technology',
      description: 'We are hiring. Based in Denver',
      requirements: undefined,
      salary: undefined,
      deadline: undefined,
      applicationUrl: 'https://acme.test/jobs/1',
      source: 'feedA',
      sourceId: '1',
      sourceUrl: 'https://acme.test/jobs/1',
    });
  });

  it('falls back to the title when there is no description', () => {
    const candidate = normalizeOpportunity({ title: 'Design Sprint Workshop' }, 'feedA');
    expect(candidate.description).toBe('Design Sprint Workshop');
    expect(candidate.type).toBe('workshop');
  });

  it('rejects items without a title', () => {
    expect(() => normalizeOpportunity({ title: '   ' }, 'feedA')).toThrow(ValidationError);
    expect(() => normalizeOpportunity({}, 'feedA')).toThrow('Item from feedA has no title');
  });
});
