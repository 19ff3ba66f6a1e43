/**
 * Deterministic filter used when the classifier is unavailable and the
 * gate is configured to fall back instead of rejecting.
 * Prefers rejecting a real posting over admitting a question.
 */

const INTERROGATIVE_WORDS = [
  'how', 'what', 'where', 'when', 'why', 'who', 'which', 'any', 'anyone',
  'is', 'are', 'should', 'can', 'could', 'does', 'do', 'has', 'have', 'did',
];

const HIRING_LANGUAGE = [
  'hiring', 'job opening', 'position available', 'positions available',
  'apply now', 'apply at', 'apply here', 'join our team', 'looking to hire',
  'open position', 'open role', 'accepting applications', 'internship program',
];

const ADVICE_PHRASES = [
  'advice', 'any suggestions', 'suggestions', 'recommendations', 'tips',
  'help me', 'need help', 'how do i', 'should i', 'looking for an internship',
  'looking for internship', 'looking for a job', 'looking for work',
];

const SELF_PROMOTION_PHRASES = [
  'for hire', 'hire me', 'available for work', 'open to work',
  'my portfolio', 'seeking employment',
];

const EXPLICIT_HIRING_TAG = /\[\s*hiring\s*\]/i;

const STRONG_OPPORTUNITY_PHRASES = [
  'hiring', 'job opening', 'position available', 'positions available',
  'apply now', 'apply at', 'accepting applications', 'internship program',
  'join our team', 'open position', 'open role', 'register now',
  'registration open', 'call for applications', 'call for papers',
  'we are looking for', "we're looking for",
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive whole-word match, so "tips" does not hit "multiple"
 */
export function containsKeyword(text: string, keyword: string): boolean {
  const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(keyword.toLowerCase())}($|[^a-z0-9])`);
  return pattern.test(text.toLowerCase());
}

export function containsAnyKeyword(text: string, keywords: string[]): boolean {
  return keywords.some(keyword => containsKeyword(text, keyword));
}

export interface FallbackDecision {
  admitted: boolean;
  reason: string;
}

export function startsWithInterrogative(title: string): boolean {
  const firstWord = title.trim().toLowerCase().match(/^[a-z']+/);
  return firstWord !== null && INTERROGATIVE_WORDS.includes(firstWord[0]);
}

export function keywordFallback(title: string, description: string): FallbackDecision {
  const text = `${title} ${description}`;
  const hasHiringLanguage = EXPLICIT_HIRING_TAG.test(text) || containsAnyKeyword(text, HIRING_LANGUAGE);

  if (startsWithInterrogative(title) && !hasHiringLanguage) {
    return { admitted: false, reason: 'question without hiring language' };
  }

  if (containsAnyKeyword(text, ADVICE_PHRASES) && !hasHiringLanguage) {
    return { admitted: false, reason: 'advice request without hiring language' };
  }

  if (containsAnyKeyword(text, SELF_PROMOTION_PHRASES) && !EXPLICIT_HIRING_TAG.test(text)) {
    return { admitted: false, reason: 'self-promotion' };
  }

  if (EXPLICIT_HIRING_TAG.test(text) || containsAnyKeyword(text, STRONG_OPPORTUNITY_PHRASES)) {
    return { admitted: true, reason: 'strong opportunity phrase' };
  }

  return { admitted: false, reason: 'no opportunity phrase' };
}
