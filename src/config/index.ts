/**
 * Configuration management
 * All behavior is driven by environment variables
 */

export type TitleMatcher = 'ratio' | 'overlap';

export interface SourcesConfig {
  // Empty list means every registered source is enabled
  enabled: string[];
  rssFeeds: string[];
  redditSubreddits: string[];
  credentials: {
    jooble: string;
    authenticJobs: string;
    meetup: string;
  };
  fetchTimeoutMs: number;
  maxItemsPerSource: number;
}

export interface ClassificationConfig {
  enabled: boolean;
  ollamaBaseUrl: string;
  model: string;
  timeoutMs: number;
  minConfidence: number;
  rejectOnError: boolean;
  skipSources: string[];
}

export interface DeduplicationConfig {
  similarityThreshold: number;
  titleMatcher: TitleMatcher;
}

export interface Config {
  // Database
  databaseUrl: string;

  sources: SourcesConfig;
  classification: ClassificationConfig;
  deduplication: DeduplicationConfig;

  // Orchestrator
  fetchConcurrency: number;
  fetchIntervalHours: number;
  runLogSize: number;

  // Trigger
  cronSecret?: string;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_SUBREDDITS = ['jobbit', 'remotejs', 'jobopenings', 'internships'];

// Structured APIs return clean postings; classifying them only costs time
export const DEFAULT_SKIP_SOURCES = [
  'graphql_jobs',
  'jooble',
  'authentic_jobs',
  'meetup',
  'remoteok',
];

export function parseStringArray(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

export function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function parseFloatValue(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseTitleMatcher(value: string | undefined): TitleMatcher {
  return value?.toLowerCase() === 'overlap' ? 'overlap' : 'ratio';
}

export function loadConfig(env: Env = process.env): Config {
  const requiredEnvVars = ['DATABASE_URL'];

  for (const envVar of requiredEnvVars) {
    if (!env[envVar]) {
      throw new Error(`Missing required environment variable: ${envVar}`);
    }
  }

  return {
    databaseUrl: env.DATABASE_URL ?? '',
    sources: {
      enabled: parseStringArray(env.ENABLED_FETCHERS),
      rssFeeds: parseStringArray(env.RSS_FEEDS),
      redditSubreddits: parseStringArray(env.REDDIT_SUBREDDITS, DEFAULT_SUBREDDITS),
      credentials: {
        jooble: env.JOOBLE_API_KEY || '',
        authenticJobs: env.AUTHENTIC_JOBS_API_KEY || '',
        meetup: env.MEETUP_API_KEY || '',
      },
      fetchTimeoutMs: parseNumber(env.FETCH_TIMEOUT_MS, 30000),
      maxItemsPerSource: parseNumber(env.MAX_ITEMS_PER_SOURCE, 100),
    },
    classification: {
      enabled: parseBoolean(env.AI_FILTER_ENABLED, true),
      ollamaBaseUrl: env.OLLAMA_BASE_URL || 'http://localhost:11434',
      model: env.AI_FILTER_MODEL || env.OLLAMA_MODEL || 'llama2',
      // Model cold starts are slow, keep this well above the fetch timeout
      timeoutMs: parseNumber(env.AI_FILTER_TIMEOUT_MS, 120000),
      minConfidence: parseFloatValue(env.AI_FILTER_MIN_CONFIDENCE, 0.7),
      rejectOnError: parseBoolean(env.AI_FILTER_REJECT_ON_ERROR, true),
      skipSources: parseStringArray(env.AI_FILTER_SKIP_SOURCES, DEFAULT_SKIP_SOURCES),
    },
    deduplication: {
      similarityThreshold: parseFloatValue(env.DEDUP_SIMILARITY_THRESHOLD, 0.85),
      titleMatcher: parseTitleMatcher(env.DEDUP_TITLE_MATCHER),
    },
    fetchConcurrency: Math.max(1, parseNumber(env.FETCH_CONCURRENCY, 3)),
    fetchIntervalHours: parseNumber(env.FETCH_INTERVAL_HOURS, 24),
    runLogSize: Math.max(1, parseNumber(env.RUN_LOG_SIZE, 50)),
    cronSecret: env.CRON_SECRET || undefined,
  };
}
