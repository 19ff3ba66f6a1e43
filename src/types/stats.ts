/**
 * Counters for one source in one run
 */
export interface SourceRunStats {
  fetched: number;
  created: number;
  updated: number;
  rejected: number;
  errors: number;
  errorMessages?: string[];
  timestamp: string;
}

export interface RunTotals {
  fetched: number;
  created: number;
  updated: number;
  rejected: number;
  errors: number;
}

/**
 * Result of one orchestrator invocation
 */
export interface FetchRunStats {
  runId: number;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  aborted: boolean;
  sources: Record<string, SourceRunStats>;
  totals: RunTotals;
}

export type IngestionRunSummary = FetchRunStats;

export function emptySourceStats(timestamp: Date = new Date()): SourceRunStats {
  return {
    fetched: 0,
    created: 0,
    updated: 0,
    rejected: 0,
    errors: 0,
    timestamp: timestamp.toISOString(),
  };
}
