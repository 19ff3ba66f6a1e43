import { OpportunitySource, SourceFetchResult } from '../sources/base';
import { CandidateOpportunity } from '../types/opportunity';
import {
  FetchRunStats,
  IngestionRunSummary,
  RunTotals,
  SourceRunStats,
  emptySourceStats,
} from '../types/stats';
import { UpsertResult } from './deduplication';
import { FetchRunLog } from './run-log';
import { runWorkerPool } from '../utils/worker-pool';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export const ORCHESTRATOR_STATS_KEY = '_orchestrator';
const MAX_ERROR_MESSAGES = 20;

export interface AdmissionGate {
  shouldAdmit(candidate: CandidateOpportunity): Promise<boolean>;
}

export interface OpportunityWriter {
  upsert(candidate: CandidateOpportunity): Promise<UpsertResult>;
}

export interface OrchestratorOptions {
  concurrency: number;
  maxItemsPerSource: number;
  runLogSize: number;
  clock?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
}

function addError(stats: SourceRunStats, message: string): void {
  stats.errors++;
  const messages = stats.errorMessages ?? [];
  if (messages.length < MAX_ERROR_MESSAGES) {
    messages.push(message);
  }
  stats.errorMessages = messages;
}

export function sumTotals(sources: Record<string, SourceRunStats>): RunTotals {
  const totals: RunTotals = { fetched: 0, created: 0, updated: 0, rejected: 0, errors: 0 };
  for (const stats of Object.values(sources)) {
    totals.fetched += stats.fetched;
    totals.created += stats.created;
    totals.updated += stats.updated;
    totals.rejected += stats.rejected;
    totals.errors += stats.errors;
  }
  return totals;
}

/**
 * Runs every source through fetch, gate and deduplication.
 * Sources run concurrently through a bounded pool; candidates of one
 * source are processed in order. runIngestion never rejects.
 */
export class IngestionOrchestrator {
  private readonly runLog: FetchRunLog;
  private readonly clock: () => Date;
  private inFlight: Promise<IngestionRunSummary> | null = null;
  private nextRunId = 1;

  constructor(
    private readonly sources: OpportunitySource[],
    private readonly gate: AdmissionGate,
    private readonly writer: OpportunityWriter,
    private readonly options: OrchestratorOptions
  ) {
    this.runLog = new FetchRunLog(options.runLogSize);
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Starts a run, or returns the summary of the run already in flight
   */
  runIngestion(options: RunOptions = {}): Promise<IngestionRunSummary> {
    if (this.inFlight) {
      logger.warn('Ingestion already running, joining the in-flight run');
      return this.inFlight;
    }

    const run = this.execute(options).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  getRecentRuns(limit?: number): FetchRunStats[] {
    return this.runLog.recent(limit);
  }

  get isRunning(): boolean {
    return this.inFlight !== null;
  }

  private async execute(options: RunOptions): Promise<IngestionRunSummary> {
    const runId = this.nextRunId++;
    const startedAt = this.clock();
    const sourceStats: Record<string, SourceRunStats> = {};
    let started = 0;

    try {
      logger.info('Ingestion run started', {
        runId,
        sources: this.sources.map(source => source.name),
        concurrency: this.options.concurrency,
      });

      await runWorkerPool(
        this.sources,
        this.options.concurrency,
        async (source) => {
          started++;
          sourceStats[source.name] = await this.processSource(source);
        },
        () => options.signal?.aborted === true
      );
    } catch (error) {
      logger.error('Ingestion run failed unexpectedly', error, { runId });
      const failure = emptySourceStats(this.clock());
      addError(failure, errorMessage(error));
      sourceStats[ORCHESTRATOR_STATS_KEY] = failure;
    }

    const finishedAt = this.clock();
    const summary: FetchRunStats = {
      runId,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      aborted: options.signal?.aborted === true && started < this.sources.length,
      sources: sourceStats,
      totals: sumTotals(sourceStats),
    };

    this.runLog.record(summary);

    logger.info('Ingestion run completed', {
      runId,
      aborted: summary.aborted,
      durationMs: summary.durationMs,
      ...summary.totals,
    });

    return summary;
  }

  private async fetchSource(source: OpportunitySource): Promise<SourceFetchResult> {
    try {
      return await source.fetchOpportunities();
    } catch (error) {
      // Sources report their own failures; this only catches a broken contract
      return {
        source: source.name,
        candidates: [],
        errors: 1,
        errorMessages: [errorMessage(error)],
      };
    }
  }

  private async processSource(source: OpportunitySource): Promise<SourceRunStats> {
    const stats = emptySourceStats(this.clock());
    logger.info(`Processing source: ${source.name}`);

    const result = await this.fetchSource(source);
    stats.errors = result.errors;
    if (result.errorMessages.length > 0) {
      stats.errorMessages = result.errorMessages.slice(0, MAX_ERROR_MESSAGES);
    }

    const candidates = result.candidates.slice(0, this.options.maxItemsPerSource);
    stats.fetched = candidates.length;

    for (const candidate of candidates) {
      try {
        if (!(await this.gate.shouldAdmit(candidate))) {
          stats.rejected++;
          continue;
        }

        const { isNew } = await this.writer.upsert(candidate);
        if (isNew) {
          stats.created++;
        } else {
          stats.updated++;
        }
      } catch (error) {
        logger.error(`Failed to store candidate from ${source.name}`, error, {
          title: candidate.title,
        });
        addError(stats, `${candidate.title}: ${errorMessage(error)}`);
      }
    }

    logger.info(`Source ${source.name} completed`, {
      produced: result.candidates.length,
      fetched: stats.fetched,
      created: stats.created,
      updated: stats.updated,
      rejected: stats.rejected,
      errors: stats.errors,
    });

    return stats;
  }
}
