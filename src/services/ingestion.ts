import { Config, loadConfig } from '../config';
import { createOpportunitySources } from '../sources';
import { OpportunityStore } from '../db/store';
import { PgOpportunityStore } from '../db/opportunities';
import { getPool } from '../db/client';
import { ClassificationGate } from '../filters/classification-gate';
import { OpportunityClassifier } from './opportunity-classifier';
import { getCompletionClient } from './ollama-client';
import { DeduplicationEngine } from './deduplication';
import { IngestionOrchestrator } from './ingestion-orchestrator';
import { logger } from '../utils/logger';

/**
 * Assembles the pipeline from configuration
 */
export function createIngestionOrchestrator(
  config: Config,
  store: OpportunityStore = new PgOpportunityStore(getPool(config.databaseUrl))
): IngestionOrchestrator {
  const sources = createOpportunitySources(config.sources);
  const classifier = new OpportunityClassifier(
    getCompletionClient(config.classification.ollamaBaseUrl),
    { model: config.classification.model, timeoutMs: config.classification.timeoutMs }
  );
  const gate = new ClassificationGate(config.classification, classifier);
  const deduplicator = new DeduplicationEngine(store, config.deduplication);

  logger.info(`Initialized ${sources.length} opportunity source(s)`, {
    sourceNames: sources.map(source => source.name),
    classification: config.classification.enabled,
    model: config.classification.model,
    rejectOnError: config.classification.rejectOnError,
    intervalHours: config.fetchIntervalHours,
  });

  return new IngestionOrchestrator(sources, gate, deduplicator, {
    concurrency: config.fetchConcurrency,
    maxItemsPerSource: config.sources.maxItemsPerSource,
    runLogSize: config.runLogSize,
  });
}

let sharedOrchestrator: IngestionOrchestrator | null = null;

/**
 * Gets or creates the orchestrator for this process, so the run log
 * survives between trigger invocations on a warm instance
 */
export function getIngestionOrchestrator(): IngestionOrchestrator {
  if (!sharedOrchestrator) {
    sharedOrchestrator = createIngestionOrchestrator(loadConfig());
  }
  return sharedOrchestrator;
}

/**
 * Resets the shared orchestrator (useful for testing)
 */
export function resetIngestionOrchestrator(): void {
  sharedOrchestrator = null;
}
