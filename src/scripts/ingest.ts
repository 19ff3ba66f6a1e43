import { loadConfig } from '../config';
import { createIngestionOrchestrator } from '../services/ingestion';
import { closePool } from '../db/client';
import { logger } from '../utils/logger';

/**
 * Runs one ingestion pass from the command line.
 * Ctrl+C stops before the next source starts.
 */
async function ingest() {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupt received, finishing sources already started');
    controller.abort();
  });

  try {
    const orchestrator = createIngestionOrchestrator(loadConfig());
    const stats = await orchestrator.runIngestion({ signal: controller.signal });
    console.log(JSON.stringify(stats, null, 2));
    await closePool();
    process.exit(stats.totals.errors > 0 && stats.totals.created + stats.totals.updated === 0 ? 1 : 0);
  } catch (error) {
    logger.error('Ingestion failed', error);
    process.exit(1);
  }
}

void ingest();
