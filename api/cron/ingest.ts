import type { VercelRequest, VercelResponse } from '@vercel/node';
import { getIngestionOrchestrator } from '../../src/services/ingestion';
import { logger } from '../../src/utils/logger';

/**
 * Ingestion cron endpoint
 * Runs one ingestion pass and returns its stats
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  const authHeader = req.headers.authorization;
  const cronSecret = process.env.CRON_SECRET;

  if (cronSecret && authHeader !== `Bearer ${cronSecret}`) {
    logger.warn('Unauthorized cron request', { authHeader: authHeader ? 'present' : 'missing' });
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }

  logger.info('Ingestion cron started');

  try {
    const orchestrator = getIngestionOrchestrator();
    const stats = await orchestrator.runIngestion();

    res.status(200).json({
      success: stats.totals.errors === 0,
      stats,
    });
  } catch (error) {
    // Only configuration or wiring can fail here; runs themselves never reject
    logger.error('Ingestion cron failed', error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}
