import type { VercelRequest, VercelResponse } from '@vercel/node';
import { getIngestionOrchestrator } from '../../src/services/ingestion';
import { logger } from '../../src/utils/logger';

const DEFAULT_LIMIT = 10;

export function parseLimit(value: string | string[] | undefined): number {
  const raw = Array.isArray(value) ? value[0] : value;
  const parsed = raw ? parseInt(raw, 10) : NaN;
  return isNaN(parsed) || parsed < 1 ? DEFAULT_LIMIT : parsed;
}

/**
 * Recent ingestion runs held by this instance
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  const authHeader = req.headers.authorization;
  const cronSecret = process.env.CRON_SECRET;

  if (cronSecret && authHeader !== `Bearer ${cronSecret}`) {
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }

  try {
    const runs = getIngestionOrchestrator().getRecentRuns(parseLimit(req.query.limit));
    res.status(200).json({ runs });
  } catch (error) {
    logger.error('Failed to read ingestion logs', error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}
