import { createHash } from 'crypto';
import { CandidateOpportunity } from '../types/opportunity';

/**
 * Deterministic key for the write path of one real-world posting:
 * - source + source id when the source provides one
 * - otherwise title + company + type
 */
export function generateDedupKey(candidate: CandidateOpportunity): string {
  const hashInput = candidate.sourceId
    ? `id|${candidate.source}|${candidate.sourceId}`
    : `fuzzy|${candidate.title.toLowerCase().trim()}|${candidate.company.toLowerCase().trim()}|${candidate.type}`;
  return createHash('sha256').update(hashInput).digest('hex');
}
