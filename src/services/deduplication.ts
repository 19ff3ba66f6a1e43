import {
  CandidateOpportunity,
  OpportunityFields,
  StoredOpportunity,
} from '../types/opportunity';
import { DeduplicationConfig } from '../config';
import { OpportunityStore } from '../db/store';
import { KeyedLock } from '../utils/keyed-lock';
import { generateDedupKey } from '../utils/hash';
import { overlapSimilar, similarityRatio } from '../utils/similarity';
import { DEFAULT_LOCATION, UNKNOWN_COMPANY } from '../utils/normalizer';
import { logger } from '../utils/logger';

export const PLACEHOLDER_DESCRIPTION = 'No description provided';

export interface Resolution {
  existing?: StoredOpportunity;
  isDuplicate: boolean;
}

export interface UpsertResult {
  record: StoredOpportunity;
  isNew: boolean;
}

/**
 * Fields a duplicate hit may overwrite; empty candidate values never clear stored ones.
 * The stored source identity is kept, so a fuzzy hit from another source never
 * takes over the record. A missing sourceId is filled in only from the same source.
 */
export function overwriteFields(
  candidate: CandidateOpportunity,
  existing: StoredOpportunity
): Partial<OpportunityFields> {
  const fields: Partial<OpportunityFields> = {};

  const text: ReadonlyArray<keyof CandidateOpportunity> = [
    'title', 'company', 'location', 'category', 'description', 'requirements',
    'salary', 'applicationUrl', 'sourceUrl',
  ];
  for (const key of text) {
    const value = candidate[key];
    if (typeof value === 'string' && value.trim() !== '') {
      Object.assign(fields, { [key]: value });
    }
  }

  if (!existing.sourceId && candidate.sourceId && existing.source === candidate.source) {
    fields.sourceId = candidate.sourceId;
  }

  fields.type = candidate.type;
  if (candidate.deadline) {
    fields.deadline = candidate.deadline;
  }
  return fields;
}

/**
 * Fills the non-null columns before a create
 */
export function prepareForCreate(candidate: CandidateOpportunity, now: Date): OpportunityFields {
  return {
    ...candidate,
    company: candidate.company.trim() || UNKNOWN_COMPANY,
    location: candidate.location.trim() || DEFAULT_LOCATION,
    description: candidate.description.trim() || PLACEHOLDER_DESCRIPTION,
    autoFetched: true,
    lastFetched: now,
  };
}

/**
 * Resolves candidates against storage and decides create vs. update.
 * Writes for one logical posting are serialized through a keyed lock.
 */
export class DeduplicationEngine {
  private readonly lock = new KeyedLock();

  constructor(
    private readonly store: OpportunityStore,
    private readonly config: DeduplicationConfig,
    private readonly clock: () => Date = () => new Date()
  ) {}

  titlesMatch(candidateTitle: string, storedTitle: string): number | null {
    if (this.config.titleMatcher === 'overlap') {
      return overlapSimilar(candidateTitle, storedTitle, this.config.similarityThreshold) ? 1 : null;
    }
    const score = similarityRatio(candidateTitle, storedTitle);
    return score >= this.config.similarityThreshold ? score : null;
  }

  async resolve(candidate: CandidateOpportunity): Promise<Resolution> {
    if (candidate.sourceId) {
      const exact = await this.store.findByIdentity(candidate.source, candidate.sourceId);
      if (exact) {
        return { existing: exact, isDuplicate: true };
      }
    }

    const similar = await this.store.findBySimilarity(
      candidate.title,
      candidate.company,
      candidate.type
    );

    let best: StoredOpportunity | undefined;
    let bestScore = -1;
    for (const record of similar) {
      const score = this.titlesMatch(candidate.title, record.title);
      if (score !== null && score > bestScore) {
        best = record;
        bestScore = score;
      }
    }

    if (best) {
      logger.debug('Fuzzy duplicate found', {
        title: candidate.title,
        existingId: best.id,
        score: bestScore,
      });
      return { existing: best, isDuplicate: true };
    }

    return { isDuplicate: false };
  }

  async upsert(candidate: CandidateOpportunity): Promise<UpsertResult> {
    return await this.lock.run(generateDedupKey(candidate), async () => {
      const { existing } = await this.resolve(candidate);

      if (existing) {
        const record = await this.store.update(existing, {
          ...overwriteFields(candidate, existing),
          lastFetched: this.clock(),
        });
        return { record, isNew: false };
      }

      const record = await this.store.create(prepareForCreate(candidate, this.clock()));
      logger.debug('New opportunity stored', { id: record.id, source: candidate.source });
      return { record, isNew: true };
    });
  }
}
