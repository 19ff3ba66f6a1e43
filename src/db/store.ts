import {
  OpportunityFields,
  OpportunityType,
  StoredOpportunity,
} from '../types/opportunity';

/**
 * What the ingestion pipeline needs from persistence.
 * Both finders ignore soft-deleted records.
 */
export interface OpportunityStore {
  findByIdentity(source: string, sourceId: string): Promise<StoredOpportunity | null>;

  /**
   * Records of the same type whose company contains, or is contained in,
   * the given company (case-insensitive). Title scoring is left to the caller.
   */
  findBySimilarity(title: string, company: string, type: OpportunityType): Promise<StoredOpportunity[]>;

  create(fields: OpportunityFields): Promise<StoredOpportunity>;

  update(record: StoredOpportunity, fields: Partial<OpportunityFields>): Promise<StoredOpportunity>;
}
