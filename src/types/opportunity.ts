/**
 * Canonical opportunity schema
 * All sources must normalize their items to CandidateOpportunity
 */
export const OPPORTUNITY_TYPES = [
  'job',
  'internship',
  'workshop',
  'conference',
  'competition',
] as const;

export type OpportunityType = (typeof OPPORTUNITY_TYPES)[number];

export interface CandidateOpportunity {
  title: string;
  company: string;
  location: string;
  type: OpportunityType;
  category: string;
  description: string;
  requirements?: string;
  salary?: string;
  deadline?: Date;
  applicationUrl: string;
  source: string;
  sourceId?: string;
  sourceUrl: string;
}

/**
 * Record owned by the storage collaborator
 */
export interface StoredOpportunity extends CandidateOpportunity {
  id: number;
  isDeleted: boolean;
  autoFetched: boolean;
  lastFetched: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Fields written on create/update
 */
export type OpportunityFields = CandidateOpportunity & {
  autoFetched: boolean;
  lastFetched: Date;
};

/**
 * Source item after field extraction, before normalization.
 * Anything left undefined is derived by the normalizer.
 */
export interface RawOpportunity {
  title?: string;
  company?: string;
  location?: string;
  type?: OpportunityType;
  category?: string;
  description?: string;
  requirements?: string;
  salary?: string;
  deadline?: string | Date;
  applicationUrl?: string;
  sourceId?: string;
  sourceUrl?: string;
}

export function isOpportunityType(value: string): value is OpportunityType {
  return (OPPORTUNITY_TYPES as readonly string[]).includes(value);
}
