import { CandidateOpportunity, RawOpportunity } from '../types/opportunity';
import { normalizeOpportunity } from '../utils/normalizer';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const MAX_ERROR_MESSAGES = 20;

/**
 * What one fetch of one source produced.
 * Counters live here rather than on the source so concurrent runs never share them.
 */
export interface SourceFetchResult {
  source: string;
  candidates: CandidateOpportunity[];
  errors: number;
  errorMessages: string[];
}

/**
 * Contract every opportunity source implements
 */
export interface OpportunitySource {
  /**
   * Unique identifier for the source, stored on every record it produces
   */
  readonly name: string;

  /**
   * Never rejects: transport and parse failures are reported in the result
   */
  fetchOpportunities(): Promise<SourceFetchResult>;
}

/**
 * Retrieves raw items from one origin (feed pull, keyed API call)
 */
export interface SourceTransport<TItem> {
  readonly target: string;
  pull(): Promise<TItem[]>;
}

/**
 * Extracts fields from one raw item. Returning null skips the item
 * without counting an error (metadata rows, unrelated entries).
 */
export type ItemMapper<TItem> = (item: TItem) => RawOpportunity | null;

export interface TransportSourceOptions {
  // Passed to type classification, e.g. "eventbrite" defaults to workshop
  typeHint?: string;
  // False when the source needs credentials that are not configured
  enabled?: boolean;
}

export function emptyResult(source: string): SourceFetchResult {
  return { source, candidates: [], errors: 0, errorMessages: [] };
}

function recordError(result: SourceFetchResult, error: unknown): void {
  result.errors++;
  if (result.errorMessages.length < MAX_ERROR_MESSAGES) {
    result.errorMessages.push(errorMessage(error));
  }
}

/**
 * A source composed of a transport and an item mapper, sharing normalization
 */
export class TransportSource<TItem> implements OpportunitySource {
  constructor(
    readonly name: string,
    private readonly transport: SourceTransport<TItem>,
    private readonly mapItem: ItemMapper<TItem>,
    private readonly options: TransportSourceOptions = {}
  ) {}

  async fetchOpportunities(): Promise<SourceFetchResult> {
    const result = emptyResult(this.name);

    if (this.options.enabled === false) {
      logger.info(`Source ${this.name} has no credentials configured, skipping`);
      return result;
    }

    let items: TItem[];
    try {
      logger.info(`Fetching opportunities from ${this.name}`, { target: this.transport.target });
      items = await this.transport.pull();
    } catch (error) {
      recordError(result, error);
      logger.error(`Error fetching opportunities from ${this.name}`, error);
      return result;
    }

    let skipped = 0;
    for (const item of items) {
      try {
        const raw = this.mapItem(item);
        if (!raw) {
          skipped++;
          continue;
        }
        result.candidates.push(
          normalizeOpportunity(raw, this.name, this.options.typeHint ?? this.name)
        );
      } catch (error) {
        recordError(result, error);
        logger.warn(`Failed to normalize item from ${this.name}`, {
          error: errorMessage(error),
        });
      }
    }

    logger.info(`Fetched ${result.candidates.length} opportunities from ${this.name}`, {
      totalItems: items.length,
      normalized: result.candidates.length,
      skipped,
      errors: result.errors,
    });

    return result;
  }
}
