import { Pool, PoolClient } from 'pg';
import {
  OpportunityFields,
  OpportunityType,
  StoredOpportunity,
  isOpportunityType,
} from '../types/opportunity';
import { OpportunityStore } from './store';
import { getPool, withTransaction } from './client';
import { logger } from '../utils/logger';

type OpportunityRow = {
  id: number;
  title: string;
  company: string;
  location: string;
  type: string;
  category: string | null;
  description: string;
  requirements: string | null;
  salary: string | null;
  deadline: Date | null;
  application_url: string | null;
  created_at: Date;
  updated_at: Date;
  is_deleted: boolean;
  source: string | null;
  source_id: string | null;
  source_url: string | null;
  last_fetched: Date | null;
  auto_fetched: boolean;
};

const SIMILARITY_CANDIDATE_LIMIT = 50;

/**
 * Columns written from OpportunityFields, in insert order
 */
const COLUMN_MAP: ReadonlyArray<[keyof OpportunityFields, string]> = [
  ['title', 'title'],
  ['company', 'company'],
  ['location', 'location'],
  ['type', 'type'],
  ['category', 'category'],
  ['description', 'description'],
  ['requirements', 'requirements'],
  ['salary', 'salary'],
  ['deadline', 'deadline'],
  ['applicationUrl', 'application_url'],
  ['source', 'source'],
  ['sourceId', 'source_id'],
  ['sourceUrl', 'source_url'],
  ['autoFetched', 'auto_fetched'],
  ['lastFetched', 'last_fetched'],
];

export function titleTokens(title: string): string[] {
  return [...new Set(title.toLowerCase().split(/\s+/).filter(token => token.length > 0))];
}

function toRecord(row: OpportunityRow): StoredOpportunity {
  return {
    id: row.id,
    title: row.title,
    company: row.company,
    location: row.location,
    type: isOpportunityType(row.type) ? row.type : 'job',
    category: row.category ?? 'General',
    description: row.description,
    requirements: row.requirements ?? undefined,
    salary: row.salary ?? undefined,
    deadline: row.deadline ?? undefined,
    applicationUrl: row.application_url ?? '',
    source: row.source ?? '',
    sourceId: row.source_id ?? undefined,
    sourceUrl: row.source_url ?? '',
    isDeleted: row.is_deleted,
    autoFetched: row.auto_fetched,
    lastFetched: row.last_fetched,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * PostgreSQL store for the opportunities table.
 * Writes run inside a transaction; reads go straight to the pool.
 */
export class PgOpportunityStore implements OpportunityStore {
  constructor(private readonly pool: Pool = getPool()) {}

  async findByIdentity(source: string, sourceId: string): Promise<StoredOpportunity | null> {
    const result = await this.pool.query<OpportunityRow>(
      `SELECT * FROM opportunities
       WHERE source = $1 AND source_id = $2 AND is_deleted = FALSE
       ORDER BY id ASC
       LIMIT 1`,
      [source, sourceId]
    );
    return result.rows.length > 0 ? toRecord(result.rows[0]) : null;
  }

  async findBySimilarity(
    title: string,
    company: string,
    type: OpportunityType
  ): Promise<StoredOpportunity[]> {
    const result = await this.pool.query<OpportunityRow>(
      `SELECT * FROM opportunities
       WHERE is_deleted = FALSE
         AND type = $3
         AND (POSITION(LOWER($2) IN LOWER(company)) > 0 OR POSITION(LOWER(company) IN LOWER($2)) > 0)
         AND (
           POSITION(LOWER($1) IN LOWER(title)) > 0
           OR POSITION(LOWER(title) IN LOWER($1)) > 0
           OR regexp_split_to_array(LOWER(title), '\\s+') && $4::text[]
         )
       ORDER BY last_fetched DESC NULLS LAST, id DESC
       LIMIT $5`,
      [title, company, type, titleTokens(title), SIMILARITY_CANDIDATE_LIMIT]
    );
    return result.rows.map(toRecord);
  }

  async create(fields: OpportunityFields): Promise<StoredOpportunity> {
    return await withTransaction(async (client) => {
      const columns = COLUMN_MAP.map(([, column]) => column);
      const placeholders = columns.map((_, index) => `$${index + 1}`);
      const values = COLUMN_MAP.map(([key]) => fields[key] ?? null);

      const result = await client.query<OpportunityRow>(
        `INSERT INTO opportunities (${columns.join(', ')})
         VALUES (${placeholders.join(', ')})
         RETURNING *`,
        values
      );

      logger.debug('Opportunity created', { id: result.rows[0].id, source: fields.source });
      return toRecord(result.rows[0]);
    }, this.pool);
  }

  async update(
    record: StoredOpportunity,
    fields: Partial<OpportunityFields>
  ): Promise<StoredOpportunity> {
    return await withTransaction(
      async (client) => this.updateWithClient(client, record, fields),
      this.pool
    );
  }

  private async updateWithClient(
    client: PoolClient,
    record: StoredOpportunity,
    fields: Partial<OpportunityFields>
  ): Promise<StoredOpportunity> {
    const assignments: string[] = [];
    const values: unknown[] = [];

    for (const [key, column] of COLUMN_MAP) {
      const value = fields[key];
      if (value !== undefined) {
        values.push(value);
        assignments.push(`${column} = $${values.length}`);
      }
    }
    assignments.push('updated_at = NOW()');
    values.push(record.id);

    const result = await client.query<OpportunityRow>(
      `UPDATE opportunities SET ${assignments.join(', ')}
       WHERE id = $${values.length}
       RETURNING *`,
      values
    );

    if (result.rows.length === 0) {
      throw new Error(`Opportunity ${record.id} no longer exists`);
    }
    return toRecord(result.rows[0]);
  }
}
