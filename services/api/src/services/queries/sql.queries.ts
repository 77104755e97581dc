import type { Queryable } from '../database.service';
import { HealthCheckRow, MatchDocumentRow } from '../../types/database.types';
import { DEFAULT_MATCH_FUNCTION } from '../../lib/config';

/**
 * SQL Query Builder for the vector store
 * Encapsulates all raw SQL operations for better testability
 */
export class SqlQueries {
  constructor(private readonly matchFunction: string = DEFAULT_MATCH_FUNCTION) {}

  /**
   * Test database connectivity
   */
  async executeHealthCheck(db: Queryable): Promise<boolean> {
    const result = await db.query<HealthCheckRow>('SELECT 1 as result');
    return result.rows[0]?.result === 1;
  }

  /**
   * Call the store's match function with named arguments.
   * The function does the nearest-neighbour search and returns rows ordered by similarity.
   */
  async matchDocuments(
    db: Queryable,
    embeddingString: string,
    matchCount: number,
    filter: Record<string, string>
  ): Promise<MatchDocumentRow[]> {
    const result = await db.query<MatchDocumentRow>(
      `SELECT * FROM ${this.matchFunction}(query_embedding => $1::vector, match_count => $2::int, filter => $3::jsonb)`,
      [embeddingString, matchCount, JSON.stringify(filter)]
    );
    return result.rows;
  }
}

/**
 * Format embedding array for SQL vector parameter
 */
export function formatEmbeddingForSql(embedding: number[]): string {
  return `[${embedding.join(',')}]`;
}
