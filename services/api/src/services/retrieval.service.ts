import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { DEFAULT_MATCH_COUNT } from '../lib/config';
import { MatchDocumentRow } from '../types/database.types';
import {
  EmbeddingVector,
  MatchFilter,
  RetrievedDocument,
  StageOutcome,
} from '../types/pipeline.types';
import type { Queryable } from './database.service';
import { SqlQueries, formatEmbeddingForSql } from './queries/sql.queries';

export interface VectorRetriever {
  retrieve(queryVector: EmbeddingVector, filter: MatchFilter): Promise<RetrievedDocument[]>;
  retrieveWithOutcome(queryVector: EmbeddingVector, filter: MatchFilter): Promise<StageOutcome<RetrievedDocument[]>>;
}

/**
 * Service interface for the match query, so the retriever can be tested without SQL
 */
export interface MatchQueryService {
  matchDocuments(
    db: Queryable,
    embeddingString: string,
    matchCount: number,
    filter: Record<string, string>
  ): Promise<MatchDocumentRow[]>;
}

/**
 * Similarity search against the pgvector store's match function.
 * Returns at most matchCount documents in store order; any failure is
 * logged and reported as an empty result.
 */
export class PgVectorRetriever implements VectorRetriever {
  constructor(
    private readonly db: Queryable,
    private readonly sqlQueries: MatchQueryService = new SqlQueries()
  ) {}

  async retrieve(queryVector: EmbeddingVector, filter: MatchFilter): Promise<RetrievedDocument[]> {
    const outcome = await this.retrieveWithOutcome(queryVector, filter);
    return outcome.value;
  }

  async retrieveWithOutcome(
    queryVector: EmbeddingVector,
    filter: MatchFilter
  ): Promise<StageOutcome<RetrievedDocument[]>> {
    const matchCount = filter.matchCount ?? DEFAULT_MATCH_COUNT;

    try {
      if (!Number.isInteger(matchCount) || matchCount <= 0) {
        throw new Error(`matchCount must be a positive integer, got ${matchCount}`);
      }

      const rows = await this.sqlQueries.matchDocuments(
        this.db,
        formatEmbeddingForSql(queryVector),
        matchCount,
        { source: filter.source }
      );
      const documents = this.toDocuments(rows).slice(0, matchCount);
      logger.info({ source: filter.source, matchCount, matches: documents.length }, 'Vector search completed');
      return { status: 'ok', value: documents };
    } catch (error: unknown) {
      logger.error({ error, source: filter.source, matchCount }, 'Vector similarity search failed');
      return {
        status: 'failed',
        value: [],
        reason: `Vector search failed: ${errorMessage(error)}`,
      };
    }
  }

  private toDocuments(rows: MatchDocumentRow[]): RetrievedDocument[] {
    const documents: RetrievedDocument[] = [];

    rows.forEach((row, index) => {
      if (typeof row.title !== 'string' || typeof row.content !== 'string') {
        logger.warn({ index }, 'Skipping match row without string title/content');
        return;
      }

      const document: RetrievedDocument = { title: row.title, content: row.content };
      if (typeof row.url === 'string') {
        document.url = row.url;
      }
      const similarity = typeof row.similarity === 'string' ? Number(row.similarity) : row.similarity;
      if (typeof similarity === 'number' && Number.isFinite(similarity)) {
        document.similarity = similarity;
      }
      documents.push(document);
    });

    return documents;
  }
}

export function createVectorRetriever(db: Queryable, matchFunction: string): VectorRetriever {
  return new PgVectorRetriever(db, new SqlQueries(matchFunction));
}
