/**
 * Types for raw SQL query results
 * These represent the structure returned from PostgreSQL queries
 */

/**
 * Row returned by the document match function. Only title and content are
 * guaranteed; the remaining columns depend on how the store was built.
 */
export interface MatchDocumentRow {
  title?: unknown;
  content?: unknown;
  url?: unknown;
  similarity?: unknown;
  [column: string]: unknown;
}

export type HealthCheckRow = {
  result: number;
};
