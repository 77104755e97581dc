/**
 * Values flowing through the question-answering pipeline.
 * All of them are derived per query and never shared between queries.
 */

export type EmbeddingVector = number[];

export interface RetrievedDocument {
  title: string;
  content: string;
  url?: string;
  similarity?: number;
}

export interface MatchFilter {
  source: string;
  matchCount?: number;
}

/**
 * Result of a single pipeline stage.
 * `degraded` and `failed` still carry the placeholder value the stage substituted.
 */
export type StageOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'degraded'; value: T; reason: string }
  | { status: 'failed'; value: T; reason: string };

export type QueryStatus =
  | 'answered'
  | 'no_results'
  | 'retrieval_failed'
  | 'generation_failed';

export interface QueryResult {
  status: QueryStatus;
  answer: string;
  documents: RetrievedDocument[];
  embeddingDegraded: boolean;
  reason?: string;
}

export interface QueryRunOptions {
  matchCount?: number;
}
