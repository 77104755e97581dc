import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { DEFAULT_MATCH_COUNT } from '../lib/config';
import { QueryResult, QueryRunOptions } from '../types/pipeline.types';
import type { EmbeddingClient } from './embedding.service';
import type { VectorRetriever } from './retrieval.service';
import type { AnswerGenerator } from './answer.service';
import { ContextAssembler, assembleContext } from './context.service';

export const NO_RESULTS_MESSAGE = "I couldn't find any relevant information in the documentation.";

export type QueryState =
  | 'Idle'
  | 'Embedding'
  | 'Retrieving'
  | 'NoResults'
  | 'Assembling'
  | 'Generating'
  | 'Done';

export interface QueryOrchestratorDependencies {
  embeddingClient: EmbeddingClient;
  retriever: VectorRetriever;
  generator: AnswerGenerator;
  assemble?: ContextAssembler;
}

export interface QueryOrchestratorOptions {
  source: string;
  matchCount?: number;
}

/**
 * Runs one question through embed → retrieve → assemble → generate.
 *
 * Every stage absorbs its own failures, so `run` and `answer` always resolve.
 * `run` reports which path was taken; `answer` only returns the text.
 */
export class QueryOrchestrator {
  private readonly embeddingClient: EmbeddingClient;
  private readonly retriever: VectorRetriever;
  private readonly generator: AnswerGenerator;
  private readonly assemble: ContextAssembler;
  private readonly source: string;
  private readonly matchCount: number;

  constructor(dependencies: QueryOrchestratorDependencies, options: QueryOrchestratorOptions) {
    this.embeddingClient = dependencies.embeddingClient;
    this.retriever = dependencies.retriever;
    this.generator = dependencies.generator;
    this.assemble = dependencies.assemble ?? assembleContext;
    this.source = options.source;
    this.matchCount = options.matchCount ?? DEFAULT_MATCH_COUNT;
  }

  async answer(query: string): Promise<string> {
    const result = await this.run(query);
    return result.answer;
  }

  async run(query: string, options: QueryRunOptions = {}): Promise<QueryResult> {
    if (query.trim().length === 0) {
      this.transition('Done', { reason: 'blank query' });
      return { status: 'no_results', answer: NO_RESULTS_MESSAGE, documents: [], embeddingDegraded: false };
    }

    let embeddingDegraded = false;

    try {
      this.transition('Embedding');
      const embedding = await this.embeddingClient.embedWithOutcome(query);
      embeddingDegraded = embedding.status !== 'ok';
      if (embedding.status !== 'ok') {
        logger.warn({ reason: embedding.reason }, 'Continuing with degraded query embedding');
      }

      this.transition('Retrieving');
      const retrieval = await this.retriever.retrieveWithOutcome(embedding.value, {
        source: this.source,
        matchCount: options.matchCount ?? this.matchCount,
      });

      if (retrieval.value.length === 0) {
        this.transition('NoResults');
        this.transition('Done');
        if (retrieval.status === 'ok') {
          return { status: 'no_results', answer: NO_RESULTS_MESSAGE, documents: [], embeddingDegraded };
        }
        return {
          status: 'retrieval_failed',
          answer: NO_RESULTS_MESSAGE,
          documents: [],
          embeddingDegraded,
          reason: retrieval.reason,
        };
      }

      this.transition('Assembling', { matches: retrieval.value.length });
      const context = this.assemble(retrieval.value);

      this.transition('Generating');
      const generation = await this.generator.generateWithOutcome(query, context);

      this.transition('Done');
      if (generation.status === 'ok') {
        return { status: 'answered', answer: generation.value, documents: retrieval.value, embeddingDegraded };
      }
      return {
        status: 'generation_failed',
        answer: generation.value,
        documents: retrieval.value,
        embeddingDegraded,
        reason: generation.reason,
      };
    } catch (error: unknown) {
      // A stage broke its own fail-soft contract
      logger.error({ error }, 'Query pipeline stage threw unexpectedly');
      const message = errorMessage(error);
      return {
        status: 'generation_failed',
        answer: `Error: ${message}`,
        documents: [],
        embeddingDegraded,
        reason: message,
      };
    }
  }

  private transition(state: QueryState, details: Record<string, unknown> = {}): void {
    logger.debug({ state, ...details }, 'Query pipeline state');
  }
}

export function createQueryOrchestrator(
  dependencies: QueryOrchestratorDependencies,
  options: QueryOrchestratorOptions
): QueryOrchestrator {
  return new QueryOrchestrator(dependencies, options);
}
