import { AppConfig } from '../lib/config';
import { DatabaseService } from './database.service';
import { OpenAIService } from './openai.service';
import { createEmbeddingClient } from './embedding.service';
import { createVectorRetriever } from './retrieval.service';
import { createAnswerGenerator } from './answer.service';
import { QueryOrchestrator, createQueryOrchestrator } from './query-orchestrator.service';
import { SqlQueries } from './queries/sql.queries';

export interface QueryPipeline {
  openai: OpenAIService;
  database: DatabaseService;
  orchestrator: QueryOrchestrator;
}

/**
 * Build the clients and the orchestrator from validated config.
 * The caller owns the lifecycle (connection test, shutdown).
 */
export function createQueryPipeline(config: AppConfig): QueryPipeline {
  const openai = new OpenAIService(config.openai);
  const database = new DatabaseService(config.database, new SqlQueries(config.retrieval.matchFunction));

  const orchestrator = createQueryOrchestrator(
    {
      embeddingClient: createEmbeddingClient(openai, config.openai.embeddingDimensions),
      retriever: createVectorRetriever(database, config.retrieval.matchFunction),
      generator: createAnswerGenerator(openai, config.docsName),
    },
    {
      source: config.retrieval.source,
      matchCount: config.retrieval.matchCount,
    }
  );

  return { openai, database, orchestrator };
}
