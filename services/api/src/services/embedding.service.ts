import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { EmbeddingVector, StageOutcome } from '../types/pipeline.types';
import type { ModelProvider } from './openai.service';

export interface EmbeddingClient {
  embed(text: string): Promise<EmbeddingVector>;
  embedWithOutcome(text: string): Promise<StageOutcome<EmbeddingVector>>;
}

/**
 * Turns text into a vector with the configured embedding model.
 *
 * A failed call never reaches the caller: the result degrades to an all-zero
 * vector of the configured length, so retrieval still runs (with poor matches).
 */
export class OpenAIEmbeddingClient implements EmbeddingClient {
  constructor(
    private readonly provider: Pick<ModelProvider, 'createEmbedding'>,
    private readonly dimensions: number
  ) {}

  async embed(text: string): Promise<EmbeddingVector> {
    const outcome = await this.embedWithOutcome(text);
    return outcome.value;
  }

  async embedWithOutcome(text: string): Promise<StageOutcome<EmbeddingVector>> {
    try {
      const embedding = await this.provider.createEmbedding(text);
      this.validateEmbedding(embedding);
      return { status: 'ok', value: embedding };
    } catch (error: unknown) {
      logger.error({ error }, 'Failed to generate embedding, falling back to zero vector');
      return {
        status: 'degraded',
        value: this.zeroVector(),
        reason: `Embedding generation failed: ${errorMessage(error)}`,
      };
    }
  }

  zeroVector(): EmbeddingVector {
    return new Array<number>(this.dimensions).fill(0);
  }

  private validateEmbedding(embedding: number[]): void {
    if (!Array.isArray(embedding) || embedding.length !== this.dimensions) {
      throw new Error(
        `Embedding dimension mismatch: expected ${this.dimensions}, got ${Array.isArray(embedding) ? embedding.length : 0}`
      );
    }

    if (embedding.some((val) => !Number.isFinite(val))) {
      throw new Error('Embedding contains invalid values');
    }
  }
}

export function createEmbeddingClient(
  provider: Pick<ModelProvider, 'createEmbedding'>,
  dimensions: number
): EmbeddingClient {
  return new OpenAIEmbeddingClient(provider, dimensions);
}
