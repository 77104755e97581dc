import OpenAI from 'openai';
import { OpenAIConfig } from '../lib/config';
import { logger } from '../lib/logger';

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string };

/**
 * The raw model calls the pipeline depends on. Implementations throw on failure.
 */
export interface ModelProvider {
  createEmbedding(text: string): Promise<number[]>;
  createChatCompletion(messages: ChatMessage[]): Promise<string | null>;
}

/**
 * Service for OpenAI operations including embeddings and completions
 */
export class OpenAIService implements ModelProvider {
  private client?: OpenAI;

  constructor(private readonly config: OpenAIConfig) {}

  /**
   * Get the OpenAI client, initializing it if necessary
   */
  getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new Error('OPENAI_API_KEY is required');
      }

      // No retries anywhere in the pipeline: a failed call falls back exactly once
      this.client = new OpenAI({
        apiKey: this.config.apiKey,
        maxRetries: 0,
        timeout: this.config.timeoutMs,
      });
      logger.info({ chatModel: this.config.chatModel, embeddingModel: this.config.embeddingModel }, 'OpenAI client initialized');
    }
    return this.client;
  }

  /**
   * Generate an embedding with the configured embedding model
   */
  async createEmbedding(text: string): Promise<number[]> {
    const response = await this.getClient().embeddings.create({
      model: this.config.embeddingModel,
      input: text,
    });
    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error('Embedding response contained no data');
    }
    return embedding;
  }

  /**
   * Generate a completion with the configured chat model.
   * Resolves to the first choice's content.
   */
  async createChatCompletion(messages: ChatMessage[]): Promise<string | null> {
    const response = await this.getClient().chat.completions.create({
      model: this.config.chatModel,
      messages,
    });
    return response.choices[0]?.message.content ?? null;
  }
}

export function createOpenAIService(config: OpenAIConfig): OpenAIService {
  return new OpenAIService(config);
}
