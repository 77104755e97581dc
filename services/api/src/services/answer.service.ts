import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { DEFAULT_DOCS_NAME } from '../lib/config';
import { StageOutcome } from '../types/pipeline.types';
import type { ChatMessage, ModelProvider } from './openai.service';

export interface AnswerGenerator {
  generate(query: string, context: string): Promise<string>;
  generateWithOutcome(query: string, context: string): Promise<StageOutcome<string>>;
}

export function buildSystemPrompt(docsName: string): string {
  return `You are a helpful AI assistant that answers questions about ${docsName} documentation. Use the provided context to answer questions accurately and concisely.`;
}

export function buildUserPrompt(query: string, context: string): string {
  return `Context:\n${context}\n\nQuestion: ${query}`;
}

/**
 * Asks the chat model for an answer grounded in the retrieved context.
 *
 * Failures are rendered as `Error: <message>` rather than thrown.
 */
export class OpenAIAnswerGenerator implements AnswerGenerator {
  private readonly systemPrompt: string;

  constructor(
    private readonly provider: Pick<ModelProvider, 'createChatCompletion'>,
    docsName: string = DEFAULT_DOCS_NAME
  ) {
    this.systemPrompt = buildSystemPrompt(docsName);
  }

  async generate(query: string, context: string): Promise<string> {
    const outcome = await this.generateWithOutcome(query, context);
    return outcome.value;
  }

  async generateWithOutcome(query: string, context: string): Promise<StageOutcome<string>> {
    const messages: ChatMessage[] = [
      { role: 'system', content: this.systemPrompt },
      { role: 'user', content: buildUserPrompt(query, context) },
    ];

    try {
      const content = await this.provider.createChatCompletion(messages);
      if (!content) {
        throw new Error('Model returned an empty completion');
      }
      return { status: 'ok', value: content };
    } catch (error: unknown) {
      logger.error({ error }, 'Failed to generate completion');
      const message = errorMessage(error);
      return { status: 'failed', value: `Error: ${message}`, reason: message };
    }
  }
}

export function createAnswerGenerator(
  provider: Pick<ModelProvider, 'createChatCompletion'>,
  docsName: string
): AnswerGenerator {
  return new OpenAIAnswerGenerator(provider, docsName);
}
