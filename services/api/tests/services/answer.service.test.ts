import { OpenAIAnswerGenerator, buildSystemPrompt } from '../../src/services/answer.service';
import { ModelProvider } from '../../src/services/openai.service';

jest.mock('../../src/lib/logger', () => ({
  logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('OpenAIAnswerGenerator', () => {
  let provider: jest.Mocked<Pick<ModelProvider, 'createChatCompletion'>>;
  let generator: OpenAIAnswerGenerator;

  beforeEach(() => {
    provider = {
      createChatCompletion: jest.fn(),
    };
    generator = new OpenAIAnswerGenerator(provider, 'Acme');
  });

  describe('generate', () => {
    it('whenModelAnswers_returnsContentUnmodified', async () => {
      provider.createChatCompletion.mockResolvedValue('  Use POST /calls.\n');

      await expect(generator.generate('How do I start a call?', 'Title: Calls\nContent: POST /calls'))
        .resolves.toBe('  Use POST /calls.\n');
    });

    it('whenCalled_sendsSystemAndTemplatedUserMessage', async () => {
      provider.createChatCompletion.mockResolvedValue('ok');

      await generator.generate('How do I start a call?', 'Title: Calls\nContent: POST /calls');

      expect(provider.createChatCompletion).toHaveBeenCalledTimes(1);
      expect(provider.createChatCompletion).toHaveBeenCalledWith([
        {
          role: 'system',
          content: 'You are a helpful AI assistant that answers questions about Acme documentation. Use the provided context to answer questions accurately and concisely.',
        },
        {
          role: 'user',
          content: 'Context:\nTitle: Calls\nContent: POST /calls\n\nQuestion: How do I start a call?',
        },
      ]);
    });

    it('whenModelCallThrows_returnsErrorString', async () => {
      provider.createChatCompletion.mockRejectedValue(new Error('rate limited'));

      await expect(generator.generate('q', 'c')).resolves.toBe('Error: rate limited');
    });

    it('whenNonErrorIsThrown_stringifiesIt', async () => {
      provider.createChatCompletion.mockRejectedValue('socket hang up');

      await expect(generator.generate('q', 'c')).resolves.toBe('Error: socket hang up');
    });

    it('whenModelReturnsNoContent_returnsErrorString', async () => {
      provider.createChatCompletion.mockResolvedValue(null);

      await expect(generator.generate('q', 'c')).resolves.toBe('Error: Model returned an empty completion');
    });
  });

  describe('generateWithOutcome', () => {
    it('whenModelAnswers_returnsOk', async () => {
      provider.createChatCompletion.mockResolvedValue('answer');

      await expect(generator.generateWithOutcome('q', 'c')).resolves.toEqual({ status: 'ok', value: 'answer' });
    });

    it('whenModelCallThrows_returnsFailedWithReason', async () => {
      provider.createChatCompletion.mockRejectedValue(new Error('rate limited'));

      await expect(generator.generateWithOutcome('q', 'c')).resolves.toEqual({
        status: 'failed',
        value: 'Error: rate limited',
        reason: 'rate limited',
      });
    });
  });

  describe('buildSystemPrompt', () => {
    it('whenNoDocsNameGiven_defaultsToUltravox', async () => {
      provider.createChatCompletion.mockResolvedValue('ok');

      await new OpenAIAnswerGenerator(provider).generate('q', 'c');

      expect(provider.createChatCompletion.mock.calls[0][0][0]).toEqual({
        role: 'system',
        content: buildSystemPrompt('Ultravox'),
      });
    });
  });
});
