import Together from 'together-ai';
import { AIProvider, ChatMessage, TokenHandler } from '../../types/ai-provider';
import { logger } from '../../utils/logger';
import { CompletionError, toErrorMessage } from '../../utils/errors';

export interface TogetherAIProviderOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  temperature?: number;
}

export class TogetherAIProvider implements AIProvider {
  private together: Together;
  public readonly model: string;
  private readonly temperature: number;

  constructor(options: TogetherAIProviderOptions) {
    this.together = new Together({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
    });
    this.model = options.model;
    this.temperature = options.temperature ?? 0;
  }

  async streamChat(
    messages: ChatMessage[],
    onToken?: TokenHandler
  ): Promise<string> {
    logger.info('Sending chat completion to Together AI', {
      model: this.model,
      messages: messages.length,
    });

    let fullText = '';
    try {
      const stream = await this.together.chat.completions.create({
        model: this.model,
        messages: messages.map((message) => ({
          role: message.role,
          content: message.content,
        })),
        temperature: this.temperature,
        stream: true,
      });

      for await (const chunk of stream) {
        const text = chunk.choices[0]?.delta?.content;
        if (text) {
          fullText += text;
          if (onToken) {
            await onToken(text);
          }
        }
      }
    } catch (error) {
      logger.error('Error streaming completion from Together AI', {
        model: this.model,
        error: toErrorMessage(error),
      });
      throw new CompletionError('Completion request failed', error);
    }

    const reply = fullText.trim();
    if (!reply) {
      logger.warn('Empty completion from Together AI', { model: this.model });
      throw new CompletionError('No response from Together AI service');
    }
    logger.info('Received completion from Together AI', {
      model: this.model,
      length: reply.length,
    });
    return reply;
  }
}
