import Anthropic from '@anthropic-ai/sdk';
import { TransportError, errorMessage } from '../../../core/errors.ts';
import { CompletionBackend, statusOf, type CompletionBackendOptions } from './types.ts';

/**
 * Hosted classification through the Anthropic Messages API.
 */
export class AnthropicBackend extends CompletionBackend {
  readonly name = 'anthropic';
  private readonly client: Anthropic;
  private readonly maxOutputTokens: number;

  constructor(options: CompletionBackendOptions) {
    super();
    this.maxOutputTokens = options.maxOutputTokens;
    this.client = new Anthropic({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      // Retries are counted per file by the orchestrator
      maxRetries: 0,
    });
  }

  protected async complete(prompt: string, model: string): Promise<string> {
    let message: Anthropic.Message;
    try {
      message = await this.client.messages.create({
        model,
        max_tokens: this.maxOutputTokens,
        temperature: 0,
        messages: [{ role: 'user', content: prompt }],
      });
    } catch (error) {
      throw new TransportError(`Anthropic request failed: ${errorMessage(error)}`, this.name, {
        status: statusOf(error),
        cause: error,
      });
    }

    return message.content.map((block) => (block.type === 'text' ? block.text : '')).join('');
  }
}
