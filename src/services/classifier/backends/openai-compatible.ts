import OpenAI from 'openai';
import { TransportError, errorMessage } from '../../../core/errors.ts';
import { CompletionBackend, statusOf, type CompletionBackendOptions } from './types.ts';

// Local servers (Ollama, llama.cpp, vLLM, LM Studio) ignore the key but the SDK requires one
const LOCAL_API_KEY = 'not-needed';

/**
 * Classification through any OpenAI-compatible chat completions endpoint,
 * typically a local model server selected with `--base-url`.
 */
export class OpenAICompatibleBackend extends CompletionBackend {
  readonly name = 'openai-compatible';
  private readonly client: OpenAI;
  private readonly endpoint: string;
  private readonly maxOutputTokens: number;

  constructor(options: CompletionBackendOptions) {
    super();
    this.endpoint = options.baseUrl ?? 'the OpenAI API';
    this.maxOutputTokens = options.maxOutputTokens;
    this.client = new OpenAI({
      apiKey: options.apiKey ?? LOCAL_API_KEY,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  protected async complete(prompt: string, model: string): Promise<string> {
    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model,
        max_tokens: this.maxOutputTokens,
        temperature: 0,
        messages: [{ role: 'user', content: prompt }],
      });
    } catch (error) {
      throw new TransportError(`Request to ${this.endpoint} failed: ${errorMessage(error)}`, this.name, {
        status: statusOf(error),
        cause: error,
      });
    }

    return completion.choices[0]?.message.content ?? '';
  }
}
