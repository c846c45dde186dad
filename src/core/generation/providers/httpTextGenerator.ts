import { request } from 'undici';
import { z } from 'zod';
import { TextGenerator, type GenerateOptions, type TextGeneratorConfig } from '../textGenerator';
import { TextGenerationError } from '../../errors';
import { USER_AGENT } from '../../../config/constants';
import { createChildLogger, generateCorrelationId, withTiming } from '../../../utils/logger';

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

const ErrorBodySchema = z.object({ error: z.object({ message: z.string() }) });

/**
 * Text generator for OpenAI-compatible chat completions APIs
 */
export class HttpTextGenerator extends TextGenerator {
  private readonly serverUrl: string;
  private readonly apiKey: string;
  private readonly modelName: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;

  constructor(config: TextGeneratorConfig) {
    super();

    if (!config.serverUrl) {
      throw new TextGenerationError('serverUrl is required for HTTP text generator');
    }
    if (!config.apiKey) {
      throw new TextGenerationError('apiKey is required for HTTP text generator');
    }
    if (!config.modelName) {
      throw new TextGenerationError('modelName is required for HTTP text generator');
    }

    this.serverUrl = config.serverUrl.replace(/\/$/, ''); // Remove trailing slash
    this.apiKey = config.apiKey;
    this.modelName = config.modelName;
    this.temperature = config.temperature ?? 0.1;
    this.maxTokens = config.maxTokens ?? 2000;
    this.timeoutMs = config.timeoutMs ?? 30000;
  }

  getModelName(): string {
    return this.modelName;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const log = createChildLogger(options.correlationId ?? generateCorrelationId());

    const messages: ChatMessage[] = [];
    if (options.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    const body: ChatCompletionRequest = {
      model: this.modelName,
      messages,
      temperature: this.temperature,
      max_tokens: this.maxTokens,
    };

    return withTiming(log, 'text_generation', () => this.makeRequest(body), {
      model: this.modelName,
      promptLength: prompt.length,
    });
  }

  private async makeRequest(body: ChatCompletionRequest): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await request(`${this.serverUrl}/v1/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          'User-Agent': USER_AGENT,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (response.statusCode < 200 || response.statusCode >= 300) {
        const errorText = await response.body.text();
        throw new TextGenerationError(this.describeError(errorText), response.statusCode);
      }

      const parsed = ChatCompletionResponseSchema.safeParse(await response.body.json());
      if (!parsed.success) {
        throw new TextGenerationError('Invalid response format: missing choices');
      }

      const content = parsed.data.choices[0].message.content;
      if (!content) {
        throw new TextGenerationError('Empty completion');
      }

      return content;
    } catch (error) {
      if (error instanceof TextGenerationError) {
        throw error;
      }

      // Handle network errors, timeouts, etc.
      const errorMessage = error instanceof Error ? error.message : 'Unknown network error';
      throw new TextGenerationError(`Request failed: ${errorMessage}`);
    } finally {
      clearTimeout(timeout);
    }
  }

  private describeError(errorText: string): string {
    let errorBody: unknown;
    try {
      errorBody = JSON.parse(errorText);
    } catch {
      return 'Unexpected response';
    }

    const parsed = ErrorBodySchema.safeParse(errorBody);
    return parsed.success ? parsed.data.error.message : 'Unexpected response';
  }
}
