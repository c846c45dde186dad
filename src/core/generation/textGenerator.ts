/**
 * Single prompt in, single text response out. Implementations make one
 * request per call and do not retry.
 */
export abstract class TextGenerator {
  /**
   * @param prompt User prompt sent as-is
   * @returns Raw response text, unparsed
   */
  abstract generate(prompt: string, options?: GenerateOptions): Promise<string>;

  /**
   * Model name/identifier used by this generator
   */
  abstract getModelName(): string;
}

export interface GenerateOptions {
  systemPrompt?: string;
  correlationId?: string;
}

export interface TextGeneratorConfig {
  type: 'http';
  serverUrl?: string;
  apiKey?: string;
  modelName?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

export async function createTextGenerator(config: TextGeneratorConfig): Promise<TextGenerator> {
  switch (config.type) {
    case 'http': {
      const { HttpTextGenerator } = await import('./providers/httpTextGenerator');
      return new HttpTextGenerator(config);
    }

    default:
      throw new Error(`Unknown text generator type: ${String(config.type)}`);
  }
}
