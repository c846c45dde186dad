import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvironmentSchema = z.object({
  // Text-generation collaborator (OpenAI-compatible chat completions API)
  LLM_SERVER_URL: z.string().url('LLM server URL must be a valid URL').optional(),
  LLM_API_KEY: z.string().min(1).optional(),
  LLM_MODEL_NAME: z.string().min(1).default('gpt-4o-mini'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),

  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  AI_INPUT_CHAR_LIMIT: z.coerce.number().int().positive().default(10000),

  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),

  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

export interface TextGeneratorSettings {
  serverUrl: string;
  apiKey: string;
  modelName: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

let cachedEnvironment: Environment | null = null;

export function getEnvironment(): Environment {
  if (cachedEnvironment) {
    return cachedEnvironment;
  }

  try {
    const env = EnvironmentSchema.parse(process.env);
    cachedEnvironment = env;
    return env;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Environment validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

export function getLogLevel(): (typeof LOG_LEVELS)[number] {
  const env = getEnvironment();
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }
  return env.NODE_ENV === 'development' ? 'debug' : 'info';
}

/**
 * Settings for the text-generation collaborator, or null when the
 * server URL or API key is missing.
 */
export function getTextGeneratorSettings(): TextGeneratorSettings | null {
  const env = getEnvironment();
  if (!env.LLM_SERVER_URL || !env.LLM_API_KEY) {
    return null;
  }

  return {
    serverUrl: env.LLM_SERVER_URL,
    apiKey: env.LLM_API_KEY,
    modelName: env.LLM_MODEL_NAME,
    temperature: env.LLM_TEMPERATURE,
    maxTokens: env.LLM_MAX_TOKENS,
    timeoutMs: env.REQUEST_TIMEOUT_MS,
  };
}

// For testing purposes
export function clearEnvironmentCache(): void {
  cachedEnvironment = null;
}
