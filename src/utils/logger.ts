import pino from 'pino';
import { getLogLevel } from '../config/environment';
import { APP_NAME } from '../config/constants';
import { getTransport } from './getTransport';

// Sensitive keys to redact from logs
const SENSITIVE_KEYS = ['LLM_API_KEY', 'apiKey', 'api_key', 'authorization', 'token', 'secret'];

function createRedactor(): (obj: Record<string, unknown>) => Record<string, unknown> {
  return (obj: Record<string, unknown>) => {
    const redacted = { ...obj };

    Object.keys(redacted).forEach(key => {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive.toLowerCase()))) {
        redacted[key] = '[REDACTED]';
      }
    });

    return redacted;
  };
}

function createLogger(): pino.Logger {
  const transport = getTransport();

  return pino({
    name: APP_NAME,
    level: getLogLevel(),
    ...(transport ? { transport } : {}),
    redact: {
      paths: SENSITIVE_KEYS,
      censor: '[REDACTED]',
    },
    formatters: {
      log: createRedactor(),
    },
  });
}

let cachedLogger: pino.Logger | null = null;
export function getLogger(): pino.Logger {
  if (!cachedLogger) cachedLogger = createLogger();
  return cachedLogger;
}

export const logger: pino.Logger = new Proxy({} as pino.Logger, {
  get: (_target, prop: string | symbol) => {
    const real = getLogger();

    const value: unknown = Reflect.get(real, prop);
    if (typeof value === 'function') {
      return value.bind(real);
    }
    return value;
  },
});

// Helper function to create child loggers with correlation IDs
export function createChildLogger(correlationId: string): pino.Logger {
  return getLogger().child({ correlationId });
}

// Helper function to generate correlation IDs
export function generateCorrelationId(): string {
  return `fpe-${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
}

export async function withTiming<T>(
  log: pino.Logger,
  event: string,
  fn: () => Promise<T>,
  fields?: Record<string, unknown>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    log.info({ event, durationMs: Date.now() - start, status: 'ok', ...(fields ?? {}) });
    return result;
  } catch (error) {
    log.error({ event, durationMs: Date.now() - start, error, ...(fields ?? {}) }, 'failed');
    throw error;
  }
}
