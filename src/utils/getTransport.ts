import type pino from 'pino';
import { getEnvironment } from '../config/environment';

const STDERR_DESTINATION = 2;

function isPrettyAvailable(): boolean {
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

/**
 * Logs always go to stderr so stdout stays clean for rendered tables,
 * CSV and JSON. Tests log without a worker-thread transport.
 */
export function getTransport(): pino.TransportSingleOptions | undefined {
  const env = getEnvironment();

  if (env.NODE_ENV === 'test') {
    return undefined;
  }

  if (env.NODE_ENV === 'development' && isPrettyAvailable()) {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        destination: STDERR_DESTINATION,
      },
    };
  }

  return { target: 'pino/file', options: { destination: STDERR_DESTINATION } };
}
