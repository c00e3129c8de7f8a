import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export const logger: Logger = pino({
  name: 'strata',
  level: process.env.LOG_LEVEL || 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    error: pino.stdSerializers.err,
    err: pino.stdSerializers.err,
  },
});

/**
 * Child logger tagged with the emitting component. Extra bindings (session id,
 * backend name) end up on every line the child writes.
 */
export function componentLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ component, ...bindings });
}

/**
 * Flatten an unknown thrown value into something pino can print without
 * dragging a whole response object into the log line.
 */
export function describeError(error: unknown): { name: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Unknown', message: String(error) };
}
