import { pino, destination, type Logger } from 'pino';

/**
 * The slice of pino the services log through. Fastify's `request.log` and
 * `fastify.log` satisfy it as well as a standalone pino instance.
 */
export type ServiceLogger = Pick<Logger, 'info' | 'warn' | 'error' | 'debug'>;

/**
 * Standalone logger for the command line. Writes to stderr so stdout carries
 * only the rate lines.
 */
export function createCliLogger(level: string = process.env.LOG_LEVEL || 'warn'): Logger {
  return pino({ name: 'boc-fx-rates', level }, destination(2));
}
