/**
 * Logger utility using Pino
 */
import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';
const underTest = process.env.VITEST !== undefined || process.env.NODE_ENV === 'test';

let transport: pino.DestinationStream | undefined;
if (!underTest && process.stdout.isTTY) {
  try {
    transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    });
  } catch {
    // pino-pretty not available, use default
  }
}

const rootLogger = transport
  ? pino({ level }, transport)
  : pino({ level: underTest ? process.env.LOG_LEVEL || 'silent' : level }, pino.destination(2));

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return rootLogger.child({ name });
}

export { rootLogger as logger };
