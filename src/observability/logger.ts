import pino from 'pino';
import { env } from '../config/env';

const options: pino.LoggerOptions = {
  level: env.logLevel,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
};

// stdout carries the analysis result, so logs go to stderr
export const logger =
  env.nodeEnv === 'development'
    ? pino({ ...options, transport: { target: 'pino/file', options: { destination: 2 } } })
    : pino(options, pino.destination(2));

/** Create a child logger bound to one analysis run */
export function runLogger(runId: string, extra?: Record<string, unknown>): pino.Logger {
  return logger.child({ runId, ...extra });
}
