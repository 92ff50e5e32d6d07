// src/logger.ts
import pino, { Logger, LoggerOptions } from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isDev = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : isDev ? 'debug' : 'info'),
  base: {
    app: process.env.APP_NAME ?? 'advocate-reply',
    env: nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime, // ISO 8601
  // redact common secrets everywhere (headers, config, payloads)
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'headers.authorization',
      '*.apiKey',
      '*.token',
      '*.secret',
    ],
    remove: true,
  },
  formatters: {
    level(label) {
      return { level: label }; // keep { level: 'info' }
    },
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
};

const transport =
  isDev
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard', singleLine: false } }
    : undefined;

// Optional file logging (instead of stdout)
const logToFile = (process.env.LOG_TO_FILE ?? '').trim();
const destination = !logToFile
  ? undefined
  : pino.destination({ dest: logToFile, sync: false, mkdir: true });

export const logger: Logger =
  destination
    ? pino({ ...baseOptions }, destination)
    : pino({ ...baseOptions, transport });

/**
 * Create a child logger tagged with a component/module name.
 * Usage: const log = getLogger('pipeline'); log.info('run complete');
 */
export function getLogger(component: string, bindings?: Record<string, unknown>): Logger {
  return logger.child({ component, ...(bindings ?? {}) });
}
