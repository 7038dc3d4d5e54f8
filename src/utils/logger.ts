/**
 * Structured Logger
 * Pino-backed logger wrapped in the project Logger interface
 */

import pino from 'pino';
import { Logger } from '../types';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  pretty: boolean;
  redactPaths?: string[];
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  pretty: process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test',
  redactPaths: [
    'config.credentials.apiKey',
    'storage.secretKey',
    'headers.authorization',
    'headers["x-api-key"]'
  ]
};

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value?.toLowerCase());
  return match ?? fallback;
}

export function createLogger(
  name: string,
  config: Partial<LoggerConfig> = {}
): Logger {
  const mergedConfig = { ...defaultConfig, ...config };

  const transport = mergedConfig.pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname'
        }
      }
    : undefined;

  const pinoLogger = pino({
    name,
    level: mergedConfig.level,
    transport,
    redact: {
      paths: mergedConfig.redactPaths || [],
      censor: '[REDACTED]'
    },
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        service: bindings.name,
        env: process.env.NODE_ENV || 'development'
      })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  });

  return wrapPinoLogger(pinoLogger);
}

function wrapPinoLogger(pinoLogger: pino.Logger): Logger {
  return {
    debug: (msg: string, data?: Record<string, unknown>) => {
      if (data) {
        pinoLogger.debug(data, msg);
      } else {
        pinoLogger.debug(msg);
      }
    },
    info: (msg: string, data?: Record<string, unknown>) => {
      if (data) {
        pinoLogger.info(data, msg);
      } else {
        pinoLogger.info(msg);
      }
    },
    warn: (msg: string, data?: Record<string, unknown>) => {
      if (data) {
        pinoLogger.warn(data, msg);
      } else {
        pinoLogger.warn(msg);
      }
    },
    error: (msg: string, data?: Record<string, unknown>) => {
      if (data) {
        pinoLogger.error(data, msg);
      } else {
        pinoLogger.error(msg);
      }
    },
    child: (bindings: Record<string, unknown>) => {
      return wrapPinoLogger(pinoLogger.child(bindings));
    }
  };
}

export default createLogger;
