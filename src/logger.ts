/**
 * Logger Module
 *
 * Winston-based logging: JSON lines in production, colorized single-line
 * output for local development.
 *
 * Supports both:
 * - logger.info('message')
 * - logger.info({ key: value }, 'message')
 */

import winston from 'winston';

// Read directly from env so config.ts can import the logger
const logLevel = process.env.LOG_LEVEL || 'info';
const nodeEnv = process.env.NODE_ENV || 'development';

const formatForProduction = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const formatForDev = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp, ...meta }) => {
    const keys = Object.keys(meta).filter((k) => k !== 'service');
    const metaStr = keys.length ? ' ' + JSON.stringify(meta) : '';
    return `${timestamp} ${level}: ${message}${metaStr}`;
  })
);

const winstonLogger = winston.createLogger({
  level: logLevel,
  format: nodeEnv === 'production' ? formatForProduction : formatForDev,
  defaultMeta: { service: 'phonebridge' },
  transports: [new winston.transports.Console()],
  silent: nodeEnv === 'test',
});

type LogLevel = 'info' | 'warn' | 'error' | 'debug';
type LogFn = (metaOrMessage: string | Record<string, unknown>, message?: string) => void;

export interface Logger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
  child: (context: Record<string, unknown>) => Logger;
}

function createLogFn(target: winston.Logger, level: LogLevel): LogFn {
  return (metaOrMessage, message) => {
    if (typeof metaOrMessage === 'string') {
      target.log(level, metaOrMessage);
    } else if (message) {
      target.log(level, message, metaOrMessage);
    } else {
      target.log(level, JSON.stringify(metaOrMessage));
    }
  };
}

function wrap(target: winston.Logger): Logger {
  return {
    info: createLogFn(target, 'info'),
    warn: createLogFn(target, 'warn'),
    error: createLogFn(target, 'error'),
    debug: createLogFn(target, 'debug'),
    child: (context) => wrap(target.child(context)),
  };
}

export const logger: Logger = wrap(winstonLogger);
