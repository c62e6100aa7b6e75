import winston from 'winston';
import type { LogLevel } from './types.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const consoleFormat = printf(({ level, message, timestamp: time, ...metadata }) => {
  let line = `${String(time)} [${level}] ${String(message)}`;
  if (Object.keys(metadata).length > 0) {
    line += ` ${JSON.stringify(metadata)}`;
  }
  return line;
});

function levelFromEnv(): LogLevel {
  const value = process.env['DEPSCOUT_LOG_LEVEL'];
  switch (value) {
    case 'silent':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
      return value;
    default:
      return 'warn';
  }
}

const initialLevel = levelFromEnv();

// stdout carries the report; every log level goes to stderr.
export const logger = winston.createLogger({
  level: initialLevel === 'silent' ? 'error' : initialLevel,
  silent: initialLevel === 'silent',
  format: combine(
    errors({ stack: true }),
    colorize(),
    timestamp({ format: 'HH:mm:ss' }),
    consoleFormat,
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
  exitOnError: false,
});

export function setLogLevel(level: LogLevel): void {
  if (level === 'silent') {
    logger.silent = true;
    return;
  }
  logger.silent = false;
  logger.level = level;
}
