/**
 * Codegen Engine - Logger
 *
 * Winston-based structured logging. Console output goes to stderr so that
 * stdout carries only the build report. Set CODEGEN_LOG_FILE to also keep
 * a JSON log of every run.
 */

import winston from 'winston';
import { config, type Config } from '../config.js';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

interface LogMetadata {
  runId?: string;
  dictionary?: string;
  model?: string;
  operation?: string;
  duration?: number;
  [key: string]: unknown;
}

const consoleLine = printf(({ level, message, timestamp: at, stack, ...metadata }) => {
  const fields = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  const trace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${String(at)} ${level.padEnd(5)} ${String(message)}${fields}${trace}`;
});

const root = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: combine(errors({ stack: true }), timestamp({ format: 'HH:mm:ss.SSS' })),
  defaultMeta: { service: config.serviceName },
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: combine(colorize({ level: config.nodeEnv === 'development' }), consoleLine),
    }),
  ],
});

if (config.logFile) {
  root.add(
    new winston.transports.File({
      filename: config.logFile,
      format: json(),
      maxsize: 5 * 1024 * 1024,
      maxFiles: 3,
    })
  );
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  child(defaultMetadata: LogMetadata): Logger;
}

class ScopedLogger implements Logger {
  constructor(private readonly target: winston.Logger) {}

  debug(message: string, metadata: LogMetadata = {}): void {
    this.target.debug(message, metadata);
  }

  info(message: string, metadata: LogMetadata = {}): void {
    this.target.info(message, metadata);
  }

  warn(message: string, metadata: LogMetadata = {}): void {
    this.target.warn(message, metadata);
  }

  error(message: string, error?: Error, metadata: LogMetadata = {}): void {
    this.target.error(message, {
      ...metadata,
      ...(error && { errorName: error.name, error: error.message, stack: error.stack }),
    });
  }

  child(defaultMetadata: LogMetadata): Logger {
    return new ScopedLogger(this.target.child(defaultMetadata));
  }
}

/**
 * Change the level at runtime (the CLI's --verbose flag).
 */
export function setLogLevel(level: Config['logLevel']): void {
  root.level = level;
}

export const log: Logger = new ScopedLogger(root);

export default log;
