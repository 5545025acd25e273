import { LoggerService, LogLevel } from '@nestjs/common';
import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';

// Determine log directory based on environment
export const getLogDirectory = (): string => {
  if (process.env.LOG_DIR) {
    return process.env.LOG_DIR;
  }

  if (process.env.NODE_ENV === 'development') {
    // In development, log to project root
    return path.join(process.cwd(), 'logs');
  }

  // The player only runs on Linux boxes attached to a display
  return path.join(os.homedir(), '.config', 'scanplay', 'logs');
};

// Upper-case before colorize so the colour codes stay intact
const upperCaseLevel = winston.format((info) => {
  info.level = info.level.toUpperCase();
  return info;
});

// Custom format for better readability
const customFormat = winston.format.printf(({ level, message, timestamp, context, ...metadata }) => {
  let msg = `${timestamp} [${level}]`;
  if (context) {
    msg += ` [${context}]`;
  }
  msg += ` ${message}`;

  // Add metadata if present
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

export const consoleFormat = winston.format.combine(
  upperCaseLevel(),
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  customFormat,
);

export function createAppLogger(logDir: string = getLogDirectory(), level = 'info'): winston.Logger {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  return winston.createLogger({
    level,
    format: winston.format.combine(
      upperCaseLevel(),
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      customFormat,
    ),
    transports: [
      new winston.transports.Console({ format: consoleFormat }),
      // File transport for all logs
      new winston.transports.File({
        filename: path.join(logDir, 'scanplay.log'),
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true,
      }),
      // File transport for errors only
      new winston.transports.File({
        filename: path.join(logDir, 'scanplay-error.log'),
        level: 'error',
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true,
      }),
    ],
    exitOnError: false,
  });
}

/**
 * Routes Nest's Logger (used as `new Logger(Service.name)` everywhere) into winston
 */
export class WinstonLoggerService implements LoggerService {
  constructor(private readonly logger: winston.Logger) {}

  log(message: unknown, context?: string): void {
    this.write('info', message, context);
  }

  error(message: unknown, stackOrContext?: string, context?: string): void {
    // Nest passes (message, stack, context) for errors and (message, context) otherwise
    if (context !== undefined) {
      this.logger.log({ level: 'error', message: this.format(message), context, stack: stackOrContext });
      return;
    }
    this.write('error', message, stackOrContext);
  }

  warn(message: unknown, context?: string): void {
    this.write('warn', message, context);
  }

  debug(message: unknown, context?: string): void {
    this.write('debug', message, context);
  }

  verbose(message: unknown, context?: string): void {
    this.write('verbose', message, context);
  }

  setLogLevels(levels: LogLevel[]): void {
    if (levels.includes('verbose')) {
      this.logger.level = 'verbose';
    } else if (levels.includes('debug')) {
      this.logger.level = 'debug';
    }
  }

  private write(level: string, message: unknown, context?: string): void {
    this.logger.log({ level, message: this.format(message), context });
  }

  private format(message: unknown): string {
    if (typeof message === 'string') {
      return message;
    }
    if (message instanceof Error) {
      return message.stack ?? message.message;
    }
    return JSON.stringify(message);
  }
}
