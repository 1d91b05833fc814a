import { createWriteStream } from 'fs';
import winston from 'winston';
import { getConfig, isProduction } from './config';

const config = getConfig();

const logger = winston.createLogger({
  level: config.LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'pingwatch' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      )
    })
  ],
});

// Add file transport in production
if (isProduction()) {
  logger.add(new winston.transports.File({
    filename: 'logs/pingwatch-error.log',
    level: 'error'
  }));
}

export { logger };

/**
 * Categories of the event log. Every line written to the event log carries
 * one of these as its tag, e.g. `2026/10/17 10:03:00 OUTAGE - Lost contact`.
 */
export type EventCategory = 'PING' | 'OUTAGE' | 'ERROR' | 'TRACE';

export interface CategoryLogger {
  log(message: string, details?: Record<string, unknown>): void;
}

export type EventLoggers = Record<EventCategory, CategoryLogger>;

export interface EventLoggerOptions {
  logFile: string;
  trace: boolean;
  console?: boolean;
}

export interface EventLogHandle {
  loggers: EventLoggers;
  /** Resolves once every line logged so far has been written to the file. */
  close(): Promise<void>;
}

export const eventLineFormat = winston.format.printf(info => {
  const line = `${String(info.timestamp)} ${String(info.category)} - ${String(info.message)}`;
  return info.details ? `${line} ${JSON.stringify(info.details)}` : line;
});

/**
 * Builds the event log: one winston logger appending to the configured file,
 * fronted by a logger per category. TRACE lines are written at debug level,
 * so they only reach the file when tracing is switched on.
 */
export const createEventLoggers = (options: EventLoggerOptions): EventLogHandle => {
  const stream = createWriteStream(options.logFile, { flags: 'a' });
  stream.on('error', error => {
    logger.error('Event log file failed', { logFile: options.logFile, error });
  });

  const file = new winston.transports.Stream({ stream });
  const transports = options.console ? [file, new winston.transports.Console()] : [file];

  const eventLog = winston.createLogger({
    level: options.trace ? 'debug' : 'info',
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY/MM/DD HH:mm:ss' }),
      eventLineFormat
    ),
    transports
  });

  eventLog.on('error', error => {
    logger.error('Event log write failed', { error });
  });

  const forCategory = (category: EventCategory): CategoryLogger => ({
    log: (message, details) => {
      eventLog.log({
        level: category === 'TRACE' ? 'debug' : 'info',
        message,
        category,
        ...(details ? { details } : {})
      });
    }
  });

  // The transport finishes once the logger has handed it every line; the
  // file stream finishes once those lines are on disk.
  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    if (!closing) {
      closing = new Promise<void>(resolve => {
        file.once('finish', () => {
          stream.end(() => resolve());
        });
        eventLog.end();
      });
    }
    return closing;
  };

  return {
    loggers: {
      PING: forCategory('PING'),
      OUTAGE: forCategory('OUTAGE'),
      ERROR: forCategory('ERROR'),
      TRACE: forCategory('TRACE'),
    },
    close
  };
};
