import { injectable } from 'inversify';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export interface LogContext {
  requestId?: string;
  userId?: string;
  operation?: string;
  duration?: number;
  metadata?: Record<string, unknown>;
}

export interface ILogger {
  error(message: string, error?: Error, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  createChild(namespace: string): ILogger;
}

@injectable()
export class Logger implements ILogger {
  private readonly logger: winston.Logger;
  private readonly namespace: string;

  constructor(namespace: string = 'Gateway', parent?: winston.Logger) {
    this.namespace = namespace;
    this.logger = parent ?? this.createLogger();
  }

  private createLogger(): winston.Logger {
    const logDirectory = process.env.LOG_DIR || 'logs';

    const logFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ timestamp, level, message, namespace, context, error, stack }) => {
        const logEntry: Record<string, unknown> = {
          timestamp,
          level,
          namespace: namespace || this.namespace,
          message
        };

        if (context) {
          logEntry.context = context;
        }

        if (error) {
          logEntry.error = error;
        }

        if (stack) {
          logEntry.stack = stack;
        }

        return JSON.stringify(logEntry);
      })
    );

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, namespace }) => {
            return `${timestamp} [${level}] [${namespace || this.namespace}] ${message}`;
          })
        )
      })
    ];

    if (process.env.LOG_TO_FILE !== 'false') {
      transports.push(
        new DailyRotateFile({
          filename: `${logDirectory}/application-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: logFormat
        }),
        new DailyRotateFile({
          filename: `${logDirectory}/error-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          level: 'error',
          maxSize: '20m',
          maxFiles: '30d',
          format: logFormat
        })
      );
    }

    return winston.createLogger({
      level: process.env.LOG_LEVEL || 'info',
      format: logFormat,
      transports,
      exitOnError: false
    });
  }

  error(message: string, error?: Error, context?: LogContext): void {
    const logData: Record<string, unknown> = {
      namespace: this.namespace
    };

    if (context) {
      logData.context = context;
    }

    if (error) {
      logData.error = {
        name: error.name,
        message: error.message,
        stack: error.stack
      };
    }

    this.logger.error(message, logData);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, this.buildLogData(context));
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(message, this.buildLogData(context));
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, this.buildLogData(context));
  }

  createChild(namespace: string): ILogger {
    return new Logger(`${this.namespace}:${namespace}`, this.logger);
  }

  private buildLogData(context?: LogContext): Record<string, unknown> {
    const logData: Record<string, unknown> = {
      namespace: this.namespace
    };

    if (context) {
      logData.context = context;
    }

    return logData;
  }
}
