import { Injectable, LoggerService as NestLoggerService, Scope } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogContext = Record<string, unknown>;

type LogEntry = {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: string;
  contentId?: string;
  data?: LogContext;
};

export type LogSink = (line: string) => void;

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const parseLogLevel = (raw: string | undefined): LogLevel =>
  LEVEL_ORDER.find((level) => level === (raw || '').trim().toLowerCase()) ?? LogLevel.INFO;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Structured logger installed as the application logger by the batch entry point.
 * Writes to stderr so that stdout carries only the exported results.
 * JSON lines in production, a coloured one-line form otherwise.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class LoggerService implements NestLoggerService {
  private readonly level: LogLevel;
  private readonly isProduction: boolean;
  private readonly sink: LogSink;
  private context?: string;
  private contentId?: string;

  constructor(private readonly config: ConfigService) {
    this.level = parseLogLevel(this.config.get<string>('LOG_LEVEL'));
    this.isProduction = this.config.get<string>('NODE_ENV') === 'production';
    this.sink = stderrSink;
  }

  setContext(context: string): this {
    this.context = context;
    return this;
  }

  /** Tags subsequent entries with the content item being processed. */
  setContentId(contentId: string | undefined): this {
    this.contentId = contentId;
    return this;
  }

  debug(message: string, data?: LogContext | string): void {
    this.writeLog(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogContext | string): void {
    this.writeLog(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogContext | string): void {
    this.writeLog(LogLevel.WARN, message, data);
  }

  error(message: string, error?: Error | LogContext | string, context?: string): void {
    if (error instanceof Error) {
      this.writeLog(LogLevel.ERROR, message, { name: error.name, message: error.message }, context);
      return;
    }
    if (typeof error === 'string') {
      // Nest passes (message, stack, context)
      this.writeLog(LogLevel.ERROR, message, { stack: error }, context);
      return;
    }
    this.writeLog(LogLevel.ERROR, message, error, context);
  }

  log(message: string, data?: LogContext | string): void {
    this.writeLog(LogLevel.INFO, message, data);
  }

  verbose(message: string, data?: LogContext | string): void {
    this.debug(message, data);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  private writeLog(
    level: LogLevel,
    message: string,
    data?: LogContext | string,
    contextOverride?: string,
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const context = contextOverride ?? (typeof data === 'string' ? data : this.context);
    const payload = typeof data === 'string' ? undefined : data;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...(context && { context }),
      ...(this.contentId && { contentId: this.contentId }),
      ...(payload && { data: payload }),
    };

    this.sink(this.isProduction ? JSON.stringify(entry) : this.format(entry));
  }

  private format(entry: LogEntry): string {
    const { level, message, timestamp, context, contentId, data } = entry;
    const prefix = [
      this.colorizeLevel(level),
      timestamp,
      context && `[${context}]`,
      contentId && `content:${contentId}`,
    ]
      .filter(Boolean)
      .join(' ');

    if (data && Object.keys(data).length > 0) {
      return `${prefix} ${message} ${JSON.stringify(data)}`;
    }
    return `${prefix} ${message}`;
  }

  private colorizeLevel(level: LogLevel): string {
    const colors = {
      [LogLevel.DEBUG]: '\x1b[36m',
      [LogLevel.INFO]: '\x1b[32m',
      [LogLevel.WARN]: '\x1b[33m',
      [LogLevel.ERROR]: '\x1b[31m',
    };
    const reset = '\x1b[0m';
    return `${colors[level]}${level.toUpperCase()}${reset}`;
  }
}
