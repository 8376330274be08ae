// Logging for halkit: leveled records per component, written to a sink

import { HypermediaError } from './errors.js';

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

/**
 * Components that log
 */
export type LogScope = 'relations' | 'routes' | 'web' | 'config';

export type LogContext = Readonly<Record<string, unknown>>;

/**
 * A single log event as handed to the sink
 */
export interface LogRecord {
  level: LogLevel;
  scope?: LogScope;
  message: string;
  context?: LogContext;
  timestamp: Date;
}

/**
 * Receives every record that passes the level filter, with its rendered line
 */
export type LogSink = (record: LogRecord, line: string) => void;

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  timestamps: boolean;
  sink: LogSink;
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT'
};

const LEVEL_NAMES: ReadonlyMap<string, LogLevel> = new Map([
  ['debug', LogLevel.DEBUG],
  ['info', LogLevel.INFO],
  ['warn', LogLevel.WARN],
  ['error', LogLevel.ERROR],
  ['silent', LogLevel.SILENT]
]);

/**
 * Maps a configured level name onto a LogLevel
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_NAMES.get(name.toLowerCase());
}

/**
 * Writes each line to the console method matching its level
 */
export const consoleSink: LogSink = (record, line) => {
  switch (record.level) {
    case LogLevel.DEBUG:
      console.debug(line);
      break;
    case LogLevel.INFO:
      console.info(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    default:
      console.error(line);
  }
};

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  name: 'halkit',
  timestamps: false,
  sink: consoleSink
};

/**
 * Renders a record: `[time] [halkit:scope] [LEVEL] message {context}`
 */
export function formatRecord(record: LogRecord, config: Pick<LoggerConfig, 'name' | 'timestamps'>): string {
  const parts: string[] = [];

  if (config.timestamps) {
    parts.push(`[${record.timestamp.toISOString()}]`);
  }

  parts.push(record.scope ? `[${config.name}:${record.scope}]` : `[${config.name}]`);
  parts.push(`[${LEVEL_LABELS[record.level]}]`);
  parts.push(record.message);

  if (record.context && Object.keys(record.context).length > 0) {
    parts.push(JSON.stringify(record.context));
  }

  return parts.join(' ');
}

/**
 * Leveled logger; child loggers share their parent's configuration
 */
export class Logger {
  private config: LoggerConfig;
  private scope: LogScope | undefined;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Get singleton instance
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigure the singleton and every child created from it
   */
  static configure(config: Partial<LoggerConfig>): void {
    Object.assign(Logger.getInstance().config, config);
  }

  /**
   * A logger tagging its records with a component
   */
  child(scope: LogScope): Logger {
    const child = new Logger();
    child.config = this.config;
    child.scope = scope;
    return child;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && this.config.level <= level;
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  /**
   * Log an error with its stack; hypermedia errors add their code and status
   */
  exception(error: Error, context?: LogContext): void {
    const details = error instanceof HypermediaError
      ? { code: error.code, status: error.statusCode }
      : {};
    this.log(LogLevel.ERROR, error.message, { ...context, name: error.name, ...details, stack: error.stack });
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const record: LogRecord = { level, message, timestamp: new Date() };
    if (this.scope !== undefined) record.scope = this.scope;
    if (context !== undefined) record.context = context;
    this.config.sink(record, formatRecord(record, this.config));
  }
}

export const logger = Logger.getInstance();
