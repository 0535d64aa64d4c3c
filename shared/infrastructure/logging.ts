/**
 * Logging infrastructure for ragcrawl
 *
 * Structured logging for the application. Logs go to a rotating file by
 * default; stdout is never used because it carries the MCP transport.
 */

import fs from 'fs';
import path from 'path';
import { getConfig } from './config.js';

/**
 * Log level enumeration
 */
export enum LogLevel {
  ERROR = 'ERROR',
  WARN = 'WARN',
  INFO = 'INFO',
  DEBUG = 'DEBUG'
}

export type LogTarget = 'file' | 'stderr' | 'none';

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  /** Base directory for log files */
  logDir: string;

  /** Minimum log level to record */
  minLevel: LogLevel;

  /** File name for the log file */
  logFile: string;

  /** Maximum log file size before rotation (in bytes) */
  maxFileSize: number;

  /** Maximum number of rotated log files to keep */
  maxFiles: number;

  target: LogTarget;
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

function levelFromName(name: string): LogLevel {
  switch (name) {
    case 'debug': return LogLevel.DEBUG;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    default: return LogLevel.INFO;
  }
}

/**
 * Render metadata for a log line. Errors lose their fields under
 * JSON.stringify, so they are flattened first.
 */
export function formatMetadata(metadata: unknown): string {
  if (metadata === undefined || metadata === null) {
    return '';
  }
  if (metadata instanceof Error) {
    return JSON.stringify({ name: metadata.name, message: metadata.message, stack: metadata.stack });
  }
  if (typeof metadata === 'object') {
    try {
      return JSON.stringify(metadata, (_key, value: unknown) =>
        value instanceof Error ? { name: value.name, message: value.message } : value
      );
    } catch {
      return '[unserializable metadata]';
    }
  }
  return String(metadata);
}

/**
 * Class for structured logging
 */
export class Logger {
  private static instance: Logger | null = null;
  private config: LoggerConfig;
  private currentLogSize = 0;
  private logFilePath: string;
  private ready = false;

  private constructor(config: LoggerConfig) {
    this.config = config;
    this.logFilePath = path.join(config.logDir, config.logFile);
    this.setupLogger();
  }

  /**
   * Get the singleton logger instance
   */
  public static getInstance(): Logger {
    if (!Logger.instance) {
      const appConfig = getConfig();
      Logger.instance = new Logger({
        logDir: path.join(appConfig.dataDir, 'logs'),
        minLevel: levelFromName(appConfig.logLevel),
        logFile: 'ragcrawl.log',
        maxFileSize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        target: appConfig.logTarget
      });
    }

    return Logger.instance;
  }

  /**
   * Reconfigure the logger
   */
  public static configure(config: Partial<LoggerConfig>): void {
    const logger = Logger.getInstance();

    logger.config = {
      ...logger.config,
      ...config
    };
    logger.logFilePath = path.join(logger.config.logDir, logger.config.logFile);
    logger.setupLogger();
  }

  public getLogFilePath(): string {
    return this.logFilePath;
  }

  /**
   * Set up the logger (create directory, read current size)
   */
  private setupLogger(): void {
    this.ready = false;
    if (this.config.target !== 'file') {
      return;
    }

    try {
      fs.mkdirSync(this.config.logDir, { recursive: true });
      this.currentLogSize = fs.existsSync(this.logFilePath) ? fs.statSync(this.logFilePath).size : 0;
      this.ready = true;
    } catch (error) {
      // Fallback to stderr in case of setup failure
      process.stderr.write(`Failed to setup logger: ${formatMetadata(error)}\n`);
    }
  }

  /**
   * Rotate log file once it exceeds the maximum size.
   * ragcrawl.log -> ragcrawl.log.1 -> ... -> ragcrawl.log.<maxFiles>
   */
  private rotateLogFile(): void {
    if (this.currentLogSize < this.config.maxFileSize) {
      return;
    }

    const rotated = (index: number) => path.join(this.config.logDir, `${this.config.logFile}.${index}`);

    const oldest = rotated(this.config.maxFiles);
    if (fs.existsSync(oldest)) {
      fs.unlinkSync(oldest);
    }
    for (let i = this.config.maxFiles - 1; i > 0; i--) {
      if (fs.existsSync(rotated(i))) {
        fs.renameSync(rotated(i), rotated(i + 1));
      }
    }
    if (fs.existsSync(this.logFilePath)) {
      fs.renameSync(this.logFilePath, rotated(1));
    }

    this.currentLogSize = 0;
  }

  private writeLog(level: LogLevel, message: string, context: string, metadata?: unknown): void {
    if (this.config.target === 'none') {
      return;
    }
    if (LEVEL_ORDER.indexOf(level) > LEVEL_ORDER.indexOf(this.config.minLevel)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const meta = formatMetadata(metadata);
    const logEntry = `${timestamp} [${level}] [${context}] ${message}${meta ? ` ${meta}` : ''}\n`;

    if (this.config.target === 'stderr' || !this.ready) {
      process.stderr.write(logEntry);
      return;
    }

    try {
      this.rotateLogFile();
      fs.appendFileSync(this.logFilePath, logEntry);
      this.currentLogSize += Buffer.byteLength(logEntry);
    } catch (error) {
      // Fallback to stderr in case of write failure
      process.stderr.write(`Failed to write log: ${formatMetadata(error)}\n${logEntry}`);
    }
  }

  public error(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.ERROR, message, context, metadata);
  }

  public warn(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.WARN, message, context, metadata);
  }

  public info(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.INFO, message, context, metadata);
  }

  public debug(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.DEBUG, message, context, metadata);
  }

  /**
   * Log an error with stack trace
   * @param message Optional message to use instead of the error's own
   */
  public logError(error: Error, context: string, message?: string): void {
    this.error(message || error.message, context, {
      stack: error.stack,
      name: error.name,
      message: error.message
    });
  }
}

// Convenience function to get the logger instance
export function getLogger(): Logger {
  return Logger.getInstance();
}
