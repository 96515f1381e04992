/**
 * Voice Reshaper - Logger
 * Winston-based logging with daily file rotation and per-module tags
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { mkdirSync, existsSync } from 'fs';
import { getConfig } from '../config';

const DEFAULT_TAG = '[Reshaper]';

function formatMeta(meta: Record<string, unknown>): string {
  return Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
}

// Console output
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
    const moduleStr = module ? `[${String(module)}]` : DEFAULT_TAG;
    return `${String(timestamp)} ${level} ${moduleStr} ${String(message)}${formatMeta(meta)}`;
  })
);

// File output
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
    const moduleStr = module ? `[${String(module)}]` : DEFAULT_TAG;
    return `${String(timestamp)} ${level.toUpperCase().padEnd(5)} ${moduleStr} ${String(message)}${formatMeta(meta)}`;
  })
);

// Singleton logger instance
let loggerInstance: winston.Logger | null = null;
let isShuttingDown = false;

/**
 * Mark logger as shutting down to prevent write errors
 */
export function markLoggerShuttingDown(): void {
  isShuttingDown = true;
}

/**
 * Check if logger is shutting down
 */
export function isLoggerShuttingDown(): boolean {
  return isShuttingDown;
}

/**
 * Initialize the logger
 */
function initLogger(): winston.Logger {
  const config = getConfig();
  const logDir = config.logDir;
  const logLevel = config.logLevel;

  const transports: winston.transport[] = [];

  // Console is always attached so the logger has a sink; it is muted under test
  transports.push(
    new winston.transports.Console({
      format: consoleFormat,
      level: logLevel,
      silent: config.nodeEnv === 'test',
    })
  );

  if (config.logToFile) {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }

    transports.push(
      new DailyRotateFile({
        dirname: logDir,
        filename: 'reshaper-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: '20m',
        maxFiles: '14d',
        format: fileFormat,
        level: logLevel,
      })
    );

    // Errors only
    transports.push(
      new DailyRotateFile({
        dirname: logDir,
        filename: 'reshaper-error-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: '20m',
        maxFiles: '30d',
        format: fileFormat,
        level: 'error',
      })
    );
  }

  return winston.createLogger({
    level: logLevel,
    defaultMeta: {},
    transports,
    exitOnError: false,
  });
}

/**
 * Get the logger instance (creates if needed)
 */
export function getLogger(): winston.Logger {
  if (!loggerInstance) {
    loggerInstance = initLogger();
  }
  return loggerInstance;
}

/**
 * Create a child logger for a specific module
 */
export function createModuleLogger(moduleName: string): ModuleLogger {
  return new ModuleLogger(getLogger(), moduleName);
}

/**
 * Module-specific logger with convenience methods
 */
export class ModuleLogger {
  private logger: winston.Logger;
  private module: string;

  constructor(logger: winston.Logger, module: string) {
    this.logger = logger;
    this.module = module;
  }

  private safeLog(level: string, message: string, meta?: Record<string, unknown>): void {
    if (isShuttingDown) {
      return; // transports may already be closed
    }
    try {
      this.logger.log(level, message, { module: this.module, ...meta });
    } catch (error) {
      process.stderr.write(`[${this.module}] log write failed: ${String(error)}\n`);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.safeLog('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.safeLog('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.safeLog('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.safeLog('error', message, meta);
  }

  /**
   * Log with timing information
   */
  time(label: string): () => void {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(`${label} completed`, { duration: `${duration.toFixed(2)}ms` });
    };
  }

  /**
   * Log an error with stack trace
   */
  logError(error: Error, context?: string): void {
    this.error(context ? `${context}: ${error.message}` : error.message, {
      stack: error.stack,
      name: error.name,
    });
  }
}

/**
 * Performance timer utility
 */
export class PerformanceTimer {
  private timers: Map<string, number> = new Map();
  private logger: ModuleLogger;

  constructor(module: string) {
    this.logger = createModuleLogger(module);
  }

  start(label: string): void {
    this.timers.set(label, performance.now());
  }

  end(label: string): number {
    const start = this.timers.get(label);
    if (start === undefined) {
      this.logger.warn(`Timer '${label}' was not started`);
      return 0;
    }
    const duration = performance.now() - start;
    this.timers.delete(label);
    this.logger.debug(`${label}`, { duration: `${duration.toFixed(2)}ms` });
    return duration;
  }

  async measure<T>(label: string, fn: () => Promise<T>): Promise<T> {
    this.start(label);
    try {
      return await fn();
    } finally {
      this.end(label);
    }
  }
}

// Pre-created loggers for common modules
export const mainLogger = createModuleLogger('Main');

/**
 * Shutdown the logger (close file handles)
 */
export function shutdownLogger(): Promise<void> {
  isShuttingDown = true;

  return new Promise((resolve) => {
    const logger = loggerInstance;
    if (!logger) {
      resolve();
      return;
    }
    // Let pending writes drain before closing transports
    setTimeout(() => {
      logger.end();
      resolve();
    }, 100);
  });
}

export default getLogger;
