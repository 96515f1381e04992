/**
 * Voice Reshaper - Error Handling Utilities
 * Error hierarchy and process-level error handlers
 */

import { createModuleLogger } from './logger';
import { getErrorMessage } from '../../shared/utils';
import type { SerializedError } from '../../shared/types/workers';

const errorLogger = createModuleLogger('Error');

// ============================================================================
// Custom Error Types
// ============================================================================

export class ReshaperError extends Error {
  constructor(
    message: string,
    public code: string,
    public recoverable: boolean = true,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ReshaperError';
    Error.captureStackTrace(this, ReshaperError);
  }
}

/**
 * Unreadable, empty, unsupported or over-long audio
 */
export class InputError extends ReshaperError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INPUT_ERROR', true, context);
    this.name = 'InputError';
  }
}

export class ProcessingError extends ReshaperError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PROCESSING_ERROR', true, context);
    this.name = 'ProcessingError';
  }
}

export class JobTimeoutError extends ReshaperError {
  constructor(
    public jobId: string,
    public timeoutMs: number
  ) {
    super(`Job ${jobId} exceeded timeout of ${timeoutMs}ms`, 'JOB_TIMEOUT', true, {
      jobId,
      timeoutMs,
    });
    this.name = 'JobTimeoutError';
  }
}

export class NotFoundError extends ReshaperError {
  constructor(
    public resource: string,
    public id: string
  ) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', true, { resource, id });
    this.name = 'NotFoundError';
  }
}

export class ConfigError extends ReshaperError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', false, context);
    this.name = 'ConfigError';
  }
}

/**
 * Pass ReshaperErrors through; wrap anything else in a ProcessingError
 */
export function toReshaperError(error: unknown, context?: Record<string, unknown>): ReshaperError {
  if (error instanceof ReshaperError) {
    return error;
  }
  const wrapped = new ProcessingError(getErrorMessage(error, 'Unknown processing failure'), context);
  if (error instanceof Error && error.stack) {
    wrapped.stack = error.stack;
  }
  return wrapped;
}

/**
 * Plain form of an error, for posting across a worker boundary
 */
export function serializeError(error: unknown): SerializedError {
  const reshaped = toReshaperError(error);
  return { message: reshaped.message, code: reshaped.code, recoverable: reshaped.recoverable };
}

/**
 * Rebuild an error posted by a worker thread
 */
export function deserializeError(error: SerializedError): ReshaperError {
  switch (error.code) {
    case 'INPUT_ERROR':
      return new InputError(error.message);
    case 'PROCESSING_ERROR':
      return new ProcessingError(error.message);
    default:
      return new ReshaperError(error.message, error.code, error.recoverable);
  }
}

// ============================================================================
// Global Error Handler
// ============================================================================

export interface GlobalErrorHandlerOptions {
  /** Exit the process after an uncaught exception */
  exitOnCritical?: boolean;
  /** Called before exiting on a critical error */
  onCritical?: (error: Error) => Promise<void>;
}

let globalErrorHandlerInstalled = false;
let globalOptions: GlobalErrorHandlerOptions = {};

/**
 * Install global error handlers for the process
 */
export function installGlobalErrorHandler(options: GlobalErrorHandlerOptions = {}): void {
  if (globalErrorHandlerInstalled) {
    errorLogger.warn('Global error handler already installed');
    return;
  }

  globalOptions = {
    exitOnCritical: process.env.NODE_ENV === 'production',
    ...options,
  };

  process.on('uncaughtException', (error: Error) => {
    errorLogger.error('Uncaught Exception', {
      message: error.message,
      stack: error.stack,
      name: error.name,
    });

    void handleCriticalError(error);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));

    errorLogger.error('Unhandled Promise Rejection', {
      message: error.message,
      stack: error.stack,
      reason: String(reason),
    });
  });

  process.on('warning', (warning: Error) => {
    errorLogger.warn('Process Warning', {
      message: warning.message,
      stack: warning.stack,
      name: warning.name,
    });
  });

  globalErrorHandlerInstalled = true;
  errorLogger.info('Global error handler installed');
}

async function handleCriticalError(error: Error): Promise<void> {
  if (globalOptions.onCritical) {
    try {
      await globalOptions.onCritical(error);
    } catch (hookError) {
      errorLogger.error('Critical error hook failed', {
        message: getErrorMessage(hookError),
      });
    }
  }

  if (globalOptions.exitOnCritical) {
    process.exit(1);
  }
}

export { errorLogger };
