/**
 * Observability Primitives
 *
 * Structured JSON logging for VitalGrid packages.
 *
 * Hard rules:
 * - All logs are JSON structured, one object per line
 * - DEBUG output only when VITALGRID_DEBUG=true or DEBUG is set
 *
 * @module @vitalgrid/core/reliability/observability
 */

import { VitalGridError } from './errors.js';

// =============================================================================
// Log Types
// =============================================================================

/**
 * Log levels
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** Log level */
  level: LogLevel;

  /** Log message */
  message: string;

  /** ISO timestamp */
  timestamp: string;

  /** Component name */
  component?: string;

  /** Additional structured data */
  data?: Record<string, unknown>;

  /** Error details if applicable */
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

// =============================================================================
// Logger
// =============================================================================

/**
 * Structured JSON logger
 */
export class Logger {
  private component: string;
  private context: Record<string, unknown>;

  constructor(component: string, context?: Record<string, unknown>) {
    this.component = component;
    this.context = context ?? {};
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(this.component, {
      ...this.context,
      ...additionalContext,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const errorData: LogEntry['error'] | undefined = error instanceof Error
      ? {
          name: error.name,
          message: error.message,
          code: error instanceof VitalGridError ? error.code : undefined,
          stack: error.stack,
        }
      : error
        ? { name: 'Error', message: String(error) }
        : undefined;

    this.log('ERROR', message, data, errorData);
  }

  /**
   * Core log method
   */
  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: LogEntry['error']
  ): void {
    if (level === 'DEBUG' && !isDebugEnabled()) {
      return;
    }

    const merged = { ...this.context, ...data };
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      component: this.component,
      data: Object.keys(merged).length > 0 ? merged : undefined,
      error,
    };

    // Clean up undefined fields
    const cleaned = Object.fromEntries(
      Object.entries(entry).filter(([, v]) => v !== undefined)
    );

    const output = JSON.stringify(cleaned);

    switch (level) {
      case 'DEBUG':
        console.debug(output);
        break;
      case 'INFO':
        console.info(output);
        break;
      case 'WARN':
        console.warn(output);
        break;
      case 'ERROR':
        console.error(output);
        break;
    }
  }
}

function isDebugEnabled(): boolean {
  return process.env.VITALGRID_DEBUG === 'true' || Boolean(process.env.DEBUG);
}

// =============================================================================
// Logger Factory
// =============================================================================

const loggers = new Map<string, Logger>();

/**
 * Get or create a logger for a component
 */
export function getLogger(component: string, context?: Record<string, unknown>): Logger {
  const key = context ? `${component}:${JSON.stringify(context)}` : component;

  let logger = loggers.get(key);
  if (!logger) {
    logger = new Logger(component, context);
    loggers.set(key, logger);
  }

  return logger;
}
