/**
 * Error Taxonomy
 *
 * Standard error types shared by every VitalGrid package.
 *
 * Hard rules:
 * - Every error has a code for programmatic handling
 * - Every error maps to an exit code
 * - Errors are thrown to the caller, never logged and dropped
 *
 * @module @vitalgrid/core/reliability/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard VitalGrid error codes
 */
export type VitalGridErrorCode =
  // Caller errors
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'NOT_FOUND'

  // Internal errors
  | 'INTERNAL_ERROR'
  | 'UNHANDLED_ERROR';

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * VitalGrid error options
 */
export interface VitalGridErrorOptions {
  /** Error code */
  code: VitalGridErrorCode;

  /** Additional context for debugging */
  context?: Record<string, unknown>;

  /** Underlying cause */
  cause?: Error;
}

/**
 * Base VitalGrid error class
 *
 * All VitalGrid errors extend this for consistent handling.
 */
export class VitalGridError extends Error {
  readonly code: VitalGridErrorCode;
  readonly context?: Record<string, unknown>;
  readonly cause?: Error;
  readonly timestamp: Date;

  constructor(message: string, options: VitalGridErrorOptions) {
    super(message);
    this.name = 'VitalGridError';
    this.code = options.code;
    this.context = options.context;
    this.cause = options.cause;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

// =============================================================================
// Specific Error Types
// =============================================================================

/**
 * Configuration error - a setting (interval width, env variable) is unusable
 */
export class ConfigurationError extends VitalGridError {
  readonly setting?: string;

  constructor(
    message: string,
    options?: {
      setting?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      context: options?.context,
    });
    this.name = 'ConfigurationError';
    this.setting = options?.setting;
  }
}

/**
 * Validation error - input failed validation
 */
export class ValidationError extends VitalGridError {
  readonly fieldErrors?: Record<string, string>;

  constructor(
    message: string,
    options?: {
      fieldErrors?: Record<string, string>;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, {
      code: 'VALIDATION_ERROR',
      context: options?.context,
    });
    this.name = 'ValidationError';
    this.fieldErrors = options?.fieldErrors;
  }
}

/**
 * Not found error - a referenced file or resource does not exist
 */
export class NotFoundError extends VitalGridError {
  readonly resource: string;

  constructor(resource: string, options?: { context?: Record<string, unknown> }) {
    super(`Not found: ${resource}`, {
      code: 'NOT_FOUND',
      context: options?.context,
    });
    this.name = 'NotFoundError';
    this.resource = resource;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Map error to CLI exit code
 */
export function toExitCode(error: unknown): number {
  if (!(error instanceof VitalGridError)) {
    return 1; // Generic error
  }

  switch (error.code) {
    // Caller errors (20-29)
    case 'VALIDATION_ERROR':
      return 20;
    case 'NOT_FOUND':
      return 21;

    // Internal errors (40-49)
    case 'INTERNAL_ERROR':
      return 40;
    case 'CONFIGURATION_ERROR':
      return 41;
    case 'UNHANDLED_ERROR':
      return 42;

    default:
      return 1;
  }
}

/**
 * Wrap any error as a VitalGridError
 */
export function wrapError(
  error: unknown,
  defaults?: Partial<VitalGridErrorOptions>
): VitalGridError {
  if (error instanceof VitalGridError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new VitalGridError(message, {
    code: defaults?.code ?? 'UNHANDLED_ERROR',
    cause,
    ...defaults,
  });
}
