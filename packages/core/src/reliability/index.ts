/**
 * Reliability Primitives
 *
 * This module provides:
 * - Error taxonomy for consistent failure handling
 * - Observability primitives (structured logging)
 *
 * @module @vitalgrid/core/reliability
 */

// Error taxonomy
export {
  type VitalGridErrorCode,
  type VitalGridErrorOptions,
  VitalGridError,
  ConfigurationError,
  ValidationError,
  NotFoundError,
  toExitCode,
  wrapError,
} from './errors.js';

// Observability
export {
  type LogLevel,
  type LogEntry,
  Logger,
  getLogger,
} from './observability.js';
