/**
 * Sampler Configuration
 *
 * Zod schemas for sampler settings and a loader that reads them from
 * environment variables.
 *
 * @module @vitalgrid/core/config
 */

import { z } from 'zod';
import { ConfigurationError } from '../reliability/errors.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_INTERVAL_MINUTES = 5;

/** One year; keeps grid arithmetic inside the Date range */
export const MAX_INTERVAL_MINUTES = 525_600;

export const ENV_INTERVAL_MINUTES = 'VITALGRID_INTERVAL_MINUTES';
export const ENV_EXCLUDE_BEFORE_START = 'VITALGRID_EXCLUDE_BEFORE_START';

// =============================================================================
// Schemas
// =============================================================================

/**
 * Interval width in whole minutes
 */
export const IntervalMinutesSchema = z
  .number({ invalid_type_error: 'Interval must be a number' })
  .int({ message: 'Interval must be a whole number of minutes' })
  .positive({ message: 'Interval must be a positive integer' })
  .max(MAX_INTERVAL_MINUTES, {
    message: `Interval must be at most ${MAX_INTERVAL_MINUTES} minutes (one year)`,
  });

/**
 * Sampler configuration
 */
export const SamplerConfigSchema = z.object({
  /** Default bucket width in minutes */
  intervalMinutes: IntervalMinutesSchema.default(DEFAULT_INTERVAL_MINUTES),
  /** Drop readings earlier than an explicit start of sampling */
  excludeBeforeStart: z.boolean().default(false),
});

export type SamplerConfig = z.infer<typeof SamplerConfigSchema>;

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate an interval width, throwing ConfigurationError when it is not a
 * positive integer of at most MAX_INTERVAL_MINUTES.
 *
 * @param setting - Name reported in the error (option or variable name)
 */
export function assertIntervalMinutes(value: unknown, setting = 'intervalMinutes'): number {
  const result = IntervalMinutesSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid ${setting}: ${result.error.issues[0].message} (got ${String(value)})`,
      { setting, context: { value } }
    );
  }
  return result.data;
}

// =============================================================================
// Environment Loader
// =============================================================================

function parseBooleanFlag(raw: string | undefined, variable: string): boolean | undefined {
  if (raw === undefined || raw === '') {
    return undefined;
  }

  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigurationError(
        `Invalid ${variable}: expected true or false (got ${raw})`,
        { setting: variable }
      );
  }
}

/**
 * Load sampler configuration from environment variables
 *
 * - VITALGRID_INTERVAL_MINUTES: default interval width (positive integer)
 * - VITALGRID_EXCLUDE_BEFORE_START: true/false
 */
export function loadSamplerConfig(env: NodeJS.ProcessEnv = process.env): SamplerConfig {
  const intervalRaw = env[ENV_INTERVAL_MINUTES];
  const intervalMinutes = intervalRaw === undefined || intervalRaw.trim() === ''
    ? DEFAULT_INTERVAL_MINUTES
    : assertIntervalMinutes(Number(intervalRaw), ENV_INTERVAL_MINUTES);

  return SamplerConfigSchema.parse({
    intervalMinutes,
    excludeBeforeStart: parseBooleanFlag(env[ENV_EXCLUDE_BEFORE_START], ENV_EXCLUDE_BEFORE_START),
  });
}
