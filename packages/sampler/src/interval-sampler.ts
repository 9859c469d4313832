/**
 * Interval Sampler
 *
 * Maps irregularly timed measurements onto a fixed-width time grid and keeps
 * one representative reading per (grid line, measurement type).
 *
 * Each reading moves up to the first grid line at or after its timestamp. A
 * reading exactly on a grid line stays there. Within a bucket the reading
 * with the latest timestamp wins; among equal timestamps the one that comes
 * later in the input wins.
 */

import {
  DEFAULT_INTERVAL_MINUTES,
  ValidationError,
  assertIntervalMinutes,
  getLogger,
  loadSamplerConfig,
} from '@vitalgrid/core';
import {
  MEASUREMENT_TYPES,
  compareMeasurementTypes,
  type Measurement,
  type MeasurementType,
} from './models/index.js';

const logger = getLogger('interval-sampler');

const MS_PER_MINUTE = 60 * 1000;

// =============================================================================
// Types
// =============================================================================

/**
 * Per-call overrides
 */
export interface ResamplingOptions {
  /** Bucket width in minutes; defaults to the sampler's interval */
  intervalMinutes?: number;
  /** Grid anchor; defaults to the earliest reading aligned down onto the grid */
  startOfSampling?: Date;
  /** Drop readings earlier than startOfSampling instead of folding them into its bucket */
  excludeBeforeStart?: boolean;
}

/**
 * Construction options besides the interval
 */
export interface IntervalSamplerOptions {
  /** Default for ResamplingOptions.excludeBeforeStart */
  excludeBeforeStart?: boolean;
}

interface BucketGroup {
  boundary: number;
  type: MeasurementType;
  selected: Measurement;
}

// =============================================================================
// Grid Helpers
// =============================================================================

/**
 * Align a timestamp down onto the epoch-based grid of the given width.
 * For widths that divide an hour this is the clock grid (:00, :05, ...).
 */
export function alignToGrid(timestamp: Date, intervalMinutes: number): Date {
  const intervalMs = intervalMinutes * MS_PER_MINUTE;
  return new Date(Math.floor(timestamp.getTime() / intervalMs) * intervalMs);
}

/**
 * First grid line `anchor + k * interval` (k >= 0) at or after the timestamp
 */
export function bucketBoundary(timestamp: Date, anchor: Date, intervalMinutes: number): Date {
  const intervalMs = intervalMinutes * MS_PER_MINUTE;
  const offset = timestamp.getTime() - anchor.getTime();
  const steps = offset <= 0 ? 0 : Math.ceil(offset / intervalMs);
  return new Date(anchor.getTime() + steps * intervalMs);
}

function earliestTimestamp(measurements: readonly Measurement[]): Date {
  let earliest = measurements[0].timestamp;
  for (const measurement of measurements) {
    if (measurement.timestamp.getTime() < earliest.getTime()) {
      earliest = measurement.timestamp;
    }
  }
  return earliest;
}

function assertValidDate(date: Date, field: string): void {
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid ${field}: not a valid date`, {
      fieldErrors: { [field]: 'Invalid date' },
    });
  }
}

// =============================================================================
// IntervalSampler
// =============================================================================

/**
 * Resamples measurements onto a regular grid
 *
 * @example
 * ```typescript
 * const sampler = new IntervalSampler(5);
 * const sampled = sampler.resample(measurements);
 * const spo2Only = sampler.resampleByType(measurements, 'SPO2', { intervalMinutes: 10 });
 * ```
 */
export class IntervalSampler {
  readonly intervalMinutes: number;
  readonly excludeBeforeStart: boolean;

  /**
   * @throws ConfigurationError when the interval is not a positive integer
   */
  constructor(
    intervalMinutes: number = DEFAULT_INTERVAL_MINUTES,
    options: IntervalSamplerOptions = {}
  ) {
    this.intervalMinutes = assertIntervalMinutes(intervalMinutes, 'intervalMinutes');
    this.excludeBeforeStart = options.excludeBeforeStart ?? false;
  }

  /**
   * Resample measurements of every type
   *
   * @returns One record per occupied (grid line, type), sorted by grid line
   *   then canonical type order. Each record carries the grid line as its
   *   timestamp.
   * @throws ConfigurationError when options.intervalMinutes is invalid
   */
  resample(
    measurements: readonly Measurement[],
    options: ResamplingOptions = {}
  ): Measurement[] {
    const intervalMinutes = options.intervalMinutes === undefined
      ? this.intervalMinutes
      : assertIntervalMinutes(options.intervalMinutes, 'intervalMinutes');
    const start = options.startOfSampling;
    if (start) {
      assertValidDate(start, 'startOfSampling');
    }
    const excludeBeforeStart = options.excludeBeforeStart ?? this.excludeBeforeStart;

    const candidates = start && excludeBeforeStart
      ? measurements.filter((m) => m.timestamp.getTime() >= start.getTime())
      : measurements;

    if (candidates.length === 0) {
      return [];
    }

    const anchor = start ?? alignToGrid(earliestTimestamp(candidates), intervalMinutes);
    const groups = new Map<string, BucketGroup>();

    for (const measurement of candidates) {
      assertValidDate(measurement.timestamp, 'timestamp');

      const boundary = bucketBoundary(measurement.timestamp, anchor, intervalMinutes).getTime();
      const key = `${boundary}|${measurement.type}`;
      const group = groups.get(key);

      if (!group) {
        groups.set(key, { boundary, type: measurement.type, selected: measurement });
      } else if (measurement.timestamp.getTime() >= group.selected.timestamp.getTime()) {
        group.selected = measurement;
      }
    }

    const sampled = Array.from(groups.values())
      .sort((a, b) => a.boundary - b.boundary || compareMeasurementTypes(a.type, b.type))
      .map((group): Measurement => Object.freeze({
        timestamp: new Date(group.boundary),
        type: group.type,
        value: group.selected.value,
      }));

    logger.debug('Resampled measurements', {
      inputCount: measurements.length,
      outputCount: sampled.length,
      droppedBeforeStart: measurements.length - candidates.length,
      intervalMinutes,
      anchor: anchor.toISOString(),
    });

    return sampled;
  }

  /**
   * Resample only the measurements of one type
   */
  resampleByType(
    measurements: readonly Measurement[],
    type: MeasurementType,
    options: ResamplingOptions = {}
  ): Measurement[] {
    return this.resample(
      measurements.filter((m) => m.type === type),
      options
    );
  }

  /**
   * Resample every type and split the result into one list per type.
   * Keys follow canonical type order; types absent from the input have no key.
   */
  resampleGroupedByType(
    measurements: readonly Measurement[],
    options: ResamplingOptions = {}
  ): Map<MeasurementType, Measurement[]> {
    const sampled = this.resample(measurements, options);
    const grouped = new Map<MeasurementType, Measurement[]>();

    for (const type of MEASUREMENT_TYPES) {
      const ofType = sampled.filter((m) => m.type === type);
      if (ofType.length > 0) {
        grouped.set(type, ofType);
      }
    }

    return grouped;
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create an interval sampler
 */
export function createIntervalSampler(
  intervalMinutes?: number,
  options?: IntervalSamplerOptions
): IntervalSampler {
  return new IntervalSampler(intervalMinutes, options);
}

/**
 * Create an interval sampler from VITALGRID_* environment variables
 */
export function createIntervalSamplerFromEnv(
  env: NodeJS.ProcessEnv = process.env
): IntervalSampler {
  const config = loadSamplerConfig(env);
  return new IntervalSampler(config.intervalMinutes, {
    excludeBeforeStart: config.excludeBeforeStart,
  });
}
