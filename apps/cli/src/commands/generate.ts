/**
 * vitalgrid generate command
 *
 * Produces random demonstration measurements spread over one hour, either
 * as JSON (readable by `vitalgrid sample`) or already resampled.
 */

import { ValidationError } from '@vitalgrid/core';
import {
  MEASUREMENT_TYPES,
  createIntervalSamplerFromEnv,
  createMeasurement,
  formatSampledData,
  parseTimestamp,
  truncateToSecond,
  wallClockNow,
  type Measurement,
  type MeasurementType,
} from '@vitalgrid/sampler';
import { toMeasurementJson, toResamplingOptions } from './sample.js';

const DEFAULT_COUNT = 100;
const SPREAD_SECONDS = 3600;

/**
 * Plausible value range per channel
 */
const VALUE_RANGES: Record<MeasurementType, { min: number; max: number }> = {
  SPO2: { min: 90, max: 100 },
  HR: { min: 50, max: 120 },
  TEMP: { min: 30, max: 40 },
};

export interface GenerateOptions {
  /** Number of measurements (raw CLI text) */
  count?: string;
  /** First possible timestamp; defaults to the local wall-clock time */
  start?: string;
  /** Interval override used with --sample */
  interval?: string;
  /** Print the resampled form instead of raw JSON */
  sample?: boolean;
  /** With --sample, print one section per type */
  groupByType?: boolean;
}

/**
 * Generate random measurements
 *
 * @param random - Source of numbers in [0, 1)
 */
export function generateMeasurements(
  count: number,
  start: Date,
  random: () => number = Math.random
): Measurement[] {
  const startMs = truncateToSecond(start).getTime();
  const measurements: Measurement[] = [];

  for (let i = 0; i < count; i++) {
    const offsetSeconds = Math.floor(random() * (SPREAD_SECONDS + 1));
    const type = MEASUREMENT_TYPES[Math.floor(random() * MEASUREMENT_TYPES.length)];
    const { min, max } = VALUE_RANGES[type];
    const value = Math.round((min + random() * (max - min)) * 100) / 100;

    measurements.push(createMeasurement({
      timestamp: new Date(startMs + offsetSeconds * 1000),
      type,
      value,
    }));
  }

  return measurements;
}

function parseCount(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_COUNT;
  }

  const count = Number(raw);
  if (!Number.isInteger(count) || count < 0) {
    throw new ValidationError(`Invalid count: ${raw} (expected a non-negative integer)`, {
      fieldErrors: { count: 'Expected a non-negative integer' },
    });
  }
  return count;
}

/**
 * Run the generate command
 */
export async function generateCommand(
  options: GenerateOptions = {},
  random: () => number = Math.random
): Promise<void> {
  const count = parseCount(options.count);
  const start = options.start === undefined ? wallClockNow() : parseTimestamp(options.start);
  const measurements = generateMeasurements(count, start, random);

  if (!options.sample) {
    console.log(JSON.stringify(measurements.map(toMeasurementJson), null, 2));
    return;
  }

  const sampler = createIntervalSamplerFromEnv();
  const resampling = toResamplingOptions({ interval: options.interval });
  const sampled = options.groupByType
    ? sampler.resampleGroupedByType(measurements, resampling)
    : sampler.resample(measurements, resampling);

  formatSampledData(sampled).forEach((line) => console.log(line));
}
