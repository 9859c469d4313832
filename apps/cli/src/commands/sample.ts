/**
 * vitalgrid sample command
 *
 * Reads a JSON array of measurements and prints it resampled onto the
 * interval grid.
 */

import { readFile } from 'node:fs/promises';
import chalk from 'chalk';
import { NotFoundError, ValidationError, getLogger } from '@vitalgrid/core';
import {
  MEASUREMENT_TYPES,
  MEASUREMENT_TYPE_LABELS,
  MeasurementTypeSchema,
  createIntervalSamplerFromEnv,
  formatSampledData,
  formatTimestamp,
  parseMeasurements,
  parseTimestamp,
  type Measurement,
  type MeasurementType,
  type ResamplingOptions,
} from '@vitalgrid/sampler';

const logger = getLogger('cli');

export interface SampleOptions {
  /** Interval override in minutes (raw CLI text) */
  interval?: string;
  /** Start of sampling timestamp */
  start?: string;
  /** Resample only this type */
  type?: string;
  /** Print one section per type */
  groupByType?: boolean;
  /** Drop readings before --start */
  excludeBeforeStart?: boolean;
  /** Output as JSON */
  json?: boolean;
}

/**
 * JSON form of a measurement, as read by `vitalgrid sample`
 */
export interface MeasurementJson {
  timestamp: string;
  type: MeasurementType;
  value: number;
}

export function toMeasurementJson(measurement: Measurement): MeasurementJson {
  return {
    timestamp: formatTimestamp(measurement.timestamp),
    type: measurement.type,
    value: measurement.value,
  };
}

/**
 * Turn CLI option text into resampling options
 */
export function toResamplingOptions(options: SampleOptions): ResamplingOptions {
  const resampling: ResamplingOptions = {};

  if (options.interval !== undefined) {
    // Validated (and rejected when not a positive integer) by the sampler
    resampling.intervalMinutes = Number(options.interval);
  }
  if (options.start !== undefined) {
    resampling.startOfSampling = parseTimestamp(options.start);
  }
  if (options.excludeBeforeStart) {
    resampling.excludeBeforeStart = true;
  }

  return resampling;
}

function describeTypes(): string {
  return MEASUREMENT_TYPES.map((type) => `${type} (${MEASUREMENT_TYPE_LABELS[type]})`).join(', ');
}

function parseTypeOption(type: string): MeasurementType {
  const result = MeasurementTypeSchema.safeParse(type.toUpperCase());
  if (!result.success) {
    throw new ValidationError(
      `Unknown measurement type: ${type} (expected one of ${describeTypes()})`,
      { fieldErrors: { type: 'Unknown measurement type' } }
    );
  }
  return result.data;
}

/**
 * Load measurements from a JSON file
 */
export async function loadMeasurements(file: string): Promise<Measurement[]> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new NotFoundError(file);
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(
      `Invalid JSON in ${file}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseMeasurements(data);
}

/**
 * Run the sample command
 */
export async function sampleCommand(file: string, options: SampleOptions = {}): Promise<void> {
  const measurements = await loadMeasurements(file);
  const type = options.type === undefined ? undefined : parseTypeOption(options.type);
  const sampler = createIntervalSamplerFromEnv();
  const resampling = toResamplingOptions(options);

  logger.debug('Sampling file', { file, count: measurements.length });

  if (options.groupByType) {
    const selected = type === undefined
      ? measurements
      : measurements.filter((m) => m.type === type);
    const grouped = sampler.resampleGroupedByType(selected, resampling);

    if (options.json) {
      const output: Record<string, MeasurementJson[]> = {};
      for (const [groupType, records] of grouped) {
        output[groupType] = records.map(toMeasurementJson);
      }
      console.log(JSON.stringify(output, null, 2));
      return;
    }

    formatSampledData(grouped).forEach((line) => console.log(line));
    return;
  }

  const sampled = type === undefined
    ? sampler.resample(measurements, resampling)
    : sampler.resampleByType(measurements, type, resampling);

  if (options.json) {
    console.log(JSON.stringify(sampled.map(toMeasurementJson), null, 2));
    return;
  }

  if (sampled.length === 0) {
    console.log(chalk.dim('No measurements to sample.'));
    return;
  }

  formatSampledData(sampled).forEach((line) => console.log(line));
}
