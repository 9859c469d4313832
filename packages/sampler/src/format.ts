/**
 * Display helpers for resampled data
 */

import { formatTimestamp, type Measurement, type MeasurementType } from './models/index.js';

export type SampledData =
  | readonly Measurement[]
  | ReadonlyMap<MeasurementType, readonly Measurement[]>;

function isGroupedData(
  data: SampledData
): data is ReadonlyMap<MeasurementType, readonly Measurement[]> {
  return data instanceof Map;
}

/**
 * Render a value with two decimals
 */
export function formatValue(value: number): string {
  return value.toFixed(2);
}

/**
 * Render `{YYYY-MM-DDTHH:MM:SS, TYPE, value}`
 */
export function formatMeasurement(measurement: Measurement): string {
  return `{${formatTimestamp(measurement.timestamp)}, ${measurement.type}, ${formatValue(measurement.value)}}`;
}

/**
 * Render resampled data as lines.
 *
 * A list gives one line per record. A per-type map gives a
 * `Measurement Type: TYPE` header per type followed by indented
 * `{timestamp, value}` lines.
 */
export function formatSampledData(data: SampledData): string[] {
  if (!isGroupedData(data)) {
    return data.map(formatMeasurement);
  }

  const lines: string[] = [];
  for (const [type, measurements] of data) {
    lines.push(`Measurement Type: ${type}`);
    for (const measurement of measurements) {
      lines.push(`  {${formatTimestamp(measurement.timestamp)}, ${formatValue(measurement.value)}}`);
    }
  }
  return lines;
}
