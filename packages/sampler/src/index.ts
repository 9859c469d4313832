/**
 * @vitalgrid/sampler
 *
 * Buckets irregularly timed sensor measurements onto a fixed-width time grid,
 * keeping one representative reading per (grid line, measurement type).
 *
 * @example
 * ```typescript
 * import { IntervalSampler, createMeasurement, formatSampledData } from '@vitalgrid/sampler';
 *
 * const sampler = new IntervalSampler(5);
 * const sampled = sampler.resample([
 *   createMeasurement({ timestamp: new Date('2017-01-03T10:04:45Z'), type: 'TEMP', value: 35.79 }),
 *   createMeasurement({ timestamp: new Date('2017-01-03T10:01:18Z'), type: 'SPO2', value: 98.78 }),
 * ]);
 *
 * formatSampledData(sampled).forEach((line) => console.log(line));
 * ```
 */

// Models and schemas
export {
  MeasurementTypeSchema,
  MeasurementSchema,
  RawMeasurementSchema,
  MEASUREMENT_TYPES,
  MEASUREMENT_TYPE_LABELS,
  type MeasurementType,
  type Measurement,
  type MeasurementInput,
  compareMeasurementTypes,
  createMeasurement,
  parseMeasurement,
  parseMeasurements,
  tryParseTimestamp,
  parseTimestamp,
  formatTimestamp,
  truncateToSecond,
  wallClockNow,
} from './models/index.js';

// Sampler
export {
  IntervalSampler,
  createIntervalSampler,
  createIntervalSamplerFromEnv,
  alignToGrid,
  bucketBoundary,
  type ResamplingOptions,
  type IntervalSamplerOptions,
} from './interval-sampler.js';

// Formatting
export {
  formatValue,
  formatMeasurement,
  formatSampledData,
  type SampledData,
} from './format.js';
