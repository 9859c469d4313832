/**
 * Sampler Models
 *
 * Exports measurement schemas, types and the timestamp codec.
 */

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
} from './measurement.js';

export {
  tryParseTimestamp,
  parseTimestamp,
  formatTimestamp,
  truncateToSecond,
  wallClockNow,
} from './timestamp.js';
