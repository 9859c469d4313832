/**
 * Measurement Model
 *
 * Zod schemas and types for timestamped sensor readings.
 */

import { z } from 'zod';
import { ValidationError } from '@vitalgrid/core';
import { tryParseTimestamp, truncateToSecond } from './timestamp.js';

// =============================================================================
// Measurement Types
// =============================================================================

/**
 * Sensor channel kinds. Declaration order is the canonical output order.
 */
export const MeasurementTypeSchema = z.enum([
  'SPO2', // Blood oxygen saturation
  'HR',   // Heart rate
  'TEMP', // Body temperature
]);

export type MeasurementType = z.infer<typeof MeasurementTypeSchema>;

export const MEASUREMENT_TYPES = MeasurementTypeSchema.options;

export const MEASUREMENT_TYPE_LABELS: Record<MeasurementType, string> = {
  SPO2: 'Blood oxygen saturation',
  HR: 'Heart rate',
  TEMP: 'Temperature',
};

/**
 * Order two types by their canonical position
 */
export function compareMeasurementTypes(a: MeasurementType, b: MeasurementType): number {
  return MEASUREMENT_TYPES.indexOf(a) - MEASUREMENT_TYPES.indexOf(b);
}

// =============================================================================
// Measurement
// =============================================================================

/**
 * A single reading. The object is frozen; the Date in `timestamp` is not,
 * so callers must treat it as read-only.
 */
export interface Measurement {
  /** Wall-clock time of the reading, whole seconds */
  readonly timestamp: Date;
  /** Channel the reading came from */
  readonly type: MeasurementType;
  /** Reading value */
  readonly value: number;
}

export const MeasurementSchema = z.object({
  timestamp: z.date({ invalid_type_error: 'Expected a valid date' }),
  type: MeasurementTypeSchema,
  value: z.number().finite(),
});

export type MeasurementInput = z.input<typeof MeasurementSchema>;

/**
 * JSON-shaped measurement as found in files: the timestamp may be an ISO
 * string, epoch milliseconds or a Date.
 */
export const RawMeasurementSchema = MeasurementSchema.extend({
  timestamp: z.union([
    z.date(),
    z.number().int(),
    z.string().transform((text, ctx) => {
      const date = tryParseTimestamp(text);
      if (!date) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'Expected YYYY-MM-DDTHH:MM:SS',
        });
        return z.NEVER;
      }
      return date;
    }),
  ]).transform((value) => (value instanceof Date ? value : new Date(value))),
});

function toFieldErrors(error: z.ZodError): Record<string, string> {
  const fieldErrors: Record<string, string> = {};
  for (const issue of error.issues) {
    const path = issue.path.join('.') || '(root)';
    fieldErrors[path] ??= issue.message;
  }
  return fieldErrors;
}

function invalidMeasurement(
  fieldErrors: Record<string, string>,
  index?: number
): ValidationError {
  const where = index === undefined ? '' : ` at index ${index}`;
  const details = Object.entries(fieldErrors)
    .map(([field, message]) => `${field}: ${message}`)
    .join(', ');

  return new ValidationError(`Invalid measurement${where}: ${details}`, {
    fieldErrors,
    context: index === undefined ? undefined : { index },
  });
}

function freezeMeasurement(timestamp: Date, type: MeasurementType, value: number): Measurement {
  return Object.freeze({ timestamp: truncateToSecond(timestamp), type, value });
}

/**
 * Create a validated, frozen measurement. Sub-second precision is dropped.
 *
 * @throws ValidationError when a field is missing or ill-typed
 */
export function createMeasurement(input: MeasurementInput): Measurement {
  const result = MeasurementSchema.safeParse(input);
  if (!result.success) {
    throw invalidMeasurement(toFieldErrors(result.error));
  }

  return freezeMeasurement(result.data.timestamp, result.data.type, result.data.value);
}

/**
 * Parse an untrusted JSON value into a measurement
 *
 * @param index - Position in the source array, reported in errors
 */
export function parseMeasurement(raw: unknown, index?: number): Measurement {
  const result = RawMeasurementSchema.safeParse(raw);
  if (!result.success) {
    throw invalidMeasurement(toFieldErrors(result.error), index);
  }

  const { timestamp, type, value } = result.data;
  if (Number.isNaN(timestamp.getTime())) {
    throw invalidMeasurement({ timestamp: 'Out of range' }, index);
  }
  return freezeMeasurement(timestamp, type, value);
}

/**
 * Parse a JSON array of measurements
 */
export function parseMeasurements(raw: unknown): Measurement[] {
  if (!Array.isArray(raw)) {
    throw new ValidationError('Expected an array of measurements', {
      fieldErrors: { '(root)': 'Expected array' },
    });
  }
  return raw.map((item: unknown, index) => parseMeasurement(item, index));
}
