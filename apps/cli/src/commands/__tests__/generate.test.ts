/**
 * Tests for vitalgrid generate command
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ValidationError } from '@vitalgrid/core';
import { generateCommand, generateMeasurements } from '../generate.js';

function constant(value: number): () => number {
  return () => value;
}

const START = new Date('2017-01-03T10:00:00Z');

describe('generateMeasurements', () => {
  it('should draw offset, type and value from the random source', () => {
    const measurements = generateMeasurements(2, START, constant(0.5));

    expect(measurements).toEqual([
      { timestamp: new Date('2017-01-03T10:30:00Z'), type: 'HR', value: 85 },
      { timestamp: new Date('2017-01-03T10:30:00Z'), type: 'HR', value: 85 },
    ]);
  });

  it('should start at the lower bound of each range', () => {
    expect(generateMeasurements(1, START, constant(0))).toEqual([
      { timestamp: START, type: 'SPO2', value: 90 },
    ]);
  });

  it('should keep values in range and within the hour', () => {
    const measurements = generateMeasurements(200, START);
    const end = START.getTime() + 3600 * 1000;

    expect(measurements).toHaveLength(200);
    for (const measurement of measurements) {
      const time = measurement.timestamp.getTime();
      expect(time).toBeGreaterThanOrEqual(START.getTime());
      expect(time).toBeLessThanOrEqual(end);
      expect(time % 1000).toBe(0);

      const bounds = { SPO2: [90, 100], HR: [50, 120], TEMP: [30, 40] }[measurement.type];
      expect(measurement.value).toBeGreaterThanOrEqual(bounds[0]);
      expect(measurement.value).toBeLessThanOrEqual(bounds[1]);
      expect(Math.round(measurement.value * 100) / 100).toBe(measurement.value);
    }
  });

  it('should return nothing for a zero count', () => {
    expect(generateMeasurements(0, START)).toEqual([]);
  });
});

describe('Generate Command', () => {
  let logged: string[];

  beforeEach(() => {
    logged = [];
    vi.stubEnv('VITALGRID_INTERVAL_MINUTES', '');
    vi.stubEnv('VITALGRID_EXCLUDE_BEFORE_START', '');
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logged.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('should print JSON readable by the sample command', async () => {
    await generateCommand({ count: '2', start: '2017-01-03T10:00:00' }, constant(0.5));

    expect(logged).toHaveLength(1);
    expect(JSON.parse(logged[0])).toEqual([
      { timestamp: '2017-01-03T10:30:00', type: 'HR', value: 85 },
      { timestamp: '2017-01-03T10:30:00', type: 'HR', value: 85 },
    ]);
  });

  it('should print the resampled form with --sample', async () => {
    await generateCommand(
      { count: '3', start: '2017-01-03T10:00:00', sample: true },
      constant(0)
    );

    expect(logged).toEqual(['{2017-01-03T10:00:00, SPO2, 90.00}']);
  });

  it('should group the resampled form by type', async () => {
    await generateCommand(
      { count: '1', start: '2017-01-03T10:00:00', sample: true, groupByType: true },
      constant(0)
    );

    expect(logged).toEqual([
      'Measurement Type: SPO2',
      '  {2017-01-03T10:00:00, 90.00}',
    ]);
  });

  it('should reject a negative count', async () => {
    await expect(generateCommand({ count: '-1' })).rejects.toThrow(ValidationError);
    await expect(generateCommand({ count: 'many' })).rejects.toThrow(
      'Invalid count: many (expected a non-negative integer)'
    );
  });
});
