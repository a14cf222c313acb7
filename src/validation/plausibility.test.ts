import { describe, expect, it } from 'vitest';

import { UnknownMetricTypeError } from '../errors';
import { hasPositiveSetFields, isValidMetric, isValidReading, isValidSet } from './plausibility';

describe('isValidReading', () => {
  it('accepts a typical reading with and without heart rate', () => {
    expect(isValidReading(120, 80, 72)).toBe(true);
    expect(isValidReading(120, 80)).toBe(true);
    expect(isValidReading(120, 80, null)).toBe(true);
  });

  it('is false whenever systolic is not above diastolic', () => {
    expect(isValidReading(90, 90)).toBe(false);
    expect(isValidReading(85, 90)).toBe(false);
  });

  it('checks the inclusive ranges', () => {
    expect(isValidReading(50, 30)).toBe(true);
    expect(isValidReading(300, 200)).toBe(true);
    expect(isValidReading(49, 30)).toBe(false);
    expect(isValidReading(301, 80)).toBe(false);
    expect(isValidReading(120, 29)).toBe(false);
    expect(isValidReading(250, 201)).toBe(false);
    expect(isValidReading(120, 80, 29)).toBe(false);
    expect(isValidReading(120, 80, 201)).toBe(false);
  });

  it('rejects non-integer and non-finite input', () => {
    expect(isValidReading(120.5, 80)).toBe(false);
    expect(isValidReading(Number.NaN, 80)).toBe(false);
    expect(isValidReading(120, 80, Number.POSITIVE_INFINITY)).toBe(false);
  });
});

describe('isValidMetric', () => {
  it('applies the per-type range', () => {
    expect(isValidMetric('weight', 50)).toBe(true);
    expect(isValidMetric('weight', 500.1)).toBe(false);
    expect(isValidMetric('bloodSugar', 20)).toBe(true);
    expect(isValidMetric('bloodSugar', 19.9)).toBe(false);
    expect(isValidMetric('heartRate', 200)).toBe(true);
    expect(isValidMetric('bloodPressure', 301)).toBe(false);
  });

  it('throws for a type outside the table', () => {
    expect(() => isValidMetric('cholesterol', 180)).toThrow(UnknownMetricTypeError);
  });
});

describe('isValidSet', () => {
  it('needs at least one positive field', () => {
    expect(isValidSet(8)).toBe(true);
    expect(isValidSet(undefined, 135)).toBe(true);
    expect(isValidSet(undefined, undefined, 30)).toBe(true);
    expect(isValidSet(0, 100)).toBe(true);
  });

  it('rejects a set with nothing positive', () => {
    expect(isValidSet()).toBe(false);
    expect(isValidSet(0, 0, 0)).toBe(false);
    expect(isValidSet(-1, null, undefined)).toBe(false);
  });
});

describe('hasPositiveSetFields', () => {
  it('accepts absent fields and positive values', () => {
    expect(hasPositiveSetFields()).toBe(true);
    expect(hasPositiveSetFields(8, null, 45)).toBe(true);
  });

  it('rejects any populated field at or below zero', () => {
    expect(hasPositiveSetFields(8, -100)).toBe(false);
    expect(hasPositiveSetFields(0, 100)).toBe(false);
    expect(hasPositiveSetFields(8, 100, Number.NaN)).toBe(false);
  });
});
