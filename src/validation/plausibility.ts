/**
 * Physiological plausibility checks.
 * Pure predicates: they never throw for bad values, only for a metric type
 * that does not exist, which is a programming error.
 */

import { getMetricTypeInfo } from '../catalog/metricTypes';

const SYSTOLIC_RANGE = { max: 300, min: 50 } as const;
const DIASTOLIC_RANGE = { max: 200, min: 30 } as const;
const HEART_RATE_RANGE = { max: 200, min: 30 } as const;

function isIntegerWithin(value: number, range: { max: number; min: number }): boolean {
  return Number.isInteger(value) && value >= range.min && value <= range.max;
}

/**
 * Blood pressure reading check: both components in range, systolic strictly
 * above diastolic, heart rate in range when given.
 */
export function isValidReading(
  systolic: number,
  diastolic: number,
  heartRate?: null | number,
): boolean {
  if (!isIntegerWithin(systolic, SYSTOLIC_RANGE)) return false;
  if (!isIntegerWithin(diastolic, DIASTOLIC_RANGE)) return false;
  if (systolic <= diastolic) return false;
  if (heartRate !== undefined && heartRate !== null && !isIntegerWithin(heartRate, HEART_RATE_RANGE)) {
    return false;
  }
  return true;
}

/**
 * Range check against the metric type table.
 * @throws UnknownMetricTypeError when `type` is not a metric type
 */
export function isValidMetric(type: string, value: number): boolean {
  const { range } = getMetricTypeInfo(type);
  return Number.isFinite(value) && value >= range.min && value <= range.max;
}

/**
 * A set is recordable when at least one of its populated fields is positive.
 */
export function isValidSet(reps?: null | number, weight?: null | number, time?: null | number): boolean {
  return [reps, weight, time].some(isPositive);
}

/**
 * Every populated field of a set is positive. Absent fields pass.
 */
export function hasPositiveSetFields(
  reps?: null | number,
  weight?: null | number,
  time?: null | number,
): boolean {
  return [reps, weight, time].every((field) => field === undefined || field === null || isPositive(field));
}

function isPositive(field: null | number | undefined): boolean {
  return typeof field === 'number' && Number.isFinite(field) && field > 0;
}
