/**
 * Measurement session state machine: Empty → Active → Completed.
 * Every function is pure. A mutation returns a new session inside a
 * MutationResult and never touches its argument.
 */

import { secondsBetween } from '../utils/dateUtilities';
import { isValidMetric, isValidReading } from '../validation/plausibility';
import { fail, succeed } from './results';

import type { HealthMetric, MeasurementSession, MetricType, Reading, RestartPolicy } from '../types';
import type { MutationResult } from './results';

export interface AddToSessionOptions {
  /** Start an inactive session instead of rejecting the input */
  autoStart: boolean;
  now: Date;
  restartPolicy?: RestartPolicy;
}

export interface AddReadingOptions extends AddToSessionOptions {
  /** `null` = unlimited */
  maxReadings: null | number;
}

export function createMeasurementSession(id: string, now: Date): MeasurementSession {
  return {
    id,
    isActive: false,
    metrics: [],
    readings: [],
    startTime: now,
  };
}

export function isCompletedMeasurement(session: MeasurementSession): boolean {
  return session.endTime !== undefined;
}

export function startMeasurementSession(
  session: MeasurementSession,
  now: Date,
  policy: RestartPolicy = 'reset',
): MutationResult<MeasurementSession> {
  if (isCompletedMeasurement(session)) {
    return fail('completed', 'Session has already been completed');
  }
  const keepStart = session.isActive && policy === 'keep';
  return succeed({ ...session, isActive: true, startTime: keepStart ? session.startTime : now });
}

export function stopMeasurementSession(
  session: MeasurementSession,
): MutationResult<MeasurementSession> {
  if (isCompletedMeasurement(session)) {
    return fail('completed', 'Session has already been completed');
  }
  return succeed({ ...session, isActive: false });
}

/**
 * Auto-start policy for incoming readings and metrics.
 * An active session passes through; an inactive one is started when the
 * policy is enabled and rejected as `inactive` otherwise.
 */
export function applyAutoStart(
  session: MeasurementSession,
  options: AddToSessionOptions,
): MutationResult<MeasurementSession> {
  if (isCompletedMeasurement(session)) {
    return fail('completed', 'Session has already been completed');
  }
  if (session.isActive) return succeed(session);
  if (!options.autoStart) {
    return fail('inactive', 'Session is not active');
  }
  return startMeasurementSession(session, options.now, options.restartPolicy);
}

export function canAddReading(session: MeasurementSession, maxReadings: null | number): boolean {
  if (!session.isActive || isCompletedMeasurement(session)) return false;
  return maxReadings === null || session.readings.length < maxReadings;
}

export function addReading(
  session: MeasurementSession,
  reading: Reading,
  options: AddReadingOptions,
): MutationResult<MeasurementSession> {
  if (!isValidReading(reading.systolic, reading.diastolic, reading.heartRate)) {
    return fail('invalid', 'Reading is outside the plausible range');
  }

  const started = applyAutoStart(session, options);
  if (!started.ok) return started;

  if (!canAddReading(started.value, options.maxReadings)) {
    return fail('capacity', `Session already holds ${String(options.maxReadings)} readings`);
  }

  return succeed({ ...started.value, readings: [...started.value.readings, reading] });
}

/**
 * @throws UnknownMetricTypeError when the metric carries a type outside the table
 */
export function addMetric(
  session: MeasurementSession,
  metric: HealthMetric,
  options: AddToSessionOptions,
): MutationResult<MeasurementSession> {
  if (!isValidMetric(metric.type, metric.value)) {
    return fail('invalid', `${metric.type} value ${String(metric.value)} is outside the plausible range`);
  }

  const started = applyAutoStart(session, options);
  if (!started.ok) return started;

  return succeed({ ...started.value, metrics: [...started.value.metrics, metric] });
}

function removeAt<T>(items: readonly T[], index: number): T[] | undefined {
  if (!Number.isInteger(index) || index < 0 || index >= items.length) return undefined;
  return items.filter((_, position) => position !== index);
}

export function removeReading(
  session: MeasurementSession,
  index: number,
): MutationResult<MeasurementSession> {
  if (isCompletedMeasurement(session)) {
    return fail('completed', 'Session has already been completed');
  }
  const readings = removeAt(session.readings, index);
  if (!readings) return fail('notFound', `No reading at index ${String(index)}`);
  return succeed({ ...session, readings });
}

export function removeMetric(
  session: MeasurementSession,
  index: number,
): MutationResult<MeasurementSession> {
  if (isCompletedMeasurement(session)) {
    return fail('completed', 'Session has already been completed');
  }
  const metrics = removeAt(session.metrics, index);
  if (!metrics) return fail('notFound', `No metric at index ${String(index)}`);
  return succeed({ ...session, metrics });
}

/**
 * Stamp the end time. A second call keeps the first end time.
 */
export function completeMeasurementSession(
  session: MeasurementSession,
  now: Date,
): MeasurementSession {
  return { ...session, endTime: session.endTime ?? now, isActive: false };
}

// =============================================================================
// DERIVED VALUES
// =============================================================================

function mean(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function averageSystolic(session: MeasurementSession): number {
  return mean(session.readings.map((reading) => reading.systolic)) ?? 0;
}

export function averageDiastolic(session: MeasurementSession): number {
  return mean(session.readings.map((reading) => reading.diastolic)) ?? 0;
}

export function averageHeartRate(session: MeasurementSession): number | undefined {
  const heartRates = session.readings.flatMap((reading) =>
    reading.heartRate === undefined ? [] : [reading.heartRate],
  );
  return mean(heartRates);
}

export function metricsOfType(session: MeasurementSession, type: MetricType): HealthMetric[] {
  return session.metrics.filter((metric) => metric.type === type);
}

export function averageMetricOfType(
  session: MeasurementSession,
  type: MetricType,
): number | undefined {
  return mean(metricsOfType(session, type).map((metric) => metric.value));
}

/**
 * Expand a reading into blood pressure metrics (systolic, then diastolic)
 * plus a heart rate metric when the reading has one.
 */
export function readingToMetrics(reading: Reading): HealthMetric[] {
  const metrics: HealthMetric[] = [
    {
      id: `${reading.id}:systolic`,
      timestamp: reading.timestamp,
      type: 'bloodPressure',
      value: reading.systolic,
    },
    {
      id: `${reading.id}:diastolic`,
      timestamp: reading.timestamp,
      type: 'bloodPressure',
      value: reading.diastolic,
    },
  ];
  if (reading.heartRate !== undefined) {
    metrics.push({
      id: `${reading.id}:heartRate`,
      timestamp: reading.timestamp,
      type: 'heartRate',
      value: reading.heartRate,
    });
  }
  return metrics;
}

/**
 * Readings expanded into metrics plus the session's own metrics, oldest first.
 */
export function allMetrics(session: MeasurementSession): HealthMetric[] {
  return [...session.readings.flatMap(readingToMetrics), ...session.metrics].sort(
    (a, b) => a.timestamp.getTime() - b.timestamp.getTime(),
  );
}

/**
 * Seconds from start to end, or to `now` while the session is open.
 */
export function sessionDuration(session: MeasurementSession, now: Date): number {
  return secondsBetween(session.startTime, session.endTime ?? now);
}

export function isEmptyMeasurement(session: MeasurementSession): boolean {
  return session.readings.length === 0 && session.metrics.length === 0;
}
