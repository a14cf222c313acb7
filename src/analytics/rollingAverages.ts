/**
 * Multi-window rolling blood pressure averages over session history.
 */

import { AnalyticsConfig } from '../config';
import { subtractDays } from '../utils/dateUtilities';
import { classifyBloodPressure } from './bloodPressure';

import type { MeasurementSession, RollingAverage } from '../types';

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Average every reading of the sessions that started within the last
 * `windowDays` calendar days, bounds inclusive. Returns undefined when the
 * window holds no session or no reading.
 */
export function computeRollingAverage(
  history: readonly MeasurementSession[],
  windowDays: number,
  now: Date,
): RollingAverage | undefined {
  const windowStart = subtractDays(now, windowDays);
  const sessions = history.filter(
    (session) =>
      session.startTime.getTime() >= windowStart.getTime() &&
      session.startTime.getTime() <= now.getTime(),
  );
  if (sessions.length === 0) return undefined;

  const readings = sessions.flatMap((session) => session.readings);
  if (readings.length === 0) return undefined;

  const avgSystolic = mean(readings.map((reading) => reading.systolic));
  const avgDiastolic = mean(readings.map((reading) => reading.diastolic));
  const heartRates = readings.flatMap((reading) =>
    reading.heartRate === undefined ? [] : [reading.heartRate],
  );

  return {
    avgDiastolic,
    avgHeartRate: heartRates.length > 0 ? mean(heartRates) : undefined,
    avgSystolic,
    category: classifyBloodPressure(avgSystolic, avgDiastolic),
    readingCount: readings.length,
    sessionCount: sessions.length,
    windowDays,
    windowEnd: now,
    windowStart,
  };
}

/**
 * One entry per window that has data, in window order.
 */
export function computeRollingAverages(
  history: readonly MeasurementSession[],
  now: Date,
  windows: readonly number[] = AnalyticsConfig.rollingWindowDays,
): RollingAverage[] {
  return windows.flatMap((windowDays) => {
    const average = computeRollingAverage(history, windowDays, now);
    return average ? [average] : [];
  });
}
