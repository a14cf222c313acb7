/**
 * Blood pressure measurement types.
 */

import type { HealthMetric } from './metric';

export interface Reading {
  diastolic: number;
  id: string;
  systolic: number;
  timestamp: Date;
  heartRate?: number;
}

/**
 * A bounded group of readings and metrics.
 * `endTime` is set exactly when the session has been completed.
 */
export interface MeasurementSession {
  id: string;
  isActive: boolean;
  metrics: HealthMetric[];
  readings: Reading[];
  startTime: Date;
  endTime?: Date;
}

/**
 * What `start` does to a session that is already active.
 * - reset: the elapsed-time reference point moves to now
 * - keep: the original start time is preserved
 */
export type RestartPolicy = 'keep' | 'reset';
