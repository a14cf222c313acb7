/**
 * Derived (never persisted) analytics shapes.
 */

import type { MetricType } from './metric';

export type BloodPressureCategory = 'crisis' | 'elevated' | 'normal' | 'stage1' | 'stage2';

export interface RollingAverage {
  avgDiastolic: number;
  avgSystolic: number;
  category: BloodPressureCategory;
  readingCount: number;
  sessionCount: number;
  windowDays: number;
  windowEnd: Date;
  windowStart: Date;
  avgHeartRate?: number;
}

export type TrendDirection = 'decreasing' | 'increasing' | 'stable';

export type TimeRange = 'month' | 'threeMonths' | 'week' | 'year';

export interface FitnessTrendSample {
  averageWeight: number;
  date: Date;
  maxWeight: number;
  sets: number;
  totalReps: number;
  totalTime: number;
}

export interface TrendAnalysis {
  avgWeight: number;
  direction: TrendDirection;
  maxWeight: number;
  percentImprovement: number;
  sampleCount: number;
  weightDelta: number;
}

export interface ExerciseStats {
  averageWeight: number;
  exerciseType: string;
  maxWeight: number;
  totalReps: number;
  totalSessions: number;
  totalSets: number;
  totalTime: number;
}

export interface MetricSummary {
  count: number;
  days: number;
  trend: TrendDirection;
  type: MetricType;
  average?: number;
}
