/**
 * Per-exercise progress over workout history.
 */

import { AnalyticsConfig } from '../config';
import {
  exerciseAverageWeight,
  exerciseMaxWeight,
  exerciseTotalReps,
  exerciseTotalTime,
} from '../sessions/workoutSession';
import { subtractDays, subtractMonths, subtractYears } from '../utils/dateUtilities';

import type {
  ExerciseSession,
  ExerciseStats,
  FitnessTrendSample,
  TimeRange,
  TrendAnalysis,
  TrendDirection,
  WorkoutSession,
} from '../types';

export function getTimeRangeCutoff(range: TimeRange, now: Date): Date {
  switch (range) {
    case 'week': {
      return subtractDays(now, 7);
    }
    case 'month': {
      return subtractMonths(now, 1);
    }
    case 'threeMonths': {
      return subtractMonths(now, 3);
    }
    case 'year': {
      return subtractYears(now, 1);
    }
  }
}

function sessionsOfType(
  workouts: readonly WorkoutSession[],
  exerciseType: string,
): ExerciseSession[] {
  return workouts
    .flatMap((workout) => workout.exerciseSessions)
    .filter((exercise) => exercise.exerciseType === exerciseType);
}

/**
 * One sample per exercise session of the type, from workouts started on or
 * after the range cutoff, oldest first.
 */
export function getFitnessTrendSamples(
  history: readonly WorkoutSession[],
  exerciseType: string,
  range: TimeRange,
  now: Date,
): FitnessTrendSample[] {
  const cutoff = getTimeRangeCutoff(range, now).getTime();
  const recent = history.filter((workout) => workout.startTime.getTime() >= cutoff);

  return sessionsOfType(recent, exerciseType)
    .map((exercise) => ({
      averageWeight: exerciseAverageWeight(exercise) ?? 0,
      date: exercise.startTime,
      maxWeight: exerciseMaxWeight(exercise) ?? 0,
      sets: exercise.sets.length,
      totalReps: exerciseTotalReps(exercise),
      totalTime: exerciseTotalTime(exercise),
    }))
    .sort((a, b) => a.date.getTime() - b.date.getTime());
}

function directionOf(delta: number, threshold: number): TrendDirection {
  if (delta > threshold) return 'increasing';
  if (delta < -threshold) return 'decreasing';
  return 'stable';
}

/**
 * Compare the first and last sample of a series.
 */
export function analyzeTrendSamples(
  samples: readonly FitnessTrendSample[],
  thresholdLbs: number = AnalyticsConfig.fitnessTrendThresholdLbs,
): TrendAnalysis {
  const first = samples.at(0);
  const last = samples.at(-1);

  if (!first || !last || samples.length < 2) {
    return {
      avgWeight: first?.averageWeight ?? 0,
      direction: 'stable',
      maxWeight: first?.maxWeight ?? 0,
      percentImprovement: 0,
      sampleCount: samples.length,
      weightDelta: 0,
    };
  }

  const weightDelta = last.averageWeight - first.averageWeight;
  const avgWeight =
    samples.reduce((sum, sample) => sum + sample.averageWeight, 0) / samples.length;

  return {
    avgWeight,
    direction: directionOf(weightDelta, thresholdLbs),
    maxWeight: Math.max(...samples.map((sample) => sample.maxWeight)),
    percentImprovement: first.averageWeight > 0 ? (weightDelta / first.averageWeight) * 100 : 0,
    sampleCount: samples.length,
    weightDelta,
  };
}

export function analyzeFitnessTrend(
  history: readonly WorkoutSession[],
  exerciseType: string,
  range: TimeRange,
  now: Date,
): TrendAnalysis {
  return analyzeTrendSamples(getFitnessTrendSamples(history, exerciseType, range, now));
}

/**
 * Lifetime totals for one exercise type. Weight figures are over each
 * session's heaviest set.
 */
export function getExerciseStats(
  history: readonly WorkoutSession[],
  exerciseType: string,
): ExerciseStats {
  const sessions = sessionsOfType(history, exerciseType);
  const maxima = sessions.flatMap((exercise) => {
    const max = exerciseMaxWeight(exercise);
    return max === undefined ? [] : [max];
  });

  return {
    averageWeight:
      maxima.length === 0 ? 0 : maxima.reduce((sum, weight) => sum + weight, 0) / maxima.length,
    exerciseType,
    maxWeight: maxima.length === 0 ? 0 : Math.max(...maxima),
    totalReps: sessions.reduce((sum, exercise) => sum + exerciseTotalReps(exercise), 0),
    totalSessions: sessions.length,
    totalSets: sessions.reduce((sum, exercise) => sum + exercise.sets.length, 0),
    totalTime: sessions.reduce((sum, exercise) => sum + exerciseTotalTime(exercise), 0),
  };
}
