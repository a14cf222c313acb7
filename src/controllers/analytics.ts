import {
  BLOOD_PRESSURE_CATEGORY_LABELS,
  analyzeTrendSamples,
  classifyBloodPressure,
  computeRollingAverages,
  getExerciseStats,
  getFitnessTrendSamples,
  summarizeMetric,
} from '../analytics';
import { findExerciseType, getMetricTypeInfo } from '../catalog';
import { AnalyticsConfig, HttpStatus } from '../config';
import {
  CategoryQuerySchema,
  MetricSummaryQuerySchema,
  MetricTypeSchema,
  TrendQuerySchema,
} from '../validation/schemas';
import { resolveContext } from './context';
import { handle, parseInput } from './respond';

import type { ApiRequest, ExerciseTypeInfo, JsonResponse } from '../types';
import type { TrackerControllerOptions } from './context';

function requireExerciseType(req: ApiRequest, res: JsonResponse): ExerciseTypeInfo | undefined {
  const info = findExerciseType(req.params.type);
  if (!info) {
    res.status(HttpStatus.NOT_FOUND).json({
      error: 'notFound',
      message: `Unknown exercise type: ${req.params.type}`,
    });
  }
  return info;
}

/**
 * Read-only views computed from the histories on each request.
 */
export function createAnalyticsController(options: TrackerControllerOptions) {
  const context = resolveContext(options);
  const { tracker } = context;

  return {
    rollingAverages: handle('getRollingAverages', async (_req, res) => {
      const averages = computeRollingAverages(tracker.measurementHistory, context.clock());
      res.status(HttpStatus.OK).json(averages);
    }),

    bloodPressureCategory: handle('classifyBloodPressure', async (req, res) => {
      const query = parseInput(CategoryQuerySchema, req.query, req, res);
      if (!query) return;
      const category = classifyBloodPressure(query.systolic, query.diastolic);
      res.status(HttpStatus.OK).json({ category, label: BLOOD_PRESSURE_CATEGORY_LABELS[category] });
    }),

    exerciseTrend: handle('getExerciseTrend', async (req, res) => {
      const info = requireExerciseType(req, res);
      if (!info) return;
      const query = parseInput(TrendQuerySchema, req.query, req, res);
      if (!query) return;

      const samples = getFitnessTrendSamples(
        tracker.workoutHistory,
        info.id,
        query.range,
        context.clock(),
      );
      res.status(HttpStatus.OK).json({
        analysis: analyzeTrendSamples(samples),
        exerciseType: info.id,
        range: query.range,
        samples,
      });
    }),

    exerciseStats: handle('getExerciseStats', async (req, res) => {
      const info = requireExerciseType(req, res);
      if (!info) return;
      res.status(HttpStatus.OK).json(getExerciseStats(tracker.workoutHistory, info.id));
    }),

    metricSummary: handle('getMetricSummary', async (req, res) => {
      const type = parseInput(MetricTypeSchema, req.params.type, req, res);
      if (!type) return;
      const query = parseInput(MetricSummaryQuerySchema, req.query, req, res);
      if (!query) return;

      const days = query.days ?? AnalyticsConfig.metricSummaryDays;
      const { label, unit } = getMetricTypeInfo(type);
      res.status(HttpStatus.OK).json({
        label,
        latest: tracker.getLatestHealthMetric(type) ?? null,
        summary: summarizeMetric(tracker.healthMetrics, type, days, context.clock()),
        unit,
      });
    }),
  };
}

export type AnalyticsController = ReturnType<typeof createAnalyticsController>;
