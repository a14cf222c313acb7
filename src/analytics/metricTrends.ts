/**
 * Averages and trends over the standalone metric collection.
 */

import { AnalyticsConfig } from '../config';
import { subtractDays } from '../utils/dateUtilities';

import type { HealthMetric, MetricSummary, MetricType, TrendDirection } from '../types';

function recentOfType(
  metrics: readonly HealthMetric[],
  type: MetricType,
  days: number,
  now: Date,
): HealthMetric[] {
  const cutoff = subtractDays(now, days).getTime();
  return metrics
    .filter((metric) => metric.type === type && metric.timestamp.getTime() >= cutoff)
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

export function averageMetricValue(
  metrics: readonly HealthMetric[],
  type: MetricType,
  days: number,
  now: Date,
): number | undefined {
  const recent = recentOfType(metrics, type, days, now);
  if (recent.length === 0) return undefined;
  return recent.reduce((sum, metric) => sum + metric.value, 0) / recent.length;
}

/**
 * Relative change between the oldest and newest value in the window.
 */
export function metricTrend(
  metrics: readonly HealthMetric[],
  type: MetricType,
  days: number,
  now: Date,
  thresholdPercent: number = AnalyticsConfig.metricTrendThresholdPercent,
): TrendDirection {
  const recent = recentOfType(metrics, type, days, now);
  const first = recent.at(0);
  const last = recent.at(-1);
  if (!first || !last || recent.length < 2 || first.value === 0) return 'stable';

  const changePercent = ((last.value - first.value) / first.value) * 100;
  if (changePercent > thresholdPercent) return 'increasing';
  if (changePercent < -thresholdPercent) return 'decreasing';
  return 'stable';
}

export function summarizeMetric(
  metrics: readonly HealthMetric[],
  type: MetricType,
  days: number,
  now: Date,
): MetricSummary {
  return {
    average: averageMetricValue(metrics, type, days, now),
    count: recentOfType(metrics, type, days, now).length,
    days,
    trend: metricTrend(metrics, type, days, now),
    type,
  };
}
