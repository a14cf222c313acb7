/**
 * Health metric type definitions.
 * A metric is a single scalar measurement, either recorded inside a
 * measurement session or on its own in the standalone metric collection.
 */

export const METRIC_TYPES = ['bloodPressure', 'weight', 'bloodSugar', 'heartRate'] as const;

export type MetricType = (typeof METRIC_TYPES)[number];

export interface HealthMetric {
  id: string;
  timestamp: Date;
  type: MetricType;
  value: number;
}

/**
 * Static description of a metric type, used for validation and display.
 */
export interface MetricTypeInfo {
  color: string;
  icon: string;
  label: string;
  /** Inclusive plausibility range */
  range: { max: number; min: number };
  unit: string;
}
