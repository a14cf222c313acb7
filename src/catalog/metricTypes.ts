import { UnknownMetricTypeError } from '../errors';
import { METRIC_TYPES } from '../types';

import type { MetricType, MetricTypeInfo } from '../types';

/**
 * Per-type metric table. Adding a metric type is one entry here plus the
 * name in METRIC_TYPES.
 */
export const METRIC_TYPE_INFO = {
  bloodPressure: {
    color: 'blue',
    icon: 'heart.fill',
    label: 'Blood Pressure',
    range: { max: 300, min: 50 },
    unit: 'mmHg',
  },
  bloodSugar: {
    color: 'orange',
    icon: 'drop.fill',
    label: 'Blood Sugar',
    range: { max: 600, min: 20 },
    unit: 'mg/dL',
  },
  heartRate: {
    color: 'red',
    icon: 'heart.circle.fill',
    label: 'Heart Rate',
    range: { max: 200, min: 30 },
    unit: 'bpm',
  },
  weight: {
    color: 'green',
    icon: 'scalemass.fill',
    label: 'Weight',
    range: { max: 500, min: 50 },
    unit: 'lbs',
  },
} as const satisfies Record<MetricType, MetricTypeInfo>;

export function isMetricType(value: string): value is MetricType {
  return METRIC_TYPES.some((type) => type === value);
}

/**
 * Look up a metric type.
 * @throws UnknownMetricTypeError for a name outside the table
 */
export function getMetricTypeInfo(type: string): MetricTypeInfo {
  if (!isMetricType(type)) {
    throw new UnknownMetricTypeError(type);
  }
  return METRIC_TYPE_INFO[type];
}
