/**
 * Centralized type exports.
 * All type definitions are exported from this index for consistent imports.
 */

// Analytics types
export type {
  BloodPressureCategory,
  ExerciseStats,
  FitnessTrendSample,
  MetricSummary,
  RollingAverage,
  TimeRange,
  TrendAnalysis,
  TrendDirection,
} from './analytics';

// Measurement types
export type { MeasurementSession, Reading, RestartPolicy } from './measurement';

// Metric types
export { METRIC_TYPES } from './metric';
export type { HealthMetric, MetricType, MetricTypeInfo } from './metric';

// Profile types
export type { UserPreferences, UserProfile } from './profile';

// Storage types
export { COLLECTION_NAMES } from './storage';
export type {
  BackupBundle,
  CollectionItems,
  CollectionName,
  CurrentSessions,
  TrackerSnapshot,
} from './storage';

// Workout types
export { EXERCISE_CATEGORIES } from './workout';
export type {
  ExerciseCategory,
  ExerciseCategoryInfo,
  ExerciseSession,
  ExerciseSet,
  ExerciseTypeInfo,
  WorkoutSession,
  WorkoutState,
} from './workout';

// HTTP types
export type { ApiHandler, ApiRequest, JsonResponse, MiddlewareRequest } from './http';
