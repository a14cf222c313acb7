import { z } from 'zod';

import { EXERCISE_CATEGORIES, METRIC_TYPES } from '../types';
import { parseDateKey } from '../utils/dateUtilities';

import type {
  BackupBundle,
  CurrentSessions,
  ExerciseSession,
  ExerciseSet,
  ExerciseTypeInfo,
  HealthMetric,
  MeasurementSession,
  Reading,
  UserProfile,
  WorkoutSession,
} from '../types';

// Dates arrive as ISO-8601 strings from JSON, or as Date objects from in-process stores
const DateSchema = z.union([
  z.date(),
  z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value)),
]);

export const MetricTypeSchema = z.enum(METRIC_TYPES);

// =============================================================================
// PERSISTED DOCUMENTS
// Shared by the local store, the remote store and backup bundles.
// =============================================================================

export const HealthMetricSchema: z.ZodType<HealthMetric, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  timestamp: DateSchema,
  type: MetricTypeSchema,
  value: z.number(),
});

export const ReadingSchema: z.ZodType<Reading, z.ZodTypeDef, unknown> = z.object({
  diastolic: z.number().int(),
  heartRate: z.number().int().optional(),
  id: z.string().min(1),
  systolic: z.number().int(),
  timestamp: DateSchema,
});

export const MeasurementSessionSchema: z.ZodType<MeasurementSession, z.ZodTypeDef, unknown> =
  z.object({
    endTime: DateSchema.optional(),
    id: z.string().min(1),
    isActive: z.boolean(),
    metrics: z.array(HealthMetricSchema),
    readings: z.array(ReadingSchema),
    startTime: DateSchema,
  });

export const ExerciseSetSchema: z.ZodType<ExerciseSet, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  reps: z.number().int().positive().optional(),
  time: z.number().positive().optional(),
  timestamp: DateSchema,
  weight: z.number().positive().optional(),
});

export const ExerciseSessionSchema: z.ZodType<ExerciseSession, z.ZodTypeDef, unknown> = z.object({
  endTime: DateSchema.optional(),
  exerciseType: z.string().min(1),
  id: z.string().min(1),
  isCompleted: z.boolean(),
  sets: z.array(ExerciseSetSchema),
  startTime: DateSchema,
});

export const WorkoutSessionSchema: z.ZodType<WorkoutSession, z.ZodTypeDef, unknown> = z
  .object({
    endTime: DateSchema.optional(),
    exerciseSessions: z.array(ExerciseSessionSchema),
    id: z.string().min(1),
    isActive: z.boolean(),
    isCompleted: z.boolean(),
    isPaused: z.boolean(),
    startTime: DateSchema,
  })
  .refine((session) => !(session.isActive && session.isPaused), {
    message: 'A workout cannot be active and paused at the same time',
  });

const PreferencesSchema = z.object({
  notificationsEnabled: z.boolean(),
  reminderTime: z
    .string()
    .regex(/^\d{2}:\d{2}$/)
    .optional(),
  theme: z.enum(['dark', 'light', 'system']),
  units: z.enum(['imperial', 'metric']),
});

export const UserProfileSchema: z.ZodType<UserProfile, z.ZodTypeDef, unknown> = z.object({
  createdAt: DateSchema,
  displayName: z.string().optional(),
  email: z.string(),
  id: z.string().min(1),
  lastUpdated: DateSchema,
  photoURL: z.string().optional(),
  preferences: PreferencesSchema,
});

export const MeasurementHistorySchema = z.array(MeasurementSessionSchema);
export const WorkoutHistorySchema = z.array(WorkoutSessionSchema);
export const HealthMetricsSchema = z.array(HealthMetricSchema);
export const NullableProfileSchema = UserProfileSchema.nullable();

export const CurrentSessionsSchema: z.ZodType<CurrentSessions, z.ZodTypeDef, unknown> = z.object({
  measurement: MeasurementSessionSchema,
  workout: WorkoutSessionSchema,
});

export const BackupBundleSchema: z.ZodType<BackupBundle, z.ZodTypeDef, unknown> = z.object({
  createdAt: DateSchema,
  formatVersion: z.string(),
  measurementSessions: MeasurementHistorySchema,
  profile: NullableProfileSchema.default(null),
  workoutSessions: WorkoutHistorySchema,
});

export const ExerciseCatalogSchema: z.ZodType<ExerciseTypeInfo[], z.ZodTypeDef, unknown> = z.array(
  z.object({
    category: z.enum(EXERCISE_CATEGORIES),
    icon: z.string(),
    id: z.string().min(1),
    name: z.string().min(1),
    supportsReps: z.boolean(),
    supportsTime: z.boolean(),
    supportsWeight: z.boolean(),
    unit: z.string(),
  }),
);

// =============================================================================
// REQUEST BODIES
// Range checks are left to the plausibility predicates so that an
// implausible value is a 422, while a malformed body is a 400.
// =============================================================================

export const ReadingInputSchema = z.object({
  diastolic: z.number().int(),
  heartRate: z.number().int().nullish(),
  systolic: z.number().int(),
  timestamp: DateSchema.optional(),
});

export const MetricInputSchema = z.object({
  timestamp: DateSchema.optional(),
  type: MetricTypeSchema,
  value: z.number(),
});

export const SetInputSchema = z.object({
  reps: z.number().int().positive().nullish(),
  time: z.number().positive().nullish(),
  timestamp: DateSchema.optional(),
  weight: z.number().positive().nullish(),
});

export const ExerciseInputSchema = z.object({
  exerciseType: z.string().min(1),
});

export const WorkoutPlanInputSchema = z.object({
  exerciseTypes: z.array(z.string().min(1)).min(1),
});

export const SignInInputSchema = z.object({
  displayName: z.string().optional(),
  email: z.string().email(),
  id: z.string().min(1),
  photoURL: z.string().url().optional(),
  preferences: PreferencesSchema.partial().optional(),
});

// =============================================================================
// QUERY STRINGS
// =============================================================================

export const IndexParamSchema = z.coerce.number().int().min(0);

/** A local calendar day written as YYYY-MM-DD */
export const DateKeySchema = z.string().transform((value, context) => {
  try {
    return parseDateKey(value);
  } catch (error) {
    context.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : 'Invalid date key',
    });
    return z.NEVER;
  }
});

export const ExerciseListQuerySchema = z.object({
  category: z.enum(EXERCISE_CATEGORIES).optional(),
});

export const TrendQuerySchema = z.object({
  range: z.enum(['week', 'month', 'threeMonths', 'year']).default('month'),
});

export const MetricSummaryQuerySchema = z.object({
  days: z.coerce.number().int().positive().optional(),
});

export const MetricListQuerySchema = z.object({
  date: DateKeySchema.optional(),
  from: DateSchema.optional(),
  limit: z.coerce.number().int().positive().optional(),
  to: DateSchema.optional(),
  type: MetricTypeSchema.optional(),
});

export const CategoryQuerySchema = z.object({
  diastolic: z.coerce.number(),
  systolic: z.coerce.number(),
});

export type ReadingInput = z.infer<typeof ReadingInputSchema>;
export type MetricInput = z.infer<typeof MetricInputSchema>;
export type SetInput = z.infer<typeof SetInputSchema>;
export type SignInInput = z.infer<typeof SignInInputSchema>;
