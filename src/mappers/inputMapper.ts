/**
 * Request input transformation utilities.
 * Turns validated request bodies into domain objects with ids and timestamps.
 */

import type { ExerciseSet, HealthMetric, Reading, UserProfile } from '../types';
import type { MetricInput, ReadingInput, SetInput, SignInInput } from '../validation/schemas';

/**
 * Request-scoped source of ids and the current time.
 */
export interface MappingContext {
  generateId: () => string;
  now: Date;
}

// JSON clients send null for "no value"; the domain uses an absent field
function present<T>(value: null | T | undefined): T | undefined {
  return value ?? undefined;
}

export function readingFromInput(input: ReadingInput, context: MappingContext): Reading {
  const reading: Reading = {
    diastolic: input.diastolic,
    id: context.generateId(),
    systolic: input.systolic,
    timestamp: input.timestamp ?? context.now,
  };
  const heartRate = present(input.heartRate);
  if (heartRate !== undefined) reading.heartRate = heartRate;
  return reading;
}

export function metricFromInput(input: MetricInput, context: MappingContext): HealthMetric {
  return {
    id: context.generateId(),
    timestamp: input.timestamp ?? context.now,
    type: input.type,
    value: input.value,
  };
}

export function setFromInput(input: SetInput, context: MappingContext): ExerciseSet {
  const set: ExerciseSet = {
    id: context.generateId(),
    timestamp: input.timestamp ?? context.now,
  };
  const reps = present(input.reps);
  const time = present(input.time);
  const weight = present(input.weight);
  if (reps !== undefined) set.reps = reps;
  if (time !== undefined) set.time = time;
  if (weight !== undefined) set.weight = weight;
  return set;
}

/**
 * Build the profile for a sign-in. Signing in again as the same user keeps
 * the creation date and any preference the request leaves out.
 */
export function profileFromSignIn(
  input: SignInInput,
  existing: null | UserProfile,
  now: Date,
): UserProfile {
  const previous = existing?.id === input.id ? existing : null;
  const profile: UserProfile = {
    createdAt: previous?.createdAt ?? now,
    email: input.email,
    id: input.id,
    lastUpdated: now,
    preferences: {
      notificationsEnabled: true,
      theme: 'system',
      units: 'imperial',
      ...previous?.preferences,
      ...input.preferences,
    },
  };
  const displayName = input.displayName ?? previous?.displayName;
  const photoURL = input.photoURL ?? previous?.photoURL;
  if (displayName !== undefined) profile.displayName = displayName;
  if (photoURL !== undefined) profile.photoURL = photoURL;
  return profile;
}
