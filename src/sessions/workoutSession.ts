/**
 * Workout session state machine: NotStarted → Active ⇄ Paused → Completed.
 * The state is derived from the three flags. Completed is terminal and every
 * mutator rejects it.
 */

import { findExerciseType } from '../catalog/exerciseCatalog';
import { secondsBetween } from '../utils/dateUtilities';
import { hasPositiveSetFields, isValidSet } from '../validation/plausibility';
import { fail, succeed } from './results';

import type { ExerciseSession, ExerciseSet, WorkoutSession, WorkoutState } from '../types';
import type { MutationResult } from './results';

export function createWorkoutSession(id: string, now: Date): WorkoutSession {
  return {
    exerciseSessions: [],
    id,
    isActive: false,
    isCompleted: false,
    isPaused: false,
    startTime: now,
  };
}

export function createExerciseSession(id: string, exerciseType: string, now: Date): ExerciseSession {
  return { exerciseType, id, isCompleted: false, sets: [], startTime: now };
}

export function getWorkoutState(session: WorkoutSession): WorkoutState {
  if (session.isCompleted) return 'completed';
  if (session.isPaused) return 'paused';
  if (session.isActive) return 'active';
  return 'notStarted';
}

function rejectCompleted(session: WorkoutSession): MutationResult<WorkoutSession> | undefined {
  return session.isCompleted ? fail('completed', 'Workout has already been completed') : undefined;
}

function isIndexIn(items: readonly unknown[], index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < items.length;
}

// =============================================================================
// TRANSITIONS
// =============================================================================

/**
 * NotStarted → Active stamps the start time. Starting a paused workout
 * resumes it; starting an active one changes nothing.
 */
export function startWorkout(session: WorkoutSession, now: Date): MutationResult<WorkoutSession> {
  switch (getWorkoutState(session)) {
    case 'notStarted': {
      return succeed({ ...session, isActive: true, isPaused: false, startTime: now });
    }
    case 'paused': {
      return succeed({ ...session, isActive: true, isPaused: false });
    }
    case 'active': {
      return succeed(session);
    }
    case 'completed': {
      return fail('completed', 'Workout has already been completed');
    }
  }
}

export function pauseWorkout(session: WorkoutSession): MutationResult<WorkoutSession> {
  const state = getWorkoutState(session);
  if (state === 'completed') return fail('completed', 'Workout has already been completed');
  if (state !== 'active') return fail('inactive', `Cannot pause a workout that is ${state}`);
  return succeed({ ...session, isActive: false, isPaused: true });
}

export function resumeWorkout(session: WorkoutSession): MutationResult<WorkoutSession> {
  const state = getWorkoutState(session);
  if (state === 'completed') return fail('completed', 'Workout has already been completed');
  if (state !== 'paused') return fail('inactive', `Cannot resume a workout that is ${state}`);
  return succeed({ ...session, isActive: true, isPaused: false });
}

export function completeWorkout(session: WorkoutSession, now: Date): MutationResult<WorkoutSession> {
  const state = getWorkoutState(session);
  if (state === 'completed') return fail('completed', 'Workout has already been completed');
  if (state === 'notStarted') return fail('inactive', 'Cannot complete a workout that has not started');
  return succeed({ ...session, endTime: now, isActive: false, isCompleted: true, isPaused: false });
}

// =============================================================================
// EXERCISES AND SETS
// =============================================================================

/**
 * Append an empty exercise session. Allowed before the workout starts so a
 * plan can be laid out ahead of time.
 */
export function addExerciseSession(
  session: WorkoutSession,
  exercise: ExerciseSession,
): MutationResult<WorkoutSession> {
  const completed = rejectCompleted(session);
  if (completed) return completed;
  if (!findExerciseType(exercise.exerciseType)) {
    return fail('invalid', `Unknown exercise type: ${exercise.exerciseType}`);
  }
  return succeed({ ...session, exerciseSessions: [...session.exerciseSessions, exercise] });
}

export function removeExerciseSession(
  session: WorkoutSession,
  index: number,
): MutationResult<WorkoutSession> {
  const completed = rejectCompleted(session);
  if (completed) return completed;
  if (!isIndexIn(session.exerciseSessions, index)) {
    return fail('notFound', `No exercise at index ${String(index)}`);
  }
  return succeed({
    ...session,
    exerciseSessions: session.exerciseSessions.filter((_, position) => position !== index),
  });
}

function updateExercise(
  session: WorkoutSession,
  index: number,
  update: (exercise: ExerciseSession) => MutationResult<ExerciseSession>,
): MutationResult<WorkoutSession> {
  const exercise = session.exerciseSessions.at(index);
  if (!isIndexIn(session.exerciseSessions, index) || !exercise) {
    return fail('notFound', `No exercise at index ${String(index)}`);
  }
  const updated = update(exercise);
  if (!updated.ok) return updated;
  return succeed({
    ...session,
    exerciseSessions: session.exerciseSessions.map((existing, position) =>
      position === index ? updated.value : existing,
    ),
  });
}

export function addSet(
  session: WorkoutSession,
  exerciseIndex: number,
  set: ExerciseSet,
): MutationResult<WorkoutSession> {
  const completed = rejectCompleted(session);
  if (completed) return completed;
  if (!isValidSet(set.reps, set.weight, set.time)) {
    return fail('invalid', 'A set needs at least one positive value');
  }
  if (!hasPositiveSetFields(set.reps, set.weight, set.time)) {
    return fail('invalid', 'Set values must be positive');
  }
  if (!isIndexIn(session.exerciseSessions, exerciseIndex)) {
    return fail('notFound', `No exercise at index ${String(exerciseIndex)}`);
  }
  const state = getWorkoutState(session);
  if (state !== 'active') return fail('inactive', `Cannot add a set while the workout is ${state}`);

  return updateExercise(session, exerciseIndex, (exercise) =>
    exercise.isCompleted
      ? fail('completed', 'Exercise has already been completed')
      : succeed({ ...exercise, sets: [...exercise.sets, set] }),
  );
}

export function removeSet(
  session: WorkoutSession,
  exerciseIndex: number,
  setIndex: number,
): MutationResult<WorkoutSession> {
  const completed = rejectCompleted(session);
  if (completed) return completed;
  return updateExercise(session, exerciseIndex, (exercise) =>
    isIndexIn(exercise.sets, setIndex)
      ? succeed({ ...exercise, sets: exercise.sets.filter((_, position) => position !== setIndex) })
      : fail('notFound', `No set at index ${String(setIndex)}`),
  );
}

export function completeExercise(
  session: WorkoutSession,
  exerciseIndex: number,
  now: Date,
): MutationResult<WorkoutSession> {
  const completed = rejectCompleted(session);
  if (completed) return completed;
  return updateExercise(session, exerciseIndex, (exercise) =>
    succeed({ ...exercise, endTime: exercise.endTime ?? now, isCompleted: true }),
  );
}

/**
 * A not-started workout pre-filled with one empty exercise session per type.
 */
export function loadWorkoutPlan(
  id: string,
  exercises: readonly ExerciseSession[],
  now: Date,
): MutationResult<WorkoutSession> {
  let session = createWorkoutSession(id, now);
  for (const exercise of exercises) {
    const added = addExerciseSession(session, exercise);
    if (!added.ok) return added;
    session = added.value;
  }
  return succeed(session);
}

// =============================================================================
// DERIVED VALUES
// =============================================================================

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

function weightsOf(exercise: ExerciseSession): number[] {
  return exercise.sets.flatMap((set) => (set.weight === undefined ? [] : [set.weight]));
}

export function exerciseTotalReps(exercise: ExerciseSession): number {
  return sum(exercise.sets.map((set) => set.reps ?? 0));
}

export function exerciseTotalWeight(exercise: ExerciseSession): number {
  return sum(weightsOf(exercise));
}

export function exerciseTotalTime(exercise: ExerciseSession): number {
  return sum(exercise.sets.map((set) => set.time ?? 0));
}

/**
 * Mean over sets that carry a weight; undefined when none do.
 */
export function exerciseAverageWeight(exercise: ExerciseSession): number | undefined {
  const weights = weightsOf(exercise);
  return weights.length === 0 ? undefined : sum(weights) / weights.length;
}

export function exerciseMaxWeight(exercise: ExerciseSession): number | undefined {
  const weights = weightsOf(exercise);
  return weights.length === 0 ? undefined : Math.max(...weights);
}

export function totalExercises(session: WorkoutSession): number {
  return session.exerciseSessions.length;
}

export function totalSets(session: WorkoutSession): number {
  return sum(session.exerciseSessions.map((exercise) => exercise.sets.length));
}

export function totalReps(session: WorkoutSession): number {
  return sum(session.exerciseSessions.map(exerciseTotalReps));
}

/**
 * Seconds from start to end, or to `now` while the workout is open.
 */
export function workoutDuration(session: WorkoutSession, now: Date): number {
  return secondsBetween(session.startTime, session.endTime ?? now);
}
