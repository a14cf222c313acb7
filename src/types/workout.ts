/**
 * Workout type definitions.
 */

export const EXERCISE_CATEGORIES = [
  'upperBody',
  'lowerBody',
  'coreAbs',
  'fullBody',
  'machineBased',
] as const;

export type ExerciseCategory = (typeof EXERCISE_CATEGORIES)[number];

export interface ExerciseCategoryInfo {
  color: string;
  icon: string;
  label: string;
}

/**
 * Catalog entry for one exercise type. Capability flags drive which set
 * fields a client offers for the exercise.
 */
export interface ExerciseTypeInfo {
  category: ExerciseCategory;
  icon: string;
  id: string;
  name: string;
  supportsReps: boolean;
  supportsTime: boolean;
  supportsWeight: boolean;
  unit: string;
}

export interface ExerciseSet {
  id: string;
  timestamp: Date;
  reps?: number;
  /** Duration in seconds */
  time?: number;
  weight?: number;
}

export interface ExerciseSession {
  /** Catalog id, e.g. "benchPress" */
  exerciseType: string;
  id: string;
  isCompleted: boolean;
  sets: ExerciseSet[];
  startTime: Date;
  endTime?: Date;
}

/**
 * A workout made of per-exercise sessions.
 * `isActive` and `isPaused` are never both true.
 */
export interface WorkoutSession {
  exerciseSessions: ExerciseSession[];
  id: string;
  isActive: boolean;
  isCompleted: boolean;
  isPaused: boolean;
  startTime: Date;
  endTime?: Date;
}

export type WorkoutState = 'active' | 'completed' | 'notStarted' | 'paused';
