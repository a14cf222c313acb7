/**
 * Exercise catalog.
 * Exercise types live in exercises.json as a data-driven table; each entry
 * carries its category and capability flags, so adding an exercise is a
 * single table entry.
 */

import { ExerciseCatalogSchema } from '../validation/schemas';
import exercisesJson from './exercises.json';

import type { ExerciseCategory, ExerciseCategoryInfo, ExerciseTypeInfo } from '../types';

export const EXERCISE_CATEGORY_INFO = {
  coreAbs: { color: 'orange', icon: 'figure.core.training', label: 'Core / Abs' },
  fullBody: { color: 'purple', icon: 'figure.strengthtraining.traditional', label: 'Full Body & Power' },
  lowerBody: { color: 'green', icon: 'figure.strengthtraining.traditional', label: 'Lower Body' },
  machineBased: { color: 'red', icon: 'dumbbell.fill', label: 'Machine-Based' },
  upperBody: { color: 'blue', icon: 'figure.arms.open', label: 'Upper Body' },
} as const satisfies Record<ExerciseCategory, ExerciseCategoryInfo>;

const exerciseTypes: readonly ExerciseTypeInfo[] = ExerciseCatalogSchema.parse(exercisesJson);

const exerciseTypesById = new Map(exerciseTypes.map((info) => [info.id, info]));

export function listExerciseTypes(category?: ExerciseCategory): readonly ExerciseTypeInfo[] {
  if (!category) return exerciseTypes;
  return exerciseTypes.filter((info) => info.category === category);
}

export function findExerciseType(id: string): ExerciseTypeInfo | undefined {
  return exerciseTypesById.get(id);
}

export function isKnownExerciseType(id: string): boolean {
  return exerciseTypesById.has(id);
}

/**
 * Display color of an exercise comes from its category.
 */
export function getExerciseColor(info: ExerciseTypeInfo): string {
  return EXERCISE_CATEGORY_INFO[info.category].color;
}
