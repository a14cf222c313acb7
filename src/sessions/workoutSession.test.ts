import { describe, expect, it } from 'vitest';

import {
  addExerciseSession,
  addSet,
  completeExercise,
  completeWorkout,
  createExerciseSession,
  createWorkoutSession,
  exerciseAverageWeight,
  exerciseMaxWeight,
  exerciseTotalReps,
  exerciseTotalTime,
  exerciseTotalWeight,
  getWorkoutState,
  loadWorkoutPlan,
  pauseWorkout,
  removeExerciseSession,
  removeSet,
  resumeWorkout,
  startWorkout,
  totalExercises,
  totalReps,
  totalSets,
  workoutDuration,
} from './workoutSession';

import type { ExerciseSet, WorkoutSession } from '../types';
import type { MutationResult } from './results';

const T0 = new Date('2025-03-01T08:00:00.000Z');
const T1 = new Date('2025-03-01T08:30:00.000Z');

function unwrap(result: MutationResult<WorkoutSession>): WorkoutSession {
  if (!result.ok) throw new Error(`expected success, got ${result.reason}`);
  return result.value;
}

function set(id: string, fields: Omit<ExerciseSet, 'id' | 'timestamp'>): ExerciseSet {
  return { id, timestamp: T0, ...fields };
}

function activeWorkoutWith(exerciseType: string): WorkoutSession {
  const started = unwrap(startWorkout(createWorkoutSession('w1', T0), T0));
  return unwrap(addExerciseSession(started, createExerciseSession('e1', exerciseType, T0)));
}

describe('workout transitions', () => {
  it('follows NotStarted → Active ⇄ Paused → Completed', () => {
    let session = createWorkoutSession('w1', T0);
    expect(getWorkoutState(session)).toBe('notStarted');

    session = unwrap(startWorkout(session, T1));
    expect(getWorkoutState(session)).toBe('active');
    expect(session.startTime).toEqual(T1);

    session = unwrap(pauseWorkout(session));
    expect(getWorkoutState(session)).toBe('paused');
    expect(session.isActive).toBe(false);

    session = unwrap(resumeWorkout(session));
    expect(getWorkoutState(session)).toBe('active');

    session = unwrap(completeWorkout(session, T1));
    expect(getWorkoutState(session)).toBe('completed');
    expect(session).toMatchObject({ endTime: T1, isActive: false, isPaused: false });
  });

  it('rejects illegal transitions as inactive', () => {
    const fresh = createWorkoutSession('w1', T0);
    expect(pauseWorkout(fresh)).toMatchObject({ ok: false, reason: 'inactive' });
    expect(resumeWorkout(fresh)).toMatchObject({ ok: false, reason: 'inactive' });
    expect(completeWorkout(fresh, T1)).toMatchObject({ ok: false, reason: 'inactive' });
  });

  it('guards every mutator once completed', () => {
    const completed = unwrap(completeWorkout(activeWorkoutWith('benchPress'), T1));
    const results = [
      startWorkout(completed, T1),
      pauseWorkout(completed),
      resumeWorkout(completed),
      completeWorkout(completed, T1),
      addExerciseSession(completed, createExerciseSession('e2', 'squat', T1)),
      removeExerciseSession(completed, 0),
      addSet(completed, 0, set('s1', { reps: 8 })),
      removeSet(completed, 0, 0),
      completeExercise(completed, 0, T1),
    ];
    for (const result of results) {
      expect(result).toMatchObject({ ok: false, reason: 'completed' });
    }
  });
});

describe('exercises and sets', () => {
  it('allows planning exercises before the workout starts', () => {
    const planned = addExerciseSession(
      createWorkoutSession('w1', T0),
      createExerciseSession('e1', 'deadlifts', T0),
    );
    expect(planned).toMatchObject({ ok: true });
  });

  it('rejects an exercise type missing from the catalog', () => {
    const result = addExerciseSession(
      createWorkoutSession('w1', T0),
      createExerciseSession('e1', 'underwaterBasketWeaving', T0),
    );
    expect(result).toMatchObject({ ok: false, reason: 'invalid' });
  });

  it('rejects a set with no positive value', () => {
    const result = addSet(activeWorkoutWith('benchPress'), 0, set('s1', { reps: 0, weight: 0 }));
    expect(result).toMatchObject({ ok: false, reason: 'invalid' });
  });

  it('rejects a set carrying a negative weight beside positive reps', () => {
    const workout = activeWorkoutWith('benchPress');
    const result = addSet(workout, 0, set('s1', { reps: 8, weight: -100 }));

    expect(result).toEqual({ message: 'Set values must be positive', ok: false, reason: 'invalid' });
    expect(workout.exerciseSessions[0].sets).toEqual([]);
  });

  it('rejects a set for an exercise index that does not exist', () => {
    const result = addSet(activeWorkoutWith('benchPress'), 3, set('s1', { reps: 8 }));
    expect(result).toMatchObject({ ok: false, reason: 'notFound' });
  });

  it('rejects a set while paused', () => {
    const paused = unwrap(pauseWorkout(activeWorkoutWith('benchPress')));
    expect(addSet(paused, 0, set('s1', { reps: 8 }))).toMatchObject({ ok: false, reason: 'inactive' });
  });

  it('rejects a set for a completed exercise', () => {
    const done = unwrap(completeExercise(activeWorkoutWith('benchPress'), 0, T1));
    expect(done.exerciseSessions[0]).toMatchObject({ endTime: T1, isCompleted: true });
    expect(addSet(done, 0, set('s1', { reps: 8 }))).toMatchObject({ ok: false, reason: 'completed' });
  });

  it('removes sets and exercises by index', () => {
    let session = activeWorkoutWith('benchPress');
    session = unwrap(addSet(session, 0, set('s1', { reps: 8, weight: 135 })));
    session = unwrap(addSet(session, 0, set('s2', { reps: 8, weight: 145 })));
    session = unwrap(removeSet(session, 0, 0));
    expect(session.exerciseSessions[0].sets.map((s) => s.id)).toEqual(['s2']);

    expect(removeSet(session, 0, 5)).toMatchObject({ ok: false, reason: 'notFound' });
    expect(unwrap(removeExerciseSession(session, 0)).exerciseSessions).toEqual([]);
    expect(removeExerciseSession(session, 1)).toMatchObject({ ok: false, reason: 'notFound' });
  });
});

describe('derived values', () => {
  it('totals a bench press session', () => {
    let session = activeWorkoutWith('benchPress');
    session = unwrap(addSet(session, 0, set('s1', { reps: 8, weight: 135 })));
    session = unwrap(addSet(session, 0, set('s2', { reps: 8, weight: 145 })));
    const [bench] = session.exerciseSessions;

    expect(exerciseTotalReps(bench)).toBe(16);
    expect(exerciseAverageWeight(bench)).toBe(140);
    expect(exerciseMaxWeight(bench)).toBe(145);
    expect(exerciseTotalWeight(bench)).toBe(280);
    expect(totalExercises(session)).toBe(1);
    expect(totalSets(session)).toBe(2);
    expect(totalReps(session)).toBe(16);
  });

  it('leaves weight stats undefined for time-only sets', () => {
    let session = activeWorkoutWith('weightedPlank');
    session = unwrap(addSet(session, 0, set('s1', { time: 45 })));
    session = unwrap(addSet(session, 0, set('s2', { time: 60 })));
    const [plank] = session.exerciseSessions;

    expect(exerciseTotalTime(plank)).toBe(105);
    expect(exerciseAverageWeight(plank)).toBeUndefined();
    expect(exerciseMaxWeight(plank)).toBeUndefined();
  });

  it('measures duration to now until completed', () => {
    const session = activeWorkoutWith('benchPress');
    expect(workoutDuration(session, T1)).toBe(1800);
    const completed = unwrap(completeWorkout(session, new Date('2025-03-01T08:10:00.000Z')));
    expect(workoutDuration(completed, T1)).toBe(600);
  });
});

describe('loadWorkoutPlan', () => {
  it('builds a not-started workout with empty exercises', () => {
    const plan = unwrap(
      loadWorkoutPlan(
        'w1',
        [createExerciseSession('e1', 'squat', T0), createExerciseSession('e2', 'benchPress', T0)],
        T0,
      ),
    );
    expect(getWorkoutState(plan)).toBe('notStarted');
    expect(plan.exerciseSessions.map((exercise) => exercise.exerciseType)).toEqual(['squat', 'benchPress']);
    expect(totalSets(plan)).toBe(0);
  });
});
