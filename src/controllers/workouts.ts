import { HttpStatus } from '../config';
import { setFromInput } from '../mappers';
import {
  getWorkoutState,
  totalExercises,
  totalReps,
  totalSets,
  workoutDuration,
} from '../sessions/workoutSession';
import {
  DateKeySchema,
  ExerciseInputSchema,
  IndexParamSchema,
  SetInputSchema,
  WorkoutPlanInputSchema,
} from '../validation/schemas';
import { mappingContext, resolveContext } from './context';
import { handle, parseInput, sendFailure, sendResult } from './respond';

import type { WorkoutSession, WorkoutState } from '../types';
import type { TrackerControllerOptions } from './context';

export interface WorkoutSummary {
  durationSeconds: number;
  state: WorkoutState;
  totalExercises: number;
  totalReps: number;
  totalSets: number;
}

export function summarizeWorkout(session: WorkoutSession, now: Date): WorkoutSummary {
  return {
    durationSeconds: workoutDuration(session, now),
    state: getWorkoutState(session),
    totalExercises: totalExercises(session),
    totalReps: totalReps(session),
    totalSets: totalSets(session),
  };
}

export function createWorkoutController(options: TrackerControllerOptions) {
  const context = resolveContext(options);
  const { tracker } = context;

  return {
    getCurrent: handle('getCurrentWorkout', async (_req, res) => {
      const session = tracker.currentWorkout;
      res.status(HttpStatus.OK).json({ session, summary: summarizeWorkout(session, context.clock()) });
    }),

    start: handle('startWorkout', async (_req, res) => {
      sendResult(res, await tracker.startWorkout());
    }),

    pause: handle('pauseWorkout', async (_req, res) => {
      sendResult(res, await tracker.pauseWorkout());
    }),

    resume: handle('resumeWorkout', async (_req, res) => {
      sendResult(res, await tracker.resumeWorkout());
    }),

    complete: handle('completeWorkout', async (_req, res) => {
      sendResult(res, await tracker.completeWorkout());
    }),

    discard: handle('discardWorkout', async (_req, res) => {
      res.status(HttpStatus.OK).json(await tracker.discardWorkout());
    }),

    loadPlan: handle('loadWorkoutPlan', async (req, res) => {
      const input = parseInput(WorkoutPlanInputSchema, req.body, req, res);
      if (!input) return;
      sendResult(res, await tracker.loadWorkoutPlan(input.exerciseTypes), HttpStatus.CREATED);
    }),

    addExercise: handle('addExercise', async (req, res) => {
      const input = parseInput(ExerciseInputSchema, req.body, req, res);
      if (!input) return;
      sendResult(res, await tracker.addExercise(input.exerciseType), HttpStatus.CREATED);
    }),

    removeExercise: handle('removeExercise', async (req, res) => {
      const index = parseInput(IndexParamSchema, req.params.index, req, res);
      if (index === undefined) return;
      sendResult(res, await tracker.removeExercise(index));
    }),

    completeExercise: handle('completeExercise', async (req, res) => {
      const index = parseInput(IndexParamSchema, req.params.index, req, res);
      if (index === undefined) return;
      sendResult(res, await tracker.completeExercise(index));
    }),

    addSet: handle('addSet', async (req, res) => {
      const index = parseInput(IndexParamSchema, req.params.index, req, res);
      if (index === undefined) return;
      const input = parseInput(SetInputSchema, req.body, req, res);
      if (!input) return;
      const set = setFromInput(input, mappingContext(context));
      sendResult(res, await tracker.addSet(index, set), HttpStatus.CREATED);
    }),

    removeSet: handle('removeSet', async (req, res) => {
      const index = parseInput(IndexParamSchema, req.params.index, req, res);
      if (index === undefined) return;
      const setIndex = parseInput(IndexParamSchema, req.params.setIndex, req, res);
      if (setIndex === undefined) return;
      sendResult(res, await tracker.removeSet(index, setIndex));
    }),

    getHistory: handle('getWorkoutHistory', async (_req, res) => {
      res.status(HttpStatus.OK).json(tracker.workoutHistory);
    }),

    deleteHistory: handle('deleteWorkoutHistory', async (_req, res) => {
      const removed = await tracker.deleteAllWorkoutSessions();
      res.status(HttpStatus.OK).json({ removed });
    }),

    deleteHistorySession: handle('deleteWorkoutSession', async (req, res) => {
      const result = await tracker.deleteWorkoutSession(req.params.id);
      if (!result.ok) {
        sendFailure(res, result);
        return;
      }
      res.status(HttpStatus.OK).json({ removed: result.value });
    }),

    deleteHistoryOn: handle('deleteWorkoutSessionsOn', async (req, res) => {
      const date = parseInput(DateKeySchema, req.params.date, req, res);
      if (!date) return;
      const removed = await tracker.deleteWorkoutSessionsOn(date);
      res.status(HttpStatus.OK).json({ removed });
    }),
  };
}

export type WorkoutController = ReturnType<typeof createWorkoutController>;
