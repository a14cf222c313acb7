import express from 'express';

import type { WorkoutController } from '../controllers/workouts';

export function createWorkoutRouter(controller: WorkoutController): express.Router {
  const router = express.Router();

  router.get('/current', controller.getCurrent);
  router.post('/current/start', controller.start);
  router.post('/current/pause', controller.pause);
  router.post('/current/resume', controller.resume);
  router.post('/current/complete', controller.complete);
  router.post('/current/discard', controller.discard);
  router.post('/current/plan', controller.loadPlan);
  router.post('/current/exercises', controller.addExercise);
  router.delete('/current/exercises/:index', controller.removeExercise);
  router.post('/current/exercises/:index/complete', controller.completeExercise);
  router.post('/current/exercises/:index/sets', controller.addSet);
  router.delete('/current/exercises/:index/sets/:setIndex', controller.removeSet);

  router.get('/history', controller.getHistory);
  router.delete('/history', controller.deleteHistory);
  router.delete('/history/date/:date', controller.deleteHistoryOn);
  router.delete('/history/:id', controller.deleteHistorySession);

  return router;
}
