import express from 'express';

import { createAnalyticsController } from '../controllers/analytics';
import { createBackupController } from '../controllers/backup';
import { listExercises } from '../controllers/exercises';
import { createMeasurementController } from '../controllers/measurements';
import { createMetricController } from '../controllers/metrics';
import { createSyncController } from '../controllers/sync';
import { createWorkoutController } from '../controllers/workouts';
import { createMeasurementRouter } from './measurements';
import { createWorkoutRouter } from './workouts';

import type { SyncControllerOptions } from '../controllers/sync';

export interface ApiRouterOptions extends SyncControllerOptions {
  backupDirectory?: string;
}

/**
 * Every /api route. Authentication is applied by the caller.
 */
export function createApiRouter(options: ApiRouterOptions): express.Router {
  const router = express.Router();

  router.get('/exercises', listExercises);
  router.use('/measurements', createMeasurementRouter(createMeasurementController(options)));
  router.use('/workouts', createWorkoutRouter(createWorkoutController(options)));

  const metrics = createMetricController(options);
  router.get('/metrics', metrics.list);
  router.post('/metrics', metrics.add);
  router.delete('/metrics/:id', metrics.remove);

  const analytics = createAnalyticsController(options);
  router.get('/analytics/rolling-averages', analytics.rollingAverages);
  router.get('/analytics/blood-pressure/category', analytics.bloodPressureCategory);
  router.get('/analytics/exercises/:type/trend', analytics.exerciseTrend);
  router.get('/analytics/exercises/:type/stats', analytics.exerciseStats);
  router.get('/analytics/metrics/:type', analytics.metricSummary);

  const backup = createBackupController(options);
  router.get('/backup', backup.download);
  router.post('/backup/restore', backup.restore);
  router.post('/backup/file', backup.writeFile);

  const sync = createSyncController(options);
  router.get('/sync/status', sync.status);
  router.post('/sync/sign-in', sync.signIn);
  router.post('/sync/sign-out', sync.signOut);
  router.post('/sync/push', sync.push);
  router.post('/sync/pull', sync.pull);

  return router;
}
