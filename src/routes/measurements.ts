import express from 'express';

import type { MeasurementController } from '../controllers/measurements';

export function createMeasurementRouter(controller: MeasurementController): express.Router {
  const router = express.Router();

  router.get('/current', controller.getCurrent);
  router.post('/current/start', controller.start);
  router.post('/current/stop', controller.stop);
  router.post('/current/complete', controller.complete);
  router.post('/current/discard', controller.discard);
  router.post('/current/readings', controller.addReading);
  router.delete('/current/readings/:index', controller.removeReading);
  router.post('/current/metrics', controller.addMetric);
  router.delete('/current/metrics/:index', controller.removeMetric);

  router.get('/history', controller.getHistory);
  router.delete('/history', controller.deleteHistory);
  // Registered before /history/:id so "date" is never taken for an id
  router.delete('/history/date/:date', controller.deleteHistoryOn);
  router.delete('/history/:id', controller.deleteHistorySession);

  return router;
}
