import { classifyBloodPressure } from '../analytics';
import { HttpStatus } from '../config';
import { metricFromInput, readingFromInput } from '../mappers';
import {
  averageDiastolic,
  averageHeartRate,
  averageSystolic,
  sessionDuration,
} from '../sessions/measurementSession';
import {
  DateKeySchema,
  IndexParamSchema,
  MetricInputSchema,
  ReadingInputSchema,
} from '../validation/schemas';
import { mappingContext, resolveContext } from './context';
import { handle, parseInput, sendFailure, sendResult } from './respond';

import type { BloodPressureCategory, MeasurementSession } from '../types';
import type { TrackerControllerOptions } from './context';

export interface MeasurementSummary {
  averageDiastolic: number;
  averageSystolic: number;
  canAddReading: boolean;
  durationSeconds: number;
  averageHeartRate?: number;
  /** Absent until the session holds a reading */
  category?: BloodPressureCategory;
}

export function summarizeMeasurement(
  session: MeasurementSession,
  canAddReading: boolean,
  now: Date,
): MeasurementSummary {
  const summary: MeasurementSummary = {
    averageDiastolic: averageDiastolic(session),
    averageSystolic: averageSystolic(session),
    canAddReading,
    durationSeconds: sessionDuration(session, now),
  };
  const heartRate = averageHeartRate(session);
  if (heartRate !== undefined) summary.averageHeartRate = heartRate;
  if (session.readings.length > 0) {
    summary.category = classifyBloodPressure(summary.averageSystolic, summary.averageDiastolic);
  }
  return summary;
}

export function createMeasurementController(options: TrackerControllerOptions) {
  const context = resolveContext(options);
  const { tracker } = context;

  return {
    getCurrent: handle('getCurrentMeasurement', async (_req, res) => {
      const session = tracker.currentMeasurement;
      res.status(HttpStatus.OK).json({
        session,
        summary: summarizeMeasurement(session, tracker.canAddReading(), context.clock()),
      });
    }),

    start: handle('startMeasurement', async (_req, res) => {
      sendResult(res, await tracker.startMeasurement());
    }),

    stop: handle('stopMeasurement', async (_req, res) => {
      sendResult(res, await tracker.stopMeasurement());
    }),

    complete: handle('completeMeasurement', async (req, res) => {
      const result = await tracker.completeMeasurement();
      if (result.ok) {
        req.log.info('Measurement session recorded', {
          readings: result.value.readings.length,
          sessionId: result.value.id,
        });
      }
      sendResult(res, result);
    }),

    discard: handle('discardMeasurement', async (_req, res) => {
      res.status(HttpStatus.OK).json(await tracker.discardMeasurement());
    }),

    addReading: handle('addReading', async (req, res) => {
      const input = parseInput(ReadingInputSchema, req.body, req, res);
      if (!input) return;
      const reading = readingFromInput(input, mappingContext(context));
      sendResult(res, await tracker.addReading(reading), HttpStatus.CREATED);
    }),

    removeReading: handle('removeReading', async (req, res) => {
      const index = parseInput(IndexParamSchema, req.params.index, req, res);
      if (index === undefined) return;
      sendResult(res, await tracker.removeReading(index));
    }),

    addMetric: handle('addSessionMetric', async (req, res) => {
      const input = parseInput(MetricInputSchema, req.body, req, res);
      if (!input) return;
      const metric = metricFromInput(input, mappingContext(context));
      sendResult(res, await tracker.addSessionMetric(metric), HttpStatus.CREATED);
    }),

    removeMetric: handle('removeSessionMetric', async (req, res) => {
      const index = parseInput(IndexParamSchema, req.params.index, req, res);
      if (index === undefined) return;
      sendResult(res, await tracker.removeSessionMetric(index));
    }),

    getHistory: handle('getMeasurementHistory', async (_req, res) => {
      res.status(HttpStatus.OK).json(tracker.measurementHistory);
    }),

    deleteHistory: handle('deleteMeasurementHistory', async (_req, res) => {
      const removed = await tracker.deleteAllMeasurementSessions();
      res.status(HttpStatus.OK).json({ removed });
    }),

    deleteHistorySession: handle('deleteMeasurementSession', async (req, res) => {
      const result = await tracker.deleteMeasurementSession(req.params.id);
      if (!result.ok) {
        sendFailure(res, result);
        return;
      }
      res.status(HttpStatus.OK).json({ removed: result.value });
    }),

    deleteHistoryOn: handle('deleteMeasurementSessionsOn', async (req, res) => {
      const date = parseInput(DateKeySchema, req.params.date, req, res);
      if (!date) return;
      const removed = await tracker.deleteMeasurementSessionsOn(date);
      res.status(HttpStatus.OK).json({ removed });
    }),
  };
}

export type MeasurementController = ReturnType<typeof createMeasurementController>;
