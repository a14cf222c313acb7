import { HttpStatus } from '../config';
import { metricFromInput } from '../mappers';
import { MetricInputSchema, MetricListQuerySchema } from '../validation/schemas';
import { mappingContext, resolveContext } from './context';
import { handle, parseInput, sendResult } from './respond';

import type { HealthMetric } from '../types';
import type { TrackerControllerOptions } from './context';

/**
 * Standalone health metrics, outside any measurement session.
 */
export function createMetricController(options: TrackerControllerOptions) {
  const context = resolveContext(options);
  const { tracker } = context;

  return {
    list: handle('listHealthMetrics', async (req, res) => {
      const query = parseInput(MetricListQuerySchema, req.query, req, res);
      if (!query) return;

      const { date, from, limit, to, type } = query;
      let metrics: HealthMetric[];
      if (date) {
        metrics = tracker.getHealthMetricsOn(date);
      } else if (from || to) {
        metrics = tracker.getHealthMetricsBetween(from ?? new Date(0), to ?? context.clock());
      } else {
        metrics = tracker.getHealthMetrics();
      }
      if (type) metrics = metrics.filter((metric) => metric.type === type);
      if (limit !== undefined) metrics = metrics.slice(0, limit);

      res.status(HttpStatus.OK).json(metrics);
    }),

    add: handle('addHealthMetric', async (req, res) => {
      const input = parseInput(MetricInputSchema, req.body, req, res);
      if (!input) return;
      const metric = metricFromInput(input, mappingContext(context));
      sendResult(res, await tracker.addHealthMetric(metric), HttpStatus.CREATED);
    }),

    remove: handle('removeHealthMetric', async (req, res) => {
      sendResult(res, await tracker.removeHealthMetric(req.params.id));
    }),
  };
}

export type MetricController = ReturnType<typeof createMetricController>;
