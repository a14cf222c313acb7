import { randomUUID } from 'node:crypto';

import type { MappingContext } from '../mappers';
import type { HealthTracker } from '../tracker/HealthTracker';

export interface TrackerControllerOptions {
  tracker: HealthTracker;
  clock?: () => Date;
  generateId?: () => string;
}

export interface TrackerControllerContext {
  clock: () => Date;
  generateId: () => string;
  tracker: HealthTracker;
}

export function resolveContext(options: TrackerControllerOptions): TrackerControllerContext {
  return {
    clock: options.clock ?? (() => new Date()),
    generateId: options.generateId ?? randomUUID,
    tracker: options.tracker,
  };
}

export function mappingContext(context: TrackerControllerContext): MappingContext {
  return { generateId: context.generateId, now: context.clock() };
}
