import { StorageConfig } from '../config';
import { debugValidation } from '../utils/debugLogger';
import { logger } from '../utils/logger';
import {
  CurrentSessionsSchema,
  HealthMetricsSchema,
  MeasurementHistorySchema,
  NullableProfileSchema,
  WorkoutHistorySchema,
} from '../validation/schemas';

import type {
  CurrentSessions,
  HealthMetric,
  MeasurementSession,
  UserProfile,
  WorkoutSession,
} from '../types';
import type { Logger } from '../utils/logger';
import type { LocalStore } from './LocalStore';
import type { z } from 'zod';

export interface PersistedState {
  /** null when nothing was stored or the stored document was unreadable */
  currentSessions: CurrentSessions | null;
  healthMetrics: HealthMetric[];
  measurementSessions: MeasurementSession[];
  profile: null | UserProfile;
  workoutSessions: WorkoutSession[];
}

/**
 * Typed access to the tracker's documents in a LocalStore.
 * A document that is missing or fails validation loads as its empty value;
 * the failure is logged, never thrown.
 */
export class TrackerRepository {
  private keys = StorageConfig.keys;
  private log: Logger;
  private store: LocalStore;

  constructor(store: LocalStore, log: Logger = logger.forComponent('repository')) {
    this.store = store;
    this.log = log;
  }

  async load(): Promise<PersistedState> {
    const [measurementSessions, workoutSessions, healthMetrics, profile, currentSessions] =
      await Promise.all([
        this.loadDocument(this.keys.measurementSessions, MeasurementHistorySchema, []),
        this.loadDocument(this.keys.workoutSessions, WorkoutHistorySchema, []),
        this.loadDocument(this.keys.healthMetrics, HealthMetricsSchema, []),
        this.loadDocument(this.keys.profile, NullableProfileSchema, null),
        this.loadDocument(this.keys.currentSessions, CurrentSessionsSchema.nullable(), null),
      ]);

    this.log.info('Loaded tracker state', {
      healthMetrics: healthMetrics.length,
      measurementSessions: measurementSessions.length,
      workoutSessions: workoutSessions.length,
    });

    return { currentSessions, healthMetrics, measurementSessions, profile, workoutSessions };
  }

  saveCurrentSessions(sessions: CurrentSessions): Promise<void> {
    return this.store.write(this.keys.currentSessions, sessions);
  }

  saveHealthMetrics(metrics: readonly HealthMetric[]): Promise<void> {
    return this.store.write(this.keys.healthMetrics, metrics);
  }

  saveMeasurementSessions(sessions: readonly MeasurementSession[]): Promise<void> {
    return this.store.write(this.keys.measurementSessions, sessions);
  }

  saveProfile(profile: null | UserProfile): Promise<void> {
    return this.store.write(this.keys.profile, profile);
  }

  saveWorkoutSessions(sessions: readonly WorkoutSession[]): Promise<void> {
    return this.store.write(this.keys.workoutSessions, sessions);
  }

  private async loadDocument<T>(
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    fallback: T,
  ): Promise<T> {
    let raw: unknown;
    try {
      raw = await this.store.read(key);
    } catch (error) {
      this.log.warn('Unreadable document, starting empty', {
        error: error instanceof Error ? error.message : String(error),
        key,
      });
      return fallback;
    }
    if (raw === undefined) return fallback;

    const result = schema.safeParse(raw);
    debugValidation(this.log, result.success, { key }, result.error?.issues);
    if (!result.success) {
      this.log.warn('Stored document failed validation, starting empty', {
        issues: result.error.issues.length,
        key,
      });
      return fallback;
    }
    return result.data;
  }
}
