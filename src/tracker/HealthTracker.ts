import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';

import { SessionConfig } from '../config';
import {
  addMetric,
  addReading,
  canAddReading,
  completeMeasurementSession,
  createMeasurementSession,
  isEmptyMeasurement,
  removeMetric,
  removeReading,
  startMeasurementSession,
  stopMeasurementSession,
} from '../sessions/measurementSession';
import { fail, succeed } from '../sessions/results';
import {
  addExerciseSession,
  addSet,
  completeExercise,
  completeWorkout,
  createExerciseSession,
  createWorkoutSession,
  loadWorkoutPlan,
  pauseWorkout,
  removeExerciseSession,
  removeSet,
  resumeWorkout,
  startWorkout,
} from '../sessions/workoutSession';
import { isSameLocalDay } from '../utils/dateUtilities';
import { debugSession } from '../utils/debugLogger';
import { logger } from '../utils/logger';
import { KeyedSerialQueue } from '../utils/serialQueue';
import { isValidMetric } from '../validation/plausibility';

import type { MutationResult } from '../sessions/results';
import type { TrackerRepository } from '../storage/TrackerRepository';
import type {
  ExerciseSet,
  HealthMetric,
  MeasurementSession,
  MetricType,
  Reading,
  RestartPolicy,
  TrackerSnapshot,
  UserProfile,
  WorkoutSession,
} from '../types';
import type { Logger } from '../utils/logger';

export type HistoryKind = 'measurement' | 'workout';

export interface TrackerEvents {
  historyChanged: [kind: HistoryKind];
  measurementChanged: [session: MeasurementSession];
  metricsChanged: [metrics: readonly HealthMetric[]];
  profileChanged: [profile: null | UserProfile];
  workoutChanged: [session: WorkoutSession];
}

export interface SessionPolicy {
  autoStartOnReading: boolean;
  maxReadingsPerSession: null | number;
  restartPolicy: RestartPolicy;
}

export interface HealthTrackerOptions {
  repository: TrackerRepository;
  clock?: () => Date;
  generateId?: () => string;
  log?: Logger;
  policy?: Partial<SessionPolicy>;
}

// Serialization keys. Both current sessions share one document, so they share a key.
const CURRENT = 'current';
const MEASUREMENT_HISTORY = 'measurementSessions';
const WORKOUT_HISTORY = 'workoutSessions';
const METRICS = 'healthMetrics';
const PROFILE = 'profile';

/**
 * One document write plus the write that puts the previous version back.
 */
interface StagedWrite {
  key: string;
  restore: () => Promise<void>;
  write: () => Promise<void>;
}

function newestFirst<T extends { timestamp: Date }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
}

/**
 * Owns the current sessions, the history collections, standalone metrics
 * and the profile. Every mutator runs the pure transition, persists the
 * changed documents, then commits and announces the change. Mutations on
 * the same documents run one at a time.
 */
export class HealthTracker extends EventEmitter<TrackerEvents> {
  private clock: () => Date;
  private current: { measurement: MeasurementSession; workout: WorkoutSession };
  private generateId: () => string;
  private log: Logger;
  private metrics: HealthMetric[];
  private measurementSessions: MeasurementSession[];
  private policy: SessionPolicy;
  private queue = new KeyedSerialQueue();
  private repository: TrackerRepository;
  private userProfile: null | UserProfile;
  private workoutSessions: WorkoutSession[];

  private constructor(options: HealthTrackerOptions) {
    super();
    this.repository = options.repository;
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.log = options.log ?? logger.forComponent('tracker');
    this.policy = {
      autoStartOnReading: SessionConfig.autoStartOnReading,
      maxReadingsPerSession: SessionConfig.maxReadingsPerSession,
      restartPolicy: SessionConfig.restartPolicy,
      ...options.policy,
    };

    const now = this.clock();
    this.current = {
      measurement: createMeasurementSession(this.generateId(), now),
      workout: createWorkoutSession(this.generateId(), now),
    };
    this.measurementSessions = [];
    this.workoutSessions = [];
    this.metrics = [];
    this.userProfile = null;
  }

  /**
   * Create a tracker holding whatever the repository has stored.
   */
  static async open(options: HealthTrackerOptions): Promise<HealthTracker> {
    const tracker = new HealthTracker(options);
    const state = await options.repository.load();

    tracker.measurementSessions = state.measurementSessions;
    tracker.workoutSessions = state.workoutSessions;
    tracker.metrics = newestFirst(state.healthMetrics);
    tracker.userProfile = state.profile;
    if (state.currentSessions) {
      tracker.current = { ...state.currentSessions };
    }
    return tracker;
  }

  // ===========================================================================
  // READ ACCESS
  // ===========================================================================

  get currentMeasurement(): MeasurementSession {
    return this.current.measurement;
  }

  get currentWorkout(): WorkoutSession {
    return this.current.workout;
  }

  /** Newest first */
  get measurementHistory(): readonly MeasurementSession[] {
    return this.measurementSessions;
  }

  /** Newest first */
  get workoutHistory(): readonly WorkoutSession[] {
    return this.workoutSessions;
  }

  /** Newest first */
  get healthMetrics(): readonly HealthMetric[] {
    return this.metrics;
  }

  get sessionPolicy(): Readonly<SessionPolicy> {
    return this.policy;
  }

  canAddReading(): boolean {
    return canAddReading(this.current.measurement, this.policy.maxReadingsPerSession);
  }

  // ===========================================================================
  // MEASUREMENT SESSION
  // ===========================================================================

  startMeasurement(): Promise<MutationResult<MeasurementSession>> {
    return this.updateMeasurement('start', (session) =>
      startMeasurementSession(session, this.clock(), this.policy.restartPolicy),
    );
  }

  stopMeasurement(): Promise<MutationResult<MeasurementSession>> {
    return this.updateMeasurement('stop', stopMeasurementSession);
  }

  addReading(reading: Reading): Promise<MutationResult<MeasurementSession>> {
    return this.updateMeasurement('addReading', (session) =>
      addReading(session, reading, {
        autoStart: this.policy.autoStartOnReading,
        maxReadings: this.policy.maxReadingsPerSession,
        now: this.clock(),
        restartPolicy: this.policy.restartPolicy,
      }),
    );
  }

  removeReading(index: number): Promise<MutationResult<MeasurementSession>> {
    return this.updateMeasurement('removeReading', (session) => removeReading(session, index));
  }

  /**
   * @throws UnknownMetricTypeError when the metric type is outside the table
   */
  addSessionMetric(metric: HealthMetric): Promise<MutationResult<MeasurementSession>> {
    return this.updateMeasurement('addMetric', (session) =>
      addMetric(session, metric, {
        autoStart: this.policy.autoStartOnReading,
        now: this.clock(),
        restartPolicy: this.policy.restartPolicy,
      }),
    );
  }

  removeSessionMetric(index: number): Promise<MutationResult<MeasurementSession>> {
    return this.updateMeasurement('removeMetric', (session) => removeMetric(session, index));
  }

  /**
   * Move the current session to the front of the history and start over
   * with an empty one. A session with nothing recorded is left in place.
   */
  completeMeasurement(): Promise<MutationResult<MeasurementSession>> {
    return this.queue.run([CURRENT, MEASUREMENT_HISTORY], async () => {
      const session = this.current.measurement;
      if (isEmptyMeasurement(session)) {
        return fail<MeasurementSession>('empty', 'Nothing has been recorded in this session');
      }

      const now = this.clock();
      const completed = completeMeasurementSession(session, now);
      const history = [completed, ...this.measurementSessions];
      const current = { ...this.current, measurement: createMeasurementSession(this.generateId(), now) };

      const previous = { current: this.current, history: this.measurementSessions };
      await this.commitWrites([
        {
          key: CURRENT,
          restore: () => this.repository.saveCurrentSessions(previous.current),
          write: () => this.repository.saveCurrentSessions(current),
        },
        {
          key: MEASUREMENT_HISTORY,
          restore: () => this.repository.saveMeasurementSessions(previous.history),
          write: () => this.repository.saveMeasurementSessions(history),
        },
      ]);
      this.measurementSessions = history;
      this.current = current;

      debugSession(this.log, 'completeMeasurement', { outcome: 'ok', sessionId: completed.id });
      this.log.info('Measurement session completed', {
        metrics: completed.metrics.length,
        readings: completed.readings.length,
        sessionId: completed.id,
      });
      this.emit('historyChanged', 'measurement');
      this.emit('measurementChanged', current.measurement);
      return succeed(completed);
    });
  }

  /**
   * Throw away the current session without recording it.
   */
  discardMeasurement(): Promise<MeasurementSession> {
    return this.queue.run([CURRENT], async () => {
      const current = {
        ...this.current,
        measurement: createMeasurementSession(this.generateId(), this.clock()),
      };
      await this.repository.saveCurrentSessions(current);
      this.current = current;
      this.emit('measurementChanged', current.measurement);
      return current.measurement;
    });
  }

  // ===========================================================================
  // MEASUREMENT HISTORY
  // ===========================================================================

  deleteMeasurementSession(id: string): Promise<MutationResult<number>> {
    return this.removeMeasurementHistory((session) => session.id === id).then((removed) =>
      removed === 0 ? fail<number>('notFound', `No measurement session with id ${id}`) : succeed(removed),
    );
  }

  /**
   * Delete every session that started on the given local calendar day.
   */
  deleteMeasurementSessionsOn(date: Date): Promise<number> {
    return this.removeMeasurementHistory((session) => isSameLocalDay(session.startTime, date));
  }

  deleteAllMeasurementSessions(): Promise<number> {
    return this.removeMeasurementHistory(() => true);
  }

  // ===========================================================================
  // WORKOUT SESSION
  // ===========================================================================

  startWorkout(): Promise<MutationResult<WorkoutSession>> {
    return this.updateWorkout('start', (session) => startWorkout(session, this.clock()));
  }

  pauseWorkout(): Promise<MutationResult<WorkoutSession>> {
    return this.updateWorkout('pause', pauseWorkout);
  }

  resumeWorkout(): Promise<MutationResult<WorkoutSession>> {
    return this.updateWorkout('resume', resumeWorkout);
  }

  addExercise(exerciseType: string): Promise<MutationResult<WorkoutSession>> {
    return this.updateWorkout('addExercise', (session) =>
      addExerciseSession(session, createExerciseSession(this.generateId(), exerciseType, this.clock())),
    );
  }

  removeExercise(index: number): Promise<MutationResult<WorkoutSession>> {
    return this.updateWorkout('removeExercise', (session) => removeExerciseSession(session, index));
  }

  addSet(exerciseIndex: number, set: ExerciseSet): Promise<MutationResult<WorkoutSession>> {
    return this.updateWorkout('addSet', (session) => addSet(session, exerciseIndex, set));
  }

  removeSet(exerciseIndex: number, setIndex: number): Promise<MutationResult<WorkoutSession>> {
    return this.updateWorkout('removeSet', (session) => removeSet(session, exerciseIndex, setIndex));
  }

  completeExercise(exerciseIndex: number): Promise<MutationResult<WorkoutSession>> {
    return this.updateWorkout('completeExercise', (session) =>
      completeExercise(session, exerciseIndex, this.clock()),
    );
  }

  /**
   * Replace the current workout with a not-started one laid out with the
   * given exercises.
   */
  loadWorkoutPlan(exerciseTypes: readonly string[]): Promise<MutationResult<WorkoutSession>> {
    return this.updateWorkout('loadPlan', () => {
      const now = this.clock();
      return loadWorkoutPlan(
        this.generateId(),
        exerciseTypes.map((type) => createExerciseSession(this.generateId(), type, now)),
        now,
      );
    });
  }

  /**
   * Complete the current workout, move it to the front of the history and
   * start over. A workout without exercises is not recorded.
   */
  completeWorkout(): Promise<MutationResult<WorkoutSession>> {
    return this.queue.run([CURRENT, WORKOUT_HISTORY], async () => {
      const session = this.current.workout;
      if (session.exerciseSessions.length === 0) {
        return fail<WorkoutSession>('empty', 'The workout has no exercises');
      }

      const now = this.clock();
      const result = completeWorkout(session, now);
      if (!result.ok) return result;

      const history = [result.value, ...this.workoutSessions];
      const current = { ...this.current, workout: createWorkoutSession(this.generateId(), now) };

      const previous = { current: this.current, history: this.workoutSessions };
      await this.commitWrites([
        {
          key: CURRENT,
          restore: () => this.repository.saveCurrentSessions(previous.current),
          write: () => this.repository.saveCurrentSessions(current),
        },
        {
          key: WORKOUT_HISTORY,
          restore: () => this.repository.saveWorkoutSessions(previous.history),
          write: () => this.repository.saveWorkoutSessions(history),
        },
      ]);
      this.workoutSessions = history;
      this.current = current;

      this.log.info('Workout completed', {
        exercises: result.value.exerciseSessions.length,
        workoutId: result.value.id,
      });
      this.emit('historyChanged', 'workout');
      this.emit('workoutChanged', current.workout);
      return result;
    });
  }

  discardWorkout(): Promise<WorkoutSession> {
    return this.queue.run([CURRENT], async () => {
      const current = { ...this.current, workout: createWorkoutSession(this.generateId(), this.clock()) };
      await this.repository.saveCurrentSessions(current);
      this.current = current;
      this.emit('workoutChanged', current.workout);
      return current.workout;
    });
  }

  // ===========================================================================
  // WORKOUT HISTORY
  // ===========================================================================

  deleteWorkoutSession(id: string): Promise<MutationResult<number>> {
    return this.removeWorkoutHistory((session) => session.id === id).then((removed) =>
      removed === 0 ? fail<number>('notFound', `No workout session with id ${id}`) : succeed(removed),
    );
  }

  deleteWorkoutSessionsOn(date: Date): Promise<number> {
    return this.removeWorkoutHistory((session) => isSameLocalDay(session.startTime, date));
  }

  deleteAllWorkoutSessions(): Promise<number> {
    return this.removeWorkoutHistory(() => true);
  }

  // ===========================================================================
  // STANDALONE METRICS
  // ===========================================================================

  /**
   * @throws UnknownMetricTypeError when the metric type is outside the table
   */
  addHealthMetric(metric: HealthMetric): Promise<MutationResult<HealthMetric>> {
    if (!isValidMetric(metric.type, metric.value)) {
      return Promise.resolve(
        fail<HealthMetric>('invalid', `${metric.type} value ${String(metric.value)} is outside the plausible range`),
      );
    }
    return this.queue.run([METRICS], async () => {
      const metrics = newestFirst([metric, ...this.metrics]);
      await this.repository.saveHealthMetrics(metrics);
      this.metrics = metrics;
      this.emit('metricsChanged', metrics);
      return succeed(metric);
    });
  }

  removeHealthMetric(id: string): Promise<MutationResult<HealthMetric>> {
    return this.queue.run([METRICS], async () => {
      const metric = this.metrics.find((candidate) => candidate.id === id);
      if (!metric) return fail<HealthMetric>('notFound', `No health metric with id ${id}`);

      const metrics = this.metrics.filter((candidate) => candidate.id !== id);
      await this.repository.saveHealthMetrics(metrics);
      this.metrics = metrics;
      this.emit('metricsChanged', metrics);
      return succeed(metric);
    });
  }

  /**
   * Newest first, optionally narrowed to one type and capped.
   */
  getHealthMetrics(type?: MetricType, limit?: number): HealthMetric[] {
    const filtered = type ? this.metrics.filter((metric) => metric.type === type) : [...this.metrics];
    return limit === undefined ? filtered : filtered.slice(0, limit);
  }

  getLatestHealthMetric(type: MetricType): HealthMetric | undefined {
    return this.metrics.find((metric) => metric.type === type);
  }

  /**
   * Metrics with `from ≤ timestamp ≤ to`, newest first.
   */
  getHealthMetricsBetween(from: Date, to: Date): HealthMetric[] {
    return this.metrics.filter(
      (metric) =>
        metric.timestamp.getTime() >= from.getTime() && metric.timestamp.getTime() <= to.getTime(),
    );
  }

  getHealthMetricsOn(date: Date): HealthMetric[] {
    return this.metrics.filter((metric) => isSameLocalDay(metric.timestamp, date));
  }

  // ===========================================================================
  // PROFILE
  // ===========================================================================

  getProfile(): null | UserProfile {
    return this.userProfile;
  }

  setProfile(profile: null | UserProfile): Promise<void> {
    return this.queue.run([PROFILE], async () => {
      await this.repository.saveProfile(profile);
      this.userProfile = profile;
      this.emit('profileChanged', profile);
    });
  }

  // ===========================================================================
  // SYNC AND BACKUP HOOKS
  // ===========================================================================

  snapshot(): TrackerSnapshot {
    return {
      healthMetrics: this.metrics,
      measurementSessions: this.measurementSessions,
      profile: this.userProfile,
      workoutSessions: this.workoutSessions,
    };
  }

  /**
   * Replace whole collections, as a pull or a backup restore does.
   * Collections left out of `update` are kept. If any write fails, the
   * collections already written are put back and nothing changes in memory.
   */
  replaceCollections(update: Partial<TrackerSnapshot>): Promise<void> {
    const keys = [
      update.measurementSessions && MEASUREMENT_HISTORY,
      update.workoutSessions && WORKOUT_HISTORY,
      update.healthMetrics && METRICS,
      update.profile !== undefined && PROFILE,
    ].filter((key): key is string => typeof key === 'string');

    return this.queue.run(keys, async () => {
      const { healthMetrics, measurementSessions, profile, workoutSessions } = update;
      const previous = this.snapshot();
      const writes: StagedWrite[] = [];
      if (measurementSessions) {
        writes.push({
          key: MEASUREMENT_HISTORY,
          restore: () => this.repository.saveMeasurementSessions(previous.measurementSessions),
          write: () => this.repository.saveMeasurementSessions(measurementSessions),
        });
      }
      if (workoutSessions) {
        writes.push({
          key: WORKOUT_HISTORY,
          restore: () => this.repository.saveWorkoutSessions(previous.workoutSessions),
          write: () => this.repository.saveWorkoutSessions(workoutSessions),
        });
      }
      if (healthMetrics) {
        writes.push({
          key: METRICS,
          restore: () => this.repository.saveHealthMetrics(previous.healthMetrics),
          write: () => this.repository.saveHealthMetrics(healthMetrics),
        });
      }
      if (profile !== undefined) {
        writes.push({
          key: PROFILE,
          restore: () => this.repository.saveProfile(previous.profile),
          write: () => this.repository.saveProfile(profile),
        });
      }
      await this.commitWrites(writes);

      if (measurementSessions) {
        this.measurementSessions = [...measurementSessions];
        this.emit('historyChanged', 'measurement');
      }
      if (workoutSessions) {
        this.workoutSessions = [...workoutSessions];
        this.emit('historyChanged', 'workout');
      }
      if (healthMetrics) {
        this.metrics = newestFirst(healthMetrics);
        this.emit('metricsChanged', this.metrics);
      }
      if (profile !== undefined) {
        this.userProfile = profile;
        this.emit('profileChanged', profile);
      }
    });
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  /**
   * Apply writes in order. When one fails, the writes already applied are
   * undone newest first and the failure is rethrown.
   */
  private async commitWrites(writes: readonly StagedWrite[]): Promise<void> {
    const applied: StagedWrite[] = [];
    for (const staged of writes) {
      try {
        await staged.write();
      } catch (error) {
        this.log.warn('Document write failed, restoring earlier writes', {
          failedKey: staged.key,
          restoring: applied.map(({ key }) => key).join(','),
        });
        for (const done of applied.reverse()) {
          try {
            await done.restore();
          } catch (restoreError) {
            this.log.error('Failed to restore document', restoreError, { key: done.key });
          }
        }
        throw error;
      }
      applied.push(staged);
    }
  }

  private updateMeasurement(
    operation: string,
    transition: (session: MeasurementSession) => MutationResult<MeasurementSession>,
  ): Promise<MutationResult<MeasurementSession>> {
    return this.queue.run([CURRENT], async () => {
      const result = transition(this.current.measurement);
      debugSession(this.log, operation, {
        outcome: result.ok ? 'ok' : result.reason,
        sessionId: this.current.measurement.id,
      });
      if (!result.ok) return result;

      const current = { ...this.current, measurement: result.value };
      await this.repository.saveCurrentSessions(current);
      this.current = current;
      this.emit('measurementChanged', result.value);
      return result;
    });
  }

  private updateWorkout(
    operation: string,
    transition: (session: WorkoutSession) => MutationResult<WorkoutSession>,
  ): Promise<MutationResult<WorkoutSession>> {
    return this.queue.run([CURRENT], async () => {
      const result = transition(this.current.workout);
      debugSession(this.log, operation, {
        outcome: result.ok ? 'ok' : result.reason,
        sessionId: this.current.workout.id,
      });
      if (!result.ok) return result;

      const current = { ...this.current, workout: result.value };
      await this.repository.saveCurrentSessions(current);
      this.current = current;
      this.emit('workoutChanged', result.value);
      return result;
    });
  }

  private removeMeasurementHistory(
    predicate: (session: MeasurementSession) => boolean,
  ): Promise<number> {
    return this.queue.run([MEASUREMENT_HISTORY], async () => {
      const kept = this.measurementSessions.filter((session) => !predicate(session));
      const removed = this.measurementSessions.length - kept.length;
      if (removed === 0) return 0;

      await this.repository.saveMeasurementSessions(kept);
      this.measurementSessions = kept;
      this.emit('historyChanged', 'measurement');
      return removed;
    });
  }

  private removeWorkoutHistory(predicate: (session: WorkoutSession) => boolean): Promise<number> {
    return this.queue.run([WORKOUT_HISTORY], async () => {
      const kept = this.workoutSessions.filter((session) => !predicate(session));
      const removed = this.workoutSessions.length - kept.length;
      if (removed === 0) return 0;

      await this.repository.saveWorkoutSessions(kept);
      this.workoutSessions = kept;
      this.emit('historyChanged', 'workout');
      return removed;
    });
  }
}
