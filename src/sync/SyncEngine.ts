import { EventEmitter } from 'node:events';

import { SyncConfig } from '../config';
import { RemoteStoreError } from '../errors';
import { COLLECTION_NAMES } from '../types';
import { debugSync } from '../utils/debugLogger';
import { logger } from '../utils/logger';
import { KeyedSerialQueue } from '../utils/serialQueue';
import {
  HealthMetricsSchema,
  MeasurementHistorySchema,
  NullableProfileSchema,
  WorkoutHistorySchema,
} from '../validation/schemas';
import { withTimeout } from './timeout';

import type { RemoteStore } from '../storage/RemoteStore';
import type { CollectionItems, CollectionName, TrackerSnapshot, UserProfile } from '../types';
import type { Logger } from '../utils/logger';
import type { z } from 'zod';

export type SyncDirection = 'pull' | 'push';

export type SyncState = 'failed' | 'idle' | 'syncing';

export interface SyncStatus {
  state: SyncState;
  lastDirection?: SyncDirection;
  lastError?: string;
  lastSyncedAt?: Date;
}

export type SyncOutcome =
  | {
      counts: Record<CollectionName, number>;
      direction: SyncDirection;
      ok: true;
      syncedAt: Date;
    }
  | { direction: SyncDirection; error: Error; ok: false };

/**
 * The local side of a sync: the tracker, or a stand-in for it.
 */
export interface SyncTarget {
  replaceCollections(update: Partial<TrackerSnapshot>): Promise<void>;
  setProfile(profile: null | UserProfile): Promise<void>;
  snapshot(): TrackerSnapshot;
}

export interface SyncEvents {
  statusChanged: [status: SyncStatus];
}

export interface SyncEngineOptions {
  remote: RemoteStore;
  target: SyncTarget;
  clock?: () => Date;
  log?: Logger;
  timeoutMs?: number;
}

const COLLECTION_SCHEMAS: {
  [C in CollectionName]: z.ZodType<CollectionItems[C], z.ZodTypeDef, unknown>;
} = {
  healthMetrics: HealthMetricsSchema,
  measurementSessions: MeasurementHistorySchema,
  workoutSessions: WorkoutHistorySchema,
};

// Everything a push or pull touches; operations queue behind each other per key
const SYNC_KEYS: readonly string[] = [...COLLECTION_NAMES, 'profile'];

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function countItems(collections: CollectionItems): Record<CollectionName, number> {
  return {
    healthMetrics: collections.healthMetrics.length,
    measurementSessions: collections.measurementSessions.length,
    workoutSessions: collections.workoutSessions.length,
  };
}

/**
 * Whole-collection, last-writer-wins reconciliation between the tracker and
 * a remote store. Operations never reject: they resolve to a SyncOutcome and
 * record failures in the status. Failed syncs are not retried here.
 */
export class SyncEngine extends EventEmitter<SyncEvents> {
  private clock: () => Date;
  private hasPushedSinceSignIn = false;
  private signInEpoch = 0;
  private signInPush: Promise<SyncOutcome> | undefined;
  private inFlight = 0;
  private log: Logger;
  private queue = new KeyedSerialQueue();
  private remote: RemoteStore;
  private status: SyncStatus = { state: 'idle' };
  private target: SyncTarget;
  private timeoutMs: number;

  constructor(options: SyncEngineOptions) {
    super();
    this.remote = options.remote;
    this.target = options.target;
    this.clock = options.clock ?? (() => new Date());
    this.log = options.log ?? logger.forComponent('sync');
    this.timeoutMs = options.timeoutMs ?? SyncConfig.timeoutMs;
  }

  getStatus(): SyncStatus {
    return { ...this.status };
  }

  get isSignedIn(): boolean {
    return this.hasPushedSinceSignIn;
  }

  /**
   * Replace every remote collection and the remote profile with the local
   * versions. If a write fails or times out, every write already started is
   * allowed to settle and the documents it touched are put back before the
   * queue moves on.
   */
  push(): Promise<SyncOutcome> {
    return this.run('push', async () => {
      const local = this.target.snapshot();
      const [previous, previousProfile] = await Promise.all([
        this.fetchRemoteCollections(),
        this.fetchRemoteProfile(),
      ]);
      const started: CollectionName[] = [];
      const pending: Array<Promise<unknown>> = [];
      let profileStarted = false;

      try {
        for (const collection of COLLECTION_NAMES) {
          started.push(collection);
          await this.replaceRemote(collection, local, pending);
        }
        profileStarted = true;
        await this.call('setProfile', (signal) => this.remote.setProfile(local.profile, { signal }), pending);
      } catch (error) {
        await Promise.allSettled(pending);
        await this.rollback(started, previous, profileStarted ? { profile: previousProfile } : undefined);
        throw error;
      }

      return countItems(local);
    });
  }

  /**
   * Overwrite the local collections with the remote ones. Everything is
   * fetched and validated first; nothing local changes if any part fails.
   * A remote without a profile leaves the local profile alone.
   */
  pull(): Promise<SyncOutcome> {
    return this.run('pull', async () => {
      const [collections, profile] = await Promise.all([
        this.fetchRemoteCollections(),
        this.fetchRemoteProfile(),
      ]);

      await this.target.replaceCollections(profile === null ? collections : { ...collections, profile });
      return countItems(collections);
    });
  }

  /**
   * Record the signed-in profile and push the local history, once per
   * signed-in session. Later calls before sign-out resolve undefined.
   */
  async handleSignIn(profile: UserProfile): Promise<SyncOutcome | undefined> {
    try {
      await this.target.setProfile(profile);
    } catch (caught) {
      const error = toError(caught);
      this.log.error('Failed to store the signed-in profile', error);
      this.setStatus({ ...this.status, lastDirection: 'push', lastError: error.message, state: 'failed' });
      return { direction: 'push', error, ok: false };
    }
    if (this.hasPushedSinceSignIn) return undefined;

    // Overlapping sign-ins share one push
    this.signInPush ??= this.pushForSignIn();
    return this.signInPush;
  }

  handleSignOut(): void {
    this.signInEpoch += 1;
    this.signInPush = undefined;
    this.hasPushedSinceSignIn = false;
    this.setStatus({ state: 'idle' });
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async pushForSignIn(): Promise<SyncOutcome> {
    const epoch = this.signInEpoch;
    try {
      const outcome = await this.push();
      if (outcome.ok && epoch === this.signInEpoch) this.hasPushedSinceSignIn = true;
      return outcome;
    } finally {
      if (epoch === this.signInEpoch) this.signInPush = undefined;
    }
  }

  /**
   * Run one remote call under the sync timeout. When `pending` is given the
   * call's own promise is recorded there, so a caller can wait for a write
   * that outlived its timeout.
   */
  private call<T>(
    operation: string,
    task: (signal: AbortSignal) => Promise<T>,
    pending?: Array<Promise<unknown>>,
  ): Promise<T> {
    return withTimeout(operation, this.timeoutMs, (signal) => {
      const attempt = task(signal);
      pending?.push(attempt);
      return attempt;
    });
  }

  private async fetchRemoteProfile(): Promise<null | UserProfile> {
    const raw = await this.call('getProfile', (signal) => this.remote.getProfile({ signal }));
    const result = NullableProfileSchema.safeParse(raw);
    if (!result.success) {
      throw new RemoteStoreError('profile', 'Remote profile failed validation', { cause: result.error });
    }
    return result.data;
  }

  private async fetchRemoteCollections(): Promise<CollectionItems> {
    const [healthMetrics, measurementSessions, workoutSessions] = await Promise.all([
      this.fetchRemote('healthMetrics'),
      this.fetchRemote('measurementSessions'),
      this.fetchRemote('workoutSessions'),
    ]);
    return { healthMetrics, measurementSessions, workoutSessions };
  }

  private async fetchRemote<C extends CollectionName>(collection: C): Promise<CollectionItems[C]> {
    const raw = await this.call(`fetch ${collection}`, (signal) =>
      this.remote.fetchAll(collection, { signal }),
    );
    const result = COLLECTION_SCHEMAS[collection].safeParse(raw);
    if (!result.success) {
      throw new RemoteStoreError(collection, `Remote ${collection} failed validation`, {
        cause: result.error,
      });
    }
    debugSync(this.log, 'Fetched remote collection', {
      collection,
      itemCount: result.data.length,
    });
    return result.data;
  }

  private replaceRemote(
    collection: CollectionName,
    source: CollectionItems,
    pending?: Array<Promise<unknown>>,
  ): Promise<void> {
    return this.call(
      `replace ${collection}`,
      (signal) => this.remote.replaceAll(collection, source[collection], { signal }),
      pending,
    );
  }

  private async rollback(
    started: readonly CollectionName[],
    previous: CollectionItems,
    previousProfile?: { profile: null | UserProfile },
  ): Promise<void> {
    const pending: Array<Promise<unknown>> = [];
    const restores: Array<{ name: string; restore: Promise<void> }> = started.map((collection) => ({
      name: collection,
      restore: this.replaceRemote(collection, previous, pending),
    }));
    if (previousProfile) {
      restores.push({
        name: 'profile',
        restore: this.call(
          'restore profile',
          (signal) => this.remote.setProfile(previousProfile.profile, { signal }),
          pending,
        ),
      });
    }

    const results = await Promise.allSettled(restores.map(({ restore }) => restore));
    await Promise.allSettled(pending);
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.log.error('Failed to restore remote document after a failed push', result.reason, {
          document: restores[index].name,
        });
      }
    });
    if (restores.length > 0) {
      this.log.warn('Restored remote documents after a failed push', {
        documents: restores.map(({ name }) => name).join(','),
      });
    }
  }

  private run(
    direction: SyncDirection,
    task: () => Promise<Record<CollectionName, number>>,
  ): Promise<SyncOutcome> {
    return this.queue.run(SYNC_KEYS, async (): Promise<SyncOutcome> => {
      this.inFlight += 1;
      this.setStatus({ ...this.status, lastDirection: direction, state: 'syncing' });
      const timer = this.log.startTimer(`sync ${direction}`);

      try {
        const counts = await task();
        const syncedAt = this.clock();
        timer.end('info', `Sync ${direction} completed`, counts);
        this.inFlight -= 1;
        this.setStatus({
          lastDirection: direction,
          lastSyncedAt: syncedAt,
          state: this.inFlight > 0 ? 'syncing' : 'idle',
        });
        return { counts, direction, ok: true, syncedAt };
      } catch (caught) {
        const error = toError(caught);
        this.log.error(`Sync ${direction} failed`, error);
        this.inFlight -= 1;
        this.setStatus({
          ...this.status,
          lastDirection: direction,
          lastError: error.message,
          state: 'failed',
        });
        return { direction, error, ok: false };
      }
    });
  }

  private setStatus(status: SyncStatus): void {
    this.status = status;
    this.emit('statusChanged', this.getStatus());
  }
}
