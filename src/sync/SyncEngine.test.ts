import { describe, expect, it, vi } from 'vitest';

import { SyncTimeoutError } from '../errors';
import { InMemoryRemoteStore } from '../storage/RemoteStore';
import { SyncEngine } from './SyncEngine';

import type { RemoteCallOptions } from '../storage/RemoteStore';
import type {
  CollectionItems,
  CollectionName,
  MeasurementSession,
  TrackerSnapshot,
  UserProfile,
  WorkoutSession,
} from '../types';
import type { SyncStatus, SyncTarget } from './SyncEngine';

const DAY = new Date('2025-08-01T06:30:00.000Z');

class FakeTarget implements SyncTarget {
  state: TrackerSnapshot;
  replaceCollections = vi.fn((update: Partial<TrackerSnapshot>) => {
    this.state = { ...this.state, ...update };
    return Promise.resolve();
  });

  constructor(state: Partial<TrackerSnapshot> = {}) {
    this.state = {
      healthMetrics: [],
      measurementSessions: [],
      profile: null,
      workoutSessions: [],
      ...state,
    };
  }

  setProfile(profile: null | UserProfile): Promise<void> {
    this.state = { ...this.state, profile };
    return Promise.resolve();
  }

  snapshot(): TrackerSnapshot {
    return this.state;
  }
}

class FlakyRemoteStore extends InMemoryRemoteStore {
  constructor(private failOn: CollectionName) {
    super();
  }

  replaceAll<C extends CollectionName>(
    collection: C,
    items: CollectionItems[C],
    options?: RemoteCallOptions,
  ): Promise<void> {
    if (collection === this.failOn) return Promise.reject(new Error('quota exceeded'));
    return super.replaceAll(collection, items, options);
  }
}

// Writes to one collection land late and ignore the abort signal
class SlowWriteRemoteStore extends InMemoryRemoteStore {
  constructor(
    private slowCollection: CollectionName,
    private delayMs: number,
  ) {
    super();
  }

  async replaceAll<C extends CollectionName>(collection: C, items: CollectionItems[C]): Promise<void> {
    if (collection === this.slowCollection) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    return super.replaceAll(collection, items);
  }
}

class RecordingRemoteStore extends InMemoryRemoteStore {
  events: string[] = [];

  fetchAll(collection: CollectionName, options?: RemoteCallOptions): Promise<unknown> {
    return this.record('fetchAll', () => super.fetchAll(collection, options));
  }

  getProfile(options?: RemoteCallOptions): Promise<unknown> {
    return this.record('getProfile', () => super.getProfile(options));
  }

  setProfile(profile: null | UserProfile, options?: RemoteCallOptions): Promise<void> {
    return this.record('setProfile', () => super.setProfile(profile, options));
  }

  private async record<T>(name: string, call: () => Promise<T>): Promise<T> {
    this.events.push(`start ${name}`);
    await new Promise((resolve) => setTimeout(resolve, 5));
    const result = await call();
    this.events.push(`end ${name}`);
    return result;
  }
}

function measurement(id: string, systolic: number): MeasurementSession {
  return {
    endTime: DAY,
    id,
    isActive: false,
    metrics: [],
    readings: [{ diastolic: 80, id: `${id}-r`, systolic, timestamp: DAY }],
    startTime: DAY,
  };
}

function workout(id: string): WorkoutSession {
  return {
    endTime: DAY,
    exerciseSessions: [],
    id,
    isActive: false,
    isCompleted: true,
    isPaused: false,
    startTime: DAY,
  };
}

const profile: UserProfile = {
  createdAt: DAY,
  email: 'someone@example.com',
  id: 'user-1',
  lastUpdated: DAY,
  preferences: { notificationsEnabled: false, theme: 'dark', units: 'metric' },
};

describe('SyncEngine', () => {
  it('pushes every local collection and the profile', async () => {
    const remote = new InMemoryRemoteStore();
    const target = new FakeTarget({
      healthMetrics: [{ id: 'w', timestamp: DAY, type: 'weight', value: 175 }],
      measurementSessions: [measurement('m1', 120)],
      profile,
      workoutSessions: [workout('w1')],
    });
    const engine = new SyncEngine({ clock: () => DAY, remote, target });

    const outcome = await engine.push();

    expect(outcome).toEqual({
      counts: { healthMetrics: 1, measurementSessions: 1, workoutSessions: 1 },
      direction: 'push',
      ok: true,
      syncedAt: DAY,
    });
    expect(await remote.fetchAll('workoutSessions')).toEqual([
      {
        endTime: '2025-08-01T06:30:00.000Z',
        exerciseSessions: [],
        id: 'w1',
        isActive: false,
        isCompleted: true,
        isPaused: false,
        startTime: '2025-08-01T06:30:00.000Z',
      },
    ]);
    expect(await remote.getProfile()).toMatchObject({ email: 'someone@example.com' });
    expect(engine.getStatus()).toEqual({ lastDirection: 'push', lastSyncedAt: DAY, state: 'idle' });
  });

  it('pulls remote collections into the target with dates restored', async () => {
    const remote = new InMemoryRemoteStore();
    await remote.replaceAll('measurementSessions', [measurement('remote', 131)]);
    await remote.setProfile(profile);
    const target = new FakeTarget({ measurementSessions: [measurement('local', 118)] });

    const outcome = await new SyncEngine({ remote, target }).pull();

    expect(outcome).toMatchObject({ direction: 'pull', ok: true });
    expect(target.state.measurementSessions).toEqual([measurement('remote', 131)]);
    expect(target.state.measurementSessions[0].startTime).toBeInstanceOf(Date);
    expect(target.state.profile).toEqual(profile);
  });

  it('keeps the local profile when the remote has none', async () => {
    const target = new FakeTarget({ profile });
    await new SyncEngine({ remote: new InMemoryRemoteStore(), target }).pull();
    expect(target.state.profile).toEqual(profile);
  });

  it('leaves local state untouched when a pull fails', async () => {
    const remote = new InMemoryRemoteStore();
    await remote.replaceAll('measurementSessions', [measurement('remote', 131)]);
    vi.spyOn(remote, 'fetchAll').mockImplementation((collection: CollectionName) =>
      collection === 'workoutSessions'
        ? Promise.reject(new Error('connection reset'))
        : Promise.resolve([]),
    );
    const target = new FakeTarget({ measurementSessions: [measurement('local', 118)] });
    const engine = new SyncEngine({ remote, target });

    const outcome = await engine.pull();

    expect(outcome).toMatchObject({ direction: 'pull', ok: false });
    expect(target.replaceCollections).not.toHaveBeenCalled();
    expect(target.state.measurementSessions).toEqual([measurement('local', 118)]);
    expect(engine.getStatus()).toEqual({
      lastDirection: 'pull',
      lastError: 'connection reset',
      state: 'failed',
    });
  });

  it('rejects a remote document with the wrong shape before touching local state', async () => {
    const remote = new InMemoryRemoteStore();
    vi.spyOn(remote, 'fetchAll').mockResolvedValue([{ id: 42 }]);
    const target = new FakeTarget();

    const outcome = await new SyncEngine({ remote, target }).pull();

    expect(outcome.ok).toBe(false);
    expect(target.replaceCollections).not.toHaveBeenCalled();
  });

  it('restores the remote when a push fails part way', async () => {
    const remote = new FlakyRemoteStore('workoutSessions');
    await remote.replaceAll('measurementSessions', [measurement('remote', 131)]);
    const target = new FakeTarget({ measurementSessions: [measurement('local', 118)] });

    const outcome = await new SyncEngine({ remote, target }).push();

    expect(outcome).toMatchObject({ direction: 'push', ok: false });
    expect(await remote.fetchAll('measurementSessions')).toEqual([
      {
        endTime: '2025-08-01T06:30:00.000Z',
        id: 'remote',
        isActive: false,
        metrics: [],
        readings: [
          { diastolic: 80, id: 'remote-r', systolic: 131, timestamp: '2025-08-01T06:30:00.000Z' },
        ],
        startTime: '2025-08-01T06:30:00.000Z',
      },
    ]);
  });

  it('restores a collection whose write landed after the push timed out', async () => {
    const remote = new SlowWriteRemoteStore('measurementSessions', 40);
    await remote.replaceAll('measurementSessions', [measurement('remote', 131)]);
    const target = new FakeTarget({ measurementSessions: [measurement('local', 118)] });

    const outcome = await new SyncEngine({ remote, target, timeoutMs: 10 }).push();

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(SyncTimeoutError);
    }
    expect(await remote.fetchAll('measurementSessions')).toMatchObject([{ id: 'remote' }]);
    expect(await remote.fetchAll('workoutSessions')).toEqual([]);
  });

  it('restores the remote profile when setting it fails', async () => {
    const remote = new InMemoryRemoteStore();
    await remote.setProfile(profile);
    vi.spyOn(remote, 'setProfile').mockRejectedValueOnce(new Error('permission denied'));
    const target = new FakeTarget({ profile: { ...profile, email: 'other@example.com' } });

    const outcome = await new SyncEngine({ remote, target }).push();

    expect(outcome).toMatchObject({ direction: 'push', ok: false });
    expect(await remote.getProfile()).toMatchObject({ email: 'someone@example.com' });
  });

  it('runs concurrent syncs one after the other', async () => {
    const remote = new RecordingRemoteStore();
    const engine = new SyncEngine({ remote, target: new FakeTarget() });
    const [pushed, pulled] = await Promise.all([engine.push(), engine.pull()]);

    expect(pushed.ok && pulled.ok).toBe(true);
    const { events } = remote;
    const pushFinished = events.indexOf('end setProfile');
    expect(events.lastIndexOf('start getProfile')).toBeGreaterThan(pushFinished);
    expect(events.slice(0, pushFinished).filter((event) => event === 'start fetchAll')).toHaveLength(3);
    expect(events.slice(pushFinished).filter((event) => event === 'start fetchAll')).toHaveLength(3);
  });

  it('fails the sync when a remote call outlives the timeout', async () => {
    const remote = new InMemoryRemoteStore();
    vi.spyOn(remote, 'fetchAll').mockImplementation(
      (_collection: CollectionName, options?: RemoteCallOptions) =>
        new Promise((_, reject) => {
          options?.signal?.addEventListener('abort', () => {
            reject(new Error('aborted'));
          });
        }),
    );
    const engine = new SyncEngine({ remote, target: new FakeTarget(), timeoutMs: 10 });

    const outcome = await engine.pull();

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(SyncTimeoutError);
    }
    expect(engine.getStatus().state).toBe('failed');
  });

  it('pushes once per signed-in session', async () => {
    const remote = new InMemoryRemoteStore();
    const replaceAll = vi.spyOn(remote, 'replaceAll');
    const target = new FakeTarget();
    const engine = new SyncEngine({ remote, target });

    expect(await engine.handleSignIn(profile)).toMatchObject({ direction: 'push', ok: true });
    expect(await engine.handleSignIn(profile)).toBeUndefined();
    expect(replaceAll).toHaveBeenCalledTimes(3);
    expect(target.state.profile).toEqual(profile);

    engine.handleSignOut();
    expect(engine.getStatus()).toEqual({ state: 'idle' });
    await engine.handleSignIn(profile);
    expect(replaceAll).toHaveBeenCalledTimes(6);
  });

  it('shares one push between overlapping sign-ins', async () => {
    const remote = new InMemoryRemoteStore();
    const replaceAll = vi.spyOn(remote, 'replaceAll');
    const engine = new SyncEngine({ remote, target: new FakeTarget() });

    const [first, second] = await Promise.all([engine.handleSignIn(profile), engine.handleSignIn(profile)]);

    expect(first).toMatchObject({ direction: 'push', ok: true });
    expect(second).toBe(first);
    expect(replaceAll).toHaveBeenCalledTimes(3);
    expect(await engine.handleSignIn(profile)).toBeUndefined();
  });

  it('resolves a failed outcome when the profile cannot be stored', async () => {
    const target = new FakeTarget();
    vi.spyOn(target, 'setProfile').mockRejectedValue(new Error('disk full'));
    const engine = new SyncEngine({ remote: new InMemoryRemoteStore(), target });

    const outcome = await engine.handleSignIn(profile);

    expect(outcome).toMatchObject({ direction: 'push', ok: false });
    expect(engine.getStatus()).toEqual({ lastDirection: 'push', lastError: 'disk full', state: 'failed' });
    expect(engine.isSignedIn).toBe(false);
  });

  it('announces status changes', async () => {
    const engine = new SyncEngine({ clock: () => DAY, remote: new InMemoryRemoteStore(), target: new FakeTarget() });
    const statuses: SyncStatus[] = [];
    engine.on('statusChanged', (status) => statuses.push(status));

    await engine.pull();

    expect(statuses).toEqual([
      { lastDirection: 'pull', state: 'syncing' },
      { lastDirection: 'pull', lastSyncedAt: DAY, state: 'idle' },
    ]);
  });
});
