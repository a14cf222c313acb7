import { beforeEach, describe, expect, it } from 'vitest';

import { InMemoryRemoteStore } from '../storage/RemoteStore';
import { SyncEngine } from '../sync/SyncEngine';
import { StubResponse, stubRequest } from '../testing/httpStubs';
import { openTestTracker } from '../testing/trackerFixture';
import { createSyncController, describeOutcome } from './sync';

import type { HealthTracker } from '../tracker/HealthTracker';
import type { CollectionItems, CollectionName } from '../types';
import type { SyncController } from './sync';

const NOW = new Date('2025-10-01T12:00:00.000Z');

class UnreachableRemoteStore extends InMemoryRemoteStore {
  override replaceAll<C extends CollectionName>(_collection: C, _items: CollectionItems[C]): Promise<void> {
    return Promise.reject(new Error('remote unreachable'));
  }
}

describe('sync controller', () => {
  let tracker: HealthTracker;
  let remote: InMemoryRemoteStore;
  let controller: SyncController;

  beforeEach(async () => {
    tracker = await openTestTracker(() => NOW);
    remote = new InMemoryRemoteStore();
    controller = createSyncController({
      clock: () => NOW,
      sync: new SyncEngine({ clock: () => NOW, remote, target: tracker }),
      tracker,
    });
  });

  async function signIn(body: unknown): Promise<StubResponse> {
    const res = new StubResponse();
    await controller.signIn(stubRequest({ body }), res);
    return res;
  }

  it('stores the profile and pushes once per sign-in', async () => {
    await tracker.addReading({ diastolic: 80, id: 'r1', systolic: 120, timestamp: NOW });
    await tracker.completeMeasurement();

    const first = await signIn({ email: 'test@example.com', id: 'user-1' });

    expect(first.statusCode).toBe(200);
    expect(first.body).toEqual({
      profile: {
        createdAt: NOW,
        email: 'test@example.com',
        id: 'user-1',
        lastUpdated: NOW,
        preferences: { notificationsEnabled: true, theme: 'system', units: 'imperial' },
      },
      sync: {
        counts: { healthMetrics: 0, measurementSessions: 1, workoutSessions: 0 },
        direction: 'push',
        ok: true,
        syncedAt: NOW,
      },
    });
    expect(await remote.fetchAll('measurementSessions')).toHaveLength(1);

    const second = await signIn({ email: 'test@example.com', id: 'user-1' });
    expect(second.body).toMatchObject({ sync: null });
  });

  it('answers 400 for a sign-in without an email', async () => {
    const res = await signIn({ id: 'user-1' });
    expect(res.statusCode).toBe(400);
  });

  it('reports the status and resets it on sign-out', async () => {
    await signIn({ email: 'test@example.com', id: 'user-1' });

    const status = new StubResponse();
    await controller.status(stubRequest(), status);
    expect(status.body).toMatchObject({
      lastDirection: 'push',
      lastSyncedAt: NOW,
      profile: { id: 'user-1' },
      signedIn: true,
      state: 'idle',
    });

    const signedOut = new StubResponse();
    await controller.signOut(stubRequest(), signedOut);
    expect(signedOut.body).toEqual({ state: 'idle' });
    expect(tracker.getProfile()).toMatchObject({ id: 'user-1' });
  });

  it('pulls the remote collections', async () => {
    await remote.replaceAll('healthMetrics', [
      { id: 'm1', timestamp: NOW, type: 'heartRate', value: 64 },
    ]);

    const res = new StubResponse();
    await controller.pull(stubRequest(), res);

    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({ direction: 'pull', ok: true });
    expect(tracker.healthMetrics).toEqual([{ id: 'm1', timestamp: NOW, type: 'heartRate', value: 64 }]);
  });

  it('answers 503 with the error message when a push fails', async () => {
    const failing = createSyncController({
      clock: () => NOW,
      sync: new SyncEngine({ clock: () => NOW, remote: new UnreachableRemoteStore(), target: tracker }),
      tracker,
    });

    const res = new StubResponse();
    await failing.push(stubRequest(), res);

    expect(res.statusCode).toBe(503);
    expect(res.body).toEqual({ direction: 'push', error: 'remote unreachable', ok: false });
  });

  it('flattens a failed outcome for JSON', () => {
    expect(describeOutcome({ direction: 'pull', error: new Error('timed out'), ok: false })).toEqual({
      direction: 'pull',
      error: 'timed out',
      ok: false,
    });
  });
});
