import { HttpStatus } from '../config';
import { profileFromSignIn } from '../mappers';
import { SignInInputSchema } from '../validation/schemas';
import { resolveContext } from './context';
import { handle, parseInput } from './respond';

import type { SyncEngine, SyncOutcome } from '../sync/SyncEngine';
import type { CollectionName } from '../types';
import type { TrackerControllerOptions } from './context';

export interface SyncControllerOptions extends TrackerControllerOptions {
  sync: SyncEngine;
}

export type SyncOutcomeBody =
  | { counts: Record<CollectionName, number>; direction: string; ok: true; syncedAt: Date }
  | { direction: string; error: string; ok: false };

/**
 * Outcomes carry an Error, which JSON would flatten to `{}`.
 */
export function describeOutcome(outcome: SyncOutcome): SyncOutcomeBody {
  if (outcome.ok) return outcome;
  return { direction: outcome.direction, error: outcome.error.message, ok: false };
}

function outcomeStatus(outcome: SyncOutcome): number {
  return outcome.ok ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE;
}

export function createSyncController(options: SyncControllerOptions) {
  const context = resolveContext(options);
  const { tracker } = context;
  const { sync } = options;

  return {
    status: handle('getSyncStatus', async (_req, res) => {
      res.status(HttpStatus.OK).json({
        ...sync.getStatus(),
        profile: tracker.getProfile(),
        signedIn: sync.isSignedIn,
      });
    }),

    signIn: handle('signIn', async (req, res) => {
      const input = parseInput(SignInInputSchema, req.body, req, res);
      if (!input) return;

      const profile = profileFromSignIn(input, tracker.getProfile(), context.clock());
      const outcome = await sync.handleSignIn(profile);
      req.log.info('Signed in', { initialPush: outcome?.ok ?? 'skipped', userId: profile.id });
      res.status(HttpStatus.OK).json({
        profile,
        sync: outcome ? describeOutcome(outcome) : null,
      });
    }),

    signOut: handle('signOut', async (req, res) => {
      sync.handleSignOut();
      req.log.info('Signed out');
      res.status(HttpStatus.OK).json(sync.getStatus());
    }),

    push: handle('pushToRemote', async (_req, res) => {
      const outcome = await sync.push();
      res.status(outcomeStatus(outcome)).json(describeOutcome(outcome));
    }),

    pull: handle('pullFromRemote', async (_req, res) => {
      const outcome = await sync.pull();
      res.status(outcomeStatus(outcome)).json(describeOutcome(outcome));
    }),
  };
}

export type SyncController = ReturnType<typeof createSyncController>;
