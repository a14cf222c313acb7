/**
 * Persistence and remote store shapes.
 */

import type { MeasurementSession } from './measurement';
import type { HealthMetric } from './metric';
import type { UserProfile } from './profile';
import type { WorkoutSession } from './workout';

/**
 * Names of the whole-collection documents shared by the local and remote stores.
 */
export const COLLECTION_NAMES = ['measurementSessions', 'workoutSessions', 'healthMetrics'] as const;

export type CollectionName = (typeof COLLECTION_NAMES)[number];

export interface CollectionItems {
  healthMetrics: HealthMetric[];
  measurementSessions: MeasurementSession[];
  workoutSessions: WorkoutSession[];
}

export interface CurrentSessions {
  measurement: MeasurementSession;
  workout: WorkoutSession;
}

/**
 * Everything the tracker owns, as handed to sync and backup.
 */
export interface TrackerSnapshot extends CollectionItems {
  profile: null | UserProfile;
}

export interface BackupBundle {
  createdAt: Date;
  formatVersion: string;
  measurementSessions: MeasurementSession[];
  profile: null | UserProfile;
  workoutSessions: WorkoutSession[];
}
