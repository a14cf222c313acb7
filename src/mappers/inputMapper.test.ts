import { describe, expect, it } from 'vitest';

import { sequentialIds } from '../testing/httpStubs';
import { metricFromInput, profileFromSignIn, readingFromInput, setFromInput } from './inputMapper';

import type { UserProfile } from '../types';
import type { MappingContext } from './inputMapper';

const NOW = new Date('2025-07-14T08:00:00.000Z');
const EARLIER = new Date('2025-01-02T10:00:00.000Z');

function context(): MappingContext {
  return { generateId: sequentialIds('id'), now: NOW };
}

describe('readingFromInput', () => {
  it('stamps an id and defaults the timestamp to now', () => {
    expect(readingFromInput({ diastolic: 80, heartRate: 72, systolic: 120 }, context())).toEqual({
      diastolic: 80,
      heartRate: 72,
      id: 'id-1',
      systolic: 120,
      timestamp: NOW,
    });
  });

  it('keeps a supplied timestamp and omits a null heart rate', () => {
    const reading = readingFromInput(
      { diastolic: 80, heartRate: null, systolic: 120, timestamp: EARLIER },
      context(),
    );
    expect(reading).toEqual({ diastolic: 80, id: 'id-1', systolic: 120, timestamp: EARLIER });
    expect('heartRate' in reading).toBe(false);
  });
});

describe('metricFromInput', () => {
  it('builds a metric', () => {
    expect(metricFromInput({ type: 'bloodSugar', value: 98 }, context())).toEqual({
      id: 'id-1',
      timestamp: NOW,
      type: 'bloodSugar',
      value: 98,
    });
  });
});

describe('setFromInput', () => {
  it('keeps only the fields that carry a value', () => {
    const set = setFromInput({ reps: 10, time: null, weight: 95 }, context());
    expect(set).toEqual({ id: 'id-1', reps: 10, timestamp: NOW, weight: 95 });
    expect('time' in set).toBe(false);
  });
});

describe('profileFromSignIn', () => {
  const existing: UserProfile = {
    createdAt: EARLIER,
    displayName: 'Test User',
    email: 'old@example.com',
    id: 'user-1',
    lastUpdated: EARLIER,
    preferences: { notificationsEnabled: false, theme: 'dark', units: 'metric' },
  };

  it('applies default preferences for a new user', () => {
    expect(profileFromSignIn({ email: 'test@example.com', id: 'user-2' }, existing, NOW)).toEqual({
      createdAt: NOW,
      email: 'test@example.com',
      id: 'user-2',
      lastUpdated: NOW,
      preferences: { notificationsEnabled: true, theme: 'system', units: 'imperial' },
    });
  });

  it('keeps what a returning user does not resend', () => {
    const profile = profileFromSignIn(
      { email: 'test@example.com', id: 'user-1', preferences: { theme: 'light' } },
      existing,
      NOW,
    );
    expect(profile).toEqual({
      createdAt: EARLIER,
      displayName: 'Test User',
      email: 'test@example.com',
      id: 'user-1',
      lastUpdated: NOW,
      preferences: { notificationsEnabled: false, theme: 'light', units: 'metric' },
    });
  });
});
