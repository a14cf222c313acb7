export interface UserPreferences {
  notificationsEnabled: boolean;
  theme: 'dark' | 'light' | 'system';
  units: 'imperial' | 'metric';
  /** HH:MM local time */
  reminderTime?: string;
}

export interface UserProfile {
  createdAt: Date;
  email: string;
  id: string;
  lastUpdated: Date;
  preferences: UserPreferences;
  displayName?: string;
  photoURL?: string;
}
