export { FileLocalStore, InMemoryLocalStore } from './LocalStore';
export type { LocalStore } from './LocalStore';
export { FileRemoteStore } from './FileRemoteStore';
export { InMemoryRemoteStore } from './RemoteStore';
export type { RemoteCallOptions, RemoteStore } from './RemoteStore';
export { TrackerRepository } from './TrackerRepository';
export type { PersistedState } from './TrackerRepository';
