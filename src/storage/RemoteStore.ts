import type { CollectionItems, CollectionName, UserProfile } from '../types';

export interface RemoteCallOptions {
  /** Aborted when the caller gives up on the call */
  signal?: AbortSignal;
}

/**
 * Remote document store contract. Whole collections move in one call;
 * there is no per-record API. Reads return raw documents that the caller
 * validates.
 */
export interface RemoteStore {
  /** Resolves an empty array for a collection never written */
  fetchAll(collection: CollectionName, options?: RemoteCallOptions): Promise<unknown>;
  /** Resolves null when no profile was stored */
  getProfile(options?: RemoteCallOptions): Promise<unknown>;
  replaceAll<C extends CollectionName>(
    collection: C,
    items: CollectionItems[C],
    options?: RemoteCallOptions,
  ): Promise<void>;
  setProfile(profile: null | UserProfile, options?: RemoteCallOptions): Promise<void>;
}

/**
 * Remote store held in process memory, for tests and local development.
 * Documents pass through JSON the way they would over the wire.
 */
export class InMemoryRemoteStore implements RemoteStore {
  private documents = new Map<string, string>();

  fetchAll(collection: CollectionName, options?: RemoteCallOptions): Promise<unknown> {
    options?.signal?.throwIfAborted();
    return Promise.resolve(this.readDocument(collection) ?? []);
  }

  getProfile(options?: RemoteCallOptions): Promise<unknown> {
    options?.signal?.throwIfAborted();
    return Promise.resolve(this.readDocument('profile') ?? null);
  }

  replaceAll<C extends CollectionName>(
    collection: C,
    items: CollectionItems[C],
    options?: RemoteCallOptions,
  ): Promise<void> {
    options?.signal?.throwIfAborted();
    this.documents.set(collection, JSON.stringify(items));
    return Promise.resolve();
  }

  setProfile(profile: null | UserProfile, options?: RemoteCallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    this.documents.set('profile', JSON.stringify(profile));
    return Promise.resolve();
  }

  private readDocument(name: string): unknown {
    const document = this.documents.get(name);
    if (document === undefined) return undefined;
    const parsed: unknown = JSON.parse(document);
    return parsed;
  }
}
