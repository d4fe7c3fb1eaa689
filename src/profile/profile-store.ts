import type { UserProfile } from '../types';

export interface StoredProfile {
  profile: UserProfile;
  /** Incremented on every successful write; the first write produces 1. */
  revision: number;
}

export type PutResult =
  | { ok: true; revision: number }
  | { ok: false; conflict: true; currentRevision: number };

/**
 * Persistence port for user profiles. `putProfile` is a compare-and-swap:
 * it succeeds only when the stored revision equals `expectedRevision`
 * (0 meaning "no record yet").
 */
export interface ProfileStore {
  getProfile(userId: string): Promise<StoredProfile | undefined>;
  putProfile(userId: string, profile: UserProfile, expectedRevision: number): Promise<PutResult>;
}

/** Process-local store. Yields to the event loop on each call, like a real backend would. */
export class InMemoryProfileStore implements ProfileStore {
  private readonly records = new Map<string, StoredProfile>();

  async getProfile(userId: string): Promise<StoredProfile | undefined> {
    await yieldTurn();
    const record = this.records.get(userId);
    return record ? structuredClone(record) : undefined;
  }

  async putProfile(userId: string, profile: UserProfile, expectedRevision: number): Promise<PutResult> {
    await yieldTurn();
    const currentRevision = this.records.get(userId)?.revision ?? 0;
    if (currentRevision !== expectedRevision) {
      return { ok: false, conflict: true, currentRevision };
    }
    const revision = currentRevision + 1;
    this.records.set(userId, { profile: structuredClone(profile), revision });
    return { ok: true, revision };
  }

  get size(): number {
    return this.records.size;
  }
}

function yieldTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
