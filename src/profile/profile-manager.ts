import type { AnalysisHistoryEntry, ProfileStatistics, UserProfile } from '../types';
import { getDefaultConfig, type ProfileConfig } from '../utils/config';
import { describeError, ProfileConflictError, ProfileStoreUnavailableError } from '../utils/errors';
import { componentLog } from '../utils/logger';
import type { ProfileStore } from './profile-store';
import { applyAnalysis, type AnalysisRecord } from './signature-merge';

export interface ProfileUpdateResult {
  /** Profile as it was before this analysis; null for a first submission. */
  previous: UserProfile | null;
  profile: UserProfile;
  revision: number;
}

const TOP_FINDING_TYPES = 5;

/**
 * Owns the read-modify-write cycle of user profiles. Updates for one user
 * run one at a time within this manager; across processes they are
 * optimistic: read the record and its revision, fold the analysis in, then
 * write back only if nobody else wrote in between, retrying on conflict.
 */
export class StyleProfileManager {
  /** Tail of the pending update chain per user. */
  private readonly queues = new Map<string, Promise<void>>();

  constructor(
    private readonly store: ProfileStore,
    private readonly config: ProfileConfig = getDefaultConfig().profile,
  ) {}

  update(record: AnalysisRecord): Promise<ProfileUpdateResult> {
    return this.serialized(record.userId, () => this.applyUpdate(record));
  }

  /** Number of users with an update queued or running. */
  get pendingUsers(): number {
    return this.queues.size;
  }

  private serialized<T>(userId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(userId) ?? Promise.resolve();
    const run = previous.then(task);
    const release = (): void => {
      if (this.queues.get(userId) === tail) this.queues.delete(userId);
    };
    const tail: Promise<void> = run.then(release, release);
    this.queues.set(userId, tail);
    return run;
  }

  private async applyUpdate(record: AnalysisRecord): Promise<ProfileUpdateResult> {
    const { userId } = record;
    const attempts = Math.max(1, this.config.maxUpdateAttempts);

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const current = await this.call('read', () => this.store.getProfile(userId));
      const expectedRevision = current?.revision ?? 0;
      const profile = applyAnalysis(current?.profile, record, this.config.historyLimit);

      const result = await this.call('write', () => this.store.putProfile(userId, profile, expectedRevision));
      if (result.ok) {
        if (attempt > 1) {
          componentLog('profile', `Profile "${userId}" updated after ${attempt} attempts`, 'debug');
        }
        return { previous: current?.profile ?? null, profile, revision: result.revision };
      }
      componentLog(
        'profile',
        `Revision conflict on "${userId}": expected ${expectedRevision}, found ${result.currentRevision} (attempt ${attempt})`,
        'debug',
      );
    }

    throw new ProfileConflictError(userId, attempts);
  }

  async getProfile(userId: string): Promise<UserProfile | null> {
    const record = await this.call('read', () => this.store.getProfile(userId));
    return record?.profile ?? null;
  }

  async getStatistics(userId: string): Promise<ProfileStatistics | null> {
    const profile = await this.getProfile(userId);
    if (!profile) return null;

    const topFindingTypes = Object.entries(profile.findingTypeCounts)
      .map(([type, count]) => ({ type, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, TOP_FINDING_TYPES);

    return {
      userId: profile.userId,
      totalAnalyses: profile.totalAnalyses,
      totalLines: profile.totalLines,
      averageQualityScore:
        profile.totalAnalyses === 0 ? 0 : Math.round((profile.cumulativeQualitySum / profile.totalAnalyses) * 100) / 100,
      favoriteLanguage: profile.favoriteLanguage,
      languages: { ...profile.languageCounts },
      topFindingTypes,
      lastAnalyzedAt: profile.history.length > 0 ? profile.history[0].analyzedAt : null,
    };
  }

  /** Most recent analyses first. */
  async getHistory(userId: string, limit?: number): Promise<AnalysisHistoryEntry[]> {
    const profile = await this.getProfile(userId);
    if (!profile) return [];
    return limit === undefined ? [...profile.history] : profile.history.slice(0, Math.max(0, limit));
  }

  /** Runs one store call under the configured timeout; any failure becomes ProfileStoreUnavailableError. */
  private async call<T>(operation: 'read' | 'write', run: () => Promise<T>): Promise<T> {
    const timeoutMs = this.config.storeTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new ProfileStoreUnavailableError(`Profile store ${operation} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([run(), timeout]);
    } catch (error) {
      if (error instanceof ProfileStoreUnavailableError) {
        componentLog('profile', error.message, 'warn');
        throw error;
      }
      const wrapped = new ProfileStoreUnavailableError(`Profile store ${operation} failed: ${describeError(error)}`, error);
      componentLog('profile', wrapped.message, 'warn');
      throw wrapped;
    } finally {
      clearTimeout(timer);
    }
  }
}
