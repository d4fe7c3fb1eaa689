import { Severity, type UserProfile } from '../../src/types';
import { StyleProfileManager } from '../../src/profile/profile-manager';
import {
  InMemoryProfileStore,
  type ProfileStore,
  type PutResult,
  type StoredProfile,
} from '../../src/profile/profile-store';
import { getDefaultConfig, type ProfileConfig } from '../../src/utils/config';
import { ProfileConflictError, ProfileStoreUnavailableError } from '../../src/utils/errors';
import { bug, emptyPatterns, makeRecord, makeSignature, smell } from '../helpers';

function profileConfig(overrides: Partial<ProfileConfig> = {}): ProfileConfig {
  return { ...getDefaultConfig().profile, ...overrides };
}

describe('StyleProfileManager', () => {
  let store: InMemoryProfileStore;
  let manager: StyleProfileManager;

  beforeEach(() => {
    store = new InMemoryProfileStore();
    manager = new StyleProfileManager(store, profileConfig());
  });

  describe('update', () => {
    it('should create the profile and return no previous one', async () => {
      const result = await manager.update(makeRecord());

      expect(result.previous).toBeNull();
      expect(result.revision).toBe(1);
      expect(result.profile.totalAnalyses).toBe(1);
      expect(store.size).toBe(1);
    });

    it('should return the pre-update profile on later analyses', async () => {
      await manager.update(makeRecord());
      const result = await manager.update(
        makeRecord({ analysisId: 'analysis-2', signature: makeSignature({ indentation: { unitWidth: 2, consistencyRatio: 1, observations: 1 } }) }),
      );

      expect(result.revision).toBe(2);
      expect(result.previous?.totalAnalyses).toBe(1);
      expect(result.previous?.style.indentation.unitWidth).toBe(4);
      expect(result.profile.style.indentation.unitWidth).toBe(3);
    });

    it('should not lose concurrent updates for the same user', async () => {
      const updates = Array.from({ length: 12 }, (_, i) => manager.update(makeRecord({ analysisId: `a${i}` })));
      await Promise.all(updates);

      const profile = await manager.getProfile('alice');
      expect(profile?.totalAnalyses).toBe(12);
      expect(profile?.totalLines).toBe(120);
    });

    it('should apply more concurrent updates than the retry budget', async () => {
      const limited = new StyleProfileManager(store, profileConfig({ maxUpdateAttempts: 2 }));
      const updates = Array.from({ length: 30 }, (_, i) => limited.update(makeRecord({ analysisId: `a${i}` })));
      const results = await Promise.all(updates);

      expect(results.map((result) => result.revision)).toEqual(Array.from({ length: 30 }, (_, i) => i + 1));
      expect((await limited.getProfile('alice'))?.totalAnalyses).toBe(30);
      expect(limited.pendingUsers).toBe(0);
    });

    it('should keep serving a user after a failed update', async () => {
      let failNext = true;
      const flaky: ProfileStore = {
        getProfile: (userId) => store.getProfile(userId),
        putProfile: async (userId, profile, expectedRevision) => {
          if (failNext) {
            failNext = false;
            throw new Error('disk gone');
          }
          return store.putProfile(userId, profile, expectedRevision);
        },
      };
      const recovering = new StyleProfileManager(flaky, profileConfig());

      const [first, second] = await Promise.allSettled([
        recovering.update(makeRecord({ analysisId: 'a1' })),
        recovering.update(makeRecord({ analysisId: 'a2' })),
      ]);

      expect(first.status).toBe('rejected');
      expect(second.status).toBe('fulfilled');
      expect((await recovering.getProfile('alice'))?.history.map((entry) => entry.id)).toEqual(['a2']);
    });

    it('should give up after the configured number of conflicts', async () => {
      const conflicting: ProfileStore = {
        getProfile: async () => undefined,
        putProfile: async (): Promise<PutResult> => ({ ok: false, conflict: true, currentRevision: 1 }),
      };
      const limited = new StyleProfileManager(conflicting, profileConfig({ maxUpdateAttempts: 3 }));

      await expect(limited.update(makeRecord())).rejects.toThrow(ProfileConflictError);
      await expect(limited.update(makeRecord())).rejects.toThrow(
        'Profile update for "alice" kept conflicting after 3 attempts',
      );
    });
  });

  describe('store failures', () => {
    it('should time out a store call that never answers', async () => {
      const hanging: ProfileStore = {
        getProfile: () => new Promise<StoredProfile | undefined>(() => undefined),
        putProfile: () => new Promise<PutResult>(() => undefined),
      };
      const slow = new StyleProfileManager(hanging, profileConfig({ storeTimeoutMs: 20 }));

      await expect(slow.update(makeRecord())).rejects.toThrow(ProfileStoreUnavailableError);
      await expect(slow.getProfile('alice')).rejects.toThrow('Profile store read timed out after 20ms');
    });

    it('should wrap store errors and keep the underlying error', async () => {
      const failure = new Error('disk gone');
      const broken: ProfileStore = {
        getProfile: async () => undefined,
        putProfile: async () => {
          throw failure;
        },
      };
      const failing = new StyleProfileManager(broken, profileConfig());

      const error: unknown = await failing.update(makeRecord()).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(ProfileStoreUnavailableError);
      if (error instanceof ProfileStoreUnavailableError) {
        expect(error.message).toBe('Profile store write failed: disk gone');
        expect(error.reason).toBe(failure);
      }
    });
  });

  describe('queries', () => {
    beforeEach(async () => {
      await manager.update(
        makeRecord({
          analysisId: 'a1',
          qualityScore: 95,
          patterns: { ...emptyPatterns(), bugPatterns: [bug('mutable_default_argument', Severity.WARNING)] },
        }),
      );
      await manager.update(
        makeRecord({
          analysisId: 'a2',
          analyzedAt: new Date('2024-03-02T08:30:00.000Z'),
          qualityScore: 90,
          patterns: {
            ...emptyPatterns(),
            bugPatterns: [bug('mutable_default_argument', Severity.WARNING)],
            codeSmells: [smell('long_line')],
          },
        }),
      );
    });

    it('should summarize the profile', async () => {
      const stats = await manager.getStatistics('alice');

      expect(stats).toEqual({
        userId: 'alice',
        totalAnalyses: 2,
        totalLines: 20,
        averageQualityScore: 92.5,
        favoriteLanguage: 'python',
        languages: { python: 2 },
        topFindingTypes: [
          { type: 'mutable_default_argument', count: 2 },
          { type: 'long_line', count: 1 },
        ],
        lastAnalyzedAt: '2024-03-02T08:30:00.000Z',
      });
    });

    it('should list history newest first, up to the limit', async () => {
      const history = await manager.getHistory('alice', 1);
      const full = await manager.getHistory('alice');

      expect(history.map((entry) => entry.id)).toEqual(['a2']);
      expect(full.map((entry) => entry.id)).toEqual(['a2', 'a1']);
    });

    it('should return nothing for unknown users', async () => {
      const missing: UserProfile | null = await manager.getProfile('bob');

      expect(missing).toBeNull();
      expect(await manager.getStatistics('bob')).toBeNull();
      expect(await manager.getHistory('bob')).toEqual([]);
    });
  });
});
