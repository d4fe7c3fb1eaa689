import { v4 as uuidv4 } from 'uuid';
import {
  NoticeCode,
  ParseMode,
  type AnalysisHistoryEntry,
  type AnalysisNotice,
  type AnalysisResult,
  type CodeSubmission,
  type ProfileStatistics,
  type UserProfile,
} from '../types';
import { PatternDetector } from '../detector/pattern-detector';
import type { PatternRule } from '../detector/rule';
import { createDefaultRules } from '../detector/rules';
import { StructuralParser } from '../parser/structural-parser';
import { StyleProfileManager } from '../profile/profile-manager';
import { InMemoryProfileStore, type ProfileStore } from '../profile/profile-store';
import { computeQualityScore } from '../recommend/quality';
import { RecommendationEngine } from '../recommend/recommendation-engine';
import { StyleExtractor } from '../style/style-extractor';
import { getDefaultConfig, type StylewiseConfig } from '../utils/config';
import { ProfileConflictError, ProfileStoreUnavailableError } from '../utils/errors';
import { componentLog } from '../utils/logger';
import { toSubmission } from '../utils/validators';

export interface AnalysisEngineOptions {
  config?: StylewiseConfig;
  /** Defaults to a process-local in-memory store. */
  store?: ProfileStore;
  rules?: PatternRule[];
  parser?: StructuralParser;
  clock?: () => Date;
}

/**
 * One analysis request end to end: parse, extract style, detect patterns,
 * score, update the submitter's profile, recommend. Requests share nothing
 * but the profile store.
 */
export class AnalysisEngine {
  private readonly parser: StructuralParser;
  private readonly extractor = new StyleExtractor();
  private readonly detector: PatternDetector;
  private readonly profiles: StyleProfileManager;
  private readonly recommender: RecommendationEngine;
  private readonly clock: () => Date;

  constructor(options: AnalysisEngineOptions = {}) {
    const config = options.config ?? getDefaultConfig();
    this.parser = options.parser ?? new StructuralParser();
    this.detector = new PatternDetector(config.detector, options.rules ?? createDefaultRules());
    this.profiles = new StyleProfileManager(options.store ?? new InMemoryProfileStore(), config.profile);
    const titles = new Map(this.detector.listRules().map((rule) => [rule.id, rule.title]));
    this.recommender = new RecommendationEngine(config.recommendation, titles);
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Analyzes `code`. Rejects with InvalidInputError for empty or non-text
   * input; every other problem is reported through `notices`.
   */
  async analyze(code: unknown, language: string = '', userId?: string | null): Promise<AnalysisResult> {
    const submission = toSubmission({ code, language, userId }, this.clock());
    return this.analyzeSubmission(submission);
  }

  async analyzeSubmission(submission: CodeSubmission): Promise<AnalysisResult> {
    const started = Date.now();
    const notices: AnalysisNotice[] = [];
    const code = submission.rawText;

    const parsed = this.parser.parse(code, submission.declaredLanguage);
    if (parsed.mode === ParseMode.HEURISTIC) {
      notices.push({
        code: NoticeCode.PARSE_DEGRADED,
        message: parsed.degradedReason ?? `parsed ${parsed.language} heuristically`,
      });
    }

    const signature = this.extractor.extract(parsed.tree, code, parsed.language);
    const { patterns, skipped } = this.detector.detect(parsed.tree, code, parsed.language);
    for (const rule of skipped) {
      notices.push({
        code: NoticeCode.RULE_EVALUATION_SKIPPED,
        message: `rule ${rule.ruleId} was skipped: ${rule.reason}`,
        ruleId: rule.ruleId,
      });
    }

    const qualityScore = computeQualityScore(patterns, parsed.metrics.complexity);
    const id = uuidv4();

    let previous: UserProfile | null = null;
    let profile: UserProfile | null = null;
    let degraded = false;
    if (submission.userId !== null) {
      try {
        const updated = await this.profiles.update({
          userId: submission.userId,
          analysisId: id,
          analyzedAt: submission.timestamp,
          language: parsed.language,
          signature,
          metrics: parsed.metrics,
          qualityScore,
          patterns,
        });
        previous = updated.previous;
        profile = updated.profile;
      } catch (error) {
        if (!(error instanceof ProfileStoreUnavailableError || error instanceof ProfileConflictError)) throw error;
        degraded = true;
        notices.push({ code: NoticeCode.PROFILE_STORE_UNAVAILABLE, message: error.message });
        componentLog('engine', `Personalization skipped for "${submission.userId}": ${error.message}`, 'warn');
      }
    }

    const recommendations = this.recommender.recommend(parsed.metrics, patterns, previous, signature);

    componentLog(
      'engine',
      `Analysis ${id} (${parsed.language}, ${parsed.mode}) finished in ${Date.now() - started}ms`,
      'debug',
    );

    return {
      id,
      language: parsed.language,
      parseMode: parsed.mode,
      metrics: parsed.metrics,
      issues: [...patterns.bugPatterns],
      patterns,
      stylePatterns: signature,
      recommendations,
      summary: this.recommender.summarize(recommendations),
      qualityScore,
      degraded,
      notices,
      profile,
    };
  }

  getProfile(userId: string): Promise<UserProfile | null> {
    return this.profiles.getProfile(userId);
  }

  getStatistics(userId: string): Promise<ProfileStatistics | null> {
    return this.profiles.getStatistics(userId);
  }

  getHistory(userId: string, limit?: number): Promise<AnalysisHistoryEntry[]> {
    return this.profiles.getHistory(userId, limit);
  }

  listRules(): PatternRule[] {
    return this.detector.listRules();
  }
}
