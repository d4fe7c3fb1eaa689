export * from './types';
export { AnalysisEngine, type AnalysisEngineOptions } from './engine/analysis-engine';
export { StructuralParser } from './parser/structural-parser';
export { HeuristicParser } from './parser/heuristic-parser';
export { TypeScriptParser } from './parser/typescript-parser';
export type { BackendOutcome, ParserBackend } from './parser/backend';
export { SUPPORTED_LANGUAGES, detectLanguage, normalizeLanguageTag, resolveLanguage } from './parser/languages';
export { StyleExtractor, classifyIdentifier } from './style/style-extractor';
export { PatternDetector, type DetectionOutcome, type SkippedRule } from './detector/pattern-detector';
export type { PatternRule, RuleContext, RuleMatch, BugPatternRule, CodeSmellRule, SecurityRule } from './detector/rule';
export { createDefaultRules } from './detector/rules';
export { StyleProfileManager, type ProfileUpdateResult } from './profile/profile-manager';
export { InMemoryProfileStore, type ProfileStore, type PutResult, type StoredProfile } from './profile/profile-store';
export { FileProfileStore } from './profile/file-profile-store';
export { mergeSignature, runningMean, type AnalysisRecord } from './profile/signature-merge';
export { RecommendationEngine } from './recommend/recommendation-engine';
export { computeQualityScore } from './recommend/quality';
export { loadConfig, saveConfig, getDefaultConfig, mergeWithDefaults, type StylewiseConfig } from './utils/config';
export {
  StylewiseError,
  InvalidInputError,
  ProfileStoreUnavailableError,
  ProfileConflictError,
} from './utils/errors';
