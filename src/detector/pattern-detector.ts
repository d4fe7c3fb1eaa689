import {
  FindingCategory,
  type BugPatternFinding,
  type CodeSmellFinding,
  type DetectedPatterns,
  type SecurityIssueFinding,
  type SourceSpan,
  type StructuralNode,
} from '../types';
import { getSyntax } from '../parser/languages';
import { scanSource } from '../parser/lexer';
import { getDefaultConfig, type DetectorConfig } from '../utils/config';
import { describeError } from '../utils/errors';
import { componentLog } from '../utils/logger';
import type { PatternRule, RuleContext, RuleMatch } from './rule';
import { createDefaultRules } from './rules';

export interface SkippedRule {
  ruleId: string;
  reason: string;
}

export interface DetectionOutcome {
  patterns: DetectedPatterns;
  /** Rules that threw; their findings are missing from `patterns`. */
  skipped: SkippedRule[];
}

/**
 * Runs the rule catalog over one parsed submission. Each rule is isolated:
 * a rule that throws is reported in `skipped` and the rest still run.
 */
export class PatternDetector {
  private readonly rules = new Map<string, PatternRule>();

  constructor(
    private readonly config: DetectorConfig = getDefaultConfig().detector,
    rules: PatternRule[] = createDefaultRules(),
  ) {
    for (const rule of rules) this.register(rule);
  }

  register(rule: PatternRule): void {
    if (this.rules.has(rule.id)) {
      throw new Error(`Rule "${rule.id}" is already registered`);
    }
    this.rules.set(rule.id, rule);
  }

  getRule(id: string): PatternRule | undefined {
    return this.rules.get(id);
  }

  listRules(): PatternRule[] {
    return Array.from(this.rules.values());
  }

  detect(tree: StructuralNode, rawText: string, language: string = 'unknown'): DetectionOutcome {
    const syntax = getSyntax(language);
    const scan = scanSource(rawText, syntax);
    const context: RuleContext = { tree, rawText, scan, syntax, config: this.config };
    const lastLine = Math.max(1, scan.lines.length);

    const patterns: DetectedPatterns = { bugPatterns: [], codeSmells: [], securityIssues: [] };
    const skipped: SkippedRule[] = [];

    for (const rule of this.rules.values()) {
      if (this.config.disabledRules.includes(rule.id)) continue;
      if (rule.languages && !rule.languages.includes(syntax.id)) continue;

      let matches: RuleMatch[];
      try {
        matches = rule.evaluate(context);
      } catch (error) {
        const reason = describeError(error);
        componentLog('detector', `Rule ${rule.id} failed: ${reason}`, 'warn');
        skipped.push({ ruleId: rule.id, reason });
        continue;
      }

      for (const match of matches) {
        const span = clampSpan(match.span, lastLine);
        switch (rule.category) {
          case FindingCategory.BUG_PATTERN: {
            const finding: BugPatternFinding = {
              category: rule.category,
              severity: rule.severity,
              type: rule.id,
              message: match.message,
              span,
            };
            patterns.bugPatterns.push(finding);
            break;
          }
          case FindingCategory.CODE_SMELL: {
            const finding: CodeSmellFinding = {
              category: rule.category,
              type: rule.id,
              message: match.message,
              suggestion: rule.suggestion,
              span,
            };
            patterns.codeSmells.push(finding);
            break;
          }
          case FindingCategory.SECURITY_ISSUE: {
            const finding: SecurityIssueFinding = {
              category: rule.category,
              type: rule.id,
              message: match.message,
              suggestion: rule.suggestion,
              span,
            };
            patterns.securityIssues.push(finding);
            break;
          }
        }
      }
    }

    componentLog(
      'detector',
      `${syntax.id}: ${patterns.bugPatterns.length} bug pattern(s), ${patterns.codeSmells.length} smell(s), ` +
        `${patterns.securityIssues.length} security issue(s)`,
      'debug',
    );
    return { patterns, skipped };
  }
}

/** Keeps spans inside the submission; a span entirely outside it is dropped. */
function clampSpan(span: SourceSpan | undefined, lastLine: number): SourceSpan | undefined {
  if (!span || span.startLine > lastLine || span.endLine < 1) return undefined;
  const startLine = Math.max(1, span.startLine);
  return { startLine, endLine: Math.min(lastLine, Math.max(startLine, span.endLine)) };
}
