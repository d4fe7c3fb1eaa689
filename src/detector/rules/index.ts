import type { PatternRule } from '../rule';
import { BUG_PATTERN_RULES } from './bug-patterns';
import { CODE_SMELL_RULES } from './code-smells';
import { SECURITY_RULES } from './security';

export { BUG_PATTERN_RULES } from './bug-patterns';
export { CODE_SMELL_RULES } from './code-smells';
export { SECURITY_RULES, shannonEntropy } from './security';

/** Built-in catalog in evaluation order: bug patterns, code smells, security. */
export function createDefaultRules(): PatternRule[] {
  return [...BUG_PATTERN_RULES, ...CODE_SMELL_RULES, ...SECURITY_RULES];
}
