import type { ParseMode, StructuralNode } from '../types';
import type { LanguageSyntax } from './languages';
import type { ScanResult } from './lexer';

export type BackendOutcome =
  | { ok: true; tree: StructuralNode }
  | { ok: false; reason: string };

/** One way of turning source text into a structural tree. */
export interface ParserBackend {
  readonly mode: ParseMode;
  supports(syntax: LanguageSyntax): boolean;
  build(code: string, syntax: LanguageSyntax, scan: ScanResult): BackendOutcome;
}
