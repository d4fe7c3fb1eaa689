import { NodeKind, ParseMode, type ParseResult, type StructuralNode } from '../types';
import { componentLog } from '../utils/logger';
import { describeError } from '../utils/errors';
import type { ParserBackend } from './backend';
import { HeuristicParser } from './heuristic-parser';
import { getSyntax, resolveLanguage } from './languages';
import { scanSource, type ScanResult } from './lexer';
import { computeMetrics } from './metrics';
import { createNode } from './tree';
import { TypeScriptParser } from './typescript-parser';

/**
 * Picks a grammar backend by language-support lookup and falls back to the
 * heuristic parser when none applies or the grammar rejects the input.
 * `parse` never throws.
 */
export class StructuralParser {
  private readonly heuristic = new HeuristicParser();

  constructor(private readonly grammars: ParserBackend[] = [new TypeScriptParser()]) {}

  parse(code: string, declaredLanguage: string): ParseResult {
    const language = resolveLanguage(declaredLanguage, code);
    const syntax = getSyntax(language);
    const scan = scanSource(code, syntax);

    const grammar = this.grammars.find((backend) => backend.supports(syntax));
    let degradedReason: string;
    if (grammar) {
      try {
        const outcome = grammar.build(code, syntax, scan);
        if (outcome.ok) {
          componentLog('parser', `Parsed ${language} with grammar`, 'debug');
          return this.result(outcome.tree, scan, grammar.mode, language);
        }
        degradedReason = outcome.reason;
      } catch (error) {
        degradedReason = `grammar parser failed: ${describeError(error)}`;
      }
      componentLog('parser', `Falling back to heuristic parsing for ${language}: ${degradedReason}`, 'info');
    } else {
      degradedReason = `no grammar available for ${language}`;
      componentLog('parser', `Parsing ${language} heuristically`, 'debug');
    }

    let tree: StructuralNode;
    try {
      const outcome = this.heuristic.build(code, syntax, scan);
      tree = outcome.ok ? outcome.tree : this.emptyTree(scan);
    } catch (error) {
      componentLog('parser', `Heuristic parser failed: ${describeError(error)}`, 'warn');
      tree = this.emptyTree(scan);
    }
    return { ...this.result(tree, scan, ParseMode.HEURISTIC, language), degradedReason };
  }

  private result(tree: StructuralNode, scan: ScanResult, mode: ParseMode, language: string): ParseResult {
    return { tree, metrics: computeMetrics(tree, scan), mode, language };
  }

  private emptyTree(scan: ScanResult): StructuralNode {
    return createNode(NodeKind.MODULE, { startLine: 1, endLine: Math.max(1, scan.lines.length) });
  }
}
