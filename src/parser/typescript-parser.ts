import * as ts from 'typescript';
import { NodeKind, ParseMode, type SourceSpan, type StructuralNode } from '../types';
import type { BackendOutcome, ParserBackend } from './backend';
import type { LanguageSyntax } from './languages';
import { createNode, finalizeSpans, type NodeDetails } from './tree';

type FunctionLike =
  | ts.FunctionDeclaration
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration
  | ts.GetAccessorDeclaration
  | ts.SetAccessorDeclaration
  | ts.FunctionExpression
  | ts.ArrowFunction;

function isFunctionLike(node: ts.Node): node is FunctionLike {
  return ts.isFunctionDeclaration(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isConstructorDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node) ||
    ts.isFunctionExpression(node) ||
    ts.isArrowFunction(node);
}

function isLoop(node: ts.Node): boolean {
  return ts.isForStatement(node) ||
    ts.isForInStatement(node) ||
    ts.isForOfStatement(node) ||
    ts.isWhileStatement(node) ||
    ts.isDoStatement(node);
}

const EQUALITY_TOKENS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.EqualsEqualsEqualsToken,
  ts.SyntaxKind.ExclamationEqualsEqualsToken,
  ts.SyntaxKind.EqualsEqualsToken,
  ts.SyntaxKind.ExclamationEqualsToken,
]);

const LOGICAL_TOKENS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.AmpersandAmpersandToken,
  ts.SyntaxKind.BarBarToken,
]);

/** Syntax errors as reported by the compiler for a single in-memory file. */
function syntacticDiagnostics(sourceFile: ts.SourceFile): readonly ts.Diagnostic[] {
  const host: ts.CompilerHost = {
    getSourceFile: (fileName) => (fileName === sourceFile.fileName ? sourceFile : undefined),
    getDefaultLibFileName: () => 'lib.d.ts',
    writeFile: () => undefined,
    getCurrentDirectory: () => '/',
    getCanonicalFileName: (fileName) => fileName,
    useCaseSensitiveFileNames: () => true,
    getNewLine: () => '\n',
    fileExists: (fileName) => fileName === sourceFile.fileName,
    readFile: () => undefined,
  };
  const program = ts.createProgram({
    rootNames: [sourceFile.fileName],
    options: { noLib: true, noResolve: true, allowJs: true, types: [] },
    host,
  });
  return program.getSyntacticDiagnostics(sourceFile);
}

/**
 * Grammar parser for JavaScript and TypeScript. Rejects input the compiler
 * reports syntax errors for, so the caller can fall back to the heuristic
 * parser.
 */
export class TypeScriptParser implements ParserBackend {
  readonly mode = ParseMode.GRAMMAR;

  supports(syntax: LanguageSyntax): boolean {
    return syntax.grammar !== undefined;
  }

  build(code: string, syntax: LanguageSyntax): BackendOutcome {
    const typed = syntax.grammar === 'typescript';
    const sourceFile = ts.createSourceFile(
      typed ? 'submission.ts' : 'submission.js',
      code,
      ts.ScriptTarget.Latest,
      true,
      typed ? ts.ScriptKind.TS : ts.ScriptKind.JS,
    );

    const diagnostics = syntacticDiagnostics(sourceFile);
    if (diagnostics.length > 0) {
      const first = diagnostics[0];
      const line = first.start !== undefined
        ? sourceFile.getLineAndCharacterOfPosition(first.start).line + 1
        : 1;
      return {
        ok: false,
        reason: `syntax error at line ${line}: ${ts.flattenDiagnosticMessageText(first.messageText, ' ')}`,
      };
    }
    return { ok: true, tree: new SourceFileWalker(sourceFile).build() };
  }
}

class SourceFileWalker {
  constructor(private readonly sourceFile: ts.SourceFile) {}

  build(): StructuralNode {
    const lineCount = this.sourceFile.getLineStarts().length;
    const root = createNode(NodeKind.MODULE, { startLine: 1, endLine: Math.max(1, lineCount) });
    for (const statement of this.sourceFile.statements) this.visit(statement, root);
    finalizeSpans(root);
    return root;
  }

  // ─── Positions ───────────────────────────────────────────────────────────

  private lineOf(position: number): number {
    return this.sourceFile.getLineAndCharacterOfPosition(position).line + 1;
  }

  private span(node: ts.Node): SourceSpan {
    return { startLine: this.lineOf(node.getStart(this.sourceFile)), endLine: this.lineOf(node.getEnd()) };
  }

  private headerText(node: ts.Node): string {
    return this.sourceFile.text.slice(node.getStart(this.sourceFile)).split('\n')[0].trim();
  }

  private textOf(node: ts.Node): string {
    return node.getText(this.sourceFile);
  }

  // ─── Visiting ────────────────────────────────────────────────────────────

  private add(parent: StructuralNode, kind: NodeKind, node: ts.Node, extra: NodeDetails = {}): StructuralNode {
    const created = createNode(kind, this.span(node), extra);
    parent.children.push(created);
    return created;
  }

  private visitChildren(node: ts.Node, parent: StructuralNode): void {
    ts.forEachChild(node, (child) => {
      this.visit(child, parent);
    });
  }

  /** Block bodies contribute their statements directly to `parent`. */
  private visitBody(node: ts.Node, parent: StructuralNode): void {
    if (ts.isBlock(node)) {
      for (const statement of node.statements) this.visit(statement, parent);
    } else {
      this.visit(node, parent);
    }
  }

  private visit(node: ts.Node, parent: StructuralNode): void {
    if (isFunctionLike(node)) {
      this.visitFunction(node, parent);
    } else if (ts.isClassDeclaration(node) || ts.isClassExpression(node)) {
      this.visitClass(node, parent);
    } else if (ts.isImportDeclaration(node)) {
      this.visitImport(node, parent);
    } else if (ts.isImportEqualsDeclaration(node)) {
      this.add(parent, NodeKind.IMPORT, node, {
        name: this.textOf(node.moduleReference),
        text: this.headerText(node),
        bindings: [node.name.text],
      });
    } else if (ts.isVariableDeclaration(node)) {
      this.visitVariable(node, parent);
    } else if (ts.isPropertyDeclaration(node)) {
      const assignment = this.add(parent, NodeKind.ASSIGNMENT, node, {
        name: this.nameText(node.name),
        text: this.headerText(node),
        bindings: [this.nameText(node.name)],
      });
      if (node.initializer) this.visit(node.initializer, assignment);
    } else if (ts.isIfStatement(node)) {
      this.visitIf(node, parent);
    } else if (isLoop(node)) {
      const loop = this.add(parent, NodeKind.LOOP, node, { text: this.headerText(node) });
      ts.forEachChild(node, (child) => {
        this.visitBody(child, loop);
      });
    } else if (ts.isConditionalExpression(node)) {
      const conditional = this.add(parent, NodeKind.CONDITIONAL, node, { text: this.headerText(node) });
      this.visitChildren(node, conditional);
    } else if (ts.isSwitchStatement(node)) {
      this.visitSwitch(node, parent);
    } else if (ts.isTryStatement(node)) {
      this.visitTry(node, parent);
    } else if (ts.isReturnStatement(node)) {
      const statement = this.add(parent, NodeKind.RETURN, node, { text: this.headerText(node) });
      this.visitChildren(node, statement);
    } else if (ts.isThrowStatement(node)) {
      const statement = this.add(parent, NodeKind.RAISE, node, { text: this.headerText(node) });
      this.visitChildren(node, statement);
    } else if (ts.isBreakStatement(node) || ts.isContinueStatement(node)) {
      this.add(parent, NodeKind.JUMP, node, {
        text: this.headerText(node),
        operator: ts.isBreakStatement(node) ? 'break' : 'continue',
      });
    } else if (ts.isExpressionStatement(node)) {
      const statement = this.add(parent, NodeKind.STATEMENT, node, { text: this.headerText(node) });
      this.visit(node.expression, statement);
    } else if (ts.isCallExpression(node) || ts.isNewExpression(node)) {
      const call = this.add(parent, NodeKind.CALL, node, {
        name: this.textOf(node.expression).replace(/\s+/g, ''),
        text: this.textOf(node),
        operator: ts.isNewExpression(node) ? 'new' : undefined,
      });
      this.visitChildren(node, call);
    } else if (ts.isBinaryExpression(node)) {
      this.visitBinary(node, parent);
    } else if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node) || ts.isNumericLiteral(node)) {
      this.add(parent, NodeKind.LITERAL, node, { value: this.textOf(node) });
    } else if (ts.isTemplateExpression(node)) {
      this.add(parent, NodeKind.LITERAL, node, { value: this.textOf(node) });
      for (const span of node.templateSpans) this.visit(span.expression, parent);
    } else if (
      ts.isInterfaceDeclaration(node) ||
      ts.isTypeAliasDeclaration(node) ||
      ts.isEnumDeclaration(node) ||
      ts.isDecorator(node) ||
      ts.isTypeNode(node)
    ) {
      // type-level only
    } else {
      this.visitChildren(node, parent);
    }
  }

  private visitFunction(node: FunctionLike, parent: StructuralNode): void {
    const fn = this.add(parent, NodeKind.FUNCTION, node, {
      name: this.functionName(node),
      text: this.headerText(node),
      params: node.parameters.map((param) => ({
        name: this.textOf(param.name),
        defaultValue: param.initializer ? this.textOf(param.initializer) : undefined,
      })),
      documented: this.isDocumented(node),
    });
    for (const param of node.parameters) {
      if (param.initializer) this.visit(param.initializer, fn);
    }
    if (node.body) this.visitBody(node.body, fn);
  }

  private functionName(node: FunctionLike): string | undefined {
    if (ts.isConstructorDeclaration(node)) return 'constructor';
    if (node.name) return this.nameText(node.name);
    const owner = node.parent;
    if (ts.isVariableDeclaration(owner) && ts.isIdentifier(owner.name)) return owner.name.text;
    if (ts.isPropertyAssignment(owner) || ts.isPropertyDeclaration(owner)) return this.nameText(owner.name);
    return undefined;
  }

  private visitClass(node: ts.ClassDeclaration | ts.ClassExpression, parent: StructuralNode): void {
    const owner = node.parent;
    const name = node.name?.text ??
      (ts.isVariableDeclaration(owner) && ts.isIdentifier(owner.name) ? owner.name.text : undefined);
    const cls = this.add(parent, NodeKind.CLASS, node, {
      name,
      text: this.headerText(node),
      documented: this.isDocumented(node),
    });
    for (const member of node.members) this.visit(member, cls);
  }

  private visitImport(node: ts.ImportDeclaration, parent: StructuralNode): void {
    const bindings: string[] = [];
    const clause = node.importClause;
    if (clause?.name) bindings.push(clause.name.text);
    const named = clause?.namedBindings;
    if (named && ts.isNamespaceImport(named)) bindings.push(named.name.text);
    if (named && ts.isNamedImports(named)) {
      for (const element of named.elements) bindings.push(element.name.text);
    }
    const specifier = node.moduleSpecifier;
    this.add(parent, NodeKind.IMPORT, node, {
      name: ts.isStringLiteral(specifier) ? specifier.text : this.textOf(specifier),
      text: this.headerText(node),
      bindings,
    });
  }

  private visitVariable(node: ts.VariableDeclaration, parent: StructuralNode): void {
    const bindings = this.bindingNames(node.name);
    const init = node.initializer;
    if (
      init &&
      ts.isCallExpression(init) &&
      ts.isIdentifier(init.expression) &&
      init.expression.text === 'require' &&
      init.arguments.length === 1 &&
      ts.isStringLiteral(init.arguments[0])
    ) {
      this.add(parent, NodeKind.IMPORT, node, {
        name: init.arguments[0].text,
        text: this.headerText(node),
        bindings,
      });
      return;
    }
    const assignment = this.add(parent, NodeKind.ASSIGNMENT, node, {
      name: bindings[0],
      text: this.headerText(node),
      bindings,
    });
    if (init) this.visit(init, assignment);
  }

  private visitIf(node: ts.IfStatement, parent: StructuralNode): void {
    const conditional = createNode(NodeKind.CONDITIONAL, {
      startLine: this.lineOf(node.getStart(this.sourceFile)),
      endLine: this.lineOf(node.thenStatement.getEnd()),
    }, { text: this.headerText(node) });
    parent.children.push(conditional);
    this.visit(node.expression, conditional);
    this.visitBody(node.thenStatement, conditional);

    const otherwise = node.elseStatement;
    if (!otherwise) return;
    if (ts.isIfStatement(otherwise)) {
      this.visitIf(otherwise, parent);
      return;
    }
    const block = this.add(parent, NodeKind.BLOCK, otherwise, { text: 'else' });
    this.visitBody(otherwise, block);
  }

  private visitSwitch(node: ts.SwitchStatement, parent: StructuralNode): void {
    const block = this.add(parent, NodeKind.BLOCK, node, { text: this.headerText(node) });
    this.visit(node.expression, block);
    for (const clause of node.caseBlock.clauses) {
      if (ts.isCaseClause(clause)) {
        const branch = this.add(block, NodeKind.CONDITIONAL, clause, { text: this.headerText(clause) });
        this.visit(clause.expression, branch);
        for (const statement of clause.statements) this.visit(statement, branch);
      } else {
        const fallback = this.add(block, NodeKind.BLOCK, clause, { text: this.headerText(clause) });
        for (const statement of clause.statements) this.visit(statement, fallback);
      }
    }
  }

  private visitTry(node: ts.TryStatement, parent: StructuralNode): void {
    const attempt = this.add(parent, NodeKind.TRY, node.tryBlock, { text: 'try' });
    attempt.span.startLine = this.lineOf(node.getStart(this.sourceFile));
    this.visitBody(node.tryBlock, attempt);

    if (node.catchClause) {
      const declaration = node.catchClause.variableDeclaration;
      const handler = this.add(parent, NodeKind.HANDLER, node.catchClause, {
        name: declaration ? this.textOf(declaration.name) : undefined,
        text: this.headerText(node.catchClause),
      });
      this.visitBody(node.catchClause.block, handler);
    }
    if (node.finallyBlock) {
      const block = this.add(parent, NodeKind.BLOCK, node.finallyBlock, { text: 'finally' });
      this.visitBody(node.finallyBlock, block);
    }
  }

  private visitBinary(node: ts.BinaryExpression, parent: StructuralNode): void {
    const operator = node.operatorToken.kind;
    if (EQUALITY_TOKENS.has(operator)) {
      const comparison = this.add(parent, NodeKind.COMPARISON, node, {
        operator: ts.tokenToString(operator),
        operands: [this.textOf(node.left), this.textOf(node.right)],
      });
      this.visitChildren(node, comparison);
    } else if (LOGICAL_TOKENS.has(operator)) {
      const logical = this.add(parent, NodeKind.BOOLEAN_OP, node, { operator: ts.tokenToString(operator) });
      this.visitChildren(node, logical);
    } else {
      this.visitChildren(node, parent);
    }
  }

  // ─── Names and documentation ─────────────────────────────────────────────

  private nameText(name: ts.PropertyName | ts.BindingName): string {
    if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
      return name.text;
    }
    return this.textOf(name);
  }

  private bindingNames(name: ts.BindingName): string[] {
    if (ts.isIdentifier(name)) return [name.text];
    const names: string[] = [];
    for (const element of name.elements) {
      if (ts.isOmittedExpression(element)) continue;
      names.push(...this.bindingNames(element.name));
    }
    return names;
  }

  /** A comment ending on the line directly above the declaration. */
  private isDocumented(node: ts.Node): boolean {
    let host: ts.Node = node;
    const declaration = node.parent;
    if (
      declaration &&
      ts.isVariableDeclaration(declaration) &&
      ts.isVariableDeclarationList(declaration.parent) &&
      ts.isVariableStatement(declaration.parent.parent)
    ) {
      host = declaration.parent.parent;
    }
    const ranges = ts.getLeadingCommentRanges(this.sourceFile.text, host.getFullStart()) ?? [];
    const last = ranges[ranges.length - 1];
    if (!last) return false;
    return this.lineOf(last.end) === this.lineOf(host.getStart(this.sourceFile)) - 1;
  }
}
