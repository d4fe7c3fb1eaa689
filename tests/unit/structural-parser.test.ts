import { NodeKind, ParseMode, type StructuralNode } from '../../src/types';
import type { ParserBackend } from '../../src/parser/backend';
import { StructuralParser } from '../../src/parser/structural-parser';
import { collect } from '../../src/parser/tree';
import { PY_MUTABLE_DEFAULT } from '../helpers';

function kinds(nodes: StructuralNode[]): NodeKind[] {
  return nodes.map((node) => node.kind);
}

describe('StructuralParser', () => {
  const parser = new StructuralParser();

  describe('heuristic parsing', () => {
    it('should build functions with parameters and defaults', () => {
      const result = parser.parse(PY_MUTABLE_DEFAULT, 'python');

      expect(result.mode).toBe(ParseMode.HEURISTIC);
      expect(result.language).toBe('python');
      expect(result.degradedReason).toBe('no grammar available for python');

      const [fn] = result.tree.children;
      expect(fn.kind).toBe(NodeKind.FUNCTION);
      expect(fn.name).toBe('f');
      expect(fn.params).toEqual([{ name: 'x', defaultValue: '[]' }]);
      expect(fn.span).toEqual({ startLine: 1, endLine: 3 });
      expect(kinds(fn.children)).toEqual([NodeKind.STATEMENT, NodeKind.RETURN]);
      expect(kinds(fn.children[0].children)).toEqual([NodeKind.CALL, NodeKind.LITERAL]);
      expect(fn.children[0].children[0].name).toBe('x.append');
    });

    it('should compute metrics from the tree and the raw text', () => {
      const { metrics } = parser.parse(PY_MUTABLE_DEFAULT, 'python');

      expect(metrics).toEqual({
        linesOfCode: 3,
        numFunctions: 1,
        numClasses: 0,
        numImports: 0,
        complexity: 1,
        maxLineLength: 15,
        numComments: 0,
        docstringCoverage: 0,
      });
    });

    it('should nest methods under classes and detect docstrings', () => {
      const code = [
        'class Greeter:',
        '    """Says hello."""',
        '',
        '    def greet(self, name):',
        '        if name:',
        '            return "hi " + name',
        '        return "hello"',
      ].join('\n');
      const result = parser.parse(code, 'python');

      const [cls] = result.tree.children;
      expect(cls.kind).toBe(NodeKind.CLASS);
      expect(cls.name).toBe('Greeter');
      expect(cls.documented).toBe(true);

      const method = cls.children.find((child) => child.kind === NodeKind.FUNCTION);
      expect(method?.name).toBe('greet');
      expect(method?.params).toEqual([{ name: 'self' }, { name: 'name' }]);
      expect(method?.documented).toBe(false);

      expect(result.metrics.complexity).toBe(2);
      expect(result.metrics.docstringCoverage).toBe(0.5);
    });

    it('should detect the language when the tag is empty', () => {
      expect(parser.parse(PY_MUTABLE_DEFAULT, '').language).toBe('python');
    });

    it('should parse a very long line in linear time', () => {
      const code = 'x = ' + 'a'.repeat(40000) + ';\n';
      const started = Date.now();
      const result = parser.parse(code, 'java');

      expect(Date.now() - started).toBeLessThan(1000);
      expect(result.metrics.maxLineLength).toBe(40005);
    });

    it('should read comparison operands outward from the operator', () => {
      const code = 'y = ' + 'b'.repeat(20000) + ' == c\n';
      const started = Date.now();
      const comparisons = collect(parser.parse(code, 'python').tree, NodeKind.COMPARISON);

      expect(Date.now() - started).toBeLessThan(1000);
      expect(comparisons).toHaveLength(1);
      expect(comparisons[0].operator).toBe('==');
      expect(comparisons[0].operands?.[1]).toBe('c');
      expect(comparisons[0].operands?.[0]).toMatch(/^b+$/);
    });
  });

  describe('grammar parsing', () => {
    const code = [
      "import { readFile } from 'fs';",
      '',
      '/** Adds two numbers. */',
      'export function add(a: number, b = 2): number {',
      '  if (a > 0 && b > 0) {',
      '    return a + b;',
      '  }',
      '  return 0;',
      '}',
    ].join('\n');

    it('should parse typescript with the compiler', () => {
      const result = parser.parse(code, 'ts');

      expect(result.mode).toBe(ParseMode.GRAMMAR);
      expect(result.language).toBe('typescript');
      expect(result.degradedReason).toBeUndefined();

      const [imported, fn] = result.tree.children;
      expect(imported).toMatchObject({ kind: NodeKind.IMPORT, name: 'fs', bindings: ['readFile'] });
      expect(fn).toMatchObject({ kind: NodeKind.FUNCTION, name: 'add', documented: true });
      expect(fn.params).toEqual([{ name: 'a' }, { name: 'b', defaultValue: '2' }]);
      expect(fn.span).toEqual({ startLine: 4, endLine: 9 });
    });

    it('should count branches and boolean operators in complexity', () => {
      const { metrics } = parser.parse(code, 'typescript');

      expect(metrics).toMatchObject({
        linesOfCode: 9,
        numFunctions: 1,
        numImports: 1,
        complexity: 3,
        numComments: 1,
        docstringCoverage: 1,
      });
    });

    it('should fall back to heuristic parsing on syntax errors', () => {
      const result = parser.parse('const total = ;\n', 'javascript');

      expect(result.mode).toBe(ParseMode.HEURISTIC);
      expect(result.degradedReason).toMatch(/^syntax error at line 1: /);
      expect(result.tree.children[0].kind).toBe(NodeKind.ASSIGNMENT);
    });

    it('should fall back when a grammar backend throws', () => {
      const failing: ParserBackend = {
        mode: ParseMode.GRAMMAR,
        supports: () => true,
        build: () => {
          throw new Error('grammar crashed');
        },
      };
      const result = new StructuralParser([failing]).parse('x = 1\n', 'python');

      expect(result.mode).toBe(ParseMode.HEURISTIC);
      expect(result.degradedReason).toBe('grammar parser failed: grammar crashed');
    });
  });
});
