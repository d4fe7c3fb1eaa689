import { StructuralParser } from '../../src/parser/structural-parser';
import { buildDistribution, dominantOf, EMPTY_QUOTES } from '../../src/style/distribution';
import { classifyIdentifier, classifyQuote, StyleExtractor } from '../../src/style/style-extractor';

const parser = new StructuralParser();
const extractor = new StyleExtractor();

function extract(code: string, language: string) {
  const parsed = parser.parse(code, language);
  return extractor.extract(parsed.tree, code, parsed.language);
}

describe('classifyIdentifier', () => {
  it('should classify the common conventions', () => {
    expect(classifyIdentifier('user_name')).toBe('snake_case');
    expect(classifyIdentifier('userName')).toBe('camelCase');
    expect(classifyIdentifier('UserName')).toBe('PascalCase');
    expect(classifyIdentifier('HTTPServer')).toBe('PascalCase');
    expect(classifyIdentifier('user_Name')).toBe('mixed');
  });

  it('should ignore leading underscores', () => {
    expect(classifyIdentifier('_private_value')).toBe('snake_case');
  });

  it('should not classify names that fit every convention', () => {
    expect(classifyIdentifier('total')).toBeNull();
    expect(classifyIdentifier('MAX_SIZE')).toBeNull();
    expect(classifyIdentifier('__init__')).toBeNull();
  });
});

describe('classifyQuote', () => {
  it('should report strings that embed the other quote as mixed', () => {
    expect(classifyQuote("'", 'say "hi"')).toBe('mixed');
    expect(classifyQuote('"', 'abc')).toBe('double');
    expect(classifyQuote("'", 'abc')).toBe('single');
  });
});

describe('distributions', () => {
  it('should give ties to the category seen first', () => {
    expect(buildDistribution(EMPTY_QUOTES, ['double', 'single'])).toEqual({
      distribution: { single: 0.5, double: 0.5, mixed: 0 },
      dominant: 'double',
      samples: 2,
      observations: 1,
    });
  });

  it('should have no dominant category without samples', () => {
    expect(buildDistribution(EMPTY_QUOTES, []).dominant).toBeNull();
    expect(dominantOf({ single: 0, double: 0, mixed: 0 }, ['single', 'double', 'mixed'])).toBeNull();
  });
});

describe('StyleExtractor', () => {
  it('should extract naming, indentation, quotes and spacing', () => {
    const code = [
      'def load_data(path):',
      "    file_name = 'a'",
      '    return file_name',
      '',
      '',
      'def saveData(x):',
      '    return "b"',
    ].join('\n');

    expect(extract(code, 'python')).toEqual({
      naming: {
        distribution: { snake_case: 2 / 3, camelCase: 1 / 3, PascalCase: 0, mixed: 0 },
        dominant: 'snake_case',
        samples: 3,
        observations: 1,
      },
      indentation: { unitWidth: 4, consistencyRatio: 1, observations: 1 },
      quoteStyle: {
        distribution: { single: 0.5, double: 0.5, mixed: 0 },
        dominant: 'single',
        samples: 2,
        observations: 1,
      },
      spacing: { avgBlankLinesBetweenDefs: 2, blankLineObservations: 1, trailingWhitespaceRate: 0 },
    });
  });

  it('should report the most common indentation step and its share', () => {
    const code = ['if a:', '  b = 1', '  if c:', '      d = 2', 'if e:', '  f = 3'].join('\n');

    expect(extract(code, 'python').indentation).toEqual({ unitWidth: 2, consistencyRatio: 2 / 3, observations: 1 });
  });

  it('should measure trailing whitespace per line', () => {
    expect(extract('a = 1  \nb = 2\n', 'python').spacing.trailingWhitespaceRate).toBe(0.5);
  });

  it('should report no indentation unit for flat code', () => {
    expect(extract('x = 1\n', 'python').indentation).toEqual({ unitWidth: 0, consistencyRatio: 1, observations: 0 });
  });

  it('should skip quote style where the language fixes it', () => {
    const code = 'package main\n\nfunc main() {\n\tfmt.Println("hi")\n}\n';

    expect(extract(code, 'go').quoteStyle.samples).toBe(0);
  });

  it('should return the same signature for the same input', () => {
    const code = 'const userName = "a";\n';

    expect(extract(code, 'javascript')).toEqual(extract(code, 'javascript'));
  });
});
