import {
  detectLanguage,
  getSyntax,
  normalizeLanguageTag,
  resolveLanguage,
  SUPPORTED_LANGUAGES,
} from '../../src/parser/languages';

describe('normalizeLanguageTag', () => {
  it('should map aliases and ignore case and whitespace', () => {
    expect(normalizeLanguageTag('PY')).toBe('python');
    expect(normalizeLanguageTag('c++')).toBe('cpp');
    expect(normalizeLanguageTag(' TypeScript ')).toBe('typescript');
  });

  it('should return null for unrecognized or empty tags', () => {
    expect(normalizeLanguageTag('cobol')).toBeNull();
    expect(normalizeLanguageTag('')).toBeNull();
    expect(normalizeLanguageTag('unknown')).toBeNull();
  });
});

describe('detectLanguage', () => {
  it('should recognize python definitions', () => {
    expect(detectLanguage('def f(x):\n    return x')).toBe('python');
  });

  it('should recognize preprocessor includes as C++', () => {
    expect(detectLanguage('#include <stdio.h>\n')).toBe('cpp');
  });

  it('should tell typescript annotations from plain javascript', () => {
    expect(detectLanguage('let n: number = 1;')).toBe('typescript');
    expect(detectLanguage('const x = 1;')).toBe('javascript');
  });

  it('should fall back to unknown', () => {
    expect(detectLanguage('hello world')).toBe('unknown');
  });
});

describe('resolveLanguage', () => {
  it('should prefer a recognized tag over the content', () => {
    expect(resolveLanguage('go', 'def f():\n  pass')).toBe('go');
  });

  it('should inspect the content when the tag is unrecognized', () => {
    expect(resolveLanguage('cobol', 'def f():\n  pass')).toBe('python');
  });
});

describe('language registry', () => {
  it('should list supported languages without the fallback entry', () => {
    expect(SUPPORTED_LANGUAGES).toContain('python');
    expect(SUPPORTED_LANGUAGES).not.toContain('unknown');
  });

  it('should return the fallback syntax for unknown ids', () => {
    expect(getSyntax('nope').id).toBe('unknown');
  });
});
