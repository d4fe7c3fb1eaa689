/**
 * Language registry: lexical conventions and line-level patterns for every
 * language the heuristic parser understands, plus tag normalization and
 * content-based detection for tags it does not recognize.
 */

export type GrammarId = 'typescript' | 'javascript';

export type ParamStyle = 'name-first' | 'type-first';

export interface LanguageSyntax {
  id: string;
  lineComments: string[];
  blockComment?: [string, string];
  /** Quote characters that open a string literal. */
  quotes: string[];
  /** Python-style triple-quoted strings and docstrings. */
  tripleQuotes: boolean;
  /** Single quotes delimit character literals rather than strings. */
  charLiterals: boolean;
  /** Choice between single and double quotes is a style decision. */
  quoteStyleMatters: boolean;
  /** Block structure is carried by indentation alone. */
  indentBlocks: boolean;
  paramStyle: ParamStyle;
  booleanOperators: RegExp;
  functionPatterns: RegExp[];
  classPatterns: RegExp[];
  importPatterns: RegExp[];
  assignmentPatterns: RegExp[];
  grammar?: GrammarId;
}

const C_BOOLEAN = /&&|\|\|/g;
const C_FAMILY_FUNCTION =
  /^(?:(?:public|private|protected|static|final|abstract|synchronized|virtual|inline|override|async|extern|unsafe|internal|sealed|native|constexpr|explicit)\s+)*(?:[A-Za-z_][\w:<>,\[\]*&.?]*\s+)+[*&]*([A-Za-z_]\w*)\s*\([^;]*$/;
const C_FAMILY_CLASS =
  /^(?:(?:public|private|protected|abstract|final|static|sealed|partial|internal|export|template<[^>]*>)\s+)*(?:class|struct|interface|enum|record)\s+([A-Za-z_]\w*)/;
const C_FAMILY_ASSIGNMENT =
  /^(?:(?:final|static|const|var|auto|readonly|private|public|protected)\s+)*(?:[A-Za-z_][\w<>,\[\].]*\s+)?([A-Za-z_]\w*)\s*=(?!=)/;

const JS_PATTERNS = {
  functionPatterns: [
    /^(?:export\s+)?(?:default\s+)?(?:async\s+)?function\s*\*?\s*([A-Za-z_$][\w$]*)\s*[(<]/,
    /^(?:export\s+)?(?:const|let|var)\s+([A-Za-z_$][\w$]*)\s*(?::[^=]+)?=\s*(?:async\s+)?(?:function\b|\([^)]*\)\s*(?::[^=]+)?=>|[A-Za-z_$][\w$]*\s*=>)/,
    /^(?:(?:public|private|protected|static|async|get|set|override|readonly|abstract)\s+)*([A-Za-z_$][\w$]*)\s*\([^)]*\)\s*(?::\s*[^={]+)?\{\s*$/,
  ],
  classPatterns: [
    /^(?:export\s+)?(?:default\s+)?(?:abstract\s+)?class\s+([A-Za-z_$][\w$]*)/,
  ],
  importPatterns: [
    /^import\s/,
    /^(?:const|let|var)\s+[^=]+=\s*require\s*\(/,
  ],
  assignmentPatterns: [
    /^(?:export\s+)?(?:const|let|var)\s+([A-Za-z_$][\w$]*)/,
  ],
};

const LANGUAGES: Record<string, LanguageSyntax> = {
  python: {
    id: 'python',
    lineComments: ['#'],
    quotes: ['"', "'"],
    tripleQuotes: true,
    charLiterals: false,
    quoteStyleMatters: true,
    indentBlocks: true,
    paramStyle: 'name-first',
    booleanOperators: /\b(?:and|or)\b/g,
    functionPatterns: [/^(?:async\s+)?def\s+([A-Za-z_]\w*)\s*\(/],
    classPatterns: [/^class\s+([A-Za-z_]\w*)/],
    importPatterns: [/^import\s+\S/, /^from\s+[\w.]+\s+import\b/],
    assignmentPatterns: [/^([A-Za-z_]\w*(?:\s*,\s*[A-Za-z_]\w*)*)\s*(?::\s*[^=]+)?=(?!=)/],
  },
  javascript: {
    id: 'javascript',
    lineComments: ['//'],
    blockComment: ['/*', '*/'],
    quotes: ['"', "'", '`'],
    tripleQuotes: false,
    charLiterals: false,
    quoteStyleMatters: true,
    indentBlocks: false,
    paramStyle: 'name-first',
    booleanOperators: C_BOOLEAN,
    ...JS_PATTERNS,
    grammar: 'javascript',
  },
  typescript: {
    id: 'typescript',
    lineComments: ['//'],
    blockComment: ['/*', '*/'],
    quotes: ['"', "'", '`'],
    tripleQuotes: false,
    charLiterals: false,
    quoteStyleMatters: true,
    indentBlocks: false,
    paramStyle: 'name-first',
    booleanOperators: C_BOOLEAN,
    ...JS_PATTERNS,
    grammar: 'typescript',
  },
  java: cFamily('java', [/^import\s+(?:static\s+)?[\w.*]+\s*;/]),
  c: cFamily('c', [/^#\s*include\b/]),
  cpp: cFamily('cpp', [/^#\s*include\b/, /^using\s+namespace\b/]),
  csharp: cFamily('csharp', [/^using\s+(?:static\s+)?[\w.]+\s*;/]),
  go: {
    id: 'go',
    lineComments: ['//'],
    blockComment: ['/*', '*/'],
    quotes: ['"', '`', "'"],
    tripleQuotes: false,
    charLiterals: true,
    quoteStyleMatters: false,
    indentBlocks: false,
    paramStyle: 'name-first',
    booleanOperators: C_BOOLEAN,
    functionPatterns: [/^func\s+(?:\([^)]*\)\s*)?([A-Za-z_]\w*)\s*[(\[]/],
    classPatterns: [/^type\s+([A-Za-z_]\w*)\s+(?:struct|interface)\b/],
    importPatterns: [/^import\b/],
    assignmentPatterns: [/^([A-Za-z_]\w*(?:\s*,\s*[A-Za-z_]\w*)*)\s*:=/, /^var\s+([A-Za-z_]\w*)/],
  },
  rust: {
    id: 'rust',
    lineComments: ['//'],
    blockComment: ['/*', '*/'],
    quotes: ['"', "'"],
    tripleQuotes: false,
    charLiterals: true,
    quoteStyleMatters: false,
    indentBlocks: false,
    paramStyle: 'name-first',
    booleanOperators: C_BOOLEAN,
    functionPatterns: [/^(?:pub(?:\([^)]*\))?\s+)?(?:const\s+)?(?:async\s+)?(?:unsafe\s+)?fn\s+([A-Za-z_]\w*)/],
    classPatterns: [/^(?:pub(?:\([^)]*\))?\s+)?(?:struct|enum|trait)\s+([A-Za-z_]\w*)/],
    importPatterns: [/^(?:pub\s+)?use\s/, /^extern\s+crate\b/],
    assignmentPatterns: [/^let\s+(?:mut\s+)?([A-Za-z_]\w*)/, /^(?:pub\s+)?(?:const|static)\s+([A-Za-z_]\w*)/],
  },
  kotlin: {
    id: 'kotlin',
    lineComments: ['//'],
    blockComment: ['/*', '*/'],
    quotes: ['"', "'"],
    tripleQuotes: false,
    charLiterals: true,
    quoteStyleMatters: false,
    indentBlocks: false,
    paramStyle: 'name-first',
    booleanOperators: C_BOOLEAN,
    functionPatterns: [/^(?:(?:private|public|internal|protected|override|suspend|inline|open|operator)\s+)*fun\s+(?:<[^>]*>\s*)?(?:[\w.]+\.)?([A-Za-z_]\w*)\s*\(/],
    classPatterns: [/^(?:(?:private|public|internal|data|sealed|abstract|open|enum|inner)\s+)*(?:class|interface|object)\s+([A-Za-z_]\w*)/],
    importPatterns: [/^import\s/],
    assignmentPatterns: [/^(?:(?:private|public|internal|const)\s+)*(?:val|var)\s+([A-Za-z_]\w*)/],
  },
  swift: {
    id: 'swift',
    lineComments: ['//'],
    blockComment: ['/*', '*/'],
    quotes: ['"'],
    tripleQuotes: false,
    charLiterals: false,
    quoteStyleMatters: false,
    indentBlocks: false,
    paramStyle: 'name-first',
    booleanOperators: C_BOOLEAN,
    functionPatterns: [/^(?:(?:private|public|internal|fileprivate|open|static|class|override|mutating)\s+)*func\s+([A-Za-z_]\w*)/],
    classPatterns: [/^(?:(?:private|public|internal|final|open)\s+)*(?:class|struct|enum|protocol|extension)\s+([A-Za-z_]\w*)/],
    importPatterns: [/^import\s/],
    assignmentPatterns: [/^(?:(?:private|public|static)\s+)*(?:let|var)\s+([A-Za-z_]\w*)/],
  },
  ruby: {
    id: 'ruby',
    lineComments: ['#'],
    quotes: ['"', "'"],
    tripleQuotes: false,
    charLiterals: false,
    quoteStyleMatters: true,
    indentBlocks: true,
    paramStyle: 'name-first',
    booleanOperators: /&&|\|\||\b(?:and|or)\b/g,
    functionPatterns: [/^def\s+(?:self\.)?([A-Za-z_]\w*[?!=]?)/],
    classPatterns: [/^(?:class|module)\s+([A-Z]\w*)/],
    importPatterns: [/^require(?:_relative)?\s/, /^load\s/],
    assignmentPatterns: [/^([a-z_]\w*)\s*=(?!=)/],
  },
  php: {
    id: 'php',
    lineComments: ['//', '#'],
    blockComment: ['/*', '*/'],
    quotes: ['"', "'"],
    tripleQuotes: false,
    charLiterals: false,
    quoteStyleMatters: true,
    indentBlocks: false,
    paramStyle: 'name-first',
    booleanOperators: /&&|\|\||\b(?:and|or)\b/g,
    functionPatterns: [/^(?:(?:public|private|protected|static|abstract|final)\s+)*function\s+&?([A-Za-z_]\w*)\s*\(/],
    classPatterns: [/^(?:(?:abstract|final|readonly)\s+)*(?:class|interface|trait|enum)\s+([A-Za-z_]\w*)/],
    importPatterns: [/^use\s+[\w\\]+/, /^(?:require|include)(?:_once)?\b/],
    assignmentPatterns: [/^\$([A-Za-z_]\w*)\s*=(?!=)/],
  },
  unknown: {
    id: 'unknown',
    lineComments: ['//', '#'],
    blockComment: ['/*', '*/'],
    quotes: ['"', "'"],
    tripleQuotes: false,
    charLiterals: false,
    quoteStyleMatters: true,
    indentBlocks: false,
    paramStyle: 'name-first',
    booleanOperators: /&&|\|\||\b(?:and|or)\b/g,
    functionPatterns: [
      /^(?:async\s+)?(?:def|function|func|fn|fun|sub)\s+([A-Za-z_]\w*)/,
    ],
    classPatterns: [/^(?:class|struct|interface|trait)\s+([A-Za-z_]\w*)/],
    importPatterns: [/^(?:import|from|require|use|include|#\s*include)\b/],
    assignmentPatterns: [/^(?:(?:const|let|var|val)\s+)?([A-Za-z_]\w*)\s*=(?!=)/],
  },
};

function cFamily(id: string, importPatterns: RegExp[]): LanguageSyntax {
  return {
    id,
    lineComments: ['//'],
    blockComment: ['/*', '*/'],
    quotes: ['"', "'"],
    tripleQuotes: false,
    charLiterals: true,
    quoteStyleMatters: false,
    indentBlocks: false,
    paramStyle: 'type-first',
    booleanOperators: C_BOOLEAN,
    functionPatterns: [C_FAMILY_FUNCTION],
    classPatterns: [C_FAMILY_CLASS],
    importPatterns,
    assignmentPatterns: [C_FAMILY_ASSIGNMENT],
  };
}

const ALIASES: Record<string, string> = {
  py: 'python',
  python3: 'python',
  py3: 'python',
  js: 'javascript',
  jsx: 'javascript',
  mjs: 'javascript',
  cjs: 'javascript',
  node: 'javascript',
  ecmascript: 'javascript',
  ts: 'typescript',
  tsx: 'typescript',
  mts: 'typescript',
  cts: 'typescript',
  'c++': 'cpp',
  cc: 'cpp',
  cxx: 'cpp',
  hpp: 'cpp',
  h: 'c',
  'c#': 'csharp',
  cs: 'csharp',
  golang: 'go',
  rb: 'ruby',
  rs: 'rust',
  kt: 'kotlin',
  kts: 'kotlin',
};

export const SUPPORTED_LANGUAGES: readonly string[] = Object.keys(LANGUAGES).filter((id) => id !== 'unknown');

/** Maps a caller-supplied tag to a registry id, or null when unrecognized. */
export function normalizeLanguageTag(tag: string): string | null {
  const key = tag.trim().toLowerCase();
  if (key.length === 0) return null;
  if (key !== 'unknown' && Object.hasOwn(LANGUAGES, key)) return key;
  return Object.hasOwn(ALIASES, key) ? ALIASES[key] : null;
}

export function detectLanguage(code: string): string {
  if (/^\s*(?:async\s+)?def\s+\w+\s*\(.*\)\s*(?:->\s*[^:]+)?:\s*$/m.test(code) ||
      /^\s*from\s+[\w.]+\s+import\s/m.test(code) ||
      /^\s*(?:elif|except)\b.*:\s*$/m.test(code)) {
    return 'python';
  }
  if (/^\s*#\s*include\b/m.test(code) || /\bint\s+main\s*\(/.test(code) || /\bstd::/.test(code)) {
    return 'cpp';
  }
  if (/^\s*using\s+System\b/m.test(code) || /^\s*namespace\s+[\w.]+\s*[{;]?\s*$/m.test(code)) {
    return 'csharp';
  }
  if (/\bpublic\s+(?:final\s+)?class\b/.test(code) || /public\s+static\s+void\s+main/.test(code)) {
    return 'java';
  }
  if (/\binterface\s+\w+\s*\{/.test(code) || /:\s*(?:string|number|boolean)\b/.test(code)) {
    return 'typescript';
  }
  if (/\bfunction\b/.test(code) || /^\s*(?:const|let)\s+\w+\s*=/m.test(code) || /=>/.test(code)) {
    return 'javascript';
  }
  if (/^\s*import\s+[\w.]+\s*$/m.test(code)) {
    return 'python';
  }
  return 'unknown';
}

/**
 * Resolves a declared tag to a registry id: known tags and aliases directly,
 * anything else by inspecting the code.
 */
export function resolveLanguage(tag: string, code: string): string {
  return normalizeLanguageTag(tag) ?? detectLanguage(code);
}

export function getSyntax(languageId: string): LanguageSyntax {
  return Object.hasOwn(LANGUAGES, languageId) ? LANGUAGES[languageId] : LANGUAGES.unknown;
}
