import { FindingCategory, NodeKind, type StructuralNode } from '../../types';
import { collect } from '../../parser/tree';
import {
  type RuleMatch,
  type SecurityRule,
  callArguments,
  isPlainLiteral,
  isStringLiteral,
  lastSegment,
  lineSpan,
} from '../rule';

function calls(tree: StructuralNode): StructuralNode[] {
  return collect(tree, NodeKind.CALL).filter((call) => call.name !== undefined);
}

function argumentsOf(call: StructuralNode): string {
  return callArguments(call.text ?? '');
}

function firstArgument(args: string): string {
  let depth = 0;
  for (let i = 0; i < args.length; i++) {
    const ch = args[i];
    if ('([{'.includes(ch)) depth++;
    else if (')]}'.includes(ch)) depth--;
    else if (ch === ',' && depth === 0) return args.slice(0, i).trim();
  }
  return args.trim();
}

/** Shannon entropy in bits per character. */
export function shannonEntropy(text: string): number {
  if (text.length === 0) return 0;
  const counts = new Map<string, number>();
  for (const ch of text) counts.set(ch, (counts.get(ch) ?? 0) + 1);
  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / text.length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

const GLOBAL_EVAL = new Set(['eval', 'window.eval', 'globalThis.eval', 'execScript', 'window.execScript']);
const TIMERS = new Set(['setTimeout', 'setInterval', 'window.setTimeout', 'window.setInterval']);

const dynamicEvaluation: SecurityRule = {
  id: 'dynamic_evaluation',
  title: 'Dynamic code evaluation',
  category: FindingCategory.SECURITY_ISSUE,
  suggestion: 'Parse the data explicitly instead of executing it as code.',
  evaluate({ tree, syntax }) {
    const matches: RuleMatch[] = [];
    for (const call of calls(tree)) {
      const name = call.name ?? '';
      let reason: string | null = null;
      if (GLOBAL_EVAL.has(name)) reason = `${name}() executes a string as code`;
      else if (name === 'exec' && syntax.id === 'python') reason = 'exec() executes a string as code';
      else if (name === 'Function' && call.operator === 'new') reason = 'new Function() compiles a string into code';
      else if (TIMERS.has(name) && isStringLiteral(firstArgument(argumentsOf(call)))) {
        reason = `${name}() with a string argument evaluates it as code`;
      }
      if (reason) matches.push({ message: reason, span: call.span });
    }
    return matches;
  },
};

const SUBPROCESS = /^subprocess\.(?:call|run|Popen|check_call|check_output)$/;
const SHELL_FUNCTIONS = new Set(['system', 'popen', 'shell_exec', 'passthru', 'proc_open', 'os.system', 'os.popen']);
const CHILD_EXEC = new Set(['exec', 'execSync']);
const CHILD_SPAWN = new Set(['spawn', 'spawnSync', 'execFile', 'execFileSync']);
const CONCATENATED = /\+|\$\{/;

const shellInjection: SecurityRule = {
  id: 'shell_injection',
  title: 'Shell command built from data',
  category: FindingCategory.SECURITY_ISSUE,
  suggestion: 'Pass the program and its arguments as a list without a shell.',
  evaluate({ tree, syntax }) {
    const matches: RuleMatch[] = [];
    for (const call of calls(tree)) {
      const name = call.name ?? '';
      const args = argumentsOf(call);
      const last = lastSegment(name);
      let flagged = false;
      if (SHELL_FUNCTIONS.has(name)) {
        flagged = args.length > 0 && !isPlainLiteral(firstArgument(args));
      } else if (SUBPROCESS.test(name)) {
        flagged = /\bshell\s*=\s*True\b/.test(args);
      } else if (CHILD_EXEC.has(last) && syntax.id !== 'python') {
        flagged = CONCATENATED.test(firstArgument(args));
      } else if (CHILD_SPAWN.has(last)) {
        flagged = /\bshell\s*:\s*true\b/.test(args);
      } else if (name === 'exec.Command') {
        flagged = /^"(?:ba)?sh"\s*,\s*"-c"/.test(args);
      }
      if (flagged) {
        matches.push({ message: `${name}() runs a shell command assembled at runtime`, span: call.span });
      }
    }
    return matches;
  },
};

const SECRET_ASSIGNMENT =
  /(?<![A-Za-z0-9])((?:password|passwd|pwd|secret|api[_-]?key|access[_-]?key|private[_-]?key|auth[_-]?token|token)[\w-]*)["']?\s*[:=]\s*(["'`])([^"'`]+)\2/i;

const hardcodedSecret: SecurityRule = {
  id: 'hardcoded_secret',
  title: 'Hardcoded credential',
  category: FindingCategory.SECURITY_ISSUE,
  suggestion: 'Load credentials from the environment or a secret manager.',
  evaluate({ scan, config }) {
    const matches: RuleMatch[] = [];
    const flagged = new Set<number>();
    scan.lines.forEach((line, index) => {
      const match = SECRET_ASSIGNMENT.exec(line);
      if (!match) return;
      flagged.add(index + 1);
      matches.push({
        message: `A literal value is assigned to "${match[1]}"`,
        span: lineSpan(index + 1),
      });
    });
    for (const token of scan.strings) {
      if (flagged.has(token.line)) continue;
      const value = token.content;
      if (value.length < config.secretMinLength || /\s/.test(value) || /^[a-z][\w+.-]*:\/\//i.test(value)) continue;
      const entropy = shannonEntropy(value);
      if (entropy < config.secretEntropyThreshold) continue;
      flagged.add(token.line);
      matches.push({
        message: `String literal on line ${token.line} looks like a credential (entropy ${entropy.toFixed(2)})`,
        span: lineSpan(token.line, token.endLine),
      });
    }
    return matches.sort((a, b) => (a.span?.startLine ?? 0) - (b.span?.startLine ?? 0));
  },
};

const WEAK_ALGORITHM = /^["'`](md5|sha-?1)["'`]$/i;

const weakHash: SecurityRule = {
  id: 'weak_hash',
  title: 'Weak hash algorithm',
  category: FindingCategory.SECURITY_ISSUE,
  suggestion: 'Use SHA-256 or stronger, and a dedicated password hash for passwords.',
  evaluate({ tree }) {
    const matches: RuleMatch[] = [];
    for (const call of calls(tree)) {
      const last = lastSegment(call.name ?? '');
      let algorithm: string | null = null;
      if (/^(?:md5|sha1)$/i.test(last)) {
        algorithm = last.toUpperCase();
      } else if (last === 'createHash' || last === 'getInstance' || call.operator === 'new') {
        const named = WEAK_ALGORITHM.exec(firstArgument(argumentsOf(call)));
        if (named) algorithm = named[1].toUpperCase().replace('-', '');
      }
      if (algorithm) {
        matches.push({ message: `${algorithm} is not collision resistant`, span: call.span });
      }
    }
    return matches;
  },
};

const QUERY_METHODS = new Set(['execute', 'executemany', 'query', 'raw', 'executeQuery', 'executeUpdate']);
const DYNAMIC_SQL = [
  /["']\s*%\s*[\w(]/,
  /["'`]\s*\+|\+\s*["'`]/,
  /\.format\(/,
  /^[fF]["']/,
  /\$\{/,
];

const sqlInjection: SecurityRule = {
  id: 'sql_injection',
  title: 'SQL built from strings',
  category: FindingCategory.SECURITY_ISSUE,
  suggestion: 'Use parameterized queries with placeholders.',
  evaluate({ tree }) {
    const matches: RuleMatch[] = [];
    for (const call of calls(tree)) {
      if (!QUERY_METHODS.has(lastSegment(call.name ?? ''))) continue;
      const query = firstArgument(argumentsOf(call));
      if (!DYNAMIC_SQL.some((pattern) => pattern.test(query))) continue;
      matches.push({
        message: `${call.name ?? 'query'}() receives a query assembled from strings`,
        span: call.span,
      });
    }
    return matches;
  },
};

const UNSAFE_LOADERS = /^(?:c?pickle|_pickle|marshal|dill)\.loads?$/i;
const SAFE_YAML = /SafeLoader|CSafeLoader|BaseLoader/;

const insecureDeserialization: SecurityRule = {
  id: 'insecure_deserialization',
  title: 'Unsafe deserialization',
  category: FindingCategory.SECURITY_ISSUE,
  suggestion: 'Deserialize untrusted input with a data-only format such as JSON.',
  evaluate({ tree }) {
    const matches: RuleMatch[] = [];
    for (const call of calls(tree)) {
      const name = call.name ?? '';
      const unsafe =
        UNSAFE_LOADERS.test(name) ||
        name === 'jsonpickle.decode' ||
        name === 'unserialize' ||
        (name === 'ObjectInputStream' && call.operator === 'new') ||
        (name === 'yaml.load' && !SAFE_YAML.test(argumentsOf(call)));
      if (unsafe) {
        matches.push({ message: `${name}() can construct arbitrary objects from its input`, span: call.span });
      }
    }
    return matches;
  },
};

export const SECURITY_RULES: readonly SecurityRule[] = [
  dynamicEvaluation,
  shellInjection,
  hardcodedSecret,
  weakHash,
  sqlInjection,
  insecureDeserialization,
];
