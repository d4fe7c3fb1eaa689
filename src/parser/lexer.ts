import type { LanguageSyntax } from './languages';

export interface StringToken {
  line: number;
  endLine: number;
  column: number;
  /** Opening delimiter character. */
  quote: string;
  triple: boolean;
  /** Raw text including delimiters. */
  text: string;
  content: string;
}

export interface CommentToken {
  line: number;
  endLine: number;
  text: string;
}

export interface ScanResult {
  lines: string[];
  /**
   * Same lines, column-aligned, with comment text and string contents
   * replaced by spaces. String delimiters are kept.
   */
  masked: string[];
  strings: StringToken[];
  comments: CommentToken[];
  /** Lines (1-based) covered by a comment. */
  commentLines: Set<number>;
  /** openAtEnd[i] is true when line i+1 ends inside a string or block comment. */
  openAtEnd: boolean[];
}

export interface LogicalLine {
  startLine: number;
  endLine: number;
  indent: number;
  /** Raw lines joined with '\n'. */
  raw: string;
  /** Masked lines joined with '\n'; offsets match `raw`. */
  masked: string;
}

export const TAB_WIDTH = 4;

/** Splits on any line terminator; a trailing terminator does not add an empty line. */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export function indentWidth(line: string): number {
  let width = 0;
  for (const ch of line) {
    if (ch === ' ') width += 1;
    else if (ch === '\t') width += TAB_WIDTH;
    else break;
  }
  return width;
}

type ScanState =
  | { mode: 'code' }
  | { mode: 'string'; token: StringToken; quote: string; triple: boolean }
  | { mode: 'block'; token: CommentToken; close: string };

const MAX_CHAR_LITERAL = 10;

function charLiteralEnd(line: string, start: number): number {
  for (let i = start + 1; i < line.length && i - start <= MAX_CHAR_LITERAL; i++) {
    if (line[i] === '\\') {
      i++;
      continue;
    }
    if (line[i] === "'") return i;
  }
  return -1;
}

export function scanSource(text: string, syntax: LanguageSyntax): ScanResult {
  const lines = splitLines(text);
  const masked: string[] = [];
  const strings: StringToken[] = [];
  const comments: CommentToken[] = [];
  const commentLines = new Set<number>();
  const openAtEnd: boolean[] = [];
  let state: ScanState = { mode: 'code' };

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    const lineNo = index + 1;
    const out = line.split('');
    let i = 0;

    while (i < line.length) {
      if (state.mode === 'string') {
        const { token, quote, triple } = state;
        const ch = line[i];
        if (ch === '\\') {
          const escaped = line.slice(i, i + 2);
          token.content += escaped;
          token.text += escaped;
          out[i] = ' ';
          if (i + 1 < line.length) out[i + 1] = ' ';
          i += 2;
          continue;
        }
        const closer = triple ? quote.repeat(3) : quote;
        if (line.startsWith(closer, i)) {
          token.text += closer;
          token.endLine = lineNo;
          strings.push(token);
          state = { mode: 'code' };
          i += closer.length;
          continue;
        }
        token.content += ch;
        token.text += ch;
        out[i] = ' ';
        i++;
        continue;
      }

      if (state.mode === 'block') {
        commentLines.add(lineNo);
        if (line.startsWith(state.close, i)) {
          for (let k = 0; k < state.close.length; k++) out[i + k] = ' ';
          state.token.text += state.close;
          state.token.endLine = lineNo;
          comments.push(state.token);
          i += state.close.length;
          state = { mode: 'code' };
          continue;
        }
        state.token.text += line[i];
        out[i] = ' ';
        i++;
        continue;
      }

      if (syntax.blockComment && line.startsWith(syntax.blockComment[0], i)) {
        const [open, close] = syntax.blockComment;
        for (let k = 0; k < open.length; k++) out[i + k] = ' ';
        commentLines.add(lineNo);
        state = { mode: 'block', token: { line: lineNo, endLine: lineNo, text: open }, close };
        i += open.length;
        continue;
      }

      const lineComment = syntax.lineComments.find((marker) => line.startsWith(marker, i));
      if (lineComment) {
        comments.push({ line: lineNo, endLine: lineNo, text: line.slice(i) });
        commentLines.add(lineNo);
        for (let k = i; k < line.length; k++) out[k] = ' ';
        break;
      }

      const ch = line[i];
      if (syntax.quotes.includes(ch)) {
        if (syntax.tripleQuotes && line.startsWith(ch.repeat(3), i)) {
          state = {
            mode: 'string',
            quote: ch,
            triple: true,
            token: { line: lineNo, endLine: lineNo, column: i, quote: ch, triple: true, text: ch.repeat(3), content: '' },
          };
          i += 3;
          continue;
        }
        if (!(syntax.charLiterals && ch === "'" && charLiteralEnd(line, i) < 0)) {
          state = {
            mode: 'string',
            quote: ch,
            triple: false,
            token: { line: lineNo, endLine: lineNo, column: i, quote: ch, triple: false, text: ch, content: '' },
          };
          i += 1;
          continue;
        }
      }
      i++;
    }

    // Only triple-quoted strings and template literals span lines.
    if (state.mode === 'string' && !state.triple && state.quote !== '`') {
      state.token.endLine = lineNo;
      strings.push(state.token);
      state = { mode: 'code' };
    } else if (state.mode === 'string') {
      state.token.content += '\n';
      state.token.text += '\n';
    } else if (state.mode === 'block') {
      state.token.text += '\n';
    }

    masked.push(out.join(''));
    openAtEnd.push(state.mode !== 'code');
  }

  if (state.mode === 'string') {
    state.token.endLine = lines.length;
    strings.push(state.token);
  } else if (state.mode === 'block') {
    state.token.endLine = lines.length;
    comments.push(state.token);
  }

  return { lines, masked, strings, comments, commentLines, openAtEnd };
}

function bracketDelta(masked: string, countBraces: boolean): number {
  let delta = 0;
  for (const ch of masked) {
    if (ch === '(' || ch === '[' || (countBraces && ch === '{')) delta++;
    else if (ch === ')' || ch === ']' || (countBraces && ch === '}')) delta--;
  }
  return delta;
}

/**
 * Groups physical lines into statements: a statement continues while a
 * bracket is open, a string or block comment is unterminated, or the line
 * ends with a backslash. Blank and comment-only lines are dropped.
 */
export function buildLogicalLines(scan: ScanResult, syntax: LanguageSyntax): LogicalLine[] {
  const result: LogicalLine[] = [];
  const { lines, masked, openAtEnd } = scan;
  let i = 0;

  while (i < lines.length) {
    if (masked[i].trim().length === 0) {
      i++;
      continue;
    }
    const start = i;
    let depth = Math.max(0, bracketDelta(masked[i], syntax.indentBlocks));
    while (i + 1 < lines.length) {
      const trimmed = masked[i].trimEnd();
      const continues = openAtEnd[i] || trimmed.endsWith('\\') ||
        (depth > 0 && !(!syntax.indentBlocks && trimmed.endsWith('{')));
      if (!continues) break;
      i++;
      depth = Math.max(0, depth + bracketDelta(masked[i], syntax.indentBlocks));
    }
    result.push({
      startLine: start + 1,
      endLine: i + 1,
      indent: indentWidth(lines[start]),
      raw: lines.slice(start, i + 1).join('\n'),
      masked: masked.slice(start, i + 1).join('\n'),
    });
    i++;
  }
  return result;
}
