/**
 * Lexer for the HCL-style threat-model format.
 * Only what block/attribute extraction needs: identifiers, literals,
 * structural punctuation and newlines. Everything else is an `other` token.
 */

export type TokenType =
  | 'ident'
  | 'string'
  | 'heredoc'
  | 'number'
  | 'lbrace'
  | 'rbrace'
  | 'open'
  | 'close'
  | 'equals'
  | 'newline'
  | 'other'
  | 'eof';

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  /** Source offsets: `source.slice(start, end)` is the token's raw text. */
  start: number;
  end: number;
}

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(`line ${line}: ${message}`);
    this.name = 'ParseError';
  }
}

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_\-.]/;
const DIGIT = /[0-9]/;

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  let line = 1;
  let tokenStart = 0;

  // Punctuation is pushed before `i` moves past it
  const push = (type: TokenType, value: string, at = line) => {
    tokens.push({ type, value, line: at, start: tokenStart, end: Math.max(i, tokenStart + value.length) });
  };

  while (i < source.length) {
    const ch = source[i];
    tokenStart = i;

    if (ch === '\n') {
      push('newline', '\n');
      line++;
      i++;
      continue;
    }

    if (ch === ' ' || ch === '\t' || ch === '\r') {
      i++;
      continue;
    }

    // Line comments
    if (ch === '#' || (ch === '/' && source[i + 1] === '/')) {
      while (i < source.length && source[i] !== '\n') i++;
      continue;
    }

    // Block comments
    if (ch === '/' && source[i + 1] === '*') {
      const start = line;
      i += 2;
      while (i < source.length && !(source[i] === '*' && source[i + 1] === '/')) {
        if (source[i] === '\n') line++;
        i++;
      }
      if (i >= source.length) throw new ParseError('unterminated block comment', start);
      i += 2;
      continue;
    }

    if (ch === '"') {
      const start = line;
      let value = '';
      i++;
      while (i < source.length && source[i] !== '"') {
        if (source[i] === '\n') throw new ParseError('unterminated string', start);
        if (source[i] === '\\' && i + 1 < source.length) {
          const next = source[i + 1];
          value += next === 'n' ? '\n' : next === 't' ? '\t' : next;
          i += 2;
          continue;
        }
        value += source[i];
        i++;
      }
      if (i >= source.length) throw new ParseError('unterminated string', start);
      i++;
      push('string', value, start);
      continue;
    }

    // Heredoc: <<EOT or <<-EOT, body up to a line holding only the marker
    if (ch === '<' && source[i + 1] === '<') {
      const header = /^<<(-?)([A-Za-z_][A-Za-z0-9_]*)[ \t]*\r?\n/.exec(source.slice(i));
      if (header) {
        const start = line;
        const indented = header[1] === '-';
        const marker = header[2];
        i += header[0].length;
        line++;
        const bodyLines: string[] = [];
        let closed = false;
        while (i < source.length) {
          const end = source.indexOf('\n', i);
          const raw = end === -1 ? source.slice(i) : source.slice(i, end);
          const text = raw.replace(/\r$/, '');
          i = end === -1 ? source.length : end;
          if (text.trim() === marker) {
            closed = true;
            break;
          }
          bodyLines.push(text);
          if (end !== -1) {
            i++;
            line++;
          }
        }
        if (!closed) throw new ParseError(`unterminated heredoc ${marker}`, start);
        const body = indented ? stripCommonIndent(bodyLines) : bodyLines;
        push('heredoc', body.join('\n'), start);
        continue;
      }
    }

    if (IDENT_START.test(ch)) {
      let value = '';
      while (i < source.length && IDENT_PART.test(source[i])) {
        value += source[i];
        i++;
      }
      push('ident', value);
      continue;
    }

    if (DIGIT.test(ch) || (ch === '-' && DIGIT.test(source[i + 1] ?? ''))) {
      let value = ch;
      i++;
      while (i < source.length && /[0-9.eE]/.test(source[i])) {
        value += source[i];
        i++;
      }
      push('number', value);
      continue;
    }

    switch (ch) {
      case '{':
        push('lbrace', ch);
        break;
      case '}':
        push('rbrace', ch);
        break;
      case '[':
      case '(':
        push('open', ch);
        break;
      case ']':
      case ')':
        push('close', ch);
        break;
      case '=':
        // `==` is an operator inside expressions, not an assignment
        if (source[i + 1] === '=') {
          push('other', '==');
          i++;
        } else {
          push('equals', ch);
        }
        break;
      default:
        push('other', ch);
    }
    i++;
  }

  tokenStart = source.length;
  push('eof', '');
  return tokens;
}

function stripCommonIndent(lines: string[]): string[] {
  const indents = lines
    .filter((l) => l.trim().length > 0)
    .map((l) => /^[ \t]*/.exec(l)?.[0].length ?? 0);
  const common = indents.length > 0 ? Math.min(...indents) : 0;
  return lines.map((l) => l.slice(common));
}
