/**
 * Keel Manifest DSL — Lexer
 *
 * Splits manifest source into tokens. Comments (`# ...` and `/* ... *\/`)
 * and whitespace are dropped. Double-quoted strings are split into
 * interpolation parts here so the parser never re-scans string contents.
 *
 * The lexer is total: it returns either the full token list or a single
 * ParseError diagnostic pointing at the offending character.
 */

import type { InterpolationPart } from './ast.js';
import type { Result, SourceLocation } from './types.js';
import { DiagnosticKind, failure } from './types.js';

export type TokenKind =
  | 'name'
  | 'typeref'
  | 'variable'
  | 'string'
  | 'dqstring'
  | 'number'
  | 'punct'
  | 'eof';

export interface Token {
  readonly kind: TokenKind;
  /**
   * Token text. For `string` the unescaped value, for `variable` the name
   * without `$` or a leading `::`, for `dqstring` the raw source.
   */
  readonly text: string;
  /** Interpolation parts, only for `dqstring`. */
  readonly parts?: ReadonlyArray<InterpolationPart> | undefined;
  readonly location: SourceLocation;
}

/** Punctuation, longest first so that `=>` wins over `=`. */
const PUNCTUATION: ReadonlyArray<string> = [
  '<<|', '|>>', '=>', '==', '!=', '@@',
  '{', '}', '(', ')', '[', ']', ',', ':', ';', '=', '!',
];

const NAME = /[a-z_][A-Za-z0-9_]*(?:::[a-z_][A-Za-z0-9_]*)*/y;
const TYPEREF = /[A-Z][A-Za-z0-9_]*(?:::[A-Z][A-Za-z0-9_]*)*/y;
const VARIABLE = /\$(?:::)?([a-z_][A-Za-z0-9_]*(?:::[a-z_][A-Za-z0-9_]*)*)/y;
const NUMBER = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const VARIABLE_NAME = /^(?:::)?([a-z_][A-Za-z0-9_]*(?:::[a-z_][A-Za-z0-9_]*)*)$/;
const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  '"': '"',
  $: '$',
};

/** Sticky-regex match at `offset`, or null. */
function matchAt(pattern: RegExp, source: string, offset: number): RegExpExecArray | null {
  pattern.lastIndex = offset;
  return pattern.exec(source);
}

class Scanner {
  private offset = 0;
  private line = 1;
  private column = 1;

  constructor(
    private readonly file: string,
    private readonly source: string,
  ) {}

  get position(): number {
    return this.offset;
  }

  get done(): boolean {
    return this.offset >= this.source.length;
  }

  peek(ahead = 0): string {
    return this.source.charAt(this.offset + ahead);
  }

  location(): SourceLocation {
    return { file: this.file, line: this.line, column: this.column };
  }

  advance(count: number): string {
    const consumed = this.source.slice(this.offset, this.offset + count);
    for (const ch of consumed) {
      if (ch === '\n') {
        this.line += 1;
        this.column = 1;
      } else {
        this.column += 1;
      }
    }
    this.offset += consumed.length;
    return consumed;
  }

  match(pattern: RegExp): RegExpExecArray | null {
    return matchAt(pattern, this.source, this.offset);
  }

  startsWith(text: string): boolean {
    return this.source.startsWith(text, this.offset);
  }

  indexOf(text: string): number {
    return this.source.indexOf(text, this.offset);
  }
}

/**
 * Tokenize manifest source.
 *
 * @param file - Path used in token locations
 * @param source - Manifest text
 */
export function tokenize(file: string, source: string): Result<ReadonlyArray<Token>> {
  const scanner = new Scanner(file, source);
  const tokens: Token[] = [];

  while (!scanner.done) {
    const ch = scanner.peek();

    if (/\s/.test(ch)) {
      scanner.advance(1);
      continue;
    }
    if (ch === '#') {
      const end = scanner.indexOf('\n');
      scanner.advance(end === -1 ? source.length - scanner.position : end - scanner.position);
      continue;
    }
    if (scanner.startsWith('/*')) {
      const start = scanner.location();
      const end = scanner.indexOf('*/');
      if (end === -1) {
        return failure(DiagnosticKind.ParseError, 'Unterminated block comment', start);
      }
      scanner.advance(end + 2 - scanner.position);
      continue;
    }

    const location = scanner.location();

    if (ch === "'") {
      const scanned = scanSingleQuoted(scanner);
      if (scanned === null) {
        return failure(DiagnosticKind.ParseError, 'Unterminated string', location);
      }
      tokens.push({ kind: 'string', text: scanned, location });
      continue;
    }
    if (ch === '"') {
      const start = scanner.position;
      const scanned = scanDoubleQuoted(scanner);
      if (!scanned.ok) {
        return failure(DiagnosticKind.ParseError, scanned.error, location);
      }
      tokens.push({
        kind: 'dqstring',
        text: source.slice(start, scanner.position),
        parts: scanned.parts,
        location,
      });
      continue;
    }

    const variable = scanner.match(VARIABLE);
    if (variable !== null) {
      scanner.advance(variable[0].length);
      tokens.push({ kind: 'variable', text: variable[1] ?? '', location });
      continue;
    }
    const number = scanner.match(NUMBER);
    if (number !== null && (ch !== '-' || /\d/.test(scanner.peek(1)))) {
      scanner.advance(number[0].length);
      tokens.push({ kind: 'number', text: number[0], location });
      continue;
    }
    const name = scanner.match(NAME);
    if (name !== null) {
      scanner.advance(name[0].length);
      tokens.push({ kind: 'name', text: name[0], location });
      continue;
    }
    const typeref = scanner.match(TYPEREF);
    if (typeref !== null) {
      scanner.advance(typeref[0].length);
      tokens.push({ kind: 'typeref', text: typeref[0], location });
      continue;
    }
    const punct = PUNCTUATION.find((p) => scanner.startsWith(p));
    if (punct !== undefined) {
      scanner.advance(punct.length);
      tokens.push({ kind: 'punct', text: punct, location });
      continue;
    }

    return failure(DiagnosticKind.ParseError, `Unexpected character ${JSON.stringify(ch)}`, location);
  }

  tokens.push({ kind: 'eof', text: '', location: scanner.location() });
  return { ok: true, value: tokens };
}

// ---------------------------------------------------------------------------
// Internal: string scanning
// ---------------------------------------------------------------------------

/** Single-quoted: only `\'` and `\\` are escapes. Returns null if unterminated. */
function scanSingleQuoted(scanner: Scanner): string | null {
  scanner.advance(1);
  let value = '';
  while (!scanner.done) {
    const ch = scanner.peek();
    if (ch === "'") {
      scanner.advance(1);
      return value;
    }
    if (ch === '\\' && (scanner.peek(1) === "'" || scanner.peek(1) === '\\')) {
      scanner.advance(1);
      value += scanner.advance(1);
      continue;
    }
    value += scanner.advance(1);
  }
  return null;
}

type DoubleQuoted =
  | { readonly ok: true; readonly parts: ReadonlyArray<InterpolationPart> }
  | { readonly ok: false; readonly error: string };

/** Double-quoted: escapes plus `$name` and `${name}` interpolation. */
function scanDoubleQuoted(scanner: Scanner): DoubleQuoted {
  scanner.advance(1);
  const parts: InterpolationPart[] = [];
  let text = '';
  const flush = (): void => {
    if (text !== '') {
      parts.push({ kind: 'text', value: text });
      text = '';
    }
  };

  while (!scanner.done) {
    const ch = scanner.peek();
    if (ch === '"') {
      scanner.advance(1);
      flush();
      return { ok: true, parts };
    }
    if (ch === '\\') {
      const next = scanner.peek(1);
      const escaped = ESCAPES[next];
      scanner.advance(2);
      text += escaped ?? '\\' + next;
      continue;
    }
    if (ch === '$' && scanner.peek(1) === '{') {
      const close = scanner.indexOf('}');
      if (close === -1) {
        return { ok: false, error: 'Unterminated interpolation' };
      }
      const inner = scanner.advance(close + 1 - scanner.position).slice(2, -1).trim();
      const match = VARIABLE_NAME.exec(inner.startsWith('$') ? inner.slice(1) : inner);
      if (match === null) {
        return { ok: false, error: `Invalid interpolation ${JSON.stringify(inner)}` };
      }
      flush();
      parts.push({ kind: 'variable', name: match[1] ?? '' });
      continue;
    }
    if (ch === '$') {
      const variable = scanner.match(VARIABLE);
      if (variable !== null) {
        scanner.advance(variable[0].length);
        flush();
        parts.push({ kind: 'variable', name: variable[1] ?? '' });
        continue;
      }
    }
    text += scanner.advance(1);
  }
  return { ok: false, error: 'Unterminated string' };
}
