/**
 * Keel Manifest DSL — Parser
 *
 * Recursive-descent parser from tokens to the statement AST.
 *
 * Parser guarantees:
 * - Deterministic: identical source produces an identical AST
 * - Rejecting: any syntax error yields one ParseError diagnostic, never a
 *   partial statement list
 * - Structural only: no name resolution, no type checks. Those belong to
 *   the interpreter and the type registry.
 *
 * Grammar sketch:
 *
 *   file       := statement*
 *   statement  := class | define | node | include | if | assignment
 *               | resource | collector | call
 *   resource   := '@@'? name '{' body (';' body)* ';'? '}'
 *   body       := expr ':' (attr (',' attr)* ','?)?
 *   attr       := name '=>' expr
 *   collector  := Typeref '<<|' (name '==' expr)? '|>>'
 *   expr       := unary (('==' | '!=') unary)?
 *   unary      := '!' unary | primary
 */

import type {
  AttributeAssignment,
  ConditionalBranch,
  Expression,
  NodeMatcher,
  Parameter,
  ResourceBody,
  Statement,
} from './ast.js';
import { parseDecimal } from './decimal.js';
import { tokenize } from './lexer.js';
import type { Token } from './lexer.js';
import type { Diagnostic, Result, SourceLocation } from './types.js';
import { DiagnosticKind, diagnostic } from './types.js';

/** Words that cannot be used as resource type names or bare words. */
const RESERVED = new Set<string>([
  'class', 'define', 'node', 'include', 'if', 'elsif', 'else', 'true', 'false', 'undef',
]);

/**
 * Parse a manifest file into its top-level statements.
 *
 * @param file - Path used in diagnostic locations
 * @param source - Manifest text
 * @returns The statements, or one ParseError diagnostic
 */
export function parse(file: string, source: string): Result<ReadonlyArray<Statement>> {
  const tokens = tokenize(file, source);
  if (!tokens.ok) {
    return tokens;
  }
  const parser = new Parser(tokens.value);
  try {
    return { ok: true, value: parser.parseFile() };
  } catch (err: unknown) {
    if (err instanceof SyntaxFailure) {
      return { ok: false, error: err.diagnostic };
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

/** Unwinds the descent on the first syntax error; caught in parse(). */
class SyntaxFailure extends Error {
  constructor(readonly diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = 'SyntaxFailure';
  }
}

function describe(token: Token): string {
  return token.kind === 'eof' ? 'end of file' : JSON.stringify(token.text);
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: ReadonlyArray<Token>) {}

  parseFile(): ReadonlyArray<Statement> {
    const statements: Statement[] = [];
    while (this.current().kind !== 'eof') {
      statements.push(this.parseStatement(true));
    }
    return statements;
  }

  // -- token helpers --------------------------------------------------------

  private current(): Token {
    return this.peek(0);
  }

  private peek(ahead: number): Token {
    const token = this.tokens[Math.min(this.index + ahead, this.tokens.length - 1)];
    if (token === undefined) {
      throw new SyntaxFailure(diagnostic(DiagnosticKind.ParseError, 'Empty token stream'));
    }
    return token;
  }

  private next(): Token {
    const token = this.current();
    if (token.kind !== 'eof') {
      this.index += 1;
    }
    return token;
  }

  private isPunct(text: string, ahead = 0): boolean {
    const token = this.peek(ahead);
    return token.kind === 'punct' && token.text === text;
  }

  private isWord(text: string): boolean {
    const token = this.current();
    return token.kind === 'name' && token.text === text;
  }

  private fail(message: string, location: SourceLocation): never {
    throw new SyntaxFailure(diagnostic(DiagnosticKind.ParseError, message, location));
  }

  private expectPunct(text: string): Token {
    const token = this.current();
    if (token.kind !== 'punct' || token.text !== text) {
      this.fail(`Expected ${JSON.stringify(text)} but found ${describe(token)}`, token.location);
    }
    return this.next();
  }

  private expectName(): Token {
    const token = this.current();
    if (token.kind !== 'name') {
      this.fail(`Expected a name but found ${describe(token)}`, token.location);
    }
    return this.next();
  }

  // -- statements -----------------------------------------------------------

  private parseStatement(topLevel: boolean): Statement {
    const token = this.current();

    if (token.kind === 'name') {
      switch (token.text) {
        case 'class':
        case 'define':
        case 'node':
          if (!topLevel) {
            this.fail(`A ${token.text} definition is only allowed at top level`, token.location);
          }
          if (token.text === 'node') {
            return this.parseNode();
          }
          return this.parseDefinition(token.text === 'class' ? 'class' : 'define');
        case 'include':
          return this.parseInclude();
        case 'if':
          return this.parseIf();
        default:
          break;
      }
      if (this.isPunct('(', 1)) {
        const call = this.parseCall();
        return { kind: 'call', call, location: call.location };
      }
      if (this.isPunct('{', 1)) {
        return this.parseResource(false);
      }
    }
    if (token.kind === 'punct' && token.text === '@@') {
      this.next();
      return this.parseResource(true);
    }
    if (token.kind === 'variable' && this.isPunct('=', 1)) {
      this.next();
      this.next();
      return { kind: 'assignment', name: token.text, value: this.parseExpression(), location: token.location };
    }
    if (token.kind === 'typeref' && this.isPunct('<<|', 1)) {
      return this.parseCollector();
    }
    return this.fail(`Unexpected ${describe(token)}`, token.location);
  }

  private parseBlock(): ReadonlyArray<Statement> {
    this.expectPunct('{');
    const body: Statement[] = [];
    while (!this.isPunct('}')) {
      if (this.current().kind === 'eof') {
        this.fail('Unterminated block', this.current().location);
      }
      body.push(this.parseStatement(false));
    }
    this.expectPunct('}');
    return body;
  }

  private parseDefinition(kind: 'class' | 'define'): Statement {
    const start = this.next();
    const name = this.expectName();
    const parameters: Parameter[] = [];
    if (this.isPunct('(')) {
      this.next();
      while (!this.isPunct(')')) {
        const variable = this.current();
        if (variable.kind !== 'variable') {
          this.fail(`Expected a parameter but found ${describe(variable)}`, variable.location);
        }
        this.next();
        if (this.isPunct('=')) {
          this.next();
          parameters.push({ name: variable.text, defaultValue: this.parseExpression() });
        } else {
          parameters.push({ name: variable.text });
        }
        if (!this.isPunct(')')) {
          this.expectPunct(',');
        }
      }
      this.expectPunct(')');
    }
    const body = this.parseBlock();
    return { kind, name: name.text, parameters, body, location: start.location };
  }

  private parseNode(): Statement {
    const start = this.next();
    const matchers: NodeMatcher[] = [];
    do {
      if (matchers.length > 0) {
        this.next();
      }
      const token = this.next();
      if (token.kind === 'name' && token.text === 'default') {
        matchers.push({ kind: 'default' });
      } else if (token.kind === 'string' || token.kind === 'name') {
        matchers.push({ kind: 'name', name: token.text });
      } else {
        this.fail(`Expected a node name but found ${describe(token)}`, token.location);
      }
    } while (this.isPunct(','));
    return { kind: 'node', matchers, body: this.parseBlock(), location: start.location };
  }

  private parseInclude(): Statement {
    const start = this.next();
    const names: Expression[] = [this.parseExpression()];
    while (this.isPunct(',')) {
      this.next();
      names.push(this.parseExpression());
    }
    return { kind: 'include', names, location: start.location };
  }

  private parseIf(): Statement {
    const start = this.next();
    const branches: ConditionalBranch[] = [
      { condition: this.parseExpression(), body: this.parseBlock() },
    ];
    let otherwise: ReadonlyArray<Statement> = [];
    for (;;) {
      if (this.isWord('elsif')) {
        this.next();
        branches.push({ condition: this.parseExpression(), body: this.parseBlock() });
        continue;
      }
      if (this.isWord('else')) {
        this.next();
        otherwise = this.parseBlock();
      }
      break;
    }
    return { kind: 'if', branches, otherwise, location: start.location };
  }

  private parseResource(exported: boolean): Statement {
    const typeToken = this.expectName();
    if (RESERVED.has(typeToken.text)) {
      this.fail(`${JSON.stringify(typeToken.text)} is not a resource type`, typeToken.location);
    }
    this.expectPunct('{');
    const bodies: ResourceBody[] = [];
    while (!this.isPunct('}')) {
      bodies.push(this.parseResourceBody());
      if (this.isPunct(';')) {
        this.next();
      } else if (!this.isPunct('}')) {
        this.fail(`Expected ";" or "}" but found ${describe(this.current())}`, this.current().location);
      }
    }
    this.expectPunct('}');
    if (bodies.length === 0) {
      this.fail('A resource declaration needs at least one title', typeToken.location);
    }
    return { kind: 'resource', type: typeToken.text, exported, bodies, location: typeToken.location };
  }

  private parseResourceBody(): ResourceBody {
    const location = this.current().location;
    const title = this.parseExpression();
    this.expectPunct(':');
    const attributes: AttributeAssignment[] = [];
    while (this.current().kind === 'name') {
      const name = this.next();
      this.expectPunct('=>');
      attributes.push({ name: name.text, value: this.parseExpression(), location: name.location });
      if (!this.isPunct(',')) {
        break;
      }
      this.next();
    }
    return { title, attributes, location };
  }

  private parseCollector(): Statement {
    const typeToken = this.next();
    this.expectPunct('<<|');
    let query: { attribute: string; value: Expression } | undefined;
    if (!this.isPunct('|>>')) {
      const attribute = this.expectName();
      this.expectPunct('==');
      query = { attribute: attribute.text, value: this.parseExpression() };
    }
    this.expectPunct('|>>');
    return {
      kind: 'collector',
      type: typeToken.text.toLowerCase(),
      query,
      location: typeToken.location,
    };
  }

  // -- expressions ----------------------------------------------------------

  private parseExpression(): Expression {
    const left = this.parseUnary();
    if (this.isPunct('==') || this.isPunct('!=')) {
      const operator = this.next().text === '==' ? '==' : '!=';
      const right = this.parseUnary();
      return { kind: 'comparison', operator, left, right, location: left.location };
    }
    return left;
  }

  private parseUnary(): Expression {
    if (this.isPunct('!')) {
      const bang = this.next();
      return { kind: 'not', operand: this.parseUnary(), location: bang.location };
    }
    return this.parsePrimary();
  }

  private parseList(close: string): ReadonlyArray<Expression> {
    const items: Expression[] = [];
    while (!this.isPunct(close)) {
      items.push(this.parseExpression());
      if (!this.isPunct(close)) {
        this.expectPunct(',');
      }
    }
    this.expectPunct(close);
    return items;
  }

  private parseCall(): Extract<Expression, { kind: 'call' }> {
    const name = this.next();
    this.expectPunct('(');
    return { kind: 'call', name: name.text, args: this.parseList(')'), location: name.location };
  }

  private parsePrimary(): Expression {
    const token = this.current();
    const location = token.location;

    switch (token.kind) {
      case 'string':
        this.next();
        return { kind: 'string', value: token.text, location };
      case 'dqstring': {
        this.next();
        const parts = token.parts ?? [];
        const only = parts[0];
        if (parts.length === 0) {
          return { kind: 'string', value: '', location };
        }
        if (parts.length === 1 && only !== undefined && only.kind === 'text') {
          return { kind: 'string', value: only.value, location };
        }
        return { kind: 'interpolated', parts, location };
      }
      case 'number': {
        this.next();
        const value = parseDecimal(token.text);
        if (value === null) {
          return this.fail(`Invalid number ${token.text}`, location);
        }
        return { kind: 'number', value, location };
      }
      case 'variable':
        this.next();
        return { kind: 'variable', name: token.text, location };
      case 'typeref': {
        this.next();
        this.expectPunct('[');
        const titles = this.parseList(']');
        if (titles.length === 0) {
          return this.fail(`Reference to ${token.text} needs a title`, location);
        }
        return { kind: 'reference', type: token.text, titles, location };
      }
      case 'name':
        if (token.text === 'true' || token.text === 'false') {
          this.next();
          return { kind: 'boolean', value: token.text === 'true', location };
        }
        if (token.text === 'undef') {
          this.next();
          return { kind: 'undef', location };
        }
        if (this.isPunct('(', 1)) {
          return this.parseCall();
        }
        this.next();
        // Bare words are strings: `ensure => present`.
        return { kind: 'string', value: token.text, location };
      case 'punct':
        if (token.text === '[') {
          this.next();
          return { kind: 'array', elements: this.parseList(']'), location };
        }
        if (token.text === '(') {
          this.next();
          const inner = this.parseExpression();
          this.expectPunct(')');
          return inner;
        }
        break;
      case 'eof':
        break;
    }
    return this.fail(`Expected an expression but found ${describe(token)}`, location);
  }
}
