/**
 * Keel Runtime Host — Substitution Template Evaluator
 *
 * A minimal TemplateEvaluator: replaces `<%= @name %>` tags with the value
 * of `name` in the render scope and `<%# … %>` comments with nothing. It is
 * not a template engine; any other tag fails the render.
 *
 * File templates are read from `<templates>/<name>` through a SourceReader.
 */

import { posix } from 'node:path';
import type { Result, Value } from '@keel/manifest-dsl';
import { DiagnosticKind, failure, formatDecimal } from '@keel/manifest-dsl';
import type { Scope, SourceReader, TemplateEvaluator, TemplateSource } from '@keel/kernel';

const TAG = /<%([=#]?)([\s\S]*?)%>/g;
const VARIABLE = /^@([a-z_][a-z0-9_]*(?:::[a-z0-9_]+)*)$/i;

/** Text of a value as it appears in rendered output. */
export function renderValue(value: Value): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'number':
      return formatDecimal(value.value);
    case 'array':
      return value.values.map(renderValue).join('');
    case 'undefined':
      return '';
  }
}

/** Render template text against a scope. */
export function substitute(name: string, text: string, scope: Scope): Result<string> {
  let out = '';
  let last = 0;
  for (const match of text.matchAll(TAG)) {
    const index = match.index ?? 0;
    out += text.slice(last, index);
    last = index + match[0].length;
    const marker = match[1] ?? '';
    const body = (match[2] ?? '').trim();
    if (marker === '#') continue;
    if (marker !== '=') {
      return failure(DiagnosticKind.InterpreterError, `Template ${name}: unsupported tag <%${match[2] ?? ''}%>`);
    }
    const variable = VARIABLE.exec(body)?.[1];
    if (variable === undefined) {
      return failure(DiagnosticKind.InterpreterError, `Template ${name}: unsupported expression ${body}`);
    }
    const value = scope.get(variable);
    if (value === undefined) {
      return failure(DiagnosticKind.InterpreterError, `Template ${name}: unknown variable @${variable}`);
    }
    out += renderValue(value);
  }
  return { ok: true, value: out + text.slice(last) };
}

export class SubstitutionTemplateEvaluator implements TemplateEvaluator {
  constructor(
    private readonly templatesDir: string,
    private readonly reader: SourceReader,
  ) {}

  async evaluate(source: TemplateSource, scope: Scope): Promise<Result<string>> {
    if (source.kind === 'inline') {
      return substitute('inline', source.text, scope);
    }
    const path = posix.join(this.templatesDir, source.name);
    if (!path.startsWith(posix.join(this.templatesDir, '/'))) {
      return failure(DiagnosticKind.InterpreterError, `Template ${source.name}: outside the templates directory`);
    }
    let text: string;
    try {
      text = await this.reader.readText(path);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      return failure(DiagnosticKind.InterpreterError, `Template ${source.name}: cannot read ${path}: ${reason}`);
    }
    return substitute(source.name, text, scope);
  }
}
