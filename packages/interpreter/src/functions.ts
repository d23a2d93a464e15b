/**
 * Keel Interpreter — Built-in Functions
 *
 *   template(name, ...)          render template files, concatenated
 *   inline_template(text, ...)   render inline template sources, concatenated
 *   lookup(key[, default])       hierarchical data, default when undef
 *   fail(message, ...)           abort the compilation
 *   warning(message, ...)        record an interpreter warning
 *
 * Arguments are already evaluated. Unknown names are an InterpreterError.
 */

import type { SourceLocation, Value } from '@keel/manifest-dsl';
import { DiagnosticKind, UNDEFINED, showValue, str } from '@keel/manifest-dsl';
import type { InterpreterServices, Scope, TemplateSource } from '@keel/kernel';
import { fail, failWith } from './failure.js';
import { interpolationText } from './values.js';

export interface FunctionContext {
  readonly services: InterpreterServices;
  /** Variables visible at the call site. */
  readonly scope: Scope;
  readonly location: SourceLocation;
  warn(message: string): void;
}

type BuiltIn = (args: ReadonlyArray<Value>, context: FunctionContext) => Promise<Value>;

function stringArguments(name: string, args: ReadonlyArray<Value>, location: SourceLocation): string[] {
  if (args.length === 0) {
    fail(`${name}() needs at least one argument`, location);
  }
  return args.map((arg) => {
    if (arg.kind !== 'string') {
      return fail(`${name}() expects strings, not ${showValue(arg)}`, location, DiagnosticKind.TypeMismatch);
    }
    return arg.value;
  });
}

function renderAll(kind: TemplateSource['kind'], name: string): BuiltIn {
  return async (args, context) => {
    let output = '';
    for (const text of stringArguments(name, args, context.location)) {
      const source: TemplateSource = kind === 'file' ? { kind, name: text } : { kind, text };
      const rendered = await context.services.templates.render(source, context.scope);
      if (!rendered.ok) {
        failWith(rendered.error, context.location);
      }
      output += rendered.value;
    }
    return str(output);
  };
}

const BUILT_INS: ReadonlyMap<string, BuiltIn> = new Map<string, BuiltIn>([
  ['template', renderAll('file', 'template')],
  ['inline_template', renderAll('inline', 'inline_template')],
  [
    'lookup',
    async (args, context) => {
      const [key, fallback, ...extra] = args;
      if (key?.kind !== 'string' || extra.length > 0) {
        return fail('lookup() takes a key and an optional default', context.location);
      }
      const found = await context.services.lookup.lookup(key.value, context.scope);
      if (!found.ok) {
        return failWith(found.error, context.location);
      }
      return found.value.kind === 'undefined' && fallback !== undefined ? fallback : found.value;
    },
  ],
  [
    'fail',
    (args, context) => fail(args.map(interpolationText).join(' '), context.location),
  ],
  [
    'warning',
    (args, context) => {
      context.warn(args.map(interpolationText).join(' '));
      return Promise.resolve(UNDEFINED);
    },
  ],
]);

export function callFunction(name: string, args: ReadonlyArray<Value>, context: FunctionContext): Promise<Value> {
  const builtIn = BUILT_INS.get(name);
  if (builtIn === undefined) {
    return fail(`Unknown function ${name}()`, context.location);
  }
  return builtIn(args, context);
}
