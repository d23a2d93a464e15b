/**
 * Keel Interpreter — Evaluation
 *
 * One Evaluation per interpret() request. Walks the node block and every
 * class and define it reaches, collecting declared resources and warnings.
 *
 * Evaluation rules:
 * - Facts are top-scope variables (String values); `$::name` reads them too
 * - An unknown variable is undef and raises a warning
 * - A class is evaluated at most once per node; `include` of a class in an
 *   ignored module is skipped
 * - Class parameters come from lookup(`<class>::<param>`), then the default
 * - A resource type that is neither native nor a loadable define is kept
 *   as a plain resource for the type registry to accept or reject
 * - Define instances are expanded in place; metaparameters given to an
 *   instance apply to each resource it declares, unless set there
 * - Attributes that evaluate to undef are omitted
 * - Collected resources are never exported, whatever the store says
 */

import type {
  Expression,
  ResourceBody,
  SourceLocation,
  Statement,
  TopLevelStatement,
  Value,
} from '@keel/manifest-dsl';
import { DiagnosticKind, UNDEFINED, arr, bool, formatDecimal, formatLocation, num, showValue, str } from '@keel/manifest-dsl';
import type { InterpreterOutput, InterpreterRequest, Resource } from '@keel/kernel';
import { METAPARAMETERS, createResource, formatReference, moduleOf } from '@keel/kernel';
import { fail, failWith } from './failure.js';
import { callFunction } from './functions.js';
import { VariableScope } from './scope.js';
import { interpolationText, looselyEqual, truthy } from './values.js';

/** Nesting limit for define instances declared inside defines. */
export const MAX_DEFINE_DEPTH = 64;

type DefineUnit = Extract<TopLevelStatement, { kind: 'define' }>;

interface Context {
  readonly scope: VariableScope;
  /** Declared inside an exported define instance. */
  readonly exported: boolean;
  /** Metaparameters passed down from enclosing define instances. */
  readonly inherited: ReadonlyMap<string, Value>;
  readonly depth: number;
}

export class Evaluation {
  private readonly resources: Resource[] = [];
  private readonly collected: Resource[] = [];
  private readonly warnings: string[] = [];
  private readonly declaredClasses = new Set<string>();
  private readonly classScopes = new Map<string, VariableScope>();
  private readonly nodeScope: VariableScope;

  constructor(
    private readonly request: InterpreterRequest,
    private readonly nativeTypes: ReadonlySet<string>,
  ) {
    const top = new VariableScope('');
    for (const [name, value] of request.facts) {
      top.define(name, str(value));
    }
    top.define('clientcert', str(request.node));
    this.nodeScope = new VariableScope('', top);
  }

  async run(): Promise<InterpreterOutput> {
    await this.statements(this.request.unit.body, {
      scope: this.nodeScope,
      exported: false,
      inherited: new Map(),
      depth: 0,
    });
    return { resources: this.resources, collected: this.collected, warnings: this.warnings };
  }

  // -------------------------------------------------------------------------
  // Statements
  // -------------------------------------------------------------------------

  private async statements(body: ReadonlyArray<Statement>, context: Context): Promise<void> {
    for (const statement of body) {
      await this.statement(statement, context);
    }
  }

  private async statement(statement: Statement, context: Context): Promise<void> {
    const { scope } = context;
    switch (statement.kind) {
      case 'resource':
        for (const body of statement.bodies) {
          await this.declare(statement.type, statement.exported, body, context);
        }
        return;
      case 'include':
        for (const expression of statement.names) {
          for (const name of this.names(await this.evaluate(expression, scope), expression.location)) {
            await this.include(name, statement.location);
          }
        }
        return;
      case 'assignment':
        if (statement.name.includes('::')) {
          fail(`Cannot assign to qualified variable $${statement.name}`, statement.location);
        }
        if (!scope.define(statement.name, await this.evaluate(statement.value, scope))) {
          fail(`Cannot reassign variable $${statement.name}`, statement.location);
        }
        return;
      case 'if':
        for (const branch of statement.branches) {
          if (truthy(await this.evaluate(branch.condition, scope))) {
            await this.statements(branch.body, context);
            return;
          }
        }
        await this.statements(statement.otherwise, context);
        return;
      case 'collector':
        await this.collect(statement, scope);
        return;
      case 'call':
        await this.evaluate(statement.call, scope);
        return;
      case 'class':
      case 'define':
      case 'node':
        fail(`A ${statement.kind} definition cannot be evaluated here`, statement.location, DiagnosticKind.InternalError);
    }
  }

  private async include(rawName: string, location: SourceLocation): Promise<void> {
    const name = rawName.replace(/^::/, '').toLowerCase();
    if (this.request.services.ignoredModules.has(moduleOf(name)) || this.declaredClasses.has(name)) {
      return;
    }
    this.declaredClasses.add(name);

    const unit = await this.request.loadUnit('class', name);
    if (!unit.ok) {
      failWith(unit.error, location);
    }
    if (unit.value === undefined) {
      fail(`Unknown class ${name}`, location);
    }
    if (unit.value.kind !== 'class') {
      fail(`${name} is not a class`, location, DiagnosticKind.InternalError);
    }

    const scope = new VariableScope(name, this.nodeScope);
    for (const parameter of unit.value.parameters) {
      const bound = await this.request.services.lookup.lookup(`${name}::${parameter.name}`, scope.flatten());
      if (!bound.ok) {
        failWith(bound.error, location);
      }
      let value = bound.value;
      if (value.kind === 'undefined') {
        if (parameter.defaultValue === undefined) {
          fail(`Missing parameter $${parameter.name} for class ${name}`, location, DiagnosticKind.MissingRequired);
        }
        value = await this.evaluate(parameter.defaultValue, scope);
      }
      scope.define(parameter.name, value);
    }
    scope.define('title', str(name));
    scope.define('name', str(name));
    this.classScopes.set(name, scope);

    await this.statements(unit.value.body, { scope, exported: false, inherited: new Map(), depth: 0 });
  }

  // -------------------------------------------------------------------------
  // Resources
  // -------------------------------------------------------------------------

  private async declare(type: string, exported: boolean, body: ResourceBody, context: Context): Promise<void> {
    const titles = this.names(await this.evaluate(body.title, context.scope), body.title.location);
    const attributes = new Map<string, Value>();
    const seen = new Set<string>();
    for (const attribute of body.attributes) {
      if (seen.has(attribute.name)) {
        fail(`Parameter ${attribute.name} is set twice for ${type}`, attribute.location);
      }
      seen.add(attribute.name);
      const value = await this.evaluate(attribute.value, context.scope);
      if (value.kind !== 'undefined') {
        attributes.set(attribute.name, value);
      }
    }

    for (const title of titles) {
      if (this.nativeTypes.has(type)) {
        this.emit(type, title, attributes, exported, body.location, context);
        continue;
      }
      const unit = await this.request.loadUnit('define', type);
      if (!unit.ok) {
        failWith(unit.error, body.location);
      }
      if (unit.value?.kind === 'define') {
        await this.expand(unit.value, title, attributes, exported, body.location, context);
      } else {
        this.emit(type, title, attributes, exported, body.location, context);
      }
    }
  }

  private emit(
    type: string,
    title: string,
    attributes: ReadonlyMap<string, Value>,
    exported: boolean,
    location: SourceLocation,
    context: Context,
  ): void {
    const merged = new Map(attributes);
    for (const [name, value] of context.inherited) {
      if (!merged.has(name)) {
        merged.set(name, value);
      }
    }
    this.resources.push(
      createResource({
        type,
        title,
        attributes: merged,
        exported: exported || context.exported,
        scope: context.scope.path(),
        location,
      }),
    );
  }

  private async expand(
    unit: DefineUnit,
    title: string,
    attributes: ReadonlyMap<string, Value>,
    exported: boolean,
    location: SourceLocation,
    context: Context,
  ): Promise<void> {
    const reference = formatReference({ type: unit.name, title });
    if (context.depth >= MAX_DEFINE_DEPTH) {
      fail(`${reference}: defines nested deeper than ${MAX_DEFINE_DEPTH}`, location);
    }

    const parameters = new Set(unit.parameters.map((p) => p.name));
    const inherited = new Map(context.inherited);
    for (const [name, value] of attributes) {
      if (METAPARAMETERS.has(name)) {
        inherited.set(name, value);
      } else if (!parameters.has(name)) {
        fail(`${reference}: Unknown parameter ${name}`, location, DiagnosticKind.UnknownParameter);
      }
    }

    const scope = new VariableScope(`${unit.name}[${title}]`, this.nodeScope);
    for (const parameter of unit.parameters) {
      let value = attributes.get(parameter.name);
      if (value === undefined) {
        if (parameter.defaultValue === undefined) {
          fail(`${reference}: Parameter ${parameter.name} should be set`, location, DiagnosticKind.MissingRequired);
        }
        value = await this.evaluate(parameter.defaultValue, scope);
      }
      scope.define(parameter.name, value);
    }
    scope.define('title', str(title));
    scope.define('name', str(title));

    await this.statements(unit.body, {
      scope,
      exported: exported || context.exported,
      inherited,
      depth: context.depth + 1,
    });
  }

  private async collect(statement: Extract<Statement, { kind: 'collector' }>, scope: VariableScope): Promise<void> {
    const store = this.request.services.exportedStore;
    if (store === undefined) {
      this.warnings.push(`Collector for ${statement.type} resources ignored: no exported resource store`);
      return;
    }
    const attribute =
      statement.query === undefined
        ? undefined
        : { name: statement.query.attribute, value: await this.evaluate(statement.query.value, scope) };
    const found = await store.getResources({ type: statement.type, attribute, excludeNode: this.request.node });
    if (!found.ok) {
      failWith(found.error, statement.location);
    }
    for (const resource of found.value) {
      this.collected.push({ ...resource, exported: false });
    }
  }

  /** Titles and class names: a String, a Number, or an Array of them. */
  private names(value: Value, location: SourceLocation): string[] {
    switch (value.kind) {
      case 'string':
        return [value.value];
      case 'number':
        return [formatDecimal(value.value)];
      case 'array':
        return value.values.flatMap((item) => this.names(item, location));
      default:
        return fail(`Invalid title or name ${showValue(value)}`, location, DiagnosticKind.TypeMismatch);
    }
  }

  // -------------------------------------------------------------------------
  // Expressions
  // -------------------------------------------------------------------------

  private async evaluate(expression: Expression, scope: VariableScope): Promise<Value> {
    switch (expression.kind) {
      case 'string':
        return str(expression.value);
      case 'interpolated': {
        let text = '';
        for (const part of expression.parts) {
          text +=
            part.kind === 'text'
              ? part.value
              : interpolationText(this.variable(part.name, scope, expression.location));
        }
        return str(text);
      }
      case 'number':
        return num(expression.value);
      case 'boolean':
        return bool(expression.value);
      case 'undef':
        return UNDEFINED;
      case 'array': {
        const values: Value[] = [];
        for (const element of expression.elements) {
          values.push(await this.evaluate(element, scope));
        }
        return arr(values);
      }
      case 'variable':
        return this.variable(expression.name, scope, expression.location);
      case 'reference': {
        const type = expression.type.toLowerCase();
        const references: Value[] = [];
        for (const titleExpression of expression.titles) {
          for (const title of this.names(await this.evaluate(titleExpression, scope), titleExpression.location)) {
            references.push(str(formatReference({ type, title })));
          }
        }
        const [only] = references;
        return references.length === 1 && only !== undefined ? only : arr(references);
      }
      case 'call': {
        const args: Value[] = [];
        for (const arg of expression.args) {
          args.push(await this.evaluate(arg, scope));
        }
        return callFunction(expression.name, args, {
          services: this.request.services,
          scope: scope.flatten(),
          location: expression.location,
          warn: (message) => this.warnings.push(message),
        });
      }
      case 'comparison': {
        const left = await this.evaluate(expression.left, scope);
        const right = await this.evaluate(expression.right, scope);
        return bool(looselyEqual(left, right) === (expression.operator === '=='));
      }
      case 'not':
        return bool(!truthy(await this.evaluate(expression.operand, scope)));
    }
  }

  private variable(name: string, scope: VariableScope, location: SourceLocation): Value {
    const separator = name.lastIndexOf('::');
    const value =
      separator === -1
        ? scope.lookup(name)
        : this.classScopes.get(name.slice(0, separator))?.own(name.slice(separator + 2));
    if (value === undefined) {
      this.warnings.push(`Unknown variable $${name} at ${formatLocation(location)}`);
      return UNDEFINED;
    }
    return value;
  }
}
