/**
 * Keel Kernel — Type Validation Pipelines
 *
 * A TypeMethods value is what the registry stores per resource type: the
 * composed validator and the set of parameters the type declares.
 *
 * Every pipeline built by typeMethods() runs defaultValidate() first:
 *   1. unknown-parameter check against the declared parameters plus
 *      metaparameters (skipped when the type declares none)
 *   2. merge of type-level default attributes, never overwriting
 * then the per-parameter combinators, then an optional type-wide validator.
 */

import type { Value } from '@keel/manifest-dsl';
import { DiagnosticKind, failure } from '@keel/manifest-dsl';
import { METAPARAMETERS } from '../types/resource.js';
import type { Validator, ParameterRules } from './combinators.js';
import { chain, parameterFunctions } from './combinators.js';

export interface TypeMethods {
  readonly validate: Validator;
  readonly parameters: ReadonlySet<string>;
}

/** Default attributes merged into every resource. Currently none. */
const TYPE_DEFAULTS: ReadonlyMap<string, Value> = new Map();

const NO_PARAMETERS: ReadonlySet<string> = new Set();

/**
 * Reject parameters outside `legal` ∪ metaparameters, then merge defaults.
 * An empty `legal` set accepts any parameter.
 */
export function defaultValidate(legal: ReadonlySet<string>): Validator {
  return (resource) => {
    if (legal.size > 0) {
      const unknown = [...resource.attributes.keys()]
        .filter((key) => !legal.has(key) && !METAPARAMETERS.has(key))
        .sort();
      if (unknown.length > 0) {
        return failure(DiagnosticKind.UnknownParameter, `Unknown parameters: ${unknown.join(', ')}`);
      }
    }
    const additions = [...TYPE_DEFAULTS].filter(
      ([key, value]) => value.kind !== 'undefined' && !resource.attributes.has(key),
    );
    if (additions.length === 0) {
      return { ok: true, value: resource };
    }
    return { ok: true, value: { ...resource, attributes: new Map([...resource.attributes, ...additions]) } };
  };
}

/**
 * Build the pipeline for a native type.
 *
 * @param rules - Parameters in declaration order with their validators
 * @param extra - Type-wide validator run last (e.g. validateSourceOrContent)
 */
export function typeMethods(rules: ParameterRules, extra?: Validator): TypeMethods {
  const parameters = new Set(rules.map(([param]) => param));
  const steps: Validator[] = [defaultValidate(parameters), parameterFunctions(rules)];
  if (extra !== undefined) {
    steps.push(extra);
  }
  return { validate: chain(steps), parameters };
}

/** Accepts every resource unchanged. */
export const fakeType: TypeMethods = {
  validate: (resource) => ({ ok: true, value: resource }),
  parameters: NO_PARAMETERS,
};

/** Accepts any parameter; only merges defaults. Used for unregistered types. */
export const defaultType: TypeMethods = {
  validate: defaultValidate(NO_PARAMETERS),
  parameters: NO_PARAMETERS,
};
