/**
 * Keel Interpreter — Evaluation Failure
 *
 * Unwinds an evaluation on the first error. Thrown only inside the
 * interpreter and caught in ManifestInterpreter.interpret(), which returns
 * the carried diagnostic.
 */

import type { Diagnostic, SourceLocation } from '@keel/manifest-dsl';
import { DiagnosticKind, diagnostic } from '@keel/manifest-dsl';

export class EvaluationFailure extends Error {
  constructor(readonly diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = 'EvaluationFailure';
  }
}

export function fail(
  message: string,
  location?: SourceLocation,
  kind: DiagnosticKind = DiagnosticKind.InterpreterError,
): never {
  throw new EvaluationFailure(diagnostic(kind, message, location));
}

/** Rethrow a collaborator's diagnostic, adding `location` if it has none. */
export function failWith(error: Diagnostic, location?: SourceLocation): never {
  if (error.location !== undefined || location === undefined) {
    throw new EvaluationFailure(error);
  }
  throw new EvaluationFailure(diagnostic(error.kind, error.message, location));
}
