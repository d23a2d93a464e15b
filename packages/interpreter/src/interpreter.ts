/**
 * Keel Interpreter — Manifest Interpreter
 *
 * The reference implementation of the kernel's Interpreter collaborator.
 * Evaluation errors are returned as one diagnostic; unexpected exceptions
 * propagate to the orchestrator, which converts them.
 */

import type { Result } from '@keel/manifest-dsl';
import type { Interpreter, InterpreterOutput, InterpreterRequest } from '@keel/kernel';
import { NATIVE_TYPES } from '@keel/kernel';
import { Evaluation } from './evaluation.js';
import { EvaluationFailure } from './failure.js';

export interface InterpreterOptions {
  /**
   * Types declared directly, without looking for a define of the same name.
   * Defaults to the kernel's native types.
   */
  readonly nativeTypes?: Iterable<string> | undefined;
}

export class ManifestInterpreter implements Interpreter {
  private readonly nativeTypes: ReadonlySet<string>;

  constructor(options: InterpreterOptions = {}) {
    this.nativeTypes = new Set(options.nativeTypes ?? NATIVE_TYPES.map(([name]) => name));
  }

  async interpret(request: InterpreterRequest): Promise<Result<InterpreterOutput>> {
    try {
      return { ok: true, value: await new Evaluation(request, this.nativeTypes).run() };
    } catch (err: unknown) {
      if (err instanceof EvaluationFailure) {
        return { ok: false, error: err.diagnostic };
      }
      throw err;
    }
  }
}
