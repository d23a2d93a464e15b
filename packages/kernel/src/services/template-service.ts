/**
 * Keel Kernel — Template Service
 *
 * Gives the template evaluator a single owner. Renders requested by any
 * number of concurrent compilations are queued and handed to the evaluator
 * one at a time, in request order. Each render is measured under the
 * template name (or `inline`) in the `templates` stats store.
 *
 * An evaluator that throws or rejects is converted to an InterpreterError
 * diagnostic for that render only; the queue keeps running.
 */

import type { Result } from '@keel/manifest-dsl';
import { DiagnosticKind, failure } from '@keel/manifest-dsl';
import type { Scope, TemplateEvaluator, TemplateRenderer, TemplateSource } from '../adapters/index.js';
import { SerialQueue } from '../concurrency/serial-queue.js';
import type { StatsStore } from '../stats/stats-store.js';
import { measure } from '../stats/stats-store.js';

export class TemplateService implements TemplateRenderer {
  private readonly queue = new SerialQueue();

  constructor(
    private readonly evaluator: TemplateEvaluator,
    private readonly stats: StatsStore,
  ) {}

  render(source: TemplateSource, scope: Scope): Promise<Result<string>> {
    const name = source.kind === 'file' ? source.name : 'inline';
    return this.queue.run(() => measure(this.stats, name, () => this.evaluate(name, source, scope)));
  }

  private async evaluate(name: string, source: TemplateSource, scope: Scope): Promise<Result<string>> {
    try {
      return await this.evaluator.evaluate(source, scope);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      return failure(DiagnosticKind.InterpreterError, `Template ${name} failed: ${reason}`);
    }
  }
}

/** Evaluator used when none is configured: every render fails. */
export const unavailableTemplates: TemplateEvaluator = {
  evaluate: (source) =>
    Promise.resolve(
      failure<string>(
        DiagnosticKind.InterpreterError,
        `No template evaluator is configured (template ${source.kind === 'file' ? source.name : 'inline'})`,
      ),
    ),
};
