/**
 * Keel Kernel — Unit Selection
 *
 * Picks the statement a unit names out of a parsed file: the class or define
 * with that exact name, or for nodes the block naming the node exactly,
 * falling back to the `default` block.
 */

import type { Result, Statement, TopLevelKind, TopLevelStatement } from '@keel/manifest-dsl';
import { DiagnosticKind, failure } from '@keel/manifest-dsl';

export function selectStatement(
  statements: ReadonlyArray<Statement>,
  kind: TopLevelKind,
  name: string,
  file: string,
): Result<TopLevelStatement> {
  if (kind === 'node') {
    const nodes = statements.filter(
      (s): s is Extract<Statement, { kind: 'node' }> => s.kind === 'node',
    );
    const exact = nodes.find((n) => n.matchers.some((m) => m.kind === 'name' && m.name === name));
    const chosen = exact ?? nodes.find((n) => n.matchers.some((m) => m.kind === 'default'));
    if (chosen === undefined) {
      return failure(DiagnosticKind.InterpreterError, `No node definition matches ${name} in ${file}`);
    }
    return { ok: true, value: chosen };
  }

  for (const statement of statements) {
    if ((statement.kind === 'class' || statement.kind === 'define') && statement.kind === kind && statement.name === name) {
      return { ok: true, value: statement };
    }
  }
  return failure(DiagnosticKind.InterpreterError, `The ${kind} ${name} is not defined in ${file}`);
}
