/**
 * @keel/interpreter
 *
 * Reference interpreter for the Keel manifest language. Turns a node block,
 * the node's facts and the units it reaches into declared resources and
 * warnings, for the kernel's CatalogCompiler to validate and assemble.
 */

export type { InterpreterOptions } from './interpreter.js';
export { ManifestInterpreter } from './interpreter.js';
export { MAX_DEFINE_DEPTH } from './evaluation.js';
export type { FunctionContext } from './functions.js';
export { callFunction } from './functions.js';
export { VariableScope } from './scope.js';
export { interpolationText, looselyEqual, truthy } from './values.js';
