/**
 * @since 0.1.0
 */

export * from "./Config.js"
export * from "./Definitions.js"
export * from "./Display.js"
export * from "./Engine.js"
export * from "./Errors.js"
export * from "./Evaluator.js"
export * from "./Grammar.js"
export * from "./OrderedRecord.js"
export * from "./PathValue.js"
export * from "./Resolver.js"
export * from "./Serialization.js"
export * from "./Types.js"

export { NdArray, ArrayError } from "./internal/array/NdArray.js"
export { ExpressionDiagnosticError } from "./internal/expression/Diagnostic.js"
export {
  ExpressionEvaluationError,
  MarkedReferenceError,
  UnresolvedReferenceError,
} from "./internal/expression/errors.js"
export { type Scope, emptyScope, evaluateExpression } from "./internal/expression/Evaluator.js"
