/**
 * Field-by-field evaluation of a record into a snapshot.
 *
 * Each field is evaluated against the snapshot built so far, so a field can
 * only see the fields before it. Failures never abort the walk: the failing
 * field holds an {@link ErrorMarker} and evaluation moves on.
 *
 * @since 0.1.0
 */

import { Data, Either } from "effect"
import { ErrorMarker, isErrorMarker } from "./Errors.js"
import {
  type MarkerFailure,
  type MarkerResolution,
  type Sigil,
  GrammarError,
  classify,
  convertArrayLiterals,
  hasEscapedMarker,
  interpolate,
  stripComment,
} from "./Grammar.js"
import { ArrayError, NdArray } from "./internal/array/NdArray.js"
import { toNumeric } from "./internal/expression/Arithmetic.js"
import { ExpressionDiagnosticError } from "./internal/expression/Diagnostic.js"
import { ExpressionEvaluationError, MarkedReferenceError, UnresolvedReferenceError } from "./internal/expression/errors.js"
import { type Scope, emptyScope, evaluateExpression } from "./internal/expression/Evaluator.js"
import { renderText } from "./internal/render.js"
import { OrderedRecord, isList } from "./OrderedRecord.js"
import { PathValue } from "./PathValue.js"
import type { FieldValue } from "./Types.js"

/**
 * @category Options
 * @since 0.1.0
 */
export interface EngineOptions {
  /** Text that fails arithmetic becomes an error marker instead of staying as text. */
  readonly strictArithmetic?: boolean
  /** Maximum number of elements a `$[a:b]` range may expand to. */
  readonly rangeLimit?: number
}

/**
 * @category Options
 * @since 0.1.0
 */
export const DefaultEngineOptions: Required<EngineOptions> = {
  strictArithmetic: false,
  rangeLimit: 100,
}

/**
 * Result of {@link evaluate}. Evaluating a snapshot again returns a copy of it
 * unchanged.
 *
 * @category Evaluation
 * @since 0.1.0
 */
export class Snapshot extends OrderedRecord {
  /** Fields that could not be computed, in record order. */
  errors(): ReadonlyArray<readonly [string, ErrorMarker]> {
    return this.entries().flatMap(([name, value]) => (isErrorMarker(value) ? [[name, value] as const] : []))
  }

  get hasErrors(): boolean {
    return this.errors().length > 0
  }
}

type EngineFailure =
  | ExpressionDiagnosticError
  | ExpressionEvaluationError
  | UnresolvedReferenceError
  | MarkedReferenceError
  | ArrayError
  | GrammarError

const isEngineFailure = (error: unknown): error is EngineFailure =>
  error instanceof ExpressionDiagnosticError ||
  error instanceof ExpressionEvaluationError ||
  error instanceof UnresolvedReferenceError ||
  error instanceof MarkedReferenceError ||
  error instanceof ArrayError ||
  error instanceof GrammarError

// RangeError covers runaway allocations and recursion too deep for the stack.
const attempt = <A>(f: () => A): Either.Either<A, EngineFailure> =>
  Either.try({
    try: f,
    catch: (error) => {
      if (isEngineFailure(error)) {
        return error
      }
      if (error instanceof RangeError) {
        return new ExpressionEvaluationError({ expression: "", problem: error.message })
      }
      throw error
    },
  })

const scopeOf = (record: OrderedRecord): Scope => (name) => record.getOption(name)

const coerce2d = (value: FieldValue): NdArray => {
  const numeric = toNumeric(value, "@{}")
  if (typeof numeric === "number") {
    return new NdArray([1, 1], [numeric])
  }
  return numeric instanceof NdArray ? numeric.atLeast2d() : NdArray.row(numeric)
}

const markerResolver =
  (scope: Scope) =>
  (content: string, sigil: Sigil, raw: string): MarkerResolution => {
    const result = attempt(() => {
      const value = evaluateExpression(content, scope)
      return renderText(sigil === "@" ? coerce2d(value) : value)
    })
    if (Either.isRight(result)) {
      return { _tag: "Resolved", text: result.right }
    }
    const error = result.left
    switch (error._tag) {
      case "UnresolvedReferenceError":
        return { _tag: "Unresolved", raw, name: error.name }
      case "MarkedReferenceError":
        return error.marker.missing !== undefined
          ? { _tag: "Unresolved", raw, name: error.marker.missing }
          : { _tag: "Failed", raw, problem: error.marker.cause }
      default:
        return { _tag: "Failed", raw, problem: error.message }
    }
  }

const markerFor = (field: string, failure: MarkerFailure): ErrorMarker =>
  failure._tag === "Unresolved"
    ? ErrorMarker.unresolved(field, failure.name)
    : ErrorMarker.failed(field, failure.problem)

class FieldFailure extends Data.TaggedError("FieldFailure")<{
  readonly marker: ErrorMarker
}> {}

interface FieldContext {
  readonly field: string
  readonly scope: Scope
  readonly options: Required<EngineOptions>
}

const interpolateOrFail = (text: string, ctx: FieldContext): string => {
  const { failures, text: result } = interpolate(text, markerResolver(ctx.scope))
  const [first] = failures
  if (first) {
    throw new FieldFailure({ marker: markerFor(ctx.field, first) })
  }
  return result
}

const QUOTED = /("(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*')/

const interpolateStrings = (value: FieldValue, ctx: FieldContext): FieldValue => {
  if (typeof value === "string") {
    return interpolateOrFail(value, ctx)
  }
  if (isList(value)) {
    return value.map((item) => interpolateStrings(item, ctx))
  }
  if (value instanceof OrderedRecord) {
    return new OrderedRecord(value.entries().map(([name, item]) => [name, interpolateStrings(item, ctx)] as const))
  }
  return value
}

const evaluateLiteralList = (body: string, ctx: FieldContext): FieldValue => {
  const text = body
    .split(QUOTED)
    .map((piece, i) => (i % 2 === 1 ? piece : interpolateOrFail(piece, ctx)))
    .join("")
  const parsed = attempt(() => evaluateExpression(text))
  if (Either.isLeft(parsed)) {
    throw new FieldFailure({ marker: ErrorMarker.failed(ctx.field, parsed.left.message) })
  }
  return interpolateStrings(parsed.right, ctx)
}

const evaluateExpressionText = (text: string, ctx: FieldContext): FieldValue => {
  if (hasEscapedMarker(text)) {
    return interpolateOrFail(text, ctx)
  }
  const converted = attempt(() => convertArrayLiterals(text, ctx.options.rangeLimit))
  if (Either.isLeft(converted)) {
    throw new FieldFailure({ marker: ErrorMarker.failed(ctx.field, converted.left.message) })
  }
  const interpolated = interpolateOrFail(converted.right, ctx)
  const computed = attempt(() => evaluateExpression(interpolated, emptyScope))
  if (Either.isRight(computed)) {
    return computed.right
  }
  if (ctx.options.strictArithmetic) {
    throw new FieldFailure({ marker: ErrorMarker.failed(ctx.field, computed.left.message) })
  }
  return interpolated
}

const evaluateString = (raw: string, ctx: FieldContext): FieldValue => {
  const text = stripComment(raw).trim()
  switch (classify(text)) {
    case "empty":
      return ""
    case "literal-list":
      return evaluateLiteralList(text.slice(1), ctx)
    case "literal":
      return interpolateOrFail(text.slice(1), ctx)
    case "expression":
      return evaluateExpressionText(text, ctx)
  }
}

const evaluateValue = (value: FieldValue, ctx: FieldContext): FieldValue => {
  if (typeof value === "string") {
    return evaluateString(value, ctx)
  }
  if (value instanceof PathValue) {
    return PathValue.of(interpolateOrFail(value.value, ctx))
  }
  if (value instanceof OrderedRecord) {
    return value.clone()
  }
  return value
}

/**
 * Evaluates a single value as if it were the field `field` of a record whose
 * earlier fields are visible through `scope`.
 *
 * @category Evaluation
 * @since 0.1.0
 */
export const evaluateField = (
  field: string,
  value: FieldValue,
  scope: Scope,
  options: EngineOptions = {},
): FieldValue => {
  const ctx: FieldContext = { field, scope, options: { ...DefaultEngineOptions, ...options } }
  try {
    return evaluateValue(value, ctx)
  } catch (error) {
    if (error instanceof FieldFailure) {
      return error.marker
    }
    throw error
  }
}

/**
 * Evaluates every field in record order into a fresh {@link Snapshot}.
 * The source record is never modified.
 *
 * @category Evaluation
 * @since 0.1.0
 * @example
 * ```ts
 * const snapshot = evaluate(OrderedRecord.from({ a: 1, b: "${a}+1", c: "${a}+${d}" }))
 * snapshot.get("b") // 2
 * String(snapshot.get("c")) // '< undef definition "${d}" >'
 * ```
 */
export const evaluate = (record: OrderedRecord, options: EngineOptions = {}): Snapshot => {
  if (record instanceof Snapshot) {
    return new Snapshot(record.clone())
  }
  const snapshot = new Snapshot()
  const scope = scopeOf(snapshot)
  for (const [name, value] of record) {
    snapshot.set(name, evaluateField(name, value, scope, options))
  }
  return snapshot
}

/**
 * Evaluated value of one field. Throws `FieldNotFoundError` when the record
 * has no such field.
 *
 * @category Evaluation
 * @since 0.1.0
 */
export const getValue = (record: OrderedRecord, name: string, options: EngineOptions = {}): FieldValue =>
  evaluate(record, options).get(name)

/**
 * Substitutes markers in `template` from the record's values as they are.
 * A marker that cannot be resolved is left exactly as written.
 *
 * @category Formatting
 * @since 0.1.0
 * @example
 * ```ts
 * format("value is ${x}", OrderedRecord.from({ x: 5 })) // "value is 5"
 * format("value is ${y}", OrderedRecord.from({ x: 5 })) // "value is ${y}"
 * ```
 */
export const format = (template: string, record: OrderedRecord): string =>
  interpolate(template, markerResolver(scopeOf(record))).text

const formatLine = (line: string, scope: Scope): string => {
  const trimmed = line.trimStart()
  if (trimmed.startsWith("#")) {
    return line
  }
  if (trimmed.startsWith("%")) {
    return line.replace("%", "#")
  }
  const text = interpolate(line, markerResolver(scope)).text
  if (text.trim().length === 0) {
    return text
  }
  const computed = attempt(() => evaluateExpression(text, emptyScope))
  return Either.isRight(computed) ? renderText(computed.right) : text
}

/**
 * Evaluates the record, then formats each line of `template` against the
 * snapshot and computes lines that read as arithmetic. Comment lines are
 * kept and a leading `%` is written as `#`.
 *
 * @category Formatting
 * @since 0.1.0
 */
export const formatEval = (template: string, record: OrderedRecord, options: EngineOptions = {}): string => {
  const scope = scopeOf(evaluate(record, options))
  return template
    .split("\n")
    .map((line) => formatLine(line, scope))
    .join("\n")
}
