/**
 * Error hierarchy for the parameter engine.
 *
 * Structural failures (unknown names, reserved names, ordering failures) are
 * tagged errors so callers can pattern match with `Effect.catchTag`. Failures
 * while evaluating a single field never escape the evaluator; they are stored
 * in the snapshot as {@link ErrorMarker} values instead.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Unique symbol used to tag engine services within the context graph.
 *
 * @since 0.1.0
 */
export const EngineTypeId = Symbol.for("effect-param-templates/ParamEngine")

/**
 * Raised by direct record access to a name that is not defined.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const record = OrderedRecord.from({ a: 1 })
 * record.get("b") // throws FieldNotFoundError
 * ```
 */
export class FieldNotFoundError extends Data.TaggedError("FieldNotFoundError")<{
  readonly name: string
}> {
  override get message(): string {
    return `the field "${this.name}" does not exist`
  }
}

/**
 * Raised when a caller tries to assign one of the reserved names.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ReservedFieldError extends Data.TaggedError("ReservedFieldError")<{
  readonly name: string
}> {
  override get message(): string {
    return `"${this.name}" is a reserved name and cannot be assigned`
  }
}

/**
 * Raised by positional access outside the record.
 *
 * @category Errors
 * @since 0.1.0
 */
export class FieldIndexError extends Data.TaggedError("FieldIndexError")<{
  readonly index: number
  readonly length: number
}> {
  override get message(): string {
    return `index ${this.index} is out of range for a record of ${this.length} fields`
  }
}

/**
 * Raised by a strict dependency sort when some expressions can never be
 * ordered, either because they reference undefined names or form a cycle.
 *
 * @category Errors
 * @since 0.1.0
 */
export class OrderingFailureError extends Data.TaggedError("OrderingFailureError")<{
  readonly pending: number
  readonly total: number
  readonly names: ReadonlyArray<string>
}> {
  override get message(): string {
    return `could not order ${this.pending}/${this.total} expressions`
  }
}

/**
 * Raised while writing or reading the `name=value` text format.
 *
 * @category Errors
 * @since 0.1.0
 */
export class SerializationError extends Data.TaggedError("SerializationError")<{
  readonly path: string
  readonly line: number
  readonly problem: string
}> {
  override get message(): string {
    return this.line > 0
      ? `${this.path}:${this.line}: ${this.problem}`
      : `${this.path}: ${this.problem}`
  }
}

/**
 * Kind of failure recorded by an {@link ErrorMarker}.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ErrorMarkerKind = "UnresolvedReference" | "EvaluationError"

/**
 * Sentinel stored in a snapshot in place of a value that could not be
 * computed. Its text form is what ends up in generated output.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const snapshot = evaluate(OrderedRecord.from({ c: "${d}+1" }))
 * const marker = snapshot.get("c") // ErrorMarker { kind: "UnresolvedReference", missing: "d" }
 * String(marker) // '< undef definition "${d}" >'
 * ```
 */
export class ErrorMarker extends Data.TaggedClass("ErrorMarker")<{
  readonly kind: ErrorMarkerKind
  readonly field: string
  readonly cause: string
  readonly missing?: string
}> {
  static unresolved(field: string, missing: string): ErrorMarker {
    return new ErrorMarker({
      kind: "UnresolvedReference",
      field,
      cause: `unresolved reference to "${missing}"`,
      missing,
    })
  }

  static failed(field: string, cause: string): ErrorMarker {
    return new ErrorMarker({ kind: "EvaluationError", field, cause })
  }

  toString(): string {
    return this.missing !== undefined
      ? `< undef definition "\${${this.missing}}" >`
      : `ERROR < ${this.cause} >`
  }
}

/**
 * Type guard for {@link ErrorMarker}.
 *
 * @category Guards
 * @since 0.1.0
 */
export const isErrorMarker = (value: unknown): value is ErrorMarker => value instanceof ErrorMarker
