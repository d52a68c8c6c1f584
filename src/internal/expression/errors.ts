import { Data } from "effect"
import type { ErrorMarker } from "../../Errors.js"

export class ExpressionEvaluationError extends Data.TaggedError("ExpressionEvaluationError")<{
  readonly expression: string
  readonly problem: string
}> {
  override get message(): string {
    return `Expression evaluation error: ${this.problem}`
  }
}

export class UnresolvedReferenceError extends Data.TaggedError("UnresolvedReferenceError")<{
  readonly expression: string
  readonly name: string
}> {
  override get message(): string {
    return `Identifier "${this.name}" is not defined`
  }
}

/** A referenced field holds an error marker of its own. */
export class MarkedReferenceError extends Data.TaggedError("MarkedReferenceError")<{
  readonly name: string
  readonly marker: ErrorMarker
}> {
  override get message(): string {
    return `"${this.name}" could not be evaluated: ${this.marker.cause}`
  }
}
