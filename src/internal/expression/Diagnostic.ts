import { Data } from "effect"
import type { Span } from "./Ast.js"

/**
 * Structured diagnostic raised while lexing or parsing an arithmetic
 * expression. The evaluator turns it into retained text or an error marker,
 * so it rarely reaches callers directly.
 */
export type ExpressionPhase = "lex" | "parse"

export type ExpressionErrorCode =
  | "UnexpectedToken"
  | "UnexpectedEnd"
  | "UnclosedBracket"
  | "TrailingInput"
  | "UnknownToken"
  | "InvalidNumber"
  | "InvalidMember"

export interface ExpressionDiagnostic {
  readonly phase: ExpressionPhase
  readonly code: ExpressionErrorCode
  readonly message: string
  readonly span?: Span
  readonly snippet?: string
}

export class ExpressionDiagnosticError extends Data.TaggedError("ExpressionDiagnosticError")<{
  readonly diagnostic: ExpressionDiagnostic
}> {
  override get message(): string {
    return this.diagnostic.message
  }
}

export const snippet = (source: string, span: Span): string => {
  const lines = source.split(/\r?\n/)
  const line = lines[span.line - 1] ?? ""
  const caretLine = `${" ".repeat(Math.max(0, span.column - 1))}^`
  return `${line}\n${caretLine}`
}
