import { describe, expect, it } from "@effect/vitest"
import { Effect, Either, Exit } from "effect"
import { parseExpressionAst, parseExpressionEffect, parseExpressionEither } from "../src/internal/expression/Parser.js"
import { printExpr } from "../src/internal/expression/Pretty.js"

const print = (source: string): string => printExpr(parseExpressionAst(source))

describe("expression parser", () => {
  it("applies operator precedence", () => {
    expect(print("1 + 2 * 3")).toBe("1 + (2 * 3)")
    expect(print("(1 + 2) * 3")).toBe("(1 + 2) * 3")
    expect(print("a - b - c")).toBe("(a - b) - c")
    expect(print("7 // 2 % 3")).toBe("(7 // 2) % 3")
  })

  it("treats ^ and ** as the same right-associative power", () => {
    expect(print("2 ^ 3 ^ 2")).toBe("2 ^ (3 ^ 2)")
    expect(print("2 ** 3")).toBe("2 ^ 3")
    expect(print("-2^2")).toBe("-(2 ^ 2)")
    expect(print("2^-1")).toBe("2 ^ (-1)")
  })

  it("parses calls, indexing, slices and transposes", () => {
    expect(print("sqrt(x) + max(1, 2)")).toBe("sqrt(x) + max(1, 2)")
    expect(print("m[0, 1]")).toBe("m[0, 1]")
    expect(print("v[1:]")).toBe("v[1:]")
    expect(print("v[::-1]")).toBe("v[::-1]")
    expect(print("m[:, 0]")).toBe("m[:, 0]")
    expect(print("m.T @ m")).toBe("m.T @ m")
  })

  it("parses lists, records, strings and booleans", () => {
    expect(print("[1, [2, 3]]")).toBe("[1, [2, 3]]")
    expect(print("{a: 1, 'b': true}")).toBe("{a: 1, b: true}")
    expect(print("'it\\'s'")).toBe('"it\'s"')
    expect(print("False")).toBe("false")
  })

  it("reports trailing input with its position", () => {
    const result = parseExpressionEither("1 2")

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.diagnostic.code).toBe("TrailingInput")
      expect(result.left.diagnostic.span?.start).toBe(2)
      expect(result.left.diagnostic.snippet).toBe("1 2\n  ^")
    }
  })

  it("reports unclosed brackets and unknown characters", () => {
    const unclosed = parseExpressionEither("(1 + 2")
    const unknown = parseExpressionEither("1 $ 2")
    const member = parseExpressionEither("m.shape")

    expect(Either.isLeft(unclosed) ? unclosed.left.diagnostic.code : undefined).toBe("UnexpectedEnd")
    expect(Either.isLeft(unknown) ? unknown.left.diagnostic.phase : undefined).toBe("lex")
    expect(Either.isLeft(member) ? member.left.message : undefined).toBe('Unsupported member ".shape"')
  })

  it.effect("fails the effect with a diagnostic error", () =>
    Effect.gen(function* () {
      const exit = yield* Effect.exit(parseExpressionEffect("1 +"))

      expect(Exit.isFailure(exit)).toBe(true)
      const handled = yield* parseExpressionEffect("1 +").pipe(
        Effect.catchTag("ExpressionDiagnosticError", (error) => Effect.succeed(error.diagnostic.code)),
      )
      expect(handled).toBe("UnexpectedEnd")
    }),
  )
})
