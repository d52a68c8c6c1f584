import { describe, expect, it } from "@effect/vitest"
import { ErrorMarker } from "../src/Errors.js"
import { NdArray } from "../src/internal/array/NdArray.js"
import { ExpressionEvaluationError, MarkedReferenceError, UnresolvedReferenceError } from "../src/internal/expression/errors.js"
import { type Scope, evaluateExpression, sliceIndices } from "../src/internal/expression/Evaluator.js"
import { OrderedRecord } from "../src/OrderedRecord.js"
import type { FieldValue } from "../src/Types.js"

const scopeOf = (record: OrderedRecord): Scope => (name) => record.getOption(name)

const scope = scopeOf(
  OrderedRecord.from({
    v: [1, 2, 3],
    m: new NdArray([2, 2], [1, 2, 3, 4]),
    flag: true,
  }),
)

const nested = (value: FieldValue): unknown => (value instanceof NdArray ? value.toNested() : value)

describe("scalar arithmetic", () => {
  it("follows the usual precedence", () => {
    expect(evaluateExpression("1 + 2 * 3")).toBe(7)
    expect(evaluateExpression("2^10")).toBe(1024)
    expect(evaluateExpression("2 ** 3 ** 2")).toBe(512)
    expect(evaluateExpression("-2^2")).toBe(-4)
  })

  it("uses floor division and a modulo that follows the divisor's sign", () => {
    expect(evaluateExpression("7 // 2")).toBe(3)
    expect(evaluateExpression("-7 // 2")).toBe(-4)
    expect(evaluateExpression("-7 % 3")).toBe(2)
  })

  it("reads constants, booleans and None", () => {
    expect(evaluateExpression("pi")).toBe(Math.PI)
    expect(evaluateExpression("true + 1")).toBe(2)
    expect(evaluateExpression("flag", scope)).toBe(true)
    expect(evaluateExpression("None")).toBeNull()
    expect(evaluateExpression("-inf")).toBe(Number.NEGATIVE_INFINITY)
  })

  it("calls math functions", () => {
    expect(evaluateExpression("sqrt(16)")).toBe(4)
    expect(evaluateExpression("log(8, 2)")).toBeCloseTo(3)
    expect(evaluateExpression("round(3.14159, 2)")).toBe(3.14)
    expect(evaluateExpression("max(1, 5, 3)")).toBe(5)
    expect(evaluateExpression("hypot(3, 4)")).toBe(5)
  })
})

describe("sequences", () => {
  it("broadcasts scalars and combines equal lengths", () => {
    expect(evaluateExpression("v * 2", scope)).toEqual([2, 4, 6])
    expect(evaluateExpression("v + v", scope)).toEqual([2, 4, 6])
    expect(evaluateExpression("10 - v", scope)).toEqual([9, 8, 7])
  })

  it("indexes from the end and slices with steps", () => {
    expect(evaluateExpression("v[1]", scope)).toBe(2)
    expect(evaluateExpression("v[-1]", scope)).toBe(3)
    expect(evaluateExpression("v[::-1]", scope)).toEqual([3, 2, 1])
    expect(evaluateExpression("v[0:2]", scope)).toEqual([1, 2])
    expect(sliceIndices(5, -2, undefined)).toEqual([3, 4])
    expect(sliceIndices(5, undefined, undefined, -2)).toEqual([4, 2, 0])
  })

  it("reduces", () => {
    expect(evaluateExpression("sum(v)", scope)).toBe(6)
    expect(evaluateExpression("mean(v)", scope)).toBe(2)
    expect(evaluateExpression("prod([])")).toBe(1)
  })
})

describe("arrays", () => {
  it("indexes matrices", () => {
    expect(evaluateExpression("m[1, 0]", scope)).toBe(3)
    expect(evaluateExpression("m[:, 1]", scope)).toEqual([2, 4])
    expect(evaluateExpression("m[0]", scope)).toEqual([1, 2])
  })

  it("transposes and multiplies only on request", () => {
    expect(nested(evaluateExpression("m.T", scope))).toEqual([
      [1, 3],
      [2, 4],
    ])
    expect(nested(evaluateExpression("m @ m", scope))).toEqual([
      [7, 10],
      [15, 22],
    ])
    expect(nested(evaluateExpression("m * m", scope))).toEqual([
      [1, 4],
      [9, 16],
    ])
    expect(evaluateExpression("[1, 2] @ [3, 4]")).toBe(11)
    expect(evaluateExpression("m @ [1, 1]", scope)).toEqual([3, 7])
  })

  it("builds arrays from literals and constructors", () => {
    const literal = evaluateExpression("[[1, 2], [3, 4]]")
    expect(literal instanceof NdArray ? literal.shape : undefined).toEqual([2, 2])
    expect(evaluateExpression("[[1], [2, 3]]")).toEqual([[1], [2, 3]])
    expect(evaluateExpression("zeros(3)")).toEqual([0, 0, 0])
    expect(nested(evaluateExpression("eye(2)"))).toEqual([
      [1, 0],
      [0, 1],
    ])
    expect(evaluateExpression("linspace(0, 1, 5)")).toEqual([0, 0.25, 0.5, 0.75, 1])
    expect(evaluateExpression("shape(m)", scope)).toEqual([2, 2])
    expect(evaluateExpression("numel(m)", scope)).toBe(4)
    expect(nested(evaluateExpression("array([1, 2])"))).toEqual([[1, 2]])
  })

  it("runs linear algebra helpers", () => {
    expect(evaluateExpression("det(m)", scope)).toBeCloseTo(-2)
    const values = evaluateExpression("eig([[2, 1], [1, 2]])")
    expect(Array.isArray(values) ? values.length : 0).toBe(2)
    expect(Array.isArray(values) ? values[0] : undefined).toBeCloseTo(1)
  })

  it("builds records", () => {
    const value = evaluateExpression("{a: 1, b: 'x'}")

    expect(value instanceof OrderedRecord ? value.toObject() : undefined).toEqual({ a: 1, b: "x" })
  })
})

describe("failures", () => {
  it("names unresolved references", () => {
    expect(() => evaluateExpression("x + 1")).toThrow(UnresolvedReferenceError)
    expect(() => evaluateExpression("x + 1")).toThrow('Identifier "x" is not defined')
  })

  it("wraps array errors as evaluation errors", () => {
    expect(() => evaluateExpression("[1, 2] + [1, 2, 3]")).toThrow(ExpressionEvaluationError)
    expect(() => evaluateExpression("[1, 2] + [1, 2, 3]")).toThrow(
      "Expression evaluation error: +: operands have lengths 2 and 3",
    )
    expect(() => evaluateExpression("'a' + 1")).toThrow("+: expected a number or numeric array, got string")
  })

  it("rejects unknown functions and bad indices", () => {
    expect(() => evaluateExpression("foo(1)")).toThrow('Unknown function "foo"')
    expect(() => evaluateExpression("v[5]", scope)).toThrow("index 5 is out of range for length 3")
    expect(() => evaluateExpression("v[1.5]", scope)).toThrow("indices must be integers, got number")
  })

  it("quotes the subexpression that cannot be indexed", () => {
    expect(() => evaluateExpression("flag[0]", scope)).toThrow("Expression evaluation error: cannot index flag, a boolean")
    expect(() => evaluateExpression("(2 * 3)[0]")).toThrow("cannot index 2 * 3, a number")
  })

  it("caps the size of constructed arrays", () => {
    expect(() => evaluateExpression("zeros(100000, 100000)")).toThrow(
      "zeros: 10000000000 elements exceed the limit of 10000000",
    )
    expect(() => evaluateExpression("eye(100000)")).toThrow("eye: 10000000000 elements exceed the limit of 10000000")
    expect(() => evaluateExpression("linspace(0, 1, 20000000)")).toThrow(ExpressionEvaluationError)
  })

  it("reduces long arrays without spreading them", () => {
    expect(evaluateExpression("max(zeros(500000) + 2)")).toBe(2)
    expect(evaluateExpression("min(ones(500000))")).toBe(1)
  })

  it("refuses to read a field that failed", () => {
    const failing = scopeOf(OrderedRecord.from({ bad: ErrorMarker.failed("bad", "boom") }))

    expect(() => evaluateExpression("bad * 2", failing)).toThrow(MarkedReferenceError)
  })
})
