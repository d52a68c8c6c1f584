import { ErrorMarker } from "../../Errors.js"
import { OrderedRecord, isList } from "../../OrderedRecord.js"
import { PathValue } from "../../PathValue.js"
import type { FieldValue, Numeric } from "../../Types.js"
import { matmul } from "../array/LinearAlgebra.js"
import { ArrayError, NdArray, broadcast, type NestedNumbers } from "../array/NdArray.js"
import type { BinaryOp } from "./Ast.js"

export const describeType = (value: FieldValue): string => {
  if (value === null) return "None"
  if (typeof value === "string") return "string"
  if (typeof value === "boolean") return "boolean"
  if (typeof value === "number") return "number"
  if (value instanceof PathValue) return "path"
  if (value instanceof ErrorMarker) return "error marker"
  if (value instanceof OrderedRecord) return "record"
  if (value instanceof NdArray) return `array [${value.shape.join("x")}]`
  return "list"
}

const nestedNumbers = (value: FieldValue): NestedNumbers | undefined => {
  if (typeof value === "number") return value
  if (typeof value === "boolean") return value ? 1 : 0
  if (value instanceof NdArray) return value.toNested()
  if (!isList(value)) return undefined
  const items: Array<NestedNumbers> = []
  for (const item of value) {
    const converted = nestedNumbers(item)
    if (converted === undefined) return undefined
    items.push(converted)
  }
  return items
}

/** Rank-1 results are plain sequences; higher ranks stay arrays. */
export const collapse = (array: NdArray): Numeric => (array.rank === 1 ? [...array.data] : array)

export const toNumeric = (value: FieldValue, operation: string): Numeric => {
  if (typeof value === "number") return value
  if (typeof value === "boolean") return value ? 1 : 0
  if (value instanceof NdArray) return value
  const nested = nestedNumbers(value)
  if (nested !== undefined && typeof nested !== "number") {
    if (nested.every((item): item is number => typeof item === "number")) {
      return nested
    }
    return collapse(NdArray.fromNested(nested))
  }
  throw new ArrayError({ operation, problem: `expected a number or numeric array, got ${describeType(value)}` })
}

export const asArray = (value: Numeric): NdArray => {
  if (typeof value === "number") return new NdArray([1], [value])
  if (value instanceof NdArray) return value
  return new NdArray([value.length], value)
}

export const mapNumeric = (value: Numeric, f: (x: number) => number): Numeric => {
  if (typeof value === "number") return f(value)
  if (value instanceof NdArray) return value.map(f)
  return value.map(f)
}

export const flatten = (value: Numeric): ReadonlyArray<number> => {
  if (typeof value === "number") return [value]
  if (value instanceof NdArray) return value.data
  return value
}

export const combine = (
  left: Numeric,
  right: Numeric,
  f: (x: number, y: number) => number,
  operation: string,
): Numeric => {
  if (typeof left === "number" && typeof right === "number") {
    return f(left, right)
  }
  if (!(left instanceof NdArray) && !(right instanceof NdArray)) {
    if (typeof left === "number") return flatten(right).map((y) => f(left, y))
    if (typeof right === "number") return left.map((x) => f(x, right))
    if (left.length !== right.length) {
      throw new ArrayError({ operation, problem: `operands have lengths ${left.length} and ${right.length}` })
    }
    return left.map((x, i) => f(x, right[i] ?? Number.NaN))
  }
  return collapse(broadcast(asArray(left), asArray(right), f))
}

const flooredMod = (x: number, y: number): number => (y === 0 ? Number.NaN : x - y * Math.floor(x / y))

export const BinaryFunctions: Readonly<Record<Exclude<BinaryOp, "@">, (x: number, y: number) => number>> = {
  "+": (x, y) => x + y,
  "-": (x, y) => x - y,
  "*": (x, y) => x * y,
  "/": (x, y) => x / y,
  "//": (x, y) => Math.floor(x / y),
  "%": flooredMod,
  "^": (x, y) => x ** y,
}

/**
 * Matrix product with vector promotion: a sequence on the left acts as a row
 * and on the right as a column, and the promoted axis is dropped again.
 */
export const matmulValues = (left: Numeric, right: Numeric): Numeric => {
  if (typeof left === "number" || typeof right === "number") {
    throw new ArrayError({ operation: "matmul", problem: "operands must be arrays, not scalars" })
  }
  if (!(left instanceof NdArray) && !(right instanceof NdArray)) {
    if (left.length !== right.length) {
      throw new ArrayError({ operation: "matmul", problem: `vectors have lengths ${left.length} and ${right.length}` })
    }
    return left.reduce((acc, x, i) => acc + x * (right[i] ?? 0), 0)
  }
  const a = left instanceof NdArray ? left : NdArray.row(left)
  const b = right instanceof NdArray ? right : new NdArray([right.length, 1], right)
  const product = matmul(a, b)
  if (!(left instanceof NdArray)) return [...product.data]
  if (!(right instanceof NdArray)) return [...product.data]
  return product
}
